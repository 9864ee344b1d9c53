import fs from 'node:fs';
import path from 'node:path';
import { nanoid } from 'nanoid';
import { errorMessage, PersistenceError } from '../errors.js';

export interface AtomicWriteOptions {
  /** Runs after the temp file is durable, before the rename */
  beforeRename?: (tmpPath: string) => void;
}

/**
 * Write-temp-then-rename. Readers only ever see the previous file or the
 * complete new one; a crash before the rename leaves the previous file as is.
 * Each writer gets its own temp name.
 */
export function atomicWriteFileSync(filePath: string, payload: string, opts: AtomicWriteOptions = {}): void {
  const dir = path.dirname(filePath);
  const tmpPath = path.join(dir, `.${path.basename(filePath)}.${nanoid(8)}.tmp`);

  let created = false;
  try {
    fs.mkdirSync(dir, { recursive: true });
    const fd = fs.openSync(tmpPath, 'w', 0o644);
    created = true;
    try {
      fs.writeFileSync(fd, payload, 'utf-8');
      fs.fsyncSync(fd);
    } finally {
      fs.closeSync(fd);
    }
    opts.beforeRename?.(tmpPath);
    fs.renameSync(tmpPath, filePath);
  } catch (err) {
    if (created) fs.rmSync(tmpPath, { force: true });
    throw new PersistenceError(`Failed to write ${filePath}: ${errorMessage(err)}`, filePath, { cause: err });
  }
}
