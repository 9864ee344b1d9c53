import fs from 'node:fs';
import path from 'node:path';

export interface FileLockOptions {
  /** Give up after this long (ms) */
  timeoutMs?: number;
  /** Poll interval while another holder has the lock (ms) */
  retryMs?: number;
  /** A lock file older than this (ms) is left over from a crashed holder and is removed */
  staleMs?: number;
}

const DEFAULTS = { timeoutMs: 5000, retryMs: 10, staleMs: 30_000 };

function isErrno(err: unknown, code: string): boolean {
  return err instanceof Error && 'code' in err && err.code === code;
}

/** One attempt at `open(lockPath, 'wx')`. Returns false when someone else holds it. */
function tryAcquire(lockPath: string, staleMs: number): boolean {
  try {
    fs.closeSync(fs.openSync(lockPath, 'wx'));
    return true;
  } catch (err) {
    if (!isErrno(err, 'EEXIST')) throw err;
  }

  try {
    const age = Date.now() - fs.statSync(lockPath).mtimeMs;
    if (age > staleMs) fs.rmSync(lockPath, { force: true });
  } catch (err) {
    // Released between the open and the stat
    if (!isErrno(err, 'ENOENT')) throw err;
  }
  return false;
}

function release(lockPath: string): void {
  fs.rmSync(lockPath, { force: true });
}

function timeoutError(lockPath: string, timeoutMs: number): Error {
  return new Error(`Timed out after ${timeoutMs}ms waiting for lock ${lockPath}`);
}

/**
 * Run `fn` while holding an exclusive lock file. Works across processes:
 * creation with `wx` is atomic on local filesystems.
 */
export async function withFileLock<T>(
  lockPath: string,
  fn: () => Promise<T>,
  options: FileLockOptions = {},
): Promise<T> {
  const { timeoutMs, retryMs, staleMs } = { ...DEFAULTS, ...options };
  await fs.promises.mkdir(path.dirname(lockPath), { recursive: true });

  const deadline = Date.now() + timeoutMs;
  while (!tryAcquire(lockPath, staleMs)) {
    if (Date.now() >= deadline) throw timeoutError(lockPath, timeoutMs);
    await new Promise<void>((resolve) => setTimeout(resolve, retryMs));
  }

  try {
    return await fn();
  } finally {
    release(lockPath);
  }
}

const sleepCell = new Int32Array(new SharedArrayBuffer(4));

/** Synchronous variant for the loop store, whose callers are synchronous. */
export function withFileLockSync<T>(lockPath: string, fn: () => T, options: FileLockOptions = {}): T {
  const { timeoutMs, retryMs, staleMs } = { ...DEFAULTS, ...options };
  fs.mkdirSync(path.dirname(lockPath), { recursive: true });

  const deadline = Date.now() + timeoutMs;
  while (!tryAcquire(lockPath, staleMs)) {
    if (Date.now() >= deadline) throw timeoutError(lockPath, timeoutMs);
    Atomics.wait(sleepCell, 0, 0, retryMs);
  }

  try {
    return fn();
  } finally {
    release(lockPath);
  }
}
