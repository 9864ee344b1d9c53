import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import path from 'node:path';
import os from 'node:os';
import { withFileLock, withFileLockSync } from '../../src/io/file-lock.js';

let tmpDir: string;
let lockPath: string;

beforeEach(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'hookgate-lock-test-'));
  lockPath = path.join(tmpDir, 'state', 'data.lock');
});

afterEach(() => {
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

describe('withFileLock', () => {
  it('should hold the lock while the callback runs and release it after', async () => {
    const result = await withFileLock(lockPath, async () => fs.existsSync(lockPath));
    expect(result).toBe(true);
    expect(fs.existsSync(lockPath)).toBe(false);
  });

  it('should release the lock when the callback throws', async () => {
    await expect(
      withFileLock(lockPath, async () => {
        throw new Error('boom');
      }),
    ).rejects.toThrow('boom');
    expect(fs.existsSync(lockPath)).toBe(false);
  });

  it('should run callbacks one at a time', async () => {
    const order: string[] = [];
    const task = (name: string) =>
      withFileLock(lockPath, async () => {
        order.push(`${name}:start`);
        await new Promise<void>((resolve) => setTimeout(resolve, 20));
        order.push(`${name}:end`);
      });

    await Promise.all([task('a'), task('b')]);

    expect(order.map((step) => step.split(':')[1])).toEqual(['start', 'end', 'start', 'end']);
    expect(order[0].split(':')[0]).toBe(order[1].split(':')[0]);
  });

  it('should time out while another holder keeps the lock', async () => {
    fs.mkdirSync(path.dirname(lockPath), { recursive: true });
    fs.writeFileSync(lockPath, '');

    await expect(withFileLock(lockPath, async () => 'never', { timeoutMs: 30 })).rejects.toThrow(
      `Timed out after 30ms waiting for lock ${lockPath}`,
    );
    expect(fs.existsSync(lockPath)).toBe(true);
  });
});

describe('withFileLockSync', () => {
  it('should take over a stale lock', () => {
    fs.mkdirSync(path.dirname(lockPath), { recursive: true });
    fs.writeFileSync(lockPath, '');
    const past = new Date(Date.now() - 60_000);
    fs.utimesSync(lockPath, past, past);

    expect(withFileLockSync(lockPath, () => 42, { staleMs: 1000 })).toBe(42);
    expect(fs.existsSync(lockPath)).toBe(false);
  });

  it('should time out on a fresh lock', () => {
    fs.mkdirSync(path.dirname(lockPath), { recursive: true });
    fs.writeFileSync(lockPath, '');

    expect(() => withFileLockSync(lockPath, () => 1, { timeoutMs: 20 })).toThrow(/^Timed out after 20ms/);
  });
});
