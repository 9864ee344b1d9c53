import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import path from 'node:path';
import os from 'node:os';
import { Readable } from 'node:stream';
import { EXIT_ALLOW, EXIT_BLOCK, EXIT_FATAL, readStdin, runHook, toExitResult } from '../../src/cli/hook.js';
import { IterationController } from '../../src/loop/controller.js';
import { LoopStore } from '../../src/loop/store.js';

let tmpDir: string;

beforeEach(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'hookgate-hook-test-'));
});

afterEach(() => {
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

function event(fields: Record<string, unknown>): string {
  return JSON.stringify({ session_id: 'sess-1', cwd: tmpDir, ...fields });
}

describe('toExitResult', () => {
  it('should map outcomes onto the host exit codes', () => {
    expect(toExitResult({ decision: 'allow', reason: 'fine' })).toEqual({ exitCode: EXIT_ALLOW, stderr: '' });
    expect(toExitResult({ decision: 'block', reason: 'no' })).toEqual({ exitCode: EXIT_BLOCK, stderr: 'no' });
    expect(toExitResult({ decision: 'fatal', reason: 'disk full' })).toEqual({
      exitCode: EXIT_FATAL,
      stderr: '[hookgate] disk full',
    });
  });

  it('should use 0, 2 and 1', () => {
    expect([EXIT_ALLOW, EXIT_BLOCK, EXIT_FATAL]).toEqual([0, 2, 1]);
  });
});

describe('runHook', () => {
  it('should exit 2 with the reason on stderr for a blocked command', async () => {
    const result = await runHook(
      event({ hook_event_name: 'PreToolUse', tool_name: 'Bash', tool_input: { command: 'git push --force origin feature' } }),
      { projectDir: tmpDir, env: {} },
    );
    expect(result).toEqual({
      exitCode: 2,
      stderr: 'Blocked by hookgate [version-control]: Force-push rewrites shared history',
    });
  });

  it('should exit 0 silently for an allowed command', async () => {
    const result = await runHook(
      event({ hook_event_name: 'PreToolUse', tool_name: 'Bash', tool_input: { command: 'git status' } }),
      { projectDir: tmpDir, env: {} },
    );
    expect(result).toEqual({ exitCode: 0, stderr: '' });
  });

  it('should exit 0 on a malformed event by default', async () => {
    expect(await runHook('not json', { projectDir: tmpDir, env: {} })).toEqual({ exitCode: 0, stderr: '' });
  });

  it('should exit 2 on a malformed pre-invocation under the closed policy', async () => {
    const result = await runHook(event({ hook_event_name: 'PreToolUse' }), {
      projectDir: tmpDir,
      env: {},
      failurePolicy: 'closed',
    });
    expect(result.exitCode).toBe(2);
    expect(result.stderr.endsWith('(failure policy: closed)')).toBe(true);
  });

  it('should print the continuation prompt when a loop keeps the session going', async () => {
    const store = new LoopStore(path.join(tmpDir, '.hookgate', 'loops'));
    new IterationController(store, { defaultCompletionToken: 'DONE', defaultMaxIterations: 5 }).setup({
      taskText: 'Ship the feature',
    });

    const result = await runHook(event({ hook_event_name: 'Stop', stop_hook_active: false }), {
      projectDir: tmpDir,
      env: {},
    });

    expect(result.exitCode).toBe(2);
    expect(result.stderr.split('\n')[0]).toBe('[hookgate loop 2/5] The task is not complete yet. Keep working on it.');
    expect(result.stderr.endsWith('\n\nShip the feature')).toBe(true);
  });

  it('should apply the failure policy to unexpected errors', async () => {
    const defaultsPath = path.join(tmpDir, 'defaults-dir');
    fs.mkdirSync(defaultsPath);
    const raw = event({ hook_event_name: 'PreToolUse', tool_name: 'Bash', tool_input: { command: 'ls' } });

    const open = await runHook(raw, { projectDir: tmpDir, env: {}, defaultsPath });
    const closed = await runHook(raw, { projectDir: tmpDir, env: {}, defaultsPath, failurePolicy: 'closed' });

    expect(open.exitCode).toBe(0);
    expect(open.stderr.startsWith('[hookgate] Internal error: ')).toBe(true);
    expect(closed.exitCode).toBe(2);
    expect(closed.stderr.startsWith('Internal error: ')).toBe(true);
    expect(closed.stderr.endsWith('(failure policy: closed)')).toBe(true);
  });
});

describe('readStdin', () => {
  it('should concatenate every chunk', async () => {
    expect(await readStdin(Readable.from(['{"a":', '1}']))).toBe('{"a":1}');
  });

  it('should decode buffers', async () => {
    expect(await readStdin(Readable.from([Buffer.from('héllo', 'utf-8')]))).toBe('héllo');
  });
});
