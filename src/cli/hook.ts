/**
 * `hookgate hook`, the host entry point. Reads one event from stdin and
 * answers with the host's exit-status contract:
 *
 *   0  allow
 *   2  block (reason on stderr; for stop events it becomes the next turn)
 *   1  fatal (loop state could not be persisted)
 */

import type { Command } from 'commander';
import { failureOutcome } from '../engine/dispatcher.js';
import { peekHostEvent } from '../engine/envelope.js';
import { HookRuntime, resolveProjectDir, type RuntimeConfig } from '../engine/runtime.js';
import { errorMessage } from '../errors.js';
import { FailurePolicySchema } from '../policy/schema.js';
import type { HookOutcome } from '../types.js';

export const EXIT_ALLOW = 0;
export const EXIT_FATAL = 1;
export const EXIT_BLOCK = 2;

export interface HookCommandResult {
  exitCode: number;
  stderr: string;
}

export function toExitResult(outcome: HookOutcome): HookCommandResult {
  switch (outcome.decision) {
    case 'allow':
      return { exitCode: EXIT_ALLOW, stderr: '' };
    case 'block':
      return { exitCode: EXIT_BLOCK, stderr: outcome.reason };
    case 'fatal':
      return { exitCode: EXIT_FATAL, stderr: `[hookgate] ${outcome.reason}` };
  }
}

export async function runHook(raw: string, config: RuntimeConfig): Promise<HookCommandResult> {
  try {
    const runtime = HookRuntime.create(config);
    return toExitResult(await runtime.dispatch(raw));
  } catch (err) {
    const outcome = failureOutcome(
      config.failurePolicy ?? 'open',
      peekHostEvent(raw),
      `Internal error: ${errorMessage(err)}`,
    );
    const result = toExitResult(outcome);
    return outcome.decision === 'allow' ? { ...result, stderr: `[hookgate] ${outcome.reason ?? ''}` } : result;
  }
}

export async function readStdin(stream: NodeJS.ReadableStream = process.stdin): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(typeof chunk === 'string' ? Buffer.from(chunk, 'utf-8') : chunk);
  }
  return Buffer.concat(chunks).toString('utf-8');
}

export function registerHookCommand(program: Command): void {
  program
    .command('hook')
    .description('Handle one host hook event from stdin (exit 0 allow, 2 block, 1 fatal)')
    .option('--config <file>', 'Config file (default: <project>/.hookgate/config.yaml)')
    .option('--project-dir <dir>', 'Project root (default: $CLAUDE_PROJECT_DIR, then cwd)')
    .option('--failure-policy <policy>', 'open | closed (overrides the config)')
    .action(async (opts: { config?: string; projectDir?: string; failurePolicy?: string }) => {
      const policy = opts.failurePolicy === undefined ? undefined : FailurePolicySchema.safeParse(opts.failurePolicy);
      if (policy && !policy.success) {
        console.error(`[hookgate] Invalid --failure-policy "${opts.failurePolicy}" (expected open or closed)`);
      }

      const raw = await readStdin();
      const result = await runHook(raw, {
        projectDir: resolveProjectDir(opts.projectDir),
        configPath: opts.config,
        failurePolicy: policy?.success ? policy.data : undefined,
      });

      if (result.stderr) {
        process.stderr.write(result.stderr.endsWith('\n') ? result.stderr : `${result.stderr}\n`);
      }
      process.exitCode = result.exitCode;
    });
}
