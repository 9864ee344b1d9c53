/**
 * `hookgate loop start|cancel|status`: operator side of the iteration loop.
 * These commands never block anything; they only write or read loop state.
 */

import { InvalidArgumentError, type Command } from 'commander';
import fs from 'node:fs';
import path from 'node:path';
import { createLoopController, resolveProjectDir } from '../engine/runtime.js';
import { ConfigurationError, errorMessage, formatIssues } from '../errors.js';
import type { CancelResult, IterationController, LoopStatus, SetupResult } from '../loop/controller.js';
import { DEFAULT_LOOP_KEY } from '../loop/store.js';
import { loadGuardConfig } from '../policy/loader.js';
import { readStdin } from './hook.js';

interface LoopCommonOptions {
  projectDir?: string;
  config?: string;
  session?: string;
}

interface LoopStartOptions extends LoopCommonOptions {
  maxIterations?: number;
  completionToken?: string;
  taskFile?: string;
}

export function parsePositiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return n;
}

export function openLoopController(opts: LoopCommonOptions): IterationController {
  const projectDir = resolveProjectDir(opts.projectDir);
  const config = loadGuardConfig({ projectDir, configPath: opts.config });
  return createLoopController(config, projectDir);
}

/**
 * Task text from the positional words, else `--task-file`, else stdin when
 * it is not a terminal.
 */
export async function resolveTaskText(
  words: string[],
  taskFile: string | undefined,
  stdin: NodeJS.ReadStream = process.stdin,
): Promise<string> {
  if (words.length > 0) return words.join(' ');
  if (taskFile) return fs.readFileSync(path.resolve(taskFile), 'utf-8').replace(/\n+$/, '');
  if (!stdin.isTTY) return (await readStdin(stdin)).replace(/\n+$/, '');
  return '';
}

export function formatSetupResult(result: SetupResult): string[] {
  const { state } = result;
  if (result.status === 'already_active') {
    return [
      `A loop is already active for "${result.key}" (iteration ${state.iteration}/${state.max_iterations}); nothing changed.`,
      'Run `hookgate loop cancel` first to replace it.',
    ];
  }
  const lines = [
    `Loop started for "${result.key}": up to ${state.max_iterations} iteration(s).`,
    `The session may only end once the agent outputs <promise>${state.completion_token}</promise>.`,
  ];
  if (result.archivedTo) lines.push(`Previous record archived to ${result.archivedTo}`);
  return lines;
}

export function formatCancelResult(result: CancelResult): string[] {
  if (result.status === 'no_active_loop') {
    return [`No active loop for "${result.key}".`];
  }
  return [`Loop for "${result.key}" cancelled at iteration ${result.state.iteration}/${result.state.max_iterations}.`];
}

export function formatStatus(status: LoopStatus): string[] {
  const { state } = status;
  if (!state) return [`Loop "${status.key}": NoLoop`];

  const lines = [
    `Loop "${status.key}": ${status.phase}`,
    `  Iteration: ${state.iteration}/${state.max_iterations}`,
    `  Completion token: ${state.completion_token}`,
    `  Started: ${state.started_at}`,
  ];
  if (state.ended_at) lines.push(`  Ended: ${state.ended_at} (${state.end_reason ?? 'unknown'})`);
  if (state.owner_session) lines.push(`  Session: ${state.owner_session}`);
  const firstLine = state.task_text.split('\n')[0];
  lines.push(`  Task: ${firstLine.length > 80 ? `${firstLine.slice(0, 80)}...` : firstLine}`);
  return lines;
}

function reportError(err: unknown): void {
  if (err instanceof ConfigurationError && err.issues.length > 0) {
    console.error(`Error: ${err.message}: ${formatIssues(err.issues)}`);
  } else {
    console.error(`Error: ${errorMessage(err)}`);
  }
  process.exitCode = 1;
}

function addCommonOptions(cmd: Command): Command {
  return cmd
    .option('--session <key>', 'Loop key (defaults to the shared key)', DEFAULT_LOOP_KEY)
    .option('--project-dir <dir>', 'Project root (default: $CLAUDE_PROJECT_DIR, then cwd)')
    .option('--config <file>', 'Config file (default: <project>/.hookgate/config.yaml)');
}

export function registerLoopCommand(program: Command): void {
  const loop = program.command('loop').description('Keep the agent working until it emits a completion promise');

  addCommonOptions(
    loop
      .command('start')
      .description('Start an iteration loop for a task')
      .argument('[task...]', 'Task text (or use --task-file / stdin)')
      .option('--max-iterations <n>', 'Iteration budget', parsePositiveInt)
      .option('--completion-token <token>', 'Token the agent must emit inside <promise> tags')
      .option('--task-file <file>', 'Read the task text from a file'),
  ).action(async (words: string[], opts: LoopStartOptions) => {
    try {
      const taskText = await resolveTaskText(words, opts.taskFile);
      const result = openLoopController(opts).setup({
        key: opts.session,
        taskText,
        maxIterations: opts.maxIterations,
        completionToken: opts.completionToken,
      });
      for (const line of formatSetupResult(result)) console.log(line);
    } catch (err) {
      reportError(err);
    }
  });

  addCommonOptions(loop.command('cancel').description('Cancel the active loop')).action(
    (opts: LoopCommonOptions) => {
      try {
        const result = openLoopController(opts).cancel(opts.session);
        for (const line of formatCancelResult(result)) console.log(line);
      } catch (err) {
        reportError(err);
      }
    },
  );

  addCommonOptions(loop.command('status').description('Show the loop phase and record')).action(
    (opts: LoopCommonOptions) => {
      try {
        const status = openLoopController(opts).status(opts.session);
        for (const line of formatStatus(status)) console.log(line);
      } catch (err) {
        reportError(err);
      }
    },
  );
}
