#!/usr/bin/env node

/**
 * hookgate CLI
 *
 * Commands:
 *   hook                                  Handle one host hook event from stdin
 *   loop start|cancel|status              Manage the iteration loop
 *   check --command <cmd>                 Dry-run the command guard
 *   check --path <p> [--content <text>]   Dry-run the path guard
 *   validate [config.yaml]                Validate a config file
 *   report <log.jsonl>                    Verify and summarize an audit log
 *   init                                  Wire hooks and scaffold config
 *   doctor                                Check the installation
 */

import { Command } from 'commander';
import { createGuardSet, resolveProjectDir } from '../engine/runtime.js';
import { ConfigurationError, errorMessage } from '../errors.js';
import { loadGuardConfig, PROJECT_CONFIG_PATH } from '../policy/loader.js';
import type { Verdict } from '../types.js';
import { registerDoctorCommand } from './doctor.js';
import { EXIT_ALLOW, EXIT_BLOCK, registerHookCommand } from './hook.js';
import { registerInitCommand } from './init.js';
import { registerLoopCommand } from './loop.js';
import { registerReportCommand } from './report.js';

const program = new Command();

program
  .name('hookgate')
  .description('Guard agent tool calls and keep sessions iterating until a task is done')
  .version('0.1.0');

function printConfigError(err: unknown): void {
  if (err instanceof ConfigurationError) {
    console.error(`Config validation failed: ${err.message}`);
    for (const issue of err.issues) {
      console.error(`  ${issue.path ? issue.path + ': ' : ''}${issue.message}`);
    }
  } else {
    console.error(`Error: ${errorMessage(err)}`);
  }
}

// ---------------------------------------------------------------------------
// hook / loop / report / init / doctor
// ---------------------------------------------------------------------------

registerHookCommand(program);
registerLoopCommand(program);
registerReportCommand(program);
registerInitCommand(program);
registerDoctorCommand(program);

// ---------------------------------------------------------------------------
// validate
// ---------------------------------------------------------------------------

program
  .command('validate')
  .description('Validate a config file (merged over the bundled defaults)')
  .argument('[config]', `Config file (default: ${PROJECT_CONFIG_PATH})`)
  .option('--project-dir <dir>', 'Project root (default: $CLAUDE_PROJECT_DIR, then cwd)')
  .action((configPath: string | undefined, opts: { projectDir?: string }) => {
    try {
      const projectDir = resolveProjectDir(opts.projectDir);
      const config = loadGuardConfig({ projectDir, configPath });
      createGuardSet(config, { projectDir, env: {} });

      console.log('Config is valid.');
      console.log(`  Version: ${config.version}`);
      console.log(`  Inherits defaults: ${config.inherit_defaults}`);
      console.log(`  Failure policy: ${config.failure_policy}`);
      console.log(`  Command categories: ${config.command_guard.categories.length}`);
      for (const category of config.command_guard.categories) {
        console.log(
          `    ${category.name}: ${category.rules.length} rule(s), ${category.exceptions.length} exception(s)`,
        );
      }
      console.log(`  Protected globs: ${config.path_guard.protected.length}`);
      console.log(`  Path exceptions: ${config.path_guard.exceptions.length}`);
      console.log(`  Sentinel markers: ${config.path_guard.sentinel_markers.length}`);
      console.log(`  Override variable: ${config.path_guard.override_env}`);
      console.log(
        `  Loop: ${config.loop.default_max_iterations} iteration(s), token ${config.loop.default_completion_token}, state in ${config.loop.state_dir}`,
      );
      console.log(`  Audit: ${config.audit.enabled ? config.audit.dir : 'disabled'}`);
    } catch (err) {
      printConfigError(err);
      process.exitCode = 1;
    }
  });

// ---------------------------------------------------------------------------
// check
// ---------------------------------------------------------------------------

function printVerdict(verdict: Verdict): void {
  if (verdict.decision === 'block') {
    console.log(`BLOCK [${verdict.category}] ${verdict.reason}`);
    console.log(`  pattern: ${verdict.pattern}`);
  } else {
    console.log(verdict.reason ? `ALLOW ${verdict.reason}` : 'ALLOW');
  }
}

program
  .command('check')
  .description('Dry-run a guard against a command or a write target (exit 0 allow, 2 block)')
  .option('--command <command>', 'Shell command to check')
  .option('--path <path>', 'File path to check')
  .option('--content <text>', 'Proposed file content (with --path)')
  .option('--project-dir <dir>', 'Project root (default: $CLAUDE_PROJECT_DIR, then cwd)')
  .option('--config <file>', 'Config file (default: <project>/.hookgate/config.yaml)')
  .action((opts: { command?: string; path?: string; content?: string; projectDir?: string; config?: string }) => {
    if (opts.command === undefined && opts.path === undefined) {
      console.error('Error: pass --command or --path');
      process.exitCode = 1;
      return;
    }
    try {
      const projectDir = resolveProjectDir(opts.projectDir);
      const config = loadGuardConfig({ projectDir, configPath: opts.config });
      const guards = createGuardSet(config, { projectDir });

      const verdicts: Verdict[] = [];
      if (opts.command !== undefined) verdicts.push(guards.commandGuard.evaluate(opts.command));
      if (opts.path !== undefined) verdicts.push(guards.pathGuard.evaluate({ path: opts.path, content: opts.content, cwd: process.cwd() }));

      verdicts.forEach(printVerdict);
      process.exitCode = verdicts.some((v) => v.decision === 'block') ? EXIT_BLOCK : EXIT_ALLOW;
    } catch (err) {
      printConfigError(err);
      process.exitCode = 1;
    }
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  console.error(`Error: ${errorMessage(err)}`);
  process.exit(1);
});
