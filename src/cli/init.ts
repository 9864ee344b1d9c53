/**
 * `hookgate init` command.
 *
 * Scaffolds the host hook wiring and a project config so a repository is
 * guarded with a single command. An existing settings.json is merged: its
 * other keys and foreign hooks are kept.
 */

import type { Command } from 'commander';
import fs from 'node:fs';
import path from 'node:path';
import { errorMessage } from '../errors.js';
import { PROJECT_CONFIG_PATH } from '../policy/loader.js';
import { DEFAULT_PROJECT_CONFIG, generateClaudeSettingsJson, generateHooksSection } from './templates.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

interface FileToWrite {
  /** Absolute path */
  path: string;
  /** File content */
  content: string;
  /** Short label for display (relative to project root) */
  label: string;
  /** Description shown next to the file in output */
  description: string;
}

export interface InitResult {
  created: FileToWrite[];
  merged: FileToWrite[];
  skipped: FileToWrite[];
}

export interface InitOptions {
  projectDir: string;
  /** How the host invokes hookgate, e.g. "npx hookgate" */
  command?: string;
  force?: boolean;
}

export const DEFAULT_HOOK_COMMAND = 'npx --no-install hookgate';

export const SETTINGS_PATH = path.join('.claude', 'settings.json');

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function writeFile(file: FileToWrite): void {
  fs.mkdirSync(path.dirname(file.path), { recursive: true });
  fs.writeFileSync(file.path, file.content, 'utf-8');
}

/**
 * Add hookgate's handlers to an existing settings object. Handlers that
 * already invoke `<command> hook` are replaced, everything else is kept.
 */
export function mergeHookSettings(existing: Record<string, unknown>, command: string): Record<string, unknown> {
  const ours = generateHooksSection(command);
  const hooks: Record<string, unknown> = isRecord(existing.hooks) ? { ...existing.hooks } : {};
  const ourCommand = `${command} hook`;

  for (const [event, handlers] of Object.entries(ours)) {
    const value = hooks[event];
    const current: unknown[] = Array.isArray(value) ? value : [];
    const foreign = current.filter((handler: unknown) => {
      if (!isRecord(handler) || !Array.isArray(handler.hooks)) return true;
      return !handler.hooks.some((h: unknown) => isRecord(h) && h.command === ourCommand);
    });
    hooks[event] = [...foreign, ...handlers];
  }

  return { ...existing, hooks };
}

// ---------------------------------------------------------------------------
// Core init logic
// ---------------------------------------------------------------------------

export function runInit(opts: InitOptions): InitResult {
  const projectDir = path.resolve(opts.projectDir);
  const command = opts.command ?? DEFAULT_HOOK_COMMAND;
  const result: InitResult = { created: [], merged: [], skipped: [] };

  const configFile: FileToWrite = {
    path: path.join(projectDir, PROJECT_CONFIG_PATH),
    content: DEFAULT_PROJECT_CONFIG,
    label: PROJECT_CONFIG_PATH,
    description: 'guard rules and loop defaults (edit to customize)',
  };
  if (fs.existsSync(configFile.path) && !opts.force) {
    result.skipped.push(configFile);
  } else {
    writeFile(configFile);
    result.created.push(configFile);
  }

  const settingsPath = path.join(projectDir, SETTINGS_PATH);
  if (!fs.existsSync(settingsPath) || opts.force) {
    const file: FileToWrite = {
      path: settingsPath,
      content: generateClaudeSettingsJson(command),
      label: SETTINGS_PATH,
      description: 'hook wiring',
    };
    writeFile(file);
    result.created.push(file);
    return result;
  }

  let existing: unknown;
  try {
    existing = JSON.parse(fs.readFileSync(settingsPath, 'utf-8'));
  } catch (err) {
    throw new Error(`${SETTINGS_PATH} is not valid JSON (${errorMessage(err)}); fix it or rerun with --force`);
  }
  if (!isRecord(existing)) {
    throw new Error(`${SETTINGS_PATH} must contain a JSON object; fix it or rerun with --force`);
  }

  const file: FileToWrite = {
    path: settingsPath,
    content: JSON.stringify(mergeHookSettings(existing, command), null, 2) + '\n',
    label: SETTINGS_PATH,
    description: 'hook wiring merged into existing settings',
  };
  writeFile(file);
  result.merged.push(file);
  return result;
}

// ---------------------------------------------------------------------------
// CLI command registration
// ---------------------------------------------------------------------------

export function registerInitCommand(program: Command): void {
  program
    .command('init')
    .description('Wire hookgate into .claude/settings.json and scaffold .hookgate/config.yaml')
    .option('--project-dir <dir>', 'Project root', process.cwd())
    .option('--command <command>', 'How the host should invoke hookgate', DEFAULT_HOOK_COMMAND)
    .option('--force', 'Overwrite existing files', false)
    .action((opts: { projectDir: string; command: string; force: boolean }) => {
      try {
        const result = runInit(opts);

        console.log('');
        console.log('  hookgate -- init');
        console.log(`  Project: ${path.resolve(opts.projectDir)}`);
        console.log('');

        for (const [title, files, mark] of [
          ['Created', result.created, '+'],
          ['Merged', result.merged, '~'],
          ['Skipped (already exist, use --force to overwrite)', result.skipped, '-'],
        ] as const) {
          if (files.length === 0) continue;
          console.log(`  ${title}:`);
          for (const file of files) {
            console.log(`    ${mark} ${file.label.padEnd(28)} ${file.description}`);
          }
        }

        console.log('');
        console.log('  Next steps:');
        console.log(`    1. Review ${PROJECT_CONFIG_PATH}`);
        console.log('    2. Run `hookgate doctor` to check the wiring');
        console.log('    3. Restart the agent session to pick up the hooks');
        console.log('');
      } catch (err) {
        console.error(`Error: ${errorMessage(err)}`);
        process.exit(1);
      }
    });
}
