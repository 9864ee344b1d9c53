/**
 * `hookgate doctor` checks that the host settings actually wire hookgate
 * in, that the config compiles, that loop records parse and that the audit
 * directory is writable. Invalid settings can silently disable hooks, so
 * structure problems are reported rather than assumed away.
 */

import type { Command } from 'commander';
import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { createGuardSet, resolveProjectDir } from '../engine/runtime.js';
import { HOST_EVENT_KINDS } from '../engine/envelope.js';
import { ConfigurationError, errorMessage, formatIssues } from '../errors.js';
import { LoopStore } from '../loop/store.js';
import { loadGuardConfig } from '../policy/loader.js';
import type { GuardConfig } from '../types.js';

export type CheckStatus = 'ok' | 'info' | 'warn' | 'error';

export interface DoctorCheck {
  section: string;
  status: CheckStatus;
  message: string;
}

export interface DoctorReport {
  checks: DoctorCheck[];
  errors: number;
  warnings: number;
}

export interface DoctorOptions {
  projectDir: string;
  configPath?: string;
}

/** Events hookgate has to see for the guards and the loop to work. */
const REQUIRED_EVENTS = ['PreToolUse', 'Stop'];

const HookCommandSchema = z
  .object({
    type: z.string(),
    command: z.string().optional(),
    timeout: z.number().optional(),
  })
  .passthrough();

const HookHandlerSchema = z
  .object({
    matcher: z.string().optional(),
    hooks: z.array(HookCommandSchema).optional(),
  })
  .passthrough();

const SettingsSchema = z
  .object({
    hooks: z.record(z.array(HookHandlerSchema)).optional(),
    permissions: z
      .object({
        allow: z.array(z.string()).optional(),
        deny: z.array(z.string()).optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

type Settings = z.infer<typeof SettingsSchema>;

class Checks {
  readonly checks: DoctorCheck[] = [];
  constructor(private section: string) {}

  enter(section: string): this {
    this.section = section;
    return this;
  }

  add(status: CheckStatus, message: string): void {
    this.checks.push({ section: this.section, status, message });
  }
}

function readSettings(projectDir: string, out: Checks): Settings | null {
  out.enter('Settings');
  const candidates = ['settings.local.json', 'settings.json'].map((f) => path.join(projectDir, '.claude', f));
  const present = candidates.filter((f) => fs.existsSync(f));
  if (present.length === 0) {
    out.add('warn', 'No .claude/settings.json or settings.local.json found (run `hookgate init`)');
    return null;
  }

  // settings.local.json wins when both exist
  let chosen: Settings | null = null;
  for (const file of present) {
    const label = path.relative(projectDir, file);
    let json: unknown;
    try {
      json = JSON.parse(fs.readFileSync(file, 'utf-8'));
    } catch (err) {
      out.add('error', `${label}: invalid JSON (${errorMessage(err)})`);
      continue;
    }
    const parsed = SettingsSchema.safeParse(json);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((i) => ({ path: i.path.join('.'), message: i.message }));
      out.add('error', `${label}: ${formatIssues(issues)}`);
      continue;
    }
    out.add('ok', `${label}: valid JSON`);
    if (!chosen) chosen = parsed.data;
  }
  return chosen;
}

function checkHooks(settings: Settings, out: Checks): void {
  out.enter('Hooks');
  const hooks = settings.hooks ?? {};
  const validEvents = Object.keys(HOST_EVENT_KINDS);

  for (const [event, handlers] of Object.entries(hooks)) {
    if (!validEvents.includes(event)) {
      out.add('warn', `Unknown hook event: ${event}`);
    }
    handlers.forEach((handler, i) => {
      if (!handler.hooks || handler.hooks.length === 0) {
        out.add('warn', `hooks.${event}[${i}]: no 'hooks' entries`);
      }
    });
  }

  const wired = new Set<string>();
  for (const [event, handlers] of Object.entries(hooks)) {
    for (const handler of handlers) {
      for (const hook of handler.hooks ?? []) {
        if (hook.type === 'command' && hook.command && /\bhookgate\b.*\bhook\b/.test(hook.command)) {
          wired.add(event);
        }
      }
    }
  }

  for (const event of REQUIRED_EVENTS) {
    if (wired.has(event)) {
      out.add('ok', `${event} is wired to hookgate`);
    } else {
      out.add('error', `${event} is not wired to \`hookgate hook\``);
    }
  }
  for (const event of validEvents) {
    if (!REQUIRED_EVENTS.includes(event) && !wired.has(event)) {
      out.add('info', `${event} is not wired (no audit records for it)`);
    }
  }
}

function checkConfig(opts: DoctorOptions, out: Checks): GuardConfig | null {
  out.enter('Config');
  try {
    const config = loadGuardConfig({ projectDir: opts.projectDir, configPath: opts.configPath });
    createGuardSet(config, { projectDir: opts.projectDir, env: {} });
    const ruleCount = config.command_guard.categories.reduce((n, c) => n + c.rules.length, 0);
    out.add(
      'ok',
      `Config is valid: ${config.command_guard.categories.length} command categories, ${ruleCount} rules, ` +
        `${config.path_guard.protected.length} protected globs (failure policy: ${config.failure_policy})`,
    );
    return config;
  } catch (err) {
    if (!(err instanceof ConfigurationError)) throw err;
    const detail = err.issues.length > 0 ? `: ${formatIssues(err.issues)}` : '';
    out.add('error', `${err.message}${detail}`);
    return null;
  }
}

function checkLoops(config: GuardConfig, projectDir: string, out: Checks): void {
  out.enter('Loops');
  const store = new LoopStore(path.resolve(projectDir, config.loop.state_dir));
  const keys = store.list();
  if (keys.length === 0) {
    out.add('info', 'No loop records');
    return;
  }
  for (const key of keys) {
    try {
      const state = store.load(key);
      if (state?.active) {
        out.add('info', `${key}: active, iteration ${state.iteration}/${state.max_iterations}`);
      } else {
        out.add('ok', `${key}: ended (${state?.end_reason ?? 'unknown'})`);
      }
    } catch (err) {
      if (!(err instanceof ConfigurationError)) throw err;
      out.add('error', `${key}: ${err.message}`);
    }
  }
}

function checkAuditDir(config: GuardConfig, projectDir: string, out: Checks): void {
  out.enter('Audit');
  if (!config.audit.enabled) {
    out.add('info', 'Audit logging is disabled');
    return;
  }
  const dir = path.resolve(projectDir, config.audit.dir);
  if (!fs.existsSync(dir)) {
    out.add('info', `${path.relative(projectDir, dir)} does not exist yet (created on first event)`);
    return;
  }
  try {
    fs.accessSync(dir, fs.constants.W_OK);
    out.add('ok', `${path.relative(projectDir, dir)} is writable`);
  } catch {
    out.add('error', `${path.relative(projectDir, dir)} is not writable (hooks cannot log)`);
  }
}

export function runDoctor(opts: DoctorOptions): DoctorReport {
  const projectDir = path.resolve(opts.projectDir);
  const out = new Checks('Settings');

  const settings = readSettings(projectDir, out);
  if (settings) checkHooks(settings, out);

  const config = checkConfig({ ...opts, projectDir }, out);
  if (config) {
    checkLoops(config, projectDir, out);
    checkAuditDir(config, projectDir, out);
  }

  return {
    checks: out.checks,
    errors: out.checks.filter((c) => c.status === 'error').length,
    warnings: out.checks.filter((c) => c.status === 'warn').length,
  };
}

const LABELS: Record<CheckStatus, string> = {
  ok: '[OK]',
  info: '[INFO]',
  warn: '[WARN]',
  error: '[ERROR]',
};

export function registerDoctorCommand(program: Command): void {
  program
    .command('doctor')
    .description('Check hook wiring, config, loop records and the audit directory')
    .option('--project-dir <dir>', 'Project root (default: $CLAUDE_PROJECT_DIR, then cwd)')
    .option('--config <file>', 'Config file (default: <project>/.hookgate/config.yaml)')
    .action((opts: { projectDir?: string; config?: string }) => {
      const report = runDoctor({ projectDir: resolveProjectDir(opts.projectDir), configPath: opts.config });

      let section = '';
      for (const check of report.checks) {
        if (check.section !== section) {
          section = check.section;
          console.log(`\n=== ${section} ===`);
        }
        console.log(`  ${LABELS[check.status]} ${check.message}`);
      }

      console.log('');
      console.log(`${report.errors} error(s), ${report.warnings} warning(s)`);
      process.exitCode = report.errors > 0 ? 1 : 0;
    });
}
