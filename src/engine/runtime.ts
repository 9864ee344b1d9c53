/**
 * Wires configuration into guards, the iteration controller
 * and the audit log for one project directory.
 *
 * Flow (one process per host event):
 *   host → `hookgate hook` → HookRuntime.create(projectDir)
 *     → config load (errors kept, not thrown) → dispatcher.dispatch(stdin)
 *     → outcome → exit status
 */

import path from 'node:path';
import { ConfigurationError } from '../errors.js';
import { CommandGuard } from '../guards/command-guard.js';
import { isOverrideEnabled, PathGuard } from '../guards/path-guard.js';
import { AuditLog } from '../ledger/audit-sink.js';
import { IterationController } from '../loop/controller.js';
import { LoopStore } from '../loop/store.js';
import { loadGuardConfig, toProtectedPathSpec } from '../policy/loader.js';
import { BUILTIN_DEFAULTS } from '../policy/schema.js';
import type { FailurePolicy, GuardConfig, HookOutcome, StopEvent } from '../types.js';
import { HookDispatcher, type GuardSet } from './dispatcher.js';

export interface RuntimeConfig {
  /** Project root; relative state and log directories resolve against it */
  projectDir: string;
  /** Explicit config file (instead of `.hookgate/config.yaml`) */
  configPath?: string;
  /** Bundled defaults override (tests) */
  defaultsPath?: string;
  /** Overrides `failure_policy` from the config */
  failurePolicy?: FailurePolicy;
  /** Environment consulted for the operator override */
  env?: NodeJS.ProcessEnv;
  /** Clock for loop timestamps */
  now?: () => Date;
  readStopOutput?: (event: StopEvent) => string | null;
  onDiagnostic?: (message: string) => void;
}

/**
 * Project directory for a hook invocation: explicit flag, then the host's
 * CLAUDE_PROJECT_DIR, then the working directory.
 */
export function resolveProjectDir(explicit: string | undefined, env: NodeJS.ProcessEnv = process.env): string {
  return path.resolve(explicit ?? env.CLAUDE_PROJECT_DIR ?? process.cwd());
}

export function createLoopController(config: GuardConfig, projectDir: string, now?: () => Date): IterationController {
  const store = new LoopStore(path.resolve(projectDir, config.loop.state_dir));
  return new IterationController(store, {
    defaultCompletionToken: config.loop.default_completion_token,
    defaultMaxIterations: config.loop.default_max_iterations,
    now,
  });
}

/** Config-dependent pieces; throws ConfigurationError when the config is bad. */
export function createGuardSet(config: GuardConfig, runtime: RuntimeConfig): GuardSet {
  const env = runtime.env ?? process.env;
  return {
    commandGuard: CommandGuard.fromCategories(config.command_guard.categories),
    pathGuard: PathGuard.fromSpec(toProtectedPathSpec(config), {
      projectDir: runtime.projectDir,
      override: isOverrideEnabled(env, config.path_guard.override_env),
    }),
    controller: createLoopController(config, runtime.projectDir, runtime.now),
  };
}

export class HookRuntime {
  private constructor(
    private readonly dispatcher: HookDispatcher,
    /** Effective config, or null when it failed to load */
    readonly config: GuardConfig | null,
    readonly configError: ConfigurationError | null,
    readonly audit: AuditLog,
  ) {}

  /**
   * Never throws on a bad config: the error is kept and every event is
   * answered by the failure policy, still audited under the default log dir.
   */
  static create(runtime: RuntimeConfig): HookRuntime {
    let config: GuardConfig | null = null;
    let guards: GuardSet | ConfigurationError;
    try {
      config = loadGuardConfig({
        projectDir: runtime.projectDir,
        configPath: runtime.configPath,
        defaultsPath: runtime.defaultsPath,
      });
      guards = createGuardSet(config, runtime);
    } catch (err) {
      if (!(err instanceof ConfigurationError)) throw err;
      config = null;
      guards = err;
    }

    const audit = new AuditLog({
      dir: path.resolve(runtime.projectDir, config?.audit.dir ?? BUILTIN_DEFAULTS.audit.dir),
      enabled: config?.audit.enabled ?? true,
      onError: runtime.onDiagnostic,
    });

    const dispatcher = new HookDispatcher({
      guards,
      audit,
      failurePolicy: runtime.failurePolicy ?? config?.failure_policy ?? BUILTIN_DEFAULTS.failure_policy,
      readStopOutput: runtime.readStopOutput,
      onDiagnostic: runtime.onDiagnostic,
    });

    return new HookRuntime(dispatcher, config, guards instanceof ConfigurationError ? guards : null, audit);
  }

  dispatch(raw: string): Promise<HookOutcome> {
    return this.dispatcher.dispatch(raw);
  }
}
