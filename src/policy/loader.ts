/**
 * Config Loader — reads YAML config files, validates them against the Zod
 * schema, and layers a project config over the bundled defaults.
 */

import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import yaml from 'js-yaml';
import { ZodError } from 'zod';
import { BUILTIN_DEFAULTS, GuardConfigFileSchema, type GuardConfigFile } from './schema.js';
import { ConfigurationError, errorMessage } from '../errors.js';
import type { CommandCategory, GuardConfig, ProtectedPathSpec } from '../types.js';

export const DEFAULT_CONFIG_PATH = fileURLToPath(new URL('../../config/default.yaml', import.meta.url));

export const PROJECT_CONFIG_PATH = path.join('.hookgate', 'config.yaml');

function issuesFrom(error: ZodError) {
  return error.issues.map((issue) => ({
    path: issue.path.join('.'),
    message: issue.message,
  }));
}

/**
 * Parse and validate a config file from a YAML string.
 * An empty document is an empty config.
 */
export function parseConfigYaml(yamlString: string): GuardConfigFile {
  let parsed: unknown;
  try {
    parsed = yaml.load(yamlString);
  } catch (err) {
    throw new ConfigurationError('Invalid YAML syntax', [{ path: '', message: errorMessage(err) }]);
  }

  if (parsed === null || parsed === undefined) {
    parsed = {};
  }
  if (typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new ConfigurationError('Config must be a YAML mapping', [
      { path: '', message: 'Expected a mapping, got ' + (Array.isArray(parsed) ? 'array' : typeof parsed) },
    ]);
  }

  const result = GuardConfigFileSchema.safeParse(parsed);
  if (!result.success) {
    const issues = issuesFrom(result.error);
    throw new ConfigurationError(`Config validation failed with ${issues.length} issue(s)`, issues);
  }
  return result.data;
}

/**
 * Load and validate a config file from disk.
 */
export function loadConfigFile(filePath: string): GuardConfigFile {
  const absPath = path.resolve(filePath);
  if (!fs.existsSync(absPath)) {
    throw new ConfigurationError(`Config file not found: ${absPath}`);
  }
  const raw = fs.readFileSync(absPath, 'utf-8');
  try {
    return parseConfigYaml(raw);
  } catch (err) {
    if (err instanceof ConfigurationError) {
      throw new ConfigurationError(`${absPath}: ${err.message}`, err.issues);
    }
    throw err;
  }
}

// ---------------------------------------------------------------------------
// Layering
// ---------------------------------------------------------------------------

function mergeCategories(base: CommandCategory[], overlay: CommandCategory[]): CommandCategory[] {
  const merged = base.map((c) => ({ ...c, rules: [...c.rules], exceptions: [...c.exceptions] }));
  for (const category of overlay) {
    const existing = merged.find((c) => c.name === category.name);
    if (existing) {
      existing.rules.push(...category.rules);
      existing.exceptions.push(...category.exceptions);
      if (category.description) existing.description = category.description;
    } else {
      merged.push({ ...category, rules: [...category.rules], exceptions: [...category.exceptions] });
    }
  }
  return merged;
}

/**
 * Resolve the effective config. With `inherit_defaults` (the default) the
 * overlay's rules are appended to the base, category by category; without
 * it the overlay stands alone.
 */
export function resolveConfig(base: GuardConfigFile, overlay?: GuardConfigFile): GuardConfig {
  const layers = overlay ? (overlay.inherit_defaults ? [base, overlay] : [overlay]) : [base];
  const top = layers[layers.length - 1];

  const pick = <T>(get: (layer: GuardConfigFile) => T | undefined, fallback: T): T => {
    for (let i = layers.length - 1; i >= 0; i--) {
      const value = get(layers[i]);
      if (value !== undefined) return value;
    }
    return fallback;
  };

  let categories: CommandCategory[] = [];
  const protectedGlobs: GuardConfig['path_guard']['protected'] = [];
  const exceptions: string[] = [];
  const markers: string[] = [];
  for (const layer of layers) {
    categories = mergeCategories(categories, layer.command_guard.categories);
    protectedGlobs.push(...layer.path_guard.protected);
    exceptions.push(...layer.path_guard.exceptions);
    markers.push(...layer.path_guard.sentinel_markers.filter((m) => !markers.includes(m)));
  }

  return {
    version: top.version,
    inherit_defaults: top.inherit_defaults,
    failure_policy: pick((l) => l.failure_policy, BUILTIN_DEFAULTS.failure_policy),
    command_guard: { categories },
    path_guard: {
      protected: protectedGlobs,
      exceptions,
      sentinel_markers: markers,
      override_env: pick((l) => l.path_guard.override_env, BUILTIN_DEFAULTS.override_env),
    },
    loop: {
      state_dir: pick((l) => l.loop.state_dir, BUILTIN_DEFAULTS.loop.state_dir),
      default_completion_token: pick(
        (l) => l.loop.default_completion_token,
        BUILTIN_DEFAULTS.loop.default_completion_token,
      ),
      default_max_iterations: pick(
        (l) => l.loop.default_max_iterations,
        BUILTIN_DEFAULTS.loop.default_max_iterations,
      ),
    },
    audit: {
      enabled: pick((l) => l.audit.enabled, BUILTIN_DEFAULTS.audit.enabled),
      dir: pick((l) => l.audit.dir, BUILTIN_DEFAULTS.audit.dir),
    },
  };
}

export interface LoadConfigOptions {
  /** Project root; relative config paths resolve against it */
  projectDir: string;
  /** Explicit config file; must exist when given */
  configPath?: string;
  /** Override the bundled defaults (tests) */
  defaultsPath?: string;
}

/**
 * Load the effective config: bundled defaults, then the explicit config
 * file or, failing that, `<projectDir>/.hookgate/config.yaml` if present.
 */
export function loadGuardConfig(opts: LoadConfigOptions): GuardConfig {
  const base = loadConfigFile(opts.defaultsPath ?? DEFAULT_CONFIG_PATH);

  let overlay: GuardConfigFile | undefined;
  if (opts.configPath) {
    overlay = loadConfigFile(path.resolve(opts.projectDir, opts.configPath));
  } else {
    const projectConfig = path.join(opts.projectDir, PROJECT_CONFIG_PATH);
    if (fs.existsSync(projectConfig)) {
      overlay = loadConfigFile(projectConfig);
    }
  }

  return resolveConfig(base, overlay);
}

export function toProtectedPathSpec(config: GuardConfig): ProtectedPathSpec {
  return {
    protected: config.path_guard.protected,
    exceptions: config.path_guard.exceptions,
    sentinelMarkers: config.path_guard.sentinel_markers,
    overrideEnv: config.path_guard.override_env,
  };
}
