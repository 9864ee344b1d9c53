/**
 * Zod schemas for the hookgate configuration YAML.
 *
 * These schemas are the source of truth for config validation. Scalars are
 * optional here so that a project config can be layered over the bundled
 * defaults; `resolveConfig()` fills in what neither layer sets.
 */

import { z } from 'zod';

// ---------------------------------------------------------------------------
// Primitives
// ---------------------------------------------------------------------------

export const FailurePolicySchema = z.enum(['open', 'closed']);

export const PatternRuleSchema = z.object({
  pattern: z.string().min(1),
  reason: z.string().min(1),
});

export const ExceptionRuleSchema = z.object({
  pattern: z.string().min(1),
  reason: z.string().min(1).default('Allowlisted by operator exception'),
});

// ---------------------------------------------------------------------------
// Command guard
// ---------------------------------------------------------------------------

export const CommandCategorySchema = z.object({
  name: z
    .string()
    .regex(/^[a-z0-9][a-z0-9-]*$/, 'Category names are lowercase words joined by "-"'),
  description: z.string().optional(),
  rules: z.array(PatternRuleSchema).default([]),
  exceptions: z.array(ExceptionRuleSchema).default([]),
}).describe('One independently extensible risk category');

export const CommandGuardSchema = z.object({
  categories: z.array(CommandCategorySchema).default([]),
});

// ---------------------------------------------------------------------------
// Path guard
// ---------------------------------------------------------------------------

export const ProtectedGlobSchema = z.object({
  glob: z.string().min(1),
  reason: z.string().min(1),
});

export const PathGuardSchema = z.object({
  protected: z.array(ProtectedGlobSchema).default([]),
  exceptions: z.array(z.string().min(1)).default([]),
  sentinel_markers: z.array(z.string().min(1)).default([]),
  override_env: z
    .string()
    .regex(/^[A-Za-z_][A-Za-z0-9_]*$/, 'Must be a valid environment variable name')
    .optional(),
});

// ---------------------------------------------------------------------------
// Loop + audit
// ---------------------------------------------------------------------------

export const LoopConfigSchema = z.object({
  state_dir: z.string().min(1).optional(),
  default_completion_token: z.string().trim().min(1).optional(),
  default_max_iterations: z.number().int().positive().optional(),
});

export const AuditConfigSchema = z.object({
  enabled: z.boolean().optional(),
  dir: z.string().min(1).optional(),
});

// ---------------------------------------------------------------------------
// Top-level config file
// ---------------------------------------------------------------------------

export const GuardConfigFileSchema = z.object({
  version: z.string().default('1.0'),
  inherit_defaults: z.boolean().default(true),
  failure_policy: FailurePolicySchema.optional(),
  command_guard: CommandGuardSchema.default({}),
  path_guard: PathGuardSchema.default({}),
  loop: LoopConfigSchema.default({}),
  audit: AuditConfigSchema.default({}),
});

export type GuardConfigFileInput = z.input<typeof GuardConfigFileSchema>;
export type GuardConfigFile = z.output<typeof GuardConfigFileSchema>;

// ---------------------------------------------------------------------------
// Built-in fallbacks for scalars neither layer sets
// ---------------------------------------------------------------------------

export const BUILTIN_DEFAULTS = {
  failure_policy: 'open',
  override_env: 'HOOKGATE_ALLOW_PROTECTED',
  loop: {
    state_dir: '.hookgate/loops',
    default_completion_token: 'DONE',
    default_max_iterations: 20,
  },
  audit: {
    enabled: true,
    dir: '.hookgate/logs',
  },
} as const;
