/**
 * hookgate
 *
 * Deterministic guards for an agent host's lifecycle hooks, plus an
 * iteration loop that keeps a session working until the agent emits a
 * completion promise.
 *
 * @packageDocumentation
 */

// Core types
export * from './types.js';
export { ConfigurationError, EnvelopeParseError, PersistenceError, formatIssues } from './errors.js';
export type { Issue } from './errors.js';

// Policy
export { evaluateRules } from './policy/matcher.js';
export { compileCommandRules, compilePathSpec, globMatcher, regexMatcher } from './policy/compiler.js';
export type { CompiledPathSpec } from './policy/compiler.js';
export {
  loadGuardConfig,
  loadConfigFile,
  parseConfigYaml,
  resolveConfig,
  toProtectedPathSpec,
  DEFAULT_CONFIG_PATH,
  PROJECT_CONFIG_PATH,
} from './policy/loader.js';
export { GuardConfigFileSchema, BUILTIN_DEFAULTS } from './policy/schema.js';

// Guards
export { CommandGuard, commandSegments, splitCommand } from './guards/command-guard.js';
export { PathGuard, normalizeTargetPath, isOverrideEnabled } from './guards/path-guard.js';
export type { PathGuardOptions, WriteTarget } from './guards/path-guard.js';

// Engine
export { parseEnvelope, operationTypeOf } from './engine/envelope.js';
export { HookDispatcher, failureOutcome } from './engine/dispatcher.js';
export type { DispatcherOptions, GuardSet } from './engine/dispatcher.js';
export { HookRuntime, createGuardSet, createLoopController, resolveProjectDir } from './engine/runtime.js';
export type { RuntimeConfig } from './engine/runtime.js';

// Loop
export { IterationController, containsPromise, loopPhase } from './loop/controller.js';
export type {
  IterationControllerOptions,
  LoopDecision,
  SetupRequest,
  SetupResult,
  CancelResult,
  LoopStatus,
} from './loop/controller.js';
export { LoopStore, DEFAULT_LOOP_KEY, parseLoopState, serializeLoopState } from './loop/store.js';
export { extractLastAssistantText, readLastAssistantText } from './loop/transcript.js';
export { atomicWriteFileSync } from './io/atomic-write.js';

// Audit
export { AuditLog, AuditSink, redactSecrets } from './ledger/audit-sink.js';
export { queryAudit, summarizeAudit } from './ledger/query.js';
export type { AuditQueryOptions, AuditSummary } from './ledger/query.js';
