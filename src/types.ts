/**
 * Core types for hookgate.
 *
 * These types are the shared vocabulary used across the framework:
 * rule matcher, guards, hook dispatcher, iteration controller, and audit sinks.
 */

// ---------------------------------------------------------------------------
// Rule Types
// ---------------------------------------------------------------------------

export type RuleVerdict = 'block' | 'allow-exception';

/** Anything that can test a candidate string (compiled regex or glob). */
export interface Matcher {
  /** The pattern as written in configuration */
  readonly source: string;
  test(candidate: string): boolean;
}

export interface Rule {
  /** Risk category the rule belongs to; exceptions only apply within it */
  category: string;
  pattern: Matcher;
  verdict: RuleVerdict;
  reason: string;
}

// ---------------------------------------------------------------------------
// Verdict Types
// ---------------------------------------------------------------------------

export type Decision = 'allow' | 'block';

export interface AllowVerdict {
  decision: 'allow';
  /** Informational only, e.g. which exception suppressed a block */
  reason?: string;
  category?: string;
}

export interface BlockVerdict {
  decision: 'block';
  reason: string;
  category: string;
  /** Source of the pattern or marker that fired */
  pattern: string;
}

export type Verdict = AllowVerdict | BlockVerdict;

// ---------------------------------------------------------------------------
// Path protection
// ---------------------------------------------------------------------------

export interface ProtectedGlob {
  glob: string;
  reason: string;
}

export interface ProtectedPathSpec {
  protected: ProtectedGlob[];
  exceptions: string[];
  sentinelMarkers: string[];
  /** Environment variable the operator sets to bypass path protection */
  overrideEnv: string;
}

// ---------------------------------------------------------------------------
// Hook Events
// ---------------------------------------------------------------------------

export type HookEventKind =
  | 'PreInvocation'
  | 'PostInvocation'
  | 'PostInvocationFailure'
  | 'PromptSubmitted'
  | 'SessionStop'
  | 'SubagentStop'
  | 'Notification';

export type OperationType = 'shell' | 'write' | 'edit' | 'other';

export type OperationPayload =
  | { type: 'shell'; command: string }
  | { type: 'write' | 'edit'; path: string; content: string }
  | { type: 'other'; input: Record<string, unknown> };

export interface Operation {
  /** Host tool name, e.g. "Bash" */
  tool: string;
  payload: OperationPayload;
}

interface HookEventBase {
  /** Host event name as received, e.g. "PreToolUse" */
  hostEvent: string;
  sessionId: string;
  cwd?: string;
}

export interface InvocationEvent extends HookEventBase {
  kind: 'PreInvocation' | 'PostInvocation' | 'PostInvocationFailure';
  operation: Operation;
  /** Failure text reported by the host for PostInvocationFailure */
  error?: string;
}

export interface PromptEvent extends HookEventBase {
  kind: 'PromptSubmitted';
  prompt: string;
}

export interface StopEvent extends HookEventBase {
  kind: 'SessionStop' | 'SubagentStop';
  transcriptPath?: string;
  /** Final assistant text, when the host supplies it inline */
  lastAssistantMessage?: string;
  stopHookActive: boolean;
}

export interface NotificationEvent extends HookEventBase {
  kind: 'Notification';
  message: string;
}

export type HookEvent = InvocationEvent | PromptEvent | StopEvent | NotificationEvent;

// ---------------------------------------------------------------------------
// Dispatch outcome (translated to the host's exit-status contract at the edge)
// ---------------------------------------------------------------------------

export type FailurePolicy = 'open' | 'closed';

export type HookOutcome =
  | { decision: 'allow'; reason?: string }
  | { decision: 'block'; reason: string }
  | { decision: 'fatal'; reason: string };

// ---------------------------------------------------------------------------
// Loop state
// ---------------------------------------------------------------------------

export type LoopEndReason = 'completion_promise' | 'max_iterations' | 'user_cancelled';

export interface LoopState {
  active: boolean;
  iteration: number;
  max_iterations: number;
  completion_token: string;
  task_text: string;
  started_at: string;
  ended_at?: string;
  end_reason?: LoopEndReason;
  /** Session that claimed a loop started without one */
  owner_session?: string;
}

export type LoopPhase =
  | 'NoLoop'
  | 'Active'
  | 'CompletedByPromise'
  | 'CompletedByBudget'
  | 'Cancelled';

// ---------------------------------------------------------------------------
// Audit Types
// ---------------------------------------------------------------------------

export type AuditConcern = 'commands' | 'file-edits' | 'prompts' | 'loop' | 'events';

export type AuditDecision = Decision | 'fatal';

export interface AuditRecord {
  session_id: string;
  event_kind: HookEventKind | 'ParseFailure';
  operation_summary: string;
  decision: AuditDecision;
  reason: string;
}

export interface AuditEntry extends AuditRecord {
  seq: number;
  ts: string;
  hash: string;
  prev: string;
}

// ---------------------------------------------------------------------------
// Configuration (post-validation, pre-compilation)
// ---------------------------------------------------------------------------

export interface PatternRule {
  pattern: string;
  reason: string;
}

export interface CommandCategory {
  name: string;
  description?: string;
  rules: PatternRule[];
  exceptions: PatternRule[];
}

export interface LoopConfig {
  state_dir: string;
  default_completion_token: string;
  default_max_iterations: number;
}

export interface AuditConfig {
  enabled: boolean;
  dir: string;
}

export interface GuardConfig {
  version: string;
  inherit_defaults: boolean;
  failure_policy: FailurePolicy;
  command_guard: {
    categories: CommandCategory[];
  };
  path_guard: {
    protected: ProtectedGlob[];
    exceptions: string[];
    sentinel_markers: string[];
    override_env: string;
  };
  loop: LoopConfig;
  audit: AuditConfig;
}
