/**
 * Hook Dispatcher — one host event in, one outcome out.
 *
 * Per event:
 *   RECEIVED -> PARSED -> (guards | controller) -> DECIDED -> LOGGED -> RETURNED
 *   RECEIVED -> FAILED -> LOGGED -> RETURNED            (envelope did not parse)
 *
 * Exactly one audit record is written per event, after the decision is
 * final. Audit failures never change the outcome.
 */

import { ConfigurationError, EnvelopeParseError, errorMessage, formatIssues, PersistenceError } from '../errors.js';
import type { CommandGuard } from '../guards/command-guard.js';
import type { PathGuard } from '../guards/path-guard.js';
import { summarize, type AuditLog } from '../ledger/audit-sink.js';
import type { IterationController, LoopDecision } from '../loop/controller.js';
import { readLastAssistantText } from '../loop/transcript.js';
import type {
  AuditConcern,
  AuditRecord,
  BlockVerdict,
  FailurePolicy,
  HookEvent,
  HookOutcome,
  InvocationEvent,
  StopEvent,
  Verdict,
} from '../types.js';
import { parseEnvelope, peekHostEvent, PRE_INVOCATION_EVENT } from './envelope.js';

export interface GuardSet {
  commandGuard: CommandGuard;
  pathGuard: PathGuard;
  controller: IterationController;
}

export interface DispatcherOptions {
  /** Loaded guards, or the error that kept them from loading */
  guards: GuardSet | ConfigurationError;
  audit: AuditLog;
  failurePolicy: FailurePolicy;
  /** Most recent agent output for a stop event; null when unavailable */
  readStopOutput?: (event: StopEvent) => string | null;
  /** Diagnostic channel; defaults to stderr */
  onDiagnostic?: (message: string) => void;
}

interface Decided {
  outcome: HookOutcome;
  concern: AuditConcern;
  summary: string;
  /** Reason recorded in the audit trail (may differ from what the host sees) */
  auditReason: string;
}

/**
 * What a broken envelope or configuration turns into. Only pre-invocation
 * events can fail closed; a stop event that failed closed would trap the
 * session.
 */
export function failureOutcome(policy: FailurePolicy, hostEvent: string | undefined, reason: string): HookOutcome {
  if (policy === 'closed' && hostEvent === PRE_INVOCATION_EVENT) {
    return { decision: 'block', reason: `${reason} (failure policy: closed)` };
  }
  return { decision: 'allow', reason: `${reason} (failure policy: open)` };
}

export function blockMessage(verdict: BlockVerdict): string {
  return `Blocked by hookgate [${verdict.category}]: ${verdict.reason}`;
}

function evaluateOperation(event: InvocationEvent, guards: GuardSet): Verdict {
  const { payload } = event.operation;
  switch (payload.type) {
    case 'shell':
      return guards.commandGuard.evaluate(payload.command);
    case 'write':
    case 'edit':
      return guards.pathGuard.evaluate({ path: payload.path, content: payload.content, cwd: event.cwd });
    case 'other':
      return { decision: 'allow' };
  }
}

function concernFor(event: HookEvent): AuditConcern {
  switch (event.kind) {
    case 'PreInvocation':
    case 'PostInvocation':
    case 'PostInvocationFailure':
      switch (event.operation.payload.type) {
        case 'shell':
          return 'commands';
        case 'write':
        case 'edit':
          return 'file-edits';
        default:
          return 'events';
      }
    case 'PromptSubmitted':
      return 'prompts';
    case 'SessionStop':
    case 'SubagentStop':
      return 'loop';
    case 'Notification':
      return 'events';
  }
}

function summaryFor(event: HookEvent): string {
  switch (event.kind) {
    case 'PreInvocation':
    case 'PostInvocation':
    case 'PostInvocationFailure': {
      const { tool, payload } = event.operation;
      switch (payload.type) {
        case 'shell':
          return summarize(`${tool}: ${payload.command}`);
        case 'write':
        case 'edit':
          return summarize(`${tool}: ${payload.path}`);
        case 'other':
          return summarize(`${tool}: ${JSON.stringify(payload.input)}`);
      }
    }
    case 'PromptSubmitted':
      return summarize(`prompt: ${event.prompt}`);
    case 'SessionStop':
    case 'SubagentStop':
      // Set when the host is already continuing because of an earlier block
      return event.stopHookActive ? `${event.hostEvent} (stop_hook_active)` : event.hostEvent;
    case 'Notification':
      return summarize(`notification: ${event.message}`);
  }
}

export class HookDispatcher {
  private onDiagnostic: (message: string) => void;
  private readStopOutput: (event: StopEvent) => string | null;

  constructor(private readonly options: DispatcherOptions) {
    this.onDiagnostic = options.onDiagnostic ?? ((message) => console.error(`[hookgate] ${message}`));
    this.readStopOutput = options.readStopOutput ?? ((event) => this.defaultStopOutput(event));
  }

  async dispatch(raw: string): Promise<HookOutcome> {
    let event: HookEvent;
    try {
      event = parseEnvelope(raw);
    } catch (err) {
      if (!(err instanceof EnvelopeParseError)) throw err;
      const detail = err.issues.length > 0 ? `${err.message}: ${formatIssues(err.issues)}` : err.message;
      const outcome = failureOutcome(this.options.failurePolicy, peekHostEvent(raw), `Malformed hook event: ${detail}`);
      await this.options.audit.record('events', {
        session_id: 'unknown',
        event_kind: 'ParseFailure',
        operation_summary: summarize(raw),
        decision: outcome.decision,
        reason: outcome.reason ?? '',
      });
      return outcome;
    }

    const decided = this.decide(event);
    const record: AuditRecord = {
      session_id: event.sessionId,
      event_kind: event.kind,
      operation_summary: decided.summary,
      decision: decided.outcome.decision,
      reason: decided.auditReason,
    };
    await this.options.audit.record(decided.concern, record);
    return decided.outcome;
  }

  /**
   * Pure routing plus loop persistence. Errors from loading config or loop
   * state become outcomes here; nothing escapes to the host.
   */
  decide(event: HookEvent): Decided {
    const concern = concernFor(event);
    const summary = summaryFor(event);
    const { guards } = this.options;

    if (guards instanceof ConfigurationError) {
      const detail = guards.issues.length > 0 ? `${guards.message}: ${formatIssues(guards.issues)}` : guards.message;
      this.onDiagnostic(`Configuration error: ${detail}`);
      const outcome = this.failure(event, `Configuration error: ${guards.message}`);
      return { outcome, concern, summary, auditReason: outcome.reason ?? '' };
    }

    try {
      switch (event.kind) {
        case 'PreInvocation':
          return { ...this.decideInvocation(event, guards), concern, summary };
        case 'SessionStop': {
          const key = guards.controller.keyForSession(event.sessionId);
          const decision = guards.controller.onSessionStop(key, this.readStopOutput(event));
          return { ...this.fromLoopDecision(decision), concern, summary: `${summary} loop[${decision.key}]` };
        }
        case 'SubagentStop': {
          const key = guards.controller.keyForSession(event.sessionId);
          const decision = guards.controller.onSubagentStop(key);
          return { ...this.fromLoopDecision(decision), concern, summary: `${summary} loop[${decision.key}]` };
        }
        case 'PostInvocationFailure':
          return { outcome: { decision: 'allow' }, concern, summary, auditReason: event.error ?? '' };
        case 'PostInvocation':
        case 'PromptSubmitted':
        case 'Notification':
          return { outcome: { decision: 'allow' }, concern, summary, auditReason: '' };
      }
    } catch (err) {
      if (err instanceof PersistenceError) {
        const reason = `Loop state could not be saved: ${err.message}`;
        this.onDiagnostic(reason);
        return { outcome: { decision: 'fatal', reason }, concern, summary, auditReason: reason };
      }
      const detail =
        err instanceof ConfigurationError && err.issues.length > 0
          ? `${err.message}: ${formatIssues(err.issues)}`
          : errorMessage(err);
      this.onDiagnostic(detail);
      const outcome = this.failure(event, detail);
      return { outcome, concern, summary, auditReason: outcome.reason ?? '' };
    }
  }

  private decideInvocation(event: InvocationEvent, guards: GuardSet): Pick<Decided, 'outcome' | 'auditReason'> {
    const verdict = evaluateOperation(event, guards);
    if (verdict.decision === 'block') {
      return { outcome: { decision: 'block', reason: blockMessage(verdict) }, auditReason: verdict.reason };
    }
    return { outcome: { decision: 'allow', reason: verdict.reason }, auditReason: verdict.reason ?? '' };
  }

  private fromLoopDecision(decision: LoopDecision): Pick<Decided, 'outcome' | 'auditReason'> {
    if (decision.action === 'continue') {
      return {
        outcome: { decision: 'block', reason: decision.prompt },
        auditReason: `continue: iteration ${decision.iteration}/${decision.state.max_iterations}`,
      };
    }
    return {
      outcome: { decision: 'allow', reason: decision.message },
      auditReason: `${decision.outcome}: ${decision.message}`,
    };
  }

  private failure(event: HookEvent, reason: string): HookOutcome {
    return failureOutcome(this.options.failurePolicy, event.hostEvent, reason);
  }

  private defaultStopOutput(event: StopEvent): string | null {
    if (event.lastAssistantMessage !== undefined) return event.lastAssistantMessage;
    if (!event.transcriptPath) return null;
    try {
      return readLastAssistantText(event.transcriptPath);
    } catch (err) {
      this.onDiagnostic(`Could not read transcript ${event.transcriptPath}: ${errorMessage(err)}`);
      return null;
    }
  }
}
