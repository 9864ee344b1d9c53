/**
 * Iteration Controller — keeps a session working on one task until the agent
 * emits `<promise>TOKEN</promise>` or the iteration budget runs out.
 *
 * The phase is never stored; it is derived from the persisted record:
 *
 *   no record                                  -> NoLoop
 *   active                                     -> Active
 *   inactive, end_reason completion_promise    -> CompletedByPromise
 *   inactive, end_reason max_iterations        -> CompletedByBudget
 *   inactive, end_reason user_cancelled        -> Cancelled
 *
 * Every transition is written before the decision is returned.
 */

import { z } from 'zod';
import { ConfigurationError } from '../errors.js';
import type { LoopPhase, LoopState } from '../types.js';
import { DEFAULT_LOOP_KEY, sanitizeLoopKey, type LoopStore } from './store.js';

export interface IterationControllerOptions {
  defaultCompletionToken: string;
  defaultMaxIterations: number;
  /** Clock, injectable for tests */
  now?: () => Date;
}

export interface SetupRequest {
  key?: string;
  taskText: string;
  maxIterations?: number;
  completionToken?: string;
}

export type SetupResult =
  | { status: 'started'; key: string; state: LoopState; archivedTo?: string }
  | { status: 'already_active'; key: string; state: LoopState };

export type CancelResult =
  | { status: 'cancelled'; key: string; state: LoopState }
  | { status: 'no_active_loop'; key: string; state: LoopState | null };

export interface LoopStatus {
  key: string;
  phase: LoopPhase;
  state: LoopState | null;
}

export type LoopExitOutcome = 'no_loop' | 'inactive' | 'completed_by_promise' | 'completed_by_budget' | 'subagent';

export type LoopDecision =
  | { action: 'continue'; key: string; iteration: number; prompt: string; state: LoopState }
  | { action: 'exit'; outcome: LoopExitOutcome; key: string; message: string; state: LoopState | null };

const SetupSchema = z.object({
  taskText: z.string().refine((t) => t.trim().length > 0, 'Task text must not be empty'),
  maxIterations: z.number().int().min(1),
  completionToken: z
    .string()
    .trim()
    .min(1)
    .refine((t) => !/[<>\n\r]/.test(t), 'Completion token must be a single line without angle brackets'),
});

const PROMISE_PATTERN = /<promise>([\s\S]*?)<\/promise>/gi;

function normalizeWhitespace(text: string): string {
  return text.trim().replace(/\s+/g, ' ');
}

/** True when `output` contains `<promise>token</promise>`, whitespace-insensitive inside the tag. */
export function containsPromise(output: string, token: string): boolean {
  const wanted = normalizeWhitespace(token);
  for (const match of output.matchAll(PROMISE_PATTERN)) {
    if (normalizeWhitespace(match[1]) === wanted) return true;
  }
  return false;
}

export function loopPhase(state: LoopState | null): LoopPhase {
  if (!state) return 'NoLoop';
  if (state.active) return 'Active';
  switch (state.end_reason) {
    case 'completion_promise':
      return 'CompletedByPromise';
    case 'max_iterations':
      return 'CompletedByBudget';
    case 'user_cancelled':
      return 'Cancelled';
    default:
      // Inactive without a reason only happens in hand-edited records
      return 'Cancelled';
  }
}

export function continuationPrompt(state: LoopState): string {
  return [
    `[hookgate loop ${state.iteration}/${state.max_iterations}] The task is not complete yet. Keep working on it.`,
    `When it is genuinely complete, output <promise>${state.completion_token}</promise>.`,
    '',
    state.task_text,
  ].join('\n');
}

export class IterationController {
  private now: () => Date;

  constructor(
    private readonly store: LoopStore,
    private readonly options: IterationControllerOptions,
  ) {
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Start a loop under `key`. A record that is still active is left alone;
   * a terminal one is archived first.
   */
  setup(request: SetupRequest): SetupResult {
    const key = sanitizeLoopKey(request.key ?? DEFAULT_LOOP_KEY);
    const parsed = SetupSchema.safeParse({
      taskText: request.taskText,
      maxIterations: request.maxIterations ?? this.options.defaultMaxIterations,
      completionToken: request.completionToken ?? this.options.defaultCompletionToken,
    });
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
      }));
      throw new ConfigurationError('Invalid loop setup', issues);
    }

    const existing = this.store.load(key);
    if (existing?.active) {
      return { status: 'already_active', key, state: existing };
    }

    const archivedTo = existing ? this.store.archive(key, existing) : undefined;

    const state: LoopState = {
      active: true,
      iteration: 1,
      max_iterations: parsed.data.maxIterations,
      completion_token: parsed.data.completionToken,
      task_text: parsed.data.taskText,
      started_at: this.now().toISOString(),
    };
    this.store.save(key, state);

    return archivedTo ? { status: 'started', key, state, archivedTo } : { status: 'started', key, state };
  }

  cancel(key: string = DEFAULT_LOOP_KEY): CancelResult {
    const safeKey = sanitizeLoopKey(key);
    const existing = this.store.load(safeKey);
    if (!existing?.active) {
      return { status: 'no_active_loop', key: safeKey, state: existing };
    }

    const state: LoopState = {
      ...existing,
      active: false,
      ended_at: this.now().toISOString(),
      end_reason: 'user_cancelled',
    };
    this.store.save(safeKey, state);
    return { status: 'cancelled', key: safeKey, state };
  }

  status(key: string = DEFAULT_LOOP_KEY): LoopStatus {
    const safeKey = sanitizeLoopKey(key);
    const state = this.store.load(safeKey);
    return { key: safeKey, phase: loopPhase(state), state };
  }

  /**
   * The session's own record when there is one. Otherwise the default
   * record, which the first session to stop claims; every other session
   * gets its own (absent) key and so no loop.
   */
  keyForSession(sessionId: string): string {
    const sessionKey = sanitizeLoopKey(sessionId);
    if (this.store.exists(sessionKey)) return sessionKey;
    return this.store.claim(DEFAULT_LOOP_KEY, sessionId) ? DEFAULT_LOOP_KEY : sessionKey;
  }

  /**
   * Decide whether a stopping session may end. `output` is the agent's most
   * recent output, or null when it could not be obtained.
   */
  onSessionStop(key: string, output: string | null): LoopDecision {
    const safeKey = sanitizeLoopKey(key);
    const state = this.store.load(safeKey);

    if (!state) {
      return { action: 'exit', outcome: 'no_loop', key: safeKey, message: 'No iteration loop is set up', state: null };
    }
    if (!state.active) {
      return {
        action: 'exit',
        outcome: 'inactive',
        key: safeKey,
        message: `Loop already ended (${loopPhase(state)})`,
        state,
      };
    }

    if (output !== null && containsPromise(output, state.completion_token)) {
      const ended: LoopState = {
        ...state,
        active: false,
        ended_at: this.now().toISOString(),
        end_reason: 'completion_promise',
      };
      this.store.save(safeKey, ended);
      return {
        action: 'exit',
        outcome: 'completed_by_promise',
        key: safeKey,
        message: `Loop completed: <promise>${state.completion_token}</promise> detected at iteration ${state.iteration}`,
        state: ended,
      };
    }

    if (state.iteration >= state.max_iterations) {
      const ended: LoopState = {
        ...state,
        active: false,
        ended_at: this.now().toISOString(),
        end_reason: 'max_iterations',
      };
      this.store.save(safeKey, ended);
      return {
        action: 'exit',
        outcome: 'completed_by_budget',
        key: safeKey,
        message: `Loop stopped: iteration budget of ${state.max_iterations} exhausted without the completion promise`,
        state: ended,
      };
    }

    const next: LoopState = { ...state, iteration: state.iteration + 1 };
    this.store.save(safeKey, next);
    return {
      action: 'continue',
      key: safeKey,
      iteration: next.iteration,
      prompt: continuationPrompt(next),
      state: next,
    };
  }

  /** Subagents never advance the loop; the answer is always exit. */
  onSubagentStop(key: string): LoopDecision {
    const safeKey = sanitizeLoopKey(key);
    return {
      action: 'exit',
      outcome: 'subagent',
      key: safeKey,
      message: 'Subagent stop does not advance the loop',
      state: this.store.load(safeKey),
    };
  }
}
