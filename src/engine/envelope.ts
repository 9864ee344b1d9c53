/**
 * Turns one host hook record (JSON on stdin) into a typed
 * HookEvent. Anything that cannot be parsed is an EnvelopeParseError; the
 * dispatcher decides what that means.
 */

import { z, type ZodError } from 'zod';
import { EnvelopeParseError, errorMessage, type Issue } from '../errors.js';
import type { HookEvent, HookEventKind, OperationPayload, OperationType } from '../types.js';

// ---------------------------------------------------------------------------
// Host vocabulary
// ---------------------------------------------------------------------------

export const HOST_EVENT_KINDS: Record<string, HookEventKind> = {
  PreToolUse: 'PreInvocation',
  PostToolUse: 'PostInvocation',
  PostToolUseFailure: 'PostInvocationFailure',
  UserPromptSubmit: 'PromptSubmitted',
  Stop: 'SessionStop',
  SubagentStop: 'SubagentStop',
  Notification: 'Notification',
};

export const PRE_INVOCATION_EVENT = 'PreToolUse';

const TOOL_OPERATIONS: Record<string, OperationType> = {
  Bash: 'shell',
  Write: 'write',
  Edit: 'edit',
  MultiEdit: 'edit',
  NotebookEdit: 'edit',
};

export function operationTypeOf(tool: string): OperationType {
  return TOOL_OPERATIONS[tool] ?? 'other';
}

// ---------------------------------------------------------------------------
// Schemas
// ---------------------------------------------------------------------------

const EnvelopeSchema = z.object({
  hook_event_name: z.string().min(1),
  session_id: z.string().min(1).optional(),
  cwd: z.string().optional(),
  transcript_path: z.string().optional(),
  tool_name: z.string().min(1).optional(),
  tool_input: z.record(z.unknown()).optional(),
  error: z.string().optional(),
  prompt: z.string().optional(),
  message: z.string().optional(),
  stop_hook_active: z.boolean().optional(),
  last_assistant_message: z.string().optional(),
});

const ShellInputSchema = z.object({ command: z.string() });

const WriteInputSchema = z.object({
  file_path: z.string().min(1),
  content: z.string(),
});

const EditInputSchema = z.object({
  file_path: z.string().min(1),
  new_string: z.string(),
});

const MultiEditInputSchema = z.object({
  file_path: z.string().min(1),
  edits: z.array(z.object({ new_string: z.string() })).min(1),
});

const NotebookEditInputSchema = z.object({
  notebook_path: z.string().min(1),
  new_source: z.string().default(''),
});

type PayloadResult = { ok: true; payload: OperationPayload } | { ok: false; issues: Issue[] };

function toIssues(error: ZodError, prefix: string): Issue[] {
  return error.issues.map((issue) => ({
    path: [prefix, ...issue.path].join('.'),
    message: issue.message,
  }));
}

function parsePayload(tool: string, input: Record<string, unknown>): PayloadResult {
  switch (tool) {
    case 'Bash': {
      const r = ShellInputSchema.safeParse(input);
      return r.success
        ? { ok: true, payload: { type: 'shell', command: r.data.command } }
        : { ok: false, issues: toIssues(r.error, 'tool_input') };
    }
    case 'Write': {
      const r = WriteInputSchema.safeParse(input);
      return r.success
        ? { ok: true, payload: { type: 'write', path: r.data.file_path, content: r.data.content } }
        : { ok: false, issues: toIssues(r.error, 'tool_input') };
    }
    case 'Edit': {
      const r = EditInputSchema.safeParse(input);
      return r.success
        ? { ok: true, payload: { type: 'edit', path: r.data.file_path, content: r.data.new_string } }
        : { ok: false, issues: toIssues(r.error, 'tool_input') };
    }
    case 'MultiEdit': {
      const r = MultiEditInputSchema.safeParse(input);
      return r.success
        ? {
            ok: true,
            payload: {
              type: 'edit',
              path: r.data.file_path,
              content: r.data.edits.map((e) => e.new_string).join('\n'),
            },
          }
        : { ok: false, issues: toIssues(r.error, 'tool_input') };
    }
    case 'NotebookEdit': {
      const r = NotebookEditInputSchema.safeParse(input);
      return r.success
        ? { ok: true, payload: { type: 'edit', path: r.data.notebook_path, content: r.data.new_source } }
        : { ok: false, issues: toIssues(r.error, 'tool_input') };
    }
    default:
      return { ok: true, payload: { type: 'other', input } };
  }
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Best-effort read of the host event name from a record that may not parse
 * as a full envelope.
 */
export function peekHostEvent(raw: string): string | undefined {
  try {
    const parsed: unknown = JSON.parse(raw);
    if (parsed !== null && typeof parsed === 'object' && 'hook_event_name' in parsed) {
      const name = parsed.hook_event_name;
      return typeof name === 'string' ? name : undefined;
    }
  } catch {
    return undefined;
  }
  return undefined;
}

export function parseEnvelope(raw: string): HookEvent {
  if (raw.trim().length === 0) {
    throw new EnvelopeParseError('Empty hook input');
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new EnvelopeParseError('Hook input is not valid JSON', [{ path: '', message: errorMessage(err) }]);
  }

  const result = EnvelopeSchema.safeParse(json);
  if (!result.success) {
    const issues = toIssues(result.error, '').map((i) => ({ ...i, path: i.path.replace(/^\./, '') }));
    throw new EnvelopeParseError('Hook input does not match the envelope schema', issues);
  }
  const env = result.data;

  const kind = HOST_EVENT_KINDS[env.hook_event_name];
  if (!kind) {
    throw new EnvelopeParseError(`Unknown hook event "${env.hook_event_name}"`, [
      { path: 'hook_event_name', message: `Expected one of: ${Object.keys(HOST_EVENT_KINDS).join(', ')}` },
    ]);
  }

  const base = {
    hostEvent: env.hook_event_name,
    sessionId: env.session_id ?? 'unknown',
    cwd: env.cwd,
  };

  switch (kind) {
    case 'PreInvocation':
    case 'PostInvocation':
    case 'PostInvocationFailure': {
      if (!env.tool_name) {
        throw new EnvelopeParseError(`${env.hook_event_name} event has no tool_name`, [
          { path: 'tool_name', message: 'Required' },
        ]);
      }
      const input = env.tool_input ?? {};
      const parsed = parsePayload(env.tool_name, input);
      let payload: OperationPayload;
      if (parsed.ok) {
        payload = parsed.payload;
      } else if (kind === 'PreInvocation') {
        throw new EnvelopeParseError(`Malformed ${env.tool_name} input`, parsed.issues);
      } else {
        // After the fact there is nothing to decide; keep the raw input for the audit trail.
        payload = { type: 'other', input };
      }
      return {
        ...base,
        kind,
        operation: { tool: env.tool_name, payload },
        error: env.error,
      };
    }
    case 'PromptSubmitted':
      return { ...base, kind, prompt: env.prompt ?? '' };
    case 'SessionStop':
    case 'SubagentStop':
      return {
        ...base,
        kind,
        transcriptPath: env.transcript_path,
        lastAssistantMessage: env.last_assistant_message,
        stopHookActive: env.stop_hook_active ?? false,
      };
    case 'Notification':
      return { ...base, kind, message: env.message ?? '' };
  }
}
