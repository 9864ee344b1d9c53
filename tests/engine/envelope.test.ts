import { describe, it, expect } from 'vitest';
import { operationTypeOf, parseEnvelope, peekHostEvent } from '../../src/engine/envelope.js';
import { EnvelopeParseError } from '../../src/errors.js';

function envelope(fields: Record<string, unknown>): string {
  return JSON.stringify({ session_id: 'sess-1', cwd: '/work/app', ...fields });
}

function parseErrorOf(raw: string): EnvelopeParseError {
  try {
    parseEnvelope(raw);
  } catch (err) {
    if (err instanceof EnvelopeParseError) return err;
    throw err;
  }
  throw new Error('expected an EnvelopeParseError');
}

describe('operationTypeOf', () => {
  it('should map host tools to operation types', () => {
    expect(operationTypeOf('Bash')).toBe('shell');
    expect(operationTypeOf('Write')).toBe('write');
    expect(operationTypeOf('Edit')).toBe('edit');
    expect(operationTypeOf('MultiEdit')).toBe('edit');
    expect(operationTypeOf('NotebookEdit')).toBe('edit');
    expect(operationTypeOf('WebFetch')).toBe('other');
  });
});

describe('parseEnvelope', () => {
  it('should parse a shell pre-invocation', () => {
    const event = parseEnvelope(
      envelope({ hook_event_name: 'PreToolUse', tool_name: 'Bash', tool_input: { command: 'ls' } }),
    );
    expect(event).toEqual({
      hostEvent: 'PreToolUse',
      sessionId: 'sess-1',
      cwd: '/work/app',
      kind: 'PreInvocation',
      operation: { tool: 'Bash', payload: { type: 'shell', command: 'ls' } },
      error: undefined,
    });
  });

  it('should accept an empty command as well-formed', () => {
    const event = parseEnvelope(
      envelope({ hook_event_name: 'PreToolUse', tool_name: 'Bash', tool_input: { command: '' } }),
    );
    expect(event.kind === 'PreInvocation' && event.operation.payload).toEqual({ type: 'shell', command: '' });
  });

  it('should take the replacement text as edit content', () => {
    const event = parseEnvelope(
      envelope({
        hook_event_name: 'PreToolUse',
        tool_name: 'Edit',
        tool_input: { file_path: 'src/a.ts', old_string: 'a', new_string: 'b' },
      }),
    );
    expect(event.kind === 'PreInvocation' && event.operation.payload).toEqual({
      type: 'edit',
      path: 'src/a.ts',
      content: 'b',
    });
  });

  it('should join every replacement of a multi-edit', () => {
    const event = parseEnvelope(
      envelope({
        hook_event_name: 'PreToolUse',
        tool_name: 'MultiEdit',
        tool_input: {
          file_path: 'src/a.ts',
          edits: [
            { old_string: 'a', new_string: 'one' },
            { old_string: 'b', new_string: 'two' },
          ],
        },
      }),
    );
    expect(event.kind === 'PreInvocation' && event.operation.payload).toEqual({
      type: 'edit',
      path: 'src/a.ts',
      content: 'one\ntwo',
    });
  });

  it('should keep other tools as opaque input', () => {
    const event = parseEnvelope(
      envelope({ hook_event_name: 'PreToolUse', tool_name: 'WebFetch', tool_input: { url: 'https://example.com' } }),
    );
    expect(event.kind === 'PreInvocation' && event.operation.payload).toEqual({
      type: 'other',
      input: { url: 'https://example.com' },
    });
  });

  it('should reject a write without a path', () => {
    const err = parseErrorOf(
      envelope({ hook_event_name: 'PreToolUse', tool_name: 'Write', tool_input: { content: 'x' } }),
    );
    expect(err.message).toBe('Malformed Write input');
    expect(err.issues[0].path).toBe('tool_input.file_path');
  });

  it('should keep malformed input of a post-invocation for the audit trail', () => {
    const event = parseEnvelope(
      envelope({ hook_event_name: 'PostToolUse', tool_name: 'Write', tool_input: { content: 'x' } }),
    );
    expect(event.kind === 'PostInvocation' && event.operation.payload).toEqual({
      type: 'other',
      input: { content: 'x' },
    });
  });

  it('should carry the failure text of a failed invocation', () => {
    const event = parseEnvelope(
      envelope({
        hook_event_name: 'PostToolUseFailure',
        tool_name: 'Bash',
        tool_input: { command: 'false' },
        error: 'exit 1',
      }),
    );
    expect(event).toMatchObject({ kind: 'PostInvocationFailure', error: 'exit 1' });
  });

  it('should parse stop events', () => {
    const event = parseEnvelope(
      envelope({ hook_event_name: 'Stop', transcript_path: '/tmp/t.jsonl', stop_hook_active: true }),
    );
    expect(event).toEqual({
      hostEvent: 'Stop',
      sessionId: 'sess-1',
      cwd: '/work/app',
      kind: 'SessionStop',
      transcriptPath: '/tmp/t.jsonl',
      lastAssistantMessage: undefined,
      stopHookActive: true,
    });
  });

  it('should default a missing session id', () => {
    const event = parseEnvelope(JSON.stringify({ hook_event_name: 'UserPromptSubmit', prompt: 'hi' }));
    expect(event).toMatchObject({ kind: 'PromptSubmitted', sessionId: 'unknown', prompt: 'hi' });
  });

  it('should reject empty input', () => {
    expect(parseErrorOf('  ').message).toBe('Empty hook input');
  });

  it('should reject invalid JSON', () => {
    expect(parseErrorOf('{not json').message).toBe('Hook input is not valid JSON');
  });

  it('should reject an unknown event', () => {
    expect(parseErrorOf(envelope({ hook_event_name: 'SessionStart' })).message).toBe(
      'Unknown hook event "SessionStart"',
    );
  });

  it('should reject an invocation without a tool name', () => {
    const err = parseErrorOf(envelope({ hook_event_name: 'PreToolUse', tool_input: {} }));
    expect(err.issues).toEqual([{ path: 'tool_name', message: 'Required' }]);
  });

  it('should reject fields of the wrong type', () => {
    const err = parseErrorOf(envelope({ hook_event_name: 'Stop', stop_hook_active: 'yes' }));
    expect(err.message).toBe('Hook input does not match the envelope schema');
    expect(err.issues[0].path).toBe('stop_hook_active');
  });
});

describe('peekHostEvent', () => {
  it('should read the event name from a record that does not fully parse', () => {
    expect(peekHostEvent(JSON.stringify({ hook_event_name: 'PreToolUse', tool_input: 3 }))).toBe('PreToolUse');
  });

  it('should return undefined for garbage', () => {
    expect(peekHostEvent('garbage')).toBeUndefined();
    expect(peekHostEvent('[]')).toBeUndefined();
  });
});
