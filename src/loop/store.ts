/**
 * One state file per loop key.
 *
 * File layout: YAML front matter holding the LoopState header fields,
 * followed by the task text verbatim.
 *
 *   ---
 *   active: true
 *   iteration: 1
 *   max_iterations: 3
 *   completion_token: DONE
 *   started_at: '2026-01-01T00:00:00.000Z'
 *   ---
 *   <task text>
 */

import fs from 'node:fs';
import path from 'node:path';
import yaml from 'js-yaml';
import { nanoid } from 'nanoid';
import { z } from 'zod';
import { atomicWriteFileSync, type AtomicWriteOptions } from '../io/atomic-write.js';
import { withFileLockSync } from '../io/file-lock.js';
import { ConfigurationError, errorMessage, PersistenceError } from '../errors.js';
import type { LoopState } from '../types.js';

export const DEFAULT_LOOP_KEY = 'default';

const FENCE = '---';

// js-yaml turns unquoted ISO timestamps into Dates; accept both
const TimestampSchema = z
  .union([z.string().min(1), z.date()])
  .transform((v) => (typeof v === 'string' ? v : v.toISOString()));

export const LoopHeaderSchema = z.object({
  active: z.boolean(),
  iteration: z.number().int().min(1),
  max_iterations: z.number().int().min(1),
  completion_token: z
    .union([z.string(), z.number()])
    .transform((v) => String(v).trim())
    .pipe(z.string().min(1)),
  started_at: TimestampSchema,
  ended_at: TimestampSchema.optional(),
  end_reason: z.enum(['completion_promise', 'max_iterations', 'user_cancelled']).optional(),
  owner_session: z.string().min(1).optional(),
});

export function sanitizeLoopKey(key: string): string {
  const cleaned = key.replace(/[^A-Za-z0-9._-]/g, '_').replace(/^\.+/, '_');
  return cleaned.length > 0 ? cleaned : DEFAULT_LOOP_KEY;
}

export function serializeLoopState(state: LoopState): string {
  const header: Record<string, unknown> = {
    active: state.active,
    iteration: state.iteration,
    max_iterations: state.max_iterations,
    completion_token: state.completion_token,
    started_at: state.started_at,
  };
  if (state.ended_at !== undefined) header.ended_at = state.ended_at;
  if (state.end_reason !== undefined) header.end_reason = state.end_reason;
  if (state.owner_session !== undefined) header.owner_session = state.owner_session;

  const body = yaml.dump(header, { lineWidth: -1, noRefs: true, sortKeys: false });
  return `${FENCE}\n${body}${FENCE}\n${state.task_text}\n`;
}

export function parseLoopState(text: string, source = 'loop state'): LoopState {
  const normalized = text.replace(/\r\n/g, '\n');
  if (!normalized.startsWith(`${FENCE}\n`)) {
    throw new ConfigurationError(`${source}: missing header`, [
      { path: '', message: 'Expected the file to start with a --- header block' },
    ]);
  }

  const close = normalized.indexOf(`\n${FENCE}\n`, FENCE.length);
  if (close === -1) {
    throw new ConfigurationError(`${source}: unterminated header`, [
      { path: '', message: 'No closing --- line' },
    ]);
  }

  let header: unknown;
  try {
    header = yaml.load(normalized.slice(FENCE.length + 1, close + 1));
  } catch (err) {
    throw new ConfigurationError(`${source}: header is not valid YAML`, [{ path: '', message: errorMessage(err) }]);
  }

  const result = LoopHeaderSchema.safeParse(header);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));
    throw new ConfigurationError(`${source}: malformed header`, issues);
  }

  const body = normalized.slice(close + FENCE.length + 2);
  const taskText = body.endsWith('\n') ? body.slice(0, -1) : body;
  if (taskText.trim().length === 0) {
    throw new ConfigurationError(`${source}: task text is empty`, [{ path: 'task_text', message: 'Required' }]);
  }

  return { ...result.data, task_text: taskText };
}

export class LoopStore {
  private stateDir: string;

  constructor(
    stateDir: string,
    private readonly writeOptions: AtomicWriteOptions = {},
  ) {
    this.stateDir = path.resolve(stateDir);
  }

  getStateDir(): string {
    return this.stateDir;
  }

  pathFor(key: string): string {
    return path.join(this.stateDir, `${sanitizeLoopKey(key)}.md`);
  }

  exists(key: string): boolean {
    return fs.existsSync(this.pathFor(key));
  }

  /**
   * Read the record for `key`. Returns null when there is none; a record
   * that exists but does not parse is a ConfigurationError.
   */
  load(key: string): LoopState | null {
    const filePath = this.pathFor(key);
    if (!fs.existsSync(filePath)) return null;
    return parseLoopState(fs.readFileSync(filePath, 'utf-8'), filePath);
  }

  save(key: string, state: LoopState): void {
    atomicWriteFileSync(this.pathFor(key), serializeLoopState(state), this.writeOptions);
  }

  /**
   * Bind an unowned record to `sessionId`, under a lock so that two
   * sessions stopping at once cannot both claim it. True when the record
   * belongs to `sessionId` afterwards, or is finished and unowned.
   */
  claim(key: string, sessionId: string): boolean {
    return withFileLockSync(`${this.pathFor(key)}.lock`, () => {
      const state = this.load(key);
      if (!state) return false;
      if (state.owner_session !== undefined) return state.owner_session === sessionId;
      if (!state.active) return true;
      this.save(key, { ...state, owner_session: sessionId });
      return true;
    });
  }

  /**
   * Move a finished record into `archive/` so a new loop can take its key.
   * Returns the archive path.
   */
  archive(key: string, state: LoopState): string {
    const archiveDir = path.join(this.stateDir, 'archive');
    const stamp = (state.ended_at ?? state.started_at).replace(/[:.]/g, '-');
    let target = path.join(archiveDir, `${sanitizeLoopKey(key)}-${stamp}.md`);
    if (fs.existsSync(target)) {
      target = target.replace(/\.md$/, `-${nanoid(6)}.md`);
    }

    try {
      fs.mkdirSync(archiveDir, { recursive: true });
      fs.renameSync(this.pathFor(key), target);
    } catch (err) {
      throw new PersistenceError(`Failed to archive loop record: ${errorMessage(err)}`, target, { cause: err });
    }
    return target;
  }

  /** Keys of every current (non-archived) record. */
  list(): string[] {
    if (!fs.existsSync(this.stateDir)) return [];
    return fs
      .readdirSync(this.stateDir, { withFileTypes: true })
      .filter((d) => d.isFile() && d.name.endsWith('.md') && !d.name.startsWith('.'))
      .map((d) => d.name.slice(0, -'.md'.length))
      .sort();
  }
}
