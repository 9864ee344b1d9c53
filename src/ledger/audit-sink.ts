/**
 * Audit Sink — append-only JSONL log with SHA-256 hash chaining.
 *
 * Each hook event leaves exactly one record in the sink for its concern.
 * Entries are chained: each entry's hash covers the previous entry's hash,
 * so `hookgate report` can tell whether a log was only ever appended to.
 */

import fs from 'node:fs';
import path from 'node:path';
import crypto from 'node:crypto';
import { z } from 'zod';
import { errorMessage } from '../errors.js';
import { withFileLock, type FileLockOptions } from '../io/file-lock.js';
import type { AuditConcern, AuditEntry, AuditRecord } from '../types.js';

export const GENESIS_HASH = 'sha256:' + '0'.repeat(64);

export const AUDIT_CONCERNS: readonly AuditConcern[] = ['commands', 'file-edits', 'prompts', 'loop', 'events'];

const MAX_SUMMARY_LENGTH = 500;

export const AuditEntrySchema = z.object({
  seq: z.number().int().min(1),
  ts: z.string(),
  hash: z.string(),
  prev: z.string(),
  session_id: z.string(),
  event_kind: z.enum([
    'PreInvocation',
    'PostInvocation',
    'PostInvocationFailure',
    'PromptSubmitted',
    'SessionStop',
    'SubagentStop',
    'Notification',
    'ParseFailure',
  ]),
  operation_summary: z.string(),
  decision: z.enum(['allow', 'block', 'fatal']),
  reason: z.string(),
});

export interface AuditIntegrityReport {
  valid: boolean;
  totalEntries: number;
  firstSeq: number;
  lastSeq: number;
  brokenAt?: number;
  error?: string;
}

function computeHash(seq: number, ts: string, prev: string, record: AuditRecord): string {
  const body = {
    session_id: record.session_id,
    operation_summary: record.operation_summary,
    decision: record.decision,
    reason: record.reason,
  };
  const hashInput = `${seq}|${ts}|${prev}|${record.event_kind}|${JSON.stringify(body)}`;
  return 'sha256:' + crypto.createHash('sha256').update(hashInput).digest('hex');
}

function parseEntry(line: string): AuditEntry | null {
  let json: unknown;
  try {
    json = JSON.parse(line);
  } catch {
    return null;
  }
  const result = AuditEntrySchema.safeParse(json);
  return result.success ? result.data : null;
}

export class AuditSink {
  private filePath: string;
  private lockPath: string;
  private seq: number = 0;
  private lastHash: string = GENESIS_HASH;
  private initialized = false;

  constructor(
    filePath: string,
    private readonly lockOptions: FileLockOptions = {},
  ) {
    this.filePath = path.resolve(filePath);
    this.lockPath = `${this.filePath}.lock`;
  }

  /**
   * Create the log directory and, for an existing log, pick the chain up
   * from its last entry.
   */
  async init(): Promise<void> {
    await fs.promises.mkdir(path.dirname(this.filePath), { recursive: true });
    await withFileLock(this.lockPath, () => this.readTail(), this.lockOptions);
    this.initialized = true;
  }

  /**
   * Other hook processes may have appended since init, so the tail is
   * re-read under the lock before every write.
   */
  async append(record: AuditRecord): Promise<AuditEntry> {
    if (!this.initialized) {
      throw new Error('Audit sink not initialized. Call init() first.');
    }

    return withFileLock(
      this.lockPath,
      async () => {
        await this.readTail();
        const seq = this.seq + 1;
        const ts = new Date().toISOString();
        const prev = this.lastHash;
        const entry: AuditEntry = { seq, ts, hash: computeHash(seq, ts, prev, record), prev, ...record };

        await fs.promises.appendFile(this.filePath, JSON.stringify(entry) + '\n', 'utf-8');
        this.seq = seq;
        this.lastHash = entry.hash;
        return entry;
      },
      this.lockOptions,
    );
  }

  /**
   * Chain position from the last entry that parses. A torn final line (an
   * append cut short by a crash) is newline-terminated so the next entry
   * starts on its own line; verifyIntegrity keeps reporting it.
   */
  private async readTail(): Promise<void> {
    this.seq = 0;
    this.lastHash = GENESIS_HASH;
    if (!fs.existsSync(this.filePath)) return;

    const content = await fs.promises.readFile(this.filePath, 'utf-8');
    if (content.length > 0 && !content.endsWith('\n')) {
      await fs.promises.appendFile(this.filePath, '\n', 'utf-8');
    }

    const lines = content.split('\n');
    for (let i = lines.length - 1; i >= 0; i--) {
      if (lines[i].trim().length === 0) continue;
      const entry = parseEntry(lines[i]);
      if (entry) {
        this.seq = entry.seq;
        this.lastHash = entry.hash;
        return;
      }
    }
  }

  /** Entries that parse; unparseable lines are left to verifyIntegrity to report. */
  readAll(): AuditEntry[] {
    return readAuditEntries(this.filePath);
  }

  getSeq(): number {
    return this.seq;
  }

  getLastHash(): string {
    return this.lastHash;
  }

  getFilePath(): string {
    return this.filePath;
  }

  static verifyIntegrity(filePath: string): AuditIntegrityReport {
    const absPath = path.resolve(filePath);
    if (!fs.existsSync(absPath)) {
      return { valid: false, totalEntries: 0, firstSeq: 0, lastSeq: 0, error: 'File not found' };
    }

    const content = fs.readFileSync(absPath, 'utf-8').trim();
    if (content.length === 0) {
      return { valid: true, totalEntries: 0, firstSeq: 0, lastSeq: 0 };
    }

    const lines = content.split('\n');
    const broken = (brokenAt: number, error: string): AuditIntegrityReport => ({
      valid: false,
      totalEntries: lines.length,
      firstSeq: 1,
      lastSeq: lines.length,
      brokenAt,
      error,
    });

    let prevHash = GENESIS_HASH;
    for (let i = 0; i < lines.length; i++) {
      const entry = parseEntry(lines[i]);
      if (!entry) {
        return broken(i + 1, `Cannot parse entry at line ${i + 1}`);
      }
      if (entry.seq !== i + 1) {
        return broken(i + 1, `Sequence gap at line ${i + 1}: expected seq ${i + 1}, got ${entry.seq}`);
      }
      if (entry.prev !== prevHash) {
        return broken(
          entry.seq,
          `Hash chain broken at seq ${entry.seq}: expected prev=${prevHash}, got prev=${entry.prev}`,
        );
      }
      const expectedHash = computeHash(entry.seq, entry.ts, entry.prev, entry);
      if (entry.hash !== expectedHash) {
        return broken(entry.seq, `Hash mismatch at seq ${entry.seq}: expected ${expectedHash}, got ${entry.hash}`);
      }
      prevHash = entry.hash;
    }

    return { valid: true, totalEntries: lines.length, firstSeq: 1, lastSeq: lines.length };
  }
}

export function readAuditEntries(filePath: string): AuditEntry[] {
  if (!fs.existsSync(filePath)) return [];
  const content = fs.readFileSync(filePath, 'utf-8').trim();
  if (content.length === 0) return [];
  return content.split('\n').flatMap((line) => {
    const entry = parseEntry(line);
    return entry ? [entry] : [];
  });
}

// ---------------------------------------------------------------------------
// Summaries
// ---------------------------------------------------------------------------

const SECRET_ASSIGNMENT =
  /\b([A-Za-z0-9_]*(?:api[_-]?key|token|secret|password|passwd|credential)[A-Za-z0-9_]*)(\s*[=:]\s*)(?:"[^"]*"|'[^']*'|[^\s"']+)/gi;

const BEARER = /\b(Bearer)\s+[A-Za-z0-9._~+/-]+=*/g;

/** Masks `NAME=value` secrets and bearer tokens. */
export function redactSecrets(text: string): string {
  return text.replace(SECRET_ASSIGNMENT, '$1$2***').replace(BEARER, '$1 ***');
}

export function summarize(text: string, maxLength: number = MAX_SUMMARY_LENGTH): string {
  const redacted = redactSecrets(text.replace(/\s*\n\s*/g, ' ').trim());
  return redacted.length > maxLength ? `${redacted.slice(0, maxLength)}...` : redacted;
}

// ---------------------------------------------------------------------------
// Per-concern routing
// ---------------------------------------------------------------------------

export interface AuditLogOptions {
  dir: string;
  enabled?: boolean;
  /** Diagnostic channel for write failures; defaults to stderr */
  onError?: (message: string) => void;
}

/**
 * One sink per concern under `dir`. A failed write is reported and
 * swallowed: the audit trail never changes a decision.
 */
export class AuditLog {
  private sinks = new Map<AuditConcern, AuditSink>();
  private dir: string;
  private enabled: boolean;
  private onError: (message: string) => void;

  constructor(options: AuditLogOptions) {
    this.dir = path.resolve(options.dir);
    this.enabled = options.enabled ?? true;
    this.onError = options.onError ?? ((message) => console.error(`[hookgate] ${message}`));
  }

  getDir(): string {
    return this.dir;
  }

  pathFor(concern: AuditConcern): string {
    return path.join(this.dir, `${concern}.jsonl`);
  }

  async record(concern: AuditConcern, record: AuditRecord): Promise<AuditEntry | null> {
    if (!this.enabled) return null;
    try {
      const sink = await this.sinkFor(concern);
      return await sink.append(record);
    } catch (err) {
      this.sinks.delete(concern);
      this.onError(`audit write failed (${concern}): ${errorMessage(err)}`);
      return null;
    }
  }

  private async sinkFor(concern: AuditConcern): Promise<AuditSink> {
    const existing = this.sinks.get(concern);
    if (existing) return existing;
    const sink = new AuditSink(this.pathFor(concern));
    await sink.init();
    this.sinks.set(concern, sink);
    return sink;
  }
}
