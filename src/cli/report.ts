/**
 * `hookgate report`: verify an audit log's hash chain, then summarize and
 * optionally list the entries that pass the filters.
 */

import { InvalidArgumentError, type Command } from 'commander';
import fs from 'node:fs';
import path from 'node:path';
import { AuditEntrySchema, AuditSink, readAuditEntries } from '../ledger/audit-sink.js';
import { queryAudit, summarizeAudit, type AuditQueryOptions } from '../ledger/query.js';
import type { AuditDecision } from '../types.js';
import { parsePositiveInt } from './loop.js';

export interface ReportFlags {
  session?: string;
  decision?: AuditDecision;
  kind?: string[];
  after?: string;
  before?: string;
  offset?: number;
  limit?: number;
}

export interface ReportResult {
  lines: string[];
  errors: string[];
  exitCode: number;
}

const DECISIONS: readonly AuditDecision[] = ['allow', 'block', 'fatal'];

export function parseDecision(value: string): AuditDecision {
  const decision = DECISIONS.find((d) => d === value);
  if (!decision) throw new InvalidArgumentError(`Expected one of: ${DECISIONS.join(', ')}.`);
  return decision;
}

/** Repeatable, comma-separated `--kind`. */
export function collectKinds(value: string, previous: string[] = []): string[] {
  const kinds = value
    .split(',')
    .map((k) => k.trim())
    .filter((k) => k.length > 0);
  for (const kind of kinds) {
    if (!AuditEntrySchema.shape.event_kind.safeParse(kind).success) {
      throw new InvalidArgumentError(`Unknown event kind: ${kind}.`);
    }
  }
  return [...previous, ...kinds];
}

export function parseTimestamp(value: string): string {
  if (Number.isNaN(Date.parse(value))) {
    throw new InvalidArgumentError('Expected an ISO timestamp, e.g. 2026-03-01T10:00:00Z.');
  }
  return value;
}

export function parseOffset(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 0) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return n;
}

/** Filters that decide which entries are summarized; paging only applies to the listing. */
export function toQueryOptions(flags: ReportFlags): AuditQueryOptions {
  return {
    sessionId: flags.session,
    decision: flags.decision,
    kinds: flags.kind,
    after: flags.after,
    before: flags.before,
  };
}

export function buildReport(logPath: string, flags: ReportFlags = {}): ReportResult {
  const absPath = path.resolve(logPath);
  if (!fs.existsSync(absPath)) {
    return { lines: [], errors: [`Audit log not found: ${absPath}`], exitCode: 1 };
  }

  const integrity = AuditSink.verifyIntegrity(absPath);
  const exitCode = integrity.valid ? 0 : 1;
  const lines = ['--- Audit Log Integrity ---', `Valid: ${integrity.valid}`, `Entries: ${integrity.totalEntries}`];
  if (!integrity.valid) {
    lines.push(`Broken at: seq ${integrity.brokenAt}`, `Error: ${integrity.error}`);
  }

  const entries = readAuditEntries(absPath);
  if (entries.length === 0) {
    lines.push('Audit log is empty.');
    return { lines, errors: [], exitCode };
  }

  const matching = queryAudit(entries, toQueryOptions(flags));
  const summary = summarizeAudit(matching);

  lines.push(
    '',
    '--- Summary ---',
    `Total entries: ${summary.totalEntries}`,
    `Sessions: ${summary.sessions.length}`,
    `  Allowed: ${summary.allowed}`,
    `  Blocked: ${summary.blocked}`,
    `  Fatal: ${summary.fatal}`,
  );
  for (const [kind, count] of Object.entries(summary.byKind)) {
    lines.push(`  ${kind}: ${count}`);
  }
  if (summary.topBlockReasons.length > 0) {
    lines.push('Top block reasons:');
    for (const { reason, count } of summary.topBlockReasons) {
      lines.push(`  ${count}x ${reason}`);
    }
  }

  if (flags.limit !== undefined || flags.offset !== undefined) {
    lines.push('', '--- Entries ---');
    for (const e of queryAudit(matching, { offset: flags.offset, limit: flags.limit })) {
      lines.push(`#${e.seq} ${e.ts} ${e.event_kind} ${e.decision.toUpperCase()} ${e.operation_summary}`);
      if (e.reason) lines.push(`    ${e.reason}`);
    }
  }

  return { lines, errors: [], exitCode };
}

export function registerReportCommand(program: Command): void {
  program
    .command('report')
    .description('Verify the hash chain of an audit log and summarize it')
    .argument('<log>', 'Path to an audit JSONL file, e.g. .hookgate/logs/commands.jsonl')
    .option('--session <id>', 'Only entries for this session')
    .option('--decision <decision>', 'Only entries with this decision (allow, block, fatal)', parseDecision)
    .option('--kind <kinds>', 'Only these event kinds (comma-separated, repeatable)', collectKinds)
    .option('--after <iso>', 'Only entries after this timestamp', parseTimestamp)
    .option('--before <iso>', 'Only entries before this timestamp', parseTimestamp)
    .option('--offset <n>', 'Skip this many matching entries in the listing', parseOffset)
    .option('--limit <n>', 'List at most this many matching entries', parsePositiveInt)
    .action((logPath: string, flags: ReportFlags) => {
      const result = buildReport(logPath, flags);
      for (const line of result.errors) console.error(line);
      for (const line of result.lines) console.log(line);
      process.exitCode = result.exitCode;
    });
}
