/**
 * Filtering and summaries over audit entries.
 */

import type { AuditDecision, AuditEntry } from '../types.js';

export interface AuditQueryOptions {
  /** Filter by session ID */
  sessionId?: string;
  /** Filter by event kind(s) */
  kinds?: string[];
  /** Filter by decision */
  decision?: AuditDecision;
  /** Filter entries after this timestamp (ISO string) */
  after?: string;
  /** Filter entries before this timestamp (ISO string) */
  before?: string;
  /** Maximum number of entries to return */
  limit?: number;
  /** Offset for pagination */
  offset?: number;
}

export function queryAudit(entries: AuditEntry[], options: AuditQueryOptions = {}): AuditEntry[] {
  let filtered = entries;

  if (options.sessionId) {
    const sessionId = options.sessionId;
    filtered = filtered.filter((e) => e.session_id === sessionId);
  }

  const kinds = options.kinds;
  if (kinds && kinds.length > 0) {
    filtered = filtered.filter((e) => kinds.includes(e.event_kind));
  }

  if (options.decision) {
    const decision = options.decision;
    filtered = filtered.filter((e) => e.decision === decision);
  }

  if (options.after) {
    const afterDate = new Date(options.after).getTime();
    filtered = filtered.filter((e) => new Date(e.ts).getTime() > afterDate);
  }

  if (options.before) {
    const beforeDate = new Date(options.before).getTime();
    filtered = filtered.filter((e) => new Date(e.ts).getTime() < beforeDate);
  }

  if (options.offset) {
    filtered = filtered.slice(options.offset);
  }

  if (options.limit) {
    filtered = filtered.slice(0, options.limit);
  }

  return filtered;
}

export interface AuditSummary {
  totalEntries: number;
  sessions: string[];
  byKind: Record<string, number>;
  allowed: number;
  blocked: number;
  fatal: number;
  /** Most frequent block reasons, highest first */
  topBlockReasons: Array<{ reason: string; count: number }>;
}

export function summarizeAudit(entries: AuditEntry[], topN = 5): AuditSummary {
  const byKind: Record<string, number> = {};
  const blockReasons = new Map<string, number>();
  const sessions = new Set<string>();

  for (const entry of entries) {
    byKind[entry.event_kind] = (byKind[entry.event_kind] ?? 0) + 1;
    sessions.add(entry.session_id);
    if (entry.decision === 'block') {
      blockReasons.set(entry.reason, (blockReasons.get(entry.reason) ?? 0) + 1);
    }
  }

  return {
    totalEntries: entries.length,
    sessions: [...sessions].sort(),
    byKind,
    allowed: entries.filter((e) => e.decision === 'allow').length,
    blocked: entries.filter((e) => e.decision === 'block').length,
    fatal: entries.filter((e) => e.decision === 'fatal').length,
    topBlockReasons: [...blockReasons.entries()]
      .map(([reason, count]) => ({ reason, count }))
      .sort((a, b) => b.count - a.count || a.reason.localeCompare(b.reason))
      .slice(0, topN),
  };
}
