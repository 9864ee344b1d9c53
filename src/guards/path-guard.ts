/**
 * Path Guard: decides whether a proposed file write or edit may proceed.
 *
 * Two checks, either of which blocks:
 *  1. content check: a sentinel marker anywhere in the new content; path
 *     exceptions do not apply to it
 *  2. path check: protected globs, unless any exception glob matches
 *
 * The operator override disables both for the session. The guard still
 * reports what it would have blocked so the bypass lands in the audit log.
 */

import path from 'node:path';
import { compilePathSpec, type CompiledPathSpec } from '../policy/compiler.js';
import { evaluateRules } from '../policy/matcher.js';
import type { ProtectedPathSpec, Verdict } from '../types.js';

export const SENTINEL_CATEGORY = 'sentinel-marker';

export interface PathGuardOptions {
  /** Paths inside this directory are matched relative to it */
  projectDir?: string;
  /** Operator override: disables both checks */
  override?: boolean;
}

export interface WriteTarget {
  path: string;
  content?: string;
  /** Directory a relative `path` is relative to; defaults to the project */
  cwd?: string;
}

export class PathGuard {
  constructor(
    private readonly spec: CompiledPathSpec,
    private readonly options: PathGuardOptions = {},
  ) {}

  static fromSpec(spec: ProtectedPathSpec, options: PathGuardOptions = {}): PathGuard {
    return new PathGuard(compilePathSpec(spec), options);
  }

  get overrideEnv(): string {
    return this.spec.overrideEnv;
  }

  evaluate(target: WriteTarget): Verdict {
    const verdict = this.check(target);
    if (!this.options.override) return verdict;

    const bypass = `Protection bypassed by operator override (${this.spec.overrideEnv})`;
    if (verdict.decision === 'block') {
      return {
        decision: 'allow',
        reason: `${bypass}; would have blocked: ${verdict.reason}`,
        category: verdict.category,
      };
    }
    return { decision: 'allow', reason: bypass };
  }

  private check(target: WriteTarget): Verdict {
    if (target.content) {
      const marker = this.spec.sentinelMarkers.find((m) => target.content?.includes(m));
      if (marker) {
        return {
          decision: 'block',
          reason: `Content check: new content contains sentinel marker "${marker}"`,
          category: SENTINEL_CATEGORY,
          pattern: marker,
        };
      }
    }

    const candidate = normalizeTargetPath(target.path, this.options.projectDir, target.cwd);
    const verdict = evaluateRules(candidate, this.spec.rules);
    if (verdict.decision === 'block') {
      return {
        ...verdict,
        reason: `Path check: "${candidate}" matches protected pattern "${verdict.pattern}" (${verdict.reason})`,
      };
    }
    return verdict;
  }
}

/**
 * POSIX form of the target, resolved against `cwd` (else `projectDir`);
 * relative to `projectDir` when it lies inside it, absolute otherwise.
 * Without either directory a relative target is only normalized.
 */
export function normalizeTargetPath(target: string, projectDir?: string, cwd?: string): string {
  const slashed = target.replace(/\\/g, '/');
  const base = cwd ?? projectDir;

  let absolute: string;
  if (path.isAbsolute(slashed)) {
    absolute = slashed;
  } else if (base) {
    absolute = path.resolve(base, slashed);
  } else {
    const normalized = path.posix.normalize(slashed);
    return normalized.startsWith('./') ? normalized.slice(2) : normalized;
  }

  if (projectDir) {
    const rel = path.relative(projectDir, absolute);
    const outside = rel === '..' || rel.startsWith(`..${path.sep}`) || path.isAbsolute(rel);
    if (rel.length > 0 && !outside) {
      return rel.split(path.sep).join('/');
    }
  }
  return path.posix.normalize(absolute.split(path.sep).join('/'));
}

export function isOverrideEnabled(env: NodeJS.ProcessEnv, name: string): boolean {
  const value = env[name];
  return value !== undefined && ['1', 'true', 'yes'].includes(value.trim().toLowerCase());
}
