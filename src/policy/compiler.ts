/**
 * Turns validated config into typed, ready-to-match rules.
 *
 * Every pattern is compiled here, once, so the matcher never meets an
 * invalid pattern at evaluation time. All problems are collected and
 * reported together.
 */

import { Minimatch } from 'minimatch';
import { ConfigurationError, errorMessage, type Issue } from '../errors.js';
import type { CommandCategory, Matcher, ProtectedPathSpec, Rule } from '../types.js';

export const PROTECTED_PATH_CATEGORY = 'protected-path';

export interface CompiledPathSpec {
  rules: Rule[];
  sentinelMarkers: string[];
  overrideEnv: string;
}

// ---------------------------------------------------------------------------
// Matchers
// ---------------------------------------------------------------------------

/** Case-insensitive regular expression matcher, used for command text. */
export function regexMatcher(source: string): Matcher {
  const re = new RegExp(source, 'i');
  return {
    source,
    test: (candidate) => re.test(candidate),
  };
}

/** Case-sensitive glob matcher, used for file paths. */
export function globMatcher(source: string): Matcher {
  const mm = new Minimatch(source, { dot: true });
  if (mm.makeRe() === false) {
    throw new Error(`Invalid glob "${source}"`);
  }
  return {
    source,
    test: (candidate) => mm.match(candidate),
  };
}

// ---------------------------------------------------------------------------
// Command rules
// ---------------------------------------------------------------------------

export function compileCommandRules(categories: CommandCategory[]): Rule[] {
  const rules: Rule[] = [];
  const issues: Issue[] = [];

  categories.forEach((category, ci) => {
    category.rules.forEach((rule, ri) => {
      try {
        rules.push({
          category: category.name,
          pattern: regexMatcher(rule.pattern),
          verdict: 'block',
          reason: rule.reason,
        });
      } catch (err) {
        issues.push({
          path: `command_guard.categories.${ci}.rules.${ri}.pattern`,
          message: errorMessage(err),
        });
      }
    });

    category.exceptions.forEach((exception, ei) => {
      try {
        rules.push({
          category: category.name,
          pattern: regexMatcher(exception.pattern),
          verdict: 'allow-exception',
          reason: exception.reason,
        });
      } catch (err) {
        issues.push({
          path: `command_guard.categories.${ci}.exceptions.${ei}.pattern`,
          message: errorMessage(err),
        });
      }
    });
  });

  if (issues.length > 0) {
    throw new ConfigurationError(`Command rule set has ${issues.length} invalid pattern(s)`, issues);
  }
  return rules;
}

// ---------------------------------------------------------------------------
// Path rules
// ---------------------------------------------------------------------------

/**
 * Protected globs and their exceptions share one category, which makes
 * every exception apply to every protected glob.
 */
export function compilePathSpec(spec: ProtectedPathSpec): CompiledPathSpec {
  const rules: Rule[] = [];
  const issues: Issue[] = [];

  spec.protected.forEach((entry, i) => {
    try {
      rules.push({
        category: PROTECTED_PATH_CATEGORY,
        pattern: globMatcher(entry.glob),
        verdict: 'block',
        reason: entry.reason,
      });
    } catch (err) {
      issues.push({ path: `path_guard.protected.${i}.glob`, message: errorMessage(err) });
    }
  });

  spec.exceptions.forEach((glob, i) => {
    try {
      rules.push({
        category: PROTECTED_PATH_CATEGORY,
        pattern: globMatcher(glob),
        verdict: 'allow-exception',
        reason: `Path matches exception pattern "${glob}"`,
      });
    } catch (err) {
      issues.push({ path: `path_guard.exceptions.${i}`, message: errorMessage(err) });
    }
  });

  if (issues.length > 0) {
    throw new ConfigurationError(`Path rule set has ${issues.length} invalid pattern(s)`, issues);
  }

  return {
    rules,
    sentinelMarkers: [...spec.sentinelMarkers],
    overrideEnv: spec.overrideEnv,
  };
}
