/**
 * Rule Matcher — evaluates an ordered rule set against one candidate string.
 *
 * Precedence:
 *  - block rules are considered in declaration order; the first one that
 *    matches and is not excepted wins
 *  - an allow-exception suppresses every block rule of the same category,
 *    wherever either is declared; it never reaches across categories
 *  - no surviving block rule means allow
 */

import type { Rule, Verdict } from '../types.js';

export function evaluateRules(candidate: string, rules: readonly Rule[]): Verdict {
  const exceptions = new Map<string, Rule>();
  for (const rule of rules) {
    if (rule.verdict !== 'allow-exception' || exceptions.has(rule.category)) continue;
    if (rule.pattern.test(candidate)) {
      exceptions.set(rule.category, rule);
    }
  }

  let suppressed: Rule | undefined;

  for (const rule of rules) {
    if (rule.verdict !== 'block' || !rule.pattern.test(candidate)) continue;

    const exception = exceptions.get(rule.category);
    if (exception) {
      if (!suppressed) suppressed = exception;
      continue;
    }

    return {
      decision: 'block',
      reason: rule.reason,
      category: rule.category,
      pattern: rule.pattern.source,
    };
  }

  if (suppressed) {
    return {
      decision: 'allow',
      reason: suppressed.reason,
      category: suppressed.category,
    };
  }

  return { decision: 'allow' };
}
