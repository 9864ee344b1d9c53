/**
 * Command Guard — decides whether a proposed shell invocation may run.
 *
 * The command line is split into its sequential segments (`&&`, `||`, `;`,
 * `&`, newlines), and `sh -c '…'` style wrappers are unwrapped, so that an
 * anchored exception for one segment cannot allowlist another. Pipes stay
 * inside a segment: fetch-and-execute patterns need to see both sides.
 */

import { compileCommandRules } from '../policy/compiler.js';
import { evaluateRules } from '../policy/matcher.js';
import type { CommandCategory, Rule, Verdict } from '../types.js';

const SHELL_WRAPPER = /^\s*(?:(?:\/usr)?\/bin\/)?(?:ba|da|k|z)?sh\s+-[a-z]*c\s+(['"])([\s\S]*)\1\s*$/i;

const MAX_UNWRAP_DEPTH = 3;

export class CommandGuard {
  constructor(private readonly rules: readonly Rule[]) {}

  static fromCategories(categories: CommandCategory[]): CommandGuard {
    return new CommandGuard(compileCommandRules(categories));
  }

  evaluate(command: string): Verdict {
    if (command.trim().length === 0) {
      return { decision: 'allow', reason: 'No command to evaluate' };
    }

    let firstAllow: Verdict | undefined;
    for (const segment of commandSegments(command)) {
      const verdict = evaluateRules(segment, this.rules);
      if (verdict.decision === 'block') return verdict;
      if (!firstAllow && verdict.reason) firstAllow = verdict;
    }
    return firstAllow ?? { decision: 'allow' };
  }
}

/**
 * Every segment a guard should look at: each sequential segment, plus the
 * segments of any shell wrapper's inline script.
 */
export function commandSegments(command: string, depth = 0): string[] {
  const segments: string[] = [];
  for (const segment of splitCommand(command)) {
    segments.push(segment);
    const wrapped = SHELL_WRAPPER.exec(segment);
    if (wrapped && depth < MAX_UNWRAP_DEPTH) {
      segments.push(...commandSegments(wrapped[2], depth + 1));
    }
  }
  return segments;
}

/**
 * Quote-aware split on sequencing operators. Redirections such as `2>&1`
 * and `&>` are not treated as separators.
 */
export function splitCommand(command: string): string[] {
  const segments: string[] = [];
  let current = '';
  let quote: '"' | "'" | null = null;

  const flush = () => {
    const trimmed = current.trim();
    if (trimmed.length > 0) segments.push(trimmed);
    current = '';
  };

  for (let i = 0; i < command.length; i++) {
    const ch = command[i];
    const next = command[i + 1];

    if (quote) {
      current += ch;
      if (ch === '\\' && quote === '"' && next !== undefined) {
        current += next;
        i++;
      } else if (ch === quote) {
        quote = null;
      }
      continue;
    }

    if (ch === '\\' && next !== undefined) {
      current += ch + next;
      i++;
      continue;
    }
    if (ch === '"' || ch === "'") {
      quote = ch;
      current += ch;
      continue;
    }

    if ((ch === '&' && next === '&') || (ch === '|' && next === '|')) {
      flush();
      i++;
      continue;
    }
    if (ch === ';' || ch === '\n') {
      flush();
      continue;
    }
    if (ch === '&') {
      const prev = command[i - 1];
      if (prev === '>' || prev === '<' || next === '>') {
        current += ch;
      } else {
        flush();
      }
      continue;
    }

    current += ch;
  }

  flush();
  return segments;
}
