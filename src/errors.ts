/**
 * Error taxonomy. Blocked operations and exhausted loop budgets are normal
 * results, not errors, and have no class here.
 */

export interface Issue {
  path: string;
  message: string;
}

/** Malformed rule set, config file, or loop state header. */
export class ConfigurationError extends Error {
  constructor(
    message: string,
    public readonly issues: Issue[] = [],
  ) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/** The incoming host event could not be parsed into a HookEvent. */
export class EnvelopeParseError extends Error {
  constructor(
    message: string,
    public readonly issues: Issue[] = [],
  ) {
    super(message);
    this.name = 'EnvelopeParseError';
  }
}

/** Loop state could not be durably written. */
export class PersistenceError extends Error {
  constructor(
    message: string,
    public readonly filePath: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'PersistenceError';
  }
}

export function formatIssues(issues: Issue[]): string {
  return issues.map((i) => (i.path ? `${i.path}: ${i.message}` : i.message)).join('; ');
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
