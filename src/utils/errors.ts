/**
 * Error taxonomy shared across the library and the CLI.
 */

import type { ZodError } from 'zod';

/**
 * A malformed criterion, transform or request. Raised at construction or
 * validation time, never while matching.
 */
export class ValidationError extends Error {
  constructor(
    message: string,
    public readonly issues: string[] = [message],
  ) {
    super(message);
    this.name = 'ValidationError';
  }

  static fromZod(error: ZodError, context: string): ValidationError {
    const issues = error.issues.map(issue => {
      const path = issue.path.join('.');
      return path ? `${path}: ${issue.message}` : issue.message;
    });
    return new ValidationError(`Invalid ${context}: ${issues.join('; ')}`, issues);
  }
}

/**
 * A regex criterion whose pattern does not compile. Reported as a warning;
 * the criterion then matches nothing.
 */
export class PatternError extends Error {
  constructor(
    public readonly field: string,
    public readonly pattern: string,
    cause: string,
  ) {
    super(`Invalid regex for field "${field}": /${pattern}/ (${cause})`);
    this.name = 'PatternError';
  }
}

export class NotFoundError extends Error {
  constructor(
    public readonly entity: 'rule' | 'transform',
    public readonly key: string | number,
  ) {
    super(`${entity === 'rule' ? 'Rule with SID' : 'Transform'} ${key} not found`);
    this.name = 'NotFoundError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
