import type { ZodError } from 'zod';

export class ValidationError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'ValidationError';
    this.issues = issues;
  }

  static fromZod(message: string, err: ZodError): ValidationError {
    const issues = err.issues.map(i => (i.path.length ? `${i.path.join('.')}: ${i.message}` : i.message));
    return new ValidationError(message, issues);
  }
}

/** Raised for states the door invariants should make unreachable. */
export class LogicError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'LogicError';
  }
}
