import type { ConfigIssue } from './app-error.js';

/**
 * Thrown for programmer errors: null construction, use of a handle after its
 * last strong reference was released, unbalanced releases.
 *
 * Not meant to be caught in normal control flow.
 */
export class ContractViolationError extends Error {
  constructor(message: string, options?: { readonly cause?: unknown }) {
    super(message, options);
    this.name = 'ContractViolationError';
  }
}

/**
 * Thrown by the process-level config accessor when the environment does not parse.
 */
export class ConfigurationError extends Error {
  public readonly issues: readonly ConfigIssue[];

  constructor(message: string, issues: readonly ConfigIssue[]) {
    super(message);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

export function requireValue<T>(value: T | null | undefined, name: string): T {
  if (value === null || value === undefined) {
    throw new ContractViolationError(`${name} must not be null or undefined`);
  }
  return value;
}
