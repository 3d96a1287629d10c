import type { DomainIssue } from './Domain.js';

/**
 * Raised when a node's structural parameters are rejected.
 * This is a programmer error; no partially built node is ever returned.
 */
export class ConstructionError extends Error {
  constructor(
    message: string,
    public node: string,
    public parameter?: string
  ) {
    const parameterInfo = parameter ? ` (parameter: ${parameter})` : '';
    super(`Construction error for '${node}': ${message}${parameterInfo}`);
    this.name = 'ConstructionError';
  }
}

/**
 * Raised by the checked evaluation layer only. Plain evaluation never throws
 * for domain violations.
 */
export class DomainError extends Error {
  constructor(
    public issues: DomainIssue[],
    public input: number
  ) {
    super(`Domain error at x = ${input}: ${issues.map(issue => issue.description).join('; ')}`);
    this.name = 'DomainError';
  }
}
