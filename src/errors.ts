/**
 * Error Types
 *
 * Scoring itself never throws: unknown metrics are skipped and failed
 * thresholds are reported as outcomes. These errors cover the edges
 * where untyped input enters the advisor.
 *
 * @module errors
 */

import type { ZodError } from 'zod';

/**
 * Invalid criteria, environment or command-line input.
 */
export class ConfigurationError extends Error {
  constructor(
    message: string,
    public readonly issues: readonly string[] = []
  ) {
    super(issues.length > 0 ? `${message}\n  - ${issues.join('\n  - ')}` : message);
    this.name = 'ConfigurationError';
  }
}

/**
 * A country dataset that cannot be read, parsed or validated.
 */
export class DatasetError extends Error {
  constructor(
    message: string,
    public readonly source: string
  ) {
    super(message);
    this.name = 'DatasetError';
  }
}

/**
 * Flatten zod issues into `path: message` lines.
 */
export function formatZodIssues(error: ZodError): string[] {
  return error.issues.map(
    (issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`
  );
}
