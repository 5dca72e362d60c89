import type { ZodIssue } from 'zod';

/** A capacity/refill-rate pair was rejected before it touched the bucket. */
export class InvalidConfigurationError extends Error {
  readonly issues: ZodIssue[];

  constructor(issues: ZodIssue[]) {
    super(`Invalid rate limit configuration: ${formatIssues(issues)}`);
    this.name = 'InvalidConfigurationError';
    this.issues = issues;
  }
}

export function formatIssues(issues: ZodIssue[]): string {
  return issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}
