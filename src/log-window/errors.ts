import type { ZodIssue } from "zod";

/**
 * A single rejected input field.
 */
export type ValidationIssue = {
  /** Dotted path of the offending field, empty for the input as a whole */
  path: string;
  message: string;
};

export class LogWindowError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "LogWindowError";
  }
}

export class ConfigError extends LogWindowError {
  readonly issues: ValidationIssue[];

  constructor(issues: ValidationIssue[]) {
    super(`Invalid log window config: ${formatIssues(issues)}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

/**
 * Raised at the query boundary for malformed read parameters.
 * Nothing that raises this has touched the cache.
 */
export class QueryValidationError extends LogWindowError {
  readonly issues: ValidationIssue[];

  constructor(issues: ValidationIssue[]) {
    super(`Invalid query: ${formatIssues(issues)}`);
    this.name = "QueryValidationError";
    this.issues = issues;
  }
}

export function issuesFromZod(issues: ZodIssue[]): ValidationIssue[] {
  return issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
  }));
}

function formatIssues(issues: ValidationIssue[]): string {
  return issues.map((i) => (i.path ? `${i.path}: ${i.message}` : i.message)).join("; ");
}
