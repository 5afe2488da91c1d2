/**
 * Pattern catalog could not be loaded. Fatal at start: the service must not
 * answer scoring requests with a partial catalog.
 */
export class ConfigurationError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join("; ")}` : message);
    this.name = "ConfigurationError";
    this.issues = issues;
  }
}

/**
 * Caller broke the scoring contract (non-string lead fields).
 */
export class InvalidInputError extends Error {
  readonly field: string;

  constructor(field: string, message: string) {
    super(message);
    this.name = "InvalidInputError";
    this.field = field;
  }
}

/**
 * The text-generation service refused the request for rate limiting.
 */
export class RateLimitError extends Error {
  constructor(message = "Rate limit exceeded (429)") {
    super(message);
    this.name = "RateLimitError";
  }
}
