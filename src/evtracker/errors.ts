export class EvTrackerApiError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "EvTrackerApiError";
  }
}

export class EvTrackerAuthenticationError extends EvTrackerApiError {
  constructor(message: string) {
    super(message);
    this.name = "EvTrackerAuthenticationError";
  }
}

export class EvTrackerRateLimitError extends EvTrackerApiError {
  /**
   * Seconds the API asked us to wait.
   */
  retryAfter: number;

  constructor(retryAfter: number) {
    super(`Rate limit exceeded. Retry after ${retryAfter} seconds`);
    this.name = "EvTrackerRateLimitError";
    this.retryAfter = retryAfter;
  }
}

export class EvTrackerValidationError extends EvTrackerApiError {
  status: number;

  constructor(status: number, message: string) {
    super(`API error: ${status} - ${message}`);
    this.name = "EvTrackerValidationError";
    this.status = status;
  }
}

export class EvTrackerConnectionError extends EvTrackerApiError {
  constructor(cause: unknown) {
    super(
      `Connection error: ${cause instanceof Error ? cause.message : String(cause)}`
    );
    this.name = "EvTrackerConnectionError";
  }
}

/**
 * Thrown for a session logging request whose payload does not validate.
 */
export class ServiceCallValidationError extends Error {
  issues: string[];

  constructor(service: string, issues: string[]) {
    super(`invalid data for ${service}: ${issues.join("; ")}`);
    this.name = "ServiceCallValidationError";
    this.issues = issues;
  }
}
