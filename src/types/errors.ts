/**
 * Base error class for the focus analytics engine
 */
export class FocusAnalyticsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Error thrown when parsing CLI input fails
 */
export class ParseError extends FocusAnalyticsError {
  constructor(
    message: string,
    public readonly input?: string
  ) {
    super(input !== undefined ? `${message}: "${input}"` : message);
  }
}

/**
 * Error thrown when snapshot store operations fail
 */
export class DatabaseError extends FocusAnalyticsError {}

/**
 * Error thrown when a request or configuration is malformed
 */
export class ValidationError extends FocusAnalyticsError {
  constructor(
    message: string,
    public readonly field?: string
  ) {
    super(message);
  }
}

/**
 * Error thrown when a drill-down target (session, template) does not exist
 */
export class NotFoundError extends FocusAnalyticsError {
  constructor(
    public readonly kind: 'session' | 'template',
    public readonly key: string
  ) {
    super(`Unknown ${kind}: ${key}`);
  }
}

/**
 * Render an unknown thrown value as a message
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
