/**
 * Custom error classes
 */

export class LrcLibError extends Error {
  public readonly timestamp: Date;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    public readonly code: string,
    public readonly statusCode?: number,
    public readonly originalError?: unknown,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'LrcLibError';
    this.timestamp = new Date();
    this.context = context;
    Object.setPrototypeOf(this, LrcLibError.prototype);

    // Capture stack trace
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Convert error to JSON for logging/debugging
   */
  toJSON() {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      statusCode: this.statusCode,
      timestamp: this.timestamp.toISOString(),
      context: this.context,
      stack: this.stack,
    };
  }
}

/**
 * Connection failure, DNS failure or timeout. No HTTP status was received.
 */
export class NetworkError extends LrcLibError {
  constructor(message: string, originalError?: unknown, context?: Record<string, unknown>) {
    super(message, 'NETWORK_ERROR', undefined, originalError, context);
    this.name = 'NetworkError';
    Object.setPrototypeOf(this, NetworkError.prototype);
  }
}

export class NotFoundError extends LrcLibError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'NOT_FOUND_ERROR', 404, undefined, context);
    this.name = 'NotFoundError';
    Object.setPrototypeOf(this, NotFoundError.prototype);
  }
}

/**
 * Any non-2xx response other than 404
 */
export class ServerError extends LrcLibError {
  constructor(
    message: string,
    statusCode: number,
    context?: Record<string, unknown>,
    code = 'SERVER_ERROR'
  ) {
    super(message, code, statusCode, undefined, context);
    this.name = 'ServerError';
    Object.setPrototypeOf(this, ServerError.prototype);
  }
}

export class RateLimitError extends ServerError {
  constructor(
    message: string,
    public readonly retryAfter?: number,
    context?: Record<string, unknown>
  ) {
    super(message, 429, context, 'RATE_LIMIT_ERROR');
    this.name = 'RateLimitError';
    Object.setPrototypeOf(this, RateLimitError.prototype);
  }
}

export class IncorrectPublishTokenError extends ServerError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 400, context, 'INCORRECT_PUBLISH_TOKEN_ERROR');
    this.name = 'IncorrectPublishTokenError';
    Object.setPrototypeOf(this, IncorrectPublishTokenError.prototype);
  }
}

export class ValidationError extends LrcLibError {
  constructor(
    message: string,
    public readonly validationErrors?: unknown,
    context?: Record<string, unknown>
  ) {
    super(message, 'VALIDATION_ERROR', undefined, validationErrors, context);
    this.name = 'ValidationError';
    Object.setPrototypeOf(this, ValidationError.prototype);
  }
}

export class ChallengeAbortedError extends LrcLibError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'CHALLENGE_ABORTED_ERROR', undefined, undefined, context);
    this.name = 'ChallengeAbortedError';
    Object.setPrototypeOf(this, ChallengeAbortedError.prototype);
  }
}
