/**
 * AppError - Unified application error class
 *
 * Carries an HTTP status code and a machine-readable code so the Express
 * error handler can answer the transport consistently.
 *
 * @example
 * throw AppError.forbidden('Invalid webhook signature');
 * throw AppError.conflict('Conversation is busy', { userId });
 */
export class AppError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number = 500,
    public readonly code?: string,
    public readonly details?: unknown,
  ) {
    super(message);
    this.name = 'AppError';
    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * 403 Forbidden - Request could not be authenticated as coming from the transport
   */
  static forbidden(message: string = 'Forbidden'): AppError {
    return new AppError(message, 403, 'FORBIDDEN');
  }

  /**
   * 404 Not Found - Route or resource doesn't exist
   */
  static notFound(message: string = 'Not found'): AppError {
    return new AppError(message, 404, 'NOT_FOUND');
  }

  /**
   * 409 Conflict - Per-user lock could not be taken in time
   */
  static conflict(message: string, details?: unknown): AppError {
    return new AppError(message, 409, 'CONFLICT', details);
  }

  /**
   * 500 Internal Server Error - Unexpected server error
   */
  static internal(message: string = 'Internal server error', details?: unknown): AppError {
    return new AppError(message, 500, 'INTERNAL_ERROR', details);
  }
}
