import { ErrorCode } from '../utils/error-handler';

/**
 * Error raised by the assessment pipeline with a structured error code
 */
export class AssessmentError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly details?: Record<string, unknown>,
    public readonly originalError?: Error
  ) {
    super(message);
    this.name = 'AssessmentError';

    if (originalError?.stack) {
      this.stack = `${this.stack}\nCaused by: ${originalError.stack}`;
    }
  }
}
