import { ErrorCode } from '../utils/error-handler';
import { AssessmentError } from './assessment-error';

/**
 * A single file could not be read (permissions, vanished, not a regular file).
 * Engine stages catch this, skip the file and continue.
 */
export class FileUnreadableError extends AssessmentError {
  constructor(
    public readonly filePath: string,
    originalError?: Error
  ) {
    super(
      ErrorCode.FILE_NOT_ACCESSIBLE,
      `Cannot read ${filePath}${originalError ? `: ${originalError.message}` : ''}`,
      { filePath },
      originalError
    );
    this.name = 'FileUnreadableError';
  }
}
