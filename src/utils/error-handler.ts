import { Logger } from './cli-utils';

export enum ErrorCode {
  // Configuration errors
  INVALID_CONFIG = 'INVALID_CONFIG',
  CONFIG_NOT_FOUND = 'CONFIG_NOT_FOUND',

  // File system errors
  DIRECTORY_NOT_FOUND = 'DIRECTORY_NOT_FOUND',
  FILE_NOT_ACCESSIBLE = 'FILE_NOT_ACCESSIBLE',
  REPORT_WRITE_FAILED = 'REPORT_WRITE_FAILED',

  // Analysis errors
  ANALYSIS_FAILED = 'ANALYSIS_FAILED',

  // Generic errors
  UNKNOWN_ERROR = 'UNKNOWN_ERROR',
  OPERATION_CANCELLED = 'OPERATION_CANCELLED',
}

export interface ReadinessError {
  code: ErrorCode;
  message: string;
  details?: Record<string, unknown>;
  recoverable: boolean;
  recoveryActions?: string[];
  originalError?: Error;
  stack?: string;
}

/**
 * Shape of errors thrown with a structured code (see src/errors)
 */
export interface CodedError extends Error {
  code: ErrorCode;
  details?: Record<string, unknown>;
}

const ERROR_CODES = new Set<string>(Object.values(ErrorCode));

export function isCodedError(error: unknown): error is CodedError {
  return (
    error instanceof Error &&
    'code' in error &&
    typeof error.code === 'string' &&
    ERROR_CODES.has(error.code)
  );
}

export interface ErrorHandlerOptions {
  enableRecovery: boolean;
}

export class ErrorHandler {
  private logger: Logger;
  private options: ErrorHandlerOptions;

  constructor(logger: Logger, options: Partial<ErrorHandlerOptions> = {}) {
    this.logger = logger;
    this.options = {
      enableRecovery: true,
      ...options,
    };
  }

  createError(
    code: ErrorCode,
    message: string,
    details?: Record<string, unknown>,
    originalError?: Error
  ): ReadinessError {
    const errorInfo = this.getErrorInfo(code);

    const result: ReadinessError = {
      code,
      message,
      recoverable: errorInfo.recoverable,
    };

    const stack = originalError?.stack ?? new Error().stack;
    if (stack) result.stack = stack;
    if (details) result.details = details;
    if (errorInfo.recoveryActions) result.recoveryActions = errorInfo.recoveryActions;
    if (originalError) result.originalError = originalError;

    return result;
  }

  /**
   * Convert anything thrown into a ReadinessError, keeping the code of coded errors
   */
  normalize(error: unknown): ReadinessError {
    if (isCodedError(error)) {
      return this.createError(error.code, error.message, error.details, error);
    }
    if (error instanceof Error) {
      return this.createError(ErrorCode.UNKNOWN_ERROR, error.message, {}, error);
    }
    return this.createError(ErrorCode.UNKNOWN_ERROR, String(error));
  }

  private getErrorInfo(code: ErrorCode): { recoverable: boolean; recoveryActions?: string[] } {
    switch (code) {
      case ErrorCode.INVALID_CONFIG:
        return {
          recoverable: true,
          recoveryActions: [
            'Check the configuration file syntax',
            'Remove unknown or mistyped keys',
            'Run without --config to use the defaults',
          ],
        };

      case ErrorCode.CONFIG_NOT_FOUND:
        return {
          recoverable: true,
          recoveryActions: ['Check the path passed to --config'],
        };

      case ErrorCode.DIRECTORY_NOT_FOUND:
        return {
          recoverable: true,
          recoveryActions: ['Check the repository path', 'Use an absolute path if the relative one is ambiguous'],
        };

      case ErrorCode.FILE_NOT_ACCESSIBLE:
        return {
          recoverable: true,
          recoveryActions: ['Check file permissions', 'Run with appropriate user privileges'],
        };

      case ErrorCode.REPORT_WRITE_FAILED:
        return {
          recoverable: true,
          recoveryActions: [
            'Ensure the report directory is writable',
            'Choose another directory with --output',
            'Skip the report file with --no-report',
          ],
        };

      case ErrorCode.ANALYSIS_FAILED:
        return {
          recoverable: true,
          recoveryActions: [
            'Re-run with --verbose to collect detailed logs',
            'Narrow the analysis with excludeDirectories / excludePatterns',
          ],
        };

      default:
        return { recoverable: false };
    }
  }

  handleError(error: ReadinessError | Error): never {
    const readinessError = error instanceof Error ? this.normalize(error) : error;

    this.logError(readinessError);

    if (readinessError.recoverable && this.options.enableRecovery) {
      this.suggestRecovery(readinessError);
    }

    process.exit(this.getExitCode(readinessError.code));
  }

  private logError(error: ReadinessError): void {
    this.logger.error(`[${error.code}] ${error.message}`);

    if (error.details && Object.keys(error.details).length > 0) {
      this.logger.error('Details:', error.details);
    }

    if (error.originalError) {
      this.logger.debug('Original error:', error.originalError);
    }
  }

  private suggestRecovery(error: ReadinessError): void {
    if (error.recoveryActions && error.recoveryActions.length > 0) {
      this.logger.info('💡 Suggested recovery actions:');
      error.recoveryActions.forEach((action, index) => {
        this.logger.info(`   ${index + 1}. ${action}`);
      });
    }
  }

  getExitCode(errorCode: ErrorCode): number {
    switch (errorCode) {
      case ErrorCode.INVALID_CONFIG:
      case ErrorCode.CONFIG_NOT_FOUND:
        return 1; // Configuration errors

      case ErrorCode.DIRECTORY_NOT_FOUND:
      case ErrorCode.FILE_NOT_ACCESSIBLE:
      case ErrorCode.REPORT_WRITE_FAILED:
        return 2; // File system errors

      case ErrorCode.ANALYSIS_FAILED:
        return 4; // Analysis errors

      case ErrorCode.OPERATION_CANCELLED:
        return 130; // User cancellation (SIGINT)

      default:
        return 1;
    }
  }
}

export function createErrorHandler(logger: Logger): ErrorHandler {
  return new ErrorHandler(logger);
}

// Process-level error handlers
export function setupGlobalErrorHandlers(errorHandler: ErrorHandler): void {
  process.on('uncaughtException', error => {
    const readinessError = errorHandler.createError(
      ErrorCode.UNKNOWN_ERROR,
      'Uncaught exception',
      {},
      error
    );
    errorHandler.handleError(readinessError);
  });

  process.on('unhandledRejection', reason => {
    const error = reason instanceof Error ? reason : new Error(String(reason));
    const readinessError = errorHandler.createError(
      ErrorCode.UNKNOWN_ERROR,
      'Unhandled promise rejection',
      {},
      error
    );
    errorHandler.handleError(readinessError);
  });

  process.on('SIGINT', () => {
    const readinessError = errorHandler.createError(
      ErrorCode.OPERATION_CANCELLED,
      'Operation cancelled by user',
      {}
    );
    errorHandler.handleError(readinessError);
  });
}
