import { describe, it, expect } from 'vitest';
import { AssessmentError } from '../../src/errors/assessment-error';
import { FileUnreadableError } from '../../src/errors/file-unreadable-error';
import { Logger } from '../../src/utils/cli-utils';
import { createErrorHandler, ErrorCode, isCodedError } from '../../src/utils/error-handler';

describe('ErrorHandler', () => {
  const handler = createErrorHandler(new Logger(false, true));

  it.each([
    [ErrorCode.INVALID_CONFIG, 1],
    [ErrorCode.CONFIG_NOT_FOUND, 1],
    [ErrorCode.DIRECTORY_NOT_FOUND, 2],
    [ErrorCode.REPORT_WRITE_FAILED, 2],
    [ErrorCode.ANALYSIS_FAILED, 4],
    [ErrorCode.OPERATION_CANCELLED, 130],
    [ErrorCode.UNKNOWN_ERROR, 1],
  ])('maps %s to exit code %s', (code, exitCode) => {
    expect(handler.getExitCode(code)).toBe(exitCode);
  });

  it('keeps the code and details of coded errors', () => {
    const error = new AssessmentError(ErrorCode.DIRECTORY_NOT_FOUND, 'Repository directory not found: /x', {
      repositoryPath: '/x',
    });

    const normalized = handler.normalize(error);

    expect(normalized.code).toBe(ErrorCode.DIRECTORY_NOT_FOUND);
    expect(normalized.details).toEqual({ repositoryPath: '/x' });
    expect(normalized.recoverable).toBe(true);
    expect(normalized.recoveryActions?.length).toBeGreaterThan(0);
    expect(normalized.originalError).toBe(error);
  });

  it('treats anything else as an unknown error', () => {
    expect(handler.normalize(new Error('boom'))).toMatchObject({
      code: ErrorCode.UNKNOWN_ERROR,
      message: 'boom',
      recoverable: false,
    });
    expect(handler.normalize('plain string')).toMatchObject({ code: ErrorCode.UNKNOWN_ERROR, message: 'plain string' });
  });
});

describe('isCodedError', () => {
  it('recognises errors carrying one of our codes', () => {
    expect(isCodedError(new FileUnreadableError('/x/a.ts'))).toBe(true);
  });

  it('rejects system errors with foreign codes', () => {
    const systemError = Object.assign(new Error('missing'), { code: 'ENOENT' });
    expect(isCodedError(systemError)).toBe(false);
  });
});
