import chalk from 'chalk';
import { AppError, ErrorCode } from './types';
import { HttpClientError, isHttpClientError } from '../api/http-client';

/**
 * Map HTTP client errors to app errors
 */
export function mapHttpError(error: HttpClientError): AppError {
  // No response - network error
  if (!error.response) {
    if (error.code === 'ECONNREFUSED') {
      return new AppError(
        'Connection refused',
        ErrorCode.CONNECTION_REFUSED,
        { originalError: error.message },
        true
      );
    }
    if (error.code === 'ETIMEDOUT' || error.code === 'ECONNABORTED') {
      return new AppError(
        'Request timed out',
        ErrorCode.TIMEOUT,
        { originalError: error.message },
        true
      );
    }
    return new AppError(
      'Network error',
      ErrorCode.NETWORK_ERROR,
      { originalError: error.message, originalCode: error.code },
      true
    );
  }

  const statusCode = error.response.status;
  const responseData = error.response.data;

  // Map HTTP status codes
  if (statusCode === 401) {
    return new AppError(
      'Authentication failed',
      ErrorCode.AUTH_FAILED,
      { statusCode, apiError: responseData },
      false
    );
  }

  if (statusCode === 403) {
    return new AppError(
      'Permission denied',
      ErrorCode.PERMISSION_DENIED,
      { statusCode, apiError: responseData },
      false
    );
  }

  if (statusCode === 404) {
    return new AppError(
      'Resource not found',
      ErrorCode.NOT_FOUND,
      { statusCode, apiError: responseData },
      false
    );
  }

  if (statusCode === 429) {
    const retryAfter = error.response.headers['retry-after'] || 60;
    return new AppError(
      'Rate limited',
      ErrorCode.RATE_LIMITED,
      { statusCode, retryAfter },
      true
    );
  }

  if (statusCode === 507) {
    return new AppError(
      'Storage quota exceeded',
      ErrorCode.QUOTA_EXCEEDED,
      { statusCode },
      false
    );
  }

  if (statusCode >= 500) {
    return new AppError(
      'Server error',
      ErrorCode.API_ERROR,
      { statusCode, apiError: responseData },
      true // Server errors are recoverable (might be temporary)
    );
  }

  return new AppError(
    error.message || 'Upload request failed',
    ErrorCode.UPLOAD_FAILED,
    { statusCode, apiError: responseData },
    false
  );
}

// Structural check: errors raised inside Node core may come from another realm.
function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string';
}

/**
 * Map Node.js system errors to app errors
 */
export function mapSystemError(error: NodeJS.ErrnoException): AppError {
  switch (error.code) {
    case 'ENOENT':
      return new AppError(
        'File or directory not found',
        ErrorCode.FILE_NOT_FOUND,
        { path: error.path, syscall: error.syscall },
        false
      );

    case 'EACCES':
    case 'EPERM':
      return new AppError(
        'Permission denied',
        ErrorCode.PERMISSION_DENIED,
        { path: error.path, syscall: error.syscall },
        false
      );

    case 'EISDIR':
      return new AppError(
        'Not a file',
        ErrorCode.INVALID_FILE,
        { path: error.path, syscall: error.syscall },
        false
      );

    default:
      return new AppError(
        error.message || 'System error',
        ErrorCode.UNKNOWN_ERROR,
        { originalCode: error.code, syscall: error.syscall },
        false
      );
  }
}

/**
 * Convert any error to AppError
 */
export function toAppError(error: unknown): AppError {
  // Already an AppError
  if (error instanceof AppError) {
    return error;
  }

  if (isHttpClientError(error)) {
    return mapHttpError(error);
  }

  // Node.js system error
  if (isErrnoException(error)) {
    return mapSystemError(error);
  }

  // Generic Error
  if (error instanceof Error) {
    return new AppError(
      error.message,
      ErrorCode.UNKNOWN_ERROR,
      { originalError: error.name },
      false
    );
  }

  // Unknown error type
  return new AppError(
    String(error),
    ErrorCode.UNKNOWN_ERROR,
    {},
    false
  );
}

/**
 * Labelled values from an error's details that point at what to fix:
 * the upload URL, the HTTP status, and the config or result keys involved.
 */
export function describeErrorContext(error: AppError): Array<[string, string]> {
  const details = error.details ?? {};
  const context: Array<[string, string]> = [];

  if (typeof details.url === 'string') {
    context.push(['Signature URL', details.url]);
  }
  if (typeof details.statusCode === 'number') {
    context.push(['HTTP status', String(details.statusCode)]);
  }
  if (Array.isArray(details.missing)) {
    context.push(['Config keys', details.missing.join(', ')]);
  }
  if (typeof details.key === 'string') {
    context.push(['Key', details.key]);
  }
  if (typeof details.stepName === 'string') {
    context.push(['Step', details.stepName]);
  }
  return context;
}

/**
 * Print an error for the CLI. Debug mode adds the error code, the
 * underlying cause, any server response body and the stack.
 */
export function handleError(error: unknown, debug: boolean = false): void {
  const appError = toAppError(error);

  console.error(chalk.red.bold('\n✗ Error:'), appError.toUserMessage());
  for (const [label, value] of describeErrorContext(appError)) {
    console.error(chalk.dim(`  ${label}:`), value);
  }

  const suggestion = appError.getRecoverySuggestion();
  if (suggestion) {
    console.error(chalk.yellow('\nSuggestion:'), suggestion);
  } else if (appError.isRecoverable) {
    console.error(chalk.yellow('\nThe signature server may be temporarily unavailable. Rerun the step.'));
  }

  if (!debug) {
    console.error(chalk.dim('\nRun with --debug for the error code and server response'));
    return;
  }

  console.error(chalk.dim('\n  Code:'), appError.code);
  if (appError.cause instanceof AppError) {
    console.error(chalk.dim('  Caused by:'), `${appError.cause.code}: ${appError.cause.message}`);
  }
  const apiError = appError.details?.apiError;
  if (apiError !== undefined && apiError !== null) {
    console.error(chalk.dim('  Server response:'), typeof apiError === 'string' ? apiError : JSON.stringify(apiError));
  }
  if (appError.stack) {
    console.error(chalk.dim(appError.stack));
  }
}
