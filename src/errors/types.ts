/**
 * Error codes for different error scenarios
 */
export enum ErrorCode {
  // Authentication errors
  AUTH_FAILED = 'AUTH_FAILED',

  // Network errors
  NETWORK_ERROR = 'NETWORK_ERROR',
  TIMEOUT = 'TIMEOUT',
  CONNECTION_REFUSED = 'CONNECTION_REFUSED',

  // Server errors
  API_ERROR = 'API_ERROR',
  RATE_LIMITED = 'RATE_LIMITED',
  QUOTA_EXCEEDED = 'QUOTA_EXCEEDED',
  NOT_FOUND = 'NOT_FOUND',

  // File system errors
  FILE_NOT_FOUND = 'FILE_NOT_FOUND',
  PERMISSION_DENIED = 'PERMISSION_DENIED',
  INVALID_FILE = 'INVALID_FILE',

  // Upload errors
  UPLOAD_FAILED = 'UPLOAD_FAILED',

  // Generic
  UNKNOWN_ERROR = 'UNKNOWN_ERROR',
  VALIDATION_ERROR = 'VALIDATION_ERROR',
}

/**
 * Custom application error class with error codes and recovery hints
 */
export class AppError extends Error {
  constructor(
    message: string,
    public code: ErrorCode,
    public details?: Record<string, unknown>,
    public isRecoverable: boolean = false
  ) {
    super(message);
    this.name = 'AppError';
    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert to user-friendly message
   */
  toUserMessage(): string {
    const path = typeof this.details?.path === 'string' ? this.details.path : 'unknown';

    switch (this.code) {
      case ErrorCode.AUTH_FAILED:
        return 'Authentication failed. Please check the signature server username and password.';

      case ErrorCode.NETWORK_ERROR:
        return 'Network connection failed. Please check that the signature server is reachable.';

      case ErrorCode.TIMEOUT:
        return 'Request timed out. The signature server took too long to respond.';

      case ErrorCode.CONNECTION_REFUSED:
        return 'Connection refused. The signature server may be down or unreachable.';

      case ErrorCode.FILE_NOT_FOUND:
        return `File not found: ${path}`;

      case ErrorCode.PERMISSION_DENIED:
        return `Permission denied: ${path}`;

      case ErrorCode.INVALID_FILE:
        return `Not a readable file: ${path}`;

      case ErrorCode.RATE_LIMITED:
        return this.message || 'Too many requests. Please try again later.';

      case ErrorCode.QUOTA_EXCEEDED:
        return 'Signature server storage is full.';

      case ErrorCode.NOT_FOUND:
        return 'Upload location not found on the signature server.';

      case ErrorCode.UPLOAD_FAILED:
        return 'Upload failed. Please check your connection and try again.';

      case ErrorCode.VALIDATION_ERROR:
        return this.message || 'Validation error. Please check your input.';

      default:
        return this.message || 'An unknown error occurred.';
    }
  }

  /**
   * Get recovery suggestion for the error
   */
  getRecoverySuggestion(): string | null {
    switch (this.code) {
      case ErrorCode.AUTH_FAILED:
        return 'Check container-image-signature-server-username and container-image-signature-server-password';

      case ErrorCode.NETWORK_ERROR:
      case ErrorCode.TIMEOUT:
      case ErrorCode.CONNECTION_REFUSED:
        return 'Check container-image-signature-server-url and your network connection';

      case ErrorCode.RATE_LIMITED:
        return 'Wait a few moments before trying again';

      case ErrorCode.FILE_NOT_FOUND:
        return 'Check that the sign-container-image step produced the signature file';

      case ErrorCode.PERMISSION_DENIED:
        return 'Check file permissions or the account permissions on the signature server';

      case ErrorCode.VALIDATION_ERROR:
        return 'Run: signature-push push --help';

      default:
        return null;
    }
  }
}

/**
 * Failure of the upload exchange itself (non-2xx, DNS, TLS, connection
 * reset, timeout). The code mirrors the mapped cause so suggestions still
 * apply, but the message keeps the transport text as reported.
 */
export class TransportError extends AppError {
  public readonly url: string;

  constructor(url: string, cause: AppError, transportMessage: string) {
    super(
      `Unexpected error uploading signature file to ${url}: ${transportMessage}`,
      cause.code,
      { ...cause.details, url },
      cause.isRecoverable
    );
    this.name = 'TransportError';
    this.url = url;
    this.cause = cause;
  }

  toUserMessage(): string {
    return this.message;
  }
}
