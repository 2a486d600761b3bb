/**
 * Transport-level error classes
 */

import { ConnectorError, type ConnectorErrorOptions } from './base.js';
import { ErrorCode } from './codes.js';

type ApiErrorCode =
  | typeof ErrorCode.API_ERROR
  | typeof ErrorCode.REQUEST_TIMEOUT
  | typeof ErrorCode.MALFORMED_RESPONSE;

/**
 * Generic transport failure: network errors, timeouts, malformed payloads and
 * non-auth error statuses. Never retried by the transport.
 */
export class ApiError extends ConnectorError {
  constructor(
    message = 'API request failed',
    options?: ConnectorErrorOptions,
    code: ApiErrorCode = ErrorCode.API_ERROR
  ) {
    super(message, code, options);
    this.name = 'ApiError';
  }

  /**
   * Wrap an unknown caught value.
   */
  static fromError(error: unknown, correlationId?: string | undefined): ApiError {
    const message = error instanceof Error ? error.message : 'API request failed';
    return new ApiError(message, {
      cause: error,
      ...(correlationId !== undefined && { correlationId }),
    });
  }

  static timeout(timeoutMs: number, correlationId?: string | undefined): ApiError {
    return new ApiError(
      `Request timed out after ${timeoutMs}ms`,
      { correlationId },
      ErrorCode.REQUEST_TIMEOUT
    );
  }

  static malformed(message: string, options?: ConnectorErrorOptions): ApiError {
    return new ApiError(message, options, ErrorCode.MALFORMED_RESPONSE);
  }
}
