/**
 * Base error class for the query connector.
 *
 * @packageDocumentation
 */

import type { ErrorCode } from './codes.js';

/**
 * Options for creating a ConnectorError.
 */
export interface ConnectorErrorOptions {
  /** HTTP status code (if applicable) */
  readonly statusCode?: number | undefined;
  /** Request id of the call that failed */
  readonly correlationId?: string | undefined;
  /** Original error that caused this error */
  readonly cause?: unknown;
}

/**
 * Root of the connector's error hierarchy.
 *
 * Carries a stable {@link ErrorCode}, the HTTP status when one was involved,
 * the request id of the failing call and the underlying cause.
 *
 * @example
 * ```typescript
 * try {
 *   await cursor.execute('SELECT Id FROM Contact');
 * } catch (error) {
 *   if (error instanceof ConnectorError) {
 *     console.log(error.code, error.correlationId);
 *   }
 * }
 * ```
 */
export class ConnectorError extends Error {
  /** Error code for programmatic handling */
  readonly code: ErrorCode;
  /** HTTP status code (if applicable) */
  readonly statusCode: number | undefined;
  /** Request id of the failing call */
  readonly correlationId: string | undefined;
  /** Timestamp when the error was created */
  readonly timestamp: Date;

  constructor(message: string, code: ErrorCode, options?: ConnectorErrorOptions) {
    super(message, { cause: options?.cause });
    this.name = 'ConnectorError';
    this.code = code;
    this.statusCode = options?.statusCode;
    this.correlationId = options?.correlationId;
    this.timestamp = new Date();

    if ('captureStackTrace' in Error && typeof Error.captureStackTrace === 'function') {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * JSON-serializable view of the error, used by the structured logger.
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      statusCode: this.statusCode,
      correlationId: this.correlationId,
      timestamp: this.timestamp.toISOString(),
    };
  }
}
