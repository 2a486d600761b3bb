/**
 * Query lifecycle error classes
 */

import { ConnectorError, type ConnectorErrorOptions } from './base.js';
import { ErrorCode } from './codes.js';

/**
 * The server reported that the query itself failed.
 */
export class QueryError extends ConnectorError {
  readonly queryId: string | undefined;

  constructor(message: string, queryId?: string | undefined, options?: ConnectorErrorOptions) {
    super(message, ErrorCode.QUERY_FAILED, options);
    this.name = 'QueryError';
    this.queryId = queryId;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      queryId: this.queryId,
    };
  }
}

/**
 * Polling hit its attempt or wall-clock ceiling. The query may still finish
 * on the server.
 */
export class QueryTimeoutError extends ConnectorError {
  readonly queryId: string;
  readonly attempts: number;
  readonly elapsedMs: number;

  constructor(queryId: string, attempts: number, elapsedMs: number, options?: ConnectorErrorOptions) {
    super(
      `Query ${queryId} did not finish after ${attempts} status checks (${elapsedMs}ms)`,
      ErrorCode.QUERY_TIMEOUT,
      options
    );
    this.name = 'QueryTimeoutError';
    this.queryId = queryId;
    this.attempts = attempts;
    this.elapsedMs = elapsedMs;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      queryId: this.queryId,
      attempts: this.attempts,
      elapsedMs: this.elapsedMs,
    };
  }
}

/**
 * A cursor operation was called in a state that does not allow it, such as
 * fetching before `execute()` or after the query failed.
 */
export class InvalidCursorStateError extends ConnectorError {
  constructor(message: string, options?: ConnectorErrorOptions) {
    super(message, ErrorCode.INVALID_CURSOR_STATE, options);
    this.name = 'InvalidCursorStateError';
  }
}
