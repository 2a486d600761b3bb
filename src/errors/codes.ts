/**
 * Error codes for the query connector.
 *
 * A const object rather than an enum so unused codes tree-shake away.
 *
 * @example Branching on a code
 * ```typescript
 * import { ErrorCode, isConnectorError } from 'dataquery-connector';
 *
 * try {
 *   await cursor.fetchall();
 * } catch (error) {
 *   if (isConnectorError(error) && error.code === ErrorCode.QUERY_TIMEOUT) {
 *     // the query may still be running server-side
 *   }
 * }
 * ```
 */
export const ErrorCode = {
  // Authentication
  /** Credentials were rejected or the token endpoint failed */
  AUTHENTICATION_FAILED: 'AUTHENTICATION_FAILED',
  /** The service signalled that the bearer token expired */
  TOKEN_EXPIRED: 'TOKEN_EXPIRED',

  // Transport
  /** Non-auth failure talking to the service */
  API_ERROR: 'API_ERROR',
  /** Request exceeded the configured timeout */
  REQUEST_TIMEOUT: 'REQUEST_TIMEOUT',
  /** Response body did not have the expected shape */
  MALFORMED_RESPONSE: 'MALFORMED_RESPONSE',

  // Query lifecycle
  /** The server reported the query as failed */
  QUERY_FAILED: 'QUERY_FAILED',
  /** Polling gave up before the query finished */
  QUERY_TIMEOUT: 'QUERY_TIMEOUT',
  /** Cursor operation not valid in the current state */
  INVALID_CURSOR_STATE: 'INVALID_CURSOR_STATE',

  // Lifecycle
  /** Connection, cursor or transport used after close */
  CONNECTION_CLOSED: 'CONNECTION_CLOSED',

  // Configuration
  /** Configuration is invalid */
  INVALID_CONFIG: 'INVALID_CONFIG',
  /** Required configuration field is missing */
  MISSING_REQUIRED_FIELD: 'MISSING_REQUIRED_FIELD',
} as const;

/**
 * Union type of all error codes.
 */
export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];
