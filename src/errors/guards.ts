/**
 * Type guards for error classes
 */

import { ConnectorError } from './base.js';
import { AuthenticationError, TokenExpiredError } from './auth.js';
import { ApiError } from './api.js';
import { QueryError, QueryTimeoutError, InvalidCursorStateError } from './query.js';
import { ConnectionClosedError } from './connection.js';
import { InvalidConfigError, MissingRequiredFieldError } from './config.js';

/** Type guard for ConnectorError */
export function isConnectorError(error: unknown): error is ConnectorError {
  return error instanceof ConnectorError;
}

/** Type guard for AuthenticationError */
export function isAuthenticationError(error: unknown): error is AuthenticationError {
  return error instanceof AuthenticationError;
}

/** Type guard for TokenExpiredError */
export function isTokenExpiredError(error: unknown): error is TokenExpiredError {
  return error instanceof TokenExpiredError;
}

/** Type guard for ApiError */
export function isApiError(error: unknown): error is ApiError {
  return error instanceof ApiError;
}

/** Type guard for QueryError */
export function isQueryError(error: unknown): error is QueryError {
  return error instanceof QueryError;
}

/** Type guard for QueryTimeoutError */
export function isQueryTimeoutError(error: unknown): error is QueryTimeoutError {
  return error instanceof QueryTimeoutError;
}

/** Type guard for InvalidCursorStateError */
export function isInvalidCursorStateError(error: unknown): error is InvalidCursorStateError {
  return error instanceof InvalidCursorStateError;
}

/** Type guard for ConnectionClosedError */
export function isConnectionClosedError(error: unknown): error is ConnectionClosedError {
  return error instanceof ConnectionClosedError;
}

/** Type guard for InvalidConfigError */
export function isInvalidConfigError(error: unknown): error is InvalidConfigError {
  return error instanceof InvalidConfigError;
}

/** Type guard for MissingRequiredFieldError */
export function isMissingRequiredFieldError(error: unknown): error is MissingRequiredFieldError {
  return error instanceof MissingRequiredFieldError;
}
