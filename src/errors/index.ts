/**
 * Error module exports
 */

// Error codes
export { ErrorCode } from './codes.js';

// Base error
export { ConnectorError, type ConnectorErrorOptions } from './base.js';

// Authentication errors
export { AuthenticationError, TokenExpiredError } from './auth.js';

// Transport errors
export { ApiError } from './api.js';

// Query errors
export { QueryError, QueryTimeoutError, InvalidCursorStateError } from './query.js';

// Lifecycle errors
export { ConnectionClosedError } from './connection.js';

// Config errors
export { InvalidConfigError, MissingRequiredFieldError } from './config.js';

// Type guards
export {
  isConnectorError,
  isAuthenticationError,
  isTokenExpiredError,
  isApiError,
  isQueryError,
  isQueryTimeoutError,
  isInvalidCursorStateError,
  isConnectionClosedError,
  isInvalidConfigError,
  isMissingRequiredFieldError,
} from './guards.js';
