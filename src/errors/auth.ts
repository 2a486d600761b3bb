/**
 * Authentication error classes
 */

import { ConnectorError, type ConnectorErrorOptions } from './base.js';
import { ErrorCode } from './codes.js';

/**
 * Thrown when credentials are rejected, the token endpoint fails, or the
 * service keeps rejecting a freshly obtained token.
 */
export class AuthenticationError extends ConnectorError {
  constructor(message = 'Authentication failed', options?: ConnectorErrorOptions) {
    super(message, ErrorCode.AUTHENTICATION_FAILED, options);
    this.name = 'AuthenticationError';
  }
}

/**
 * Auth-expiry signal raised by a transport when the service answers 401 (or
 * gRPC UNAUTHENTICATED). The transport's retry wrapper consumes it; callers
 * only ever see an {@link AuthenticationError}.
 */
export class TokenExpiredError extends ConnectorError {
  constructor(
    message = 'Access token has expired',
    options?: Omit<ConnectorErrorOptions, 'statusCode'>
  ) {
    super(message, ErrorCode.TOKEN_EXPIRED, { ...options, statusCode: 401 });
    this.name = 'TokenExpiredError';
  }
}
