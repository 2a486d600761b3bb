import { ConnectorError, type ConnectorErrorOptions } from './base.js';
import { ErrorCode } from './codes.js';

/**
 * A connection, cursor or transport was used after it was closed.
 */
export class ConnectionClosedError extends ConnectorError {
  constructor(message = 'Connection is closed', options?: ConnectorErrorOptions) {
    super(message, ErrorCode.CONNECTION_CLOSED, options);
    this.name = 'ConnectionClosedError';
  }
}
