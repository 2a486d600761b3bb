/**
 * Async SQL connector for a remote analytical query service.
 *
 * @packageDocumentation
 */

export { connect } from './connect.js';
export { Connection, type ConnectionOptions } from './connection.js';
export { QueryCursor, type CursorState, type CursorOptions, type ColumnDescription } from './cursor.js';
export { toColumnarTable, type ColumnarTable, type ColumnarColumn, type ColumnarValue } from './columnar.js';
export {
  createAuthStrategy,
  OAuthStrategy,
  PasswordGrantStrategy,
  RefreshTokenStrategy,
  JwtBearerStrategy,
  TokenStore,
  type AuthStrategy,
  type AuthStrategyOptions,
  type CoreToken,
} from './auth/index.js';
export * from './transports/index.js';
export {
  StructuredLogger,
  LogLevel,
  silentLogger,
  type ConnectorLogger,
  type LogContext,
  type LogEntry,
  type LogSink,
} from './logging/logger.js';
export * from './types/index.js';
export * from './errors/index.js';
