/**
 * Type exports
 */

// Branded types
export type { AccessToken, RefreshToken, QueryId, CorrelationId } from './branded.js';
export {
  createAccessToken,
  createRefreshToken,
  createQueryId,
  generateCorrelationId,
} from './branded.js';

// Token types
export type { TokenSnapshot, CoreTokenResponse, ExchangeTokenResponse } from './tokens.js';
export {
  coreTokenResponseSchema,
  exchangeTokenResponseSchema,
  oauthErrorSchema,
} from './tokens.js';

// Credentials
export type {
  Credentials,
  GrantType,
  PasswordGrantCredentials,
  RefreshTokenCredentials,
  JwtBearerCredentials,
} from './credentials.js';

// Query types
export type {
  SqlValue,
  Row,
  SqlParameters,
  QueryPhase,
  ColumnMetadata,
  QueryStatus,
  ResultPage,
  QueryState,
} from './query.js';

// Table metadata
export type {
  MetadataFilters,
  TableMetadata,
  TableField,
  PrimaryKey,
  TableRelationship,
} from './metadata.js';

// SQL type mapping
export { TypeCode, getTypeCode } from './sql-types.js';

// Config
export type { ConnectOptions, ConnectCollaborators, ResolvedConfig, PollOptions } from './config.js';
export {
  DEFAULT_TRANSPORT,
  DEFAULT_API_VERSION,
  connectOptionsSchema,
  validateConfig,
  connectOptionsFromEnv,
} from './config.js';
