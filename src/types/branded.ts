/**
 * Branded types for sensitive and identifier values.
 *
 * A brand makes these strings incompatible with plain strings and with each
 * other at compile time, at no runtime cost.
 *
 * @example
 * ```typescript
 * const token: AccessToken = createAccessToken('token-1');
 * const id: QueryId = createQueryId('q-1');
 *
 * // Error: Type 'AccessToken' is not assignable to type 'QueryId'
 * const wrong: QueryId = token;
 * ```
 *
 * @packageDocumentation
 */

import { v4 as uuidv4 } from 'uuid';

declare const __brand: unique symbol;

/**
 * Branded type utility.
 * @typeParam T - Base type
 * @typeParam B - Brand identifier string
 */
type Brand<T, B extends string> = T & { readonly [__brand]: B };

/** Bearer token presented on every service call. */
export type AccessToken = Brand<string, 'AccessToken'>;

/** OAuth refresh token used to obtain new core tokens. */
export type RefreshToken = Brand<string, 'RefreshToken'>;

/** Server-assigned identifier of a submitted query. */
export type QueryId = Brand<string, 'QueryId'>;

/** Per-request id sent as `X-Request-Id` and echoed on errors. */
export type CorrelationId = Brand<string, 'CorrelationId'>;

/**
 * Create a branded AccessToken.
 *
 * @throws Error if value is empty
 */
export function createAccessToken(value: string): AccessToken {
  if (typeof value !== 'string' || value.length === 0) {
    throw new Error('Invalid access token: must be a non-empty string');
  }
  return value as AccessToken;
}

/**
 * Create a branded RefreshToken.
 *
 * @throws Error if value is empty
 */
export function createRefreshToken(value: string): RefreshToken {
  if (typeof value !== 'string' || value.length === 0) {
    throw new Error('Invalid refresh token: must be a non-empty string');
  }
  return value as RefreshToken;
}

/**
 * Create a branded QueryId.
 *
 * @throws Error if value is empty
 */
export function createQueryId(value: string): QueryId {
  if (typeof value !== 'string' || value.length === 0) {
    throw new Error('Invalid query id: must be a non-empty string');
  }
  return value as QueryId;
}

/**
 * Generate a fresh request correlation id (uuid v4).
 */
export function generateCorrelationId(): CorrelationId {
  return uuidv4() as CorrelationId;
}
