/**
 * Token-related types.
 *
 * @packageDocumentation
 */

import { z } from 'zod';
import type { AccessToken, RefreshToken } from './branded.js';

/**
 * One authenticated session with the query service.
 *
 * Entries are replaced whole, so a token never exists without the instance
 * URL it belongs to.
 */
export interface TokenSnapshot {
  /** Bearer token for data-service calls */
  readonly accessToken: AccessToken;
  /** Base URL (scheme and host) for data-service calls */
  readonly instanceUrl: string;
  /** Expiry in ms since epoch; undefined when the server did not say */
  readonly expiresAt: number | undefined;
  /** When the token was requested, in ms since epoch */
  readonly issuedAt?: number | undefined;
  /** Refresh token, when the flow produced one */
  readonly refreshToken?: RefreshToken | undefined;
}

/**
 * Raw body of `/services/oauth2/token` (core token).
 */
export const coreTokenResponseSchema = z.object({
  access_token: z.string().min(1),
  instance_url: z.string().min(1),
  token_type: z.string().optional(),
  refresh_token: z.string().optional(),
  scope: z.string().optional(),
});

export type CoreTokenResponse = z.infer<typeof coreTokenResponseSchema>;

/**
 * Raw body of `/services/a360/token` (data-service token).
 */
export const exchangeTokenResponseSchema = z.object({
  access_token: z.string().min(1),
  instance_url: z.string().min(1),
  expires_in: z.number().nonnegative().optional(),
  token_type: z.string().optional(),
  issued_token_type: z.string().optional(),
});

export type ExchangeTokenResponse = z.infer<typeof exchangeTokenResponseSchema>;

/**
 * Error body returned by the OAuth endpoints.
 */
export const oauthErrorSchema = z.object({
  error: z.string().optional(),
  error_description: z.string().optional(),
});
