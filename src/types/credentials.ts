/**
 * Credential variants, one per authentication strategy.
 *
 * The `grantType` tag selects the strategy; nothing inspects which fields
 * happen to be present.
 */

export interface PasswordGrantCredentials {
  readonly grantType: 'password';
  readonly loginUrl: string;
  readonly clientId: string;
  readonly clientSecret: string;
  readonly username: string;
  readonly password: string;
}

export interface RefreshTokenCredentials {
  readonly grantType: 'refresh_token';
  readonly loginUrl: string;
  readonly clientId: string;
  readonly clientSecret: string;
  readonly refreshToken: string;
  /** Already-issued core token, exchanged first when present */
  readonly coreToken?: string | undefined;
}

export interface JwtBearerCredentials {
  readonly grantType: 'jwt_bearer';
  readonly loginUrl: string;
  readonly clientId: string;
  readonly username: string;
  /** PEM-encoded RSA private key */
  readonly privateKey: string;
}

export type Credentials =
  | PasswordGrantCredentials
  | RefreshTokenCredentials
  | JwtBearerCredentials;

export type GrantType = Credentials['grantType'];
