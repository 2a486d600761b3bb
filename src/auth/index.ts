/**
 * Auth module exports
 */

import type { Credentials } from '../types/index.js';
import { JwtBearerStrategy } from './jwt-bearer.js';
import { PasswordGrantStrategy } from './password-grant.js';
import { RefreshTokenStrategy } from './refresh-token.js';
import type { AuthStrategy, AuthStrategyOptions } from './strategy.js';

export { OAuthStrategy, type AuthStrategy, type AuthStrategyOptions, type CoreToken } from './strategy.js';
export { PasswordGrantStrategy } from './password-grant.js';
export { RefreshTokenStrategy } from './refresh-token.js';
export { JwtBearerStrategy } from './jwt-bearer.js';
export { TokenStore } from './token-store.js';

/**
 * Pick the strategy matching the credentials' grant type.
 */
export function createAuthStrategy(credentials: Credentials, options: AuthStrategyOptions): AuthStrategy {
  switch (credentials.grantType) {
    case 'password':
      return new PasswordGrantStrategy(credentials, options);
    case 'refresh_token':
      return new RefreshTokenStrategy(credentials, options);
    case 'jwt_bearer':
      return new JwtBearerStrategy(credentials, options);
  }
}
