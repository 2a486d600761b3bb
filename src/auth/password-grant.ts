/**
 * Username-password OAuth flow
 */

import type { PasswordGrantCredentials } from '../types/index.js';
import { OAuthStrategy, type AuthStrategyOptions, type CoreToken } from './strategy.js';

export class PasswordGrantStrategy extends OAuthStrategy {
  readonly grantType = 'password' as const;

  constructor(
    private readonly credentials: PasswordGrantCredentials,
    options: AuthStrategyOptions
  ) {
    super(credentials.loginUrl, options);
  }

  protected obtainCoreToken(): Promise<CoreToken> {
    return this.requestCoreToken(
      {
        grant_type: 'password',
        client_id: this.credentials.clientId,
        client_secret: this.credentials.clientSecret,
        username: this.credentials.username,
        password: this.credentials.password,
      },
      'Password authentication'
    );
  }
}
