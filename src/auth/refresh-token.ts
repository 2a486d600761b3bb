/**
 * Refresh-token OAuth flow
 */

import type { RefreshTokenCredentials, TokenSnapshot } from '../types/index.js';
import { AuthenticationError } from '../errors/index.js';
import { OAuthStrategy, type AuthStrategyOptions, type CoreToken } from './strategy.js';

/**
 * Obtains core tokens with the refresh grant. A core token handed in with
 * the credentials is exchanged directly on first use; it is never reused
 * after that since it has been revoked. When the login service rotates the
 * refresh token, the next refresh presents the new one.
 */
export class RefreshTokenStrategy extends OAuthStrategy {
  readonly grantType = 'refresh_token' as const;
  private pendingCoreToken: string | undefined;
  private refreshToken: string;

  constructor(
    private readonly credentials: RefreshTokenCredentials,
    options: AuthStrategyOptions
  ) {
    super(credentials.loginUrl, options);
    this.pendingCoreToken = credentials.coreToken;
    this.refreshToken = credentials.refreshToken;
  }

  protected override async acquire(): Promise<TokenSnapshot> {
    const supplied = this.pendingCoreToken;
    if (supplied === undefined) {
      return super.acquire();
    }
    this.pendingCoreToken = undefined;

    try {
      return await this.exchange({
        accessToken: supplied,
        instanceUrl: this.loginUrl,
        refreshToken: this.refreshToken,
      });
    } catch (error) {
      if (!(error instanceof AuthenticationError)) {
        throw error;
      }
      this.logger.warn('Supplied core token was rejected, using refresh grant', {
        statusCode: error.statusCode,
      });
      return super.acquire();
    }
  }

  protected async obtainCoreToken(): Promise<CoreToken> {
    const core = await this.requestCoreToken(
      {
        grant_type: 'refresh_token',
        client_id: this.credentials.clientId,
        client_secret: this.credentials.clientSecret,
        refresh_token: this.refreshToken,
      },
      'Token refresh'
    );
    if (core.refreshToken !== undefined && core.refreshToken !== this.refreshToken) {
      this.logger.debug('Refresh token rotated', { operation: this.grantType });
      this.refreshToken = core.refreshToken;
    }
    // The exchanged session keeps whichever refresh token is current.
    return { ...core, refreshToken: this.refreshToken };
  }
}
