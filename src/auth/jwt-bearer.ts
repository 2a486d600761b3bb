/**
 * JWT bearer OAuth flow (RFC 7523)
 */

import jwt from 'jsonwebtoken';
import type { JwtBearerCredentials } from '../types/index.js';
import { AuthenticationError } from '../errors/index.js';
import { OAuthStrategy, type AuthStrategyOptions, type CoreToken } from './strategy.js';

const JWT_BEARER_GRANT_TYPE = 'urn:ietf:params:oauth:grant-type:jwt-bearer';
const ASSERTION_LIFETIME_SECONDS = 180;

export class JwtBearerStrategy extends OAuthStrategy {
  readonly grantType = 'jwt_bearer' as const;

  constructor(
    private readonly credentials: JwtBearerCredentials,
    options: AuthStrategyOptions
  ) {
    super(credentials.loginUrl, options);
  }

  /**
   * Sign a short-lived RS256 assertion for the configured user.
   */
  createAssertion(): string {
    try {
      return jwt.sign({}, this.credentials.privateKey, {
        algorithm: 'RS256',
        issuer: this.credentials.clientId,
        subject: this.credentials.username,
        audience: this.loginUrl,
        expiresIn: ASSERTION_LIFETIME_SECONDS,
      });
    } catch (error) {
      throw new AuthenticationError('Could not sign JWT assertion', { cause: error });
    }
  }

  protected obtainCoreToken(): Promise<CoreToken> {
    return this.requestCoreToken(
      {
        grant_type: JWT_BEARER_GRANT_TYPE,
        assertion: this.createAssertion(),
      },
      'JWT bearer authentication'
    );
  }
}
