import type { AuthStrategy } from '../../auth/strategy.js';
import { createAccessToken, type TokenSnapshot } from '../../types/index.js';

/**
 * Auth strategy that issues `token-1`, `token-2`, ... without any network.
 */
export class StaticAuth implements AuthStrategy {
  readonly grantType = 'password' as const;
  authenticateCalls = 0;
  invalidateCalls = 0;
  private token: TokenSnapshot | null = null;

  constructor(private readonly instance = 'https://tenant.example.com') {}

  async authenticate(): Promise<TokenSnapshot> {
    this.authenticateCalls += 1;
    this.token = {
      accessToken: createAccessToken(`token-${this.authenticateCalls}`),
      instanceUrl: this.instance,
      expiresAt: undefined,
    };
    return this.token;
  }

  async ensureValid(): Promise<TokenSnapshot> {
    return this.token ?? this.authenticate();
  }

  async headers(): Promise<Record<string, string>> {
    const token = await this.ensureValid();
    return { Authorization: `Bearer ${token.accessToken}`, Accept: 'application/json' };
  }

  async instanceUrl(): Promise<string> {
    return (await this.ensureValid()).instanceUrl;
  }

  invalidate(): void {
    this.invalidateCalls += 1;
    this.token = null;
  }

  current(): TokenSnapshot | null {
    return this.token;
  }
}
