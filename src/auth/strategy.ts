/**
 * Authentication strategies - token acquisition, validity and refresh
 */

import type { z } from 'zod';
import {
  createAccessToken,
  createRefreshToken,
  coreTokenResponseSchema,
  exchangeTokenResponseSchema,
  oauthErrorSchema,
  type GrantType,
  type TokenSnapshot,
} from '../types/index.js';
import { ApiError, AuthenticationError } from '../errors/index.js';
import { httpRequest, normalizeBaseUrl, readJson, type FetchFn } from '../http/request.js';
import type { ConnectorLogger } from '../logging/logger.js';
import { TokenStore } from './token-store.js';

const DEFAULT_REFRESH_BUFFER_MS = 60_000; // Refresh 1 minute before expiry

const TOKEN_PATH = '/services/oauth2/token';
const REVOKE_PATH = '/services/oauth2/revoke';
const EXCHANGE_PATH = '/services/a360/token';

const EXCHANGE_GRANT_TYPE = 'urn:salesforce:grant-type:external:cdp';
const SUBJECT_TOKEN_TYPE = 'urn:ietf:params:oauth:token-type:access_token';

/**
 * Contract every credential strategy fulfils.
 */
export interface AuthStrategy {
  readonly grantType: GrantType;
  /** Always performs a network exchange and replaces the stored token. */
  authenticate(): Promise<TokenSnapshot>;
  /** Returns the stored token, authenticating first if it is missing or expired. */
  ensureValid(): Promise<TokenSnapshot>;
  /** Request headers carrying a valid bearer token. */
  headers(): Promise<Record<string, string>>;
  /** Instance endpoint for data-service calls. */
  instanceUrl(): Promise<string>;
  /** Force the next `ensureValid()` to re-authenticate. */
  invalidate(): void;
  /** Current stored token without any validity check. */
  current(): TokenSnapshot | null;
}

export interface AuthStrategyOptions {
  readonly fetch: FetchFn;
  readonly logger: ConnectorLogger;
  readonly requestTimeoutMs: number;
  readonly refreshBufferMs?: number | undefined;
  /** Lifetime assumed when the exchange response carries no `expires_in` */
  readonly tokenLifetimeSeconds?: number | undefined;
  readonly dataspace?: string | undefined;
  readonly store?: TokenStore | undefined;
}

/**
 * A core token from the login service, before exchange.
 */
export interface CoreToken {
  readonly accessToken: string;
  readonly instanceUrl: string;
  readonly refreshToken?: string | undefined;
}

/**
 * Shared OAuth machinery. Subclasses only know how to obtain a core token;
 * exchange, validity tracking and single-flight re-authentication live here.
 */
export abstract class OAuthStrategy implements AuthStrategy {
  abstract readonly grantType: GrantType;

  protected readonly loginUrl: string;
  protected readonly logger: ConnectorLogger;
  private readonly store: TokenStore;
  private readonly refreshBufferMs: number;
  private authPromise: Promise<TokenSnapshot> | null = null;

  constructor(
    loginUrl: string,
    protected readonly options: AuthStrategyOptions
  ) {
    this.loginUrl = normalizeBaseUrl(loginUrl);
    this.store = options.store ?? new TokenStore();
    this.refreshBufferMs = options.refreshBufferMs ?? DEFAULT_REFRESH_BUFFER_MS;
    this.logger = options.logger.child({ component: 'auth' });
  }

  /**
   * Obtain a core token from the login service.
   */
  protected abstract obtainCoreToken(): Promise<CoreToken>;

  /**
   * Produce a fresh data-service token. Strategies with more than one path
   * to a token override this.
   */
  protected async acquire(): Promise<TokenSnapshot> {
    const core = await this.obtainCoreToken();
    return this.exchange(core);
  }

  /**
   * Authenticate against the login service.
   * Concurrent callers share one in-flight request; a failure leaves the
   * previously stored token untouched.
   */
  async authenticate(): Promise<TokenSnapshot> {
    if (this.authPromise) {
      return this.authPromise;
    }

    this.authPromise = this.doAuthenticate();

    try {
      return await this.authPromise;
    } finally {
      this.authPromise = null;
    }
  }

  private async doAuthenticate(): Promise<TokenSnapshot> {
    this.logger.debug('Authenticating', { operation: this.grantType });
    const started = Date.now();
    const token = await this.acquire();
    this.store.set(token);
    this.logger.info('Authentication successful', {
      operation: this.grantType,
      instanceUrl: token.instanceUrl,
      duration: Date.now() - started,
    });
    return token;
  }

  async ensureValid(): Promise<TokenSnapshot> {
    const token = this.store.get();
    if (token && !this.shouldRefresh(token)) {
      return token;
    }
    if (token) {
      this.logger.debug('Token expired, re-authenticating', { operation: this.grantType });
    }
    return this.authenticate();
  }

  async headers(): Promise<Record<string, string>> {
    const token = await this.ensureValid();
    return {
      Authorization: `Bearer ${token.accessToken}`,
      Accept: 'application/json',
    };
  }

  async instanceUrl(): Promise<string> {
    const token = await this.ensureValid();
    return token.instanceUrl;
  }

  invalidate(): void {
    this.store.expire();
  }

  current(): TokenSnapshot | null {
    return this.store.get();
  }

  /**
   * Check if a token should be refreshed. Tokens without a known expiry stay
   * valid until the service rejects them. A token that lives shorter than
   * twice the buffer is refreshed after half its lifetime.
   */
  private shouldRefresh(token: TokenSnapshot): boolean {
    if (token.expiresAt === undefined) {
      return false;
    }
    let buffer = this.refreshBufferMs;
    if (token.issuedAt !== undefined) {
      buffer = Math.min(buffer, (token.expiresAt - token.issuedAt) / 2);
    }
    return token.expiresAt - Date.now() <= buffer;
  }

  /**
   * Request a core token from `/services/oauth2/token`.
   */
  protected async requestCoreToken(params: Record<string, string>, flow: string): Promise<CoreToken> {
    const body = await this.postForm(`${this.loginUrl}${TOKEN_PATH}`, params, flow);
    const data = this.parse(coreTokenResponseSchema, body, flow);
    return {
      accessToken: data.access_token,
      instanceUrl: normalizeBaseUrl(data.instance_url),
      refreshToken: data.refresh_token,
    };
  }

  /**
   * Exchange a core token for a data-service token, then revoke the core
   * token.
   */
  protected async exchange(core: CoreToken): Promise<TokenSnapshot> {
    const params: Record<string, string> = {
      grant_type: EXCHANGE_GRANT_TYPE,
      subject_token_type: SUBJECT_TOKEN_TYPE,
      subject_token: core.accessToken,
    };
    if (this.options.dataspace !== undefined) {
      params.dataspace = this.options.dataspace;
    }

    const issuedAt = Date.now();
    const body = await this.postForm(`${core.instanceUrl}${EXCHANGE_PATH}`, params, 'Token exchange');
    const data = this.parse(exchangeTokenResponseSchema, body, 'Token exchange');

    await this.revoke(core);

    const lifetimeSeconds = data.expires_in ?? this.options.tokenLifetimeSeconds;
    return {
      accessToken: createAccessToken(data.access_token),
      instanceUrl: normalizeBaseUrl(data.instance_url),
      expiresAt: lifetimeSeconds === undefined ? undefined : issuedAt + lifetimeSeconds * 1000,
      issuedAt,
      refreshToken: core.refreshToken ? createRefreshToken(core.refreshToken) : undefined,
    };
  }

  private async revoke(core: CoreToken): Promise<void> {
    try {
      const response = await httpRequest(
        `${core.instanceUrl}${REVOKE_PATH}`,
        {
          method: 'POST',
          headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
          body: new URLSearchParams({ token: core.accessToken }).toString(),
        },
        { fetch: this.options.fetch, timeoutMs: this.options.requestTimeoutMs }
      );
      if (!response.ok) {
        this.logger.warn('Core token revocation was rejected', { statusCode: response.status });
      }
    } catch (error) {
      // The data-service token is already issued; a stale core token only
      // lingers until its own expiry.
      this.logger.warn('Core token revocation failed', {
        reason: error instanceof Error ? error.message : String(error),
      });
    }
  }

  private async postForm(url: string, params: Record<string, string>, flow: string): Promise<unknown> {
    let response: Response;
    try {
      response = await httpRequest(
        url,
        {
          method: 'POST',
          headers: {
            'Content-Type': 'application/x-www-form-urlencoded',
            Accept: 'application/json',
          },
          body: new URLSearchParams(params).toString(),
        },
        { fetch: this.options.fetch, timeoutMs: this.options.requestTimeoutMs }
      );
    } catch (error) {
      if (error instanceof ApiError) {
        this.logger.error(`${flow} request failed`, error);
        throw new AuthenticationError(`Network error during ${flow.toLowerCase()}: ${error.message}`, {
          cause: error,
        });
      }
      throw error;
    }

    let body: unknown;
    try {
      body = await readJson(response);
    } catch (error) {
      throw new AuthenticationError(`Could not parse ${flow.toLowerCase()} response`, {
        statusCode: response.status,
        cause: error,
      });
    }

    if (!response.ok) {
      let message = `${flow} failed with status ${response.status}`;
      const details = oauthErrorSchema.safeParse(body);
      if (details.success) {
        if (details.data.error) message += ` - ${details.data.error}`;
        if (details.data.error_description) message += `: ${details.data.error_description}`;
      }
      this.logger.warn(message, { statusCode: response.status });
      throw new AuthenticationError(message, { statusCode: response.status });
    }

    return body;
  }

  private parse<T extends z.ZodTypeAny>(schema: T, body: unknown, flow: string): z.output<T> {
    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      throw new AuthenticationError(`Could not parse ${flow.toLowerCase()} response`, {
        cause: parsed.error,
      });
    }
    return parsed.data;
  }
}
