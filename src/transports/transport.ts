/**
 * Transport contract and the auth-retry behaviour every transport shares.
 *
 * @packageDocumentation
 */

import type { AuthStrategy } from '../auth/strategy.js';
import { AuthenticationError, ConnectionClosedError, TokenExpiredError } from '../errors/index.js';
import type { ConnectorLogger } from '../logging/logger.js';
import type {
  MetadataFilters,
  QueryId,
  QueryStatus,
  ResultPage,
  SqlParameters,
  TableMetadata,
} from '../types/index.js';
import type { FetchFn } from '../http/request.js';

/**
 * Remote query service as seen by a cursor.
 */
export interface TransportClient {
  readonly name: string;
  submitQuery(sql: string, params?: SqlParameters): Promise<QueryStatus>;
  getQueryStatus(queryId: QueryId): Promise<QueryStatus>;
  getQueryResults(queryId: QueryId, offset: number, limit: number): Promise<ResultPage>;
  /** Tables visible to the session, narrowed by the filters given. */
  getMetadata(filters: MetadataFilters): Promise<TableMetadata[]>;
  close(): Promise<void>;
}

/**
 * What a transport factory receives from `connect()`.
 */
export interface TransportContext {
  readonly auth: AuthStrategy;
  readonly logger: ConnectorLogger;
  readonly fetch: FetchFn;
  readonly apiVersion: string;
  readonly requestTimeoutMs: number;
  readonly dataspace?: string | undefined;
  readonly grpcEndpoint?: string | undefined;
}

/**
 * Base class wiring auth headers, one-shot re-authentication and close state.
 *
 * Subclasses implement the `do*` calls. They signal an expired token by
 * throwing {@link TokenExpiredError}; every other failure propagates as-is.
 */
export abstract class BaseTransport implements TransportClient {
  abstract readonly name: string;

  protected readonly auth: AuthStrategy;
  protected readonly logger: ConnectorLogger;
  private closed = false;

  constructor(auth: AuthStrategy, logger: ConnectorLogger) {
    this.auth = auth;
    this.logger = logger;
  }

  protected abstract doSubmitQuery(
    headers: Record<string, string>,
    sql: string,
    params: SqlParameters | undefined
  ): Promise<QueryStatus>;

  protected abstract doGetQueryStatus(
    headers: Record<string, string>,
    queryId: QueryId
  ): Promise<QueryStatus>;

  protected abstract doGetQueryResults(
    headers: Record<string, string>,
    queryId: QueryId,
    offset: number,
    limit: number
  ): Promise<ResultPage>;

  protected abstract doGetMetadata(
    headers: Record<string, string>,
    filters: MetadataFilters
  ): Promise<TableMetadata[]>;

  /** Release transport resources. Called once. */
  protected async doClose(): Promise<void> {
    // nothing to release by default
  }

  get isClosed(): boolean {
    return this.closed;
  }

  submitQuery(sql: string, params?: SqlParameters): Promise<QueryStatus> {
    return this.withAuthRetry('submitQuery', (headers) => this.doSubmitQuery(headers, sql, params));
  }

  getQueryStatus(queryId: QueryId): Promise<QueryStatus> {
    return this.withAuthRetry('getQueryStatus', (headers) => this.doGetQueryStatus(headers, queryId));
  }

  getQueryResults(queryId: QueryId, offset: number, limit: number): Promise<ResultPage> {
    return this.withAuthRetry('getQueryResults', (headers) =>
      this.doGetQueryResults(headers, queryId, offset, limit)
    );
  }

  getMetadata(filters: MetadataFilters): Promise<TableMetadata[]> {
    return this.withAuthRetry('getMetadata', (headers) => this.doGetMetadata(headers, filters));
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    await this.doClose();
    this.logger.debug('Transport closed', { transport: this.name });
  }

  /**
   * Run a call with fresh headers. On an expiry signal, invalidate the token,
   * re-authenticate and retry exactly once.
   */
  protected async withAuthRetry<T>(
    operation: string,
    call: (headers: Record<string, string>) => Promise<T>
  ): Promise<T> {
    this.assertOpen();
    try {
      return await call(await this.auth.headers());
    } catch (error) {
      if (!(error instanceof TokenExpiredError)) {
        throw error;
      }
      this.logger.info('Access token rejected, re-authenticating', {
        transport: this.name,
        operation,
        correlationId: error.correlationId,
      });
    }

    this.auth.invalidate();
    this.assertOpen();
    const headers = await this.auth.headers();
    try {
      return await call(headers);
    } catch (error) {
      if (error instanceof TokenExpiredError) {
        throw new AuthenticationError('Access token rejected after re-authentication', {
          statusCode: error.statusCode,
          correlationId: error.correlationId,
          cause: error,
        });
      }
      throw error;
    }
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new ConnectionClosedError('Transport is closed');
    }
  }
}
