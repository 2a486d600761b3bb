/**
 * REST transport over the `ssot/query-sql` endpoints and the metadata API.
 */

import { z } from 'zod';
import type { AuthStrategy } from '../auth/strategy.js';
import { ApiError, TokenExpiredError } from '../errors/index.js';
import { httpRequest, readJsonOrThrow, type FetchFn } from '../http/request.js';
import type { ConnectorLogger } from '../logging/logger.js';
import {
  createQueryId,
  generateCorrelationId,
  type ColumnMetadata,
  type MetadataFilters,
  type QueryId,
  type QueryStatus,
  type ResultPage,
  type SqlParameters,
  type TableMetadata,
} from '../types/index.js';
import { BaseTransport, type TransportContext } from './transport.js';
import {
  alignRow,
  columnSchema,
  isLastPage,
  mapPhase,
  metadataParams,
  metadataResponseSchema,
  sqlValueSchema,
  toColumnMetadata,
  toTableMetadata,
} from './wire.js';

const METADATA_PATH = '/api/v1/metadata';

const statusResponseSchema = z.object({
  queryId: z.string().min(1),
  status: z.string().min(1),
  columns: z.array(columnSchema).optional(),
  totalRows: z.number().int().nonnegative().optional(),
  errorMessage: z.string().optional(),
});

const rowsResponseSchema = z.object({
  data: z.array(z.union([z.array(sqlValueSchema), z.record(sqlValueSchema)])),
  totalRows: z.number().int().nonnegative().optional(),
  nextOffset: z.number().int().nullable().optional(),
  done: z.boolean().optional(),
});

export interface RestTransportOptions {
  readonly fetch: FetchFn;
  readonly apiVersion: string;
  readonly requestTimeoutMs: number;
  readonly dataspace?: string | undefined;
}

export class RestTransport extends BaseTransport {
  readonly name = 'rest';

  /** Columns seen per query, used to order object rows; dropped after the last page */
  private readonly columnsByQuery = new Map<string, readonly ColumnMetadata[]>();

  constructor(
    auth: AuthStrategy,
    logger: ConnectorLogger,
    private readonly options: RestTransportOptions
  ) {
    super(auth, logger.child({ transport: 'rest' }));
  }

  static create(context: TransportContext): RestTransport {
    return new RestTransport(context.auth, context.logger, {
      fetch: context.fetch,
      apiVersion: context.apiVersion,
      requestTimeoutMs: context.requestTimeoutMs,
      dataspace: context.dataspace,
    });
  }

  protected async doSubmitQuery(
    headers: Record<string, string>,
    sql: string,
    params: SqlParameters | undefined
  ): Promise<QueryStatus> {
    const body: Record<string, unknown> = { sql };
    if (params !== undefined) body.sqlParameters = params;
    if (this.options.dataspace !== undefined) body.dataspace = this.options.dataspace;

    const { data, correlationId } = await this.request(headers, 'POST', this.queryPath(''), body);
    return this.toStatus(data, correlationId);
  }

  protected async doGetQueryStatus(headers: Record<string, string>, queryId: QueryId): Promise<QueryStatus> {
    const { data, correlationId } = await this.request(
      headers,
      'GET',
      this.queryPath(`/${encodeURIComponent(queryId)}`)
    );
    return this.toStatus(data, correlationId);
  }

  protected async doGetQueryResults(
    headers: Record<string, string>,
    queryId: QueryId,
    offset: number,
    limit: number
  ): Promise<ResultPage> {
    const search = new URLSearchParams({ offset: String(offset), rowLimit: String(limit) });
    const { data, correlationId } = await this.request(
      headers,
      'GET',
      this.queryPath(`/${encodeURIComponent(queryId)}/rows?${search.toString()}`)
    );

    const parsed = rowsResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw ApiError.malformed(`Invalid rows response: ${parsed.error.issues[0]?.message ?? 'unknown'}`, {
        correlationId,
        cause: parsed.error,
      });
    }

    const columns = this.columnsByQuery.get(queryId);
    const rows = parsed.data.data.map((raw) => alignRow(raw, columns));
    const isLast = isLastPage({
      offset,
      returned: rows.length,
      limit,
      done: parsed.data.done,
      nextOffset: parsed.data.nextOffset,
      totalRows: parsed.data.totalRows,
    });
    if (isLast) {
      this.columnsByQuery.delete(queryId);
    }
    return { rows, offset, totalRows: parsed.data.totalRows, isLast };
  }

  protected async doGetMetadata(
    headers: Record<string, string>,
    filters: MetadataFilters
  ): Promise<TableMetadata[]> {
    const search = new URLSearchParams(metadataParams(filters)).toString();
    const path = search ? `${METADATA_PATH}?${search}` : METADATA_PATH;
    const { data, correlationId } = await this.request(headers, 'GET', path);

    const parsed = metadataResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw ApiError.malformed(`Invalid metadata response: ${parsed.error.issues[0]?.message ?? 'unknown'}`, {
        correlationId,
        cause: parsed.error,
      });
    }
    return toTableMetadata(parsed.data);
  }

  protected override async doClose(): Promise<void> {
    this.columnsByQuery.clear();
  }

  private toStatus(data: unknown, correlationId: string): QueryStatus {
    const parsed = statusResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw ApiError.malformed(`Invalid query status response: ${parsed.error.issues[0]?.message ?? 'unknown'}`, {
        correlationId,
        cause: parsed.error,
      });
    }

    const queryId = createQueryId(parsed.data.queryId);
    const columns = parsed.data.columns?.map(toColumnMetadata);
    if (columns !== undefined) {
      this.columnsByQuery.set(queryId, columns);
    }
    return {
      queryId,
      phase: mapPhase(parsed.data.status, correlationId),
      columns,
      totalRows: parsed.data.totalRows,
      error: parsed.data.errorMessage,
    };
  }

  private queryPath(suffix: string): string {
    return `/services/data/${this.options.apiVersion}/ssot/query-sql${suffix}`;
  }

  /**
   * Send a request to `path` under the instance URL.
   */
  private async request(
    headers: Record<string, string>,
    method: 'GET' | 'POST',
    path: string,
    body?: unknown
  ): Promise<{ data: unknown; correlationId: string }> {
    const instanceUrl = await this.auth.instanceUrl();
    const url = `${instanceUrl}${path}`;
    const correlationId = generateCorrelationId();
    const started = Date.now();

    const init: RequestInit = {
      method,
      headers: {
        ...headers,
        'X-Request-Id': correlationId,
        ...(body !== undefined && { 'Content-Type': 'application/json' }),
      },
    };
    if (body !== undefined) {
      init.body = JSON.stringify(body);
    }

    const response = await httpRequest(url, init, {
      fetch: this.options.fetch,
      timeoutMs: this.options.requestTimeoutMs,
      correlationId,
    });

    this.logger.debug('Request completed', {
      operation: `${method} ${path}`,
      statusCode: response.status,
      correlationId,
      duration: Date.now() - started,
    });

    if (response.status === 401) {
      throw new TokenExpiredError('Access token rejected', { correlationId });
    }
    if (!response.ok) {
      let detail = '';
      try {
        detail = await response.text();
      } catch (error) {
        this.logger.debug('Could not read error body', {
          correlationId,
          reason: error instanceof Error ? error.message : String(error),
        });
      }
      throw new ApiError(
        `Request failed with status ${response.status}${detail ? `: ${detail.slice(0, 500)}` : ''}`,
        { statusCode: response.status, correlationId }
      );
    }

    return { data: await readJsonOrThrow(response, correlationId), correlationId };
  }
}
