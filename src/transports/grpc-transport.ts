/**
 * gRPC transport for `dataquery.v1.QueryService`.
 *
 * The service definition is read from `proto/query_service.proto` at run time.
 */

import * as grpc from '@grpc/grpc-js';
import * as protoLoader from '@grpc/proto-loader';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import type { AuthStrategy } from '../auth/strategy.js';
import { ApiError, ConnectionClosedError, TokenExpiredError } from '../errors/index.js';
import type { ConnectorLogger } from '../logging/logger.js';
import {
  createQueryId,
  generateCorrelationId,
  type MetadataFilters,
  type QueryId,
  type QueryStatus,
  type ResultPage,
  type Row,
  type SqlParameters,
  type SqlValue,
  type TableMetadata,
} from '../types/index.js';
import { BaseTransport, type TransportContext } from './transport.js';
import {
  isLastPage,
  mapPhase,
  metadataParams,
  metadataResponseSchema,
  toColumnMetadata,
  toTableMetadata,
} from './wire.js';

export const QUERY_SERVICE_NAME = 'dataquery.v1.QueryService';

export const PROTO_PATH = fileURLToPath(new URL('../../proto/query_service.proto', import.meta.url));

const LOADER_OPTIONS: protoLoader.Options = {
  keepCase: false,
  longs: String,
  enums: String,
  defaults: true,
  oneofs: true,
};

export type GrpcMethod = 'SubmitQuery' | 'GetQueryStatus' | 'GetQueryResults' | 'GetMetadata';

/**
 * Minimal unary-call surface the transport needs. The default implementation
 * wraps a grpc-js client; tests supply an in-process one.
 */
export interface GrpcQueryStub {
  call(method: GrpcMethod, request: object, metadata: grpc.Metadata, deadline: Date): Promise<unknown>;
  close(): void;
}

export type GrpcStubFactory = (endpoint: string) => GrpcQueryStub;

function loadServiceDefinition(): protoLoader.ServiceDefinition {
  const packageDefinition = protoLoader.loadSync(PROTO_PATH, LOADER_OPTIONS);
  const service = packageDefinition[QUERY_SERVICE_NAME];
  if (service === undefined || 'format' in service) {
    throw new Error(`${QUERY_SERVICE_NAME} not found in ${PROTO_PATH}`);
  }
  return service;
}

/**
 * Stub backed by a TLS grpc-js channel.
 */
export const createDefaultStub: GrpcStubFactory = (endpoint) => {
  const service = loadServiceDefinition();
  const client = new grpc.Client(endpoint, grpc.credentials.createSsl());

  return {
    call(method, request, metadata, deadline) {
      const definition = service[method];
      if (definition === undefined) {
        return Promise.reject(new Error(`${QUERY_SERVICE_NAME}/${method} is not defined`));
      }
      return new Promise((resolve, reject) => {
        client.makeUnaryRequest(
          definition.path,
          definition.requestSerialize,
          definition.responseDeserialize,
          request,
          metadata,
          { deadline },
          (error, response) => {
            if (error) {
              reject(error);
            } else {
              resolve(response);
            }
          }
        );
      });
    },
    close() {
      client.close();
    },
  };
};

// int64 arrives as a decimal string.
const countSchema = z.union([z.string(), z.number()]).transform((value) => Number(value));

/** int64 cell; values a number cannot hold exactly stay strings */
const longValueSchema = z.union([z.string(), z.number()]).transform((value): number | string => {
  if (typeof value === 'number') return value;
  const parsed = Number(value);
  return Number.isSafeInteger(parsed) ? parsed : value;
});

const valueSchema = z.object({
  kind: z.string().optional(),
  stringValue: z.string().optional(),
  doubleValue: z.number().optional(),
  longValue: longValueSchema.optional(),
  boolValue: z.boolean().optional(),
});

const statusResponseSchema = z.object({
  queryId: z.string().min(1),
  status: z.string().min(1),
  columns: z
    .array(
      z.object({
        name: z.string().min(1),
        type: z.string().min(1),
        nullable: z.boolean().default(true),
        precision: z.number().int().default(0),
        scale: z.number().int().default(0),
      })
    )
    .default([]),
  totalRows: countSchema.default(0),
  hasTotalRows: z.boolean().default(false),
  errorMessage: z.string().default(''),
});

const resultsResponseSchema = z.object({
  rows: z.array(z.object({ values: z.array(valueSchema).default([]) })).default([]),
  totalRows: countSchema.default(0),
  hasTotalRows: z.boolean().default(false),
  done: z.boolean().default(false),
});

function decodeValue(value: z.infer<typeof valueSchema>): SqlValue {
  switch (value.kind) {
    case 'stringValue':
      return value.stringValue ?? null;
    case 'doubleValue':
      return value.doubleValue ?? null;
    case 'longValue':
      return value.longValue ?? null;
    case 'boolValue':
      return value.boolValue ?? null;
    default:
      return null;
  }
}

function encodeValue(value: SqlValue): object {
  if (value === null) return { nullValue: 'NULL_VALUE' };
  if (typeof value === 'string') return { stringValue: value };
  if (typeof value === 'boolean') return { boolValue: value };
  return Number.isInteger(value) ? { longValue: String(value) } : { doubleValue: value };
}

function isPositional(params: SqlParameters): params is readonly SqlValue[] {
  return Array.isArray(params);
}

function isServiceError(error: unknown): error is grpc.ServiceError & { code: grpc.status } {
  return error instanceof Error && 'code' in error && typeof error.code === 'number';
}

export interface GrpcTransportOptions {
  readonly requestTimeoutMs: number;
  /** `host:port`; defaults to the instance host on port 443 */
  readonly endpoint?: string | undefined;
  readonly dataspace?: string | undefined;
  readonly createStub?: GrpcStubFactory | undefined;
}

export class GrpcTransport extends BaseTransport {
  readonly name = 'grpc';

  private stub: GrpcQueryStub | null = null;
  private stubPromise: Promise<GrpcQueryStub> | null = null;
  private readonly createStub: GrpcStubFactory;

  constructor(
    auth: AuthStrategy,
    logger: ConnectorLogger,
    private readonly options: GrpcTransportOptions
  ) {
    super(auth, logger.child({ transport: 'grpc' }));
    this.createStub = options.createStub ?? createDefaultStub;
  }

  static create(context: TransportContext): GrpcTransport {
    return new GrpcTransport(context.auth, context.logger, {
      requestTimeoutMs: context.requestTimeoutMs,
      endpoint: context.grpcEndpoint,
      dataspace: context.dataspace,
    });
  }

  protected async doSubmitQuery(
    headers: Record<string, string>,
    sql: string,
    params: SqlParameters | undefined
  ): Promise<QueryStatus> {
    const request: Record<string, unknown> = { sql };
    if (params !== undefined) {
      if (isPositional(params)) {
        request.parameters = params.map(encodeValue);
      } else {
        request.namedParameters = Object.entries(params).map(([name, value]) => ({
          name,
          value: encodeValue(value),
        }));
      }
    }
    if (this.options.dataspace !== undefined) {
      request.dataspace = this.options.dataspace;
    }

    const { response, correlationId } = await this.invoke(headers, 'SubmitQuery', request);
    return this.toStatus(response, correlationId);
  }

  protected async doGetQueryStatus(headers: Record<string, string>, queryId: QueryId): Promise<QueryStatus> {
    const { response, correlationId } = await this.invoke(headers, 'GetQueryStatus', { queryId });
    return this.toStatus(response, correlationId);
  }

  protected async doGetQueryResults(
    headers: Record<string, string>,
    queryId: QueryId,
    offset: number,
    limit: number
  ): Promise<ResultPage> {
    const { response, correlationId } = await this.invoke(headers, 'GetQueryResults', {
      queryId,
      offset: String(offset),
      rowLimit: limit,
    });

    const parsed = resultsResponseSchema.safeParse(response);
    if (!parsed.success) {
      throw ApiError.malformed(`Invalid results response: ${parsed.error.issues[0]?.message ?? 'unknown'}`, {
        correlationId,
        cause: parsed.error,
      });
    }

    const rows: Row[] = parsed.data.rows.map((row) => row.values.map(decodeValue));
    const totalRows = parsed.data.hasTotalRows ? parsed.data.totalRows : undefined;
    return {
      rows,
      offset,
      totalRows,
      isLast: isLastPage({ offset, returned: rows.length, limit, done: parsed.data.done, totalRows }),
    };
  }

  protected async doGetMetadata(
    headers: Record<string, string>,
    filters: MetadataFilters
  ): Promise<TableMetadata[]> {
    const { response, correlationId } = await this.invoke(headers, 'GetMetadata', metadataParams(filters));

    const parsed = metadataResponseSchema.safeParse(response);
    if (!parsed.success) {
      throw ApiError.malformed(`Invalid metadata response: ${parsed.error.issues[0]?.message ?? 'unknown'}`, {
        correlationId,
        cause: parsed.error,
      });
    }
    return toTableMetadata(parsed.data);
  }

  protected override async doClose(): Promise<void> {
    this.stubPromise = null;
    this.stub?.close();
    this.stub = null;
  }

  private toStatus(response: unknown, correlationId: string): QueryStatus {
    const parsed = statusResponseSchema.safeParse(response);
    if (!parsed.success) {
      throw ApiError.malformed(`Invalid query status response: ${parsed.error.issues[0]?.message ?? 'unknown'}`, {
        correlationId,
        cause: parsed.error,
      });
    }

    const data = parsed.data;
    return {
      queryId: createQueryId(data.queryId),
      phase: mapPhase(data.status, correlationId),
      columns:
        data.columns.length > 0
          ? data.columns.map((column) =>
              toColumnMetadata({
                name: column.name,
                type: column.type,
                nullable: column.nullable,
                precision: column.precision > 0 ? column.precision : undefined,
                scale: column.precision > 0 ? column.scale : undefined,
              })
            )
          : undefined,
      totalRows: data.hasTotalRows ? data.totalRows : undefined,
      error: data.errorMessage || undefined,
    };
  }

  /**
   * One channel per transport. Concurrent first calls share the opening; a
   * failed opening is retried by the next call.
   */
  private async getStub(): Promise<GrpcQueryStub> {
    if (this.stubPromise === null) {
      this.stubPromise = this.openStub();
    }
    const pending = this.stubPromise;
    try {
      return await pending;
    } catch (error) {
      if (this.stubPromise === pending) {
        this.stubPromise = null;
      }
      throw error;
    }
  }

  private async openStub(): Promise<GrpcQueryStub> {
    const endpoint = this.options.endpoint ?? `${new URL(await this.auth.instanceUrl()).hostname}:443`;
    if (this.isClosed) {
      throw new ConnectionClosedError('Transport is closed');
    }
    this.logger.debug('Opening channel', { endpoint });
    this.stub = this.createStub(endpoint);
    return this.stub;
  }

  private async invoke(
    headers: Record<string, string>,
    method: GrpcMethod,
    request: object
  ): Promise<{ response: unknown; correlationId: string }> {
    const stub = await this.getStub();
    const correlationId = generateCorrelationId();
    const metadata = new grpc.Metadata();
    const authorization = headers.Authorization;
    if (authorization !== undefined) {
      metadata.set('authorization', authorization);
    }
    metadata.set('x-request-id', correlationId);

    const started = Date.now();
    try {
      const response = await stub.call(
        method,
        request,
        metadata,
        new Date(started + this.options.requestTimeoutMs)
      );
      this.logger.debug('Call completed', {
        operation: method,
        correlationId,
        duration: Date.now() - started,
      });
      return { response, correlationId };
    } catch (error) {
      throw this.mapError(error, correlationId);
    }
  }

  private mapError(error: unknown, correlationId: string): Error {
    if (!isServiceError(error)) {
      return ApiError.fromError(error, correlationId);
    }
    switch (error.code) {
      case grpc.status.UNAUTHENTICATED:
        return new TokenExpiredError('Access token rejected', { correlationId, cause: error });
      case grpc.status.DEADLINE_EXCEEDED:
        return ApiError.timeout(this.options.requestTimeoutMs, correlationId);
      default:
        return new ApiError(`gRPC call failed (${grpc.status[error.code]}): ${error.details ?? error.message}`, {
          correlationId,
          cause: error,
        });
    }
  }
}
