/**
 * Query cursor - submit, poll to completion, drain result pages.
 *
 * @packageDocumentation
 */

import { setTimeout as delay } from 'node:timers/promises';
import {
  ConnectionClosedError,
  InvalidConfigError,
  InvalidCursorStateError,
  QueryError,
  QueryTimeoutError,
} from './errors/index.js';
import type { ConnectorLogger } from './logging/logger.js';
import type { TransportClient } from './transports/transport.js';
import {
  getTypeCode,
  type ColumnMetadata,
  type PollOptions,
  type QueryId,
  type QueryState,
  type QueryStatus,
  type Row,
  type SqlParameters,
  type TypeCode,
} from './types/index.js';

export type CursorState =
  | 'idle'
  | 'submitted'
  | 'polling'
  | 'ready'
  | 'draining'
  | 'exhausted'
  | 'failed'
  | 'closed';

/**
 * DB-API style column description:
 * `[name, typeCode, displaySize, internalSize, precision, scale, nullable]`.
 */
export type ColumnDescription = readonly [
  name: string,
  typeCode: TypeCode,
  displaySize: null,
  internalSize: null,
  precision: number | null,
  scale: number | null,
  nullable: boolean,
];

export interface CursorOptions {
  readonly pageSize: number;
  readonly poll: PollOptions;
  readonly logger: ConnectorLogger;
  /** Called once when the cursor closes */
  readonly onClose?: ((cursor: QueryCursor) => void) | undefined;
  /** Wait between status polls (default: a timer) */
  readonly sleep?: ((ms: number) => Promise<unknown>) | undefined;
}

/**
 * Executes one query at a time and hands out its rows.
 *
 * Polling is lazy: nothing talks to the service between `execute()` and the
 * first call that needs the result. Calls on one cursor run strictly in the
 * order they were made.
 *
 * @example
 * ```typescript
 * const cursor = connection.cursor();
 * await cursor.execute('SELECT Id, Name FROM Contact LIMIT 10');
 * for await (const row of cursor) {
 *   console.log(row);
 * }
 * ```
 */
export class QueryCursor implements AsyncIterable<Row> {
  private _state: CursorState = 'idle';
  private query: QueryState | null = null;
  private buffer: Row[] = [];
  private lastPageLoaded = false;
  private closed = false;
  private chain: Promise<void> = Promise.resolve();
  private _arraysize: number;
  private readonly logger: ConnectorLogger;
  private readonly sleep: (ms: number) => Promise<unknown>;

  constructor(
    private readonly transport: TransportClient,
    private readonly options: CursorOptions
  ) {
    this._arraysize = options.pageSize;
    this.logger = options.logger.child({ component: 'cursor' });
    this.sleep = options.sleep ?? delay;
  }

  get state(): CursorState {
    return this._state;
  }

  get queryId(): QueryId | undefined {
    return this.query?.queryId;
  }

  /** Default row count for `fetchmany()`. */
  get arraysize(): number {
    return this._arraysize;
  }

  set arraysize(size: number) {
    this._arraysize = positiveInteger('arraysize', size);
  }

  /**
   * Column metadata of the current result, once the query has finished.
   */
  get description(): readonly ColumnMetadata[] | undefined {
    if (this.query === null || !this.hasResult()) {
      return undefined;
    }
    return this.query.columns;
  }

  /**
   * -1 until the result is ready; then the server's total while nothing has
   * been read, the rows read so far while draining, and the final count once
   * exhausted.
   */
  get rowcount(): number {
    const query = this.query;
    if (query === null) {
      return -1;
    }
    switch (this._state) {
      case 'ready':
        return query.totalRows ?? -1;
      case 'draining':
        return query.rowsReturnedSoFar;
      case 'exhausted':
        return query.totalRows ?? query.rowsReturnedSoFar;
      default:
        return -1;
    }
  }

  /**
   * DB-API style description tuples, or undefined before the result is ready.
   */
  describe(): ColumnDescription[] | undefined {
    return this.description?.map((column) => [
      column.name,
      getTypeCode(column.declaredType),
      null,
      null,
      column.precision ?? null,
      column.scale ?? null,
      column.nullable,
    ]);
  }

  /**
   * Submit a query, discarding whatever the previous one left behind.
   *
   * @throws {@link QueryError} when the service rejects the query outright
   */
  execute(sql: string, params?: SqlParameters): Promise<void> {
    return this.serialize(async () => {
      this.query = null;
      this.buffer = [];
      this.lastPageLoaded = false;
      this._state = 'idle';

      const status = await this.transport.submitQuery(sql, params);
      this.assertOpen();
      this.query = {
        queryId: status.queryId,
        phase: status.phase,
        columns: status.columns,
        rowsReturnedSoFar: 0,
        totalRows: status.totalRows,
      };
      this._state = 'submitted';
      this.logger.info('Query submitted', { queryId: status.queryId, phase: status.phase });

      if (status.phase === 'failed') {
        this._state = 'failed';
        throw new QueryError(status.error ?? `Query ${status.queryId} failed`, status.queryId);
      }
      if (status.phase === 'finished' && status.columns !== undefined) {
        this._state = 'ready';
      }
    });
  }

  /**
   * Poll until the query has finished. Fetch calls do this on their own.
   *
   * @throws {@link QueryTimeoutError} when the poll ceiling is reached
   * @throws {@link QueryError} when the server reports failure
   */
  waitForCompletion(): Promise<void> {
    return this.serialize(() => this.ensureReady());
  }

  fetchone(): Promise<Row | null> {
    return this.serialize(async () => {
      const rows = await this.take(1);
      return rows[0] ?? null;
    });
  }

  /**
   * @throws {@link InvalidConfigError} when `size` is not a positive integer
   */
  fetchmany(size: number = this._arraysize): Promise<Row[]> {
    return this.serialize(() => this.take(positiveInteger('fetchmany size', size)));
  }

  fetchall(): Promise<Row[]> {
    return this.serialize(() => this.take(Number.POSITIVE_INFINITY));
  }

  /**
   * Close the cursor. Calls still in flight finish their network round trip,
   * then reject with {@link ConnectionClosedError}.
   */
  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this._state = 'closed';
    this.buffer = [];
    this.logger.debug('Cursor closed', { queryId: this.query?.queryId });
    this.options.onClose?.(this);
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<Row, void, undefined> {
    for (;;) {
      const row = await this.fetchone();
      if (row === null) {
        return;
      }
      yield row;
    }
  }

  private serialize<T>(operation: () => Promise<T>): Promise<T> {
    const run = this.chain.then(() => {
      this.assertOpen();
      return operation();
    });
    // Callers see failures through `run`; the chain only orders calls.
    this.chain = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new ConnectionClosedError('Cursor is closed');
    }
  }

  private hasResult(): boolean {
    return this._state === 'ready' || this._state === 'draining' || this._state === 'exhausted';
  }

  private requireQuery(): QueryState {
    if (this.query === null) {
      throw new InvalidCursorStateError('No query has been executed');
    }
    return this.query;
  }

  private async ensureReady(): Promise<void> {
    const query = this.requireQuery();
    switch (this._state) {
      case 'ready':
      case 'draining':
      case 'exhausted':
        return;
      case 'failed':
        throw new InvalidCursorStateError(`Query ${query.queryId} failed; execute a new query`);
      case 'submitted':
      case 'polling':
        await this.pollUntilDone(query);
        return;
      case 'idle':
        throw new InvalidCursorStateError('No query has been executed');
      case 'closed':
        throw new ConnectionClosedError('Cursor is closed');
    }
  }

  private async pollUntilDone(query: QueryState): Promise<void> {
    const { initialIntervalMs, maxIntervalMs, backoffMultiplier, maxAttempts, timeoutMs } = this.options.poll;
    const started = Date.now();
    let interval = initialIntervalMs;
    let attempts = 0;
    this._state = 'polling';

    for (;;) {
      attempts += 1;
      const status = await this.transport.getQueryStatus(query.queryId);
      this.assertOpen();
      this.logger.debug('Query status', { queryId: query.queryId, phase: status.phase, attempt: attempts });

      if (this.applyStatus(query, status)) {
        return;
      }

      const elapsed = Date.now() - started;
      if (attempts >= maxAttempts || elapsed >= timeoutMs) {
        this._state = 'failed';
        this.logger.warn('Query did not finish in time', {
          queryId: query.queryId,
          attempt: attempts,
          duration: elapsed,
        });
        throw new QueryTimeoutError(query.queryId, attempts, elapsed);
      }

      await this.sleep(Math.min(interval, timeoutMs - elapsed));
      this.assertOpen();
      interval = Math.min(interval * backoffMultiplier, maxIntervalMs);
    }
  }

  /**
   * Fold a status into the query state. Returns true once the query is ready.
   */
  private applyStatus(query: QueryState, status: QueryStatus): boolean {
    query.phase = status.phase;
    switch (status.phase) {
      case 'running':
        return false;
      case 'failed':
        this._state = 'failed';
        throw new QueryError(status.error ?? `Query ${query.queryId} failed`, query.queryId);
      case 'finished':
        query.columns = status.columns ?? query.columns ?? [];
        query.totalRows = status.totalRows ?? query.totalRows;
        this._state = 'ready';
        this.logger.info('Query finished', { queryId: query.queryId, totalRows: query.totalRows });
        return true;
    }
  }

  private async take(size: number): Promise<Row[]> {
    const query = this.requireQuery();
    await this.ensureReady();

    const rows: Row[] = [];
    while (rows.length < size) {
      if (this.buffer.length === 0) {
        if (this.lastPageLoaded) {
          break;
        }
        await this.loadPage(query);
        if (this.buffer.length === 0) {
          break;
        }
      }
      const taken = this.buffer.splice(0, size - rows.length);
      query.rowsReturnedSoFar += taken.length;
      rows.push(...taken);
    }

    if (this.lastPageLoaded && this.buffer.length === 0) {
      this._state = 'exhausted';
    }
    return rows;
  }

  private async loadPage(query: QueryState): Promise<void> {
    const page = await this.transport.getQueryResults(
      query.queryId,
      query.rowsReturnedSoFar,
      this.options.pageSize
    );
    this.assertOpen();

    this._state = 'draining';
    this.buffer.push(...page.rows);
    if (page.totalRows !== undefined) {
      query.totalRows = page.totalRows;
    }
    if (page.isLast || page.rows.length === 0) {
      this.lastPageLoaded = true;
    }
    this.logger.debug('Page loaded', {
      queryId: query.queryId,
      offset: page.offset,
      rows: page.rows.length,
      isLast: page.isLast,
    });
  }
}

function positiveInteger(name: string, value: number): number {
  if (!Number.isInteger(value) || value <= 0) {
    throw new InvalidConfigError(`${name} must be a positive integer, got ${value}`);
  }
  return value;
}
