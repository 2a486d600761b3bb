import type { TransportClient } from '../../transports/transport.js';
import {
  createQueryId,
  type ColumnMetadata,
  type MetadataFilters,
  type QueryId,
  type QueryPhase,
  type QueryStatus,
  type ResultPage,
  type Row,
  type SqlParameters,
  type TableMetadata,
} from '../../types/index.js';

export interface FakeQueryScript {
  readonly columns: readonly ColumnMetadata[];
  readonly rows: readonly Row[];
  /** Phase reported by submit (default: running) */
  readonly submitPhase?: QueryPhase;
  /** Include columns in a finished submit answer (default: true) */
  readonly submitColumns?: boolean;
  /** Running answers before finished (default: 0; Infinity never finishes) */
  readonly runningPolls?: number;
  /** Reported by the first non-running status as the failure reason */
  readonly failWith?: string;
  /** Report totalRows (default: true) */
  readonly discloseTotal?: boolean;
}

/**
 * In-process query service following a script.
 */
export class FakeTransport implements TransportClient {
  readonly name = 'fake';
  readonly submitted: Array<{ sql: string; params: SqlParameters | undefined }> = [];
  readonly resultCalls: Array<{ queryId: QueryId; offset: number; limit: number }> = [];
  readonly metadataCalls: MetadataFilters[] = [];
  statusCalls = 0;
  closeCalls = 0;
  /** Served by `getMetadata`, filtered by category */
  tables: TableMetadata[] = [];
  /** Awaited before every page is served */
  beforeResults: (() => Promise<void>) | undefined;

  private script: FakeQueryScript;
  private pollsLeft = 0;

  constructor(script: FakeQueryScript) {
    this.script = script;
  }

  /** Replace the script for the next submitted query. */
  setScript(script: FakeQueryScript): void {
    this.script = script;
  }

  async submitQuery(sql: string, params?: SqlParameters): Promise<QueryStatus> {
    this.submitted.push({ sql, params });
    this.pollsLeft = this.script.runningPolls ?? 0;
    const queryId = createQueryId(`q-${this.submitted.length}`);
    const phase = this.script.submitPhase ?? 'running';
    if (phase === 'finished') {
      return this.finished(queryId, this.script.submitColumns ?? true);
    }
    if (phase === 'failed') {
      return { queryId, phase, error: this.script.failWith };
    }
    return { queryId, phase };
  }

  async getQueryStatus(queryId: QueryId): Promise<QueryStatus> {
    this.statusCalls += 1;
    if (this.pollsLeft > 0) {
      this.pollsLeft -= 1;
      return { queryId, phase: 'running' };
    }
    if (this.script.failWith !== undefined) {
      return { queryId, phase: 'failed', error: this.script.failWith };
    }
    return this.finished(queryId, true);
  }

  async getQueryResults(queryId: QueryId, offset: number, limit: number): Promise<ResultPage> {
    this.resultCalls.push({ queryId, offset, limit });
    if (this.beforeResults) {
      await this.beforeResults();
    }
    const rows = this.script.rows.slice(offset, offset + limit);
    return {
      rows,
      offset,
      isLast: offset + rows.length >= this.script.rows.length,
      totalRows: this.total(),
    };
  }

  async getMetadata(filters: MetadataFilters): Promise<TableMetadata[]> {
    this.metadataCalls.push(filters);
    const category = filters.entityCategory;
    return category ? this.tables.filter((table) => table.category === category) : this.tables;
  }

  async close(): Promise<void> {
    this.closeCalls += 1;
  }

  private finished(queryId: QueryId, withColumns: boolean): QueryStatus {
    return {
      queryId,
      phase: 'finished',
      columns: withColumns ? this.script.columns : undefined,
      totalRows: this.total(),
    };
  }

  private total(): number | undefined {
    return this.script.discloseTotal === false ? undefined : this.script.rows.length;
  }
}

export const CONTACT_COLUMNS: readonly ColumnMetadata[] = [
  { name: 'Id', declaredType: 'VARCHAR', nullable: false },
  { name: 'Name', declaredType: 'VARCHAR', nullable: true },
];
