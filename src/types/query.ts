/**
 * Query, column and page types shared by every transport and the cursor.
 *
 * @packageDocumentation
 */

import type { QueryId } from './branded.js';

/** Scalar value of one cell. */
export type SqlValue = string | number | boolean | null;

/** One result row, aligned positionally with the query's columns. */
export type Row = readonly SqlValue[];

/** Positional or named query parameters. */
export type SqlParameters = readonly SqlValue[] | Readonly<Record<string, SqlValue>>;

/** Server-reported lifecycle stage of a query. */
export type QueryPhase = 'running' | 'finished' | 'failed';

/** Column metadata as reported by the service. */
export interface ColumnMetadata {
  readonly name: string;
  readonly declaredType: string;
  readonly nullable: boolean;
  readonly precision?: number | undefined;
  readonly scale?: number | undefined;
}

/**
 * Answer to a submit or status call.
 */
export interface QueryStatus {
  readonly queryId: QueryId;
  readonly phase: QueryPhase;
  /** Known once the query has finished (some services send it earlier) */
  readonly columns?: readonly ColumnMetadata[] | undefined;
  /** Total rows of the result set, when disclosed */
  readonly totalRows?: number | undefined;
  /** Server-provided failure reason when phase is failed */
  readonly error?: string | undefined;
}

/**
 * One bounded slice of a result set.
 */
export interface ResultPage {
  readonly rows: readonly Row[];
  /** Zero-based offset of the first row in this page */
  readonly offset: number;
  readonly isLast: boolean;
  readonly totalRows?: number | undefined;
}

/**
 * The cursor's view of the active query.
 */
export interface QueryState {
  readonly queryId: QueryId;
  phase: QueryPhase;
  columns: readonly ColumnMetadata[] | undefined;
  rowsReturnedSoFar: number;
  totalRows: number | undefined;
}
