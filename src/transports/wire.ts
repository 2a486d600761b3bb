/**
 * Mapping shared by the transports: server states, columns, rows.
 */

import { z } from 'zod';
import { ApiError } from '../errors/index.js';
import type { ColumnMetadata, MetadataFilters, QueryPhase, Row, SqlValue, TableMetadata } from '../types/index.js';

const PHASES: Readonly<Record<string, QueryPhase>> = {
  UNSPECIFIED: 'running',
  QUEUED: 'running',
  RUNNING: 'running',
  INPROGRESS: 'running',
  FINISHED: 'finished',
  COMPLETED: 'finished',
  SUCCESS: 'finished',
  FAILED: 'failed',
  ERROR: 'failed',
  CANCELLED: 'failed',
};

/**
 * Map a server state such as `InProgress` or `IN_PROGRESS` to a phase.
 *
 * @throws {@link ApiError} with code MALFORMED_RESPONSE for unknown states
 */
export function mapPhase(state: string, correlationId?: string | undefined): QueryPhase {
  const phase = PHASES[state.replace(/[_\s-]/g, '').toUpperCase()];
  if (phase === undefined) {
    throw ApiError.malformed(`Unknown query state: ${state}`, { correlationId });
  }
  return phase;
}

export const sqlValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

export const columnSchema = z.object({
  name: z.string().min(1),
  type: z.string().min(1),
  nullable: z.boolean().optional(),
  precision: z.number().int().optional(),
  scale: z.number().int().optional(),
});

export function toColumnMetadata(column: z.infer<typeof columnSchema>): ColumnMetadata {
  return {
    name: column.name,
    declaredType: column.type,
    nullable: column.nullable ?? true,
    precision: column.precision,
    scale: column.scale,
  };
}

/**
 * Align an object row with the column order. Without known columns the
 * object's own key order is used.
 */
export function alignRow(
  raw: readonly SqlValue[] | Readonly<Record<string, SqlValue>>,
  columns: readonly ColumnMetadata[] | undefined
): Row {
  if (isRowArray(raw)) {
    return raw;
  }
  if (columns === undefined || columns.length === 0) {
    return Object.values(raw);
  }
  return columns.map((column) => raw[column.name] ?? null);
}

function isRowArray(
  raw: readonly SqlValue[] | Readonly<Record<string, SqlValue>>
): raw is readonly SqlValue[] {
  return Array.isArray(raw);
}

/**
 * Decide whether a page is the last one. A `nextOffset` of null or below
 * zero ends the result set; an absent one says nothing.
 */
export function isLastPage(page: {
  readonly offset: number;
  readonly returned: number;
  readonly limit: number;
  readonly done?: boolean | undefined;
  readonly nextOffset?: number | null | undefined;
  readonly totalRows?: number | undefined;
}): boolean {
  if (page.done === true) return true;
  if (page.nextOffset === null || (page.nextOffset !== undefined && page.nextOffset < 0)) return true;
  if (page.totalRows !== undefined && page.offset + page.returned >= page.totalRows) return true;
  return page.returned < page.limit;
}

// Protobuf strings default to '' rather than absent.
const optionalText = z
  .string()
  .optional()
  .transform((value) => (value === '' ? undefined : value));

const indexOrderSchema = z
  .union([z.string(), z.number()])
  .optional()
  .transform((value) => {
    const order = Number(value);
    return Number.isInteger(order) && order > 0 ? order : undefined;
  });

const tableMetadataSchema = z.object({
  name: z.string().min(1),
  displayName: optionalText,
  category: optionalText,
  fields: z
    .array(
      z.object({
        name: z.string().min(1),
        displayName: optionalText,
        type: optionalText,
        isMeasure: z.boolean().optional(),
        isDimension: z.boolean().optional(),
      })
    )
    .default([]),
  primaryKeys: z
    .array(z.object({ name: z.string().min(1), displayName: optionalText, indexOrder: indexOrderSchema }))
    .default([]),
  relationships: z
    .array(
      z.object({
        fromEntity: z.string().min(1),
        toEntity: z.string().min(1),
        fromEntityAttribute: z.string(),
        toEntityAttribute: z.string(),
        cardinality: optionalText,
      })
    )
    .default([]),
});

/**
 * Body of a metadata lookup, the same on both transports.
 */
export const metadataResponseSchema = z.object({
  metadata: z.array(tableMetadataSchema).default([]),
});

export function toTableMetadata(response: z.output<typeof metadataResponseSchema>): TableMetadata[] {
  return response.metadata;
}

/**
 * Request parameters for a metadata lookup; blank filters are left out.
 */
export function metadataParams(filters: MetadataFilters): Record<string, string> {
  const params: Record<string, string> = {};
  for (const key of ['entityName', 'entityCategory', 'entityType'] as const) {
    const value = filters[key]?.trim();
    if (value) {
      params[key] = value;
    }
  }
  return params;
}
