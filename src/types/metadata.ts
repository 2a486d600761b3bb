/**
 * Table metadata published by the query service.
 *
 * @packageDocumentation
 */

/**
 * Narrows a metadata lookup. Empty strings count as absent.
 */
export interface MetadataFilters {
  /** API name of one table */
  readonly entityName?: string | undefined;
  /** e.g. `Profile`, `Engagement`, `Related` */
  readonly entityCategory?: string | undefined;
  /** e.g. `DataLakeObject`, `DataModel` */
  readonly entityType?: string | undefined;
}

export interface TableField {
  readonly name: string;
  readonly displayName?: string | undefined;
  readonly type?: string | undefined;
  readonly isMeasure?: boolean | undefined;
  readonly isDimension?: boolean | undefined;
}

export interface PrimaryKey {
  readonly name: string;
  readonly displayName?: string | undefined;
  /** 1-based position within a composite key */
  readonly indexOrder?: number | undefined;
}

export interface TableRelationship {
  readonly fromEntity: string;
  readonly toEntity: string;
  readonly fromEntityAttribute: string;
  readonly toEntityAttribute: string;
  readonly cardinality?: string | undefined;
}

export interface TableMetadata {
  readonly name: string;
  readonly displayName?: string | undefined;
  readonly category?: string | undefined;
  readonly fields: readonly TableField[];
  readonly primaryKeys: readonly PrimaryKey[];
  readonly relationships: readonly TableRelationship[];
}
