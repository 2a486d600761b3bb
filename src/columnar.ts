/**
 * Columnar view of a result set.
 */

import { getTypeCode, TypeCode, type ColumnMetadata, type Row, type SqlValue } from './types/index.js';

export type ColumnarValue = SqlValue | Date;

export interface ColumnarColumn {
  readonly name: string;
  readonly declaredType: string;
  readonly typeCode: TypeCode;
  readonly values: ColumnarValue[];
}

export interface ColumnarTable {
  readonly columns: ColumnarColumn[];
  readonly rowCount: number;
}

function coerce(value: SqlValue | undefined, typeCode: TypeCode): ColumnarValue {
  if (value === undefined || value === null) {
    return null;
  }
  switch (typeCode) {
    case TypeCode.NUMBER: {
      if (typeof value !== 'string' || value.trim() === '') return value;
      const parsed = Number(value);
      // Integers beyond 2^53 stay exact as strings.
      if (Number.isNaN(parsed) || (Number.isInteger(parsed) && !Number.isSafeInteger(parsed))) return value;
      return parsed;
    }
    case TypeCode.DATETIME: {
      if (typeof value !== 'string') return value;
      const parsed = new Date(value);
      return Number.isNaN(parsed.getTime()) ? value : parsed;
    }
    default:
      return value;
  }
}

/**
 * Pivot rows into one array per column, coercing numeric strings and ISO
 * timestamps according to each column's declared type. Values that do not
 * parse, and integers too large to be exact as a number, are kept as they
 * came.
 */
export function toColumnarTable(columns: readonly ColumnMetadata[], rows: readonly Row[]): ColumnarTable {
  return {
    columns: columns.map((column, index) => {
      const typeCode = getTypeCode(column.declaredType);
      return {
        name: column.name,
        declaredType: column.declaredType,
        typeCode,
        values: rows.map((row) => coerce(row[index], typeCode)),
      };
    }),
    rowCount: rows.length,
  };
}
