/**
 * Declared SQL type → local type code.
 */

export const TypeCode = {
  STRING: 'STRING',
  NUMBER: 'NUMBER',
  DATETIME: 'DATETIME',
  BOOLEAN: 'BOOLEAN',
  BINARY: 'BINARY',
} as const;

export type TypeCode = (typeof TypeCode)[keyof typeof TypeCode];

const TYPE_MAP: Readonly<Record<string, TypeCode>> = {
  TEXT: TypeCode.STRING,
  STRING: TypeCode.STRING,
  VARCHAR: TypeCode.STRING,
  CHAR: TypeCode.STRING,
  ID: TypeCode.STRING,
  URL: TypeCode.STRING,
  EMAIL: TypeCode.STRING,
  PHONE: TypeCode.STRING,
  PICKLIST: TypeCode.STRING,
  MULTIPICKLIST: TypeCode.STRING,
  TEXTAREA: TypeCode.STRING,
  NUMBER: TypeCode.NUMBER,
  DECIMAL: TypeCode.NUMBER,
  INTEGER: TypeCode.NUMBER,
  LONG: TypeCode.NUMBER,
  BIGINT: TypeCode.NUMBER,
  DOUBLE: TypeCode.NUMBER,
  FLOAT: TypeCode.NUMBER,
  CURRENCY: TypeCode.NUMBER,
  PERCENT: TypeCode.NUMBER,
  DATE: TypeCode.DATETIME,
  DATETIME: TypeCode.DATETIME,
  TIME: TypeCode.DATETIME,
  TIMESTAMP: TypeCode.DATETIME,
  'TIMESTAMP WITH TIME ZONE': TypeCode.DATETIME,
  BOOLEAN: TypeCode.BOOLEAN,
  BINARY: TypeCode.BINARY,
  BASE64: TypeCode.BINARY,
};

/**
 * Map a declared type such as `decimal(18,2)` to its type code.
 * Unknown types are treated as strings.
 */
export function getTypeCode(declaredType: string): TypeCode {
  const normalized = declaredType.replace(/\(.*\)\s*$/, '').trim().toUpperCase();
  return TYPE_MAP[normalized] ?? TypeCode.STRING;
}
