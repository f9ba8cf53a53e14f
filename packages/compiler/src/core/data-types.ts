// ── Type families ────────────────────────────────────────────────────

export enum TypeFamily {
  STRING = 'string',
  NUMERIC = 'numeric',
  DATE = 'date',
  TIMESTAMP = 'timestamp',
  BOOLEAN = 'boolean',
  OPAQUE = 'opaque',
}

export type TypeName =
  | 'VARCHAR'
  | 'DECIMAL'
  | 'INTEGER'
  | 'DOUBLE'
  | 'DATE'
  | 'TIMESTAMP'
  | 'BOOLEAN'
  | 'OPAQUE';

// ── SqlType ──────────────────────────────────────────────────────────

export interface SqlType {
  readonly name: TypeName;
  readonly family: TypeFamily;
  readonly length?: number;
  readonly precision?: number;
  readonly scale?: number;
}

// ── Type builders ────────────────────────────────────────────────────

export const SqlTypes = {
  VARCHAR(length?: number): SqlType {
    return length === undefined
      ? { name: 'VARCHAR', family: TypeFamily.STRING }
      : { name: 'VARCHAR', family: TypeFamily.STRING, length };
  },
  DECIMAL(precision = 38, scale = 0): SqlType {
    return { name: 'DECIMAL', family: TypeFamily.NUMERIC, precision, scale };
  },
  INTEGER(): SqlType { return { name: 'INTEGER', family: TypeFamily.NUMERIC }; },
  DOUBLE(): SqlType { return { name: 'DOUBLE', family: TypeFamily.NUMERIC }; },
  DATE(): SqlType { return { name: 'DATE', family: TypeFamily.DATE }; },
  TIMESTAMP(): SqlType { return { name: 'TIMESTAMP', family: TypeFamily.TIMESTAMP }; },
  BOOLEAN(): SqlType { return { name: 'BOOLEAN', family: TypeFamily.BOOLEAN }; },
  /** Generic string type for values whose type cannot be inferred. */
  OPAQUE(): SqlType { return { name: 'OPAQUE', family: TypeFamily.OPAQUE }; },
} as const;

// ── Declared types ───────────────────────────────────────────────────

const STRING_TYPES: ReadonlySet<string> = new Set([
  'VARCHAR', 'NVARCHAR', 'ALPHANUM', 'CHAR', 'NCHAR', 'SHORTTEXT', 'STRING', 'CLOB', 'NCLOB',
]);
const INTEGER_TYPES: ReadonlySet<string> = new Set(['INTEGER', 'INT', 'BIGINT', 'SMALLINT', 'TINYINT']);
const FLOAT_TYPES: ReadonlySet<string> = new Set(['DOUBLE', 'REAL', 'FLOAT']);
const DECIMAL_TYPES: ReadonlySet<string> = new Set(['DECIMAL', 'SMALLDECIMAL', 'NUMBER', 'NUMERIC']);
const TIMESTAMP_TYPES: ReadonlySet<string> = new Set(['TIMESTAMP', 'SECONDDATE', 'TIME', 'DATETIME']);

/**
 * Map a datatype attribute from the view XML onto a SqlType.
 * Unknown names fall back to VARCHAR.
 */
export function declaredType(datatype: string, length?: number, scale?: number): SqlType {
  const name = datatype.trim().toUpperCase();

  if (STRING_TYPES.has(name)) return SqlTypes.VARCHAR(length ?? 255);
  if (INTEGER_TYPES.has(name)) return SqlTypes.INTEGER();
  if (FLOAT_TYPES.has(name)) return SqlTypes.DOUBLE();
  if (DECIMAL_TYPES.has(name)) return SqlTypes.DECIMAL(length ?? 38, scale ?? 0);
  if (name === 'DATE') return SqlTypes.DATE();
  if (TIMESTAMP_TYPES.has(name)) return SqlTypes.TIMESTAMP();
  if (name === 'BOOLEAN') return SqlTypes.BOOLEAN();

  return SqlTypes.VARCHAR(length ?? 255);
}

// ── Name-based inference ─────────────────────────────────────────────

const DATE_NAME = /(DATE|DAT$|DATUM|ERDAT|AEDAT|BUDAT|VALUT|DATENT|AUGDT)/i;
const TIMESTAMP_NAME = /(TIMESTAMP|TIME$|TSTMP|UTIME|UTS)/i;
const NUMERIC_NAME = /(AMT|AMOUNT|BETR|MENGE|QUAN|NUM|CNT|RATE|PRICE|VALUE|IDNRK|ANZ)/i;

/** Guess a type for an attribute that carries no datatype in the XML. */
export function inferTypeFromName(attributeName: string): SqlType {
  if (DATE_NAME.test(attributeName)) return SqlTypes.DATE();
  if (TIMESTAMP_NAME.test(attributeName)) return SqlTypes.TIMESTAMP();
  if (NUMERIC_NAME.test(attributeName)) return SqlTypes.DECIMAL(38, 6);
  return SqlTypes.VARCHAR(attributeName.length > 10 ? 255 : 40);
}

// ── Predicates ───────────────────────────────────────────────────────

export function isNumeric(type: SqlType): boolean {
  return type.family === TypeFamily.NUMERIC;
}

export function isStringLike(type: SqlType): boolean {
  return type.family === TypeFamily.STRING || type.family === TypeFamily.OPAQUE;
}

/** Whether two types may share a union column position. */
export function isCompatible(a: SqlType, b: SqlType): boolean {
  if (isStringLike(a) && isStringLike(b)) return true;
  return a.family === b.family;
}

// ── Formatting ───────────────────────────────────────────────────────

/**
 * Render a type with a dialect's type names.
 * `names` maps every TypeName to the dialect spelling.
 */
export function formatType(type: SqlType, names: Readonly<Record<TypeName, string>>): string {
  const base = names[type.name];
  switch (type.name) {
    case 'VARCHAR':
      return type.length === undefined ? base : `${base}(${type.length})`;
    case 'DECIMAL':
      return `${base}(${type.precision ?? 38}, ${type.scale ?? 0})`;
    default:
      return base;
  }
}

export function describeType(type: SqlType): string {
  switch (type.name) {
    case 'VARCHAR':
      return type.length === undefined ? 'VARCHAR' : `VARCHAR(${type.length})`;
    case 'DECIMAL':
      return `DECIMAL(${type.precision ?? 38}, ${type.scale ?? 0})`;
    default:
      return type.name;
  }
}
