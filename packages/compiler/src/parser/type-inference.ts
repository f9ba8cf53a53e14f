import {
  SqlTypes,
  declaredType,
  isNumeric,
  isStringLike,
  TypeFamily,
  type SqlType,
} from '../core/data-types.js';
import type { Expression } from '../core/expression.js';

export type TypeLookup = (name: string) => SqlType | undefined;

const STRING_FUNCTIONS: ReadonlySet<string> = new Set([
  'LEFTSTR', 'RIGHTSTR', 'MIDSTR', 'UPPER', 'LOWER', 'TRIM', 'STRING', 'CONCAT',
  'LPAD', 'RPAD', 'REPLACE',
]);
const INTEGER_FUNCTIONS: ReadonlySet<string> = new Set(['STRLEN', 'INT', 'DAYSBETWEEN', 'INSTR']);
const BOOLEAN_FUNCTIONS: ReadonlySet<string> = new Set(['ISNULL', 'MATCH', 'IN']);
const NUMERIC_FUNCTIONS: ReadonlySet<string> = new Set(['ABS', 'ROUND', 'FLOOR', 'CEIL']);

/** Literal `'2024-01-31'` or `'20240131'`. */
export function looksLikeDate(value: string): boolean {
  return /^\d{4}-\d{2}-\d{2}$/.test(value) || /^\d{8}$/.test(value);
}

function literalType(expr: Extract<Expression, { kind: 'literal' }>): SqlType | undefined {
  switch (expr.type) {
    case 'string':
      return SqlTypes.VARCHAR(Math.max(expr.value.length, 10));
    case 'number': {
      const decimals = expr.value.split('.')[1];
      return decimals === undefined ? SqlTypes.INTEGER() : SqlTypes.DECIMAL(38, decimals.length);
    }
    case 'boolean':
      return SqlTypes.BOOLEAN();
    case 'null':
      return undefined;
  }
}

function arithmetic(left: SqlType | undefined, right: SqlType | undefined): SqlType | undefined {
  if (!left || !right) return left ?? right;
  if (left.family === TypeFamily.DATE && isNumeric(right)) return left;
  if (isNumeric(left) && isNumeric(right)) {
    return left.name === right.name && left.name !== 'DECIMAL' ? left : SqlTypes.DECIMAL(38, 6);
  }
  return undefined;
}

/**
 * Best-effort result type of a formula. Returns undefined when nothing
 * can be concluded; callers fall back to the opaque type.
 */
export function inferExpressionType(expr: Expression, lookup: TypeLookup): SqlType | undefined {
  const infer = (e: Expression): SqlType | undefined => inferExpressionType(e, lookup);

  switch (expr.kind) {
    case 'literal':
      return literalType(expr);
    case 'column':
      return lookup(expr.name);
    case 'identifier':
      return lookup(expr.name);
    case 'call': {
      const name = expr.name.toUpperCase();
      const [first, second, third] = expr.args;
      if (STRING_FUNCTIONS.has(name)) return SqlTypes.VARCHAR();
      if (INTEGER_FUNCTIONS.has(name)) return SqlTypes.INTEGER();
      if (BOOLEAN_FUNCTIONS.has(name)) return SqlTypes.BOOLEAN();
      if (NUMERIC_FUNCTIONS.has(name)) {
        const arg = first && infer(first);
        return arg && isNumeric(arg) ? arg : SqlTypes.DECIMAL(38, 6);
      }
      if (name === 'DOUBLE') return SqlTypes.DOUBLE();
      if (name === 'DATE' || name === 'ADDDAYS') return SqlTypes.DATE();
      if (name === 'NOW') return SqlTypes.TIMESTAMP();
      if (name === 'IF') return (second && infer(second)) ?? (third && infer(third));
      if (name === 'IFNULL') return (first && infer(first)) ?? (second && infer(second));
      return undefined;
    }
    case 'binary':
      switch (expr.operator) {
        case '||':
          return SqlTypes.VARCHAR();
        case '+': {
          const left = infer(expr.left);
          const right = infer(expr.right);
          if ((left && isStringLike(left)) || (right && isStringLike(right))) return SqlTypes.VARCHAR();
          return arithmetic(left, right);
        }
        case '-': case '*': case '/':
          return arithmetic(infer(expr.left), infer(expr.right));
        default:
          return SqlTypes.BOOLEAN();
      }
    case 'unary':
      return expr.operator === '-' ? infer(expr.operand) : SqlTypes.BOOLEAN();
    case 'case': {
      for (const branch of expr.branches) {
        const type = infer(branch.then);
        if (type) return type;
      }
      return expr.otherwise && infer(expr.otherwise);
    }
    case 'cast': {
      const match = /^([A-Z_]+)(?:\((\d+)(?:,\s*(\d+))?\))?$/.exec(expr.typeName);
      if (!match?.[1]) return undefined;
      const size = match[2] === undefined ? undefined : Number(match[2]);
      const scale = match[3] === undefined ? undefined : Number(match[3]);
      return declaredType(match[1], size, scale);
    }
    case 'in':
      return SqlTypes.BOOLEAN();
    default:
      return undefined;
  }
}
