import type { BinaryOperator, Expression } from './expression.js';

// ── Precedence ───────────────────────────────────────────────────────

const PRIMARY = 9;

function binaryPrecedence(operator: BinaryOperator): number {
  switch (operator) {
    case 'OR':
      return 1;
    case 'AND':
      return 2;
    case '=': case '<>': case '<': case '<=': case '>': case '>=': case 'LIKE':
      return 4;
    case '+': case '-': case '||':
      return 5;
    case '*': case '/':
      return 6;
  }
}

function precedence(expr: Expression): number {
  switch (expr.kind) {
    case 'binary':
      return binaryPrecedence(expr.operator);
    case 'unary':
      if (expr.operator === 'NOT') return 3;
      if (expr.operator === '-') return 7;
      return 4;
    case 'in':
      return 4;
    case 'literal':
      return expr.type === 'number' && expr.value.startsWith('-') ? 7 : PRIMARY;
    default:
      return PRIMARY;
  }
}

// ── Printing ─────────────────────────────────────────────────────────

export function quoteIdentifier(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

export function quoteString(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

function wrap(expr: Expression, minimum: number): string {
  const text = printExpression(expr);
  return precedence(expr) < minimum ? `(${text})` : text;
}

/** Print an expression as SQL text with minimal parentheses. */
export function printExpression(expr: Expression): string {
  switch (expr.kind) {
    case 'column':
      return expr.qualifier === undefined
        ? quoteIdentifier(expr.name)
        : `${expr.qualifier}.${quoteIdentifier(expr.name)}`;
    case 'identifier':
      return expr.name;
    case 'literal':
      return expr.type === 'string' ? quoteString(expr.value) : expr.value;
    case 'parameter':
      return expr.quoted ? `'$$${expr.name}$$'` : `$$${expr.name}$$`;
    case 'call':
      return `${expr.name}(${expr.args.map(printExpression).join(', ')})`;
    case 'binary': {
      const own = binaryPrecedence(expr.operator);
      // Left-associative: an equal-precedence right operand needs parentheses.
      return `${wrap(expr.left, own)} ${expr.operator} ${wrap(expr.right, own + 1)}`;
    }
    case 'unary':
      switch (expr.operator) {
        case 'NOT':
          return `NOT ${wrap(expr.operand, 3)}`;
        case '-':
          return `-${wrap(expr.operand, 7)}`;
        default:
          return `${wrap(expr.operand, 5)} ${expr.operator}`;
      }
    case 'case': {
      const branches = expr.branches.map((b) => `WHEN ${printExpression(b.when)} THEN ${printExpression(b.then)}`);
      const otherwise = expr.otherwise ? ` ELSE ${printExpression(expr.otherwise)}` : '';
      return `CASE ${branches.join(' ')}${otherwise} END`;
    }
    case 'cast':
      return `CAST(${printExpression(expr.operand)} AS ${expr.typeName})`;
    case 'in':
      return `${wrap(expr.operand, 5)} ${expr.negated ? 'NOT IN' : 'IN'} (${expr.items.map(printExpression).join(', ')})`;
    case 'placeholder':
      return expr.rest ? `{${expr.index}...}` : `{${expr.index}}`;
    case 'meta':
      return `$${expr.name}`;
    case 'symbol':
      return `{@${expr.name}}`;
  }
}
