// ── Expression tree ──────────────────────────────────────────────────
//
// Immutable expression nodes shared by formulas, filters, catalog
// templates and pattern rules. Template-only nodes (placeholder, meta,
// symbol) never survive translation.

export type BinaryOperator =
  | '+' | '-' | '*' | '/' | '||'
  | '=' | '<>' | '<' | '<=' | '>' | '>='
  | 'AND' | 'OR' | 'LIKE';

export type UnaryOperator = 'NOT' | '-' | 'IS NULL' | 'IS NOT NULL';

export type LiteralType = 'string' | 'number' | 'boolean' | 'null';

export interface ColumnRef {
  readonly kind: 'column';
  readonly name: string;
  readonly qualifier?: string;
}

/** Bare identifier such as a keyword argument (`DAY`, `CURRENT_DATE`). */
export interface Identifier {
  readonly kind: 'identifier';
  readonly name: string;
}

export interface Literal {
  readonly kind: 'literal';
  readonly type: LiteralType;
  readonly value: string;
}

/** `$$NAME$$` input-parameter or placeholder reference. */
export interface ParameterRef {
  readonly kind: 'parameter';
  readonly name: string;
  readonly quoted: boolean;
}

export interface FunctionCall {
  readonly kind: 'call';
  readonly name: string;
  readonly args: readonly Expression[];
  /** Set on calls produced by a catalog rewrite; already in the target dialect. */
  readonly rewritten?: true;
}

export interface BinaryExpression {
  readonly kind: 'binary';
  readonly operator: BinaryOperator;
  readonly left: Expression;
  readonly right: Expression;
}

export interface UnaryExpression {
  readonly kind: 'unary';
  readonly operator: UnaryOperator;
  readonly operand: Expression;
}

export interface CaseBranch {
  readonly when: Expression;
  readonly then: Expression;
}

export interface CaseExpression {
  readonly kind: 'case';
  readonly branches: readonly CaseBranch[];
  readonly otherwise?: Expression;
}

export interface CastExpression {
  readonly kind: 'cast';
  readonly operand: Expression;
  readonly typeName: string;
}

export interface InListExpression {
  readonly kind: 'in';
  readonly operand: Expression;
  readonly items: readonly Expression[];
  readonly negated: boolean;
}

/** `{0}` or `{1...}` slot in a catalog template. */
export interface Placeholder {
  readonly kind: 'placeholder';
  readonly index: number;
  readonly rest: boolean;
}

/** `$name` metavariable in a pattern rule. */
export interface MetaVariable {
  readonly kind: 'meta';
  readonly name: string;
}

/** `{@name}` reference to a configuration symbol in a catalog template. */
export interface SymbolRef {
  readonly kind: 'symbol';
  readonly name: string;
}

export type Expression =
  | ColumnRef
  | Identifier
  | Literal
  | ParameterRef
  | FunctionCall
  | BinaryExpression
  | UnaryExpression
  | CaseExpression
  | CastExpression
  | InListExpression
  | Placeholder
  | MetaVariable
  | SymbolRef;

export type ExpressionKind = Expression['kind'];

// ── Constructors ─────────────────────────────────────────────────────

export function column(name: string, qualifier?: string): ColumnRef {
  return qualifier === undefined ? { kind: 'column', name } : { kind: 'column', name, qualifier };
}

export function stringLiteral(value: string): Literal {
  return { kind: 'literal', type: 'string', value };
}

export function numberLiteral(value: string | number): Literal {
  return { kind: 'literal', type: 'number', value: String(value) };
}

export const NULL_LITERAL: Literal = Object.freeze({ kind: 'literal', type: 'null', value: 'NULL' });

export function call(name: string, ...args: Expression[]): FunctionCall {
  return { kind: 'call', name, args };
}

export function binary(operator: BinaryOperator, left: Expression, right: Expression): BinaryExpression {
  return { kind: 'binary', operator, left, right };
}

export function and(...operands: Expression[]): Expression {
  const [first, ...rest] = operands;
  if (first === undefined) return { kind: 'literal', type: 'boolean', value: 'TRUE' };
  return rest.reduce<Expression>((acc, next) => binary('AND', acc, next), first);
}

export function not(operand: Expression): UnaryExpression {
  return { kind: 'unary', operator: 'NOT', operand };
}

export function isComparison(operator: BinaryOperator): boolean {
  return operator === '=' || operator === '<>' || operator === '<' || operator === '<='
    || operator === '>' || operator === '>=' || operator === 'LIKE';
}
