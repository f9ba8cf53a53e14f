import type { Expression } from '../core/expression.js';
import { NULL_LITERAL } from '../core/expression.js';
import { printExpression } from '../core/expression-printer.js';
import { childrenOf, findExpressions, withChildren } from '../core/tree-utils.js';

// ── Pattern matching ─────────────────────────────────────────────────

export type Bindings = ReadonlyMap<string, Expression>;

function sameExpression(a: Expression, b: Expression): boolean {
  return printExpression(a) === printExpression(b);
}

function matchList(
  patterns: readonly Expression[],
  exprs: readonly Expression[],
  bindings: Map<string, Expression>,
): boolean {
  if (patterns.length !== exprs.length) return false;
  return patterns.every((p, i) => {
    const e = exprs[i];
    return e !== undefined && matchInto(p, e, bindings);
  });
}

function matchInto(pattern: Expression, expr: Expression, bindings: Map<string, Expression>): boolean {
  if (pattern.kind === 'meta') {
    const bound = bindings.get(pattern.name);
    if (bound) return sameExpression(bound, expr);
    bindings.set(pattern.name, expr);
    return true;
  }

  switch (pattern.kind) {
    case 'column':
      return expr.kind === 'column' && expr.name === pattern.name && expr.qualifier === pattern.qualifier;
    case 'identifier':
      return expr.kind === 'identifier' && expr.name.toUpperCase() === pattern.name.toUpperCase();
    case 'literal':
      return expr.kind === 'literal' && expr.type === pattern.type && expr.value === pattern.value;
    case 'parameter':
      return expr.kind === 'parameter' && expr.name === pattern.name;
    case 'call':
      return expr.kind === 'call'
        && expr.rewritten === undefined
        && expr.name.toUpperCase() === pattern.name.toUpperCase()
        && matchList(pattern.args, expr.args, bindings);
    case 'binary':
      return expr.kind === 'binary'
        && expr.operator === pattern.operator
        && matchInto(pattern.left, expr.left, bindings)
        && matchInto(pattern.right, expr.right, bindings);
    case 'unary':
      return expr.kind === 'unary'
        && expr.operator === pattern.operator
        && matchInto(pattern.operand, expr.operand, bindings);
    case 'cast':
      return expr.kind === 'cast'
        && expr.typeName === pattern.typeName
        && matchInto(pattern.operand, expr.operand, bindings);
    case 'in':
      return expr.kind === 'in'
        && expr.negated === pattern.negated
        && matchInto(pattern.operand, expr.operand, bindings)
        && matchList(pattern.items, expr.items, bindings);
    case 'case':
      return expr.kind === 'case'
        && matchList(childrenOf(pattern), childrenOf(expr), bindings)
        && (pattern.otherwise === undefined) === (expr.otherwise === undefined);
    default:
      return false;
  }
}

/** Structural match; metavariables bind whole subtrees. */
export function matchPattern(pattern: Expression, expr: Expression): Bindings | null {
  const bindings = new Map<string, Expression>();
  return matchInto(pattern, expr, bindings) ? bindings : null;
}

// ── Template instantiation ───────────────────────────────────────────

export interface TemplateInputs {
  readonly args?: readonly Expression[];
  readonly bindings?: Bindings;
  readonly symbols?: ReadonlyMap<string, string>;
}

/** Symbol names a template needs, in first-use order. */
export function templateSymbols(template: Expression): string[] {
  const names = findExpressions(template, (n): n is Extract<Expression, { kind: 'symbol' }> => n.kind === 'symbol')
    .map((s) => s.name);
  return [...new Set(names)];
}

/**
 * Fill placeholders, metavariables and symbols. Calls coming from the
 * template are marked as rewritten so translation does not revisit them.
 */
export function instantiate(template: Expression, inputs: TemplateInputs): Expression {
  const args = inputs.args ?? [];

  const fillList = (items: readonly Expression[]): Expression[] =>
    items.flatMap((item) =>
      item.kind === 'placeholder' && item.rest ? args.slice(item.index) : [fill(item)],
    );

  const fill = (node: Expression): Expression => {
    switch (node.kind) {
      case 'placeholder':
        return args[node.index] ?? NULL_LITERAL;
      case 'meta':
        return inputs.bindings?.get(node.name) ?? node;
      case 'symbol': {
        const value = inputs.symbols?.get(node.name);
        return value === undefined ? node : { kind: 'identifier', name: value };
      }
      case 'call':
        return { kind: 'call', name: node.name, args: fillList(node.args), rewritten: true };
      case 'in':
        return { ...node, operand: fill(node.operand), items: fillList(node.items) };
      default:
        return withChildren(node, childrenOf(node).map(fill));
    }
  };

  return fill(template);
}
