import type { Expression } from './expression.js';

// ── childrenOf ───────────────────────────────────────────────────────

export function childrenOf(expr: Expression): readonly Expression[] {
  switch (expr.kind) {
    case 'call':
      return expr.args;
    case 'binary':
      return [expr.left, expr.right];
    case 'unary':
      return [expr.operand];
    case 'case': {
      const parts = expr.branches.flatMap((b) => [b.when, b.then]);
      return expr.otherwise ? [...parts, expr.otherwise] : parts;
    }
    case 'cast':
      return [expr.operand];
    case 'in':
      return [expr.operand, ...expr.items];
    default:
      return [];
  }
}

// ── withChildren ─────────────────────────────────────────────────────

/** Rebuild a node with replacement children, in `childrenOf` order. */
export function withChildren(expr: Expression, children: readonly Expression[]): Expression {
  const at = (i: number): Expression => {
    const child = children[i];
    if (child === undefined) {
      throw new Error(`Missing child ${i} while rebuilding '${expr.kind}' expression`);
    }
    return child;
  };

  switch (expr.kind) {
    case 'call':
      return { ...expr, args: children.slice() };
    case 'binary':
      return { ...expr, left: at(0), right: at(1) };
    case 'unary':
      return { ...expr, operand: at(0) };
    case 'case': {
      const branches = expr.branches.map((_, i) => ({ when: at(i * 2), then: at(i * 2 + 1) }));
      const otherwise = expr.otherwise ? at(expr.branches.length * 2) : undefined;
      return otherwise ? { kind: 'case', branches, otherwise } : { kind: 'case', branches };
    }
    case 'cast':
      return { ...expr, operand: at(0) };
    case 'in':
      return { ...expr, operand: at(0), items: children.slice(1) };
    default:
      return expr;
  }
}

// ── mapExpression ────────────────────────────────────────────────────

/**
 * Bottom-up transform: children are mapped first, the node is rebuilt
 * only if a child changed, then the visitor sees the rebuilt node.
 */
export function mapExpression(
  root: Expression,
  visitor: (node: Expression) => Expression,
): Expression {
  const children = childrenOf(root);
  const mapped = children.map((child) => mapExpression(child, visitor));

  const changed = mapped.some((c, i) => c !== children[i]);
  const rebuilt = changed ? withChildren(root, mapped) : root;

  return visitor(rebuilt);
}

// ── walkExpression ───────────────────────────────────────────────────

export function walkExpression(
  root: Expression,
  callback: (node: Expression) => void | false,
): void {
  const result = callback(root);
  if (result === false) return;

  for (const child of childrenOf(root)) {
    walkExpression(child, callback);
  }
}

// ── findExpressions ──────────────────────────────────────────────────

export function findExpressions<T extends Expression>(
  root: Expression,
  predicate: (node: Expression) => node is T,
): T[] {
  const results: T[] = [];
  walkExpression(root, (node) => {
    if (predicate(node)) {
      results.push(node);
    }
  });
  return results;
}

export function referencedColumns(root: Expression): string[] {
  const names = findExpressions(root, (n): n is Extract<Expression, { kind: 'column' }> => n.kind === 'column')
    .map((c) => c.name);
  return [...new Set(names)];
}
