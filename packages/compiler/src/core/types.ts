import { SqlTypes, isNumeric, type SqlType } from './data-types.js';
import type { Expression } from './expression.js';

// ── Node identity (branded type) ─────────────────────────────────────

declare const nodeKeyBrand: unique symbol;

/** Canonical, case-insensitive identity of a node or stage. */
export type NodeKey = string & { readonly [nodeKeyBrand]: true };

export function toNodeKey(name: string): NodeKey {
  return name.trim().toLowerCase() as NodeKey;
}

// ── Columns ──────────────────────────────────────────────────────────

export type AggregationFunction = 'SUM' | 'AVG' | 'MIN' | 'MAX' | 'COUNT';

/** Result type of an aggregate; non-numeric SUM/AVG inputs widen to DECIMAL(38, 6). */
export function aggregatedType(aggregation: AggregationFunction | undefined, source: SqlType): SqlType {
  switch (aggregation) {
    case 'COUNT':
      return SqlTypes.INTEGER();
    case 'SUM':
    case 'AVG':
      return isNumeric(source) ? source : SqlTypes.DECIMAL(38, 6);
    default:
      return source;
  }
}

export interface ColumnSource {
  readonly node: NodeKey;
  readonly field: string;
}

export interface RealColumn {
  readonly kind: 'real';
  readonly name: string;
  readonly source: ColumnSource;
  readonly type: SqlType;
  readonly aggregation?: AggregationFunction;
  readonly hidden: boolean;
}

export type TypeOrigin = 'declared' | 'inferred' | 'default';

export interface CalculatedColumn {
  readonly kind: 'calculated';
  readonly name: string;
  readonly expression: Expression;
  readonly type: SqlType;
  readonly typeOrigin: TypeOrigin;
  readonly hidden: boolean;
}

export type Column = RealColumn | CalculatedColumn;

// ── Filters & joins ──────────────────────────────────────────────────

export interface Filter {
  readonly expression: Expression;
  readonly origin: 'attribute' | 'formula';
}

export type JoinType = 'inner' | 'left' | 'right' | 'full';

/** Field names on the left and right inputs. */
export interface JoinKey {
  readonly left: string;
  readonly right: string;
}

export interface Join {
  readonly type: JoinType;
  readonly left: NodeKey;
  readonly right: NodeKey;
  readonly keys: readonly JoinKey[];
}

// ── Nodes ────────────────────────────────────────────────────────────

export type NodeKind = 'table' | 'projection' | 'join' | 'aggregation' | 'union';

interface NodeBase {
  readonly key: NodeKey;
  readonly name: string;
  readonly columns: readonly Column[];
  readonly inputs: readonly NodeKey[];
  readonly filters: readonly Filter[];
}

export interface TableNode extends NodeBase {
  readonly kind: 'table';
  readonly sourceType: 'table' | 'view';
  readonly schema: string;
  readonly object: string;
}

export interface ProjectionNode extends NodeBase {
  readonly kind: 'projection';
}

export interface JoinNode extends NodeBase {
  readonly kind: 'join';
  readonly join: Join;
}

export interface AggregationNode extends NodeBase {
  readonly kind: 'aggregation';
  readonly groupBy: readonly string[];
}

export type UnionValue =
  | { readonly kind: 'field'; readonly field: string }
  | { readonly kind: 'constant'; readonly value: string | null };

/** One union input; `values` align positionally with the node's columns. */
export interface UnionBranch {
  readonly input: NodeKey;
  readonly values: readonly UnionValue[];
}

export interface UnionNode extends NodeBase {
  readonly kind: 'union';
  readonly branches: readonly UnionBranch[];
}

export type ViewNode = TableNode | ProjectionNode | JoinNode | AggregationNode | UnionNode;

// ── Input parameters ─────────────────────────────────────────────────

export interface InputParameter {
  readonly name: string;
  readonly type: SqlType;
  readonly defaultValue?: string;
  readonly mandatory: boolean;
}

// ── Scenario ─────────────────────────────────────────────────────────

export interface Scenario {
  readonly id: string;
  readonly description?: string;
  readonly defaultClient?: string;
  readonly defaultLanguage?: string;
  /** Declaration order: data sources first, then calculation views. */
  readonly nodes: readonly ViewNode[];
  readonly parameters: readonly InputParameter[];
  readonly output: NodeKey;
}

// ── Lookups ──────────────────────────────────────────────────────────

export function findNode(scenario: Scenario, name: string): ViewNode | undefined {
  const key = toNodeKey(name);
  return scenario.nodes.find((n) => n.key === key);
}

export function findColumn(node: { readonly columns: readonly Column[] }, name: string): Column | undefined {
  return node.columns.find((c) => c.name === name);
}

/**
 * Follow a field through real-column sources down to the column that
 * originates it. Returns undefined when the field is not exposed.
 */
export function traceColumn(
  nodes: ReadonlyMap<NodeKey, { readonly columns: readonly Column[]; readonly kind: NodeKind }>,
  node: NodeKey,
  field: string,
): { readonly node: NodeKey; readonly column: Column } | undefined {
  const seen = new Set<string>();
  let current = node;
  let currentField = field;

  for (;;) {
    const marker = `${current}\u0000${currentField}`;
    if (seen.has(marker)) return undefined;
    seen.add(marker);

    const owner = nodes.get(current);
    if (!owner) return undefined;

    const col = findColumn(owner, currentField);
    if (!col) return undefined;

    if (col.kind === 'calculated' || owner.kind === 'table' || col.source.node === current) {
      return { node: current, column: col };
    }

    current = col.source.node;
    currentField = col.source.field;
  }
}
