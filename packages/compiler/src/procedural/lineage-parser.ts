import { ParseError } from '../core/errors.js';
import { toNodeKey, type JoinType, type NodeKey } from '../core/types.js';
import {
  identifierName,
  isSymbol,
  isWord,
  matchingParen,
  readCtes,
  scanSql,
  type Token,
} from '../sql/scanner.js';

// ── Lineage model ────────────────────────────────────────────────────

export type LineageStageKind = 'table' | 'projection' | 'join' | 'aggregation' | 'union';

export interface FieldRef {
  /** Stage alias the field is qualified with, if any. */
  readonly qualifier?: string;
  readonly field: string;
}

export interface LineageColumn {
  readonly name: string;
  readonly kind: 'real' | 'calculated';
  /** Set on real columns. */
  readonly source?: FieldRef;
  /** Aggregate function wrapped around the source field. */
  readonly aggregate?: string;
  /** Original SQL text of the select item. */
  readonly text: string;
}

export interface LineageJoinKey {
  readonly left: string;
  readonly right: string;
}

export interface LineageJoin {
  readonly type: JoinType | 'cross';
  readonly left: NodeKey;
  readonly right: NodeKey;
  readonly keys: readonly LineageJoinKey[];
}

export interface LineageBranch {
  readonly input: NodeKey;
  readonly columns: readonly LineageColumn[];
}

export interface LineageStage {
  readonly key: NodeKey;
  readonly name: string;
  readonly kind: LineageStageKind;
  readonly columns: readonly LineageColumn[];
  readonly inputs: readonly NodeKey[];
  /** Physical object of a table stage. */
  readonly table?: { readonly schema?: string; readonly name: string };
  readonly join?: LineageJoin;
  readonly branches?: readonly LineageBranch[];
  readonly groupBy: readonly string[];
  readonly where?: string;
}

export interface ParsedSql {
  readonly stages: readonly LineageStage[];
  readonly output: NodeKey;
  readonly outputColumns: readonly string[];
}

const AGGREGATES = new Set(['SUM', 'AVG', 'MIN', 'MAX', 'COUNT']);

const JOIN_TYPES: Readonly<Record<string, JoinType>> = {
  INNER: 'inner',
  LEFT: 'left',
  RIGHT: 'right',
  FULL: 'full',
};

// ── Token helpers ────────────────────────────────────────────────────

function lineageError(message: string, stage?: string): ParseError {
  return new ParseError(message, stage === undefined ? {} : { stage }, 'lineage');
}

/** Split at top-level occurrences of `separator`. */
function splitTopLevel(tokens: readonly Token[], isSeparator: (t: Token) => boolean): Token[][] {
  const parts: Token[][] = [[]];
  let depth = 0;
  for (const token of tokens) {
    if (isSymbol(token, '(')) depth++;
    if (isSymbol(token, ')')) depth--;
    if (depth === 0 && isSeparator(token)) {
      parts.push([]);
      continue;
    }
    parts[parts.length - 1]?.push(token);
  }
  return parts.filter((p) => p.length > 0);
}

/** Index of the first top-level token matching, or -1. */
function findTopLevel(tokens: readonly Token[], predicate: (t: Token) => boolean, from = 0): number {
  let depth = 0;
  for (let i = from; i < tokens.length; i++) {
    const token = tokens[i];
    if (!token) break;
    if (isSymbol(token, '(')) depth++;
    if (isSymbol(token, ')')) depth--;
    if (depth === 0 && predicate(token)) return i;
  }
  return -1;
}

function isIdentifier(token: Token | undefined): token is Token {
  return token?.kind === 'word' || token?.kind === 'quoted';
}

/** `x`, `"x"` or `q."x"`; undefined for anything else. */
function fieldRef(tokens: readonly Token[]): FieldRef | undefined {
  const [first, dot, second] = tokens;
  if (tokens.length === 1 && isIdentifier(first)) {
    return { field: identifierName(first) };
  }
  if (tokens.length === 3 && isIdentifier(first) && isSymbol(dot, '.') && isIdentifier(second)) {
    return { qualifier: identifierName(first), field: identifierName(second) };
  }
  return undefined;
}

/** Strip a `CAST(... AS type)` or single-argument call wrapper down to a field reference. */
function unwrapField(tokens: readonly Token[]): FieldRef | undefined {
  const direct = fieldRef(tokens);
  if (direct) return direct;
  const [name, open] = tokens;
  if (!isWord(name) || !isSymbol(open, '(') || matchingParen(tokens, 1) !== tokens.length - 1) return undefined;
  const inner = tokens.slice(2, -1);
  const asIndex = findTopLevel(inner, (t) => isWord(t, 'AS'));
  const [argument] = splitTopLevel(asIndex === -1 ? inner : inner.slice(0, asIndex), (t) => isSymbol(t, ','));
  return argument ? unwrapField(argument) : undefined;
}

function textOf(sql: string, tokens: readonly Token[]): string {
  const first = tokens[0];
  const last = tokens[tokens.length - 1];
  return first && last ? sql.slice(first.start, last.end) : '';
}

// ── Select items ─────────────────────────────────────────────────────

/**
 * A select item is real when it is a bare field reference, or an
 * aggregate over one (through casts). Anything else is calculated.
 */
function parseColumn(sql: string, item: readonly Token[], stage: string): LineageColumn {
  let expression = item;
  let alias: string | undefined;
  const asToken = item[item.length - 2];
  const last = item[item.length - 1];
  if (item.length >= 3 && isWord(asToken, 'AS') && isIdentifier(last)) {
    expression = item.slice(0, -2);
    alias = identifierName(last);
  }

  const text = textOf(sql, expression);
  const direct = fieldRef(expression);
  if (direct) {
    return { name: alias ?? direct.field, kind: 'real', source: direct, text };
  }

  const [head, open] = expression;
  if (isWord(head) && AGGREGATES.has(head.text.toUpperCase()) && isSymbol(open, '(')) {
    const source = unwrapField(expression.slice(2, -1));
    if (source && matchingParen(expression, 1) === expression.length - 1) {
      return { name: alias ?? source.field, kind: 'real', source, aggregate: head.text.toUpperCase(), text };
    }
  }

  if (alias === undefined) {
    throw lineageError(`Calculated select item '${text}' has no alias`, stage);
  }
  return { name: alias, kind: 'calculated', text };
}

// ── Stage bodies ─────────────────────────────────────────────────────

interface SelectParts {
  readonly columns: LineageColumn[];
  readonly from: Token[];
  readonly where?: string;
  readonly groupBy: string[];
}

function splitSelect(sql: string, tokens: readonly Token[], stage: string): SelectParts {
  if (!isWord(tokens[0], 'SELECT')) {
    throw lineageError(`Stage '${stage}' does not start with SELECT`, stage);
  }
  const fromAt = findTopLevel(tokens, (t) => isWord(t, 'FROM'));
  if (fromAt === -1) {
    throw lineageError(`Stage '${stage}' has no FROM clause`, stage);
  }
  const whereAt = findTopLevel(tokens, (t) => isWord(t, 'WHERE'), fromAt);
  const groupAt = findTopLevel(tokens, (t) => isWord(t, 'GROUP'), fromAt);
  const fromEnd = [whereAt, groupAt, tokens.length].filter((i) => i !== -1).reduce((a, b) => Math.min(a, b));

  const items = splitTopLevel(tokens.slice(1, fromAt), (t) => isSymbol(t, ','));
  const columns = items
    .filter((item) => !(item.length === 1 && isSymbol(item[0], '*')))
    .map((item) => parseColumn(sql, item, stage));

  const where = whereAt === -1 ? undefined : textOf(sql, tokens.slice(whereAt + 1, groupAt === -1 ? tokens.length : groupAt));
  const groupBy = groupAt === -1
    ? []
    : splitTopLevel(tokens.slice(groupAt + 2), (t) => isSymbol(t, ','))
      .map((part) => fieldRef(part)?.field)
      .filter((f): f is string => f !== undefined);

  return { columns, from: tokens.slice(fromAt + 1, fromEnd), groupBy, ...(where === undefined ? {} : { where }) };
}

function parseJoinKeys(on: readonly Token[], left: string, right: string, stage: string): LineageJoinKey[] {
  const keys: LineageJoinKey[] = [];
  for (const predicate of splitTopLevel(on, (t) => isWord(t, 'AND'))) {
    const eq = predicate.findIndex((t) => isSymbol(t, '='));
    const a = fieldRef(predicate.slice(0, eq));
    const b = fieldRef(predicate.slice(eq + 1));
    if (eq === -1 || !a || !b) {
      if (predicate.every((t) => t.kind === 'number' || isSymbol(t, '='))) continue;
      throw lineageError(`Unsupported join predicate in stage '${stage}'`, stage);
    }
    const aIsLeft = a.qualifier === undefined || toNodeKey(a.qualifier) === toNodeKey(left);
    const bIsRight = b.qualifier === undefined || toNodeKey(b.qualifier) === toNodeKey(right);
    keys.push(aIsLeft && bIsRight ? { left: a.field, right: b.field } : { left: b.field, right: a.field });
  }
  return keys;
}

function parseSource(
  sql: string,
  name: string,
  parts: SelectParts,
  stageKeys: ReadonlySet<NodeKey>,
): Pick<LineageStage, 'kind' | 'inputs' | 'table' | 'join'> {
  const { from } = parts;
  const aggregated = parts.groupBy.length > 0 || parts.columns.some((c) => c.aggregate !== undefined);

  const joinAt = from.findIndex((t) => isWord(t, 'JOIN'));
  if (joinAt !== -1) {
    const leftRef = fieldRef(from.slice(0, 1));
    const typeWord = from[1];
    const rightToken = from[joinAt + 1];
    if (!leftRef || !isIdentifier(rightToken)) {
      throw lineageError(`Unsupported join in stage '${name}'`, name);
    }
    const right = identifierName(rightToken);
    const type = typeWord && isWord(typeWord, 'CROSS') ? 'cross' : JOIN_TYPES[typeWord?.text.toUpperCase() ?? ''] ?? 'inner';
    const onAt = from.findIndex((t) => isWord(t, 'ON'));
    const keys = onAt === -1 ? [] : parseJoinKeys(from.slice(onAt + 1), leftRef.field, right, name);
    const join: LineageJoin = { type, left: toNodeKey(leftRef.field), right: toNodeKey(right), keys };
    return { kind: aggregated ? 'aggregation' : 'join', inputs: [join.left, join.right], join };
  }

  const ref = fieldRef(from);
  if (!ref) {
    throw lineageError(`Unsupported FROM clause in stage '${name}': ${textOf(sql, from)}`, name);
  }
  const target = toNodeKey(ref.field);
  // A stage named after its own table reads that table.
  if (ref.qualifier !== undefined || target === toNodeKey(name) || !stageKeys.has(target)) {
    return {
      kind: 'table',
      inputs: [],
      table: ref.qualifier === undefined ? { name: ref.field } : { schema: ref.qualifier, name: ref.field },
    };
  }
  return { kind: aggregated ? 'aggregation' : 'projection', inputs: [target] };
}

function parseStage(sql: string, name: string, tokens: readonly Token[], stageKeys: ReadonlySet<NodeKey>): LineageStage {
  const key = toNodeKey(name);
  const branches = splitTopLevel(tokens, (t) => isWord(t, 'UNION', 'ALL'));

  if (branches.length > 1) {
    const parsed = branches.map((b) => {
      const parts = splitSelect(sql, b, name);
      const source = parseSource(sql, name, parts, stageKeys);
      const [input] = source.inputs;
      if (input === undefined) {
        throw lineageError(`Union branch of stage '${name}' must read from a stage`, name);
      }
      return { input, columns: parts.columns };
    });
    return {
      key,
      name,
      kind: 'union',
      columns: parsed[0]?.columns ?? [],
      inputs: parsed.map((b) => b.input),
      branches: parsed,
      groupBy: [],
    };
  }

  const parts = splitSelect(sql, tokens, name);

  // Calculated columns over grouped rows: SELECT ... FROM ( inner ) AS alias
  const [open] = parts.from;
  if (isSymbol(open, '(')) {
    const close = matchingParen(parts.from, 0);
    const inner = parseStage(sql, name, parts.from.slice(1, close), stageKeys);
    const columns = parts.columns.map((col) => {
      const origin = col.kind === 'real' ? inner.columns.find((c) => c.name.toLowerCase() === col.source?.field.toLowerCase()) : undefined;
      return origin ? { ...origin, name: col.name, text: col.text } : col;
    });
    return { ...inner, columns, ...(parts.where === undefined ? {} : { where: parts.where }) };
  }

  return {
    key,
    name,
    columns: parts.columns,
    groupBy: parts.groupBy,
    ...parseSource(sql, name, parts, stageKeys),
    ...(parts.where === undefined ? {} : { where: parts.where }),
  };
}

// ── Public API ───────────────────────────────────────────────────────

/**
 * Re-read rendered SQL into stages. Stage identity is case-insensitive;
 * a leading CREATE VIEW or DROP VIEW statement is skipped.
 */
export function parseLineage(sql: string): ParsedSql {
  const { tokens, unterminated } = scanSql(sql);
  if (unterminated) {
    throw lineageError(`Unterminated ${unterminated.kind} on line ${unterminated.line}`);
  }

  const ctes = readCtes(tokens);
  if (ctes.length === 0) {
    throw lineageError('SQL has no WITH stages');
  }

  const stageKeys = new Set(ctes.map((c) => toNodeKey(c.name)));
  const seen = new Set<NodeKey>();
  const stages = ctes.map((cte) => {
    const stage = parseStage(sql, cte.name, tokens.slice(cte.open + 1, cte.close), stageKeys);
    if (seen.has(stage.key)) {
      throw lineageError(`Stage '${cte.name}' is defined more than once`, cte.name);
    }
    seen.add(stage.key);
    return stage;
  });

  const last = ctes[ctes.length - 1];
  const tail = tokens.slice((last?.close ?? 0) + 1);
  const end = tail.findIndex((t) => isSymbol(t, ';'));
  const finalTokens = end === -1 ? tail : tail.slice(0, end);
  const final = splitSelect(sql, finalTokens, 'final SELECT');
  const ref = fieldRef(final.from);
  if (!ref || !seen.has(toNodeKey(ref.field))) {
    throw lineageError(`Final SELECT must read from a stage: ${textOf(sql, final.from)}`);
  }

  return {
    stages,
    output: toNodeKey(ref.field),
    outputColumns: final.columns.map((c) => c.name),
  };
}
