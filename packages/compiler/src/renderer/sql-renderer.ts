import type { Catalog, DialectProfile } from '../catalog/catalog.js';
import { instantiate } from '../catalog/template.js';
import type { ConversionOptions } from '../core/config.js';
import {
  TypeFamily,
  formatType,
  isCompatible,
  isNumeric,
  describeType,
  type SqlType,
} from '../core/data-types.js';
import {
  NULL_LITERAL,
  and,
  binary,
  call,
  column,
  isComparison,
  numberLiteral,
  stringLiteral,
  type Expression,
} from '../core/expression.js';
import { printExpression, quoteIdentifier, quoteString } from '../core/expression-printer.js';
import { RenderError, type TranslationWarning } from '../core/errors.js';
import { ScenarioGraph } from '../core/scenario-graph.js';
import { mapExpression } from '../core/tree-utils.js';
import {
  findColumn,
  type AggregationNode,
  type CalculatedColumn,
  type Column,
  type JoinNode,
  type JoinType,
  type RealColumn,
  type NodeKey,
  type ProjectionNode,
  type Scenario,
  type TableNode,
  type UnionNode,
  type ViewNode,
} from '../core/types.js';
import { translateExpression } from '../translator/function-translator.js';
import { dottedName, fillViewTemplate, qualifiedName, sanitizeIdentifier } from './naming.js';

// ── Result types ─────────────────────────────────────────────────────

export interface StageColumn {
  readonly name: string;
  readonly type: string;
  readonly hidden: boolean;
}

export interface RenderedStage {
  readonly key: NodeKey;
  readonly name: string;
  readonly kind: ViewNode['kind'];
  readonly columns: readonly StageColumn[];
  readonly sql: string;
}

export interface RenderResult {
  /** Complete output, including view DDL when requested. */
  readonly sql: string;
  /** The WITH query alone. */
  readonly query: string;
  readonly stages: readonly RenderedStage[];
  readonly warnings: readonly TranslationWarning[];
}

export type RenderOptions = Pick<
  ConversionOptions,
  | 'dialect'
  | 'schemaOverrides'
  | 'targetSchema'
  | 'defaultViewSchema'
  | 'client'
  | 'language'
  | 'parameters'
  | 'currency'
  | 'createView'
  | 'viewName'
>;

// ── Scopes ───────────────────────────────────────────────────────────
//
// A scope answers what an unqualified column name means inside one
// stage body, and what type it carries.

interface Scope {
  resolve(name: string): Expression | undefined;
  typeOf(name: string): SqlType | undefined;
}

const JOIN_KEYWORDS: Readonly<Record<JoinType, string>> = {
  inner: 'INNER JOIN',
  left: 'LEFT OUTER JOIN',
  right: 'RIGHT OUTER JOIN',
  full: 'FULL OUTER JOIN',
};

const GROUPED = 'grouped';

function indent(text: string, spaces: number): string {
  const pad = ' '.repeat(spaces);
  return text
    .split('\n')
    .map((line) => (line === '' ? line : pad + line))
    .join('\n');
}

function selectList(items: readonly string[]): string {
  return `SELECT\n${items.map((item, i) => `  ${item}${i < items.length - 1 ? ',' : ''}`).join('\n')}`;
}

function aliased(expr: string, name: string, field?: string): string {
  return field === name ? expr : `${expr} AS ${quoteIdentifier(name)}`;
}

// ── Renderer ─────────────────────────────────────────────────────────

class ScenarioRenderer {
  readonly warnings: TranslationWarning[] = [];
  private readonly profile: DialectProfile;
  private readonly nodes: ReadonlyMap<NodeKey, ViewNode>;
  private readonly stageNames = new Map<NodeKey, string>();
  private readonly symbols: ReadonlyMap<string, string>;

  constructor(
    private readonly scenario: Scenario,
    private readonly catalog: Catalog,
    private readonly options: RenderOptions,
  ) {
    this.profile = catalog.getDialect(options.dialect);
    this.nodes = new Map(scenario.nodes.map((n) => [n.key, n]));

    const symbols = new Map<string, string>();
    const { udf, ratesTable, schema } = options.currency;
    if (udf) symbols.set('currencyUdf', dottedName(schema, udf));
    if (ratesTable) symbols.set('currencyRatesTable', dottedName(schema, ratesTable));
    this.symbols = symbols;
  }

  render(): RenderResult {
    const graph = ScenarioGraph.fromNodes(this.scenario.nodes);
    const ordered = graph.topologicalSort();

    const taken = new Map<string, string>();
    for (const node of ordered) {
      const name = sanitizeIdentifier(node.name);
      const clash = taken.get(name.toLowerCase());
      if (clash !== undefined) {
        throw new RenderError(`Nodes '${clash}' and '${node.name}' both render as stage '${name}'`, { node: node.name });
      }
      taken.set(name.toLowerCase(), node.name);
      this.stageNames.set(node.key, name);
    }

    const stages = ordered.map((node) => this.renderStage(node));

    const output = this.node(this.scenario.output);
    const visible = output.columns.filter((c) => !c.hidden).map((c) => quoteIdentifier(c.name));
    const ctes = stages.map((s) => `  ${s.name} AS (\n${indent(s.sql, 4)}\n  )`).join(',\n');
    const query = `WITH\n${ctes}\n${selectList(visible)}\nFROM ${this.stage(output.key)}`;

    return { sql: this.options.createView ? this.wrapView(query) : query, query, stages, warnings: this.warnings };
  }

  // ── Helpers ────────────────────────────────────────────────────

  private node(key: NodeKey): ViewNode {
    const node = this.nodes.get(key);
    if (!node) {
      throw new RenderError(`Unknown node '${key}'`);
    }
    return node;
  }

  private stage(key: NodeKey): string {
    const name = this.stageNames.get(key);
    if (name === undefined) {
      throw new RenderError(`Node '${key}' has no rendered stage`);
    }
    return name;
  }

  private ref(node: NodeKey, field: string): Expression {
    return column(field, this.stage(node));
  }

  private inputScope(inputs: readonly NodeKey[]): Scope {
    return {
      resolve: (name) => {
        for (const key of inputs) {
          if (findColumn(this.node(key), name)) return this.ref(key, name);
        }
        return undefined;
      },
      typeOf: (name) => {
        for (const key of inputs) {
          const col = findColumn(this.node(key), name);
          if (col) return col.type;
        }
        return undefined;
      },
    };
  }

  /**
   * Own columns first, then input columns. Real columns resolve through
   * `realRef`; calculated columns are inlined.
   */
  private nodeScope(node: ViewNode, realRef: (col: RealColumn) => Expression, fallback?: Scope): Scope {
    const compiled = new Map<string, Expression>();
    const pending = new Set<string>();

    const scope: Scope = {
      resolve: (name) => {
        const col = findColumn(node, name);
        if (!col) return fallback?.resolve(name);
        if (col.kind === 'real') return realRef(col);

        const done = compiled.get(name);
        if (done) return done;
        if (pending.has(name)) {
          throw new RenderError(`Calculated column '${name}' references itself`, { node: node.name, column: name });
        }
        pending.add(name);
        const expr = this.compile(col.expression, scope, node, name);
        pending.delete(name);
        compiled.set(name, expr);
        return expr;
      },
      typeOf: (name) => findColumn(node, name)?.type ?? fallback?.typeOf(name),
    };
    return scope;
  }

  // ── Expression compilation ─────────────────────────────────────

  private compile(expr: Expression, scope: Scope, node: ViewNode, columnName?: string): Expression {
    const context = columnName === undefined ? { node: node.name } : { node: node.name, column: columnName };
    const bound = this.bindParameters(expr, node, columnName);
    const coerced = this.coerceDates(bound, scope);

    const { expression, warnings } = translateExpression(coerced, {
      dialect: this.profile.name,
      catalog: this.catalog,
      symbols: this.symbols,
      columnType: (ref) => (ref.qualifier === undefined ? scope.typeOf(ref.name) : undefined),
      context,
    });
    this.warnings.push(...warnings);

    return mapExpression(expression, (n) => {
      if (n.kind !== 'column' || n.qualifier !== undefined) return n;
      const resolved = scope.resolve(n.name);
      if (!resolved) {
        throw new RenderError(`Column '${n.name}' is not visible at node '${node.name}'`, context);
      }
      return resolved;
    });
  }

  private parameterValue(name: string): string | undefined {
    const supplied = this.options.parameters[name];
    if (supplied !== undefined) return supplied;

    const declared = this.scenario.parameters.find((p) => p.name.toLowerCase() === name.toLowerCase());
    if (declared?.defaultValue !== undefined) return declared.defaultValue;

    switch (name.toLowerCase()) {
      case 'client':
        return this.options.client ?? this.scenario.defaultClient;
      case 'language':
        return this.options.language ?? this.scenario.defaultLanguage;
      default:
        return undefined;
    }
  }

  private bindParameters(expr: Expression, node: ViewNode, columnName?: string): Expression {
    return mapExpression(expr, (n) => {
      if (n.kind !== 'parameter') return n;
      const value = this.parameterValue(n.name);
      if (value === undefined) {
        throw new RenderError(`No value for input parameter '$$${n.name}$$'`, {
          node: node.name,
          ...(columnName === undefined ? {} : { column: columnName }),
        });
      }
      return !n.quoted && /^-?\d+(\.\d+)?$/.test(value) ? numberLiteral(value) : stringLiteral(value);
    });
  }

  /** Comparisons of a date column with a string literal cast the literal. */
  private coerceDates(expr: Expression, scope: Scope): Expression {
    const isTemporal = (e: Expression): boolean => {
      if (e.kind !== 'column' || e.qualifier !== undefined) return false;
      const family = scope.typeOf(e.name)?.family;
      return family === TypeFamily.DATE || family === TypeFamily.TIMESTAMP;
    };
    const isText = (e: Expression): boolean => e.kind === 'literal' && e.type === 'string';
    const cast = (e: Expression): Expression => instantiate(this.profile.dateCast, { args: [e] });

    return mapExpression(expr, (n) => {
      if (n.kind !== 'binary' || !isComparison(n.operator) || n.operator === 'LIKE') return n;
      if (isTemporal(n.left) && isText(n.right)) return { ...n, right: cast(n.right) };
      if (isTemporal(n.right) && isText(n.left)) return { ...n, left: cast(n.left) };
      return n;
    });
  }

  private where(node: ViewNode, scope: Scope): string | undefined {
    if (node.filters.length === 0) return undefined;
    const predicates = node.filters.map((f) => this.compile(f.expression, scope, node));
    return `WHERE ${printExpression(and(...predicates))}`;
  }

  private defaultTypeWarnings(node: ViewNode): void {
    for (const col of node.columns) {
      if (col.kind === 'calculated' && col.typeOrigin === 'default') {
        this.warnings.push({
          code: 'DEFAULT_TYPE',
          message: `Type of calculated column '${col.name}' could not be inferred; using ${this.profile.opaqueType}`,
          node: node.name,
          column: col.name,
        });
      }
    }
  }

  // ── Stages ─────────────────────────────────────────────────────

  private renderStage(node: ViewNode): RenderedStage {
    this.defaultTypeWarnings(node);

    return {
      key: node.key,
      name: this.stage(node.key),
      kind: node.kind,
      columns: node.columns.map((c) => ({
        name: c.name,
        type: formatType(c.type, this.profile.typeNames),
        hidden: c.hidden,
      })),
      sql: this.stageBody(node),
    };
  }

  private stageBody(node: ViewNode): string {
    switch (node.kind) {
      case 'table':
        return this.renderTable(node);
      case 'projection':
        return this.renderProjection(node);
      case 'join':
        return this.renderJoin(node);
      case 'aggregation':
        return this.renderAggregation(node);
      case 'union':
        return this.renderUnion(node);
    }
  }

  /** Real columns read their source field from the input stage. */
  private sourceRef = (col: RealColumn): Expression => this.ref(col.source.node, col.source.field);

  private tableReference(node: TableNode): string {
    if (node.sourceType === 'view') {
      return qualifiedName(this.options.defaultViewSchema, node.object);
    }
    const schema = this.options.targetSchema ?? this.options.schemaOverrides[node.schema] ?? node.schema;
    return qualifiedName(schema || undefined, node.object);
  }

  private renderTable(node: TableNode): string {
    const items = node.columns.length > 0 ? node.columns.map((c) => quoteIdentifier(c.name)) : ['*'];
    return `${selectList(items)}\nFROM ${this.tableReference(node)}`;
  }

  private renderProjection(node: ProjectionNode): string {
    const [input] = node.inputs;
    if (input === undefined) {
      throw new RenderError(`Projection node '${node.name}' has no input`, { node: node.name });
    }
    const scope = this.nodeScope(node, this.sourceRef, this.inputScope(node.inputs));
    const items = node.columns.map((col) => this.selectItem(node, col, scope));
    const where = this.where(node, scope);
    return [selectList(items), `FROM ${this.stage(input)}`, where].filter((s) => s !== undefined).join('\n');
  }

  private selectItem(node: ViewNode, col: Column, scope: Scope): string {
    if (col.kind === 'real') {
      return aliased(printExpression(this.ref(col.source.node, col.source.field)), col.name, col.source.field);
    }
    const expr = scope.resolve(col.name);
    if (!expr) {
      throw new RenderError(`Calculated column '${col.name}' did not resolve`, { node: node.name, column: col.name });
    }
    return aliased(printExpression(expr), col.name);
  }

  private renderJoin(node: JoinNode): string {
    const { join } = node;
    const left = this.stage(join.left);
    const right = this.stage(join.right);

    let on: string;
    if (join.keys.length === 0) {
      on = '1 = 1';
      this.warnings.push({
        code: 'CARTESIAN_JOIN',
        message: `Join node '${node.name}' has no join attributes; every row pairs with every row`,
        node: node.name,
      });
    } else {
      on = join.keys
        .map((k) => printExpression(binary('=', this.ref(join.left, k.left), this.ref(join.right, k.right))))
        .join(' AND ');
    }

    const scope = this.nodeScope(node, this.sourceRef, this.inputScope([join.left, join.right]));
    const items = node.columns.map((col) => this.selectItem(node, col, scope));
    const where = this.where(node, scope);
    return [selectList(items), `FROM ${left}`, `${JOIN_KEYWORDS[join.type]} ${right} ON ${on}`, where]
      .filter((s) => s !== undefined)
      .join('\n');
  }

  private renderAggregation(node: AggregationNode): string {
    const [input] = node.inputs;
    if (input === undefined) {
      throw new RenderError(`Aggregation node '${node.name}' has no input`, { node: node.name });
    }
    const inputNode = this.node(input);
    const inputScope = this.inputScope(node.inputs);
    const rowScope = this.nodeScope(node, this.sourceRef, inputScope);

    const items: string[] = [];
    for (const col of node.columns) {
      if (col.kind !== 'real') continue;
      const ref: Expression = this.ref(col.source.node, col.source.field);
      if (col.aggregation === undefined) {
        items.push(aliased(printExpression(ref), col.name, col.source.field));
        continue;
      }
      const sourceType = findColumn(inputNode, col.source.field)?.type;
      const needsCast = this.profile.numericAggregates.has(col.aggregation) && sourceType !== undefined && !isNumeric(sourceType);
      const argument = needsCast ? instantiate(this.profile.numericCast, { args: [ref] }) : ref;
      items.push(`${printExpression(call(col.aggregation, argument))} AS ${quoteIdentifier(col.name)}`);
    }

    const groupBy = node.groupBy.map((name) => {
      const col = findColumn(node, name);
      if (col?.kind !== 'real' || col.aggregation !== undefined) {
        throw new RenderError(`Aggregation node '${node.name}' cannot group by '${name}'`, { node: node.name, column: name });
      }
      return printExpression(this.ref(col.source.node, col.source.field));
    });

    const where = this.where(node, rowScope);
    const grouped = [
      selectList(items),
      `FROM ${this.stage(input)}`,
      where,
      groupBy.length > 0 ? `GROUP BY ${groupBy.join(', ')}` : undefined,
    ]
      .filter((s) => s !== undefined)
      .join('\n');

    const calculated = node.columns.filter((c): c is CalculatedColumn => c.kind === 'calculated');
    if (calculated.length === 0) return grouped;

    const groupedScope = this.nodeScope(node, (col) => column(col.name, GROUPED));
    const outer = node.columns.map((col) =>
      col.kind === 'real' ? `${GROUPED}.${quoteIdentifier(col.name)}` : this.selectItem(node, col, groupedScope),
    );
    return `${selectList(outer)}\nFROM (\n${indent(grouped, 2)}\n) AS ${GROUPED}`;
  }

  private renderUnion(node: UnionNode): string {
    if (node.branches.length === 0) {
      throw new RenderError(`Union node '${node.name}' has no branches`, { node: node.name });
    }

    for (const branch of node.branches) {
      if (branch.values.length !== node.columns.length) {
        throw new RenderError(
          `Union branch '${this.node(branch.input).name}' supplies ${branch.values.length} column(s), expected ${node.columns.length}`,
          { node: node.name },
        );
      }
    }

    node.columns.forEach((col, position) => {
      let first: { readonly type: SqlType; readonly branch: string } | undefined;
      for (const branch of node.branches) {
        const value = branch.values[position];
        if (value?.kind !== 'field') continue;
        const input = this.node(branch.input);
        const type = findColumn(input, value.field)?.type;
        if (!type) continue;
        if (!first) {
          first = { type, branch: input.name };
        } else if (!isCompatible(first.type, type)) {
          throw new RenderError(
            `Union column '${col.name}' mixes ${describeType(first.type)} from '${first.branch}' with ${describeType(type)} from '${input.name}'`,
            { node: node.name, column: col.name },
          );
        }
      }
    });

    const branches = node.branches.map((branch) => {
      const valueOf = (name: string): Expression | undefined => {
        const position = node.columns.findIndex((c) => c.name === name);
        const value = branch.values[position];
        if (!value) return undefined;
        if (value.kind === 'field') return this.ref(branch.input, value.field);
        return value.value === null ? NULL_LITERAL : stringLiteral(value.value);
      };
      const scope: Scope = {
        resolve: valueOf,
        typeOf: (name) => findColumn(node, name)?.type,
      };

      const items = node.columns.map((col, position) => {
        const value = branch.values[position];
        if (value?.kind === 'field') {
          return aliased(printExpression(this.ref(branch.input, value.field)), col.name, value.field);
        }
        if (!value || value.value === null) {
          return `CAST(NULL AS ${formatType(col.type, this.profile.typeNames)}) AS ${quoteIdentifier(col.name)}`;
        }
        return `${quoteString(value.value)} AS ${quoteIdentifier(col.name)}`;
      });

      const where = this.where(node, scope);
      return [selectList(items), `FROM ${this.stage(branch.input)}`, where].filter((s) => s !== undefined).join('\n');
    });

    return branches.join('\nUNION ALL\n');
  }

  // ── DDL ────────────────────────────────────────────────────────

  private wrapView(query: string): string {
    const name = sanitizeIdentifier(this.options.viewName ?? this.scenario.id);
    if (name === '') {
      throw new RenderError('Cannot create a view without a view name or scenario id');
    }
    const view = qualifiedName(this.options.targetSchema, name);
    const parts: string[] = [];
    if (this.profile.dropView) {
      parts.push(`${fillViewTemplate(this.profile.dropView, view)};`);
    }
    parts.push(`${fillViewTemplate(this.profile.createView, view)}\n${query};`);
    return parts.join('\n');
  }
}

// ── Public API ───────────────────────────────────────────────────────

/**
 * Render a scenario as one WITH query: a stage per node in dependency
 * order, then a SELECT over the output node.
 */
export function renderScenario(scenario: Scenario, catalog: Catalog, options: RenderOptions): RenderResult {
  return new ScenarioRenderer(scenario, catalog, options).render();
}
