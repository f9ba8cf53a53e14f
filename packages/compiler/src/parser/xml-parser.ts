import {
  SqlTypes,
  declaredType,
  inferTypeFromName,
  isNumeric,
  type SqlType,
} from '../core/data-types.js';
import {
  NULL_LITERAL,
  and,
  binary,
  column,
  not,
  numberLiteral,
  stringLiteral,
  type BinaryOperator,
  type Expression,
} from '../core/expression.js';
import { ParseError } from '../core/errors.js';
import { parseFormula } from '../core/formula-parser.js';
import { ScenarioGraph } from '../core/scenario-graph.js';
import { referencedColumns } from '../core/tree-utils.js';
import {
  findColumn,
  toNodeKey,
  aggregatedType,
  traceColumn,
  type AggregationFunction,
  type CalculatedColumn,
  type Column,
  type Filter,
  type InputParameter,
  type Join,
  type JoinType,
  type NodeKey,
  type RealColumn,
  type Scenario,
  type UnionBranch,
  type UnionValue,
  type ViewNode,
} from '../core/types.js';
import { inferExpressionType } from './type-inference.js';
import {
  attr,
  child,
  children,
  descendants,
  flag,
  intAttr,
  readXmlDocument,
  text,
  type XmlElement,
} from './xml-document.js';

// ── Declarations ─────────────────────────────────────────────────────

type ViewType = 'projection' | 'join' | 'aggregation' | 'union';

type MappingDecl =
  | { readonly kind: 'field'; readonly target: string; readonly source: string }
  | { readonly kind: 'constant'; readonly target: string; readonly value: string | null };

interface InputDecl {
  readonly node: NodeKey;
  readonly ref: string;
  readonly mappings: readonly MappingDecl[];
}

interface SourceDecl {
  readonly kind: 'source';
  readonly key: NodeKey;
  readonly name: string;
  readonly inputs: readonly NodeKey[];
  readonly sourceType: 'table' | 'view';
  readonly schema: string;
  readonly object: string;
}

interface ViewDecl {
  readonly kind: 'view';
  readonly key: NodeKey;
  readonly name: string;
  readonly inputs: readonly NodeKey[];
  readonly viewType: ViewType;
  readonly element: XmlElement;
  readonly inputDecls: readonly InputDecl[];
}

type Declaration = SourceDecl | ViewDecl;

const JOIN_TYPES: ReadonlyMap<string, JoinType> = new Map<string, JoinType>([
  ['inner', 'inner'],
  ['referential', 'inner'],
  ['texttable', 'left'],
  ['leftouter', 'left'],
  ['rightouter', 'right'],
  ['fullouter', 'full'],
]);

const FILTER_OPERATORS: ReadonlyMap<string, BinaryOperator> = new Map<string, BinaryOperator>([
  ['EQ', '='],
  ['NE', '<>'],
  ['GT', '>'],
  ['GE', '>='],
  ['LT', '<'],
  ['LE', '<='],
  ['LIKE', 'LIKE'],
  ['CP', 'LIKE'],
]);

const INTERNAL_FOLDERS = /\/(calculationviews|analyticviews|attributeviews)\//g;

/** `#/0/Join_1`, `#//Join_1`, `#Join_1` → `Join_1`. */
export function cleanRef(ref: string): string {
  const value = ref.trim();
  if (value.startsWith('#//')) return value.slice(3);
  if (value.startsWith('#/')) {
    const slash = value.indexOf('/', 2);
    return slash > 0 ? value.slice(slash + 1) : value.slice(2);
  }
  return value.startsWith('#') ? value.slice(1) : value;
}

function requireAttr(element: XmlElement, name: string, where: string): string {
  const value = attr(element, name);
  if (value === undefined || value.trim() === '') {
    throw new ParseError(`${where} is missing the '${name}' attribute`);
  }
  return value;
}

function viewTypeOf(element: XmlElement, id: string): ViewType {
  const type = attr(element, 'type') ?? '';
  if (type.endsWith('ProjectionView')) return 'projection';
  if (type.endsWith('JoinView')) return 'join';
  if (type.endsWith('AggregationView')) return 'aggregation';
  if (type.endsWith('UnionView')) return 'union';
  throw new ParseError(`Unsupported calculation view type '${type || 'none'}'`, { node: id });
}

function readSource(element: XmlElement): SourceDecl {
  const id = requireAttr(element, 'id', 'DataSource');
  const type = (attr(element, 'type') ?? 'DATA_BASE_TABLE').toUpperCase();

  if (type === 'CALCULATION_VIEW') {
    const uri = text(child(element, 'resourceUri') ?? {});
    if (uri === '') {
      throw new ParseError(`Data source '${id}' has no resourceUri`, { node: id });
    }
    const object = uri.replace(INTERNAL_FOLDERS, '/').replace(/^\//, '');
    return { kind: 'source', key: toNodeKey(id), name: id, inputs: [], sourceType: 'view', schema: '', object };
  }

  const columnObject = child(element, 'columnObject');
  if (!columnObject) {
    throw new ParseError(`Data source '${id}' has no columnObject`, { node: id });
  }
  return {
    kind: 'source',
    key: toNodeKey(id),
    name: id,
    inputs: [],
    sourceType: type === 'DATA_BASE_TABLE' ? 'table' : 'view',
    schema: attr(columnObject, 'schemaName') ?? '',
    object: requireAttr(columnObject, 'columnObjectName', `Data source '${id}' columnObject`),
  };
}

function readMappings(input: XmlElement, where: string): MappingDecl[] {
  return children(input, 'mapping').map((mapping): MappingDecl => {
    const target = attr(mapping, 'target') ?? attr(mapping, 'targetName');
    if (target === undefined) {
      throw new ParseError(`${where}: mapping without a target`);
    }
    if ((attr(mapping, 'type') ?? '').endsWith('ConstantAttributeMapping')) {
      return { kind: 'constant', target, value: flag(mapping, 'null') ? null : attr(mapping, 'value') ?? null };
    }
    const source = attr(mapping, 'source') ?? attr(mapping, 'sourceName');
    if (source === undefined) {
      throw new ParseError(`${where}: mapping '${target}' has no source`);
    }
    return { kind: 'field', target, source };
  });
}

function readView(element: XmlElement): ViewDecl {
  const id = requireAttr(element, 'id', 'calculationView');
  const viewType = viewTypeOf(element, id);

  const inputDecls = children(element, 'input').map((input) => {
    const ref = attr(input, 'node') ?? text(child(input, 'viewNode') ?? child(input, 'dataSource') ?? {});
    if (ref === '') {
      throw new ParseError(`Node '${id}' has an input without a node reference`, { node: id });
    }
    const name = cleanRef(ref);
    return { node: toNodeKey(name), ref: name, mappings: readMappings(input, `Node '${id}'`) };
  });

  return {
    kind: 'view',
    key: toNodeKey(id),
    name: id,
    inputs: inputDecls.map((i) => i.node),
    viewType,
    element,
    inputDecls,
  };
}

// ── Scenario builder ─────────────────────────────────────────────────

class ScenarioBuilder {
  private readonly built = new Map<NodeKey, ViewNode>();
  private readonly declarations = new Map<NodeKey, Declaration>();
  private readonly tableFields = new Map<NodeKey, Map<string, SqlType>>();

  constructor(private readonly root: XmlElement) {}

  build(): Scenario {
    const sources = descendants(this.root, 'dataSources', 'DataSource').map(readSource);
    const views = descendants(this.root, 'calculationViews', 'calculationView').map(readView);

    for (const decl of [...sources, ...views]) {
      const existing = this.declarations.get(decl.key);
      if (existing) {
        throw new ParseError(`Duplicate node name '${decl.name}' (already declared as '${existing.name}')`, {
          node: decl.name,
        });
      }
      this.declarations.set(decl.key, decl);
    }

    for (const view of views) {
      for (const input of view.inputDecls) {
        if (!this.declarations.has(input.node)) {
          throw new ParseError(`Node '${view.name}' references undefined node '${input.ref}'`, { node: view.name });
        }
      }
    }

    const graph = ScenarioGraph.fromNodes([...this.declarations.values()]);
    const cycle = graph.detectCycle();
    if (cycle) {
      throw new ParseError(`Cycle detected in view graph: ${cycle.join(' -> ')}`);
    }

    this.collectTableFields(views);

    for (const decl of graph.topologicalSort()) {
      const node = decl.kind === 'source' ? this.buildTable(decl) : this.buildView(decl);
      this.built.set(node.key, node);
    }

    const nodes = [...this.declarations.keys()].map((key) => this.node(key));
    return {
      id: attr(this.root, 'id') ?? '',
      description: attr(child(this.root, 'descriptions') ?? {}, 'defaultDescription'),
      defaultClient: attr(this.root, 'defaultClient'),
      defaultLanguage: attr(this.root, 'defaultLanguage'),
      nodes,
      parameters: this.readParameters(),
      output: this.resolveOutput(graph),
    };
  }

  // ── Lookups ────────────────────────────────────────────────────

  private node(key: NodeKey): ViewNode {
    const node = this.built.get(key);
    if (!node) {
      throw new ParseError(`Node '${key}' is referenced before it is defined`);
    }
    return node;
  }

  private attributeElements(element: XmlElement): XmlElement[] {
    return descendants(element, 'viewAttributes', 'viewAttribute');
  }

  /** Datatype declared on an attribute, if any. */
  private declared(element: XmlElement): SqlType | undefined {
    const datatype = attr(element, 'datatype');
    return datatype === undefined ? undefined : declaredType(datatype, intAttr(element, 'length'), intAttr(element, 'scale'));
  }

  // ── Tables ─────────────────────────────────────────────────────

  /**
   * Table columns are not declared in the view XML; they are the fields
   * consumers map or join on.
   */
  private collectTableFields(views: readonly ViewDecl[]): void {
    const add = (table: NodeKey, field: string, type: SqlType | undefined): void => {
      let fields = this.tableFields.get(table);
      if (!fields) {
        fields = new Map();
        this.tableFields.set(table, fields);
      }
      if (!fields.has(field)) fields.set(field, type ?? inferTypeFromName(field));
    };

    for (const view of views) {
      const attributes = new Map(
        this.attributeElements(view.element).map((a) => [attr(a, 'id') ?? '', a] as const),
      );
      for (const input of view.inputDecls) {
        if (this.declarations.get(input.node)?.kind !== 'source') continue;
        for (const mapping of input.mappings) {
          if (mapping.kind !== 'field') continue;
          const attribute = attributes.get(mapping.target);
          add(input.node, mapping.source, attribute && this.declared(attribute));
        }
        if (view.viewType === 'join') {
          for (const name of this.joinAttributeNames(view.element)) {
            const mapped = input.mappings.some((m) => m.kind === 'field' && m.target === name);
            if (!mapped) add(input.node, name, undefined);
          }
        }
      }
    }
  }

  private buildTable(decl: SourceDecl): ViewNode {
    const fields = this.tableFields.get(decl.key) ?? new Map<string, SqlType>();
    const columns = [...fields].map(([field, type]): RealColumn => ({
      kind: 'real',
      name: field,
      source: { node: decl.key, field },
      type,
      hidden: false,
    }));
    return {
      kind: 'table',
      key: decl.key,
      name: decl.name,
      columns,
      inputs: [],
      filters: [],
      sourceType: decl.sourceType,
      schema: decl.schema,
      object: decl.object,
    };
  }

  // ── Calculation views ──────────────────────────────────────────

  private buildView(decl: ViewDecl): ViewNode {
    const inputs = decl.inputDecls.map((i) => this.node(i.node));
    const viewType = decl.viewType;

    if (viewType === 'union') {
      return this.buildUnion(decl, inputs);
    }

    if (viewType === 'join') {
      if (inputs.length !== 2) {
        throw new ParseError(`Join node '${decl.name}' expects exactly two inputs, found ${inputs.length}`, {
          node: decl.name,
        });
      }
    } else if (inputs.length !== 1) {
      throw new ParseError(
        `${viewType === 'projection' ? 'Projection' : 'Aggregation'} node '${decl.name}' expects exactly one input, found ${inputs.length}`,
        { node: decl.name },
      );
    }

    const columns: Column[] = this.attributeElements(decl.element).map((element) =>
      this.buildAttribute(decl, inputs, element),
    );
    const calculatedScope = viewType === 'aggregation' ? [] : inputs;
    columns.push(...this.buildCalculated(decl, columns, calculatedScope));

    const filters = this.buildFilters(decl, columns, inputs);
    const base = {
      key: decl.key,
      name: decl.name,
      columns,
      inputs: inputs.map((i) => i.key),
      filters,
    };

    switch (viewType) {
      case 'projection':
        return { kind: 'projection', ...base };
      case 'aggregation':
        return {
          kind: 'aggregation',
          ...base,
          groupBy: columns.filter((c) => c.kind === 'real' && c.aggregation === undefined).map((c) => c.name),
        };
      case 'join':
        return { kind: 'join', ...base, join: this.buildJoin(decl, inputs) };
    }
  }

  private buildAttribute(decl: ViewDecl, inputs: readonly ViewNode[], element: XmlElement): Column {
    const id = requireAttr(element, 'id', `viewAttribute of node '${decl.name}'`);
    const context = { node: decl.name, column: id };
    const hidden = flag(element, 'hidden');
    const declared = this.declared(element);

    let origin: { readonly input: ViewNode; readonly field: string } | undefined;
    for (const [index, input] of decl.inputDecls.entries()) {
      const mapping = input.mappings.find((m) => m.target === id);
      const node = inputs[index];
      if (!mapping || !node) continue;
      if (mapping.kind === 'constant') {
        return this.constantColumn(id, mapping.value, declared, hidden);
      }
      origin = { input: node, field: mapping.source };
      break;
    }
    origin ??= inputs
      .filter((input) => findColumn(input, id) !== undefined)
      .map((input) => ({ input, field: id }))[0];

    if (!origin) {
      throw new ParseError(`Attribute '${id}' of node '${decl.name}' is not mapped from any input`, context);
    }

    const source = findColumn(origin.input, origin.field);
    if (!source) {
      throw new ParseError(
        `Mapping '${id}' of node '${decl.name}' references field '${origin.field}' that input '${origin.input.name}' does not expose`,
        context,
      );
    }

    const aggregationType = attr(element, 'aggregationType')?.toUpperCase();
    let aggregation: AggregationFunction | undefined;
    if (aggregationType !== undefined && decl.viewType === 'aggregation') {
      aggregation = toAggregation(aggregationType, context);
    }

    return {
      kind: 'real',
      name: id,
      source: { node: origin.input.key, field: origin.field },
      type: declared ?? aggregatedType(aggregation, source.type),
      ...(aggregation === undefined ? {} : { aggregation }),
      hidden,
    };
  }

  private constantColumn(name: string, value: string | null, declared: SqlType | undefined, hidden: boolean): CalculatedColumn {
    const expression = value === null ? NULL_LITERAL : stringLiteral(value);
    return {
      kind: 'calculated',
      name,
      expression,
      type: declared ?? SqlTypes.OPAQUE(),
      typeOrigin: declared ? 'declared' : 'default',
      hidden,
    };
  }

  private buildCalculated(decl: ViewDecl, columns: readonly Column[], inputs: readonly ViewNode[]): CalculatedColumn[] {
    const elements = descendants(decl.element, 'calculatedViewAttributes', 'calculatedViewAttribute');
    const names = new Set([
      ...columns.map((c) => c.name),
      ...elements.map((e) => attr(e, 'id') ?? ''),
      ...inputs.flatMap((i) => i.columns.map((c) => c.name)),
    ]);

    const result: CalculatedColumn[] = [];
    for (const element of elements) {
      const id = requireAttr(element, 'id', `calculatedViewAttribute of node '${decl.name}'`);
      const context = { node: decl.name, column: id };
      const formula = text(child(element, 'formula') ?? {});
      const expression = parseFormula(formula, { context });

      for (const name of referencedColumns(expression)) {
        if (!names.has(name)) {
          throw new ParseError(`Formula of '${id}' references column '${name}' that is not visible at node '${decl.name}'`, context);
        }
      }

      const declared = this.declared(element);
      const known = [...columns, ...result];
      const inferred = declared
        ? undefined
        : inferExpressionType(expression, (name) =>
            (known.find((c) => c.name === name) ?? inputs.map((i) => findColumn(i, name)).find((c) => c !== undefined))?.type,
          );

      result.push({
        kind: 'calculated',
        name: id,
        expression,
        type: declared ?? inferred ?? SqlTypes.OPAQUE(),
        typeOrigin: declared ? 'declared' : inferred ? 'inferred' : 'default',
        hidden: flag(element, 'hidden'),
      });
    }
    return result;
  }

  // ── Filters ────────────────────────────────────────────────────

  private buildFilters(decl: ViewDecl, columns: readonly Column[], inputs: readonly ViewNode[]): Filter[] {
    const filters: Filter[] = [];

    for (const element of this.attributeElements(decl.element)) {
      const filter = child(element, 'filter');
      const id = attr(element, 'id');
      if (!filter || id === undefined) continue;
      const type = columns.find((c) => c.name === id)?.type;
      filters.push({ expression: attributeFilter(id, filter, type, decl.name), origin: 'attribute' });
    }

    const visible = new Set([...columns.map((c) => c.name), ...inputs.flatMap((i) => i.columns.map((c) => c.name))]);
    for (const element of children(decl.element, 'filter')) {
      const source = text(element);
      if (source === '') continue;
      const expression = parseFormula(source, { context: { node: decl.name, construct: 'filter' } });
      for (const name of referencedColumns(expression)) {
        if (!visible.has(name)) {
          throw new ParseError(`Filter of node '${decl.name}' references column '${name}' that is not visible`, {
            node: decl.name,
            column: name,
          });
        }
      }
      filters.push({ expression, origin: 'formula' });
    }

    return filters;
  }

  // ── Joins ──────────────────────────────────────────────────────

  private joinAttributeNames(element: XmlElement): string[] {
    return children(element, 'joinAttribute')
      .map((a) => attr(a, 'name'))
      .filter((n): n is string => n !== undefined);
  }

  private buildJoin(decl: ViewDecl, inputs: readonly ViewNode[]): Join {
    const [left, right] = inputs;
    const [leftDecl, rightDecl] = decl.inputDecls;
    if (!left || !right || !leftDecl || !rightDecl) {
      throw new ParseError(`Join node '${decl.name}' expects exactly two inputs`, { node: decl.name });
    }
    if (left.key === right.key) {
      throw new ParseError(`Join node '${decl.name}' joins '${left.name}' with itself`, { node: decl.name });
    }

    const rawType = (attr(decl.element, 'joinType') ?? 'inner').toLowerCase();
    const type = JOIN_TYPES.get(rawType);
    if (!type) {
      throw new ParseError(`Unsupported join type '${rawType}'`, { node: decl.name });
    }

    const fieldFor = (input: InputDecl, node: ViewNode, name: string): string => {
      const mapping = input.mappings.find((m) => m.kind === 'field' && m.target === name);
      const field = mapping?.kind === 'field' ? mapping.source : name;
      if (!traceColumn(this.built, node.key, field)) {
        throw new ParseError(`Join attribute '${name}' is not exposed by input '${node.name}'`, {
          node: decl.name,
          column: name,
        });
      }
      return field;
    };

    const keys = this.joinAttributeNames(decl.element).map((name) => ({
      left: fieldFor(leftDecl, left, name),
      right: fieldFor(rightDecl, right, name),
    }));

    return { type, left: left.key, right: right.key, keys };
  }

  // ── Unions ─────────────────────────────────────────────────────

  private buildUnion(decl: ViewDecl, inputs: readonly ViewNode[]): ViewNode {
    if (inputs.length < 2) {
      throw new ParseError(`Union node '${decl.name}' expects at least two inputs, found ${inputs.length}`, {
        node: decl.name,
      });
    }

    const attributes = this.attributeElements(decl.element);
    const branches: UnionBranch[] = decl.inputDecls.map((input, index) => {
      const node = inputs[index];
      if (!node) throw new ParseError(`Union node '${decl.name}' lost input '${input.ref}'`, { node: decl.name });

      const values = attributes.map((element): UnionValue => {
        const id = attr(element, 'id') ?? '';
        const mapping = input.mappings.find((m) => m.target === id);
        if (mapping?.kind === 'constant') return { kind: 'constant', value: mapping.value };
        const field = mapping?.kind === 'field' ? mapping.source : findColumn(node, id) ? id : undefined;
        if (field === undefined) return { kind: 'constant', value: null };
        if (!findColumn(node, field)) {
          throw new ParseError(
            `Mapping '${id}' of node '${decl.name}' references field '${field}' that input '${node.name}' does not expose`,
            { node: decl.name, column: id },
          );
        }
        return { kind: 'field', field };
      });
      return { input: node.key, values };
    });

    const columns = attributes.map((element, position): Column => {
      const id = requireAttr(element, 'id', `viewAttribute of node '${decl.name}'`);
      const declared = this.declared(element);
      const hidden = flag(element, 'hidden');

      for (const [index, branch] of branches.entries()) {
        const value = branch.values[position];
        const node = inputs[index];
        if (value?.kind !== 'field' || !node) continue;
        const source = findColumn(node, value.field);
        return {
          kind: 'real',
          name: id,
          source: { node: node.key, field: value.field },
          type: declared ?? source?.type ?? SqlTypes.OPAQUE(),
          hidden,
        };
      }
      return this.constantColumn(id, null, declared, hidden);
    });

    return {
      kind: 'union',
      key: decl.key,
      name: decl.name,
      columns,
      inputs: inputs.map((i) => i.key),
      filters: this.buildFilters(decl, columns, []),
      branches,
    };
  }

  // ── Scenario level ─────────────────────────────────────────────

  private readParameters(): InputParameter[] {
    return descendants(this.root, 'localVariables', 'variable').map((element) => {
      const name = requireAttr(element, 'id', 'variable');
      const props = child(element, 'variableProperties') ?? {};
      const datatype = attr(props, 'datatype');
      const defaultValue = attr(props, 'defaultValue');
      return {
        name,
        type: datatype ? declaredType(datatype, intAttr(props, 'length'), intAttr(props, 'scale')) : SqlTypes.VARCHAR(),
        ...(defaultValue === undefined ? {} : { defaultValue }),
        mandatory: flag(props, 'mandatory'),
      };
    });
  }

  private resolveOutput(graph: ScenarioGraph<Declaration>): NodeKey {
    const logical = child(this.root, 'logicalModel');
    const id = logical ? attr(logical, 'id') : undefined;
    if (id !== undefined && id !== '') {
      const key = toNodeKey(cleanRef(id));
      if (!this.built.has(key)) {
        throw new ParseError(`Logical model references undefined node '${id}'`);
      }
      return key;
    }

    const terminal = graph.getTerminalNodes().filter((d) => d.kind === 'view');
    const last = terminal[terminal.length - 1] ?? graph.getTerminalNodes().at(-1);
    if (!last) {
      throw new ParseError('Scenario has no nodes');
    }
    return last.key;
  }
}

// ── Attribute filters ────────────────────────────────────────────────

function filterLiteral(value: string, type: SqlType | undefined): Expression {
  return type && isNumeric(type) && /^-?\d+(\.\d+)?$/.test(value) ? numberLiteral(value) : stringLiteral(value);
}

function attributeFilter(id: string, filter: XmlElement, type: SqlType | undefined, node: string): Expression {
  const target = column(id);
  const kind = attr(filter, 'type') ?? '';
  const including = attr(filter, 'including')?.toLowerCase() !== 'false';
  const context = { node, column: id, construct: 'filter' };

  if (kind.endsWith('ListValueFilter')) {
    const items = children(filter, 'operands')
      .map((o) => attr(o, 'value'))
      .filter((v): v is string => v !== undefined)
      .map((v) => filterLiteral(v, type));
    if (items.length === 0) {
      throw new ParseError(`List filter on '${id}' has no operands`, context);
    }
    return { kind: 'in', operand: target, items, negated: !including };
  }

  let expression: Expression;
  if (kind.endsWith('RangeValueFilter')) {
    const low = attr(filter, 'lowValue');
    const high = attr(filter, 'highValue');
    if (low === undefined || high === undefined) {
      throw new ParseError(`Range filter on '${id}' needs lowValue and highValue`, context);
    }
    expression = and(binary('>=', target, filterLiteral(low, type)), binary('<=', target, filterLiteral(high, type)));
  } else {
    const value = attr(filter, 'value');
    if (value === undefined) {
      throw new ParseError(`Filter on '${id}' has no value`, context);
    }
    const code = (attr(filter, 'operator') ?? 'EQ').toUpperCase();
    const operator = FILTER_OPERATORS.get(code);
    if (!operator) {
      throw new ParseError(`Unsupported filter operator '${code}'`, context);
    }
    const operand = code === 'CP' ? value.replace(/\*/g, '%') : value;
    expression = binary(operator, target, filterLiteral(operand, type));
  }

  return including ? expression : not(expression);
}

function toAggregation(value: string, context: { node: string; column: string }): AggregationFunction {
  switch (value) {
    case 'SUM': case 'AVG': case 'MIN': case 'MAX': case 'COUNT':
      return value;
    default:
      throw new ParseError(`Unsupported aggregation type '${value}'`, context);
  }
}

// ── Public API ───────────────────────────────────────────────────────

/**
 * Parse a calculation-view document into a Scenario. Throws ParseError
 * for malformed documents and for references that do not resolve.
 */
export function parseScenario(input: string | Uint8Array): Scenario {
  const { rootName, root } = readXmlDocument(input);

  if (rootName === 'ColumnView') {
    throw new ParseError('Legacy ColumnView documents are not supported; expected a calculation scenario');
  }
  if (rootName !== 'scenario') {
    throw new ParseError(`Root element <${rootName}> is not a calculation scenario`);
  }

  return new ScenarioBuilder(root).build();
}
