import { toNodeKey, type NodeKey } from '../core/types.js';
import type { DependencyMap, FaeResolution } from './dependency-map.js';
import type { LineageGraph } from './lineage-graph.js';
import type { LineageColumn, LineageStage } from './lineage-parser.js';

// ── Naming ───────────────────────────────────────────────────────────

const MAX_NAME = 30;
const PACKED_TYPE = 'p LENGTH 16 DECIMALS 6';

/** Lower-case identifier limited to the 30 characters the target allows. */
export function proceduralName(prefix: string, name: string): string {
  const cleaned = name.toLowerCase().replace(/[^a-z0-9_]/g, '_').replace(/^_+/, '');
  return `${prefix}${cleaned}`.slice(0, MAX_NAME);
}

export interface GenerateOptions {
  /** Program name without the `z_` prefix. */
  readonly programName: string;
}

// ── Line builder ─────────────────────────────────────────────────────

class SourceWriter {
  private readonly lines: string[] = [];
  private depth = 0;

  line(text = ''): this {
    this.lines.push(text === '' ? '' : '  '.repeat(this.depth) + text);
    return this;
  }

  indent(): this {
    this.depth++;
    return this;
  }

  dedent(): this {
    this.depth = Math.max(0, this.depth - 1);
    return this;
  }

  toString(): string {
    return `${this.lines.join('\n')}\n`;
  }
}

// ── Generator ────────────────────────────────────────────────────────

class ProceduralGenerator {
  private readonly out = new SourceWriter();
  private readonly names = new Map<NodeKey, string>();

  constructor(
    private readonly graph: LineageGraph,
    private readonly deps: DependencyMap,
    private readonly options: GenerateOptions,
  ) {
    const used = new Set<string>();
    for (const stage of graph.executionOrder()) {
      let base = proceduralName('', stage.name).slice(0, MAX_NAME - 3);
      for (let n = 2; used.has(base); n++) {
        base = `${proceduralName('', stage.name).slice(0, MAX_NAME - 3 - String(n).length)}${n}`;
      }
      used.add(base);
      this.names.set(stage.key, base);
    }
  }

  generate(): string {
    const stages = this.graph.executionOrder();

    this.out.line(`REPORT ${proceduralName('z_', this.options.programName)}.`).line();
    for (const stage of stages) this.declareType(stage);
    for (const stage of stages) this.declareData(stage);

    this.out.line('START-OF-SELECTION.').line().indent();

    for (const key of this.deps.fetchOrder) {
      const stage = this.graph.getStage(key);
      if (stage) this.fetch(stage);
    }
    for (const stage of stages) {
      if (stage.kind !== 'table') this.assemble(stage);
    }

    const output = this.graph.getStage(this.graph.output);
    if (output) {
      this.out.line(`WRITE: / 'Rows:', lines( ${this.table(output)} ).`);
    }
    return this.out.toString();
  }

  // ── Names ──────────────────────────────────────────────────────

  private base(stage: LineageStage): string {
    return this.names.get(stage.key) ?? proceduralName('', stage.name);
  }

  private table(stage: LineageStage): string {
    return `lt_${this.base(stage)}`;
  }

  private row(stage: LineageStage): string {
    return `ls_${this.base(stage)}`;
  }

  private field(name: string): string {
    return proceduralName('', name);
  }

  // ── Declarations ───────────────────────────────────────────────

  /**
   * Real columns take the dictionary type of the table field they come
   * from. Sums and averages are packed numbers, since COLLECT only adds
   * numeric components and groups by the rest.
   */
  private columnType(stage: LineageStage, col: LineageColumn): string {
    if (col.kind === 'calculated') return 'string';
    const owner = this.graph.findAncestorWithColumn(stage.name, col.name);
    const aggregate = col.aggregate ?? owner?.aggregate;
    if (aggregate === 'COUNT') return 'i';
    if (aggregate === 'SUM' || aggregate === 'AVG') return PACKED_TYPE;
    const table = owner?.stage.table;
    if (!owner || !table) return 'string';
    return `${table.name.toLowerCase()}-${owner.field.toLowerCase()}`;
  }

  private declareType(stage: LineageStage): void {
    const type = `ty_${this.base(stage)}`;
    this.out.line(`TYPES: BEGIN OF ${type},`);
    for (const col of stage.columns) {
      this.out.line(`         ${this.field(col.name)} TYPE ${this.columnType(stage, col)},`);
    }
    this.out.line(`       END OF ${type}.`).line();
  }

  private declareData(stage: LineageStage): void {
    const type = `ty_${this.base(stage)}`;
    this.out
      .line(`DATA: ${this.table(stage)} TYPE STANDARD TABLE OF ${type},`)
      .line(`      ${this.row(stage)} TYPE ${type}.`)
      .line();
  }

  // ── Fetches ────────────────────────────────────────────────────

  private resolutionFor(stage: LineageStage): FaeResolution | undefined {
    return this.deps.resolutions.find((r) => r.target === stage.key);
  }

  private fetch(stage: LineageStage): void {
    const table = stage.table?.name.toLowerCase() ?? this.field(stage.name);
    const fields = stage.columns
      .filter((c) => c.kind === 'real')
      .map((c) => this.field(c.source?.field ?? c.name))
      .join(' ');
    const resolution = this.resolutionFor(stage);

    if (resolution?.mode !== 'batched') {
      this.out.line(resolution ? `" ${stage.name}: full fetch for ${resolution.stage} (${resolution.reason})` : `" ${stage.name}`);
      this.out
        .line(`SELECT ${fields || '*'}`)
        .indent()
        .line(`FROM ${table}`)
        .line(`INTO CORRESPONDING FIELDS OF TABLE ${this.table(stage)}.`)
        .dedent()
        .line();
      return;
    }

    const source = this.graph.getStage(resolution.source);
    if (!source) return;
    const driver = this.table(source);

    this.out
      .line(`" ${stage.name}: lookup for ${resolution.stage}`)
      .line(`IF ${driver} IS NOT INITIAL.`)
      .indent()
      .line(`SELECT ${fields || '*'}`)
      .indent()
      .line(`FROM ${table}`)
      .line(`INTO CORRESPONDING FIELDS OF TABLE ${this.table(stage)}`)
      .line(`FOR ALL ENTRIES IN ${driver}`);
    resolution.keys.forEach((key, i) => {
      const predicate = `${this.field(key.target)} = ${driver}-${this.field(key.source)}`;
      const last = i === resolution.keys.length - 1 ? '.' : '';
      this.out.line(`${i === 0 ? 'WHERE' : '  AND'} ${predicate}${last}`);
    });
    this.out.dedent().dedent().line('ENDIF.').line();
  }

  // ── Assembly ───────────────────────────────────────────────────

  private inputFor(stage: LineageStage, qualifier?: string): LineageStage | undefined {
    const inputs = stage.inputs.map((k) => this.graph.getStage(k)).filter((s): s is LineageStage => s !== undefined);
    if (qualifier !== undefined) {
      const named = inputs.find((s) => s.key === toNodeKey(qualifier));
      if (named) return named;
    }
    return inputs[0];
  }

  /** `ls_out-col = ls_in-field.` for columns read from `only` (or any input). */
  private moveColumns(stage: LineageStage, columns: readonly LineageColumn[], only?: LineageStage): void {
    for (const col of columns) {
      if (col.kind === 'calculated') {
        const literal = /^'(?:[^']|'')*'$/.test(col.text) ? col.text : undefined;
        if (literal) {
          this.out.line(`${this.row(stage)}-${this.field(col.name)} = ${literal}.`);
        } else {
          this.out.line(`" ${this.field(col.name)}: ${col.text.replace(/\s+/g, ' ')}`);
        }
        continue;
      }
      const input = this.inputFor(stage, col.source?.qualifier);
      if (!input || (only && input.key !== only.key)) continue;
      const value = col.aggregate === 'COUNT' ? '1' : `${this.row(input)}-${this.field(col.source?.field ?? col.name)}`;
      this.out.line(`${this.row(stage)}-${this.field(col.name)} = ${value}.`);
    }
  }

  private assemble(stage: LineageStage): void {
    this.out.line(`" ${stage.name}`);
    if (stage.where !== undefined) {
      this.out.line(`" Filter: ${stage.where.replace(/\s+/g, ' ')}`);
    }

    switch (stage.kind) {
      case 'union':
        this.assembleUnion(stage);
        break;
      case 'aggregation':
        this.assembleAggregation(stage);
        break;
      default:
        if (stage.join) {
          this.assembleJoin(stage);
        } else {
          this.assembleProjection(stage);
        }
    }
    this.out.line();
  }

  private assembleProjection(stage: LineageStage): void {
    const input = this.inputFor(stage);
    if (!input) return;
    this.out
      .line(`LOOP AT ${this.table(input)} INTO ${this.row(input)}.`)
      .indent()
      .line(`CLEAR ${this.row(stage)}.`);
    this.moveColumns(stage, stage.columns);
    this.out.line(`APPEND ${this.row(stage)} TO ${this.table(stage)}.`).dedent().line('ENDLOOP.');
  }

  private assembleAggregation(stage: LineageStage): void {
    const input = this.inputFor(stage);
    if (!input) return;
    for (const col of stage.columns) {
      if (col.aggregate !== undefined && col.aggregate !== 'SUM' && col.aggregate !== 'COUNT') {
        this.out.line(`" ${this.field(col.name)}: COLLECT adds values; ${col.aggregate} needs a post-processing step`);
      }
    }
    this.out
      .line(`LOOP AT ${this.table(input)} INTO ${this.row(input)}.`)
      .indent()
      .line(`CLEAR ${this.row(stage)}.`);
    this.moveColumns(stage, stage.columns);
    this.out.line(`COLLECT ${this.row(stage)} INTO ${this.table(stage)}.`).dedent().line('ENDLOOP.');
  }

  private assembleUnion(stage: LineageStage): void {
    for (const branch of stage.branches ?? []) {
      const input = this.graph.getStage(branch.input);
      if (!input) continue;
      const identical = branch.columns.length === input.columns.length
        && branch.columns.every((c, i) => c.kind === 'real' && c.source?.field.toLowerCase() === c.name.toLowerCase() && input.columns[i]?.name.toLowerCase() === c.name.toLowerCase());
      if (identical) {
        this.out.line(`APPEND LINES OF ${this.table(input)} TO ${this.table(stage)}.`);
        continue;
      }
      this.out
        .line(`LOOP AT ${this.table(input)} INTO ${this.row(input)}.`)
        .indent()
        .line(`CLEAR ${this.row(stage)}.`);
      this.moveColumns({ ...stage, inputs: [input.key] }, branch.columns);
      this.out.line(`APPEND ${this.row(stage)} TO ${this.table(stage)}.`).dedent().line('ENDLOOP.');
    }
  }

  private assembleJoin(stage: LineageStage): void {
    const { join } = stage;
    if (!join) return;
    const left = this.graph.getStage(join.left);
    const right = this.graph.getStage(join.right);
    if (!left || !right) return;

    const [outer, inner] = join.type === 'right' ? [right, left] : [left, right];
    const match = join.keys
      .map((k) => (join.type === 'right'
        ? `${this.field(k.left)} = ${this.row(right)}-${this.field(k.right)}`
        : `${this.field(k.right)} = ${this.row(left)}-${this.field(k.left)}`))
      .join(' AND ');
    const keepUnmatched = join.type === 'left' || join.type === 'right' || join.type === 'full';

    this.out
      .line(`LOOP AT ${this.table(outer)} INTO ${this.row(outer)}.`)
      .indent()
      .line(`LOOP AT ${this.table(inner)} INTO ${this.row(inner)}${match ? ` WHERE ${match}` : ''}.`)
      .indent()
      .line(`CLEAR ${this.row(stage)}.`);
    this.moveColumns(stage, stage.columns);
    this.out.line(`APPEND ${this.row(stage)} TO ${this.table(stage)}.`).dedent().line('ENDLOOP.');

    if (keepUnmatched) {
      this.out.line('IF sy-subrc <> 0.').indent().line(`CLEAR ${this.row(stage)}.`);
      this.moveColumns(stage, stage.columns, outer);
      this.out.line(`APPEND ${this.row(stage)} TO ${this.table(stage)}.`).dedent().line('ENDIF.');
    }
    this.out.dedent().line('ENDLOOP.');

    if (join.type === 'full') {
      const back = join.keys
        .map((k) => `${this.field(k.left)} = ${this.row(right)}-${this.field(k.right)}`)
        .join(' ');
      this.out
        .line(`LOOP AT ${this.table(right)} INTO ${this.row(right)}.`)
        .indent()
        .line(`READ TABLE ${this.table(left)} WITH KEY ${back} TRANSPORTING NO FIELDS.`)
        .line('IF sy-subrc <> 0.')
        .indent()
        .line(`CLEAR ${this.row(stage)}.`);
      this.moveColumns(stage, stage.columns, right);
      this.out
        .line(`APPEND ${this.row(stage)} TO ${this.table(stage)}.`)
        .dedent()
        .line('ENDIF.')
        .dedent()
        .line('ENDLOOP.');
    }
  }
}

// ── Public API ───────────────────────────────────────────────────────

/**
 * Emit a report that fetches every table, emulating joins with guarded
 * FOR ALL ENTRIES lookups, then assembles each derived stage in loops.
 */
export function generateProcedural(graph: LineageGraph, deps: DependencyMap, options: GenerateOptions): string {
  return new ProceduralGenerator(graph, deps, options).generate();
}
