import { ParseError } from '../core/errors.js';
import { ScenarioGraph } from '../core/scenario-graph.js';
import { toNodeKey, type NodeKey } from '../core/types.js';
import { parseLineage, type LineageColumn, type LineageStage, type ParsedSql } from './lineage-parser.js';

export interface ColumnOwner {
  /** Table stage whose real columns include the field. */
  readonly stage: LineageStage;
  /** Field name on that table, after following renames. */
  readonly field: string;
  /** First aggregate met on the way back, e.g. `SUM`. */
  readonly aggregate?: string;
}

/**
 * Stages of rendered SQL with their column provenance. Every lookup
 * takes a stage name and compares it case-insensitively.
 */
export class LineageGraph {
  private readonly stages: ReadonlyMap<NodeKey, LineageStage>;
  private readonly graph: ScenarioGraph<LineageStage>;
  readonly output: NodeKey;
  readonly outputColumns: readonly string[];

  constructor(parsed: ParsedSql) {
    this.stages = new Map(parsed.stages.map((s) => [s.key, s]));
    this.graph = ScenarioGraph.fromNodes(parsed.stages);
    const cycle = this.graph.detectCycle();
    if (cycle) {
      throw new ParseError(`Cycle detected in stage graph: ${cycle.join(' -> ')}`, { stage: cycle[0] }, 'lineage');
    }
    this.output = parsed.output;
    this.outputColumns = parsed.outputColumns;
  }

  static fromSql(sql: string): LineageGraph {
    return new LineageGraph(parseLineage(sql));
  }

  getStage(name: string): LineageStage | undefined {
    return this.stages.get(toNodeKey(name));
  }

  /** Stages with inputs before consumers, ties in declaration order. */
  executionOrder(): LineageStage[] {
    return this.graph.topologicalSort();
  }

  tables(): LineageStage[] {
    return this.executionOrder().filter((s) => s.kind === 'table');
  }

  joins(): LineageStage[] {
    return this.executionOrder().filter((s) => s.join !== undefined);
  }

  /**
   * Walk backwards from `stage` to the first table whose real columns
   * include `column`. Real columns are followed through their source
   * field; a column a stage does not expose is looked for in its inputs,
   * left to right. Calculated columns end the search on that path.
   */
  findAncestorWithColumn(stage: string, column: string): ColumnOwner | undefined {
    const start = this.getStage(stage);
    if (!start) return undefined;

    const queue: Array<{ readonly stage: LineageStage; readonly field: string; readonly aggregate?: string }> = [
      { stage: start, field: column },
    ];
    const visited = new Set<string>();

    while (queue.length > 0) {
      const current = queue.shift();
      if (!current) break;
      const marker = `${current.stage.key}\u0000${current.field.toLowerCase()}`;
      if (visited.has(marker)) continue;
      visited.add(marker);

      const col = findLineageColumn(current.stage, current.field);

      if (current.stage.kind === 'table') {
        if (col?.kind === 'real') {
          const aggregate = current.aggregate ?? col.aggregate;
          return {
            stage: current.stage,
            field: col.source?.field ?? col.name,
            ...(aggregate === undefined ? {} : { aggregate }),
          };
        }
        continue;
      }

      if (col?.kind === 'calculated') continue;

      const aggregate = current.aggregate ?? col?.aggregate;
      const carried = aggregate === undefined ? {} : { aggregate };

      if (col?.source) {
        for (const input of this.inputsFor(current.stage, col.source.qualifier)) {
          queue.push({ stage: input, field: col.source.field, ...carried });
        }
        continue;
      }

      for (const input of this.inputsFor(current.stage)) {
        queue.push({ stage: input, field: current.field, ...carried });
      }
    }
    return undefined;
  }

  /** Input stages, narrowed to the one a qualifier names when it names one. */
  private inputsFor(stage: LineageStage, qualifier?: string): LineageStage[] {
    const inputs = stage.inputs
      .map((key) => this.stages.get(key))
      .filter((s): s is LineageStage => s !== undefined);
    if (qualifier === undefined) return inputs;
    const named = inputs.filter((s) => s.key === toNodeKey(qualifier));
    return named.length > 0 ? named : inputs;
  }
}

export function findLineageColumn(stage: LineageStage, name: string): LineageColumn | undefined {
  const wanted = name.toLowerCase();
  return stage.columns.find((c) => c.name.toLowerCase() === wanted);
}
