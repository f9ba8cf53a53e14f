import type { FAEResolutionError } from '../core/errors.js';
import { StepRecorder, snippetOf, type StepRecord } from '../core/steps.js';
import { buildDependencyMap, type DependencyMap, type FaeResolution } from './dependency-map.js';
import { LineageGraph } from './lineage-graph.js';
import type { LineageStage } from './lineage-parser.js';
import { generateProcedural } from './procedural-generator.js';

export interface ProceduralOptions {
  /** Program name without the `z_` prefix. Defaults to the output stage name. */
  readonly programName?: string;
}

export interface ProceduralResult {
  readonly source: string;
  readonly stages: readonly LineageStage[];
  readonly resolutions: readonly FaeResolution[];
  /** Join stages whose key owner could not be found; their table is fetched in full. */
  readonly errors: readonly FAEResolutionError[];
  readonly steps: readonly StepRecord[];
}

/**
 * Turn rendered SQL into a procedural report. Parse failures throw;
 * unresolved join keys are returned in `errors`.
 */
export function transpileToProcedural(sql: string, options: ProceduralOptions = {}): ProceduralResult {
  const recorder = new StepRecorder();

  const graph = recorder.run('lineage', () => LineageGraph.fromSql(sql), (g) => ({
    detail: `${g.executionOrder().length} stage(s)`,
  }));

  const deps: DependencyMap = recorder.run('procedural', () => buildDependencyMap(graph), (d) => ({
    status: d.errors.length > 0 ? 'warning' : 'ok',
    detail: `${d.resolutions.length} resolution(s), ${d.errors.length} error(s)`,
  }));

  const programName = options.programName ?? graph.getStage(graph.output)?.name ?? 'converted';
  const source = recorder.run('procedural', () => generateProcedural(graph, deps, { programName }), (s) => ({
    snippet: snippetOf(s),
  }));

  return {
    source,
    stages: graph.executionOrder(),
    resolutions: deps.resolutions,
    errors: deps.errors,
    steps: recorder.steps(),
  };
}
