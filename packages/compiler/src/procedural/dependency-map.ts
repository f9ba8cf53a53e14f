import { FAEResolutionError } from '../core/errors.js';
import type { NodeKey } from '../core/types.js';
import type { LineageGraph } from './lineage-graph.js';
import type { LineageStage } from './lineage-parser.js';

// ── Resolution records ───────────────────────────────────────────────

/** `target.field = source.field` pairs for a batched lookup. */
export interface FaeKey {
  readonly target: string;
  readonly source: string;
}

export type FaeResolution =
  | {
      readonly mode: 'batched';
      /** Join stage the lookup emulates. */
      readonly stage: string;
      /** Table fetched with FOR ALL ENTRIES. */
      readonly target: NodeKey;
      /** Table whose rows drive the lookup. */
      readonly source: NodeKey;
      readonly keys: readonly FaeKey[];
    }
  | {
      readonly mode: 'direct';
      readonly stage: string;
      readonly target: NodeKey;
      readonly reason: string;
    };

type BatchedResolution = Extract<FaeResolution, { readonly mode: 'batched' }>;

export interface DependencyMap {
  /** One entry per table reached through a join, in join order. */
  readonly resolutions: readonly FaeResolution[];
  readonly errors: readonly FAEResolutionError[];
  /** Table stages in an order where every lookup source precedes its target. */
  readonly fetchOrder: readonly NodeKey[];
}

// ── Resolver ─────────────────────────────────────────────────────────

function resolveJoin(
  graph: LineageGraph,
  stage: LineageStage,
  left: LineageStage,
  target: NodeKey,
  keys: NonNullable<LineageStage['join']>['keys'],
): BatchedResolution {
  if (left.kind === 'table') {
    return {
      mode: 'batched',
      stage: stage.name,
      target,
      source: left.key,
      keys: keys.map((k) => ({ target: k.right, source: k.left })),
    };
  }

  let source: LineageStage | undefined;
  const resolved: FaeKey[] = [];
  for (const key of keys) {
    const owner = graph.findAncestorWithColumn(left.name, key.left);
    if (!owner) {
      throw new FAEResolutionError(stage.name, key.left, `no table upstream of '${left.name}' has a real column '${key.left}'`);
    }
    if (source !== undefined && owner.stage.key !== source.key) {
      throw new FAEResolutionError(
        stage.name,
        key.left,
        `join keys come from different tables ('${source.name}' and '${owner.stage.name}')`,
      );
    }
    source = owner.stage;
    resolved.push({ target: key.right, source: owner.field });
  }

  if (source === undefined) {
    throw new FAEResolutionError(stage.name, '', 'join has no equality keys');
  }
  return { mode: 'batched', stage: stage.name, target, source: source.key, keys: resolved };
}

/** Follow lookup sources from `start`; true when the chain reaches `target`. */
function drivesBack(sourceOf: ReadonlyMap<NodeKey, NodeKey>, start: NodeKey, target: NodeKey): boolean {
  const seen = new Set<NodeKey>();
  let current: NodeKey | undefined = start;
  while (current !== undefined && !seen.has(current)) {
    if (current === target) return true;
    seen.add(current);
    current = sourceOf.get(current);
  }
  return false;
}

function orderFetches(tables: readonly LineageStage[], resolutions: readonly FaeResolution[]): NodeKey[] {
  const sourceOf = new Map<NodeKey, NodeKey>();
  for (const r of resolutions) {
    if (r.mode === 'batched') sourceOf.set(r.target, r.source);
  }

  const order: NodeKey[] = [];
  const fetched = new Set<NodeKey>();
  let pending = tables.map((t) => t.key);

  while (pending.length > 0) {
    const ready = pending.filter((key) => {
      const source = sourceOf.get(key);
      return source === undefined || fetched.has(source);
    });
    if (ready.length === 0) {
      throw new Error(`Lookup sources never fetched for: ${pending.join(', ')}`);
    }
    for (const key of ready) {
      order.push(key);
      fetched.add(key);
    }
    pending = pending.filter((key) => !fetched.has(key));
  }
  return order;
}

/**
 * Decide, per join stage, how its right-hand table is fetched. A base
 * table on the left drives the lookup directly; a derived left input is
 * traced back to the table that owns the key. RIGHT and FULL joins keep
 * unmatched right rows, so their table is fetched in full, and so is a
 * table whose lookup would be driven by itself.
 */
export function buildDependencyMap(graph: LineageGraph): DependencyMap {
  const resolutions: FaeResolution[] = [];
  const errors: FAEResolutionError[] = [];
  const claimed = new Set<NodeKey>();
  const sourceOf = new Map<NodeKey, NodeKey>();

  for (const stage of graph.joins()) {
    const { join } = stage;
    if (!join) continue;
    const left = graph.getStage(join.left);
    const right = graph.getStage(join.right);
    if (!left || !right) continue;

    if (left.kind === 'table') claimed.add(left.key);
    if (right.kind !== 'table' || claimed.has(right.key)) continue;
    claimed.add(right.key);

    if (join.type === 'right' || join.type === 'full' || join.type === 'cross' || join.keys.length === 0) {
      const reason = join.keys.length === 0 || join.type === 'cross'
        ? 'join has no equality keys'
        : `${join.type.toUpperCase()} join keeps rows without a match`;
      resolutions.push({ mode: 'direct', stage: stage.name, target: right.key, reason });
      continue;
    }

    let resolution: BatchedResolution;
    try {
      resolution = resolveJoin(graph, stage, left, right.key, join.keys);
    } catch (err) {
      if (!(err instanceof FAEResolutionError)) throw err;
      errors.push(err);
      resolutions.push({ mode: 'direct', stage: stage.name, target: right.key, reason: err.message });
      continue;
    }

    if (drivesBack(sourceOf, resolution.source, right.key)) {
      const driver = graph.getStage(resolution.source)?.name ?? resolution.source;
      resolutions.push({
        mode: 'direct',
        stage: stage.name,
        target: right.key,
        reason: resolution.source === right.key
          ? `join keys come from '${right.name}' itself`
          : `lookup source '${driver}' is fetched through '${right.name}'`,
      });
      continue;
    }

    sourceOf.set(right.key, resolution.source);
    resolutions.push(resolution);
  }

  return { resolutions, errors, fetchOrder: orderFetches(graph.tables(), resolutions) };
}
