import { Command } from 'commander';
import pc from 'picocolors';
import { readFileSync, existsSync } from 'node:fs';
import {
  ScenarioGraph,
  describeType,
  isConversionError,
  parseScenario,
  type NodeKey,
  type Scenario,
  type ViewNode,
} from '@cvsql/compiler';

// ── Command registration ────────────────────────────────────────────

export function registerInspectCommand(program: Command): void {
  program
    .command('inspect')
    .argument('<xml-file>', 'Path to a calculation view XML file')
    .description('Inspect the node graph of a calculation view')
    .option('--json', 'Output as JSON')
    .option('--graph', 'Output as Mermaid DAG')
    .action(async (xmlFile: string, opts: { json?: boolean; graph?: boolean }) => {
      await runInspect(xmlFile, opts);
    });
}

// ── Inspect logic ───────────────────────────────────────────────────

export async function runInspect(
  xmlFile: string,
  opts: { json?: boolean; graph?: boolean },
): Promise<string> {
  if (!existsSync(xmlFile)) {
    console.error(pc.red(`Error: View file not found: ${xmlFile}`));
    process.exitCode = 1;
    return '';
  }

  let scenario: Scenario;
  try {
    scenario = parseScenario(readFileSync(xmlFile, 'utf-8'));
  } catch (err) {
    if (!isConversionError(err)) throw err;
    console.error(pc.red(`Error: ${err.describe()}`));
    process.exitCode = 1;
    return '';
  }

  const graph = ScenarioGraph.fromNodes(scenario.nodes);

  let output: string;

  if (opts.json) {
    output = formatJson(scenario, graph);
  } else if (opts.graph) {
    output = formatMermaid(scenario, graph);
  } else {
    output = formatTable(scenario, graph);
  }

  console.log(output);
  return output;
}

type NodeGraph = ScenarioGraph<ViewNode>;

function nameOf(graph: NodeGraph, key: NodeKey): string {
  return graph.getNode(key)?.name ?? key;
}

function sourceOf(node: ViewNode): string {
  return node.kind === 'table' ? `${node.schema}.${node.object}` : '-';
}

// ── Table format ────────────────────────────────────────────────────

function formatTable(scenario: Scenario, graph: NodeGraph): string {
  const lines: string[] = [];
  const nodes = graph.getAllNodes();

  lines.push('');
  lines.push(`${pc.bold('Scenario:')} ${pc.cyan(scenario.id || '(unnamed)')}`);
  if (scenario.description) {
    lines.push(`${pc.bold('About:')}    ${scenario.description}`);
  }
  lines.push(`${pc.bold('Output:')}   ${nameOf(graph, scenario.output)}`);
  lines.push('');

  lines.push(pc.bold('Nodes'));
  lines.push(pc.dim('─'.repeat(70)));
  lines.push(`  ${pad('Name', 20)} ${pad('Kind', 12)} ${pad('Columns', 8)} ${pad('Source', 26)}`);
  lines.push(pc.dim('─'.repeat(70)));

  for (const node of nodes) {
    lines.push(
      `  ${pad(node.name, 20)} ${pad(node.kind, 12)} ${pad(String(node.columns.length), 8)} ${pad(sourceOf(node), 26)}`,
    );
  }

  lines.push('');

  const edges = graph.getAllEdges();
  if (edges.length > 0) {
    lines.push(pc.bold('Edges'));
    lines.push(pc.dim('─'.repeat(40)));
    for (const edge of edges) {
      lines.push(`  ${nameOf(graph, edge.from)} ${pc.dim('→')} ${nameOf(graph, edge.to)}`);
    }
    lines.push('');
  }

  if (scenario.parameters.length > 0) {
    lines.push(pc.bold('Parameters'));
    lines.push(pc.dim('─'.repeat(40)));
    for (const parameter of scenario.parameters) {
      const fallback = parameter.defaultValue === undefined ? '' : pc.dim(` = ${parameter.defaultValue}`);
      lines.push(`  $$${parameter.name}$$: ${describeType(parameter.type)}${fallback}`);
    }
    lines.push('');
  }

  const output = graph.getNode(scenario.output);
  if (output) {
    lines.push(pc.bold('Columns'));
    lines.push(pc.dim('─'.repeat(40)));
    for (const column of output.columns) {
      const hidden = column.hidden ? pc.dim(' (hidden)') : '';
      lines.push(`  ${column.name}: ${pc.dim(describeType(column.type))}${hidden}`);
    }
    lines.push('');
  }

  return lines.join('\n');
}

// ── JSON format ─────────────────────────────────────────────────────

function formatJson(scenario: Scenario, graph: NodeGraph): string {
  const output = {
    scenario: {
      id: scenario.id,
      description: scenario.description ?? null,
      output: nameOf(graph, scenario.output),
    },
    nodes: graph.getAllNodes().map((n) => ({
      name: n.name,
      kind: n.kind,
      source: n.kind === 'table' ? sourceOf(n) : null,
      inputs: n.inputs.map((key) => nameOf(graph, key)),
      columns: n.columns.map((c) => ({
        name: c.name,
        kind: c.kind,
        type: describeType(c.type),
        hidden: c.hidden,
      })),
    })),
    edges: graph.getAllEdges().map((e) => ({
      from: nameOf(graph, e.from),
      to: nameOf(graph, e.to),
    })),
    parameters: scenario.parameters.map((p) => ({
      name: p.name,
      type: describeType(p.type),
      defaultValue: p.defaultValue ?? null,
    })),
  };

  return JSON.stringify(output, null, 2);
}

// ── Mermaid format ──────────────────────────────────────────────────

function formatMermaid(scenario: Scenario, graph: NodeGraph): string {
  const lines: string[] = [];

  lines.push(`---`);
  lines.push(`title: ${scenario.id || '(unnamed)'}`);
  lines.push(`---`);
  lines.push('graph TD');

  for (const node of graph.getAllNodes()) {
    lines.push(`  ${sanitizeId(node.name)}["${node.kind}: ${node.name}"]:::${node.kind}`);
  }

  lines.push('');

  for (const edge of graph.getAllEdges()) {
    lines.push(`  ${sanitizeId(nameOf(graph, edge.from))} --> ${sanitizeId(nameOf(graph, edge.to))}`);
  }

  lines.push('');
  lines.push('  classDef table fill:#4CAF50,color:#fff');
  lines.push('  classDef projection fill:#2196F3,color:#fff');
  lines.push('  classDef join fill:#FF9800,color:#fff');
  lines.push('  classDef aggregation fill:#9C27B0,color:#fff');
  lines.push('  classDef union fill:#9E9E9E,color:#fff');

  return lines.join('\n');
}

// ── Utilities ───────────────────────────────────────────────────────

function pad(str: string, width: number): string {
  return str.padEnd(width);
}

function sanitizeId(id: string): string {
  return id.replace(/[^a-zA-Z0-9_]/g, '_');
}
