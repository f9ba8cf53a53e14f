import { Command } from 'commander';
import pc from 'picocolors';
import { existsSync, readFileSync, writeFileSync } from 'node:fs';
import { isConversionError, transpileToProcedural, type ProceduralResult } from '@cvsql/compiler';

export interface ProceduralCommandOptions {
  /** Program name; defaults to the output stage. */
  readonly name?: string;
  /** Write the report here instead of printing it. */
  readonly out?: string;
}

// ── Command registration ────────────────────────────────────────────

export function registerProceduralCommand(program: Command): void {
  program
    .command('procedural')
    .argument('<sql-file>', 'SQL produced by `cvsql convert`')
    .description('Transpile converted SQL into a procedural report')
    .option('-n, --name <program>', 'Program name')
    .option('-o, --out <file>', 'Output file (default: print to stdout)')
    .action(async (sqlFile: string, opts: ProceduralCommandOptions) => {
      await runProcedural(sqlFile, opts);
    });
}

// ── Procedural logic ────────────────────────────────────────────────

export async function runProcedural(sqlFile: string, opts: ProceduralCommandOptions): Promise<ProceduralResult | null> {
  if (!existsSync(sqlFile)) {
    console.error(pc.red(`Error: SQL file not found: ${sqlFile}`));
    process.exitCode = 1;
    return null;
  }

  let result: ProceduralResult;
  try {
    result = transpileToProcedural(
      readFileSync(sqlFile, 'utf-8'),
      opts.name === undefined ? {} : { programName: opts.name },
    );
  } catch (err) {
    if (!isConversionError(err)) throw err;
    console.error(pc.red(`Error: ${err.describe()}`));
    process.exitCode = 1;
    return null;
  }

  for (const error of result.errors) {
    console.error(pc.yellow(`Warning: ${error.message}`));
  }

  if (opts.out) {
    writeFileSync(opts.out, result.source, 'utf-8');
    const batched = result.resolutions.filter((r) => r.mode === 'batched').length;
    console.log(pc.green(`Wrote ${opts.out}`) + pc.dim(` (${result.stages.length} stage(s), ${batched} batched lookup(s))`));
  } else {
    console.log(result.source);
  }

  return result;
}
