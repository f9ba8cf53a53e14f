import { Command, InvalidArgumentError } from 'commander';
import pc from 'picocolors';
import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { join, relative, resolve } from 'node:path';
import {
  convertXml,
  defaultCatalog,
  isConversionError,
  transpileToProcedural,
  validateConfig,
  type ConversionResult,
  type ConversionSettings,
  type StepRecord,
} from '@cvsql/compiler';
import { resolveProjectContext, viewFromPath, type DiscoveredView, type ProjectContext } from '../discovery.js';

// ── Types ───────────────────────────────────────────────────────────

export interface ConvertFlags {
  readonly dialect?: string;
  readonly schema?: string;
  readonly createView?: boolean;
  readonly viewName?: string;
  readonly param?: readonly string[];
  /** `false` when --no-auto-correct is given. */
  readonly autoCorrect?: boolean;
  readonly threshold?: number;
  readonly strict?: boolean;
}

export interface ConvertCommandOptions extends ConvertFlags {
  readonly outdir: string;
  readonly procedural?: boolean;
  readonly verbose?: boolean;
  readonly projectDir?: string;
}

export interface ConvertedView {
  readonly name: string;
  readonly outputPath: string;
  readonly proceduralPath?: string;
  readonly result: ConversionResult;
}

// ── Command registration ────────────────────────────────────────────

export function registerConvertCommand(program: Command): void {
  program
    .command('convert')
    .argument('[files...]', 'Calculation view XML files (default: views/*.xml)')
    .description('Convert calculation views to SQL')
    .option('-d, --dialect <name>', 'Target SQL dialect')
    .option('-s, --schema <name>', 'Schema for every base table')
    .option('-o, --outdir <dir>', 'Output directory', 'dist')
    .option('--create-view', 'Wrap the query in view DDL')
    .option('--view-name <name>', 'Name of the generated view')
    .option('-p, --param <assignment...>', 'Input parameter values as NAME=value')
    .option('--no-auto-correct', 'Report validation issues without fixing them')
    .option('--threshold <confidence>', 'Minimum confidence for automatic fixes', parseThreshold)
    .option('--strict', 'Fail when validation errors remain')
    .option('--procedural', 'Also write a procedural report per view')
    .option('-v, --verbose', 'Print every conversion step')
    .action(async (files: string[], opts: ConvertCommandOptions) => {
      await runConvert(files, opts);
    });
}

export function parseThreshold(value: string): number {
  const threshold = Number(value);
  if (Number.isNaN(threshold) || threshold < 0 || threshold > 1) {
    throw new InvalidArgumentError('Expected a number between 0 and 1.');
  }
  return threshold;
}

// ── Flag handling ───────────────────────────────────────────────────

export function parseParameters(assignments: readonly string[] = []): Record<string, string> {
  const parameters: Record<string, string> = {};
  for (const assignment of assignments) {
    const eq = assignment.indexOf('=');
    if (eq <= 0) {
      throw new Error(`Invalid parameter '${assignment}', expected NAME=value`);
    }
    parameters[assignment.slice(0, eq)] = assignment.slice(eq + 1);
  }
  return parameters;
}

/** Settings given on the command line; unset flags leave the config alone. */
export function settingsFromFlags(flags: ConvertFlags): ConversionSettings {
  return validateConfig({
    dialect: flags.dialect,
    targetSchema: flags.schema,
    createView: flags.createView,
    viewName: flags.viewName,
    parameters: flags.param === undefined ? undefined : parseParameters(flags.param),
    autoCorrect: flags.autoCorrect === false ? false : undefined,
    correctionThreshold: flags.threshold,
    strict: flags.strict,
  });
}

// ── Convert logic ───────────────────────────────────────────────────

export async function runConvert(files: readonly string[], opts: ConvertCommandOptions): Promise<ConvertedView[]> {
  const projectDir = opts.projectDir ?? process.cwd();

  let ctx: ProjectContext;
  let overrides: ConversionSettings;
  try {
    ctx = await resolveProjectContext(projectDir);
    overrides = settingsFromFlags(opts);
  } catch (err) {
    if (!(err instanceof Error)) throw err;
    console.error(pc.red(`Error: ${err.message}`));
    process.exitCode = 1;
    return [];
  }

  let views: readonly DiscoveredView[];
  if (files.length > 0) {
    views = files.map((file) => viewFromPath(resolve(projectDir, file)));
    const missing = views.filter((v) => !existsSync(v.path));
    if (missing.length > 0) {
      for (const view of missing) {
        console.error(pc.red(`Error: View file not found: ${view.path}`));
      }
      process.exitCode = 1;
      return [];
    }
  } else {
    views = ctx.views;
  }

  if (views.length === 0) {
    console.log(pc.yellow('No calculation views found in views/ directory.'));
    return [];
  }

  console.log(pc.dim(`Converting ${views.length} view(s)...\n`));

  const catalog = defaultCatalog();
  const outdir = resolve(projectDir, opts.outdir);
  const converted: ConvertedView[] = [];
  let hasErrors = false;

  for (const view of views) {
    let result: ConversionResult;
    try {
      result = convertXml(readFileSync(view.path, 'utf-8'), ctx.config ?? {}, { catalog, overrides });
    } catch (err) {
      if (!isConversionError(err)) throw err;
      hasErrors = true;
      console.log(pc.red(`  ${view.name}: ${err.step} failed`));
      console.log(pc.red(`    ${err.describe()}`));
      console.log(pc.dim(`    at ${view.path}`));
      continue;
    }

    if (opts.verbose) {
      for (const step of result.steps) {
        console.log(pc.dim(`  ${formatStep(step)}`));
      }
    }
    reportFindings(result);
    if (!result.validation.valid) hasErrors = true;

    mkdirSync(outdir, { recursive: true });
    const outputPath = join(outdir, `${view.name}.sql`);
    writeFileSync(outputPath, `${result.sql}\n`, 'utf-8');

    let proceduralPath: string | undefined;
    if (opts.procedural) {
      proceduralPath = writeProcedural(view, result, outdir);
      if (proceduralPath === undefined) hasErrors = true;
    }

    converted.push({
      name: view.name,
      outputPath,
      result,
      ...(proceduralPath === undefined ? {} : { proceduralPath }),
    });
  }

  if (hasErrors) {
    console.log(pc.red('\nConversion finished with errors.'));
    process.exitCode = 1;
  } else {
    console.log(pc.green(`\nConversion complete. ${converted.length} view(s) written.\n`));
  }

  for (const view of converted) {
    console.log(`  ${pc.cyan(view.name)} ${pc.dim(`→ ${relative(projectDir, view.outputPath)}`)}`);
  }

  console.log('');
  return converted;
}

// ── Procedural output ───────────────────────────────────────────────

function writeProcedural(view: DiscoveredView, result: ConversionResult, outdir: string): string | undefined {
  try {
    const procedural = transpileToProcedural(result.sql);
    for (const error of procedural.errors) {
      console.log(pc.yellow(`  Warning: ${error.message}`));
    }
    const path = join(outdir, `${view.name}.abap`);
    writeFileSync(path, procedural.source, 'utf-8');
    return path;
  } catch (err) {
    if (!isConversionError(err)) throw err;
    console.log(pc.red(`  ${view.name}: ${err.step} failed`));
    console.log(pc.red(`    ${err.describe()}`));
    return undefined;
  }
}

// ── Reporting ───────────────────────────────────────────────────────

export function formatStep(step: StepRecord): string {
  const timing = step.status === 'skipped' ? '' : ` ${step.durationMs.toFixed(1)}ms`;
  const detail = step.detail ? ` ${step.detail}` : '';
  return `${step.step.padEnd(10)} ${step.status.padEnd(7)}${timing}${detail}`;
}

function reportFindings(result: ConversionResult): void {
  for (const warning of result.warnings) {
    const where = warning.node ? ` (${warning.node}${warning.column ? `.${warning.column}` : ''})` : '';
    console.log(pc.yellow(`  Warning${where}: ${warning.message}`));
  }

  for (const correction of result.correction?.corrections ?? []) {
    console.log(pc.dim(`  Fixed ${correction.code} on line ${correction.line}: ${correction.description}`));
  }

  for (const issue of result.validation.issues) {
    const line = issue.line === undefined ? '' : ` line ${issue.line}`;
    const text = `  ${issue.severity === 'error' ? 'Error' : 'Warning'} [${issue.code}]${line}: ${issue.message}`;
    console.log(issue.severity === 'error' ? pc.red(text) : pc.yellow(text));
  }
}
