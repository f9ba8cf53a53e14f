import type { Catalog } from './catalog/catalog.js';
import { defaultCatalog } from './catalog/loader.js';
import {
  resolveConversionOptions,
  type ConversionOptions,
  type ConversionSettings,
  type CvsqlConfig,
} from './core/config.js';
import { StrictModeError, type TranslationWarning } from './core/errors.js';
import { StepRecorder, snippetOf, type StepRecord } from './core/steps.js';
import type { Scenario } from './core/types.js';
import { parseScenario } from './parser/xml-parser.js';
import { renderScenario, type RenderedStage } from './renderer/sql-renderer.js';
import { correctSql, type CorrectionResult } from './sql/corrector.js';
import { validateSql, type ValidationResult } from './sql/validator.js';

export interface ConvertOptions {
  /** Defaults to the bundled rule files. */
  readonly catalog?: Catalog;
  /** Applied over the config, e.g. command-line flags. */
  readonly overrides?: ConversionSettings;
}

export interface ConversionResult {
  readonly scenario: Scenario;
  readonly options: ConversionOptions;
  readonly sql: string;
  readonly stages: readonly RenderedStage[];
  readonly warnings: readonly TranslationWarning[];
  /** Validation of the final SQL, after any corrections. */
  readonly validation: ValidationResult;
  readonly correction?: CorrectionResult;
  readonly steps: readonly StepRecord[];
}

/**
 * Parse a calculation scenario and render it as SQL for the configured
 * dialect, then validate and, when enabled, auto-correct the result.
 * In strict mode remaining validation errors throw StrictModeError.
 */
export function convertXml(
  input: string | Uint8Array,
  config: CvsqlConfig = {},
  convertOptions: ConvertOptions = {},
): ConversionResult {
  const recorder = new StepRecorder();

  const catalog = convertOptions.catalog ?? recorder.run('catalog', () => defaultCatalog(), (c) => ({
    detail: `dialects: ${c.dialectNames().join(', ')}`,
  }));

  const scenario = recorder.run('parse', () => parseScenario(input), (s) => ({
    detail: `${s.id || '(unnamed)'}: ${s.nodes.length} node(s)`,
  }));

  const options = resolveConversionOptions(config, scenario.id, convertOptions.overrides);
  const profile = catalog.getDialect(options.dialect);

  const rendered = recorder.run('render', () => renderScenario(scenario, catalog, options), (r) => ({
    status: r.warnings.length > 0 ? 'warning' : 'ok',
    detail: `${r.stages.length} stage(s), ${r.warnings.length} warning(s)`,
    snippet: snippetOf(r.sql),
  }));

  let sql = rendered.sql;
  let validation = recorder.run('validate', () => validateSql(sql, { profile, scenario }), describeValidation);

  let correction: CorrectionResult | undefined;
  if (!options.autoCorrect) {
    recorder.skip('correct', 'auto-correction disabled');
  } else if (validation.issues.length === 0) {
    recorder.skip('correct', 'no issues');
  } else {
    const issues = validation.issues;
    correction = recorder.run(
      'correct',
      () => correctSql(sql, issues, { threshold: options.correctionThreshold, profile }),
      (c) => ({ detail: `${c.corrections.length} correction(s), ${c.issuesRemaining.length} issue(s) remaining` }),
    );
    if (correction.corrections.length > 0) {
      sql = correction.sql;
      validation = recorder.run('validate', () => validateSql(sql, { profile, scenario }), describeValidation);
    }
  }

  if (options.strict && validation.errors.length > 0) {
    throw new StrictModeError(validation.errors);
  }

  return {
    scenario,
    options,
    sql,
    stages: rendered.stages,
    warnings: rendered.warnings,
    validation,
    ...(correction === undefined ? {} : { correction }),
    steps: recorder.steps(),
  };
}

function describeValidation(v: ValidationResult): { status: 'ok' | 'warning' | 'error'; detail: string } {
  return {
    status: v.errors.length > 0 ? 'error' : v.warnings.length > 0 ? 'warning' : 'ok',
    detail: `${v.errors.length} error(s), ${v.warnings.length} warning(s)`,
  };
}
