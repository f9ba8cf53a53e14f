import { isRecord, type UnknownRecord } from './guards.js';

// ── Settings ─────────────────────────────────────────────────────────

export interface CurrencyConfig {
  /** User-defined conversion function, referenced as `{@currencyUdf}`. */
  readonly udf?: string;
  readonly ratesTable?: string;
  readonly schema?: string;
}

/** Options that may be set project-wide, per scenario, or from the CLI. */
export interface ConversionSettings {
  readonly dialect?: string;
  /** Declared schema name → schema used in the generated SQL. */
  readonly schemaOverrides?: Readonly<Record<string, string>>;
  /** Replaces the schema of every base table. */
  readonly targetSchema?: string;
  /** Schema of referenced calculation views. */
  readonly defaultViewSchema?: string;
  readonly client?: string;
  readonly language?: string;
  /** Input parameter values by name. */
  readonly parameters?: Readonly<Record<string, string>>;
  readonly currency?: CurrencyConfig;
  readonly createView?: boolean;
  readonly viewName?: string;
  readonly autoCorrect?: boolean;
  readonly correctionThreshold?: number;
  readonly strict?: boolean;
}

// ── CvsqlConfig ──────────────────────────────────────────────────────

export interface CvsqlConfig extends ConversionSettings {
  /** Per-scenario settings keyed by scenario id; `*` applies to all. */
  readonly scenarios?: Readonly<Record<string, ConversionSettings>>;
}

/** Fully resolved settings for one conversion. */
export interface ConversionOptions {
  readonly dialect: string;
  readonly schemaOverrides: Readonly<Record<string, string>>;
  readonly targetSchema?: string;
  readonly defaultViewSchema: string;
  readonly client?: string;
  readonly language?: string;
  readonly parameters: Readonly<Record<string, string>>;
  readonly currency: CurrencyConfig;
  readonly createView: boolean;
  readonly viewName?: string;
  readonly autoCorrect: boolean;
  readonly correctionThreshold: number;
  readonly strict: boolean;
}

export const DEFAULT_OPTIONS: ConversionOptions = Object.freeze({
  dialect: 'snowflake',
  schemaOverrides: {},
  defaultViewSchema: '_SYS_BIC',
  parameters: {},
  currency: {},
  createView: false,
  autoCorrect: true,
  correctionThreshold: 0.8,
  strict: false,
});

// ── Validation ───────────────────────────────────────────────────────

function optionalString(record: UnknownRecord, key: string, where: string): string | undefined {
  const value = record[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'string') {
    throw new Error(`${where}${key} must be a string`);
  }
  return value;
}

function optionalBoolean(record: UnknownRecord, key: string, where: string): boolean | undefined {
  const value = record[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'boolean') {
    throw new Error(`${where}${key} must be a boolean`);
  }
  return value;
}

function optionalStringMap(record: UnknownRecord, key: string, where: string): Record<string, string> | undefined {
  const value = record[key];
  if (value === undefined) return undefined;
  if (!isRecord(value)) {
    throw new Error(`${where}${key} must be an object of strings`);
  }
  const result: Record<string, string> = {};
  for (const [name, entry] of Object.entries(value)) {
    if (typeof entry !== 'string') {
      throw new Error(`${where}${key}.${name} must be a string`);
    }
    result[name] = entry;
  }
  return result;
}

function readSettings(record: UnknownRecord, where: string): ConversionSettings {
  const threshold = record.correctionThreshold;
  if (threshold !== undefined && (typeof threshold !== 'number' || threshold < 0 || threshold > 1)) {
    throw new Error(`${where}correctionThreshold must be a number between 0 and 1`);
  }

  let currency: CurrencyConfig | undefined;
  if (record.currency !== undefined) {
    if (!isRecord(record.currency)) {
      throw new Error(`${where}currency must be an object`);
    }
    currency = {
      udf: optionalString(record.currency, 'udf', `${where}currency.`),
      ratesTable: optionalString(record.currency, 'ratesTable', `${where}currency.`),
      schema: optionalString(record.currency, 'schema', `${where}currency.`),
    };
  }

  return {
    dialect: optionalString(record, 'dialect', where),
    schemaOverrides: optionalStringMap(record, 'schemaOverrides', where),
    targetSchema: optionalString(record, 'targetSchema', where),
    defaultViewSchema: optionalString(record, 'defaultViewSchema', where),
    client: optionalString(record, 'client', where),
    language: optionalString(record, 'language', where),
    parameters: optionalStringMap(record, 'parameters', where),
    currency,
    createView: optionalBoolean(record, 'createView', where),
    viewName: optionalString(record, 'viewName', where),
    autoCorrect: optionalBoolean(record, 'autoCorrect', where),
    correctionThreshold: typeof threshold === 'number' ? threshold : undefined,
    strict: optionalBoolean(record, 'strict', where),
  };
}

/** Check an untyped value (e.g. a loaded config module) against CvsqlConfig. */
export function validateConfig(value: unknown): CvsqlConfig {
  if (!isRecord(value)) {
    throw new Error('Config must be an object');
  }

  const settings = readSettings(value, '');
  if (value.scenarios === undefined) return settings;

  if (!isRecord(value.scenarios)) {
    throw new Error('scenarios must be an object keyed by scenario id');
  }
  const scenarios: Record<string, ConversionSettings> = {};
  for (const [id, entry] of Object.entries(value.scenarios)) {
    if (!isRecord(entry)) {
      throw new Error(`scenarios.${id} must be an object`);
    }
    scenarios[id] = readSettings(entry, `scenarios.${id}.`);
  }
  return { ...settings, scenarios };
}

// ── defineConfig ─────────────────────────────────────────────────────

export function defineConfig(config: CvsqlConfig): CvsqlConfig {
  return Object.freeze(validateConfig(config));
}

// ── Resolution ───────────────────────────────────────────────────────

function overlay(base: ConversionOptions, settings: ConversionSettings | undefined): ConversionOptions {
  if (!settings) return base;
  return {
    dialect: settings.dialect ?? base.dialect,
    schemaOverrides: { ...base.schemaOverrides, ...settings.schemaOverrides },
    targetSchema: settings.targetSchema ?? base.targetSchema,
    defaultViewSchema: settings.defaultViewSchema ?? base.defaultViewSchema,
    client: settings.client ?? base.client,
    language: settings.language ?? base.language,
    parameters: { ...base.parameters, ...settings.parameters },
    currency: {
      udf: settings.currency?.udf ?? base.currency.udf,
      ratesTable: settings.currency?.ratesTable ?? base.currency.ratesTable,
      schema: settings.currency?.schema ?? base.currency.schema,
    },
    createView: settings.createView ?? base.createView,
    viewName: settings.viewName ?? base.viewName,
    autoCorrect: settings.autoCorrect ?? base.autoCorrect,
    correctionThreshold: settings.correctionThreshold ?? base.correctionThreshold,
    strict: settings.strict ?? base.strict,
  };
}

/**
 * Layer defaults, project config, the `*` scenario entry, the entry for
 * `scenarioId`, and finally explicit overrides such as CLI flags.
 */
export function resolveConversionOptions(
  config: CvsqlConfig = {},
  scenarioId?: string,
  overrides?: ConversionSettings,
): ConversionOptions {
  const { scenarios, ...project } = config;
  let options = overlay(DEFAULT_OPTIONS, project);
  options = overlay(options, scenarios?.['*']);
  if (scenarioId !== undefined) {
    options = overlay(options, scenarios?.[scenarioId]);
  }
  return Object.freeze(overlay(options, overrides));
}
