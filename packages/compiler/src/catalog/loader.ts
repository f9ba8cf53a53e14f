import { readFileSync } from 'node:fs';
import { createRequire } from 'node:module';
import { dirname, join } from 'node:path';
import { parse } from 'yaml';
import type { TypeName } from '../core/data-types.js';
import type { Expression } from '../core/expression.js';
import { CatalogError, ParseError } from '../core/errors.js';
import { parseFormula } from '../core/formula-parser.js';
import { isRecord, isStringArray, type UnknownRecord } from '../core/guards.js';
import {
  Catalog,
  type ArityConstraint,
  type DialectProfile,
  type FunctionRule,
  type PatternRule,
  type RuleAction,
} from './catalog.js';

// ── Rule files ───────────────────────────────────────────────────────

export interface CatalogSources {
  readonly functions: string;
  readonly patterns: string;
  readonly dialects: string;
}

export const CATALOG_FILES = {
  functions: 'functions.yaml',
  patterns: 'patterns.yaml',
  dialects: 'dialects.yaml',
} as const;

// OPAQUE is spelled by the profile's `opaqueType`.
const TYPE_NAMES: readonly Exclude<TypeName, 'OPAQUE'>[] = [
  'VARCHAR', 'DECIMAL', 'INTEGER', 'DOUBLE', 'DATE', 'TIMESTAMP', 'BOOLEAN',
];

// ── Field readers ────────────────────────────────────────────────────

function entries(doc: unknown, key: string, file: string): UnknownRecord[] {
  if (!isRecord(doc)) {
    throw new CatalogError(`${file}: expected a mapping at the top level`);
  }
  const list = doc[key];
  if (!Array.isArray(list)) {
    throw new CatalogError(`${file}: expected a '${key}' list`);
  }
  return list.map((entry, i) => {
    if (!isRecord(entry)) {
      throw new CatalogError(`${file}: ${key}[${i}] must be a mapping`);
    }
    return entry;
  });
}

function requireString(entry: UnknownRecord, key: string, where: string): string {
  const value = entry[key];
  if (typeof value !== 'string' || value.trim() === '') {
    throw new CatalogError(`${where}: '${key}' must be a non-empty string`);
  }
  return value;
}

function optionalString(entry: UnknownRecord, key: string, where: string): string | undefined {
  const value = entry[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string') {
    throw new CatalogError(`${where}: '${key}' must be a string`);
  }
  return value;
}

function template(source: string, where: string): Expression {
  try {
    return parseFormula(source, { templates: true });
  } catch (err) {
    if (err instanceof ParseError) {
      throw new CatalogError(`${where}: invalid template: ${err.message}`);
    }
    throw err;
  }
}

/** A value that is either one string for all dialects or a dialect map. */
function perDialect(
  value: unknown,
  where: string,
): { readonly all?: string; readonly byDialect: ReadonlyMap<string, string> } {
  if (typeof value === 'string') {
    return { all: value, byDialect: new Map() };
  }
  if (!isRecord(value)) {
    throw new CatalogError(`${where}: expected a string or a dialect mapping`);
  }
  const byDialect = new Map<string, string>();
  for (const [dialect, text] of Object.entries(value)) {
    if (typeof text !== 'string') {
      throw new CatalogError(`${where}.${dialect}: expected a string`);
    }
    byDialect.set(dialect, text);
  }
  return { byDialect };
}

function arity(entry: UnknownRecord, where: string): ArityConstraint | undefined {
  const value = entry.arity;
  if (value === undefined || value === null) return undefined;
  if (typeof value === 'number' && Number.isInteger(value) && value >= 0) {
    return { min: value, max: value };
  }
  if (isRecord(value)) {
    const min = value.min ?? 0;
    const max = value.max ?? Number.POSITIVE_INFINITY;
    if (typeof min === 'number' && typeof max === 'number' && min >= 0 && min <= max) {
      return { min, max };
    }
  }
  throw new CatalogError(`${where}: 'arity' must be a count or { min, max }`);
}

// ── Function rules ───────────────────────────────────────────────────

function toAction(kind: 'template' | 'rename', text: string, where: string): RuleAction {
  return kind === 'template'
    ? { kind, source: text, template: template(text, where) }
    : { kind, target: text };
}

export function parseFunctionRules(text: string, file: string = CATALOG_FILES.functions): FunctionRule[] {
  return entries(parse(text), 'functions', file).map((entry, i) => {
    const name = requireString(entry, 'name', `${file}: functions[${i}]`).toUpperCase();
    const where = `${file}: ${name}`;

    const hasTemplate = entry.template !== undefined;
    const hasRename = entry.rename !== undefined;
    if (hasTemplate === hasRename) {
      throw new CatalogError(`${where}: exactly one of 'template' or 'rename' is required`);
    }

    const kind = hasTemplate ? 'template' : 'rename';
    const spec = perDialect(hasTemplate ? entry.template : entry.rename, `${where}.${kind}`);
    const actions = new Map<string, RuleAction>();
    for (const [dialect, body] of spec.byDialect) {
      actions.set(dialect, toAction(kind, body, `${where}.${kind}.${dialect}`));
    }

    const rule: FunctionRule = {
      name,
      description: optionalString(entry, 'description', where),
      arity: arity(entry, where),
      fallback: spec.all === undefined ? undefined : toAction(kind, spec.all, `${where}.${kind}`),
      actions,
    };
    return rule;
  });
}

// ── Pattern rules ────────────────────────────────────────────────────

export function parsePatternRules(text: string, file: string = CATALOG_FILES.patterns): PatternRule[] {
  return entries(parse(text), 'patterns', file).map((entry, i) => {
    const name = requireString(entry, 'name', `${file}: patterns[${i}]`);
    const where = `${file}: ${name}`;
    const source = requireString(entry, 'match', where);
    const match = template(source, `${where}.match`);

    const rewrites = new Map<string, Expression>();
    const rewrite = entry.rewrite;
    if (!isRecord(rewrite)) {
      throw new CatalogError(`${where}: 'rewrite' must map dialects to templates`);
    }
    for (const [dialect, body] of Object.entries(rewrite)) {
      if (typeof body !== 'string') {
        throw new CatalogError(`${where}.rewrite.${dialect}: expected a string`);
      }
      rewrites.set(dialect, template(body, `${where}.rewrite.${dialect}`));
    }

    return { name, description: optionalString(entry, 'description', where), source, match, rewrites };
  });
}

// ── Dialect profiles ─────────────────────────────────────────────────

function typeNames(value: unknown, opaque: string, where: string): Record<TypeName, string> {
  if (!isRecord(value)) {
    throw new CatalogError(`${where}: 'types' must be a mapping`);
  }
  const names: Partial<Record<TypeName, string>> = {};
  for (const typeName of TYPE_NAMES) {
    const spelled = value[typeName];
    if (typeof spelled !== 'string') {
      throw new CatalogError(`${where}: 'types.${typeName}' is required`);
    }
    names[typeName] = spelled;
  }
  return {
    VARCHAR: names.VARCHAR ?? 'VARCHAR',
    DECIMAL: names.DECIMAL ?? 'DECIMAL',
    INTEGER: names.INTEGER ?? 'INTEGER',
    DOUBLE: names.DOUBLE ?? 'DOUBLE',
    DATE: names.DATE ?? 'DATE',
    TIMESTAMP: names.TIMESTAMP ?? 'TIMESTAMP',
    BOOLEAN: names.BOOLEAN ?? 'BOOLEAN',
    OPAQUE: opaque,
  };
}

function stringMap(value: unknown, where: string): Map<string, string> {
  const map = new Map<string, string>();
  if (value === undefined || value === null) return map;
  if (!isRecord(value)) {
    throw new CatalogError(`${where}: expected a mapping`);
  }
  for (const [key, target] of Object.entries(value)) {
    if (typeof target !== 'string') {
      throw new CatalogError(`${where}.${key}: expected a string`);
    }
    map.set(key.toUpperCase(), target);
  }
  return map;
}

function upperSet(value: unknown, where: string): Set<string> {
  if (value === undefined || value === null) return new Set();
  if (!isStringArray(value)) {
    throw new CatalogError(`${where}: expected a list of strings`);
  }
  return new Set(value.map((v) => v.toUpperCase()));
}

export function parseDialectProfiles(text: string, file: string = CATALOG_FILES.dialects): DialectProfile[] {
  return entries(parse(text), 'dialects', file).map((entry, i) => {
    const name = requireString(entry, 'name', `${file}: dialects[${i}]`);
    const where = `${file}: ${name}`;
    const concat = optionalString(entry, 'concat', where) ?? '||';
    if (concat !== '||' && concat !== '+') {
      throw new CatalogError(`${where}: 'concat' must be '||' or '+'`);
    }

    const opaqueType = requireString(entry, 'opaqueType', where);

    return {
      name,
      description: optionalString(entry, 'description', where),
      numericCast: template(requireString(entry, 'numericCast', where), `${where}.numericCast`),
      dateCast: template(requireString(entry, 'dateCast', where), `${where}.dateCast`),
      opaqueType,
      typeNames: typeNames(entry.types, opaqueType, where),
      numericAggregates: upperSet(entry.numericAggregates, `${where}.numericAggregates`),
      concatOperator: concat,
      createView: requireString(entry, 'createView', where),
      dropView: optionalString(entry, 'dropView', where),
      functionReplacements: stringMap(entry.functionReplacements, `${where}.functionReplacements`),
      reservedKeywords: upperSet(entry.reservedKeywords, `${where}.reservedKeywords`),
    };
  });
}

// ── Catalog construction ─────────────────────────────────────────────

export function parseCatalog(sources: CatalogSources): Catalog {
  return Catalog.create({
    functions: parseFunctionRules(sources.functions),
    patterns: parsePatternRules(sources.patterns),
    dialects: parseDialectProfiles(sources.dialects),
  });
}

/** Directory holding the bundled rule files. */
export function defaultCatalogDirectory(): string {
  const require = createRequire(import.meta.url);
  return join(dirname(require.resolve('@cvsql/compiler/package.json')), 'catalog');
}

export function loadCatalog(directory: string = defaultCatalogDirectory()): Catalog {
  const read = (file: string): string => {
    try {
      return readFileSync(join(directory, file), 'utf-8');
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new CatalogError(`Cannot read catalog file ${join(directory, file)}: ${reason}`);
    }
  };

  return parseCatalog({
    functions: read(CATALOG_FILES.functions),
    patterns: read(CATALOG_FILES.patterns),
    dialects: read(CATALOG_FILES.dialects),
  });
}

let bundled: Catalog | undefined;

/** The bundled catalog, read from disk on first use. */
export function defaultCatalog(): Catalog {
  bundled ??= loadCatalog();
  return bundled;
}
