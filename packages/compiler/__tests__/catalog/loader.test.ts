import { describe, it, expect } from 'vitest';
import { CatalogError } from '../../src/core/errors.js';
import {
  defaultCatalog,
  loadCatalog,
  parseCatalog,
  parseDialectProfiles,
  parseFunctionRules,
} from '../../src/catalog/loader.js';

const DIALECTS = `
dialects:
  - name: testdb
    numericCast: 'CAST({0} AS DECIMAL(38, 6))'
    dateCast: 'DATE({0})'
    opaqueType: TEXT
    types: { VARCHAR: TEXT, DECIMAL: NUMERIC, INTEGER: INT, DOUBLE: REAL, DATE: DATE, TIMESTAMP: TIMESTAMP, BOOLEAN: BOOL }
    concat: '+'
    createView: 'CREATE VIEW {view} AS'
    functionReplacements: { iif: CASE_WHEN }
    reservedKeywords: [select, from]
`;

describe('defaultCatalog', () => {
  it('loads the bundled dialects', () => {
    expect(defaultCatalog().dialectNames()).toEqual(['snowflake', 'hana']);
  });

  it('keeps literal keywords as reserved words', () => {
    const snowflake = defaultCatalog().getDialect('snowflake').reservedKeywords;
    expect(['TRUE', 'FALSE', 'NULL'].filter((word) => snowflake.has(word))).toEqual(['TRUE', 'FALSE', 'NULL']);
    expect(defaultCatalog().getDialect('hana').reservedKeywords.has('NULL')).toBe(true);
  });

  it('is read once', () => {
    expect(defaultCatalog()).toBe(defaultCatalog());
  });

  it('looks up functions case-insensitively', () => {
    expect(defaultCatalog().getFunction('leftstr')?.name).toBe('LEFTSTR');
    expect(defaultCatalog().getFunction('NO_SUCH_FUNCTION')).toBeUndefined();
  });

  it('lists the available dialects for an unknown one', () => {
    expect(() => defaultCatalog().getDialect('oracle')).toThrow("Unknown dialect 'oracle'. Available: snowflake, hana");
  });

  it('gives per-dialect actions precedence over the shared one', () => {
    const catalog = defaultCatalog();
    const rule = catalog.getFunction('IF');
    expect(rule && catalog.actionFor(rule, 'hana')?.kind).toBe('template');
    const match = catalog.getFunction('MATCH');
    expect(match && catalog.actionFor(match, 'hana')).toBeUndefined();
  });
});

describe('loadCatalog', () => {
  it('reports a missing rule directory', () => {
    expect(() => loadCatalog('/nonexistent/catalog')).toThrow(CatalogError);
    expect(() => loadCatalog('/nonexistent/catalog')).toThrow('Cannot read catalog file /nonexistent/catalog/functions.yaml');
  });
});

describe('parseFunctionRules', () => {
  it('reads arity ranges', () => {
    const [rule] = parseFunctionRules(`
functions:
  - name: coalesce2
    arity: { min: 2 }
    rename: COALESCE
`);
    expect(rule?.name).toBe('COALESCE2');
    expect(rule?.arity).toEqual({ min: 2, max: Number.POSITIVE_INFINITY });
    expect(rule?.fallback).toEqual({ kind: 'rename', target: 'COALESCE' });
  });

  it('requires exactly one of template and rename', () => {
    expect(() => parseFunctionRules(`
functions:
  - name: foo
    template: 'BAR({0})'
    rename: BAR
`)).toThrow("functions.yaml: FOO: exactly one of 'template' or 'rename' is required");
  });

  it('wraps template syntax errors', () => {
    expect(() => parseFunctionRules(`
functions:
  - name: foo
    template: 'LEFT({0}'
`)).toThrow("functions.yaml: FOO.template: invalid template: Expected ')'");
  });

  it('rejects a malformed arity', () => {
    expect(() => parseFunctionRules(`
functions:
  - name: foo
    arity: many
    rename: BAR
`)).toThrow("functions.yaml: FOO: 'arity' must be a count or { min, max }");
  });
});

describe('parseDialectProfiles', () => {
  it('reads a complete profile', () => {
    const [profile] = parseDialectProfiles(DIALECTS);
    expect(profile?.name).toBe('testdb');
    expect(profile?.concatOperator).toBe('+');
    expect(profile?.typeNames.OPAQUE).toBe('TEXT');
    expect(profile?.functionReplacements.get('IIF')).toBe('CASE_WHEN');
    expect(profile?.reservedKeywords.has('SELECT')).toBe(true);
    expect(profile?.numericAggregates.size).toBe(0);
  });

  it('rejects an unknown concatenation operator', () => {
    expect(() => parseDialectProfiles(DIALECTS.replace("concat: '+'", "concat: '&'"))).toThrow(
      "dialects.yaml: testdb: 'concat' must be '||' or '+'",
    );
  });

  it('requires every type name', () => {
    expect(() => parseDialectProfiles(DIALECTS.replace(', BOOLEAN: BOOL', ''))).toThrow(
      "dialects.yaml: testdb: 'types.BOOLEAN' is required",
    );
  });
});

describe('parseCatalog', () => {
  it('rejects duplicate function rules', () => {
    expect(() =>
      parseCatalog({
        functions: 'functions:\n  - { name: foo, rename: A }\n  - { name: FOO, rename: B }\n',
        patterns: 'patterns: []\n',
        dialects: DIALECTS,
      }),
    ).toThrow("Duplicate function rule 'FOO'");
  });

  it('rejects rules aimed at unknown dialects', () => {
    expect(() =>
      parseCatalog({
        functions: 'functions: []\n',
        patterns: "patterns:\n  - { name: p, match: 'now()', rewrite: { oracle: 'SYSDATE' } }\n",
        dialects: DIALECTS,
      }),
    ).toThrow("Pattern 'p' targets unknown dialect 'oracle'");
  });
});
