import { readFileSync } from 'node:fs';
import { describe, it, expect } from 'vitest';
import { defaultCatalog } from '../../src/catalog/loader.js';
import { parseScenario } from '../../src/parser/xml-parser.js';
import { validateSql } from '../../src/sql/validator.js';
import { ScenarioBuilder, render } from '../../src/testing/index.js';

const snowflake = defaultCatalog().getDialect('snowflake');

const codes = (sql: string, options: Parameters<typeof validateSql>[1] = {}): string[] =>
  validateSql(sql, options).issues.map((i) => i.code);

describe('validateSql', () => {
  describe('structure', () => {
    it('rejects empty SQL', () => {
      const result = validateSql('   ');
      expect(result.valid).toBe(false);
      expect(result.errors).toEqual([{ severity: 'error', code: 'EMPTY_SQL', message: 'SQL is empty' }]);
    });

    it('requires a SELECT', () => {
      expect(codes('UPDATE t SET a = 1')).toEqual(['NO_SELECT']);
    });

    it('checks parentheses', () => {
      expect(validateSql('SELECT (1').errors.map((e) => e.message)).toEqual(["1 unclosed '('"]);
      expect(validateSql('SELECT 1)').errors).toEqual([
        { severity: 'error', code: 'UNBALANCED_PARENTHESES', message: "Unmatched ')'", line: 1 },
      ]);
    });

    it('reports unterminated literals', () => {
      expect(validateSql("SELECT 'abc").errors).toEqual([
        { severity: 'error', code: 'UNBALANCED_QUOTES', message: 'Unterminated string literal', line: 1 },
      ]);
    });

    it('accepts well-formed SQL', () => {
      const result = validateSql('SELECT a, b FROM t WHERE c = 1');
      expect(result.valid).toBe(true);
      expect(result.issues).toEqual([]);
    });
  });

  describe('stages', () => {
    it('treats stage names case-insensitively', () => {
      const result = validateSql('WITH a AS (SELECT 1), A AS (SELECT 2)\nSELECT x FROM a');
      expect(result.errors).toEqual([
        {
          severity: 'error',
          code: 'DUPLICATE_CTE',
          message: "Stage 'A' is defined more than once (also as 'a')",
          line: 1,
        },
      ]);
    });

    it('reports references to undefined stages', () => {
      const result = validateSql('WITH a AS (SELECT 1 FROM "S"."T")\nSELECT x FROM b');
      expect(result.errors).toEqual([
        { severity: 'error', code: 'UNDEFINED_CTE_REFERENCE', message: "Reference to undefined stage 'b'", line: 2 },
      ]);
    });

    it('reports nodes without a stage', () => {
      const scenario = new ScenarioBuilder().table('T', { columns: ['A'] }).build();
      expect(validateSql('SELECT 1', { scenario }).errors.map((e) => e.message)).toEqual(["Node 'T' has no stage 'T'"]);
    });

    it('warns about stage names that are reserved keywords', () => {
      const result = validateSql('WITH ORDER AS (SELECT 1 AS x)\nSELECT x FROM ORDER', { profile: snowflake });
      expect(result.valid).toBe(true);
      expect(result.warnings.map((w) => w.message)).toEqual(["Stage name 'ORDER' is a reserved keyword in snowflake"]);
    });
  });

  describe('patterns', () => {
    it('reports trailing commas with their line', () => {
      expect(validateSql('SELECT a,\n  b,\nFROM t').errors).toEqual([
        { severity: 'error', code: 'TRAILING_COMMA', message: 'Trailing comma before FROM', line: 2 },
      ]);
    });

    it('reports unresolved placeholders, quoted or not', () => {
      expect(codes("SELECT a FROM t WHERE y = $$P$$ OR z = '$$P$$'")).toEqual([
        'UNRESOLVED_PLACEHOLDER',
        'UNRESOLVED_PLACEHOLDER',
      ]);
    });

    it('warns about always-true joins and SELECT *', () => {
      expect(codes('SELECT * FROM x INNER JOIN y ON 1 = 1')).toEqual(['SELECT_STAR', 'CARTESIAN_JOIN']);
      expect(codes('SELECT x.a FROM x CROSS JOIN y')).toEqual(['CARTESIAN_JOIN']);
    });

    it('flags plus between strings for the dialect', () => {
      expect(codes("SELECT 'a' + b FROM t", { profile: snowflake })).toEqual(['STRING_CONCAT_PLUS']);
    });

    it('flags functions the dialect replaces', () => {
      const result = validateSql('SELECT LEFTSTR(a, 2) FROM t', { profile: snowflake });
      expect(result.warnings).toEqual([
        {
          severity: 'warning',
          code: 'UNSUPPORTED_FUNCTION',
          message: "Function 'LEFTSTR' is not available in snowflake; use LEFT",
          line: 1,
        },
      ]);
    });
  });

  describe('rendered scenarios', () => {
    const scenario = parseScenario(readFileSync(new URL('../fixtures/employees.xml', import.meta.url), 'utf-8'));
    const { sql } = render(scenario);

    it('passes rendered SQL', () => {
      expect(validateSql(sql, { profile: snowflake, scenario }).issues).toEqual([]);
    });

    it('requires the numeric cast on aggregates over non-numeric columns', () => {
      const uncast = sql.replace('SUM(CAST(Join_1."SALARY" AS NUMBER(38, 6)))', 'SUM(Join_1."SALARY")');
      expect(validateSql(uncast, { profile: snowflake, scenario }).errors.map((e) => e.message)).toEqual([
        'SUM over non-numeric column SALARY without a numeric cast',
      ]);
    });
  });
});
