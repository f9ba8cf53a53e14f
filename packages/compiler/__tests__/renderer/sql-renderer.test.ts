import { readFileSync } from 'node:fs';
import { describe, it, expect } from 'vitest';
import { SqlTypes } from '../../src/core/data-types.js';
import { RenderError } from '../../src/core/errors.js';
import { parseScenario } from '../../src/parser/xml-parser.js';
import { ScenarioBuilder, calc, col, render, validate } from '../../src/testing/index.js';
import type { RenderResult } from '../../src/renderer/sql-renderer.js';

const fixture = (name: string): string => readFileSync(new URL(`../fixtures/${name}`, import.meta.url), 'utf-8');

function stageSql(result: RenderResult, name: string): string {
  const stage = result.stages.find((s) => s.name === name);
  if (!stage) throw new Error(`no stage ${name}`);
  return stage.sql;
}

const EMPLOYEES_SQL = `WITH
  EMPLOYEES AS (
    SELECT
      "ID",
      "NAME",
      "SALARY"
    FROM "HR"."EMPLOYEES"
  ),
  DEPT AS (
    SELECT
      "DEPT_NAME",
      "ID"
    FROM "HR"."DEPT"
  ),
  Join_1 AS (
    SELECT
      EMPLOYEES."ID",
      EMPLOYEES."NAME",
      EMPLOYEES."SALARY",
      DEPT."DEPT_NAME"
    FROM EMPLOYEES
    INNER JOIN DEPT ON EMPLOYEES."ID" = DEPT."ID"
  ),
  Aggregation_1 AS (
    SELECT
      Join_1."DEPT_NAME",
      SUM(CAST(Join_1."SALARY" AS NUMBER(38, 6))) AS "SALARY"
    FROM Join_1
    GROUP BY Join_1."DEPT_NAME"
  )
SELECT
  "DEPT_NAME",
  "SALARY"
FROM Aggregation_1`;

describe('renderScenario', () => {
  describe('employee salaries', () => {
    const scenario = parseScenario(fixture('employees.xml'));

    it('renders one stage per node in dependency order', () => {
      const result = render(scenario);
      expect(result.stages.map((s) => s.name)).toEqual(['EMPLOYEES', 'DEPT', 'Join_1', 'Aggregation_1']);
      expect(result.sql).toBe(EMPLOYEES_SQL);
      expect(result.query).toBe(EMPLOYEES_SQL);
      expect(result.warnings).toEqual([]);
    });

    it('is deterministic', () => {
      expect(render(scenario).sql).toBe(render(scenario).sql);
    });

    it('reports stage column types in dialect spelling', () => {
      const result = render(scenario);
      const aggregation = result.stages.find((s) => s.name === 'Aggregation_1');
      expect(aggregation?.columns).toEqual([
        { name: 'DEPT_NAME', type: 'VARCHAR(40)', hidden: false },
        { name: 'SALARY', type: 'NUMBER(38, 6)', hidden: false },
      ]);
    });

    it('uses the numeric cast of the target dialect', () => {
      const result = render(scenario, { dialect: 'hana' });
      expect(stageSql(result, 'Aggregation_1').split('\n')[2]).toBe(
        '  SUM(TO_DECIMAL(Join_1."SALARY", 38, 6)) AS "SALARY"',
      );
    });

    it('applies schema overrides', () => {
      const result = render(scenario, { schemaOverrides: { HR: 'HR_PROD' } });
      expect(stageSql(result, 'DEPT').split('\n').at(-1)).toBe('FROM "HR_PROD"."DEPT"');
    });

    it('validates cleanly', () => {
      const { errors, warnings } = validate(scenario);
      expect(errors).toEqual([]);
      expect(warnings).toEqual([]);
    });
  });

  describe('sales overview', () => {
    const scenario = parseScenario(fixture('sales.xml'));
    const result = render(scenario);

    it('sanitizes stage names', () => {
      expect(result.stages.map((s) => s.name)).toEqual(['VBAK', 'ARCHIVE', 'Current_Orders', 'Archived', 'Union_1']);
    });

    it('inlines calculated columns and binds parameter defaults', () => {
      expect(stageSql(result, 'Current_Orders')).toBe(`SELECT
  VBAK."VBELN",
  VBAK."NETWR",
  VBAK."GJAHR",
  VBAK."AUART",
  VBAK."NETWR" * 1.1 AS "NET_EUR",
  LEFT(LEFT(VBAK."VBELN", 8), 4) AS "LABEL"
FROM VBAK
WHERE VBAK."AUART" IN ('TA', 'ZOR') AND VBAK."GJAHR" = 2024`);
    });

    it('prefers supplied parameter values', () => {
      const supplied = render(scenario, { parameters: { P_YEAR: '2023' } });
      expect(stageSql(supplied, 'Current_Orders').split('\n').at(-1)).toBe(
        `WHERE VBAK."AUART" IN ('TA', 'ZOR') AND VBAK."GJAHR" = 2023`,
      );
    });

    it('renders union branches with constants', () => {
      expect(stageSql(result, 'Union_1')).toBe(`SELECT
  Current_Orders."VBELN",
  Current_Orders."NETWR",
  'LIVE' AS "SOURCE"
FROM Current_Orders
UNION ALL
SELECT
  Archived."VBELN",
  Archived."NETWR",
  'ARCHIVE' AS "SOURCE"
FROM Archived`);
    });

    it('selects the visible output columns', () => {
      expect(result.sql.endsWith('SELECT\n  "VBELN",\n  "NETWR",\n  "SOURCE"\nFROM Union_1')).toBe(true);
      expect(result.warnings).toEqual([]);
      expect(validate(scenario).errors).toEqual([]);
    });
  });

  describe('stages built in memory', () => {
    it('casts string literals compared with date columns', () => {
      const scenario = new ScenarioBuilder('Orders')
        .table('ORDERS', { schema: 'SALES', columns: [['ERDAT', SqlTypes.DATE()], 'VBELN'] })
        .projection('Recent', 'ORDERS', [col('ERDAT'), col('VBELN')], { where: [`"ERDAT" >= '2024-01-01'`] })
        .build();
      expect(stageSql(render(scenario), 'Recent').split('\n').at(-1)).toBe(
        `WHERE ORDERS."ERDAT" >= TO_DATE('2024-01-01')`,
      );
    });

    it('aliases renamed columns', () => {
      const scenario = new ScenarioBuilder()
        .table('T', { columns: ['MATNR'] })
        .projection('P', 'T', [col('MATERIAL', { field: 'MATNR' })])
        .build();
      expect(stageSql(render(scenario), 'P')).toBe('SELECT\n  T."MATNR" AS "MATERIAL"\nFROM T');
    });

    it('reads calculation views from the default view schema', () => {
      const scenario = new ScenarioBuilder()
        .table('BASE', { sourceType: 'view', object: 'sales.models/CV_BASE', columns: ['A'] })
        .build();
      expect(stageSql(render(scenario), 'BASE')).toBe('SELECT\n  "A"\nFROM "_SYS_BIC"."sales.models/CV_BASE"');
    });

    it('wraps aggregations with calculated columns in a grouped subquery', () => {
      const scenario = new ScenarioBuilder()
        .table('SALES', { columns: [['REGION', SqlTypes.VARCHAR(10)], ['AMOUNT', SqlTypes.DECIMAL(15, 2)]] })
        .aggregation('Aggregation_1', 'SALES', [
          col('REGION'),
          col('AMOUNT', { aggregation: 'SUM' }),
          calc('DOUBLED', '"AMOUNT" * 2'),
        ])
        .build();
      expect(stageSql(render(scenario), 'Aggregation_1')).toBe(`SELECT
  grouped."REGION",
  grouped."AMOUNT",
  grouped."AMOUNT" * 2 AS "DOUBLED"
FROM (
  SELECT
    SALES."REGION",
    SUM(SALES."AMOUNT") AS "AMOUNT"
  FROM SALES
  GROUP BY SALES."REGION"
) AS grouped`);
    });

    it('groups by the columns the aggregation names', () => {
      const scenario = new ScenarioBuilder()
        .table('SALES', { columns: ['REGION', 'YEAR', ['AMOUNT', SqlTypes.DECIMAL(15, 2)]] })
        .aggregation('Aggregation_1', 'SALES', [col('REGION'), col('YEAR'), col('AMOUNT', { aggregation: 'SUM' })], {
          groupBy: ['YEAR', 'REGION'],
        })
        .build();
      expect(stageSql(render(scenario), 'Aggregation_1').split('\n').at(-1)).toBe(
        'GROUP BY SALES."YEAR", SALES."REGION"',
      );
    });

    it('warns about joins without join attributes', () => {
      const scenario = new ScenarioBuilder()
        .table('A', { columns: ['X'] })
        .table('B', { columns: ['Y'] })
        .join('Join_1', { left: 'A', right: 'B' }, [col('X'), col('Y')])
        .build();
      const result = render(scenario);
      expect(stageSql(result, 'Join_1').split('\n')).toContain('INNER JOIN B ON 1 = 1');
      expect(result.warnings.map((w) => w.code)).toEqual(['CARTESIAN_JOIN']);
    });

    it('fills missing union columns with typed NULLs', () => {
      const scenario = new ScenarioBuilder()
        .table('A', { columns: ['ID', ['NOTE', SqlTypes.VARCHAR(40)]] })
        .table('B', { columns: ['ID'] })
        .union('Union_1', ['ID', 'NOTE'], [{ input: 'A' }, { input: 'B' }])
        .build();
      expect(stageSql(render(scenario), 'Union_1').split('\n')).toContain('  CAST(NULL AS VARCHAR(40)) AS "NOTE"');
    });

    it('warns when a calculated column falls back to the opaque type', () => {
      const scenario = new ScenarioBuilder()
        .table('T', { columns: ['A'] })
        .projection('P', 'T', [col('A'), calc('MYSTERY', 'unknownfn("A")')])
        .build();
      const codes = render(scenario).warnings.map((w) => w.code);
      expect(codes).toContain('DEFAULT_TYPE');
    });
  });

  describe('view DDL', () => {
    const scenario = parseScenario(fixture('employees.xml'));

    it('creates or replaces the view on snowflake', () => {
      const result = render(scenario, { createView: true });
      expect(result.sql).toBe(`CREATE OR REPLACE VIEW "EMPLOYEE_SALARY" AS\n${result.query};`);
    });

    it('drops before creating on hana', () => {
      const result = render(scenario, { dialect: 'hana', createView: true, viewName: 'SALARIES' });
      expect(result.sql).toBe(`DROP VIEW "SALARIES" CASCADE;\nCREATE VIEW "SALARIES" AS\n${result.query};`);
    });

    it('needs a view name', () => {
      const unnamed = new ScenarioBuilder('').table('T', { columns: ['A'] }).build();
      expect(() => render(unnamed, { createView: true })).toThrow(
        'Cannot create a view without a view name or scenario id',
      );
    });
  });

  describe('errors', () => {
    it('rejects nodes whose stage names collide', () => {
      const scenario = new ScenarioBuilder()
        .table('Stage 1', { columns: ['A'] })
        .table('Stage_1', { columns: ['A'] })
        .build();
      expect(() => render(scenario)).toThrow(RenderError);
      expect(() => render(scenario)).toThrow("Nodes 'Stage 1' and 'Stage_1' both render as stage 'Stage_1'");
    });

    it('requires a value for every input parameter', () => {
      const scenario = new ScenarioBuilder()
        .table('T', { columns: ['GJAHR'] })
        .projection('P', 'T', [col('GJAHR')], { where: ['"GJAHR" = $$P_MISSING$$'] })
        .build();
      expect(() => render(scenario)).toThrow("No value for input parameter '$$P_MISSING$$'");
      expect(stageSql(render(scenario, { parameters: { P_MISSING: 'X' } }), 'P').split('\n').at(-1)).toBe(
        `WHERE T."GJAHR" = 'X'`,
      );
    });

    it('rejects grouping by an aggregated column', () => {
      const scenario = new ScenarioBuilder()
        .table('SALES', { columns: ['REGION', ['AMOUNT', SqlTypes.DECIMAL(15, 2)]] })
        .aggregation('Aggregation_1', 'SALES', [col('REGION'), col('AMOUNT', { aggregation: 'SUM' })], {
          groupBy: ['AMOUNT'],
        })
        .build();
      expect(() => render(scenario)).toThrow("Aggregation node 'Aggregation_1' cannot group by 'AMOUNT'");
    });

    it('rejects union columns of incompatible types', () => {
      const scenario = new ScenarioBuilder()
        .table('A', { columns: [['AMOUNT', SqlTypes.DECIMAL(15, 2)]] })
        .table('B', { columns: [['AMOUNT', SqlTypes.DATE()]] })
        .union('Union_1', ['AMOUNT'], [{ input: 'A' }, { input: 'B' }])
        .build();
      expect(() => render(scenario)).toThrow(
        "Union column 'AMOUNT' mixes DECIMAL(15, 2) from 'A' with DATE from 'B'",
      );
    });
  });
});
