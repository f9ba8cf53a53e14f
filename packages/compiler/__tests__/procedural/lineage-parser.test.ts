import { readFileSync } from 'node:fs';
import { describe, it, expect } from 'vitest';
import { SqlTypes } from '../../src/core/data-types.js';
import { ParseError } from '../../src/core/errors.js';
import { toNodeKey } from '../../src/core/types.js';
import { parseScenario } from '../../src/parser/xml-parser.js';
import { parseLineage, type LineageStage, type ParsedSql } from '../../src/procedural/lineage-parser.js';
import { ScenarioBuilder, calc, col, render } from '../../src/testing/index.js';

const fixture = (name: string): string => readFileSync(new URL(`../fixtures/${name}`, import.meta.url), 'utf-8');

function stage(parsed: ParsedSql, name: string): LineageStage {
  const found = parsed.stages.find((s) => s.key === toNodeKey(name));
  if (!found) throw new Error(`no stage ${name}`);
  return found;
}

describe('parseLineage', () => {
  describe('employee salaries', () => {
    const rendered = render(parseScenario(fixture('employees.xml')));
    const parsed = parseLineage(rendered.sql);

    it('reads every stage and the final select', () => {
      expect(parsed.stages.map((s) => [s.name, s.kind])).toEqual([
        ['EMPLOYEES', 'table'],
        ['DEPT', 'table'],
        ['Join_1', 'join'],
        ['Aggregation_1', 'aggregation'],
      ]);
      expect(parsed.output).toBe(toNodeKey('Aggregation_1'));
      expect(parsed.outputColumns).toEqual(['DEPT_NAME', 'SALARY']);
    });

    it('records the physical object of table stages', () => {
      expect(stage(parsed, 'EMPLOYEES').table).toEqual({ schema: 'HR', name: 'EMPLOYEES' });
      expect(stage(parsed, 'EMPLOYEES').columns.map((c) => c.name)).toEqual(['ID', 'NAME', 'SALARY']);
    });

    it('reads join inputs and keys', () => {
      expect(stage(parsed, 'Join_1').join).toEqual({
        type: 'inner',
        left: toNodeKey('EMPLOYEES'),
        right: toNodeKey('DEPT'),
        keys: [{ left: 'ID', right: 'ID' }],
      });
      expect(stage(parsed, 'Join_1').columns[3]).toEqual({
        name: 'DEPT_NAME',
        kind: 'real',
        source: { qualifier: 'DEPT', field: 'DEPT_NAME' },
        text: 'DEPT."DEPT_NAME"',
      });
    });

    it('sees through the numeric cast of an aggregate', () => {
      const aggregation = stage(parsed, 'Aggregation_1');
      expect(aggregation.inputs).toEqual([toNodeKey('Join_1')]);
      expect(aggregation.groupBy).toEqual(['DEPT_NAME']);
      expect(aggregation.columns[1]).toMatchObject({
        name: 'SALARY',
        kind: 'real',
        source: { qualifier: 'Join_1', field: 'SALARY' },
        aggregate: 'SUM',
      });
    });

    it('skips a leading view statement', () => {
      const ddl = render(parseScenario(fixture('employees.xml')), { dialect: 'hana', createView: true });
      expect(parseLineage(ddl.sql).output).toBe(toNodeKey('Aggregation_1'));
    });
  });

  describe('sales overview', () => {
    const parsed = parseLineage(render(parseScenario(fixture('sales.xml'))).sql);

    it('keeps calculated items with their SQL text', () => {
      const current = stage(parsed, 'Current_Orders');
      expect(current.kind).toBe('projection');
      expect(current.columns.filter((c) => c.kind === 'calculated').map((c) => [c.name, c.text])).toEqual([
        ['NET_EUR', 'VBAK."NETWR" * 1.1'],
        ['LABEL', 'LEFT(LEFT(VBAK."VBELN", 8), 4)'],
      ]);
      expect(current.where).toBe(`VBAK."AUART" IN ('TA', 'ZOR') AND VBAK."GJAHR" = 2024`);
    });

    it('splits union branches', () => {
      const union = stage(parsed, 'Union_1');
      expect(union.kind).toBe('union');
      expect(union.inputs).toEqual([toNodeKey('Current_Orders'), toNodeKey('Archived')]);
      expect(union.branches?.[1]?.columns[2]).toEqual({ name: 'SOURCE', kind: 'calculated', text: "'ARCHIVE'" });
    });
  });

  it('reads aggregations wrapped for calculated columns', () => {
    const scenario = new ScenarioBuilder()
      .table('SALES', { columns: [['REGION', SqlTypes.VARCHAR(10)], ['AMOUNT', SqlTypes.DECIMAL(15, 2)]] })
      .aggregation('Aggregation_1', 'SALES', [
        col('REGION'),
        col('AMOUNT', { aggregation: 'SUM' }),
        calc('DOUBLED', '"AMOUNT" * 2'),
      ])
      .build();
    const aggregation = stage(parseLineage(render(scenario).sql), 'Aggregation_1');
    expect(aggregation.kind).toBe('aggregation');
    expect(aggregation.inputs).toEqual([toNodeKey('SALES')]);
    expect(aggregation.groupBy).toEqual(['REGION']);
    expect(aggregation.columns.map((c) => [c.name, c.kind, c.aggregate])).toEqual([
      ['REGION', 'real', undefined],
      ['AMOUNT', 'real', 'SUM'],
      ['DOUBLED', 'calculated', undefined],
    ]);
  });

  it('reads outer join types', () => {
    const parsed = parseLineage(`WITH
  A AS (SELECT "K" FROM "S"."A"),
  B AS (SELECT "K" FROM "S"."B"),
  J AS (SELECT A."K" FROM A LEFT OUTER JOIN B ON B."K" = A."K")
SELECT "K" FROM J`);
    expect(stage(parsed, 'J').join).toEqual({
      type: 'left',
      left: toNodeKey('A'),
      right: toNodeKey('B'),
      keys: [{ left: 'K', right: 'K' }],
    });
  });

  it('reads a stage named after its table as a table', () => {
    const parsed = parseLineage(`WITH
  T AS (SELECT "A" FROM "T"),
  P AS (SELECT T."A" FROM T)
SELECT "A" FROM P`);
    expect(stage(parsed, 'T')).toMatchObject({ kind: 'table', inputs: [], table: { name: 'T' } });
    expect(stage(parsed, 'P')).toMatchObject({ kind: 'projection', inputs: [toNodeKey('T')] });
  });

  describe('errors', () => {
    it('requires WITH stages', () => {
      expect(() => parseLineage('SELECT 1')).toThrow('SQL has no WITH stages');
    });

    it('treats stage names case-insensitively', () => {
      const sql = 'WITH Stage_1 AS (SELECT "A" FROM "S"."T"), stage_1 AS (SELECT "A" FROM "S"."U") SELECT "A" FROM Stage_1';
      expect(() => parseLineage(sql)).toThrow("Stage 'stage_1' is defined more than once");
    });

    it('requires an alias on calculated items', () => {
      const sql = 'WITH A AS (SELECT "K" + 1 FROM "S"."A") SELECT "K" FROM A';
      try {
        parseLineage(sql);
        expect.unreachable();
      } catch (err) {
        expect(err).toBeInstanceOf(ParseError);
        if (!(err instanceof ParseError)) return;
        expect(err.step).toBe('lineage');
        expect(err.message).toBe(`Calculated select item '"K" + 1' has no alias`);
        expect(err.context).toEqual({ stage: 'A' });
      }
    });

    it('requires the final select to read a stage', () => {
      expect(() => parseLineage('WITH A AS (SELECT "K" FROM "S"."A") SELECT "K" FROM other')).toThrow(
        'Final SELECT must read from a stage: other',
      );
    });
  });
});
