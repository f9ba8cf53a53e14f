import { readFileSync } from 'node:fs';
import { describe, it, expect } from 'vitest';
import { ParseError } from '../../src/core/errors.js';
import { parseScenario } from '../../src/parser/xml-parser.js';
import { LineageGraph } from '../../src/procedural/lineage-graph.js';
import { render } from '../../src/testing/index.js';

const employeesSql = render(
  parseScenario(readFileSync(new URL('../fixtures/employees.xml', import.meta.url), 'utf-8')),
).sql;

describe('LineageGraph', () => {
  const graph = LineageGraph.fromSql(employeesSql);

  it('looks stages up case-insensitively', () => {
    expect(graph.getStage('join_1')?.name).toBe('Join_1');
    expect(graph.getStage('JOIN_1')).toBe(graph.getStage('Join_1'));
    expect(graph.getStage('Join_9')).toBeUndefined();
  });

  it('rejects stages that read each other', () => {
    const sql = `WITH
  P AS (SELECT Q."K" FROM Q),
  Q AS (SELECT P."K" FROM P)
SELECT "K" FROM Q`;
    try {
      LineageGraph.fromSql(sql);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ParseError);
      if (!(err instanceof ParseError)) return;
      expect(err.step).toBe('lineage');
      expect(err.message).toBe('Cycle detected in stage graph: P -> Q -> P');
      expect(err.context).toEqual({ stage: 'P' });
    }
  });

  it('orders stages inputs first', () => {
    expect(graph.executionOrder().map((s) => s.name)).toEqual(['EMPLOYEES', 'DEPT', 'Join_1', 'Aggregation_1']);
    expect(graph.tables().map((s) => s.name)).toEqual(['EMPLOYEES', 'DEPT']);
    expect(graph.joins().map((s) => s.name)).toEqual(['Join_1']);
  });

  describe('findAncestorWithColumn', () => {
    it('follows real columns back to their table', () => {
      const owner = graph.findAncestorWithColumn('Aggregation_1', 'SALARY');
      expect(owner?.stage.name).toBe('EMPLOYEES');
      expect(owner?.field).toBe('SALARY');
      expect(graph.findAncestorWithColumn('aggregation_1', 'dept_name')?.stage.name).toBe('DEPT');
    });

    it('follows renames', () => {
      const renamed = LineageGraph.fromSql(`WITH
  T AS (SELECT "MATNR" FROM "S"."MARA"),
  P AS (SELECT T."MATNR" AS "MATERIAL" FROM T)
SELECT "MATERIAL" FROM P`);
      const owner = renamed.findAncestorWithColumn('P', 'MATERIAL');
      expect(owner?.stage.name).toBe('T');
      expect(owner?.field).toBe('MATNR');
    });

    it('stops at calculated columns', () => {
      const calculated = LineageGraph.fromSql(`WITH
  T AS (SELECT "K" FROM "S"."T"),
  P AS (SELECT T."K" || 'x' AS "K2" FROM T)
SELECT "K2" FROM P`);
      expect(calculated.findAncestorWithColumn('P', 'K2')).toBeUndefined();
    });

    it('returns undefined for unknown stages', () => {
      expect(graph.findAncestorWithColumn('Nope', 'ID')).toBeUndefined();
    });
  });
});
