import { readFileSync } from 'node:fs';
import { describe, it, expect } from 'vitest';
import { SqlTypes } from '../../src/core/data-types.js';
import { printExpression } from '../../src/core/expression-printer.js';
import { ParseError } from '../../src/core/errors.js';
import { findNode, toNodeKey, type Scenario, type ViewNode } from '../../src/core/types.js';
import { cleanRef, parseScenario } from '../../src/parser/xml-parser.js';

const fixture = (name: string): string => readFileSync(new URL(`../fixtures/${name}`, import.meta.url), 'utf-8');

function scenarioXml(body: string): string {
  return `<?xml version="1.0" encoding="UTF-8"?>
<Calculation:scenario xmlns:xsi="http://www.w3.org/2001/XMLSchema-instance" xmlns:Calculation="http://www.sap.com/ndb/BiModelCalculation.ecore" id="TEST">
${body}
</Calculation:scenario>`;
}

const TABLE_SOURCE = `
  <dataSources>
    <DataSource id="T1" type="DATA_BASE_TABLE">
      <columnObject schemaName="S" columnObjectName="T1"/>
    </DataSource>
  </dataSources>`;

function projectionXml(attributes: string, mappings: string, extra = ''): string {
  return scenarioXml(`${TABLE_SOURCE}
  <calculationViews>
    <calculationView xsi:type="Calculation:ProjectionView" id="P">
      <viewAttributes>${attributes}</viewAttributes>
      <input node="#T1">${mappings}</input>
      ${extra}
    </calculationView>
  </calculationViews>`);
}

function mapping(target: string, source = target): string {
  return `<mapping xsi:type="Calculation:AttributeMapping" target="${target}" source="${source}"/>`;
}

function node(scenario: Scenario, name: string): ViewNode {
  const found = findNode(scenario, name);
  if (!found) throw new Error(`no node ${name}`);
  return found;
}

describe('parseScenario', () => {
  describe('employee salaries', () => {
    const scenario = parseScenario(fixture('employees.xml'));

    it('reads scenario attributes', () => {
      expect(scenario.id).toBe('EMPLOYEE_SALARY');
      expect(scenario.description).toBe('Salary totals by department');
      expect(scenario.defaultClient).toBe('100');
      expect(scenario.output).toBe(toNodeKey('Aggregation_1'));
    });

    it('keeps declaration order, data sources first', () => {
      expect(scenario.nodes.map((n) => n.name)).toEqual(['EMPLOYEES', 'DEPT', 'Join_1', 'Aggregation_1']);
      expect(scenario.nodes.map((n) => n.kind)).toEqual(['table', 'table', 'join', 'aggregation']);
    });

    it('derives table columns from the fields consumers use', () => {
      const employees = node(scenario, 'EMPLOYEES');
      expect(employees.columns.map((c) => c.name)).toEqual(['ID', 'NAME', 'SALARY']);
      expect(employees.columns[2]?.type).toEqual(SqlTypes.VARCHAR(20));
      expect(node(scenario, 'DEPT').columns.map((c) => c.name)).toEqual(['DEPT_NAME', 'ID']);
    });

    it('reads join keys and type', () => {
      const join = node(scenario, 'Join_1');
      expect(join.kind === 'join' && join.join).toEqual({
        type: 'inner',
        left: toNodeKey('EMPLOYEES'),
        right: toNodeKey('DEPT'),
        keys: [{ left: 'ID', right: 'ID' }],
      });
    });

    it('groups by the non-aggregated columns', () => {
      const aggregation = node(scenario, 'Aggregation_1');
      expect(aggregation.kind === 'aggregation' && aggregation.groupBy).toEqual(['DEPT_NAME']);
      const salary = aggregation.columns[1];
      expect(salary?.kind === 'real' && salary.aggregation).toBe('SUM');
      expect(salary?.type).toEqual(SqlTypes.DECIMAL(38, 6));
    });
  });

  describe('sales overview', () => {
    const scenario = parseScenario(fixture('sales.xml'));

    it('reads input parameters', () => {
      expect(scenario.parameters).toEqual([
        { name: 'P_YEAR', type: SqlTypes.INTEGER(), defaultValue: '2024', mandatory: false },
      ]);
    });

    it('types calculated columns by declaration or inference', () => {
      const current = node(scenario, 'Current Orders');
      const netEur = current.columns.find((c) => c.name === 'NET_EUR');
      const label = current.columns.find((c) => c.name === 'LABEL');
      expect(netEur?.kind === 'calculated' && netEur.typeOrigin).toBe('declared');
      expect(netEur?.type).toEqual(SqlTypes.DECIMAL(17, 2));
      expect(label?.kind === 'calculated' && label.typeOrigin).toBe('inferred');
      expect(label?.type).toEqual(SqlTypes.VARCHAR());
    });

    it('collects attribute filters before formula filters', () => {
      const current = node(scenario, 'Current Orders');
      expect(current.filters.map((f) => f.origin)).toEqual(['attribute', 'formula']);
      expect(current.filters.map((f) => printExpression(f.expression))).toEqual([
        `"AUART" IN ('TA', 'ZOR')`,
        '"GJAHR" = $$P_YEAR$$',
      ]);
    });

    it('reads union branches with constant mappings', () => {
      const union = node(scenario, 'Union_1');
      if (union.kind !== 'union') throw new Error('expected a union');
      expect(union.branches.map((b) => b.input)).toEqual([toNodeKey('Current Orders'), toNodeKey('Archived')]);
      expect(union.branches[0]?.values).toEqual([
        { kind: 'field', field: 'VBELN' },
        { kind: 'field', field: 'NETWR' },
        { kind: 'constant', value: 'LIVE' },
      ]);
      expect(union.columns[2]?.kind).toBe('calculated');
    });
  });

  describe('attribute filters', () => {
    it('turns a range filter into two comparisons', () => {
      const scenario = parseScenario(projectionXml(
        `<viewAttribute id="QTY" datatype="INTEGER">
           <filter xsi:type="Calculation:RangeValueFilter" lowValue="1" highValue="5"/>
         </viewAttribute>`,
        mapping('QTY'),
      ));
      expect(printExpression(node(scenario, 'P').filters[0]?.expression ?? { kind: 'identifier', name: '' })).toBe(
        '"QTY" >= 1 AND "QTY" <= 5',
      );
    });

    it('turns an excluding pattern filter into NOT LIKE', () => {
      const scenario = parseScenario(projectionXml(
        `<viewAttribute id="NAME">
           <filter xsi:type="Calculation:SingleValueFilter" operator="CP" value="A*" including="false"/>
         </viewAttribute>`,
        mapping('NAME'),
      ));
      expect(printExpression(node(scenario, 'P').filters[0]?.expression ?? { kind: 'identifier', name: '' })).toBe(
        `NOT "NAME" LIKE 'A%'`,
      );
    });
  });

  it('reads calculation-view data sources', () => {
    const scenario = parseScenario(scenarioXml(`
  <dataSources>
    <DataSource id="BASE" type="CALCULATION_VIEW">
      <resourceUri>/sales.models/calculationviews/CV_BASE</resourceUri>
    </DataSource>
  </dataSources>
  <calculationViews>
    <calculationView xsi:type="Calculation:ProjectionView" id="P">
      <viewAttributes><viewAttribute id="A"/></viewAttributes>
      <input node="#BASE">${mapping('A')}</input>
    </calculationView>
  </calculationViews>`));
    const base = node(scenario, 'BASE');
    expect(base.kind === 'table' && base.sourceType).toBe('view');
    expect(base.kind === 'table' && base.object).toBe('sales.models/CV_BASE');
  });

  it('uses the last terminal view when no logical model is given', () => {
    const scenario = parseScenario(projectionXml('<viewAttribute id="A"/>', mapping('A')));
    expect(scenario.output).toBe(toNodeKey('P'));
  });

  describe('errors', () => {
    it('rejects empty and malformed documents', () => {
      expect(() => parseScenario('   ')).toThrow('Empty XML document');
      expect(() => parseScenario('<scenario><a></scenario>')).toThrow('Malformed XML');
    });

    it('rejects documents that are not calculation scenarios', () => {
      expect(() => parseScenario('<ColumnView id="X"/>')).toThrow('Legacy ColumnView documents are not supported');
      expect(() => parseScenario('<report/>')).toThrow('Root element <report> is not a calculation scenario');
    });

    it('rejects references to undefined nodes', () => {
      const xml = projectionXml('<viewAttribute id="A"/>', mapping('A')).replace('node="#T1"', 'node="#NOPE"');
      expect(() => parseScenario(xml)).toThrow("Node 'P' references undefined node 'NOPE'");
    });

    it('treats node names case-insensitively', () => {
      const xml = projectionXml('<viewAttribute id="A"/>', mapping('A')).replace('id="P"', 'id="t1"');
      expect(() => parseScenario(xml)).toThrow("Duplicate node name 't1' (already declared as 'T1')");
    });

    it('rejects cycles', () => {
      const xml = scenarioXml(`
  <calculationViews>
    <calculationView xsi:type="Calculation:ProjectionView" id="P1">
      <viewAttributes><viewAttribute id="A"/></viewAttributes>
      <input node="#P2">${mapping('A')}</input>
    </calculationView>
    <calculationView xsi:type="Calculation:ProjectionView" id="P2">
      <viewAttributes><viewAttribute id="A"/></viewAttributes>
      <input node="#P1">${mapping('A')}</input>
    </calculationView>
  </calculationViews>`);
      expect(() => parseScenario(xml)).toThrow('Cycle detected in view graph: P1 -> P2 -> P1');
    });

    it('rejects unsupported view types', () => {
      const xml = projectionXml('<viewAttribute id="A"/>', mapping('A')).replace('Calculation:ProjectionView', 'Calculation:RankView');
      expect(() => parseScenario(xml)).toThrow("Unsupported calculation view type 'Calculation:RankView'");
    });

    it('rejects attributes without a source', () => {
      expect(() => parseScenario(projectionXml('<viewAttribute id="A"/><viewAttribute id="X"/>', mapping('A')))).toThrow(
        "Attribute 'X' of node 'P' is not mapped from any input",
      );
    });

    it('rejects formulas over unknown columns and names the column', () => {
      const xml = projectionXml(
        '<viewAttribute id="A"/>',
        mapping('A'),
        `<calculatedViewAttributes>
           <calculatedViewAttribute id="C"><formula>"NOPE" + 1</formula></calculatedViewAttribute>
         </calculatedViewAttributes>`,
      );
      try {
        parseScenario(xml);
        expect.unreachable();
      } catch (err) {
        expect(err).toBeInstanceOf(ParseError);
        if (!(err instanceof ParseError)) return;
        expect(err.message).toBe("Formula of 'C' references column 'NOPE' that is not visible at node 'P'");
        expect(err.context).toEqual({ node: 'P', column: 'C' });
      }
    });

    it('rejects unknown join and aggregation types', () => {
      const join = fixture('employees.xml').replace('joinType="inner"', 'joinType="crossjoin"');
      expect(() => parseScenario(join)).toThrow("Unsupported join type 'crossjoin'");

      const aggregation = fixture('employees.xml').replace('aggregationType="sum"', 'aggregationType="median"');
      expect(() => parseScenario(aggregation)).toThrow("Unsupported aggregation type 'MEDIAN'");
    });

    it('rejects a logical model pointing at an undefined node', () => {
      const xml = fixture('employees.xml').replace('<logicalModel id="Aggregation_1"/>', '<logicalModel id="Nope"/>');
      expect(() => parseScenario(xml)).toThrow("Logical model references undefined node 'Nope'");
    });
  });
});

describe('cleanRef', () => {
  it('strips reference prefixes', () => {
    expect(cleanRef('#/0/Join_1')).toBe('Join_1');
    expect(cleanRef('#//Join_1')).toBe('Join_1');
    expect(cleanRef('#Join_1')).toBe('Join_1');
    expect(cleanRef(' Join_1 ')).toBe('Join_1');
  });
});
