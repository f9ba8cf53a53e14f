import { describe, it, expect } from 'vitest';
import {
  SqlTypes,
  TypeFamily,
  declaredType,
  describeType,
  inferTypeFromName,
  isCompatible,
} from '../../src/core/data-types.js';
import { aggregatedType, toNodeKey, traceColumn, type NodeKey } from '../../src/core/types.js';
import { ScenarioBuilder, col } from '../../src/testing/index.js';

describe('declaredType', () => {
  it('maps string types and keeps the length', () => {
    expect(declaredType('NVARCHAR', 10)).toEqual({ name: 'VARCHAR', family: TypeFamily.STRING, length: 10 });
  });

  it('maps decimal types with precision and scale', () => {
    expect(describeType(declaredType('DECIMAL', 15, 2))).toBe('DECIMAL(15, 2)');
  });

  it('maps integer and timestamp families', () => {
    expect(declaredType('BIGINT')).toEqual(SqlTypes.INTEGER());
    expect(declaredType('seconddate')).toEqual(SqlTypes.TIMESTAMP());
  });

  it('falls back to VARCHAR(255) for unknown names', () => {
    expect(declaredType('ST_GEOMETRY')).toEqual(SqlTypes.VARCHAR(255));
  });
});

describe('inferTypeFromName', () => {
  it('recognizes date, numeric and plain attribute names', () => {
    expect(inferTypeFromName('BUDAT')).toEqual(SqlTypes.DATE());
    expect(inferTypeFromName('NET_AMOUNT')).toEqual(SqlTypes.DECIMAL(38, 6));
    expect(inferTypeFromName('MATNR')).toEqual(SqlTypes.VARCHAR(40));
    expect(inferTypeFromName('MATERIAL_DESCRIPTION')).toEqual(SqlTypes.VARCHAR(255));
  });
});

describe('isCompatible', () => {
  it('groups string-like types and numeric types', () => {
    expect(isCompatible(SqlTypes.VARCHAR(10), SqlTypes.OPAQUE())).toBe(true);
    expect(isCompatible(SqlTypes.INTEGER(), SqlTypes.DECIMAL(10, 2))).toBe(true);
    expect(isCompatible(SqlTypes.VARCHAR(10), SqlTypes.INTEGER())).toBe(false);
  });
});

describe('aggregatedType', () => {
  it('counts as INTEGER', () => {
    expect(aggregatedType('COUNT', SqlTypes.VARCHAR(10))).toEqual(SqlTypes.INTEGER());
  });

  it('widens non-numeric SUM and AVG inputs', () => {
    expect(aggregatedType('SUM', SqlTypes.VARCHAR(10))).toEqual(SqlTypes.DECIMAL(38, 6));
    expect(aggregatedType('AVG', SqlTypes.INTEGER())).toEqual(SqlTypes.INTEGER());
  });

  it('keeps the source type for MIN, MAX and grouping', () => {
    expect(aggregatedType('MAX', SqlTypes.DATE())).toEqual(SqlTypes.DATE());
    expect(aggregatedType(undefined, SqlTypes.VARCHAR(3))).toEqual(SqlTypes.VARCHAR(3));
  });
});

describe('toNodeKey', () => {
  it('is case-insensitive', () => {
    expect(toNodeKey('Stage_1')).toBe(toNodeKey('stage_1'));
    expect(toNodeKey(' Join_1 ')).toBe('join_1');
  });
});

describe('traceColumn', () => {
  it('follows renames down to the table column', () => {
    const scenario = new ScenarioBuilder()
      .table('Orders', { columns: ['ORDER_ID', 'NETWR'] })
      .projection('Projection_1', 'Orders', [col('ID', { field: 'ORDER_ID' }), col('NETWR')])
      .projection('Projection_2', 'Projection_1', [col('KEY', { field: 'ID' })])
      .build();
    const nodes = new Map<NodeKey, (typeof scenario.nodes)[number]>(scenario.nodes.map((n) => [n.key, n]));

    const traced = traceColumn(nodes, toNodeKey('Projection_2'), 'KEY');

    expect(traced?.node).toBe(toNodeKey('Orders'));
    expect(traced?.column.name).toBe('ORDER_ID');
  });

  it('returns undefined for a field the node does not expose', () => {
    const scenario = new ScenarioBuilder().table('Orders', { columns: ['ORDER_ID'] }).build();
    const nodes = new Map<NodeKey, (typeof scenario.nodes)[number]>(scenario.nodes.map((n) => [n.key, n]));
    expect(traceColumn(nodes, toNodeKey('Orders'), 'MISSING')).toBeUndefined();
  });
});
