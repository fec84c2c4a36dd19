import { describe, expect, it } from 'vitest';
import type { RawTable } from '@/types/facility';
import {
  appendPoint,
  criteriaSignature,
  normalizeCriteriaTable,
  normalizePointsTable,
  pointsSignature,
  signaturesEqual,
  tableFromColumns,
  toCriteriaTable,
  toPointsTable,
} from '@/utils/pointsTable';

const messyTable: RawTable = {
  headers: [' LON ', 'Lat', 'Stawka', 'MASA', 'note'],
  rows: [
    { ' LON ': '21.5', Lat: 52, Stawka: '2', MASA: 3, note: 'a' },
    { ' LON ': 'n/a', Lat: 50, Stawka: 1, MASA: 1, note: 'b' },
    { ' LON ': 19, Lat: '', Stawka: 1, MASA: 1, note: 'c' },
    { ' LON ': 18, Lat: 51, Stawka: 'fast', MASA: null, note: 'd' },
  ],
};

describe('normalizePointsTable', () => {
  it('resolves aliases, drops rows without coordinates and fills defaults', () => {
    expect(normalizePointsTable(messyTable)).toEqual([
      { longitude: 21.5, latitude: 52, transportRate: 2, mass: 3 },
      { longitude: 18, latitude: 51, transportRate: 1, mass: 1 },
    ]);
  });

  it('uses the first two columns when coordinates are not named', () => {
    const table = tableFromColumns({ east: [1, 2], north: [3, 4], m: [5, 6] });
    expect(normalizePointsTable(table)).toEqual([
      { longitude: 1, latitude: 3, transportRate: 1, mass: 5 },
      { longitude: 2, latitude: 4, transportRate: 1, mass: 6 },
    ]);
  });

  it('yields nothing when coordinates cannot be resolved', () => {
    expect(normalizePointsTable(tableFromColumns({ lon: [1, 2] }))).toEqual([]);
    expect(normalizePointsTable(null)).toEqual([]);
  });

  it('is idempotent', () => {
    const once = normalizePointsTable(messyTable);
    expect(normalizePointsTable(toPointsTable(once))).toEqual(once);
  });
});

describe('normalizeCriteriaTable', () => {
  it('passes every other column through as a criterion', () => {
    const table = normalizeCriteriaTable(messyTable);
    expect(table.criteria).toEqual(['stawka', 'masa', 'note']);
    expect(table.points).toEqual([
      { longitude: 21.5, latitude: 52, values: { stawka: 2, masa: 3, note: null } },
      { longitude: 18, latitude: 51, values: { stawka: null, masa: null, note: null } },
    ]);
  });

  it('excludes positional coordinate columns from the criteria', () => {
    const table = normalizeCriteriaTable(tableFromColumns({ a: [1], b: [2], cost: [3] }));
    expect(table.criteria).toEqual(['cost']);
    expect(table.points).toEqual([{ longitude: 1, latitude: 2, values: { cost: 3 } }]);
  });

  it('is idempotent', () => {
    const once = normalizeCriteriaTable(messyTable);
    expect(normalizeCriteriaTable(toCriteriaTable(once))).toEqual(once);
  });
});

describe('appendPoint', () => {
  it('appends with defaults for missing weights', () => {
    expect(appendPoint([], { longitude: '1', latitude: 2 })).toEqual([
      { longitude: 1, latitude: 2, transportRate: 1, mass: 1 },
    ]);
  });

  it('ignores points without numeric coordinates', () => {
    const points = [{ longitude: 0, latitude: 0, transportRate: 1, mass: 1 }];
    expect(appendPoint(points, { longitude: 'x', latitude: 2 })).toEqual(points);
  });
});

describe('signatures', () => {
  it('ignores differences past eight decimals', () => {
    const a = pointsSignature([{ longitude: 1.000000001, latitude: 2, transportRate: 1, mass: 1 }]);
    const b = pointsSignature([{ longitude: 1, latitude: 2, transportRate: 1, mass: 1 }]);
    expect(signaturesEqual(a, b)).toBe(true);
  });

  it('detects changed attributes', () => {
    const a = pointsSignature([{ longitude: 1, latitude: 2, transportRate: 1, mass: 1 }]);
    const b = pointsSignature([{ longitude: 1, latitude: 2, transportRate: 1, mass: 2 }]);
    expect(signaturesEqual(a, b)).toBe(false);
  });

  it('treats missing criteria values as equal to each other', () => {
    const table = { criteria: ['cost'], points: [{ longitude: 0, latitude: 0, values: { cost: null } }] };
    expect(signaturesEqual(criteriaSignature(table), criteriaSignature(table))).toBe(true);
  });
});
