// Point table normalization
import type {
  CriteriaPoint,
  CriteriaTable,
  GeoPoint,
  RawTable,
  Signature,
  WeightedPoint,
} from '@/types/facility';
import {
  detectCoordinateColumns,
  findAliasedColumn,
  indexHeaders,
  roundTo,
  toNumber,
} from '@/utils/coordinateUtils';
import {
  DEFAULT_MASS,
  DEFAULT_TRANSPORT_RATE,
  POINT_COLUMNS,
  SIGNATURE_PRECISION,
} from '@/utils/plannerConfig';

/**
 * Build a table from a column name -> values mapping.
 */
export function tableFromColumns(columns: Record<string, readonly unknown[]>): RawTable {
  const headers = Object.keys(columns);
  const rowCount = Math.max(0, ...headers.map(h => columns[h].length));
  const rows: Record<string, unknown>[] = [];

  for (let i = 0; i < rowCount; i++) {
    const row: Record<string, unknown> = {};
    headers.forEach(h => {
      row[h] = columns[h][i];
    });
    rows.push(row);
  }

  return { headers, rows };
}

function readCell(row: Record<string, unknown>, source: string | undefined): unknown {
  return source === undefined ? undefined : row[source];
}

function readCoordinates(
  row: Record<string, unknown>,
  lonSource: string | undefined,
  latSource: string | undefined
): GeoPoint | null {
  const longitude = toNumber(readCell(row, lonSource));
  const latitude = toNumber(readCell(row, latSource));
  if (longitude === null || latitude === null) return null;
  return { longitude, latitude };
}

/**
 * Coerce an arbitrary table into weighted points. Rows without numeric
 * coordinates are dropped; missing transport rate or mass falls back to 1.
 */
export function normalizePointsTable(table: RawTable | null | undefined): WeightedPoint[] {
  if (!table) return [];

  const { names, sources } = indexHeaders(table.headers);
  const coords = detectCoordinateColumns(names);
  const rateColumn = findAliasedColumn(names, 'transport_rate');
  const massColumn = findAliasedColumn(names, 'mass');

  const lonSource = coords.longitude === null ? undefined : sources.get(coords.longitude);
  const latSource = coords.latitude === null ? undefined : sources.get(coords.latitude);
  const rateSource = rateColumn === null ? undefined : sources.get(rateColumn);
  const massSource = massColumn === null ? undefined : sources.get(massColumn);

  const points: WeightedPoint[] = [];
  for (const row of table.rows) {
    const position = readCoordinates(row, lonSource, latSource);
    if (!position) continue;

    points.push({
      ...position,
      transportRate: toNumber(readCell(row, rateSource)) ?? DEFAULT_TRANSPORT_RATE,
      mass: toNumber(readCell(row, massSource)) ?? DEFAULT_MASS,
    });
  }

  return points;
}

/**
 * TOPSIS variant: every column besides the two coordinates is a criterion,
 * passed through as a number or `null` when it does not parse.
 */
export function normalizeCriteriaTable(table: RawTable | null | undefined): CriteriaTable {
  if (!table) return { criteria: [], points: [] };

  const { names, sources } = indexHeaders(table.headers);
  const coords = detectCoordinateColumns(names);
  const criteria = names.filter(name => name !== coords.longitude && name !== coords.latitude);

  const lonSource = coords.longitude === null ? undefined : sources.get(coords.longitude);
  const latSource = coords.latitude === null ? undefined : sources.get(coords.latitude);

  const points: CriteriaPoint[] = [];
  for (const row of table.rows) {
    const position = readCoordinates(row, lonSource, latSource);
    if (!position) continue;

    const values: Record<string, number | null> = {};
    criteria.forEach(name => {
      values[name] = toNumber(readCell(row, sources.get(name)));
    });
    points.push({ ...position, values });
  }

  return { criteria, points };
}

export function toPointsTable(points: readonly WeightedPoint[]): RawTable {
  return {
    headers: [...POINT_COLUMNS],
    rows: points.map(p => ({
      longitude: p.longitude,
      latitude: p.latitude,
      transport_rate: p.transportRate,
      mass: p.mass,
    })),
  };
}

export function toCriteriaTable(table: CriteriaTable): RawTable {
  return {
    headers: ['longitude', 'latitude', ...table.criteria],
    rows: table.points.map(p => {
      const row: Record<string, unknown> = { longitude: p.longitude, latitude: p.latitude };
      table.criteria.forEach(name => {
        row[name] = p.values[name] ?? null;
      });
      return row;
    }),
  };
}

/**
 * Append a manually entered point. Non-numeric coordinates leave the set as is.
 */
export function appendPoint(
  points: readonly WeightedPoint[],
  point: { longitude: unknown; latitude: unknown; transportRate?: unknown; mass?: unknown }
): WeightedPoint[] {
  const longitude = toNumber(point.longitude);
  const latitude = toNumber(point.latitude);
  if (longitude === null || latitude === null) return [...points];

  return [
    ...points,
    {
      longitude,
      latitude,
      transportRate: toNumber(point.transportRate) ?? DEFAULT_TRANSPORT_RATE,
      mass: toNumber(point.mass) ?? DEFAULT_MASS,
    },
  ];
}

export function pointsSignature(points: readonly WeightedPoint[]): Signature {
  return points.map(p => [
    roundTo(p.longitude, SIGNATURE_PRECISION),
    roundTo(p.latitude, SIGNATURE_PRECISION),
    roundTo(p.transportRate, SIGNATURE_PRECISION),
    roundTo(p.mass, SIGNATURE_PRECISION),
  ]);
}

export function criteriaSignature(table: CriteriaTable): Signature {
  return table.points.map(p => [
    roundTo(p.longitude, SIGNATURE_PRECISION),
    roundTo(p.latitude, SIGNATURE_PRECISION),
    ...table.criteria.map(name => {
      const value = p.values[name];
      return value === null || value === undefined ? Number.NaN : roundTo(value, SIGNATURE_PRECISION);
    }),
  ]);
}

export function signaturesEqual(a: Signature, b: Signature): boolean {
  if (a.length !== b.length) return false;
  return a.every((item, i) => {
    const other = b[i];
    return (
      item.length === other.length &&
      item.every((value, j) => Object.is(value, other[j]))
    );
  });
}
