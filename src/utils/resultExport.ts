// CSV export of calculation results
import Papa from 'papaparse';
import type { PointDistance, TopsisResult } from '@/types/facility';
import { formatDecimal } from '@/utils/plannerConfig';

export function distancesToCsv(distances: readonly PointDistance[]): string {
  return Papa.unparse({
    fields: [
      'longitude',
      'latitude',
      'transport_rate',
      'mass',
      'euclidean_distance',
      'weighted_euclidean_distance',
    ],
    data: distances.map(d => [
      formatDecimal(d.longitude),
      formatDecimal(d.latitude),
      formatDecimal(d.transportRate),
      formatDecimal(d.mass),
      formatDecimal(d.distance),
      formatDecimal(d.weightedDistance),
    ]),
  });
}

export function rankingToCsv(result: TopsisResult): string {
  return Papa.unparse({
    fields: ['longitude', 'latitude', ...result.criteria, 'topsis_score', 'topsis_rank'],
    data: result.ranking.map(row => [
      formatDecimal(row.longitude),
      formatDecimal(row.latitude),
      ...result.criteria.map(name => {
        const value = row.point.values[name];
        return value === null || value === undefined ? '' : formatDecimal(value);
      }),
      formatDecimal(row.topsisScore),
      String(row.topsisRank),
    ]),
  });
}

export function generateCsvFilename(prefix: string, date: Date = new Date()): string {
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  return `${prefix}_${date.getFullYear()}-${month}-${day}.csv`;
}
