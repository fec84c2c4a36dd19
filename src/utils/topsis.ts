// TOPSIS multi-criteria ranking
import type {
  CriteriaConfigMap,
  CriteriaPoint,
  Impact,
  TopsisRankedPoint,
  TopsisResult,
} from '@/types/facility';
import { normalizeHeader } from '@/utils/coordinateUtils';
import { DEFAULT_CRITERION_WEIGHT, DEFAULT_IMPACT } from '@/utils/plannerConfig';

function hasColumn(points: readonly CriteriaPoint[], name: string): boolean {
  return points.some(p => Object.prototype.hasOwnProperty.call(p.values, name));
}

function lowercaseKeys<T>(record: Record<string, T>): Map<string, T> {
  const result = new Map<string, T>();
  Object.entries(record).forEach(([key, value]) => {
    const name = normalizeHeader(key);
    if (!result.has(name)) result.set(name, value);
  });
  return result;
}

/**
 * Selected names, lowercased and deduplicated, that exist as a column.
 */
export function resolveCriteria(
  points: readonly CriteriaPoint[],
  selected: readonly string[]
): string[] {
  const resolved: string[] = [];
  selected.forEach(raw => {
    const name = normalizeHeader(raw);
    if (!resolved.includes(name) && hasColumn(points, name)) {
      resolved.push(name);
    }
  });
  return resolved;
}

export function buildDecisionMatrix(
  points: readonly CriteriaPoint[],
  criteria: readonly string[]
): number[][] {
  return points.map(p =>
    criteria.map(name => {
      const value = p.values[name];
      return typeof value === 'number' && Number.isFinite(value) ? value : 0;
    })
  );
}

/**
 * r_ij = x_ij / sqrt(Σ_i x_ij²); an all-zero column stays zero. The norm goes
 * through `Math.hypot` so large magnitudes do not overflow.
 */
export function vectorNormalize(matrix: readonly number[][], columnCount: number): number[][] {
  const norms: number[] = [];
  for (let j = 0; j < columnCount; j++) {
    norms.push(Math.hypot(...columnValues(matrix, j)));
  }
  return matrix.map(row => row.map((value, j) => (norms[j] > 0 ? value / norms[j] : 0)));
}

/**
 * Scale weights to sum to 1. Negative or non-finite weights count as 0; when
 * all are 0 the weight is split equally.
 */
export function normalizeCriterionWeights(weights: readonly number[]): number[] {
  if (weights.length === 0) return [];
  const cleaned = weights.map(w => (Number.isFinite(w) && w > 0 ? w : 0));
  const total = cleaned.reduce((sum, w) => sum + w, 0);
  if (total === 0) {
    return cleaned.map(() => 1 / cleaned.length);
  }
  return cleaned.map(w => w / total);
}

function columnValues(matrix: readonly number[][], j: number): number[] {
  return matrix.map(row => row[j]);
}

function distanceTo(row: readonly number[], ideal: readonly number[]): number {
  return Math.sqrt(row.reduce((sum, v, j) => sum + Math.pow(v - ideal[j], 2), 0));
}

function emptyResult(criteria: string[]): TopsisResult {
  return {
    criteria,
    weights: [],
    impacts: [],
    decisionMatrix: [],
    normalizedMatrix: [],
    weightedMatrix: [],
    idealBest: [],
    idealWorst: [],
    distanceToBest: [],
    distanceToWorst: [],
    ranking: [],
  };
}

/**
 * Rank points by closeness to the ideal solution.
 *
 * Unknown criteria are skipped. No points or no usable criteria yields an
 * empty ranking. Ties keep input order.
 */
export function rankByTopsis(
  points: readonly CriteriaPoint[],
  selectedCriteria: readonly string[],
  weights: Record<string, number> = {},
  impacts: Record<string, Impact> = {}
): TopsisResult {
  const criteria = resolveCriteria(points, selectedCriteria);
  if (points.length === 0 || criteria.length === 0) {
    return emptyResult(criteria);
  }

  const weightLookup = lowercaseKeys(weights);
  const impactLookup = lowercaseKeys(impacts);

  const rawWeights = criteria.map(name => weightLookup.get(name) ?? DEFAULT_CRITERION_WEIGHT);
  const columnImpacts = criteria.map(name => impactLookup.get(name) ?? DEFAULT_IMPACT);
  const normalizedWeights = normalizeCriterionWeights(rawWeights);

  const decisionMatrix = buildDecisionMatrix(points, criteria);
  const normalizedMatrix = vectorNormalize(decisionMatrix, criteria.length);
  const weightedMatrix = normalizedMatrix.map(row =>
    row.map((value, j) => value * normalizedWeights[j])
  );

  const idealBest: number[] = [];
  const idealWorst: number[] = [];
  columnImpacts.forEach((impact, j) => {
    const column = columnValues(weightedMatrix, j);
    const max = Math.max(...column);
    const min = Math.min(...column);
    idealBest.push(impact === 'cost' ? min : max);
    idealWorst.push(impact === 'cost' ? max : min);
  });

  const distanceToBest = weightedMatrix.map(row => distanceTo(row, idealBest));
  const distanceToWorst = weightedMatrix.map(row => distanceTo(row, idealWorst));

  const scores = points.map((_, i) => {
    const total = distanceToBest[i] + distanceToWorst[i];
    return total === 0 ? 0 : distanceToWorst[i] / total;
  });

  const order = points
    .map((_, i) => i)
    .sort((a, b) => (scores[b] !== scores[a] ? scores[b] - scores[a] : a - b));

  const ranking: TopsisRankedPoint[] = order.map((index, position) => ({
    index,
    point: points[index],
    longitude: points[index].longitude,
    latitude: points[index].latitude,
    topsisScore: scores[index],
    topsisRank: position + 1,
  }));

  return {
    criteria,
    weights: normalizedWeights,
    impacts: columnImpacts,
    decisionMatrix,
    normalizedMatrix,
    weightedMatrix,
    idealBest,
    idealWorst,
    distanceToBest,
    distanceToWorst,
    ranking,
  };
}

/**
 * Rank using per-criterion configuration entries.
 */
export function rankWithConfig(
  points: readonly CriteriaPoint[],
  selectedCriteria: readonly string[],
  config: CriteriaConfigMap
): TopsisResult {
  const weights: Record<string, number> = {};
  const impacts: Record<string, Impact> = {};
  Object.entries(config).forEach(([name, entry]) => {
    weights[name] = entry.weight;
    impacts[name] = entry.impact;
  });
  return rankByTopsis(points, selectedCriteria, weights, impacts);
}
