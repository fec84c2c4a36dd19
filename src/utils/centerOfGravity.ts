// Center-of-gravity (weighted centroid) calculations
import type { CentroidResult, GeoPoint, PointDistance, WeightedPoint } from '@/types/facility';
import { euclideanDistance } from '@/utils/coordinateUtils';
import { DEGENERATE_WEIGHT_EPSILON } from '@/utils/plannerConfig';

export function pointWeight(point: WeightedPoint): number {
  return point.transportRate * point.mass;
}

/**
 * Weighted arithmetic mean of the coordinates, with w = transport rate x mass.
 *
 * When the total weight is (near) zero the plain mean is returned and
 * `usedFallbackAverage` is set. No points gives (0, 0).
 */
export function computeCentroid(
  points: readonly WeightedPoint[]
): GeoPoint & { usedFallbackAverage: boolean } {
  if (points.length === 0) {
    return { longitude: 0, latitude: 0, usedFallbackAverage: false };
  }

  let totalWeight = 0;
  let weightedLonSum = 0;
  let weightedLatSum = 0;

  points.forEach(p => {
    const w = pointWeight(p);
    totalWeight += w;
    weightedLonSum += w * p.longitude;
    weightedLatSum += w * p.latitude;
  });

  if (Math.abs(totalWeight) < DEGENERATE_WEIGHT_EPSILON) {
    const n = points.length;
    return {
      longitude: points.reduce((sum, p) => sum + p.longitude, 0) / n,
      latitude: points.reduce((sum, p) => sum + p.latitude, 0) / n,
      usedFallbackAverage: true,
    };
  }

  return {
    longitude: weightedLonSum / totalWeight,
    latitude: weightedLatSum / totalWeight,
    usedFallbackAverage: false,
  };
}

/**
 * Σ w_i · d(point_i, target). Diagnostic only: the centroid minimizes squared
 * distance, not this sum.
 */
export function weightedDistanceSum(points: readonly WeightedPoint[], target: GeoPoint): number {
  return points.reduce((sum, p) => sum + pointWeight(p) * euclideanDistance(p, target), 0);
}

export function computeCenterOfGravity(points: readonly WeightedPoint[]): CentroidResult {
  const { longitude, latitude, usedFallbackAverage } = computeCentroid(points);
  return {
    longitude,
    latitude,
    weightedDistanceSum: weightedDistanceSum(points, { longitude, latitude }),
    usedFallbackAverage,
  };
}

// Per-point breakdown for the distances table
export function computePointDistances(
  points: readonly WeightedPoint[],
  target: GeoPoint
): PointDistance[] {
  return points.map(p => {
    const weight = pointWeight(p);
    const distance = euclideanDistance(p, target);
    return {
      ...p,
      weight,
      weightedLongitude: weight * p.longitude,
      weightedLatitude: weight * p.latitude,
      distance,
      weightedDistance: weight * distance,
    };
  });
}
