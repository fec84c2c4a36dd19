import { describe, expect, it } from 'vitest';
import type { WeightedPoint } from '@/types/facility';
import {
  computeCenterOfGravity,
  computeCentroid,
  computePointDistances,
  pointWeight,
  weightedDistanceSum,
} from '@/utils/centerOfGravity';

const point = (longitude: number, latitude: number, transportRate = 1, mass = 1): WeightedPoint => ({
  longitude,
  latitude,
  transportRate,
  mass,
});

describe('computeCentroid', () => {
  it('returns the weighted mean', () => {
    const centroid = computeCentroid([point(0, 0), point(10, 0), point(5, 10, 1, 2)]);
    expect(centroid.longitude).toBeCloseTo(5, 12);
    expect(centroid.latitude).toBeCloseTo(5, 12);
    expect(centroid.usedFallbackAverage).toBe(false);
  });

  it('weights by transport rate times mass', () => {
    const centroid = computeCentroid([point(0, 0, 3, 1), point(4, 0, 1, 1)]);
    expect(centroid.longitude).toBe(1);
    expect(centroid.latitude).toBe(0);
  });

  it('falls back to the plain mean when every weight is zero', () => {
    const centroid = computeCentroid([point(0, 0, 0, 5), point(4, 2, 1, 0)]);
    expect(centroid).toEqual({ longitude: 2, latitude: 1, usedFallbackAverage: true });
  });

  it('returns the origin for no points', () => {
    expect(computeCentroid([])).toEqual({ longitude: 0, latitude: 0, usedFallbackAverage: false });
  });

  it('stays inside the bounding box of positively weighted points', () => {
    const points = [point(1, 1, 2, 3), point(7, 2, 0.5, 4), point(3, 9, 1, 1), point(6, 6, 4, 0.25)];
    const centroid = computeCentroid(points);
    expect(centroid.longitude).toBeGreaterThanOrEqual(1);
    expect(centroid.longitude).toBeLessThanOrEqual(7);
    expect(centroid.latitude).toBeGreaterThanOrEqual(1);
    expect(centroid.latitude).toBeLessThanOrEqual(9);
  });
});

describe('weightedDistanceSum', () => {
  it('sums weight times distance', () => {
    const points = [point(3, 4, 2, 1), point(0, 0, 5, 5)];
    expect(weightedDistanceSum(points, { longitude: 0, latitude: 0 })).toBe(10);
  });

  it('is zero without points', () => {
    expect(weightedDistanceSum([], { longitude: 1, latitude: 1 })).toBe(0);
  });
});

describe('computeCenterOfGravity', () => {
  it('reports the centroid with its weighted distance sum', () => {
    const result = computeCenterOfGravity([point(0, 0), point(6, 8)]);
    expect(result).toEqual({
      longitude: 3,
      latitude: 4,
      weightedDistanceSum: 10,
      usedFallbackAverage: false,
    });
  });
});

describe('computePointDistances', () => {
  it('breaks the result down per point', () => {
    const [row] = computePointDistances([point(3, 4, 2, 1.5)], { longitude: 0, latitude: 0 });
    expect(row).toEqual({
      longitude: 3,
      latitude: 4,
      transportRate: 2,
      mass: 1.5,
      weight: 3,
      weightedLongitude: 9,
      weightedLatitude: 12,
      distance: 5,
      weightedDistance: 15,
    });
    expect(pointWeight(row)).toBe(3);
  });
});
