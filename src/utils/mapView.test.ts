import { describe, expect, it } from 'vitest';
import { buildPolylinePath, getMapCenter, toLatLngPath } from '@/utils/mapView';

describe('getMapCenter', () => {
  it('centers on the last point', () => {
    const points = [
      { longitude: 1, latitude: 2 },
      { longitude: 3, latitude: 4 },
    ];
    expect(getMapCenter(points, { longitude: 2, latitude: 3 })).toEqual({ longitude: 3, latitude: 4 });
  });

  it('uses the centroid when there are no points', () => {
    expect(getMapCenter([], { longitude: 18.5, latitude: 0 })).toEqual({ longitude: 18.5, latitude: 0 });
  });

  it('falls back to Warsaw when the centroid is the origin', () => {
    expect(getMapCenter([], { longitude: 0, latitude: 0 })).toEqual({ longitude: 21.0122, latitude: 52.2297 });
  });
});

describe('buildPolylinePath', () => {
  it('closes a ring of three or more points', () => {
    const path = buildPolylinePath([
      { longitude: 0, latitude: 0 },
      { longitude: 1, latitude: 0 },
      { longitude: 1, latitude: 1 },
    ]);
    expect(path).toEqual([[0, 0], [1, 0], [1, 1], [0, 0]]);
  });

  it('leaves short or already closed paths open', () => {
    expect(buildPolylinePath([{ longitude: 0, latitude: 0 }, { longitude: 1, latitude: 1 }])).toEqual([
      [0, 0],
      [1, 1],
    ]);
    const closed = [
      { longitude: 0, latitude: 0 },
      { longitude: 1, latitude: 0 },
      { longitude: 0, latitude: 0 },
    ];
    expect(buildPolylinePath(closed)).toHaveLength(3);
  });

  it('swaps to lat/lng order for the map', () => {
    expect(toLatLngPath([[21, 52]])).toEqual([[52, 21]]);
  });
});
