// Map centering and outline helpers
import type { GeoPoint, MarkerPosition } from '@/types/facility';
import { DEFAULT_MAP_CENTER, MAP_CENTER_EPSILON } from '@/utils/plannerConfig';

/**
 * Last point if there is one, otherwise the centroid unless it sits at the
 * origin, otherwise the default center.
 */
export function getMapCenter(
  points: readonly GeoPoint[],
  centroid: GeoPoint,
  fallback: GeoPoint = DEFAULT_MAP_CENTER
): GeoPoint {
  if (points.length > 0) {
    const last = points[points.length - 1];
    return { longitude: last.longitude, latitude: last.latitude };
  }

  if (Math.abs(centroid.longitude) > MAP_CENTER_EPSILON || Math.abs(centroid.latitude) > MAP_CENTER_EPSILON) {
    return { longitude: centroid.longitude, latitude: centroid.latitude };
  }

  return { ...fallback };
}

// Closed ring through the points once there are three of them
export function buildPolylinePath(points: readonly GeoPoint[]): MarkerPosition[] {
  const path: MarkerPosition[] = points.map(p => [p.longitude, p.latitude]);

  if (path.length >= 3) {
    const first = path[0];
    const last = path[path.length - 1];
    if (first[0] !== last[0] || first[1] !== last[1]) {
      path.push([first[0], first[1]]);
    }
  }

  return path;
}

/** Leaflet takes [lat, lng]. */
export function toLatLngPath(path: readonly MarkerPosition[]): [number, number][] {
  return path.map(([lon, lat]) => [lat, lon]);
}
