// Keeps the point table in step with markers drawn on the map
import type {
  CriteriaTable,
  GeoPoint,
  MarkerPosition,
  Signature,
  WeightedPoint,
} from '@/types/facility';
import { euclideanDistance, normalizeHeader, roundTo, toNumber } from '@/utils/coordinateUtils';
import {
  DEFAULT_CRITERION_VALUE,
  DEFAULT_MASS,
  DEFAULT_TRANSPORT_RATE,
  SIGNATURE_PRECISION,
} from '@/utils/plannerConfig';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function pointGeometry(drawing: unknown): Record<string, unknown> | null {
  if (!isRecord(drawing)) return null;
  const geometry = drawing.type === 'Point' ? drawing : drawing.geometry;
  if (!isRecord(geometry) || geometry.type !== 'Point') return null;
  return geometry;
}

/**
 * Pull marker coordinates out of drawn GeoJSON. Accepts a list or an
 * id -> feature object of Point features or bare Point geometries; other
 * shapes and non-numeric coordinates are skipped.
 */
export function extractMarkerPositions(drawings: unknown): MarkerPosition[] {
  let items: unknown[];
  if (Array.isArray(drawings)) {
    items = drawings;
  } else if (isRecord(drawings)) {
    items = Object.values(drawings);
  } else {
    return [];
  }

  const positions: MarkerPosition[] = [];
  items.forEach(item => {
    const geometry = pointGeometry(item);
    if (!geometry) return;
    const coordinates = geometry.coordinates;
    if (!Array.isArray(coordinates) || coordinates.length < 2) return;

    const longitude = toNumber(coordinates[0]);
    const latitude = toNumber(coordinates[1]);
    if (longitude === null || latitude === null) return;
    positions.push([longitude, latitude]);
  });

  return positions;
}

export function sortMarkerPositions(markers: readonly MarkerPosition[]): MarkerPosition[] {
  return [...markers].sort((a, b) => (a[0] !== b[0] ? a[0] - b[0] : a[1] - b[1]));
}

export function markerSignature(markers: readonly MarkerPosition[]): Signature {
  return markers.map(([lon, lat]) => [
    roundTo(lon, SIGNATURE_PRECISION),
    roundTo(lat, SIGNATURE_PRECISION),
  ]);
}

/**
 * Signature of where the table's points sit, sorted the same way as markers.
 */
export function positionsSignature(points: readonly GeoPoint[]): Signature {
  return markerSignature(sortMarkerPositions(points.map(p => [p.longitude, p.latitude])));
}

export interface MarkerMatch {
  /** previous index -> marker index */
  matches: Map<number, number>;
  unmatchedMarkers: number[];
}

interface CandidatePair {
  distance: number;
  previousIndex: number;
  markerIndex: number;
}

/**
 * Greedy nearest-neighbour assignment: every (previous, marker) pair sorted by
 * distance, then previous index, then marker index; the closest pair whose
 * ends are both free is claimed until one side runs out.
 */
export function matchMarkers(
  previous: readonly GeoPoint[],
  markers: readonly MarkerPosition[]
): MarkerMatch {
  const pairs: CandidatePair[] = [];
  previous.forEach((point, previousIndex) => {
    markers.forEach(([longitude, latitude], markerIndex) => {
      pairs.push({
        distance: euclideanDistance(point, { longitude, latitude }),
        previousIndex,
        markerIndex,
      });
    });
  });

  pairs.sort(
    (a, b) =>
      a.distance - b.distance ||
      a.previousIndex - b.previousIndex ||
      a.markerIndex - b.markerIndex
  );

  const matches = new Map<number, number>();
  const claimedMarkers = new Set<number>();
  const capacity = Math.min(previous.length, markers.length);

  for (const pair of pairs) {
    if (matches.size === capacity) break;
    if (matches.has(pair.previousIndex) || claimedMarkers.has(pair.markerIndex)) continue;
    matches.set(pair.previousIndex, pair.markerIndex);
    claimedMarkers.add(pair.markerIndex);
  }

  const unmatchedMarkers = markers
    .map((_, markerIndex) => markerIndex)
    .filter(markerIndex => !claimedMarkers.has(markerIndex));

  return { matches, unmatchedMarkers };
}

/**
 * Generic reconciliation. Matched points keep their attributes on the marker's
 * coordinates (previous order), unmatched markers follow in marker order as
 * fresh points, unmatched previous points are dropped. No markers clears the
 * set.
 */
export function reconcile<T extends GeoPoint>(
  previous: readonly T[],
  markers: readonly MarkerPosition[],
  relocate: (point: T, position: GeoPoint) => T,
  create: (position: GeoPoint) => T
): T[] {
  if (markers.length === 0) return [];

  const toPosition = ([longitude, latitude]: MarkerPosition): GeoPoint => ({ longitude, latitude });

  if (previous.length === 0) {
    return markers.map(marker => create(toPosition(marker)));
  }

  const { matches, unmatchedMarkers } = matchMarkers(previous, markers);
  const result: T[] = [];

  previous.forEach((point, previousIndex) => {
    const markerIndex = matches.get(previousIndex);
    if (markerIndex === undefined) return;
    result.push(relocate(point, toPosition(markers[markerIndex])));
  });

  unmatchedMarkers.forEach(markerIndex => {
    result.push(create(toPosition(markers[markerIndex])));
  });

  return result;
}

export interface WeightedDefaults {
  transportRate: number;
  mass: number;
}

export function reconcileWeightedPoints(
  previous: readonly WeightedPoint[],
  markers: readonly MarkerPosition[],
  defaults: WeightedDefaults = { transportRate: DEFAULT_TRANSPORT_RATE, mass: DEFAULT_MASS }
): WeightedPoint[] {
  return reconcile(
    previous,
    markers,
    (point, position) => ({ ...point, ...position }),
    position => ({ ...position, transportRate: defaults.transportRate, mass: defaults.mass })
  );
}

/**
 * Criteria columns stay as they are; new points take the given default for
 * each column, or 1 where none is given.
 */
export function reconcileCriteriaPoints(
  previous: CriteriaTable,
  markers: readonly MarkerPosition[],
  defaults: Record<string, number> = {}
): CriteriaTable {
  const defaultLookup = new Map<string, number>();
  Object.entries(defaults).forEach(([key, value]) => {
    defaultLookup.set(normalizeHeader(key), value);
  });

  const points = reconcile(
    previous.points,
    markers,
    (point, position) => ({ ...point, ...position, values: { ...point.values } }),
    position => {
      const values: Record<string, number | null> = {};
      previous.criteria.forEach(name => {
        values[name] = defaultLookup.get(name) ?? DEFAULT_CRITERION_VALUE;
      });
      return { ...position, values };
    }
  );

  return { criteria: [...previous.criteria], points };
}
