// Planner session state and its transitions
import type {
  CentroidResult,
  CriteriaConfigMap,
  CriteriaPoint,
  CriteriaTable,
  CriterionConfig,
  DecisionMethod,
  GeoPoint,
  MapView,
  PointDistance,
  RawTable,
  Signature,
  TopsisResult,
  WeightedPoint,
} from '@/types/facility';
import { normalizeHeader, toNumber } from '@/utils/coordinateUtils';
import { computeCenterOfGravity, computePointDistances } from '@/utils/centerOfGravity';
import { criterionDefaults, syncCriteriaConfig, updateCriterionConfig } from '@/utils/criteriaConfig';
import {
  extractMarkerPositions,
  markerSignature,
  positionsSignature,
  reconcileCriteriaPoints,
  reconcileWeightedPoints,
  sortMarkerPositions,
  type WeightedDefaults,
} from '@/utils/markerReconciler';
import { getMapCenter } from '@/utils/mapView';
import {
  appendPoint,
  criteriaSignature,
  normalizeCriteriaTable,
  normalizePointsTable,
  pointsSignature,
  signaturesEqual,
} from '@/utils/pointsTable';
import { resolvePlannerConfig, type PlannerConfig } from '@/utils/plannerConfig';
import { rankWithConfig } from '@/utils/topsis';

export interface PlannerState {
  method: DecisionMethod;
  points: WeightedPoint[];
  criteriaTable: CriteriaTable;
  selectedCriteria: string[];
  criteriaConfig: CriteriaConfigMap;
  markerSnapshot: Signature;
  mapView: MapView;
  mapDefaults: WeightedDefaults;
}

export interface Transition {
  state: PlannerState;
  changed: boolean;
}

export function createInitialState(overrides: Partial<PlannerConfig> = {}): PlannerState {
  const config = resolvePlannerConfig(overrides);
  return {
    method: config.method,
    points: [],
    criteriaTable: { criteria: [], points: [] },
    selectedCriteria: [],
    criteriaConfig: {},
    markerSnapshot: [],
    mapView: { center: { ...config.mapCenter }, zoom: config.mapZoom },
    mapDefaults: { transportRate: config.defaultTransportRate, mass: config.defaultMass },
  };
}

/**
 * Context object holding one session state; callers load it, run a
 * transition and store the result.
 */
export interface PlannerSession {
  load(): PlannerState;
  store(next: PlannerState): void;
}

export function createPlannerSession(overrides: Partial<PlannerConfig> = {}): PlannerSession {
  let current = createInitialState(overrides);
  return {
    load: () => current,
    store: next => {
      current = next;
    },
  };
}

function activePoints(state: PlannerState): GeoPoint[] {
  return state.method === 'topsis' ? state.criteriaTable.points : state.points;
}

function numericCriteria(table: CriteriaTable): string[] {
  return table.criteria.filter(name => table.points.some(p => p.values[name] !== null));
}

/**
 * Swap in a new criteria table. The selection falls back to every numeric
 * column on a fresh load, or when there were no criteria before; an edit
 * keeps what the user selected, even when that is nothing.
 */
function withCriteriaTable(state: PlannerState, criteriaTable: CriteriaTable, fresh: boolean): PlannerState {
  const kept = state.selectedCriteria.filter(name => criteriaTable.criteria.includes(name));
  const reselect = kept.length === 0 && (fresh || state.criteriaTable.criteria.length === 0);
  const selectedCriteria = reselect ? numericCriteria(criteriaTable) : kept;
  return {
    ...state,
    criteriaTable,
    selectedCriteria,
    criteriaConfig: syncCriteriaConfig(state.criteriaConfig, criteriaTable.criteria, selectedCriteria),
  };
}

/**
 * Replace the point tables with an uploaded table. A table without usable
 * points for the active method leaves the session untouched.
 */
export function loadTable(state: PlannerState, table: RawTable): Transition {
  const points = normalizePointsTable(table);
  const criteriaTable = normalizeCriteriaTable(table);
  const usable = state.method === 'topsis' ? criteriaTable.points.length : points.length;
  if (usable === 0) return { state, changed: false };

  return {
    state: { ...withCriteriaTable({ ...state, points }, criteriaTable, true), markerSnapshot: [] },
    changed: true,
  };
}

/**
 * Re-normalize the table of the active method after an edit in a table editor.
 */
export function editTable(state: PlannerState, table: RawTable): Transition {
  if (state.method === 'topsis') {
    const criteriaTable = normalizeCriteriaTable(table);
    const sameColumns =
      criteriaTable.criteria.length === state.criteriaTable.criteria.length &&
      criteriaTable.criteria.every((name, i) => name === state.criteriaTable.criteria[i]);
    const changed =
      !sameColumns ||
      !signaturesEqual(criteriaSignature(criteriaTable), criteriaSignature(state.criteriaTable));
    return { state: withCriteriaTable(state, criteriaTable, false), changed };
  }

  const points = normalizePointsTable(table);
  const changed = !signaturesEqual(pointsSignature(points), pointsSignature(state.points));
  return { state: { ...state, points }, changed };
}

export interface ManualPointInput {
  longitude: unknown;
  latitude: unknown;
  transportRate?: unknown;
  mass?: unknown;
  values?: Record<string, unknown>;
}

export function addManualPoint(state: PlannerState, input: ManualPointInput): Transition {
  if (state.method === 'topsis') {
    const longitude = toNumber(input.longitude);
    const latitude = toNumber(input.latitude);
    if (longitude === null || latitude === null) return { state, changed: false };

    const { criteria } = state.criteriaTable;
    const defaults = criterionDefaults(state.criteriaConfig, criteria);
    const values: Record<string, number | null> = {};
    criteria.forEach(name => {
      values[name] = toNumber(input.values?.[name]) ?? defaults[name];
    });
    const point: CriteriaPoint = { longitude, latitude, values };
    return {
      state: {
        ...state,
        criteriaTable: { criteria: [...criteria], points: [...state.criteriaTable.points, point] },
        markerSnapshot: [],
      },
      changed: true,
    };
  }

  const points = appendPoint(state.points, input);
  if (points.length === state.points.length) return { state, changed: false };
  return { state: { ...state, points, markerSnapshot: [] }, changed: true };
}

export function clearPoints(state: PlannerState): PlannerState {
  return {
    ...state,
    points: [],
    criteriaTable: { criteria: [...state.criteriaTable.criteria], points: [] },
    markerSnapshot: [],
  };
}

export function setMethod(state: PlannerState, method: DecisionMethod): PlannerState {
  if (state.method === method) return state;
  return { ...state, method, markerSnapshot: [] };
}

export function selectCriteria(state: PlannerState, selected: readonly string[]): PlannerState {
  const selectedCriteria = selected
    .map(normalizeHeader)
    .filter((name, i, all) => state.criteriaTable.criteria.includes(name) && all.indexOf(name) === i);
  return {
    ...state,
    selectedCriteria,
    criteriaConfig: syncCriteriaConfig(
      state.criteriaConfig,
      state.criteriaTable.criteria,
      selectedCriteria
    ),
  };
}

export function updateCriterion(
  state: PlannerState,
  criterion: string,
  patch: Partial<CriterionConfig>
): PlannerState {
  return { ...state, criteriaConfig: updateCriterionConfig(state.criteriaConfig, criterion, patch) };
}

export function setMapDefaults(state: PlannerState, defaults: Partial<WeightedDefaults>): PlannerState {
  const transportRate = toNumber(defaults.transportRate);
  const mass = toNumber(defaults.mass);
  return {
    ...state,
    mapDefaults: {
      transportRate: transportRate !== null && transportRate >= 0 ? transportRate : state.mapDefaults.transportRate,
      mass: mass !== null && mass >= 0 ? mass : state.mapDefaults.mass,
    },
  };
}

export function setMapView(state: PlannerState, view: { center?: unknown; zoom?: unknown }): PlannerState {
  let { center, zoom } = state.mapView;

  if (typeof view.center === 'object' && view.center !== null && 'lat' in view.center && 'lng' in view.center) {
    const latitude = toNumber(view.center.lat);
    const longitude = toNumber(view.center.lng);
    if (latitude !== null && longitude !== null) center = { longitude, latitude };
  }
  const nextZoom = toNumber(view.zoom);
  if (nextZoom !== null) zoom = Math.trunc(nextZoom);

  return { ...state, mapView: { center, zoom } };
}

/**
 * Bring the active table in line with the markers drawn on the map.
 *
 * With nothing drawn and no active drawing only the snapshot is refreshed.
 * Otherwise the table is reconciled when the drawn markers differ from the
 * last snapshot; `changed` reports whether the table content moved.
 */
export function applyDrawings(
  state: PlannerState,
  drawings: unknown,
  lastActiveDrawing: unknown = null
): Transition {
  const markers = sortMarkerPositions(extractMarkerPositions(drawings));

  if ((lastActiveDrawing === null || lastActiveDrawing === undefined) && markers.length === 0) {
    const snapshot = positionsSignature(activePoints(state));
    if (signaturesEqual(snapshot, state.markerSnapshot)) return { state, changed: false };
    return { state: { ...state, markerSnapshot: snapshot }, changed: false };
  }

  if (signaturesEqual(markerSignature(markers), state.markerSnapshot)) {
    return { state, changed: false };
  }

  if (state.method === 'topsis') {
    const defaults = criterionDefaults(state.criteriaConfig, state.criteriaTable.criteria);
    const criteriaTable = reconcileCriteriaPoints(state.criteriaTable, markers, defaults);
    return {
      state: { ...state, criteriaTable, markerSnapshot: positionsSignature(criteriaTable.points) },
      changed: !signaturesEqual(criteriaSignature(criteriaTable), criteriaSignature(state.criteriaTable)),
    };
  }

  const points = reconcileWeightedPoints(state.points, markers, state.mapDefaults);
  return {
    state: { ...state, points, markerSnapshot: positionsSignature(points) },
    changed: !signaturesEqual(pointsSignature(points), pointsSignature(state.points)),
  };
}

export type PlannerResults =
  | {
      method: 'center-of-gravity';
      centroid: CentroidResult;
      distances: PointDistance[];
      mapCenter: GeoPoint;
      needsInput: boolean;
    }
  | {
      method: 'topsis';
      topsis: TopsisResult;
      mapCenter: GeoPoint;
      needsInput: boolean;
    };

export function evaluatePlanner(state: PlannerState): PlannerResults {
  if (state.method === 'topsis') {
    const topsis = rankWithConfig(state.criteriaTable.points, state.selectedCriteria, state.criteriaConfig);
    const best = topsis.ranking[0];
    return {
      method: 'topsis',
      topsis,
      mapCenter: getMapCenter(state.criteriaTable.points, best ?? { longitude: 0, latitude: 0 }, state.mapView.center),
      needsInput: topsis.ranking.length === 0,
    };
  }

  const centroid = computeCenterOfGravity(state.points);
  return {
    method: 'center-of-gravity',
    centroid,
    distances: computePointDistances(state.points, centroid),
    mapCenter: getMapCenter(state.points, centroid, state.mapView.center),
    needsInput: state.points.length === 0,
  };
}
