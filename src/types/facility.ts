// Facility location data types

/** A raw table as it arrives from an upload or a table editor. */
export interface RawTable {
  headers: string[];
  rows: Record<string, unknown>[];
}

export interface GeoPoint {
  longitude: number;
  latitude: number;
}

/** Point used by the center-of-gravity method. */
export interface WeightedPoint extends GeoPoint {
  transportRate: number;
  mass: number;
}

/** Point used by TOPSIS; `null` marks a cell that failed numeric coercion. */
export interface CriteriaPoint extends GeoPoint {
  values: Record<string, number | null>;
}

export interface CriteriaTable {
  criteria: string[];
  points: CriteriaPoint[];
}

export type DecisionMethod = 'center-of-gravity' | 'topsis';

export type Impact = 'benefit' | 'cost';

export interface CriterionConfig {
  weight: number;
  impact: Impact;
  defaultValue: number;
}

/** Keyed by lowercased, trimmed column name. */
export type CriteriaConfigMap = Record<string, CriterionConfig>;

export type MarkerPosition = [longitude: number, latitude: number];

export type Signature = ReadonlyArray<readonly number[]>;

export interface CentroidResult extends GeoPoint {
  weightedDistanceSum: number;
  usedFallbackAverage: boolean;
}

export interface PointDistance extends WeightedPoint {
  weight: number;
  weightedLongitude: number;
  weightedLatitude: number;
  distance: number;
  weightedDistance: number;
}

export interface TopsisRankedPoint extends GeoPoint {
  index: number;
  point: CriteriaPoint;
  topsisScore: number;
  topsisRank: number;
}

export interface TopsisResult {
  criteria: string[];
  weights: number[];
  impacts: Impact[];
  decisionMatrix: number[][];
  normalizedMatrix: number[][];
  weightedMatrix: number[][];
  idealBest: number[];
  idealWorst: number[];
  distanceToBest: number[];
  distanceToWorst: number[];
  ranking: TopsisRankedPoint[];
}

export type ImportStatus = 'ok' | 'empty' | 'error';

export interface ImportResult {
  status: ImportStatus;
  message: string;
  table: RawTable;
}

export interface MapView {
  center: GeoPoint;
  zoom: number;
}
