// Planner defaults and column aliases
import type { DecisionMethod, GeoPoint, Impact } from '@/types/facility';

export const DEFAULT_TRANSPORT_RATE = 1;
export const DEFAULT_MASS = 1;
export const DEFAULT_CRITERION_VALUE = 1;
export const DEFAULT_CRITERION_WEIGHT = 1;
export const DEFAULT_IMPACT: Impact = 'benefit';

export const DEGENERATE_WEIGHT_EPSILON = 1e-12;
export const SIGNATURE_PRECISION = 8;
export const DISPLAY_DECIMALS = 6;

export const DEFAULT_MAP_CENTER: GeoPoint = { longitude: 21.0122, latitude: 52.2297 };
export const DEFAULT_MAP_ZOOM = 11;
export const MAP_CENTER_EPSILON = 1e-9;

export const POINT_COLUMNS = ['longitude', 'latitude', 'transport_rate', 'mass'] as const;

export const COLUMN_ALIASES = {
  longitude: ['longitude', 'lon', 'x'],
  latitude: ['latitude', 'lat', 'y'],
  transport_rate: ['transport_rate', 'transport', 'rate', 'stawka_transportowa', 'stawka', 'st'],
  mass: ['mass', 'masa', 'm'],
} as const;

export type CanonicalColumn = keyof typeof COLUMN_ALIASES;

export interface PlannerConfig {
  method: DecisionMethod;
  defaultTransportRate: number;
  defaultMass: number;
  mapCenter: GeoPoint;
  mapZoom: number;
}

export const DEFAULT_PLANNER_CONFIG: PlannerConfig = {
  method: 'center-of-gravity',
  defaultTransportRate: DEFAULT_TRANSPORT_RATE,
  defaultMass: DEFAULT_MASS,
  mapCenter: DEFAULT_MAP_CENTER,
  mapZoom: DEFAULT_MAP_ZOOM,
};

export function resolvePlannerConfig(overrides: Partial<PlannerConfig> = {}): PlannerConfig {
  return { ...DEFAULT_PLANNER_CONFIG, ...overrides };
}

export function formatDecimal(value: number, decimals: number = DISPLAY_DECIMALS): string {
  return value.toFixed(decimals);
}
