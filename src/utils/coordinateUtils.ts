// Column detection and numeric coercion utilities
import type { GeoPoint } from '@/types/facility';
import { COLUMN_ALIASES, type CanonicalColumn } from '@/utils/plannerConfig';

export interface HeaderIndex {
  /** Normalized names in input order, duplicates removed. */
  names: string[];
  /** Normalized name -> original header of its first occurrence. */
  sources: Map<string, string>;
}

export function normalizeHeader(header: string): string {
  return String(header).trim().toLowerCase();
}

export function indexHeaders(headers: readonly string[]): HeaderIndex {
  const names: string[] = [];
  const sources = new Map<string, string>();

  headers.forEach(header => {
    const name = normalizeHeader(header);
    if (sources.has(name)) return;
    sources.set(name, header);
    names.push(name);
  });

  return { names, sources };
}

/**
 * First alias, in alias order, that exists among the normalized names.
 */
export function chooseExistingColumn(
  names: readonly string[],
  candidates: readonly string[]
): string | null {
  for (const candidate of candidates) {
    if (names.includes(candidate)) return candidate;
  }
  return null;
}

export function findAliasedColumn(names: readonly string[], column: CanonicalColumn): string | null {
  return chooseExistingColumn(names, COLUMN_ALIASES[column]);
}

export interface CoordinateColumns {
  longitude: string | null;
  latitude: string | null;
}

/**
 * Detect coordinate columns by alias. When either is missing, the first two
 * columns fill the gap positionally.
 */
export function detectCoordinateColumns(names: readonly string[]): CoordinateColumns {
  let longitude = findAliasedColumn(names, 'longitude');
  let latitude = findAliasedColumn(names, 'latitude');

  if ((longitude === null || latitude === null) && names.length >= 2) {
    longitude = longitude ?? names[0];
    latitude = latitude ?? names[1];
  }

  return { longitude, latitude };
}

// Plain decimal or exponent notation; hex, binary and octal literals are text
const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i;

/**
 * Coerce a cell to a finite number; anything else is missing (`null`).
 */
export function toNumber(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === 'bigint') {
    return toNumber(Number(value));
  }
  if (typeof value === 'boolean') {
    return value ? 1 : 0;
  }
  if (typeof value === 'string') {
    const trimmed = value.trim();
    if (!DECIMAL_PATTERN.test(trimmed)) return null;
    return toNumber(Number(trimmed));
  }
  return null;
}

export function euclideanDistance(a: GeoPoint, b: GeoPoint): number {
  return Math.sqrt(
    Math.pow(a.longitude - b.longitude, 2) + Math.pow(a.latitude - b.latitude, 2)
  );
}

export function roundTo(value: number, decimals: number): number {
  const factor = Math.pow(10, decimals);
  const rounded = Math.round(value * factor) / factor;
  // -0 and 0 must compare equal in signatures
  return rounded === 0 ? 0 : rounded;
}
