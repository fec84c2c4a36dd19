// Reads uploaded point files into raw tables
import Papa from 'papaparse';
import * as XLSX from 'xlsx';
import type { ImportResult, RawTable } from '@/types/facility';

export type FileContent = ArrayBuffer | Uint8Array | string;

/** The part of a browser `File` the adapter reads. */
export interface UploadedFile {
  name: string;
  arrayBuffer(): Promise<ArrayBuffer>;
}

function toBytes(content: FileContent): Uint8Array {
  if (typeof content === 'string') return new TextEncoder().encode(content);
  return content instanceof Uint8Array ? content : new Uint8Array(content);
}

function toText(content: FileContent): string {
  if (typeof content === 'string') return content;
  return new TextDecoder('utf-8').decode(toBytes(content));
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function parseCsv(text: string): RawTable {
  const results = Papa.parse<Record<string, unknown>>(text, {
    header: true,
    skipEmptyLines: true,
  });

  const fatal = results.errors.find(e => e.type === 'Delimiter' || e.type === 'Quotes');
  if (fatal && results.data.length === 0) {
    throw new Error(fatal.message);
  }

  const headers = results.meta.fields ?? [];
  return { headers, rows: results.data };
}

export function parseSpreadsheet(bytes: Uint8Array): RawTable {
  const workbook = XLSX.read(bytes, { type: 'array' });

  // Use the first sheet
  const sheetName = workbook.SheetNames[0];
  if (sheetName === undefined) return { headers: [], rows: [] };
  const worksheet = workbook.Sheets[sheetName];

  const grid = XLSX.utils.sheet_to_json<unknown[]>(worksheet, {
    header: 1,
    defval: null,
    blankrows: false,
  });
  if (grid.length === 0) return { headers: [], rows: [] };

  // Repeated headers get a numeric suffix so the first column keeps its name
  const seen = new Set<string>();
  const headers = grid[0].map((cell, i) => {
    const base =
      cell === null || cell === undefined || String(cell).trim() === '' ? `column_${i + 1}` : String(cell);
    let header = base;
    for (let n = 1; seen.has(header); n++) header = `${base}_${n}`;
    seen.add(header);
    return header;
  });
  const rows = grid.slice(1).map(cells => {
    const row: Record<string, unknown> = {};
    headers.forEach((header, i) => {
      row[header] = cells[i] ?? null;
    });
    return row;
  });

  return { headers, rows };
}

/**
 * Point features of a GeoJSON FeatureCollection (or a single Feature) become
 * rows: `longitude`, `latitude`, then the feature properties.
 */
export function parseGeoJson(text: string): RawTable {
  const parsed: unknown = JSON.parse(text);
  if (!isRecord(parsed) || (parsed.type !== 'FeatureCollection' && parsed.type !== 'Feature')) {
    throw new Error('Invalid GeoJSON format');
  }

  const features: unknown[] =
    parsed.type === 'FeatureCollection'
      ? Array.isArray(parsed.features) ? parsed.features : []
      : [parsed];

  const headers = ['longitude', 'latitude'];
  const rows: Record<string, unknown>[] = [];

  features.forEach(feature => {
    if (!isRecord(feature) || !isRecord(feature.geometry)) return;
    const { geometry } = feature;
    if (geometry.type !== 'Point' || !Array.isArray(geometry.coordinates)) return;

    const properties = isRecord(feature.properties) ? feature.properties : {};
    Object.keys(properties).forEach(key => {
      if (!headers.includes(key)) headers.push(key);
    });
    rows.push({
      ...properties,
      longitude: geometry.coordinates[0],
      latitude: geometry.coordinates[1],
    });
  });

  return { headers, rows };
}

/**
 * Parse an uploaded file by extension: .xlsx/.xls as spreadsheets,
 * .geojson/.json as GeoJSON, anything else as delimited text. Failures come
 * back as an empty table with `status: 'error'`.
 */
export function readPointsFile(fileName: string, content: FileContent): ImportResult {
  const name = fileName.toLowerCase();

  try {
    let table: RawTable;
    if (name.endsWith('.xlsx') || name.endsWith('.xls')) {
      table = parseSpreadsheet(toBytes(content));
    } else if (name.endsWith('.geojson') || name.endsWith('.json')) {
      table = parseGeoJson(toText(content));
    } else {
      table = parseCsv(toText(content));
    }

    if (table.rows.length === 0) {
      return { status: 'empty', message: `${fileName} contains no rows`, table };
    }

    return {
      status: 'ok',
      message: `${table.rows.length} rows loaded from ${fileName}`,
      table,
    };
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    console.warn(`[ImportAdapter] Could not parse ${fileName}:`, reason);
    return {
      status: 'error',
      message: `Error reading ${fileName}: ${reason}`,
      table: { headers: [], rows: [] },
    };
  }
}

export async function readPointsUpload(file: UploadedFile): Promise<ImportResult> {
  try {
    const buffer = await file.arrayBuffer();
    return readPointsFile(file.name, buffer);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    console.warn(`[ImportAdapter] Could not read ${file.name}:`, reason);
    return {
      status: 'error',
      message: `Error reading ${file.name}: ${reason}`,
      table: { headers: [], rows: [] },
    };
  }
}
