import { afterEach, describe, expect, it, vi } from 'vitest';
import * as XLSX from 'xlsx';
import { parseGeoJson, readPointsFile } from '@/utils/importAdapter';
import { normalizePointsTable } from '@/utils/pointsTable';

afterEach(() => {
  vi.restoreAllMocks();
});

describe('readPointsFile', () => {
  it('parses delimited text with headers', () => {
    const result = readPointsFile('points.csv', 'Longitude,Latitude,Mass\n21,52,3\n19,50,abc\n');

    expect(result.status).toBe('ok');
    expect(result.message).toBe('2 rows loaded from points.csv');
    expect(result.table.headers).toEqual(['Longitude', 'Latitude', 'Mass']);
    expect(normalizePointsTable(result.table)).toEqual([
      { longitude: 21, latitude: 52, transportRate: 1, mass: 3 },
      { longitude: 19, latitude: 50, transportRate: 1, mass: 1 },
    ]);
  });

  it('decodes byte content and treats unknown extensions as delimited text', () => {
    const bytes = new TextEncoder().encode('x;y\n1;2\n');
    const result = readPointsFile('points.txt', bytes);
    expect(result.table.headers).toEqual(['x', 'y']);
    expect(result.table.rows).toEqual([{ x: '1', y: '2' }]);
  });

  it('reads the first sheet of a workbook in column order', () => {
    const sheet = XLSX.utils.aoa_to_sheet([
      ['lon', 'lat', 'masa'],
      [1, 2, 3],
      [4, 5, null],
    ]);
    const workbook = XLSX.utils.book_new();
    XLSX.utils.book_append_sheet(workbook, sheet, 'Points');
    const buffer: ArrayBuffer = XLSX.write(workbook, { type: 'array', bookType: 'xlsx' });

    const result = readPointsFile('Depots.XLSX', buffer);

    expect(result.status).toBe('ok');
    expect(result.table).toEqual({
      headers: ['lon', 'lat', 'masa'],
      rows: [
        { lon: 1, lat: 2, masa: 3 },
        { lon: 4, lat: 5, masa: null },
      ],
    });
  });

  it('keeps the first of two columns with the same header', () => {
    const sheet = XLSX.utils.aoa_to_sheet([
      ['lon', 'lat', 'mass', 'mass'],
      [1, 2, 5, 99],
    ]);
    const workbook = XLSX.utils.book_new();
    XLSX.utils.book_append_sheet(workbook, sheet, 'Points');
    const buffer: ArrayBuffer = XLSX.write(workbook, { type: 'array', bookType: 'xlsx' });

    const result = readPointsFile('depots.xlsx', buffer);

    expect(result.table).toEqual({
      headers: ['lon', 'lat', 'mass', 'mass_1'],
      rows: [{ lon: 1, lat: 2, mass: 5, mass_1: 99 }],
    });
    expect(normalizePointsTable(result.table)).toEqual([
      { longitude: 1, latitude: 2, transportRate: 1, mass: 5 },
    ]);
  });

  it('reports an empty file', () => {
    const result = readPointsFile('points.csv', 'longitude,latitude\n');
    expect(result.status).toBe('empty');
    expect(result.message).toBe('points.csv contains no rows');
    expect(result.table.rows).toEqual([]);
  });

  it('recovers from a parse failure with an empty table', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);

    const result = readPointsFile('broken.geojson', '{oops');

    expect(result.status).toBe('error');
    expect(result.message.startsWith('Error reading broken.geojson: ')).toBe(true);
    expect(result.table).toEqual({ headers: [], rows: [] });
    expect(warn).toHaveBeenCalledTimes(1);
  });
});

describe('parseGeoJson', () => {
  it('turns Point features into rows', () => {
    const text = JSON.stringify({
      type: 'FeatureCollection',
      features: [
        { type: 'Feature', properties: { mass: 4 }, geometry: { type: 'Point', coordinates: [17, 51] } },
        { type: 'Feature', properties: { name: 'route' }, geometry: { type: 'LineString', coordinates: [[0, 0], [1, 1]] } },
        { type: 'Feature', properties: null, geometry: { type: 'Point', coordinates: [18, 54] } },
      ],
    });
    expect(parseGeoJson(text)).toEqual({
      headers: ['longitude', 'latitude', 'mass'],
      rows: [
        { mass: 4, longitude: 17, latitude: 51 },
        { longitude: 18, latitude: 54 },
      ],
    });
  });

  it('rejects documents that are not features', () => {
    expect(() => parseGeoJson('{"type":"Point","coordinates":[0,0]}')).toThrow('Invalid GeoJSON format');
  });
});
