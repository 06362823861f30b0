import fs from 'node:fs';
import { locateDataFile, parseDatasetFile, DEFAULT_DICTIONARY_FILE } from '../../01-ingest';
import type { Discontinuity, Station } from '../../types';
import { createCodeDictionary, type CodeDictionary } from '../../utils/code-dictionary';

export function bundledDictionary(): CodeDictionary {
  const file = locateDataFile(DEFAULT_DICTIONARY_FILE);
  const sheets = parseDatasetFile(fs.readFileSync(file), file);
  return createCodeDictionary(sheets.flatMap((sheet) => sheet.rows));
}

/** Bundled dictionary plus extra rows (e.g. a fractional rating). */
export function extendedDictionary(extra: Array<{ parameter: string; code: string; rating: number | null; label: string }>) {
  return createCodeDictionary([...bundledDictionary().entries, ...extra]);
}

export function makeDiscontinuity(overrides: Partial<Discontinuity> = {}): Discontinuity {
  const stationId = overrides.stationId ?? 'ST-1';
  const rowIndex = overrides.rowIndex ?? 1;
  return {
    id: `${stationId}:${rowIndex}`,
    stationId,
    sheet: stationId,
    rowIndex,
    distanceM: 1,
    structureType: 'J',
    dipDirection: 45,
    dip: 65,
    spacing: '4',
    persistence: '2',
    aperture: '2',
    roughness: '2',
    infill: '1',
    weathering: '2',
    groundwater: '2',
    ...overrides
  };
}

export function makeStation(id: string, discontinuities: Discontinuity[], overrides: Partial<Station> = {}): Station {
  return {
    id,
    discontinuities,
    ucsClass: 'R4',
    rqd: null,
    traverseLengthM: discontinuities.reduce((acc, d) => Math.max(acc, d.distanceM), 0) || null,
    ...overrides
  };
}

export const TRAVERSE_HEADERS = [
  'Station',
  'Distance_m',
  'Type',
  'Dip_Direction_degrees',
  'Dip_degrees',
  'Spacing_mm',
  'Persistence',
  'Aperture_mm',
  'Roughness',
  'Infilling_Type',
  'Weathering',
  'Groundwater'
];

/** One traverse row keyed by TRAVERSE_HEADERS, from positional cells. */
export function traverseRow(cells: string[]): Record<string, unknown> {
  return Object.fromEntries(TRAVERSE_HEADERS.map((header, idx) => [header, cells[idx] ?? '']));
}
