import type { Discontinuity, ParsedSheet, Station, StationOverride } from './types';
import { buildColumnMap, missingFields, type CanonicalField, type ColumnMap } from './utils/column-mapper';
import { normalizeCode, type CodeDictionary, type CodedParameter } from './utils/code-dictionary';
import {
  InsufficientDataError,
  InvalidRangeError,
  type RmrError,
  UnknownCodeError,
  toIssue,
  type ErrorContext,
  type RecordIssue
} from './utils/errors';
import { normalizeAzimuth } from './utils/orientation';

// Readings this far outside [0, 90] are compass rounding and get clamped.
export const DIP_CLAMP_SLACK_DEG = 1;

const REQUIRED_FIELDS: CanonicalField[] = [
  'distance_m',
  'structure_type',
  'dip_direction',
  'dip',
  'spacing',
  'persistence',
  'aperture',
  'roughness',
  'infill',
  'weathering',
  'groundwater'
];

const CODE_FIELDS: Array<[CodedParameter, CanonicalField]> = [
  ['structure_type', 'structure_type'],
  ['spacing', 'spacing'],
  ['persistence', 'persistence'],
  ['aperture', 'aperture'],
  ['roughness', 'roughness'],
  ['infill', 'infill'],
  ['weathering', 'weathering'],
  ['groundwater', 'groundwater']
];

function toNumber(value: unknown): number | null {
  if (value == null || value === '') return null;
  const n = typeof value === 'string' ? Number(value.trim().replace(',', '.')) : Number(value);
  return Number.isFinite(n) ? n : null;
}

function cell(row: Record<string, unknown>, map: ColumnMap, field: CanonicalField): unknown {
  const header = map[field];
  return header ? row[header] : null;
}

export type NormalizeResult = {
  discontinuities: Discontinuity[];
  issues: RecordIssue[];
  /** Every station id seen, valid rows or not, in order of first appearance */
  stationIds: string[];
  totalRecords: number;
};

export function normalizeSheets(sheets: readonly ParsedSheet[], dictionary: CodeDictionary): NormalizeResult {
  const discontinuities: Discontinuity[] = [];
  const issues: RecordIssue[] = [];
  const stationIds: string[] = [];
  const seenStations = new Set<string>();
  let totalRecords = 0;

  const noteStation = (id: string) => {
    if (!seenStations.has(id)) {
      seenStations.add(id);
      stationIds.push(id);
    }
  };

  for (const sheet of sheets) {
    totalRecords += sheet.rows.length;
    const columnMap = buildColumnMap(sheet.headers);
    const missing = missingFields(columnMap, REQUIRED_FIELDS);

    if (missing.length > 0) {
      console.warn(`[normalize] Sheet ${sheet.label}: missing columns ${missing.join(', ')}; ${sheet.rows.length} rows rejected`);
      for (const field of missing) {
        issues.push(
          toIssue(
            new InsufficientDataError(`Required column for ${field} not found`, { sheet: sheet.label, field })
          )
        );
      }
      sheet.rows.forEach((row) => noteStation(normalizeCode(cell(row, columnMap, 'station')) || sheet.label));
      continue;
    }

    sheet.rows.forEach((row, idx) => {
      const rowIndex = idx + 1;
      const stationId = normalizeCode(cell(row, columnMap, 'station')) || sheet.label;
      noteStation(stationId);

      const context: ErrorContext = { stationId, sheet: sheet.label, rowIndex };
      const errors: RmrError[] = [];

      const distanceM = toNumber(cell(row, columnMap, 'distance_m'));
      if (distanceM == null || distanceM <= 0) {
        errors.push(
          new InvalidRangeError(`Distance along traverse must be a positive number`, {
            ...context,
            field: 'distance_m',
            ...(distanceM != null ? { value: distanceM } : {})
          })
        );
      }

      const rawDipDirection = toNumber(cell(row, columnMap, 'dip_direction'));
      if (rawDipDirection == null) {
        errors.push(new InvalidRangeError('Dip direction is missing or not a number', { ...context, field: 'dip_direction' }));
      }

      let dip = toNumber(cell(row, columnMap, 'dip'));
      if (dip == null) {
        errors.push(new InvalidRangeError('Dip is missing or not a number', { ...context, field: 'dip' }));
      } else if (dip < -DIP_CLAMP_SLACK_DEG || dip > 90 + DIP_CLAMP_SLACK_DEG) {
        errors.push(new InvalidRangeError(`Dip ${dip} is outside [0, 90]`, { ...context, field: 'dip', value: dip }));
        dip = null;
      } else if (dip < 0 || dip > 90) {
        const clamped = Math.max(0, Math.min(90, dip));
        console.warn(`[normalize] ${sheet.label} row ${rowIndex}: dip ${dip} clamped to ${clamped}`);
        dip = clamped;
      }

      const codes: Partial<Record<CodedParameter, string>> = {};
      for (const [parameter, field] of CODE_FIELDS) {
        const code = normalizeCode(cell(row, columnMap, field));
        if (!dictionary.has(parameter, code)) {
          errors.push(new UnknownCodeError(parameter, code, { ...context, field }));
          continue;
        }
        codes[parameter] = code;
      }

      if (errors.length > 0 || distanceM == null || rawDipDirection == null || dip == null) {
        issues.push(...errors.map(toIssue));
        return;
      }

      discontinuities.push(
        Object.freeze({
          id: `${sheet.label}:${rowIndex}`,
          stationId,
          sheet: sheet.label,
          rowIndex,
          distanceM,
          structureType: codes.structure_type ?? '',
          dipDirection: normalizeAzimuth(rawDipDirection),
          dip,
          spacing: codes.spacing ?? '',
          persistence: codes.persistence ?? '',
          aperture: codes.aperture ?? '',
          roughness: codes.roughness ?? '',
          infill: codes.infill ?? '',
          weathering: codes.weathering ?? '',
          groundwater: codes.groundwater ?? ''
        })
      );
    });
  }

  return { discontinuities, issues, stationIds, totalRecords };
}

export function buildStations(args: {
  discontinuities: readonly Discontinuity[];
  stationIds: readonly string[];
  ucsClass: string;
  overrides?: Record<string, StationOverride>;
}): Station[] {
  const byStation = new Map<string, Discontinuity[]>();
  for (const d of args.discontinuities) {
    const list = byStation.get(d.stationId) ?? [];
    list.push(d);
    byStation.set(d.stationId, list);
  }

  for (const id of Object.keys(args.overrides ?? {})) {
    if (!args.stationIds.includes(id)) {
      console.warn(`[normalize] Station table lists ${id}, which has no records`);
    }
  }

  return args.stationIds.map((id) => {
    const members = byStation.get(id) ?? [];
    const override = args.overrides?.[id] ?? {};
    const furthest = members.reduce((acc, d) => Math.max(acc, d.distanceM), 0);

    return Object.freeze({
      id,
      discontinuities: Object.freeze([...members]),
      ucsClass: override.ucsClass ?? args.ucsClass,
      rqd: override.rqd ?? null,
      traverseLengthM: override.traverseLengthM ?? (members.length > 0 ? furthest : null)
    });
  });
}
