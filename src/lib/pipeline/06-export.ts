import fs from 'node:fs/promises';
import path from 'node:path';
import * as XLSX from 'xlsx';
import type { AnalysisResult, RmrScore, UnitFailure } from './types';
import { formatClassification } from './utils/classification';

export type ExportRow = Record<string, string | number | null>;

export type ExportTables = {
  stations: ExportRow[];
  families: ExportRow[];
  unclustered: ExportRow[];
  issues: ExportRow[];
  overview: ExportRow[];
};

function round(value: number, digits = 2): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

/**
 * Convert an array of flat-keyed rows into a CSV string with a deterministic
 * column order. `orderedColumns` defines the column order; any remaining keys
 * found in the data are appended alphabetically.
 */
export function toCsvString(rows: ExportRow[], orderedColumns: string[]): string {
  const allKeys = new Set<string>();
  for (const row of rows) {
    for (const key of Object.keys(row)) allKeys.add(key);
  }
  const columns = orderedColumns.filter((c) => rows.length === 0 || allKeys.has(c));
  const remainder = [...allKeys].filter((k) => !orderedColumns.includes(k)).sort();
  const finalCols = [...columns, ...remainder];

  const escape = (v: unknown): string => {
    if (v == null) return '';
    const s = String(v);
    if (s.includes(',') || s.includes('"') || s.includes('\n') || s.includes('\r')) {
      return `"${s.replace(/"/g, '""')}"`;
    }
    return s;
  };

  const header = finalCols.map(escape).join(',');
  if (rows.length === 0) return `${header}\n`;
  const body = rows.map((row) => finalCols.map((col) => escape(row[col])).join(',')).join('\n');
  return `${header}\n${body}\n`;
}

// ── Canonical column orders ──

const RATING_COLUMNS = [
  'ucs_class',
  'rqd_pct',
  'rqd_source',
  'frequency_per_m',
  'spacing_mm_avg',
  'rating_strength',
  'rating_rqd',
  'rating_spacing',
  'rating_condition',
  'condition_persistence',
  'condition_aperture',
  'condition_roughness',
  'condition_infill',
  'condition_weathering',
  'groundwater_code',
  'rating_groundwater',
  'rating_orientation',
  'rmr_total',
  'rock_class',
  'quality',
  'classification'
];

export const STATION_COLUMNS = [
  'station_id',
  'status',
  'discontinuity_count',
  'traverse_length_m',
  ...RATING_COLUMNS,
  'error'
];

export const FAMILY_COLUMNS = [
  'family_id',
  'status',
  'member_count',
  'mean_dip_direction',
  'mean_dip',
  'resultant_length',
  'max_deviation_deg',
  'tolerance_deg',
  'metric',
  'dominant_structure_type',
  'stations',
  'member_ids',
  ...RATING_COLUMNS,
  'error'
];

export const UNCLUSTERED_COLUMNS = [
  'discontinuity_id',
  'station_id',
  'sheet',
  'row_index',
  'distance_m',
  'structure_type',
  'dip_direction',
  'dip'
];

export const ISSUE_COLUMNS = ['kind', 'message', 'unit', 'station_id', 'sheet', 'row_index', 'field', 'code', 'value'];

export const OVERVIEW_COLUMNS = ['metric', 'value'];

function scoreColumns(score: RmrScore | null): ExportRow {
  if (!score) {
    return Object.fromEntries(RATING_COLUMNS.map((column) => [column, null]));
  }

  return {
    ucs_class: score.ucsClass,
    rqd_pct: round(score.rqd.value),
    rqd_source: score.rqd.source,
    frequency_per_m: score.rqd.frequency == null ? null : round(score.rqd.frequency, 3),
    spacing_mm_avg: round(score.spacingMm, 1),
    rating_strength: score.ratings.strength,
    rating_rqd: score.ratings.rqd,
    rating_spacing: score.ratings.spacing,
    rating_condition: round(score.ratings.condition),
    condition_persistence: score.condition.persistence,
    condition_aperture: score.condition.aperture,
    condition_roughness: score.condition.roughness,
    condition_infill: score.condition.infill,
    condition_weathering: score.condition.weathering,
    groundwater_code: score.dominantGroundwater,
    rating_groundwater: score.ratings.groundwater,
    rating_orientation: score.ratings.orientation,
    rmr_total: round(score.total),
    rock_class: score.classification.rockClass,
    quality: score.classification.quality,
    classification: formatClassification(score.classification)
  };
}

function failureMessage(failures: UnitFailure[], kind: 'station' | 'family', id: string): string | null {
  const failure = failures.find((f) => f.unit.kind === kind && f.unit.id === id);
  return failure ? failure.issue.message : null;
}

export function buildExportTables(result: AnalysisResult): ExportTables {
  const scoreByStation = new Map(result.stationScores.map((score) => [score.unit.id, score]));

  const stations = result.stations.map((station) => {
    const score = scoreByStation.get(station.id) ?? null;
    return {
      station_id: station.id,
      status: score ? 'OK' : 'FAILED',
      discontinuity_count: station.discontinuities.length,
      traverse_length_m: station.traverseLengthM == null ? null : round(station.traverseLengthM),
      ...scoreColumns(score),
      error: failureMessage(result.failures, 'station', station.id)
    };
  });

  const families = result.families.map((summary) => ({
    family_id: summary.family.id,
    status: summary.score ? 'OK' : 'FAILED',
    member_count: summary.memberCount,
    mean_dip_direction: round(summary.family.meanDipDirection, 1),
    mean_dip: round(summary.family.meanDip, 1),
    resultant_length: round(summary.family.resultantLength, 4),
    max_deviation_deg: round(summary.maxDeviationDeg, 1),
    tolerance_deg: summary.family.toleranceDeg,
    metric: summary.family.metric,
    dominant_structure_type: summary.dominantStructureType,
    stations: summary.stationIds.join('; '),
    member_ids: summary.family.members.map((m) => m.id).join('; '),
    ...scoreColumns(summary.score),
    error: failureMessage(result.failures, 'family', summary.family.id)
  }));

  const unclustered = result.unclustered.map((d) => ({
    discontinuity_id: d.id,
    station_id: d.stationId,
    sheet: d.sheet,
    row_index: d.rowIndex,
    distance_m: d.distanceM,
    structure_type: d.structureType,
    dip_direction: d.dipDirection,
    dip: d.dip
  }));

  const issues = [...result.issues, ...result.failures.map((f) => f.issue)].map((issue) => ({
    kind: issue.kind,
    message: issue.message,
    unit: issue.unit,
    station_id: issue.stationId,
    sheet: issue.sheet,
    row_index: issue.rowIndex,
    field: issue.field,
    code: issue.code,
    value: issue.value
  }));

  const o = result.overview;
  const overview: ExportRow[] = [
    { metric: 'stations', value: o.stationCount },
    { metric: 'total_records', value: o.totalRecords },
    { metric: 'valid_records', value: o.validRecords },
    { metric: 'rejected_records', value: o.rejectedRecords },
    { metric: 'mean_rmr', value: o.meanRmr == null ? null : round(o.meanRmr, 1) },
    { metric: 'dominant_classification', value: o.dominantClassification },
    { metric: 'families', value: o.familyCount },
    { metric: 'unclustered', value: o.unclusteredCount },
    ...o.statistics.flatMap((stat) => [
      { metric: `${stat.field}_count`, value: stat.count },
      { metric: `${stat.field}_mean`, value: stat.mean == null ? null : round(stat.mean) },
      { metric: `${stat.field}_min`, value: stat.min == null ? null : round(stat.min) },
      { metric: `${stat.field}_max`, value: stat.max == null ? null : round(stat.max) }
    ])
  ];

  return { stations, families, unclustered, issues, overview };
}

export const EXPORT_FILES = {
  stations: 'stations.csv',
  families: 'families.csv',
  unclustered: 'unclustered.csv',
  issues: 'issues.csv',
  xlsx: 'rmr14-report.xlsx'
} as const;

export async function writeExports(tables: ExportTables, outDir: string) {
  await fs.mkdir(outDir, { recursive: true });

  const csvFiles: Array<[keyof typeof EXPORT_FILES, ExportRow[], string[]]> = [
    ['stations', tables.stations, STATION_COLUMNS],
    ['families', tables.families, FAMILY_COLUMNS],
    ['unclustered', tables.unclustered, UNCLUSTERED_COLUMNS],
    ['issues', tables.issues, ISSUE_COLUMNS]
  ];

  await Promise.all(
    csvFiles.map(([name, rows, columns]) =>
      fs.writeFile(path.join(outDir, EXPORT_FILES[name]), toCsvString(rows, columns), 'utf8')
    )
  );

  // ── XLSX with every table ──
  const workbook = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(workbook, XLSX.utils.json_to_sheet(tables.overview, { header: OVERVIEW_COLUMNS }), 'overview');
  for (const [name, rows, columns] of csvFiles) {
    XLSX.utils.book_append_sheet(workbook, XLSX.utils.json_to_sheet(rows, { header: columns }), name);
  }

  const xlsxPath = path.join(outDir, EXPORT_FILES.xlsx);
  XLSX.writeFile(workbook, xlsxPath);

  return {
    outDir,
    files: {
      xlsx: xlsxPath,
      stationsCsv: path.join(outDir, EXPORT_FILES.stations),
      familiesCsv: path.join(outDir, EXPORT_FILES.families),
      unclusteredCsv: path.join(outDir, EXPORT_FILES.unclustered),
      issuesCsv: path.join(outDir, EXPORT_FILES.issues)
    }
  };
}
