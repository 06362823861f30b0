import { randomUUID } from 'node:crypto';
import path from 'node:path';
import { parseDatasetFile, readTableFile } from './01-ingest';
import { buildStations, normalizeSheets } from './02-normalize';
import { scoreStations } from './03-station-score';
import { formFamilies } from './04-cluster';
import { summarizeFamilies } from './05-family-score';
import { buildExportTables, writeExports } from './06-export';
import type {
  AnalysisOptions,
  AnalysisResult,
  DatasetOverview,
  Discontinuity,
  FamilySummary,
  FieldStatistics,
  ParsedSheet,
  RmrScore
} from './types';
import type { CodeDictionary } from './utils/code-dictionary';
import { formatClassification } from './utils/classification';
import { circularMean } from './utils/orientation';
import { dominantValue } from './utils/ratings';

const STAGES = ['Parse/ingest', 'Normalize', 'Station scoring', 'Family clustering', 'Family scoring', 'Export'];

function markStage(runId: string, stageIndex: number, status: 'RUNNING' | 'DONE' | 'FAILED', message?: string) {
  console.log(`[Pipeline ${runId}] Stage ${stageIndex} (${STAGES[stageIndex - 1]}): ${status}${message ? ' — ' + message : ''}`);
}

function describeField(
  field: FieldStatistics['field'],
  values: readonly number[],
  mean: (values: readonly number[]) => number
): FieldStatistics {
  if (values.length === 0) {
    return { field, count: 0, mean: null, min: null, max: null };
  }
  return { field, count: values.length, mean: mean(values), min: Math.min(...values), max: Math.max(...values) };
}

const arithmeticMean = (values: readonly number[]) => values.reduce((acc, v) => acc + v, 0) / values.length;

export function describeDiscontinuities(discontinuities: readonly Discontinuity[]): FieldStatistics[] {
  return [
    describeField('distance_m', discontinuities.map((d) => d.distanceM), arithmeticMean),
    describeField('dip_direction', discontinuities.map((d) => d.dipDirection), (values) => circularMean(values).mean),
    describeField('dip', discontinuities.map((d) => d.dip), arithmeticMean)
  ];
}

export function buildOverview(args: {
  stationCount: number;
  totalRecords: number;
  discontinuities: readonly Discontinuity[];
  stationScores: readonly RmrScore[];
  families: readonly FamilySummary[];
  unclusteredCount: number;
}): DatasetOverview {
  const totals = args.stationScores.map((s) => s.total);
  const validRecords = args.discontinuities.length;
  return {
    stationCount: args.stationCount,
    totalRecords: args.totalRecords,
    validRecords,
    rejectedRecords: args.totalRecords - validRecords,
    meanRmr: totals.length > 0 ? totals.reduce((acc, t) => acc + t, 0) / totals.length : null,
    dominantClassification: dominantValue(args.stationScores.map((s) => formatClassification(s.classification))) ?? null,
    familyCount: args.families.length,
    unclusteredCount: args.unclusteredCount,
    statistics: describeDiscontinuities(args.discontinuities)
  };
}

export type StageListener = (stageIndex: number, status: 'RUNNING' | 'DONE', message?: string) => void;

/**
 * Runs normalize → station scoring → clustering → family scoring over
 * already-parsed sheets. No I/O; the dictionary and options are explicit.
 * `onStage` hears about stages 2–5 as they start and finish.
 */
export function analyzeDataset(
  sheets: readonly ParsedSheet[],
  dictionary: CodeDictionary,
  options: AnalysisOptions,
  onStage: StageListener = () => undefined
): AnalysisResult {
  onStage(2, 'RUNNING');
  const normalized = normalizeSheets(sheets, dictionary);
  onStage(2, 'DONE', `${normalized.discontinuities.length}/${normalized.totalRecords} records valid, ${normalized.issues.length} issues`);

  onStage(3, 'RUNNING');
  const stations = buildStations({
    discontinuities: normalized.discontinuities,
    stationIds: normalized.stationIds,
    ucsClass: options.ucsClass,
    overrides: options.stations
  });

  const stationResult = scoreStations({
    stations,
    dictionary,
    orientationAdjustment: options.orientationAdjustment
  });
  onStage(3, 'DONE', `${stationResult.scores.length}/${stations.length} stations scored`);

  onStage(4, 'RUNNING');
  const formation = formFamilies({ discontinuities: normalized.discontinuities, options });
  onStage(4, 'DONE', `${formation.families.length} families, ${formation.unclustered.length} unclustered`);

  onStage(5, 'RUNNING');
  const familyResult = summarizeFamilies({
    families: formation.families,
    stations,
    dictionary,
    ucsClass: options.ucsClass,
    orientationAdjustment: options.orientationAdjustment
  });
  const scoredFamilies = familyResult.summaries.filter((f) => f.score).length;
  onStage(5, 'DONE', `${scoredFamilies}/${familyResult.summaries.length} families scored`);

  return {
    stations,
    stationScores: stationResult.scores,
    families: familyResult.summaries,
    unclustered: formation.unclustered,
    issues: normalized.issues,
    failures: [...stationResult.failures, ...familyResult.failures],
    overview: buildOverview({
      stationCount: stations.length,
      totalRecords: normalized.totalRecords,
      discontinuities: normalized.discontinuities,
      stationScores: stationResult.scores,
      families: familyResult.summaries,
      unclusteredCount: formation.unclustered.length
    })
  };
}

export type PipelineInput =
  | { inputPath: string }
  | { buffer: Buffer; filename: string };

export type PipelineRun = {
  runId: string;
  result: AnalysisResult;
  exports: Awaited<ReturnType<typeof writeExports>> | null;
};

export async function runRmrPipeline(args: {
  input: PipelineInput;
  dictionary: CodeDictionary;
  options: AnalysisOptions;
  outDir?: string;
  runId?: string;
}): Promise<PipelineRun> {
  const runId = args.runId ?? randomUUID().slice(0, 8);
  let stage = 1;

  try {
    markStage(runId, stage, 'RUNNING');
    const sheets =
      'inputPath' in args.input
        ? await readTableFile(args.input.inputPath)
        : parseDatasetFile(args.input.buffer, args.input.filename);
    const rowCount = sheets.reduce((acc, s) => acc + s.rows.length, 0);
    markStage(runId, stage, 'DONE', `${sheets.length} sheet(s), ${rowCount} rows`);

    const result = analyzeDataset(sheets, args.dictionary, args.options, (stageIndex, status, message) => {
      stage = stageIndex;
      markStage(runId, stageIndex, status, message);
    });

    let exports: PipelineRun['exports'] = null;
    if (args.outDir) {
      stage = 6;
      markStage(runId, stage, 'RUNNING');
      exports = await writeExports(buildExportTables(result), path.resolve(args.outDir));
      markStage(runId, stage, 'DONE', exports.outDir);
    }

    return { runId, result, exports };
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Pipeline failed';
    markStage(runId, stage, 'FAILED', message);
    throw error;
  }
}
