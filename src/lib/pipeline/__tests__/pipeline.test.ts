import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest';
import { EXAMPLE_TRAVERSE_FILE, locateDataFile, readTableFile } from '../01-ingest';
import { analyzeDataset, describeDiscontinuities, runRmrPipeline } from '..';
import type { AnalysisOptions } from '../types';
import { formatClassification } from '../utils/classification';
import { bundledDictionary, makeDiscontinuity } from './fixtures/records';

const OPTIONS: AnalysisOptions = {
  ucsClass: 'R4',
  orientationAdjustment: -5,
  toleranceDeg: 15,
  minFamilySize: 3,
  metric: 'independent',
  scope: 'project'
};

const dictionary = bundledDictionary();

async function exampleSheets() {
  return readTableFile(locateDataFile(EXAMPLE_TRAVERSE_FILE));
}

describe('analyzeDataset on the example traverse', () => {
  test('scores every station', async () => {
    const result = analyzeDataset(await exampleSheets(), dictionary, OPTIONS);

    expect(result.failures).toEqual([]);
    expect(result.issues).toEqual([]);
    expect(result.stationScores.map((s) => [s.unit.id, s.memberCount, s.total, formatClassification(s.classification)])).toEqual([
      ['ST-01', 7, 70, 'Class II – Good'],
      ['ST-02', 7, 55, 'Class III – Fair'],
      ['ST-03', 4, 75, 'Class II – Good']
    ]);
    expect(result.stationScores[1].condition).toEqual({ persistence: 1, aperture: 1, roughness: 1, infill: 2, weathering: 3 });
  });

  test('groups the two joint sets and leaves the fault and the odd joint out', async () => {
    const result = analyzeDataset(await exampleSheets(), dictionary, OPTIONS);

    expect(result.families.map((f) => [f.family.id, f.memberCount])).toEqual([
      ['F1', 10],
      ['F2', 6]
    ]);
    expect(result.unclustered.map((d) => d.id)).toEqual(['example-traverse:12', 'example-traverse:18']);

    const [f1, f2] = result.families;
    expect(f1.family.meanDip).toBeCloseTo(64.6, 9);
    expect(f2.family.meanDip).toBeCloseTo(22.5, 9);
    expect(f2.dominantStructureType).toBe('B');
    expect(f2.stationIds).toEqual(['ST-01', 'ST-02', 'ST-03']);
    expect(f2.score?.rqd.source).toBe('frequency');
    expect(f2.score?.spacingMm).toBe(600);
    expect(f2.score?.dominantGroundwater).toBe('1');
    expect(f2.score?.total).toBe(80);
    expect(f1.score).not.toBeNull();
  });

  test('every record lands in exactly one family or in unclustered', async () => {
    const result = analyzeDataset(await exampleSheets(), dictionary, OPTIONS);
    const placed = [...result.families.flatMap((f) => f.family.members), ...result.unclustered].map((d) => d.id).sort();
    const valid = result.stations.flatMap((s) => s.discontinuities).map((d) => d.id).sort();

    expect(placed).toEqual(valid);
    expect(new Set(placed).size).toBe(18);
  });

  test('summarises the dataset', async () => {
    const { overview } = analyzeDataset(await exampleSheets(), dictionary, OPTIONS);

    expect(overview).toMatchObject({
      stationCount: 3,
      totalRecords: 18,
      validRecords: 18,
      rejectedRecords: 0,
      meanRmr: (70 + 55 + 75) / 3,
      dominantClassification: 'Class II – Good',
      familyCount: 2,
      unclusteredCount: 2
    });

    const [distance, dipDirection, dip] = overview.statistics;
    expect(distance).toMatchObject({ field: 'distance_m', count: 18, min: 0.6, max: 8 });
    expect(distance.mean).toBeCloseTo(71.4 / 18, 9);
    expect(dipDirection).toMatchObject({ field: 'dip_direction', count: 18, min: 39, max: 315 });
    expect(dip).toMatchObject({ field: 'dip', count: 18, min: 20, max: 80 });
    expect(dip.mean).toBeCloseTo(901 / 18, 9);
  });

  test('clusters each station separately under station scope', async () => {
    const result = analyzeDataset(await exampleSheets(), dictionary, { ...OPTIONS, scope: 'station' });

    expect(result.families.map((f) => [f.family.id, f.memberCount, f.stationIds.join(',')])).toEqual([
      ['F1', 5, 'ST-01'],
      ['F2', 3, 'ST-02'],
      ['F3', 3, 'ST-02']
    ]);
    expect(result.overview.unclusteredCount).toBe(7);
  });
});

describe('describeDiscontinuities', () => {
  test('averages dip direction on the circle', () => {
    const [, dipDirection] = describeDiscontinuities([
      makeDiscontinuity({ dipDirection: 350 }),
      makeDiscontinuity({ dipDirection: 10 })
    ]);

    expect(dipDirection).toMatchObject({ field: 'dip_direction', count: 2, min: 10, max: 350 });
    expect(Math.min(dipDirection.mean ?? NaN, 360 - (dipDirection.mean ?? NaN))).toBeLessThan(1e-6);
  });

  test('reports empty statistics without records', () => {
    expect(describeDiscontinuities([])).toEqual([
      { field: 'distance_m', count: 0, mean: null, min: null, max: null },
      { field: 'dip_direction', count: 0, mean: null, min: null, max: null },
      { field: 'dip', count: 0, mean: null, min: null, max: null }
    ]);
  });
});

describe('analyzeDataset failure handling', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  test('a station without valid records fails alone', async () => {
    const [sheet] = await exampleSheets();
    const rows = sheet.rows.map((row) => (row.Station === 'ST-03' ? { ...row, Dip_degrees: '120' } : row));
    const result = analyzeDataset([{ ...sheet, rows }], dictionary, OPTIONS);

    expect(result.issues).toHaveLength(4);
    expect(result.stationScores.map((s) => s.unit.id)).toEqual(['ST-01', 'ST-02']);
    expect(result.failures).toHaveLength(1);
    expect(result.failures[0].unit).toEqual({ kind: 'station', id: 'ST-03' });
    expect(result.failures[0].issue.kind).toBe('EMPTY_INPUT');
    expect(result.failures[0].issue.unit).toBe('station:ST-03');
    expect(result.overview.rejectedRecords).toBe(4);
  });

  test('an unknown UCS class on one station is reported against that station', async () => {
    const result = analyzeDataset(await exampleSheets(), dictionary, {
      ...OPTIONS,
      stations: { 'ST-02': { ucsClass: 'R9' } }
    });

    expect(result.stationScores.map((s) => s.unit.id)).toEqual(['ST-01', 'ST-03']);
    expect(result.failures.map((f) => [f.issue.kind, f.issue.stationId, f.issue.field, f.issue.code])).toEqual([
      ['UNKNOWN_CODE', 'ST-02', 'ucs_class', 'R9']
    ]);
  });
});

test('runRmrPipeline logs each stage and skips export without an output directory', async () => {
  const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
  const csv = [
    'Station,Distance_m,Type,Dip_Direction_degrees,Dip_degrees,Spacing_mm,Persistence,Aperture_mm,Roughness,Infilling_Type,Weathering,Groundwater',
    'ST-1,1,J,40,60,4,2,2,2,1,2,1',
    'ST-1,2,J,42,62,4,2,2,2,1,2,1'
  ].join('\n');

  const run = await runRmrPipeline({
    input: { buffer: Buffer.from(csv), filename: 'mini.csv' },
    dictionary,
    options: OPTIONS,
    runId: 'test-run'
  });

  expect(run.exports).toBeNull();
  expect(run.result.stationScores).toHaveLength(1);
  expect(log).toHaveBeenCalledWith('[Pipeline test-run] Stage 1 (Parse/ingest): DONE — 1 sheet(s), 2 rows');
  expect(log).toHaveBeenCalledWith('[Pipeline test-run] Stage 4 (Family clustering): DONE — 0 families, 2 unclustered');
  log.mockRestore();
});

test('runRmrPipeline reports a clustering failure against the clustering stage', async () => {
  const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);

  await expect(
    runRmrPipeline({
      input: { inputPath: locateDataFile(EXAMPLE_TRAVERSE_FILE) },
      dictionary,
      options: { ...OPTIONS, toleranceDeg: 0 },
      runId: 'bad-tolerance'
    })
  ).rejects.toThrow('Cluster tolerance must be positive, got 0');

  expect(log).toHaveBeenCalledWith('[Pipeline bad-tolerance] Stage 3 (Station scoring): DONE — 3/3 stations scored');
  expect(log).toHaveBeenCalledWith(
    '[Pipeline bad-tolerance] Stage 4 (Family clustering): FAILED — Cluster tolerance must be positive, got 0'
  );
  log.mockRestore();
});
