import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, describe, expect, test } from 'vitest';
import * as XLSX from 'xlsx';
import { EXAMPLE_TRAVERSE_FILE, locateDataFile, readTableFile } from '../01-ingest';
import { buildExportTables, STATION_COLUMNS, toCsvString, writeExports } from '../06-export';
import { analyzeDataset } from '..';
import { bundledDictionary } from './fixtures/records';

async function exampleTables() {
  const sheets = await readTableFile(locateDataFile(EXAMPLE_TRAVERSE_FILE));
  const result = analyzeDataset(sheets, bundledDictionary(), {
    ucsClass: 'R4',
    orientationAdjustment: -5,
    toleranceDeg: 15,
    minFamilySize: 3,
    metric: 'independent',
    scope: 'project'
  });
  return buildExportTables(result);
}

describe('toCsvString', () => {
  test('quotes separators, quotes and newlines', () => {
    const rows = [{ a: 'x,y', b: 'say "hi"', c: null }, { a: 'line\nbreak', b: 3, c: 'plain' }];
    expect(toCsvString(rows, ['b', 'a'])).toBe('b,a,c\n"say ""hi""","x,y",\n3,"line\nbreak",plain\n');
  });

  test('writes the header alone for empty tables', () => {
    expect(toCsvString([], ['kind', 'message'])).toBe('kind,message\n');
  });
});

describe('buildExportTables', () => {
  test('flattens station scores into rows', async () => {
    const tables = await exampleTables();
    const [st01] = tables.stations;

    expect(st01).toMatchObject({
      station_id: 'ST-01',
      status: 'OK',
      discontinuity_count: 7,
      traverse_length_m: 8,
      ucs_class: 'R4',
      rqd_source: 'frequency',
      rating_strength: 12,
      rating_rqd: 20,
      rating_spacing: 10,
      rating_condition: 18,
      groundwater_code: '1',
      rating_groundwater: 15,
      rating_orientation: -5,
      rmr_total: 70,
      rock_class: 'II',
      quality: 'Good',
      classification: 'Class II – Good',
      error: null
    });
  });

  test('lists family membership and the overview', async () => {
    const tables = await exampleTables();

    expect(tables.families[1]).toMatchObject({
      family_id: 'F2',
      member_count: 6,
      mean_dip: 22.5,
      dominant_structure_type: 'B',
      stations: 'ST-01; ST-02; ST-03',
      member_ids: 'example-traverse:4; example-traverse:6; example-traverse:9; example-traverse:10; example-traverse:13; example-traverse:16',
      rmr_total: 80
    });
    expect(tables.unclustered.map((row) => row.discontinuity_id)).toEqual(['example-traverse:12', 'example-traverse:18']);
    expect(tables.issues).toEqual([]);
    expect(tables.overview).toContainEqual({ metric: 'mean_rmr', value: 66.7 });
    expect(tables.overview).toContainEqual({ metric: 'distance_m_count', value: 18 });
    expect(tables.overview).toContainEqual({ metric: 'distance_m_mean', value: 3.97 });
    expect(tables.overview).toContainEqual({ metric: 'distance_m_min', value: 0.6 });
    expect(tables.overview).toContainEqual({ metric: 'dip_mean', value: 50.06 });
    expect(tables.overview).toContainEqual({ metric: 'dip_max', value: 80 });
    expect(tables.overview).toContainEqual({ metric: 'dip_direction_min', value: 39 });
    expect(tables.overview).toHaveLength(20);
  });
});

describe('writeExports', () => {
  let outDir = '';

  afterEach(async () => {
    if (outDir) await fs.rm(outDir, { recursive: true, force: true });
  });

  test('writes the CSV files and a workbook with every table', async () => {
    outDir = await fs.mkdtemp(path.join(os.tmpdir(), 'rmr14-export-'));
    const written = await writeExports(await exampleTables(), outDir);

    const stationsCsv = await fs.readFile(written.files.stationsCsv, 'utf8');
    expect(stationsCsv.split('\n')[0]).toBe(STATION_COLUMNS.join(','));
    expect(stationsCsv.split('\n')).toHaveLength(5);

    const issuesCsv = await fs.readFile(written.files.issuesCsv, 'utf8');
    expect(issuesCsv).toBe('kind,message,unit,station_id,sheet,row_index,field,code,value\n');

    const workbook = XLSX.read(await fs.readFile(written.files.xlsx), { type: 'buffer' });
    expect(workbook.SheetNames).toEqual(['overview', 'stations', 'families', 'unclustered', 'issues']);
  });
});
