import fs from 'node:fs';
import fsp from 'node:fs/promises';
import path from 'node:path';
import * as XLSX from 'xlsx';
import Papa from 'papaparse';
import { z } from 'zod';
import type { ParsedSheet, StationOverride } from './types';
import { createCodeDictionary, normalizeCode, type CodeDictionary } from './utils/code-dictionary';
import { InvalidRangeError } from './utils/errors';

export const DEFAULT_DICTIONARY_FILE = 'code-dictionary.csv';
export const EXAMPLE_TRAVERSE_FILE = 'example-traverse.csv';

export function parseDatasetFile(fileBuffer: Buffer, filename: string): ParsedSheet[] {
  const lower = filename.toLowerCase();
  const baseLabel = path.basename(filename, path.extname(filename));

  if (lower.endsWith('.csv')) {
    const parsed = Papa.parse<Record<string, unknown>>(fileBuffer.toString('utf-8').replace(/^\uFEFF/, ''), {
      header: true,
      skipEmptyLines: 'greedy',
      dynamicTyping: false,
      transformHeader: (header) => header.trim()
    });

    for (const error of parsed.errors) {
      console.warn(`[ingest] ${filename}: row ${error.row == null ? '?' : error.row + 1}: ${error.message}`);
    }

    return [
      {
        label: baseLabel,
        headers: parsed.meta.fields ?? Object.keys(parsed.data[0] ?? {}),
        rows: parsed.data
      }
    ];
  }

  // Do NOT use cellDates: field sheets carry no dates, and raw numbers keep
  // codes such as "2" from being reformatted.
  const workbook = XLSX.read(fileBuffer, {
    type: 'buffer',
    cellDates: false,
    raw: true
  });

  return workbook.SheetNames.map((sheetName) => {
    const sheet = workbook.Sheets[sheetName];
    const headerRows = XLSX.utils.sheet_to_json<unknown[]>(sheet, { header: 1, raw: true });
    const headers = (headerRows[0] ?? []).map((value) => String(value ?? '').trim());
    const rows = XLSX.utils.sheet_to_json<Record<string, unknown>>(sheet, {
      raw: true,
      defval: null
    });

    return { label: sheetName, headers, rows };
  }).filter((sheet) => sheet.headers.length > 0);
}

export async function readTableFile(filePath: string): Promise<ParsedSheet[]> {
  const buffer = await fsp.readFile(filePath);
  return parseDatasetFile(buffer, filePath);
}

/**
 * Finds a file shipped under the package's `data/` directory, from either
 * the sources or the compiled output.
 */
export function locateDataFile(name: string): string {
  let dir = __dirname;
  for (let depth = 0; depth < 6; depth += 1) {
    const candidate = path.join(dir, 'data', name);
    if (fs.existsSync(candidate)) return candidate;
    const parent = path.dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }

  const fromCwd = path.resolve('data', name);
  if (fs.existsSync(fromCwd)) return fromCwd;

  throw new Error(`Bundled data file ${name} not found`);
}

export async function loadCodeDictionary(filePath?: string): Promise<CodeDictionary> {
  const sheets = await readTableFile(filePath ?? locateDataFile(DEFAULT_DICTIONARY_FILE));
  return createCodeDictionary(sheets.flatMap((sheet) => sheet.rows));
}

const blankToUndefined = (value: unknown) =>
  value == null || (typeof value === 'string' && value.trim() === '') ? undefined : value;

const stationRowSchema = z.object({
  station: z.unknown().transform(normalizeCode).pipe(z.string().min(1, 'station is empty')),
  ucs_class: z.preprocess(blankToUndefined, z.string().trim().toUpperCase().optional()),
  // RQD is clamped to [0, 100] when the station is scored
  rqd: z.preprocess(blankToUndefined, z.coerce.number().finite().optional()),
  traverse_length_m: z.preprocess(blankToUndefined, z.coerce.number().finite().positive().optional())
});

/** Per-station overrides from a `station, ucs_class, rqd, traverse_length_m` table. */
export function parseStationTable(rows: readonly Record<string, unknown>[]): Record<string, StationOverride> {
  const overrides: Record<string, StationOverride> = {};

  rows.forEach((row, idx) => {
    const parsed = stationRowSchema.safeParse(row);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const field = issue?.path.join('.') ?? '';
      throw new InvalidRangeError(`Station table row ${idx + 1}: ${field} ${issue?.message ?? 'is invalid'}`, {
        rowIndex: idx + 1,
        ...(field ? { field } : {})
      });
    }

    const { station, ucs_class, rqd, traverse_length_m } = parsed.data;
    overrides[station] = {
      ...(ucs_class ? { ucsClass: ucs_class } : {}),
      ...(rqd != null ? { rqd } : {}),
      ...(traverse_length_m != null ? { traverseLengthM: traverse_length_m } : {})
    };
  });

  return overrides;
}

export async function loadStationTable(filePath: string): Promise<Record<string, StationOverride>> {
  const sheets = await readTableFile(filePath);
  return parseStationTable(sheets.flatMap((sheet) => sheet.rows));
}
