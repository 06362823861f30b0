import { z } from 'zod';
import { DictionaryFormatError, UnknownCodeError, type ErrorContext } from './errors';

export const RATED_PARAMETERS = [
  'strength',
  'spacing',
  'persistence',
  'aperture',
  'roughness',
  'infill',
  'weathering',
  'groundwater'
] as const;

export const CODED_PARAMETERS = ['structure_type', ...RATED_PARAMETERS] as const;

export type RatedParameter = (typeof RATED_PARAMETERS)[number];
export type CodedParameter = (typeof CODED_PARAMETERS)[number];

export type CodeEntry = {
  readonly parameter: CodedParameter;
  readonly code: string;
  /** null only for structure types, which carry a label but no rating */
  readonly rating: number | null;
  readonly label: string;
};

export type CodeDictionary = {
  readonly entries: readonly CodeEntry[];
  ratingFor(parameter: RatedParameter, code: string, context?: ErrorContext): number;
  labelFor(parameter: CodedParameter, code: string, context?: ErrorContext): string;
  has(parameter: CodedParameter, code: string): boolean;
  codes(parameter: CodedParameter): string[];
};

/**
 * Field sheets mix `2`, `2.0` and ` 2 ` for the same code; all of them
 * resolve to `2`. Alphabetic codes (`J`, `R4`) are only trimmed.
 */
export function normalizeCode(value: unknown): string {
  if (value == null) return '';
  if (typeof value === 'number') {
    return Number.isFinite(value) ? String(value) : '';
  }
  const raw = String(value).trim();
  if (raw !== '' && /^[+-]?\d+(\.\d+)?$/.test(raw)) {
    return String(Number(raw));
  }
  return raw;
}

const ratingCell = z.preprocess((value) => {
  if (value == null) return null;
  if (typeof value === 'string') {
    const trimmed = value.trim();
    return trimmed === '' ? null : Number(trimmed);
  }
  return value;
}, z.number().finite().nullable());

const entrySchema = z
  .object({
    parameter: z.preprocess(
      (value) => (typeof value === 'string' ? value.trim().toLowerCase() : value),
      z.enum(CODED_PARAMETERS)
    ),
    code: z.unknown().transform(normalizeCode).pipe(z.string().min(1, 'code is empty')),
    rating: ratingCell,
    label: z.preprocess((value) => (value == null ? '' : String(value).trim()), z.string())
  })
  .refine((entry) => entry.parameter === 'structure_type' || entry.rating != null, {
    message: 'rating is required for rated parameters',
    path: ['rating']
  });

function keyOf(parameter: CodedParameter, code: string) {
  return `${parameter}:${code}`;
}

/**
 * Builds the read-only code dictionary from table rows
 * (`parameter, code, rating, label`). Rows are numbered from 1 in errors.
 */
export function createCodeDictionary(rows: readonly unknown[]): CodeDictionary {
  const byKey = new Map<string, CodeEntry>();
  const entries: CodeEntry[] = [];

  rows.forEach((row, idx) => {
    const parsed = entrySchema.safeParse(row);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new DictionaryFormatError(
        `Code dictionary row ${idx + 1}: ${issue?.path.join('.') || 'row'} ${issue?.message ?? 'is invalid'}`,
        { rowIndex: idx + 1, field: issue?.path.join('.') }
      );
    }

    const entry: CodeEntry = Object.freeze({
      parameter: parsed.data.parameter,
      code: parsed.data.code,
      rating: parsed.data.parameter === 'structure_type' ? null : parsed.data.rating,
      label: parsed.data.label
    });

    const key = keyOf(entry.parameter, entry.code);
    if (byKey.has(key)) {
      throw new DictionaryFormatError(`Code dictionary row ${idx + 1}: duplicate ${entry.parameter} code "${entry.code}"`, {
        rowIndex: idx + 1,
        field: entry.parameter,
        code: entry.code
      });
    }
    byKey.set(key, entry);
    entries.push(entry);
  });

  function lookup(parameter: CodedParameter, code: string, context?: ErrorContext): CodeEntry {
    const normalized = normalizeCode(code);
    const entry = byKey.get(keyOf(parameter, normalized));
    if (!entry) {
      throw new UnknownCodeError(parameter, normalized, context);
    }
    return entry;
  }

  const frozenEntries = Object.freeze([...entries]);

  return Object.freeze({
    entries: frozenEntries,
    ratingFor(parameter: RatedParameter, code: string, context?: ErrorContext): number {
      const { rating } = lookup(parameter, code, context);
      if (rating == null) {
        // unreachable for rated parameters; the schema refuses null ratings there
        throw new UnknownCodeError(parameter, code, context);
      }
      return rating;
    },
    labelFor(parameter: CodedParameter, code: string, context?: ErrorContext): string {
      return lookup(parameter, code, context).label;
    },
    has(parameter: CodedParameter, code: string): boolean {
      return byKey.has(keyOf(parameter, normalizeCode(code)));
    },
    codes(parameter: CodedParameter): string[] {
      return frozenEntries.filter((entry) => entry.parameter === parameter).map((entry) => entry.code);
    }
  });
}
