export type ErrorKind =
  | 'UNKNOWN_CODE'
  | 'INSUFFICIENT_DATA'
  | 'INVALID_RANGE'
  | 'EMPTY_INPUT'
  | 'DICTIONARY_FORMAT';

/** Where a failure happened, as far as the raising code knows. */
export type ErrorContext = {
  stationId?: string;
  sheet?: string;
  rowIndex?: number;
  field?: string;
  code?: string;
  value?: number;
  unit?: { kind: 'station' | 'family'; id: string };
};

export abstract class RmrError extends Error {
  abstract readonly kind: ErrorKind;
  context: ErrorContext;

  constructor(message: string, context: ErrorContext = {}) {
    super(message);
    this.name = new.target.name;
    this.context = context;
  }

  /** Fills in context the raising code did not know; keys already set win. */
  withContext(extra: ErrorContext): this {
    this.context = { ...extra, ...this.context };
    return this;
  }
}

export class UnknownCodeError extends RmrError {
  readonly kind = 'UNKNOWN_CODE';
  readonly parameter: string;

  constructor(parameter: string, code: string, context: ErrorContext = {}) {
    super(`Unknown ${parameter} code "${code}"`, { ...context, field: context.field ?? parameter, code });
    this.parameter = parameter;
  }
}

export class InsufficientDataError extends RmrError {
  readonly kind = 'INSUFFICIENT_DATA';
}

export class InvalidRangeError extends RmrError {
  readonly kind = 'INVALID_RANGE';
}

export class EmptyInputError extends RmrError {
  readonly kind = 'EMPTY_INPUT';
}

export class DictionaryFormatError extends RmrError {
  readonly kind = 'DICTIONARY_FORMAT';
}

/** Flat, export-ready view of an error. */
export type RecordIssue = {
  kind: ErrorKind;
  message: string;
  stationId: string | null;
  sheet: string | null;
  rowIndex: number | null;
  field: string | null;
  code: string | null;
  value: number | null;
  unit: string | null;
};

export function toIssue(error: RmrError): RecordIssue {
  const ctx = error.context;
  return {
    kind: error.kind,
    message: error.message,
    stationId: ctx.stationId ?? null,
    sheet: ctx.sheet ?? null,
    rowIndex: ctx.rowIndex ?? null,
    field: ctx.field ?? null,
    code: ctx.code ?? null,
    value: ctx.value ?? null,
    unit: ctx.unit ? `${ctx.unit.kind}:${ctx.unit.id}` : null
  };
}

export function isRmrError(error: unknown): error is RmrError {
  return error instanceof RmrError;
}
