import { InsufficientDataError, InvalidRangeError, type ErrorContext } from './errors';

export type RqdInput = {
  /** Directly measured RQD (%). Wins over everything else when present. */
  rqd?: number | null;
  /** Discontinuities per metre of traverse. */
  frequency?: number | null;
  count?: number | null;
  traverseLengthM?: number | null;
};

export type RqdEstimate = {
  value: number;
  source: 'supplied' | 'frequency';
  /** λ used for the estimate; null when RQD was supplied */
  frequency: number | null;
};

function clampPercent(value: number) {
  return Math.max(0, Math.min(100, value));
}

/**
 * Priest & Hudson relation between discontinuity frequency and RQD
 * (0.1 m intact-length threshold).
 */
export function rqdFromFrequency(lambda: number): number {
  const x = 0.1 * lambda;
  return clampPercent(100 * Math.exp(-x) * (x + 1));
}

export function estimateRqd(input: RqdInput, context: ErrorContext = {}): RqdEstimate {
  if (input.rqd != null) {
    if (!Number.isFinite(input.rqd)) {
      throw new InvalidRangeError('Supplied RQD is not a number', { ...context, field: 'rqd' });
    }
    return { value: clampPercent(input.rqd), source: 'supplied', frequency: null };
  }

  let lambda = input.frequency ?? null;
  if (lambda == null && input.count != null && input.traverseLengthM != null && input.traverseLengthM > 0) {
    lambda = input.count / input.traverseLengthM;
  }

  if (lambda == null) {
    throw new InsufficientDataError('RQD cannot be derived: no RQD, frequency or traverse length', {
      ...context,
      field: 'rqd'
    });
  }

  if (!Number.isFinite(lambda) || lambda < 0) {
    throw new InvalidRangeError(`Discontinuity frequency ${lambda} is out of range`, {
      ...context,
      field: 'frequency',
      value: lambda
    });
  }

  return { value: rqdFromFrequency(lambda), source: 'frequency', frequency: lambda };
}
