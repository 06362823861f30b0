import { InvalidRangeError, type ErrorContext } from './errors';

export type RockClass = 'I' | 'II' | 'III' | 'IV' | 'V';
export type QualityDescriptor = 'Very Good' | 'Good' | 'Fair' | 'Poor' | 'Very Poor';

export type Classification = {
  rockClass: RockClass;
  quality: QualityDescriptor;
};

// Lower bounds are inclusive; each band runs up to the next one's bound.
const BANDS: Array<{ min: number; rockClass: RockClass; quality: QualityDescriptor }> = [
  { min: 81, rockClass: 'I', quality: 'Very Good' },
  { min: 61, rockClass: 'II', quality: 'Good' },
  { min: 41, rockClass: 'III', quality: 'Fair' },
  { min: 21, rockClass: 'IV', quality: 'Poor' },
  { min: 0, rockClass: 'V', quality: 'Very Poor' }
];

export function classify(total: number, context: ErrorContext = {}): Classification {
  if (!Number.isFinite(total) || total < 0 || total > 100) {
    throw new InvalidRangeError(`RMR total ${total} is outside [0, 100]`, {
      ...context,
      field: 'total',
      value: total
    });
  }

  for (const band of BANDS) {
    if (total >= band.min) {
      return { rockClass: band.rockClass, quality: band.quality };
    }
  }

  // total >= 0 always meets the last band
  return { rockClass: 'V', quality: 'Very Poor' };
}

export function formatClassification(classification: Classification): string {
  return `Class ${classification.rockClass} – ${classification.quality}`;
}
