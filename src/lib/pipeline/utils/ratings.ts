import type { ConditionRatings, Discontinuity, PartialRatings, RmrScore, ScoredUnit } from '../types';
import { classify } from './classification';
import type { CodeDictionary, RatedParameter } from './code-dictionary';
import { EmptyInputError, InvalidRangeError, type ErrorContext } from './errors';
import { estimateRqd, type RqdInput } from './rqd';

const CONDITION_PARAMETERS = ['persistence', 'aperture', 'roughness', 'infill', 'weathering'] as const;

export function rqdRating(rqd: number): number {
  if (rqd >= 90) return 20;
  if (rqd >= 75) return 17;
  if (rqd >= 50) return 13;
  if (rqd >= 25) return 8;
  return 3;
}

export function spacingRating(spacingMm: number): number {
  if (spacingMm >= 2000) return 20;
  if (spacingMm >= 600) return 15;
  if (spacingMm >= 200) return 10;
  if (spacingMm >= 60) return 8;
  return 5;
}

/** Most frequent value; on a tie the value seen first wins. */
export function dominantValue<T>(values: readonly T[]): T | undefined {
  const counts = new Map<T, number>();
  for (const value of values) {
    counts.set(value, (counts.get(value) ?? 0) + 1);
  }

  // Map iteration follows first appearance
  let best: T | undefined;
  let bestCount = 0;
  for (const [value, count] of counts) {
    if (count > bestCount) {
      best = value;
      bestCount = count;
    }
  }
  return best;
}

function memberContext(member: Discontinuity, unit: ScoredUnit, field: RatedParameter): ErrorContext {
  return {
    unit,
    stationId: member.stationId,
    sheet: member.sheet,
    rowIndex: member.rowIndex,
    field
  };
}

/**
 * Worst (lowest) rating of one condition parameter across the members.
 * A single weak plane governs the behaviour of the whole set.
 */
export function worstRating(
  members: readonly Discontinuity[],
  parameter: (typeof CONDITION_PARAMETERS)[number],
  dictionary: CodeDictionary,
  unit: ScoredUnit
): number {
  let worst = Number.POSITIVE_INFINITY;
  for (const member of members) {
    const rating = dictionary.ratingFor(parameter, member[parameter], memberContext(member, unit, parameter));
    worst = Math.min(worst, rating);
  }
  return worst;
}

export function calculateRmr(args: {
  unit: ScoredUnit;
  members: readonly Discontinuity[];
  dictionary: CodeDictionary;
  ucsClass: string;
  rqd: RqdInput;
  orientationAdjustment: number;
}): RmrScore {
  const { unit, members, dictionary } = args;
  const unitContext: ErrorContext = unit.kind === 'station' ? { unit, stationId: unit.id } : { unit };

  if (members.length === 0) {
    throw new EmptyInputError(`No valid discontinuities for ${unit.kind} ${unit.id}`, unitContext);
  }

  if (!Number.isFinite(args.orientationAdjustment) || args.orientationAdjustment > 0) {
    throw new InvalidRangeError(`Orientation adjustment must be a penalty (<= 0), got ${args.orientationAdjustment}`, {
      ...unitContext,
      field: 'orientation_adjustment',
      value: args.orientationAdjustment
    });
  }

  const strength = dictionary.ratingFor('strength', args.ucsClass, { ...unitContext, field: 'ucs_class' });

  const rqd = estimateRqd(args.rqd, unitContext);

  let spacingSum = 0;
  for (const member of members) {
    spacingSum += dictionary.ratingFor('spacing', member.spacing, memberContext(member, unit, 'spacing'));
  }
  const spacingMm = spacingSum / members.length;

  const condition: ConditionRatings = {
    persistence: worstRating(members, 'persistence', dictionary, unit),
    aperture: worstRating(members, 'aperture', dictionary, unit),
    roughness: worstRating(members, 'roughness', dictionary, unit),
    infill: worstRating(members, 'infill', dictionary, unit),
    weathering: worstRating(members, 'weathering', dictionary, unit)
  };

  const dominantGroundwater = dominantValue(members.map((m) => m.groundwater)) ?? '';
  const groundwaterSource = members.find((m) => m.groundwater === dominantGroundwater) ?? members[0];
  const groundwater = dictionary.ratingFor(
    'groundwater',
    dominantGroundwater,
    memberContext(groundwaterSource, unit, 'groundwater')
  );

  const ratings: PartialRatings = {
    strength,
    rqd: rqdRating(rqd.value),
    spacing: spacingRating(spacingMm),
    condition: CONDITION_PARAMETERS.reduce((acc, parameter) => acc + condition[parameter], 0),
    groundwater,
    orientation: args.orientationAdjustment
  };

  const total =
    ratings.strength + ratings.rqd + ratings.spacing + ratings.condition + ratings.groundwater + ratings.orientation;

  const classification = classify(total, unitContext);

  return Object.freeze({
    unit: Object.freeze({ ...unit }),
    memberCount: members.length,
    ucsClass: args.ucsClass,
    ratings: Object.freeze(ratings),
    condition: Object.freeze(condition),
    rqd: Object.freeze(rqd),
    spacingMm,
    dominantGroundwater,
    total,
    classification: Object.freeze(classification)
  });
}
