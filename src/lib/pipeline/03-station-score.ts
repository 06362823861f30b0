import type { RmrScore, Station, UnitFailure } from './types';
import type { CodeDictionary } from './utils/code-dictionary';
import { isRmrError, toIssue } from './utils/errors';
import { calculateRmr } from './utils/ratings';

export function scoreStation(args: {
  station: Station;
  dictionary: CodeDictionary;
  orientationAdjustment: number;
}): RmrScore {
  const { station } = args;
  return calculateRmr({
    unit: { kind: 'station', id: station.id },
    members: station.discontinuities,
    dictionary: args.dictionary,
    ucsClass: station.ucsClass,
    rqd: {
      rqd: station.rqd,
      count: station.discontinuities.length,
      traverseLengthM: station.traverseLengthM
    },
    orientationAdjustment: args.orientationAdjustment
  });
}

/**
 * Scores every station on its own. A station that cannot be scored is
 * reported as a failure; the others are unaffected.
 */
export function scoreStations(args: {
  stations: readonly Station[];
  dictionary: CodeDictionary;
  orientationAdjustment: number;
}): { scores: RmrScore[]; failures: UnitFailure[] } {
  const scores: RmrScore[] = [];
  const failures: UnitFailure[] = [];

  for (const station of args.stations) {
    try {
      scores.push(scoreStation({ station, dictionary: args.dictionary, orientationAdjustment: args.orientationAdjustment }));
    } catch (error) {
      if (!isRmrError(error)) throw error;
      const unit = { kind: 'station' as const, id: station.id };
      failures.push({ unit, issue: toIssue(error.withContext({ unit, stationId: station.id })) });
    }
  }

  return { scores, failures };
}
