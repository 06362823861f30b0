import type { Family, FamilySummary, RmrScore, Station, UnitFailure } from './types';
import type { CodeDictionary } from './utils/code-dictionary';
import { orientationDeviation } from './utils/clustering';
import { isRmrError, toIssue } from './utils/errors';
import { calculateRmr, dominantValue } from './utils/ratings';

type FamilyScoreArgs = {
  stationsById: Map<string, Station>;
  dictionary: CodeDictionary;
  ucsClass: string;
  orientationAdjustment: number;
};

/**
 * Family RQD comes from frequency: members over the combined traverse
 * length of every station that contributed a member. A directly measured
 * station RQD describes the whole station, not one set, so it is not used.
 */
function familyTraverseLength(family: Family, stationsById: Map<string, Station>): number | null {
  let total = 0;
  for (const stationId of new Set(family.members.map((m) => m.stationId))) {
    const length = stationsById.get(stationId)?.traverseLengthM;
    if (length == null) return null;
    total += length;
  }
  return total > 0 ? total : null;
}

export function familyStatistics(family: Family): Omit<FamilySummary, 'score'> {
  const mean = { dipDirection: family.meanDipDirection, dip: family.meanDip };
  return {
    family,
    memberCount: family.members.length,
    dominantStructureType: dominantValue(family.members.map((m) => m.structureType)) ?? '',
    stationIds: Object.freeze([...new Set(family.members.map((m) => m.stationId))]),
    maxDeviationDeg: family.members.reduce((acc, m) => Math.max(acc, orientationDeviation(m, mean, family.metric)), 0)
  };
}

export function scoreFamily(family: Family, args: FamilyScoreArgs): RmrScore {
  return calculateRmr({
    unit: { kind: 'family', id: family.id },
    members: family.members,
    dictionary: args.dictionary,
    ucsClass: args.ucsClass,
    rqd: {
      count: family.members.length,
      traverseLengthM: familyTraverseLength(family, args.stationsById)
    },
    orientationAdjustment: args.orientationAdjustment
  });
}

/**
 * Summaries for every family. A family whose score cannot be computed keeps
 * its orientation statistics with `score: null` and is listed in `failures`.
 */
export function summarizeFamilies(args: {
  families: readonly Family[];
  stations: readonly Station[];
  dictionary: CodeDictionary;
  ucsClass: string;
  orientationAdjustment: number;
}): { summaries: FamilySummary[]; failures: UnitFailure[] } {
  const scoreArgs: FamilyScoreArgs = {
    stationsById: new Map(args.stations.map((s) => [s.id, s])),
    dictionary: args.dictionary,
    ucsClass: args.ucsClass,
    orientationAdjustment: args.orientationAdjustment
  };
  const summaries: FamilySummary[] = [];
  const failures: UnitFailure[] = [];

  for (const family of args.families) {
    let score: RmrScore | null = null;
    try {
      score = scoreFamily(family, scoreArgs);
    } catch (error) {
      if (!isRmrError(error)) throw error;
      const unit = { kind: 'family' as const, id: family.id };
      failures.push({ unit, issue: toIssue(error.withContext({ unit })) });
    }
    summaries.push(Object.freeze({ ...familyStatistics(family), score }));
  }

  return { summaries, failures };
}
