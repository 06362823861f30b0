import type { AnalysisOptions, Discontinuity, Family } from './types';
import { clusterOrientations } from './utils/clustering';

export type FamilyFormation = {
  families: Family[];
  unclustered: Discontinuity[];
};

function groupForScope(discontinuities: readonly Discontinuity[], scope: AnalysisOptions['scope']): Discontinuity[][] {
  if (scope === 'project') {
    return [[...discontinuities]];
  }

  const byStation = new Map<string, Discontinuity[]>();
  for (const d of discontinuities) {
    const list = byStation.get(d.stationId) ?? [];
    list.push(d);
    byStation.set(d.stationId, list);
  }
  return [...byStation.values()];
}

/**
 * Clusters discontinuities by orientation. Family ids run F1, F2, … in the
 * order families were seeded; unclustered records keep input order.
 */
export function formFamilies(args: {
  discontinuities: readonly Discontinuity[];
  options: Pick<AnalysisOptions, 'toleranceDeg' | 'minFamilySize' | 'metric' | 'scope'>;
}): FamilyFormation {
  const { options } = args;
  const families: Family[] = [];
  const unclusteredIds = new Set<string>();

  for (const group of groupForScope(args.discontinuities, options.scope)) {
    const result = clusterOrientations(group, {
      toleranceDeg: options.toleranceDeg,
      minMembers: options.minFamilySize,
      metric: options.metric
    });

    for (const cluster of result.clusters) {
      families.push(
        Object.freeze({
          id: `F${families.length + 1}`,
          members: Object.freeze(cluster.members.map((idx) => group[idx])),
          meanDipDirection: cluster.mean.dipDirection,
          meanDip: cluster.mean.dip,
          resultantLength: cluster.mean.resultantLength,
          toleranceDeg: options.toleranceDeg,
          metric: options.metric
        })
      );
    }

    for (const idx of result.unclustered) {
      unclusteredIds.add(group[idx].id);
    }
  }

  return {
    families,
    unclustered: args.discontinuities.filter((d) => unclusteredIds.has(d.id))
  };
}
