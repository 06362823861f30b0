/**
 * Orientation Clustering
 *
 * ───────────────────────────────────────────────────────────────────
 * Purpose:
 *
 *   Groups discontinuity orientations into structural sets ("families").
 *   Field practice reads families off a stereonet; this module does the
 *   same thing greedily so the result can be reproduced run after run.
 *
 * ───────────────────────────────────────────────────────────────────
 * Algorithm:
 *
 *   1. Walk orientations in input order. Each one joins the first
 *      cluster (in creation order) whose CURRENT mean it is joinable
 *      to; the mean is recomputed right after the admission. If no
 *      cluster accepts it, it seeds a new one.
 *   2. Refinement passes: a cluster whose mean drifted may now hold
 *      members outside the tolerance. Those are evicted farthest-first
 *      and re-placed first-fit in input order. Members of clusters still
 *      below `minMembers` are offered, in input order, to every other
 *      cluster's current mean and move to the first that accepts them.
 *      Passes stop when nothing moves, or after `maxPasses`.
 *   3. A last eviction pass makes every member lie within tolerance of
 *      its cluster mean. Each evicted orientation joins the first
 *      cluster it can enter without pushing any member out of tolerance,
 *      else it seeds its own.
 *   4. Clusters smaller than `minMembers` are dissolved; their members
 *      are reported as unclustered.
 *
 *   Joinability:
 *     - independent: circular dip-direction distance ≤ τ AND |Δdip| ≤ τ
 *     - angular:     acute angle between plane normals ≤ τ
 *
 *   Dip-direction means are unit-vector means (see ./orientation).
 *
 * ───────────────────────────────────────────────────────────────────
 */

import { InvalidRangeError } from './errors';
import {
  angleBetweenPlanes,
  circularDistance,
  meanOrientation,
  type Orientation
} from './orientation';

export type ClusterMetric = 'independent' | 'angular';

export type ClusterOptions = {
  toleranceDeg: number;
  minMembers: number;
  metric?: ClusterMetric;
  /** Upper bound on refinement passes (default 25) */
  maxPasses?: number;
};

export type OrientationCluster = {
  /** Indices into the input, ascending */
  members: number[];
  mean: Orientation & { resultantLength: number };
};

export type ClusteringResult = {
  clusters: OrientationCluster[];
  /** Indices into the input, ascending */
  unclustered: number[];
  passes: number;
};

type WorkingCluster = {
  members: number[];
  mean: Orientation & { resultantLength: number };
};

// Means are floating point; a member sitting exactly on τ must not flicker.
const EPS = 1e-9;

export function orientationDeviation(o: Orientation, mean: Orientation, metric: ClusterMetric): number {
  if (metric === 'angular') {
    return angleBetweenPlanes(o, mean);
  }
  return Math.max(circularDistance(o.dipDirection, mean.dipDirection), Math.abs(o.dip - mean.dip));
}

export function isJoinable(o: Orientation, mean: Orientation, toleranceDeg: number, metric: ClusterMetric): boolean {
  return orientationDeviation(o, mean, metric) <= toleranceDeg + EPS;
}

export function clusterOrientations(orientations: readonly Orientation[], options: ClusterOptions): ClusteringResult {
  const metric = options.metric ?? 'independent';
  const tolerance = options.toleranceDeg;
  const maxPasses = options.maxPasses ?? 25;

  if (!(tolerance > 0)) {
    throw new InvalidRangeError(`Cluster tolerance must be positive, got ${tolerance}`, {
      field: 'toleranceDeg',
      value: tolerance
    });
  }
  if (!Number.isInteger(options.minMembers) || options.minMembers < 1) {
    throw new InvalidRangeError(`Minimum family size must be a positive integer, got ${options.minMembers}`, {
      field: 'minMembers',
      value: options.minMembers
    });
  }

  const clusters: WorkingCluster[] = [];

  const recompute = (cluster: WorkingCluster) => {
    cluster.members.sort((a, b) => a - b);
    cluster.mean = meanOrientation(cluster.members.map((idx) => orientations[idx]));
  };

  const seed = (idx: number) => {
    const { dipDirection, dip } = orientations[idx];
    clusters.push({ members: [idx], mean: { dipDirection, dip, resultantLength: 1 } });
  };

  const place = (idx: number) => {
    const o = orientations[idx];
    for (const cluster of clusters) {
      if (cluster.members.length === 0) continue;
      if (isJoinable(o, cluster.mean, tolerance, metric)) {
        cluster.members.push(idx);
        recompute(cluster);
        return;
      }
    }
    seed(idx);
  };

  const evictStrays = (cluster: WorkingCluster): number[] => {
    const evicted: number[] = [];
    for (;;) {
      let worst = -1;
      let worstDeviation = -Infinity;
      for (const idx of cluster.members) {
        const deviation = orientationDeviation(orientations[idx], cluster.mean, metric);
        if (deviation > tolerance + EPS && deviation >= worstDeviation) {
          // members are ascending, so ">=" leaves the later input on ties
          worst = idx;
          worstDeviation = deviation;
        }
      }
      if (worst < 0) return evicted;
      cluster.members = cluster.members.filter((idx) => idx !== worst);
      evicted.push(worst);
      recompute(cluster);
    }
  };

  // Members of under-sized clusters move to the first other cluster that accepts them.
  const absorbSmallClusters = (): boolean => {
    let moved = false;
    for (let idx = 0; idx < orientations.length; idx += 1) {
      const donor = clusters.find((cluster) => cluster.members.includes(idx));
      if (!donor || donor.members.length >= options.minMembers) continue;

      const target = clusters.find(
        (cluster) =>
          cluster !== donor && cluster.members.length > 0 && isJoinable(orientations[idx], cluster.mean, tolerance, metric)
      );
      if (!target) continue;

      donor.members = donor.members.filter((member) => member !== idx);
      if (donor.members.length > 0) recompute(donor);
      target.members.push(idx);
      recompute(target);
      moved = true;
    }
    return moved;
  };

  const admitsCleanly = (cluster: WorkingCluster, idx: number): boolean => {
    const members = [...cluster.members, idx];
    const mean = meanOrientation(members.map((member) => orientations[member]));
    return members.every((member) => isJoinable(orientations[member], mean, tolerance, metric));
  };

  for (let idx = 0; idx < orientations.length; idx += 1) {
    place(idx);
  }

  let passes = 0;
  while (passes < maxPasses) {
    passes += 1;
    const pending: number[] = [];
    for (const cluster of clusters) {
      pending.push(...evictStrays(cluster));
    }
    pending.sort((a, b) => a - b).forEach(place);
    const absorbed = absorbSmallClusters();
    if (pending.length === 0 && !absorbed) break;
  }

  // Guarantee the tolerance invariant even if refinement did not settle.
  const leftovers: number[] = [];
  for (const cluster of clusters) {
    leftovers.push(...evictStrays(cluster));
  }
  for (const idx of leftovers.sort((a, b) => a - b)) {
    const target = clusters.find(
      (cluster) =>
        cluster.members.length > 0 &&
        isJoinable(orientations[idx], cluster.mean, tolerance, metric) &&
        admitsCleanly(cluster, idx)
    );
    if (target) {
      target.members.push(idx);
      recompute(target);
    } else {
      seed(idx);
    }
  }

  const kept: OrientationCluster[] = [];
  const unclustered: number[] = [];
  for (const cluster of clusters) {
    if (cluster.members.length === 0) continue;
    if (cluster.members.length >= options.minMembers) {
      kept.push({ members: [...cluster.members], mean: { ...cluster.mean } });
    } else {
      unclustered.push(...cluster.members);
    }
  }

  return { clusters: kept, unclustered: unclustered.sort((a, b) => a - b), passes };
}
