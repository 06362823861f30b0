/**
 * Orientation geometry for planar discontinuities.
 *
 * Dip direction is an azimuth and wraps at 360°; dip is a plain linear
 * quantity in [0, 90]. Averaging or comparing dip directions goes through
 * the helpers here.
 */

export type Orientation = {
  dipDirection: number;
  dip: number;
};

const DEG = Math.PI / 180;

export function normalizeAzimuth(value: number): number {
  const wrapped = value % 360;
  const positive = wrapped < 0 ? wrapped + 360 : wrapped;
  // -0 and 360 - ε rounding both land on 0
  return positive === 360 || Object.is(positive, -0) ? 0 : positive;
}

export function circularDistance(a: number, b: number): number {
  const diff = Math.abs(normalizeAzimuth(a) - normalizeAzimuth(b));
  return Math.min(diff, 360 - diff);
}

export type CircularMean = {
  /** Mean azimuth in [0, 360) */
  mean: number;
  /** Mean resultant length in [0, 1]; 1 means all directions agree */
  resultantLength: number;
};

/**
 * Unit-vector mean of azimuths. When the resultant vanishes (e.g. 0° and
 * 180°) there is no mean direction, so the first azimuth is returned.
 */
export function circularMean(directions: readonly number[]): CircularMean {
  if (directions.length === 0) {
    return { mean: 0, resultantLength: 0 };
  }

  let sumSin = 0;
  let sumCos = 0;
  for (const direction of directions) {
    sumSin += Math.sin(direction * DEG);
    sumCos += Math.cos(direction * DEG);
  }

  const resultantLength = Math.hypot(sumSin, sumCos) / directions.length;
  if (resultantLength < 1e-9) {
    return { mean: normalizeAzimuth(directions[0]), resultantLength: 0 };
  }

  return {
    mean: normalizeAzimuth(Math.atan2(sumSin, sumCos) / DEG),
    resultantLength: Math.min(1, resultantLength)
  };
}

export function meanOrientation(orientations: readonly Orientation[]): Orientation & { resultantLength: number } {
  const { mean, resultantLength } = circularMean(orientations.map((o) => o.dipDirection));
  const dip = orientations.length > 0 ? orientations.reduce((acc, o) => acc + o.dip, 0) / orientations.length : 0;
  return { dipDirection: mean, dip, resultantLength };
}

function planeNormal(o: Orientation): [number, number, number] {
  const dd = o.dipDirection * DEG;
  const dip = o.dip * DEG;
  return [Math.sin(dip) * Math.sin(dd), Math.sin(dip) * Math.cos(dd), Math.cos(dip)];
}

/**
 * Acute angle between two planes (angle between their normals, treated as
 * axes), in degrees within [0, 90].
 */
export function angleBetweenPlanes(a: Orientation, b: Orientation): number {
  const [ax, ay, az] = planeNormal(a);
  const [bx, by, bz] = planeNormal(b);
  const dot = Math.abs(ax * bx + ay * by + az * bz);
  return Math.acos(Math.min(1, dot)) / DEG;
}
