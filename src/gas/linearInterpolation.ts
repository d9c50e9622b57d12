export interface InterpolationPoint {
  x: number;
  y: number;
}

/**
 * Piecewise-linear `y` at `x` over `points`, which must be sorted by `x`.
 * Outside the covered range the nearest end value is returned.
 */
export function interpolate(x: number, points: readonly InterpolationPoint[]): number {
  if (points.length === 0) {
    throw new RangeError('interpolate needs at least one point');
  }
  const first = points[0];
  const last = points[points.length - 1];
  if (x <= first.x) return first.y;
  if (x >= last.x) return last.y;

  for (let i = 1; i < points.length; i++) {
    const right = points[i];
    if (x > right.x) continue;
    const left = points[i - 1];
    if (right.x === left.x) return right.y;
    return left.y + ((x - left.x) * (right.y - left.y)) / (right.x - left.x);
  }
  return last.y;
}
