/**
 * Polyline helpers: index-parameterised resampling, arclength tables and
 * distance lookups along a resampled curve.
 */

import { InsufficientDataError } from '../errors/replay-errors';
import type { Point, ResampledCurve } from '../models/track-data.model';

/** Boundary curves (drawn every frame). */
export const BOUNDARY_RESOLUTION = 2000;

/** Reference centerline used for distance lookups. */
export const REFERENCE_RESOLUTION = 4000;

/**
 * Resample to exactly `count` points, linear in a parameter `t ∈ [0, 1]`
 * assigned by source index (not arclength). The first and last source points
 * are reproduced exactly.
 */
export function resample(points: readonly Point[], count: number): Point[] {
  if (points.length < 2) {
    throw new InsufficientDataError(points.length);
  }

  const n = points.length;
  const m = Math.max(2, Math.floor(count));
  const out: Point[] = new Array(m);

  for (let j = 0; j < m; j++) {
    const pos = (j * (n - 1)) / (m - 1);
    const i0 = Math.floor(pos);

    if (i0 >= n - 1) {
      const last = points[n - 1];
      out[j] = { x: last.x, y: last.y };
      continue;
    }

    const frac = pos - i0;
    const a = points[i0];
    const b = points[i0 + 1];
    out[j] = {
      x: a.x + (b.x - a.x) * frac,
      y: a.y + (b.y - a.y) * frac,
    };
  }

  return out;
}

/** Running Euclidean arclength from the first point. Element 0 = 0. */
export function cumulativeDistance(points: readonly Point[]): {
  distances: number[];
  total: number;
} {
  if (!points.length) return { distances: [], total: 0 };

  const d = new Float64Array(points.length);
  for (let i = 1; i < points.length; i++) {
    const a = points[i - 1];
    const b = points[i];
    d[i] = d[i - 1] + Math.hypot(b.x - a.x, b.y - a.y);
  }

  return { distances: Array.from(d), total: d[d.length - 1] };
}

export function buildResampledCurve(
  points: readonly Point[],
  count: number = REFERENCE_RESOLUTION,
): ResampledCurve {
  const resampled = resample(points, count);
  const { distances, total } = cumulativeDistance(resampled);

  return { points: resampled, distances, totalLength: total };
}

/** Point at an arclength along the curve; the distance is clamped to the curve. */
export function pointAtDistance(curve: ResampledCurve, distance: number): Point {
  const { points, distances, totalLength } = curve;
  const target = Math.max(0, Math.min(totalLength, distance));

  // Binary search for the segment containing the target distance
  let lo = 0;
  let hi = distances.length - 1;
  while (lo < hi - 1) {
    const mid = (lo + hi) >> 1;
    if (distances[mid] <= target) lo = mid;
    else hi = mid;
  }

  const segLen = distances[hi] - distances[lo];
  const frac = segLen > 0 ? (target - distances[lo]) / segLen : 0;

  return {
    x: points[lo].x + frac * (points[hi].x - points[lo].x),
    y: points[lo].y + frac * (points[hi].y - points[lo].y),
  };
}

/** Arclength of the curve sample nearest to `point`. */
export function distanceAlong(curve: ResampledCurve, point: Point): number {
  let best = 0;
  let bestSq = Infinity;

  for (let i = 0; i < curve.points.length; i++) {
    const dx = curve.points[i].x - point.x;
    const dy = curve.points[i].y - point.y;
    const sq = dx * dx + dy * dy;
    if (sq < bestSq) {
      bestSq = sq;
      best = i;
    }
  }

  return curve.distances[best] ?? 0;
}

/**
 * Map a sample index between two resolutions of the same curve
 * (raw lap → resampled), clamped to the target range.
 */
export function mapIndexToResolution(
  index: number,
  sourceLength: number,
  targetLength: number,
): number {
  if (sourceLength <= 0 || targetLength <= 0) return 0;

  const mapped = Math.floor((index / sourceLength) * targetLength);
  return Math.max(0, Math.min(mapped, targetLength - 1));
}

export function toPoints(xs: readonly number[], ys: readonly number[]): Point[] {
  const n = Math.min(xs.length, ys.length);
  const out: Point[] = new Array(n);
  for (let i = 0; i < n; i++) {
    out[i] = { x: xs[i], y: ys[i] };
  }
  return out;
}
