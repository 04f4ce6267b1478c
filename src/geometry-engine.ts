// Tendon Stiffness Analyzer - Geometry Engine
//
// Tendon length on a single frame: a Catmull–Rom spline through the two
// insertion points and up to two user-placed points, measured as the length
// of the sampled polyline.

import { InsufficientPointsError, MalformedInputError } from "./errors.js";
import { euclidean } from "./stats.js";
import type { Point } from "./types.js";

export const DEFAULT_SEGMENTS_PER_SPAN = 30;
export const MAX_EXTRA_POINTS = 2;

/** Left to right; ties broken on y so the order never depends on input order. */
export function sortByX(points: readonly Point[]): Point[] {
  return [...points].sort((a, b) => a.x - b.x || a.y - b.y);
}

function catmullRom(p0: number, p1: number, p2: number, p3: number, t: number): number {
  const tt = t * t;
  const ttt = tt * t;
  return (
    0.5 *
    (2 * p1 +
      (-p0 + p2) * t +
      (2 * p0 - 5 * p1 + 4 * p2 - p3) * tt +
      (-p0 + 3 * p1 - 3 * p2 + p3) * ttt)
  );
}

/**
 * Uniform Catmull–Rom interpolation through `points` in the given order.
 * The first and last spans reuse the end point as their outer control point,
 * so the curve stops at the anchors instead of overshooting.
 *
 * Each span contributes `segmentsPerSpan` steps; joints are emitted once.
 */
export function catmullRomSpline(points: readonly Point[], segmentsPerSpan = DEFAULT_SEGMENTS_PER_SPAN): Point[] {
  if (points.length < 2) return points.map((p) => ({ x: p.x, y: p.y }));
  const steps = Math.max(1, Math.floor(segmentsPerSpan));
  const last = points.length - 1;
  const curve: Point[] = [];

  for (let i = 0; i < last; i++) {
    const p0 = points[Math.max(i - 1, 0)];
    const p1 = points[i];
    const p2 = points[i + 1];
    const p3 = points[Math.min(i + 2, last)];

    for (let s = i === 0 ? 0 : 1; s <= steps; s++) {
      const t = s / steps;
      curve.push({
        x: catmullRom(p0.x, p1.x, p2.x, p3.x, t),
        y: catmullRom(p0.y, p1.y, p2.y, p3.y, t),
      });
    }
  }

  return curve;
}

/** Sum of distances between consecutive points. */
export function polylineLength(points: readonly Point[]): number {
  let length = 0;
  for (let i = 1; i < points.length; i++) {
    length += euclidean(points[i - 1], points[i]);
  }
  return length;
}

export interface TendonPoints {
  distal: Point;
  proximal: Point;
  extraPoints?: readonly Point[];
}

export interface CurveMeasurement {
  lengthPx: number;
  /** Control points after filtering and sorting. */
  controlPoints: Point[];
  curve: Point[];
}

function isValidPoint(p: Point): boolean {
  return Number.isFinite(p.x) && Number.isFinite(p.y);
}

/**
 * Arc length, in pixels, of the spline through the anchors and extra points.
 * @throws MalformedInputError when more than two extra points are given
 * @throws InsufficientPointsError when fewer than two finite points remain
 */
export function measureCurveLength(
  input: TendonPoints,
  segmentsPerSpan = DEFAULT_SEGMENTS_PER_SPAN,
): CurveMeasurement {
  const extras = input.extraPoints ?? [];
  if (extras.length > MAX_EXTRA_POINTS) {
    throw new MalformedInputError(`At most ${MAX_EXTRA_POINTS} extra points are supported, got ${extras.length}`);
  }

  const valid = [input.distal, input.proximal, ...extras].filter(isValidPoint);
  if (valid.length < 2) {
    throw new InsufficientPointsError(`At least 2 valid points are needed to measure a length, got ${valid.length}`);
  }

  const controlPoints = sortByX(valid);
  const curve = catmullRomSpline(controlPoints, segmentsPerSpan);
  return { lengthPx: polylineLength(curve), controlPoints, curve };
}
