// Tendon Stiffness Analyzer - Descriptive statistics shared by the detectors

import type { Point } from "./types.js";

export function euclidean(a: Point, b: Point): number {
  return Math.hypot(b.x - a.x, b.y - a.y);
}

/** Arithmetic mean; 0 for an empty series. */
export function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  let sum = 0;
  for (const v of values) sum += v;
  return sum / values.length;
}

/** Population standard deviation (divides by n); 0 for an empty series. */
export function standardDeviation(values: readonly number[]): number {
  if (values.length === 0) return 0;
  const m = mean(values);
  let sumSq = 0;
  for (const v of values) sumSq += (v - m) ** 2;
  return Math.sqrt(sumSq / values.length);
}

/**
 * Quantile with linear interpolation between closest ranks
 * (position = (n - 1) · q over the sorted values).
 */
export function quantile(values: readonly number[], q: number): number {
  if (values.length === 0) return 0;
  const sorted = [...values].sort((a, b) => a - b);
  const pos = (sorted.length - 1) * q;
  const base = Math.floor(pos);
  const rest = pos - base;
  if (base + 1 < sorted.length) {
    return sorted[base] + rest * (sorted[base + 1] - sorted[base]);
  }
  return sorted[base];
}

/**
 * Slice of `values` covering [index - radius, index + radius], clamped to the
 * series bounds.
 */
export function centeredWindow<T>(values: readonly T[], index: number, radius: number): T[] {
  const start = Math.max(0, index - radius);
  const end = Math.min(values.length - 1, index + radius);
  return values.slice(start, end + 1);
}
