// Tendon Stiffness Analyzer - Anomaly Detector
//
// Flags frames of an already-smoothed trajectory that are still suspect, so a
// reviewer only has to look at a handful. Four independent criteria, each with
// a threshold derived from the trajectory itself:
//
//   velocity      step length          > mean + k·std
//   acceleration  |Δ step length|      > mean + k·std
//   jitter        local std of steps   > 1.5 · std(step length)
//   trend         distance to the SMA  > Q3 + 1.5·IQR
//
// Frame 0 has no step, so it is never flagged.

import { centeredWindow, euclidean, mean, quantile, standardDeviation } from "./stats.js";
import type {
  AnomalyCriterion,
  AnomalyFlag,
  AnomalyReport,
  AnomalyThresholds,
  SiteAnomalyReport,
  SiteRecord,
  Trajectory,
  TrajectoryPoint,
} from "./types.js";
import { Site } from "./types.js";

// ─── Options ────────────────────────────────────────────────────────────────────

export interface AnomalyOptions {
  /** k in mean + k·std for the velocity and acceleration thresholds. */
  sensitivity: number;
  /** Radius of the local-jitter window, in steps. */
  jitterRadius: number;
  /** Radius of the moving-average trend window, in frames. */
  trendRadius: number;
  jitterFactor: number;
  fenceFactor: number;
}

export const DEFAULT_ANOMALY_OPTIONS: Readonly<AnomalyOptions> = {
  sensitivity: 3,
  jitterRadius: 5,
  trendRadius: 10,
  jitterFactor: 1.5,
  fenceFactor: 1.5,
};

/**
 * Absolute slack on every comparison, and the spread below which a series is
 * treated as constant. Without it a constant trajectory has zero thresholds
 * and rounding residue in the moving average would flag every frame.
 */
export const ZERO_VARIANCE_TOLERANCE = 1e-9;

// ─── Series helpers ─────────────────────────────────────────────────────────────

/** velocity[j] is the step from frame j to frame j + 1. */
export function stepLengths(points: readonly TrajectoryPoint[]): number[] {
  const steps: number[] = [];
  for (let j = 1; j < points.length; j++) {
    steps.push(euclidean(points[j - 1], points[j]));
  }
  return steps;
}

/** acceleration[j] = |velocity[j + 1] - velocity[j]|, ending at frame j + 2. */
export function stepChanges(steps: readonly number[]): number[] {
  const changes: number[] = [];
  for (let j = 1; j < steps.length; j++) {
    changes.push(Math.abs(steps[j] - steps[j - 1]));
  }
  return changes;
}

/** Distance from each position to the moving average of its ±radius window. */
export function trendDeviations(points: readonly TrajectoryPoint[], radius: number): number[] {
  return points.map((p, i) => {
    const window = centeredWindow(points, i, radius);
    const trend = { x: mean(window.map((w) => w.x)), y: mean(window.map((w) => w.y)) };
    return euclidean(p, trend);
  });
}

// ─── Detection ──────────────────────────────────────────────────────────────────

function emptyReport(site: Site): SiteAnomalyReport {
  return { site, frames: [], flags: [], thresholds: null };
}

/**
 * Scans one site's trajectory and returns the frames that exceed any of the
 * four thresholds, with the criteria that fired for each.
 */
export function detectAnomalies(
  trajectory: Trajectory,
  options: Partial<AnomalyOptions> = {},
): SiteAnomalyReport {
  const opts = { ...DEFAULT_ANOMALY_OPTIONS, ...options };
  const { points, site } = trajectory;
  if (points.length < 2) {
    return emptyReport(site);
  }

  const velocity = stepLengths(points);
  const acceleration = stepChanges(velocity);
  const deviation = trendDeviations(points, opts.trendRadius);

  const velocityStd = standardDeviation(velocity);
  const accelerationStd = standardDeviation(acceleration);
  const q1 = quantile(deviation, 0.25);
  const q3 = quantile(deviation, 0.75);

  const thresholds: AnomalyThresholds = {
    velocity: mean(velocity) + opts.sensitivity * velocityStd,
    acceleration: mean(acceleration) + opts.sensitivity * accelerationStd,
    jitter: opts.jitterFactor * velocityStd,
    trend: q3 + opts.fenceFactor * (q3 - q1),
  };

  const velocityActive = velocityStd > ZERO_VARIANCE_TOLERANCE;
  const accelerationActive = acceleration.length > 0 && accelerationStd > ZERO_VARIANCE_TOLERANCE;
  const exceeds = (value: number, threshold: number) => value > threshold + ZERO_VARIANCE_TOLERANCE;

  const flags: AnomalyFlag[] = [];

  for (let i = 1; i < points.length; i++) {
    const criteria: AnomalyCriterion[] = [];

    if (velocityActive && exceeds(velocity[i - 1], thresholds.velocity)) {
      criteria.push("velocity");
    }
    if (accelerationActive && i >= 2 && exceeds(acceleration[i - 2], thresholds.acceleration)) {
      criteria.push("acceleration");
    }
    if (velocityActive) {
      const jitter = standardDeviation(centeredWindow(velocity, i - 1, opts.jitterRadius));
      if (exceeds(jitter, thresholds.jitter)) criteria.push("jitter");
    }
    if (exceeds(deviation[i], thresholds.trend)) {
      criteria.push("trend");
    }

    if (criteria.length > 0) {
      flags.push({ frameIndex: points[i].frameIndex, criteria });
    }
  }

  return {
    site,
    frames: flags.map((f) => f.frameIndex),
    flags,
    thresholds,
  };
}

/** Sorted, deduplicated union of several frame lists. */
export function unionFrames(...lists: readonly (readonly number[])[]): number[] {
  const all = new Set<number>();
  for (const list of lists) {
    for (const frame of list) all.add(frame);
  }
  return [...all].sort((a, b) => a - b);
}

/** Runs detection on both sites and merges the flagged frames for review. */
export function detectSessionAnomalies(
  trajectories: SiteRecord<Trajectory>,
  options: Partial<AnomalyOptions> = {},
): AnomalyReport {
  const distal = detectAnomalies(trajectories[Site.DISTAL], options);
  const proximal = detectAnomalies(trajectories[Site.PROXIMAL], options);
  return {
    frames: unionFrames(distal.frames, proximal.frames),
    sites: { [Site.DISTAL]: distal, [Site.PROXIMAL]: proximal },
  };
}
