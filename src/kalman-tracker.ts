// Tendon Stiffness Analyzer - Kalman Tracker
//
// Constant-velocity Kalman filter for one insertion site. The state is
// (x, vx, y, vy) with F = [[1, dt], [0, 1]] per axis, H selecting position,
// Q = q·I and R = r·I. With a diagonal initial covariance the two axes never
// couple, so each axis carries its own 2×2 covariance.

import { MalformedInputError } from "./errors.js";
import { silentLogger, type Logger } from "./logger.js";
import type { Observation, Point, Site, Trajectory, TrajectoryPoint } from "./types.js";

// ─── Configuration ──────────────────────────────────────────────────────────────

export interface KalmanConfig {
  /** Process noise added to every state component on predict. */
  processNoise: number;
  /** Measurement noise on each observed coordinate. */
  measurementNoise: number;
  /** Covariance assigned to every state component on the first observation. */
  initialCovariance: number;
  /**
   * Skip the update when the implied acceleration exceeds this (px/frame²).
   * 0 disables gating and is the validated default: enabling it has been
   * observed to degrade trajectories.
   */
  accelerationGateThreshold: number;
  /** Time step between frames, in frames. */
  frameInterval: number;
}

export const DEFAULT_KALMAN_CONFIG: Readonly<KalmanConfig> = {
  processNoise: 0.1,
  measurementNoise: 1,
  initialCovariance: 1000,
  accelerationGateThreshold: 0,
  frameInterval: 1,
};

// ─── Tracker Interface ──────────────────────────────────────────────────────────

/** 2×2 symmetric covariance: [p00, p01, p11] where p01 = p10. */
export type AxisCovariance = [number, number, number];

export interface TrackerState {
  position: Point;
  velocity: Point;
  covariance: { x: AxisCovariance; y: AxisCovariance };
  /** Number of observations incorporated so far (gated frames excluded). */
  updates: number;
}

export interface Tracker {
  predict(): void;
  /** Returns false when the observation was gated out. */
  update(observation: Point): boolean;
  state(): TrackerState | null;
}

// ─── Per-axis filter ────────────────────────────────────────────────────────────

interface AxisState {
  pos: number;
  vel: number;
  cov: AxisCovariance;
}

function predictAxis(axis: AxisState, dt: number, q: number): AxisState {
  const [p00, p01, p11] = axis.cov;
  return {
    pos: axis.pos + dt * axis.vel,
    vel: axis.vel,
    cov: [p00 + 2 * dt * p01 + dt * dt * p11 + q, p01 + dt * p11, p11 + q],
  };
}

function updateAxis(axis: AxisState, z: number, r: number): AxisState {
  const [p00, p01, p11] = axis.cov;
  const s = p00 + r;
  const k0 = p00 / s;
  const k1 = p01 / s;
  const innovation = z - axis.pos;
  return {
    pos: axis.pos + k0 * innovation,
    vel: axis.vel + k1 * innovation,
    cov: [(1 - k0) * p00, (1 - k0) * p01, p11 - k1 * p01],
  };
}

// ─── KalmanTracker ──────────────────────────────────────────────────────────────

export class KalmanTracker implements Tracker {
  readonly site: Site;
  private readonly config: KalmanConfig;
  private x: AxisState | null = null;
  private y: AxisState | null = null;
  private updates = 0;
  private lastPosition: Point | null = null;

  constructor(site: Site, config: Partial<KalmanConfig> = {}) {
    this.site = site;
    this.config = { ...DEFAULT_KALMAN_CONFIG, ...config };
  }

  /** Advances the state one frame. A no-op before the first observation. */
  predict(): void {
    if (!this.x || !this.y) return;
    this.lastPosition = { x: this.x.pos, y: this.y.pos };
    const { frameInterval: dt, processNoise: q } = this.config;
    this.x = predictAxis(this.x, dt, q);
    this.y = predictAxis(this.y, dt, q);
  }

  /**
   * Incorporates one observation. The first call initializes the state
   * (position = observation, velocity = 0, covariance = initialCovariance).
   */
  update(observation: Point): boolean {
    if (!this.x || !this.y) {
      const p0 = this.config.initialCovariance;
      this.x = { pos: observation.x, vel: 0, cov: [p0, 0, p0] };
      this.y = { pos: observation.y, vel: 0, cov: [p0, 0, p0] };
      this.updates = 1;
      return true;
    }

    if (this.isGated(observation)) {
      return false;
    }

    const r = this.config.measurementNoise;
    this.x = updateAxis(this.x, observation.x, r);
    this.y = updateAxis(this.y, observation.y, r);
    this.updates++;
    return true;
  }

  state(): TrackerState | null {
    if (!this.x || !this.y) return null;
    return {
      position: { x: this.x.pos, y: this.y.pos },
      velocity: { x: this.x.vel, y: this.y.vel },
      covariance: { x: [...this.x.cov], y: [...this.y.cov] },
      updates: this.updates,
    };
  }

  /**
   * Acceleration implied by moving from the previous estimate to the
   * observation, compared against the current velocity estimate.
   */
  private isGated(observation: Point): boolean {
    const threshold = this.config.accelerationGateThreshold;
    if (threshold <= 0 || !this.x || !this.y || !this.lastPosition) return false;
    const dt = this.config.frameInterval;
    const impliedVx = (observation.x - this.lastPosition.x) / dt;
    const impliedVy = (observation.y - this.lastPosition.y) / dt;
    const accel = Math.hypot(impliedVx - this.x.vel, impliedVy - this.y.vel) / dt;
    return accel > threshold;
  }
}

// ─── Batch smoothing ────────────────────────────────────────────────────────────

export interface SmoothOptions {
  config?: Partial<KalmanConfig>;
  logger?: Logger;
}

/**
 * Checks that frame indices start anywhere ≥ 0 and increase by exactly one.
 * @throws MalformedInputError on a gap, repeat, or negative index.
 */
export function assertContiguousFrames(observations: readonly Observation[], site: Site): void {
  for (let i = 0; i < observations.length; i++) {
    const { frameIndex, x, y } = observations[i];
    if (!Number.isInteger(frameIndex) || frameIndex < 0) {
      throw new MalformedInputError(`${site} observation ${i} has invalid frame index ${frameIndex}`);
    }
    if (!Number.isFinite(x) || !Number.isFinite(y)) {
      throw new MalformedInputError(`${site} observation at frame ${frameIndex} has non-finite coordinates`);
    }
    if (i > 0 && frameIndex !== observations[i - 1].frameIndex + 1) {
      throw new MalformedInputError(
        `${site} observations are not contiguous: frame ${observations[i - 1].frameIndex} is followed by ${frameIndex}`,
      );
    }
  }
}

/**
 * Runs one tracker over an ordered observation stream and returns one
 * smoothed position per input frame. The first frame is the observation
 * itself; every later frame is predict → update.
 */
export function smoothTrajectory(
  site: Site,
  observations: readonly Observation[],
  options: SmoothOptions = {},
): Trajectory {
  const logger = options.logger ?? silentLogger;
  assertContiguousFrames(observations, site);

  const tracker = new KalmanTracker(site, options.config);
  const gate = options.config?.accelerationGateThreshold ?? DEFAULT_KALMAN_CONFIG.accelerationGateThreshold;
  if (gate <= 0) {
    logger.info(`${site}: acceleration gating disabled (threshold ${gate})`);
  }

  const points: TrajectoryPoint[] = [];
  let gated = 0;

  for (const obs of observations) {
    tracker.predict();
    if (!tracker.update(obs)) gated++;
    const state = tracker.state();
    if (!state) {
      throw new Error(`${site} tracker has no state after frame ${obs.frameIndex}`);
    }
    points.push({ frameIndex: obs.frameIndex, x: state.position.x, y: state.position.y });
  }

  if (gated > 0) {
    logger.warn(`${site}: ${gated} of ${observations.length} frames were gated to prediction only`);
  }

  return { site, points };
}
