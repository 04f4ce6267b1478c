// Tendon Stiffness Analyzer - Shared TypeScript interfaces and types
//
// Runtime code stays out of this module apart from the two enums.

import type { CorrectionStore } from "./correction-store.js";

// ─── Sites & Geometry ───────────────────────────────────────────────────────────

export enum Site {
  DISTAL = "distal",
  PROXIMAL = "proximal",
}

export const SITES: readonly Site[] = [Site.DISTAL, Site.PROXIMAL];

export interface Point {
  x: number;
  y: number;
}

/** One raw detection for one site, as emitted by the segmentation model. */
export interface Observation extends Point {
  frameIndex: number;
}

export interface TrajectoryPoint extends Point {
  frameIndex: number;
}

/** Smoothed positions for one site, frame indices strictly increasing by one. */
export interface Trajectory {
  site: Site;
  points: TrajectoryPoint[];
}

export type SiteRecord<T> = Record<Site, T>;

// ─── Corrections ────────────────────────────────────────────────────────────────

export interface Correction extends Point {
  frameIndex: number;
  site: Site;
}

export interface ResetConfirmation {
  confirmed: true;
}

// ─── Anomalies ──────────────────────────────────────────────────────────────────

export type AnomalyCriterion = "velocity" | "acceleration" | "jitter" | "trend";

export interface AnomalyFlag {
  frameIndex: number;
  criteria: AnomalyCriterion[];
}

export interface AnomalyThresholds {
  velocity: number;
  acceleration: number;
  jitter: number;
  trend: number;
}

export interface SiteAnomalyReport {
  site: Site;
  /** Sorted, deduplicated frame indices. */
  frames: number[];
  flags: AnomalyFlag[];
  /** null when the trajectory was too short to derive thresholds. */
  thresholds: AnomalyThresholds | null;
}

export interface AnomalyReport {
  /** Union across sites, sorted; what a reviewer should be shown. */
  frames: number[];
  sites: SiteRecord<SiteAnomalyReport>;
}

// ─── Calibration ────────────────────────────────────────────────────────────────

export interface Calibration {
  conversionFactorPxPerMm: number;
  baselineLengthMm: number;
  baselineLengthPx: number;
  referenceFrame: number | null;
}

// ─── Force & Stiffness ──────────────────────────────────────────────────────────

export interface ForceSample {
  frameIndex: number;
  torqueNm: number;
}

export interface ElongationSample {
  frameIndex: number;
  elongationMm: number;
  deltaLMm: number;
}

export interface ForceElongationPair {
  deltaLMm: number;
  forceN: number;
}

export type RegressionRange = "full" | "tf80";

export interface MomentArmOptions {
  tendonMomentArmM?: number;
  lowerLegMomentArmM?: number;
  applyLeverRatio?: boolean;
}

export interface StiffnessOptions extends MomentArmOptions {
  regressionRange?: RegressionRange;
}

/** force = a·ΔL² + b·ΔL + c */
export interface QuadraticFit {
  a: number;
  b: number;
  c: number;
  rSquared: number;
}

export interface StiffnessResult {
  stiffnessNPerMm: number;
  normalizedStiffnessN: number;
}

export interface ForceAlignment {
  /** c(lag) = Σ force[n + lag] · elongation[n]; the lag at the peak. */
  lagFrames: number;
  peakCorrelation: number;
}

export interface StiffnessAnalysis {
  result: StiffnessResult;
  fit: QuadraticFit;
  tfMaxN: number;
  tf50N: number;
  tf80N: number;
  deltaL50Mm: number;
  deltaL80Mm: number;
  samplesUsed: number;
  samplesInBand: number;
  regressionRange: RegressionRange;
  alignment: ForceAlignment | null;
}

// ─── Session ────────────────────────────────────────────────────────────────────

export enum SessionState {
  IDLE = "idle",
  LOADING = "loading",
  READY = "ready",
}

/**
 * Everything known about one loaded video. Owned by the SessionManager;
 * components receive the pieces they need as arguments.
 */
export interface Session {
  id: string;
  state: SessionState;
  createdAt: Date;
  /** When the current trajectories were produced; null until the first load. */
  loadedAt: Date | null;
  observations: SiteRecord<Observation[]> | null;
  /** Smoothed output of the trackers. Corrections never modify these. */
  trajectories: SiteRecord<Trajectory> | null;
  anomalies: AnomalyReport | null;
  corrections: CorrectionStore;
  calibration: Calibration | null;
  forceSamples: ForceSample[];
  lastStiffness: StiffnessAnalysis | null;
  outputsSaved: boolean;
  /** Incremented on every successful load. */
  runId: number;
}

export interface SessionSummary {
  id: string;
  state: SessionState;
  frameCount: number;
  correctionCount: number;
  calibration: Calibration | null;
  forceSampleCount: number;
  flaggedFrames: number[];
}

// ─── WebSocket Messages ─────────────────────────────────────────────────────────

export interface ErrorPayload {
  code: string;
  message: string;
  retryable: boolean;
}

export type SessionEvent =
  | { type: "state_change"; sessionId: string; state: SessionState }
  | { type: "trajectory_ready"; sessionId: string; frameCount: number; flaggedFrames: number[] }
  | { type: "corrections_updated"; sessionId: string; correctionCount: number }
  | { type: "corrections_reset"; sessionId: string; cleared: number }
  | { type: "calibration_set"; sessionId: string; calibration: Calibration }
  | { type: "stiffness_ready"; sessionId: string; result: StiffnessResult }
  | { type: "error"; sessionId: string; error: ErrorPayload }
  | { type: "session_deleted"; sessionId: string };

export type ClientMessage =
  | { type: "subscribe"; sessionId: string }
  | { type: "unsubscribe"; sessionId: string };

export type ServerMessage =
  | SessionEvent
  | { type: "subscribed"; sessionId: string; summary: SessionSummary }
  | { type: "unsubscribed"; sessionId: string }
  | { type: "protocol_error"; message: string };
