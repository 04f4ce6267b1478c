// Tendon Stiffness Analyzer - Session Manager
// Owns the state of every loaded video and runs the analysis steps against it.
//
// A session holds the smoothed trajectories, the correction overrides, the
// calibration and the force ramp for one video. Nothing is global: two
// sessions never see each other's data. Writes that change a session's
// trajectories or corrections are serialized through a per-session lock.

import { v4 as uuidv4 } from "uuid";
import { detectSessionAnomalies } from "./anomaly-detector.js";
import { calculateStiffness } from "./biomechanics-engine.js";
import { convertBaseline } from "./calibration-converter.js";
import { loadConfig, type AppConfig } from "./config.js";
import { CorrectionStore } from "./correction-store.js";
import {
  DataNotReadyError,
  InsufficientDataError,
  MalformedInputError,
  SessionNotFoundError,
  toErrorPayload,
} from "./errors.js";
import type { FilePersistence } from "./file-persistence.js";
import { measureCurveLength, type CurveMeasurement } from "./geometry-engine.js";
import { smoothTrajectory } from "./kalman-tracker.js";
import { createConsoleLogger, type Logger } from "./logger.js";
import { parseForceRampCsv, pollWithBackoff, readTrajectoryFile } from "./trajectory-feed.js";
import { Mutex } from "./utils/mutex.js";
import { Site, SessionState } from "./types.js";
import type {
  AnomalyReport,
  Calibration,
  Correction,
  ForceSample,
  Observation,
  Point,
  ResetConfirmation,
  Session,
  SessionEvent,
  SessionSummary,
  SiteRecord,
  StiffnessAnalysis,
  StiffnessOptions,
  Trajectory,
} from "./types.js";

// ─── Dependency injection interface ─────────────────────────────────────────────

export type AnalysisSettings = Pick<AppConfig, "feed" | "kalman" | "anomalySensitivity" | "splineSegments" | "stiffness">;

export interface SessionManagerDeps {
  settings?: AnalysisSettings;
  filePersistence?: FilePersistence;
  logger?: Logger;
  /** Used between feed polling attempts. Tests pass a no-op. */
  sleep?: (ms: number) => Promise<void>;
}

export type SessionListener = (event: SessionEvent) => void;

export interface LoadResult {
  frameCount: number;
  anomalies: AnomalyReport;
}

export interface CalibrationRequest {
  referenceFrame: number;
  factorPxPerMm: number;
  extraPoints?: Point[];
}

export interface CalibrationOutcome {
  measurement: CurveMeasurement;
  calibration: Calibration;
}

/**
 * Valid state transitions for the session state machine.
 *
 * IDLE → LOADING:     loadObservations() / ingestFeed()
 * READY → LOADING:    loading another video into the same session
 * LOADING → READY:    trajectories smoothed and scanned
 * LOADING → IDLE:     first load failed
 */
const VALID_TRANSITIONS: ReadonlyMap<SessionState, readonly SessionState[]> = new Map([
  [SessionState.IDLE, [SessionState.LOADING]],
  [SessionState.READY, [SessionState.LOADING]],
  [SessionState.LOADING, [SessionState.READY, SessionState.IDLE]],
]);

export class SessionManager {
  private sessions: Map<string, Session> = new Map();
  private locks: Map<string, Mutex> = new Map();
  private listeners: Set<SessionListener> = new Set();
  private readonly settings: AnalysisSettings;
  private readonly deps: SessionManagerDeps;
  private readonly logger: Logger;

  constructor(deps: SessionManagerDeps = {}) {
    this.deps = deps;
    this.settings = deps.settings ?? loadConfig({});
    this.logger = deps.logger ?? createConsoleLogger("SessionManager");
  }

  // ─── Lifecycle ──────────────────────────────────────────────────────────────

  createSession(): Session {
    const session: Session = {
      id: uuidv4(),
      state: SessionState.IDLE,
      createdAt: new Date(),
      loadedAt: null,
      observations: null,
      trajectories: null,
      anomalies: null,
      corrections: new CorrectionStore(),
      calibration: null,
      forceSamples: [],
      lastStiffness: null,
      outputsSaved: false,
      runId: 0,
    };
    this.sessions.set(session.id, session);
    this.locks.set(session.id, new Mutex());
    this.logger.info(`Session ${session.id} created`);
    return session;
  }

  /** @throws SessionNotFoundError */
  getSession(sessionId: string): Session {
    const session = this.sessions.get(sessionId);
    if (!session) {
      throw new SessionNotFoundError(sessionId);
    }
    return session;
  }

  summary(sessionId: string): SessionSummary {
    const session = this.getSession(sessionId);
    return {
      id: session.id,
      state: session.state,
      frameCount: frameCount(session.trajectories),
      correctionCount: session.corrections.size,
      calibration: session.calibration,
      forceSampleCount: session.forceSamples.length,
      flaggedFrames: session.anomalies?.frames ?? [],
    };
  }

  /**
   * Drops the session and its lock once any work already queued on it has
   * finished.
   * @throws SessionNotFoundError
   */
  async deleteSession(sessionId: string): Promise<void> {
    const session = this.getSession(sessionId);
    await this.exclusive(session, () => {
      if (this.sessions.get(session.id) !== session) {
        throw new SessionNotFoundError(session.id);
      }
      this.sessions.delete(session.id);
      this.locks.delete(session.id);
    });
    this.logger.info(`Session ${session.id} deleted`);
    this.emit({ type: "session_deleted", sessionId: session.id });
  }

  /** Registers a listener for every session's events; returns the unsubscribe function. */
  subscribe(listener: SessionListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  // ─── Loading ────────────────────────────────────────────────────────────────

  /**
   * Smooths both sites' observations and scans them for anomalies. Loading
   * replaces the previous video: corrections, calibration and the last
   * stiffness result are dropped. The force ramp is kept.
   *
   * On failure the session keeps whatever it had before.
   */
  loadObservations(sessionId: string, observations: SiteRecord<Observation[]>): Promise<LoadResult> {
    const session = this.getSession(sessionId);
    return this.exclusive(session, () => this.withLoading(session, async () => this.applyObservations(session, observations)));
  }

  /** Polls the configured feed files until both are readable, then loads them. */
  ingestFeed(sessionId: string): Promise<LoadResult> {
    const session = this.getSession(sessionId);
    const { feed } = this.settings;
    const pollOptions = { ...feed.poll, sleep: this.deps.sleep, logger: this.logger };
    const csvOptions = { swapColumns: feed.swapColumns };

    return this.exclusive(session, () =>
      this.withLoading(session, async () => {
        const distal = await pollWithBackoff(() => readTrajectoryFile(feed.distalFile, Site.DISTAL, csvOptions), pollOptions);
        const proximal = await pollWithBackoff(
          () => readTrajectoryFile(feed.proximalFile, Site.PROXIMAL, csvOptions),
          pollOptions,
        );
        return this.applyObservations(session, { [Site.DISTAL]: distal, [Site.PROXIMAL]: proximal });
      }),
    );
  }

  private applyObservations(session: Session, observations: SiteRecord<Observation[]>): LoadResult {
    for (const site of [Site.DISTAL, Site.PROXIMAL]) {
      if (observations[site].length === 0) {
        throw new MalformedInputError(`No ${site} observations were provided`);
      }
    }

    const trackerOptions = { config: this.settings.kalman, logger: this.logger };
    const trajectories: SiteRecord<Trajectory> = {
      [Site.DISTAL]: smoothTrajectory(Site.DISTAL, observations[Site.DISTAL], trackerOptions),
      [Site.PROXIMAL]: smoothTrajectory(Site.PROXIMAL, observations[Site.PROXIMAL], trackerOptions),
    };
    const anomalies = detectSessionAnomalies(trajectories, { sensitivity: this.settings.anomalySensitivity });

    session.observations = {
      [Site.DISTAL]: [...observations[Site.DISTAL]],
      [Site.PROXIMAL]: [...observations[Site.PROXIMAL]],
    };
    session.trajectories = trajectories;
    session.anomalies = anomalies;
    session.corrections = new CorrectionStore();
    session.calibration = null;
    session.lastStiffness = null;
    session.outputsSaved = false;
    session.loadedAt = new Date();
    session.runId++;

    const count = frameCount(trajectories);
    this.logger.info(
      `Session ${session.id}: run ${session.runId} loaded ${count} frames, ${anomalies.frames.length} flagged for review`,
    );
    this.emit({ type: "trajectory_ready", sessionId: session.id, frameCount: count, flaggedFrames: anomalies.frames });
    return { frameCount: count, anomalies };
  }

  private async withLoading<T>(session: Session, load: () => Promise<T>): Promise<T> {
    const previous = session.state;
    this.transition(session, SessionState.LOADING);
    try {
      const result = await load();
      this.transition(session, SessionState.READY);
      return result;
    } catch (err) {
      this.transition(session, session.trajectories ? SessionState.READY : SessionState.IDLE);
      this.logger.warn(`Session ${session.id}: load failed, staying in "${previous}"`);
      throw this.reportFailure(session, err);
    }
  }

  // ─── Trajectories & corrections ─────────────────────────────────────────────

  /**
   * Smoothed trajectories with the session's overrides applied. Built fresh
   * on every call.
   * @throws DataNotReadyError before the first successful load
   */
  effectiveTrajectories(sessionId: string): SiteRecord<Trajectory> {
    const session = this.getSession(sessionId);
    return effectiveOf(session, requireTrajectories(session));
  }

  /** @throws DataNotReadyError before the first successful load */
  getAnomalies(sessionId: string): AnomalyReport {
    const session = this.getSession(sessionId);
    if (!session.anomalies) {
      throw new DataNotReadyError("No trajectories have been loaded for this session yet");
    }
    return session.anomalies;
  }

  /**
   * Applies a batch of overrides. A batch with any invalid entry is rejected
   * as a whole.
   * @returns the number of overrides now held
   */
  submitCorrections(sessionId: string, corrections: readonly Correction[]): Promise<number> {
    const session = this.getSession(sessionId);
    return this.exclusive(session, () => {
      requireTrajectories(session);
      session.corrections.setMany(corrections);
      const correctionCount = session.corrections.size;
      this.logger.info(`Session ${session.id}: ${corrections.length} correction(s) applied, ${correctionCount} held`);
      this.emit({ type: "corrections_updated", sessionId: session.id, correctionCount });
      return correctionCount;
    });
  }

  /** Drops every override; requires explicit confirmation. */
  resetCorrections(sessionId: string, confirmation: ResetConfirmation): Promise<number> {
    const session = this.getSession(sessionId);
    return this.exclusive(session, () => {
      const cleared = session.corrections.reset(confirmation);
      this.logger.info(`Session ${session.id}: reset cleared ${cleared} correction(s)`);
      this.emit({ type: "corrections_reset", sessionId: session.id, cleared });
      return cleared;
    });
  }

  // ─── Calibration ────────────────────────────────────────────────────────────

  /**
   * Measures the tendon on `referenceFrame` of the effective trajectories and
   * records the baseline in millimetres. A failed request leaves any earlier
   * calibration in place.
   */
  calibrate(sessionId: string, request: CalibrationRequest): CalibrationOutcome {
    const session = this.getSession(sessionId);
    try {
      const effective = effectiveOf(session, requireTrajectories(session));
      const distal = pointAt(effective[Site.DISTAL], request.referenceFrame);
      const proximal = pointAt(effective[Site.PROXIMAL], request.referenceFrame);
      const measurement = measureCurveLength(
        { distal, proximal, extraPoints: request.extraPoints },
        this.settings.splineSegments,
      );
      const calibration = convertBaseline(
        session,
        measurement.lengthPx,
        request.factorPxPerMm,
        request.referenceFrame,
      );
      session.lastStiffness = null;

      this.logger.info(
        `Session ${session.id}: baseline ${calibration.baselineLengthMm.toFixed(2)} mm ` +
          `(${measurement.lengthPx.toFixed(1)} px at ${calibration.conversionFactorPxPerMm} px/mm, frame ${request.referenceFrame})`,
      );
      this.emit({ type: "calibration_set", sessionId: session.id, calibration });
      return { measurement, calibration };
    } catch (err) {
      throw this.reportFailure(session, err);
    }
  }

  // ─── Force & stiffness ──────────────────────────────────────────────────────

  /** Replaces the session's force ramp. */
  loadForceSamples(sessionId: string, samples: readonly ForceSample[]): number {
    const session = this.getSession(sessionId);
    if (samples.length === 0) {
      throw new MalformedInputError("Force ramp must contain at least one sample");
    }
    samples.forEach((s, i) => {
      if (!Number.isInteger(s.frameIndex) || s.frameIndex < 0) {
        throw new MalformedInputError(`Force sample ${i} has invalid frame index ${s.frameIndex}`);
      }
      if (!Number.isFinite(s.torqueNm)) {
        throw new MalformedInputError(`Force sample ${i} has non-finite torque`);
      }
    });

    session.forceSamples = samples.map((s) => ({ frameIndex: s.frameIndex, torqueNm: s.torqueNm }));
    session.lastStiffness = null;
    this.logger.info(`Session ${session.id}: ${samples.length} force samples loaded`);
    return session.forceSamples.length;
  }

  loadForceCsv(sessionId: string, text: string): number {
    return this.loadForceSamples(sessionId, parseForceRampCsv(text));
  }

  /**
   * Runs the stiffness computation on the current effective trajectories.
   * The session only records the result on success.
   */
  computeStiffness(sessionId: string, overrides: StiffnessOptions = {}): StiffnessAnalysis {
    const session = this.getSession(sessionId);
    try {
      const trajectories = requireTrajectories(session);
      if (session.forceSamples.length === 0) {
        throw new InsufficientDataError("No force ramp has been loaded for this session");
      }
      const effective = effectiveOf(session, trajectories);
      const analysis = calculateStiffness({
        distal: effective[Site.DISTAL],
        proximal: effective[Site.PROXIMAL],
        calibration: session.calibration,
        forceSamples: session.forceSamples,
        options: { ...this.settings.stiffness, ...overrides },
        logger: this.logger,
      });

      session.lastStiffness = analysis;
      this.logger.info(
        `Session ${session.id}: stiffness ${analysis.result.stiffnessNPerMm.toFixed(2)} N/mm ` +
          `(R² ${analysis.fit.rSquared.toFixed(3)}, ${analysis.samplesInBand} samples in band)`,
      );
      this.emit({ type: "stiffness_ready", sessionId: session.id, result: analysis.result });
      return analysis;
    } catch (err) {
      throw this.reportFailure(session, err);
    }
  }

  // ─── Persistence ────────────────────────────────────────────────────────────

  /**
   * Save session outputs to disk via FilePersistence. Opt-in only.
   * @returns saved file paths, or an empty array if no persistence is configured
   */
  async saveOutputs(sessionId: string): Promise<string[]> {
    const session = this.getSession(sessionId);
    if (!this.deps.filePersistence) {
      return [];
    }
    const effective = effectiveOf(session, requireTrajectories(session));
    return this.deps.filePersistence.saveSession(session, effective);
  }

  // ─── Internals ──────────────────────────────────────────────────────────────

  private exclusive<T>(session: Session, task: () => T | Promise<T>): Promise<T> {
    const lock = this.locks.get(session.id);
    if (!lock) {
      throw new SessionNotFoundError(session.id);
    }
    return lock.runExclusive(task);
  }

  private emit(event: SessionEvent): void {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (err) {
        this.logger.error(`Listener failed on ${event.type}: ${err instanceof Error ? err.message : String(err)}`);
      }
    }
  }

  /** Broadcasts the failure and hands the error back for rethrowing. */
  private reportFailure(session: Session, err: unknown): unknown {
    const error = toErrorPayload(err);
    this.logger.warn(`Session ${session.id}: ${error.code} ${error.message}`);
    this.emit({ type: "error", sessionId: session.id, error });
    return err;
  }

  /**
   * Validates that a state transition is allowed.
   * @throws Error with a descriptive message if the transition is invalid.
   */
  private transition(session: Session, target: SessionState): void {
    const allowed = VALID_TRANSITIONS.get(session.state) ?? [];
    if (!allowed.includes(target)) {
      throw new Error(`Invalid state transition: "${session.state}" → "${target}"`);
    }
    session.state = target;
    this.emit({ type: "state_change", sessionId: session.id, state: target });
  }
}

// ─── Helpers ────────────────────────────────────────────────────────────────────

function frameCount(trajectories: SiteRecord<Trajectory> | null): number {
  if (!trajectories) return 0;
  return Math.max(trajectories[Site.DISTAL].points.length, trajectories[Site.PROXIMAL].points.length);
}

function requireTrajectories(session: Session): SiteRecord<Trajectory> {
  if (!session.trajectories) {
    throw new DataNotReadyError("No trajectories have been loaded for this session yet");
  }
  return session.trajectories;
}

function effectiveOf(session: Session, trajectories: SiteRecord<Trajectory>): SiteRecord<Trajectory> {
  return {
    [Site.DISTAL]: session.corrections.effective(trajectories[Site.DISTAL]),
    [Site.PROXIMAL]: session.corrections.effective(trajectories[Site.PROXIMAL]),
  };
}

function pointAt(trajectory: Trajectory, frameIndex: number): Point {
  const point = trajectory.points.find((p) => p.frameIndex === frameIndex);
  if (!point) {
    throw new MalformedInputError(`Frame ${frameIndex} is not in the ${trajectory.site} trajectory`);
  }
  return { x: point.x, y: point.y };
}
