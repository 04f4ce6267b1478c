// Tendon Stiffness Analyzer - Biomechanics Engine
//
// Effective trajectories + calibration + force ramp → stiffness.
//
//   ΔL(i)     = |distal(i) − proximal(i)| / factor − baseline
//   force(i)  = torque(i) / tendon arm   (× lower-leg arm / tendon arm in lever mode)
//   fit       force ≈ a·ΔL² + b·ΔL + c over the selected range
//   stiffness = (TF80 − TF50) / (ΔL(TF80) − ΔL(TF50)),  TFn = n% of TFmax
//
// Force and elongation are paired by position and truncated to the shorter
// series. Nothing is resampled or shifted in time.

import { pxToMm, requireCalibration } from "./calibration-converter.js";
import { InsufficientDataError, NoRootError } from "./errors.js";
import { silentLogger, type Logger } from "./logger.js";
import { euclidean, mean, standardDeviation } from "./stats.js";
import type {
  Calibration,
  ElongationSample,
  ForceAlignment,
  ForceElongationPair,
  ForceSample,
  MomentArmOptions,
  QuadraticFit,
  RegressionRange,
  StiffnessAnalysis,
  StiffnessOptions,
  StiffnessResult,
  Trajectory,
} from "./types.js";

// ─── Constants ──────────────────────────────────────────────────────────────────

export const DEFAULT_TENDON_MOMENT_ARM_M = 0.04;
export const DEFAULT_LOWER_LEG_MOMENT_ARM_M = 0.28;
export const MIN_SAMPLES_IN_BAND = 3;

const TF50_RATIO = 0.5;
const TF80_RATIO = 0.8;

/** Relative pivot size below which the normal equations are treated as singular. */
const SINGULAR_PIVOT = 1e-12;

// ─── Elongation ─────────────────────────────────────────────────────────────────

/**
 * One sample per frame present in both trajectories, in distal order.
 * @throws MissingBaselineError via requireCalibration when uncalibrated
 */
export function buildElongationSeries(
  distal: Trajectory,
  proximal: Trajectory,
  calibration: Calibration | null,
): ElongationSample[] {
  const calibrated = requireCalibration({ calibration });
  const proximalByFrame = new Map(proximal.points.map((p) => [p.frameIndex, p]));
  const series: ElongationSample[] = [];

  for (const d of distal.points) {
    const p = proximalByFrame.get(d.frameIndex);
    if (!p) continue;
    const elongationMm = pxToMm(euclidean(d, p), calibrated);
    series.push({ frameIndex: d.frameIndex, elongationMm, deltaLMm: elongationMm - calibrated.baselineLengthMm });
  }

  return series;
}

// ─── Force ──────────────────────────────────────────────────────────────────────

export interface ResolvedMomentArms {
  tendonMomentArmM: number;
  lowerLegMomentArmM: number;
  applyLeverRatio: boolean;
}

function resolveArm(value: number | undefined, fallback: number, label: string, logger: Logger): number {
  if (value === undefined) return fallback;
  if (Number.isFinite(value) && value > 0) return value;
  logger.warn(`Invalid ${label} moment arm ${value} m; using default ${fallback} m`);
  return fallback;
}

/** Fills in defaults; an invalid arm is replaced by its default with a warning. */
export function resolveMomentArms(options: MomentArmOptions = {}, logger: Logger = silentLogger): ResolvedMomentArms {
  return {
    tendonMomentArmM: resolveArm(options.tendonMomentArmM, DEFAULT_TENDON_MOMENT_ARM_M, "tendon", logger),
    lowerLegMomentArmM: resolveArm(options.lowerLegMomentArmM, DEFAULT_LOWER_LEG_MOMENT_ARM_M, "lower-leg", logger),
    applyLeverRatio: options.applyLeverRatio ?? false,
  };
}

export function tendonForce(torqueNm: number, arms: ResolvedMomentArms): number {
  const force = torqueNm / arms.tendonMomentArmM;
  return arms.applyLeverRatio ? force * (arms.lowerLegMomentArmM / arms.tendonMomentArmM) : force;
}

export function tendonForceSeries(
  samples: readonly ForceSample[],
  options: MomentArmOptions = {},
  logger: Logger = silentLogger,
): number[] {
  const arms = resolveMomentArms(options, logger);
  return samples.map((s) => tendonForce(s.torqueNm, arms));
}

// ─── Pairing ────────────────────────────────────────────────────────────────────

export function pairSeries(elongation: readonly ElongationSample[], forces: readonly number[]): ForceElongationPair[] {
  const n = Math.min(elongation.length, forces.length);
  const pairs: ForceElongationPair[] = [];
  for (let i = 0; i < n; i++) {
    pairs.push({ deltaLMm: elongation[i].deltaLMm, forceN: forces[i] });
  }
  return pairs;
}

function maxForce(pairs: readonly ForceElongationPair[]): number {
  return pairs.reduce((max, p) => Math.max(max, p.forceN), -Infinity);
}

/**
 * "full" keeps everything. "tf80" keeps the prefix up to and including the
 * first sample that reaches 80% of the whole series' maximum.
 */
export function selectRegressionRange(
  pairs: readonly ForceElongationPair[],
  range: RegressionRange,
): ForceElongationPair[] {
  if (range === "full" || pairs.length === 0) return [...pairs];
  const cutoff = TF80_RATIO * maxForce(pairs);
  const index = pairs.findIndex((p) => p.forceN >= cutoff);
  return pairs.slice(0, index + 1);
}

// ─── Regression ─────────────────────────────────────────────────────────────────

/** Solves a 3×3 system by Gaussian elimination with partial pivoting. */
function solve3(matrix: number[][], rhs: number[]): [number, number, number] | null {
  const m = matrix.map((row, i) => [...row, rhs[i]]);
  const scale = Math.max(...matrix.flat().map(Math.abs), 1);

  for (let col = 0; col < 3; col++) {
    let pivot = col;
    for (let r = col + 1; r < 3; r++) {
      if (Math.abs(m[r][col]) > Math.abs(m[pivot][col])) pivot = r;
    }
    if (Math.abs(m[pivot][col]) < SINGULAR_PIVOT * scale) return null;
    [m[col], m[pivot]] = [m[pivot], m[col]];

    for (let r = col + 1; r < 3; r++) {
      const f = m[r][col] / m[col][col];
      for (let k = col; k < 4; k++) m[r][k] -= f * m[col][k];
    }
  }

  const x = [0, 0, 0];
  for (let r = 2; r >= 0; r--) {
    let acc = m[r][3];
    for (let k = r + 1; k < 3; k++) acc -= m[r][k] * x[k];
    x[r] = acc / m[r][r];
  }
  return [x[0], x[1], x[2]];
}

/**
 * Least-squares quadratic through (ΔL, force) via the normal equations.
 * @throws InsufficientDataError with fewer than three pairs or when ΔL takes
 *         fewer than three distinct values
 */
export function fitQuadratic(pairs: readonly ForceElongationPair[]): QuadraticFit {
  if (pairs.length < 3) {
    throw new InsufficientDataError(`A quadratic fit needs at least 3 samples, got ${pairs.length}`);
  }

  const s = [0, 0, 0, 0, 0];
  const t = [0, 0, 0];
  for (const { deltaLMm: x, forceN: y } of pairs) {
    let xp = 1;
    for (let k = 0; k <= 4; k++) {
      s[k] += xp;
      if (k <= 2) t[k] += xp * y;
      xp *= x;
    }
  }

  const solution = solve3(
    [
      [s[0], s[1], s[2]],
      [s[1], s[2], s[3]],
      [s[2], s[3], s[4]],
    ],
    t,
  );
  if (!solution) {
    throw new InsufficientDataError("Elongation does not vary enough across the samples to fit a curve");
  }

  const [c, b, a] = solution;
  const forceMean = mean(pairs.map((p) => p.forceN));
  let ssRes = 0;
  let ssTot = 0;
  for (const p of pairs) {
    ssRes += (p.forceN - evaluateQuadratic({ a, b, c }, p.deltaLMm)) ** 2;
    ssTot += (p.forceN - forceMean) ** 2;
  }
  const rSquared = ssTot > 0 ? 1 - ssRes / ssTot : 1;

  return { a, b, c, rSquared };
}

export function evaluateQuadratic(fit: Pick<QuadraticFit, "a" | "b" | "c">, x: number): number {
  return fit.a * x * x + fit.b * x + fit.c;
}

/**
 * ΔL at which the fitted curve reaches `force` on its ascending branch: the
 * root of a·x² + b·x + (c − force) = 0 where the slope 2a·x + b is not
 * negative. That is the larger root of a convex fit and the smaller root of a
 * concave one. Falls back to the linear solution when a is 0.
 * @throws NoRootError when the curve never reaches `force`
 */
export function elongationAtForce(fit: Pick<QuadraticFit, "a" | "b" | "c">, force: number): number {
  const { a, b } = fit;
  const c = fit.c - force;

  if (a === 0) {
    if (b === 0) {
      throw new NoRootError(`Fitted curve is flat and never reaches ${force.toFixed(2)} N`);
    }
    return -c / b;
  }

  const discriminant = b * b - 4 * a * c;
  if (discriminant < 0) {
    throw new NoRootError(
      `Fitted curve never reaches ${force.toFixed(2)} N (negative discriminant); ` +
        "the force–elongation fit has no solution in range",
    );
  }
  // slope at (−b ± √D) / 2a is ±√D, so the "+" root is always the ascending one
  const root = Math.sqrt(discriminant);
  if (b > 0) {
    // same root, written to avoid cancelling −b against √D when a is tiny
    return (2 * c) / (-b - root);
  }
  return (-b + root) / (2 * a);
}

// ─── Stiffness ──────────────────────────────────────────────────────────────────

export interface FitStiffness {
  result: StiffnessResult;
  tf50N: number;
  tf80N: number;
  deltaL50Mm: number;
  deltaL80Mm: number;
}

/**
 * Slope of the fitted curve between 50% and 80% of `tfMaxN`, and that slope
 * scaled by the baseline length.
 * @throws NoRootError if either force is unreachable or ΔL does not increase
 */
export function stiffnessFromFit(
  fit: Pick<QuadraticFit, "a" | "b" | "c">,
  tfMaxN: number,
  baselineLengthMm: number,
): FitStiffness {
  const tf50N = TF50_RATIO * tfMaxN;
  const tf80N = TF80_RATIO * tfMaxN;
  const deltaL50Mm = elongationAtForce(fit, tf50N);
  const deltaL80Mm = elongationAtForce(fit, tf80N);
  const span = deltaL80Mm - deltaL50Mm;

  if (!Number.isFinite(span) || span <= 0) {
    throw new NoRootError(
      `Fitted curve does not increase between TF50 (${tf50N.toFixed(2)} N) and TF80 (${tf80N.toFixed(2)} N)`,
    );
  }

  const stiffnessNPerMm = (tf80N - tf50N) / span;
  return {
    result: { stiffnessNPerMm, normalizedStiffnessN: stiffnessNPerMm * baselineLengthMm },
    tf50N,
    tf80N,
    deltaL50Mm,
    deltaL80Mm,
  };
}

/**
 * Fits and inverts over already-paired samples.
 * @throws InsufficientDataError when fewer than three samples lie in [TF50, TF80]
 * @throws NoRootError when the fit cannot be inverted in that band
 */
export function analyzeStiffness(
  pairs: readonly ForceElongationPair[],
  baselineLengthMm: number,
  regressionRange: RegressionRange = "full",
): Omit<StiffnessAnalysis, "alignment"> {
  if (pairs.length === 0) {
    throw new InsufficientDataError("No force–elongation samples to analyze");
  }

  const used = selectRegressionRange(pairs, regressionRange);
  const tfMaxN = maxForce(used);
  if (!(tfMaxN > 0)) {
    throw new InsufficientDataError("Tendon force never rises above 0 N in the selected range");
  }

  const tf50N = TF50_RATIO * tfMaxN;
  const tf80N = TF80_RATIO * tfMaxN;
  const samplesInBand = used.filter((p) => p.forceN >= tf50N && p.forceN <= tf80N).length;
  if (samplesInBand < MIN_SAMPLES_IN_BAND) {
    throw new InsufficientDataError(
      `Not enough samples between TF50 (${tf50N.toFixed(2)} N) and TF80 (${tf80N.toFixed(2)} N): ` +
        `found ${samplesInBand}, need at least ${MIN_SAMPLES_IN_BAND}`,
    );
  }

  const fit = fitQuadratic(used);
  const stiffness = stiffnessFromFit(fit, tfMaxN, baselineLengthMm);

  return {
    ...stiffness,
    fit,
    tfMaxN,
    samplesUsed: used.length,
    samplesInBand,
    regressionRange,
  };
}

// ─── Alignment ──────────────────────────────────────────────────────────────────

/**
 * Normalized cross-correlation of the mean-removed series over every lag;
 * c(lag) = Σ force[n + lag] · elongation[n]. Reported alongside the result,
 * never used to shift the pairing. null when either series is constant.
 */
export function estimateAlignment(forces: readonly number[], elongations: readonly number[]): ForceAlignment | null {
  const n = Math.min(forces.length, elongations.length);
  if (n < 2) return null;

  const f = forces.slice(0, n);
  const e = elongations.slice(0, n);
  const stdF = standardDeviation(f);
  const stdE = standardDeviation(e);
  if (stdF === 0 || stdE === 0) return null;

  const meanF = mean(f);
  const meanE = mean(e);
  const fc = f.map((v) => v - meanF);
  const ec = e.map((v) => v - meanE);

  let bestLag = 0;
  let best = -Infinity;
  for (let lag = -(n - 1); lag <= n - 1; lag++) {
    let sum = 0;
    for (let i = Math.max(0, -lag); i < n && i + lag < n; i++) {
      sum += fc[i + lag] * ec[i];
    }
    if (sum > best) {
      best = sum;
      bestLag = lag;
    }
  }

  return { lagFrames: bestLag, peakCorrelation: best / (n * stdF * stdE) };
}

// ─── Entry point ────────────────────────────────────────────────────────────────

export interface StiffnessInput {
  distal: Trajectory;
  proximal: Trajectory;
  calibration: Calibration | null;
  forceSamples: readonly ForceSample[];
  options?: StiffnessOptions;
  logger?: Logger;
}

/**
 * Full computation from effective trajectories and the force ramp. Pure:
 * inputs are only read.
 */
export function calculateStiffness(input: StiffnessInput): StiffnessAnalysis {
  const logger = input.logger ?? silentLogger;
  const options = input.options ?? {};
  const calibration = requireCalibration({ calibration: input.calibration });

  if (input.forceSamples.length === 0) {
    throw new InsufficientDataError("No force ramp samples have been loaded");
  }

  const elongation = buildElongationSeries(input.distal, input.proximal, calibration);
  const forces = tendonForceSeries(input.forceSamples, options, logger);
  const pairs = pairSeries(elongation, forces);

  if (elongation.length !== forces.length) {
    logger.info(
      `Pairing ${pairs.length} samples (elongation ${elongation.length}, force ${forces.length}); extra samples dropped`,
    );
  }

  const analysis = analyzeStiffness(pairs, calibration.baselineLengthMm, options.regressionRange ?? "full");
  const alignment = estimateAlignment(
    pairs.map((p) => p.forceN),
    pairs.map((p) => p.deltaLMm),
  );

  return { ...analysis, alignment };
}
