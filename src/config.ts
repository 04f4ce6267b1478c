// Tendon Stiffness Analyzer - Configuration
//
// Everything tunable comes from the environment (a .env file is loaded by the
// entry point through dotenv). Values are parsed once at startup; a bad value
// stops the process before the server listens.

import { join } from "node:path";
import { DEFAULT_ANOMALY_OPTIONS } from "./anomaly-detector.js";
import { DEFAULT_KALMAN_CONFIG, type KalmanConfig } from "./kalman-tracker.js";
import { DEFAULT_SEGMENTS_PER_SPAN } from "./geometry-engine.js";
import { DEFAULT_POLL_OPTIONS } from "./trajectory-feed.js";
import type { RegressionRange, StiffnessOptions } from "./types.js";

export interface FeedConfig {
  distalFile: string;
  proximalFile: string;
  swapColumns: boolean;
  poll: {
    attempts: number;
    initialDelayMs: number;
    maxDelayMs: number;
  };
}

export interface AppConfig {
  port: number;
  dataDir: string;
  outputDir: string;
  feed: FeedConfig;
  kalman: KalmanConfig;
  anomalySensitivity: number;
  splineSegments: number;
  stiffness: StiffnessOptions;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

type Env = Record<string, string | undefined>;

function raw(env: Env, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

function numberFrom(env: Env, key: string, fallback: number, check: (n: number) => boolean, rule: string): number {
  const value = raw(env, key);
  if (value === undefined) return fallback;
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || !check(parsed)) {
    throw new ConfigError(`${key} must be ${rule}, got "${value}"`);
  }
  return parsed;
}

const positive = (n: number) => n > 0;
const nonNegative = (n: number) => n >= 0;
const positiveInt = (n: number) => Number.isInteger(n) && n > 0;
const anyNumber = () => true;

function booleanFrom(env: Env, key: string, fallback: boolean): boolean {
  const value = raw(env, key)?.toLowerCase();
  if (value === undefined) return fallback;
  if (value === "true" || value === "1") return true;
  if (value === "false" || value === "0") return false;
  throw new ConfigError(`${key} must be true or false, got "${value}"`);
}

function rangeFrom(env: Env): RegressionRange {
  const value = raw(env, "REGRESSION_RANGE") ?? "full";
  if (value === "full" || value === "tf80") return value;
  throw new ConfigError(`REGRESSION_RANGE must be "full" or "tf80", got "${value}"`);
}

function optionalNumber(env: Env, key: string): number | undefined {
  return raw(env, key) === undefined ? undefined : numberFrom(env, key, 0, anyNumber, "a number");
}

/**
 * Builds the application config from `env`.
 * @throws ConfigError naming the first invalid variable
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const dataDir = raw(env, "DATA_DIR") ?? "data";

  return {
    port: numberFrom(env, "PORT", 3000, (n) => Number.isInteger(n) && n >= 0 && n < 65536, "a port number"),
    dataDir,
    outputDir: raw(env, "OUTPUT_DIR") ?? "output",
    feed: {
      distalFile: join(dataDir, raw(env, "FEED_DISTAL_FILE") ?? "distal.csv"),
      proximalFile: join(dataDir, raw(env, "FEED_PROXIMAL_FILE") ?? "proximal.csv"),
      swapColumns: booleanFrom(env, "FEED_SWAP_COLUMNS", true),
      poll: {
        attempts: numberFrom(env, "FEED_POLL_ATTEMPTS", DEFAULT_POLL_OPTIONS.attempts, positiveInt, "a positive integer"),
        initialDelayMs: numberFrom(
          env,
          "FEED_POLL_INITIAL_DELAY_MS",
          DEFAULT_POLL_OPTIONS.initialDelayMs,
          nonNegative,
          "a non-negative number",
        ),
        maxDelayMs: numberFrom(
          env,
          "FEED_POLL_MAX_DELAY_MS",
          DEFAULT_POLL_OPTIONS.maxDelayMs,
          nonNegative,
          "a non-negative number",
        ),
      },
    },
    kalman: {
      processNoise: numberFrom(env, "KALMAN_PROCESS_NOISE", DEFAULT_KALMAN_CONFIG.processNoise, nonNegative, "≥ 0"),
      measurementNoise: numberFrom(
        env,
        "KALMAN_MEASUREMENT_NOISE",
        DEFAULT_KALMAN_CONFIG.measurementNoise,
        positive,
        "> 0",
      ),
      initialCovariance: numberFrom(
        env,
        "KALMAN_INITIAL_COVARIANCE",
        DEFAULT_KALMAN_CONFIG.initialCovariance,
        positive,
        "> 0",
      ),
      accelerationGateThreshold: numberFrom(
        env,
        "KALMAN_ACCELERATION_GATE",
        DEFAULT_KALMAN_CONFIG.accelerationGateThreshold,
        nonNegative,
        "≥ 0 (0 disables gating)",
      ),
      frameInterval: DEFAULT_KALMAN_CONFIG.frameInterval,
    },
    anomalySensitivity: numberFrom(env, "ANOMALY_SENSITIVITY", DEFAULT_ANOMALY_OPTIONS.sensitivity, positive, "> 0"),
    splineSegments: numberFrom(env, "SPLINE_SEGMENTS", DEFAULT_SEGMENTS_PER_SPAN, positiveInt, "a positive integer"),
    stiffness: {
      // Out-of-range arms are left for the biomechanics engine to replace with a warning.
      tendonMomentArmM: optionalNumber(env, "TENDON_MOMENT_ARM_M"),
      lowerLegMomentArmM: optionalNumber(env, "LOWER_LEG_MOMENT_ARM_M"),
      applyLeverRatio: booleanFrom(env, "APPLY_LEVER_RATIO", false),
      regressionRange: rangeFrom(env),
    },
  };
}
