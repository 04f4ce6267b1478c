// Tendon Stiffness Analyzer - Error taxonomy
//
// Every failure the analysis core can report is one of these. The server maps
// them onto HTTP statuses; the WebSocket channel forwards the payload as-is.

import type { ErrorPayload } from "./types.js";

export type AnalysisErrorCode =
  | "DATA_NOT_READY"
  | "MALFORMED_INPUT"
  | "INVALID_CALIBRATION"
  | "MISSING_BASELINE"
  | "INSUFFICIENT_POINTS"
  | "INSUFFICIENT_DATA"
  | "NO_ROOT"
  | "SESSION_NOT_FOUND";

export abstract class AnalysisError extends Error {
  abstract readonly code: AnalysisErrorCode;
  abstract readonly status: number;
  readonly retryable: boolean = false;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }

  toPayload(): ErrorPayload {
    return { code: this.code, message: this.message, retryable: this.retryable };
  }
}

/** Upstream artifact has not been produced yet (or is still being written). */
export class DataNotReadyError extends AnalysisError {
  readonly code = "DATA_NOT_READY";
  readonly status = 503;
  readonly retryable = true;
}

/** Unparseable row, wrong column count, gap in frame numbering. */
export class MalformedInputError extends AnalysisError {
  readonly code = "MALFORMED_INPUT";
  readonly status = 400;
}

export class InvalidCalibrationError extends AnalysisError {
  readonly code = "INVALID_CALIBRATION";
  readonly status = 422;
}

export class MissingBaselineError extends AnalysisError {
  readonly code = "MISSING_BASELINE";
  readonly status = 409;

  constructor(message = "Baseline length has not been calibrated for this session.") {
    super(message);
  }
}

export class InsufficientPointsError extends AnalysisError {
  readonly code = "INSUFFICIENT_POINTS";
  readonly status = 422;
}

/** Not enough samples inside the TF50–TF80 band. */
export class InsufficientDataError extends AnalysisError {
  readonly code = "INSUFFICIENT_DATA";
  readonly status = 422;
}

/** The fitted curve has no usable solution at the requested force. */
export class NoRootError extends AnalysisError {
  readonly code = "NO_ROOT";
  readonly status = 422;
}

export class SessionNotFoundError extends AnalysisError {
  readonly code = "SESSION_NOT_FOUND";
  readonly status = 404;

  constructor(sessionId: string) {
    super(`Session not found: ${sessionId}`);
  }
}

export function isAnalysisError(err: unknown): err is AnalysisError {
  return err instanceof AnalysisError;
}

/**
 * Normalizes anything thrown into the wire payload. Unknown errors are
 * reported as non-retryable internal failures.
 */
export function toErrorPayload(err: unknown): ErrorPayload {
  if (isAnalysisError(err)) {
    return err.toPayload();
  }
  return {
    code: "INTERNAL",
    message: err instanceof Error ? err.message : String(err),
    retryable: false,
  };
}
