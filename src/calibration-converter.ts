// Tendon Stiffness Analyzer - Calibration Converter
//
// Pixel → millimetre conversion for one session. The measured baseline and the
// factor are written onto the session context, never into module state.

import { InvalidCalibrationError, MissingBaselineError } from "./errors.js";
import type { Calibration } from "./types.js";

/** Anything that carries a session's calibration (the Session itself, in practice). */
export interface CalibrationContext {
  calibration: Calibration | null;
}

export function isValidFactor(factor: number): boolean {
  return Number.isFinite(factor) && factor > 0;
}

/**
 * Converts a baseline length in pixels to millimetres and records the
 * resulting calibration on `context`. Nothing is recorded on failure.
 *
 * @throws InvalidCalibrationError if the factor or the length is not a
 *         finite positive number
 */
export function convertBaseline(
  context: CalibrationContext,
  lengthPx: number,
  factorPxPerMm: number,
  referenceFrame: number | null = null,
): Calibration {
  if (!isValidFactor(factorPxPerMm)) {
    throw new InvalidCalibrationError(
      `Conversion factor must be a finite number greater than 0 px/mm, got ${factorPxPerMm}`,
    );
  }
  if (!Number.isFinite(lengthPx) || lengthPx <= 0) {
    throw new InvalidCalibrationError(`Baseline length must be a finite positive pixel length, got ${lengthPx}`);
  }

  const calibration: Calibration = {
    conversionFactorPxPerMm: factorPxPerMm,
    baselineLengthMm: lengthPx / factorPxPerMm,
    baselineLengthPx: lengthPx,
    referenceFrame,
  };
  context.calibration = calibration;
  return calibration;
}

/** @throws MissingBaselineError if no calibration has been recorded */
export function requireCalibration(context: CalibrationContext): Calibration {
  if (!context.calibration) {
    throw new MissingBaselineError();
  }
  return context.calibration;
}

export function pxToMm(lengthPx: number, calibration: Calibration): number {
  return lengthPx / calibration.conversionFactorPxPerMm;
}
