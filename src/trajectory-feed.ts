// Tendon Stiffness Analyzer - Trajectory Feed
//
// Reads the per-site coordinate files written by the segmentation stage and
// the force ramp recorded by the dynamometer. The segmentation stage writes
// its files incrementally, so a missing or empty file, or one that ends in a
// half-written row, means "not yet" and is retried. Any other bad row is
// rejected outright.

import { readFile } from "node:fs/promises";
import { DataNotReadyError, MalformedInputError } from "./errors.js";
import { silentLogger, type Logger } from "./logger.js";
import type { ForceSample, Observation, Site } from "./types.js";

// ─── CSV parsing ────────────────────────────────────────────────────────────────

export interface CoordinateCsvOptions {
  /**
   * Compatibility shim: the segmentation stage writes each pair as (y, x).
   * When true (the default) the last two fields are read in that order.
   */
  swapColumns?: boolean;
}

/** Non-blank lines after the header row. */
function dataRows(text: string): string[] {
  const lines = text.split(/\r?\n/).filter((line) => line.trim().length > 0);
  return lines.slice(1);
}

function parseField(raw: string, what: string): number {
  const trimmed = raw.trim();
  const value = trimmed.length > 0 ? Number(trimmed) : NaN;
  if (!Number.isFinite(value)) {
    throw new MalformedInputError(`${what}: "${raw}" is not a number`);
  }
  return value;
}

/** True when the last line of `text` has its newline, i.e. the writer finished it. */
function endsWithNewline(text: string): boolean {
  return /\n[ \t\r]*$/.test(text);
}

function parseCoordinateRow(
  row: string,
  frameIndex: number,
  expectedFields: number,
  site: Site,
  swap: boolean,
): Observation {
  const what = `${site} row ${frameIndex + 1}`;
  const fields = row.split(",");
  if (fields.length !== expectedFields) {
    throw new MalformedInputError(`${what} has ${fields.length} field(s), expected ${expectedFields}`);
  }
  if (fields.length < 2) {
    throw new MalformedInputError(`${what} has ${fields.length} field(s), expected at least 2`);
  }
  const first = parseField(fields[fields.length - 2], what);
  const second = parseField(fields[fields.length - 1], what);
  return swap ? { frameIndex, x: second, y: first } : { frameIndex, x: first, y: second };
}

/**
 * One observation per data row. The pair is taken from the last two fields
 * so leading index or filename columns are ignored; the frame index is the
 * row's position. Every row must have as many fields as the first one.
 *
 * The segmentation stage appends rows while the file is being read, so a
 * last row that does not parse is treated as still in progress when it has
 * no newline yet or is shorter than the rows before it.
 *
 * @throws DataNotReadyError when the file has no data rows yet, or ends in a
 *         partially written row
 * @throws MalformedInputError on any other row without two numeric trailing
 *         fields, or with a different field count
 */
export function parseCoordinateCsv(text: string, site: Site, options: CoordinateCsvOptions = {}): Observation[] {
  const swap = options.swapColumns ?? true;
  const rows = dataRows(text);
  if (rows.length === 0) {
    throw new DataNotReadyError(`${site} coordinate feed has no data rows yet`);
  }

  const expectedFields = rows[0].split(",").length;
  const lastIndex = rows.length - 1;
  const terminated = endsWithNewline(text);

  return rows.map((row, frameIndex) => {
    try {
      return parseCoordinateRow(row, frameIndex, expectedFields, site, swap);
    } catch (err) {
      const partial = !terminated || row.split(",").length < expectedFields;
      if (frameIndex === lastIndex && partial && err instanceof MalformedInputError) {
        throw new DataNotReadyError(`${site} coordinate feed ends in a partial row ${frameIndex + 1}: "${row}"`);
      }
      throw err;
    }
  });
}

/**
 * Force ramp rows `frameIndex,torqueNm` after a header. Samples keep file
 * order; pairing with elongation is by position.
 *
 * @throws DataNotReadyError when the file has no data rows yet
 * @throws MalformedInputError on a bad row
 */
export function parseForceRampCsv(text: string): ForceSample[] {
  const rows = dataRows(text);
  if (rows.length === 0) {
    throw new DataNotReadyError("Force ramp has no data rows yet");
  }

  return rows.map((row, i) => {
    const fields = row.split(",");
    if (fields.length !== 2) {
      throw new MalformedInputError(`Force ramp row ${i + 1} has ${fields.length} field(s), expected 2`);
    }
    const frameIndex = parseField(fields[0], `Force ramp row ${i + 1}`);
    if (!Number.isInteger(frameIndex) || frameIndex < 0) {
      throw new MalformedInputError(`Force ramp row ${i + 1} has invalid frame index ${frameIndex}`);
    }
    return { frameIndex, torqueNm: parseField(fields[1], `Force ramp row ${i + 1}`) };
  });
}

// ─── File access ────────────────────────────────────────────────────────────────

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/**
 * Reads a feed file as text.
 * @throws DataNotReadyError when the file does not exist or is empty
 */
export async function readFeedFile(filePath: string): Promise<string> {
  let text: string;
  try {
    text = await readFile(filePath, "utf-8");
  } catch (err) {
    if (isMissingFile(err)) {
      throw new DataNotReadyError(`Feed file not found yet: ${filePath}`);
    }
    throw err;
  }
  if (text.trim().length === 0) {
    throw new DataNotReadyError(`Feed file is empty: ${filePath}`);
  }
  return text;
}

export async function readTrajectoryFile(
  filePath: string,
  site: Site,
  options: CoordinateCsvOptions = {},
): Promise<Observation[]> {
  return parseCoordinateCsv(await readFeedFile(filePath), site, options);
}

// ─── Polling ────────────────────────────────────────────────────────────────────

export interface PollOptions {
  /** Total attempts, including the first. */
  attempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  /** Injectable for tests. */
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
}

export const DEFAULT_POLL_OPTIONS: Readonly<PollOptions> = {
  attempts: 5,
  initialDelayMs: 200,
  maxDelayMs: 3000,
};

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Calls `read` until it succeeds, retrying only on DataNotReadyError with a
 * doubling delay capped at `maxDelayMs`. Any other error, or the last
 * DataNotReadyError once attempts run out, propagates.
 */
export async function pollWithBackoff<T>(read: () => Promise<T>, options: Partial<PollOptions> = {}): Promise<T> {
  const { attempts, initialDelayMs, maxDelayMs } = { ...DEFAULT_POLL_OPTIONS, ...options };
  const sleep = options.sleep ?? defaultSleep;
  const logger = options.logger ?? silentLogger;
  let delay = initialDelayMs;

  for (let attempt = 1; ; attempt++) {
    try {
      return await read();
    } catch (err) {
      if (!(err instanceof DataNotReadyError) || attempt >= attempts) {
        throw err;
      }
      logger.warn(`${err.message}; retrying in ${delay}ms (attempt ${attempt}/${attempts})`);
      await sleep(delay);
      delay = Math.min(delay * 2, maxDelayMs);
    }
  }
}
