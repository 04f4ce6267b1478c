// Tendon Stiffness Analyzer - File Persistence
// Opt-in saving of session outputs to disk.
//
// Files are only written when the operator asks for an export. Session data
// lives in server memory until then.

import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { Site } from "./types.js";
import type { Session, SiteRecord, Trajectory } from "./types.js";

export const TRAJECTORY_CSV_HEADER = "frame_index,x,y";

/**
 * Renders a trajectory as CSV:
 *   frame_index,x,y
 *   0,120.5,88.25
 */
export function formatTrajectoryCsv(trajectory: Trajectory): string {
  const rows = trajectory.points.map((p) => `${p.frameIndex},${p.x},${p.y}`);
  return [TRAJECTORY_CSV_HEADER, ...rows].join("\n") + "\n";
}

export function formatJson(value: unknown): string {
  return JSON.stringify(value, null, 2);
}

/**
 * Generates the output directory name from a session.
 * Format: `{YYYY-MM-DD_HH-mm-ss}_{sessionId}`, stamped with the load time.
 */
export function buildDirectoryName(session: Session): string {
  const date = session.loadedAt ?? session.createdAt;
  const year = date.getFullYear();
  const month = String(date.getMonth() + 1).padStart(2, "0");
  const day = String(date.getDate()).padStart(2, "0");
  const hours = String(date.getHours()).padStart(2, "0");
  const minutes = String(date.getMinutes()).padStart(2, "0");
  const seconds = String(date.getSeconds()).padStart(2, "0");

  const timestamp = `${year}-${month}-${day}_${hours}-${minutes}-${seconds}`;
  return `${timestamp}_${session.id}`;
}

/**
 * FilePersistence handles opt-in saving of session outputs to disk.
 *
 * Output directory structure:
 *   {baseDir}/{YYYY-MM-DD_HH-mm-ss}_{sessionId}/
 *     distal_effective.csv
 *     proximal_effective.csv
 *     distal_raw.csv      (once observations are loaded)
 *     proximal_raw.csv
 *     anomalies.json      (once trajectories are loaded)
 *     corrections.json    (if any overrides are held)
 *     calibration.json    (once calibrated)
 *     stiffness.json      (once computed)
 */
export class FilePersistence {
  private baseDir: string;

  constructor(baseDir: string = "output") {
    this.baseDir = baseDir;
  }

  /**
   * Writes the effective trajectories, the raw observations they were
   * smoothed from, and whatever analysis results the session has so far. Sets session.outputsSaved after a successful save.
   *
   * @returns paths of the files written, in write order
   */
  async saveSession(session: Session, effective: SiteRecord<Trajectory>): Promise<string[]> {
    const dirPath = join(this.baseDir, buildDirectoryName(session));
    await mkdir(dirPath, { recursive: true });

    const savedPaths: string[] = [];
    const write = async (name: string, content: string) => {
      const filePath = join(dirPath, name);
      await writeFile(filePath, content, "utf-8");
      savedPaths.push(filePath);
    };

    await write("distal_effective.csv", formatTrajectoryCsv(effective[Site.DISTAL]));
    await write("proximal_effective.csv", formatTrajectoryCsv(effective[Site.PROXIMAL]));

    if (session.observations) {
      for (const site of [Site.DISTAL, Site.PROXIMAL]) {
        await write(`${site}_raw.csv`, formatTrajectoryCsv({ site, points: session.observations[site] }));
      }
    }

    if (session.anomalies) {
      await write("anomalies.json", formatJson(session.anomalies));
    }
    if (session.corrections.size > 0) {
      await write("corrections.json", formatJson(session.corrections.list()));
    }
    if (session.calibration) {
      await write("calibration.json", formatJson(session.calibration));
    }
    if (session.lastStiffness) {
      await write("stiffness.json", formatJson(session.lastStiffness));
    }

    session.outputsSaved = true;
    return savedPaths;
  }
}
