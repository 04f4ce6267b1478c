// Tendon Stiffness Analyzer - Correction Store
//
// Manual overrides layered over the smoothed trajectories. The trajectories
// themselves are never touched: effective() builds a fresh copy on each call,
// and reset() drops every override at once.

import { MalformedInputError } from "./errors.js";
import type { Correction, ResetConfirmation, Site, Trajectory } from "./types.js";

function keyOf(frameIndex: number, site: Site): string {
  return `${site}:${frameIndex}`;
}

export class CorrectionStore {
  private overrides: Map<string, Correction> = new Map();

  /** Upsert; a later write for the same (frame, site) replaces the earlier one. */
  set(frameIndex: number, site: Site, x: number, y: number): void {
    if (!Number.isInteger(frameIndex) || frameIndex < 0) {
      throw new MalformedInputError(`Correction frame index must be a non-negative integer, got ${frameIndex}`);
    }
    if (!Number.isFinite(x) || !Number.isFinite(y)) {
      throw new MalformedInputError(`Correction for ${site} frame ${frameIndex} has non-finite coordinates`);
    }
    this.overrides.set(keyOf(frameIndex, site), { frameIndex, site, x, y });
  }

  /**
   * Applies a batch in order. Validation happens up front so a bad entry
   * leaves the store unchanged.
   */
  setMany(corrections: readonly Correction[]): void {
    const probe = new CorrectionStore();
    for (const c of corrections) probe.set(c.frameIndex, c.site, c.x, c.y);
    for (const c of corrections) this.set(c.frameIndex, c.site, c.x, c.y);
  }

  get(frameIndex: number, site: Site): Correction | undefined {
    return this.overrides.get(keyOf(frameIndex, site));
  }

  get size(): number {
    return this.overrides.size;
  }

  /** Overrides sorted by site, then frame. */
  list(): Correction[] {
    return [...this.overrides.values()].sort(
      (a, b) => a.site.localeCompare(b.site) || a.frameIndex - b.frameIndex,
    );
  }

  /**
   * Copy of `trajectory` with this store's overrides for its site applied.
   * Overrides for frames the trajectory does not contain are ignored.
   */
  effective(trajectory: Trajectory): Trajectory {
    return {
      site: trajectory.site,
      points: trajectory.points.map((p) => {
        const override = this.overrides.get(keyOf(p.frameIndex, trajectory.site));
        return override
          ? { frameIndex: p.frameIndex, x: override.x, y: override.y }
          : { frameIndex: p.frameIndex, x: p.x, y: p.y };
      }),
    };
  }

  /**
   * Drops every override. Irreversible for the session, so the caller has to
   * pass an explicit confirmation.
   * @returns how many overrides were cleared
   */
  reset(confirmation: ResetConfirmation): number {
    if (confirmation.confirmed !== true) {
      throw new MalformedInputError("Correction reset must be explicitly confirmed");
    }
    const cleared = this.overrides.size;
    this.overrides.clear();
    return cleared;
  }
}
