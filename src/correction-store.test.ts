import { describe, it, expect } from "vitest";
import { CorrectionStore } from "./correction-store.js";
import { MalformedInputError } from "./errors.js";
import { Site, type Trajectory } from "./types.js";

function makeTrajectory(site = Site.DISTAL): Trajectory {
  return {
    site,
    points: [
      { frameIndex: 0, x: 1, y: 1 },
      { frameIndex: 1, x: 2, y: 2 },
      { frameIndex: 2, x: 3, y: 3 },
    ],
  };
}

describe("CorrectionStore", () => {
  it("starts empty and returns an equal copy", () => {
    const store = new CorrectionStore();
    const trajectory = makeTrajectory();
    const effective = store.effective(trajectory);

    expect(store.size).toBe(0);
    expect(effective).toEqual(trajectory);
    expect(effective).not.toBe(trajectory);
    expect(effective.points[0]).not.toBe(trajectory.points[0]);
  });

  it("overrides only the matching frame and site", () => {
    const store = new CorrectionStore();
    store.set(1, Site.DISTAL, 20, 21);
    store.set(2, Site.PROXIMAL, 99, 99);

    expect(store.effective(makeTrajectory(Site.DISTAL)).points).toEqual([
      { frameIndex: 0, x: 1, y: 1 },
      { frameIndex: 1, x: 20, y: 21 },
      { frameIndex: 2, x: 3, y: 3 },
    ]);
    expect(store.effective(makeTrajectory(Site.PROXIMAL)).points[2]).toEqual({ frameIndex: 2, x: 99, y: 99 });
  });

  it("keeps the last write for a key", () => {
    const store = new CorrectionStore();
    store.set(0, Site.DISTAL, 5, 5);
    store.set(0, Site.DISTAL, 6, 7);

    expect(store.size).toBe(1);
    expect(store.get(0, Site.DISTAL)).toEqual({ frameIndex: 0, site: Site.DISTAL, x: 6, y: 7 });
  });

  it("never mutates the smoothed trajectory", () => {
    const store = new CorrectionStore();
    const trajectory = makeTrajectory();
    store.set(0, Site.DISTAL, 100, 100);
    store.effective(trajectory);

    expect(trajectory).toEqual(makeTrajectory());
  });

  it("ignores overrides for frames outside the trajectory", () => {
    const store = new CorrectionStore();
    store.set(50, Site.DISTAL, 0, 0);
    expect(store.effective(makeTrajectory())).toEqual(makeTrajectory());
  });

  it("rejects invalid frame indices and coordinates", () => {
    const store = new CorrectionStore();
    expect(() => store.set(-1, Site.DISTAL, 0, 0)).toThrow(MalformedInputError);
    expect(() => store.set(1.5, Site.DISTAL, 0, 0)).toThrow(MalformedInputError);
    expect(() => store.set(0, Site.DISTAL, Infinity, 0)).toThrow(MalformedInputError);
    expect(store.size).toBe(0);
  });

  it("applies a batch in order", () => {
    const store = new CorrectionStore();
    store.setMany([
      { frameIndex: 0, site: Site.DISTAL, x: 1, y: 1 },
      { frameIndex: 0, site: Site.DISTAL, x: 2, y: 2 },
      { frameIndex: 1, site: Site.PROXIMAL, x: 3, y: 3 },
    ]);

    expect(store.size).toBe(2);
    expect(store.get(0, Site.DISTAL)?.x).toBe(2);
  });

  it("leaves the store untouched when a batch has a bad entry", () => {
    const store = new CorrectionStore();
    store.set(0, Site.DISTAL, 1, 1);

    expect(() =>
      store.setMany([
        { frameIndex: 1, site: Site.DISTAL, x: 1, y: 1 },
        { frameIndex: 2, site: Site.DISTAL, x: NaN, y: 1 },
      ]),
    ).toThrow(MalformedInputError);
    expect(store.list()).toEqual([{ frameIndex: 0, site: Site.DISTAL, x: 1, y: 1 }]);
  });

  it("lists overrides by site then frame", () => {
    const store = new CorrectionStore();
    store.set(3, Site.PROXIMAL, 0, 0);
    store.set(2, Site.DISTAL, 0, 0);
    store.set(1, Site.PROXIMAL, 0, 0);

    expect(store.list().map((c) => `${c.site}:${c.frameIndex}`)).toEqual(["distal:2", "proximal:1", "proximal:3"]);
  });

  describe("reset", () => {
    it("clears every override and reports how many", () => {
      const store = new CorrectionStore();
      store.set(0, Site.DISTAL, 9, 9);
      store.set(1, Site.PROXIMAL, 9, 9);

      expect(store.reset({ confirmed: true })).toBe(2);
      expect(store.size).toBe(0);
      expect(store.effective(makeTrajectory())).toEqual(makeTrajectory());
    });

    it("refuses to run without confirmation", () => {
      const store = new CorrectionStore();
      store.set(0, Site.DISTAL, 9, 9);
      const unconfirmed: unknown = { confirmed: false };

      expect(() => store.reset(unconfirmed as { confirmed: true })).toThrow(MalformedInputError);
      expect(() => store.reset(unconfirmed as { confirmed: true })).toThrow(
        "Correction reset must be explicitly confirmed",
      );
      expect(store.size).toBe(1);
    });
  });
});
