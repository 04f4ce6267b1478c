import { describe, it, expect, vi } from "vitest";
import {
  DEFAULT_KALMAN_CONFIG,
  KalmanTracker,
  assertContiguousFrames,
  smoothTrajectory,
} from "./kalman-tracker.js";
import { MalformedInputError } from "./errors.js";
import { Site, type Observation } from "./types.js";

function createMockLogger() {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

function observationsOf(points: Array<[number, number]>): Observation[] {
  return points.map(([x, y], frameIndex) => ({ frameIndex, x, y }));
}

describe("KalmanTracker", () => {
  it("has no state before the first observation", () => {
    const tracker = new KalmanTracker(Site.DISTAL);
    tracker.predict();
    expect(tracker.state()).toBeNull();
  });

  it("initializes at the first observation with zero velocity", () => {
    const tracker = new KalmanTracker(Site.DISTAL);
    expect(tracker.update({ x: 12, y: -3 })).toBe(true);

    const state = tracker.state();
    expect(state?.position).toEqual({ x: 12, y: -3 });
    expect(state?.velocity).toEqual({ x: 0, y: 0 });
    expect(state?.covariance.x).toEqual([1000, 0, 1000]);
    expect(state?.updates).toBe(1);
  });

  it("applies predict then update with the standard gain", () => {
    const tracker = new KalmanTracker(Site.DISTAL);
    tracker.update({ x: 0, y: 0 });
    tracker.predict();
    tracker.update({ x: 10, y: 0 });

    // After predict: p00 = 1000 + 1000 + 0.1 = 2000.1, p01 = 1000, p11 = 1000.1
    const s = 2000.1 + 1;
    const state = tracker.state();
    expect(state?.position.x).toBeCloseTo((2000.1 / s) * 10, 10);
    expect(state?.velocity.x).toBeCloseTo((1000 / s) * 10, 10);
    expect(state?.covariance.x[0]).toBeCloseTo((1 - 2000.1 / s) * 2000.1, 10);
    expect(state?.position.y).toBe(0);
  });

  it("does not gate when the threshold is 0", () => {
    const tracker = new KalmanTracker(Site.PROXIMAL, { accelerationGateThreshold: 0 });
    tracker.update({ x: 0, y: 0 });
    tracker.predict();
    expect(tracker.update({ x: 500, y: 500 })).toBe(true);
  });

  it("skips the update when the implied acceleration exceeds the gate", () => {
    const tracker = new KalmanTracker(Site.PROXIMAL, { accelerationGateThreshold: 5 });
    tracker.update({ x: 0, y: 0 });
    tracker.predict();
    expect(tracker.update({ x: 100, y: 0 })).toBe(false);

    // Prediction only: the estimate stays where the model put it.
    expect(tracker.state()?.position).toEqual({ x: 0, y: 0 });
    expect(tracker.state()?.updates).toBe(1);
  });

  it("accepts small moves under the gate", () => {
    const tracker = new KalmanTracker(Site.PROXIMAL, { accelerationGateThreshold: 5 });
    tracker.update({ x: 0, y: 0 });
    tracker.predict();
    expect(tracker.update({ x: 3, y: 4 })).toBe(true);
  });
});

describe("assertContiguousFrames", () => {
  it("accepts a stream that starts above zero", () => {
    expect(() =>
      assertContiguousFrames(
        [
          { frameIndex: 4, x: 0, y: 0 },
          { frameIndex: 5, x: 1, y: 1 },
        ],
        Site.DISTAL,
      ),
    ).not.toThrow();
  });

  it("rejects a gap in frame numbering", () => {
    expect(() =>
      assertContiguousFrames(
        [
          { frameIndex: 0, x: 0, y: 0 },
          { frameIndex: 2, x: 1, y: 1 },
        ],
        Site.DISTAL,
      ),
    ).toThrow(MalformedInputError);
  });

  it("rejects non-finite coordinates", () => {
    expect(() => assertContiguousFrames([{ frameIndex: 0, x: NaN, y: 0 }], Site.DISTAL)).toThrow(
      "distal observation at frame 0 has non-finite coordinates",
    );
  });

  it("rejects a negative frame index", () => {
    expect(() => assertContiguousFrames([{ frameIndex: -1, x: 0, y: 0 }], Site.PROXIMAL)).toThrow(
      MalformedInputError,
    );
  });
});

describe("smoothTrajectory", () => {
  it("returns one point per frame and the first frame verbatim", () => {
    const trajectory = smoothTrajectory(Site.DISTAL, observationsOf([[10, 10], [10.2, 9.8], [50, 50], [10.1, 10.1]]));

    expect(trajectory.site).toBe(Site.DISTAL);
    expect(trajectory.points.map((p) => p.frameIndex)).toEqual([0, 1, 2, 3]);
    expect(trajectory.points[0]).toEqual({ frameIndex: 0, x: 10, y: 10 });
    expect(trajectory.points[1].x).toBeCloseTo(10.199900054969765, 9);
    expect(trajectory.points[2].x).toBeCloseTo(49.921147525529044, 9);
  });

  it("logs that gating is disabled by default", () => {
    const logger = createMockLogger();
    smoothTrajectory(Site.DISTAL, observationsOf([[0, 0]]), { logger });
    expect(DEFAULT_KALMAN_CONFIG.accelerationGateThreshold).toBe(0);
    expect(logger.info).toHaveBeenCalledWith("distal: acceleration gating disabled (threshold 0)");
  });

  it("warns with the number of gated frames", () => {
    const logger = createMockLogger();
    smoothTrajectory(Site.PROXIMAL, observationsOf([[0, 0], [0, 0], [100, 0]]), {
      config: { accelerationGateThreshold: 5 },
      logger,
    });
    expect(logger.warn).toHaveBeenCalledWith("proximal: 1 of 3 frames were gated to prediction only");
  });

  it("returns an empty trajectory for no observations", () => {
    expect(smoothTrajectory(Site.DISTAL, []).points).toEqual([]);
  });
});
