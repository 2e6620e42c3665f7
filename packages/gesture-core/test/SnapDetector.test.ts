import { describe, expect, it } from "vitest";
import {
  EdgeTriggeredSnapDetector,
  VelocityGatedSnapDetector,
  createSnapDetector,
  initialHandState,
} from "../src";
import type { HandTemporalState, SnapDetector } from "../src";

function run(detector: SnapDetector, frames: Array<[pinching: boolean, middleTipY: number]>): boolean[] {
  let state: HandTemporalState = initialHandState();
  return frames.map(([pinching, y]) => {
    const step = detector.step(state, pinching, y);
    state = step.next;
    return step.fired;
  });
}

describe("EdgeTriggeredSnapDetector", () => {
  const detector = new EdgeTriggeredSnapDetector(0.002);

  it("fires once, on the first touching frame", () => {
    const fired = run(detector, [
      [false, 0.4],
      [true, 0.4],
      [true, 0.4],
      [false, 0.4],
    ]);
    expect(fired).toEqual([false, true, false, false]);
  });

  it("never fires for a hand already pinching when first seen", () => {
    expect(run(detector, [[true, 0.4], [true, 0.4], [true, 0.4]])).toEqual([false, false, false]);
  });

  it("fires again after a full release", () => {
    const fired = run(detector, [
      [false, 0.4],
      [true, 0.4],
      [false, 0.4],
      [true, 0.4],
    ]);
    expect(fired).toEqual([false, true, false, true]);
  });
});

describe("VelocityGatedSnapDetector", () => {
  const detector = new VelocityGatedSnapDetector(0.004, 0.04);

  it("fires on a fast release", () => {
    expect(run(detector, [[true, 0.4], [false, 0.49]])).toEqual([false, true]);
  });

  it("does not fire on a slow release", () => {
    expect(run(detector, [[true, 0.4], [false, 0.41]])).toEqual([false, false]);
  });

  it("measures velocity in either direction", () => {
    expect(run(detector, [[true, 0.4], [false, 0.31]])).toEqual([false, true]);
  });

  it("ignores fast motion without a release", () => {
    expect(run(detector, [[false, 0.1], [false, 0.9], [true, 0.1], [true, 0.9]])).toEqual([
      false,
      false,
      false,
      false,
    ]);
  });

  it("never fires on the first observation", () => {
    const step = detector.step(initialHandState(), false, 0.9);
    expect(step.fired).toBe(false);
    expect(step.velocity).toBe(0);
  });

  it("uses a strict velocity bound", () => {
    const state: HandTemporalState = { isPinching: true, prevMiddleTipY: 0.5, observed: true };
    expect(detector.step(state, false, 0.75).velocity).toBe(0.25);
    expect(new VelocityGatedSnapDetector(0.004, 0.25).step(state, false, 0.75).fired).toBe(false);
  });

  it("updates state whether or not it fired", () => {
    const state: HandTemporalState = { isPinching: true, prevMiddleTipY: 0.4, observed: true };
    expect(detector.step(state, false, 0.41).next).toEqual({
      isPinching: false,
      prevMiddleTipY: 0.41,
      observed: true,
    });
    expect(detector.step(state, false, 0.6).next).toEqual({
      isPinching: false,
      prevMiddleTipY: 0.6,
      observed: true,
    });
  });
});

describe("createSnapDetector", () => {
  const options = { edgePinchThresholdSq: 0.002, velocityPinchThresholdSq: 0.004, velocityThreshold: 0.04 };

  it("picks the pinch threshold that belongs to each policy", () => {
    const edge = createSnapDetector("EdgeTriggered", options);
    const velocity = createSnapDetector("VelocityGated", options);
    expect(edge.policy).toBe("EdgeTriggered");
    expect(edge.pinchThresholdSq).toBe(0.002);
    expect(velocity.policy).toBe("VelocityGated");
    expect(velocity.pinchThresholdSq).toBe(0.004);
  });
});
