import type { HandTemporalState, SnapPolicy } from "./types";

export type SnapStep = {
  fired: boolean;
  velocity: number;
  next: HandTemporalState;
};

export interface SnapDetector {
  readonly policy: SnapPolicy;
  /** Squared thumb-to-middle distance below which the hand counts as pinching. */
  readonly pinchThresholdSq: number;
  step(state: Readonly<HandTemporalState>, pinching: boolean, middleTipY: number): SnapStep;
}

export interface SnapDetectorOptions {
  edgePinchThresholdSq: number;
  velocityPinchThresholdSq: number;
  velocityThreshold: number;
}

/**
 * Fires the instant thumb and middle finger first touch (Apart -> Touching).
 */
export class EdgeTriggeredSnapDetector implements SnapDetector {
  readonly policy = "EdgeTriggered";

  constructor(readonly pinchThresholdSq: number) {}

  step(state: Readonly<HandTemporalState>, pinching: boolean, middleTipY: number): SnapStep {
    const velocity = state.observed ? Math.abs(middleTipY - state.prevMiddleTipY) : 0;
    const fired = state.observed && !state.isPinching && pinching;
    return { fired, velocity, next: nextState(pinching, middleTipY) };
  }
}

/**
 * Fires on release (Touching -> Apart), and only when the middle fingertip
 * moved faster than `velocityThreshold` along y during that frame.
 */
export class VelocityGatedSnapDetector implements SnapDetector {
  readonly policy = "VelocityGated";

  constructor(
    readonly pinchThresholdSq: number,
    readonly velocityThreshold: number
  ) {}

  step(state: Readonly<HandTemporalState>, pinching: boolean, middleTipY: number): SnapStep {
    // No prior sample on the first observation, so no velocity to gate on.
    const velocity = state.observed ? Math.abs(middleTipY - state.prevMiddleTipY) : 0;
    const released = state.observed && state.isPinching && !pinching;
    const fired = released && velocity > this.velocityThreshold;
    return { fired, velocity, next: nextState(pinching, middleTipY) };
  }
}

export function createSnapDetector(policy: SnapPolicy, options: SnapDetectorOptions): SnapDetector {
  switch (policy) {
    case "EdgeTriggered":
      return new EdgeTriggeredSnapDetector(options.edgePinchThresholdSq);
    case "VelocityGated":
      return new VelocityGatedSnapDetector(options.velocityPinchThresholdSq, options.velocityThreshold);
  }
}

function nextState(pinching: boolean, middleTipY: number): HandTemporalState {
  return { isPinching: pinching, prevMiddleTipY: middleTipY, observed: true };
}
