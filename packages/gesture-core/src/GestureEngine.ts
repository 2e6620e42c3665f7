import { classifyGesture } from "./fold";
import { HandStateStore } from "./HandStateStore";
import { HandLandmark, assertValidObservation, landmarkAt } from "./landmarks";
import { isPinching } from "./pinch";
import { createSnapDetector } from "./SnapDetector";
import type { SnapDetector } from "./SnapDetector";
import type {
  FrameResult,
  GestureEngineOptions,
  HandResult,
  HandSide,
  HandTemporalState,
  ObservationBatch,
  SnapEvent,
  SnapPolicy,
} from "./types";

type ResolvedOptions = Required<Omit<GestureEngineOptions, "onSnap">>;

const DEFAULTS: ResolvedOptions = {
  policy: "VelocityGated",
  edgePinchThresholdSq: 0.002,
  velocityPinchThresholdSq: 0.004,
  velocityThreshold: 0.04,
};

export class GestureEngine {
  private readonly options: ResolvedOptions;
  private readonly detector: SnapDetector;
  private readonly states = new HandStateStore();
  private readonly onSnap?: (event: SnapEvent) => void;

  constructor(opts?: GestureEngineOptions) {
    // Explicit undefined falls back to the default as well.
    this.options = {
      policy: opts?.policy ?? DEFAULTS.policy,
      edgePinchThresholdSq: opts?.edgePinchThresholdSq ?? DEFAULTS.edgePinchThresholdSq,
      velocityPinchThresholdSq: opts?.velocityPinchThresholdSq ?? DEFAULTS.velocityPinchThresholdSq,
      velocityThreshold: opts?.velocityThreshold ?? DEFAULTS.velocityThreshold,
    };
    this.detector = createSnapDetector(this.options.policy, this.options);
    this.onSnap = opts?.onSnap;
  }

  get policy(): SnapPolicy {
    return this.detector.policy;
  }

  /**
   * Evaluates one frame. Returns null when no hand was observed; such a frame
   * leaves every hand state as it was. Throws InvalidObservationError before
   * touching state if any hand is malformed.
   */
  process(batch: ObservationBatch): FrameResult | null {
    batch.hands.forEach((hand, index) => assertValidObservation(hand, index));
    if (batch.hands.length === 0) return null;

    const staged = new Map<HandSide, HandTemporalState>();
    const events: SnapEvent[] = [];
    const hands: HandResult[] = [];
    let snap = false;

    for (const hand of batch.hands) {
      const gesture = classifyGesture(hand.landmarks);
      const pinching = isPinching(hand.landmarks, this.detector.pinchThresholdSq);
      const middleTipY = landmarkAt(hand.landmarks, HandLandmark.MIDDLE_TIP).y;

      // A side repeated within one frame sees the update of its earlier entry.
      const current = staged.get(hand.label) ?? this.states.get(hand.label);
      const step = this.detector.step(current, pinching, middleTipY);
      staged.set(hand.label, step.next);

      if (step.fired) {
        snap = true;
        events.push({
          label: hand.label,
          policy: this.detector.policy,
          velocity: step.velocity,
          timestamp: batch.timestamp,
        });
      }
      hands.push({ label: hand.label, landmarks: hand.landmarks, gesture });
    }

    this.states.commit(staged);
    for (const event of events) {
      try {
        this.onSnap?.(event);
      } catch (err) {
        // The frame is already committed; a failing hook must not lose it.
        console.error("gesture-core: onSnap hook failed", err);
      }
    }
    return { hands, snap };
  }

  getState(side: HandSide): HandTemporalState {
    return { ...this.states.get(side) };
  }

  snapshot(): Record<HandSide, HandTemporalState> {
    return this.states.snapshot();
  }

  reset(): void {
    this.states.reset();
  }
}

export { DEFAULTS as defaultGestureEngineOptions };
