export type HandSide = "Left" | "Right";

export const HAND_SIDES: readonly HandSide[] = ["Left", "Right"];

export interface Landmark {
  x: number;
  y: number;
  z: number;
}

export interface HandObservation {
  label: HandSide;
  landmarks: readonly Landmark[];
}

export interface ObservationBatch {
  hands: readonly HandObservation[];
  timestamp?: number;
}

export type Gesture = "Fist" | "Open" | "Neutral";

export type SnapPolicy = "EdgeTriggered" | "VelocityGated";

export interface HandTemporalState {
  isPinching: boolean;
  prevMiddleTipY: number;
  /** False until the first frame that observes this side has been committed. */
  observed: boolean;
}

export interface HandResult {
  label: HandSide;
  landmarks: readonly Landmark[];
  gesture: Gesture;
}

export interface FrameResult {
  hands: HandResult[];
  snap: boolean;
}

export interface SnapEvent {
  label: HandSide;
  policy: SnapPolicy;
  /** Absolute per-frame change of the middle fingertip's y coordinate. */
  velocity: number;
  timestamp?: number;
}

export interface GestureEngineOptions {
  policy?: SnapPolicy;
  edgePinchThresholdSq?: number;
  velocityPinchThresholdSq?: number;
  velocityThreshold?: number;
  onSnap?: (event: SnapEvent) => void;
}

export interface PayloadFields {
  gesture: boolean;
  snap: boolean;
}

export interface PayloadLandmark {
  id: number;
  x: number;
  y: number;
  z: number;
}

export interface PayloadHand {
  label: HandSide;
  landmarks: PayloadLandmark[];
  gesture?: Gesture;
}

export interface HandPayload {
  hands: PayloadHand[];
  snap?: boolean;
}
