import { InvalidObservationError } from "./errors";
import type { HandObservation, Landmark } from "./types";
import { HAND_SIDES } from "./types";

export const LANDMARK_COUNT = 21;

export const HandLandmark = {
  WRIST: 0,
  THUMB_TIP: 4,
  INDEX_MCP: 5,
  INDEX_TIP: 8,
  MIDDLE_MCP: 9,
  MIDDLE_TIP: 12,
  RING_MCP: 13,
  RING_TIP: 16,
  PINKY_MCP: 17,
  PINKY_TIP: 20,
} as const;

/** [tip, mcp] pairs for the four non-thumb fingers. */
export const FINGER_JOINTS: ReadonlyArray<readonly [tip: number, mcp: number]> = [
  [HandLandmark.INDEX_TIP, HandLandmark.INDEX_MCP],
  [HandLandmark.MIDDLE_TIP, HandLandmark.MIDDLE_MCP],
  [HandLandmark.RING_TIP, HandLandmark.RING_MCP],
  [HandLandmark.PINKY_TIP, HandLandmark.PINKY_MCP],
];

export function distanceSquared3D(a: Landmark, b: Landmark): number {
  const dx = a.x - b.x;
  const dy = a.y - b.y;
  const dz = a.z - b.z;
  return dx * dx + dy * dy + dz * dz;
}

/**
 * Reads landmark `index`, throwing when the hand does not carry it. Callers
 * run after {@link assertValidObservation}, so this only guards direct use.
 */
export function landmarkAt(landmarks: readonly Landmark[], index: number): Landmark {
  const landmark = landmarks[index];
  if (!landmark) {
    throw new RangeError(`Missing landmark ${index} (hand has ${landmarks.length})`);
  }
  return landmark;
}

export function assertValidObservation(hand: HandObservation, handIndex: number): void {
  if (!HAND_SIDES.includes(hand.label)) {
    throw new InvalidObservationError(handIndex, `unknown label ${JSON.stringify(hand.label)}`);
  }
  if (!Array.isArray(hand.landmarks) || hand.landmarks.length !== LANDMARK_COUNT) {
    const count = Array.isArray(hand.landmarks) ? hand.landmarks.length : 0;
    throw new InvalidObservationError(handIndex, `expected ${LANDMARK_COUNT} landmarks, got ${count}`);
  }
  hand.landmarks.forEach((landmark, id) => {
    if (!isFiniteNumber(landmark?.x) || !isFiniteNumber(landmark?.y) || !isFiniteNumber(landmark?.z)) {
      throw new InvalidObservationError(handIndex, `landmark ${id} has non-finite coordinates`);
    }
  });
}

function isFiniteNumber(value: unknown): value is number {
  return typeof value === "number" && Number.isFinite(value);
}
