import { FINGER_JOINTS, HandLandmark, distanceSquared3D, landmarkAt } from "./landmarks";
import type { Gesture, Landmark } from "./types";

/**
 * Counts the non-thumb fingers whose tip sits closer to the wrist than the
 * finger's own knuckle. Squared distances only, so the count holds under any
 * rigid rotation of the hand.
 */
export function countFoldedFingers(landmarks: readonly Landmark[]): number {
  const wrist = landmarkAt(landmarks, HandLandmark.WRIST);
  let folded = 0;
  for (const [tip, mcp] of FINGER_JOINTS) {
    const tipDistance = distanceSquared3D(wrist, landmarkAt(landmarks, tip));
    const mcpDistance = distanceSquared3D(wrist, landmarkAt(landmarks, mcp));
    if (tipDistance < mcpDistance) folded += 1;
  }
  return folded;
}

export function classifyGesture(landmarks: readonly Landmark[]): Gesture {
  const folded = countFoldedFingers(landmarks);
  if (folded >= 3) return "Fist";
  if (folded === 0) return "Open";
  return "Neutral";
}
