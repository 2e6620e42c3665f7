import { HandLandmark, distanceSquared3D, landmarkAt } from "./landmarks";
import type { Landmark } from "./types";

export function pinchDistanceSq(landmarks: readonly Landmark[]): number {
  return distanceSquared3D(
    landmarkAt(landmarks, HandLandmark.THUMB_TIP),
    landmarkAt(landmarks, HandLandmark.MIDDLE_TIP)
  );
}

/** Thumb tip to middle tip, compared as squared distance (strict). */
export function isPinching(landmarks: readonly Landmark[], thresholdSq: number): boolean {
  return pinchDistanceSq(landmarks) < thresholdSq;
}
