import { HandLandmark } from "./landmarks";
import type { HandSide } from "./types";

export type Vector3 = { x: number; y: number; z: number };

type LandmarkWithId = { id: number; x: number; y: number; z: number };

/**
 * Unit normal of the palm plane spanned by wrist, index MCP and pinky MCP.
 * Returns the zero vector when the three points are collinear or a joint is
 * missing.
 */
export function palmNormal(hand: { label: HandSide; landmarks: readonly LandmarkWithId[] }): Vector3 {
  const find = (id: number) => hand.landmarks.find((lm) => lm.id === id);
  const wrist = find(HandLandmark.WRIST);
  const index = find(HandLandmark.INDEX_MCP);
  const pinky = find(HandLandmark.PINKY_MCP);
  if (!wrist || !index || !pinky) return { x: 0, y: 0, z: 0 };

  // Image y grows downward.
  const toIndex = { x: index.x - wrist.x, y: wrist.y - index.y, z: index.z - wrist.z };
  const toPinky = { x: pinky.x - wrist.x, y: wrist.y - pinky.y, z: pinky.z - wrist.z };
  const normal = hand.label === "Right" ? cross(toIndex, toPinky) : cross(toPinky, toIndex);
  const length = Math.hypot(normal.x, normal.y, normal.z);
  if (length === 0 || !Number.isFinite(length)) return { x: 0, y: 0, z: 0 };
  return { x: normal.x / length, y: -normal.y / length, z: normal.z / length };
}

/** True when both normals are non-zero and point within acos(minDot) of each other. */
export function palmsAligned(a: Vector3, b: Vector3, minDot = 0.5): boolean {
  return dot(a, b) > minDot;
}

function cross(a: Vector3, b: Vector3): Vector3 {
  return {
    x: a.y * b.z - a.z * b.y,
    y: a.z * b.x - a.x * b.z,
    z: a.x * b.y - a.y * b.x,
  };
}

function dot(a: Vector3, b: Vector3): number {
  return a.x * b.x + a.y * b.y + a.z * b.z;
}
