import type { Hand } from "@tensorflow-models/hand-pose-detection";
import type { HandObservation, Landmark } from "@handsnap/gesture-core";

export type Detection = Pick<Hand, "handedness" | "keypoints" | "keypoints3D">;

export interface FrameSize {
  width: number;
  height: number;
}

export interface MapDetectionsOptions {
  /** Flip x, for detections made on an unmirrored camera frame. */
  mirror?: boolean;
}

/**
 * Converts hand-pose-detection output into observations. Image keypoints are
 * in pixels and are divided by the frame size; pass a 1x1 frame for keypoints
 * that are already normalized. z comes from the keypoint itself or, failing
 * that, from `keypoints3D`.
 */
export function mapDetectionsToObservations(
  detections: readonly Detection[],
  frame: FrameSize,
  options: MapDetectionsOptions = {}
): HandObservation[] {
  const width = frame.width || 1;
  const height = frame.height || 1;

  return detections.map((detection) => {
    const landmarks = detection.keypoints.map((kp, index): Landmark => {
      const x = clamp01(kp.x / width);
      const y = clamp01(kp.y / height);
      const z = kp.z ?? detection.keypoints3D?.[index]?.z ?? 0;
      return { x: options.mirror ? 1 - x : x, y, z: Number.isFinite(z) ? z : 0 };
    });
    return { label: detection.handedness, landmarks };
  });
}

function clamp01(value: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.min(1, Math.max(0, value));
}
