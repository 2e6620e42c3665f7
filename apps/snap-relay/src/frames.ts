import { createInterface } from "node:readline";
import type { Readable } from "node:stream";
import { z } from "zod";
import type { ObservationBatch } from "@handsnap/gesture-core";
import { mapDetectionsToObservations } from "@handsnap/handtracking-tfjs";

const Side = z.enum(["Left", "Right"]);

const ObservationLineSchema = z.object({
  timestamp: z.number().optional(),
  hands: z.array(
    z.object({
      label: Side,
      landmarks: z.array(z.object({ x: z.number(), y: z.number(), z: z.number().default(0) })),
    })
  ),
});

const KeypointSchema = z.object({ x: z.number(), y: z.number(), z: z.number().optional() });

const DetectionLineSchema = z.object({
  timestamp: z.number().optional(),
  width: z.number().positive(),
  height: z.number().positive(),
  detections: z.array(
    z.object({
      handedness: Side,
      keypoints: z.array(KeypointSchema),
      keypoints3D: z.array(KeypointSchema).optional(),
    })
  ),
});

const FrameLineSchema = z.union([ObservationLineSchema, DetectionLineSchema]);

export interface ReadFramesOptions {
  mirror?: boolean;
}

/**
 * Parses one line of input. Accepts either observations
 * (`{ hands: [{ label, landmarks }] }`) or raw detector output
 * (`{ width, height, detections }`). Returns null for lines that are neither.
 */
export function parseFrameLine(line: string, options: ReadFramesOptions = {}): ObservationBatch | null {
  let raw: unknown;
  try {
    raw = JSON.parse(line);
  } catch {
    return null;
  }
  const parsed = FrameLineSchema.safeParse(raw);
  if (!parsed.success) return null;

  const frame = parsed.data;
  if ("hands" in frame) {
    return { hands: frame.hands, timestamp: frame.timestamp };
  }
  const hands = mapDetectionsToObservations(
    frame.detections,
    { width: frame.width, height: frame.height },
    { mirror: options.mirror }
  );
  return { hands, timestamp: frame.timestamp };
}

/** Newline-delimited frames; unreadable lines are dropped like a failed camera read. */
export async function* readFrames(input: Readable, options: ReadFramesOptions = {}): AsyncGenerator<ObservationBatch> {
  const lines = createInterface({ input, crlfDelay: Infinity });
  // readline only finishes on 'end'; a destroyed input emits 'close' instead.
  let linesClosed = false;
  lines.once("close", () => {
    linesClosed = true;
  });
  const onClose = () => {
    if (!linesClosed) lines.close();
  };
  input.once("close", onClose);
  let lineNumber = 0;
  try {
    for await (const line of lines) {
      lineNumber += 1;
      if (!line.trim()) continue;
      const frame = parseFrameLine(line, options);
      if (!frame) {
        console.warn(`snap-relay: skipping unreadable frame on line ${lineNumber}`);
        continue;
      }
      yield frame;
    }
  } finally {
    input.off("close", onClose);
  }
}
