import { z } from "zod";
import { InvalidPayloadError } from "./errors";
import { LANDMARK_COUNT } from "./landmarks";
import type { FrameResult, HandPayload, PayloadFields } from "./types";

export const FULL_PAYLOAD: PayloadFields = { gesture: true, snap: true };

export function toPayload(result: FrameResult, fields: PayloadFields = FULL_PAYLOAD): HandPayload {
  const payload: HandPayload = {
    hands: result.hands.map((hand) => ({
      label: hand.label,
      landmarks: hand.landmarks.map((lm, id) => ({ id, x: lm.x, y: lm.y, z: lm.z })),
      ...(fields.gesture ? { gesture: hand.gesture } : {}),
    })),
  };
  if (fields.snap) {
    payload.snap = result.snap;
  }
  return payload;
}

export function encodePayload(result: FrameResult, fields: PayloadFields = FULL_PAYLOAD): string {
  return JSON.stringify(toPayload(result, fields));
}

const PayloadLandmarkSchema = z.object({
  id: z.number().int().min(0).max(LANDMARK_COUNT - 1),
  x: z.number(),
  y: z.number(),
  z: z.number(),
});

const PayloadHandSchema = z.object({
  label: z.enum(["Left", "Right"]),
  landmarks: z.array(PayloadLandmarkSchema),
  gesture: z.enum(["Fist", "Open", "Neutral"]).optional(),
});

export const HandPayloadSchema = z.object({
  hands: z.array(PayloadHandSchema),
  snap: z.boolean().default(false),
});

export type DecodedPayload = z.infer<typeof HandPayloadSchema>;

/** Parses a payload as a consumer receives it; a missing `snap` reads as false. */
export function decodePayload(text: string): DecodedPayload {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new InvalidPayloadError([err instanceof Error ? err.message : String(err)]);
  }
  const parsed = HandPayloadSchema.safeParse(raw);
  if (!parsed.success) {
    throw new InvalidPayloadError(
      parsed.error.issues.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
    );
  }
  return parsed.data;
}
