import { describe, expect, it } from "vitest";
import { InvalidPayloadError, decodePayload, encodePayload, toPayload } from "../src";
import type { FrameResult } from "../src";
import { buildHand } from "./hands";

function result(snap = true): FrameResult {
  const hand = buildHand({ label: "Left", folded: ["index", "middle", "ring", "pinky"] });
  return { hands: [{ label: "Left", landmarks: hand.landmarks, gesture: "Fist" }], snap };
}

describe("toPayload", () => {
  it("numbers landmarks and includes gesture and snap by default", () => {
    const payload = toPayload(result());
    expect(payload.snap).toBe(true);
    expect(payload.hands).toHaveLength(1);
    expect(payload.hands[0].label).toBe("Left");
    expect(payload.hands[0].gesture).toBe("Fist");
    expect(payload.hands[0].landmarks).toHaveLength(21);
    expect(payload.hands[0].landmarks[0]).toEqual({ id: 0, x: 0.5, y: 0.8, z: 0 });
    expect(payload.hands[0].landmarks[20]).toEqual({ id: 20, x: 0.6, y: 0.7, z: 0 });
  });

  it("relays bare landmarks when gesture and snap are off", () => {
    const payload = toPayload(result(), { gesture: false, snap: false });
    expect(Object.keys(payload)).toEqual(["hands"]);
    expect(Object.keys(payload.hands[0])).toEqual(["label", "landmarks"]);
  });

  it("can carry snap without gestures", () => {
    const payload = toPayload(result(false), { gesture: false, snap: true });
    expect(payload.snap).toBe(false);
    expect("gesture" in payload.hands[0]).toBe(false);
  });
});

describe("decodePayload", () => {
  it("reads back an encoded frame", () => {
    const decoded = decodePayload(encodePayload(result()));
    expect(decoded.snap).toBe(true);
    expect(decoded.hands[0].gesture).toBe("Fist");
    expect(decoded.hands[0].landmarks[4]).toEqual({ id: 4, x: 0.3, y: 0.6, z: 0 });
  });

  it("defaults a missing snap to false and leaves gesture absent", () => {
    const decoded = decodePayload('{"hands":[{"label":"Right","landmarks":[{"id":0,"x":0.1,"y":0.2,"z":0}]}]}');
    expect(decoded.snap).toBe(false);
    expect(decoded.hands[0].gesture).toBeUndefined();
  });

  it("rejects unknown labels", () => {
    expect(() => decodePayload('{"hands":[{"label":"Up","landmarks":[]}]}')).toThrow(InvalidPayloadError);
  });

  it("rejects landmark ids outside 0..20", () => {
    expect(() =>
      decodePayload('{"hands":[{"label":"Left","landmarks":[{"id":21,"x":0,"y":0,"z":0}]}]}')
    ).toThrow(/hands\.0\.landmarks\.0\.id/);
  });

  it("rejects text that is not JSON", () => {
    expect(() => decodePayload("not json")).toThrow(InvalidPayloadError);
  });
});
