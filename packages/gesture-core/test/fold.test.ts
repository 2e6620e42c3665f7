import fc from "fast-check";
import { describe, expect, it } from "vitest";
import { classifyGesture, countFoldedFingers, distanceSquared3D } from "../src";
import type { Landmark } from "../src";
import { buildHand } from "./hands";

function rotate(lm: Landmark, ax: number, ay: number, az: number): Landmark {
  // X, then Y, then Z.
  const y1 = lm.y * Math.cos(ax) - lm.z * Math.sin(ax);
  const z1 = lm.y * Math.sin(ax) + lm.z * Math.cos(ax);
  const x2 = lm.x * Math.cos(ay) + z1 * Math.sin(ay);
  const z2 = -lm.x * Math.sin(ay) + z1 * Math.cos(ay);
  const x3 = x2 * Math.cos(az) - y1 * Math.sin(az);
  const y3 = x2 * Math.sin(az) + y1 * Math.cos(az);
  return { x: x3, y: y3, z: z2 };
}

describe("classifyGesture", () => {
  it("returns Open when every tip is farther from the wrist than its knuckle", () => {
    const hand = buildHand();
    expect(countFoldedFingers(hand.landmarks)).toBe(0);
    expect(classifyGesture(hand.landmarks)).toBe("Open");
  });

  it("returns Fist with all four fingers folded", () => {
    const hand = buildHand({ folded: ["index", "middle", "ring", "pinky"] });
    expect(countFoldedFingers(hand.landmarks)).toBe(4);
    expect(classifyGesture(hand.landmarks)).toBe("Fist");
  });

  it("returns Fist with three fingers folded", () => {
    const hand = buildHand({ folded: ["middle", "ring", "pinky"] });
    expect(classifyGesture(hand.landmarks)).toBe("Fist");
  });

  it("returns Neutral with one or two fingers folded", () => {
    expect(classifyGesture(buildHand({ folded: ["pinky"] }).landmarks)).toBe("Neutral");
    expect(classifyGesture(buildHand({ folded: ["index", "ring"] }).landmarks)).toBe("Neutral");
  });

  it("ignores the thumb", () => {
    const hand = buildHand({ pinchGap: 0 });
    expect(classifyGesture(hand.landmarks)).toBe("Open");
  });

  it("keeps the folded count under rigid rotation and translation", () => {
    const coord = fc.double({ min: -1, max: 1, noNaN: true });
    const landmark = fc.record({ x: coord, y: coord, z: coord });
    const angle = fc.double({ min: -Math.PI, max: Math.PI, noNaN: true });

    fc.assert(
      fc.property(
        fc.array(landmark, { minLength: 21, maxLength: 21 }),
        angle,
        angle,
        angle,
        fc.record({ x: coord, y: coord, z: coord }),
        (landmarks, ax, ay, az, shift) => {
          // Skip near-ties that float rounding could flip.
          const wrist = landmarks[0];
          for (const [tip, mcp] of [[8, 5], [12, 9], [16, 13], [20, 17]]) {
            const gap = distanceSquared3D(wrist, landmarks[tip]) - distanceSquared3D(wrist, landmarks[mcp]);
            fc.pre(Math.abs(gap) > 1e-6);
          }
          const moved = landmarks.map((lm) => {
            const r = rotate(lm, ax, ay, az);
            return { x: r.x + shift.x, y: r.y + shift.y, z: r.z + shift.z };
          });
          expect(countFoldedFingers(moved)).toBe(countFoldedFingers(landmarks));
        }
      )
    );
  });
});
