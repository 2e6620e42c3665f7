import type { HandSide } from "./types";

export interface HandPresenceOptions {
  fadeTimeoutSeconds?: number;
}

const DEFAULTS: Required<HandPresenceOptions> = {
  fadeTimeoutSeconds: 0.5,
};

/**
 * Consumer-side bookkeeping of when each side last appeared in a payload.
 * A side that has never been seen is not visible.
 */
export class HandPresenceTracker {
  private readonly options: Required<HandPresenceOptions>;
  private lastSeen: Partial<Record<HandSide, number>> = {};

  constructor(opts?: HandPresenceOptions) {
    this.options = { fadeTimeoutSeconds: opts?.fadeTimeoutSeconds ?? DEFAULTS.fadeTimeoutSeconds };
  }

  markSeen(payload: { hands: ReadonlyArray<{ label: HandSide }> }, nowSeconds: number): void {
    for (const hand of payload.hands) {
      this.lastSeen[hand.label] = nowSeconds;
    }
  }

  isVisible(side: HandSide, nowSeconds: number): boolean {
    const seen = this.lastSeen[side];
    if (seen === undefined) return false;
    return nowSeconds - seen < this.options.fadeTimeoutSeconds;
  }

  lastSeenAt(side: HandSide): number | undefined {
    return this.lastSeen[side];
  }
}
