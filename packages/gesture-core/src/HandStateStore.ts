import type { HandSide, HandTemporalState } from "./types";

export function initialHandState(): HandTemporalState {
  return { isPinching: false, prevMiddleTipY: 0, observed: false };
}

/**
 * One temporal state per hand side. Both slots exist from construction and
 * are only replaced through {@link HandStateStore.commit}.
 */
export class HandStateStore {
  private states: Record<HandSide, HandTemporalState> = {
    Left: initialHandState(),
    Right: initialHandState(),
  };

  get(side: HandSide): Readonly<HandTemporalState> {
    return this.states[side];
  }

  /** Applies every staged update at once. */
  commit(updates: ReadonlyMap<HandSide, HandTemporalState>): void {
    const next = { ...this.states };
    for (const [side, state] of updates) {
      next[side] = { ...state };
    }
    this.states = next;
  }

  snapshot(): Record<HandSide, HandTemporalState> {
    return { Left: { ...this.states.Left }, Right: { ...this.states.Right } };
  }

  reset(): void {
    this.states = { Left: initialHandState(), Right: initialHandState() };
  }
}
