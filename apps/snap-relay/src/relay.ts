import { InvalidObservationError, encodePayload } from "@handsnap/gesture-core";
import type { FrameResult, GestureEngine, ObservationBatch, PayloadFields } from "@handsnap/gesture-core";
import type { EventSink } from "./UdpSink";

export type RelayOptions = {
  frames: AsyncIterable<ObservationBatch>;
  engine: GestureEngine;
  sink: EventSink;
  fields: PayloadFields;
  debug?: boolean;
};

export type RelayStats = {
  frames: number;
  sent: number;
  skipped: number;
  failed: number;
  snaps: number;
};

/**
 * Pulls frames one at a time, runs them through the engine and forwards a
 * payload for every frame that observed at least one hand. Each frame is
 * fully handled, send included, before the next one is read.
 */
export async function runRelay({ frames, engine, sink, fields, debug }: RelayOptions): Promise<RelayStats> {
  const stats: RelayStats = { frames: 0, sent: 0, skipped: 0, failed: 0, snaps: 0 };

  for await (const frame of frames) {
    stats.frames += 1;
    let result: FrameResult | null;
    try {
      result = engine.process(frame);
    } catch (err) {
      if (!(err instanceof InvalidObservationError)) throw err;
      console.warn(`snap-relay: dropping frame ${stats.frames}: ${err.message}`);
      stats.skipped += 1;
      continue;
    }
    if (!result) continue;

    if (result.snap) stats.snaps += 1;
    if (debug) {
      const summary = result.hands.map((hand) => `${hand.label}:${hand.gesture}`).join(" ");
      console.debug(`snap-relay: frame ${stats.frames} ${summary} snap=${result.snap}`);
    }

    try {
      await sink.send(encodePayload(result, fields));
      stats.sent += 1;
    } catch (err) {
      console.error("snap-relay: send failed", err);
      stats.failed += 1;
    }
  }

  return stats;
}
