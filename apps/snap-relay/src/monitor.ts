import dgram from "node:dgram";
import { performance } from "node:perf_hooks";
import {
  HAND_SIDES,
  HandPresenceTracker,
  InvalidPayloadError,
  decodePayload,
  palmNormal,
  palmsAligned,
} from "@handsnap/gesture-core";
import type { DecodedPayload, Gesture, HandSide } from "@handsnap/gesture-core";

export type SnapMonitorOptions = {
  fadeTimeoutSeconds?: number;
  log?: (line: string) => void;
};

/**
 * Receiving end of the relay: decodes payloads and reports snaps, gesture
 * changes, hands appearing or fading out, and both palms open and facing the
 * same way.
 */
export class SnapMonitor {
  private readonly presence: HandPresenceTracker;
  private readonly log: (line: string) => void;
  private readonly gestures: Partial<Record<HandSide, Gesture>> = {};
  private readonly visible: Record<HandSide, boolean> = { Left: false, Right: false };
  private palmsWereAligned = false;

  constructor(opts: SnapMonitorOptions = {}) {
    this.presence = new HandPresenceTracker({ fadeTimeoutSeconds: opts.fadeTimeoutSeconds });
    this.log = opts.log ?? ((line) => console.info(`snap-monitor: ${line}`));
  }

  handle(text: string, nowSeconds: number): void {
    let payload: DecodedPayload;
    try {
      payload = decodePayload(text);
    } catch (err) {
      if (!(err instanceof InvalidPayloadError)) throw err;
      console.warn(`snap-monitor: ignoring packet: ${err.message}`);
      return;
    }

    this.presence.markSeen(payload, nowSeconds);
    this.tick(nowSeconds);
    if (payload.snap) this.log("snap");

    for (const hand of payload.hands) {
      if (hand.gesture && hand.gesture !== this.gestures[hand.label]) {
        this.gestures[hand.label] = hand.gesture;
        this.log(`${hand.label} ${hand.gesture}`);
      }
    }

    const left = payload.hands.find((hand) => hand.label === "Left");
    const right = payload.hands.find((hand) => hand.label === "Right");
    const aligned =
      left?.gesture === "Open" &&
      right?.gesture === "Open" &&
      palmsAligned(palmNormal(left), palmNormal(right));
    if (aligned && !this.palmsWereAligned) this.log("palms aligned");
    this.palmsWereAligned = aligned;
  }

  /** Reports sides whose visibility changed since the last call. */
  tick(nowSeconds: number): void {
    for (const side of HAND_SIDES) {
      const visible = this.presence.isVisible(side, nowSeconds);
      if (visible !== this.visible[side]) {
        this.visible[side] = visible;
        this.log(`${side} ${visible ? "visible" : "lost"}`);
        if (!visible) delete this.gestures[side];
      }
    }
  }
}

export type MonitorHandle = { stop: () => Promise<void> };

export function runMonitor(target: { host: string; port: number }, opts: SnapMonitorOptions = {}): MonitorHandle {
  const monitor = new SnapMonitor(opts);
  const now = () => performance.now() / 1000;
  const socket = dgram.createSocket("udp4");

  socket.on("message", (msg) => monitor.handle(msg.toString("utf8"), now()));
  socket.on("error", (err) => console.error("snap-monitor: socket error", err));
  socket.bind(target.port, target.host, () => {
    console.info(`snap-monitor: listening on ${target.host}:${target.port}`);
  });
  const timer = setInterval(() => monitor.tick(now()), 100);

  return {
    stop: () =>
      new Promise<void>((resolve) => {
        clearInterval(timer);
        socket.close(() => resolve());
      }),
  };
}
