import { GestureEngine } from "@handsnap/gesture-core";
import { loadConfig } from "./config";
import { readFrames } from "./frames";
import { runRelay } from "./relay";
import { UdpSink } from "./UdpSink";

async function main(): Promise<void> {
  const config = loadConfig();
  const engine = new GestureEngine({
    ...config.engine,
    onSnap: (event) =>
      console.info(`snap-relay: snap detected hand=${event.label} velocity=${event.velocity.toFixed(4)}`),
  });
  const sink = new UdpSink(config.sink);
  console.info(
    `snap-relay: ${engine.policy} policy, sending to ${config.sink.host}:${config.sink.port}, reading frames from stdin`
  );

  // Ending stdin ends the frame loop, which closes the socket below.
  const stop = () => process.stdin.destroy();
  process.once("SIGINT", stop);
  process.once("SIGTERM", stop);

  try {
    const stats = await runRelay({
      frames: readFrames(process.stdin, { mirror: config.mirror }),
      engine,
      sink,
      fields: config.fields,
      debug: config.debug,
    });
    console.info("snap-relay: input closed", stats);
  } finally {
    await sink.close();
  }
}

main().catch((err) => {
  console.error("snap-relay: fatal", err);
  process.exitCode = 1;
});
