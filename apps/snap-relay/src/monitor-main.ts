import { loadConfig } from "./config";
import { runMonitor } from "./monitor";

try {
  const config = loadConfig();
  const handle = runMonitor(config.sink, { fadeTimeoutSeconds: config.fadeTimeoutSeconds });
  const stop = () => {
    handle.stop().catch((err) => console.error("snap-monitor: failed to stop", err));
  };
  process.once("SIGINT", stop);
  process.once("SIGTERM", stop);
} catch (err) {
  console.error("snap-monitor: fatal", err);
  process.exitCode = 1;
}
