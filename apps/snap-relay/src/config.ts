import { z } from "zod";
import type { GestureEngineOptions, PayloadFields, SnapPolicy } from "@handsnap/gesture-core";

const flag = z
  .enum(["true", "false", "1", "0"])
  .transform((value) => value === "true" || value === "1");

const EnvSchema = z.object({
  SNAP_POLICY: z.enum(["edge", "velocity"]).default("velocity"),
  SINK_HOST: z.string().min(1).default("127.0.0.1"),
  SINK_PORT: z.coerce.number().int().min(1).max(65535).default(5005),
  PAYLOAD_GESTURE: flag.default("true"),
  PAYLOAD_SNAP: flag.default("true"),
  PINCH_THRESHOLD_SQ: z.coerce.number().positive().optional(),
  VELOCITY_THRESHOLD: z.coerce.number().positive().optional(),
  MIRROR: flag.default("false"),
  DEBUG: flag.default("false"),
  MONITOR_FADE_TIMEOUT: z.coerce.number().positive().default(0.5),
});

export type RelayConfig = {
  engine: Omit<GestureEngineOptions, "onSnap">;
  sink: { host: string; port: number };
  fields: PayloadFields;
  mirror: boolean;
  debug: boolean;
  fadeTimeoutSeconds: number;
};

export class ConfigError extends Error {
  readonly name = "ConfigError";

  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
  }
}

const POLICIES: Record<"edge" | "velocity", SnapPolicy> = {
  edge: "EdgeTriggered",
  velocity: "VelocityGated",
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): RelayConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`));
  }
  const vars = parsed.data;
  const policy = POLICIES[vars.SNAP_POLICY];

  const engine: RelayConfig["engine"] = { policy };
  if (vars.PINCH_THRESHOLD_SQ !== undefined) {
    if (policy === "EdgeTriggered") engine.edgePinchThresholdSq = vars.PINCH_THRESHOLD_SQ;
    else engine.velocityPinchThresholdSq = vars.PINCH_THRESHOLD_SQ;
  }
  if (vars.VELOCITY_THRESHOLD !== undefined) {
    engine.velocityThreshold = vars.VELOCITY_THRESHOLD;
  }

  return {
    engine,
    sink: { host: vars.SINK_HOST, port: vars.SINK_PORT },
    fields: { gesture: vars.PAYLOAD_GESTURE, snap: vars.PAYLOAD_SNAP },
    mirror: vars.MIRROR,
    debug: vars.DEBUG,
    fadeTimeoutSeconds: vars.MONITOR_FADE_TIMEOUT,
  };
}
