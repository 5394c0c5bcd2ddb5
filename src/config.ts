import {
  object,
  optional,
  picklist,
  pipe,
  regex,
  safeParse,
  string,
  summarize,
  transform,
  type InferOutput,
} from "valibot";
import { ZERO_ADDRESS } from "./core/types";
import { addressSchema } from "./model/validation";

const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

const envSchema = object({
  LOG_LEVEL: optional(picklist(LOG_LEVELS), "info"),
  LOG_PRETTY: optional(
    pipe(
      picklist(["true", "false", "1", "0"]),
      transform((v) => v === "true" || v === "1"),
    ),
    "false",
  ),
  COOLDOWN_SECONDS: optional(
    pipe(
      string(),
      regex(/^[1-9][0-9]*$/, "COOLDOWN_SECONDS must be a positive integer"),
      transform((v) => BigInt(v)),
    ),
    "60",
  ),
  INSTANCE_ID: optional(addressSchema, ZERO_ADDRESS),
});

export type Config = {
  logLevel: InferOutput<typeof envSchema>["LOG_LEVEL"];
  logPretty: boolean;
  cooldownSeconds: bigint;
  instanceId: InferOutput<typeof envSchema>["INSTANCE_ID"];
};

export const loadConfig = (env: Record<string, string | undefined> = process.env): Config => {
  const result = safeParse(envSchema, env);
  if (!result.success) throw new Error(`invalid configuration:\n${summarize(result.issues)}`);
  const { LOG_LEVEL, LOG_PRETTY, COOLDOWN_SECONDS, INSTANCE_ID } = result.output;
  return {
    logLevel: LOG_LEVEL,
    logPretty: LOG_PRETTY,
    cooldownSeconds: COOLDOWN_SECONDS,
    instanceId: INSTANCE_ID,
  };
};
