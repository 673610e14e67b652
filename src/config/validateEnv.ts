import { z } from "zod";
import logger from "../utils/logger";
import type { EnvConfig } from "./env";

const streamUrlSchema = z
  .string()
  .url()
  .refine((value) => value.startsWith("wss://") || value.startsWith("ws://"), "must use ws:// or wss://");

export interface EnvValidationResult {
  warnings: string[];
  errors: string[];
}

export const validateEnvironment = (env: EnvConfig): EnvValidationResult => {
  const warnings: string[] = [];
  const errors: string[] = [];

  const url = streamUrlSchema.safeParse(env.streamUrl);
  if (!url.success) {
    errors.push(`STREAM_URL '${env.streamUrl}' ${url.error.issues[0]?.message ?? "is invalid"}.`);
  }

  if (!env.streamToken.trim()) {
    errors.push("STREAM_TOKEN is missing; the broker will reject the handshake.");
  }

  if (env.reconnectBaseDelayMs > env.reconnectMaxDelayMs) {
    warnings.push(
      `STREAM_RECONNECT_BASE_DELAY_MS (${env.reconnectBaseDelayMs}) exceeds STREAM_RECONNECT_MAX_DELAY_MS (${env.reconnectMaxDelayMs}); every retry waits the maximum.`,
    );
  }

  if (env.keepaliveTimeoutMs >= env.keepaliveIntervalMs) {
    warnings.push("STREAM_KEEPALIVE_TIMEOUT_MS should be shorter than STREAM_KEEPALIVE_INTERVAL_MS.");
  }

  if (env.viUnsubscribeGraceMs < 1000) {
    warnings.push(`VI_UNSUBSCRIBE_GRACE_MS is ${env.viUnsubscribeGraceMs}ms; trade feeds will be dropped almost immediately after release.`);
  }

  warnings.forEach((message) => {
    logger.warn({ message }, "Environment validation warning");
  });

  errors.forEach((message) => {
    logger.error({ message }, "Environment validation error");
  });

  if (!warnings.length && !errors.length) {
    logger.info("Environment validation completed successfully");
  }

  return { warnings, errors };
};

export default validateEnvironment;
