import dotenv from "dotenv";
import path from "node:path";
import type { Market } from "../types";

dotenv.config();

const parseNumberWithFallback = (value: string | undefined, fallback: number): number => {
  const parsed = Number(value);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
};

const parseMarketWithFallback = (value: string | undefined, fallback: Market): Market => {
  const normalized = value?.trim().toUpperCase();
  return normalized === "KOSPI" || normalized === "KOSDAQ" ? normalized : fallback;
};

const DEFAULT_SYMBOL_MARKETS_FILE = path.resolve(process.cwd(), "data/symbol-markets.json");

export const env = {
  nodeEnv: process.env.NODE_ENV ?? "development",
  port: parseNumberWithFallback(process.env.PORT, 3000),

  // Broker stream
  streamUrl: process.env.STREAM_URL ?? "wss://openapi.ls-sec.co.kr:9443/websocket",
  streamToken: process.env.STREAM_TOKEN ?? "",
  maxSubscriptions: parseNumberWithFallback(process.env.STREAM_MAX_SUBSCRIPTIONS, 100),
  handshakeTimeoutMs: parseNumberWithFallback(process.env.STREAM_HANDSHAKE_TIMEOUT_MS, 10000),
  keepaliveIntervalMs: parseNumberWithFallback(process.env.STREAM_KEEPALIVE_INTERVAL_MS, 30000),
  keepaliveTimeoutMs: parseNumberWithFallback(process.env.STREAM_KEEPALIVE_TIMEOUT_MS, 10000),
  inboundQueueSize: parseNumberWithFallback(process.env.STREAM_INBOUND_QUEUE_SIZE, 10000),
  outboundQueueSize: parseNumberWithFallback(process.env.STREAM_OUTBOUND_QUEUE_SIZE, 1000),

  // Reconnect backoff: min(base * 2^n, max)
  reconnectMaxAttempts: parseNumberWithFallback(process.env.STREAM_RECONNECT_MAX_ATTEMPTS, 10),
  reconnectBaseDelayMs: parseNumberWithFallback(process.env.STREAM_RECONNECT_BASE_DELAY_MS, 5000),
  reconnectMaxDelayMs: parseNumberWithFallback(process.env.STREAM_RECONNECT_MAX_DELAY_MS, 30000),

  // VI cascade
  viUnsubscribeGraceMs: parseNumberWithFallback(process.env.VI_UNSUBSCRIBE_GRACE_MS, 180000),
  viDefaultMarket: parseMarketWithFallback(process.env.VI_DEFAULT_MARKET, "KOSPI"),
  symbolMarketsFile: process.env.SYMBOL_MARKETS_FILE
    ? path.resolve(process.cwd(), process.env.SYMBOL_MARKETS_FILE)
    : DEFAULT_SYMBOL_MARKETS_FILE,

  accountEventsEnabled: process.env.ACCOUNT_EVENTS_ENABLED === "true",
};

export type EnvConfig = typeof env;

export default env;
