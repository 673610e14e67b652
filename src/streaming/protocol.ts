import type { ChannelFamily, Market, OutboundEnvelope, SubscriptionRequest } from "../types";

export const CHANNELS = {
  VI: "VI_",
  KOSPI_TRADE: "S3_",
  KOSDAQ_TRADE: "K3_",
  ORDER_ACCEPTED: "SC0",
  ORDER_FILLED: "SC1",
  ORDER_AMENDED: "SC2",
  ORDER_CANCELLED: "SC3",
  ORDER_REJECTED: "SC4",
} as const;

export const ORDER_CHANNELS: readonly string[] = [
  CHANNELS.ORDER_ACCEPTED,
  CHANNELS.ORDER_FILLED,
  CHANNELS.ORDER_AMENDED,
  CHANNELS.ORDER_CANCELLED,
  CHANNELS.ORDER_REJECTED,
];

// Routing key meaning "every symbol" on market channels
export const ALL_SYMBOLS = "000000";

// Account channels are keyed by the session token, not by a symbol
export const ACCOUNT_KEY = "";

export const SUCCESS_RESPONSE_CODE = "00000";

export const KEEPALIVE_CHANNEL = "PINGPONG";

export const TR_TYPES = {
  market: { register: "3", unregister: "4" },
  account: { register: "1", unregister: "2" },
} as const;

const WILDCARD_KEYS = new Set([ALL_SYMBOLS, ACCOUNT_KEY]);

export const channelFamily = (channel: string): ChannelFamily => {
  if (channel.startsWith(CHANNELS.VI)) return "vi";
  if (channel.startsWith(CHANNELS.KOSPI_TRADE)) return "kospi_trade";
  if (channel.startsWith(CHANNELS.KOSDAQ_TRADE)) return "kosdaq_trade";
  if (ORDER_CHANNELS.includes(channel)) return "order";
  return "unknown";
};

export const isWildcardKey = (key: string): boolean => WILDCARD_KEYS.has(key);

export const isAccountChannel = (channel: string): boolean => channelFamily(channel) === "order";

export const tradeChannelFor = (market: Market): string =>
  market === "KOSDAQ" ? CHANNELS.KOSDAQ_TRADE : CHANNELS.KOSPI_TRADE;

export const subscriptionId = (channel: string, key: string): string => `${channel}:${key}`;

const buildEnvelope = (token: string, trType: string, channel: string, key: string): OutboundEnvelope => ({
  header: { token, tr_type: trType },
  body: { tr_cd: channel, tr_key: key },
});

/**
 * Register/unregister pair for a channel, using the account or market tr_type codes
 */
export const buildSubscriptionRequest = (token: string, channel: string, key: string): SubscriptionRequest => {
  const codes = isAccountChannel(channel) ? TR_TYPES.account : TR_TYPES.market;
  return {
    register: buildEnvelope(token, codes.register, channel, key),
    unregister: buildEnvelope(token, codes.unregister, channel, key),
  };
};
