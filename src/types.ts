export type TradeSide = "BUY" | "SELL";

export type Market = "KOSPI" | "KOSDAQ";

export type ConnectionState = "disconnected" | "connecting" | "connected" | "closing" | "closed" | "error";

export type ChannelFamily = "vi" | "kospi_trade" | "kosdaq_trade" | "order" | "unknown";

export interface EnvelopeHeader {
  token?: string;
  tr_type?: string;
  tr_cd?: string;
  tr_key?: string;
  rsp_cd?: string;
  rsp_msg?: string;
}

/**
 * Frame sent to the broker. Wire field names are kept verbatim.
 */
export interface OutboundEnvelope {
  header: {
    token: string;
    tr_type: string;
  };
  body: {
    tr_cd: string;
    tr_key: string;
  };
}

export interface SubscriptionRequest {
  register: OutboundEnvelope;
  unregister: OutboundEnvelope;
}

/**
 * Decoded inbound frame as handed to subscription callbacks
 */
export interface StreamMessage {
  channel: string;
  key: string;
  family: ChannelFamily;
  header: EnvelopeHeader;
  body: Record<string, unknown>;
  receivedAt: Date;
}

export type MessageCallback = (message: StreamMessage) => void | Promise<void>;

export type SubscriptionErrorCallback = (error: Error, message?: StreamMessage) => void | Promise<void>;

export interface SubscriptionRecord {
  channel: string;
  key: string;
  request: SubscriptionRequest;
  callbacks: MessageCallback[];
  errorCallbacks: SubscriptionErrorCallback[];
  subscribedAt: Date;
  lastDeliveredAt?: Date;
}

export interface SubscriptionSnapshot {
  channel: string;
  key: string;
  callbackCount: number;
  subscribedAt: Date;
  lastDeliveredAt?: Date;
}

export type VIKind = "release" | "static" | "dynamic" | "static_dynamic";

export interface VIPrices {
  staticBasePrice?: number;
  dynamicBasePrice?: number;
  triggerPrice?: number;
}

export interface VIEvent {
  symbol: string;
  code: string;
  activationCode: number;
  kind: VIKind;
  prices: VIPrices;
  time: string;
  exchange: string;
}

export type VIStatus = "active" | "inactive";

export interface VIState {
  symbol: string;
  status: VIStatus;
  activationTime: Date;
  releaseTime?: Date;
  durationSeconds?: number;
  event: VIEvent;
  tradeChannel: string;
}

export interface VIActivatedInfo {
  activationTime: Date;
  event: VIEvent;
  tradeChannel: string;
}

export interface VIReleasedInfo {
  activationTime: Date;
  releaseTime: Date;
  durationSeconds: number;
  event: VIEvent;
}

export interface PendingUnsubscribe {
  symbol: string;
  channel: string;
  key: string;
  scheduledAt: Date;
  fireAt: Date;
}

export interface TradeTick {
  symbol: string;
  time: string;
  price: number;
  change?: number;
  changeRate?: number;
  sign: string;
  volume: number;
  cumulativeVolume?: number;
  strength?: number;
  askPrice?: number;
  bidPrice?: number;
  side?: TradeSide;
  exchange: string;
}

export type OrderEventKind = "accepted" | "filled" | "amended" | "cancelled" | "rejected";

export interface OrderEvent {
  kind: OrderEventKind;
  channel: string;
  orderNo: string;
  originalOrderNo?: string;
  symbol: string;
  name: string;
  time: string;
  price: number;
  quantity: number;
  side?: TradeSide;
  trCode: string;
  rejectReason?: string;
}

export interface OrderProgress {
  orderNo: string;
  symbol: string;
  side?: TradeSide;
  orderQty: number;
  filledQty: number;
  completed: boolean;
  lastEventAt: Date;
}
