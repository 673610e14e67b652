import { z } from "zod";
import type { EnvelopeHeader, OrderEvent, OrderEventKind, TradeSide, TradeTick, VIEvent, VIKind } from "../types";
import { CHANNELS } from "../streaming/protocol";
import { ProtocolError, describeError } from "../utils/errors";

// Broker sends numbers as strings, sometimes empty
const numericField = z
  .union([z.string(), z.number()])
  .optional()
  .transform((value, ctx) => {
    if (value === undefined || value === "") return undefined;
    const parsed = typeof value === "number" ? value : Number(value.trim());
    if (!Number.isFinite(parsed)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Not a number: ${String(value)}` });
      return z.NEVER;
    }
    return parsed;
  });

const textField = z
  .union([z.string(), z.number()])
  .optional()
  .transform((value) => (value === undefined ? "" : String(value).trim()));

export const envelopeHeaderSchema = z
  .object({
    token: z.string().optional(),
    tr_type: z.string().optional(),
    tr_cd: z.string().optional(),
    tr_key: z.string().optional(),
    rsp_cd: z.string().optional(),
    rsp_msg: z.string().optional(),
  })
  .passthrough();

export const envelopeSchema = z.object({
  header: envelopeHeaderSchema,
  body: z.record(z.unknown()).nullable().optional(),
});

export const viBodySchema = z.object({
  vi_gubun: z.union([z.string(), z.number()]).transform((value) => String(value).trim()),
  svi_recprice: numericField,
  dvi_recprice: numericField,
  vi_trgprice: numericField,
  shcode: textField,
  ref_shcode: textField,
  time: textField,
  exchname: textField,
});

export const tradeBodySchema = z.object({
  shcode: textField,
  chetime: textField,
  sign: textField,
  change: numericField,
  drate: numericField,
  price: numericField,
  cgubun: textField,
  cvolume: numericField,
  volume: numericField,
  cpower: numericField,
  offerho: numericField,
  bidho: numericField,
  exchname: textField,
});

export const orderBodySchema = z.object({
  ordno: textField,
  orgordno: textField,
  shtcode: textField,
  shtnIsuno: textField,
  hname: textField,
  Isunm: textField,
  ordtm: textField,
  exectime: textField,
  execprc: numericField,
  ordprice: numericField,
  ordavrexecprc: numericField,
  ordqty: numericField,
  execqty: numericField,
  ordptncode: textField,
  ordgb: textField,
  ordchegb: textField,
  trcode: textField,
  rsp_msg: textField,
});

export interface ParsedEnvelope {
  header: EnvelopeHeader;
  body: Record<string, unknown>;
}

const formatIssues = (error: z.ZodError): string =>
  error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`).join("; ");

/**
 * Decode a raw text frame into header/body. Throws {@link ProtocolError}.
 */
export const parseEnvelope = (frame: string): ParsedEnvelope => {
  let raw: unknown;
  try {
    raw = JSON.parse(frame);
  } catch (error) {
    throw new ProtocolError(`Frame is not valid JSON (${describeError(error)})`, frame);
  }

  const result = envelopeSchema.safeParse(raw);
  if (!result.success) {
    throw new ProtocolError(`Malformed envelope: ${formatIssues(result.error)}`, frame);
  }

  return { header: result.data.header, body: result.data.body ?? {} };
};

const VI_KINDS: Record<string, VIKind> = {
  "0": "release",
  "1": "static",
  "2": "dynamic",
  "3": "static_dynamic",
};

export const parseVIEvent = (body: Record<string, unknown>): VIEvent => {
  const result = viBodySchema.safeParse(body);
  if (!result.success) {
    throw new ProtocolError(`Malformed VI body: ${formatIssues(result.error)}`);
  }

  const data = result.data;
  const kind = VI_KINDS[data.vi_gubun];
  if (!kind) {
    throw new ProtocolError(`Unknown VI activation code '${data.vi_gubun}'`);
  }

  // ref_shcode carries the listed symbol; shcode is the VI record key
  const symbol = data.ref_shcode || data.shcode;
  if (!symbol) {
    throw new ProtocolError("VI body has no symbol code");
  }

  return {
    symbol,
    code: data.shcode,
    activationCode: Number(data.vi_gubun),
    kind,
    prices: {
      staticBasePrice: data.svi_recprice,
      dynamicBasePrice: data.dvi_recprice,
      triggerPrice: data.vi_trgprice,
    },
    time: data.time,
    exchange: data.exchname,
  };
};

export const parseTradeTick = (body: Record<string, unknown>, fallbackSymbol = ""): TradeTick => {
  const result = tradeBodySchema.safeParse(body);
  if (!result.success) {
    throw new ProtocolError(`Malformed trade body: ${formatIssues(result.error)}`);
  }

  const data = result.data;
  const symbol = data.shcode || fallbackSymbol;
  if (!symbol) {
    throw new ProtocolError("Trade body has no symbol code");
  }
  if (data.price === undefined) {
    throw new ProtocolError(`Trade body for ${symbol} has no price`);
  }

  let side: TradeSide | undefined;
  if (data.cgubun === "+") side = "BUY";
  else if (data.cgubun === "-") side = "SELL";

  return {
    symbol,
    time: data.chetime,
    price: data.price,
    change: data.change,
    changeRate: data.drate,
    sign: data.sign,
    volume: data.cvolume ?? 0,
    cumulativeVolume: data.volume,
    strength: data.cpower,
    askPrice: data.offerho,
    bidPrice: data.bidho,
    side,
    exchange: data.exchname,
  };
};

const ORDER_KINDS: Record<string, OrderEventKind> = {
  [CHANNELS.ORDER_ACCEPTED]: "accepted",
  [CHANNELS.ORDER_FILLED]: "filled",
  [CHANNELS.ORDER_AMENDED]: "amended",
  [CHANNELS.ORDER_CANCELLED]: "cancelled",
  [CHANNELS.ORDER_REJECTED]: "rejected",
};

const SIDE_CODES: Record<string, TradeSide> = { "01": "SELL", "02": "BUY" };

export const parseOrderEvent = (channel: string, body: Record<string, unknown>): OrderEvent => {
  const kind = ORDER_KINDS[channel];
  if (!kind) {
    throw new ProtocolError(`Channel '${channel}' is not an order channel`);
  }

  const result = orderBodySchema.safeParse(body);
  if (!result.success) {
    throw new ProtocolError(`Malformed order body: ${formatIssues(result.error)}`);
  }

  const data = result.data;
  if (!data.ordno) {
    throw new ProtocolError(`Order body on ${channel} has no order number`);
  }

  const side = [data.ordptncode, data.ordgb, data.ordchegb]
    .map((code) => SIDE_CODES[code])
    .find((value) => value !== undefined);

  const quantity = kind === "filled" ? data.execqty ?? data.ordqty : data.ordqty ?? data.execqty;

  return {
    kind,
    channel,
    orderNo: data.ordno,
    originalOrderNo: data.orgordno || undefined,
    symbol: data.shtcode || data.shtnIsuno,
    name: data.hname || data.Isunm,
    time: data.ordtm || data.exectime,
    price: data.execprc || data.ordprice || data.ordavrexecprc || 0,
    quantity: quantity ?? 0,
    side,
    trCode: data.trcode,
    rejectReason: kind === "rejected" ? data.rsp_msg || undefined : undefined,
  };
};
