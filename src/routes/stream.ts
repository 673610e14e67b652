import { Router } from "express";
import { z } from "zod";
import {
  resolveOrderEventMonitor,
  resolveStreamSession,
  resolveSubscriptionRegistry,
  resolveVICascadeController,
} from "../container";
import { symbolCodeSchema } from "../services/SymbolMarketDirectory";
import type { OrderProgress, VIState } from "../types";
import { HttpError } from "../utils/errors";

const router = Router();

const activeQuerySchema = z.object({
  all: z.enum(["true", "false"]).optional(),
});

const symbolParamsSchema = z.object({ symbol: symbolCodeSchema });

const orderParamsSchema = z.object({ orderNo: z.string().regex(/^\d+$/, "Expected a numeric order number") });

const serializeState = (state: VIState) => ({
  symbol: state.symbol,
  status: state.status,
  kind: state.event.kind,
  tradeChannel: state.tradeChannel,
  activationTime: state.activationTime.toISOString(),
  releaseTime: state.releaseTime?.toISOString(),
  durationSeconds: state.durationSeconds,
});

const serializeOrder = (order: OrderProgress) => ({
  ...order,
  lastEventAt: order.lastEventAt.toISOString(),
});

router.get("/stream/status", (_req, res) => {
  const stats = resolveStreamSession().getStats();
  const registry = resolveSubscriptionRegistry();

  res.json({
    state: stats.state,
    connected: registry.isConnected(),
    connectCount: stats.connectCount,
    reconnectAttempt: stats.reconnectAttempt,
    lastConnectedAt: stats.lastConnectedAt?.toISOString(),
    lastDisconnectedAt: stats.lastDisconnectedAt?.toISOString(),
    lastError: stats.lastError,
    subscriptions: registry.getSubscriptions().length,
    droppedMessages: registry.getDroppedMessageCount(),
  });
});

router.get("/stream/subscriptions", (_req, res) => {
  const subscriptions = resolveSubscriptionRegistry()
    .getSubscriptions()
    .map((subscription) => ({
      channel: subscription.channel,
      key: subscription.key,
      callbackCount: subscription.callbackCount,
      subscribedAt: subscription.subscribedAt.toISOString(),
      lastDeliveredAt: subscription.lastDeliveredAt?.toISOString(),
    }));
  res.json({ count: subscriptions.length, subscriptions });
});

router.get("/vi/active", (req, res) => {
  const { all } = activeQuerySchema.parse(req.query);
  const controller = resolveVICascadeController();
  // ?all=true includes released symbols still in their grace period
  const states = all === "true" ? controller.getTrackedSymbols() : controller.getActiveSymbols();
  const symbols = Array.from(states.values()).map(serializeState);
  res.json({ count: symbols.length, symbols });
});

router.get("/vi/active/:symbol", (req, res) => {
  const { symbol } = symbolParamsSchema.parse(req.params);
  const controller = resolveVICascadeController();
  const state = controller.getTrackedSymbols().get(symbol);
  if (!state) {
    throw new HttpError(404, `Symbol ${symbol} is not under VI`);
  }

  const pending = controller.getPendingUnsubscribes().find((entry) => entry.symbol === symbol);
  res.json({ ...serializeState(state), unsubscribeAt: pending?.fireAt.toISOString() });
});

router.get("/vi/pending", (_req, res) => {
  const pending = resolveVICascadeController()
    .getPendingUnsubscribes()
    .map((entry) => ({
      symbol: entry.symbol,
      channel: entry.channel,
      key: entry.key,
      scheduledAt: entry.scheduledAt.toISOString(),
      fireAt: entry.fireAt.toISOString(),
    }));
  res.json({ count: pending.length, pending });
});

router.get("/orders", (_req, res) => {
  const monitor = resolveOrderEventMonitor();
  if (!monitor) {
    res.json({ enabled: false, count: 0, orders: [] });
    return;
  }

  const orders = monitor.getOrders().map(serializeOrder);
  res.json({ enabled: true, count: orders.length, orders });
});

router.get("/orders/:orderNo", (req, res) => {
  const { orderNo } = orderParamsSchema.parse(req.params);
  const order = resolveOrderEventMonitor()?.getOrder(orderNo);
  if (!order) {
    throw new HttpError(404, `Order ${orderNo} is not being tracked`);
  }
  res.json(serializeOrder(order));
});

export default router;
