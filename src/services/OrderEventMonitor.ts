import type { OrderEvent, OrderProgress, StreamMessage } from "../types";
import { parseOrderEvent } from "../schemas/realtime";
import { ACCOUNT_KEY, ORDER_CHANNELS } from "../streaming/protocol";
import type { Clock } from "../utils/clock";
import { systemClock } from "../utils/clock";
import { createLogger } from "../utils/logger";
import type { SubscriptionRegistry } from "./SubscriptionRegistry";

const logger = createLogger("orders");

export type OrderEventObserver = (event: OrderEvent, progress: OrderProgress | undefined) => void;

/**
 * Follows the account's order lifecycle channels and keeps per-order fill progress.
 * Cancelled and rejected orders stop being tracked.
 */
export class OrderEventMonitor {
  private readonly orders = new Map<string, OrderProgress>();
  private readonly observers: OrderEventObserver[] = [];
  private readonly clock: Clock;
  private started = false;

  constructor(
    private readonly registry: SubscriptionRegistry,
    clock: Clock = systemClock,
  ) {
    this.clock = clock;
  }

  async start(): Promise<void> {
    if (this.started) return;
    this.started = true;
    await Promise.all(
      ORDER_CHANNELS.map((channel) =>
        this.registry.subscribe(
          channel,
          ACCOUNT_KEY,
          this.registry.requestFor(channel, ACCOUNT_KEY),
          this.handleOrderMessage,
          this.handleOrderError,
        ),
      ),
    );
    logger.info({ channels: ORDER_CHANNELS }, "Order event monitor started");
  }

  async stop(): Promise<void> {
    if (!this.started) return;
    this.started = false;
    await Promise.all(
      ORDER_CHANNELS.map((channel) => this.registry.unsubscribe(channel, ACCOUNT_KEY, this.handleOrderMessage)),
    );
  }

  onOrderEvent(observer: OrderEventObserver): () => void {
    this.observers.push(observer);
    return () => {
      const index = this.observers.indexOf(observer);
      if (index >= 0) this.observers.splice(index, 1);
    };
  }

  getOrders(): OrderProgress[] {
    return Array.from(this.orders.values(), (order) => ({ ...order }));
  }

  getOrder(orderNo: string): OrderProgress | undefined {
    const order = this.orders.get(orderNo);
    return order ? { ...order } : undefined;
  }

  /**
   * Fold one order event into the tracked progress
   */
  apply(event: OrderEvent): OrderProgress | undefined {
    const now = new Date(this.clock.now());

    switch (event.kind) {
      case "accepted": {
        const progress: OrderProgress = {
          orderNo: event.orderNo,
          symbol: event.symbol,
          side: event.side,
          orderQty: event.quantity,
          filledQty: 0,
          completed: false,
          lastEventAt: now,
        };
        this.orders.set(event.orderNo, progress);
        return progress;
      }
      case "filled": {
        const progress = this.orders.get(event.orderNo) ?? {
          orderNo: event.orderNo,
          symbol: event.symbol,
          side: event.side,
          orderQty: event.quantity,
          filledQty: 0,
          completed: false,
          lastEventAt: now,
        };
        progress.filledQty += event.quantity;
        progress.completed = progress.filledQty >= progress.orderQty;
        progress.lastEventAt = now;
        this.orders.set(event.orderNo, progress);
        if (progress.completed) {
          logger.info({ orderNo: event.orderNo, symbol: progress.symbol, filledQty: progress.filledQty }, "Order fully filled");
        }
        return progress;
      }
      case "amended": {
        // An amendment may come back under a new order number
        const previous =
          (event.originalOrderNo ? this.orders.get(event.originalOrderNo) : undefined) ?? this.orders.get(event.orderNo);
        if (event.originalOrderNo) this.orders.delete(event.originalOrderNo);

        const progress: OrderProgress = {
          orderNo: event.orderNo,
          symbol: event.symbol || previous?.symbol || "",
          side: event.side ?? previous?.side,
          orderQty: event.quantity > 0 ? event.quantity : previous?.orderQty ?? 0,
          filledQty: previous?.filledQty ?? 0,
          completed: false,
          lastEventAt: now,
        };
        progress.completed = progress.orderQty > 0 && progress.filledQty >= progress.orderQty;
        this.orders.set(event.orderNo, progress);
        return progress;
      }
      case "cancelled":
      case "rejected": {
        this.orders.delete(event.orderNo);
        if (event.originalOrderNo) this.orders.delete(event.originalOrderNo);
        if (event.kind === "rejected") {
          logger.warn({ orderNo: event.orderNo, reason: event.rejectReason }, "Order rejected");
        }
        return undefined;
      }
    }
  }

  private readonly handleOrderMessage = (message: StreamMessage): void => {
    let event: OrderEvent;
    try {
      event = parseOrderEvent(message.channel, message.body);
    } catch (error) {
      logger.warn({ err: error, channel: message.channel }, "Ignoring malformed order message");
      return;
    }

    const progress = this.apply(event);
    logger.debug({ kind: event.kind, orderNo: event.orderNo, symbol: event.symbol }, "Order event");

    for (const observer of [...this.observers]) {
      try {
        observer(event, progress ? { ...progress } : undefined);
      } catch (error) {
        logger.error({ err: error, orderNo: event.orderNo }, "Order observer failed");
      }
    }
  };

  private readonly handleOrderError = (error: Error): void => {
    logger.error({ err: error }, "Order channel subscription rejected");
  };
}

export default OrderEventMonitor;
