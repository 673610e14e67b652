import type {
  PendingUnsubscribe,
  StreamMessage,
  TradeTick,
  VIActivatedInfo,
  VIEvent,
  VIReleasedInfo,
  VIState,
} from "../types";
import { parseTradeTick, parseVIEvent } from "../schemas/realtime";
import { ALL_SYMBOLS, CHANNELS, tradeChannelFor } from "../streaming/protocol";
import type { Clock, TimerHandle } from "../utils/clock";
import { systemClock } from "../utils/clock";
import { createLogger } from "../utils/logger";
import type { SubscriptionRegistry } from "./SubscriptionRegistry";
import type { SymbolMarketDirectory } from "./SymbolMarketDirectory";

const logger = createLogger("vi-cascade");

export type VIActivatedObserver = (symbol: string, info: VIActivatedInfo) => void;
export type VIReleasedObserver = (symbol: string, info: VIReleasedInfo) => void;
export type TradeObserver = (symbol: string, tick: TradeTick) => void;

export interface CascadeSession {
  on(event: "ready" | "stopped", listener: () => void): unknown;
}

export interface VICascadeOptions {
  gracePeriodMs: number;
  clock?: Clock;
}

interface ScheduledUnsubscribe extends PendingUnsubscribe {
  timer: TimerHandle;
}

/**
 * Watches the all-symbols VI feed. An activation subscribes the symbol's trade
 * feed; a release schedules that subscription's removal after a grace period,
 * which a re-activation cancels.
 */
export class VICascadeController {
  private readonly states = new Map<string, VIState>();
  private readonly pending = new Map<string, ScheduledUnsubscribe>();
  private readonly activatedObservers: VIActivatedObserver[] = [];
  private readonly releasedObservers: VIReleasedObserver[] = [];
  private readonly tradeObservers: TradeObserver[] = [];
  private readonly clock: Clock;
  private started = false;

  constructor(
    private readonly registry: SubscriptionRegistry,
    session: CascadeSession,
    private readonly markets: SymbolMarketDirectory,
    private readonly options: VICascadeOptions,
  ) {
    this.clock = options.clock ?? systemClock;

    session.on("stopped", () => this.cancelPendingTimers());
    session.on("ready", () => this.rearmReleasedSymbols());
  }

  async start(): Promise<void> {
    if (this.started) return;
    this.started = true;
    await this.registry.subscribe(
      CHANNELS.VI,
      ALL_SYMBOLS,
      this.registry.requestFor(CHANNELS.VI, ALL_SYMBOLS),
      this.handleVIMessage,
      this.handleVIError,
    );
    logger.info({ gracePeriodMs: this.options.gracePeriodMs }, "VI cascade started");
  }

  /**
   * Drop the VI feed and every derived trade subscription
   */
  async stop(): Promise<void> {
    if (!this.started) return;
    this.started = false;
    this.cancelPendingTimers();

    const states = Array.from(this.states.values());
    this.states.clear();

    await this.registry.unsubscribe(CHANNELS.VI, ALL_SYMBOLS, this.handleVIMessage);
    await Promise.all(
      states.map((state) => this.registry.unsubscribe(state.tradeChannel, state.symbol, this.handleTradeMessage)),
    );
    logger.info({ released: states.length }, "VI cascade stopped");
  }

  onActivated(observer: VIActivatedObserver): () => void {
    return addObserver(this.activatedObservers, observer);
  }

  onReleased(observer: VIReleasedObserver): () => void {
    return addObserver(this.releasedObservers, observer);
  }

  onTrade(observer: TradeObserver): () => void {
    return addObserver(this.tradeObservers, observer);
  }

  /**
   * Symbols currently under VI
   */
  getActiveSymbols(): Map<string, VIState> {
    const active = new Map<string, VIState>();
    for (const [symbol, state] of this.states) {
      if (state.status === "active") active.set(symbol, { ...state });
    }
    return active;
  }

  /**
   * Active symbols plus released ones still inside their grace period
   */
  getTrackedSymbols(): Map<string, VIState> {
    return new Map(Array.from(this.states, ([symbol, state]) => [symbol, { ...state }]));
  }

  getPendingUnsubscribes(): PendingUnsubscribe[] {
    return Array.from(this.pending.values())
      .map(({ symbol, channel, key, scheduledAt, fireAt }) => ({ symbol, channel, key, scheduledAt, fireAt }))
      .sort((a, b) => a.fireAt.getTime() - b.fireAt.getTime());
  }

  /**
   * Apply one VI transition. Repeated activations or releases are no-ops.
   */
  async onVIMessage(event: VIEvent, timestamp: Date): Promise<void> {
    if (event.activationCode !== 0) {
      await this.activate(event, timestamp);
    } else {
      this.release(event, timestamp);
    }
  }

  private async activate(event: VIEvent, timestamp: Date): Promise<void> {
    const { symbol } = event;
    const current = this.states.get(symbol);
    if (current?.status === "active") {
      logger.debug({ symbol, kind: event.kind }, "VI already active");
      return;
    }

    this.cancelPending(symbol);
    const tradeChannel = current?.tradeChannel ?? tradeChannelFor(this.markets.resolve(symbol));
    const next: VIState = {
      symbol,
      status: "active",
      activationTime: timestamp,
      event,
      tradeChannel,
    };
    // Claimed before the subscribe settles so a repeated activation stays a no-op
    this.states.set(symbol, next);

    try {
      await this.registry.subscribe(
        tradeChannel,
        symbol,
        this.registry.requestFor(tradeChannel, symbol),
        this.handleTradeMessage,
      );
    } catch (error) {
      logger.error({ err: error, symbol, tradeChannel }, "Failed to subscribe VI trade feed, activation rolled back");
      this.rollbackActivation(symbol, next, current);
      return;
    }

    logger.info({ symbol, kind: event.kind, tradeChannel }, "VI activated");
    notify(this.activatedObservers, "onActivated", (observer) =>
      observer(symbol, { activationTime: timestamp, event, tradeChannel }),
    );
  }

  private rollbackActivation(symbol: string, attempted: VIState, previous: VIState | undefined): void {
    // A release or stop may already have replaced the entry
    if (this.states.get(symbol) !== attempted) return;
    if (!previous) {
      this.states.delete(symbol);
      return;
    }
    this.states.set(symbol, previous);
    this.schedulePending(symbol, previous.tradeChannel);
  }

  private release(event: VIEvent, timestamp: Date): void {
    const { symbol } = event;
    const current = this.states.get(symbol);
    if (current?.status !== "active") {
      logger.debug({ symbol }, "VI release for inactive symbol ignored");
      return;
    }

    const durationSeconds = Math.max(0, (timestamp.getTime() - current.activationTime.getTime()) / 1000);
    this.states.set(symbol, {
      ...current,
      status: "inactive",
      releaseTime: timestamp,
      durationSeconds,
      event,
    });
    logger.info({ symbol, durationSeconds }, "VI released");

    notify(this.releasedObservers, "onReleased", (observer) =>
      observer(symbol, { activationTime: current.activationTime, releaseTime: timestamp, durationSeconds, event }),
    );

    this.schedulePending(symbol, current.tradeChannel);
  }

  private schedulePending(symbol: string, channel: string): void {
    this.cancelPending(symbol);
    const now = this.clock.now();
    const timer = this.clock.setTimeout(() => {
      void this.firePending(symbol);
    }, this.options.gracePeriodMs);

    this.pending.set(symbol, {
      symbol,
      channel,
      key: symbol,
      scheduledAt: new Date(now),
      fireAt: new Date(now + this.options.gracePeriodMs),
      timer,
    });
  }

  private async firePending(symbol: string): Promise<void> {
    const entry = this.pending.get(symbol);
    if (!entry) return;
    this.pending.delete(symbol);

    if (this.states.get(symbol)?.status === "active") return;
    this.states.delete(symbol);
    logger.info({ symbol, channel: entry.channel }, "Grace period over, dropping VI trade feed");

    try {
      await this.registry.unsubscribe(entry.channel, entry.key, this.handleTradeMessage);
    } catch (error) {
      logger.error({ err: error, symbol }, "Failed to unsubscribe VI trade feed");
    }
  }

  private cancelPending(symbol: string): void {
    const entry = this.pending.get(symbol);
    if (!entry) return;
    this.clock.clearTimeout(entry.timer);
    this.pending.delete(symbol);
  }

  private cancelPendingTimers(): void {
    if (this.pending.size === 0) return;
    logger.debug({ count: this.pending.size }, "Cancelling pending VI unsubscribes");
    for (const symbol of Array.from(this.pending.keys())) {
      this.cancelPending(symbol);
    }
  }

  // Released symbols whose timers were cancelled by a stop get a fresh grace period
  private rearmReleasedSymbols(): void {
    for (const state of this.states.values()) {
      if (state.status === "inactive" && !this.pending.has(state.symbol)) {
        this.schedulePending(state.symbol, state.tradeChannel);
      }
    }
  }

  private readonly handleVIMessage = async (message: StreamMessage): Promise<void> => {
    let event: VIEvent;
    try {
      event = parseVIEvent(message.body);
    } catch (error) {
      logger.warn({ err: error, key: message.key }, "Ignoring malformed VI message");
      return;
    }
    await this.onVIMessage(event, message.receivedAt);
  };

  private readonly handleVIError = (error: Error): void => {
    logger.error({ err: error }, "VI subscription rejected");
  };

  private readonly handleTradeMessage = (message: StreamMessage): void => {
    let tick: TradeTick;
    try {
      tick = parseTradeTick(message.body, message.key);
    } catch (error) {
      logger.warn({ err: error, channel: message.channel, key: message.key }, "Ignoring malformed trade message");
      return;
    }

    if (!this.states.has(tick.symbol)) {
      logger.debug({ symbol: tick.symbol }, "Trade for untracked symbol dropped");
      return;
    }
    notify(this.tradeObservers, "onTrade", (observer) => observer(tick.symbol, tick));
  };
}

const addObserver = <T>(list: T[], observer: T): (() => void) => {
  list.push(observer);
  return () => {
    const index = list.indexOf(observer);
    if (index >= 0) list.splice(index, 1);
  };
};

const notify = <T>(observers: readonly T[], hook: string, call: (observer: T) => void): void => {
  for (const observer of [...observers]) {
    try {
      call(observer);
    } catch (error) {
      logger.error({ err: error, hook }, "VI observer failed");
    }
  }
};

export default VICascadeController;
