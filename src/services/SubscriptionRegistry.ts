import type {
  EnvelopeHeader,
  MessageCallback,
  OutboundEnvelope,
  StreamMessage,
  SubscriptionErrorCallback,
  SubscriptionRecord,
  SubscriptionRequest,
  SubscriptionSnapshot,
} from "../types";
import { parseEnvelope } from "../schemas/realtime";
import {
  SUCCESS_RESPONSE_CODE,
  buildSubscriptionRequest,
  channelFamily,
  isWildcardKey,
  subscriptionId,
} from "../streaming/protocol";
import { RingBuffer } from "../utils/RingBuffer";
import type { Clock } from "../utils/clock";
import { systemClock } from "../utils/clock";
import { CallbackError, NotConnectedError, SubscriptionError, describeError } from "../utils/errors";
import { createLogger } from "../utils/logger";

const logger = createLogger("registry");

/**
 * Session surface the registry depends on
 */
export interface RegistrySession {
  isConnected(): boolean;
  send(payload: OutboundEnvelope): Promise<void>;
  on(event: "ready" | "reconnected", listener: () => void): unknown;
  on(event: "message", listener: (text: string) => void): unknown;
}

export interface SubscriptionRegistryOptions {
  token: string;
  maxSubscriptions: number;
  inboundQueueSize: number;
  clock?: Clock;
}

export type RegistryErrorHandler = (error: Error, message?: StreamMessage) => void;

const callbackName = (fn: (...args: never[]) => unknown): string => fn.name || "anonymous";

const stringField = (value: unknown): string | undefined => (typeof value === "string" ? value : undefined);

/**
 * Desired-state map of (channel, key) subscriptions plus the inbound router.
 *
 * Mutations and the sends they cause run one at a time on a promise chain, and
 * replay after every `ready` joins the same chain. Inbound frames are queued in
 * a bounded FIFO and dispatched synchronously in arrival order.
 */
export class SubscriptionRegistry {
  private readonly records = new Map<string, SubscriptionRecord>();
  private readonly defaultHandlers: MessageCallback[] = [];
  private readonly errorHandlers: RegistryErrorHandler[] = [];
  private readonly inbound: RingBuffer<string>;
  private readonly clock: Clock;
  private operations: Promise<void> = Promise.resolve();
  private draining = false;
  private droppedMessages = 0;
  // Bumped on every "ready"; a replay from an older connection stops when it changes
  private readyGeneration = 0;

  constructor(
    private readonly session: RegistrySession,
    private readonly options: SubscriptionRegistryOptions,
  ) {
    this.inbound = new RingBuffer<string>(options.inboundQueueSize);
    this.clock = options.clock ?? systemClock;

    this.session.on("ready", () => {
      const generation = ++this.readyGeneration;
      void this.enqueue(() => this.replay(generation));
    });
    this.session.on("reconnected", () => {
      logger.info({ subscriptions: this.records.size }, "Stream reconnected, desired subscriptions restored");
    });
    this.session.on("message", (text) => this.handleMessage(text));
  }

  isConnected(): boolean {
    return this.session.isConnected();
  }

  /**
   * Register/unregister frames for a key, signed with this registry's token
   */
  requestFor(channel: string, key: string): SubscriptionRequest {
    return buildSubscriptionRequest(this.options.token, channel, key);
  }

  /**
   * Add `callback` to (channel, key). The first callback for a key creates the
   * record and, when connected, sends the register frame. Repeating a callback
   * already on the key is a no-op.
   */
  subscribe(
    channel: string,
    key: string,
    request: SubscriptionRequest,
    callback: MessageCallback,
    onError?: SubscriptionErrorCallback,
  ): Promise<void> {
    return this.enqueue(async () => {
      const id = subscriptionId(channel, key);
      const existing = this.records.get(id);

      if (existing) {
        if (!existing.callbacks.includes(callback)) {
          existing.callbacks.push(callback);
        }
        if (onError && !existing.errorCallbacks.includes(onError)) {
          existing.errorCallbacks.push(onError);
        }
        return;
      }

      if (this.records.size >= this.options.maxSubscriptions) {
        throw new SubscriptionError(
          `Subscription limit of ${this.options.maxSubscriptions} reached`,
          channel,
          key,
        );
      }

      const record: SubscriptionRecord = {
        channel,
        key,
        request,
        callbacks: [callback],
        errorCallbacks: onError ? [onError] : [],
        subscribedAt: new Date(this.clock.now()),
      };
      this.records.set(id, record);
      logger.info({ channel, key }, "Subscription added");

      if (this.session.isConnected()) {
        await this.sendRequest(record.request.register, record, "subscribe");
      }
    });
  }

  /**
   * Remove one callback, or the whole key when no callback is given.
   * The unregister frame is best-effort: the record goes away either way.
   */
  unsubscribe(channel: string, key: string, callback?: MessageCallback): Promise<void> {
    return this.enqueue(async () => {
      const id = subscriptionId(channel, key);
      const record = this.records.get(id);
      if (!record) return;

      if (callback) {
        record.callbacks = record.callbacks.filter((cb) => cb !== callback);
        if (record.callbacks.length > 0) return;
      }

      this.records.delete(id);
      logger.info({ channel, key }, "Subscription removed");

      if (this.session.isConnected()) {
        await this.sendRequest(record.request.unregister, record, "unsubscribe");
      }
    });
  }

  /**
   * Catch-all for messages no subscription matched. Returns a disposer.
   */
  onDefault(callback: MessageCallback): () => void {
    this.defaultHandlers.push(callback);
    return () => {
      const index = this.defaultHandlers.indexOf(callback);
      if (index >= 0) this.defaultHandlers.splice(index, 1);
    };
  }

  /**
   * Receives error responses that no subscription claims. Returns a disposer.
   */
  onError(handler: RegistryErrorHandler): () => void {
    this.errorHandlers.push(handler);
    return () => {
      const index = this.errorHandlers.indexOf(handler);
      if (index >= 0) this.errorHandlers.splice(index, 1);
    };
  }

  has(channel: string, key: string): boolean {
    return this.records.has(subscriptionId(channel, key));
  }

  getSubscriptions(): SubscriptionSnapshot[] {
    return Array.from(this.records.values()).map((record) => ({
      channel: record.channel,
      key: record.key,
      callbackCount: record.callbacks.length,
      subscribedAt: record.subscribedAt,
      lastDeliveredAt: record.lastDeliveredAt,
    }));
  }

  getDroppedMessageCount(): number {
    return this.droppedMessages;
  }

  /**
   * Resolves once every operation queued so far has finished
   */
  flush(): Promise<void> {
    return this.operations;
  }

  /**
   * Feed one raw frame into the router
   */
  handleMessage(text: string): void {
    const evicted = this.inbound.push(text);
    if (evicted !== undefined) {
      this.droppedMessages++;
      logger.warn({ capacity: this.inbound.maxSize, dropped: this.droppedMessages }, "Inbound queue full, dropped oldest message");
    }
    if (this.draining) return;

    this.draining = true;
    try {
      let next = this.inbound.shift();
      while (next !== undefined) {
        this.dispatch(next);
        next = this.inbound.shift();
      }
    } finally {
      this.draining = false;
    }
  }

  private enqueue<T>(operation: () => Promise<T>): Promise<T> {
    const run = this.operations.then(operation);
    this.operations = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  private async replay(generation: number): Promise<void> {
    if (this.records.size === 0) return;
    logger.info({ count: this.records.size }, "Replaying subscriptions");

    for (const record of Array.from(this.records.values())) {
      if (generation !== this.readyGeneration || !this.session.isConnected()) {
        logger.warn({ channel: record.channel, key: record.key }, "Connection changed during replay, stopping");
        return;
      }
      const failure = await this.sendRequest(record.request.register, record, "replay");
      if (failure instanceof NotConnectedError) {
        logger.warn({ channel: record.channel, key: record.key }, "Connection dropped during replay, stopping");
        return;
      }
    }
  }

  /**
   * Best-effort send; the failure is logged and handed back instead of thrown.
   */
  private async sendRequest(
    frame: OutboundEnvelope,
    record: SubscriptionRecord,
    action: string,
  ): Promise<unknown> {
    try {
      await this.session.send(frame);
      return undefined;
    } catch (error) {
      logger.warn({ err: error, channel: record.channel, key: record.key, action }, "Failed to send subscription frame");
      return error;
    }
  }

  private dispatch(text: string): void {
    let header: EnvelopeHeader;
    let body: Record<string, unknown>;
    try {
      ({ header, body } = parseEnvelope(text));
    } catch (error) {
      logger.warn({ err: error }, "Dropping malformed stream message");
      return;
    }

    const channel = header.tr_cd ?? stringField(body.tr_cd) ?? "";
    const key = stringField(body.tr_key) ?? header.tr_key ?? "";
    const message: StreamMessage = {
      channel,
      key,
      family: channelFamily(channel),
      header,
      body,
      receivedAt: new Date(this.clock.now()),
    };

    if (header.rsp_cd !== undefined && header.rsp_cd !== SUCCESS_RESPONSE_CODE) {
      this.dispatchError(message, header.rsp_cd, header.rsp_msg);
      return;
    }

    if (header.rsp_cd === SUCCESS_RESPONSE_CODE && Object.keys(body).length === 0) {
      logger.debug({ channel, key, msg: header.rsp_msg }, "Subscription acknowledged");
      return;
    }

    const targets = this.resolveTargets(channel, key);
    if (targets.length === 0) {
      if (this.defaultHandlers.length === 0) {
        logger.debug({ channel, key }, "No handler for stream message");
        return;
      }
      for (const handler of [...this.defaultHandlers]) {
        this.invoke(handler, message);
      }
      return;
    }

    const invoked = new Set<MessageCallback>();
    for (const record of targets) {
      record.lastDeliveredAt = message.receivedAt;
      for (const callback of [...record.callbacks]) {
        if (invoked.has(callback)) continue;
        invoked.add(callback);
        this.invoke(callback, message);
      }
    }
  }

  /**
   * Exact key first, then all-symbols records on the same channel, then on the same family
   */
  private resolveTargets(channel: string, key: string): SubscriptionRecord[] {
    const exact = this.records.get(subscriptionId(channel, key));
    if (exact) return [exact];

    const family = channelFamily(channel);
    if (family === "unknown") return [];

    const wildcards = Array.from(this.records.values()).filter((record) => isWildcardKey(record.key));
    const sameChannel = wildcards.filter((record) => record.channel === channel);
    if (sameChannel.length > 0) return sameChannel;
    return wildcards.filter((record) => channelFamily(record.channel) === family);
  }

  private dispatchError(message: StreamMessage, code: string, reason?: string): void {
    const error = new SubscriptionError(
      `Broker rejected ${message.channel}/${message.key || "(all)"}: ${reason ?? code}`,
      message.channel,
      message.key,
      code,
    );
    const record = this.records.get(subscriptionId(message.channel, message.key));
    const handlers: SubscriptionErrorCallback[] =
      record && record.errorCallbacks.length > 0 ? [...record.errorCallbacks] : [...this.errorHandlers];

    if (handlers.length === 0) {
      logger.warn({ channel: message.channel, key: message.key, code, reason }, "Unhandled stream error response");
      return;
    }
    for (const handler of handlers) {
      this.invokeErrorHandler(handler, error, message);
    }
  }

  private invoke(callback: MessageCallback, message: StreamMessage): void {
    this.runIsolated(callbackName(callback), message.channel, () => callback(message));
  }

  private invokeErrorHandler(handler: SubscriptionErrorCallback, error: Error, message: StreamMessage): void {
    this.runIsolated(callbackName(handler), message.channel, () => handler(error, message));
  }

  // One failing callback must not stop the others or the router
  private runIsolated(name: string, channel: string, run: () => void | Promise<void>): void {
    const report = (error: unknown) => {
      const wrapped = new CallbackError(`Callback '${name}' failed: ${describeError(error)}`, name, error);
      logger.error({ err: wrapped, channel }, "Stream callback failed");
    };

    try {
      const result = run();
      if (result instanceof Promise) {
        result.catch(report);
      }
    } catch (error) {
      report(error);
    }
  }
}

export default SubscriptionRegistry;
