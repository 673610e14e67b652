import { EventEmitter } from "events";
import type { ConnectionState, OutboundEnvelope } from "../types";
import type { Clock, TimerHandle } from "../utils/clock";
import { systemClock } from "../utils/clock";
import { ConnectError, NotConnectedError, ReconnectExhaustedError, describeError } from "../utils/errors";
import { createLogger } from "../utils/logger";
import type { TransportCloseInfo } from "./StreamTransport";

const logger = createLogger("session");

/**
 * What the session needs from a transport. {@link StreamTransport} is the production implementation.
 */
export interface SessionTransport {
  connect(endpoint: string, token: string): Promise<void>;
  send(frame: string): Promise<void>;
  close(code?: number, reason?: string): Promise<void>;
  on(event: "message", listener: (text: string) => void): unknown;
  on(event: "socket_error", listener: (error: Error) => void): unknown;
  on(event: "closed", listener: (info: TransportCloseInfo) => void): unknown;
}

export interface ReconnectPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export interface StreamSessionOptions {
  endpoint: string;
  token: string;
  reconnect: ReconnectPolicy;
  clock?: Clock;
}

export interface SessionStats {
  state: ConnectionState;
  connectCount: number;
  reconnectAttempt: number;
  lastConnectedAt?: Date;
  lastDisconnectedAt?: Date;
  lastError?: string;
}

/**
 * Delay before retry number `attempt` (0-based): `min(base * 2^attempt, cap)`
 */
export const computeBackoffDelay = (attempt: number, policy: Pick<ReconnectPolicy, "baseDelayMs" | "maxDelayMs">): number =>
  Math.min(policy.baseDelayMs * Math.pow(2, attempt), policy.maxDelayMs);

/**
 * Connection state machine over a single transport. Sole owner of reconnection.
 *
 * Events:
 * - `state` (previous, next)
 * - `opened`, `ready` on every successful connect
 * - `reconnected` after `ready` when a prior connection existed
 * - `connection_error` (Error), `closed` ({@link TransportCloseInfo})
 * - `exhausted` ({ attempts }) once the retry budget is spent
 * - `message` (text)
 * - `stopped` after {@link StreamSession.stop}
 */
export class StreamSession extends EventEmitter {
  private state: ConnectionState = "disconnected";
  private readonly transport: SessionTransport;
  private readonly options: StreamSessionOptions;
  private readonly clock: Clock;
  private attempt = 0;
  private connectCount = 0;
  private reconnectTimer?: TimerHandle;
  private startPromise?: Promise<void>;
  private resolveStart?: () => void;
  private rejectStart?: (error: Error) => void;
  private lastConnectedAt?: Date;
  private lastDisconnectedAt?: Date;
  private lastError?: string;

  constructor(transport: SessionTransport, options: StreamSessionOptions) {
    super();
    this.transport = transport;
    this.options = options;
    this.clock = options.clock ?? systemClock;

    this.transport.on("message", (text) => this.emit("message", text));
    this.transport.on("socket_error", (error) => this.handleTransportError(error));
    this.transport.on("closed", (info) => this.handleTransportClosed(info));
  }

  getState(): ConnectionState {
    return this.state;
  }

  isConnected(): boolean {
    return this.state === "connected";
  }

  getStats(): SessionStats {
    return {
      state: this.state,
      connectCount: this.connectCount,
      reconnectAttempt: this.attempt,
      lastConnectedAt: this.lastConnectedAt,
      lastDisconnectedAt: this.lastDisconnectedAt,
      lastError: this.lastError,
    };
  }

  /**
   * Begin connecting. Resolves on the first successful connect (or when stopped first);
   * rejects with {@link ReconnectExhaustedError} if the budget runs out before that.
   * Calling again while connecting, connected or waiting out a backoff returns the same promise.
   */
  start(): Promise<void> {
    if (this.state === "connecting" || this.state === "connected" || this.state === "closing") {
      logger.debug({ state: this.state }, "start() ignored");
      return this.startPromise ?? Promise.resolve();
    }
    if (this.reconnectTimer !== undefined) {
      // Backoff in progress: the scheduled retry settles the current start promise
      logger.debug({ attempt: this.attempt }, "start() joined pending reconnect");
      return this.startPromise ?? Promise.resolve();
    }

    this.attempt = 0;
    this.startPromise = new Promise<void>((resolve, reject) => {
      this.resolveStart = resolve;
      this.rejectStart = reject;
    });
    void this.attemptConnect();
    return this.startPromise;
  }

  /**
   * Serialize and send. Only allowed while connected; never buffered.
   */
  async send(payload: OutboundEnvelope | string): Promise<void> {
    if (this.state !== "connected") {
      throw new NotConnectedError(`Cannot send while session is ${this.state}`);
    }
    const frame = typeof payload === "string" ? payload : JSON.stringify(payload);
    await this.transport.send(frame);
  }

  /**
   * Single cancellation point: stops retrying and closes the transport. Idempotent.
   */
  async stop(): Promise<void> {
    if (this.state === "closed" || this.state === "closing") {
      return;
    }

    this.cancelReconnect();
    this.transition("closing");
    try {
      await this.transport.close(1000, "session stopped");
    } catch (error) {
      logger.warn({ err: error }, "Transport close failed during stop");
    }
    this.transition("closed");
    this.settleStart();
    logger.info("Stream session stopped");
    this.emit("stopped");
  }

  private async attemptConnect(): Promise<void> {
    this.transition("connecting");
    try {
      await this.transport.connect(this.options.endpoint, this.options.token);
    } catch (error) {
      if (this.state !== "connecting") {
        // stop() won the race
        return;
      }
      const connectError = error instanceof ConnectError ? error : new ConnectError(describeError(error), error);
      this.lastError = describeError(connectError);
      logger.warn({ err: connectError, attempt: this.attempt }, "Stream connect failed");
      this.transition("error");
      this.emitSafely("connection_error", connectError);
      this.scheduleReconnect();
      return;
    }

    if (this.state !== "connecting") {
      return;
    }

    const isReconnect = this.connectCount > 0;
    this.connectCount++;
    this.attempt = 0;
    this.lastConnectedAt = new Date(this.clock.now());
    this.transition("connected");
    logger.info({ connectCount: this.connectCount, isReconnect }, "Stream session ready");

    this.settleStart();
    this.emit("opened");
    this.emit("ready");
    if (isReconnect) {
      this.emit("reconnected");
    }
  }

  private handleTransportError(error: Error): void {
    this.lastError = describeError(error);
    if (this.state === "closing" || this.state === "closed") return;
    logger.warn({ err: error, state: this.state }, "Transport reported an error");
    this.emitSafely("connection_error", error);
  }

  private handleTransportClosed(info: TransportCloseInfo): void {
    this.lastDisconnectedAt = new Date(this.clock.now());
    this.emit("closed", info);

    if (this.state !== "connected") {
      return;
    }
    logger.warn({ ...info }, "Stream connection lost");
    this.transition("error");
    this.scheduleReconnect();
  }

  private scheduleReconnect(): void {
    if (this.reconnectTimer !== undefined) return;

    const { reconnect } = this.options;
    if (this.attempt >= reconnect.maxAttempts) {
      logger.error({ attempts: this.attempt }, "Reconnect budget exhausted, giving up");
      const exhausted = new ReconnectExhaustedError(this.attempt);
      this.emit("exhausted", { attempts: this.attempt });
      const reject = this.rejectStart;
      this.resolveStart = undefined;
      this.rejectStart = undefined;
      reject?.(exhausted);
      return;
    }

    const delay = computeBackoffDelay(this.attempt, reconnect);
    this.attempt++;
    logger.info({ delay, attempt: this.attempt, maxAttempts: reconnect.maxAttempts }, "Scheduling stream reconnect");

    this.reconnectTimer = this.clock.setTimeout(() => {
      this.reconnectTimer = undefined;
      if (this.state !== "error") return;
      void this.attemptConnect();
    }, delay);
  }

  private cancelReconnect(): void {
    if (this.reconnectTimer !== undefined) {
      this.clock.clearTimeout(this.reconnectTimer);
      this.reconnectTimer = undefined;
    }
  }

  private settleStart(): void {
    const resolve = this.resolveStart;
    this.resolveStart = undefined;
    this.rejectStart = undefined;
    resolve?.();
  }

  private transition(next: ConnectionState): void {
    const previous = this.state;
    if (previous === next) return;
    this.state = next;
    logger.debug({ from: previous, to: next }, "Session state changed");
    this.emit("state", previous, next);
  }

  // Plain EventEmitter throws on an unobserved "error"; this event name avoids that, listeners are optional
  private emitSafely(event: "connection_error", error: Error): void {
    this.emit(event, error);
  }
}

export default StreamSession;
