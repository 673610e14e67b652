import { EventEmitter } from "events";
import WebSocket from "ws";
import { createLogger } from "../utils/logger";
import { BackpressureError, ConnectError, NotConnectedError, describeError } from "../utils/errors";
import { KEEPALIVE_CHANNEL } from "../streaming/protocol";

const logger = createLogger("transport");

/**
 * Subset of the `ws` client the transport relies on
 */
export interface StreamSocket {
  readonly readyState: number;
  send(data: string, cb?: (err?: Error) => void): void;
  ping(): void;
  close(code?: number, reason?: string): void;
  terminate(): void;
  on(event: "open", listener: () => void): unknown;
  on(event: "message", listener: (data: WebSocket.RawData, isBinary: boolean) => void): unknown;
  on(event: "error", listener: (err: Error) => void): unknown;
  on(event: "close", listener: (code: number, reason: Buffer) => void): unknown;
  on(event: "pong", listener: () => void): unknown;
  on(event: "unexpected-response", listener: (req: unknown, res: { statusCode?: number }) => void): unknown;
  removeAllListeners(): unknown;
}

export type SocketFactory = (url: string, options: WebSocket.ClientOptions) => StreamSocket;

export interface StreamTransportOptions {
  handshakeTimeoutMs: number;
  keepaliveIntervalMs: number;
  keepaliveTimeoutMs: number;
  maxOutboundQueue: number;
  socketFactory?: SocketFactory;
}

export interface TransportCloseInfo {
  code: number;
  reason: string;
}

const defaultSocketFactory: SocketFactory = (url, options) => new WebSocket(url, options);

const OPEN = 1;
const CLOSED = 3;

const rawToText = (data: WebSocket.RawData): string => {
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf8");
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString("utf8");
  return data.toString("utf8");
};

/**
 * Owns one physical WebSocket. Emits:
 * - `opened`
 * - `message` (text) for every frame except keepalive probes
 * - `socket_error` (Error)
 * - `closed` ({@link TransportCloseInfo})
 *
 * Never reconnects on its own.
 */
export class StreamTransport extends EventEmitter {
  private socket?: StreamSocket;
  private writeChain: Promise<void> = Promise.resolve();
  private pendingWrites = 0;
  private keepaliveTimer?: NodeJS.Timeout;
  private pongTimer?: NodeJS.Timeout;
  private abortConnect?: (error: ConnectError) => void;
  private readonly options: StreamTransportOptions;
  private readonly socketFactory: SocketFactory;

  constructor(options: StreamTransportOptions) {
    super();
    this.options = options;
    this.socketFactory = options.socketFactory ?? defaultSocketFactory;
  }

  isOpen(): boolean {
    return this.socket?.readyState === OPEN;
  }

  /**
   * Open the socket and wait for the handshake to complete.
   */
  connect(endpoint: string, token: string): Promise<void> {
    this.abortPendingConnect("Superseded by a new connect()");
    if (this.socket) {
      this.teardown();
    }

    const socket = this.socketFactory(endpoint, {
      handshakeTimeout: this.options.handshakeTimeoutMs,
      headers: {
        Authorization: `Bearer ${token}`,
      },
    });
    this.socket = socket;

    return new Promise<void>((resolve, reject) => {
      let settled = false;

      const fail = (error: ConnectError) => {
        if (settled) return;
        settled = true;
        this.abortConnect = undefined;
        clearTimeout(handshakeTimer);
        if (this.socket === socket) {
          this.teardown();
        }
        // ws leaves the handshake open once "unexpected-response" has a listener
        if (socket.readyState !== CLOSED) {
          socket.terminate();
        }
        reject(error);
      };

      const handshakeTimer = setTimeout(() => {
        fail(new ConnectError(`Handshake timed out after ${this.options.handshakeTimeoutMs}ms`));
      }, this.options.handshakeTimeoutMs);
      this.abortConnect = fail;

      socket.on("unexpected-response", (_req, res) => {
        fail(new ConnectError(`Handshake rejected with HTTP ${res.statusCode ?? "unknown"}`));
      });

      socket.on("open", () => {
        if (settled) return;
        settled = true;
        this.abortConnect = undefined;
        clearTimeout(handshakeTimer);
        this.startKeepalive(socket);
        logger.info({ endpoint }, "Stream socket opened");
        this.emit("opened");
        resolve();
      });

      socket.on("message", (data) => {
        if (this.socket !== socket) return;
        this.handleFrame(socket, rawToText(data));
      });

      socket.on("pong", () => {
        if (this.pongTimer) {
          clearTimeout(this.pongTimer);
          this.pongTimer = undefined;
        }
      });

      socket.on("error", (error) => {
        if (!settled) {
          fail(new ConnectError(`Socket failed during handshake: ${error.message}`, error));
          return;
        }
        if (this.socket !== socket) return;
        logger.error({ err: error }, "Stream socket error");
        this.emit("socket_error", error);
      });

      socket.on("close", (code, reason) => {
        if (!settled) {
          fail(new ConnectError(`Socket closed during handshake (code ${code})`));
          return;
        }
        if (this.socket !== socket) return;
        this.teardown();
        const info: TransportCloseInfo = { code, reason: reason.toString("utf8") };
        logger.warn(info, "Stream socket closed");
        this.emit("closed", info);
      });
    });
  }

  /**
   * Queue a frame behind every earlier write on this socket.
   * Resolves once `ws` reports the frame flushed.
   */
  send(frame: string): Promise<void> {
    const socket = this.socket;
    if (!socket || socket.readyState !== OPEN) {
      return Promise.reject(new NotConnectedError());
    }
    if (this.pendingWrites >= this.options.maxOutboundQueue) {
      return Promise.reject(new BackpressureError(this.options.maxOutboundQueue));
    }

    this.pendingWrites++;
    const write = this.writeChain.then(
      () =>
        new Promise<void>((resolve, reject) => {
          if (this.socket !== socket || socket.readyState !== OPEN) {
            reject(new NotConnectedError("Socket closed before frame was written"));
            return;
          }
          socket.send(frame, (error) => (error ? reject(error) : resolve()));
        }),
    );

    // Keep the chain alive past a failed write
    this.writeChain = write.catch(() => undefined);
    return write.finally(() => {
      this.pendingWrites--;
    });
  }

  /**
   * Close the current socket, if any. Emits `closed` for an open socket.
   */
  async close(code = 1000, reason = "client closing"): Promise<void> {
    const socket = this.socket;
    if (!socket) return;

    const wasOpen = socket.readyState === OPEN;
    this.abortPendingConnect("Connection closed before handshake completed");
    this.teardown();
    try {
      socket.close(code, reason);
    } catch (error) {
      logger.warn({ err: error }, "Error while closing stream socket");
      socket.terminate();
    }

    if (wasOpen) {
      this.emit("closed", { code, reason } satisfies TransportCloseInfo);
    }
  }

  private abortPendingConnect(reason: string): void {
    const abort = this.abortConnect;
    this.abortConnect = undefined;
    abort?.(new ConnectError(reason));
  }

  private handleFrame(socket: StreamSocket, text: string): void {
    if (this.isKeepaliveProbe(text)) {
      socket.send(text, (error) => {
        if (error) {
          logger.warn({ err: error }, "Failed to answer keepalive probe");
        }
      });
      return;
    }
    this.emit("message", text);
  }

  private isKeepaliveProbe(text: string): boolean {
    const trimmed = text.trim();
    if (trimmed === "ping") return true;
    if (!trimmed.includes(KEEPALIVE_CHANNEL)) return false;
    try {
      const parsed: unknown = JSON.parse(trimmed);
      if (typeof parsed !== "object" || parsed === null || !("header" in parsed)) return false;
      const header: unknown = parsed.header;
      return typeof header === "object" && header !== null && "tr_cd" in header && header.tr_cd === KEEPALIVE_CHANNEL;
    } catch {
      return false;
    }
  }

  private startKeepalive(socket: StreamSocket): void {
    this.stopKeepalive();
    this.keepaliveTimer = setInterval(() => {
      if (socket.readyState !== OPEN || this.pongTimer) return;
      try {
        socket.ping();
      } catch (error) {
        logger.warn({ err: error }, "Failed to send keepalive ping");
        return;
      }
      this.pongTimer = setTimeout(() => {
        this.pongTimer = undefined;
        logger.warn({ timeoutMs: this.options.keepaliveTimeoutMs }, "Keepalive timed out, terminating socket");
        this.emit("socket_error", new Error(`No pong within ${this.options.keepaliveTimeoutMs}ms`));
        socket.terminate();
      }, this.options.keepaliveTimeoutMs);
    }, this.options.keepaliveIntervalMs);
  }

  private stopKeepalive(): void {
    if (this.keepaliveTimer) {
      clearInterval(this.keepaliveTimer);
      this.keepaliveTimer = undefined;
    }
    if (this.pongTimer) {
      clearTimeout(this.pongTimer);
      this.pongTimer = undefined;
    }
  }

  private teardown(): void {
    this.stopKeepalive();
    const socket = this.socket;
    this.socket = undefined;
    if (!socket) return;
    socket.removeAllListeners();
    // ws emits "error" on close-before-open; keep a sink so it is not thrown
    socket.on("error", (error) => {
      logger.debug({ error: describeError(error) }, "Ignoring error from discarded socket");
    });
  }
}

export default StreamTransport;
