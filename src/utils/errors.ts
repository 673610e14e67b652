export class ConnectError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = "ConnectError";
  }
}

export class NotConnectedError extends Error {
  constructor(message = "Stream is not connected") {
    super(message);
    this.name = "NotConnectedError";
  }
}

/**
 * Inbound frame that could not be decoded into an envelope or a channel body
 */
export class ProtocolError extends Error {
  constructor(message: string, readonly frame?: string) {
    super(message);
    this.name = "ProtocolError";
  }
}

export class SubscriptionError extends Error {
  constructor(
    message: string,
    readonly channel: string,
    readonly key: string,
    readonly responseCode?: string,
  ) {
    super(message);
    this.name = "SubscriptionError";
  }
}

export class CallbackError extends Error {
  constructor(
    message: string,
    readonly callbackName: string,
    cause?: unknown,
  ) {
    super(message, { cause });
    this.name = "CallbackError";
  }
}

export class BackpressureError extends Error {
  constructor(readonly limit: number) {
    super(`Outbound queue is full (${limit} frames pending)`);
    this.name = "BackpressureError";
  }
}

export class ReconnectExhaustedError extends Error {
  constructor(readonly attempts: number) {
    super(`Reconnect budget exhausted after ${attempts} attempts`);
    this.name = "ReconnectExhaustedError";
  }
}

export class HttpError extends Error {
  constructor(
    readonly statusCode: number,
    message: string,
    readonly details?: unknown,
  ) {
    super(message);
    this.name = "HttpError";
  }
}

export const describeError = (error: unknown): string =>
  error instanceof Error ? `${error.name}: ${error.message}` : String(error);
