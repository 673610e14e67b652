import type { ErrorRequestHandler } from "express";
import { ZodError } from "zod";
import {
  BackpressureError,
  HttpError,
  NotConnectedError,
  ReconnectExhaustedError,
  SubscriptionError,
} from "../utils/errors";
import { createLogger } from "../utils/logger";

const log = createLogger("http");

const statusFor = (error: Error): number | undefined => {
  if (error instanceof HttpError) return error.statusCode;
  if (error instanceof SubscriptionError) return 409;
  if (error instanceof BackpressureError) return 429;
  if (error instanceof NotConnectedError || error instanceof ReconnectExhaustedError) return 503;
  return undefined;
};

export const errorHandler: ErrorRequestHandler = (error, req, res, _next) => {
  if (error instanceof ZodError) {
    const details = error.issues.map((issue) => ({
      path: issue.path.join("."),
      message: issue.message,
    }));
    log.warn({ path: req.originalUrl, details }, "Invalid request parameters");
    res.status(400).json({
      error: "ValidationError",
      message: "Request validation failed",
      details,
    });
    return;
  }

  const status = error instanceof Error ? statusFor(error) : undefined;
  if (error instanceof Error && status !== undefined) {
    log.warn({ err: error, status }, "Request failed");
    res.status(status).json({
      error: error.name,
      message: error.message,
      ...(error instanceof HttpError && error.details !== undefined && { details: error.details }),
    });
    return;
  }

  log.error({ err: error }, "Unexpected error");
  res.status(500).json({
    error: "InternalServerError",
    message: "An unexpected error occurred",
  });
};

export default errorHandler;
