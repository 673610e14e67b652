import type { RequestHandler } from "express";
import { createLogger } from "../utils/logger";

const log = createLogger("http");

export const requestLogger: RequestHandler = (req, res, next) => {
  const start = process.hrtime.bigint();

  res.on("finish", () => {
    const durationMs = Number(process.hrtime.bigint() - start) / 1_000_000;
    const fields = {
      method: req.method,
      path: req.originalUrl,
      status: res.statusCode,
      durationMs: Number(durationMs.toFixed(3)),
    };
    // 5xx at warn, everything else at debug
    if (res.statusCode >= 500) {
      log.warn(fields, "HTTP request failed");
    } else {
      log.debug(fields, "HTTP request completed");
    }
  });

  next();
};

export default requestLogger;
