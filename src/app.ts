import express from "express";
import { rateLimit } from "express-rate-limit";
import errorHandler from "./middleware/errorHandler";
import notFoundHandler from "./middleware/notFound";
import requestLogger from "./middleware/requestLogger";
import streamRouter from "./routes/stream";
import { resolveHealthService } from "./container";

const app = express();

const limiter = rateLimit({
  windowMs: 60 * 1000, // 1 minute
  limit: 120,
  standardHeaders: true,
  legacyHeaders: false,
});

app.use(express.json());
app.use(requestLogger);

app.use("/api", limiter);

app.get("/health", (_req, res) => {
  const health = resolveHealthService().getHealth();
  res.status(health.status === "unhealthy" ? 503 : 200).json(health);
});

app.use("/api", streamRouter);

app.use(notFoundHandler);
app.use(errorHandler);

export default app;
