import http from "http";
import app from "./app";
import env from "./config/env";
import validateEnvironment from "./config/validateEnv";
import logger from "./utils/logger";
import {
  resolveOrderEventMonitor,
  resolveStreamSession,
  resolveSymbolMarketDirectory,
  resolveVICascadeController,
} from "./container";

const server = http.createServer(app);

const start = async () => {
  try {
    const { errors } = validateEnvironment(env);
    if (errors.length > 0) {
      logger.error({ errors: errors.length }, "FATAL: Invalid stream configuration");
      process.exit(1);
    }

    const marketDirectory = resolveSymbolMarketDirectory();
    await marketDirectory.loadFromFile(env.symbolMarketsFile);

    const session = resolveStreamSession();
    session.on("exhausted", ({ attempts }: { attempts: number }) => {
      logger.error({ attempts }, "CRITICAL: Stream reconnect budget exhausted, manual restart required");
    });

    // Register desired subscriptions first; they are sent on the first "ready"
    const viController = resolveVICascadeController();
    await viController.start();

    const orderMonitor = resolveOrderEventMonitor();
    if (orderMonitor) {
      await orderMonitor.start();
    }

    server.listen(env.port, () => {
      logger.info({ port: env.port }, "HTTP server is listening");
    });

    session.start().catch((err) => {
      logger.error({ err }, "Stream session failed to connect");
    });
  } catch (error) {
    logger.error({ err: error }, "Failed to start server");
    process.exit(1);
  }
};

void start();

const shutdown = (signal: string) => {
  logger.info({ signal }, "Received shutdown signal");

  resolveStreamSession()
    .stop()
    .catch((err) => {
      logger.error({ err }, "Error while stopping stream session");
    })
    .finally(() => {
      server.close((error) => {
        if (error) {
          logger.error({ err: error }, "Error during shutdown");
          process.exitCode = 1;
        }
        logger.info("Server closed");
        process.exit();
      });
    });
};

process.on("SIGTERM", () => shutdown("SIGTERM"));
process.on("SIGINT", () => shutdown("SIGINT"));
