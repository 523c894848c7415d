import { Server } from "http";
import { config } from "./config";
import { logger } from "./utils/logger";
import { createApp, createServices } from "./app";

async function startServer(): Promise<Server> {
  logger.info("Starting command gate...");

  const services = createServices(config);
  const app = createApp(config, services);

  const server = app.listen(config.port, () => {
    logger.info("Command gate started", {
      port: config.port,
      environment: config.nodeEnv,
      osType: config.osType,
      model: config.model,
    });
  });

  server.on("error", (err: Error) => {
    logger.error("Server startup error", {
      error: err.message,
      stack: err.stack,
      port: config.port,
    });
    process.exit(1);
  });

  // Graceful shutdown; pending approvals are dropped with the process
  const shutdown = (signal: string) => {
    logger.info(`Received ${signal}, starting graceful shutdown...`, {
      abandonedApprovals: services.ledger.size,
    });

    services.runner.killAllProcesses();

    server.close(() => {
      logger.info("HTTP server closed");
      process.exit(0);
    });

    // Force exit after 10 seconds
    setTimeout(() => {
      logger.error("Forced shutdown after timeout");
      process.exit(1);
    }, 10000).unref();
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));

  process.on("uncaughtException", (error) => {
    logger.error("Uncaught exception", { error });
    process.exit(1);
  });

  process.on("unhandledRejection", (reason) => {
    logger.error("Unhandled rejection", { reason });
    process.exit(1);
  });

  return server;
}

// Start the server
if (require.main === module) {
  startServer().catch((error) => {
    logger.error("Failed to start server", { error });
    process.exit(1);
  });
}

export { startServer };
