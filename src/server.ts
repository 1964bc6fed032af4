/**
 * Batch Inference Service (Entry Point)
 *
 * Thin shell: config, context creation, startup/shutdown.
 * Route registration lives in ./app/http.ts; feature routers in ./routes/*.
 */

import pino from "pino";
import { loadConfig, loadEnvFile, type RuntimeConfig } from "./config";
import { createContext } from "./app/context";
import { createApp } from "./app/http";
import { ConfigError } from "./domain/errors";

loadEnvFile();

let runtimeConfig: RuntimeConfig;
try {
  runtimeConfig = loadConfig();
} catch (error) {
  pino().fatal({ err: error }, "Invalid configuration, refusing to start");
  process.exit(1);
}

(async () => {
  // A missing or invalid model artifact throws ConfigError here, before listen
  const ctx = await createContext(runtimeConfig);
  const { logger, tasks } = ctx;
  const app = createApp(ctx);

  const { port, host } = runtimeConfig;
  const server = app.listen(port, host, () => {
    logger.info({ port, host, localMode: runtimeConfig.localMode }, "Batch inference service listening");
  });

  let shuttingDown = false;
  const shutdown = async (signal: NodeJS.Signals) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info({ signal }, "Received termination signal, initiating graceful shutdown");

    // Force exit after timeout (configurable via GRACEFUL_SHUTDOWN_MS)
    const forceExit = setTimeout(() => {
      logger.warn({ timeoutMs: runtimeConfig.gracefulShutdownMs }, "Graceful shutdown timeout exceeded, forcing exit");
      process.exit(1);
    }, runtimeConfig.gracefulShutdownMs + 1000);
    forceExit.unref();

    // Stop accepting new jobs, then let accepted ones finish delivering
    server.close(() => {
      logger.info("HTTP server closed");
    });

    logger.info({ inFlight: tasks.size, timeoutMs: runtimeConfig.gracefulShutdownMs }, "Draining background jobs");
    const drained = await tasks.drain(runtimeConfig.gracefulShutdownMs);
    logger.info({ drained }, "Background jobs drained");

    try {
      await ctx.close();
    } catch (error) {
      logger.error({ err: error }, "Error while releasing resources");
    }
    logger.info("Graceful shutdown complete");
    process.exit(drained ? 0 : 1);
  };

  process.on("SIGINT", (signal) => void shutdown(signal));
  process.on("SIGTERM", (signal) => void shutdown(signal));
})().catch((error: unknown) => {
  const logger = pino();
  if (error instanceof ConfigError) {
    logger.fatal({ err: error }, "Model artifact unusable, refusing to start");
  } else {
    logger.fatal({ err: error }, "Fatal error during server startup");
  }
  process.exit(1);
});
