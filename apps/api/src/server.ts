import { buildServer } from "./app.js";
import { loadConfig } from "./config.js";
import type { AppConfig } from "./config.js";
import { createLogger } from "./logger.js";

const SHUTDOWN_TIMEOUT_MS = 30_000;

async function main() {
  let config: AppConfig;
  try {
    config = loadConfig();
  } catch (err) {
    createLogger().error({ err }, "Failed to load configuration");
    process.exit(1);
  }

  const server = await buildServer({ config });

  // Graceful shutdown: drain connections on SIGTERM/SIGINT
  const shutdown = async (signal: string) => {
    server.log.info(`Received ${signal}, shutting down gracefully`);

    // Hard timeout: force exit if close doesn't complete in time
    const forceTimer = setTimeout(() => {
      server.log.warn(`Shutdown did not complete within ${SHUTDOWN_TIMEOUT_MS}ms, forcing exit`);
      process.exit(1);
    }, SHUTDOWN_TIMEOUT_MS);
    forceTimer.unref();

    try {
      await server.close();
    } catch (err) {
      server.log.error({ err }, "Error during graceful shutdown");
    }
    process.exit(0);
  };

  process.on("SIGTERM", () => void shutdown("SIGTERM"));
  process.on("SIGINT", () => void shutdown("SIGINT"));

  try {
    await server.listen({ port: config.port, host: config.host });
    server.log.info({ host: config.host, port: config.port }, "itemgate API server listening");
  } catch (err) {
    server.log.error({ err }, "Failed to start server");
    process.exit(1);
  }
}

main().catch((err: unknown) => {
  createLogger().error({ err }, "Fatal error during startup");
  process.exit(1);
});
