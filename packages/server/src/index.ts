import { createLogger, loadConfig } from "@homeroom/core";
import { createServer } from "./server.js";

async function main() {
  const config = loadConfig();
  const log = createLogger(config.log);
  for (const warning of config.warnings) {
    log.warn(warning);
  }

  const server = await createServer({ config, logger: log });

  try {
    await server.listen({ host: config.server.host, port: config.server.port });
  } catch (err) {
    log.fatal({ err }, "Failed to start server");
    process.exit(1);
  }

  // Graceful shutdown
  let shuttingDown = false;
  const shutdown = async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    log.info(`${signal} received, shutting down gracefully...`);
    try {
      await server.close();
      log.info("Server closed.");
      process.exit(0);
    } catch (err) {
      log.error({ err }, "Error during shutdown");
      process.exit(1);
    }
  };

  process.on("SIGINT", () => void shutdown("SIGINT"));
  process.on("SIGTERM", () => void shutdown("SIGTERM"));
}

main().catch((err) => {
  console.error("Fatal error:", err);
  process.exit(1);
});
