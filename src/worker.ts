import { createOrchestrator } from "./bootstrap.js";
import { cfg } from "./config.js";
import { getLogFilePath, isFileLoggingActive, logger } from "./logger.js";

async function main() {
  const orchestrator = await createOrchestrator(cfg);

  logger.info("worker ready", {
    transport: cfg.transportType,
    ...(cfg.transportType === "redis" ? { url: cfg.redisUrl.replace(/:[^:@]+@/, ":***@") } : {}),
    logFile: getLogFilePath(),
    fileLogging: isFileLoggingActive(),
    logLevel: cfg.log.level,
  });

  let stopping = false;
  const shutdown = async (signal: string) => {
    if (stopping) return;
    stopping = true;
    logger.info(`${signal} received, shutting down`);
    try {
      await orchestrator.stop();
      logger.info("shutdown complete");
      process.exit(0);
    } catch (err) {
      logger.error("error during shutdown", { error: err });
      process.exit(1);
    }
  };
  process.on("SIGTERM", () => void shutdown("SIGTERM"));
  process.on("SIGINT", () => void shutdown("SIGINT"));

  await orchestrator.start();
}

main().catch((err) => {
  logger.error("worker failed to start", { error: err });
  process.exit(1);
});
