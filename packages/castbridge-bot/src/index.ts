import { CastBridgeBot } from "./bot.js";
import { loadConfig } from "./config.js";
import { createLogger } from "./logger.js";

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger(config.logLevel);

  let stopping: Promise<void> | undefined;
  const shutdown = (exitCode: number): Promise<void> => {
    stopping ??= bot.stop().then(
      () => {
        process.exit(exitCode);
      },
      (error: unknown) => {
        logger.error({ err: error }, "shutdown failed");
        process.exit(1);
      },
    );
    return stopping;
  };

  const bot: CastBridgeBot = new CastBridgeBot(config, logger, (error) => {
    logger.fatal({ err: error }, "startup failed");
    void shutdown(1);
  });

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      logger.info({ signal }, "received shutdown signal");
      void shutdown(0);
    });
  }

  await bot.start();
}

main().catch((error) => {
  console.error(error);
  process.exit(1);
});
