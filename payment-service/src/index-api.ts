import { shutdownTracing } from "./tracing";
import { config } from "./config";
import { pool } from "./db/client";
import { runMigration } from "./db/migrate";
import { createApp } from "./api";
import { createServices } from "./container";
import { connectKafka, disconnectKafka } from "./kafka";
import { logger } from "./logger";

async function main(): Promise<void> {
  await runMigration(pool);
  await connectKafka();
  const { orchestrator, tokens } = createServices(pool);
  const app = createApp({ orchestrator, tokens });
  app.listen(config.port, () => {
    logger.info("Payment API listening", { port: config.port });
  });
}

main().catch((err) => {
  logger.error("Payment API startup failed", { error: String(err) });
  process.exit(1);
});

process.on("SIGTERM", () => {
  Promise.allSettled([shutdownTracing(), disconnectKafka(), pool.end()]).finally(() => process.exit(0));
});
