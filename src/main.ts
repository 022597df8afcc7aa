import { loadConfigFromDotenv } from "./config.js";
import { describeError } from "./errors.js";
import { log } from "./logger.js";
import { createSupportService } from "./service.js";
import { startMaintenance } from "./tasks/maintenance.js";

// ── Main ─────────────────────────────────────────────────

async function main() {
  const config = loadConfigFromDotenv();

  log.info(
    {
      model: config.llmModel,
      window: config.contextWindowSize,
      routerThreshold: config.routerConfidenceThreshold,
      timeoutMs: config.orchestrationTimeoutMs,
    },
    `🎧 ${config.productName} support agents starting`,
  );

  const service = createSupportService(config);

  const maintenance = startMaintenance(service.store, {
    cronExpression: config.cleanupCron,
    staleDays: config.staleConversationDays,
    logger: log,
    usage: service.usage,
  });

  // Graceful shutdown
  const shutdown = async () => {
    log.info("👋 Shutting down support agents...");
    maintenance.stop();
    await service.close();
    log.info({ usage: service.usage.getSummary() }, "📊 LLM usage");
    process.exit(0);
  };
  process.on("SIGINT", () => void shutdown());
  process.on("SIGTERM", () => void shutdown());

  log.info("✅ Support agents are online. Waiting for work...");
}

main().catch((error: unknown) => {
  log.fatal({ error: describeError(error) }, "💀 Fatal error");
  process.exit(1);
});
