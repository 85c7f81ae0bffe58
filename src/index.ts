import { resolve } from "node:path";
import { createLogger } from "./logger";
import { loadConfig, loadSecrets } from "./config";
import type { AppConfig, Secrets } from "./config";
import { createService } from "./service";
import { registerShutdownHandlers } from "./lifecycle";

const CONFIG_PATH = process.env["CONFIG_PATH"] ?? "./config.yaml";

async function main(): Promise<void> {
  const logger = createLogger();

  logger.info("feed-courier starting");

  let config: AppConfig;
  let secrets: Secrets;
  try {
    config = loadConfig(resolve(CONFIG_PATH));
    secrets = loadSecrets(process.env, config.llm.provider);
  } catch (err) {
    logger.fatal(
      { error: err instanceof Error ? err.message : String(err) },
      "configuration error",
    );
    process.exit(1);
  }

  logger.info(
    {
      provider: config.llm.provider,
      model: config.llm.model,
      sources: config.sources.map((s) => s.name),
      targetChannels: secrets.targetChannels,
    },
    "config loaded",
  );

  const service = createService({ config, secrets, logger });

  const jobCount = service.registerJobs();
  if (jobCount === 0) {
    logger.warn("no valid schedule entries, nothing will be published");
  }

  registerShutdownHandlers({
    scheduler: service.scheduler,
    shutdownGraceMs: config.scheduler.shutdownGraceSeconds * 1000,
    logger,
  });

  await service.start();
  logger.info({ jobCount }, "feed-courier running");
}

main().catch((err) => {
  console.error("fatal startup error:", err);
  process.exit(1);
});
