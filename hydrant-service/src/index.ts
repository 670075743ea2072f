import cron from "node-cron";
import type { Logger } from "pino";
import { loadConfig } from "./config.js";
import type { ServiceConfig } from "./config.js";
import { loadLocalEnv } from "./env.js";
import { createLogger } from "./logger.js";
import { LogNotifier } from "./notifier.js";
import { PipelineOrchestrator } from "./pipeline.js";

function schedule(config: ServiceConfig, expression: string, orchestrator: PipelineOrchestrator, logger: Logger) {
  if (!cron.validate(expression)) {
    throw new Error(`Invalid CRON_SCHEDULE "${expression}"`);
  }

  let inFlight: Promise<unknown> | null = null;
  const task = cron.schedule(expression, () => {
    if (inFlight) {
      logger.warn({ schedule: expression }, "Previous hydrant run still in progress; skipping");
      return;
    }
    logger.info({ schedule: expression }, "Running scheduled hydrant pipeline");
    inFlight = orchestrator.run()
      .catch((err) => {
        logger.error({ err }, "Scheduled hydrant run failed");
      })
      .finally(() => {
        inFlight = null;
      });
  }, { timezone: config.CRON_TIMEZONE });

  const close = () => {
    logger.info("Shutting down");
    task.stop();
    process.exit(0);
  };

  process.on("SIGINT", close);
  process.on("SIGTERM", close);

  logger.info({ schedule: expression, timezone: config.CRON_TIMEZONE }, "Hydrant pipeline scheduled");
}

function readConfig(): ServiceConfig {
  try {
    loadLocalEnv();
    return loadConfig();
  }
  catch (err) {
    // No logger exists until the config is valid.
    console.error(err);
    process.exit(1);
  }
}

function bootstrap() {
  const config = readConfig();
  const logger = createLogger(config);
  const orchestrator = new PipelineOrchestrator({
    config,
    logger,
    notifier: new LogNotifier(logger)
  });

  if (config.CRON_SCHEDULE) {
    try {
      schedule(config, config.CRON_SCHEDULE, orchestrator, logger);
    }
    catch (err) {
      logger.fatal({ err }, "Failed to schedule hydrant pipeline");
      process.exitCode = 1;
    }
    return;
  }

  // The orchestrator has already logged and alerted on the failure.
  orchestrator.run().catch(() => {
    logger.fatal({ runId: orchestrator.runId }, "Hydrant pipeline exited with failure");
    process.exitCode = 1;
  });
}

bootstrap();
