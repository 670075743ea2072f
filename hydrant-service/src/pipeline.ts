import { randomUUID } from "node:crypto";
import type { Logger } from "pino";
import { prepareDirectories } from "./config.js";
import type { ServiceConfig } from "./config.js";
import { PipelineError, toPipelineError } from "./errors.js";
import { fetchHydrantSnapshot } from "./hydrantClient.js";
import { withRunId } from "./logger.js";
import { notifySafely } from "./notifier.js";
import type { Notifier } from "./notifier.js";
import { PartitionedWriter } from "./storage.js";
import { transform } from "./transform.js";
import type { FeatureRecord, PipelineStage, RawRecord, StageReport, ValidRecord, ValidationResult } from "./types.js";
import { loadRawRecords, validateBatch } from "./validator.js";

export type PipelineState =
  | "INIT"
  | "INGESTED"
  | "VALIDATED"
  | "GATE_CHECKED"
  | "TRANSFORMED"
  | "PERSISTED"
  | "DONE"
  | "FAILED";

export type PipelineContext = {
  config: ServiceConfig;
  logger: Logger;
  notifier: Notifier;
};

export type PipelineStages = {
  prepare: (config: ServiceConfig) => Promise<void>;
  fetch: (config: ServiceConfig, logger: Logger) => Promise<string>;
  load: (handle: string) => Promise<RawRecord[]>;
  validate: (records: readonly RawRecord[]) => ValidationResult;
  transform: (records: readonly ValidRecord[], logger: Logger) => FeatureRecord[];
  write: (dataset: readonly FeatureRecord[], baseDir: string) => Promise<string>;
};

export type PipelineRunResult = {
  runId: string;
  state: "DONE";
  partitionPath: string;
  loadDate: string;
  reports: StageReport[];
};

export function createRunId(): string {
  return randomUUID().slice(0, 8);
}

export function defaultStages(config: ServiceConfig, logger?: Logger): PipelineStages {
  const writer = new PartitionedWriter(config.PROCESSED_DATA_DIR, logger);
  return {
    prepare: prepareDirectories,
    fetch: (cfg, logger) => fetchHydrantSnapshot(cfg, logger),
    load: loadRawRecords,
    validate: validateBatch,
    transform: (records, logger) => transform(records, { logger }),
    write: (dataset, baseDir) => writer.write(dataset, baseDir)
  };
}

export class PipelineOrchestrator {
  private readonly context: PipelineContext;
  private readonly stages: PipelineStages;
  private currentState: PipelineState = "INIT";
  private currentRunId: string | null = null;

  constructor(context: PipelineContext, stages?: Partial<PipelineStages>) {
    this.context = context;
    this.stages = { ...defaultStages(context.config, context.logger), ...stages };
  }

  get state(): PipelineState {
    return this.currentState;
  }

  get runId(): string | null {
    return this.currentRunId;
  }

  async run(runId = createRunId()): Promise<PipelineRunResult> {
    const { config, notifier } = this.context;
    const logger = withRunId(this.context.logger, runId);
    const reports: StageReport[] = [];
    this.currentRunId = runId;
    this.currentState = "INIT";

    const report = (stage: PipelineStage, input: number, output: number, failed = 0) => {
      const entry: StageReport = { stage, input, output, failed };
      reports.push(entry);
      logger.info(entry, `Stage ${stage} complete`);
    };

    logger.info("Starting hydrant pipeline");

    try {
      await this.stages.prepare(config).catch((err: unknown) => {
        throw toPipelineError(err, "storage_write");
      });

      const handle = await this.stages.fetch(config, logger);
      report("fetch", 0, 1);
      this.transition("INGESTED", logger);

      const rawRecords = await this.stages.load(handle);
      const { validRecords, invalidCount } = this.stages.validate(rawRecords);
      report("validate", rawRecords.length, validRecords.length, invalidCount);
      this.transition("VALIDATED", logger);

      if (!validRecords.length) {
        throw new PipelineError("empty_valid_set", "No valid data to process after validation");
      }
      this.transition("GATE_CHECKED", logger);

      const dataset = this.stages.transform(validRecords, logger);
      report("transform", validRecords.length, dataset.length, validRecords.length - dataset.length);
      if (!dataset.length) {
        throw new PipelineError("empty_transform", "Transformation returned no rows; aborting pipeline");
      }
      this.transition("TRANSFORMED", logger);

      const partitionPath = await this.stages.write(dataset, config.PROCESSED_DATA_DIR);
      report("write", dataset.length, dataset.length);
      this.transition("PERSISTED", logger);

      this.transition("DONE", logger);
      logger.info({ partitionPath, rows: dataset.length, invalidCount }, "Hydrant pipeline completed successfully");

      return {
        runId,
        state: "DONE",
        partitionPath,
        loadDate: dataset[0].load_date,
        reports
      };
    }
    catch (err) {
      const failure = toPipelineError(err);
      const failedIn = this.currentState;
      this.currentState = "FAILED";
      logger.error({ err: failure, reason: failure.reason, failedIn }, "Hydrant pipeline failed");
      await notifySafely(notifier, `Hydrant pipeline failed (run ${runId}): ${failure.message}`, logger);
      throw failure;
    }
  }

  private transition(next: PipelineState, logger: Logger) {
    logger.debug({ from: this.currentState, to: next }, "Pipeline state change");
    this.currentState = next;
  }
}
