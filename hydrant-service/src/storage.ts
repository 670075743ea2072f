import { promises as fs } from "node:fs";
import path from "node:path";
import { ParquetReader, ParquetSchema, ParquetWriter } from "@dsnp/parquetjs";
import type { Logger } from "pino";
import { PipelineError, isNodeError, messageFrom } from "./errors.js";
import { FEATURE_COLUMNS } from "./types.js";
import type { FeatureRecord } from "./types.js";

export const PARTITION_KEY = "load_date";
export const DATASET_FILE = "firehydrants.parquet";

const LOAD_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;
const MISSING_PATH_CODES = new Set(["ENOENT", "ENOTDIR"]);

const featureSchema = new ParquetSchema({
  objectid: { type: "INT64", optional: true },
  assetid: { type: "DOUBLE", optional: true },
  record_hash: { type: "UTF8" },
  latitude: { type: "DOUBLE", optional: true },
  longitude: { type: "DOUBLE", optional: true },
  geo_cluster: { type: "UTF8" },
  neighborhood: { type: "UTF8" },
  servicearea: { type: "UTF8" },
  lifecyclestatus: { type: "UTF8" },
  is_active: { type: "INT32" },
  staticpressure: { type: "DOUBLE", optional: true },
  pressure_category: { type: "UTF8", optional: true },
  pressure_risk_score: { type: "DOUBLE" },
  service_quality: { type: "UTF8" },
  load_date: { type: "DATE" },
  load_timestamp: { type: "TIMESTAMP_MILLIS" }
});

type ParquetValue = string | number | bigint | Date;

function toParquetRow(record: FeatureRecord): Record<string, ParquetValue> {
  const row: Record<string, ParquetValue> = {};
  for (const column of FEATURE_COLUMNS) {
    const value = record[column];
    // parquet encodes missing optional values by omission
    if (value === null) continue;
    if (column === "objectid" && typeof value === "number") {
      row[column] = BigInt(value);
    }
    else if (column === "load_date" && typeof value === "string") {
      row[column] = new Date(`${value}T00:00:00.000Z`);
    }
    else {
      row[column] = value;
    }
  }
  return row;
}

function isRow(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export class PartitionedWriter {
  private readonly baseDir: string;
  private readonly logger?: Logger;

  constructor(baseDir: string, logger?: Logger) {
    this.baseDir = baseDir;
    this.logger = logger;
  }

  partitionDir(loadDate: string, baseDir = this.baseDir): string {
    if (!LOAD_DATE_PATTERN.test(loadDate)) {
      throw new PipelineError("unclassified", `Invalid partition date "${loadDate}"`);
    }
    return path.join(baseDir, `${PARTITION_KEY}=${loadDate}`);
  }

  /**
   * Writes one batch as the single dataset file of its load_date partition,
   * replacing whatever a previous run left there. The caller guarantees a
   * non-empty, single-date batch.
   */
  async write(dataset: readonly FeatureRecord[], baseDir = this.baseDir): Promise<string> {
    if (!dataset.length) {
      throw new PipelineError("unclassified", "Refusing to write an empty partition");
    }
    const loadDate = dataset[0].load_date;
    const stray = dataset.find((row) => row.load_date !== loadDate);
    if (stray) {
      throw new PipelineError("unclassified", `Batch spans several load dates (${loadDate}, ${stray.load_date})`);
    }

    const dir = this.partitionDir(loadDate, baseDir);
    const target = path.join(dir, DATASET_FILE);
    const staging = path.join(dir, `.${DATASET_FILE}.${process.pid}.tmp`);

    try {
      await fs.mkdir(dir, { recursive: true });
      const writer = await ParquetWriter.openFile(featureSchema, staging);
      try {
        for (const record of dataset) {
          await writer.appendRow(toParquetRow(record));
        }
      }
      finally {
        await writer.close();
      }
      await fs.rename(staging, target);
    }
    catch (err) {
      await this.safeUnlink(staging).catch((cleanupErr: unknown) => {
        this.logger?.warn({ err: cleanupErr, staging }, "Failed to remove staged partition file");
      });
      throw new PipelineError("storage_write", `Failed to write partition ${dir}: ${messageFrom(err)}`, { cause: err });
    }

    return target;
  }

  async readPartition(loadDate: string, baseDir = this.baseDir): Promise<Record<string, unknown>[]> {
    const filePath = path.join(this.partitionDir(loadDate, baseDir), DATASET_FILE);
    const reader = await ParquetReader.openFile(filePath);
    try {
      const cursor = reader.getCursor();
      const rows: Record<string, unknown>[] = [];
      let next: unknown = await cursor.next();
      while (next) {
        if (isRow(next)) rows.push(next);
        next = await cursor.next();
      }
      return rows;
    }
    finally {
      await reader.close();
    }
  }

  async listPartitions(baseDir = this.baseDir): Promise<string[]> {
    try {
      const entries = await fs.readdir(baseDir, { withFileTypes: true });
      const prefix = `${PARTITION_KEY}=`;
      return entries
        .filter((entry) => entry.isDirectory() && entry.name.startsWith(prefix))
        .map((entry) => entry.name.slice(prefix.length))
        .filter((loadDate) => LOAD_DATE_PATTERN.test(loadDate))
        .sort();
    }
    catch (err) {
      if (isNodeError(err) && err.code === "ENOENT") return [];
      throw err;
    }
  }

  async safeUnlink(filePath: string): Promise<void> {
    try {
      await fs.unlink(filePath);
    }
    catch (err) {
      if (!isNodeError(err) || !MISSING_PATH_CODES.has(err.code ?? "")) throw err;
    }
  }
}
