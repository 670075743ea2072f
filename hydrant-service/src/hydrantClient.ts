import { writeFile } from "node:fs/promises";
import path from "node:path";
import type { Logger } from "pino";
import type { ServiceConfig } from "./config.js";
import { PipelineError, messageFrom } from "./errors.js";

type FetchSettings = Pick<ServiceConfig, "HYDRANT_API_URL" | "HYDRANT_ROW_LIMIT" | "FETCH_TIMEOUT_MS" | "RAW_DATA_DIR">;

function buildRequestUrl(config: FetchSettings): string {
  const url = new URL(config.HYDRANT_API_URL);
  if (!url.searchParams.has("$limit")) {
    url.searchParams.set("$limit", String(config.HYDRANT_ROW_LIMIT));
  }
  return url.toString();
}

// 2024-06-15T08:30:00.000Z -> 20240615T083000Z
export function snapshotStamp(instant: Date): string {
  return instant.toISOString().replace(/\.\d{3}Z$/, "Z").replace(/[-:]/g, "");
}

export function snapshotPath(rawDir: string, instant: Date): string {
  return path.join(rawDir, `firehydrants_${snapshotStamp(instant)}.json`);
}

async function requestSnapshot(config: FetchSettings): Promise<string> {
  const url = buildRequestUrl(config);
  let response: Response;
  try {
    response = await fetch(url, {
      method: "GET",
      headers: { Accept: "application/json" },
      signal: AbortSignal.timeout(config.FETCH_TIMEOUT_MS)
    });
  }
  catch (err) {
    if (err instanceof Error && err.name === "TimeoutError") {
      throw new PipelineError("upstream_fetch", `Hydrant API request timed out after ${config.FETCH_TIMEOUT_MS} ms`, { cause: err });
    }
    throw new PipelineError("upstream_fetch", `Hydrant API request failed: ${messageFrom(err)}`, { cause: err });
  }

  if (!response.ok) {
    const text = await response.text().catch(() => "");
    throw new PipelineError("upstream_fetch", `Hydrant API returned HTTP ${response.status}: ${text || response.statusText}`);
  }

  try {
    return await response.text();
  }
  catch (err) {
    throw new PipelineError("upstream_fetch", `Failed to read hydrant API response: ${messageFrom(err)}`, { cause: err });
  }
}

/**
 * Downloads the current hydrant snapshot and stores it verbatim under the raw
 * data directory. Returns the path of the stored payload.
 */
export async function fetchHydrantSnapshot(config: FetchSettings, logger: Logger, now = new Date()): Promise<string> {
  logger.info({ url: config.HYDRANT_API_URL }, "Starting data ingestion");
  const body = await requestSnapshot(config);
  const filePath = snapshotPath(config.RAW_DATA_DIR, now);

  try {
    await writeFile(filePath, body, "utf8");
  }
  catch (err) {
    throw new PipelineError("upstream_fetch", `Failed to store raw payload ${filePath}: ${messageFrom(err)}`, { cause: err });
  }

  logger.info({ filePath, bytes: Buffer.byteLength(body) }, "Raw payload saved");
  return filePath;
}
