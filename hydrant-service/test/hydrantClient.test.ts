import { mkdtemp, readFile, rm } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import pino from "pino";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { loadConfig } from "../src/config.js";
import type { ServiceConfig } from "../src/config.js";
import { PipelineError } from "../src/errors.js";
import { fetchHydrantSnapshot, snapshotPath, snapshotStamp } from "../src/hydrantClient.js";

const logger = pino({ level: "silent" });
const NOW = new Date("2024-06-15T08:30:05.123Z");

type FetchArgs = [input: string | URL | Request, init?: RequestInit];

async function failureOf(promise: Promise<unknown>): Promise<PipelineError> {
  const err = await promise.then(() => null, (reason: unknown) => reason);
  if (err instanceof PipelineError) return err;
  throw new Error(`expected a PipelineError, got ${String(err)}`);
}

describe("snapshot naming", () => {
  it("stamps raw files with a compact UTC timestamp", () => {
    expect(snapshotStamp(NOW)).toBe("20240615T083005Z");
    expect(snapshotPath("/data/raw", NOW)).toBe(path.join("/data/raw", "firehydrants_20240615T083005Z.json"));
  });
});

describe("fetchHydrantSnapshot", () => {
  let rawDir: string;
  let config: ServiceConfig;

  beforeEach(async () => {
    rawDir = await mkdtemp(path.join(os.tmpdir(), "hydrant-fetch-"));
    config = loadConfig({
      HYDRANT_API_URL: "https://data.example.test/resource/hydrants.json",
      RAW_DATA_DIR: rawDir,
      PROCESSED_DATA_DIR: path.join(rawDir, "processed")
    });
  });

  afterEach(async () => {
    vi.unstubAllGlobals();
    await rm(rawDir, { recursive: true, force: true });
  });

  it("stores the response body verbatim and returns its path", async () => {
    const body = '[{"objectid":"1","latitude":"39.1"}]';
    const fetchMock = vi.fn(async (..._args: FetchArgs) => new Response(body, { status: 200 }));
    vi.stubGlobal("fetch", fetchMock);

    const filePath = await fetchHydrantSnapshot(config, logger, NOW);

    expect(filePath).toBe(path.join(rawDir, "firehydrants_20240615T083005Z.json"));
    expect(await readFile(filePath, "utf8")).toBe(body);

    const requested = new URL(String(fetchMock.mock.calls[0][0]));
    expect(requested.origin + requested.pathname).toBe("https://data.example.test/resource/hydrants.json");
    expect(requested.searchParams.get("$limit")).toBe("50000");
    expect(fetchMock.mock.calls[0][1]?.method).toBe("GET");
  });

  it("keeps a row limit already present in the configured URL", async () => {
    const fetchMock = vi.fn(async (..._args: FetchArgs) => new Response("[]", { status: 200 }));
    vi.stubGlobal("fetch", fetchMock);

    await fetchHydrantSnapshot({ ...config, HYDRANT_API_URL: "https://data.example.test/h.json?$limit=10" }, logger, NOW);

    const requested = new URL(String(fetchMock.mock.calls[0][0]));
    expect(requested.searchParams.getAll("$limit")).toEqual(["10"]);
  });

  it("raises an upstream error for non-2xx responses", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => new Response("maintenance", { status: 503 })));

    const error = await failureOf(fetchHydrantSnapshot(config, logger, NOW));

    expect(error.reason).toBe("upstream_fetch");
    expect(error.message).toBe("Hydrant API returned HTTP 503: maintenance");
  });

  it("raises an upstream error when the request itself fails", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => {
      throw new TypeError("fetch failed");
    }));

    const error = await failureOf(fetchHydrantSnapshot(config, logger, NOW));

    expect(error.reason).toBe("upstream_fetch");
    expect(error.message).toBe("Hydrant API request failed: fetch failed");
  });

  it("raises an upstream error when the payload cannot be stored", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => new Response("[]", { status: 200 })));

    const error = await failureOf(fetchHydrantSnapshot({ ...config, RAW_DATA_DIR: path.join(rawDir, "missing") }, logger, NOW));

    expect(error.reason).toBe("upstream_fetch");
  });
});
