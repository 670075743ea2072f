import { mkdtemp, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { PipelineError } from "../src/errors.js";
import { REQUIRED_FIELDS } from "../src/types.js";
import { isComplete, loadRawRecords, parseRawPayload, validateBatch } from "../src/validator.js";

function rawRecord(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    objectid: "1",
    assetid: "1001",
    lifecyclestatus: "ACTIVE",
    servicearea: "East",
    staticpressure: "45",
    latitude: "39.1",
    longitude: "-84.5",
    neighborhood: "Clifton",
    ...overrides
  };
}

function without(field: string, record = rawRecord()): Record<string, unknown> {
  const { [field]: _removed, ...rest } = record;
  return rest;
}

function parseFailure(text: string): PipelineError {
  try {
    parseRawPayload(text);
  }
  catch (err) {
    if (err instanceof PipelineError) return err;
    throw err;
  }
  throw new Error("expected parseRawPayload to throw");
}

describe("isComplete", () => {
  it("accepts records with every required field regardless of value", () => {
    expect(isComplete(rawRecord())).toBe(true);
    const blank = Object.fromEntries(REQUIRED_FIELDS.map((field) => [field, ""]));
    expect(isComplete(blank)).toBe(true);
    expect(isComplete(rawRecord({ staticpressure: null, latitude: "not-a-number" }))).toBe(true);
    expect(isComplete(rawRecord({ extra: "ignored" }))).toBe(true);
  });

  it("rejects a record missing any single required field", () => {
    for (const field of REQUIRED_FIELDS) {
      expect(isComplete(without(field))).toBe(false);
    }
  });
});

describe("validateBatch", () => {
  it("partitions records and keeps input order", () => {
    const records = [
      rawRecord({ objectid: "1" }),
      without("longitude", rawRecord({ objectid: "2" })),
      rawRecord({ objectid: "3" }),
      without("neighborhood", rawRecord({ objectid: "4" })),
      rawRecord({ objectid: "5" })
    ];

    const { validRecords, invalidCount } = validateBatch(records);

    expect(validRecords.map((record) => record.objectid)).toEqual(["1", "3", "5"]);
    expect(invalidCount).toBe(2);
    expect(validRecords.length + invalidCount).toBe(records.length);
  });

  it("does not mutate its input", () => {
    const records = [rawRecord(), without("assetid")];
    const snapshot = structuredClone(records);
    validateBatch(records);
    expect(records).toEqual(snapshot);
  });

  it("handles an empty batch", () => {
    expect(validateBatch([])).toEqual({ validRecords: [], invalidCount: 0 });
  });
});

describe("parseRawPayload", () => {
  it("accepts a top-level array of objects", () => {
    expect(parseRawPayload("[]")).toEqual([]);
    expect(parseRawPayload('[{"objectid":"1"},{"objectid":"2","latitude":null}]')).toEqual([
      { objectid: "1" },
      { objectid: "2", latitude: null }
    ]);
  });

  it("rejects malformed JSON", () => {
    expect(parseFailure("not json").reason).toBe("payload_parse");
  });

  it("rejects payloads that are not arrays of records", () => {
    expect(parseFailure('{"objectid":"1"}').reason).toBe("payload_parse");
    expect(parseFailure("[1, 2]").reason).toBe("payload_parse");
    expect(parseFailure("[[]]").reason).toBe("payload_parse");
    expect(parseFailure("[null]").reason).toBe("payload_parse");
  });
});

describe("loadRawRecords", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "hydrant-validator-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("reads records from a payload file", async () => {
    const filePath = path.join(dir, "payload.json");
    await writeFile(filePath, JSON.stringify([rawRecord()]), "utf8");
    await expect(loadRawRecords(filePath)).resolves.toEqual([rawRecord()]);
  });

  it("reports an unreadable payload as a parse failure", async () => {
    const error = await loadRawRecords(path.join(dir, "missing.json")).catch((err: unknown) => err);
    expect(error).toBeInstanceOf(PipelineError);
    expect(error).toHaveProperty("reason", "payload_parse");
  });
});
