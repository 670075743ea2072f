import { readFile } from "node:fs/promises";
import { z } from "zod";
import { PipelineError, messageFrom } from "./errors.js";
import { REQUIRED_FIELDS } from "./types.js";
import type { RawRecord, ValidRecord, ValidationResult } from "./types.js";

const payloadSchema = z.array(z.record(z.string(), z.unknown()));

/**
 * Presence-only check: values are not inspected, so empty strings and nulls
 * still count as present. Type problems are left to the transformer.
 */
export function isComplete(record: RawRecord): record is ValidRecord {
  return REQUIRED_FIELDS.every((field) => Object.prototype.hasOwnProperty.call(record, field));
}

export function validateBatch(records: readonly RawRecord[]): ValidationResult {
  const validRecords: ValidRecord[] = [];
  let invalidCount = 0;

  for (const record of records) {
    if (isComplete(record)) {
      validRecords.push(record);
    }
    else {
      invalidCount += 1;
    }
  }

  return { validRecords, invalidCount };
}

export function parseRawPayload(text: string): RawRecord[] {
  let data: unknown;
  try {
    data = JSON.parse(text);
  }
  catch (err) {
    throw new PipelineError("payload_parse", `Raw payload is not valid JSON: ${messageFrom(err)}`, { cause: err });
  }

  const parsed = payloadSchema.safeParse(data);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length ? ` at [${issue.path.join(".")}]` : "";
    throw new PipelineError("payload_parse", `Raw payload is not an array of records${where}`, { cause: parsed.error });
  }
  return parsed.data;
}

export async function loadRawRecords(filePath: string): Promise<RawRecord[]> {
  let text: string;
  try {
    text = await readFile(filePath, "utf8");
  }
  catch (err) {
    throw new PipelineError("payload_parse", `Unable to read raw payload ${filePath}: ${messageFrom(err)}`, { cause: err });
  }
  return parseRawPayload(text);
}
