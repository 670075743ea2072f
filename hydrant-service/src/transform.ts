import type { Logger } from "pino";
import {
  activityFlag,
  geoCluster,
  maxOf,
  medianOf,
  normalizeStatus,
  pressureCategory,
  pressureRiskScore,
  recordHash,
  serviceQuality,
  toNullableInteger,
  toNullableNumber,
  toTitleCase
} from "./features.js";
import type { ActivityFlag, FeatureRecord, FeatureSummary, PressureCategory, ValidRecord } from "./types.js";

export type TransformOptions = {
  now?: Date;
  logger?: Logger;
};

type CoercedRow = {
  objectid: number | null;
  assetid: number | null;
  latitude: number | null;
  longitude: number | null;
  staticpressure: number | null;
  lifecyclestatus: string;
  servicearea: string;
  neighborhood: string;
  is_active: ActivityFlag;
  pressure_category: PressureCategory | null;
};

function coerce(record: ValidRecord): CoercedRow {
  const lifecyclestatus = normalizeStatus(record.lifecyclestatus);
  const staticpressure = toNullableNumber(record.staticpressure);
  return {
    objectid: toNullableInteger(record.objectid),
    assetid: toNullableNumber(record.assetid),
    latitude: toNullableNumber(record.latitude),
    longitude: toNullableNumber(record.longitude),
    staticpressure,
    lifecyclestatus,
    servicearea: toTitleCase(record.servicearea),
    neighborhood: toTitleCase(record.neighborhood),
    is_active: activityFlag(lifecyclestatus),
    pressure_category: pressureCategory(staticpressure)
  };
}

export function utcDate(instant: Date): string {
  return instant.toISOString().slice(0, 10);
}

/**
 * Turns validated records into feature rows. Risk scores and service tiers
 * need batch-wide aggregates, so the batch is processed in two passes:
 * coercion first, then per-row features against the batch max and median.
 */
export function transform(validRecords: readonly ValidRecord[], options: TransformOptions = {}): FeatureRecord[] {
  const { logger } = options;
  logger?.info({ inputCount: validRecords.length }, "Starting transformation");

  if (!validRecords.length) {
    logger?.warn("No valid records provided; returning empty dataset");
    return [];
  }

  const loadTimestamp = options.now ?? new Date();
  const loadDate = utcDate(loadTimestamp);

  const coerced = validRecords.map(coerce);
  const pressures = coerced
    .map((row) => row.staticpressure)
    .filter((value): value is number => value !== null);
  const maxPressure = maxOf(pressures);
  const medianPressure = medianOf(pressures);

  const rows = coerced.map((row): FeatureRecord => ({
    objectid: row.objectid,
    assetid: row.assetid,
    record_hash: recordHash(row.objectid, row.latitude, row.longitude),
    latitude: row.latitude,
    longitude: row.longitude,
    geo_cluster: geoCluster(row.latitude, row.longitude),
    neighborhood: row.neighborhood,
    servicearea: row.servicearea,
    lifecyclestatus: row.lifecyclestatus,
    is_active: row.is_active,
    staticpressure: row.staticpressure ?? medianPressure,
    pressure_category: row.pressure_category,
    pressure_risk_score: pressureRiskScore(row.staticpressure, maxPressure),
    service_quality: serviceQuality(row.is_active, row.staticpressure),
    load_date: loadDate,
    load_timestamp: loadTimestamp
  }));

  if (logger) {
    const summary = summarizeFeatures(rows);
    logger.info({
      rowCount: summary.rowCount,
      activeCount: summary.activeCount,
      activeRatio: summary.activeRatio,
      imputedPressure: rows.length - pressures.length
    }, "Transformation complete");
    logger.info({ serviceQuality: summary.serviceQuality }, "Service quality distribution");
    logger.info({ pressureCategories: summary.pressureCategories }, "Pressure categories");
  }

  return rows;
}

function countBy<K extends string>(values: ReadonlyArray<K | null>): Partial<Record<K, number>> {
  const counts: Partial<Record<K, number>> = {};
  for (const value of values) {
    if (value === null) continue;
    counts[value] = (counts[value] ?? 0) + 1;
  }
  return counts;
}

export function summarizeFeatures(rows: readonly FeatureRecord[]): FeatureSummary {
  const activeCount = rows.filter((row) => row.is_active === 1).length;
  return {
    rowCount: rows.length,
    activeCount,
    activeRatio: rows.length ? activeCount / rows.length : 0,
    pressureCategories: countBy(rows.map((row) => row.pressure_category)),
    serviceQuality: countBy(rows.map((row) => row.service_quality))
  };
}
