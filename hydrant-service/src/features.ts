import { createHash } from "node:crypto";
import type { ActivityFlag, PressureCategory, ServiceQuality } from "./types.js";

const ABANDONED_STATUSES = new Set(["AB", "ABANDONED"]);
const ACTIVE_STATUSES = new Set(["ACTIVE", "AC"]);
const NULL_TOKEN = "nan";
// Plain decimal notation only; Number() would also take 0x, 0b and 0o prefixes.
const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i;

export function toNullableNumber(value: unknown): number | null {
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  if (typeof value !== "string") return null;
  const trimmed = value.trim();
  if (!DECIMAL_PATTERN.test(trimmed)) return null;
  const parsed = Number(trimmed);
  return Number.isFinite(parsed) ? parsed : null;
}

export function toNullableInteger(value: unknown): number | null {
  const parsed = toNullableNumber(value);
  return parsed !== null && Number.isInteger(parsed) ? parsed : null;
}

function asText(value: unknown): string {
  if (value === null || value === undefined) return "";
  return typeof value === "string" ? value : String(value);
}

export function normalizeStatus(value: unknown): string {
  return asText(value).trim().toUpperCase();
}

// Same rule as Python's str.title(): a letter following a non-letter starts a word.
export function toTitleCase(value: unknown): string {
  return asText(value)
    .trim()
    .toLowerCase()
    .replace(/\p{L}+/gu, (word) => word.charAt(0).toUpperCase() + word.slice(1));
}

/** Rounds half away from zero, so cells mirror each other across the equator and meridian. */
export function roundTo(value: number, digits: number): number {
  const factor = 10 ** digits;
  const rounded = (Math.sign(value) * Math.round(Math.abs(value) * factor)) / factor;
  return rounded === 0 ? 0 : rounded;
}

export function pressureCategory(pressure: number | null): PressureCategory | null {
  if (pressure === null) return null;
  if (pressure <= 20) return "INSUFFICIENT";
  if (pressure <= 40) return "MARGINAL";
  if (pressure <= 60) return "ADEQUATE";
  return "EXCELLENT";
}

export function activityFlag(status: string): ActivityFlag {
  if (ABANDONED_STATUSES.has(status)) return 2;
  if (ACTIVE_STATUSES.has(status)) return 1;
  return 0;
}

/** Inverse normalised pressure on a 0-100 scale; missing pressure is maximum risk. */
export function pressureRiskScore(pressure: number | null, maxPressure: number | null): number {
  if (pressure === null || maxPressure === null) return 100;
  const score = 100 - (pressure / maxPressure) * 100;
  return Number.isFinite(score) ? roundTo(score, 2) : 100;
}

// ~111 m cells at three decimals.
export function geoCluster(latitude: number | null, longitude: number | null): string {
  const lat = latitude === null ? NULL_TOKEN : String(roundTo(latitude, 3));
  const lon = longitude === null ? NULL_TOKEN : String(roundTo(longitude, 3));
  return `${lat}_${lon}`;
}

/**
 * Later rules override earlier ones, so a pressure of exactly 40 lands in
 * MEDIUM, and an active hydrant with no pressure reading stays UNKNOWN.
 */
export function serviceQuality(flag: ActivityFlag, pressure: number | null): ServiceQuality {
  let quality: ServiceQuality = "UNKNOWN";
  if (flag === 1 && pressure !== null) {
    if (pressure >= 40) quality = "HIGH";
    if (pressure >= 20 && pressure <= 40) quality = "MEDIUM";
    if (pressure < 20) quality = "LOW";
  }
  if (flag === 0) quality = "INACTIVE";
  return quality;
}

export function recordHash(objectid: number | null, latitude: number | null, longitude: number | null): string {
  const hash = createHash("sha1");
  hash.update([objectid, latitude, longitude].map((part) => (part === null ? "null" : String(part))).join("|"));
  return hash.digest("hex").slice(0, 16);
}

export function maxOf(values: readonly number[]): number | null {
  if (!values.length) return null;
  return values.reduce((max, value) => (value > max ? value : max), values[0]);
}

export function medianOf(values: readonly number[]): number | null {
  if (!values.length) return null;
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 0 ? (sorted[mid - 1] + sorted[mid]) / 2 : sorted[mid];
}
