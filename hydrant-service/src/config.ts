import { mkdir } from "node:fs/promises";
import path from "node:path";
import { z } from "zod";

const envSchema = z.object({
  NODE_ENV: z.string().optional(),
  HYDRANT_API_URL: z.string().url().default("https://data.cincinnati-oh.gov/resource/qhw6-ujsg.json"),
  HYDRANT_ROW_LIMIT: z.coerce.number().int().positive().default(50_000),
  FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  RAW_DATA_DIR: z.string().default(path.join(process.cwd(), "data", "raw")),
  PROCESSED_DATA_DIR: z.string().default(path.join(process.cwd(), "data", "processed")),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  CRON_SCHEDULE: z.string().optional(),
  CRON_TIMEZONE: z.string().default("UTC")
});

export type ServiceConfig = z.infer<typeof envSchema>;

type EnvSource = Record<string, string | undefined>;

export function loadConfig(env: EnvSource = process.env): ServiceConfig {
  const parsed = envSchema.parse({
    ...env,
    CRON_SCHEDULE: env.CRON_SCHEDULE?.trim() || undefined
  });

  return {
    ...parsed,
    RAW_DATA_DIR: path.resolve(parsed.RAW_DATA_DIR),
    PROCESSED_DATA_DIR: path.resolve(parsed.PROCESSED_DATA_DIR)
  };
}

/**
 * Creates the raw and processed data directories. Called once per run by the
 * orchestrator; loading the config never touches the filesystem.
 */
export async function prepareDirectories(config: ServiceConfig): Promise<void> {
  await mkdir(config.RAW_DATA_DIR, { recursive: true });
  await mkdir(config.PROCESSED_DATA_DIR, { recursive: true });
}
