import { existsSync } from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { config as loadEnvFile } from "dotenv";

export type LocalEnvOptions = {
  /** Directory holding `.env` and `.env.local`; defaults to the project root. */
  root?: string;
  /** Target map for the parsed values; defaults to `process.env`. */
  processEnv?: Record<string, string>;
};

/** Walks up from `startDir` to the nearest directory containing a package.json. */
export function findProjectRoot(startDir: string): string | null {
  let dir = path.resolve(startDir);
  for (;;) {
    if (existsSync(path.join(dir, "package.json"))) return dir;
    const parent = path.dirname(dir);
    if (parent === dir) return null;
    dir = parent;
  }
}

/**
 * Loads `.env`, then `.env.local` on top of it. Values already present in the
 * environment win over `.env`; `.env.local` overrides both.
 * Returns the files that were read.
 */
export function loadLocalEnv(options: LocalEnvOptions = {}): string[] {
  const root = options.root ?? findProjectRoot(path.dirname(fileURLToPath(import.meta.url)));
  if (!root) return [];

  const loaded: string[] = [];
  for (const { file, override } of [{ file: ".env", override: false }, { file: ".env.local", override: true }]) {
    const envPath = path.join(root, file);
    if (!existsSync(envPath)) continue;
    const result = options.processEnv
      ? loadEnvFile({ path: envPath, override, processEnv: options.processEnv })
      : loadEnvFile({ path: envPath, override });
    if (result.error) throw result.error;
    loaded.push(envPath);
  }
  return loaded;
}
