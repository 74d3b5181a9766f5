/**
 * Settings — configuration lookup backed by environment variables.
 *
 * Config keys use the `module:<id>:<key>` form; each maps to an upper-snake
 * environment variable, e.g. `module:sovereign-memory:db_path` →
 * `SOVEREIGN_MEMORY_DB_PATH`. A `.env` file in the working directory is
 * loaded on import.
 */

import "dotenv/config";

export type ConfigLookup = (key: string) => string | undefined;

export function configKeyToEnv(key: string): string {
  return key
    .replace(/^module:/, "")
    .replace(/[^A-Za-z0-9]+/g, "_")
    .replace(/^_+|_+$/g, "")
    .toUpperCase();
}

export function getConfig(key: string): string | undefined {
  const value = process.env[configKeyToEnv(key)];
  return value === "" ? undefined : value;
}

/** Lookup over a fixed map, for embedding hosts and tests. */
export function staticConfig(values: Record<string, string>): ConfigLookup {
  return (key) => values[key];
}
