/**
 * Configuration Module
 *
 * Reads optional JSON files from the config/ directory and applies
 * environment overrides:
 *   config/assistant.json  timezone, timeouts, database path
 *   config/turso.json      remote libSQL database { url, authToken }
 *   GOOGLE_ACCOUNT         which credentials-<account>.json to use
 *   CALENDAR_TIMEZONE      timezone sent with event times
 */

import * as fs from "fs";
import * as path from "path";
import { z } from "zod";
import type { DatabaseLocation } from "./crm-db.js";

export interface TimeoutConfig {
  createMs: number;
  updateMs: number;
  deleteMs: number;
}

export interface AssistantConfig {
  configDir: string;
  googleAccount: string;
  timezone: string;
  timeouts: TimeoutConfig;
  database: DatabaseLocation;
}

export const DEFAULT_TIMEOUTS: TimeoutConfig = {
  createMs: 10_000,
  updateMs: 10_000,
  deleteMs: 5_000,
};

export const DEFAULT_TIMEZONE = "America/Mexico_City";

const assistantFileSchema = z
  .object({
    timezone: z.string().min(1).optional(),
    databasePath: z.string().min(1).optional(),
    timeouts: z
      .object({
        createMs: z.number().int().positive().optional(),
        updateMs: z.number().int().positive().optional(),
        deleteMs: z.number().int().positive().optional(),
      })
      .optional(),
  })
  .strict();

const tursoFileSchema = z.object({
  url: z.string().min(1),
  authToken: z.string().min(1),
});

export interface LoadConfigOptions {
  /** Base directory holding config/ and data/ (default: process.cwd()) */
  rootDir?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Read and validate a JSON file; returns null when the file does not exist
 */
export function readJsonFile<T>(filePath: string, schema: z.ZodType<T>): T | null {
  if (!fs.existsSync(filePath)) {
    return null;
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(filePath, "utf-8"));
  } catch (err) {
    throw new Error(`Invalid JSON in ${filePath}: ${err instanceof Error ? err.message : String(err)}`);
  }
  const result = schema.safeParse(parsed);
  if (!result.success) {
    throw new Error(`Invalid configuration in ${filePath}:\n${z.prettifyError(result.error)}`);
  }
  return result.data;
}

export function loadConfig(options: LoadConfigOptions = {}): AssistantConfig {
  const rootDir = options.rootDir ?? process.cwd();
  const env = options.env ?? process.env;
  const configDir = path.join(rootDir, "config");

  const file = readJsonFile(path.join(configDir, "assistant.json"), assistantFileSchema) ?? {};
  const turso = readJsonFile(path.join(configDir, "turso.json"), tursoFileSchema);

  let database: DatabaseLocation;
  if (file.databasePath) {
    database = {
      url: file.databasePath === ":memory:" ? ":memory:" : path.resolve(rootDir, file.databasePath),
    };
  } else if (turso) {
    database = { url: turso.url, authToken: turso.authToken };
  } else {
    database = { url: path.join(rootDir, "data", "crm.db") };
  }

  return {
    configDir,
    googleAccount: env.GOOGLE_ACCOUNT || "personal",
    timezone: env.CALENDAR_TIMEZONE || file.timezone || DEFAULT_TIMEZONE,
    timeouts: { ...DEFAULT_TIMEOUTS, ...file.timeouts },
    database,
  };
}
