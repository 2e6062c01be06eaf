import { z } from "zod";

import type { LogLevel } from "./logger.js";
import { appConfigPath, appDataPath } from "./paths.js";

export const APP_VERSION = "0.1.0";
export const DEFAULT_USAGE_BASE_URL = "https://claude.ai";
export const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;
export const DEFAULT_HISTORY_RETENTION_DAYS = 30;

export type RuntimeConfig = {
  usageBaseUrl: string;
  requestTimeoutMs: number;
  logLevel: LogLevel;
  settingsPath: string;
  credentialsPath: string;
  historyPath: string;
  historyRetentionDays: number;
};

type Env = Record<string, string | undefined>;

const trimmed = z
  .string()
  .transform((s) => s.trim())
  .pipe(z.string().min(1));

// Each variable falls back to its default on its own: one bad value
// never takes the whole configuration down.
const RuntimeEnvSchema = z.object({
  METERWATCH_USAGE_BASE_URL: trimmed
    .pipe(z.string().url())
    .transform((u) => u.replace(/\/+$/, ""))
    .catch(DEFAULT_USAGE_BASE_URL),
  METERWATCH_REQUEST_TIMEOUT_MS: z.coerce
    .number()
    .int()
    .min(1_000)
    .max(5 * 60_000)
    .catch(DEFAULT_REQUEST_TIMEOUT_MS),
  METERWATCH_LOG_LEVEL: z
    .string()
    .transform((s) => s.trim().toLowerCase())
    .pipe(z.enum(["debug", "info", "warn", "error"]))
    .catch("info"),
  METERWATCH_SETTINGS_PATH: trimmed.optional().catch(undefined),
  METERWATCH_CREDENTIALS_PATH: trimmed.optional().catch(undefined),
  METERWATCH_HISTORY_PATH: trimmed.optional().catch(undefined),
  METERWATCH_HISTORY_RETENTION_DAYS: z.coerce
    .number()
    .int()
    .min(1)
    .max(3650)
    .catch(DEFAULT_HISTORY_RETENTION_DAYS),
});

export function loadRuntimeConfig(env: Env = process.env): RuntimeConfig {
  const parsed = RuntimeEnvSchema.parse(env);
  return {
    usageBaseUrl: parsed.METERWATCH_USAGE_BASE_URL,
    requestTimeoutMs: parsed.METERWATCH_REQUEST_TIMEOUT_MS,
    logLevel: parsed.METERWATCH_LOG_LEVEL,
    settingsPath: parsed.METERWATCH_SETTINGS_PATH ?? appConfigPath("settings.v1.json"),
    credentialsPath: parsed.METERWATCH_CREDENTIALS_PATH ?? appConfigPath("credentials.json"),
    historyPath: parsed.METERWATCH_HISTORY_PATH ?? appDataPath("usage_history.db"),
    historyRetentionDays: parsed.METERWATCH_HISTORY_RETENTION_DAYS,
  };
}
