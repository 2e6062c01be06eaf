import fs from "node:fs/promises";
import path from "node:path";

import { z } from "zod";

import { emptyNotificationState } from "../core/notificationState.js";
import {
  AutoRefreshConfigSchema,
  DEFAULT_AUTO_REFRESH_CONFIG,
  defaultNotificationRule,
  defaultNotificationSettings,
  NotificationSettingsSchema,
  NotificationStateSchema,
} from "../types.js";

export const PersistedAutoRefreshSchema = AutoRefreshConfigSchema.pick({
  enabled: true,
  interval_minutes: true,
  hourly_refresh_enabled: true,
});

export type PersistedAutoRefresh = z.infer<typeof PersistedAutoRefreshSchema>;

const SettingsDocumentSchema = z.object({
  version: z.literal(1),
  autoRefresh: PersistedAutoRefreshSchema,
  notificationSettings: NotificationSettingsSchema,
  notificationState: NotificationStateSchema,
});

export type SettingsDocument = z.infer<typeof SettingsDocumentSchema>;
export type SettingsKey = Exclude<keyof SettingsDocument, "version">;

export function defaultSettingsDocument(): SettingsDocument {
  return {
    version: 1,
    autoRefresh: {
      enabled: DEFAULT_AUTO_REFRESH_CONFIG.enabled,
      interval_minutes: DEFAULT_AUTO_REFRESH_CONFIG.interval_minutes,
      hourly_refresh_enabled: DEFAULT_AUTO_REFRESH_CONFIG.hourly_refresh_enabled,
    },
    notificationSettings: defaultNotificationSettings(),
    notificationState: emptyNotificationState(),
  };
}

// Loading side: every field carries its own fallback, so a document written
// by an older build (or hand-edited) keeps whatever is still valid.
function lenientRule() {
  const d = defaultNotificationRule();
  return z
    .object({
      interval_enabled: z.boolean().catch(d.interval_enabled),
      interval_percent: z.number().int().positive().catch(d.interval_percent),
      threshold_enabled: z.boolean().catch(d.threshold_enabled),
      thresholds: z
        .array(z.number().int().min(0).max(100))
        .catch(() => [...d.thresholds]),
      time_remaining_enabled: z.boolean().catch(d.time_remaining_enabled),
      time_remaining_minutes: z
        .array(z.number().int().positive())
        .catch(() => [...d.time_remaining_minutes]),
    })
    .catch(() => defaultNotificationRule());
}

const LenientNotificationSettingsSchema = z
  .object({
    enabled: z.boolean().catch(true),
    five_hour: lenientRule(),
    seven_day: lenientRule(),
    seven_day_sonnet: lenientRule(),
    seven_day_opus: lenientRule(),
  })
  .catch(() => defaultNotificationSettings());

const lastValue = z.number().finite().catch(0);

const LenientNotificationStateSchema = z
  .object({
    last_utilization: z
      .object({
        five_hour: lastValue,
        seven_day: lastValue,
        seven_day_sonnet: lastValue,
        seven_day_opus: lastValue,
      })
      .catch(() => emptyNotificationState().last_utilization),
    fired_thresholds: z.array(z.string().min(1)).catch(() => []),
    fired_time_remaining: z.array(z.string().min(1)).catch(() => []),
  })
  .catch(() => emptyNotificationState());

const LenientSettingsDocumentSchema = z
  .object({
    version: z.literal(1).catch(1),
    autoRefresh: z
      .object({
        enabled: z.boolean().catch(DEFAULT_AUTO_REFRESH_CONFIG.enabled),
        interval_minutes: z
          .number()
          .int()
          .positive()
          .catch(DEFAULT_AUTO_REFRESH_CONFIG.interval_minutes),
        hourly_refresh_enabled: z
          .boolean()
          .catch(DEFAULT_AUTO_REFRESH_CONFIG.hourly_refresh_enabled),
      })
      .catch(() => defaultSettingsDocument().autoRefresh),
    notificationSettings: LenientNotificationSettingsSchema,
    notificationState: LenientNotificationStateSchema,
  })
  .catch(() => defaultSettingsDocument());

export interface SettingsStore {
  load(): Promise<SettingsDocument>;
  get<K extends SettingsKey>(key: K): Promise<SettingsDocument[K]>;
  set<K extends SettingsKey>(key: K, value: SettingsDocument[K]): Promise<void>;
  clear(): Promise<void>;
}

export class JsonSettingsStore implements SettingsStore {
  constructor(private readonly filePath: string) {}

  get path(): string {
    return this.filePath;
  }

  async load(): Promise<SettingsDocument> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, "utf8");
    } catch (err) {
      if (isNotFound(err)) return defaultSettingsDocument();
      throw err;
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch {
      return defaultSettingsDocument();
    }
    const doc: SettingsDocument = LenientSettingsDocumentSchema.parse(json);
    return doc;
  }

  async get<K extends SettingsKey>(key: K): Promise<SettingsDocument[K]> {
    const doc = await this.load();
    return doc[key];
  }

  async set<K extends SettingsKey>(key: K, value: SettingsDocument[K]): Promise<void> {
    const current = await this.load();
    const next: SettingsDocument = { ...current, [key]: value };
    await this.write(next);
  }

  async clear(): Promise<void> {
    await fs.rm(this.filePath, { force: true });
  }

  private async write(doc: SettingsDocument): Promise<void> {
    const parsed = SettingsDocumentSchema.parse(doc);
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    await fs.writeFile(this.filePath, JSON.stringify(parsed, null, 2), "utf8");
  }
}

export function isNotFound(err: unknown): boolean {
  return (
    typeof err === "object" &&
    err !== null &&
    "code" in err &&
    err.code === "ENOENT"
  );
}
