import { z } from "zod";

export const DIMENSIONS = [
  "five_hour",
  "seven_day",
  "seven_day_sonnet",
  "seven_day_opus",
] as const;

export type Dimension = (typeof DIMENSIONS)[number];

export const DIMENSION_LABELS: Record<Dimension, string> = {
  five_hour: "5 Hour",
  seven_day: "7 Day",
  seven_day_sonnet: "Sonnet (7 Day)",
  seven_day_opus: "Opus (7 Day)",
};

// Wire and persistence shape. Keys stay snake_case so a snapshot
// round-trips through the API, the history store and events unchanged.
export const UsagePeriodSchema = z.object({
  utilization: z.number().finite().nonnegative(),
  // The service sometimes sends "" for a window with no reset scheduled.
  resets_at: z
    .preprocess((value) => (value === "" ? null : value), z.string().min(1).nullable())
    .default(null),
});

export type UsagePeriod = z.infer<typeof UsagePeriodSchema>;

const OptionalPeriodSchema = UsagePeriodSchema.nullable().default(null);

export const UsageSnapshotSchema = z.object({
  five_hour: OptionalPeriodSchema,
  seven_day: OptionalPeriodSchema,
  seven_day_sonnet: OptionalPeriodSchema,
  seven_day_opus: OptionalPeriodSchema,
});

export type UsageSnapshot = z.infer<typeof UsageSnapshotSchema>;

export const NotificationRuleSchema = z.object({
  interval_enabled: z.boolean(),
  interval_percent: z.number().int().positive(),
  threshold_enabled: z.boolean(),
  thresholds: z.array(z.number().int().min(0).max(100)),
  time_remaining_enabled: z.boolean(),
  time_remaining_minutes: z.array(z.number().int().positive()),
});

export type NotificationRule = z.infer<typeof NotificationRuleSchema>;

export function defaultNotificationRule(): NotificationRule {
  return {
    interval_enabled: false,
    interval_percent: 10,
    threshold_enabled: true,
    thresholds: [80, 90],
    time_remaining_enabled: false,
    time_remaining_minutes: [30, 60],
  };
}

export const NotificationSettingsSchema = z.object({
  enabled: z.boolean(),
  five_hour: NotificationRuleSchema,
  seven_day: NotificationRuleSchema,
  seven_day_sonnet: NotificationRuleSchema,
  seven_day_opus: NotificationRuleSchema,
});

export type NotificationSettings = z.infer<typeof NotificationSettingsSchema>;

export function defaultNotificationSettings(): NotificationSettings {
  return {
    enabled: true,
    five_hour: defaultNotificationRule(),
    seven_day: defaultNotificationRule(),
    seven_day_sonnet: defaultNotificationRule(),
    seven_day_opus: defaultNotificationRule(),
  };
}

export const NotificationStateSchema = z.object({
  last_utilization: z.object({
    five_hour: z.number().finite(),
    seven_day: z.number().finite(),
    seven_day_sonnet: z.number().finite(),
    seven_day_opus: z.number().finite(),
  }),
  fired_thresholds: z.array(z.string().min(1)),
  fired_time_remaining: z.array(z.string().min(1)),
});

export type NotificationState = z.infer<typeof NotificationStateSchema>;

export const AutoRefreshConfigSchema = z.object({
  organization_id: z.string().min(1).nullable(),
  session_token: z.string().min(1).nullable(),
  enabled: z.boolean(),
  interval_minutes: z.number().int().positive(),
  // Also refresh just after each hour starts, when that is sooner than the interval.
  hourly_refresh_enabled: z.boolean(),
});

export type AutoRefreshConfig = z.infer<typeof AutoRefreshConfigSchema>;

export const DEFAULT_AUTO_REFRESH_CONFIG: AutoRefreshConfig = {
  organization_id: null,
  session_token: null,
  enabled: true,
  interval_minutes: 5,
  hourly_refresh_enabled: false,
};

export type Credentials = {
  organizationId: string;
  sessionToken: string;
};

export type UsageUpdatedEvent = {
  snapshot: UsageSnapshot;
  fetched_at: string;
  // Epoch milliseconds of the next scheduled fetch; null while auto-refresh is off.
  next_refresh_at: number | null;
};
