import type { AutoRefreshConfig } from "../types.js";

export type BackoffOptions = {
  baseMs: number;
  maxMs: number;
  multiplier: number;
  jitterRatio: number;
};

export const DEFAULT_BACKOFF: BackoffOptions = {
  baseMs: 30_000,
  maxMs: 5 * 60_000,
  multiplier: 2,
  jitterRatio: 0,
};

// Delay before retry number `attempt` (1-based) after a rate limit:
// base, base*2, base*4, ... capped at maxMs.
export function computeBackoffDelayMs(
  attempt: number,
  opts: BackoffOptions = DEFAULT_BACKOFF,
  random: () => number = Math.random
): number {
  const exponent = Math.max(0, Math.floor(attempt) - 1);
  const raw = opts.baseMs * opts.multiplier ** exponent;
  const clamped = Math.min(opts.maxMs, raw);
  if (opts.jitterRatio <= 0) return clamped;

  const jitter = clamped * opts.jitterRatio;
  const delta = (random() * 2 - 1) * jitter;
  const delayed = clamped + delta;
  return Math.min(opts.maxMs, Math.max(opts.baseMs, Math.round(delayed)));
}

export function intervalMs(config: Pick<AutoRefreshConfig, "interval_minutes">): number {
  return config.interval_minutes * 60_000;
}

export function hasCredentials(
  config: Pick<AutoRefreshConfig, "organization_id" | "session_token">
): boolean {
  return config.organization_id != null && config.session_token != null;
}

const HOUR_MS = 60 * 60_000;
export const HOURLY_REFRESH_GAP_MS = 5_000;
export const HOURLY_REFRESH_JITTER_MAX_SECONDS = 55;

// Time until a few seconds past the next top of the hour (UTC), plus
// 0-55 whole seconds of jitter so clients do not all fetch at once.
export function hourlyRefreshDelayMs(nowMs: number, random: () => number = Math.random): number {
  const untilHour = HOUR_MS - (((nowMs % HOUR_MS) + HOUR_MS) % HOUR_MS);
  const jitterSeconds = Math.min(
    HOURLY_REFRESH_JITTER_MAX_SECONDS,
    Math.floor(random() * (HOURLY_REFRESH_JITTER_MAX_SECONDS + 1))
  );
  return untilHour + HOURLY_REFRESH_GAP_MS + jitterSeconds * 1000;
}

// Regular interval, or the hourly refresh when that comes sooner.
export function nextRefreshAt(
  config: Pick<AutoRefreshConfig, "enabled" | "interval_minutes" | "hourly_refresh_enabled">,
  nowMs = Date.now(),
  random: () => number = Math.random
): number | null {
  if (!config.enabled) return null;
  const regular = nowMs + intervalMs(config);
  if (!config.hourly_refresh_enabled) return regular;
  return Math.min(regular, nowMs + hourlyRefreshDelayMs(nowMs, random));
}
