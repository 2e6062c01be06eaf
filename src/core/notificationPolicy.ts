import { formatTimeRemaining, minutesUntil } from "../time.js";
import {
  DIMENSION_LABELS,
  DIMENSIONS,
  type Dimension,
  type NotificationRule,
  type NotificationSettings,
  type NotificationState,
  type UsagePeriod,
  type UsageSnapshot,
} from "../types.js";
import {
  addFiredKey,
  cloneNotificationState,
  makeThresholdKey,
  makeTimeRemainingKey,
  purgeDimension,
  withLastUtilization,
} from "./notificationState.js";

// A drop larger than this (in percentage points) is read as a quota
// rollover. The usage payload carries no explicit "period reset" flag.
export const RESET_DROP_PERCENT = 20;

export type NotificationTrigger =
  | { kind: "interval"; level: number }
  | { kind: "threshold"; threshold: number }
  | { kind: "time-remaining"; minutes: number };

export type NotificationEvent = {
  dimension: Dimension;
  utilization: number;
  triggers: NotificationTrigger[];
  title: string;
  body: string;
};

export type NotificationEvaluation = {
  events: NotificationEvent[];
  nextState: NotificationState;
};

export function isUsageReset(lastUtilization: number, utilization: number): boolean {
  return lastUtilization - utilization > RESET_DROP_PERCENT;
}

export function checkIntervalNotification(
  utilization: number,
  lastUtilization: number,
  intervalPercent: number
): number | null {
  if (!(intervalPercent > 0)) return null;
  const currentLevel = Math.floor(utilization / intervalPercent) * intervalPercent;
  const lastLevel = Math.floor(lastUtilization / intervalPercent) * intervalPercent;
  if (currentLevel > lastLevel && currentLevel > 0) return currentLevel;
  return null;
}

export function checkThresholdNotifications(
  dim: Dimension,
  utilization: number,
  lastUtilization: number,
  thresholds: readonly number[],
  fired: readonly string[]
): number[] {
  const crossed: number[] = [];
  for (const t of uniqueAscending(thresholds)) {
    if (utilization >= t && lastUtilization < t && !fired.includes(makeThresholdKey(dim, t))) {
      crossed.push(t);
    }
  }
  return crossed;
}

export function checkTimeRemainingNotifications(
  dim: Dimension,
  resetsAt: string | null,
  thresholdsMinutes: readonly number[],
  fired: readonly string[],
  now: Date
): number[] {
  if (!resetsAt) return [];
  const remaining = minutesUntil(resetsAt, now);
  // Unparseable or already passed: nothing left to count down to.
  if (remaining == null || Date.parse(resetsAt) <= now.getTime()) return [];

  const due: number[] = [];
  for (const m of uniqueAscending(thresholdsMinutes)) {
    if (remaining <= m && !fired.includes(makeTimeRemainingKey(dim, m))) {
      due.push(m);
    }
  }
  return due;
}

function uniqueAscending(values: readonly number[]): number[] {
  return [...new Set(values)].sort((a, b) => a - b);
}

export function describeTrigger(trigger: NotificationTrigger): string {
  switch (trigger.kind) {
    case "interval":
      return `reached ${trigger.level}%`;
    case "threshold":
      return `crossed ${trigger.threshold}% threshold`;
    case "time-remaining":
      return `resets in < ${formatTimeRemaining(trigger.minutes)}`;
  }
}

export function formatNotification(
  dim: Dimension,
  utilization: number,
  triggers: readonly NotificationTrigger[]
): { title: string; body: string } {
  return {
    title: `${DIMENSION_LABELS[dim]} Usage Alert`,
    body: `Usage ${triggers.map(describeTrigger).join(" and ")} (${Math.round(utilization)}% used)`,
  };
}

function evaluateDimension(
  dim: Dimension,
  period: UsagePeriod,
  rule: NotificationRule,
  prev: NotificationState,
  now: Date
): { triggers: NotificationTrigger[]; state: NotificationState } {
  const utilization = period.utilization;
  let state = prev;

  if (isUsageReset(state.last_utilization[dim], utilization)) {
    state = purgeDimension(state, dim);
  }

  const last = state.last_utilization[dim];
  const triggers: NotificationTrigger[] = [];

  if (rule.interval_enabled) {
    const level = checkIntervalNotification(utilization, last, rule.interval_percent);
    if (level != null) triggers.push({ kind: "interval", level });
  }

  if (rule.threshold_enabled) {
    const crossed = checkThresholdNotifications(
      dim,
      utilization,
      last,
      rule.thresholds,
      state.fired_thresholds
    );
    for (const threshold of crossed) {
      triggers.push({ kind: "threshold", threshold });
      state = {
        ...state,
        fired_thresholds: addFiredKey(state.fired_thresholds, makeThresholdKey(dim, threshold)),
      };
    }
  }

  if (rule.time_remaining_enabled) {
    const due = checkTimeRemainingNotifications(
      dim,
      period.resets_at,
      rule.time_remaining_minutes,
      state.fired_time_remaining,
      now
    );
    for (const minutes of due) {
      triggers.push({ kind: "time-remaining", minutes });
      state = {
        ...state,
        fired_time_remaining: addFiredKey(
          state.fired_time_remaining,
          makeTimeRemainingKey(dim, minutes)
        ),
      };
    }
  }

  return { triggers, state: withLastUtilization(state, dim, utilization) };
}

export function evaluateNotifications(
  snapshot: UsageSnapshot,
  settings: NotificationSettings,
  prevState: NotificationState,
  now = new Date()
): NotificationEvaluation {
  if (!settings.enabled) {
    return { events: [], nextState: cloneNotificationState(prevState) };
  }

  let nextState = cloneNotificationState(prevState);
  const events: NotificationEvent[] = [];

  for (const dim of DIMENSIONS) {
    const period = snapshot[dim];
    if (!period) continue;

    const result = evaluateDimension(dim, period, settings[dim], nextState, now);
    nextState = result.state;

    if (result.triggers.length > 0) {
      events.push({
        dimension: dim,
        utilization: period.utilization,
        triggers: result.triggers,
        ...formatNotification(dim, period.utilization, result.triggers),
      });
    }
  }

  return { events, nextState };
}
