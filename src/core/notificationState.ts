import {
  DIMENSIONS,
  type Dimension,
  type NotificationState,
} from "../types.js";

export function emptyNotificationState(): NotificationState {
  return {
    last_utilization: {
      five_hour: 0,
      seven_day: 0,
      seven_day_sonnet: 0,
      seven_day_opus: 0,
    },
    fired_thresholds: [],
    fired_time_remaining: [],
  };
}

export function cloneNotificationState(state: NotificationState): NotificationState {
  return {
    last_utilization: { ...state.last_utilization },
    fired_thresholds: [...state.fired_thresholds],
    fired_time_remaining: [...state.fired_time_remaining],
  };
}

export function makeThresholdKey(dim: Dimension, threshold: number): string {
  return `${dim}:${threshold}`;
}

export function makeTimeRemainingKey(dim: Dimension, minutes: number): string {
  return `${dim}:time:${minutes}`;
}

export function keyDimension(key: string): Dimension | null {
  const head = key.split(":", 1)[0];
  return DIMENSIONS.find((d) => d === head) ?? null;
}

export function addFiredKey(keys: readonly string[], key: string): string[] {
  if (keys.includes(key)) return [...keys];
  return [...keys, key].sort();
}

// Quota rollover: forget everything recorded for `dim` and nothing else.
export function purgeDimension(state: NotificationState, dim: Dimension): NotificationState {
  return {
    last_utilization: { ...state.last_utilization, [dim]: 0 },
    fired_thresholds: state.fired_thresholds.filter((k) => keyDimension(k) !== dim),
    fired_time_remaining: state.fired_time_remaining.filter((k) => keyDimension(k) !== dim),
  };
}

export function withLastUtilization(
  state: NotificationState,
  dim: Dimension,
  utilization: number
): NotificationState {
  return {
    ...state,
    last_utilization: { ...state.last_utilization, [dim]: utilization },
  };
}

export function notificationStatesEqual(a: NotificationState, b: NotificationState): boolean {
  return (
    DIMENSIONS.every((d) => a.last_utilization[d] === b.last_utilization[d]) &&
    a.fired_thresholds.length === b.fired_thresholds.length &&
    a.fired_thresholds.every((k, i) => b.fired_thresholds[i] === k) &&
    a.fired_time_remaining.length === b.fired_time_remaining.length &&
    a.fired_time_remaining.every((k, i) => b.fired_time_remaining[i] === k)
  );
}
