import type { ClassifiedError } from "./errors.js";
import type { MetricStats, UsageStats } from "./storage/historyStore.js";
import { formatResetAt } from "./time.js";
import { DIMENSION_LABELS, DIMENSIONS, type UsageUpdatedEvent } from "./types.js";

function padRight(s: string, width: number): string {
  if (s.length >= width) return s;
  return s + " ".repeat(width - s.length);
}

function clampText(s: string, width: number): string {
  if (s.length <= width) return s;
  if (width <= 1) return s.slice(0, width);
  return s.slice(0, width - 1) + "…";
}

export function makeBar(percent: number, width = 24): string {
  const p = Math.max(0, Math.min(100, Math.round(percent)));
  const filled = Math.round((p / 100) * width);
  return `${"█".repeat(filled)}${"░".repeat(width - filled)}`;
}

function nextRefreshLabel(update: UsageUpdatedEvent): string {
  if (update.next_refresh_at == null) return "Auto-refresh off";
  return `Next refresh ${new Date(update.next_refresh_at).toISOString()}`;
}

export function renderGraph(update: UsageUpdatedEvent, now = new Date()): string {
  const lines: string[] = [];
  lines.push(`Usage @ ${update.fetched_at}`);
  lines.push("");

  let shown = 0;
  for (const dim of DIMENSIONS) {
    const period = update.snapshot[dim];
    if (!period) continue;
    shown += 1;
    lines.push(DIMENSION_LABELS[dim]);
    lines.push(`  ${makeBar(period.utilization, 32)}  ${Math.round(period.utilization)}% used`);
    lines.push(`  Resets ${formatResetAt(period.resets_at, now)}`);
    lines.push("");
  }
  if (shown === 0) lines.push("(no usage data)");
  while (lines.length > 0 && lines[lines.length - 1] === "") lines.pop();

  lines.push("");
  lines.push(nextRefreshLabel(update));
  return lines.join("\n");
}

export function renderTable(update: UsageUpdatedEvent, now = new Date()): string {
  const cols = { window: 16, usage: 8, reset: 14 };

  const header = [
    padRight("WINDOW", cols.window),
    padRight("USAGE", cols.usage),
    padRight("RESETS", cols.reset),
  ].join(" ");
  const lines: string[] = [header, "-".repeat(header.length)];

  for (const dim of DIMENSIONS) {
    const period = update.snapshot[dim];
    const usage = period ? `${Math.round(period.utilization)}%` : "-";
    const reset = period ? formatResetAt(period.resets_at, now) : "-";
    lines.push(
      [
        padRight(clampText(DIMENSION_LABELS[dim], cols.window), cols.window),
        padRight(clampText(usage, cols.usage), cols.usage),
        padRight(clampText(reset, cols.reset), cols.reset),
      ]
        .join(" ")
        .trimEnd()
    );
  }

  lines.push("");
  lines.push(nextRefreshLabel(update));
  return lines.join("\n");
}

export function renderError(error: ClassifiedError): string {
  const hint = error.retryable ? "" : " (action required)";
  return `Error: ${error.kind}: ${error.message}${hint}`;
}

function formatSigned(n: number | null, digits = 1): string {
  if (n == null) return "-";
  const s = n.toFixed(digits);
  return n > 0 ? `+${s}` : s;
}

function statsRow(label: string, m: MetricStats): string {
  const current = m.current == null ? "-" : `${Math.round(m.current)}%`;
  const velocity = m.velocity == null ? "-" : `${m.velocity.toFixed(2)}/h`;
  return [
    padRight(label, 16),
    padRight(current, 8),
    padRight(formatSigned(m.change), 8),
    velocity,
  ].join(" ");
}

export function renderStats(range: string, stats: UsageStats): string {
  const header = [
    padRight("WINDOW", 16),
    padRight("NOW", 8),
    padRight("CHANGE", 8),
    "RATE",
  ].join(" ");
  return [
    `Usage history (${range}, ${stats.recordCount} samples over ${stats.periodHours}h)`,
    "",
    header,
    "-".repeat(header.length),
    statsRow(DIMENSION_LABELS.five_hour, stats.fiveHour),
    statsRow(DIMENSION_LABELS.seven_day, stats.sevenDay),
    statsRow(DIMENSION_LABELS.seven_day_sonnet, stats.sonnet),
    statsRow(DIMENSION_LABELS.seven_day_opus, stats.opus),
  ].join("\n");
}
