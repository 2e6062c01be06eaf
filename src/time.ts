// Whole minutes from `now` until `iso`, rounded toward negative infinity
// so "29m 59s left" counts as 29. Returns null for unparseable timestamps.
export function minutesUntil(iso: string, now = new Date()): number | null {
  const t = Date.parse(iso);
  if (!Number.isFinite(t)) return null;
  return Math.floor((t - now.getTime()) / 60_000);
}

export function formatTimeRemaining(minutes: number): string {
  const m = Math.max(0, Math.floor(minutes));
  if (m < 60) return `${m}m`;
  const hours = Math.floor(m / 60);
  const rest = m % 60;
  return rest > 0 ? `${hours}h ${rest}m` : `${hours}h`;
}

export function formatResetAt(iso: string | null, now = new Date()): string {
  if (!iso) return "-";
  const minutes = minutesUntil(iso, now);
  if (minutes == null) return iso;
  if (minutes <= 0) return "now";
  return `in ${formatTimeRemaining(minutes)}`;
}
