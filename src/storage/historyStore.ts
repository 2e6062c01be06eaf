import { mkdirSync } from "node:fs";
import path from "node:path";

import Database from "better-sqlite3";

import type { UsagePeriod, UsageSnapshot } from "../types.js";

type MaybePromise<T> = T | Promise<T>;

export interface SnapshotStore {
  append(snapshot: UsageSnapshot, timestamp: Date): MaybePromise<void>;
  queryRange(from: Date, to: Date): MaybePromise<UsageHistoryRecord[]>;
  prune(olderThan: Date): MaybePromise<number>;
}

export type UsageHistoryRecord = {
  id: number;
  timestamp: string;
  five_hour_utilization: number | null;
  five_hour_resets_at: string | null;
  seven_day_utilization: number | null;
  seven_day_resets_at: string | null;
  sonnet_utilization: number | null;
  sonnet_resets_at: string | null;
  opus_utilization: number | null;
  opus_resets_at: string | null;
};

export type MetricStats = {
  current: number | null;
  change: number | null;
  // Percentage points per hour; only reported while usage grows.
  velocity: number | null;
};

export type UsageStats = {
  fiveHour: MetricStats;
  sevenDay: MetricStats;
  sonnet: MetricStats;
  opus: MetricStats;
  recordCount: number;
  periodHours: number;
};

export const HISTORY_RANGES = ["1h", "6h", "24h", "7d", "30d"] as const;
export type HistoryRange = (typeof HISTORY_RANGES)[number];

const RANGE_HOURS: Record<HistoryRange, number> = {
  "1h": 1,
  "6h": 6,
  "24h": 24,
  "7d": 7 * 24,
  "30d": 30 * 24,
};

export function isHistoryRange(value: string): value is HistoryRange {
  return HISTORY_RANGES.some((r) => r === value);
}

// Unknown presets read as the last 24 hours.
export function rangeToHours(range: string): number {
  return isHistoryRange(range) ? RANGE_HOURS[range] : 24;
}

export function calcMetricStats(
  first: number | null,
  last: number | null,
  periodHours: number
): MetricStats {
  const change = first != null && last != null ? last - first : null;
  const velocity = change != null && change >= 0 && periodHours > 0 ? change / periodHours : null;
  return { current: last, change, velocity };
}

function period(utilization: number | null, resetsAt: string | null): UsagePeriod | null {
  if (utilization == null) return null;
  return { utilization, resets_at: resetsAt };
}

export function recordToSnapshot(record: UsageHistoryRecord): UsageSnapshot {
  return {
    five_hour: period(record.five_hour_utilization, record.five_hour_resets_at),
    seven_day: period(record.seven_day_utilization, record.seven_day_resets_at),
    seven_day_sonnet: period(record.sonnet_utilization, record.sonnet_resets_at),
    seven_day_opus: period(record.opus_utilization, record.opus_resets_at),
  };
}

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS usage_history (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    timestamp TEXT NOT NULL,
    five_hour_utilization REAL,
    five_hour_resets_at TEXT,
    seven_day_utilization REAL,
    seven_day_resets_at TEXT,
    sonnet_utilization REAL,
    sonnet_resets_at TEXT,
    opus_utilization REAL,
    opus_resets_at TEXT
  );

  CREATE INDEX IF NOT EXISTS idx_timestamp ON usage_history(timestamp);
`;

const SELECT_COLUMNS = `id, timestamp,
  five_hour_utilization, five_hour_resets_at,
  seven_day_utilization, seven_day_resets_at,
  sonnet_utilization, sonnet_resets_at,
  opus_utilization, opus_resets_at`;

type InsertParams = [
  string,
  number | null,
  string | null,
  number | null,
  string | null,
  number | null,
  string | null,
  number | null,
  string | null,
];

/**
 * SQLite-backed usage history. Timestamps are stored as ISO-8601 UTC
 * strings, which sort lexicographically in time order.
 */
export class SqliteHistoryStore implements SnapshotStore {
  private readonly db: Database.Database;

  private constructor(dbPath: string) {
    if (dbPath !== ":memory:") {
      mkdirSync(path.dirname(dbPath), { recursive: true });
    }
    this.db = new Database(dbPath);
    if (dbPath !== ":memory:") {
      this.db.pragma("journal_mode = WAL");
    }
    this.db.pragma("busy_timeout = 5000");
    this.db.exec(SCHEMA);
  }

  static open(dbPath: string): SqliteHistoryStore {
    return new SqliteHistoryStore(dbPath);
  }

  close(): void {
    this.db.close();
  }

  append(snapshot: UsageSnapshot, timestamp: Date): void {
    const stmt = this.db.prepare<InsertParams>(`
      INSERT INTO usage_history (
        timestamp,
        five_hour_utilization, five_hour_resets_at,
        seven_day_utilization, seven_day_resets_at,
        sonnet_utilization, sonnet_resets_at,
        opus_utilization, opus_resets_at
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
    `);
    stmt.run(
      timestamp.toISOString(),
      snapshot.five_hour?.utilization ?? null,
      snapshot.five_hour?.resets_at ?? null,
      snapshot.seven_day?.utilization ?? null,
      snapshot.seven_day?.resets_at ?? null,
      snapshot.seven_day_sonnet?.utilization ?? null,
      snapshot.seven_day_sonnet?.resets_at ?? null,
      snapshot.seven_day_opus?.utilization ?? null,
      snapshot.seven_day_opus?.resets_at ?? null
    );
  }

  queryRange(from: Date, to: Date): UsageHistoryRecord[] {
    const stmt = this.db.prepare<[string, string], UsageHistoryRecord>(`
      SELECT ${SELECT_COLUMNS}
      FROM usage_history
      WHERE timestamp >= ? AND timestamp <= ?
      ORDER BY timestamp ASC, id ASC
    `);
    return stmt.all(from.toISOString(), to.toISOString());
  }

  queryByRange(range: string, now = new Date()): UsageHistoryRecord[] {
    const from = new Date(now.getTime() - rangeToHours(range) * 3_600_000);
    return this.queryRange(from, now);
  }

  getStats(range: string, now = new Date()): UsageStats {
    const periodHours = rangeToHours(range);
    const from = new Date(now.getTime() - periodHours * 3_600_000).toISOString();
    const to = now.toISOString();

    const edge = (order: "ASC" | "DESC"): UsageHistoryRecord | null => {
      const stmt = this.db.prepare<[string, string], UsageHistoryRecord>(`
        SELECT ${SELECT_COLUMNS}
        FROM usage_history
        WHERE timestamp >= ? AND timestamp <= ?
        ORDER BY timestamp ${order}, id ${order}
        LIMIT 1
      `);
      return stmt.get(from, to) ?? null;
    };

    const first = edge("ASC");
    const last = edge("DESC");
    const countRow = this.db
      .prepare<[string, string], { count: number }>(
        "SELECT COUNT(*) AS count FROM usage_history WHERE timestamp >= ? AND timestamp <= ?"
      )
      .get(from, to);

    return {
      fiveHour: calcMetricStats(
        first?.five_hour_utilization ?? null,
        last?.five_hour_utilization ?? null,
        periodHours
      ),
      sevenDay: calcMetricStats(
        first?.seven_day_utilization ?? null,
        last?.seven_day_utilization ?? null,
        periodHours
      ),
      sonnet: calcMetricStats(
        first?.sonnet_utilization ?? null,
        last?.sonnet_utilization ?? null,
        periodHours
      ),
      opus: calcMetricStats(
        first?.opus_utilization ?? null,
        last?.opus_utilization ?? null,
        periodHours
      ),
      recordCount: countRow?.count ?? 0,
      periodHours,
    };
  }

  prune(olderThan: Date): number {
    const stmt = this.db.prepare<[string]>("DELETE FROM usage_history WHERE timestamp < ?");
    return stmt.run(olderThan.toISOString()).changes;
  }

  cleanup(retentionDays: number, now = new Date()): number {
    return this.prune(new Date(now.getTime() - retentionDays * 24 * 3_600_000));
  }
}
