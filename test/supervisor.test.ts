import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";

import { SharedConfig } from "../src/core/sharedConfig.js";
import {
  RefreshSupervisor,
  type SupervisorState,
  type UsageErrorEvent,
} from "../src/core/supervisor.js";
import type { NotificationSink } from "../src/notify/sink.js";
import type { FetchOutcome, UsageFetcher } from "../src/providers/provider.js";
import type { SnapshotStore, UsageHistoryRecord } from "../src/storage/historyStore.js";
import {
  DEFAULT_AUTO_REFRESH_CONFIG,
  type UsageSnapshot,
  type UsageUpdatedEvent,
} from "../src/types.js";

const T0 = new Date("2026-03-01T00:00:00.000Z").getTime();

const SNAPSHOT: UsageSnapshot = {
  five_hour: { utilization: 42, resets_at: "2026-03-01T04:00:00.000Z" },
  seven_day: { utilization: 10, resets_at: null },
  seven_day_sonnet: null,
  seven_day_opus: null,
};

class ScriptedFetcher implements UsageFetcher {
  calls: Array<[string, string]> = [];

  constructor(private readonly outcomes: FetchOutcome[], private fallback: FetchOutcome) {}

  respondWith(outcome: FetchOutcome): void {
    this.fallback = outcome;
  }

  async fetch(organizationId: string, sessionToken: string): Promise<FetchOutcome> {
    this.calls.push([organizationId, sessionToken]);
    return this.outcomes.shift() ?? this.fallback;
  }
}

// Each fetch stays pending until the test releases it.
class DeferredFetcher implements UsageFetcher {
  calls: string[] = [];
  private releases: Array<(outcome: FetchOutcome) => void> = [];
  private onCall: (() => void) | null = null;

  fetch(organizationId: string, sessionToken: string): Promise<FetchOutcome> {
    this.calls.push(`${organizationId}/${sessionToken}`);
    return new Promise((resolve) => {
      this.releases.push(resolve);
      const called = this.onCall;
      this.onCall = null;
      called?.();
    });
  }

  // Resolves once a fetch is waiting to be released.
  pendingFetch(): Promise<void> {
    if (this.releases.length > 0) return Promise.resolve();
    return new Promise((resolve) => {
      this.onCall = resolve;
    });
  }

  release(outcome: FetchOutcome): void {
    const resolve = this.releases.shift();
    if (!resolve) throw new Error("no fetch is pending");
    resolve(outcome);
  }
}

class RecordingSink implements NotificationSink {
  sent: Array<[string, string]> = [];

  async ensurePermission(): Promise<boolean> {
    return true;
  }

  async notify(title: string, body: string): Promise<void> {
    this.sent.push([title, body]);
  }
}

class MemorySnapshots implements SnapshotStore {
  appended: Array<{ snapshot: UsageSnapshot; at: string }> = [];

  append(snapshot: UsageSnapshot, timestamp: Date): void {
    this.appended.push({ snapshot, at: timestamp.toISOString() });
  }

  queryRange(): UsageHistoryRecord[] {
    return [];
  }

  prune(): number {
    return 0;
  }
}

const ok = (snapshot: UsageSnapshot = SNAPSHOT): FetchOutcome => ({ ok: true, snapshot });
const rateLimited: FetchOutcome = { ok: false, error: { kind: "rate-limited" } };
const unauthorized: FetchOutcome = { ok: false, error: { kind: "unauthorized" } };

function configured(enabled = true): SharedConfig {
  return new SharedConfig({
    autoRefresh: {
      ...DEFAULT_AUTO_REFRESH_CONFIG,
      organization_id: "org-1",
      session_token: "test-secret",
      enabled,
    },
  });
}

function waitForState(
  sup: RefreshSupervisor,
  match: (s: SupervisorState) => boolean
): Promise<SupervisorState> {
  const current = sup.getStatus().state;
  if (match(current)) return Promise.resolve(current);
  return new Promise((resolve) => {
    const off = sup.on("state-changed", (s) => {
      if (!match(s)) return;
      off();
      resolve(s);
    });
  });
}

function nextUpdate(sup: RefreshSupervisor): Promise<UsageUpdatedEvent> {
  return new Promise((resolve) => {
    const off = sup.on("usage-updated", (e) => {
      off();
      resolve(e);
    });
  });
}

const isBackoff = (attempt: number) => (s: SupervisorState) =>
  s.kind === "backoff" && s.attempt === attempt;
const isWaiting = (s: SupervisorState) => s.kind === "waiting";

describe("refresh supervisor", () => {
  let running: RefreshSupervisor | null = null;

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(T0);
  });

  afterEach(async () => {
    await running?.stop();
    running = null;
    vi.useRealTimers();
  });

  function start(sup: RefreshSupervisor): RefreshSupervisor {
    running = sup;
    sup.start();
    return sup;
  }

  test("fetches on start and schedules the next refresh one interval out", async () => {
    const fetcher = new ScriptedFetcher([], ok());
    const snapshots = new MemorySnapshots();
    const sup = new RefreshSupervisor({ config: configured(), fetcher, snapshots });
    const update = nextUpdate(sup);
    start(sup);

    expect(await update).toEqual({
      snapshot: SNAPSHOT,
      fetched_at: new Date(T0).toISOString(),
      next_refresh_at: T0 + 5 * 60_000,
    });
    expect(await waitForState(sup, isWaiting)).toEqual({
      kind: "waiting",
      until: T0 + 5 * 60_000,
    });
    expect(fetcher.calls).toEqual([["org-1", "test-secret"]]);
    expect(snapshots.appended).toEqual([{ snapshot: SNAPSHOT, at: new Date(T0).toISOString() }]);
  });

  test("fetches again when the interval elapses", async () => {
    const fetcher = new ScriptedFetcher([], ok());
    const sup = start(new RefreshSupervisor({ config: configured(), fetcher }));
    await waitForState(sup, isWaiting);

    const second = nextUpdate(sup);
    await vi.advanceTimersByTimeAsync(5 * 60_000);
    expect((await second).next_refresh_at).toBe(T0 + 10 * 60_000);
    expect(fetcher.calls).toHaveLength(2);
  });

  test("rate limiting backs off exponentially without publishing an error", async () => {
    const fetcher = new ScriptedFetcher([], rateLimited);
    const errors: UsageErrorEvent[] = [];
    const sup = new RefreshSupervisor({ config: configured(), fetcher });
    sup.on("usage-error", (e) => errors.push(e));
    start(sup);

    expect(await waitForState(sup, isBackoff(1))).toEqual({
      kind: "backoff",
      attempt: 1,
      until: T0 + 30_000,
    });

    await vi.advanceTimersByTimeAsync(30_000);
    expect(await waitForState(sup, isBackoff(2))).toEqual({
      kind: "backoff",
      attempt: 2,
      until: T0 + 30_000 + 60_000,
    });
    expect(fetcher.calls).toHaveLength(2);
    expect(errors).toEqual([]);
  });

  test("a manual refresh during backoff fetches at once and counts as an attempt", async () => {
    const fetcher = new ScriptedFetcher([], rateLimited);
    const sup = start(new RefreshSupervisor({ config: configured(), fetcher }));
    await waitForState(sup, isBackoff(1));

    await sup.refreshNow();
    expect(await waitForState(sup, isBackoff(2))).toEqual({
      kind: "backoff",
      attempt: 2,
      until: T0 + 60_000,
    });
    expect(fetcher.calls).toHaveLength(2);
  });

  test("new credentials during backoff restart with an immediate fetch", async () => {
    const config = configured();
    const fetcher = new ScriptedFetcher([rateLimited], ok());
    const sup = start(new RefreshSupervisor({ config, fetcher }));
    await waitForState(sup, isBackoff(1));

    const update = nextUpdate(sup);
    await config.setCredentials("org-2", "test-secret-2");
    await update;

    expect(fetcher.calls).toEqual([
      ["org-1", "test-secret"],
      ["org-2", "test-secret-2"],
    ]);
    expect(await waitForState(sup, isWaiting)).toEqual({
      kind: "waiting",
      until: T0 + 5 * 60_000,
    });
    expect(sup.getStatus().attempt).toBe(0);
  });

  test("other failures publish a classified error and keep the normal schedule", async () => {
    const fetcher = new ScriptedFetcher([], unauthorized);
    const sup = new RefreshSupervisor({ config: configured(), fetcher });
    const error = new Promise<UsageErrorEvent>((resolve) => sup.on("usage-error", resolve));
    start(sup);

    expect(await error).toEqual({
      error: {
        kind: "unauthorized",
        message: "Session expired. Please update your session token in Settings.",
        retryable: false,
      },
    });
    expect(await waitForState(sup, isWaiting)).toEqual({
      kind: "waiting",
      until: T0 + 5 * 60_000,
    });
    expect(sup.getStatus().attempt).toBe(0);
  });

  test("a thrown fetcher error is reported as a network error", async () => {
    const fetcher: UsageFetcher = {
      fetch: async () => {
        throw new Error("socket hang up");
      },
    };
    const sup = new RefreshSupervisor({ config: configured(), fetcher });
    const error = new Promise<UsageErrorEvent>((resolve) => sup.on("usage-error", resolve));
    start(sup);

    expect((await error).error.kind).toBe("network");
  });

  test("with auto-refresh disabled only manual refreshes fetch", async () => {
    const fetcher = new ScriptedFetcher([], ok());
    const sup = start(new RefreshSupervisor({ config: configured(false), fetcher }));

    expect(await waitForState(sup, isWaiting)).toEqual({ kind: "waiting", until: null });
    await vi.advanceTimersByTimeAsync(60 * 60_000);
    expect(fetcher.calls).toHaveLength(0);

    const update = nextUpdate(sup);
    await sup.refreshNow();
    expect((await update).next_refresh_at).toBeNull();
    expect(fetcher.calls).toHaveLength(1);

    await vi.advanceTimersByTimeAsync(60 * 60_000);
    expect(fetcher.calls).toHaveLength(1);
  });

  test("enabling auto-refresh wakes the loop and fetches", async () => {
    const config = configured(false);
    const fetcher = new ScriptedFetcher([], ok());
    const sup = start(new RefreshSupervisor({ config, fetcher }));
    await waitForState(sup, isWaiting);

    const update = nextUpdate(sup);
    await config.setAutoRefresh(true, 10);
    expect((await update).next_refresh_at).toBe(T0 + 10 * 60_000);
  });

  test("without credentials it idles and manual refresh resolves without fetching", async () => {
    const fetcher = new ScriptedFetcher([], ok());
    const sup = start(new RefreshSupervisor({ config: new SharedConfig(), fetcher }));

    expect(await waitForState(sup, (s) => s.kind === "idle")).toEqual({ kind: "idle" });
    await sup.refreshNow();
    expect(fetcher.calls).toEqual([]);
  });

  test("clearing credentials sends the loop back to idle", async () => {
    const config = configured();
    const fetcher = new ScriptedFetcher([], ok());
    const sup = start(new RefreshSupervisor({ config, fetcher }));
    await waitForState(sup, isWaiting);

    await config.clearCredentials();
    expect(await waitForState(sup, (s) => s.kind === "idle")).toEqual({ kind: "idle" });
    await vi.advanceTimersByTimeAsync(10 * 60_000);
    expect(fetcher.calls).toHaveLength(1);
  });

  test("delivers alerts and records the evaluated state", async () => {
    const config = configured();
    const sink = new RecordingSink();
    const fetcher = new ScriptedFetcher(
      [],
      ok({ ...SNAPSHOT, five_hour: { utilization: 85, resets_at: null } })
    );
    const sup = new RefreshSupervisor({ config, fetcher, notifier: sink });
    const update = nextUpdate(sup);
    start(sup);
    await update;

    expect(sink.sent).toEqual([["5 Hour Usage Alert", "Usage crossed 80% threshold (85% used)"]]);
    expect((await config.getNotificationState()).fired_thresholds).toEqual(["five_hour:80"]);
  });

  test("a throwing listener does not stop the loop", async () => {
    const fetcher = new ScriptedFetcher([], ok());
    const sup = new RefreshSupervisor({ config: configured(), fetcher });
    sup.on("usage-updated", () => {
      throw new Error("listener bug");
    });
    start(sup);
    await waitForState(sup, isWaiting);

    await vi.advanceTimersByTimeAsync(5 * 60_000);
    await waitForState(sup, isWaiting);
    expect(fetcher.calls).toHaveLength(2);
  });

  test("stop settles the loop and reports idle", async () => {
    const fetcher = new ScriptedFetcher([], ok());
    const sup = start(new RefreshSupervisor({ config: configured(), fetcher }));
    await waitForState(sup, isWaiting);

    await sup.stop();
    expect(sup.getStatus()).toEqual({ state: { kind: "idle" }, attempt: 0, running: false });
    await vi.advanceTimersByTimeAsync(10 * 60_000);
    expect(fetcher.calls).toHaveLength(1);
  });

  test.each([
    ["a success", ok()],
    ["another failure", unauthorized],
  ])("%s after a rate limit resets the attempt counter", async (_label, outcome) => {
    const fetcher = new ScriptedFetcher([rateLimited], outcome);
    const sup = start(new RefreshSupervisor({ config: configured(), fetcher }));
    await waitForState(sup, isBackoff(1));

    await vi.advanceTimersByTimeAsync(30_000);
    expect(await waitForState(sup, isWaiting)).toEqual({
      kind: "waiting",
      until: T0 + 30_000 + 5 * 60_000,
    });
    expect(sup.getStatus().attempt).toBe(0);
    expect(fetcher.calls).toHaveLength(2);
  });

  test("a restart during a fetch keeps its result and refetches with the new config", async () => {
    const config = configured();
    const fetcher = new DeferredFetcher();
    const updates: UsageUpdatedEvent[] = [];
    const sup = new RefreshSupervisor({ config, fetcher });
    sup.on("usage-updated", (e) => updates.push(e));
    start(sup);
    await fetcher.pendingFetch();

    await config.setCredentials("org-2", "test-secret-2");
    fetcher.release(ok());
    await fetcher.pendingFetch();

    expect(updates).toEqual([
      {
        snapshot: SNAPSHOT,
        fetched_at: new Date(T0).toISOString(),
        next_refresh_at: T0 + 5 * 60_000,
      },
    ]);
    expect(fetcher.calls).toEqual(["org-1/test-secret", "org-2/test-secret-2"]);
    fetcher.release(ok());
  });

  test("a failing history store does not hold back the update", async () => {
    const snapshots: SnapshotStore = {
      append: () => {
        throw new Error("disk full");
      },
      queryRange: () => [],
      prune: () => 0,
    };
    const sup = new RefreshSupervisor({
      config: configured(),
      fetcher: new ScriptedFetcher([], ok()),
      snapshots,
    });
    const update = nextUpdate(sup);

    expect((await sup.runOnce()).kind).toBe("success");
    expect((await update).snapshot).toEqual(SNAPSHOT);
  });

  test("hourly refresh shortens the wait to just past the hour", async () => {
    const now = T0 + 50 * 60_000;
    vi.setSystemTime(now);
    const config = new SharedConfig({
      autoRefresh: {
        organization_id: "org-1",
        session_token: "test-secret",
        enabled: true,
        interval_minutes: 60,
        hourly_refresh_enabled: true,
      },
    });
    const fetcher = new ScriptedFetcher([], ok());
    const sup = new RefreshSupervisor({ config, fetcher, random: () => 0 });
    const update = nextUpdate(sup);
    start(sup);

    expect((await update).next_refresh_at).toBe(now + 10 * 60_000 + 5_000);
    expect(await waitForState(sup, isWaiting)).toEqual({
      kind: "waiting",
      until: now + 10 * 60_000 + 5_000,
    });
  });

  test("backoff ignores the hourly refresh", async () => {
    vi.setSystemTime(T0 + 59 * 60_000 + 50_000);
    const config = new SharedConfig({
      autoRefresh: {
        organization_id: "org-1",
        session_token: "test-secret",
        enabled: true,
        interval_minutes: 5,
        hourly_refresh_enabled: true,
      },
    });
    const fetcher = new ScriptedFetcher([], rateLimited);
    const sup = start(new RefreshSupervisor({ config, fetcher, random: () => 0 }));

    expect(await waitForState(sup, isBackoff(1))).toEqual({
      kind: "backoff",
      attempt: 1,
      until: T0 + 59 * 60_000 + 50_000 + 30_000,
    });
  });

  test("overlapping refreshes while stopped run one after the other", async () => {
    const fetcher = new DeferredFetcher();
    const sup = new RefreshSupervisor({ config: configured(), fetcher });
    const first = sup.refreshNow();
    const second = sup.refreshNow();

    await fetcher.pendingFetch();
    expect(fetcher.calls).toHaveLength(1);
    fetcher.release(ok());
    await first;

    await fetcher.pendingFetch();
    fetcher.release(ok());
    await second;

    expect(fetcher.calls).toEqual(["org-1/test-secret", "org-1/test-secret"]);
    expect(sup.getStatus()).toEqual({ state: { kind: "idle" }, attempt: 0, running: false });
  });

  test("a refresh requested while stopping runs after the loop's fetch", async () => {
    const fetcher = new DeferredFetcher();
    const sup = new RefreshSupervisor({ config: configured(), fetcher });
    sup.start();
    await fetcher.pendingFetch();

    const stopped = sup.stop();
    const refreshed = sup.refreshNow();
    fetcher.release(ok());
    await stopped;

    await fetcher.pendingFetch();
    fetcher.release(ok());
    await refreshed;

    expect(fetcher.calls).toHaveLength(2);
    expect(sup.getStatus().running).toBe(false);
  });

  test("runOnce performs a single cycle while stopped", async () => {
    const fetcher = new ScriptedFetcher([], ok());
    const sup = new RefreshSupervisor({ config: configured(), fetcher });

    const result = await sup.runOnce();
    expect(result).toEqual({ kind: "success", snapshot: SNAPSHOT, notifications: [] });
    expect(sup.getStatus().running).toBe(false);
  });
});
