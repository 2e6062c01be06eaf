import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, test } from "vitest";

import { loadRuntimeConfig } from "../src/config.js";
import { SharedConfig } from "../src/core/sharedConfig.js";
import { CredentialValidationError } from "../src/errors.js";
import { silentLogger } from "../src/logger.js";
import { UsageMonitor } from "../src/monitor.js";
import type { FetchOutcome, UsageFetcher } from "../src/providers/provider.js";
import { FileCredentialStore, type CredentialStore } from "../src/storage/credentialStore.js";
import { SqliteHistoryStore } from "../src/storage/historyStore.js";
import type { Credentials, UsageSnapshot } from "../src/types.js";

let hasSqlite = false;
try {
  SqliteHistoryStore.open(":memory:").close();
  hasSqlite = true;
} catch {
  hasSqlite = false;
}

const SNAPSHOT: UsageSnapshot = {
  five_hour: { utilization: 25, resets_at: null },
  seven_day: null,
  seven_day_sonnet: null,
  seven_day_opus: null,
};

class MemoryCredentialStore implements CredentialStore {
  stored: Credentials | null = null;

  async load(): Promise<Credentials | null> {
    return this.stored;
  }

  async save(credentials: Credentials): Promise<void> {
    this.stored = { ...credentials };
  }

  async delete(): Promise<void> {
    this.stored = null;
  }
}

class StaticFetcher implements UsageFetcher {
  calls = 0;

  async fetch(): Promise<FetchOutcome> {
    this.calls += 1;
    return { ok: true, snapshot: SNAPSHOT };
  }
}

function makeMonitor(history: SqliteHistoryStore | null = null) {
  const credentials = new MemoryCredentialStore();
  const fetcher = new StaticFetcher();
  const monitor = new UsageMonitor({
    config: new SharedConfig(),
    credentials,
    fetcher,
    history,
    notifier: null,
    wakeDetector: false,
    logger: silentLogger,
  });
  return { monitor, credentials, fetcher };
}

describe("usage monitor", () => {
  test("rejects invalid credentials before storing anything", async () => {
    const { monitor, credentials } = makeMonitor();

    const attempt = monitor.setCredentials("org 1", "test-secret");
    await expect(attempt).rejects.toBeInstanceOf(CredentialValidationError);
    await expect(attempt).rejects.toMatchObject({
      field: "organization_id",
      message: "Invalid organization ID format",
    });
    await expect(monitor.setCredentials("org-1", "")).rejects.toMatchObject({
      field: "session_token",
      message: "Session token is required",
    });

    expect(credentials.stored).toBeNull();
    expect(await monitor.isConfigured()).toBe(false);
  });

  test("stores credentials and wakes the config", async () => {
    const { monitor, credentials } = makeMonitor();
    await monitor.setCredentials("org-1", "test-secret");

    expect(credentials.stored).toEqual({ organizationId: "org-1", sessionToken: "test-secret" });
    expect(await monitor.isConfigured()).toBe(true);
    expect(monitor.config.restartSignal.version).toBe(1);

    await monitor.clearCredentials();
    expect(credentials.stored).toBeNull();
    expect(await monitor.isConfigured()).toBe(false);
  });

  test("runs a single cycle and has no history without a database", async () => {
    const { monitor, fetcher } = makeMonitor();
    await monitor.setCredentials("org-1", "test-secret");

    expect(await monitor.runOnce()).toEqual({
      kind: "success",
      snapshot: SNAPSHOT,
      notifications: [],
    });
    expect(fetcher.calls).toBe(1);
    expect(monitor.getUsageStats("24h")).toBeNull();
    expect(monitor.getUsageHistory("24h")).toEqual([]);
    expect(monitor.cleanupHistory(30)).toBe(0);
  });

  test.skipIf(!hasSqlite)("records each fetch in the history database", async () => {
    const history = SqliteHistoryStore.open(":memory:");
    const { monitor } = makeMonitor(history);
    await monitor.setCredentials("org-1", "test-secret");
    await monitor.runOnce();

    const records = monitor.getUsageHistory("1h");
    expect(records).toHaveLength(1);
    expect(records[0]?.five_hour_utilization).toBe(25);
    expect(monitor.getUsageStats("1h")?.recordCount).toBe(1);
    await monitor.close();
  });

  test("validation errors keep the settings untouched", async () => {
    const { monitor } = makeMonitor();
    await expect(monitor.setAutoRefresh(true, -1)).rejects.toBeInstanceOf(RangeError);
    expect((await monitor.config.getAutoRefresh()).interval_minutes).toBe(5);
  });
});

describe("usage monitor bootstrap", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "meterwatch-monitor-"));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  test("picks up stored credentials and settings", async () => {
    const runtime = loadRuntimeConfig({
      METERWATCH_SETTINGS_PATH: path.join(dir, "settings.v1.json"),
      METERWATCH_CREDENTIALS_PATH: path.join(dir, "credentials.json"),
      METERWATCH_HISTORY_PATH: path.join(dir, "history.db"),
    });
    await new FileCredentialStore(runtime.credentialsPath).save({
      organizationId: "org-9",
      sessionToken: "test-secret",
    });
    await fs.writeFile(
      runtime.settingsPath,
      JSON.stringify({ version: 1, autoRefresh: { enabled: false, interval_minutes: 20 } }),
      "utf8"
    );

    const monitor = await UsageMonitor.open(runtime, {
      fetcher: new StaticFetcher(),
      history: null,
      notifier: null,
      wakeDetector: false,
      logger: silentLogger,
    });

    expect(await monitor.config.getAutoRefresh()).toEqual({
      organization_id: "org-9",
      session_token: "test-secret",
      enabled: false,
      interval_minutes: 20,
      hourly_refresh_enabled: false,
    });
    await monitor.close();
  });
});
