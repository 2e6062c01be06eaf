import type { RuntimeConfig } from "./config.js";
import { SharedConfig } from "./core/sharedConfig.js";
import {
  RefreshSupervisor,
  type CycleResult,
  type SupervisorEvents,
  type SupervisorStatus,
  type UsageErrorEvent,
} from "./core/supervisor.js";
import { WakeDetector } from "./core/wakeDetector.js";
import { CredentialValidationError, errorMessage } from "./errors.js";
import { createLogger, type Logger } from "./logger.js";
import { ConsoleNotificationSink, type NotificationSink } from "./notify/sink.js";
import type { UsageFetcher } from "./providers/provider.js";
import { HttpUsageFetcher } from "./providers/usageApi.js";
import { FileCredentialStore, type CredentialStore } from "./storage/credentialStore.js";
import {
  SqliteHistoryStore,
  type UsageHistoryRecord,
  type UsageStats,
} from "./storage/historyStore.js";
import { JsonSettingsStore, type SettingsStore } from "./storage/settingsStore.js";
import type { Credentials, NotificationSettings, UsageUpdatedEvent } from "./types.js";
import { validateOrganizationId, validateSessionToken } from "./validation.js";

export type MonitorEvents = {
  "usage-updated": UsageUpdatedEvent;
  "usage-error": UsageErrorEvent;
};

export type UsageMonitorDeps = {
  config: SharedConfig;
  credentials: CredentialStore;
  fetcher: UsageFetcher;
  history?: SqliteHistoryStore | null;
  notifier?: NotificationSink | null;
  wakeDetector?: boolean;
  logger?: Logger;
};

export type OpenMonitorOptions = {
  fetcher?: UsageFetcher;
  notifier?: NotificationSink | null;
  settings?: SettingsStore;
  credentials?: CredentialStore;
  // Pass null to run without a history database.
  history?: SqliteHistoryStore | null;
  wakeDetector?: boolean;
  logger?: Logger;
};

/**
 * The surface a front end talks to. Wraps the shared config, the refresh
 * supervisor and the stores behind the operations a tray menu or CLI needs.
 */
export class UsageMonitor {
  readonly config: SharedConfig;
  private readonly supervisor: RefreshSupervisor;
  private readonly credentials: CredentialStore;
  private readonly history: SqliteHistoryStore | null;
  private readonly wake: WakeDetector | null;
  private readonly log: Logger;

  constructor(deps: UsageMonitorDeps) {
    this.config = deps.config;
    this.credentials = deps.credentials;
    this.history = deps.history ?? null;
    this.log = deps.logger ?? createLogger("monitor");
    this.supervisor = new RefreshSupervisor({
      config: deps.config,
      fetcher: deps.fetcher,
      snapshots: this.history,
      notifier: deps.notifier ?? null,
      logger: this.log.child("refresh"),
    });
    this.wake =
      deps.wakeDetector === false
        ? null
        : new WakeDetector(() => this.config.requestRestart(), {
            logger: this.log.child("wake"),
          });
  }

  /**
   * Builds a monitor from runtime configuration: loads stored credentials and
   * settings and prunes history older than the retention window.
   */
  static async open(runtime: RuntimeConfig, opts: OpenMonitorOptions = {}): Promise<UsageMonitor> {
    const log = opts.logger ?? createLogger("monitor");
    const credentials = opts.credentials ?? new FileCredentialStore(runtime.credentialsPath);
    const settings = opts.settings ?? new JsonSettingsStore(runtime.settingsPath);

    let stored: Credentials | null = null;
    try {
      stored = await credentials.load();
    } catch (err) {
      log.warn("failed to load credentials", { error: errorMessage(err) });
    }
    const config = await SharedConfig.load(settings, stored, log.child("config"));

    let history: SqliteHistoryStore | null = null;
    if (opts.history !== undefined) {
      history = opts.history;
    } else {
      try {
        history = SqliteHistoryStore.open(runtime.historyPath);
      } catch (err) {
        log.warn("usage history unavailable", { error: errorMessage(err) });
      }
    }
    if (history) {
      try {
        const removed = history.cleanup(runtime.historyRetentionDays);
        if (removed > 0) log.debug("pruned usage history", { removed });
      } catch (err) {
        log.warn("failed to prune usage history", { error: errorMessage(err) });
      }
    }

    const fetcher =
      opts.fetcher ??
      new HttpUsageFetcher({
        baseUrl: runtime.usageBaseUrl,
        timeoutMs: runtime.requestTimeoutMs,
        logger: log.child("http"),
      });

    return new UsageMonitor({
      config,
      credentials,
      fetcher,
      history,
      notifier: opts.notifier === undefined ? new ConsoleNotificationSink() : opts.notifier,
      wakeDetector: opts.wakeDetector,
      logger: log,
    });
  }

  on<E extends keyof MonitorEvents>(
    event: E,
    listener: (payload: SupervisorEvents[E]) => void
  ): () => void {
    return this.supervisor.on(event, listener);
  }

  getStatus(): SupervisorStatus {
    return this.supervisor.getStatus();
  }

  start(): void {
    this.supervisor.start();
    this.wake?.start();
  }

  async stop(): Promise<void> {
    this.wake?.stop();
    await this.supervisor.stop();
  }

  /** Stops the loop and releases the history database. */
  async close(): Promise<void> {
    await this.stop();
    this.history?.close();
  }

  async setCredentials(organizationId: string, sessionToken: string): Promise<void> {
    const org = validateOrganizationId(organizationId);
    if (!org.ok) throw new CredentialValidationError(org.error);
    const token = validateSessionToken(sessionToken);
    if (!token.ok) throw new CredentialValidationError(token.error);

    await this.credentials.save({ organizationId, sessionToken });
    await this.config.setCredentials(organizationId, sessionToken);
  }

  async clearCredentials(): Promise<void> {
    await this.credentials.delete();
    await this.config.clearCredentials();
  }

  isConfigured(): Promise<boolean> {
    return this.config.isConfigured();
  }

  async setAutoRefresh(
    enabled: boolean,
    intervalMinutes: number,
    hourlyRefresh?: boolean
  ): Promise<void> {
    await this.config.setAutoRefresh(enabled, intervalMinutes, hourlyRefresh);
  }

  async setNotificationSettings(settings: NotificationSettings): Promise<void> {
    await this.config.setNotificationSettings(settings);
  }

  refreshNow(): Promise<void> {
    return this.supervisor.refreshNow();
  }

  runOnce(): Promise<CycleResult> {
    return this.supervisor.runOnce();
  }

  getUsageHistory(range: string, now = new Date()): UsageHistoryRecord[] {
    return this.history?.queryByRange(range, now) ?? [];
  }

  getUsageStats(range: string, now = new Date()): UsageStats | null {
    return this.history?.getStats(range, now) ?? null;
  }

  cleanupHistory(retentionDays: number, now = new Date()): number {
    return this.history?.cleanup(retentionDays, now) ?? 0;
  }
}
