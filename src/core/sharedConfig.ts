import { errorMessage } from "../errors.js";
import { silentLogger, type Logger } from "../logger.js";
import type { SettingsKey, SettingsDocument, SettingsStore } from "../storage/settingsStore.js";
import {
  AutoRefreshConfigSchema,
  DEFAULT_AUTO_REFRESH_CONFIG,
  defaultNotificationSettings,
  NotificationSettingsSchema,
  type AutoRefreshConfig,
  type Credentials,
  type NotificationSettings,
  type NotificationState,
} from "../types.js";
import {
  cloneNotificationState,
  emptyNotificationState,
  notificationStatesEqual,
} from "./notificationState.js";
import { RestartSignal } from "./restartSignal.js";
import { hasCredentials } from "./scheduler.js";

export type SharedConfigInit = {
  autoRefresh?: AutoRefreshConfig;
  notificationSettings?: NotificationSettings;
  notificationState?: NotificationState;
};

export type SharedConfigOptions = {
  store?: SettingsStore | null;
  logger?: Logger;
};

export type StateUpdate<T> = {
  nextState: NotificationState;
  result: T;
};

const IntervalMinutesSchema = AutoRefreshConfigSchema.shape.interval_minutes;

function cloneSettings(s: NotificationSettings): NotificationSettings {
  return NotificationSettingsSchema.parse(s);
}

function sameJson(a: unknown, b: unknown): boolean {
  return JSON.stringify(a) === JSON.stringify(b);
}

/**
 * Single owner of the auto-refresh config, notification settings and
 * notification state. Every read and write runs through one exclusive
 * queue; callers only ever get copies. Credential and auto-refresh changes
 * wake the supervisor through `restartSignal`; notification settings are
 * picked up by the next evaluation.
 */
export class SharedConfig {
  readonly restartSignal = new RestartSignal();

  private autoRefresh: AutoRefreshConfig;
  private notificationSettings: NotificationSettings;
  private notificationState: NotificationState;
  private queue: Promise<void> = Promise.resolve();
  private readonly store: SettingsStore | null;
  private readonly log: Logger;

  constructor(init: SharedConfigInit = {}, opts: SharedConfigOptions = {}) {
    this.autoRefresh = { ...(init.autoRefresh ?? DEFAULT_AUTO_REFRESH_CONFIG) };
    this.notificationSettings = cloneSettings(
      init.notificationSettings ?? defaultNotificationSettings()
    );
    this.notificationState = cloneNotificationState(
      init.notificationState ?? emptyNotificationState()
    );
    this.store = opts.store ?? null;
    this.log = opts.logger ?? silentLogger;
  }

  static async load(
    store: SettingsStore,
    credentials: Credentials | null,
    logger: Logger = silentLogger
  ): Promise<SharedConfig> {
    let doc: SettingsDocument | null = null;
    try {
      doc = await store.load();
    } catch (err) {
      logger.warn("failed to load settings; using defaults", { error: errorMessage(err) });
    }

    return new SharedConfig(
      {
        autoRefresh: {
          organization_id: credentials?.organizationId ?? null,
          session_token: credentials?.sessionToken ?? null,
          enabled: doc?.autoRefresh.enabled ?? DEFAULT_AUTO_REFRESH_CONFIG.enabled,
          interval_minutes:
            doc?.autoRefresh.interval_minutes ?? DEFAULT_AUTO_REFRESH_CONFIG.interval_minutes,
          hourly_refresh_enabled:
            doc?.autoRefresh.hourly_refresh_enabled ??
            DEFAULT_AUTO_REFRESH_CONFIG.hourly_refresh_enabled,
        },
        notificationSettings: doc?.notificationSettings,
        notificationState: doc?.notificationState,
      },
      { store, logger }
    );
  }

  private exclusive<T>(fn: () => T | Promise<T>): Promise<T> {
    const run = this.queue.then(fn);
    this.queue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  private async persist<K extends SettingsKey>(key: K, value: SettingsDocument[K]): Promise<void> {
    if (!this.store) return;
    try {
      await this.store.set(key, value);
    } catch (err) {
      this.log.warn("failed to persist settings", { key, error: errorMessage(err) });
    }
  }

  private persistAutoRefresh(): Promise<void> {
    return this.persist("autoRefresh", {
      enabled: this.autoRefresh.enabled,
      interval_minutes: this.autoRefresh.interval_minutes,
      hourly_refresh_enabled: this.autoRefresh.hourly_refresh_enabled,
    });
  }

  getAutoRefresh(): Promise<AutoRefreshConfig> {
    return this.exclusive(() => ({ ...this.autoRefresh }));
  }

  getNotificationSettings(): Promise<NotificationSettings> {
    return this.exclusive(() => cloneSettings(this.notificationSettings));
  }

  getNotificationState(): Promise<NotificationState> {
    return this.exclusive(() => cloneNotificationState(this.notificationState));
  }

  isConfigured(): Promise<boolean> {
    return this.exclusive(() => hasCredentials(this.autoRefresh));
  }

  /** Resolves to false when nothing changed (no restart is signalled then). */
  setCredentials(organizationId: string, sessionToken: string): Promise<boolean> {
    return this.exclusive(() => {
      if (
        this.autoRefresh.organization_id === organizationId &&
        this.autoRefresh.session_token === sessionToken
      ) {
        return false;
      }
      this.autoRefresh = {
        ...this.autoRefresh,
        organization_id: organizationId,
        session_token: sessionToken,
      };
      this.log.info("credentials updated");
      this.restartSignal.notify();
      return true;
    });
  }

  clearCredentials(): Promise<boolean> {
    return this.exclusive(() => {
      if (!hasCredentials(this.autoRefresh)) return false;
      this.autoRefresh = { ...this.autoRefresh, organization_id: null, session_token: null };
      this.log.info("credentials cleared");
      this.restartSignal.notify();
      return true;
    });
  }

  /** `hourlyRefresh` keeps its current value when left out. */
  setAutoRefresh(
    enabled: boolean,
    intervalMinutes: number,
    hourlyRefresh?: boolean
  ): Promise<boolean> {
    const parsed = IntervalMinutesSchema.safeParse(intervalMinutes);
    if (!parsed.success) {
      return Promise.reject(
        new RangeError(`interval_minutes must be a positive integer (got ${intervalMinutes})`)
      );
    }
    const interval = parsed.data;
    return this.exclusive(async () => {
      const hourly = hourlyRefresh ?? this.autoRefresh.hourly_refresh_enabled;
      if (
        this.autoRefresh.enabled === enabled &&
        this.autoRefresh.interval_minutes === interval &&
        this.autoRefresh.hourly_refresh_enabled === hourly
      ) {
        return false;
      }
      this.autoRefresh = {
        ...this.autoRefresh,
        enabled,
        interval_minutes: interval,
        hourly_refresh_enabled: hourly,
      };
      this.log.info("auto-refresh updated", {
        enabled,
        intervalMinutes: interval,
        hourlyRefresh: hourly,
      });
      this.restartSignal.notify();
      await this.persistAutoRefresh();
      return true;
    });
  }

  setNotificationSettings(settings: NotificationSettings): Promise<boolean> {
    const parsed = NotificationSettingsSchema.safeParse(settings);
    if (!parsed.success) {
      return Promise.reject(parsed.error);
    }
    const next = parsed.data;
    return this.exclusive(async () => {
      if (sameJson(this.notificationSettings, next)) return false;
      this.notificationSettings = next;
      this.log.info("notification settings updated", { enabled: next.enabled });
      await this.persist("notificationSettings", cloneSettings(next));
      return true;
    });
  }

  /**
   * Runs `fn` against the current settings and state with exclusive access
   * and stores the state it returns. Evaluations never overlap.
   */
  updateNotificationState<T>(
    fn: (settings: NotificationSettings, state: NotificationState) => StateUpdate<T>
  ): Promise<T> {
    return this.exclusive(async () => {
      const update = fn(
        cloneSettings(this.notificationSettings),
        cloneNotificationState(this.notificationState)
      );
      if (!notificationStatesEqual(this.notificationState, update.nextState)) {
        this.notificationState = cloneNotificationState(update.nextState);
        await this.persist("notificationState", cloneNotificationState(update.nextState));
      }
      return update.result;
    });
  }

  // Wakes the supervisor without changing anything, e.g. after system resume.
  requestRestart(): void {
    this.restartSignal.notify();
  }
}
