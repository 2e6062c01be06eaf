import { EventEmitter } from "node:events";

import {
  classifyFetchError,
  describeFetchError,
  errorMessage,
  type ClassifiedError,
  type FetchError,
} from "../errors.js";
import { silentLogger, type Logger } from "../logger.js";
import { deliverNotifications, type NotificationSink } from "../notify/sink.js";
import type { FetchOutcome, UsageFetcher } from "../providers/provider.js";
import type { SnapshotStore } from "../storage/historyStore.js";
import type {
  AutoRefreshConfig,
  Credentials,
  UsageSnapshot,
  UsageUpdatedEvent,
} from "../types.js";
import { evaluateNotifications, type NotificationEvent } from "./notificationPolicy.js";
import {
  computeBackoffDelayMs,
  DEFAULT_BACKOFF,
  intervalMs,
  nextRefreshAt,
  type BackoffOptions,
} from "./scheduler.js";
import type { SharedConfig } from "./sharedConfig.js";

export type SupervisorState =
  | { kind: "idle" }
  // until: epoch ms of the next scheduled fetch, null while auto-refresh is off
  | { kind: "waiting"; until: number | null }
  | { kind: "fetching"; manual: boolean }
  | { kind: "backoff"; attempt: number; until: number };

export type UsageErrorEvent = {
  error: ClassifiedError;
};

export type SupervisorEvents = {
  "usage-updated": UsageUpdatedEvent;
  "usage-error": UsageErrorEvent;
  "state-changed": SupervisorState;
};

export type SupervisorStatus = {
  state: SupervisorState;
  attempt: number;
  running: boolean;
};

export type CycleResult =
  | { kind: "success"; snapshot: UsageSnapshot; notifications: NotificationEvent[] }
  | { kind: "failure"; error: FetchError }
  | { kind: "skipped"; reason: "no-credentials" | "loop-running" };

export type RefreshSupervisorOptions = {
  config: SharedConfig;
  fetcher: UsageFetcher;
  snapshots?: SnapshotStore | null;
  notifier?: NotificationSink | null;
  backoff?: BackoffOptions;
  random?: () => number;
  now?: () => number;
  logger?: Logger;
};

type WakeReason = "elapsed" | "restart" | "manual" | "stop";

function credentialsOf(config: AutoRefreshConfig): Credentials | null {
  if (config.organization_id == null || config.session_token == null) return null;
  return { organizationId: config.organization_id, sessionToken: config.session_token };
}

/**
 * Owns the polling loop. One fetch is in flight at most; every wait (timer,
 * backoff, disabled, no credentials) races the restart signal, manual
 * refresh requests and stop, so configuration changes apply at once.
 */
export class RefreshSupervisor {
  private readonly config: SharedConfig;
  private readonly fetcher: UsageFetcher;
  private readonly snapshots: SnapshotStore | null;
  private readonly notifier: NotificationSink | null;
  private readonly backoff: BackoffOptions;
  private readonly random: () => number;
  private readonly now: () => number;
  private readonly log: Logger;
  private readonly events = new EventEmitter();

  private state: SupervisorState = { kind: "idle" };
  private attempt = 0;
  private deadline: number | null = null;
  private seenVersion = 0;
  private stopped = true;
  private loopDone: Promise<void> | null = null;
  private pendingManual: Array<() => void> = [];
  private wake: (() => void) | null = null;
  private cycleInFlight = false;
  // Serializes cycles run while the loop is stopped.
  private oneShots: Promise<void> = Promise.resolve();
  private activeOneShot: Promise<CycleResult> | null = null;

  constructor(opts: RefreshSupervisorOptions) {
    this.config = opts.config;
    this.fetcher = opts.fetcher;
    this.snapshots = opts.snapshots ?? null;
    this.notifier = opts.notifier ?? null;
    this.backoff = opts.backoff ?? DEFAULT_BACKOFF;
    this.random = opts.random ?? Math.random;
    this.now = opts.now ?? (() => Date.now());
    this.log = opts.logger ?? silentLogger;
  }

  on<E extends keyof SupervisorEvents>(
    event: E,
    listener: (payload: SupervisorEvents[E]) => void
  ): () => void {
    this.events.on(event, listener);
    return () => {
      this.events.off(event, listener);
    };
  }

  getStatus(): SupervisorStatus {
    return { state: this.state, attempt: this.attempt, running: !this.stopped };
  }

  start(): void {
    if (!this.stopped) return;
    this.stopped = false;
    this.seenVersion = this.config.restartSignal.version;
    this.loopDone = this.supervise();
  }

  async stop(): Promise<void> {
    if (this.stopped) return;
    this.stopped = true;
    this.wake?.();
    await this.loopDone;
    this.loopDone = null;
    this.settleManual();
    this.setState({ kind: "idle" });
  }

  /**
   * Fetches as soon as the loop is free: any pending timer or backoff is cut
   * short. Resolves once a fetch that started after this call has been
   * processed (or right away when there is nothing to fetch with).
   */
  refreshNow(): Promise<void> {
    if (this.stopped) {
      return this.runOnce().then(() => undefined);
    }
    return new Promise((resolve) => {
      this.pendingManual.push(resolve);
      this.wake?.();
    });
  }

  /**
   * One fetch-and-process cycle outside the loop. Overlapping calls run one
   * after the other, and a loop that is still stopping finishes its own
   * fetch first.
   */
  async runOnce(): Promise<CycleResult> {
    if (!this.stopped) {
      await this.refreshNow();
      return { kind: "skipped", reason: "loop-running" };
    }
    await this.loopDone;
    const run = this.oneShots.then(() => this.oneShot());
    this.oneShots = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  private async oneShot(): Promise<CycleResult> {
    // start() may have been called while this call was queued.
    if (!this.stopped) {
      await this.refreshNow();
      return { kind: "skipped", reason: "loop-running" };
    }
    const active = this.stoppedCycle();
    this.activeOneShot = active;
    try {
      return await active;
    } finally {
      this.activeOneShot = null;
    }
  }

  private async stoppedCycle(): Promise<CycleResult> {
    const config = await this.config.getAutoRefresh();
    const creds = credentialsOf(config);
    if (!creds) return { kind: "skipped", reason: "no-credentials" };
    try {
      return await this.cycle(creds, true);
    } finally {
      this.setState({ kind: "idle" });
    }
  }

  private async supervise(): Promise<void> {
    // A one-shot cycle started before start() keeps the fetch slot until it
    // is done; its outcome belongs to its own caller.
    await this.activeOneShot?.then(
      () => undefined,
      () => undefined
    );
    let fetchNow = true;
    while (!this.stopped) {
      try {
        fetchNow = await this.step(fetchNow);
      } catch (err) {
        // Nothing inside a step is expected to throw; keep the loop alive anyway.
        this.log.error("refresh loop iteration failed", { error: errorMessage(err) });
        fetchNow = this.afterWake(await this.waitForWake(this.backoff.baseMs));
      }
    }
  }

  // Returns whether the next step should fetch right away.
  private async step(fetchNow: boolean): Promise<boolean> {
    const config = await this.config.getAutoRefresh();
    const creds = credentialsOf(config);

    if (!creds) {
      this.attempt = 0;
      this.deadline = null;
      this.settleManual();
      this.setState({ kind: "idle" });
      return this.afterWake(await this.waitForWake(null));
    }

    // A restart while disabled only re-reads the config; manual requests still fetch.
    const manual = this.pendingManual.length > 0;
    if (fetchNow && (config.enabled || manual)) {
      await this.cycle(creds, manual);
      return false;
    }

    if (!config.enabled) {
      this.setState({ kind: "waiting", until: null });
      return this.afterWake(await this.waitForWake(null));
    }

    const now = this.now();
    const until =
      this.deadline ?? nextRefreshAt(config, now, this.random) ?? now + intervalMs(config);
    this.deadline = until;
    this.setState(
      this.attempt > 0
        ? { kind: "backoff", attempt: this.attempt, until }
        : { kind: "waiting", until }
    );
    return this.afterWake(await this.waitForWake(until - now));
  }

  private afterWake(reason: WakeReason): boolean {
    switch (reason) {
      case "restart":
        this.seenVersion = this.config.restartSignal.version;
        this.attempt = 0;
        this.deadline = null;
        this.log.debug("restart signal received");
        return true;
      case "manual":
      case "elapsed":
        return true;
      case "stop":
        return false;
    }
  }

  private pendingWake(): WakeReason | null {
    if (this.stopped) return "stop";
    if (this.config.restartSignal.version !== this.seenVersion) return "restart";
    if (this.pendingManual.length > 0) return "manual";
    return null;
  }

  private waitForWake(delayMs: number | null): Promise<WakeReason> {
    const pending = this.pendingWake();
    if (pending) return Promise.resolve(pending);

    return new Promise((resolve) => {
      let timer: ReturnType<typeof setTimeout> | null = null;
      const finish = (reason: WakeReason): void => {
        if (timer) clearTimeout(timer);
        timer = null;
        unlisten();
        this.wake = null;
        resolve(reason);
      };
      const unlisten = this.config.restartSignal.listen(() => finish("restart"));
      this.wake = () => {
        const reason = this.pendingWake();
        if (reason) finish(reason);
      };
      if (delayMs != null) {
        timer = setTimeout(() => finish("elapsed"), Math.max(0, delayMs));
      }
    });
  }

  private async cycle(creds: Credentials, manual: boolean): Promise<CycleResult> {
    if (this.cycleInFlight) {
      throw new Error("refresh cycle already in flight");
    }
    this.cycleInFlight = true;
    const served = this.pendingManual.splice(0);
    this.setState({ kind: "fetching", manual });

    try {
      const outcome = await this.fetchUsage(creds);
      if (outcome.ok) {
        const notifications = await this.handleSuccess(outcome.snapshot);
        return { kind: "success", snapshot: outcome.snapshot, notifications };
      }
      await this.handleFailure(outcome.error);
      return { kind: "failure", error: outcome.error };
    } finally {
      this.cycleInFlight = false;
      for (const resolve of served) resolve();
    }
  }

  private async fetchUsage(creds: Credentials): Promise<FetchOutcome> {
    try {
      return await this.fetcher.fetch(creds.organizationId, creds.sessionToken);
    } catch (err) {
      return { ok: false, error: { kind: "network", message: errorMessage(err) } };
    }
  }

  private async handleSuccess(snapshot: UsageSnapshot): Promise<NotificationEvent[]> {
    this.attempt = 0;
    const fetchedAt = new Date(this.now());

    if (this.snapshots) {
      try {
        await this.snapshots.append(snapshot, fetchedAt);
      } catch (err) {
        this.log.warn("failed to store usage snapshot", { error: errorMessage(err) });
      }
    }

    const notifications = await this.config.updateNotificationState((settings, state) => {
      const evaluation = evaluateNotifications(snapshot, settings, state, fetchedAt);
      return { nextState: evaluation.nextState, result: evaluation.events };
    });

    if (this.notifier) {
      await deliverNotifications(this.notifier, notifications, this.log);
    }

    const fresh = await this.config.getAutoRefresh();
    const next = nextRefreshAt(fresh, this.now(), this.random);
    this.deadline = next;
    this.log.debug("usage updated", { nextRefreshAt: next, alerts: notifications.length });
    this.publish("usage-updated", {
      snapshot,
      fetched_at: fetchedAt.toISOString(),
      next_refresh_at: next,
    });
    return notifications;
  }

  private async handleFailure(error: FetchError): Promise<void> {
    if (error.kind === "rate-limited") {
      this.attempt += 1;
      const delay = computeBackoffDelayMs(this.attempt, this.backoff, this.random);
      this.deadline = this.now() + delay;
      this.log.warn("rate limited; backing off", { attempt: this.attempt, delayMs: delay });
      return;
    }

    this.attempt = 0;
    const fresh = await this.config.getAutoRefresh();
    this.deadline = nextRefreshAt(fresh, this.now(), this.random);
    this.log.warn("usage fetch failed", { error: describeFetchError(error) });
    this.publish("usage-error", { error: classifyFetchError(error) });
  }

  private settleManual(): void {
    for (const resolve of this.pendingManual.splice(0)) resolve();
  }

  private setState(next: SupervisorState): void {
    this.state = next;
    this.publish("state-changed", next);
  }

  private publish<E extends keyof SupervisorEvents>(event: E, payload: SupervisorEvents[E]): void {
    try {
      this.events.emit(event, payload);
    } catch (err) {
      this.log.error("event listener threw", { event, error: errorMessage(err) });
    }
  }
}
