import { loadRuntimeConfig, type RuntimeConfig } from "./config.js";
import { CredentialValidationError, classifyFetchError, errorMessage } from "./errors.js";
import { createLogger, setDefaultLogLevel } from "./logger.js";
import { UsageMonitor } from "./monitor.js";
import { renderError, renderGraph, renderStats, renderTable } from "./output.js";
import type { HistoryRange } from "./storage/historyStore.js";
import type { UsageUpdatedEvent } from "./types.js";

export type RunOptions = {
  org: string | null;
  token: string | null;
  logout: boolean;
  once: boolean;
  intervalMinutes: number | null;
  noAuto: boolean;
  // null leaves the stored hourly refresh setting as it is.
  hourly: boolean | null;
  history: HistoryRange | null;
  json: boolean;
  debug: boolean;
  view: "table" | "graph";
};

export type RunContext = {
  runtime?: RuntimeConfig;
  monitor?: UsageMonitor;
  stdout?: (text: string) => void;
  stderr?: (text: string) => void;
  // Resolves when the daemon should shut down.
  untilStopped?: () => Promise<void>;
};

function waitForSignal(): Promise<void> {
  return new Promise((resolve) => {
    // Signal handlers alone do not hold the event loop open.
    const keepAlive = setInterval(() => undefined, 60 * 60_000);
    const done = (): void => {
      clearInterval(keepAlive);
      process.off("SIGINT", done);
      process.off("SIGTERM", done);
      resolve();
    };
    process.on("SIGINT", done);
    process.on("SIGTERM", done);
  });
}

// Exit codes:
// 0: success
// 1: configuration error (bad or missing credentials)
// 2: usage/argument error (handled in cli.ts)
// 3: fetch failure
export async function run(opts: RunOptions, ctx: RunContext = {}): Promise<number> {
  const runtime = ctx.runtime ?? loadRuntimeConfig();
  setDefaultLogLevel(opts.debug ? "debug" : runtime.logLevel);
  const log = createLogger("meterwatch");
  const stdout = ctx.stdout ?? ((t: string) => process.stdout.write(t));
  const stderr = ctx.stderr ?? ((t: string) => process.stderr.write(t));

  const monitor =
    ctx.monitor ?? (await UsageMonitor.open(runtime, { wakeDetector: !opts.once, logger: log }));

  const printUpdate = (update: UsageUpdatedEvent): void => {
    if (opts.json) {
      stdout(`${JSON.stringify(update)}\n`);
      return;
    }
    const text = opts.view === "graph" ? renderGraph(update) : renderTable(update);
    stdout(`${text}\n\n`);
  };

  try {
    if (opts.logout) {
      await monitor.clearCredentials();
      stdout("Credentials removed.\n");
      return 0;
    }

    if (opts.org != null && opts.token != null) {
      try {
        await monitor.setCredentials(opts.org, opts.token);
      } catch (err) {
        if (err instanceof CredentialValidationError) {
          stderr(`${err.message}\n`);
          return 1;
        }
        throw err;
      }
      log.info("credentials saved");
    }

    if (opts.intervalMinutes != null || opts.noAuto || opts.hourly != null) {
      const current = await monitor.config.getAutoRefresh();
      await monitor.setAutoRefresh(
        opts.noAuto ? false : current.enabled,
        opts.intervalMinutes ?? current.interval_minutes,
        opts.hourly ?? current.hourly_refresh_enabled
      );
    }

    if (opts.history) {
      const stats = monitor.getUsageStats(opts.history);
      if (!stats) {
        stderr("Usage history is unavailable.\n");
        return 1;
      }
      if (opts.json) {
        stdout(`${JSON.stringify({ range: opts.history, ...stats })}\n`);
      } else {
        stdout(`${renderStats(opts.history, stats)}\n`);
      }
      return 0;
    }

    if (!(await monitor.isConfigured())) {
      stderr("No credentials configured. Run with --org <id> --token <token>.\n");
      return 1;
    }

    if (opts.once) {
      const unsubscribe = monitor.on("usage-updated", printUpdate);
      const result = await monitor.runOnce();
      unsubscribe();
      if (result.kind === "failure") {
        const error = classifyFetchError(result.error);
        stderr(opts.json ? `${JSON.stringify({ error })}\n` : `${renderError(error)}\n`);
        return 3;
      }
      return result.kind === "success" ? 0 : 3;
    }

    monitor.on("usage-updated", printUpdate);
    monitor.on("usage-error", ({ error }) => {
      stderr(opts.json ? `${JSON.stringify({ error })}\n` : `${renderError(error)}\n`);
    });
    monitor.start();
    log.info("monitoring usage; press Ctrl+C to stop");
    await (ctx.untilStopped ?? waitForSignal)();
    return 0;
  } catch (err) {
    stderr(`${errorMessage(err)}\n`);
    return 3;
  } finally {
    await monitor.close();
  }
}
