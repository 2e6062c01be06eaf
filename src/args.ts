import type { RunOptions } from "./main.js";
import { HISTORY_RANGES, isHistoryRange } from "./storage/historyStore.js";

// Keep help stable for parsing/tests.
export const HELP_TEXT = `meterwatch

Watches Claude plan usage limits and alerts as they fill up.

Usage:
  meterwatch [options]

Options:
  --org <id>             Organization ID to store (with --token)
  --token <token>        Session token to store (with --org)
  --logout               Remove stored credentials
  --once                 Fetch once, print and exit
  --interval <minutes>   Auto-refresh interval in minutes
  --no-auto              Disable scheduled refresh
  --hourly               Also refresh just after each hour starts
  --no-hourly            Turn the hourly refresh off
  --history <range>      Print usage history stats: ${HISTORY_RANGES.join(",")}
  --json                 Print machine-readable JSON
  --view <mode>          View mode: table,graph (default: table)
  --debug                Print debug diagnostics (no secrets)
  -h, --help             Show help
`;

const FLAGS = new Set([
  "-h",
  "--help",
  "--json",
  "--debug",
  "--once",
  "--logout",
  "--no-auto",
  "--hourly",
  "--no-hourly",
  "--org",
  "--token",
  "--interval",
  "--history",
  "--view",
]);

// Session tokens may start with "-", so only a known flag counts as missing.
function takeValue(argv: string[], i: number, flag: string, hint: string): string {
  const raw = argv[i + 1];
  if (!raw || FLAGS.has(raw)) {
    throw new Error(`${flag} requires a value (${hint})`);
  }
  return raw;
}

export function parseArgs(argv: string[]): RunOptions | "help" {
  const opts: RunOptions = {
    org: null,
    token: null,
    logout: false,
    once: false,
    intervalMinutes: null,
    noAuto: false,
    hourly: null,
    history: null,
    json: false,
    debug: false,
    view: "table",
  };

  for (let i = 0; i < argv.length; i++) {
    const a = argv[i];
    if (a === "-h" || a === "--help") return "help";
    if (a === "--json") {
      opts.json = true;
      continue;
    }
    if (a === "--debug") {
      opts.debug = true;
      continue;
    }
    if (a === "--once") {
      opts.once = true;
      continue;
    }
    if (a === "--logout") {
      opts.logout = true;
      continue;
    }
    if (a === "--no-auto") {
      opts.noAuto = true;
      continue;
    }
    if (a === "--hourly" || a === "--no-hourly") {
      opts.hourly = a === "--hourly";
      continue;
    }
    if (a === "--org") {
      opts.org = takeValue(argv, i, a, "organization id");
      i++;
      continue;
    }
    if (a === "--token") {
      opts.token = takeValue(argv, i, a, "session token");
      i++;
      continue;
    }
    if (a === "--interval") {
      const raw = takeValue(argv, i, a, "minutes");
      i++;
      const n = Number(raw);
      if (!Number.isInteger(n) || n <= 0) {
        throw new Error(`Invalid interval: ${raw}`);
      }
      opts.intervalMinutes = n;
      continue;
    }
    if (a === "--history") {
      const raw = takeValue(argv, i, a, HISTORY_RANGES.join(","));
      i++;
      if (!isHistoryRange(raw)) {
        throw new Error(`Unknown history range: ${raw}`);
      }
      opts.history = raw;
      continue;
    }
    if (a === "--view") {
      const raw = takeValue(argv, i, a, "table,graph");
      i++;
      if (raw === "table" || raw === "graph") {
        opts.view = raw;
      } else {
        throw new Error(`Unknown view: ${raw}`);
      }
      continue;
    }

    throw new Error(`Unknown argument: ${a}`);
  }

  if ((opts.org == null) !== (opts.token == null)) {
    throw new Error("--org and --token must be given together");
  }
  if (opts.logout && opts.org != null) {
    throw new Error("--logout cannot be combined with --org/--token");
  }

  return opts;
}
