export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export type LogMeta = Record<string, unknown>;

export interface Logger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
  child(scope: string): Logger;
}

export type LoggerOptions = {
  level?: LogLevel;
  write?: (line: string) => void;
};

let defaultLevel: LogLevel = "info";

export function setDefaultLogLevel(level: LogLevel): void {
  defaultLevel = level;
}

function formatMeta(meta: LogMeta | undefined): string {
  if (!meta || Object.keys(meta).length === 0) return "";
  try {
    return ` ${JSON.stringify(meta)}`;
  } catch {
    return " [unserializable meta]";
  }
}

// Lines go to stderr so stdout stays clean for --json output.
export function createLogger(scope: string, opts: LoggerOptions = {}): Logger {
  const write = opts.write ?? ((line: string) => process.stderr.write(line));

  const log = (level: LogLevel, message: string, meta?: LogMeta): void => {
    const threshold = opts.level ?? defaultLevel;
    if (LEVEL_RANK[level] < LEVEL_RANK[threshold]) return;
    write(`[${level}] ${scope}: ${message}${formatMeta(meta)}\n`);
  };

  return {
    debug: (message, meta) => log("debug", message, meta),
    info: (message, meta) => log("info", message, meta),
    warn: (message, meta) => log("warn", message, meta),
    error: (message, meta) => log("error", message, meta),
    child: (sub) => createLogger(`${scope}:${sub}`, opts),
  };
}

export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  child: () => silentLogger,
};
