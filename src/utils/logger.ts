export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export type Logger = {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
};

const LEVELS: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function isLogLevel(v: string): v is LogLevel {
  return v in LEVELS;
}

function currentLevel(): LogLevel {
  const raw = String(process.env.LOG_LEVEL ?? "info").toLowerCase();
  return isLogLevel(raw) ? raw : "info";
}

// stdout is reserved for command output; every level goes to stderr.
export function createLogger(namespace: string, level?: LogLevel): Logger {
  const emit = (at: Exclude<LogLevel, "silent">, message: string, meta?: Record<string, unknown>) => {
    if (LEVELS[at] < LEVELS[level ?? currentLevel()]) return;
    const line = `[${namespace}] ${at.toUpperCase()} ${message}`;
    if (meta && Object.keys(meta).length > 0) console.error(line, meta);
    else console.error(line);
  };

  return {
    debug: (message, meta) => emit("debug", message, meta),
    info: (message, meta) => emit("info", message, meta),
    warn: (message, meta) => emit("warn", message, meta),
    error: (message, meta) => emit("error", message, meta),
  };
}

export const silentLogger: Logger = createLogger("silent", "silent");
