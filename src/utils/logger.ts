export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

let currentLevel: LogLevel = parseLevel(process.env.TASKWAVE_LOG_LEVEL) ?? "info";

function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_ORDER, value);
}

function parseLevel(value: string | undefined): LogLevel | undefined {
  const lower = value?.toLowerCase();
  return lower !== undefined && isLogLevel(lower) ? lower : undefined;
}

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

function shouldLog(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel];
}

function formatMsg(level: LogLevel, scope: string | undefined, msg: string, data?: Record<string, unknown>): string {
  const ts = new Date().toISOString();
  const prefix = scope ? `[${scope}] ` : "";
  const base = `${ts} [${level.toUpperCase()}] ${prefix}${msg}`;
  if (data && Object.keys(data).length > 0) {
    return `${base} ${JSON.stringify(data)}`;
  }
  return base;
}

export type Logger = {
  debug(msg: string, data?: Record<string, unknown>): void;
  info(msg: string, data?: Record<string, unknown>): void;
  warn(msg: string, data?: Record<string, unknown>): void;
  error(msg: string, data?: Record<string, unknown>): void;
};

// Everything goes to stderr; stdout belongs to CLI output.
function emit(level: Exclude<LogLevel, "silent">, scope: string | undefined, msg: string, data?: Record<string, unknown>): void {
  if (!shouldLog(level)) return;
  process.stderr.write(formatMsg(level, scope, msg, data) + "\n");
}

/** Logger whose lines carry a `[scope]` prefix. */
export function createLogger(scope?: string): Logger {
  return {
    debug: (msg, data) => emit("debug", scope, msg, data),
    info: (msg, data) => emit("info", scope, msg, data),
    warn: (msg, data) => emit("warn", scope, msg, data),
    error: (msg, data) => emit("error", scope, msg, data),
  };
}

export const log: Logger = createLogger();
