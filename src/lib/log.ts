export const LOG_LEVELS = ["verbose", "info", "warn", "error", "fatal"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const DEFAULT_LEVEL: LogLevel = "info";

function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

export function resolveLogLevel(raw: string | undefined): LogLevel {
  const candidate = raw?.trim().toLowerCase();
  if (!candidate) {
    return DEFAULT_LEVEL;
  }
  return isLogLevel(candidate) ? candidate : DEFAULT_LEVEL;
}

function shouldLog(level: LogLevel): boolean {
  const threshold = resolveLogLevel(process.env.CALC_LOG_LEVEL);
  return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(threshold);
}

function emit(level: LogLevel, message: string, detail?: unknown): void {
  if (!shouldLog(level)) {
    return;
  }
  const line = `[${level}] ${message}`;
  const args: unknown[] = detail === undefined ? [line] : [line, detail];
  switch (level) {
    case "verbose":
      console.debug(...args);
      break;
    case "info":
      console.info(...args);
      break;
    case "warn":
      console.warn(...args);
      break;
    default:
      console.error(...args);
      break;
  }
}

export const logger = {
  verbose: (message: string, detail?: unknown) => emit("verbose", message, detail),
  info: (message: string, detail?: unknown) => emit("info", message, detail),
  warn: (message: string, detail?: unknown) => emit("warn", message, detail),
  error: (message: string, detail?: unknown) => emit("error", message, detail),
  /** Unrecoverable setup problems. Callers decide whether to exit. */
  fatal: (message: string, detail?: unknown) => emit("fatal", message, detail),
};

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
