export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export interface Logger {
  debug: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
}

export type LogSink = (prefix: string, ...args: unknown[]) => void;

export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const raw = (env.LOG_LEVEL || (env.NODE_ENV !== "production" ? "debug" : "info")).toLowerCase();
  return raw === "debug" || raw === "info" || raw === "warn" || raw === "error" ? raw : "info";
}

/*
 * Leveled console logger: `[md2wechat][<iso time>][LEVEL] ...`.
 * warn and error go to stderr unless a sink is given.
 */
export function createLogger(level: LogLevel = resolveLogLevel(), sink?: LogSink): Logger {
  const threshold = LEVEL_ORDER[level];

  function emit(entryLevel: LogLevel, args: unknown[]) {
    if (LEVEL_ORDER[entryLevel] < threshold) return;
    const prefix = `[md2wechat][${new Date().toISOString()}][${entryLevel.toUpperCase()}]`;
    if (sink) {
      sink(prefix, ...args);
      return;
    }
    const write = entryLevel === "warn" || entryLevel === "error" ? console.error : console.log;
    write(prefix, ...args);
  }

  return {
    debug: (...args) => emit("debug", args),
    info: (...args) => emit("info", args),
    warn: (...args) => emit("warn", args),
    error: (...args) => emit("error", args),
  };
}

export const logger = createLogger();
