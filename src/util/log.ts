// src/util/log.ts

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

const PREFIX: Record<Exclude<LogLevel, "silent">, string> = {
  debug: "🔎",
  info: "ℹ️ ",
  warn: "⚠️ ",
  error: "❌",
};

/**
 * Status lines go to stderr so that stdout stays free for data output.
 */
export function createConsoleLogger(options: { level?: LogLevel } = {}): Logger {
  const threshold = LEVEL_RANK[options.level ?? "info"];
  const emit =
    (level: Exclude<LogLevel, "silent">) =>
    (message: string): void => {
      if (LEVEL_RANK[level] < threshold) return;
      console.error(`${PREFIX[level]} ${message}`);
    };

  return {
    debug: emit("debug"),
    info: emit("info"),
    warn: emit("warn"),
    error: emit("error"),
  };
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
