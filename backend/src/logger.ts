export type LogLevel = "debug" | "info" | "warn" | "error";

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  child(scope: string): Logger;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

export function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_ORDER;
}

export function createLogger(scope: string, level: LogLevel = "info"): Logger {
  const threshold = LEVEL_ORDER[level];

  const write = (messageLevel: LogLevel, message: string) => {
    if (LEVEL_ORDER[messageLevel] < threshold) return;
    const line = `${new Date().toISOString()} [${scope}] ${messageLevel.toUpperCase()} ${message}`;
    if (messageLevel === "error") {
      console.error(line);
    } else if (messageLevel === "warn") {
      console.warn(line);
    } else {
      console.log(line);
    }
  };

  return {
    debug: (message) => write("debug", message),
    info: (message) => write("info", message),
    warn: (message) => write("warn", message),
    error: (message) => write("error", message),
    child: (childScope) => createLogger(`${scope}:${childScope}`, level)
  };
}

export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  child: () => silentLogger
};
