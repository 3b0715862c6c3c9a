/**
 * Observability: Structured logging
 *
 * CloudWatch Logs に 1 行 1 JSON で出力する。
 */

export type LogLevel = "DEBUG" | "INFO" | "WARN" | "ERROR";

const logLevels: Record<LogLevel, number> = { DEBUG: 0, INFO: 1, WARN: 2, ERROR: 3 };

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
}

export function isLogLevel(value: string): value is LogLevel {
  return value in logLevels;
}

export function createLogger(service: string, level: LogLevel = "INFO"): Logger {
  const currentLevel = logLevels[level];

  const log = (messageLevel: LogLevel, message: string, data?: Record<string, unknown>) => {
    if (logLevels[messageLevel] < currentLevel) return;

    console.log(
      JSON.stringify({
        timestamp: new Date().toISOString(),
        level: messageLevel,
        message,
        ...data,
        service,
      })
    );
  };

  return {
    debug: (message, data) => log("DEBUG", message, data),
    info: (message, data) => log("INFO", message, data),
    warn: (message, data) => log("WARN", message, data),
    error: (message, data) => log("ERROR", message, data),
  };
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
