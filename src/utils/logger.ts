/**
 * Simple logger utility for Dastore
 *
 * Everything goes to stderr: stdout carries CLI output and the MCP stdio stream.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface Logger {
  debug: (message: string, data?: unknown) => void;
  info: (message: string, data?: unknown) => void;
  warn: (message: string, data?: unknown) => void;
  error: (message: string, data?: unknown) => void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const DEFAULT_LEVEL: LogLevel = "warn";

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_ORDER;
}

// Read on every call so a level loaded from .env after import still applies
export function currentLogLevel(): LogLevel {
  const configured = process.env.DASTORE_LOG_LEVEL?.trim().toLowerCase();
  return configured && isLogLevel(configured) ? configured : DEFAULT_LEVEL;
}

/**
 * Formats one log line
 */
export function formatLog(
  level: LogLevel,
  context: string,
  message: string,
  data?: unknown,
  now: Date = new Date()
): string {
  let dataString = "";
  if (data !== undefined) {
    try {
      dataString = ` ${JSON.stringify(data, errorReplacer)}`;
    } catch (error) {
      dataString = ` [Error stringifying data: ${error instanceof Error ? error.message : String(error)}]`;
    }
  }
  return `[${now.toISOString()}] [${level.toUpperCase()}] [${context}] ${message}${dataString}`;
}

// Error instances stringify to {} otherwise
function errorReplacer(_key: string, value: unknown): unknown {
  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }
  return value;
}

/**
 * Creates a sub-logger with a specific context name
 * @param context The name of the context/file using the logger
 */
export const createSubLogger = (context: string): Logger => {
  const write = (level: LogLevel, message: string, data?: unknown): void => {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[currentLogLevel()]) {
      return;
    }
    console.error(formatLog(level, context, message, data));
  };

  return {
    debug: (message, data) => write("debug", message, data),
    info: (message, data) => write("info", message, data),
    warn: (message, data) => write("warn", message, data),
    error: (message, data) => write("error", message, data),
  };
};
