import type { Logger } from "../types/logger.js";

type Level = "DEBUG" | "INFO" | "WARNING" | "ERROR";

function formatProperties(properties?: Record<string, unknown>): string {
  if (!properties) return "";
  const parts = Object.entries(properties).map(
    ([key, value]) => `${key}=${typeof value === "string" ? value : JSON.stringify(value)}`
  );
  return parts.length > 0 ? ` ${parts.join(" ")}` : "";
}

/**
 * Logger for local runs, where the trigger.dev logger has no run to attach to.
 * Lines look like `INFO - message key=value`; debug lines get a timestamp and
 * are only written when `debug` is on.
 */
export function createConsoleLogger(
  debug: boolean,
  write: (line: string) => void = (line) => process.stdout.write(`${line}\n`)
): Logger {
  const emit = (level: Level, message: string, properties?: Record<string, unknown>) => {
    const prefix = debug ? `${new Date().toISOString()} - ${level}` : level;
    write(`${prefix} - ${message}${formatProperties(properties)}`);
  };
  return {
    debug: (message, properties) => {
      if (debug) emit("DEBUG", message, properties);
    },
    info: (message, properties) => emit("INFO", message, properties),
    warn: (message, properties) => emit("WARNING", message, properties),
    error: (message, properties) => emit("ERROR", message, properties),
  };
}
