export type LogFields = Record<string, unknown>;

export interface Logger {
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
}

export type Level = "debug" | "info" | "warn" | "error" | "silent";

const LEVEL_ORDER: Record<Level, number> = { debug: 10, info: 20, warn: 30, error: 40, silent: 100 };

export function parseLevel(raw: string | undefined): Level {
  const value = String(raw || "").trim().toLowerCase();
  if (value === "debug" || value === "info" || value === "warn" || value === "error" || value === "silent") {
    return value;
  }
  return "info";
}

function formatFields(fields?: LogFields): string {
  if (!fields || !Object.keys(fields).length) return "";
  try {
    return ` ${JSON.stringify(fields)}`;
  } catch {
    return " [unserializable fields]";
  }
}

// Every level goes to stderr so stdout stays free for rendered output.
export function createConsoleLogger(scope: string, level = parseLevel(process.env.LOG_LEVEL)): Logger {
  const threshold = LEVEL_ORDER[level];
  const write = (current: Exclude<Level, "silent">, message: string, fields?: LogFields) => {
    if (LEVEL_ORDER[current] < threshold) return;
    const line = `[${new Date().toISOString()}] ${current.toUpperCase()} [${scope}] ${message}${formatFields(fields)}`;
    if (current === "warn") {
      console.warn(line);
    } else {
      console.error(line);
    }
  };

  return {
    debug: (message, fields) => write("debug", message, fields),
    info: (message, fields) => write("info", message, fields),
    warn: (message, fields) => write("warn", message, fields),
    error: (message, fields) => write("error", message, fields),
  };
}

export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
