export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

const PREFIX = "[xmfix]";

let currentLevel: LogLevel = "info";

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

function enabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel];
}

export function describeError(err: unknown): string {
  const lines: string[] = [];
  let current: unknown = err;
  let depth = 0;
  while (current !== undefined && depth < 8) {
    if (current instanceof Error) {
      lines.push(`${depth > 0 ? "Caused by: " : ""}${current.stack ?? `${current.name}: ${current.message}`}`);
      current = current.cause;
    } else {
      lines.push(`${depth > 0 ? "Caused by: " : ""}${String(current)}`);
      current = undefined;
    }
    depth += 1;
  }
  return lines.join("\n");
}

function write(level: LogLevel, message: string): void {
  if (!enabled(level)) {
    return;
  }
  console.error(`${PREFIX} ${level.toUpperCase()} ${message}`);
}

export const log = {
  debug(message: string): void {
    write("debug", message);
  },
  info(message: string): void {
    write("info", message);
  },
  warn(message: string): void {
    write("warn", message);
  },
  error(message: string, err?: unknown): void {
    write("error", err === undefined ? message : `${message}\n${describeError(err)}`);
  }
};
