export type LogLevel = "debug" | "info" | "warn" | "error";

const rank: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

let currentLevel: LogLevel = "info";

function fmt(meta?: unknown): string {
  if (meta === undefined) {
    return "";
  }
  if (typeof meta === "string") {
    return ` ${meta}`;
  }
  try {
    return ` ${JSON.stringify(meta)}`;
  } catch {
    return " [meta:unserializable]";
  }
}

function write(level: LogLevel, msg: string, meta?: unknown): void {
  if (rank[level] < rank[currentLevel]) {
    return;
  }

  const line = `[${new Date().toISOString()}] [${level.toUpperCase()}] ${msg}${fmt(meta)}`;
  /* eslint-disable no-console */
  if (level === "error") {
    console.error(line);
  } else if (level === "warn") {
    console.warn(line);
  } else {
    console.log(line);
  }
  /* eslint-enable no-console */
}

export const log = {
  setLevel(level: LogLevel): void {
    currentLevel = level;
  },

  level(): LogLevel {
    return currentLevel;
  },

  debug(msg: string, meta?: unknown): void {
    write("debug", msg, meta);
  },
  info(msg: string, meta?: unknown): void {
    write("info", msg, meta);
  },
  warn(msg: string, meta?: unknown): void {
    write("warn", msg, meta);
  },
  error(msg: string, meta?: unknown): void {
    write("error", msg, meta);
  },

  caught(where: string, err: unknown): void {
    write("error", `${where} threw`, {
      message: err instanceof Error ? err.message : String(err),
      stack: err instanceof Error ? err.stack : undefined
    });
  }
};
