import { appendFileSync } from "node:fs";

export const LOG_LEVELS = ["debug", "info", "warn", "error", "silent"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export type Logger = {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
};

type LoggerOptions = {
  level: LogLevel;
  path?: string;
  write?: (line: string) => void;
};

const RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40, silent: 100 };

function nowIsoNoMillis(): string {
  return new Date().toISOString().replace(/\.\d{3}Z$/, "Z");
}

// Ink owns stdout, so log lines go to a file.
function fileSink(path: string): (line: string) => void {
  return (line) => {
    appendFileSync(path, `${line}\n`, "utf8");
  };
}

export function createLogger(options: LoggerOptions): Logger {
  const threshold = RANK[options.level];
  const write = options.write ?? (options.path ? fileSink(options.path) : () => {});

  const log = (level: Exclude<LogLevel, "silent">, message: string): void => {
    if (RANK[level] < threshold) {
      return;
    }
    write(`${nowIsoNoMillis()} ${level.toUpperCase().padEnd(5, " ")} ${message}`);
  };

  return {
    debug: (message) => log("debug", message),
    info: (message) => log("info", message),
    warn: (message) => log("warn", message),
    error: (message) => log("error", message),
  };
}

export const silentLogger: Logger = createLogger({ level: "silent", write: () => {} });
