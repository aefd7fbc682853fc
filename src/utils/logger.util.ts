import chalk from "chalk";

export interface Logger {
  info: (msg: string) => void;
  warn: (msg: string) => void;
  error: (msg: string, err?: Error) => void;
  debug: (msg: string) => void;
}

export type LogLevel = "debug" | "info" | "warn" | "error";

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const isLogLevel = (value: string): value is LogLevel =>
  value in LOG_LEVEL_PRIORITY;

const resolveLevel = (): LogLevel => {
  const read = (key: string): string | undefined =>
    process.env[key] ?? process.env[key.toLowerCase()];
  if (read("DEBUG") === "1") {
    return "debug";
  }
  const level = (read("LOG_LEVEL") ?? "").toLowerCase();
  return isLogLevel(level) ? level : "info";
};

/** HH:MM:SS in UTC, the clock every log line and summary is stamped with */
export const clockStamp = (date: Date = new Date()): string =>
  date.toISOString().slice(11, 19);

export class ConsoleLogger implements Logger {
  private readonly minPriority: number;

  constructor(level: LogLevel = resolveLevel()) {
    this.minPriority = LOG_LEVEL_PRIORITY[level];
  }

  info(msg: string): void {
    if (!this.enabled("info")) return;
    console.log(chalk.cyan("[INFO]"), `[${clockStamp()}] ${msg}`);
  }

  warn(msg: string): void {
    if (!this.enabled("warn")) return;
    console.warn(chalk.yellow("[WARN]"), `[${clockStamp()}] ${msg}`);
  }

  error(msg: string, err?: Error): void {
    if (!this.enabled("error")) return;
    console.error(
      chalk.red("[ERROR]"),
      `[${clockStamp()}] ${msg}`,
      err ? `\n${err.stack ?? err.message}` : "",
    );
  }

  debug(msg: string): void {
    if (!this.enabled("debug")) return;
    console.debug(chalk.gray("[DEBUG]"), `[${clockStamp()}] ${msg}`);
  }

  private enabled(level: LogLevel): boolean {
    return LOG_LEVEL_PRIORITY[level] >= this.minPriority;
  }
}

/**
 * Create a no-op logger that discards all output
 * Useful for testing or when logging should be suppressed
 */
export function createNullLogger(): Logger {
  return {
    debug: () => {},
    info: () => {},
    warn: () => {},
    error: () => {},
  };
}
