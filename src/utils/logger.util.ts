import chalk from "chalk";

export interface Logger {
  info: (msg: string) => void;
  warn: (msg: string) => void;
  error: (msg: string, err?: Error) => void;
  debug: (msg: string) => void;
}

export type LogLevel = "error" | "warn" | "info" | "debug";

const DEBUG_LEVELS = new Set(["debug", "trace"]);

const shouldLogDebug = (): boolean => {
  const read = (key: string): string | undefined =>
    process.env[key] ?? process.env[key.toLowerCase()];
  const logLevel = (read("LOG_LEVEL") ?? "").toLowerCase();
  if (read("DEBUG") === "1") {
    return true;
  }
  return DEBUG_LEVELS.has(logLevel);
};

export type LogListener = (line: string) => void;

/**
 * Fixed-size ring of the most recent rendered log lines.
 * Backs the control server's /logs and /logs/stream endpoints.
 */
export class LogBuffer {
  private readonly capacity: number;
  private lines: string[] = [];
  private readonly listeners = new Set<LogListener>();

  constructor(capacity = 1000) {
    this.capacity = Math.max(1, capacity);
  }

  push(level: LogLevel, msg: string, at: Date = new Date()): void {
    const line = `${at.toISOString()} ${level.toUpperCase()} ${msg}`;
    this.lines.push(line);
    if (this.lines.length > this.capacity) {
      this.lines.splice(0, this.lines.length - this.capacity);
    }
    for (const listener of this.listeners) listener(line);
  }

  /**
   * Receive every line pushed from now on. Returns the unsubscribe function.
   */
  subscribe(listener: LogListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  listenerCount(): number {
    return this.listeners.size;
  }

  tail(count: number): string[] {
    if (count <= 0) return [];
    return this.lines.slice(-count);
  }

  size(): number {
    return this.lines.length;
  }
}

export class ConsoleLogger implements Logger {
  private readonly buffer?: LogBuffer;

  constructor(buffer?: LogBuffer) {
    this.buffer = buffer;
  }

  info(msg: string): void {
    this.buffer?.push("info", msg);
    console.log(chalk.cyan("[INFO]"), msg);
  }

  warn(msg: string): void {
    this.buffer?.push("warn", msg);
    console.warn(chalk.yellow("[WARN]"), msg);
  }

  error(msg: string, err?: Error): void {
    this.buffer?.push("error", err ? `${msg} ${err.message}` : msg);
    console.error(
      chalk.red("[ERROR]"),
      msg,
      err ? `\n${err.stack ?? err.message}` : "",
    );
  }

  debug(msg: string): void {
    if (!shouldLogDebug()) return;
    this.buffer?.push("debug", msg);
    console.debug(chalk.gray("[DEBUG]"), msg);
  }
}

export type LogFieldValue =
  | string
  | number
  | boolean
  | null
  | undefined
  | string[]
  | Record<string, unknown>;

/**
 * Render a structured event as `event {json}`: keys sorted, floats rounded to 6 places,
 * undefined fields dropped.
 */
export function formatEvent(
  event: string,
  fields: Record<string, LogFieldValue>,
): string {
  const normalized: Record<string, unknown> = {};
  for (const key of Object.keys(fields).sort()) {
    const value = fields[key];
    if (value === undefined) continue;
    normalized[key] =
      typeof value === "number" && !Number.isInteger(value)
        ? Math.round(value * 1e6) / 1e6
        : value;
  }
  return `${event} ${JSON.stringify(normalized)}`;
}

export function logEvent(
  logger: Logger,
  event: string,
  fields: Record<string, LogFieldValue> = {},
  level: Exclude<LogLevel, "error"> = "info",
): void {
  const line = formatEvent(event, fields);
  if (level === "warn") logger.warn(line);
  else if (level === "debug") logger.debug(line);
  else logger.info(line);
}
