/**
 * Leveled logging for the solver and its driver
 *
 * The most recent entries are kept in memory; console output goes to stderr
 * so that emitted code on stdout stays clean.
 */

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

export type LogData = Record<string, string | number | boolean | bigint | undefined>;

export interface LogEntry {
  level: Exclude<LogLevel, "silent">;
  message: string;
  component?: string | undefined;
  data?: LogData | undefined;
}

export type LogSink = (line: string, entry: LogEntry) => void;

export const DEFAULT_MAX_ENTRIES = 1000;

function stderrSink(line: string): void {
  console.error(line);
}

export class Logger {
  private entries: LogEntry[] = [];
  private level: LogLevel;
  private readonly sink: LogSink | undefined;
  private readonly maxEntries: number;
  private component: string | undefined;

  /**
   * @param sink where formatted lines go; `undefined` only records entries
   * @param maxEntries how many recent entries to keep; 0 keeps none
   */
  constructor(
    level: LogLevel = "warn",
    sink: LogSink | undefined = stderrSink,
    maxEntries: number = DEFAULT_MAX_ENTRIES
  ) {
    this.level = level;
    this.sink = sink;
    this.maxEntries = maxEntries;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  isEnabled(level: Exclude<LogLevel, "silent">): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }

  /**
   * A logger that shares this one's level and sink and tags its entries.
   */
  child(component: string): Logger {
    const child = new Logger(this.level, this.sink, this.maxEntries);
    child.component = component;
    child.entries = this.entries;
    return child;
  }

  debug(message: string, data?: LogData): void {
    this.log("debug", message, data);
  }

  info(message: string, data?: LogData): void {
    this.log("info", message, data);
  }

  warn(message: string, data?: LogData): void {
    this.log("warn", message, data);
  }

  error(message: string, data?: LogData): void {
    this.log("error", message, data);
  }

  private log(level: Exclude<LogLevel, "silent">, message: string, data?: LogData): void {
    if (!this.isEnabled(level)) {
      return;
    }

    const entry: LogEntry = {
      level,
      message,
      component: this.component,
      data: data && Object.keys(data).length > 0 ? data : undefined,
    };
    this.entries.push(entry);
    if (this.entries.length > this.maxEntries) {
      this.entries.splice(0, this.entries.length - this.maxEntries);
    }

    if (this.sink) {
      this.sink(formatEntry(entry), entry);
    }
  }

  getEntries(): LogEntry[] {
    return [...this.entries];
  }

  clear(): void {
    this.entries.length = 0;
  }
}

export function formatEntry(entry: LogEntry): string {
  let line = `${entry.level}`;
  if (entry.component) {
    line += ` <${entry.component}>`;
  }
  line += `: ${entry.message}`;
  if (entry.data) {
    const parts = Object.entries(entry.data)
      .filter(([, value]) => value !== undefined)
      .map(([key, value]) => `${key}=${String(value)}`);
    if (parts.length > 0) {
      line += ` (${parts.join(", ")})`;
    }
  }
  return line;
}

/**
 * Logger that records nothing and prints nothing.
 */
export function silentLogger(): Logger {
  return new Logger("silent", undefined);
}
