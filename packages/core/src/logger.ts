import type { LogEntry, LogLevel, Logger } from "@wayfarer/types";

const LEVEL_ORDER: Record<LogLevel, number> = {
  trace: 10,
  debug: 20,
  info: 30,
  warn: 40,
  error: 50,
  fatal: 60,
};

export type LogSink = (line: string, level: LogLevel) => void;

/** stdout below warn, stderr from warn up. */
const consoleSink: LogSink = (line, level) => {
  if (LEVEL_ORDER[level] >= LEVEL_ORDER.warn) console.error(line);
  else console.log(line);
};

/**
 * Structured logger writing one JSON object per line.
 */
export class JsonLogger implements Logger {
  constructor(
    private readonly component: string,
    private readonly threshold: LogLevel = "info",
    private readonly sink: LogSink = consoleSink
  ) {}

  debug(message: string, data?: Record<string, unknown>): void {
    this.write("debug", message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.write("info", message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.write("warn", message, data);
  }

  error(message: string, data?: Record<string, unknown>): void {
    this.write("error", message, data);
  }

  child(component: string): Logger {
    return new JsonLogger(`${this.component}.${component}`, this.threshold, this.sink);
  }

  private write(level: LogLevel, message: string, data?: Record<string, unknown>): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.threshold]) return;
    const entry: LogEntry = {
      level,
      message,
      timestamp: new Date().toISOString(),
      component: this.component,
      ...(data ? { data } : {}),
    };
    this.sink(JSON.stringify(entry), level);
  }
}

export function createLogger(component: string, level: LogLevel = "info", sink?: LogSink): Logger {
  return new JsonLogger(component, level, sink);
}
