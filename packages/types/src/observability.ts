import type { SpanId, Timestamp, TraceId } from "./foundational.js";

/**
 * Attached to every bus event. Enables tracing a user turn across
 * the language, search and response steps.
 *
 * Compatible with OpenTelemetry W3C Trace Context.
 */
export interface TraceContext {
  /** Unique per user turn. All descendant spans share this. */
  readonly traceId: TraceId;
  /** Unique per event/operation. */
  readonly spanId: SpanId;
  /** The span that caused this event. Absent for root spans. */
  readonly parentSpanId?: SpanId;
}

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal";

/** Structured log entry emitted by any component. */
export interface LogEntry {
  readonly timestamp: Timestamp;
  readonly level: LogLevel;
  readonly message: string;
  readonly component?: string;
  readonly traceCtx?: TraceContext;
  readonly data?: Record<string, unknown>;
}

/**
 * Logger handed to every component by injection.
 * Implementations write one JSON line per entry.
 */
export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
  /** Derive a logger tagged with a sub-component name. */
  child(component: string): Logger;
}
