/** Branded opaque identifier types for compile-time safety. */
type Brand<T, B extends string> = T & { readonly __brand: B };

export type TraceId = Brand<string, "TraceId">;
export type SpanId = Brand<string, "SpanId">;
export type EventId = Brand<string, "EventId">;

/**
 * Caller-supplied or generated conversation identifier.
 * Left unbranded: ids arrive from chat front ends as plain strings.
 */
export type SessionId = string;

/** ISO 8601 timestamp (UTC, millisecond precision). */
export type Timestamp = string;

/** Any value that survives a JSON round trip. */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };
