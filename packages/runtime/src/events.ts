import { v7 as uuidv7 } from "uuid";
import type {
  EventId,
  EventTopic,
  SessionId,
  SpanId,
  TraceContext,
  TraceId,
  TravelEvent,
} from "@wayfarer/types";

/**
 * Helper to create a new event with a fresh ID and timestamp.
 */
export function createEvent<T>(
  topic: EventTopic,
  payload: T,
  traceCtx: TraceContext,
  sessionId?: SessionId
): TravelEvent<T> {
  return {
    id: uuidv7() as EventId,
    topic,
    payload,
    traceCtx,
    timestamp: new Date().toISOString(),
    ...(sessionId !== undefined ? { sessionId } : {}),
  };
}

/**
 * Root trace context, or a child span of `parent` when given.
 */
export function createTraceContext(parent?: TraceContext): TraceContext {
  if (parent) {
    return {
      traceId: parent.traceId,
      spanId: uuidv7() as SpanId,
      parentSpanId: parent.spanId,
    };
  }
  return {
    traceId: uuidv7() as TraceId,
    spanId: uuidv7() as SpanId,
  };
}
