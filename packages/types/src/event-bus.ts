import type { EventId, SessionId, Timestamp } from "./foundational.js";
import type { TraceContext } from "./observability.js";

/**
 * Every notification flowing through the Gateway is a `TravelEvent`.
 *
 * @typeParam T - The topic-specific payload type.
 */
export interface TravelEvent<T = unknown> {
  readonly id: EventId;
  readonly topic: EventTopic;
  readonly payload: T;
  readonly traceCtx: TraceContext;
  readonly timestamp: Timestamp;
  /** Session the event belongs to. Absent for system events. */
  readonly sessionId?: SessionId;
}

/**
 * Enumerated event topics.
 * Using a string union rather than a numeric enum for debuggability.
 */
export type EventTopic =
  // Turn lifecycle
  | "turn.started"
  | "turn.completed"
  | "turn.failed"
  // Reasoning steps
  | "agent.output"
  | "booking.confirmed"
  // System
  | "system.shutdown"
  | "system.cleanup";

/**
 * Predicate for filtering which events a subscriber receives.
 */
export interface EventFilter {
  /** Match specific topics. If empty, matches all topics. */
  readonly topics?: EventTopic[];
  /** Only events for this session. */
  readonly sessionId?: SessionId;
  /** Custom predicate for advanced filtering. */
  readonly predicate?: (event: TravelEvent) => boolean;
}

/** Callback signature for event subscribers. */
export type EventHandler<T = unknown> = (event: TravelEvent<T>) => void | Promise<void>;

/** Returned when subscribing; used to unsubscribe. */
export interface Subscription {
  readonly id: string;
  unsubscribe(): void;
}

export interface EventBus {
  /** Publish an event to all matching subscribers. */
  publish<T>(event: TravelEvent<T>): Promise<void>;

  /** Subscribe to events matching the filter. */
  subscribe<T>(filter: EventFilter, handler: EventHandler<T>): Subscription;

  /** Resolve with the first event matching the filter, or reject on timeout. */
  waitFor<T>(filter: EventFilter, timeoutMs: number): Promise<TravelEvent<T>>;
}
