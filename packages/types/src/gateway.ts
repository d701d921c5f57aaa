import type { SessionId } from "./foundational.js";
import type { EventBus } from "./event-bus.js";
import type { ChatRequest, ChatResponse } from "./chat.js";
import type { FullContext } from "./context.js";
import type { SessionStats } from "./memory.js";
import type { TravelError } from "./error.js";

/** Snapshot returned when a front end inspects a session. */
export interface SessionSnapshot {
  readonly context: FullContext;
  readonly stats: SessionStats | null;
}

export type SessionLookup =
  | { readonly ok: true; readonly session: SessionSnapshot }
  | { readonly ok: false; readonly error: TravelError };

/**
 * The Gateway is the entry point for every front end.
 * It owns the process-wide memory handle and the turn orchestrator.
 */
export interface Gateway {
  /** Open storage, build collaborators and start housekeeping. */
  start(): Promise<void>;

  /** Graceful shutdown. Safe to call more than once. */
  stop(): Promise<void>;

  /** Submit a user message and get the final response. */
  handleMessage(request: ChatRequest): Promise<ChatResponse>;

  getSession(sessionId: SessionId): SessionLookup;

  /** Returns whether the session existed. */
  deleteSession(sessionId: SessionId): boolean;

  /** Access the underlying event bus (for advanced integrations). */
  readonly bus: EventBus;
}
