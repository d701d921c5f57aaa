import type { JsonObject, JsonValue, SessionId, Timestamp } from "./foundational.js";

export type MessageRole = "user" | "assistant";

/**
 * Free-form annotations recorded with a turn, e.g. detected language,
 * follow-up flag, completeness flag, booking flag, specialists invoked.
 */
export type MessageMetadata = JsonObject;

/** One conversational turn. Immutable once written. */
export interface MessageRecord {
  readonly role: MessageRole;
  readonly content: string;
  readonly metadata: MessageMetadata;
  readonly timestamp: Timestamp;
}

/** Declared encoding of an agent output payload. */
export type OutputKind = "json" | "text";

interface AgentOutputBase {
  readonly agentName: string;
  readonly taskName: string;
  readonly timestamp: Timestamp;
}

/**
 * One unit of work product from one reasoning step.
 * The `kind` tag always matches what `data` actually holds.
 */
export type AgentOutputRecord =
  | (AgentOutputBase & { readonly kind: "json"; readonly data: JsonValue })
  | (AgentOutputBase & { readonly kind: "text"; readonly data: string });

export interface SessionStats {
  readonly sessionId: SessionId;
  readonly messageCount: number;
  readonly agentOutputCount: number;
  /** Null when the session does not exist. */
  readonly createdAt: Timestamp | null;
  readonly lastActivity: Timestamp | null;
}

/** Result of an idempotent session create. */
export type SessionCreateOutcome = "created" | "existing" | "failed";

/**
 * Durable storage for sessions, messages and agent outputs.
 *
 * Every operation catches storage faults, logs them and returns a
 * failure sentinel (`false`, `[]`, `null`, `0`, `"failed"`) instead of
 * throwing. Callers that need a correctness guarantee check the result.
 */
export interface MemoryStore {
  createSession(id: SessionId, metadata?: JsonObject): SessionCreateOutcome;
  /** Inserts the message and bumps `lastActivity` atomically. */
  appendMessage(
    sessionId: SessionId,
    role: MessageRole,
    content: string,
    metadata?: MessageMetadata
  ): boolean;
  appendAgentOutput(
    sessionId: SessionId,
    agentName: string,
    taskName: string,
    payload: unknown,
    kindHint?: OutputKind
  ): boolean;
  /** Ascending by timestamp. */
  listAgentOutputs(sessionId: SessionId, agentName?: string): AgentOutputRecord[];
  latestAgentOutput(sessionId: SessionId, agentName: string): AgentOutputRecord | null;
  /** The newest `limit` messages, returned oldest first. */
  listMessages(sessionId: SessionId, limit: number): MessageRecord[];
  /** Returns whether the session existed. */
  deleteSession(sessionId: SessionId): boolean;
  sessionStats(sessionId: SessionId): SessionStats | null;
  /** Deletes sessions idle for longer than `days`; returns how many. */
  purgeOlderThan(days: number): number;
  close(): void;
}
