import type { JsonObject, JsonValue, SessionId, Timestamp } from "./foundational.js";
import type {
  AgentOutputRecord,
  MessageMetadata,
  MessageRecord,
  MessageRole,
  OutputKind,
  SessionStats,
} from "./memory.js";

/**
 * Canonical search service tags. Trains and buses share `transport`.
 */
export type ServiceType = "flight" | "hotel" | "transport" | "attractions";

/** Language reported by the most recent language-detection output. */
export interface LanguageInfo {
  readonly detectedLanguage: string | null;
  readonly languageName: string | null;
}

/** Origin, destination, date, passenger count, budget and similar slots. */
export type EntityMap = JsonObject;

export interface SearchResultSet {
  readonly serviceType: ServiceType;
  readonly results: JsonValue[];
  readonly timestamp: Timestamp;
}

/** Views derived from agent outputs. Never stored. */
export interface DerivedViews {
  readonly language: LanguageInfo | null;
  readonly entities: EntityMap;
  readonly searchResults: SearchResultSet[];
}

/** Authoritative session snapshot consumed by the orchestrator. */
export interface FullContext extends DerivedViews {
  readonly sessionId: SessionId;
  readonly conversationHistory: MessageRecord[];
  readonly agentOutputs: AgentOutputRecord[];
}

/**
 * Caller-facing memory contract. Composes a {@link MemoryStore} with
 * context extraction and owns the store handle's lifecycle.
 */
export interface MemoryManager {
  /** True on success, including when the session already existed. */
  createSession(sessionId: SessionId, metadata?: JsonObject): boolean;
  addMessage(
    sessionId: SessionId,
    role: MessageRole,
    content: string,
    metadata?: MessageMetadata
  ): boolean;
  storeAgentOutput(
    sessionId: SessionId,
    agentName: string,
    taskName: string,
    payload: unknown,
    kindHint?: OutputKind
  ): boolean;
  getFullContext(sessionId: SessionId): FullContext;
  getLatestAgentOutput(sessionId: SessionId, agentName: string): AgentOutputRecord | null;
  getSessionStats(sessionId: SessionId): SessionStats | null;
  clearSession(sessionId: SessionId): boolean;
  cleanupOldSessions(days?: number): number;
  close(): void;
}
