import { SQLiteMemoryStore } from "@wayfarer/persistence";
import type {
  AgentOutputRecord,
  FullContext,
  JsonObject,
  Logger,
  MemoryManager,
  MemoryStore,
  MessageMetadata,
  MessageRole,
  OutputKind,
  SessionId,
  SessionStats,
} from "@wayfarer/types";
import { extractContext } from "./context-extractor.js";

export const DEFAULT_MAX_CONTEXT_MESSAGES = 10;
export const DEFAULT_RETENTION_DAYS = 30;

export interface TravelMemoryManagerOptions {
  logger: Logger;
  /** Size of the conversation window returned by getFullContext. */
  maxContextMessages?: number;
}

/**
 * Façade over a MemoryStore. Derived views are recomputed from stored
 * agent outputs on every read and never cached.
 */
export class TravelMemoryManager implements MemoryManager {
  private readonly log: Logger;
  private readonly maxContextMessages: number;
  private closed = false;

  constructor(
    private readonly store: MemoryStore,
    options: TravelMemoryManagerOptions
  ) {
    this.log = options.logger;
    this.maxContextMessages = options.maxContextMessages ?? DEFAULT_MAX_CONTEXT_MESSAGES;
  }

  createSession(sessionId: SessionId, metadata?: JsonObject): boolean {
    return this.store.createSession(sessionId, metadata) !== "failed";
  }

  addMessage(
    sessionId: SessionId,
    role: MessageRole,
    content: string,
    metadata?: MessageMetadata
  ): boolean {
    return this.store.appendMessage(sessionId, role, content, metadata);
  }

  storeAgentOutput(
    sessionId: SessionId,
    agentName: string,
    taskName: string,
    payload: unknown,
    kindHint: OutputKind = "json"
  ): boolean {
    return this.store.appendAgentOutput(sessionId, agentName, taskName, payload, kindHint);
  }

  getFullContext(sessionId: SessionId): FullContext {
    const agentOutputs = this.store.listAgentOutputs(sessionId);
    const conversationHistory = this.store.listMessages(sessionId, this.maxContextMessages);
    const views = extractContext(agentOutputs);

    this.log.debug("Context assembled", {
      sessionId,
      messages: conversationHistory.length,
      agentOutputs: agentOutputs.length,
      searchResultSets: views.searchResults.length,
    });

    return {
      sessionId,
      language: views.language,
      entities: views.entities,
      searchResults: views.searchResults,
      conversationHistory,
      agentOutputs,
    };
  }

  getLatestAgentOutput(sessionId: SessionId, agentName: string): AgentOutputRecord | null {
    return this.store.latestAgentOutput(sessionId, agentName);
  }

  getSessionStats(sessionId: SessionId): SessionStats | null {
    return this.store.sessionStats(sessionId);
  }

  clearSession(sessionId: SessionId): boolean {
    return this.store.deleteSession(sessionId);
  }

  cleanupOldSessions(days: number = DEFAULT_RETENTION_DAYS): number {
    const purged = this.store.purgeOlderThan(days);
    if (purged > 0) this.log.info("Old sessions purged", { purged, days });
    return purged;
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.store.close();
  }
}

export interface MemoryConfig {
  dbPath: string;
  maxContextMessages: number;
}

/** Open the SQLite store at `config.dbPath` and wrap it in a manager. */
export function openMemoryManager(
  config: MemoryConfig,
  logger: Logger,
  now?: () => Date
): TravelMemoryManager {
  const store = new SQLiteMemoryStore(config.dbPath, {
    logger: logger.child("store"),
    now,
  });
  return new TravelMemoryManager(store, {
    logger: logger.child("memory"),
    maxContextMessages: config.maxContextMessages,
  });
}
