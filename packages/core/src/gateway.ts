import { openMemoryManager } from "@wayfarer/memory";
import type { TravelMemoryManager } from "@wayfarer/memory";
import {
  TurnOrchestrator,
  createEvent,
  createModelAdapter,
  createSearchProvider,
  createTraceContext,
} from "@wayfarer/runtime";
import type { ModelAdapter, SearchProvider } from "@wayfarer/runtime";
import { WayfarerError, isWayfarerError } from "@wayfarer/types";
import type {
  ChatRequest,
  ChatResponse,
  EventTopic,
  Gateway,
  Logger,
  SessionId,
  SessionLookup,
} from "@wayfarer/types";
import { InMemoryEventBus } from "./bus.js";
import { missingApiKeys } from "./config.js";
import type { AppConfig } from "./config.js";
import { createLogger } from "./logger.js";

const HOUR_MS = 60 * 60 * 1000;

export interface TravelGatewayOptions {
  config: AppConfig;
  logger?: Logger;
  /** Replaces the configured model provider. */
  model?: ModelAdapter;
  /** Replaces the configured search provider. */
  search?: SearchProvider;
  /** Clock for stored timestamps. */
  now?: () => Date;
}

/**
 * Process-scoped entry point. Owns the single memory handle, the turn
 * orchestrator and the periodic purge of idle sessions.
 */
export class TravelGateway implements Gateway {
  readonly bus: InMemoryEventBus;
  private readonly config: AppConfig;
  private readonly log: Logger;
  private readonly options: TravelGatewayOptions;
  private memory?: TravelMemoryManager;
  private orchestrator?: TurnOrchestrator;
  private cleanupTimer?: NodeJS.Timeout;

  constructor(options: TravelGatewayOptions) {
    this.options = options;
    this.config = options.config;
    this.log = options.logger ?? createLogger("gateway", options.config.logLevel);
    this.bus = new InMemoryEventBus(this.log.child("bus"));
  }

  async start(): Promise<void> {
    if (this.memory) return;

    this.log.info("Gateway starting", {
      provider: this.config.model.provider,
      model: this.config.model.name,
      dbPath: this.config.memory.dbPath,
    });

    const missing = this.options.model ? [] : missingApiKeys(this.config);
    if (missing.length > 0) {
      this.log.warn("Missing API keys; affected steps will fail", { missing });
    }

    const memory = openMemoryManager(
      {
        dbPath: this.config.memory.dbPath,
        maxContextMessages: this.config.memory.maxContextMessages,
      },
      this.log,
      this.options.now
    );
    this.memory = memory;

    this.orchestrator = new TurnOrchestrator({
      memory,
      model: this.options.model ?? this.buildModel(),
      search: this.options.search ?? createSearchProvider(this.config.apiKeys.exa),
      bus: this.bus,
      logger: this.log.child("orchestrator"),
      stepTimeoutMs: this.config.orchestrator.stepTimeoutMs,
      temperature: this.config.model.temperature,
      now: this.options.now,
    });

    const intervalHours = this.config.memory.cleanupIntervalHours;
    if (intervalHours > 0) {
      this.cleanupTimer = setInterval(() => {
        this.cleanup().catch((err: unknown) => {
          this.log.error("Scheduled cleanup failed", {
            error: err instanceof Error ? err.message : String(err),
          });
        });
      }, intervalHours * HOUR_MS);
      this.cleanupTimer.unref();
    }

    this.log.info("Gateway started");
  }

  async stop(): Promise<void> {
    if (!this.memory) return;
    this.log.info("Gateway stopping");

    if (this.cleanupTimer) {
      clearInterval(this.cleanupTimer);
      this.cleanupTimer = undefined;
    }
    await this.emit("system.shutdown", {});

    this.memory.close();
    this.memory = undefined;
    this.orchestrator = undefined;
  }

  async handleMessage(request: ChatRequest): Promise<ChatResponse> {
    return this.requireOrchestrator().handleTurn(request);
  }

  getSession(sessionId: SessionId): SessionLookup {
    const memory = this.requireMemory();
    const context = memory.getFullContext(sessionId);
    if (context.conversationHistory.length === 0) {
      return {
        ok: false,
        error: { code: "SESSION_NOT_FOUND", message: `Session not found: ${sessionId}` },
      };
    }
    return { ok: true, session: { context, stats: memory.getSessionStats(sessionId) } };
  }

  deleteSession(sessionId: SessionId): boolean {
    const deleted = this.requireMemory().clearSession(sessionId);
    this.log.info("Session delete requested", { sessionId, deleted });
    return deleted;
  }

  /** Purge sessions idle longer than the retention period. */
  async cleanup(): Promise<number> {
    const days = this.config.memory.retentionDays;
    const purged = this.requireMemory().cleanupOldSessions(days);
    await this.emit("system.cleanup", { purged, retentionDays: days });
    return purged;
  }

  /**
   * A provider without its key yields an adapter that fails each call,
   * so the gateway still starts and reports the problem per turn.
   */
  private buildModel(): ModelAdapter {
    const { model, apiKeys } = this.config;
    try {
      return createModelAdapter({
        provider: model.provider,
        name: model.name,
        temperature: model.temperature,
        geminiApiKey: apiKeys.gemini,
        openaiApiKey: apiKeys.openai,
        ollamaBaseUrl: model.ollamaBaseUrl,
      });
    } catch (err) {
      if (!isWayfarerError(err) || err.code !== "CONFIG_INVALID") throw err;
      this.log.error("Model adapter unavailable", { provider: model.provider, error: err.message });
      return {
        name: `${model.provider} (unconfigured)`,
        generate: () => Promise.reject(err),
      };
    }
  }

  private requireMemory(): TravelMemoryManager {
    if (!this.memory) throw new WayfarerError("INTERNAL_ERROR", "Gateway is not started");
    return this.memory;
  }

  private requireOrchestrator(): TurnOrchestrator {
    if (!this.orchestrator) throw new WayfarerError("INTERNAL_ERROR", "Gateway is not started");
    return this.orchestrator;
  }

  private async emit(topic: EventTopic, payload: unknown): Promise<void> {
    await this.bus.publish(createEvent(topic, payload, createTraceContext()));
  }
}
