import { v7 as uuidv7 } from "uuid";
import { isJsonObject } from "@wayfarer/memory";
import { WayfarerError, isWayfarerError } from "@wayfarer/types";
import type {
  BookingConfirmation,
  ChatRequest,
  ChatResponse,
  EntityMap,
  EventBus,
  EventTopic,
  FullContext,
  JsonObject,
  JsonValue,
  Logger,
  MemoryManager,
  OutputKind,
  SessionId,
  TraceContext,
} from "@wayfarer/types";
import { bookingToJson, createMockBooking, formatBookingConfirmation } from "./booking.js";
import { createEvent, createTraceContext } from "./events.js";
import { extractJsonFromText } from "./json-extract.js";
import type { ChatMessage, ModelAdapter } from "./model-adapter.js";
import {
  TASK_FINAL_RESPONSE,
  TASK_FOLLOWUP_RESPONSE,
  TASK_LANGUAGE_DETECTION,
  buildFollowupPrompt,
  buildLanguagePrompt,
  buildResponsePrompt,
  buildSpecialistPrompt,
} from "./prompt-builder.js";
import { FollowupReplySchema, LanguageAnalysisSchema } from "./schemas.js";
import type { BookingRequest, LanguageAnalysis } from "./schemas.js";
import { formatSearchDocuments } from "./search-provider.js";
import type { SearchProvider } from "./search-provider.js";
import { buildSearchQuery, normalizeServiceType, resolveSpecialist } from "./specialists.js";
import type { Specialist } from "./specialists.js";
import { withTimeout } from "./timeout.js";

export const LANGUAGE_AGENT = "language_detector";
export const RESPONSE_AGENT = "response_agent";
export const FOLLOWUP_AGENT = "followup_agent";
export const BOOKING_AGENT = "booking_agent";
export const TASK_MOCK_BOOKING = "task_mock_booking";

export const DEFAULT_STEP_TIMEOUT_MS = 120_000;

export const ERROR_REPLY =
  "Sorry, something went wrong while handling your request. Please try again.";
export const INCOMPLETE_FALLBACK =
  "Please share all the missing trip details (origin, destination, date and service) in one message.";
export const NOT_TRAVEL_REPLY =
  "I can help with flights, hotels, trains, buses and local attractions. What would you like to plan?";

export interface TurnOrchestratorOptions {
  memory: MemoryManager;
  model: ModelAdapter;
  search: SearchProvider;
  bus: EventBus;
  logger: Logger;
  /** Bound on every model and search call. */
  stepTimeoutMs?: number;
  temperature?: number;
  now?: () => Date;
}

interface TurnOutcome {
  response: string;
  detectedLanguage: string | null;
  isComplete: boolean;
  isBooking: boolean;
}

interface TurnScope {
  readonly sessionId: SessionId;
  readonly trace: TraceContext;
  readonly agentsCalled: string[];
}

/**
 * Runs one user turn against the memory layer: records the user message,
 * drives the reasoning steps, persists each step's output and records
 * the reply. A failed step ends the turn with `status: "error"`; the
 * user message stays recorded.
 */
export class TurnOrchestrator {
  private readonly memory: MemoryManager;
  private readonly model: ModelAdapter;
  private readonly search: SearchProvider;
  private readonly bus: EventBus;
  private readonly log: Logger;
  private readonly stepTimeoutMs: number;
  private readonly temperature: number | undefined;
  private readonly now: () => Date;

  constructor(options: TurnOrchestratorOptions) {
    this.memory = options.memory;
    this.model = options.model;
    this.search = options.search;
    this.bus = options.bus;
    this.log = options.logger;
    this.stepTimeoutMs = options.stepTimeoutMs ?? DEFAULT_STEP_TIMEOUT_MS;
    this.temperature = options.temperature;
    this.now = options.now ?? (() => new Date());
  }

  async handleTurn(request: ChatRequest): Promise<ChatResponse> {
    const scope: TurnScope = {
      sessionId: request.sessionId ?? uuidv7(),
      trace: createTraceContext(),
      agentsCalled: [],
    };
    const { sessionId } = scope;

    this.log.info("Turn started", { sessionId, isFollowup: request.isFollowup });

    if (!this.memory.createSession(sessionId)) {
      this.log.warn("Session could not be created", { sessionId });
    }
    this.memory.addMessage(sessionId, "user", request.message, {
      isFollowup: request.isFollowup,
      receivedAt: this.now().toISOString(),
    });
    await this.emit(scope, "turn.started", {
      message: request.message,
      isFollowup: request.isFollowup,
    });

    try {
      const outcome = request.isFollowup
        ? await this.runFollowup(scope, request.message)
        : await this.runInitial(scope, request.message);

      const metadata: JsonObject = {
        detectedLanguage: outcome.detectedLanguage,
        isFollowup: request.isFollowup,
        isComplete: outcome.isComplete,
        agentsCalled: [...scope.agentsCalled],
      };
      if (outcome.isBooking) metadata.isBooking = true;
      this.memory.addMessage(sessionId, "assistant", outcome.response, metadata);

      const response: ChatResponse = {
        sessionId,
        response: outcome.response,
        detectedLanguage: outcome.detectedLanguage,
        isFollowup: request.isFollowup,
        isComplete: outcome.isComplete,
        agentsCalled: [...scope.agentsCalled],
        status: "success",
      };
      this.log.info("Turn completed", {
        sessionId,
        isComplete: outcome.isComplete,
        agentsCalled: scope.agentsCalled,
      });
      await this.emit(scope, "turn.completed", response);
      return response;
    } catch (err) {
      const code = isWayfarerError(err) ? err.code : "INTERNAL_ERROR";
      const message = err instanceof Error ? err.message : String(err);
      this.log.error("Turn failed", { sessionId, code, error: message });
      await this.emit(scope, "turn.failed", { code, message });

      return {
        sessionId,
        response: ERROR_REPLY,
        detectedLanguage: null,
        isFollowup: request.isFollowup,
        isComplete: true,
        agentsCalled: [...scope.agentsCalled],
        status: "error",
      };
    }
  }

  // ─── Initial flow ────────────────────────────────────────────────

  private async runInitial(scope: TurnScope, message: string): Promise<TurnOutcome> {
    const input = this.mergePreviousContext(scope.sessionId, message);

    const raw = await this.generate(TASK_LANGUAGE_DETECTION, buildLanguagePrompt(input), true);
    scope.agentsCalled.push(LANGUAGE_AGENT);
    const extracted = extractJsonFromText(raw);
    await this.record(scope, LANGUAGE_AGENT, TASK_LANGUAGE_DETECTION, extracted ?? raw);
    if (!extracted) {
      throw new WayfarerError("MODEL_ERROR", "Language analysis returned no JSON object");
    }

    const analysis = LanguageAnalysisSchema.parse(extracted);
    const entities: EntityMap = toObject(extracted.entities);

    if (analysis.is_travel_related === false) {
      return this.shortReply(scope, analysis.followup_question ?? NOT_TRAVEL_REPLY, true);
    }
    if (analysis.is_complete === false) {
      this.log.info("Input incomplete", { sessionId: scope.sessionId, missing: analysis.missing_info });
      return this.shortReply(scope, analysis.followup_question ?? INCOMPLETE_FALLBACK, false);
    }

    const specialist = resolveSpecialist(analysis.service_type);
    let results: JsonValue | null = null;
    if (specialist) {
      results = await this.runSpecialist(scope, specialist, analysis, entities);
    } else {
      this.log.warn("No specialist for service type", {
        sessionId: scope.sessionId,
        serviceType: analysis.service_type,
      });
    }

    const language = {
      code: analysis.detected_language ?? "en",
      name: analysis.language_name ?? "English",
    };
    const reply = (
      await this.generate(
        TASK_FINAL_RESPONSE,
        buildResponsePrompt(language, analysis.english_translation ?? null, results),
        false
      )
    ).trim();
    scope.agentsCalled.push(RESPONSE_AGENT);
    await this.record(scope, RESPONSE_AGENT, TASK_FINAL_RESPONSE, reply);

    return {
      response: reply,
      detectedLanguage: this.currentLanguage(scope.sessionId),
      isComplete: true,
      isBooking: false,
    };
  }

  private async runSpecialist(
    scope: TurnScope,
    specialist: Specialist,
    analysis: LanguageAnalysis,
    entities: EntityMap
  ): Promise<JsonValue> {
    const englishTranslation = analysis.english_translation ?? null;
    const query = buildSearchQuery(specialist, entities, englishTranslation);
    this.log.info("Dispatching search", {
      sessionId: scope.sessionId,
      specialist: specialist.agentName,
      query,
    });

    const documents = await withTimeout(
      this.search.search(query),
      this.stepTimeoutMs,
      `${specialist.agentName} search`
    );
    const raw = await this.generate(
      specialist.taskName,
      buildSpecialistPrompt(specialist, { entities, englishTranslation, query }, formatSearchDocuments(documents)),
      true
    );
    scope.agentsCalled.push(specialist.agentName);

    const structured = extractJsonFromText(raw);
    const output = structured ?? raw;
    await this.record(scope, specialist.agentName, specialist.taskName, output);
    return output;
  }

  /** Reply without search or response steps; the analysis already holds the text. */
  private shortReply(scope: TurnScope, response: string, isComplete: boolean): TurnOutcome {
    return {
      response,
      detectedLanguage: this.currentLanguage(scope.sessionId),
      isComplete,
      isBooking: false,
    };
  }

  /**
   * When the last reply asked for missing details, prefix the new message
   * with what is already known so the language step can merge the two.
   */
  private mergePreviousContext(sessionId: SessionId, message: string): string {
    const context = this.memory.getFullContext(sessionId);
    const lastAssistant = [...context.conversationHistory]
      .reverse()
      .find((m) => m.role === "assistant");
    if (!lastAssistant || lastAssistant.metadata.isComplete !== false) return message;

    const labels: ReadonlyArray<readonly [string, string]> = [
      ["origin", "Origin"],
      ["destination", "Destination"],
      ["date", "Date"],
      ["service_type", "Service"],
    ];
    const parts: string[] = [];
    for (const [key, label] of labels) {
      const value = context.entities[key];
      if (typeof value === "string" ? value.trim() !== "" : typeof value === "number") {
        parts.push(`${label}: ${String(value)}`);
      }
    }
    if (parts.length === 0) return message;

    this.log.debug("Merged previous context into message", { sessionId, parts });
    return `[Previous context: ${parts.join(" | ")}] ${message}`;
  }

  // ─── Follow-up flow ──────────────────────────────────────────────

  private async runFollowup(scope: TurnScope, message: string): Promise<TurnOutcome> {
    const context = this.memory.getFullContext(scope.sessionId);

    const raw = await this.generate(
      TASK_FOLLOWUP_RESPONSE,
      buildFollowupPrompt(message, context),
      true
    );
    scope.agentsCalled.push(FOLLOWUP_AGENT);

    const extracted = extractJsonFromText(raw);
    await this.record(scope, FOLLOWUP_AGENT, TASK_FOLLOWUP_RESPONSE, extracted ?? raw);

    const reply = extracted ? FollowupReplySchema.safeParse(extracted) : null;
    let response = reply?.success ? reply.data.answer.trim() : raw.trim();
    let isBooking = false;

    const bookingRequest = reply?.success ? reply.data.booking : null;
    if (bookingRequest) {
      const booking = this.book(context, bookingRequest);
      if (booking) {
        scope.agentsCalled.push(BOOKING_AGENT);
        await this.record(scope, BOOKING_AGENT, TASK_MOCK_BOOKING, bookingToJson(booking));
        await this.emit(scope, "booking.confirmed", booking);
        response = `${response}\n\n${formatBookingConfirmation(booking)}`;
        isBooking = true;
      }
    }

    return {
      response,
      detectedLanguage: context.language?.detectedLanguage ?? null,
      isComplete: true,
      isBooking,
    };
  }

  /** Resolve a 1-based option against the latest matching result set. */
  private book(context: FullContext, request: BookingRequest): BookingConfirmation | null {
    const serviceType = normalizeServiceType(request.service_type);
    const resultSet = serviceType
      ? [...context.searchResults].reverse().find((r) => r.serviceType === serviceType)
      : undefined;
    const item = resultSet?.results[request.option_index - 1];

    if (!serviceType || item === undefined) {
      this.log.warn("Booking request did not match a stored option", {
        sessionId: context.sessionId,
        serviceType: request.service_type,
        optionIndex: request.option_index,
      });
      return null;
    }
    return createMockBooking(serviceType, request.option_index, item, this.now());
  }

  // ─── Helpers ─────────────────────────────────────────────────────

  private async generate(step: string, messages: ChatMessage[], json: boolean): Promise<string> {
    const result = await withTimeout(
      this.model.generate(messages, { temperature: this.temperature, json }),
      this.stepTimeoutMs,
      step
    );
    return result.text;
  }

  /** Persist a step's output: parsed objects as json, raw model text as text. */
  private async record(
    scope: TurnScope,
    agentName: string,
    taskName: string,
    output: JsonValue
  ): Promise<void> {
    const kind: OutputKind = typeof output === "string" ? "text" : "json";
    const stored = this.memory.storeAgentOutput(scope.sessionId, agentName, taskName, output, kind);
    if (!stored) {
      this.log.warn("Agent output not stored", { sessionId: scope.sessionId, agentName });
    }
    await this.emit(scope, "agent.output", { agentName, taskName, kind, stored });
  }

  private currentLanguage(sessionId: SessionId): string | null {
    return this.memory.getFullContext(sessionId).language?.detectedLanguage ?? null;
  }

  private async emit<T>(scope: TurnScope, topic: EventTopic, payload: T): Promise<void> {
    await this.bus.publish(
      createEvent(topic, payload, createTraceContext(scope.trace), scope.sessionId)
    );
  }
}

function toObject(value: JsonValue | undefined): JsonObject {
  return value !== undefined && isJsonObject(value) ? value : {};
}
