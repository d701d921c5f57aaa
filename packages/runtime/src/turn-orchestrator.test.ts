import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { openMemoryManager } from "@wayfarer/memory";
import type { TravelMemoryManager } from "@wayfarer/memory";
import { WayfarerError } from "@wayfarer/types";
import type { EventBus, Logger, Subscription, TravelEvent } from "@wayfarer/types";
import { MockModelAdapter, TASK_MARKER } from "./model-adapter.js";
import type { ChatMessage, GenerationResult, ModelAdapter } from "./model-adapter.js";
import { StaticSearchProvider } from "./search-provider.js";
import {
  ERROR_REPLY,
  NOT_TRAVEL_REPLY,
  TurnOrchestrator,
} from "./turn-orchestrator.js";
import type { TurnOrchestratorOptions } from "./turn-orchestrator.js";

function testLogger(): Logger {
  const log: Logger = {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    child: () => log,
  };
  return log;
}

class RecordingBus implements EventBus {
  readonly events: TravelEvent[] = [];

  async publish<T>(event: TravelEvent<T>): Promise<void> {
    this.events.push(event);
  }

  subscribe(): Subscription {
    return { id: "recording", unsubscribe: () => undefined };
  }

  waitFor<T>(): Promise<TravelEvent<T>> {
    return Promise.reject(new Error("waitFor is not used by the orchestrator"));
  }

  topics(): string[] {
    return this.events.map((e) => e.topic);
  }
}

/** Answers each task with a fixed string. */
class ScriptedModel implements ModelAdapter {
  readonly name = "scripted";
  constructor(private readonly replies: Record<string, string>) {}

  async generate(messages: ChatMessage[]): Promise<GenerationResult> {
    const system = messages.find((m) => m.role === "system")?.content ?? "";
    const task = TASK_MARKER.exec(system)?.[1] ?? "";
    return { text: this.replies[task] ?? "" };
  }
}

const DOCUMENTS = [
  { title: "IndiGo 6E-123", url: "https://example.test/1", summary: "06:00, ₹3,500", text: "" },
  { title: "SpiceJet SG-456", url: "https://example.test/2", summary: "07:15, ₹3,200", text: "" },
  { title: "Air India AI-860", url: "https://example.test/3", summary: "08:45, ₹5,100", text: "" },
];

describe("TurnOrchestrator", () => {
  let memory: TravelMemoryManager;
  let bus: RecordingBus;
  let search: StaticSearchProvider;
  let model: MockModelAdapter;

  function orchestrator(overrides: Partial<TurnOrchestratorOptions> = {}): TurnOrchestrator {
    return new TurnOrchestrator({
      memory,
      model,
      search,
      bus,
      logger: testLogger(),
      now: () => new Date("2026-03-01T10:00:00.000Z"),
      ...overrides,
    });
  }

  beforeEach(() => {
    memory = openMemoryManager({ dbPath: ":memory:", maxContextMessages: 10 }, testLogger());
    bus = new RecordingBus();
    search = new StaticSearchProvider(DOCUMENTS);
    model = new MockModelAdapter();
  });

  afterEach(() => {
    memory.close();
  });

  it("should run language, search and response steps for a complete request", async () => {
    const response = await orchestrator().handleTurn({
      sessionId: "trip-1",
      message: "I need a flight from Mumbai to Delhi tomorrow",
      isFollowup: false,
    });

    expect(response).toEqual({
      sessionId: "trip-1",
      response:
        "Here are 3 options:\n1. IndiGo 6E-123\n2. SpiceJet SG-456\n3. Air India AI-860\nWould you like more details about any of these?",
      detectedLanguage: "en",
      isFollowup: false,
      isComplete: true,
      agentsCalled: ["language_detector", "flight_specialist", "response_agent"],
      status: "success",
    });
    expect(search.queries).toEqual(["flights from Mumbai to Delhi tomorrow"]);

    const ctx = memory.getFullContext("trip-1");
    expect(ctx.entities).toEqual({ origin: "Mumbai", destination: "Delhi", date: "tomorrow", service_type: "flight" });
    expect(ctx.searchResults).toHaveLength(1);
    expect(ctx.searchResults[0]).toMatchObject({
      serviceType: "flight",
      results: [
        { name: "IndiGo 6E-123", option: 1 },
        { name: "SpiceJet SG-456", option: 2 },
        { name: "Air India AI-860", option: 3 },
      ],
    });
    expect(ctx.agentOutputs.map((o) => [o.agentName, o.kind])).toEqual([
      ["language_detector", "json"],
      ["flight_specialist", "json"],
      ["response_agent", "text"],
    ]);

    expect(ctx.conversationHistory.map((m) => m.role)).toEqual(["user", "assistant"]);
    expect(ctx.conversationHistory[0].metadata).toEqual({
      isFollowup: false,
      receivedAt: "2026-03-01T10:00:00.000Z",
    });
    expect(ctx.conversationHistory[1].metadata).toEqual({
      detectedLanguage: "en",
      isFollowup: false,
      isComplete: true,
      agentsCalled: ["language_detector", "flight_specialist", "response_agent"],
    });

    expect(bus.topics()).toEqual([
      "turn.started",
      "agent.output",
      "agent.output",
      "agent.output",
      "turn.completed",
    ]);
    const traceIds = new Set(bus.events.map((e) => e.traceCtx.traceId));
    expect(traceIds.size).toBe(1);
    expect(bus.events.every((e) => e.sessionId === "trip-1")).toBe(true);
  });

  it("should ask for missing details and merge them into the next message", async () => {
    const turns = orchestrator();

    const first = await turns.handleTurn({
      sessionId: "trip-2",
      message: "I want a flight from Pune to Delhi",
      isFollowup: false,
    });
    expect(first).toMatchObject({
      response: "Please provide: date.",
      isComplete: false,
      agentsCalled: ["language_detector"],
      status: "success",
    });
    expect(search.queries).toEqual([]);

    const second = await turns.handleTurn({ sessionId: "trip-2", message: "tomorrow", isFollowup: false });

    expect(model.calls[1]?.[1]?.content).toBe(
      "User input: [Previous context: Origin: Pune | Destination: Delhi | Service: flight] tomorrow"
    );
    expect(second).toMatchObject({
      isComplete: true,
      agentsCalled: ["language_detector", "flight_specialist", "response_agent"],
    });
    expect(search.queries).toEqual(["flights from Pune to Delhi tomorrow"]);
  });

  it("should answer a follow-up from stored results and make a mock booking", async () => {
    const turns = orchestrator();
    await turns.handleTurn({
      sessionId: "trip-3",
      message: "I need a flight from Mumbai to Delhi tomorrow",
      isFollowup: false,
    });

    const reply = await turns.handleTurn({
      sessionId: "trip-3",
      message: "book the second one",
      isFollowup: true,
    });

    expect(reply.status).toBe("success");
    expect(reply.isFollowup).toBe(true);
    expect(reply.detectedLanguage).toBe("en");
    expect(reply.agentsCalled).toEqual(["followup_agent", "booking_agent"]);
    expect(reply.response).toMatch(
      /^Option 2 is available\.\n\nBooking confirmed \(simulation, no real reservation was made\)\.\nConfirmation number: WF-[0-9A-F]{8}\nService: flight, option 2$/
    );
    expect(search.queries).toHaveLength(1);

    const booking = memory.getLatestAgentOutput("trip-3", "booking_agent");
    expect(booking).toMatchObject({
      kind: "json",
      data: {
        service_type: "flight",
        option_index: 2,
        item: { name: "SpiceJet SG-456", option: 2 },
        status: "mock_confirmed",
        created_at: "2026-03-01T10:00:00.000Z",
      },
    });

    const history = memory.getFullContext("trip-3").conversationHistory;
    expect(history[history.length - 1]?.metadata).toMatchObject({ isBooking: true, isFollowup: true });
    expect(bus.topics()).toContain("booking.confirmed");
  });

  it("should not book an option outside the stored results", async () => {
    const turns = orchestrator();
    await turns.handleTurn({
      sessionId: "trip-4",
      message: "I need a flight from Mumbai to Delhi tomorrow",
      isFollowup: false,
    });

    const reply = await turns.handleTurn({ sessionId: "trip-4", message: "book the fifth one", isFollowup: true });

    expect(reply.response).toBe("Option 5 is available.");
    expect(reply.agentsCalled).toEqual(["followup_agent"]);
    expect(memory.getLatestAgentOutput("trip-4", "booking_agent")).toBeNull();
  });

  it("should accept a plain-text follow-up answer", async () => {
    const turns = orchestrator({
      model: new ScriptedModel({ task_followup_response: "  The cheapest is option 2.  " }),
    });
    const reply = await turns.handleTurn({ sessionId: "trip-5", message: "cheapest?", isFollowup: true });

    expect(reply.response).toBe("The cheapest is option 2.");
    expect(reply.detectedLanguage).toBeNull();
    expect(memory.getLatestAgentOutput("trip-5", "followup_agent")).toMatchObject({
      kind: "text",
      data: "  The cheapest is option 2.  ",
    });
  });

  it("should redirect requests that are not about travel", async () => {
    const turns = orchestrator({
      model: new ScriptedModel({
        task_language_detection: '{"detected_language": "en", "language_name": "English", "is_travel_related": false}',
      }),
    });
    const reply = await turns.handleTurn({ sessionId: "trip-6", message: "tell me a joke", isFollowup: false });

    expect(reply).toMatchObject({
      response: NOT_TRAVEL_REPLY,
      isComplete: true,
      detectedLanguage: "en",
      agentsCalled: ["language_detector"],
    });
  });

  it("should skip search for a service without a specialist", async () => {
    const turns = orchestrator({
      model: new ScriptedModel({
        task_language_detection: '{"detected_language": "en", "service_type": "weather", "is_complete": true}',
        task_final_response: "I can only search flights, hotels, trains, buses and attractions.",
      }),
    });
    const reply = await turns.handleTurn({ sessionId: "trip-7", message: "weather in Goa", isFollowup: false });

    expect(reply.agentsCalled).toEqual(["language_detector", "response_agent"]);
    expect(reply.response).toBe("I can only search flights, hotels, trains, buses and attractions.");
    expect(search.queries).toEqual([]);
  });

  it("should generate a session id when none is given", async () => {
    const reply = await orchestrator().handleTurn({ message: "attractions in Jaipur", isFollowup: false });

    expect(reply.sessionId).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-7[0-9a-f]{3}-[0-9a-f]{4}-[0-9a-f]{12}$/);
    expect(reply.agentsCalled).toEqual(["language_detector", "attractions_specialist", "response_agent"]);
    expect(search.queries).toEqual(["attractions in Jaipur"]);
  });

  describe("failures", () => {
    it("should report a model error after recording the user message", async () => {
      const failing: ModelAdapter = {
        name: "failing",
        generate: () => Promise.reject(new WayfarerError("MODEL_ERROR", "upstream 500")),
      };
      const reply = await orchestrator({ model: failing }).handleTurn({
        sessionId: "trip-8",
        message: "flight from Pune to Goa tomorrow",
        isFollowup: false,
      });

      expect(reply).toEqual({
        sessionId: "trip-8",
        response: ERROR_REPLY,
        detectedLanguage: null,
        isFollowup: false,
        isComplete: true,
        agentsCalled: [],
        status: "error",
      });
      const history = memory.getFullContext("trip-8").conversationHistory;
      expect(history.map((m) => [m.role, m.content])).toEqual([["user", "flight from Pune to Goa tomorrow"]]);

      const failed = bus.events.find((e) => e.topic === "turn.failed");
      expect(failed?.payload).toEqual({ code: "MODEL_ERROR", message: "upstream 500" });
    });

    it("should time out a step that never answers", async () => {
      const stuck: ModelAdapter = { name: "stuck", generate: () => new Promise(() => undefined) };
      const reply = await orchestrator({ model: stuck, stepTimeoutMs: 20 }).handleTurn({
        sessionId: "trip-9",
        message: "hotel in Goa",
        isFollowup: false,
      });

      expect(reply.status).toBe("error");
      const failed = bus.events.find((e) => e.topic === "turn.failed");
      expect(failed?.payload).toEqual({
        code: "TIMEOUT",
        message: "task_language_detection timed out after 20ms",
      });
    });

    it("should keep a non-JSON language reply as text and fail the turn", async () => {
      const turns = orchestrator({
        model: new ScriptedModel({ task_language_detection: "Sorry, I cannot do that." }),
      });
      const reply = await turns.handleTurn({ sessionId: "trip-10", message: "hola", isFollowup: false });

      expect(reply.status).toBe("error");
      expect(reply.agentsCalled).toEqual(["language_detector"]);
      expect(memory.getLatestAgentOutput("trip-10", "language_detector")).toMatchObject({
        kind: "text",
        data: "Sorry, I cannot do that.",
      });
      expect(memory.getFullContext("trip-10").language).toBeNull();
    });
  });
});
