import { describe, it, expect, vi, afterEach } from "vitest";
import { MockModelAdapter } from "@wayfarer/runtime";
import type { Logger, TravelEvent } from "@wayfarer/types";
import { AppConfigSchema } from "./config.js";
import type { AppConfig } from "./config.js";
import { TravelGateway } from "./gateway.js";

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

function testConfig(overrides: Record<string, unknown> = {}): AppConfig {
  return AppConfigSchema.parse({
    model: { provider: "mock" },
    memory: { dbPath: ":memory:", cleanupIntervalHours: 0 },
    ...overrides,
  });
}

const TRIP = "I need a flight from Mumbai to Delhi tomorrow";

describe("TravelGateway", () => {
  let gateway: TravelGateway;

  afterEach(async () => {
    await gateway.stop();
  });

  it("should answer a turn with the configured mock provider", async () => {
    const log = testLogger();
    gateway = new TravelGateway({ config: testConfig(), logger: log });
    await gateway.start();

    const response = await gateway.handleMessage({ sessionId: "s-1", message: TRIP, isFollowup: false });

    expect(response).toMatchObject({
      sessionId: "s-1",
      response: "No options were found for your request.",
      detectedLanguage: "en",
      isComplete: true,
      agentsCalled: ["language_detector", "flight_specialist", "response_agent"],
      status: "success",
    });
    expect(log.warn).toHaveBeenCalledWith("Missing API keys; affected steps will fail", {
      missing: ["EXA_API_KEY"],
    });
  });

  it("should publish turn events on its bus", async () => {
    gateway = new TravelGateway({ config: testConfig(), logger: testLogger() });
    await gateway.start();

    const seen: TravelEvent[] = [];
    gateway.bus.subscribe({ sessionId: "s-2" }, (event) => {
      seen.push(event);
    });
    await gateway.handleMessage({ sessionId: "s-2", message: TRIP, isFollowup: false });

    expect(seen[0]?.topic).toBe("turn.started");
    expect(seen[seen.length - 1]?.topic).toBe("turn.completed");
  });

  it("should report an unknown session", async () => {
    gateway = new TravelGateway({ config: testConfig(), logger: testLogger() });
    await gateway.start();

    expect(gateway.getSession("missing")).toEqual({
      ok: false,
      error: { code: "SESSION_NOT_FOUND", message: "Session not found: missing" },
    });
  });

  it("should return a snapshot and delete a session", async () => {
    gateway = new TravelGateway({
      config: testConfig(),
      logger: testLogger(),
      model: new MockModelAdapter(),
    });
    await gateway.start();
    await gateway.handleMessage({ sessionId: "s-3", message: TRIP, isFollowup: false });

    const lookup = gateway.getSession("s-3");
    if (!lookup.ok) throw new Error("expected a session snapshot");
    expect(lookup.session.stats).toMatchObject({ sessionId: "s-3", messageCount: 2, agentOutputCount: 3 });
    expect(lookup.session.context.language?.detectedLanguage).toBe("en");

    expect(gateway.deleteSession("s-3")).toBe(true);
    expect(gateway.deleteSession("s-3")).toBe(false);
    expect(gateway.getSession("s-3").ok).toBe(false);
  });

  it("should fail turns per request when the model key is missing", async () => {
    gateway = new TravelGateway({
      config: testConfig({ model: { provider: "gemini" } }),
      logger: testLogger(),
    });
    await gateway.start();

    const failed = gateway.bus.waitFor<{ code: string }>({ topics: ["turn.failed"] }, 1000);
    const response = await gateway.handleMessage({ sessionId: "s-4", message: TRIP, isFollowup: false });

    expect(response.status).toBe("error");
    expect((await failed).payload.code).toBe("CONFIG_INVALID");
  });

  it("should purge idle sessions on cleanup", async () => {
    let clock = new Date("2026-01-01T00:00:00.000Z");
    gateway = new TravelGateway({ config: testConfig(), logger: testLogger(), now: () => clock });
    await gateway.start();
    await gateway.handleMessage({ sessionId: "s-5", message: TRIP, isFollowup: false });

    clock = new Date("2026-03-01T00:00:00.000Z");
    const cleaned = gateway.bus.waitFor<{ purged: number; retentionDays: number }>(
      { topics: ["system.cleanup"] },
      1000
    );

    expect(await gateway.cleanup()).toBe(1);
    expect((await cleaned).payload).toEqual({ purged: 1, retentionDays: 30 });
    expect(gateway.getSession("s-5").ok).toBe(false);
  });

  it("should refuse work before start and stop only once", async () => {
    gateway = new TravelGateway({ config: testConfig(), logger: testLogger() });

    await expect(gateway.handleMessage({ message: TRIP, isFollowup: false })).rejects.toThrow(
      "Gateway is not started"
    );
    expect(() => gateway.getSession("s-6")).toThrow("Gateway is not started");

    await gateway.start();
    await gateway.start();
    const shutdown = vi.fn();
    gateway.bus.subscribe({ topics: ["system.shutdown"] }, shutdown);

    await gateway.stop();
    await gateway.stop();
    expect(shutdown).toHaveBeenCalledTimes(1);
  });
});
