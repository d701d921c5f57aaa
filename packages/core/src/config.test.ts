import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { WayfarerError } from "@wayfarer/types";
import { AppConfigSchema, loadAppConfig, missingApiKeys } from "./config.js";

describe("loadAppConfig", () => {
  let tmpDir: string;
  let file: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "wayfarer-config-"));
    file = path.join(tmpDir, "wayfarer.config.yaml");
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it("should fall back to defaults without a file or variables", () => {
    const config = loadAppConfig(path.join(tmpDir, "absent.yaml"), {});

    expect(config.logLevel).toBe("info");
    expect(config.model).toEqual({
      provider: "gemini",
      name: "gemini-2.5-flash",
      temperature: 0.7,
      ollamaBaseUrl: "http://localhost:11434",
    });
    expect(config.memory).toEqual({
      dbPath: "travel_memory.db",
      maxContextMessages: 10,
      retentionDays: 30,
      cleanupIntervalHours: 24,
    });
    expect(config.session.timeoutSeconds).toBe(3600);
    expect(config.orchestrator.stepTimeoutMs).toBe(120_000);
  });

  it("should read the YAML file", async () => {
    await fs.writeFile(
      file,
      [
        "logLevel: debug",
        "model:",
        "  provider: ollama",
        "  name: llama3.1",
        "memory:",
        "  dbPath: /var/lib/wayfarer/memory.db",
        "  maxContextMessages: 6",
        "orchestrator:",
        "  stepTimeoutMs: 30000",
      ].join("\n")
    );

    const config = loadAppConfig(file, {});

    expect(config.logLevel).toBe("debug");
    expect(config.model.provider).toBe("ollama");
    expect(config.model.name).toBe("llama3.1");
    expect(config.memory.dbPath).toBe("/var/lib/wayfarer/memory.db");
    expect(config.memory.maxContextMessages).toBe(6);
    expect(config.memory.retentionDays).toBe(30);
    expect(config.orchestrator.stepTimeoutMs).toBe(30_000);
  });

  it("should let environment variables override the file", async () => {
    await fs.writeFile(file, "model:\n  provider: openai\n  temperature: 0.2\n");

    const config = loadAppConfig(file, {
      MODEL_PROVIDER: "mock",
      MODEL_TEMPERATURE: "1.1",
      MEMORY_DB_PATH: ":memory:",
      MAX_CONTEXT_MESSAGES: "4",
      SESSION_RETENTION_DAYS: "7",
      SESSION_TIMEOUT: "600",
      LOG_LEVEL: "WARN",
      EXA_API_KEY: "test-exa-key",
      BOT_TOKEN: "test-bot-token",
      OPENAI_API_KEY: "",
    });

    expect(config.model.provider).toBe("mock");
    expect(config.model.temperature).toBe(1.1);
    expect(config.memory.dbPath).toBe(":memory:");
    expect(config.memory.maxContextMessages).toBe(4);
    expect(config.memory.retentionDays).toBe(7);
    expect(config.session.timeoutSeconds).toBe(600);
    expect(config.logLevel).toBe("warn");
    expect(config.apiKeys).toEqual({ gemini: undefined, openai: undefined, exa: "test-exa-key" });
    expect(config.telegram.botToken).toBe("test-bot-token");
  });

  it("should reject invalid values with the offending path", async () => {
    await fs.writeFile(file, "memory:\n  maxContextMessages: -3\n");

    try {
      loadAppConfig(file, {});
      throw new Error("expected loadAppConfig to throw");
    } catch (err) {
      expect(err).toBeInstanceOf(WayfarerError);
      expect(err).toMatchObject({ code: "CONFIG_INVALID" });
      expect(String(err instanceof Error ? err.message : err)).toContain(
        `Invalid configuration (${file}): memory.maxContextMessages:`
      );
    }
  });

  it("should reject an unknown provider from the environment", () => {
    expect(() => loadAppConfig(path.join(tmpDir, "absent.yaml"), { MODEL_PROVIDER: "claude" })).toThrow(
      /^Invalid environment: MODEL_PROVIDER:/
    );
  });

  it("should reject malformed YAML", async () => {
    await fs.writeFile(file, "model: [unclosed\n");

    expect(() => loadAppConfig(file, {})).toThrow(`Could not read ${file}`);
  });
});

describe("missingApiKeys", () => {
  it("should list the keys the configured providers need", () => {
    expect(missingApiKeys(AppConfigSchema.parse({}))).toEqual(["GEMINI_API_KEY", "EXA_API_KEY"]);
    expect(missingApiKeys(AppConfigSchema.parse({ model: { provider: "openai" } }))).toEqual([
      "OPENAI_API_KEY",
      "EXA_API_KEY",
    ]);
    expect(
      missingApiKeys(AppConfigSchema.parse({ model: { provider: "mock" }, apiKeys: { exa: "test-exa-key" } }))
    ).toEqual([]);
  });
});
