import fs from "node:fs";
import yaml from "js-yaml";
import { z } from "zod";
import { WayfarerError } from "@wayfarer/types";

const LOG_LEVELS = ["trace", "debug", "info", "warn", "error", "fatal"] as const;
const PROVIDERS = ["gemini", "openai", "ollama", "mock"] as const;

export const AppConfigSchema = z.object({
  logLevel: z.enum(LOG_LEVELS).default("info"),
  model: z
    .object({
      provider: z.enum(PROVIDERS).default("gemini"),
      name: z.string().min(1).default("gemini-2.5-flash"),
      temperature: z.number().min(0).max(2).default(0.7),
      ollamaBaseUrl: z.string().url().default("http://localhost:11434"),
    })
    .default({}),
  memory: z
    .object({
      dbPath: z.string().min(1).default("travel_memory.db"),
      maxContextMessages: z.number().int().positive().default(10),
      retentionDays: z.number().positive().default(30),
      /** 0 disables the periodic purge. */
      cleanupIntervalHours: z.number().nonnegative().default(24),
    })
    .default({}),
  session: z
    .object({
      /** Advisory; sessions are purged by retention, not by this timeout. */
      timeoutSeconds: z.number().int().positive().default(3600),
    })
    .default({}),
  orchestrator: z
    .object({
      stepTimeoutMs: z.number().int().positive().default(120_000),
    })
    .default({}),
  apiKeys: z
    .object({
      gemini: z.string().optional(),
      openai: z.string().optional(),
      exa: z.string().optional(),
    })
    .default({}),
  telegram: z
    .object({
      botToken: z.string().optional(),
    })
    .default({}),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;

/** Unset and empty variables both count as absent. */
function fromEnv<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess((v) => (v === "" ? undefined : v), schema.optional());
}

const EnvSchema = z.object({
  GEMINI_API_KEY: fromEnv(z.string()),
  OPENAI_API_KEY: fromEnv(z.string()),
  EXA_API_KEY: fromEnv(z.string()),
  MODEL_PROVIDER: fromEnv(z.enum(PROVIDERS)),
  MODEL_NAME: fromEnv(z.string()),
  MODEL_TEMPERATURE: fromEnv(z.coerce.number()),
  MEMORY_DB_PATH: fromEnv(z.string()),
  LOG_LEVEL: fromEnv(z.string().toLowerCase().pipe(z.enum(LOG_LEVELS))),
  SESSION_TIMEOUT: fromEnv(z.coerce.number()),
  MAX_CONTEXT_MESSAGES: fromEnv(z.coerce.number()),
  SESSION_RETENTION_DAYS: fromEnv(z.coerce.number()),
  BOT_TOKEN: fromEnv(z.string()),
});

/**
 * Load configuration from a YAML file (optional) with environment
 * overrides on top, then validate.
 *
 * @throws WayfarerError CONFIG_INVALID on unreadable YAML or invalid values.
 */
export function loadAppConfig(
  path = "wayfarer.config.yaml",
  env: NodeJS.ProcessEnv = process.env
): AppConfig {
  const file = validate(readYaml(path), path);
  const vars = EnvSchema.safeParse(env);
  if (!vars.success) {
    throw new WayfarerError("CONFIG_INVALID", `Invalid environment: ${describe(vars.error)}`, vars.error);
  }
  const e = vars.data;

  return validate(
    {
      ...file,
      logLevel: e.LOG_LEVEL ?? file.logLevel,
      model: {
        ...file.model,
        provider: e.MODEL_PROVIDER ?? file.model.provider,
        name: e.MODEL_NAME ?? file.model.name,
        temperature: e.MODEL_TEMPERATURE ?? file.model.temperature,
      },
      memory: {
        ...file.memory,
        dbPath: e.MEMORY_DB_PATH ?? file.memory.dbPath,
        maxContextMessages: e.MAX_CONTEXT_MESSAGES ?? file.memory.maxContextMessages,
        retentionDays: e.SESSION_RETENTION_DAYS ?? file.memory.retentionDays,
      },
      session: {
        timeoutSeconds: e.SESSION_TIMEOUT ?? file.session.timeoutSeconds,
      },
      apiKeys: {
        gemini: e.GEMINI_API_KEY ?? file.apiKeys.gemini,
        openai: e.OPENAI_API_KEY ?? file.apiKeys.openai,
        exa: e.EXA_API_KEY ?? file.apiKeys.exa,
      },
      telegram: {
        botToken: e.BOT_TOKEN ?? file.telegram.botToken,
      },
    },
    "environment"
  );
}

/** Names of the keys the configured providers need but do not have. */
export function missingApiKeys(config: AppConfig): string[] {
  const missing: string[] = [];
  if (config.model.provider === "gemini" && !config.apiKeys.gemini) missing.push("GEMINI_API_KEY");
  if (config.model.provider === "openai" && !config.apiKeys.openai) missing.push("OPENAI_API_KEY");
  if (!config.apiKeys.exa) missing.push("EXA_API_KEY");
  return missing;
}

function readYaml(path: string): unknown {
  if (!fs.existsSync(path)) return {};
  try {
    return yaml.load(fs.readFileSync(path, "utf8")) ?? {};
  } catch (err) {
    throw new WayfarerError("CONFIG_INVALID", `Could not read ${path}`, err);
  }
}

function validate(raw: unknown, source: string): AppConfig {
  const parsed = AppConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new WayfarerError(
      "CONFIG_INVALID",
      `Invalid configuration (${source}): ${describe(parsed.error)}`,
      parsed.error
    );
  }
  return parsed.data;
}

function describe(error: z.ZodError): string {
  return error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ");
}
