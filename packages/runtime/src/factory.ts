import { WayfarerError } from "@wayfarer/types";
import { GeminiAdapter } from "./gemini-adapter.js";
import { MockModelAdapter } from "./model-adapter.js";
import type { ModelAdapter } from "./model-adapter.js";
import { OllamaAdapter } from "./ollama-adapter.js";
import { OpenAIAdapter } from "./openai-adapter.js";
import { ExaSearchProvider, StaticSearchProvider } from "./search-provider.js";
import type { SearchProvider } from "./search-provider.js";

export type ModelProvider = "gemini" | "openai" | "ollama" | "mock";

export interface ModelSettings {
  provider: ModelProvider;
  name: string;
  temperature: number;
  geminiApiKey?: string;
  openaiApiKey?: string;
  ollamaBaseUrl?: string;
}

export function createModelAdapter(settings: ModelSettings): ModelAdapter {
  switch (settings.provider) {
    case "gemini":
      return new GeminiAdapter(settings.geminiApiKey ?? "", settings.name, settings.temperature);
    case "openai":
      return new OpenAIAdapter(settings.openaiApiKey ?? "", settings.name, settings.temperature);
    case "ollama":
      return new OllamaAdapter(settings.name, settings.ollamaBaseUrl, settings.temperature);
    case "mock":
      return new MockModelAdapter();
    default: {
      const unknown: never = settings.provider;
      throw new WayfarerError("CONFIG_INVALID", `Unknown model provider: ${String(unknown)}`);
    }
  }
}

/** Exa when a key is present; otherwise a provider that finds nothing. */
export function createSearchProvider(exaApiKey: string | undefined): SearchProvider {
  return exaApiKey ? new ExaSearchProvider(exaApiKey) : new StaticSearchProvider([]);
}
