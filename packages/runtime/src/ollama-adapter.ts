import { z } from "zod";
import { WayfarerError } from "@wayfarer/types";
import type {
  ChatMessage,
  GenerationOptions,
  GenerationResult,
  ModelAdapter,
} from "./model-adapter.js";

const OllamaChatSchema = z.object({
  message: z.object({ role: z.string(), content: z.string() }),
  done: z.boolean().optional(),
});

/**
 * ModelAdapter for a local Ollama instance.
 * Defaults to http://localhost:11434 and model "llama3.2".
 */
export class OllamaAdapter implements ModelAdapter {
  readonly name = "ollama";
  private readonly baseUrl: string;
  private readonly model: string;
  private readonly defaultTemperature: number;

  constructor(model = "llama3.2", baseUrl = "http://localhost:11434", temperature = 0.7) {
    this.model = model;
    this.baseUrl = baseUrl;
    this.defaultTemperature = temperature;
  }

  async generate(
    messages: ChatMessage[],
    options: GenerationOptions = {}
  ): Promise<GenerationResult> {
    const body = {
      model: this.model,
      messages,
      stream: false,
      options: { temperature: options.temperature ?? this.defaultTemperature },
      ...(options.json ? { format: "json" } : {}),
    };

    let response: Response;
    try {
      response = await fetch(`${this.baseUrl}/api/chat`, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify(body),
      });
    } catch (err) {
      throw new WayfarerError("MODEL_ERROR", `Ollama connection failed at ${this.baseUrl}`, err);
    }

    if (!response.ok) {
      throw new WayfarerError(
        "MODEL_ERROR",
        `Ollama API error ${response.status}: ${await response.text()}`
      );
    }

    const parsed = OllamaChatSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new WayfarerError("MODEL_ERROR", "Ollama returned an unexpected body", parsed.error);
    }
    return { text: parsed.data.message.content };
  }
}
