import { z } from "zod";
import { WayfarerError } from "@wayfarer/types";
import type {
  ChatMessage,
  GenerationOptions,
  GenerationResult,
  ModelAdapter,
} from "./model-adapter.js";

const ChatCompletionSchema = z.object({
  choices: z.array(
    z.object({
      message: z.object({ content: z.string().nullable() }),
    })
  ),
});

/**
 * ModelAdapter for OpenAI API.
 * Uses the REST chat completions endpoint directly.
 */
export class OpenAIAdapter implements ModelAdapter {
  readonly name = "openai";
  private readonly apiKey: string;
  private readonly model: string;
  private readonly defaultTemperature: number;
  private readonly baseUrl = "https://api.openai.com/v1";

  constructor(apiKey: string, model = "gpt-4o", temperature = 0.7) {
    if (!apiKey) throw new WayfarerError("CONFIG_INVALID", "OpenAI API key is required");
    this.apiKey = apiKey;
    this.model = model;
    this.defaultTemperature = temperature;
  }

  async generate(
    messages: ChatMessage[],
    options: GenerationOptions = {}
  ): Promise<GenerationResult> {
    const body = {
      model: this.model,
      messages: messages.map(({ role, content }) => ({ role, content })),
      temperature: options.temperature ?? this.defaultTemperature,
      ...(options.json ? { response_format: { type: "json_object" } } : {}),
    };

    const response = await fetch(`${this.baseUrl}/chat/completions`, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        Authorization: `Bearer ${this.apiKey}`,
      },
      body: JSON.stringify(body),
    });

    if (!response.ok) {
      const errorText = await response.text();
      throw new WayfarerError("MODEL_ERROR", `OpenAI API error ${response.status}: ${errorText}`);
    }

    const parsed = ChatCompletionSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new WayfarerError("MODEL_ERROR", "OpenAI API returned an unexpected body", parsed.error);
    }
    return { text: parsed.data.choices[0]?.message.content ?? "" };
  }
}
