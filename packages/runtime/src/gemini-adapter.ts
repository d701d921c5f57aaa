import { z } from "zod";
import { WayfarerError } from "@wayfarer/types";
import type {
  ChatMessage,
  GenerationOptions,
  GenerationResult,
  ModelAdapter,
} from "./model-adapter.js";

const GeminiResponseSchema = z.object({
  candidates: z
    .array(
      z.object({
        content: z
          .object({
            parts: z.array(z.object({ text: z.string().optional() })).optional(),
          })
          .optional(),
        finishReason: z.string().optional(),
      })
    )
    .optional(),
});

/**
 * ModelAdapter for Google Gemini API.
 *
 * Uses the REST `generateContent` endpoint directly (no SDK dependency).
 */
export class GeminiAdapter implements ModelAdapter {
  readonly name = "gemini";
  private readonly apiKey: string;
  private readonly model: string;
  private readonly defaultTemperature: number;
  private readonly baseUrl = "https://generativelanguage.googleapis.com/v1beta";

  constructor(apiKey: string, model = "gemini-2.5-flash", temperature = 0.7) {
    if (!apiKey) throw new WayfarerError("CONFIG_INVALID", "Gemini API key is required");
    this.apiKey = apiKey;
    this.model = model;
    this.defaultTemperature = temperature;
  }

  async generate(
    messages: ChatMessage[],
    options: GenerationOptions = {}
  ): Promise<GenerationResult> {
    const { systemInstruction, contents } = this.convertMessages(messages);

    const body = {
      contents,
      ...(systemInstruction ? { systemInstruction } : {}),
      generationConfig: {
        temperature: options.temperature ?? this.defaultTemperature,
        ...(options.json ? { responseMimeType: "application/json" } : {}),
      },
    };

    const url = `${this.baseUrl}/models/${this.model}:generateContent?key=${this.apiKey}`;

    const response = await fetch(url, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(body),
    });

    if (!response.ok) {
      const errorText = await response.text();
      throw new WayfarerError("MODEL_ERROR", `Gemini API error ${response.status}: ${errorText}`);
    }

    const parsed = GeminiResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new WayfarerError("MODEL_ERROR", "Gemini API returned an unexpected body", parsed.error);
    }

    const parts = parsed.data.candidates?.[0]?.content?.parts ?? [];
    const text = parts.map((p) => p.text ?? "").join("");
    if (!text) {
      throw new WayfarerError("MODEL_ERROR", "Gemini API returned an empty response");
    }
    return { text };
  }

  /**
   * Gemini takes the system prompt as `systemInstruction` and the rest as
   * `contents[]` with roles "user" | "model", strictly alternating.
   */
  private convertMessages(messages: ChatMessage[]): {
    systemInstruction: GeminiContent | null;
    contents: GeminiContent[];
  } {
    let systemInstruction: GeminiContent | null = null;
    const contents: GeminiContent[] = [];

    for (const msg of messages) {
      if (msg.role === "system") {
        systemInstruction = { parts: [{ text: msg.content }] };
        continue;
      }
      const role = msg.role === "assistant" ? "model" : "user";
      const last = contents[contents.length - 1];
      if (last && last.role === role) {
        last.parts.push({ text: msg.content });
      } else {
        contents.push({ role, parts: [{ text: msg.content }] });
      }
    }

    return { systemInstruction, contents };
  }
}

interface GeminiContent {
  role?: "user" | "model";
  parts: { text: string }[];
}
