/**
 * Messages sent to a model adapter for one reasoning step.
 * Distinct from stored MessageRecord: no timestamps, no metadata.
 */
export interface ChatMessage {
  role: "system" | "user" | "assistant";
  content: string;
}

export interface GenerationOptions {
  temperature?: number;
  /** Ask the provider for a JSON body where it supports it. */
  json?: boolean;
}

export interface GenerationResult {
  text: string;
}

/**
 * Abstraction over the underlying LLM.
 * `generate()` receives the full prompt and returns the model's text.
 */
export interface ModelAdapter {
  readonly name: string;
  generate(messages: ChatMessage[], options?: GenerationOptions): Promise<GenerationResult>;
}

/** Task marker written as the first line of every system prompt. */
export const TASK_MARKER = /^# Task: (\w+)$/m;

const ORDINALS: Record<string, number> = {
  first: 1,
  "1st": 1,
  second: 2,
  "2nd": 2,
  third: 3,
  "3rd": 3,
  fourth: 4,
  "4th": 4,
  fifth: 5,
  "5th": 5,
};

const SERVICE_WORDS: ReadonlyArray<readonly [RegExp, string]> = [
  [/\b(flight|fly|plane)s?\b/i, "flight"],
  [/\b(hotel|stay|room)s?\b/i, "hotel"],
  [/\btrains?\b/i, "train"],
  [/\bbus(es)?\b/i, "bus"],
  [/\b(attraction|sightseeing|things to do)s?\b/i, "attractions"],
];

/**
 * A mock model adapter for integration testing.
 * Reads the task marker from the system prompt and answers each step
 * with a deterministic, English-only imitation of a real model.
 *
 * Supported tasks:
 * - task_language_detection: "from X to Y", a service word and a date word
 * - task_<service>_search: one fabricated option per search document
 * - task_final_response: numbered list of the structured results
 * - task_followup_response: ordinal lookup, "book" sets a booking request
 */
export class MockModelAdapter implements ModelAdapter {
  readonly name = "mock";
  readonly calls: ChatMessage[][] = [];

  async generate(messages: ChatMessage[]): Promise<GenerationResult> {
    this.calls.push(messages);
    const system = messages.find((m) => m.role === "system")?.content ?? "";
    const user = [...messages].reverse().find((m) => m.role === "user")?.content ?? "";
    const task = TASK_MARKER.exec(system)?.[1];

    switch (task) {
      case "task_language_detection":
        return { text: "```json\n" + JSON.stringify(detectLanguage(user), null, 2) + "\n```" };
      case "task_final_response":
        return { text: renderResults(user) };
      case "task_followup_response":
        return { text: JSON.stringify(answerFollowup(user)) };
      default:
        if (task?.endsWith("_search")) {
          return { text: structureResults(system, user) };
        }
        return { text: "I don't know how to help with that." };
    }
  }
}

function detectLanguage(input: string): Record<string, unknown> {
  const text = input.replace(/^User input:\s*/i, "");
  const route = /from\s+([A-Z][\w-]*)\s+to\s+([A-Z][\w-]*)/.exec(text);
  const inCity = /\bin\s+([A-Z][\w-]*)/.exec(text);
  const spokenDate = /\b(today|tomorrow|\d{4}-\d{2}-\d{2})\b/i.exec(text)?.[1] ?? null;
  const spokenService = SERVICE_WORDS.find(([re]) => re.test(text))?.[1] ?? null;

  const known = (label: string): string | null =>
    new RegExp(`${label}: ([^|\\]]+)`).exec(text)?.[1]?.trim() ?? null;

  const origin = route?.[1] ?? known("Origin");
  const destination = route?.[2] ?? inCity?.[1] ?? known("Destination");
  const date = spokenDate ?? known("Date");
  const service = spokenService ?? known("Service");
  const entities = { origin, destination, date, service_type: service };

  const missing: string[] = [];
  if (!service) missing.push("service_type");
  if (!destination) missing.push("destination");
  if (service !== "attractions" && service !== "hotel" && !origin) missing.push("origin");
  if (service !== "attractions" && !date) missing.push("date");

  const complete = missing.length === 0;
  return {
    detected_language: "en",
    language_name: "English",
    english_translation: text,
    is_travel_related: true,
    service_type: service,
    entities,
    is_complete: complete,
    missing_info: missing,
    followup_question: complete ? null : `Please provide: ${missing.join(", ")}.`,
  };
}

function structureResults(system: string, user: string): string {
  const collection = /^Collection: (\w+)$/m.exec(system)?.[1] ?? "results";
  const sources = [...user.matchAll(/^SOURCE: (.+)$/gm)].map((m) => m[1]);
  const items = sources.map((source, i) => ({ name: source, option: i + 1 }));
  return JSON.stringify({ [collection]: items, result_count: items.length });
}

function renderResults(user: string): string {
  const names = [...user.matchAll(/"name":\s*"([^"]+)"/g)].map((m) => m[1]);
  if (names.length === 0) return "No options were found for your request.";
  const lines = names.map((name, i) => `${i + 1}. ${name}`);
  return `Here are ${names.length} options:\n${lines.join("\n")}\nWould you like more details about any of these?`;
}

function answerFollowup(user: string): Record<string, unknown> {
  const question = /^Follow-up: (.+)$/m.exec(user)?.[1] ?? "";
  const word = /\b(first|second|third|fourth|fifth|1st|2nd|3rd|4th|5th)\b/i.exec(question)?.[1];
  const numeric = /\boption\s+(\d+)\b/i.exec(question)?.[1];
  const index = word ? ORDINALS[word.toLowerCase()] : numeric ? Number(numeric) : undefined;
  const service = /"serviceType":\s*"(\w+)"/.exec(user)?.[1];

  if (index === undefined) {
    return { answer: "Which option do you mean?", booking: null };
  }
  const wantsBooking = /\bbook\b/i.test(question);
  return {
    answer: `Option ${index} is available.`,
    booking: wantsBooking && service ? { service_type: service, option_index: index } : null,
  };
}
