import type { FullContext, JsonValue } from "@wayfarer/types";
import type { ChatMessage } from "./model-adapter.js";
import type { Specialist } from "./specialists.js";

export const TASK_LANGUAGE_DETECTION = "task_language_detection";
export const TASK_FINAL_RESPONSE = "task_final_response";
export const TASK_FOLLOWUP_RESPONSE = "task_followup_response";

/** Number of history messages shown to the follow-up step. */
export const FOLLOWUP_HISTORY_WINDOW = 5;

function header(taskName: string): string {
  return `# Task: ${taskName}`;
}

function json(value: unknown): string {
  return JSON.stringify(value, null, 2);
}

export function buildLanguagePrompt(userInput: string): ChatMessage[] {
  const system = `${header(TASK_LANGUAGE_DETECTION)}

You are a language detection and translation specialist for a travel assistant.

Steps:
1. Detect the language of the input (ISO code and full name).
2. Translate it to English.
3. Decide whether it is travel related.
4. Identify the service type: flight, hotel, train, bus or attractions.
5. Extract entities: origin, destination, date, guests, budget.
6. Check completeness:
   - flight, train, bus: origin, destination and date
   - hotel: destination and check-in date
   - attractions: destination only
7. When details are missing, ask for ALL of them in ONE question written in the user's language.

Return ONLY a JSON object:
${json({
  detected_language: "hi",
  language_name: "Hindi",
  english_translation: "I need a flight from Mumbai to Delhi tomorrow",
  is_travel_related: true,
  service_type: "flight",
  entities: { origin: "Mumbai", destination: "Delhi", date: "tomorrow", guests: null, budget: null },
  is_complete: true,
  missing_info: [],
  followup_question: null,
})}`;

  return [
    { role: "system", content: system },
    { role: "user", content: `User input: ${userInput}` },
  ];
}

export function buildSpecialistPrompt(
  specialist: Specialist,
  request: { entities: JsonValue; englishTranslation: string | null; query: string },
  documents: string
): ChatMessage[] {
  const system = `${header(specialist.taskName)}
Collection: ${specialist.collection}

You are a ${specialist.role}. Extract up to 5 concrete options from the search results below.
Use only facts present in the results. Keep prices, times and identifiers exactly as written.

Return ONLY a JSON object of this shape:
${json({ [specialist.collection]: [specialist.example], search_query: request.query, result_count: 1 })}`;

  const user = `Request:
${json({ english_translation: request.englishTranslation, entities: request.entities })}

Search results:
${documents}`;

  return [
    { role: "system", content: system },
    { role: "user", content: user },
  ];
}

export function buildResponsePrompt(
  language: { code: string; name: string },
  englishTranslation: string | null,
  results: JsonValue | null
): ChatMessage[] {
  const system = `${header(TASK_FINAL_RESPONSE)}

You are a multilingual travel assistant. Write the reply in ${language.name} (${language.code}).
- Numbered options (1, 2, 3 ...), one per block, with prices, times and names preserved.
- Local currency symbols and natural date formats.
- End with a short question offering more details or a booking.
- If there are no results, say so and suggest refining the request.
Return plain text, not JSON.`;

  const user = `Request: ${englishTranslation ?? "(unknown)"}

Results:
${results === null ? "none" : json(results)}`;

  return [
    { role: "system", content: system },
    { role: "user", content: user },
  ];
}

export function buildFollowupPrompt(userInput: string, context: FullContext): ChatMessage[] {
  const code = context.language?.detectedLanguage ?? "en";
  const name = context.language?.languageName ?? "English";

  const system = `${header(TASK_FOLLOWUP_RESPONSE)}

You answer follow-up questions about earlier travel results. Do not search again.
Reply in ${name} (${code}).

Resolve references such as "second one", "option 2", "last", "cheapest" or "earliest"
against the search results. Options are numbered from 1 in the order listed.
Answer directly; do not repeat the whole list. If the reference is unclear, ask.

Return a JSON object:
${json({ answer: "The second flight is SpiceJet SG-456 at ₹3,200.", booking: null })}
Set "booking" to {"service_type": "<flight|hotel|train|bus|attractions>", "option_index": <n>}
only when the user explicitly asks to book that option.`;

  const user = `Follow-up: ${userInput}

Context:
${json({
  language: context.language,
  entities: context.entities,
  searchResults: context.searchResults,
  conversationHistory: context.conversationHistory.slice(-FOLLOWUP_HISTORY_WINDOW),
  agentOutputs: context.agentOutputs,
})}`;

  return [
    { role: "system", content: system },
    { role: "user", content: user },
  ];
}
