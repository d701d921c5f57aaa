import type { JsonObject, JsonValue } from "@wayfarer/types";

const FENCED_JSON = /```(?:json)?\s*(\{[\s\S]*?\})\s*```/;

/**
 * Pull a JSON object out of model text. Tries, in order: the whole text,
 * the first fenced code block, then each balanced `{...}` span.
 */
export function extractJsonFromText(text: string): JsonObject | null {
  const whole = tryParseObject(text.trim());
  if (whole) return whole;

  const fenced = FENCED_JSON.exec(text);
  if (fenced) {
    const parsed = tryParseObject(fenced[1]);
    if (parsed) return parsed;
  }

  for (const span of balancedObjects(text)) {
    const parsed = tryParseObject(span);
    if (parsed) return parsed;
  }
  return null;
}

function tryParseObject(text: string): JsonObject | null {
  try {
    const value: JsonValue = JSON.parse(text);
    return typeof value === "object" && value !== null && !Array.isArray(value) ? value : null;
  } catch {
    return null;
  }
}

/** Top-level `{...}` spans, skipping braces inside string literals. */
function* balancedObjects(text: string): Generator<string> {
  let depth = 0;
  let start = -1;
  let inString = false;
  let escaped = false;

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (inString) {
      if (escaped) escaped = false;
      else if (ch === "\\") escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"' && depth > 0) {
      inString = true;
    } else if (ch === "{") {
      if (depth === 0) start = i;
      depth++;
    } else if (ch === "}" && depth > 0) {
      depth--;
      if (depth === 0) yield text.slice(start, i + 1);
    }
  }
}
