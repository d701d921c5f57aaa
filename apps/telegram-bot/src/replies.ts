import type { JsonValue, SessionSnapshot } from "@wayfarer/types";
import type { ChatState } from "./chat-sessions.js";

export const HELP_TEXT = [
  "Send a travel request in any language, e.g. \"flight from Pune to Delhi tomorrow\".",
  "",
  "/new - start a new session",
  "/followup - toggle follow-up mode (ask about or book earlier results)",
  "/load <id> - switch to an existing session",
  "/session - show what this session remembers",
  "/clear - delete this session",
].join("\n");

export function formatMode(state: ChatState): string {
  return state.followup
    ? `Follow-up mode ON for session ${state.sessionId}. Ask about earlier results.`
    : `New query mode for session ${state.sessionId}.`;
}

function scalar(value: JsonValue): string {
  return typeof value === "string" ? value : JSON.stringify(value);
}

export function formatSessionSummary(snapshot: SessionSnapshot): string {
  const { context, stats } = snapshot;
  const language = context.language
    ? `${context.language.languageName ?? "unknown"} (${context.language.detectedLanguage ?? "?"})`
    : "unknown";

  const entities = Object.entries(context.entities)
    .filter(([, value]) => value !== null && value !== "")
    .map(([key, value]) => `${key}=${scalar(value)}`);

  const results = context.searchResults.map((set) => `${set.serviceType} (${set.results.length})`);

  return [
    `Session: ${context.sessionId}`,
    `Language: ${language}`,
    `Messages: ${stats?.messageCount ?? context.conversationHistory.length}, agent outputs: ${stats?.agentOutputCount ?? context.agentOutputs.length}`,
    `Entities: ${entities.length > 0 ? entities.join(", ") : "none"}`,
    `Search results: ${results.length > 0 ? results.join(", ") : "none"}`,
    `Last activity: ${stats?.lastActivity ?? "unknown"}`,
  ].join("\n");
}
