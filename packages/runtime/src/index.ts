export {
  TurnOrchestrator,
  LANGUAGE_AGENT,
  RESPONSE_AGENT,
  FOLLOWUP_AGENT,
  BOOKING_AGENT,
  TASK_MOCK_BOOKING,
  DEFAULT_STEP_TIMEOUT_MS,
  ERROR_REPLY,
  INCOMPLETE_FALLBACK,
  NOT_TRAVEL_REPLY,
} from "./turn-orchestrator.js";
export type { TurnOrchestratorOptions } from "./turn-orchestrator.js";
export {
  buildLanguagePrompt,
  buildSpecialistPrompt,
  buildResponsePrompt,
  buildFollowupPrompt,
  TASK_LANGUAGE_DETECTION,
  TASK_FINAL_RESPONSE,
  TASK_FOLLOWUP_RESPONSE,
  FOLLOWUP_HISTORY_WINDOW,
} from "./prompt-builder.js";
export { MockModelAdapter, TASK_MARKER } from "./model-adapter.js";
export type { ModelAdapter, ChatMessage, GenerationOptions, GenerationResult } from "./model-adapter.js";
export { GeminiAdapter } from "./gemini-adapter.js";
export { OllamaAdapter } from "./ollama-adapter.js";
export { OpenAIAdapter } from "./openai-adapter.js";
export {
  ExaSearchProvider,
  StaticSearchProvider,
  enhanceQuery,
  formatSearchDocuments,
} from "./search-provider.js";
export type { SearchProvider, SearchDocument, ExaSearchOptions } from "./search-provider.js";
export { createModelAdapter, createSearchProvider } from "./factory.js";
export type { ModelProvider, ModelSettings } from "./factory.js";
export { DISPATCH_TABLE, resolveSpecialist, normalizeServiceType, buildSearchQuery } from "./specialists.js";
export type { Specialist } from "./specialists.js";
export { extractJsonFromText } from "./json-extract.js";
export { createMockBooking, formatBookingConfirmation, bookingToJson } from "./booking.js";
export { createEvent, createTraceContext } from "./events.js";
export { withTimeout } from "./timeout.js";
export { LanguageAnalysisSchema, FollowupReplySchema, BookingRequestSchema } from "./schemas.js";
export type { LanguageAnalysis, FollowupReply, BookingRequest } from "./schemas.js";
