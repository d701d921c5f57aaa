export type {
  TraceId,
  SpanId,
  EventId,
  SessionId,
  Timestamp,
  JsonValue,
  JsonObject,
} from "./foundational.js";
export type { TraceContext, LogLevel, LogEntry, Logger } from "./observability.js";
export type { TravelErrorCode, TravelError } from "./error.js";
export { WayfarerError, isWayfarerError } from "./error.js";
export type {
  MessageRole,
  MessageMetadata,
  MessageRecord,
  OutputKind,
  AgentOutputRecord,
  SessionStats,
  SessionCreateOutcome,
  MemoryStore,
} from "./memory.js";
export type {
  ServiceType,
  LanguageInfo,
  EntityMap,
  SearchResultSet,
  DerivedViews,
  FullContext,
  MemoryManager,
} from "./context.js";
export type {
  TravelEvent,
  EventTopic,
  EventFilter,
  EventHandler,
  Subscription,
  EventBus,
} from "./event-bus.js";
export type { ChatRequest, ChatStatus, ChatResponse, BookingConfirmation } from "./chat.js";
export type { SessionSnapshot, SessionLookup, Gateway } from "./gateway.js";
