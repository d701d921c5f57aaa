import type { JsonValue, SessionId, Timestamp } from "./foundational.js";
import type { ServiceType } from "./context.js";

/** A single inbound user turn. */
export interface ChatRequest {
  /** Omitted on the first message of a conversation. */
  readonly sessionId?: SessionId;
  /** User message in any language. */
  readonly message: string;
  /** Answer from stored context instead of running a new search. */
  readonly isFollowup: boolean;
}

export type ChatStatus = "success" | "error";

export interface ChatResponse {
  readonly sessionId: SessionId;
  readonly response: string;
  readonly detectedLanguage: string | null;
  readonly isFollowup: boolean;
  /** False when the assistant is waiting for missing trip details. */
  readonly isComplete: boolean;
  readonly agentsCalled: string[];
  readonly status: ChatStatus;
}

/**
 * Confirmation for a simulated booking. No reservation is ever made.
 */
export interface BookingConfirmation {
  readonly confirmationNumber: string;
  readonly serviceType: ServiceType;
  /** 1-based position of the option in the result set it came from. */
  readonly optionIndex: number;
  readonly item: JsonValue;
  readonly status: "mock_confirmed";
  readonly createdAt: Timestamp;
}
