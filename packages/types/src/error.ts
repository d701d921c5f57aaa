/**
 * Error codes surfaced by Wayfarer components.
 * Using a string union rather than a numeric enum for debuggability.
 */
export type TravelErrorCode =
  | "SESSION_NOT_FOUND"     // Session has no recorded conversation
  | "STORAGE_UNAVAILABLE"   // Database could not be opened
  | "MODEL_ERROR"           // Reasoning service call failed
  | "SEARCH_ERROR"          // Web search call failed
  | "TIMEOUT"               // Operation exceeded its time limit
  | "CONFIG_INVALID"        // Configuration failed validation
  | "INTERNAL_ERROR";       // Unexpected system failure

export interface TravelError {
  readonly code: TravelErrorCode;
  readonly message: string;
  /** The original error, if wrapping a lower-level failure. */
  readonly cause?: unknown;
}

/** Throwable form of {@link TravelError}. */
export class WayfarerError extends Error implements TravelError {
  readonly code: TravelErrorCode;
  override readonly cause?: unknown;

  constructor(code: TravelErrorCode, message: string, cause?: unknown) {
    super(message);
    this.name = "WayfarerError";
    this.code = code;
    this.cause = cause;
  }
}

export function isWayfarerError(err: unknown): err is WayfarerError {
  return err instanceof WayfarerError;
}
