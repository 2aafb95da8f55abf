/**
 * Error types shared by the gateway, the reconciliation engine and the tool layer.
 */

/**
 * The external calendar is not configured (no credentials or tokens) or could
 * not be initialized. Expected condition: callers degrade to local-only.
 */
export class CalendarUnavailableError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CalendarUnavailableError";
  }
}

/**
 * A bounded calendar call did not settle before its deadline.
 */
export class CalendarTimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(operation: string, timeoutMs: number) {
    super(`Calendar ${operation} timed out after ${timeoutMs}ms`);
    this.name = "CalendarTimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

export class EventNotFoundError extends Error {
  readonly eventId: string;

  constructor(eventId: string) {
    super(`Event not found in local store: ${eventId}`);
    this.name = "EventNotFoundError";
    this.eventId = eventId;
  }
}

/**
 * Tool arguments failed validation, or the tool name is unknown.
 */
export class ToolInputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ToolInputError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
