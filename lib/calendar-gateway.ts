/**
 * Calendar Gateway
 *
 * Bounded create/get/update/delete against Google Calendar. Every call
 * resolves to an outcome instead of throwing:
 * - ok: the call succeeded
 * - unavailable: no usable connection (not configured, or setup failed)
 * - error: the call failed or timed out
 *
 * The connection is held in a CalendarConnection. Setting it up counts
 * against the same deadline as the call. When setup fails because the
 * account is not configured (CalendarUnavailableError) the failure is
 * cached and later calls report `unavailable` without retrying until
 * reset() is called. Any other setup failure is reported as an error and
 * tried again on the next call.
 */

import type { calendar_v3 } from "googleapis";
import { CalendarTimeoutError, CalendarUnavailableError, errorMessage } from "./errors.js";

// ============================================================================
// Types
// ============================================================================

export interface EventTime {
  dateTime: string;
  timeZone: string;
}

/**
 * Event-shaped payload sent to the external calendar
 */
export interface CalendarEventBody {
  summary: string;
  start: EventTime;
  end: EventTime;
  description?: string;
  location?: string;
  attendees?: string[];
}

export type CalendarEventPatch = Partial<CalendarEventBody>;

/**
 * Event as returned by the external calendar
 */
export interface ExternalEvent {
  id: string;
  summary: string | null;
  description: string | null;
  start: string | null;
  end: string | null;
  status: string | null;
  htmlLink: string | null;
}

export type GatewayOutcome<T> =
  | { kind: "ok"; payload: T }
  | { kind: "unavailable"; reason: string }
  | { kind: "error"; message: string; timedOut: boolean };

export interface CallOptions {
  timeoutMs: number;
}

export interface CalendarGateway {
  create(body: CalendarEventBody, options: CallOptions): Promise<GatewayOutcome<ExternalEvent>>;
  get(eventId: string, options: CallOptions): Promise<GatewayOutcome<ExternalEvent>>;
  /** Fetch the stored event, merge the patch into it, write it back */
  update(eventId: string, patch: CalendarEventPatch, options: CallOptions): Promise<GatewayOutcome<ExternalEvent>>;
  delete(eventId: string, options: CallOptions): Promise<GatewayOutcome<null>>;
  /** Forget any cached connection or failure */
  reset(): void;
}

/**
 * The slice of the googleapis events resource this gateway uses
 */
export interface CalendarEventsApi {
  insert(params: calendar_v3.Params$Resource$Events$Insert): Promise<{ data: calendar_v3.Schema$Event }>;
  get(params: calendar_v3.Params$Resource$Events$Get): Promise<{ data: calendar_v3.Schema$Event }>;
  update(params: calendar_v3.Params$Resource$Events$Update): Promise<{ data: calendar_v3.Schema$Event }>;
  delete(params: calendar_v3.Params$Resource$Events$Delete): Promise<unknown>;
}

// ============================================================================
// Timeout
// ============================================================================

/**
 * Race a promise against a deadline. The losing call is not cancelled.
 */
export async function withTimeout<T>(work: Promise<T>, timeoutMs: number, operation: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new CalendarTimeoutError(operation, timeoutMs)), timeoutMs);
  });
  try {
    return await Promise.race([work, deadline]);
  } finally {
    clearTimeout(timer);
  }
}

// ============================================================================
// Connection state
// ============================================================================

export type ConnectionState =
  | { kind: "idle" }
  | { kind: "connected"; events: CalendarEventsApi }
  | { kind: "unavailable"; reason: string };

export type ConnectionAcquisition =
  | { ok: true; events: CalendarEventsApi }
  | { ok: false; reason: string; cached: boolean };

/**
 * Lazily connects through the given factory. Keeps the connection once
 * made, and the reason when the account is not configured. Other failures
 * leave the state idle so the next acquire() connects again.
 */
export class CalendarConnection {
  private current: ConnectionState = { kind: "idle" };
  // bumped by reset() so an attempt started earlier cannot overwrite the state
  private generation = 0;

  constructor(private readonly connect: () => Promise<CalendarEventsApi>) {}

  get state(): ConnectionState {
    return this.current;
  }

  async acquire(): Promise<ConnectionAcquisition> {
    if (this.current.kind === "connected") {
      return { ok: true, events: this.current.events };
    }
    if (this.current.kind === "unavailable") {
      return { ok: false, reason: this.current.reason, cached: true };
    }

    const generation = this.generation;
    try {
      const events = await this.connect();
      if (generation === this.generation) {
        this.current = { kind: "connected", events };
      }
      return { ok: true, events };
    } catch (err) {
      if (err instanceof CalendarUnavailableError) {
        const reason = `Google Calendar is not available: ${err.message}`;
        if (generation === this.generation) {
          this.current = { kind: "unavailable", reason };
        }
        return { ok: false, reason, cached: true };
      }
      return { ok: false, reason: `Calendar connection failed: ${errorMessage(err)}`, cached: false };
    }
  }

  reset(): void {
    this.current = { kind: "idle" };
    this.generation++;
  }
}

// ============================================================================
// Mapping
// ============================================================================

export function toExternalEvent(event: calendar_v3.Schema$Event): ExternalEvent {
  if (!event.id) {
    throw new Error("Calendar response is missing an event id");
  }
  return {
    id: event.id,
    summary: event.summary ?? null,
    description: event.description ?? null,
    start: event.start?.dateTime ?? event.start?.date ?? null,
    end: event.end?.dateTime ?? event.end?.date ?? null,
    status: event.status ?? null,
    htmlLink: event.htmlLink ?? null,
  };
}

function toSchemaPatch(patch: CalendarEventPatch): calendar_v3.Schema$Event {
  const body: calendar_v3.Schema$Event = {};
  if (patch.summary !== undefined) body.summary = patch.summary;
  if (patch.description !== undefined) body.description = patch.description;
  if (patch.location !== undefined) body.location = patch.location;
  if (patch.start !== undefined) body.start = { ...patch.start };
  if (patch.end !== undefined) body.end = { ...patch.end };
  if (patch.attendees !== undefined) {
    body.attendees = patch.attendees.map((email) => ({ email }));
  }
  return body;
}

// ============================================================================
// Google implementation
// ============================================================================

/**
 * Mirrored events always live on the account's primary calendar; stored
 * rows record that placement as calendar_id "primary".
 */
export const PRIMARY_CALENDAR = "primary";

export interface GoogleCalendarGatewayOptions {
  log?: (message: string) => void;
}

export class GoogleCalendarGateway implements CalendarGateway {
  private readonly calendarId = PRIMARY_CALENDAR;
  private readonly log: (message: string) => void;

  constructor(private readonly connection: CalendarConnection, options: GoogleCalendarGatewayOptions = {}) {
    this.log = options.log ?? (() => {});
  }

  create(body: CalendarEventBody, options: CallOptions): Promise<GatewayOutcome<ExternalEvent>> {
    return this.run("create", options, async (events) => {
      const response = await events.insert({
        calendarId: this.calendarId,
        requestBody: toSchemaPatch(body),
      });
      return toExternalEvent(response.data);
    });
  }

  get(eventId: string, options: CallOptions): Promise<GatewayOutcome<ExternalEvent>> {
    return this.run("get", options, async (events) => {
      const response = await events.get({ calendarId: this.calendarId, eventId });
      return toExternalEvent(response.data);
    });
  }

  update(eventId: string, patch: CalendarEventPatch, options: CallOptions): Promise<GatewayOutcome<ExternalEvent>> {
    return this.run("update", options, async (events) => {
      const existing = await events.get({ calendarId: this.calendarId, eventId });
      const response = await events.update({
        calendarId: this.calendarId,
        eventId,
        requestBody: { ...existing.data, ...toSchemaPatch(patch) },
      });
      return toExternalEvent(response.data);
    });
  }

  delete(eventId: string, options: CallOptions): Promise<GatewayOutcome<null>> {
    return this.run("delete", options, async (events) => {
      await events.delete({ calendarId: this.calendarId, eventId });
      return null;
    });
  }

  reset(): void {
    this.connection.reset();
  }

  private async run<T>(
    operation: string,
    options: CallOptions,
    call: (events: CalendarEventsApi) => Promise<T>
  ): Promise<GatewayOutcome<T>> {
    const attempt = async (): Promise<GatewayOutcome<T>> => {
      const acquired = await this.connection.acquire();
      if (acquired.ok) {
        return { kind: "ok", payload: await call(acquired.events) };
      }
      if (acquired.cached) {
        return { kind: "unavailable", reason: acquired.reason };
      }
      this.log(acquired.reason);
      return { kind: "error", message: acquired.reason, timedOut: false };
    };

    try {
      return await withTimeout(attempt(), options.timeoutMs, operation);
    } catch (err) {
      const timedOut = err instanceof CalendarTimeoutError;
      const message = timedOut
        ? errorMessage(err)
        : `Calendar ${operation} failed: ${errorMessage(err)}`;
      this.log(message);
      return { kind: "error", message, timedOut };
    }
  }
}
