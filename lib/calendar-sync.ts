/**
 * Calendar Sync Module
 *
 * Creates, updates, deletes and backfills events across the local record
 * store and Google Calendar. The local store is always written; the
 * calendar is best-effort.
 *
 * Sync status of a stored event:
 * - supabase_only: local-only, event_id is local_<12 hex>
 * - synced: mirrored, event_id is the calendar-issued id
 *
 * Local-store errors propagate. Calendar failures never do; they come
 * back as a status on the result.
 */

import { randomBytes } from "crypto";
import type {
  CalendarEventBody,
  CalendarEventPatch,
  CalendarGateway,
  ExternalEvent,
  GatewayOutcome,
} from "./calendar-gateway.js";
import type { ClientResolver } from "./client-resolver.js";
import type {
  EventChanges,
  EventColumn,
  NewEvent,
  RecordStore,
  StoredEvent,
  SyncStatus,
} from "./crm-db.js";
import { DEFAULT_TIMEOUTS, DEFAULT_TIMEZONE, type TimeoutConfig } from "./config.js";
import { EventNotFoundError } from "./errors.js";
import type { ColumnFilter } from "./query-filter.js";

// ============================================================================
// Identifiers
// ============================================================================

export const LOCAL_EVENT_PREFIX = "local_";

export function isLocalEventId(eventId: string): boolean {
  return eventId.startsWith(LOCAL_EVENT_PREFIX);
}

/**
 * local_ followed by 12 lowercase hex characters
 */
export function generateLocalEventId(): string {
  return `${LOCAL_EVENT_PREFIX}${randomBytes(6).toString("hex")}`;
}

// ============================================================================
// Types
// ============================================================================

export interface EventInput {
  summary: string;
  start_iso: string;
  end_iso: string;
  description?: string | null;
  location?: string | null;
  attendees?: string[];
  company_name?: string | null;
  person_name?: string | null;
}

export type EventUpdates = EventChanges;

export type CalendarFailureStatus = "calendar_unavailable" | "calendar_error" | "calendar_timeout";

export interface CreateEventResult {
  status: SyncStatus;
  event_id: string;
  event: StoredEvent;
  calendar_event: ExternalEvent | null;
  /** Why the calendar leg failed, when status is supabase_only */
  calendar_status?: CalendarFailureStatus;
  detail?: string;
}

export interface UpdateEventResult {
  status: "synced" | "supabase_only" | CalendarFailureStatus;
  event_id: string;
  event: StoredEvent;
  client_resolved: boolean;
  calendar_event: ExternalEvent | null;
  detail?: string;
}

export interface DeleteEventResult {
  status: "deleted" | "local_event_skipped" | CalendarFailureStatus;
  event_id: string;
  local_rows_deleted: number;
  detail?: string;
}

export type BackfillItemStatus = "already_synced" | "synced_successfully" | "sync_failed";

export interface BackfillItem {
  event: string;
  status: BackfillItemStatus;
  event_id: string;
  old_event_id?: string;
  error?: string;
}

export interface BackfillResult {
  status: "completed" | "calendar_unavailable";
  total_events: number;
  synced_count: number;
  failed_count: number;
  results: BackfillItem[];
}

export interface ResetConnectionResult {
  status: "connection_reset";
  detail: string;
}

export interface EventQuery {
  event_id?: string;
  time_min?: string;
  time_max?: string;
  summary?: string;
  company?: string;
  client_id?: number;
}

export interface ListEventsResult {
  status: "ok";
  count: number;
  events: StoredEvent[];
}

export interface EventSyncOptions {
  store: RecordStore;
  resolver: ClientResolver;
  gateway: CalendarGateway;
  timezone?: string;
  timeouts?: Partial<TimeoutConfig>;
  /** Callback for degradation and progress messages */
  log?: (message: string) => void;
}

type GatewayFailure = Exclude<GatewayOutcome<unknown>, { kind: "ok" }>;

function failureStatus(outcome: GatewayFailure): CalendarFailureStatus {
  if (outcome.kind === "unavailable") return "calendar_unavailable";
  return outcome.timedOut ? "calendar_timeout" : "calendar_error";
}

function failureDetail(outcome: GatewayFailure): string {
  return outcome.kind === "unavailable" ? outcome.reason : outcome.message;
}

// ============================================================================
// Engine
// ============================================================================

export class EventSyncEngine {
  private readonly store: RecordStore;
  private readonly resolver: ClientResolver;
  private readonly gateway: CalendarGateway;
  private readonly timezone: string;
  private readonly timeouts: TimeoutConfig;
  private readonly log: (message: string) => void;

  constructor(options: EventSyncOptions) {
    this.store = options.store;
    this.resolver = options.resolver;
    this.gateway = options.gateway;
    this.timezone = options.timezone ?? DEFAULT_TIMEZONE;
    this.timeouts = { ...DEFAULT_TIMEOUTS, ...options.timeouts };
    this.log = options.log ?? (() => {});
  }

  /**
   * Create the event in the calendar if possible, then record it locally.
   * A calendar failure yields a local_ id and status supabase_only.
   */
  async create(input: EventInput): Promise<CreateEventResult> {
    const clientId = await this.resolver.resolveOrCreate(input.company_name, input.person_name);

    const outcome = await this.gateway.create(this.toCalendarBody(input, this.timezone), {
      timeoutMs: this.timeouts.createMs,
    });

    let eventId: string;
    let calendarEvent: ExternalEvent | null = null;
    if (outcome.kind === "ok") {
      eventId = outcome.payload.id;
      calendarEvent = outcome.payload;
    } else {
      eventId = generateLocalEventId();
      this.log(`Calendar create failed (${failureStatus(outcome)}), storing ${eventId} locally: ${failureDetail(outcome)}`);
    }

    const synced = outcome.kind === "ok";
    const record: NewEvent = {
      event_id: eventId,
      summary: input.summary,
      start_iso: input.start_iso,
      end_iso: input.end_iso,
      description: input.description ?? null,
      location: input.location ?? null,
      attendees: input.attendees ?? [],
      company_name: input.company_name ?? null,
      person_name: input.person_name ?? null,
      source: synced ? "synced" : "supabase_only",
      calendar_id: synced ? "primary" : "local",
      timezone: this.timezone,
      status: "confirmed",
      client_id: clientId,
    };
    const event = await this.store.upsertEvent(record);

    if (outcome.kind === "ok") {
      return { status: "synced", event_id: eventId, event, calendar_event: calendarEvent };
    }
    return {
      status: "supabase_only",
      event_id: eventId,
      event,
      calendar_event: null,
      calendar_status: failureStatus(outcome),
      detail: failureDetail(outcome),
    };
  }

  /**
   * Update by event_id. The local write happens first; synced events are
   * then patched in the calendar (fetch, merge, write back).
   */
  async update(eventId: string, updates: EventUpdates): Promise<UpdateEventResult> {
    const existing = await this.store.getEvent(eventId);
    if (!existing) {
      throw new EventNotFoundError(eventId);
    }

    const changes: EventChanges = { ...updates };
    let clientResolved = false;
    const namesChanged = updates.company_name !== undefined || updates.person_name !== undefined;
    if (namesChanged && updates.client_id === undefined) {
      const company = updates.company_name !== undefined ? updates.company_name : existing.company_name;
      const person = updates.person_name !== undefined ? updates.person_name : existing.person_name;
      changes.client_id = await this.resolver.resolveOrCreate(company, person);
      clientResolved = true;
    }

    const event = await this.store.updateEvent(eventId, changes);
    if (!event) {
      throw new EventNotFoundError(eventId);
    }

    const base = { event_id: eventId, event, client_resolved: clientResolved };

    if (isLocalEventId(eventId)) {
      return { ...base, status: "supabase_only", calendar_event: null };
    }

    const patch = this.toCalendarPatch(updates, existing.timezone);
    if (Object.keys(patch).length === 0) {
      return { ...base, status: "synced", calendar_event: null };
    }

    const outcome = await this.gateway.update(eventId, patch, { timeoutMs: this.timeouts.updateMs });
    if (outcome.kind === "ok") {
      return { ...base, status: "synced", calendar_event: outcome.payload };
    }

    this.log(`Calendar update of ${eventId} failed (${failureStatus(outcome)}), local record updated: ${failureDetail(outcome)}`);
    return {
      ...base,
      status: failureStatus(outcome),
      calendar_event: null,
      detail: failureDetail(outcome),
    };
  }

  /**
   * Delete locally, then from the calendar unless the id is local-only.
   */
  async delete(eventId: string): Promise<DeleteEventResult> {
    const removed = await this.store.deleteEvent(eventId);

    if (isLocalEventId(eventId)) {
      return {
        status: "local_event_skipped",
        event_id: eventId,
        local_rows_deleted: removed,
        detail: "Local event, not sent to the calendar",
      };
    }

    const outcome = await this.gateway.delete(eventId, { timeoutMs: this.timeouts.deleteMs });
    if (outcome.kind === "ok") {
      return { status: "deleted", event_id: eventId, local_rows_deleted: removed };
    }

    this.log(`Calendar delete of ${eventId} failed (${failureStatus(outcome)}), local record removed: ${failureDetail(outcome)}`);
    return {
      status: failureStatus(outcome),
      event_id: eventId,
      local_rows_deleted: removed,
      detail: failureDetail(outcome),
    };
  }

  /**
   * Push every local-only event to the calendar and move it onto the
   * calendar-issued id. Safe to re-run: synced events are skipped and
   * failures leave the local record untouched.
   */
  async backfillSync(): Promise<BackfillResult> {
    const events = await this.store.listEvents();
    const results: BackfillItem[] = [];
    let syncedCount = 0;
    let failedCount = 0;
    let unavailable = false;

    for (const event of events) {
      if (!isLocalEventId(event.event_id)) {
        results.push({ event: event.summary, status: "already_synced", event_id: event.event_id });
        continue;
      }

      const outcome = await this.gateway.create(this.toCalendarBody(event, event.timezone), {
        timeoutMs: this.timeouts.createMs,
      });

      if (outcome.kind !== "ok") {
        unavailable = unavailable || outcome.kind === "unavailable";
        failedCount++;
        this.log(`Backfill of ${event.event_id} failed (${failureStatus(outcome)}): ${failureDetail(outcome)}`);
        results.push({
          event: event.summary,
          status: "sync_failed",
          event_id: event.event_id,
          error: failureDetail(outcome),
        });
        continue;
      }

      const newEventId = outcome.payload.id;
      const moved = await this.store.markEventSynced(event.event_id, {
        event_id: newEventId,
        source: "synced",
        calendar_id: "primary",
      });
      if (!moved) {
        failedCount++;
        const error = `Local event ${event.event_id} was removed during sync; calendar event ${newEventId} has no local record`;
        this.log(`Backfill of ${event.event_id} failed: ${error}`);
        results.push({ event: event.summary, status: "sync_failed", event_id: event.event_id, error });
        continue;
      }
      syncedCount++;
      this.log(`Synced ${event.event_id} -> ${newEventId}`);
      results.push({
        event: event.summary,
        status: "synced_successfully",
        event_id: newEventId,
        old_event_id: event.event_id,
      });
    }

    return {
      status: unavailable ? "calendar_unavailable" : "completed",
      total_events: events.length,
      synced_count: syncedCount,
      failed_count: failedCount,
      results,
    };
  }

  /**
   * Drop the cached connection state so the next call reconnects
   */
  resetConnection(): ResetConnectionResult {
    this.gateway.reset();
    this.log("Calendar connection reset");
    return {
      status: "connection_reset",
      detail: "Calendar connection reset; the next operation will try to connect again",
    };
  }

  async listEvents(query: EventQuery = {}): Promise<ListEventsResult> {
    const filters: ColumnFilter<EventColumn>[] = [];
    if (query.event_id) filters.push({ column: "event_id", op: "eq", value: query.event_id });
    if (query.time_min) filters.push({ column: "start_iso", op: "gte", value: query.time_min });
    if (query.time_max) filters.push({ column: "start_iso", op: "lte", value: query.time_max });
    if (query.summary) filters.push({ column: "summary", op: "ilike", value: query.summary });
    if (query.company) filters.push({ column: "company_name", op: "ilike", value: query.company });
    if (query.client_id !== undefined) filters.push({ column: "client_id", op: "eq", value: query.client_id });

    const events = await this.store.listEvents(filters);
    return { status: "ok", count: events.length, events };
  }

  private toCalendarBody(
    event: Pick<EventInput, "summary" | "start_iso" | "end_iso" | "description" | "location" | "attendees">,
    timezone: string
  ): CalendarEventBody {
    const body: CalendarEventBody = {
      summary: event.summary,
      start: { dateTime: event.start_iso, timeZone: timezone },
      end: { dateTime: event.end_iso, timeZone: timezone },
    };
    if (event.description) body.description = event.description;
    if (event.location) body.location = event.location;
    if (event.attendees && event.attendees.length > 0) body.attendees = event.attendees;
    return body;
  }

  private toCalendarPatch(updates: EventUpdates, timezone: string): CalendarEventPatch {
    const patch: CalendarEventPatch = {};
    if (updates.summary !== undefined) patch.summary = updates.summary;
    if (updates.description !== undefined) patch.description = updates.description ?? "";
    if (updates.location !== undefined) patch.location = updates.location ?? "";
    if (updates.start_iso !== undefined) patch.start = { dateTime: updates.start_iso, timeZone: timezone };
    if (updates.end_iso !== undefined) patch.end = { dateTime: updates.end_iso, timeZone: timezone };
    if (updates.attendees !== undefined) patch.attendees = updates.attendees;
    return patch;
  }
}
