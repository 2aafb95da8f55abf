import { describe, it, expect, vi } from "vitest";
import type { calendar_v3 } from "googleapis";
import {
  CalendarConnection,
  GoogleCalendarGateway,
  toExternalEvent,
  withTimeout,
  type CalendarEventsApi,
} from "../lib/calendar-gateway.js";
import { CalendarTimeoutError, CalendarUnavailableError } from "../lib/errors.js";

const CALL = { timeoutMs: 1000 };

const BODY = {
  summary: "Demo",
  start: { dateTime: "2026-03-10T10:00:00-06:00", timeZone: "America/Mexico_City" },
  end: { dateTime: "2026-03-10T11:00:00-06:00", timeZone: "America/Mexico_City" },
};

function createEventsApi(overrides: Partial<CalendarEventsApi> = {}): CalendarEventsApi {
  return {
    insert: vi.fn(async (params: calendar_v3.Params$Resource$Events$Insert) => ({
      data: { ...params.requestBody, id: "gcal_1" },
    })),
    get: vi.fn(async (params: calendar_v3.Params$Resource$Events$Get) => ({
      data: {
        id: params.eventId,
        summary: "Stored",
        description: "Keep me",
        start: { dateTime: "2026-03-10T10:00:00-06:00" },
        end: { dateTime: "2026-03-10T11:00:00-06:00" },
      },
    })),
    update: vi.fn(async (params: calendar_v3.Params$Resource$Events$Update) => ({
      data: { ...params.requestBody, id: params.eventId },
    })),
    delete: vi.fn(async () => ({ data: "" })),
    ...overrides,
  };
}

describe("withTimeout", () => {
  it("resolves with the work result", async () => {
    await expect(withTimeout(Promise.resolve(42), 50, "get")).resolves.toBe(42);
  });

  it("rejects with a timeout error when the work does not settle", async () => {
    const never = new Promise<number>(() => {});

    await expect(withTimeout(never, 10, "delete")).rejects.toThrow(
      new CalendarTimeoutError("delete", 10).message
    );
  });
});

describe("CalendarConnection", () => {
  it("connects once and reuses the connection", async () => {
    const api = createEventsApi();
    const connect = vi.fn(async () => api);
    const connection = new CalendarConnection(connect);

    expect(connection.state.kind).toBe("idle");
    await connection.acquire();
    const second = await connection.acquire();

    expect(second).toEqual({ ok: true, events: api });
    expect(connection.state.kind).toBe("connected");
    expect(connect).toHaveBeenCalledTimes(1);
  });

  it("caches a missing configuration until reset", async () => {
    const connect = vi.fn(async (): Promise<CalendarEventsApi> => {
      throw new CalendarUnavailableError("no tokens");
    });
    const connection = new CalendarConnection(connect);

    const first = await connection.acquire();
    await connection.acquire();

    expect(first).toEqual({ ok: false, reason: "Google Calendar is not available: no tokens", cached: true });
    expect(connection.state.kind).toBe("unavailable");
    expect(connect).toHaveBeenCalledTimes(1);

    connection.reset();
    expect(connection.state.kind).toBe("idle");
    await connection.acquire();
    expect(connect).toHaveBeenCalledTimes(2);
  });

  it("tries again after a connectivity failure", async () => {
    const api = createEventsApi();
    const connect = vi
      .fn<() => Promise<CalendarEventsApi>>()
      .mockRejectedValueOnce(new Error("getaddrinfo ENOTFOUND oauth2.googleapis.com"))
      .mockResolvedValueOnce(api);
    const connection = new CalendarConnection(connect);

    const first = await connection.acquire();
    expect(first).toEqual({
      ok: false,
      reason: "Calendar connection failed: getaddrinfo ENOTFOUND oauth2.googleapis.com",
      cached: false,
    });
    expect(connection.state.kind).toBe("idle");

    expect(await connection.acquire()).toEqual({ ok: true, events: api });
    expect(connect).toHaveBeenCalledTimes(2);
  });

  it("ignores an attempt that settles after reset", async () => {
    let fail: (err: Error) => void = () => {};
    const connection = new CalendarConnection(
      () =>
        new Promise<CalendarEventsApi>((_, reject) => {
          fail = reject;
        })
    );

    const stale = connection.acquire();
    connection.reset();
    fail(new CalendarUnavailableError("no tokens"));
    await stale;

    expect(connection.state.kind).toBe("idle");
  });
});

describe("GoogleCalendarGateway", () => {
  it("creates an event on the primary calendar", async () => {
    const api = createEventsApi();
    const gateway = new GoogleCalendarGateway(new CalendarConnection(async () => api));

    const outcome = await gateway.create({ ...BODY, attendees: ["ana@example.com"] }, CALL);

    expect(outcome).toEqual({
      kind: "ok",
      payload: {
        id: "gcal_1",
        summary: "Demo",
        description: null,
        start: "2026-03-10T10:00:00-06:00",
        end: "2026-03-10T11:00:00-06:00",
        status: null,
        htmlLink: null,
      },
    });
    expect(api.insert).toHaveBeenCalledWith({
      calendarId: "primary",
      requestBody: { ...BODY, attendees: [{ email: "ana@example.com" }] },
    });
  });

  it("reports unavailable without calling the api", async () => {
    const gateway = new GoogleCalendarGateway(
      new CalendarConnection(async () => {
        throw new CalendarUnavailableError("credentials missing");
      })
    );

    const outcome = await gateway.delete("gcal_1", CALL);

    expect(outcome).toEqual({
      kind: "unavailable",
      reason: "Google Calendar is not available: credentials missing",
    });
  });

  it("merges the patch into the stored event on update", async () => {
    const api = createEventsApi();
    const gateway = new GoogleCalendarGateway(new CalendarConnection(async () => api));

    const outcome = await gateway.update("gcal_7", { summary: "Renamed" }, CALL);

    expect(outcome.kind).toBe("ok");
    expect(api.get).toHaveBeenCalledWith({ calendarId: "primary", eventId: "gcal_7" });
    expect(api.update).toHaveBeenCalledWith({
      calendarId: "primary",
      eventId: "gcal_7",
      requestBody: {
        id: "gcal_7",
        summary: "Renamed",
        description: "Keep me",
        start: { dateTime: "2026-03-10T10:00:00-06:00" },
        end: { dateTime: "2026-03-10T11:00:00-06:00" },
      },
    });
  });

  it("reports a failed connection as an error and reconnects on the next call", async () => {
    const api = createEventsApi();
    const connect = vi
      .fn<() => Promise<CalendarEventsApi>>()
      .mockRejectedValueOnce(new Error("socket hang up"))
      .mockResolvedValueOnce(api);
    const log = vi.fn();
    const gateway = new GoogleCalendarGateway(new CalendarConnection(connect), { log });

    expect(await gateway.create(BODY, CALL)).toEqual({
      kind: "error",
      message: "Calendar connection failed: socket hang up",
      timedOut: false,
    });
    expect(log).toHaveBeenCalledWith("Calendar connection failed: socket hang up");
    expect((await gateway.create(BODY, CALL)).kind).toBe("ok");
  });

  it("bounds a connection that never completes by the call deadline", async () => {
    const gateway = new GoogleCalendarGateway(new CalendarConnection(() => new Promise<CalendarEventsApi>(() => {})));

    const outcome = await gateway.create(BODY, { timeoutMs: 20 });

    expect(outcome).toEqual({
      kind: "error",
      message: "Calendar create timed out after 20ms",
      timedOut: true,
    });
  });

  it("turns a slow call into a timed-out error", async () => {
    const api = createEventsApi({ delete: () => new Promise<unknown>(() => {}) });
    const log = vi.fn();
    const gateway = new GoogleCalendarGateway(new CalendarConnection(async () => api), { log });

    const outcome = await gateway.delete("gcal_1", { timeoutMs: 10 });

    expect(outcome).toEqual({
      kind: "error",
      message: "Calendar delete timed out after 10ms",
      timedOut: true,
    });
    expect(log).toHaveBeenCalledWith("Calendar delete timed out after 10ms");
  });

  it("turns an api failure into an error outcome", async () => {
    const api = createEventsApi({
      insert: async () => {
        throw new Error("Rate limit exceeded");
      },
    });
    const gateway = new GoogleCalendarGateway(new CalendarConnection(async () => api));

    const outcome = await gateway.create(BODY, CALL);

    expect(outcome).toEqual({
      kind: "error",
      message: "Calendar create failed: Rate limit exceeded",
      timedOut: false,
    });
  });

  it("reset lets an unconfigured connection be retried", async () => {
    let attempts = 0;
    const api = createEventsApi();
    const gateway = new GoogleCalendarGateway(
      new CalendarConnection(async () => {
        attempts++;
        if (attempts === 1) throw new CalendarUnavailableError("offline");
        return api;
      })
    );

    expect((await gateway.create(BODY, CALL)).kind).toBe("unavailable");
    expect((await gateway.create(BODY, CALL)).kind).toBe("unavailable");
    gateway.reset();
    expect((await gateway.create(BODY, CALL)).kind).toBe("ok");
    expect(attempts).toBe(2);
  });
});

describe("toExternalEvent", () => {
  it("falls back to all-day dates", () => {
    const event = toExternalEvent({ id: "x", start: { date: "2026-03-10" }, end: { date: "2026-03-11" } });

    expect(event.start).toBe("2026-03-10");
    expect(event.end).toBe("2026-03-11");
  });

  it("rejects an event without an id", () => {
    expect(() => toExternalEvent({ summary: "No id" })).toThrow("Calendar response is missing an event id");
  });
});
