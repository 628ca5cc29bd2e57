/**
 * Integration Tests — Calendar API
 *
 * Drives the Fastify routes in-process through inject():
 * - create / read / update / delete with conflict reporting
 * - per-date cancellation and filtered listing
 * - iCalendar export
 * - error mapping (404 / 400 with an error kind)
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import type { FastifyInstance } from "fastify";
import type { Activity } from "@activity-hub/core";
import { createServer } from "../src/server.js";

// -------------------------------------------------------------------
// Helpers
// -------------------------------------------------------------------

const activities: Activity[] = [
  {
    name: "Chess Club",
    description: "Strategy",
    schedule: "Fridays, 3:30 PM - 5:00 PM",
    maxParticipants: 12,
    participants: ["michael@example.edu", "daniel@example.edu"],
  },
  {
    name: "Math Club",
    description: "Problems",
    schedule: "Tuesdays, 3:30 PM - 4:30 PM",
    maxParticipants: 10,
    participants: ["james@example.edu"],
  },
  {
    name: "Programming Class",
    description: "Code",
    schedule: "Tuesdays and Thursdays, 3:30 PM - 4:30 PM",
    maxParticipants: 20,
    participants: ["emma@example.edu"],
  },
];

const chessMeeting = {
  title: "Chess Club Meeting",
  activity_name: "Chess Club",
  description: "Weekly chess practice",
  start: "2024-12-06T15:30:00",
  end: "2024-12-06T17:00:00",
  room: "Room 101",
};

const mathClub = {
  title: "Math Club",
  activity_name: "Math Club",
  description: "Math practice",
  start: "2024-12-06T16:00:00",
  end: "2024-12-06T17:30:00",
  room: "Room 101",
};

const programmingClass = {
  title: "Programming Class",
  activity_name: "Programming Class",
  description: "Learn programming fundamentals",
  start: "2024-12-03T15:30:00",
  end: "2024-12-03T16:30:00",
  recurrence: "weekly",
  recurrence_end: "2024-12-31T16:30:00",
  room: "Computer Lab",
};

let server: FastifyInstance;

async function createEvent(payload: Record<string, unknown>) {
  return server.inject({ method: "POST", url: "/calendar/events", payload });
}

beforeEach(async () => {
  server = await createServer({
    activities,
    logging: false,
    now: () => new Date("2024-12-01T12:00:00Z"),
  });
});

afterEach(async () => {
  await server.close();
});

// -------------------------------------------------------------------
// 1. Create + conflicts
// -------------------------------------------------------------------

describe("POST /calendar/events", () => {
  it("stores the template and reports no conflicts for a free slot", async () => {
    const response = await createEvent(chessMeeting);

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({
      event: {
        id: 1,
        title: "Chess Club Meeting",
        activity_name: "Chess Club",
        description: "Weekly chess practice",
        start: "2024-12-06T15:30:00",
        end: "2024-12-06T17:00:00",
        room: "Room 101",
        color: null,
        recurrence: null,
        recurrence_end: null,
        is_cancelled: false,
        cancellation_dates: [],
      },
      conflicts: [],
      has_conflicts: false,
    });
  });

  it("reports the overlapping event in the same room", async () => {
    await createEvent(chessMeeting);
    const response = await createEvent(mathClub);
    const body = response.json();

    expect(response.statusCode).toBe(200);
    expect(body.event.id).toBe(2);
    expect(body.has_conflicts).toBe(true);
    expect(body.conflicts).toEqual([
      {
        event_id: 1,
        title: "Chess Club Meeting",
        room: "Room 101",
        start: "2024-12-06T15:30:00",
        end: "2024-12-06T17:00:00",
      },
    ]);
  });

  it("does not report an event that ends when the new one starts", async () => {
    await createEvent(chessMeeting);
    const response = await createEvent({
      ...mathClub,
      start: "2024-12-06T17:00:00",
      end: "2024-12-06T18:00:00",
    });

    expect(response.json().has_conflicts).toBe(false);
  });

  it("returns 404 for an unknown activity", async () => {
    const response = await createEvent({ ...chessMeeting, activity_name: "Knitting" });

    expect(response.statusCode).toBe(404);
    expect(response.json().kind).toBe("NotFound");
  });

  it("returns 400 when the end is not after the start", async () => {
    const response = await createEvent({ ...chessMeeting, end: chessMeeting.start });

    expect(response.statusCode).toBe(400);
    expect(response.json().kind).toBe("InvalidRange");
  });

  it("returns 400 for unparseable timestamps and missing fields", async () => {
    const badDate = await createEvent({ ...chessMeeting, start: "next friday" });
    const { title: _title, ...untitled } = chessMeeting;
    const missing = await createEvent(untitled);

    expect(badDate.statusCode).toBe(400);
    expect(badDate.json().kind).toBe("InvalidFormat");
    expect(missing.statusCode).toBe(400);
    expect(missing.json().kind).toBe("InvalidFormat");
  });

  it("returns 400 for a timestamp without a calendar date", async () => {
    const timeOnly = await createEvent({ ...chessMeeting, start: "15:30", end: "16:30" });
    const yearOnly = await createEvent({ ...chessMeeting, start: "2024", end: "2025" });

    expect(timeOnly.statusCode).toBe(400);
    expect(timeOnly.json().kind).toBe("InvalidFormat");
    expect(yearOnly.statusCode).toBe(400);
    expect(yearOnly.json().kind).toBe("InvalidFormat");
  });
});

// -------------------------------------------------------------------
// 2. Read / update / delete
// -------------------------------------------------------------------

describe("single event routes", () => {
  it("returns the raw template, not its occurrences", async () => {
    await createEvent(programmingClass);
    const response = await server.inject({ method: "GET", url: "/calendar/events/1" });

    expect(response.statusCode).toBe(200);
    expect(response.json().recurrence).toBe("weekly");
    expect(response.json().recurrence_end).toBe("2024-12-31T16:30:00");
  });

  it("returns 404 for unknown ids and 400 for non-numeric ones", async () => {
    const missing = await server.inject({ method: "GET", url: "/calendar/events/99" });
    const garbage = await server.inject({ method: "GET", url: "/calendar/events/abc" });

    expect(missing.statusCode).toBe(404);
    expect(garbage.statusCode).toBe(400);
  });

  it("returns only the template when start and end are untouched", async () => {
    await createEvent(chessMeeting);
    const response = await server.inject({
      method: "PUT",
      url: "/calendar/events/1",
      payload: { room: "Room 202", description: "Updated description" },
    });
    const body = response.json();

    expect(response.statusCode).toBe(200);
    expect(body.room).toBe("Room 202");
    expect(body.description).toBe("Updated description");
    expect(body.title).toBe("Chess Club Meeting");
    expect("conflicts" in body).toBe(false);
  });

  it("includes conflicts when the update moves the event", async () => {
    await createEvent(chessMeeting);
    await createEvent({ ...mathClub, start: "2024-12-06T18:00:00", end: "2024-12-06T19:00:00" });

    const response = await server.inject({
      method: "PUT",
      url: "/calendar/events/2",
      payload: { start: "2024-12-06T16:30:00" },
    });
    const body = response.json();

    expect(body.event.start).toBe("2024-12-06T16:30:00");
    expect(body.has_conflicts).toBe(true);
    expect(body.conflicts.map((c: { event_id: number }) => c.event_id)).toEqual([1]);
  });

  it("rejects an update that puts the end before the start", async () => {
    await createEvent(chessMeeting);
    const response = await server.inject({
      method: "PUT",
      url: "/calendar/events/1",
      payload: { end: "2024-12-06T15:00:00" },
    });

    expect(response.statusCode).toBe(400);
    expect(response.json().kind).toBe("InvalidRange");
  });

  it("deletes a template and 404s afterwards", async () => {
    await createEvent(chessMeeting);

    const deleted = await server.inject({ method: "DELETE", url: "/calendar/events/1" });
    const again = await server.inject({ method: "DELETE", url: "/calendar/events/1" });
    const fetched = await server.inject({ method: "GET", url: "/calendar/events/1" });

    expect(deleted.statusCode).toBe(200);
    expect(deleted.json()).toEqual({ message: "Event 1 deleted" });
    expect(again.statusCode).toBe(404);
    expect(fetched.statusCode).toBe(404);
  });
});

// -------------------------------------------------------------------
// 3. Cancellation + listing
// -------------------------------------------------------------------

describe("cancel-date and listing", () => {
  it("drops a cancelled week from the December listing", async () => {
    await createEvent(programmingClass);

    const cancelled = await server.inject({
      method: "POST",
      url: "/calendar/events/1/cancel-date",
      query: { date_str: "2024-12-10" },
    });
    expect(cancelled.statusCode).toBe(200);
    expect(cancelled.json().event.cancellation_dates).toEqual(["2024-12-10"]);

    const response = await server.inject({
      method: "GET",
      url: "/calendar/events",
      query: { start: "2024-12-01", end: "2024-12-31" },
    });
    const body = response.json();

    expect(body.count).toBe(3);
    expect(body.events.map((e: { start: string }) => e.start)).toEqual([
      "2024-12-03T15:30:00",
      "2024-12-17T15:30:00",
      "2024-12-24T15:30:00",
    ]);
    expect(body.events[0].occurrence_date).toBe("2024-12-03");
    expect(body.events[0].id).toBe(1);
  });

  it("treats a repeated cancellation as a no-op", async () => {
    await createEvent(programmingClass);
    for (let i = 0; i < 2; i++) {
      await server.inject({
        method: "POST",
        url: "/calendar/events/1/cancel-date",
        query: { date_str: "2024-12-10" },
      });
    }

    const response = await server.inject({ method: "GET", url: "/calendar/events/1" });
    expect(response.json().cancellation_dates).toEqual(["2024-12-10"]);
  });

  it("rejects cancelling a one-off event or a malformed date", async () => {
    await createEvent(chessMeeting);
    await createEvent(programmingClass);

    const oneOff = await server.inject({
      method: "POST",
      url: "/calendar/events/1/cancel-date",
      query: { date_str: "2024-12-06" },
    });
    const malformed = await server.inject({
      method: "POST",
      url: "/calendar/events/2/cancel-date",
      query: { date_str: "December 10" },
    });
    const missing = await server.inject({
      method: "POST",
      url: "/calendar/events/2/cancel-date",
    });

    expect(oneOff.statusCode).toBe(400);
    expect(oneOff.json().kind).toBe("InvalidState");
    expect(malformed.statusCode).toBe(400);
    expect(malformed.json().kind).toBe("InvalidFormat");
    expect(missing.statusCode).toBe(400);
  });

  it("filters by activity and by participant email", async () => {
    await createEvent(chessMeeting);
    await createEvent(programmingClass);

    const chess = await server.inject({
      method: "GET",
      url: "/calendar/events",
      query: { activity: "Chess Club" },
    });
    const emma = await server.inject({
      method: "GET",
      url: "/calendar/events",
      query: { email: "emma@example.edu" },
    });

    expect(chess.json().count).toBe(1);
    expect(emma.json().count).toBe(5);
    expect(
      new Set(emma.json().events.map((e: { activity_name: string }) => e.activity_name)),
    ).toEqual(new Set(["Programming Class"]));
  });
});

// -------------------------------------------------------------------
// 4. Export
// -------------------------------------------------------------------

describe("GET /calendar/export", () => {
  it("serves an iCalendar attachment", async () => {
    await createEvent(chessMeeting);
    const response = await server.inject({ method: "GET", url: "/calendar/export" });

    expect(response.statusCode).toBe(200);
    expect(response.headers["content-type"]).toBe("text/calendar; charset=utf-8");
    expect(response.headers["content-disposition"]).toBe(
      'attachment; filename="activities.ics"',
    );
    expect(response.payload).toBe(
      [
        "BEGIN:VCALENDAR",
        "VERSION:2.0",
        "PRODID:-//activity-hub//calendar//EN",
        "CALSCALE:GREGORIAN",
        "X-WR-CALNAME:School Activities",
        "BEGIN:VEVENT",
        "UID:1-20241206@activity-hub",
        "DTSTAMP:20241201T120000Z",
        "DTSTART:20241206T153000Z",
        "DTEND:20241206T170000Z",
        "SUMMARY:Chess Club Meeting",
        "DESCRIPTION:Weekly chess practice",
        "LOCATION:Room 101",
        "CATEGORIES:Chess Club",
        "END:VEVENT",
        "END:VCALENDAR",
      ].join("\r\n") + "\r\n",
    );
  });

  it("applies the activity filter", async () => {
    await createEvent(chessMeeting);
    const response = await server.inject({
      method: "GET",
      url: "/calendar/export",
      query: { activity: "Math Club" },
    });

    expect(response.payload.includes("BEGIN:VEVENT")).toBe(false);
  });
});
