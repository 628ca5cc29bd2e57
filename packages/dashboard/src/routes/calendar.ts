/**
 * Calendar API Routes
 *
 * REST API over the in-memory EventCalendar: template CRUD, per-date
 * cancellation, occurrence listing and iCalendar export. Overlaps are
 * reported next to the stored event and never reject a request.
 */

import type { FastifyInstance } from "fastify";
import {
  parseTimestamp,
  type CreateEventInput,
  type EventFilter,
  type Recurrence,
  type UpdateEventInput,
} from "@activity-hub/core";
import {
  cancelDateQuerySchema,
  createEventSchema,
  eventParamsSchema,
  exportQuerySchema,
  listEventsQuerySchema,
  updateEventSchema,
  type CreateEventBody,
  type UpdateEventBody,
} from "../schemas.js";
import {
  toConflictResponse,
  toEventResponse,
  toOccurrenceResponse,
} from "../serializers.js";

type WireRecurrence = Recurrence | "none";

function toRecurrence(
  value: WireRecurrence | null | undefined,
): Recurrence | undefined {
  return value && value !== "none" ? value : undefined;
}

function optionalTimestamp(
  value: string | null | undefined,
  field: string,
): Date | undefined {
  return value ? parseTimestamp(value, field) : undefined;
}

function toCreateInput(body: CreateEventBody): CreateEventInput {
  return {
    title: body.title,
    activityName: body.activity_name,
    description: body.description ?? undefined,
    room: body.room ?? undefined,
    color: body.color ?? undefined,
    start: parseTimestamp(body.start, "start"),
    end: parseTimestamp(body.end, "end"),
    recurrence: toRecurrence(body.recurrence),
    recurrenceEnd: optionalTimestamp(body.recurrence_end, "recurrence_end"),
  };
}

/**
 * Only fields present in the body end up in the update
 */
function toUpdateInput(body: UpdateEventBody): UpdateEventInput {
  const updates: UpdateEventInput = {};
  if (body.title != null) updates.title = body.title;
  if (body.activity_name != null) updates.activityName = body.activity_name;
  if (body.description != null) updates.description = body.description;
  if (body.room != null) updates.room = body.room;
  if (body.color != null) updates.color = body.color;
  if (body.start != null) updates.start = parseTimestamp(body.start, "start");
  if (body.end != null) updates.end = parseTimestamp(body.end, "end");
  if (body.recurrence === "none") updates.recurrence = null;
  else if (body.recurrence != null) updates.recurrence = body.recurrence;
  if (body.recurrence_end != null) {
    updates.recurrenceEnd = parseTimestamp(
      body.recurrence_end,
      "recurrence_end",
    );
  }
  if (body.is_cancelled != null) updates.isCancelled = body.is_cancelled;
  return updates;
}

/**
 * Register calendar routes
 */
export async function registerCalendarRoutes(
  fastify: FastifyInstance,
): Promise<void> {
  /**
   * POST /calendar/events
   *
   * Create an event template; the response lists any overlapping events
   */
  fastify.post("/calendar/events", async (request) => {
    const body = createEventSchema.parse(request.body);
    const result = fastify.calendar.createEvent(toCreateInput(body));

    return {
      event: toEventResponse(result.event),
      conflicts: result.conflicts.map(toConflictResponse),
      has_conflicts: result.hasConflicts,
    };
  });

  /**
   * GET /calendar/events
   *
   * Expanded occurrences.
   * Query params:
   *   - start, end: keep occurrences overlapping this range
   *   - activity: activity name
   *   - email: only activities this participant is signed up for
   */
  fastify.get("/calendar/events", async (request) => {
    const { start, end, activity, email } = listEventsQuerySchema.parse(
      request.query,
    );

    const filter: EventFilter = {
      start: optionalTimestamp(start, "start"),
      end: optionalTimestamp(end, "end"),
      activity,
      email,
    };
    const events = fastify.calendar
      .listEvents(filter)
      .map(toOccurrenceResponse);

    return { events, count: events.length };
  });

  /**
   * GET /calendar/events/:id
   *
   * The stored template, not expanded
   */
  fastify.get("/calendar/events/:id", async (request) => {
    const { id } = eventParamsSchema.parse(request.params);
    return toEventResponse(fastify.calendar.getEvent(id));
  });

  /**
   * PUT /calendar/events/:id
   *
   * Partial update. Conflicts are only checked (and returned) when start or
   * end changed.
   */
  fastify.put("/calendar/events/:id", async (request) => {
    const { id } = eventParamsSchema.parse(request.params);
    const body = updateEventSchema.parse(request.body ?? {});
    const result = fastify.calendar.updateEvent(id, toUpdateInput(body));

    if (result.conflicts === undefined) {
      return toEventResponse(result.event);
    }

    return {
      event: toEventResponse(result.event),
      conflicts: result.conflicts.map(toConflictResponse),
      has_conflicts: result.hasConflicts ?? result.conflicts.length > 0,
    };
  });

  /**
   * DELETE /calendar/events/:id
   */
  fastify.delete("/calendar/events/:id", async (request) => {
    const { id } = eventParamsSchema.parse(request.params);
    fastify.calendar.deleteEvent(id);
    return { message: `Event ${id} deleted` };
  });

  /**
   * POST /calendar/events/:id/cancel-date?date_str=YYYY-MM-DD
   *
   * Skip one occurrence of a recurring event
   */
  fastify.post("/calendar/events/:id/cancel-date", async (request) => {
    const { id } = eventParamsSchema.parse(request.params);
    const { date_str } = cancelDateQuerySchema.parse(request.query);
    const event = fastify.calendar.cancelDate(id, date_str);

    return {
      message: `Event ${id} cancelled on ${date_str}`,
      event: toEventResponse(event),
    };
  });

  /**
   * GET /calendar/export
   *
   * Filtered occurrences as a downloadable .ics file
   */
  fastify.get("/calendar/export", async (request, reply) => {
    const { activity, email } = exportQuerySchema.parse(request.query);
    const ics = fastify.calendar.exportCalendar({ activity, email });

    return reply
      .type("text/calendar; charset=utf-8")
      .header("Content-Disposition", 'attachment; filename="activities.ics"')
      .send(ics);
  });
}
