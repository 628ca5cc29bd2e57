/**
 * Response Serializers
 *
 * Convert core records to the snake_case wire format. Timestamps are written
 * naive (no offset), the same way they are accepted.
 */

import {
  formatTimestamp,
  type AttendanceStats,
  type Conflict,
  type EventTemplate,
  type Occurrence,
} from "@activity-hub/core";

export interface EventResponse {
  id: number;
  title: string;
  activity_name: string;
  description: string | null;
  start: string;
  end: string;
  room: string | null;
  color: string | null;
  recurrence: string | null;
  recurrence_end: string | null;
  is_cancelled: boolean;
  cancellation_dates: string[];
}

export interface OccurrenceResponse extends EventResponse {
  occurrence_date: string;
}

export interface ConflictResponse {
  event_id: number;
  title: string;
  room: string | null;
  start: string;
  end: string;
}

export function toEventResponse(event: EventTemplate): EventResponse {
  return {
    id: event.id,
    title: event.title,
    activity_name: event.activityName,
    description: event.description ?? null,
    start: formatTimestamp(event.start),
    end: formatTimestamp(event.end),
    room: event.room ?? null,
    color: event.color ?? null,
    recurrence: event.recurrence ?? null,
    recurrence_end: event.recurrenceEnd
      ? formatTimestamp(event.recurrenceEnd)
      : null,
    is_cancelled: event.isCancelled,
    cancellation_dates: [...event.cancellationDates].sort(),
  };
}

export function toOccurrenceResponse(
  occurrence: Occurrence,
): OccurrenceResponse {
  const { eventId, occurrenceDate, ...fields } = occurrence;
  return {
    ...toEventResponse({ ...fields, id: eventId }),
    occurrence_date: occurrenceDate,
  };
}

export function toConflictResponse(conflict: Conflict): ConflictResponse {
  return {
    event_id: conflict.eventId,
    title: conflict.title,
    room: conflict.room ?? null,
    start: formatTimestamp(conflict.start),
    end: formatTimestamp(conflict.end),
  };
}

export function toStatsResponse(stats: AttendanceStats) {
  return {
    email: stats.email,
    total_sessions: stats.totalSessions,
    present: stats.present,
    absent: stats.absent,
    excused: stats.excused,
    attendance_percentage: stats.attendancePercentage,
  };
}
