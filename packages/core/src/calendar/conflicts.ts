/**
 * Conflict Detection
 *
 * Compares a candidate time range against every other template's nominal
 * start/end. Recurring templates are not expanded here, so a later occurrence
 * of a weekly event is only caught when its first occurrence overlaps.
 * Per-date cancellations are likewise ignored; only isCancelled is honoured.
 */

import type { Conflict, ConflictCandidate, EventTemplate } from './types.js'

/**
 * Half-open overlap: ranges that merely touch do not overlap
 */
export function rangesOverlap(aStart: Date, aEnd: Date, bStart: Date, bEnd: Date): boolean {
  return aStart.getTime() < bEnd.getTime() && aEnd.getTime() > bStart.getTime()
}

/**
 * With a room, only same-room overlaps count. Without one, any overlapping
 * event is reported.
 */
export function findConflicts(
  templates: Iterable<EventTemplate>,
  candidate: ConflictCandidate,
  excludeId?: number,
): Conflict[] {
  const conflicts: Conflict[] = []

  for (const other of templates) {
    if (other.id === excludeId || other.isCancelled) continue
    if (!rangesOverlap(candidate.start, candidate.end, other.start, other.end)) continue
    if (candidate.room !== undefined && other.room !== candidate.room) continue

    conflicts.push({
      eventId: other.id,
      title: other.title,
      room: other.room,
      start: other.start,
      end: other.end,
    })
  }

  return conflicts
}
