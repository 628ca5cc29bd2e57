/**
 * iCalendar Export
 *
 * Serializes occurrences as an RFC 5545 VCALENDAR. Each occurrence becomes its
 * own VEVENT (no RRULE), so a subscriber sees exactly what the listing shows.
 */

import { formatICalUtc } from '../dates.js'
import type { Occurrence } from './types.js'

export interface ICalOptions {
  /** X-WR-CALNAME value */
  calendarName?: string

  /** DTSTAMP for every VEVENT (default: now) */
  now?: Date
}

const PRODID = '-//activity-hub//calendar//EN'

/**
 * Escape text for iCalendar format
 */
export function escapeICalText(text: string): string {
  return text
    .replace(/\\/g, '\\\\')
    .replace(/;/g, '\\;')
    .replace(/,/g, '\\,')
    .replace(/\r?\n/g, '\\n')
}

/**
 * Stable per-occurrence UID: template id plus the occurrence's start date
 */
export function occurrenceUid(occurrence: Occurrence): string {
  return `${occurrence.eventId}-${occurrence.occurrenceDate.replace(/-/g, '')}@activity-hub`
}

function veventLines(occurrence: Occurrence, stamp: string): string[] {
  const lines = [
    'BEGIN:VEVENT',
    `UID:${occurrenceUid(occurrence)}`,
    `DTSTAMP:${stamp}`,
    `DTSTART:${formatICalUtc(occurrence.start)}`,
    `DTEND:${formatICalUtc(occurrence.end)}`,
    `SUMMARY:${escapeICalText(occurrence.title)}`,
  ]

  if (occurrence.description) {
    lines.push(`DESCRIPTION:${escapeICalText(occurrence.description)}`)
  }

  if (occurrence.room) {
    lines.push(`LOCATION:${escapeICalText(occurrence.room)}`)
  }

  lines.push(`CATEGORIES:${escapeICalText(occurrence.activityName)}`)
  lines.push('END:VEVENT')

  return lines
}

export function toICalendar(occurrences: Occurrence[], options: ICalOptions = {}): string {
  const stamp = formatICalUtc(options.now ?? new Date())
  const lines = ['BEGIN:VCALENDAR', 'VERSION:2.0', `PRODID:${PRODID}`, 'CALSCALE:GREGORIAN']

  if (options.calendarName) {
    lines.push(`X-WR-CALNAME:${escapeICalText(options.calendarName)}`)
  }

  for (const occurrence of occurrences) {
    lines.push(...veventLines(occurrence, stamp))
  }

  lines.push('END:VCALENDAR')

  return lines.join('\r\n') + '\r\n'
}
