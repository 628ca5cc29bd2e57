/**
 * Recurrence Expansion
 *
 * Turns a template into its concrete occurrences. Pure: nothing is cached
 * between calls, and every recurring template is bounded, either by its
 * recurrenceEnd or by the horizon.
 */

import { addDays, addMonths, dayOfMonth, toCalendarDate } from '../dates.js'
import type { EventTemplate, ExpandOptions, Occurrence } from './types.js'

export const DEFAULT_HORIZON_DAYS = 365

const STEP_DAYS = { daily: 1, weekly: 7 } as const

/**
 * Last instant a recurring template may produce an occurrence at
 */
export function recurrenceBound(template: EventTemplate, horizonDays = DEFAULT_HORIZON_DAYS): Date {
  return template.recurrenceEnd ?? addDays(template.start, horizonDays)
}

/**
 * Start instants of every occurrence up to `bound`, before cancellations.
 *
 * Monthly steps are taken from the template start (start + k months) so the
 * day-of-month never drifts; a month without that day yields nothing.
 */
function occurrenceStarts(template: EventTemplate, bound: Date, until?: Date): Date[] {
  const starts: Date[] = []
  const limit = until && until.getTime() < bound.getTime() ? until : bound

  if (template.recurrence === 'monthly') {
    const anchorDay = dayOfMonth(template.start)
    for (let k = 0; ; k++) {
      const current = addMonths(template.start, k)
      if (current.getTime() > limit.getTime()) break
      if (dayOfMonth(current) === anchorDay) starts.push(current)
    }
    return starts
  }

  if (template.recurrence) {
    const step = STEP_DAYS[template.recurrence]
    for (let k = 0; ; k++) {
      const current = addDays(template.start, k * step)
      if (current.getTime() > limit.getTime()) break
      starts.push(current)
    }
  }

  return starts
}

function toOccurrence(template: EventTemplate, start: Date, durationMs: number): Occurrence {
  const { id, ...fields } = template
  return {
    ...fields,
    cancellationDates: [...template.cancellationDates],
    eventId: id,
    start,
    end: new Date(start.getTime() + durationMs),
    occurrenceDate: toCalendarDate(start),
  }
}

function overlapsWindow(occurrence: Occurrence, windowStart?: Date, windowEnd?: Date): boolean {
  if (windowStart && occurrence.end.getTime() < windowStart.getTime()) return false
  if (windowEnd && occurrence.start.getTime() > windowEnd.getTime()) return false
  return true
}

/**
 * Materialize a template's occurrences, optionally restricted to those that
 * overlap [windowStart, windowEnd].
 */
export function expand(
  template: EventTemplate,
  windowStart?: Date,
  windowEnd?: Date,
  options: ExpandOptions = {},
): Occurrence[] {
  const durationMs = template.end.getTime() - template.start.getTime()

  if (!template.recurrence) {
    const single = toOccurrence(template, template.start, durationMs)
    return overlapsWindow(single, windowStart, windowEnd) ? [single] : []
  }

  const bound = recurrenceBound(template, options.horizonDays)
  const cancelled = new Set(template.cancellationDates)

  return occurrenceStarts(template, bound, windowEnd)
    .filter((start) => !cancelled.has(toCalendarDate(start)))
    .map((start) => toOccurrence(template, start, durationMs))
    .filter((occurrence) => overlapsWindow(occurrence, windowStart, windowEnd))
}
