/**
 * Date Helpers
 *
 * Timestamps are naive: an ISO-8601 string without an offset is read as wall
 * clock time and held in a Date pinned to UTC, so arithmetic never crosses a
 * DST boundary. Strings carrying an offset are converted to that same clock.
 */

import { DateTime } from 'luxon'
import { invalidFormat } from './errors.js'

const CALENDAR_DATE_FORMAT = 'yyyy-MM-dd'
const TIMESTAMP_FORMAT = "yyyy-MM-dd'T'HH:mm:ss"
const ICAL_UTC_FORMAT = "yyyyMMdd'T'HHmmss'Z'"

// luxon also takes bare times and bare years; a timestamp must carry a full date
const LEADING_CALENDAR_DATE = /^\d{4}-\d{2}-\d{2}(?:$|[T ])/

function utc(date: Date): DateTime {
  return DateTime.fromJSDate(date, { zone: 'utc' })
}

/**
 * Parse an ISO-8601 timestamp (or bare date, read as midnight). A bare time
 * or year is rejected.
 */
export function parseTimestamp(value: string, field = 'timestamp'): Date {
  const trimmed = value.trim()
  const parsed = LEADING_CALENDAR_DATE.test(trimmed)
    ? DateTime.fromISO(trimmed, { zone: 'utc' })
    : DateTime.invalid('missing calendar date')
  if (!parsed.isValid) {
    throw invalidFormat(`Invalid ${field} "${value}". Use ISO-8601, e.g. 2024-12-06T15:30:00`)
  }
  return parsed.toJSDate()
}

/**
 * Validate a YYYY-MM-DD calendar date and return it normalised
 */
export function parseCalendarDate(value: string): string {
  const parsed = DateTime.fromFormat(value.trim(), CALENDAR_DATE_FORMAT, { zone: 'utc' })
  if (!parsed.isValid) {
    throw invalidFormat('Invalid date format. Use YYYY-MM-DD')
  }
  return parsed.toFormat(CALENDAR_DATE_FORMAT)
}

export function formatTimestamp(date: Date): string {
  return utc(date).toFormat(TIMESTAMP_FORMAT)
}

/** The calendar date a timestamp falls on */
export function toCalendarDate(date: Date): string {
  return utc(date).toFormat(CALENDAR_DATE_FORMAT)
}

export function formatICalUtc(date: Date): string {
  return utc(date).toFormat(ICAL_UTC_FORMAT)
}

export function addDays(date: Date, days: number): Date {
  return utc(date).plus({ days }).toJSDate()
}

export function addMonths(date: Date, months: number): Date {
  return utc(date).plus({ months }).toJSDate()
}

export function dayOfMonth(date: Date): number {
  return utc(date).day
}
