/**
 * Calendar System
 *
 * In-memory event templates with recurrence expansion, conflict detection
 * and iCalendar export.
 */

// Types
export type {
  Recurrence,
  EventTemplate,
  CreateEventInput,
  UpdateEventInput,
  Occurrence,
  Conflict,
  ConflictCandidate,
  EventFilter,
  ExpandOptions,
  RosterProvider,
} from './types.js'

// Implementation
export { EventStore } from './store.js'
export { expand, recurrenceBound, DEFAULT_HORIZON_DAYS } from './recurrence.js'
export { findConflicts, rangesOverlap } from './conflicts.js'
export { listEvents } from './query.js'
export { toICalendar, escapeICalText, occurrenceUid } from './ical.js'
export type { ICalOptions } from './ical.js'
export { EventCalendar } from './calendar.js'
export type { EventCalendarOptions, MutationResult, UpdateResult } from './calendar.js'
