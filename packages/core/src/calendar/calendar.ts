/**
 * Event Calendar
 *
 * What request handlers talk to: stores templates, reports conflicts next to
 * the stored result, lists occurrences and exports them. Conflicts never stop
 * a mutation.
 */

import { silentLogger, type CoreLogger } from '../logger.js'
import { formatTimestamp } from '../dates.js'
import { findConflicts } from './conflicts.js'
import { toICalendar } from './ical.js'
import { listEvents } from './query.js'
import { DEFAULT_HORIZON_DAYS } from './recurrence.js'
import { EventStore } from './store.js'
import type {
  Conflict,
  CreateEventInput,
  EventFilter,
  EventTemplate,
  Occurrence,
  RosterProvider,
  UpdateEventInput,
} from './types.js'

export interface EventCalendarOptions {
  roster: RosterProvider
  /** Bound for recurring events without an explicit end (days) */
  horizonDays?: number
  /** X-WR-CALNAME of exported calendars */
  calendarName?: string
  logger?: CoreLogger
  /** Clock used for export timestamps */
  now?: () => Date
}

export interface MutationResult {
  event: EventTemplate
  conflicts: Conflict[]
  hasConflicts: boolean
}

/**
 * Update result; conflicts are only present when start or end changed
 */
export interface UpdateResult {
  event: EventTemplate
  conflicts?: Conflict[]
  hasConflicts?: boolean
}

export class EventCalendar {
  readonly store: EventStore
  private roster: RosterProvider
  private horizonDays: number
  private calendarName: string
  private logger: CoreLogger
  private now: () => Date

  constructor(options: EventCalendarOptions) {
    this.roster = options.roster
    this.store = new EventStore(options.roster)
    this.horizonDays = options.horizonDays ?? DEFAULT_HORIZON_DAYS
    this.calendarName = options.calendarName ?? 'School Activities'
    this.logger = options.logger ?? silentLogger()
    this.now = options.now ?? (() => new Date())
  }

  private conflictsFor(event: EventTemplate): Conflict[] {
    const conflicts = findConflicts(
      this.store.list(),
      { start: event.start, end: event.end, room: event.room },
      event.id,
    )

    if (conflicts.length > 0) {
      this.logger.info(
        `[Calendar] Event ${event.id} (${formatTimestamp(event.start)}) overlaps ${conflicts
          .map((c) => c.eventId)
          .join(', ')}`,
      )
    }

    return conflicts
  }

  createEvent(input: CreateEventInput): MutationResult {
    const event = this.store.create(input)
    this.logger.info(`[Calendar] Created event ${event.id} "${event.title}" for ${event.activityName}`)

    const conflicts = this.conflictsFor(event)
    return { event, conflicts, hasConflicts: conflicts.length > 0 }
  }

  getEvent(id: number): EventTemplate {
    return this.store.get(id)
  }

  updateEvent(id: number, updates: UpdateEventInput): UpdateResult {
    const event = this.store.update(id, updates)
    this.logger.info(`[Calendar] Updated event ${id}`)

    if (updates.start === undefined && updates.end === undefined) {
      return { event }
    }

    const conflicts = this.conflictsFor(event)
    return { event, conflicts, hasConflicts: conflicts.length > 0 }
  }

  deleteEvent(id: number): void {
    this.store.delete(id)
    this.logger.info(`[Calendar] Deleted event ${id}`)
  }

  cancelDate(id: number, date: string): EventTemplate {
    const event = this.store.cancelDate(id, date)
    this.logger.info(`[Calendar] Cancelled event ${id} on ${date}`)
    return event
  }

  listEvents(filter: EventFilter = {}): Occurrence[] {
    return listEvents(this.store.list(), this.roster, filter, { horizonDays: this.horizonDays })
  }

  /**
   * Filtered occurrences as an iCalendar document
   */
  exportCalendar(filter: EventFilter = {}): string {
    const occurrences = this.listEvents(filter)
    this.logger.debug(`[Calendar] Exporting ${occurrences.length} occurrences`)
    return toICalendar(occurrences, { calendarName: this.calendarName, now: this.now() })
  }
}
