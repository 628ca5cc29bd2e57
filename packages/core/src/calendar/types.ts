/**
 * Calendar Types
 *
 * Templates are what the store holds; occurrences are derived from them on
 * every query and never stored.
 */

/**
 * Recurrence period. 'monthly' repeats on the template's day-of-month.
 */
export type Recurrence = 'daily' | 'weekly' | 'monthly'

/**
 * Stored calendar entry definition, possibly recurring.
 */
export interface EventTemplate {
  /** Sequential id, starting at 1, never reused */
  id: number

  title: string

  /** Roster activity this event belongs to */
  activityName: string

  description?: string

  room?: string

  /** Display color (free-form, e.g. "#89b4fa") */
  color?: string

  start: Date

  end: Date

  /** Absent for one-off events */
  recurrence?: Recurrence

  /** Last instant an occurrence may start at. Defaults to start + horizon when absent */
  recurrenceEnd?: Date

  /** Whole-template cancellation; distinct from cancellationDates */
  isCancelled: boolean

  /** YYYY-MM-DD dates on which a recurring template produces nothing */
  cancellationDates: string[]
}

/**
 * Input for creating a template (id and cancellation state are assigned)
 */
export type CreateEventInput = Omit<EventTemplate, 'id' | 'isCancelled' | 'cancellationDates'>

/**
 * Partial update. `recurrence: null` clears the recurrence; any other absent
 * field is left untouched.
 */
export type UpdateEventInput = Partial<
  Omit<EventTemplate, 'id' | 'cancellationDates' | 'recurrence'>
> & {
  recurrence?: Recurrence | null
}

/**
 * One concrete instance of a template
 */
export interface Occurrence extends Omit<EventTemplate, 'id'> {
  /** Template this occurrence was expanded from */
  eventId: number

  /** YYYY-MM-DD of the occurrence start */
  occurrenceDate: string
}

/**
 * A reported overlap with another template. Advisory only.
 */
export interface Conflict {
  eventId: number
  title: string
  room?: string
  start: Date
  end: Date
}

export interface ConflictCandidate {
  start: Date
  end: Date
  room?: string
}

export interface EventFilter {
  /** Keep occurrences ending at or after this instant */
  start?: Date

  /** Keep occurrences starting at or before this instant */
  end?: Date

  activity?: string

  /** Keep only activities this participant is signed up for */
  email?: string
}

export interface ExpandOptions {
  /** Bound for recurring templates without recurrenceEnd (default 365) */
  horizonDays?: number
}

/**
 * What the calendar needs from the activity subsystem
 */
export interface RosterProvider {
  activityExists(name: string): boolean
  participantsOf(name: string): ReadonlySet<string>
}
