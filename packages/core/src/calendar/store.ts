/**
 * Event Store
 *
 * Owns every event template. All methods are synchronous, so the template map
 * and the id counter only ever have one writer on the event loop.
 */

import { invalidRange, invalidState, notFound } from '../errors.js'
import { parseCalendarDate } from '../dates.js'
import type {
  CreateEventInput,
  EventTemplate,
  RosterProvider,
  UpdateEventInput,
} from './types.js'

function snapshot(template: EventTemplate): EventTemplate {
  return { ...template, cancellationDates: [...template.cancellationDates] }
}

function assertRange(start: Date, end: Date): void {
  if (end.getTime() <= start.getTime()) {
    throw invalidRange('End time must be after start time')
  }
}

export class EventStore {
  private templates = new Map<number, EventTemplate>()
  private nextId = 1
  private roster: RosterProvider

  constructor(roster: RosterProvider) {
    this.roster = roster
  }

  private assertActivity(name: string): void {
    if (!this.roster.activityExists(name)) {
      throw notFound(`Activity not found: ${name}`)
    }
  }

  private require(id: number): EventTemplate {
    const template = this.templates.get(id)
    if (!template) {
      throw notFound(`Event not found: ${id}`)
    }
    return template
  }

  create(input: CreateEventInput): EventTemplate {
    this.assertActivity(input.activityName)
    assertRange(input.start, input.end)

    const template: EventTemplate = {
      ...input,
      id: this.nextId++,
      isCancelled: false,
      cancellationDates: [],
    }
    this.templates.set(template.id, template)

    return snapshot(template)
  }

  get(id: number): EventTemplate {
    return snapshot(this.require(id))
  }

  /**
   * All templates in id order
   */
  list(): EventTemplate[] {
    return Array.from(this.templates.values(), snapshot)
  }

  get size(): number {
    return this.templates.size
  }

  /**
   * Apply the fields present in `updates`. The template is only replaced once
   * the merged result validates.
   */
  update(id: number, updates: UpdateEventInput): EventTemplate {
    const current = this.require(id)
    const next: EventTemplate = { ...current }

    if (updates.title !== undefined) next.title = updates.title
    if (updates.activityName !== undefined) {
      this.assertActivity(updates.activityName)
      next.activityName = updates.activityName
    }
    if (updates.description !== undefined) next.description = updates.description
    if (updates.room !== undefined) next.room = updates.room
    if (updates.color !== undefined) next.color = updates.color
    if (updates.start !== undefined) next.start = updates.start
    if (updates.end !== undefined) next.end = updates.end
    if (updates.recurrence === null) {
      delete next.recurrence
    } else if (updates.recurrence !== undefined) {
      next.recurrence = updates.recurrence
    }
    if (updates.recurrenceEnd !== undefined) next.recurrenceEnd = updates.recurrenceEnd
    if (updates.isCancelled !== undefined) next.isCancelled = updates.isCancelled

    if (updates.start !== undefined || updates.end !== undefined) {
      assertRange(next.start, next.end)
    }

    this.templates.set(id, next)
    return snapshot(next)
  }

  delete(id: number): void {
    this.require(id)
    this.templates.delete(id)
  }

  /**
   * Suppress a recurring template's occurrence on one date. Repeating a
   * cancelled date is a no-op.
   */
  cancelDate(id: number, date: string): EventTemplate {
    const template = this.require(id)
    if (!template.recurrence) {
      throw invalidState('Can only cancel specific dates for recurring events')
    }

    const normalised = parseCalendarDate(date)
    if (!template.cancellationDates.includes(normalised)) {
      template.cancellationDates.push(normalised)
    }

    return snapshot(template)
  }
}
