/**
 * Attendance Tracker
 *
 * Per activity, per session date, per participant status. Independent of the
 * calendar; shares only the roster.
 */

import { DateTime } from 'luxon'
import { ActivityHubError, invalidState, notFound } from '../errors.js'
import { parseCalendarDate } from '../dates.js'
import { silentLogger, type CoreLogger } from '../logger.js'
import type { ActivityRoster } from '../activities/roster.js'
import type {
  AttendanceEntry,
  AttendanceStats,
  AttendanceStatus,
  StudentAttendance,
} from './types.js'

export interface AttendanceTrackerOptions {
  roster: ActivityRoster
  logger?: CoreLogger
  /** Today's date as YYYY-MM-DD; later dates cannot be marked */
  today?: () => string
}

type SessionRecords = Map<string, AttendanceStatus>

function toEntries(records: SessionRecords): AttendanceEntry[] {
  return Array.from(records, ([email, status]) => ({ email, status }))
}

function percentage(part: number, total: number): number {
  if (total === 0) return 0
  return Math.round((part / total) * 100 * 100) / 100
}

export class AttendanceTracker {
  private records = new Map<string, Map<string, SessionRecords>>()
  private roster: ActivityRoster
  private logger: CoreLogger
  private today: () => string

  constructor(options: AttendanceTrackerOptions) {
    this.roster = options.roster
    this.logger = options.logger ?? silentLogger()
    this.today = options.today ?? (() => DateTime.local().toFormat('yyyy-MM-dd'))
  }

  private assertActivity(name: string): void {
    if (!this.roster.activityExists(name)) {
      throw notFound('Activity not found')
    }
  }

  private sessions(activity: string): Map<string, SessionRecords> {
    let sessions = this.records.get(activity)
    if (!sessions) {
      sessions = new Map()
      this.records.set(activity, sessions)
    }
    return sessions
  }

  /**
   * Record statuses for one session. Every email is checked against the
   * roster before anything is written.
   *
   * @returns number of records written
   */
  mark(activity: string, date: string, entries: AttendanceEntry[]): number {
    this.assertActivity(activity)
    const sessionDate = parseCalendarDate(date)

    if (sessionDate > this.today()) {
      throw invalidState('Cannot mark attendance for future dates')
    }

    for (const entry of entries) {
      if (!this.roster.isParticipant(activity, entry.email)) {
        throw new ActivityHubError(
          'NotRegistered',
          `Student ${entry.email} is not registered for ${activity}`,
        )
      }
    }

    if (entries.length === 0) return 0

    const sessions = this.sessions(activity)
    const session = sessions.get(sessionDate) ?? new Map<string, AttendanceStatus>()
    for (const entry of entries) {
      session.set(entry.email, entry.status)
    }
    sessions.set(sessionDate, session)

    this.logger.info(`[Attendance] ${activity} ${sessionDate}: ${entries.length} records`)
    return entries.length
  }

  forDate(activity: string, date: string): AttendanceEntry[] {
    this.assertActivity(activity)
    const session = this.records.get(activity)?.get(date)
    return session ? toEntries(session) : []
  }

  /**
   * Every recorded session, keyed by date (ascending)
   */
  all(activity: string): Record<string, AttendanceEntry[]> {
    this.assertActivity(activity)
    const sessions = this.records.get(activity) ?? new Map<string, SessionRecords>()
    const result: Record<string, AttendanceEntry[]> = {}
    for (const date of Array.from(sessions.keys()).sort()) {
      const session = sessions.get(date)
      if (session) result[date] = toEntries(session)
    }
    return result
  }

  /**
   * Totals for each current participant. Excused absences count as attended.
   */
  stats(activity: string): AttendanceStats[] {
    this.assertActivity(activity)
    const sessions = Array.from(this.records.get(activity)?.values() ?? [])

    return Array.from(this.roster.participantsOf(activity), (email) => {
      const counts = { present: 0, absent: 0, excused: 0 }
      for (const session of sessions) {
        const status = session.get(email)
        if (status) counts[status]++
      }
      const totalSessions = counts.present + counts.absent + counts.excused

      return {
        email,
        totalSessions,
        ...counts,
        attendancePercentage: percentage(counts.present + counts.excused, totalSessions),
      }
    })
  }

  /**
   * Records for one student across the activities they are signed up for.
   * Activities without any record for the student are omitted.
   */
  forStudent(email: string): StudentAttendance {
    const result: StudentAttendance = {}

    for (const activity of this.roster.activitiesFor(email)) {
      const byDate: Record<string, AttendanceStatus> = {}
      const sessions = this.records.get(activity) ?? new Map<string, SessionRecords>()
      for (const date of Array.from(sessions.keys()).sort()) {
        const status = sessions.get(date)?.get(email)
        if (status) byDate[date] = status
      }
      if (Object.keys(byDate).length > 0) result[activity] = byDate
    }

    return result
  }
}
