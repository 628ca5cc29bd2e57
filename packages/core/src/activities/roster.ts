/**
 * Activity Roster
 *
 * Activity catalogue plus sign-up state. Also serves as the calendar's
 * RosterProvider.
 */

import { ActivityHubError, notFound } from '../errors.js'
import { silentLogger, type CoreLogger } from '../logger.js'
import type { RosterProvider } from '../calendar/types.js'
import type { Activity } from './types.js'

function copy(activity: Activity): Activity {
  return { ...activity, participants: [...activity.participants] }
}

export class ActivityRoster implements RosterProvider {
  private activities = new Map<string, Activity>()
  private logger: CoreLogger

  constructor(activities: Activity[] = [], logger: CoreLogger = silentLogger()) {
    for (const activity of activities) {
      this.activities.set(activity.name, copy(activity))
    }
    this.logger = logger
  }

  private require(name: string): Activity {
    const activity = this.activities.get(name)
    if (!activity) {
      throw notFound('Activity not found')
    }
    return activity
  }

  list(): Activity[] {
    return Array.from(this.activities.values(), copy)
  }

  get(name: string): Activity {
    return copy(this.require(name))
  }

  activityExists(name: string): boolean {
    return this.activities.has(name)
  }

  /**
   * Participants of an activity; empty for unknown activities
   */
  participantsOf(name: string): ReadonlySet<string> {
    return new Set(this.activities.get(name)?.participants ?? [])
  }

  isParticipant(name: string, email: string): boolean {
    return this.activities.get(name)?.participants.includes(email) ?? false
  }

  /**
   * Names of every activity the email is signed up for
   */
  activitiesFor(email: string): string[] {
    return Array.from(this.activities.values())
      .filter((a) => a.participants.includes(email))
      .map((a) => a.name)
  }

  signup(name: string, email: string): void {
    const activity = this.require(name)
    if (activity.participants.includes(email)) {
      throw new ActivityHubError('AlreadyExists', 'Student is already signed up')
    }
    activity.participants.push(email)
    this.logger.info(`[Roster] Signed up ${email} for ${name}`)
  }

  unregister(name: string, email: string): void {
    const activity = this.require(name)
    const index = activity.participants.indexOf(email)
    if (index === -1) {
      throw new ActivityHubError('NotRegistered', 'Student is not signed up for this activity')
    }
    activity.participants.splice(index, 1)
    this.logger.info(`[Roster] Unregistered ${email} from ${name}`)
  }
}
