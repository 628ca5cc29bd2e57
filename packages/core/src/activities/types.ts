/**
 * Activity Types
 */

export interface Activity {
  name: string
  description: string
  /** Human-readable meeting times, e.g. "Fridays, 3:30 PM - 5:00 PM" */
  schedule: string
  maxParticipants: number
  /** Participant emails in sign-up order */
  participants: string[]
}
