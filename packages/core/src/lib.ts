// Public API for consumption by the dashboard server

export { ActivityHubError, isActivityHubError } from './errors.js'
export type { ErrorKind } from './errors.js'

export { silentLogger } from './logger.js'
export type { CoreLogger } from './logger.js'

export {
  parseTimestamp,
  parseCalendarDate,
  formatTimestamp,
  toCalendarDate,
  formatICalUtc,
} from './dates.js'

export { loadConfig, findConfigDir } from './config.js'
export type { HubConfig } from './config.js'

// Calendar
export {
  EventStore,
  EventCalendar,
  expand,
  recurrenceBound,
  findConflicts,
  rangesOverlap,
  listEvents,
  toICalendar,
  escapeICalText,
  occurrenceUid,
  DEFAULT_HORIZON_DAYS,
} from './calendar/index.js'
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
  ICalOptions,
  EventCalendarOptions,
  MutationResult,
  UpdateResult,
} from './calendar/index.js'

// Activities
export { ActivityRoster, loadActivities, parseActivities, DEFAULT_SEED_FILE } from './activities/index.js'
export type { Activity } from './activities/index.js'

// Attendance
export { AttendanceTracker } from './attendance/index.js'
export type {
  AttendanceStatus,
  AttendanceEntry,
  AttendanceStats,
  StudentAttendance,
  AttendanceTrackerOptions,
} from './attendance/index.js'
