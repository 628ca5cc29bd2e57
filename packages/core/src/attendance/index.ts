export type {
  AttendanceStatus,
  AttendanceEntry,
  AttendanceStats,
  StudentAttendance,
} from './types.js'
export { AttendanceTracker } from './tracker.js'
export type { AttendanceTrackerOptions } from './tracker.js'
