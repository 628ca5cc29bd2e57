export type AttendanceStatus = 'present' | 'absent' | 'excused'

export interface AttendanceEntry {
  email: string
  status: AttendanceStatus
}

export interface AttendanceStats {
  email: string
  totalSessions: number
  present: number
  absent: number
  excused: number
  /** (present + excused) / totalSessions * 100, two decimals; 0 with no sessions */
  attendancePercentage: number
}

/** activity → date → status, for one student */
export type StudentAttendance = Record<string, Record<string, AttendanceStatus>>
