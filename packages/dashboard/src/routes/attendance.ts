/**
 * Attendance API Routes
 *
 * Marking sessions, per-activity history and statistics, and a student's
 * history across activities.
 */

import type { FastifyInstance } from "fastify";
import {
  activityParamsSchema,
  attendanceMarkSchema,
  attendanceQuerySchema,
  studentParamsSchema,
} from "../schemas.js";
import { toStatsResponse } from "../serializers.js";

export async function registerAttendanceRoutes(
  fastify: FastifyInstance,
): Promise<void> {
  // POST /activities/:name/attendance - Mark one session
  fastify.post("/activities/:name/attendance", async (request) => {
    const { name } = activityParamsSchema.parse(request.params);
    const { date, records } = attendanceMarkSchema.parse(request.body);

    const updated = fastify.attendance.mark(name, date, records);
    return {
      message: `Attendance marked for ${name} on ${date}`,
      records_updated: updated,
    };
  });

  // GET /activities/:name/attendance?date= - One session, or all of them
  fastify.get("/activities/:name/attendance", async (request) => {
    const { name } = activityParamsSchema.parse(request.params);
    const { date } = attendanceQuerySchema.parse(request.query);

    if (date) {
      return { date, records: fastify.attendance.forDate(name, date) };
    }
    return { activity: name, attendance: fastify.attendance.all(name) };
  });

  // GET /activities/:name/attendance/stats
  fastify.get("/activities/:name/attendance/stats", async (request) => {
    const { name } = activityParamsSchema.parse(request.params);
    return {
      activity: name,
      statistics: fastify.attendance.stats(name).map(toStatsResponse),
    };
  });

  // GET /students/:email/attendance
  fastify.get("/students/:email/attendance", async (request) => {
    const { email } = studentParamsSchema.parse(request.params);
    const attendance = fastify.attendance.forStudent(email);

    if (Object.keys(attendance).length === 0) {
      return { email, message: "No attendance records found", attendance };
    }
    return { email, attendance };
  });
}
