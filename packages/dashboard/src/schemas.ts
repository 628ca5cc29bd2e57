/**
 * Request Schemas
 *
 * Wire payloads use snake_case. Optional fields accept null as "not given".
 */

import { z } from "zod";

const optionalText = z.string().nullish();

export const recurrenceSchema = z.enum(["none", "daily", "weekly", "monthly"]);

export const createEventSchema = z.object({
  title: z.string().min(1),
  activity_name: z.string().min(1),
  description: optionalText,
  start: z.string(),
  end: z.string(),
  room: optionalText,
  color: optionalText,
  recurrence: recurrenceSchema.nullish(),
  recurrence_end: optionalText,
});

export const updateEventSchema = z.object({
  title: z.string().min(1).nullish(),
  activity_name: z.string().min(1).nullish(),
  description: optionalText,
  start: optionalText,
  end: optionalText,
  room: optionalText,
  color: optionalText,
  recurrence: recurrenceSchema.nullish(),
  recurrence_end: optionalText,
  is_cancelled: z.boolean().nullish(),
});

export const eventParamsSchema = z.object({
  id: z.coerce.number().int().positive(),
});

export const listEventsQuerySchema = z.object({
  start: z.string().optional(),
  end: z.string().optional(),
  activity: z.string().optional(),
  email: z.string().optional(),
});

export const exportQuerySchema = z.object({
  activity: z.string().optional(),
  email: z.string().optional(),
});

export const cancelDateQuerySchema = z.object({
  date_str: z.string(),
});

export const activityParamsSchema = z.object({
  name: z.string().min(1),
});

export const emailQuerySchema = z.object({
  email: z.string().min(1),
});

export const attendanceMarkSchema = z.object({
  date: z.string(),
  records: z.array(
    z.object({
      email: z.string().min(1),
      status: z.enum(["present", "absent", "excused"]),
    }),
  ),
});

export const attendanceQuerySchema = z.object({
  date: z.string().optional(),
});

export const studentParamsSchema = z.object({
  email: z.string().min(1),
});

export type CreateEventBody = z.infer<typeof createEventSchema>;
export type UpdateEventBody = z.infer<typeof updateEventSchema>;
