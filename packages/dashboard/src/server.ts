import Fastify, {
  type FastifyError,
  type FastifyInstance,
  type FastifyServerOptions,
} from "fastify";
import fastifyStatic from "@fastify/static";
import fastifyCors from "@fastify/cors";
import { fileURLToPath } from "node:url";
import { ZodError } from "zod";
import {
  ActivityRoster,
  AttendanceTracker,
  EventCalendar,
  isActivityHubError,
  type Activity,
  type ErrorKind,
} from "@activity-hub/core";
import { registerActivityRoutes } from "./routes/activities.js";
import { registerAttendanceRoutes } from "./routes/attendance.js";
import { registerCalendarRoutes } from "./routes/calendar.js";

export interface LoggingOptions {
  level: string;
  pretty: boolean;
}

export interface ServerOptions {
  /** Starting activity catalogue */
  activities: Activity[];
  /** false disables logging entirely */
  logging?: LoggingOptions | false;
  /** Bound for recurring events without an end (days) */
  recurrenceHorizonDays?: number;
  calendarName?: string;
  /** Today's date (YYYY-MM-DD) for attendance checks */
  today?: () => string;
  /** Clock for export timestamps */
  now?: () => Date;
}

// Augment Fastify types to include our custom decorators
declare module "fastify" {
  interface FastifyInstance {
    roster: ActivityRoster;
    calendar: EventCalendar;
    attendance: AttendanceTracker;
  }
}

const STATUS_BY_KIND: Record<ErrorKind, number> = {
  NotFound: 404,
  InvalidRange: 400,
  InvalidFormat: 400,
  InvalidState: 400,
  AlreadyExists: 400,
  NotRegistered: 400,
};

function loggerOptions(
  logging: LoggingOptions | false | undefined,
): FastifyServerOptions["logger"] {
  if (logging === false) {
    return false;
  }
  const level = logging?.level ?? "info";
  if (!(logging?.pretty ?? true)) {
    return { level };
  }
  return {
    level,
    transport: {
      target: "pino-pretty",
      options: {
        translateTime: "HH:MM:ss Z",
        ignore: "pid,hostname",
      },
    },
  };
}

function describeZodError(err: ZodError): string {
  return err.issues
    .map((issue) =>
      issue.path.length > 0
        ? `${issue.path.join(".")}: ${issue.message}`
        : issue.message,
    )
    .join("; ");
}

export async function createServer(
  options: ServerOptions,
): Promise<FastifyInstance> {
  const fastify = Fastify({ logger: loggerOptions(options.logging) });

  // Register CORS (allow all origins — no auth, same data for everyone)
  await fastify.register(fastifyCors, {
    origin: true,
  });

  // Domain services, one set per server instance
  const roster = new ActivityRoster(
    options.activities,
    fastify.log.child({ module: "roster" }),
  );
  const calendar = new EventCalendar({
    roster,
    horizonDays: options.recurrenceHorizonDays,
    calendarName: options.calendarName,
    logger: fastify.log.child({ module: "calendar" }),
    now: options.now,
  });
  const attendance = new AttendanceTracker({
    roster,
    logger: fastify.log.child({ module: "attendance" }),
    today: options.today,
  });

  fastify.decorate("roster", roster);
  fastify.decorate("calendar", calendar);
  fastify.decorate("attendance", attendance);

  fastify.setErrorHandler((err: FastifyError, request, reply) => {
    if (isActivityHubError(err)) {
      return reply
        .code(STATUS_BY_KIND[err.kind])
        .send({ error: err.message, kind: err.kind });
    }

    if (err instanceof ZodError) {
      return reply
        .code(400)
        .send({ error: describeZodError(err), kind: "InvalidFormat" });
    }

    // Fastify's own client errors (malformed JSON, unsupported media type)
    if (err.statusCode !== undefined && err.statusCode < 500) {
      return reply
        .code(err.statusCode)
        .send({ error: err.message, kind: "InvalidFormat" });
    }

    request.log.error(err, "Unhandled error");
    return reply.code(500).send({ error: "Internal server error" });
  });

  // Front page lives under /static
  const publicDir = fileURLToPath(new URL("../public", import.meta.url));
  fastify.get("/", async (_request, reply) => {
    return reply.redirect("/static/index.html");
  });

  await fastify.register(fastifyStatic, {
    root: publicDir,
    prefix: "/static/",
  });

  // Register activity routes
  await registerActivityRoutes(fastify);

  // Register attendance routes
  await registerAttendanceRoutes(fastify);

  // Register calendar routes
  await registerCalendarRoutes(fastify);

  return fastify;
}
