/**
 * Activity API Routes
 *
 * Activity catalogue and participant sign-up.
 */

import type { FastifyInstance } from "fastify";
import type { Activity } from "@activity-hub/core";
import { activityParamsSchema, emailQuerySchema } from "../schemas.js";

function toResponse(activity: Activity) {
  return {
    description: activity.description,
    schedule: activity.schedule,
    max_participants: activity.maxParticipants,
    participants: activity.participants,
  };
}

export async function registerActivityRoutes(
  fastify: FastifyInstance,
): Promise<void> {
  // GET /activities - All activities keyed by name
  fastify.get("/activities", async () => {
    const result: Record<string, ReturnType<typeof toResponse>> = {};
    for (const activity of fastify.roster.list()) {
      result[activity.name] = toResponse(activity);
    }
    return result;
  });

  // POST /activities/:name/signup?email=
  fastify.post("/activities/:name/signup", async (request) => {
    const { name } = activityParamsSchema.parse(request.params);
    const { email } = emailQuerySchema.parse(request.query);

    fastify.roster.signup(name, email);
    return { message: `Signed up ${email} for ${name}` };
  });

  // DELETE /activities/:name/unregister?email=
  fastify.delete("/activities/:name/unregister", async (request) => {
    const { name } = activityParamsSchema.parse(request.params);
    const { email } = emailQuerySchema.parse(request.query);

    fastify.roster.unregister(name, email);
    return { message: `Unregistered ${email} from ${name}` };
  });
}
