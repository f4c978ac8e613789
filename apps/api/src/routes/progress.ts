import type { FastifyInstance } from "fastify";
import { materializeChallenges } from "@moodspace/shared";
import type { ApiContext } from "../context.js";
import { parseRequest, sessionParamsSchema } from "../schemas.js";

export function registerProgressRoutes(app: FastifyInstance, ctx: ApiContext) {
  app.get("/challenges", async () => {
    return materializeChallenges(ctx.newId);
  });

  // GET /progress/:session — creates a zeroed record on first read.
  app.get("/progress/:session", async (req) => {
    const { session } = parseRequest(sessionParamsSchema, req.params);
    return ctx.progress.getOrCreateProgress(session);
  });

  // GET /analytics/:session — last 14 entries.
  app.get("/analytics/:session", async (req) => {
    const { session } = parseRequest(sessionParamsSchema, req.params);
    return ctx.analytics.computeAnalytics(session);
  });
}
