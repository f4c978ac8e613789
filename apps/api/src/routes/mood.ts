import type { FastifyInstance } from "fastify";
import type { MoodEntry } from "@moodspace/shared";
import type { ApiContext } from "../context.js";
import { moodEntryCreateSchema, moodListQuerySchema, parseRequest, sessionParamsSchema } from "../schemas.js";
import { buildMoodInsightRequest } from "../services/prompts.js";

export function registerMoodRoutes(app: FastifyInstance, ctx: ApiContext) {
  // POST /mood
  // body: { user_session, mood_score: 1..10, emotions: string[], description }
  // Insight, insert and progress run in order; a failure in any of them fails the request.
  app.post("/mood", async (req) => {
    const body = parseRequest(moodEntryCreateSchema, req.body);

    const ai_insights = await ctx.insights.generate({
      session: body.user_session,
      ...buildMoodInsightRequest(body, ctx.prompts)
    });

    const entry: MoodEntry = {
      id: ctx.newId(),
      user_session: body.user_session,
      mood_score: body.mood_score,
      emotions: body.emotions,
      description: body.description,
      timestamp: ctx.clock().toISOString(),
      ai_insights
    };
    const saved = await ctx.store.insertMoodEntry(entry);

    await ctx.progress.recordActivity(body.user_session, "mood_entry");
    req.log.info({ session: body.user_session, mood_id: saved.id }, "mood entry recorded");
    return saved;
  });

  // GET /mood/:session?limit=30
  app.get("/mood/:session", async (req) => {
    const { session } = parseRequest(sessionParamsSchema, req.params);
    const { limit } = parseRequest(moodListQuerySchema, req.query);
    return ctx.store.listMoodEntries(session, limit);
  });
}
