import type { FastifyInstance } from "fastify";
import type { Story } from "@moodspace/shared";
import type { ApiContext } from "../context.js";
import { parseRequest, storyCreateSchema, storyIdParamsSchema, storyListQuerySchema } from "../schemas.js";

export function registerStoryRoutes(app: FastifyInstance, ctx: ApiContext) {
  // POST /stories — stored unapproved; approval happens outside the API.
  app.post("/stories", async (req) => {
    const body = parseRequest(storyCreateSchema, req.body);
    const story: Story = {
      id: ctx.newId(),
      user_session: body.user_session,
      title: body.title,
      story: body.story,
      category: body.category,
      is_approved: false,
      timestamp: ctx.clock().toISOString(),
      support_count: 0
    };
    return ctx.store.insertStory(story);
  });

  // GET /stories?category=&limit=20
  app.get("/stories", async (req) => {
    const { category, limit } = parseRequest(storyListQuerySchema, req.query);
    return ctx.store.listApprovedStories({ category: category || undefined, limit });
  });

  // POST /stories/:id/support
  // No de-duplication per session. An unknown id is logged and still answered with success.
  app.post("/stories/:id/support", async (req) => {
    const { id } = parseRequest(storyIdParamsSchema, req.params);
    const count = await ctx.store.incrementStorySupport(id);
    if (count === null) {
      req.log.warn({ story_id: id }, "support for unknown story ignored");
    }
    return { message: "Support added" };
  });
}
