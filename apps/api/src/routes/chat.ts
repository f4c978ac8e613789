import type { FastifyInstance } from "fastify";
import type { ApiContext } from "../context.js";
import { chatRequestSchema, parseRequest } from "../schemas.js";
import { buildChatRequest } from "../services/prompts.js";

export function registerChatRoutes(app: FastifyInstance, ctx: ApiContext) {
  // POST /chat
  // body: { user_session, message }
  app.post("/chat", async (req) => {
    const body = parseRequest(chatRequestSchema, req.body);
    const response = await ctx.insights.generate({
      session: body.user_session,
      ...buildChatRequest(body.message, ctx.prompts)
    });

    await ctx.store.insertChatMessage({
      id: ctx.newId(),
      user_session: body.user_session,
      message: body.message,
      response,
      timestamp: ctx.clock().toISOString()
    });

    return { response };
  });
}
