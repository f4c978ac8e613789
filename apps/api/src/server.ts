import crypto from "node:crypto";
import Fastify, { type FastifyBaseLogger, type FastifyServerOptions } from "fastify";
import cors from "@fastify/cors";
import type { ApiContext } from "./context.js";
import { NotFound, ServiceError, type ServiceErrorCode } from "./errors.js";
import { registerChatRoutes } from "./routes/chat.js";
import { registerMoodRoutes } from "./routes/mood.js";
import { registerProgressRoutes } from "./routes/progress.js";
import { registerStoryRoutes } from "./routes/stories.js";
import { AnalyticsAggregator } from "./services/analytics.js";
import type { InsightGenerator } from "./services/insights.js";
import { ProgressTracker } from "./services/progress.js";
import { DEFAULT_PROMPT_CONFIG, type PromptConfig } from "./services/prompts.js";
import type { RecordStore } from "./services/store.js";
import { createMonotonicClock, type Clock } from "./utils/time.js";

export type ServerDeps = {
  store: RecordStore;
  /** An instance, or a factory that receives the server logger. */
  insights: InsightGenerator | ((log: FastifyBaseLogger) => InsightGenerator);
  prompts?: PromptConfig;
  corsOrigins?: true | string[];
  logger?: FastifyServerOptions["logger"];
  clock?: Clock;
  newId?: () => string;
};

export const API_MESSAGE = "MoodSpace API - Supporting Youth Mental Wellness";

function classifyError(error: Error & { statusCode?: number }): { statusCode: number; code: ServiceErrorCode | "bad_request" } {
  if (error instanceof ServiceError) return { statusCode: error.statusCode, code: error.code };
  const status = error.statusCode;
  if (status !== undefined && status >= 400 && status < 500) return { statusCode: status, code: "bad_request" };
  return { statusCode: 500, code: "internal_error" };
}

export function buildServer(deps: ServerDeps) {
  const app = Fastify({
    logger: deps.logger ?? { level: "info" }
  });

  void app.register(cors, { origin: deps.corsOrigins ?? true, credentials: true });

  app.setErrorHandler((error, req, reply) => {
    const { statusCode, code } = classifyError(error);
    if (statusCode >= 500) {
      req.log.error({ err: error }, "request failed");
    } else {
      req.log.warn({ code, reason: error.message }, "request rejected");
    }
    return reply.code(statusCode).send({ ok: false, error: code, message: error.message });
  });

  app.setNotFoundHandler(async (req) => {
    throw new NotFound(`Route ${req.method} ${req.url} not found`);
  });

  const store = deps.store;
  const insights = typeof deps.insights === "function" ? deps.insights(app.log) : deps.insights;
  const prompts = deps.prompts ?? DEFAULT_PROMPT_CONFIG;
  const ctx: ApiContext = {
    store,
    insights,
    prompts,
    progress: new ProgressTracker(store),
    analytics: new AnalyticsAggregator(store, insights, prompts),
    clock: deps.clock ?? createMonotonicClock(),
    newId: deps.newId ?? (() => crypto.randomUUID())
  };

  app.get("/health", async () => {
    return { ok: true, service: "moodspace-api", ts: new Date().toISOString() };
  });

  void app.register(
    async (api) => {
      api.get("/", async () => ({ message: API_MESSAGE }));
      registerMoodRoutes(api, ctx);
      registerStoryRoutes(api, ctx);
      registerChatRoutes(api, ctx);
      registerProgressRoutes(api, ctx);
    },
    { prefix: "/api" }
  );

  return app;
}
