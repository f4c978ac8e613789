import { getEnv, loadEnvLocal, parseCorsOrigins } from "./config.js";
import { buildServer } from "./server.js";
import { OpenAiInsightGenerator } from "./services/insights.js";
import { loadPromptConfig } from "./services/prompts.js";
import { createSupabaseAdmin, SupabaseRecordStore } from "./services/supabaseStore.js";

loadEnvLocal();

const env = getEnv();

const store = new SupabaseRecordStore(createSupabaseAdmin(env), env.SUPABASE_DB_SCHEMA);

const app = buildServer({
  store,
  insights: (log) =>
    new OpenAiInsightGenerator({
      apiKey: env.OPENAI_API_KEY,
      baseUrl: env.OPENAI_BASE_URL,
      model: env.OPENAI_CHAT_MODEL,
      timeoutMs: env.INSIGHT_TIMEOUT_MS,
      maxRetries: env.INSIGHT_MAX_RETRIES,
      retryBackoffMs: env.INSIGHT_RETRY_BACKOFF_MS,
      log
    }),
  prompts: loadPromptConfig(env),
  corsOrigins: parseCorsOrigins(env.CORS_ORIGINS),
  logger: { level: env.LOG_LEVEL }
});

if (!env.OPENAI_API_KEY) {
  app.log.warn("OPENAI_API_KEY is not set; mood, chat and analytics requests will fail");
}

const shutdown = async (signal: string) => {
  app.log.info({ signal }, "shutting down");
  await app.close();
  process.exit(0);
};
process.once("SIGINT", (s) => void shutdown(s));
process.once("SIGTERM", (s) => void shutdown(s));

await app.listen({ port: env.PORT, host: env.HOST });
