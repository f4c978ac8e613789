import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";

export function loadEnvLocal(target: NodeJS.ProcessEnv = process.env) {
  // Dotfiles are not always allowed in the workspace; we read env.local instead of .env.
  const __filename = fileURLToPath(import.meta.url);
  const __dirname = path.dirname(__filename);
  const envPath = path.resolve(__dirname, "..", "env.local");
  if (!fs.existsSync(envPath)) return;
  const raw = fs.readFileSync(envPath, "utf8");
  for (const line of raw.split(/\r?\n/)) {
    const s = line.trim();
    if (!s || s.startsWith("#")) continue;
    const idx = s.indexOf("=");
    if (idx < 0) continue;
    const key = s.slice(0, idx).trim();
    const value = s.slice(idx + 1).trim();
    if (!key) continue;
    if (target[key] === undefined && value !== "") {
      target[key] = value;
    }
  }
}

export type Env = {
  SUPABASE_URL: string;
  SUPABASE_SERVICE_ROLE_KEY: string;
  SUPABASE_DB_SCHEMA: string;
  PORT: number;
  HOST: string;
  LOG_LEVEL: string;
  CORS_ORIGINS: string;
  OPENAI_API_KEY?: string | undefined;
  OPENAI_BASE_URL: string;
  OPENAI_CHAT_MODEL: string;
  INSIGHT_TIMEOUT_MS: number;
  INSIGHT_MAX_RETRIES: number;
  INSIGHT_RETRY_BACKOFF_MS: number;
  PERSONA_DEFAULT_FILE?: string | undefined;
  PERSONA_COMPANION_FILE?: string | undefined;
};

const REQUIRED = ["SUPABASE_URL", "SUPABASE_SERVICE_ROLE_KEY", "SUPABASE_DB_SCHEMA"] as const;

function readRequired(source: NodeJS.ProcessEnv, key: (typeof REQUIRED)[number]): string {
  const value = source[key]?.trim();
  if (!value) throw new Error(`Missing env: ${key}`);
  return value;
}

function readOptional(source: NodeJS.ProcessEnv, key: string): string | undefined {
  return source[key]?.trim() || undefined;
}

function readCount(source: NodeJS.ProcessEnv, key: string, fallback: number): number {
  const raw = readOptional(source, key);
  if (raw === undefined) return fallback;
  const n = Number(raw);
  if (!Number.isInteger(n) || n < 0) throw new Error(`Invalid env: ${key} must be a non-negative integer, got "${raw}"`);
  return n;
}

export function getEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const keyFile = readOptional(source, "OPENAI_API_KEY_FILE");
  const keyFromFile =
    !readOptional(source, "OPENAI_API_KEY") && keyFile && fs.existsSync(keyFile) ? fs.readFileSync(keyFile, "utf8").trim() : undefined;
  return {
    SUPABASE_URL: readRequired(source, "SUPABASE_URL"),
    SUPABASE_SERVICE_ROLE_KEY: readRequired(source, "SUPABASE_SERVICE_ROLE_KEY"),
    SUPABASE_DB_SCHEMA: readRequired(source, "SUPABASE_DB_SCHEMA"),
    PORT: readCount(source, "PORT", 8001),
    HOST: readOptional(source, "HOST") || "0.0.0.0",
    LOG_LEVEL: readOptional(source, "LOG_LEVEL") || "info",
    CORS_ORIGINS: readOptional(source, "CORS_ORIGINS") || "*",
    OPENAI_API_KEY: keyFromFile || readOptional(source, "OPENAI_API_KEY"),
    OPENAI_BASE_URL: readOptional(source, "OPENAI_BASE_URL") || "https://api.openai.com/v1",
    OPENAI_CHAT_MODEL: readOptional(source, "OPENAI_CHAT_MODEL") || "gpt-4o-mini",
    INSIGHT_TIMEOUT_MS: readCount(source, "INSIGHT_TIMEOUT_MS", 15000),
    INSIGHT_MAX_RETRIES: readCount(source, "INSIGHT_MAX_RETRIES", 0),
    INSIGHT_RETRY_BACKOFF_MS: readCount(source, "INSIGHT_RETRY_BACKOFF_MS", 500),
    PERSONA_DEFAULT_FILE: readOptional(source, "PERSONA_DEFAULT_FILE"),
    PERSONA_COMPANION_FILE: readOptional(source, "PERSONA_COMPANION_FILE")
  };
}

/** "*" allows any origin; otherwise a comma-separated allow list. */
export function parseCorsOrigins(raw: string): true | string[] {
  const origins = raw
    .split(",")
    .map((x) => x.trim())
    .filter(Boolean);
  if (origins.length === 0 || origins.includes("*")) return true;
  return origins;
}
