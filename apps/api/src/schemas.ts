import { z } from "zod";
import { MOOD_SCORE_MAX, MOOD_SCORE_MIN } from "@moodspace/shared";
import { ValidationError } from "./errors.js";

const sessionId = z.string().trim().min(1, "must not be empty");

// --- Request shapes ---

export const moodEntryCreateSchema = z.object({
  user_session: sessionId,
  mood_score: z
    .number()
    .int("must be an integer")
    .min(MOOD_SCORE_MIN, `must be between ${MOOD_SCORE_MIN} and ${MOOD_SCORE_MAX}`)
    .max(MOOD_SCORE_MAX, `must be between ${MOOD_SCORE_MIN} and ${MOOD_SCORE_MAX}`),
  emotions: z.array(z.string().trim().min(1, "must not be empty")),
  description: z.string()
});

export const storyCreateSchema = z.object({
  user_session: sessionId,
  title: z.string(),
  story: z.string(),
  category: z.string()
});

export const chatRequestSchema = z.object({
  user_session: sessionId,
  message: z.string().trim().min(1, "must not be empty")
});

export const sessionParamsSchema = z.object({ session: sessionId });
export const storyIdParamsSchema = z.object({ id: z.string().trim().min(1, "must not be empty") });

export const moodListQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).default(30)
});

export const storyListQuerySchema = z.object({
  category: z.string().trim().optional(),
  limit: z.coerce.number().int().min(1).default(20)
});

// --- Stored rows ---

const isoTimestamp = z
  .string()
  .refine((s) => !Number.isNaN(Date.parse(s)), "not a timestamp")
  .transform((s) => new Date(s).toISOString());

export const moodEntryRowSchema = z.object({
  id: z.string(),
  user_session: z.string(),
  mood_score: z.number().int(),
  emotions: z.array(z.string()),
  description: z.string(),
  timestamp: isoTimestamp,
  ai_insights: z.string().nullable()
});

export const storyRowSchema = z.object({
  id: z.string(),
  user_session: z.string(),
  title: z.string(),
  story: z.string(),
  category: z.string(),
  is_approved: z.boolean(),
  timestamp: isoTimestamp,
  support_count: z.number().int()
});

export const chatMessageRowSchema = z.object({
  id: z.string(),
  user_session: z.string(),
  message: z.string(),
  response: z.string(),
  timestamp: isoTimestamp
});

export const userProgressRowSchema = z.object({
  id: z.string(),
  user_session: z.string(),
  total_points: z.number().int(),
  completed_challenges: z.array(z.string()),
  current_streak: z.number().int(),
  mood_entries_count: z.number().int()
});

export function formatIssues(error: z.ZodError): string {
  return error.issues.map((i) => `${i.path.length > 0 ? i.path.join(".") : "value"}: ${i.message}`).join("; ");
}

export function parseRequest<S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> {
  const parsed = schema.safeParse(input ?? {});
  if (!parsed.success) throw new ValidationError(formatIssues(parsed.error));
  return parsed.data;
}
