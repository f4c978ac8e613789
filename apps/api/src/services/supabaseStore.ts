import crypto from "node:crypto";
import { createClient, type SupabaseClient } from "@supabase/supabase-js";
import { z } from "zod";
import type { ChatMessage, MoodEntry, Story, UserProgress } from "@moodspace/shared";
import type { Env } from "../config.js";
import { StoreUnavailable, errorMessage } from "../errors.js";
import {
  chatMessageRowSchema,
  formatIssues,
  moodEntryRowSchema,
  storyRowSchema,
  userProgressRowSchema
} from "../schemas.js";
import type { ProgressIncrement, RecordStore, StoryQuery } from "./store.js";

type QueryResult = { data: unknown; error: { message: string } | null };

export function createSupabaseAdmin(env: Pick<Env, "SUPABASE_URL" | "SUPABASE_SERVICE_ROLE_KEY">): SupabaseClient {
  return createClient(env.SUPABASE_URL, env.SUPABASE_SERVICE_ROLE_KEY, {
    auth: { persistSession: false }
  });
}

export class SupabaseRecordStore implements RecordStore {
  constructor(
    private readonly client: SupabaseClient,
    private readonly schemaName: string
  ) {}

  private db() {
    return this.client.schema(this.schemaName);
  }

  private async exec<S extends z.ZodTypeAny>(op: string, query: PromiseLike<QueryResult>, schema: S): Promise<z.output<S>> {
    let res: QueryResult;
    try {
      res = await query;
    } catch (e) {
      throw new StoreUnavailable(`${op} failed: ${errorMessage(e)}`, e);
    }
    if (res.error) {
      throw new StoreUnavailable(`${op} failed: ${res.error.message}`, res.error);
    }
    const parsed = schema.safeParse(res.data);
    if (!parsed.success) {
      throw new StoreUnavailable(`${op} returned an unexpected shape: ${formatIssues(parsed.error)}`);
    }
    return parsed.data;
  }

  async insertMoodEntry(entry: MoodEntry): Promise<MoodEntry> {
    return this.exec("insert mood entry", this.db().from("mood_entries").insert([entry]).select("*").single(), moodEntryRowSchema);
  }

  async listMoodEntries(session: string, limit: number): Promise<MoodEntry[]> {
    return this.exec(
      "list mood entries",
      this.db()
        .from("mood_entries")
        .select("*")
        .eq("user_session", session)
        .order("timestamp", { ascending: false })
        .limit(limit),
      z.array(moodEntryRowSchema)
    );
  }

  async insertStory(story: Story): Promise<Story> {
    return this.exec("insert story", this.db().from("stories").insert([story]).select("*").single(), storyRowSchema);
  }

  async listApprovedStories(query: StoryQuery): Promise<Story[]> {
    let q = this.db().from("stories").select("*").eq("is_approved", true);
    if (query.category) q = q.eq("category", query.category);
    return this.exec(
      "list stories",
      q.order("timestamp", { ascending: false }).limit(query.limit),
      z.array(storyRowSchema)
    );
  }

  async incrementStorySupport(storyId: string): Promise<number | null> {
    return this.exec(
      "increment story support",
      this.db().rpc("increment_story_support", { p_story_id: storyId }),
      z.number().int().nullable()
    );
  }

  async insertChatMessage(message: ChatMessage): Promise<ChatMessage> {
    return this.exec(
      "insert chat message",
      this.db().from("chat_history").insert([message]).select("*").single(),
      chatMessageRowSchema
    );
  }

  async findProgress(session: string): Promise<UserProgress | null> {
    return this.exec(
      "find progress",
      this.db().from("user_progress").select("*").eq("user_session", session).maybeSingle(),
      userProgressRowSchema.nullable()
    );
  }

  async ensureProgress(session: string): Promise<UserProgress> {
    const fresh: UserProgress = {
      id: crypto.randomUUID(),
      user_session: session,
      total_points: 0,
      completed_challenges: [],
      current_streak: 0,
      mood_entries_count: 0
    };
    // ignoreDuplicates turns this into INSERT ... ON CONFLICT DO NOTHING on the unique session column.
    await this.exec(
      "create progress",
      this.db().from("user_progress").upsert([fresh], { onConflict: "user_session", ignoreDuplicates: true }),
      z.unknown()
    );
    return this.exec(
      "read progress",
      this.db().from("user_progress").select("*").eq("user_session", session).single(),
      userProgressRowSchema
    );
  }

  async incrementProgress(session: string, inc: ProgressIncrement): Promise<UserProgress> {
    return this.exec(
      "increment progress",
      this.db().rpc("record_activity", {
        p_id: crypto.randomUUID(),
        p_user_session: session,
        p_points: inc.points,
        p_mood_entries: inc.moodEntries
      }),
      userProgressRowSchema
    );
  }
}
