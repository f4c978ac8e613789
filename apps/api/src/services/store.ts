import type { ChatMessage, MoodEntry, Story, UserProgress } from "@moodspace/shared";

export type ProgressIncrement = {
  points: number;
  moodEntries: number;
};

export type StoryQuery = {
  category?: string | undefined;
  limit: number;
};

/**
 * Persistence seam for every collection the API touches.
 * Implementations surface any failure as StoreUnavailable.
 */
export interface RecordStore {
  insertMoodEntry(entry: MoodEntry): Promise<MoodEntry>;
  /** Newest first. */
  listMoodEntries(session: string, limit: number): Promise<MoodEntry[]>;

  insertStory(story: Story): Promise<Story>;
  /** Approved stories only, newest first. */
  listApprovedStories(query: StoryQuery): Promise<Story[]>;
  /** Resolves with the new count, or null when no story has that id. */
  incrementStorySupport(storyId: string): Promise<number | null>;

  insertChatMessage(message: ChatMessage): Promise<ChatMessage>;

  findProgress(session: string): Promise<UserProgress | null>;
  /** Inserts a zeroed record unless one exists, then returns the stored record. */
  ensureProgress(session: string): Promise<UserProgress>;
  /** Atomic upsert: a missing record is created with the increment as its starting values. */
  incrementProgress(session: string, inc: ProgressIncrement): Promise<UserProgress>;
}
