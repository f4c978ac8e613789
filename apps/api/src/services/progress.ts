import type { ActivityKind, UserProgress } from "@moodspace/shared";
import type { RecordStore } from "./store.js";

export const DEFAULT_ACTIVITY_POINTS = 5;

export class ProgressTracker {
  constructor(private readonly store: RecordStore) {}

  /**
   * Adds `points` to the session's total, and counts the activity when it is a mood entry.
   * A session without a record gets one whose counters start at the increment.
   */
  async recordActivity(session: string, activityKind: ActivityKind, points = DEFAULT_ACTIVITY_POINTS): Promise<UserProgress> {
    if (!Number.isInteger(points) || points < 0) {
      throw new RangeError(`points must be a non-negative integer, got ${points}`);
    }
    return this.store.incrementProgress(session, {
      points,
      moodEntries: activityKind === "mood_entry" ? 1 : 0
    });
  }

  async getOrCreateProgress(session: string): Promise<UserProgress> {
    const existing = await this.store.findProgress(session);
    if (existing) return existing;
    return this.store.ensureProgress(session);
  }
}
