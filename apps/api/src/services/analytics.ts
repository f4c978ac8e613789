import { summarizeMoodWindow, type MoodAnalyticsResult } from "@moodspace/shared";
import type { InsightGenerator } from "./insights.js";
import { buildPatternAnalysisRequest, DEFAULT_PROMPT_CONFIG, type PromptConfig } from "./prompts.js";
import type { RecordStore } from "./store.js";

export const DEFAULT_ANALYTICS_WINDOW = 14;

export class AnalyticsAggregator {
  constructor(
    private readonly store: RecordStore,
    private readonly insights: InsightGenerator,
    private readonly prompts: PromptConfig = DEFAULT_PROMPT_CONFIG
  ) {}

  async computeAnalytics(session: string, windowSize = DEFAULT_ANALYTICS_WINDOW): Promise<MoodAnalyticsResult> {
    const recent = await this.store.listMoodEntries(session, windowSize);
    const summary = summarizeMoodWindow(recent.map((m) => m.mood_score));
    if (!summary) return { message: "No mood data available" };

    const request = buildPatternAnalysisRequest(recent, this.prompts);
    const analysis = await this.insights.generate({ session, ...request });

    return {
      analysis,
      average_mood: summary.average_mood,
      total_entries: summary.total_entries,
      trend: summary.trend
    };
  }
}
