import type { MoodTrend } from "./types.js";

export const MOOD_SCORE_MIN = 1;
export const MOOD_SCORE_MAX = 10;

// Half away from zero: 6.25 -> 6.3, -6.25 -> -6.3.
export function roundOneDecimal(value: number): number {
  const scaled = Math.round(Math.abs(value) * 10) / 10;
  return value < 0 ? -scaled : scaled;
}

export function meanOf(values: number[]): number | null {
  if (values.length === 0) return null;
  return values.reduce((acc, v) => acc + v, 0) / values.length;
}

/**
 * Two-bucket trend: the newest score against the mean of the window it belongs to.
 * Including the newest score in the mean pulls the result toward "stable".
 */
export function classifyTrend(newestScore: number, mean: number): MoodTrend {
  return newestScore > mean ? "improving" : "stable";
}

export type MoodWindowSummary = {
  average_mood: number;
  total_entries: number;
  trend: MoodTrend;
};

/** Scores ordered newest first. Returns null for an empty window. */
export function summarizeMoodWindow(scoresNewestFirst: number[]): MoodWindowSummary | null {
  const mean = meanOf(scoresNewestFirst);
  if (mean === null) return null;
  const [newest] = scoresNewestFirst;
  return {
    average_mood: roundOneDecimal(mean),
    total_entries: scoresNewestFirst.length,
    trend: classifyTrend(newest ?? mean, mean)
  };
}
