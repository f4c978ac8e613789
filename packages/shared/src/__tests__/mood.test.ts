import { describe, it, expect } from "vitest";
import {
  CHALLENGE_CATALOG,
  classifyTrend,
  materializeChallenges,
  meanOf,
  roundOneDecimal,
  summarizeMoodWindow
} from "../index.js";

describe("roundOneDecimal", () => {
  it("rounds halves away from zero", () => {
    expect(roundOneDecimal(6.25)).toBe(6.3);
    expect(roundOneDecimal(-6.25)).toBe(-6.3);
  });

  it("keeps whole numbers and rounds repeating decimals", () => {
    expect(roundOneDecimal(7)).toBe(7);
    expect(roundOneDecimal(20 / 3)).toBe(6.7);
  });
});

describe("meanOf", () => {
  it("returns null for no values", () => {
    expect(meanOf([])).toBeNull();
  });

  it("averages values", () => {
    expect(meanOf([2, 4, 9])).toBe(5);
  });
});

describe("classifyTrend", () => {
  it("is improving only when the newest score is strictly above the mean", () => {
    expect(classifyTrend(8, 7)).toBe("improving");
    expect(classifyTrend(7, 7)).toBe("stable");
    expect(classifyTrend(5, 7)).toBe("stable");
  });
});

describe("summarizeMoodWindow", () => {
  it("returns null for an empty window", () => {
    expect(summarizeMoodWindow([])).toBeNull();
  });

  it("summarizes [8, 6, 7] newest first as 7.0 and improving", () => {
    expect(summarizeMoodWindow([8, 6, 7])).toEqual({ average_mood: 7, total_entries: 3, trend: "improving" });
  });

  it("reports stable when the newest score is below the mean", () => {
    expect(summarizeMoodWindow([5, 6, 7])).toEqual({ average_mood: 6, total_entries: 3, trend: "stable" });
  });

  it("reports a single entry as stable", () => {
    expect(summarizeMoodWindow([10])).toEqual({ average_mood: 10, total_entries: 1, trend: "stable" });
  });

  it("compares the newest score with the mean before rounding", () => {
    // 174 / 25 = 6.96, shown as 7.0; the newest 7 is still above 6.96.
    const scores = [...Array.from({ length: 24 }, () => 7), 6];
    expect(summarizeMoodWindow(scores)).toEqual({ average_mood: 7, total_entries: 25, trend: "improving" });
  });
});

describe("materializeChallenges", () => {
  it("returns the four catalog entries with ids from the given source", () => {
    let n = 0;
    const challenges = materializeChallenges(() => `c${++n}`);
    expect(challenges.map((c) => c.id)).toEqual(["c1", "c2", "c3", "c4"]);
    expect(challenges.map((c) => c.title)).toEqual([
      "Daily Gratitude",
      "5-Minute Breathing",
      "Digital Detox Hour",
      "Connect with Nature"
    ]);
    expect(challenges[2]).toEqual({
      id: "c3",
      title: "Digital Detox Hour",
      description: "Stay off social media for 1 hour each day",
      category: "balance",
      points: 20,
      duration_days: 3
    });
  });

  it("has only positive point values", () => {
    expect(CHALLENGE_CATALOG.every((c) => c.points > 0)).toBe(true);
  });
});
