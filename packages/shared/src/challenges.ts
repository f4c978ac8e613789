import type { Challenge } from "./types.js";

export type ChallengeTemplate = Omit<Challenge, "id">;

export const CHALLENGE_CATALOG: readonly ChallengeTemplate[] = [
  {
    title: "Daily Gratitude",
    description: "Write down 3 things you're grateful for each day",
    category: "mindfulness",
    points: 10,
    duration_days: 7
  },
  {
    title: "5-Minute Breathing",
    description: "Practice deep breathing for 5 minutes daily",
    category: "relaxation",
    points: 15,
    duration_days: 5
  },
  {
    title: "Digital Detox Hour",
    description: "Stay off social media for 1 hour each day",
    category: "balance",
    points: 20,
    duration_days: 3
  },
  {
    title: "Connect with Nature",
    description: "Spend 15 minutes outdoors daily",
    category: "nature",
    points: 12,
    duration_days: 7
  }
];

// Ids are not stable: every call mints new ones.
export function materializeChallenges(newId: () => string): Challenge[] {
  return CHALLENGE_CATALOG.map((c) => ({ id: newId(), ...c }));
}
