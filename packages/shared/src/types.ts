// Shared domain types. Field names match the stored rows and the JSON the API returns.

export type ActivityKind = "mood_entry" | "story" | "chat";
export type MoodTrend = "improving" | "stable";

export interface MoodEntry {
  id: string;
  user_session: string;
  mood_score: number;
  emotions: string[];
  description: string;
  timestamp: string;
  ai_insights: string | null;
}

export interface MoodEntryCreate {
  user_session: string;
  mood_score: number;
  emotions: string[];
  description: string;
}

export interface Story {
  id: string;
  user_session: string;
  title: string;
  story: string;
  category: string;
  is_approved: boolean;
  timestamp: string;
  support_count: number;
}

export interface StoryCreate {
  user_session: string;
  title: string;
  story: string;
  category: string;
}

export interface Challenge {
  id: string;
  title: string;
  description: string;
  category: string;
  points: number;
  duration_days: number;
}

export interface UserProgress {
  id: string;
  user_session: string;
  total_points: number;
  completed_challenges: string[];
  current_streak: number;
  mood_entries_count: number;
}

export interface ChatMessage {
  id: string;
  user_session: string;
  message: string;
  response: string;
  timestamp: string;
}

export interface MoodAnalytics {
  analysis: string;
  average_mood: number;
  total_entries: number;
  trend: MoodTrend;
}

export interface NoMoodData {
  message: "No mood data available";
}

export type MoodAnalyticsResult = MoodAnalytics | NoMoodData;
