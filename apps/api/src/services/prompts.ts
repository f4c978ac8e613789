import fs from "node:fs";
import type { MoodEntry, MoodEntryCreate } from "@moodspace/shared";
import type { Env } from "../config.js";
import { toIsoDateUTC } from "../utils/time.js";

export type PromptConfig = {
  /** Persona for mood insights and pattern analysis. */
  defaultPersona: string;
  /** Persona for the chat companion. Carries the crisis-safety redirect. */
  companionPersona: string;
};

export type InsightRequest = {
  system: string;
  prompt: string;
};

export const DEFAULT_PERSONA =
  "You are a supportive mental wellness AI assistant focused on helping Indian youth. Be empathetic, culturally sensitive, and provide practical guidance.";

export const COMPANION_PERSONA = [
  "You are MoodSpace AI, a supportive mental wellness companion for Indian youth.",
  "Your role is to:",
  "1. Listen empathetically and validate feelings",
  "2. Provide culturally sensitive guidance",
  "3. Suggest practical coping strategies",
  "4. Encourage professional help when needed",
  "5. Be warm, non-judgmental, and understanding of Indian family dynamics",
  "6. Use simple, encouraging language",
  "7. Never provide medical diagnoses or replace professional therapy",
  "",
  "Always prioritize safety - if someone expresses suicidal thoughts, immediately encourage them to seek help from professionals or crisis helplines."
].join("\n");

export const DEFAULT_PROMPT_CONFIG: PromptConfig = {
  defaultPersona: DEFAULT_PERSONA,
  companionPersona: COMPANION_PERSONA
};

function readPersonaFile(file: string | undefined, fallback: string): string {
  if (!file) return fallback;
  const text = fs.readFileSync(file, "utf8").trim();
  if (!text) throw new Error(`Persona file is empty: ${file}`);
  return text;
}

export function loadPromptConfig(env: Pick<Env, "PERSONA_DEFAULT_FILE" | "PERSONA_COMPANION_FILE">): PromptConfig {
  return {
    defaultPersona: readPersonaFile(env.PERSONA_DEFAULT_FILE, DEFAULT_PERSONA),
    companionPersona: readPersonaFile(env.PERSONA_COMPANION_FILE, COMPANION_PERSONA)
  };
}

export function buildMoodInsightRequest(mood: MoodEntryCreate, config: PromptConfig = DEFAULT_PROMPT_CONFIG): InsightRequest {
  const prompt = [
    "A young person has shared their mood:",
    `Mood Score: ${mood.mood_score}/10`,
    `Emotions: ${mood.emotions.join(", ")}`,
    `Description: ${mood.description}`,
    "",
    "Provide a brief, culturally sensitive insight (2-3 sentences) that acknowledges their feelings and offers gentle guidance or encouragement. Consider Indian cultural context."
  ].join("\n");
  return { system: config.defaultPersona, prompt };
}

export function buildChatRequest(message: string, config: PromptConfig = DEFAULT_PROMPT_CONFIG): InsightRequest {
  return { system: config.companionPersona, prompt: message };
}

export function renderMoodLine(entry: Pick<MoodEntry, "timestamp" | "mood_score" | "emotions">): string {
  return `Date: ${toIsoDateUTC(new Date(entry.timestamp))}, Score: ${entry.mood_score}, Emotions: ${entry.emotions.join(", ")}`;
}

/** Entries in the order they were fetched (newest first). */
export function buildPatternAnalysisRequest(
  entries: Array<Pick<MoodEntry, "timestamp" | "mood_score" | "emotions">>,
  config: PromptConfig = DEFAULT_PROMPT_CONFIG
): InsightRequest {
  const prompt = [
    "Analyze this 2-week mood pattern for a young person:",
    ...entries.map(renderMoodLine),
    "",
    "Provide a brief, encouraging analysis (3-4 sentences) highlighting:",
    "1. Any positive trends or patterns",
    "2. Areas for gentle attention",
    "3. One specific, actionable suggestion for improvement",
    "",
    "Be supportive and focus on growth rather than problems."
  ].join("\n");
  return { system: config.defaultPersona, prompt };
}
