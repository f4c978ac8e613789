import type { AnalyticsAggregator } from "./services/analytics.js";
import type { InsightGenerator } from "./services/insights.js";
import type { ProgressTracker } from "./services/progress.js";
import type { PromptConfig } from "./services/prompts.js";
import type { RecordStore } from "./services/store.js";
import type { Clock } from "./utils/time.js";

/** Everything a route handler needs, built once per server. */
export type ApiContext = {
  store: RecordStore;
  insights: InsightGenerator;
  prompts: PromptConfig;
  progress: ProgressTracker;
  analytics: AnalyticsAggregator;
  clock: Clock;
  newId: () => string;
};
