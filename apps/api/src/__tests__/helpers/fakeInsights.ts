import { InsightGenerationFailed } from "../../errors.js";
import type { GenerateParams, InsightGenerator } from "../../services/insights.js";

/** Records every request; replies with `reply` or fails when `failWith` is set. */
export class ScriptedInsights implements InsightGenerator {
  calls: GenerateParams[] = [];
  reply = "You are doing better than you think.";
  failWith: string | null = null;

  async generate(params: GenerateParams): Promise<string> {
    this.calls.push(params);
    if (this.failWith) throw new InsightGenerationFailed(this.failWith);
    return this.reply;
  }
}
