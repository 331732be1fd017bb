import type OpenAI from "openai";
import type { SearchCapability } from "../capabilities.js";
import type { ResearchConfig } from "../config.js";
import { SEARCH_INSTRUCTIONS } from "../prompts.js";
import type { UsageMeter } from "../UsageMeter.js";

/**
 * Search backed by the OpenAI-hosted web_search tool. The model runs the
 * search itself and answers with a short summary, which is all the engine
 * keeps.
 */
export class OpenAIWebSearch implements SearchCapability {
  constructor(
    private openai: OpenAI,
    private cfg: ResearchConfig,
    private meter?: UsageMeter,
  ) {}

  async search(text: string) {
    this.meter?.recordWebSearchCall();
    const resp = await this.openai.responses.create({
      model: this.cfg.models.cheap,
      instructions: SEARCH_INSTRUCTIONS,
      tools: [{ type: "web_search" }],
      tool_choice: "required",
      input: text,
      // "minimal" effort cannot call hosted tools.
      reasoning: { effort: "low" },
    });
    this.meter?.record(this.cfg.models.cheap, resp.usage);

    const summary = resp.output_text.trim();
    if (!summary) throw new Error(`web_search returned no summary (${text.split("\n")[0] ?? text})`);
    return summary;
  }
}
