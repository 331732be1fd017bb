import type { ModelPricing } from "./config.js";
import type { UsageTotals } from "./progress/events.js";

// Shape of `usage` on a Responses API result; every field may be absent.
export type ResponseUsageLike = {
  input_tokens?: number;
  input_tokens_details?: { cached_tokens?: number };
  output_tokens?: number;
  output_tokens_details?: { reasoning_tokens?: number };
  total_tokens?: number;
};

type ModelTotals = Omit<UsageTotals, "webSearchCalls">;

export type UsageSummary = {
  totals: UsageTotals;
  byModel: Record<string, ModelTotals & { costUsd?: number }>;
  costUsd?: number;
  // True when every model and tool used had a price.
  priced: boolean;
  missingPricingFor: string[];
};

const emptyTotals = (): ModelTotals => ({
  inputTokens: 0,
  cachedInputTokens: 0,
  outputTokens: 0,
  reasoningTokens: 0,
  totalTokens: 0,
});

export class UsageMeter {
  private byModel = new Map<string, ModelTotals>();
  private webSearchCalls = 0;

  record(model: string, usage: ResponseUsageLike | null | undefined) {
    const t = this.byModel.get(model) ?? emptyTotals();
    const input = usage?.input_tokens ?? 0;
    const output = usage?.output_tokens ?? 0;
    t.inputTokens += input;
    t.cachedInputTokens += usage?.input_tokens_details?.cached_tokens ?? 0;
    t.outputTokens += output;
    t.reasoningTokens += usage?.output_tokens_details?.reasoning_tokens ?? 0;
    t.totalTokens += usage?.total_tokens ?? input + output;
    this.byModel.set(model, t);
  }

  recordWebSearchCall() {
    this.webSearchCalls += 1;
  }

  summary(pricing?: { models?: ModelPricing; webSearchUsdPer1KCalls?: number }): UsageSummary {
    const totals: UsageTotals = { ...emptyTotals(), webSearchCalls: this.webSearchCalls };
    const byModel: UsageSummary["byModel"] = {};
    const missing: string[] = [];
    let cost = 0;

    for (const [model, t] of this.byModel) {
      totals.inputTokens += t.inputTokens;
      totals.cachedInputTokens += t.cachedInputTokens;
      totals.outputTokens += t.outputTokens;
      totals.reasoningTokens += t.reasoningTokens;
      totals.totalTokens += t.totalTokens;

      const price = pricing?.models?.[model];
      if (!price) {
        missing.push(`model:${model}`);
        byModel[model] = { ...t };
        continue;
      }
      // Cached input is billed at its own rate; the rest of the input at the full rate.
      const uncached = Math.max(0, t.inputTokens - t.cachedInputTokens);
      const modelCost =
        (uncached * price.input + t.cachedInputTokens * (price.cached_input ?? price.input) + t.outputTokens * price.output) /
        1_000_000;
      cost += modelCost;
      byModel[model] = { ...t, costUsd: modelCost };
    }

    if (this.webSearchCalls > 0) {
      const perK = pricing?.webSearchUsdPer1KCalls;
      if (perK === undefined) missing.push("tool:web_search");
      else cost += (this.webSearchCalls * perK) / 1000;
    }

    const anyPricing = Boolean(pricing?.models) || pricing?.webSearchUsdPer1KCalls !== undefined;
    return {
      totals,
      byModel,
      ...(anyPricing ? { costUsd: cost } : {}),
      priced: anyPricing && missing.length === 0,
      missingPricingFor: missing,
    };
  }
}
