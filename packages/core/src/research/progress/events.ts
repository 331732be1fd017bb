export type ProgressKey =
  | "trace_id"
  | "starting"
  | "planning"
  | "searching"
  | "evaluation"
  | "follow_up"
  | "max_iterations"
  | "writing"
  | "final_report"
  | "error";

export type LogLevel = 1 | 2 | 3;

export type UsageTotals = {
  inputTokens: number;
  cachedInputTokens: number;
  outputTokens: number;
  reasoningTokens: number;
  totalTokens: number;
  webSearchCalls: number;
};

export type ProgressEvent =
  | { type: "run_start"; runId: string; query: string }
  | { type: "item_update"; key: ProgressKey; message: string; done: boolean; hideIndicator: boolean }
  | { type: "log"; scope: string; level: LogLevel; message: string }
  | {
      type: "run_end";
      runId: string;
      ok: boolean;
      iterations: number;
      resultCount: number;
      usage?: UsageTotals;
      costUsd?: number;
      costPriced?: boolean;
      costMissingPricingFor?: string[];
    };

export interface Reporter {
  emit(e: ProgressEvent): void;
}

export const silentReporter: Reporter = { emit: () => {} };
