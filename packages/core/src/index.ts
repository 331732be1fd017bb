export { runResearch, ResearchOrchestrator } from "./research/runResearch.js";
export type { OrchestratorDeps, RunArgs } from "./research/runResearch.js";
export { loadConfig, requireApiKey } from "./research/config.js";
export type { ConfigOverrides, ModelPricing, ResearchConfig, Verbosity } from "./research/config.js";
export type {
  AgentRole,
  GenerationCall,
  GenerationCapability,
  GenerationEvent,
  GenerationStream,
  SearchCapability,
} from "./research/capabilities.js";
export type { LogLevel, ProgressEvent, ProgressKey, Reporter, UsageTotals } from "./research/progress/events.js";
export { silentReporter } from "./research/progress/events.js";
export { ProgressBoard } from "./research/progress/ProgressBoard.js";
export type { ProgressItem } from "./research/progress/ProgressBoard.js";
export { createDebugRecorder, noopRecorder } from "./research/debugDump.js";
export type { DebugRecorder } from "./research/debugDump.js";
export { UsageMeter } from "./research/UsageMeter.js";
export type { UsageSummary } from "./research/UsageMeter.js";
export { ConfigError, EmptyQueryError, InvalidModelOutputError, ResearchAbortedError, errorMessage } from "./research/errors.js";
export { OpenAIGeneration } from "./research/openai/generation.js";
export { OpenAIWebSearch } from "./research/openai/webSearch.js";
export {
  EvaluationSchema,
  ReportSchema,
  ResearchGapSchema,
  SearchItemSchema,
  SearchPlanSchema,
} from "./research/types.js";
export type { Evaluation, Report, ResearchGap, RunState, SearchItem, SearchPlan, SearchResult } from "./research/types.js";
