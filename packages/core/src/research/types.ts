import { z } from "zod";

// Model output is not guaranteed; missing arrays become [] instead of failing the whole stage.
const stringList = z.array(z.string()).default([]);
// Scores and priorities are advisory: out-of-range values are pulled into range, never rejected.
const score = z.number().transform((n) => Math.min(10, Math.max(1, Math.round(n))));

export const SearchItemSchema = z.object({
  // May be blank in model output; the planner drops such items.
  query: z.string(),
  reason: z.string().default(""),
  // 1 = most important. Only used for launch order and logs.
  priority: z.number().transform((n) => Math.max(1, Math.round(n))),
});

export const SearchPlanSchema = z.object({
  mainTopics: stringList,
  items: z.array(SearchItemSchema).default([]),
});

export const ResearchGapSchema = z.object({
  topic: z.string(),
  reason: z.string().default(""),
  suggestedQueries: stringList,
});

export const EvaluationSchema = z.object({
  completenessScore: score,
  qualityScore: score,
  strengthAnalysis: z.string().default(""),
  gapAnalysis: z.string().default(""),
  gaps: z.array(ResearchGapSchema).default([]),
  needsMore: z.boolean(),
});

export const ReportSchema = z.object({
  shortSummary: z.string(),
  outline: z.string(),
  fullReport: z.string(),
  limitations: stringList,
  followUps: stringList,
});

export type SearchItem = Readonly<z.infer<typeof SearchItemSchema>>;
export type SearchPlan = z.infer<typeof SearchPlanSchema>;
export type ResearchGap = z.infer<typeof ResearchGapSchema>;
export type Evaluation = z.infer<typeof EvaluationSchema>;
export type Report = Readonly<z.infer<typeof ReportSchema>>;

// A search summary. Only successful searches ever become one.
export type SearchResult = string;

export type RunState = {
  runId: string;
  query: string;
  // Starts at 1; may reach maxIterations + 1 exactly once, which ends the loop.
  iteration: number;
  maxIterations: number;
  // Append-only for the whole run.
  allResults: SearchResult[];
};
