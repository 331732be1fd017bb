import type { GenerationCapability } from "./capabilities.js";
import type { ProgressBoard } from "./progress/ProgressBoard.js";
import { EvaluationSchema, type Evaluation, type SearchResult } from "./types.js";

// Labels are positional at call time, so a result can change number between rounds as the list grows.
export function formatResults(results: readonly SearchResult[]) {
  if (results.length === 0) return "(no search results)";
  return results.map((r, i) => `Search Result ${i + 1}: ${r}`).join("\n\n");
}

export function evaluationInput(query: string, results: readonly SearchResult[]) {
  return `Original Query: ${query}\n\nSearch Results:\n${formatResults(results)}`;
}

export async function evaluateResearch(
  generation: GenerationCapability,
  board: ProgressBoard,
  args: { query: string; results: readonly SearchResult[]; iteration: number },
): Promise<Evaluation> {
  const { iteration } = args;
  board.upsert("evaluation", `Evaluating research quality (iteration ${iteration})...`);

  const evaluation = await generation.generate({
    role: "evaluator",
    input: evaluationInput(args.query, args.results),
    schema: EvaluationSchema,
  });

  const scores = `quality ${evaluation.qualityScore}/10, completeness ${evaluation.completenessScore}/10`;
  board.upsert(
    "evaluation",
    evaluation.needsMore
      ? `Identified ${evaluation.gaps.length} research gaps (iteration ${iteration}; ${scores})`
      : `Research evaluation complete (iteration ${iteration}; ${scores})`,
    { done: true },
  );
  board.log(
    "evaluation",
    2,
    `needsMore=${evaluation.needsMore}, gaps=${evaluation.gaps.map((g) => g.topic).join(" | ") || "(none)"}`,
  );
  return evaluation;
}
