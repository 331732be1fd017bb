import type { ProgressBoard } from "./progress/ProgressBoard.js";
import type { Evaluation, ResearchGap, RunState, SearchItem, SearchResult } from "./types.js";

export const DEFAULT_MAX_ITERATIONS = 3;

/**
 * One item per suggested query, in order. Priority restarts at 1 for each
 * gap, so items from different gaps share priorities; it only orders launches.
 */
export function followUpItems(gaps: readonly ResearchGap[]): SearchItem[] {
  return gaps.flatMap((gap) =>
    gap.suggestedQueries.map((query, i) => ({
      query,
      reason: `To address gap: ${gap.topic}. ${gap.reason}`,
      priority: i + 1,
    })),
  );
}

export type RefinementStages = {
  evaluate: (query: string, results: SearchResult[], iteration: number) => Promise<Evaluation>;
  followUp: (items: SearchItem[], iteration: number) => Promise<SearchResult[]>;
};

export type RefinementOutcome = {
  evaluation: Evaluation;
  followUpRounds: number;
  capReached: boolean;
};

/**
 * Evaluate, and while the evaluator wants more and the cap allows, run one
 * follow-up round per iteration. Iterations 1..maxIterations may each add a
 * round; the evaluation at maxIterations + 1 always hands over to writing.
 * Mutates `state` (iteration, allResults) in place.
 */
export async function refine(state: RunState, stages: RefinementStages, board: ProgressBoard): Promise<RefinementOutcome> {
  let followUpRounds = 0;

  for (;;) {
    // Snapshot: the evaluator sees the list as it is now, later appends don't leak into its view.
    const evaluation = await stages.evaluate(state.query, [...state.allResults], state.iteration);

    if (!evaluation.needsMore) return { evaluation, followUpRounds, capReached: false };

    if (state.iteration > state.maxIterations) {
      board.upsert("max_iterations", `Reached maximum research iterations (${state.maxIterations})`, { done: true });
      board.log("refinement", 1, `${evaluation.gaps.length} gaps left open at the iteration cap`);
      return { evaluation, followUpRounds, capReached: true };
    }

    const items = followUpItems(evaluation.gaps);
    board.log("refinement", 2, `iteration ${state.iteration}: ${items.length} follow-up searches for ${evaluation.gaps.length} gaps`);
    const results = await stages.followUp(items, state.iteration);
    state.allResults.push(...results);
    followUpRounds += 1;
    state.iteration += 1;
  }
}
