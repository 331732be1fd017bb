import { describe, expect, it } from "vitest";
import { ProgressBoard } from "./progress/ProgressBoard.js";
import { followUpItems, refine, type RefinementStages } from "./refinement.js";
import { RecordingReporter } from "./testing/fakes.js";
import { EvaluationSchema, type Evaluation, type ResearchGap, type RunState } from "./types.js";

const gap = (topic: string, suggestedQueries: string[]): ResearchGap => ({ topic, reason: `${topic} is thin`, suggestedQueries });

const verdict = (needsMore: boolean, gaps: ResearchGap[] = []): Evaluation =>
  EvaluationSchema.parse({ completenessScore: 5, qualityScore: 6, needsMore, gaps });

function state(allResults: string[] = ["r1", "r2"], maxIterations = 3): RunState {
  return { runId: "run-1", query: "X", iteration: 1, maxIterations, allResults };
}

function stages(verdicts: (call: number) => Evaluation, perRound = 2) {
  const seen: { results: string[]; iteration: number }[] = [];
  const rounds: number[] = [];
  const s: RefinementStages = {
    evaluate: async (_q, results, iteration) => {
      seen.push({ results, iteration });
      return verdicts(seen.length);
    },
    followUp: async (items, iteration) => {
      rounds.push(items.length);
      return Array.from({ length: perRound }, (_, i) => `round ${iteration} result ${i + 1}`);
    },
  };
  return { s, seen, rounds };
}

describe("followUpItems", () => {
  it("restarts priority at 1 for every gap", () => {
    const items = followUpItems([gap("cost", ["c1", "c2", "c3"]), gap("policy", ["p1", "p2", "p3"])]);

    expect(items.map((i) => i.priority)).toEqual([1, 2, 3, 1, 2, 3]);
    expect(items.filter((i) => i.priority === 1)).toHaveLength(2);
    expect(items.filter((i) => i.priority === 2)).toHaveLength(2);
    expect(items.filter((i) => i.priority === 3)).toHaveLength(2);
  });

  it("keeps suggestion order and explains the gap in the reason", () => {
    const items = followUpItems([gap("cost", ["c1", "c2"])]);

    expect(items).toEqual([
      { query: "c1", reason: "To address gap: cost. cost is thin", priority: 1 },
      { query: "c2", reason: "To address gap: cost. cost is thin", priority: 2 },
    ]);
  });

  it("yields nothing for gaps without suggestions", () => {
    expect(followUpItems([gap("cost", [])])).toEqual([]);
    expect(followUpItems([])).toEqual([]);
  });
});

describe("refine", () => {
  it("stops after the first evaluation when no more research is needed", async () => {
    const st = state();
    const { s, seen, rounds } = stages(() => verdict(false));
    const board = new ProgressBoard(new RecordingReporter());

    const outcome = await refine(st, s, board);

    expect(outcome).toMatchObject({ followUpRounds: 0, capReached: false });
    expect(seen).toHaveLength(1);
    expect(rounds).toEqual([]);
    expect(st.iteration).toBe(1);
    expect(st.allResults).toEqual(["r1", "r2"]);
  });

  it("runs exactly maxIterations follow-up rounds when the evaluator always wants more", async () => {
    const st = state();
    const reporter = new RecordingReporter();
    const { s, seen, rounds } = stages(() => verdict(true, [gap("g", ["q1", "q2"])]));

    const outcome = await refine(st, s, new ProgressBoard(reporter));

    expect(outcome).toMatchObject({ followUpRounds: 3, capReached: true });
    expect(rounds).toEqual([2, 2, 2]);
    expect(seen.map((e) => e.iteration)).toEqual([1, 2, 3, 4]);
    expect(st.iteration).toBe(4);
    expect(st.allResults).toHaveLength(8);
    expect(reporter.updates("max_iterations")).toEqual([
      {
        type: "item_update",
        key: "max_iterations",
        message: "Reached maximum research iterations (3)",
        done: true,
        hideIndicator: false,
      },
    ]);
  });

  it("honours a smaller cap", async () => {
    const st = state(["r1"], 1);
    const { s, rounds } = stages(() => verdict(true, [gap("g", ["q1"])]));

    await refine(st, s, new ProgressBoard(new RecordingReporter()));

    expect(rounds).toEqual([1]);
    expect(st.iteration).toBe(2);
  });

  it("stops as soon as a later evaluation is satisfied", async () => {
    const st = state();
    const { s, rounds } = stages((call) => verdict(call < 2, [gap("g", ["q1"])]));

    const outcome = await refine(st, s, new ProgressBoard(new RecordingReporter()));

    expect(outcome).toMatchObject({ followUpRounds: 1, capReached: false });
    expect(rounds).toEqual([1]);
    expect(st.allResults).toEqual(["r1", "r2", "round 1 result 1", "round 1 result 2"]);
  });

  it("only ever grows the result list, even through empty rounds", async () => {
    const st = state();
    const sizes: number[] = [];
    const s: RefinementStages = {
      evaluate: async (_q, results) => {
        sizes.push(results.length);
        return verdict(true, [gap("g", ["q1", "q2"])]);
      },
      // Second round: every search failed.
      followUp: async (_items, iteration) => (iteration === 2 ? [] : [`r${iteration}`]),
    };

    await refine(st, s, new ProgressBoard(new RecordingReporter()));

    expect(sizes).toEqual([2, 3, 3, 4]);
    expect(st.allResults).toEqual(["r1", "r2", "r1", "r3"]);
  });

  it("hands the evaluator a snapshot, not the live list", async () => {
    const st = state();
    const { s, seen } = stages((call) => verdict(call === 1, [gap("g", ["q1"])]));

    await refine(st, s, new ProgressBoard(new RecordingReporter()));

    expect(seen[0]?.results).toEqual(["r1", "r2"]);
    expect(seen[1]?.results).toHaveLength(4);
  });

  it("still consumes an iteration when gaps carry no suggestions", async () => {
    const st = state();
    const { s, rounds } = stages(() => verdict(true, []), 0);

    const outcome = await refine(st, s, new ProgressBoard(new RecordingReporter()));

    expect(rounds).toEqual([0, 0, 0]);
    expect(outcome.capReached).toBe(true);
  });
});
