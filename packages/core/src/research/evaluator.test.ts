import { describe, expect, it } from "vitest";
import { evaluateResearch, evaluationInput, formatResults } from "./evaluator.js";
import { ProgressBoard } from "./progress/ProgressBoard.js";
import { RecordingReporter, ScriptedGeneration, type GenerationScript } from "./testing/fakes.js";

function setup(evaluate?: GenerationScript["evaluate"]) {
  const reporter = new RecordingReporter();
  const generation = new ScriptedGeneration({ evaluate });
  return { reporter, generation, board: new ProgressBoard(reporter) };
}

describe("formatResults", () => {
  it("numbers results from 1 and separates them with a blank line", () => {
    expect(formatResults(["x", "y"])).toBe("Search Result 1: x\n\nSearch Result 2: y");
  });

  it("uses a placeholder for no results", () => {
    expect(evaluationInput("Q", [])).toBe("Original Query: Q\n\nSearch Results:\n(no search results)");
  });
});

describe("evaluateResearch", () => {
  it("reports the gaps it found", async () => {
    const { reporter, generation, board } = setup(() => ({
      completenessScore: 4,
      qualityScore: 5,
      needsMore: true,
      gaps: [
        { topic: "history", suggestedQueries: ["h1"] },
        { topic: "cost", suggestedQueries: [] },
      ],
    }));

    const evaluation = await evaluateResearch(generation, board, { query: "Q", results: ["x"], iteration: 2 });

    expect(evaluation.gaps.map((g) => g.reason)).toEqual(["", ""]);
    expect(generation.calls).toEqual([
      { role: "evaluator", input: "Original Query: Q\n\nSearch Results:\nSearch Result 1: x", mode: "generate" },
    ]);
    expect(reporter.messages("evaluation")).toEqual([
      "Evaluating research quality (iteration 2)...",
      "Identified 2 research gaps (iteration 2; quality 5/10, completeness 4/10)",
    ]);
    expect(reporter.logs("evaluation").map((l) => l.message)).toEqual(["needsMore=true, gaps=history | cost"]);
  });

  it("reports completion when nothing more is needed", async () => {
    const { reporter, generation, board } = setup();

    const evaluation = await evaluateResearch(generation, board, { query: "Q", results: [], iteration: 1 });

    expect(evaluation).toMatchObject({ needsMore: false, gaps: [], strengthAnalysis: "", gapAnalysis: "" });
    expect(reporter.updates("evaluation").at(-1)).toMatchObject({
      message: "Research evaluation complete (iteration 1; quality 8/10, completeness 8/10)",
      done: true,
    });
    expect(reporter.logs("evaluation").map((l) => l.message)).toEqual(["needsMore=false, gaps=(none)"]);
  });

  it("pulls out-of-range and fractional scores into 1..10", async () => {
    const { reporter, generation, board } = setup(() => ({ completenessScore: 0, qualityScore: 7.5, needsMore: false }));

    const evaluation = await evaluateResearch(generation, board, { query: "Q", results: [], iteration: 1 });

    expect(evaluation).toMatchObject({ completenessScore: 1, qualityScore: 8 });
    expect(reporter.messages("evaluation").at(-1)).toBe("Research evaluation complete (iteration 1; quality 8/10, completeness 1/10)");
  });

  it("caps scores above 10", async () => {
    const { generation, board } = setup(() => ({ completenessScore: 11, qualityScore: 42, needsMore: false }));

    expect(await evaluateResearch(generation, board, { query: "Q", results: [], iteration: 1 })).toMatchObject({
      completenessScore: 10,
      qualityScore: 10,
    });
  });
});
