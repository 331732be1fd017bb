import crypto from "node:crypto";
import type { GenerationCapability, SearchCapability } from "./capabilities.js";
import type { ResearchConfig } from "./config.js";
import { createDebugRecorder, noopRecorder, type DebugRecorder } from "./debugDump.js";
import { EmptyQueryError, ResearchAbortedError, errorMessage } from "./errors.js";
import { evaluateResearch } from "./evaluator.js";
import { FOLLOW_UP_LANE, PLAN_LANE, executeAll } from "./fanOut.js";
import { instrument } from "./instrument.js";
import { makeOpenAI } from "./openai/client.js";
import { OpenAIGeneration } from "./openai/generation.js";
import { OpenAIWebSearch } from "./openai/webSearch.js";
import { planSearches } from "./planner.js";
import type { Reporter } from "./progress/events.js";
import { ProgressBoard } from "./progress/ProgressBoard.js";
import { DEFAULT_MAX_ITERATIONS, refine } from "./refinement.js";
import { writeReport } from "./synthesizer.js";
import type { Report, RunState } from "./types.js";
import { UsageMeter, type UsageSummary } from "./UsageMeter.js";

export type OrchestratorDeps = {
  generation: GenerationCapability;
  search: SearchCapability;
  reporter: Reporter;
  recorder?: DebugRecorder;
  maxIterations?: number;
  narrationIntervalMs?: number;
  signal?: AbortSignal;
  newRunId?: () => string;
  // Attached to the run_end event, e.g. token usage from the capabilities.
  usage?: () => UsageSummary;
};

/**
 * Plan -> search -> evaluate/follow-up loop -> write. Stages run one after
 * another; only the searches inside a batch run concurrently. Any stage
 * failure is reported once as "error" and rethrown.
 */
export class ResearchOrchestrator {
  constructor(private deps: OrchestratorDeps) {}

  async run(query: string): Promise<Report> {
    const { generation, search, signal } = this.deps;
    const recorder = this.deps.recorder ?? noopRecorder;
    const board = new ProgressBoard(this.deps.reporter);
    const state: RunState = {
      runId: (this.deps.newRunId ?? crypto.randomUUID)(),
      query: query.trim(),
      iteration: 1,
      maxIterations: this.deps.maxIterations ?? DEFAULT_MAX_ITERATIONS,
      allResults: [],
    };

    const throwIfAborted = () => {
      if (signal?.aborted) throw new ResearchAbortedError();
    };
    const hooks = { board, recorder };

    const plan = instrument("planning", (q: string) => planSearches(generation, board, q), hooks, {
      dumpAs: () => "search_plan",
      summarize: (p) => `${p.items.length} searches`,
    });
    const initialSearch = instrument(
      "searching",
      (items: Parameters<typeof executeAll>[1]) => executeAll(search, items, { board, recorder, lane: PLAN_LANE }),
      hooks,
      { summarize: (r) => `${r.length} results` },
    );
    const followUp = instrument(
      "follow_up",
      (items: Parameters<typeof executeAll>[1], _iteration: number) =>
        executeAll(search, items, { board, recorder, lane: FOLLOW_UP_LANE }),
      hooks,
      { dumpAs: (_items, iteration) => `follow_up_results_iteration_${iteration}`, summarize: (r) => `${r.length} results` },
    );
    const evaluate = instrument(
      "evaluation",
      (q: string, results: string[], iteration: number) => evaluateResearch(generation, board, { query: q, results, iteration }),
      hooks,
      { dumpAs: (_q, _r, iteration) => `evaluation_iteration_${iteration}` },
    );
    const write = instrument(
      "writing",
      (q: string, results: string[]) =>
        writeReport(generation, board, recorder, { query: q, results, narrationIntervalMs: this.deps.narrationIntervalMs }),
      hooks,
      { dumpAs: () => "final_report", summarize: (r) => `${r.fullReport.length} chars` },
    );

    this.deps.reporter.emit({ type: "run_start", runId: state.runId, query: state.query });
    board.upsert("trace_id", `Run id: ${state.runId}`, { done: true, hideIndicator: true });
    board.upsert("starting", "Starting research...", { done: true, hideIndicator: true });

    try {
      if (!state.query) throw new EmptyQueryError();
      throwIfAborted();
      const searchPlan = await plan(state.query);

      throwIfAborted();
      state.allResults.push(...(await initialSearch(searchPlan.items)));

      throwIfAborted();
      const outcome = await refine(
        state,
        {
          evaluate: async (q, results, iteration) => {
            throwIfAborted();
            return evaluate(q, results, iteration);
          },
          followUp: async (items, iteration) => {
            throwIfAborted();
            await recorder.dump(`follow_up_search_items_iteration_${iteration}`, items);
            return followUp(items, iteration);
          },
        },
        board,
      );
      board.log(
        "refinement",
        1,
        `${outcome.followUpRounds} follow-up rounds, ${state.allResults.length} results${outcome.capReached ? " (iteration cap reached)" : ""}`,
      );

      throwIfAborted();
      const report = await write(state.query, [...state.allResults]);

      board.upsert("final_report", `Report summary\n\n${report.shortSummary}`, { done: true });
      board.end();
      this.emitRunEnd(state, true);
      return report;
    } catch (e) {
      board.upsert("error", `Error occurred during research: ${errorMessage(e)}`, { done: true });
      await recorder.captureError(e, `research run for query: ${state.query}`);
      board.end();
      this.emitRunEnd(state, false);
      throw e;
    }
  }

  private emitRunEnd(state: RunState, ok: boolean) {
    const usage = this.deps.usage?.();
    this.deps.reporter.emit({
      type: "run_end",
      runId: state.runId,
      ok,
      iterations: state.iteration,
      resultCount: state.allResults.length,
      ...(usage
        ? {
            usage: usage.totals,
            costUsd: usage.costUsd,
            costPriced: usage.priced,
            costMissingPricingFor: usage.missingPricingFor,
          }
        : {}),
    });
  }
}

export type RunArgs = {
  input: string;
  config: ResearchConfig;
  reporter: Reporter;
  signal?: AbortSignal;
};

/** Runs one query end to end with the OpenAI-backed capabilities described by `config`. */
export async function runResearch(args: RunArgs): Promise<{ report: Report; usage: UsageSummary }> {
  const { config, reporter } = args;
  const openai = makeOpenAI(config);
  const meter = new UsageMeter();
  const pricing = { models: config.pricingUsdPer1MTokens, webSearchUsdPer1KCalls: config.webSearchUsdPer1KCalls };

  const recorder = config.debugDir
    ? createDebugRecorder({
        dir: config.debugDir,
        onWriteError: (message) => reporter.emit({ type: "log", scope: "debug", level: 1, message }),
      })
    : noopRecorder;

  const orchestrator = new ResearchOrchestrator({
    generation: new OpenAIGeneration(openai, config, meter),
    search: new OpenAIWebSearch(openai, config, meter),
    reporter,
    recorder,
    maxIterations: config.maxIterations,
    narrationIntervalMs: config.narrationIntervalMs,
    signal: args.signal,
    usage: () => meter.summary(pricing),
  });

  const report = await orchestrator.run(args.input);
  return { report, usage: meter.summary(pricing) };
}
