import type { GenerationCapability } from "./capabilities.js";
import type { DebugRecorder } from "./debugDump.js";
import { errorMessage } from "./errors.js";
import { formatResults } from "./evaluator.js";
import { StatusTicker, WRITING_LABELS } from "./narration.js";
import type { ProgressBoard } from "./progress/ProgressBoard.js";
import { ReportSchema, type Report, type SearchResult } from "./types.js";

export const DEFAULT_NARRATION_INTERVAL_MS = 5000;

export function writerInput(query: string, results: readonly SearchResult[]) {
  return `Original query: ${query}\n\nSummarized search results:\n${formatResults(results)}`;
}

export async function writeReport(
  generation: GenerationCapability,
  board: ProgressBoard,
  recorder: DebugRecorder,
  args: { query: string; results: readonly SearchResult[]; narrationIntervalMs?: number },
): Promise<Report> {
  board.upsert("writing", WRITING_LABELS[0]);

  const stream = generation.stream({ role: "writer", input: writerInput(args.query, args.results), schema: ReportSchema });
  const ticker = new StatusTicker({
    // The cadence walks the full list, so the opening label is posted again after the first interval.
    labels: WRITING_LABELS,
    intervalMs: args.narrationIntervalMs ?? DEFAULT_NARRATION_INTERVAL_MS,
    onTick: (label) => {
      board.upsert("writing", label);
      board.log("writing", 3, `status: ${label}`);
    },
  });

  let events = 0;
  let streamError: { error: unknown } | undefined;
  ticker.start();
  try {
    for await (const _event of stream) events += 1;
  } catch (e) {
    // The stream's own outcome is decided by final() below.
    board.log("writing", 1, `error in report stream after ${events} events: ${errorMessage(e)}`);
    streamError = { error: e };
  } finally {
    ticker.stop();
  }

  const report = await stream.final();
  // Only a recovered stream error is captured here; a fatal one reaches the run's error boundary.
  if (streamError) await recorder.captureError(streamError.error, "report generation stream");
  board.markDone("writing");
  return report;
}
