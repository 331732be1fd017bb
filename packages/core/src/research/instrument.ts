import type { DebugRecorder } from "./debugDump.js";
import { errorMessage } from "./errors.js";
import type { ProgressBoard } from "./progress/ProgressBoard.js";

export type InstrumentHooks = {
  board: ProgressBoard;
  recorder: DebugRecorder;
  now?: () => number;
};

export type StageOptions<A extends unknown[], R> = {
  // Name for the debug dump of the output; derived from the args so each iteration gets its own file.
  dumpAs?: (...args: A) => string;
  summarize?: (result: R) => string;
};

function seconds(ms: number) {
  return `${(ms / 1000).toFixed(2)}s`;
}

/**
 * Wraps a stage with timing logs and an optional debug dump of its output.
 * Errors are logged and rethrown unchanged; the caller's error boundary
 * captures them.
 */
export function instrument<A extends unknown[], R>(
  stage: string,
  fn: (...args: A) => Promise<R>,
  hooks: InstrumentHooks,
  opts?: StageOptions<A, R>,
): (...args: A) => Promise<R> {
  const now = hooks.now ?? Date.now;
  return async (...args: A) => {
    const startedAt = now();
    hooks.board.log(stage, 3, "started");
    try {
      const result = await fn(...args);
      const summary = opts?.summarize ? ` (${opts.summarize(result)})` : "";
      hooks.board.log(stage, 2, `completed in ${seconds(now() - startedAt)}${summary}`);
      if (opts?.dumpAs) await hooks.recorder.dump(opts.dumpAs(...args), result);
      return result;
    } catch (e) {
      hooks.board.log(stage, 1, `failed after ${seconds(now() - startedAt)}: ${errorMessage(e)}`);
      throw e;
    }
  };
}
