import type { ProgressEvent, Reporter, Verbosity } from "research-loop-core";

type Opts = {
  pretty: boolean;
  jsonl: boolean;
  verbosity: Verbosity;
  write?: (line: string) => void;
  // Milliseconds since an arbitrary origin; only differences are used.
  clock?: () => number;
};

function truncate(s: string, maxChars: number) {
  const t = s.trim();
  if (t.length <= maxChars) return t;
  return `${t.slice(0, Math.max(0, maxChars - 14)).trimEnd()} …(truncated)`;
}

export function formatElapsed(ms: number) {
  const totalSeconds = Math.max(0, Math.floor(ms / 1000));
  const s = totalSeconds % 60;
  const m = Math.floor(totalSeconds / 60) % 60;
  const h = Math.floor(totalSeconds / 3600);

  if (h > 0) return `${h}h${String(m).padStart(2, "0")}m${String(s).padStart(2, "0")}s`;
  if (m > 0) return `${m}m${String(s).padStart(2, "0")}s`;
  return `${s}s`;
}

export function formatUsd(costUsd: number) {
  if (!Number.isFinite(costUsd) || costUsd < 0) return "";
  if (costUsd > 0 && costUsd < 0.01) return "$<0.01";
  return `$${costUsd.toFixed(2)}`;
}

/**
 * Renders progress to stderr. Pretty mode prints one line per item update
 * and per visible log event; JSONL mode prints every event as-is.
 */
export class ConsoleReporter implements Reporter {
  private write: (line: string) => void;
  private clock: () => number;
  private startMs: number;

  constructor(private opts: Opts) {
    this.write = opts.write ?? ((line) => console.error(line));
    this.clock = opts.clock ?? (() => performance.now());
    this.startMs = this.clock();
  }

  emit(e: ProgressEvent) {
    const elapsedMs = Math.round(this.clock() - this.startMs);
    if (this.opts.jsonl || !this.opts.pretty) {
      if (e.type === "log" && this.opts.verbosity < e.level) return;
      this.write(JSON.stringify({ ...e, elapsedMs }));
      return;
    }

    const prefix = `[${formatElapsed(elapsedMs).padStart(8, " ")}]`;

    if (e.type === "run_start") {
      this.write(`${prefix} researching: ${e.query}`);
      return;
    }
    if (e.type === "item_update") {
      const marker = e.hideIndicator ? " " : e.done ? "✓" : "…";
      const [firstLine = "", ...more] = e.message.split("\n");
      this.write(`${prefix} ${marker} ${firstLine}`);
      // Multi-line messages (the final summary) keep their body under the headline.
      for (const line of more) this.write(`${" ".repeat(prefix.length + 3)}${line}`);
      return;
    }
    if (e.type === "log") {
      if (this.opts.verbosity < e.level) return;
      const max = this.opts.verbosity === 1 ? 400 : this.opts.verbosity === 2 ? 1400 : 4500;
      this.write(`${prefix}    ${e.scope} [v${e.level}]: ${truncate(e.message, max)}`);
      return;
    }

    const usage = e.usage
      ? `, tokens=${e.usage.totalTokens} (in=${e.usage.inputTokens}, out=${e.usage.outputTokens}), web_search_calls=${e.usage.webSearchCalls}`
      : "";
    const cost =
      e.costUsd === undefined
        ? ""
        : e.costPriced
          ? `, cost=${formatUsd(e.costUsd)}`
          : `, cost~${formatUsd(e.costUsd)} (partial; missing ${e.costMissingPricingFor?.join(", ") ?? "pricing"})`;
    this.write(`${prefix} ${e.ok ? "done" : "failed"} (${e.resultCount} results, ${e.iterations} iterations${usage}${cost})`);
  }
}
