import type { ConfigOverrides, Verbosity } from "research-loop-core";

export type CliArgs = {
  help: boolean;
  query: string;
  overrides: ConfigOverrides;
};

function clampVerbosity(n: number): Verbosity {
  const v = Math.max(0, Math.min(3, Math.trunc(n)));
  if (v === 1 || v === 2 || v === 3) return v;
  return 0;
}

export function parseArgs(argv: string[], env: Record<string, string | undefined> = process.env): CliArgs {
  const args = argv.slice(2);
  const positional: string[] = [];
  const overrides: ConfigOverrides = {};
  let help = false;
  let verbosity: number | undefined;
  let pretty = false;
  let jsonl = false;

  for (let i = 0; i < args.length; i++) {
    const a = args[i] ?? "";
    if (a === "--") continue;
    if (/^-v+$/.test(a)) {
      verbosity = (verbosity ?? 0) + (a.length - 1);
      continue;
    }
    if (a === "--pretty") pretty = true;
    else if (a === "--jsonl") jsonl = true;
    else if (a === "--help" || a === "-h") help = true;
    else if (a === "--max-iterations") {
      const n = Number(args[++i] ?? "");
      if (!Number.isInteger(n) || n < 1) throw new Error("--max-iterations expects a positive integer");
      overrides.maxIterations = n;
    } else if (a === "--debug-dir") {
      const dir = args[++i] ?? "";
      if (!dir) throw new Error("--debug-dir expects a directory");
      overrides.debugDir = dir;
    } else positional.push(a);
  }

  overrides.jsonl = jsonl;
  overrides.pretty = pretty || (!jsonl && env.RESEARCH_PRETTY !== "0");
  if (verbosity !== undefined) overrides.verbosity = clampVerbosity(verbosity);

  return { help, query: positional.join(" ").trim(), overrides };
}
