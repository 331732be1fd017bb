#!/usr/bin/env node
import dotenv from "dotenv";
import path from "node:path";
import { createInterface } from "node:readline/promises";
import { fileURLToPath } from "node:url";
import { loadConfig, runResearch } from "research-loop-core";
import { parseArgs } from "./args.js";
import { formatReport } from "./formatReport.js";
import { ConsoleReporter } from "./progress/ConsoleReporter.js";

const PRODUCT_NAME = "research-loop";

// Load repo-root .env even when running from packages/cli.
const __dirname = path.dirname(fileURLToPath(import.meta.url));
dotenv.config({ path: path.resolve(__dirname, "..", "..", "..", ".env") });

function help() {
  const key = process.env.OPENAI_API_KEY ?? "";
  const env = (name: string, fallback: string) => `  ${name} (current: ${process.env[name] || fallback})`;

  // eslint-disable-next-line no-console
  console.log(
    [
      "Usage:",
      `  ${PRODUCT_NAME} [--pretty|--jsonl] [-v|-vv|-vvv] [--max-iterations N] [--debug-dir DIR] "your research question"`,
      "",
      "Without a question, it is read from stdin.",
      "",
      "Env:",
      `  OPENAI_API_KEY (${key ? `set (len: ${key.length})` : "NOT SET"}; not printed)`,
      env("RESEARCH_MODEL_THINKING", "gpt-5.2"),
      env("RESEARCH_MODEL_CHEAP", "gpt-5-mini"),
      env("RESEARCH_REASONING_EFFORT", "medium"),
      env("RESEARCH_MAX_ITERATIONS", "3"),
      env("RESEARCH_NARRATION_INTERVAL_MS", "5000"),
      env("RESEARCH_VERBOSITY", "0"),
      env("RESEARCH_DEBUG_DIR", "unset"),
    ].join("\n"),
  );
}

async function ask(question: string) {
  const rl = createInterface({ input: process.stdin, output: process.stderr });
  try {
    return (await rl.question(question)).trim();
  } finally {
    rl.close();
  }
}

async function main() {
  const { help: wantsHelp, query: argQuery, overrides } = parseArgs(process.argv);
  if (wantsHelp) {
    help();
    return;
  }

  const query = argQuery || (await ask("What would you like to research? "));
  if (!query) {
    help();
    process.exitCode = 1;
    return;
  }

  const config = loadConfig(overrides);
  const reporter = new ConsoleReporter({ pretty: config.pretty, jsonl: config.jsonl, verbosity: config.verbosity });

  const ac = new AbortController();
  process.once("SIGINT", () => ac.abort());

  const { report } = await runResearch({ input: query, config, reporter, signal: ac.signal });
  if (config.jsonl) {
    // eslint-disable-next-line no-console
    console.log(JSON.stringify({ type: "final_report", report }));
  } else {
    // eslint-disable-next-line no-console
    console.log(formatReport(report));
  }
}

main().catch((err: unknown) => {
  // eslint-disable-next-line no-console
  console.error(err instanceof Error ? (err.stack ?? err.message) : String(err));
  process.exit(1);
});
