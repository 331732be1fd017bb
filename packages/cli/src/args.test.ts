import { describe, expect, it } from "vitest";
import { parseArgs } from "./args.js";

const argv = (...args: string[]) => ["node", "cli", ...args];

describe("parseArgs", () => {
  it("joins positional words into the query", () => {
    expect(parseArgs(argv("-vv", "--max-iterations", "2", "what", "is", "x"), {})).toEqual({
      help: false,
      query: "what is x",
      overrides: { maxIterations: 2, jsonl: false, pretty: true, verbosity: 2 },
    });
  });

  it("turns pretty output off for --jsonl", () => {
    expect(parseArgs(argv("--jsonl", "q"), {}).overrides).toEqual({ jsonl: true, pretty: false });
  });

  it("honours RESEARCH_PRETTY=0 unless --pretty is given", () => {
    expect(parseArgs(argv("q"), { RESEARCH_PRETTY: "0" }).overrides.pretty).toBe(false);
    expect(parseArgs(argv("--pretty", "q"), { RESEARCH_PRETTY: "0" }).overrides.pretty).toBe(true);
  });

  it("adds up and clamps -v flags", () => {
    expect(parseArgs(argv("-v", "-v", "q"), {}).overrides.verbosity).toBe(2);
    expect(parseArgs(argv("-vvvv", "q"), {}).overrides.verbosity).toBe(3);
    expect(parseArgs(argv("q"), {}).overrides.verbosity).toBeUndefined();
  });

  it("reads --debug-dir and --help", () => {
    const parsed = parseArgs(argv("--debug-dir", "out", "-h", "--", "q"), {});

    expect(parsed.help).toBe(true);
    expect(parsed.query).toBe("q");
    expect(parsed.overrides.debugDir).toBe("out");
  });

  it("rejects bad option values", () => {
    expect(() => parseArgs(argv("--max-iterations", "0"), {})).toThrow("--max-iterations expects a positive integer");
    expect(() => parseArgs(argv("--max-iterations"), {})).toThrow("--max-iterations expects a positive integer");
    expect(() => parseArgs(argv("--debug-dir"), {})).toThrow("--debug-dir expects a directory");
  });
});
