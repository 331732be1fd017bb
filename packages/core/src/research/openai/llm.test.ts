import { describe, expect, it } from "vitest";
import { normalizeReasoningEffort, requestParams, supportsTemperature } from "./llm.js";

describe("normalizeReasoningEffort", () => {
  it.each([
    ["gpt-5", "high", "minimal"],
    ["gpt-5-mini", "medium", "minimal"],
    ["gpt-5-2025-08-07", "low", "minimal"],
    ["gpt-5.2", "medium", "medium"],
    ["gpt-5-pro", "low", "high"],
    ["o3", "low", "low"],
  ] as const)("%s with %s -> %s", (model, effort, expected) => {
    expect(normalizeReasoningEffort(model, effort)).toBe(expected);
  });

  it("drops the effort for non-reasoning models", () => {
    expect(normalizeReasoningEffort("gpt-4.1", "high")).toBeUndefined();
  });
});

describe("supportsTemperature", () => {
  it("only allows temperature on reasoning models without an effort", () => {
    expect(supportsTemperature("gpt-5.2", "medium")).toBe(false);
    expect(supportsTemperature("gpt-5.2")).toBe(true);
    expect(supportsTemperature("gpt-4.1", "high")).toBe(true);
  });
});

describe("requestParams", () => {
  it("omits temperature once an effort is forced", () => {
    expect(requestParams({ model: "gpt-5-mini", input: "p", temperature: 0 })).toEqual({
      model: "gpt-5-mini",
      input: "p",
      reasoning: { effort: "minimal" },
    });
  });

  it("keeps instructions and temperature for non-reasoning models", () => {
    expect(
      requestParams({ model: "gpt-4.1", input: "p", instructions: "sys", temperature: 0, reasoningEffort: "high" }),
    ).toEqual({ model: "gpt-4.1", input: "p", instructions: "sys", temperature: 0 });
  });
});
