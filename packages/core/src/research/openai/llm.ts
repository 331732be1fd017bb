import type OpenAI from "openai";
import type { UsageMeter } from "../UsageMeter.js";

export type ReasoningEffort = "minimal" | "low" | "medium" | "high";

export type LlmCall = {
  model: string;
  input: string;
  instructions?: string;
  temperature?: number;
  reasoningEffort?: ReasoningEffort;
};

export function normalizeReasoningEffort(model: string, reasoningEffort?: ReasoningEffort): ReasoningEffort | undefined {
  const m = model.toLowerCase();

  // gpt-5 / gpt-5-mini / gpt-5-nano return empty output unless effort="minimal".
  const isGpt5MiniFamily = m.startsWith("gpt-5-mini") || m.startsWith("gpt-5-nano");
  const isDatedGpt5 = m.startsWith("gpt-5-") && !m.startsWith("gpt-5.1") && !m.startsWith("gpt-5.2");
  const excluded = m.startsWith("gpt-5-pro") || m.startsWith("gpt-5-chat") || m.startsWith("gpt-5-search");
  if (!excluded && (m === "gpt-5" || isDatedGpt5 || isGpt5MiniFamily)) return "minimal";

  // gpt-5-pro only accepts "high".
  if (m.startsWith("gpt-5-pro")) return "high";

  // Non-reasoning models reject the parameter outright.
  if (!m.startsWith("gpt-5") && !/^o\d/.test(m)) return undefined;

  return reasoningEffort;
}

export function supportsTemperature(model: string, reasoningEffort?: ReasoningEffort) {
  const m = model.toLowerCase();
  if (m.startsWith("gpt-5") || /^o\d/.test(m)) return reasoningEffort === undefined;
  return true;
}

export function requestParams(call: LlmCall) {
  const effort = normalizeReasoningEffort(call.model, call.reasoningEffort);
  return {
    model: call.model,
    input: call.input,
    ...(call.instructions ? { instructions: call.instructions } : {}),
    ...(effort ? { reasoning: { effort } } : {}),
    ...(supportsTemperature(call.model, effort) && call.temperature !== undefined ? { temperature: call.temperature } : {}),
  };
}

export async function callText(openai: OpenAI, call: LlmCall, opts?: { meter?: UsageMeter }) {
  const resp = await openai.responses.create(requestParams(call));
  opts?.meter?.record(call.model, resp.usage);
  return { id: resp.id, text: resp.output_text ?? "" };
}
