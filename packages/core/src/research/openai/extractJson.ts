import type { ZodIssue, ZodType, ZodTypeDef } from "zod";
import { InvalidModelOutputError } from "../errors.js";

// One model round trip: prompt in, raw text out.
export type Complete = (prompt: string) => Promise<string>;

type Parsed<T> = { ok: true; value: T } | { ok: false; reason: string; issues: ZodIssue[] };

function stripFences(text: string) {
  const t = text.trim();
  const m = /^```(?:json)?\s*\n([\s\S]*?)\n?```$/i.exec(t);
  return m?.[1] ?? t;
}

export function parseModelJson<T>(text: string, schema: ZodType<T, ZodTypeDef, unknown>): Parsed<T> {
  let raw: unknown;
  try {
    raw = JSON.parse(stripFences(text));
  } catch {
    return { ok: false, reason: "output is not valid JSON", issues: [] };
  }
  const result = schema.safeParse(raw);
  if (result.success) return { ok: true, value: result.data };
  return {
    ok: false,
    reason: result.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; "),
    issues: result.error.issues,
  };
}

export function extractionPrompt(instruction: string, input: string) {
  return [
    "Return JSON only. No prose, no markdown, no code fences.",
    "If the input is ambiguous, choose the most reasonable interpretation and proceed.",
    "",
    "Instruction:",
    instruction,
    "",
    "Input:",
    input,
  ].join("\n");
}

/** One repair attempt on bad output; throws InvalidModelOutputError if that fails too. */
export async function repairJson<T>(
  repair: Complete,
  args: { instruction: string; badText: string; problem: string; schema: ZodType<T, ZodTypeDef, unknown> },
): Promise<T> {
  const prompt = [
    "Fix the following into valid JSON that satisfies the instruction.",
    "Return JSON only. No prose, no markdown, no code fences.",
    "",
    "Instruction:",
    args.instruction,
    "",
    `Problem: ${args.problem}`,
    "",
    "Bad JSON:",
    args.badText,
  ].join("\n");

  const repaired = await repair(prompt);
  const parsed = parseModelJson(repaired, args.schema);
  if (parsed.ok) return parsed.value;
  throw new InvalidModelOutputError(`Failed to extract valid JSON from model output: ${parsed.reason}`, parsed.issues, repaired);
}

export async function extractJson<T>(
  models: { primary: Complete; repair: Complete },
  args: { instruction: string; input: string; schema: ZodType<T, ZodTypeDef, unknown> },
): Promise<T> {
  const first = await models.primary(extractionPrompt(args.instruction, args.input));
  const parsed = parseModelJson(first, args.schema);
  if (parsed.ok) return parsed.value;
  return repairJson(models.repair, { instruction: args.instruction, badText: first, problem: parsed.reason, schema: args.schema });
}
