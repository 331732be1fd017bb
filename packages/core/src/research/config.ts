import { z } from "zod";
import { ConfigError, errorMessage } from "./errors.js";

const PricingSchema = z.record(
  z.object({
    // USD per 1M tokens.
    input: z.number().nonnegative(),
    output: z.number().nonnegative(),
    cached_input: z.number().nonnegative().optional(),
  }),
);

export type ModelPricing = z.infer<typeof PricingSchema>;

const DEFAULT_PRICING_USD_PER_1M_TOKENS: ModelPricing = {
  // Override with RESEARCH_PRICING_USD_PER_1M_TOKENS_JSON when rates change.
  "gpt-5.2": { input: 1.75, cached_input: 0.175, output: 14.0 },
  "gpt-5-mini": { input: 0.25, cached_input: 0.025, output: 2.0 },
};

const Verbosity = z.union([z.literal(0), z.literal(1), z.literal(2), z.literal(3)]);
export type Verbosity = z.infer<typeof Verbosity>;

const ConfigSchema = z.object({
  // Only required once OpenAI-backed capabilities are built (see requireApiKey).
  openaiApiKey: z.string(),
  models: z.object({
    thinking: z.string().min(1),
    cheap: z.string().min(1),
  }),
  reasoningEffort: z.enum(["low", "medium", "high"]),
  maxIterations: z.number().int().positive(),
  narrationIntervalMs: z.number().int().positive(),
  pretty: z.boolean(),
  jsonl: z.boolean(),
  verbosity: Verbosity,
  debugDir: z.string().min(1).optional(),
  pricingUsdPer1MTokens: PricingSchema,
  // USD per 1K web_search tool calls.
  webSearchUsdPer1KCalls: z.number().nonnegative(),
});

export type ResearchConfig = z.infer<typeof ConfigSchema>;

export type ConfigOverrides = Partial<
  Pick<ResearchConfig, "maxIterations" | "pretty" | "jsonl" | "verbosity" | "debugDir">
>;

type Env = Record<string, string | undefined>;

function readEnv(env: Env, name: string) {
  return (env[name] ?? "").trim();
}

function parsePricingJson(env: Env) {
  const raw = readEnv(env, "RESEARCH_PRICING_USD_PER_1M_TOKENS_JSON");
  if (!raw) return undefined;
  try {
    return PricingSchema.parse(JSON.parse(raw));
  } catch (e) {
    throw new ConfigError(`Invalid RESEARCH_PRICING_USD_PER_1M_TOKENS_JSON: ${errorMessage(e)}`);
  }
}

function parseNumber(env: Env, name: string, fallback: number, check: (n: number) => boolean, expected: string) {
  const raw = readEnv(env, name);
  if (!raw) return fallback;
  const n = Number(raw);
  if (!Number.isFinite(n) || !check(n)) throw new ConfigError(`Invalid ${name} (must be ${expected}).`);
  return n;
}

function parseVerbosity(env: Env): Verbosity {
  const n = Number(readEnv(env, "RESEARCH_VERBOSITY") || "0");
  if (n === 0 || n === 1 || n === 2 || n === 3) return n;
  return 0;
}

function parseEffort(env: Env): ResearchConfig["reasoningEffort"] {
  const raw = readEnv(env, "RESEARCH_REASONING_EFFORT");
  if (!raw) return "medium";
  if (raw === "low" || raw === "medium" || raw === "high") return raw;
  throw new ConfigError("Invalid RESEARCH_REASONING_EFFORT (must be low, medium or high).");
}

export function loadConfig(overrides?: ConfigOverrides, env: Env = process.env): ResearchConfig {
  const isPositiveInt = (n: number) => Number.isInteger(n) && n > 0;
  const base = {
    openaiApiKey: readEnv(env, "OPENAI_API_KEY"),
    models: {
      thinking: readEnv(env, "RESEARCH_MODEL_THINKING") || "gpt-5.2",
      cheap: readEnv(env, "RESEARCH_MODEL_CHEAP") || "gpt-5-mini",
    },
    reasoningEffort: parseEffort(env),
    maxIterations: parseNumber(env, "RESEARCH_MAX_ITERATIONS", 3, isPositiveInt, "a positive integer"),
    narrationIntervalMs: parseNumber(env, "RESEARCH_NARRATION_INTERVAL_MS", 5000, isPositiveInt, "a positive integer"),
    pretty: true,
    jsonl: false,
    verbosity: parseVerbosity(env),
    debugDir: readEnv(env, "RESEARCH_DEBUG_DIR") || undefined,
    pricingUsdPer1MTokens: parsePricingJson(env) ?? DEFAULT_PRICING_USD_PER_1M_TOKENS,
    webSearchUsdPer1KCalls: parseNumber(env, "RESEARCH_WEB_SEARCH_USD_PER_1K_CALLS", 10, (n) => n >= 0, "a non-negative number"),
  };

  // `undefined` overrides must not clobber env/default values.
  const raw = {
    ...base,
    maxIterations: overrides?.maxIterations ?? base.maxIterations,
    pretty: overrides?.pretty ?? base.pretty,
    jsonl: overrides?.jsonl ?? base.jsonl,
    verbosity: overrides?.verbosity ?? base.verbosity,
    debugDir: overrides?.debugDir ?? base.debugDir,
  };

  const parsed = ConfigSchema.safeParse(raw);
  if (!parsed.success) throw new ConfigError(`Invalid configuration: ${parsed.error.message}`);
  return parsed.data;
}

export function requireApiKey(config: ResearchConfig) {
  if (!config.openaiApiKey) throw new ConfigError("OPENAI_API_KEY is required");
  return config.openaiApiKey;
}
