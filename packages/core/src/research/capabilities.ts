import type { ZodType, ZodTypeDef } from "zod";

export type AgentRole = "planner" | "evaluator" | "writer";

export type GenerationCall<T> = {
  role: AgentRole;
  input: string;
  // Input type left open so schemas with defaults still infer T from their output.
  schema: ZodType<T, ZodTypeDef, unknown>;
};

export type GenerationEvent = {
  type: string;
  textDelta?: string;
};

/**
 * An in-flight streamed generation. Iterate it for raw events, then call
 * `final()` for the validated output. `final()` drains whatever the caller
 * did not consume and rejects if the underlying call failed.
 */
export interface GenerationStream<T> extends AsyncIterable<GenerationEvent> {
  final(): Promise<T>;
}

export interface GenerationCapability {
  generate<T>(call: GenerationCall<T>): Promise<T>;
  stream<T>(call: GenerationCall<T>): GenerationStream<T>;
}

export interface SearchCapability {
  // Returns a plain-text summary of what the backend found. Latency is seconds.
  search(text: string): Promise<string>;
}
