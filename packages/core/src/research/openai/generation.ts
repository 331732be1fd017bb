import type OpenAI from "openai";
import type { ResponseStreamEvent } from "openai/resources/responses/responses";
import type { GenerationCall, GenerationCapability, GenerationEvent, GenerationStream } from "../capabilities.js";
import type { ResearchConfig } from "../config.js";
import { instructionFor } from "../prompts.js";
import type { ResponseUsageLike, UsageMeter } from "../UsageMeter.js";
import { extractJson, extractionPrompt, parseModelJson, repairJson, type Complete } from "./extractJson.js";
import { callText, requestParams } from "./llm.js";

export type TextStreamEvent =
  | { kind: "delta"; text: string }
  | { kind: "completed"; usage?: ResponseUsageLike | null }
  | { kind: "failed"; message: string }
  | { kind: "other"; type: string };

export function fromResponseEvent(e: ResponseStreamEvent): TextStreamEvent {
  switch (e.type) {
    case "response.output_text.delta":
      return { kind: "delta", text: e.delta };
    case "response.completed":
      return { kind: "completed", usage: e.response.usage };
    case "response.failed":
      return { kind: "failed", message: e.response.error?.message ?? "unknown error" };
    case "error":
      return { kind: "failed", message: e.message };
    default:
      return { kind: "other", type: e.type };
  }
}

async function* mapEvents(events: AsyncIterable<ResponseStreamEvent>) {
  for await (const e of events) yield fromResponseEvent(e);
}

/**
 * Buffers text deltas from a streamed call. Iterating yields the events;
 * `final()` drains the rest and parses the buffered text. A failed stream
 * makes `final()` reject with the same error.
 */
export class BufferedTextStream<T> implements GenerationStream<T> {
  private text = "";
  private failure: { error: unknown } | undefined;
  private readonly source: AsyncGenerator<GenerationEvent>;

  constructor(
    open: () => Promise<AsyncIterable<TextStreamEvent>>,
    private parse: (text: string) => Promise<T>,
    private onUsage?: (usage: ResponseUsageLike | null | undefined) => void,
  ) {
    this.source = this.pump(open);
  }

  private async *pump(open: () => Promise<AsyncIterable<TextStreamEvent>>): AsyncGenerator<GenerationEvent> {
    try {
      for await (const e of await open()) {
        if (e.kind === "failed") throw new Error(`Streamed generation failed: ${e.message}`);
        if (e.kind === "delta") {
          this.text += e.text;
          yield { type: "text_delta", textDelta: e.text };
          continue;
        }
        if (e.kind === "completed") {
          this.onUsage?.(e.usage);
          yield { type: "completed" };
          continue;
        }
        yield { type: e.type };
      }
    } catch (error) {
      this.failure = { error };
      throw error;
    }
  }

  [Symbol.asyncIterator]() {
    return this.source;
  }

  async final(): Promise<T> {
    let step = await this.source.next();
    while (!step.done) step = await this.source.next();
    if (this.failure) throw this.failure.error;
    return this.parse(this.text);
  }
}

export class OpenAIGeneration implements GenerationCapability {
  constructor(
    private openai: OpenAI,
    private cfg: ResearchConfig,
    private meter?: UsageMeter,
  ) {}

  private thinking: Complete = async (prompt) => {
    const r = await callText(
      this.openai,
      { model: this.cfg.models.thinking, input: prompt, reasoningEffort: this.cfg.reasoningEffort },
      { meter: this.meter },
    );
    return r.text;
  };

  private repair: Complete = async (prompt) => {
    const r = await callText(this.openai, { model: this.cfg.models.cheap, input: prompt, temperature: 0 }, { meter: this.meter });
    return r.text;
  };

  generate<T>(call: GenerationCall<T>): Promise<T> {
    return extractJson(
      { primary: this.thinking, repair: this.repair },
      { instruction: instructionFor(call.role), input: call.input, schema: call.schema },
    );
  }

  stream<T>(call: GenerationCall<T>): GenerationStream<T> {
    const instruction = instructionFor(call.role);
    const model = this.cfg.models.thinking;
    const params = requestParams({
      model,
      input: extractionPrompt(instruction, call.input),
      reasoningEffort: this.cfg.reasoningEffort,
    });

    return new BufferedTextStream<T>(
      async () => mapEvents(await this.openai.responses.create({ ...params, stream: true })),
      async (text) => {
        const parsed = parseModelJson(text, call.schema);
        if (parsed.ok) return parsed.value;
        return repairJson(this.repair, { instruction, badText: text, problem: parsed.reason, schema: call.schema });
      },
      (usage) => this.meter?.record(model, usage),
    );
  }
}
