import OpenAI from "openai";
import { requireApiKey, type ResearchConfig } from "../config.js";

export function makeOpenAI(config: ResearchConfig) {
  return new OpenAI({ apiKey: requireApiKey(config) });
}
