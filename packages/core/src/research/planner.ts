import type { GenerationCapability } from "./capabilities.js";
import type { ProgressBoard } from "./progress/ProgressBoard.js";
import { SearchPlanSchema, type SearchPlan } from "./types.js";

// One generation call, no retry: errors go straight to the caller.
export async function planSearches(generation: GenerationCapability, board: ProgressBoard, query: string): Promise<SearchPlan> {
  board.upsert("planning", "Planning comprehensive research strategy...");

  const generated = await generation.generate({ role: "planner", input: `Query: ${query}`, schema: SearchPlanSchema });
  const items = generated.items.filter((item) => item.query.trim() !== "");
  const plan = { ...generated, items };
  if (items.length < generated.items.length) {
    board.log("planning", 1, `skipped ${generated.items.length - items.length} plan items with a blank query`);
  }

  board.upsert(
    "planning",
    `Research plan created with ${plan.items.length} searches across ${plan.mainTopics.length} main topics`,
    { done: true },
  );
  board.log("planning", 2, plan.items.map((s, i) => `${i + 1}. [p${s.priority}] ${s.query}`).join("\n") || "(no searches)");
  return plan;
}
