import type { SearchCapability } from "./capabilities.js";
import type { DebugRecorder } from "./debugDump.js";
import { errorMessage } from "./errors.js";
import { settle, type Outcome } from "./outcome.js";
import type { ProgressBoard } from "./progress/ProgressBoard.js";
import type { SearchItem, SearchResult } from "./types.js";

export type SearchLane = {
  key: "searching" | "follow_up";
  startMessage: string;
  // Prefix of the running counter line: "<label>... 3/8 completed".
  label: string;
};

export const PLAN_LANE: SearchLane = {
  key: "searching",
  startMessage: "Executing search plan...",
  label: "Searching",
};

export const FOLLOW_UP_LANE: SearchLane = {
  key: "follow_up",
  startMessage: "Conducting follow-up research to fill gaps...",
  label: "Follow-up research",
};

export function searchRequest(item: SearchItem) {
  return `Search term: ${item.query}\nReason for searching: ${item.reason}\nPriority: ${item.priority}`;
}

// Array.prototype.sort is stable, so equal priorities keep their plan order.
export function byPriority(items: readonly SearchItem[]) {
  return [...items].sort((a, b) => a.priority - b.priority);
}

function counter(lane: SearchLane, completed: number, total: number) {
  return `${lane.label}... ${completed}/${total} completed`;
}

/**
 * Runs every item against the search capability at once and collects the
 * successful summaries in completion order. A failed item is logged and
 * dropped; it never affects its siblings.
 */
export async function executeAll(
  search: SearchCapability,
  items: readonly SearchItem[],
  ctx: { board: ProgressBoard; recorder: DebugRecorder; lane: SearchLane },
): Promise<SearchResult[]> {
  const { board, recorder, lane } = ctx;
  const total = items.length;

  if (total === 0) {
    board.upsert(lane.key, counter(lane, 0, 0), { done: true });
    return [];
  }

  board.upsert(lane.key, lane.startMessage);
  const ordered = byPriority(items);
  ordered.forEach((item, i) => board.log(lane.key, 3, `search ${i + 1}: '${item.query}' (priority ${item.priority})`));

  const results: SearchResult[] = [];
  const failures: { item: SearchItem; error: unknown }[] = [];
  let completed = 0;

  // Synchronous, so counter updates follow settle order.
  const collect = (item: SearchItem, outcome: Outcome<string>) => {
    completed += 1;
    if (outcome.ok) {
      results.push(outcome.value);
    } else {
      failures.push({ item, error: outcome.error });
      board.log(lane.key, 1, `search for '${item.query}' failed: ${errorMessage(outcome.error)}`);
    }
    board.upsert(lane.key, counter(lane, completed, total));
  };

  await Promise.all(ordered.map((item) => settle(() => search.search(searchRequest(item))).then((o) => collect(item, o))));

  for (const f of failures) await recorder.captureError(f.error, `search query: ${f.item.query}`);
  board.markDone(lane.key);
  board.log(lane.key, 2, `retrieved ${results.length}/${total} results`);
  return results;
}
