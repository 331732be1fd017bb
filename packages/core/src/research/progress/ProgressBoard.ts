import type { LogLevel, ProgressKey, Reporter } from "./events.js";

export type ProgressItem = {
  key: ProgressKey;
  message: string;
  done: boolean;
  hideIndicator: boolean;
};

/**
 * Keyed status board. Each key owns one line; callers only ever "create or
 * update the line for this key". The board observes the run and never feeds
 * anything back into it.
 */
export class ProgressBoard {
  private items = new Map<ProgressKey, ProgressItem>();
  private ended = false;

  constructor(private reporter: Reporter) {}

  upsert(key: ProgressKey, message: string, opts?: { done?: boolean; hideIndicator?: boolean }) {
    const item: ProgressItem = {
      key,
      message,
      done: opts?.done ?? false,
      hideIndicator: opts?.hideIndicator ?? false,
    };
    this.items.set(key, item);
    this.reporter.emit({ type: "item_update", ...item });
  }

  markDone(key: ProgressKey) {
    const prev = this.items.get(key);
    if (!prev || prev.done) return;
    this.upsert(key, prev.message, { done: true, hideIndicator: prev.hideIndicator });
  }

  log(scope: string, level: LogLevel, message: string) {
    this.reporter.emit({ type: "log", scope, level, message });
  }

  get(key: ProgressKey) {
    return this.items.get(key);
  }

  snapshot(): ProgressItem[] {
    return [...this.items.values()];
  }

  // Closes every open line; called once per run, on success or failure.
  end() {
    if (this.ended) return;
    this.ended = true;
    for (const item of this.items.values()) {
      if (!item.done) this.markDone(item.key);
    }
  }
}
