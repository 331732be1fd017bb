export const WRITING_LABELS = [
  "Thinking about report...",
  "Planning report structure...",
  "Creating detailed outline...",
  "Synthesizing research findings...",
  "Writing main sections...",
  "Adding supporting evidence...",
  "Refining arguments and conclusions...",
  "Finalizing report...",
] as const;

/**
 * Posts the next label every `intervalMs` until the labels run out or
 * `stop()` is called. Cosmetic only: nothing should parse these.
 */
export class StatusTicker {
  private timer: ReturnType<typeof setInterval> | undefined;
  private next = 0;

  constructor(
    private opts: {
      labels: readonly string[];
      intervalMs: number;
      onTick: (label: string) => void;
    },
  ) {}

  get remaining() {
    return this.opts.labels.length - this.next;
  }

  get running() {
    return this.timer !== undefined;
  }

  start() {
    if (this.timer || this.remaining === 0) return;
    this.timer = setInterval(() => this.tick(), this.opts.intervalMs);
  }

  stop() {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = undefined;
  }

  private tick() {
    const label = this.opts.labels[this.next];
    if (label === undefined) {
      this.stop();
      return;
    }
    this.next += 1;
    if (this.remaining === 0) this.stop();
    this.opts.onTick(label);
  }
}
