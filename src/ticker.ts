import type { Stopwatch } from "./stopwatch.js";

export const DEFAULT_TICK_INTERVAL_MS = 1000;

export class Ticker {
  private interval: NodeJS.Timeout | null = null;

  constructor(
    private readonly stopwatch: Stopwatch,
    private readonly intervalMs = DEFAULT_TICK_INTERVAL_MS
  ) {}

  get isActive(): boolean {
    return this.interval !== null;
  }

  start(): void {
    if (this.interval) {
      return;
    }
    this.interval = setInterval(() => this.stopwatch.tick(), this.intervalMs);
  }

  stop(): void {
    if (!this.interval) {
      return;
    }
    clearInterval(this.interval);
    this.interval = null;
  }
}
