import { EventEmitter } from "events";
import type { AlertLevel, StopwatchSnapshot, Thresholds } from "./types.js";

type StopwatchEvents = {
  tick: (snapshot: StopwatchSnapshot) => void;
  level: (level: AlertLevel, previous: AlertLevel) => void;
  toggle: (snapshot: StopwatchSnapshot) => void;
  reset: (snapshot: StopwatchSnapshot) => void;
};

export interface StopwatchOptions extends Thresholds {
  running?: boolean;
}

export function classifyElapsed(elapsedSeconds: number, thresholds: Thresholds): AlertLevel {
  if (elapsedSeconds >= thresholds.alertThresholdSeconds) {
    return "break-overdue";
  }
  if (elapsedSeconds >= thresholds.warnThresholdSeconds) {
    return "break-due";
  }
  return "normal";
}

/**
 * Counts elapsed seconds while running and classifies the count against the
 * warn and alert thresholds. Every mutation goes through tick, reset or
 * toggleRun; the instance never reads the clock itself.
 */
export class Stopwatch {
  private readonly emitter = new EventEmitter();
  private readonly thresholds: Thresholds;
  private elapsed = 0;
  private running: boolean;

  constructor(options: StopwatchOptions) {
    if (options.warnThresholdSeconds >= options.alertThresholdSeconds) {
      throw new Error("Warn threshold must be lower than the alert threshold.");
    }
    this.thresholds = {
      warnThresholdSeconds: options.warnThresholdSeconds,
      alertThresholdSeconds: options.alertThresholdSeconds
    };
    this.running = options.running ?? true;
  }

  on<T extends keyof StopwatchEvents>(event: T, listener: StopwatchEvents[T]): () => void {
    this.emitter.on(event, listener);
    return () => this.emitter.off(event, listener);
  }

  get elapsedSeconds(): number {
    return this.elapsed;
  }

  get isRunning(): boolean {
    return this.running;
  }

  tick(): void {
    if (!this.running) {
      return;
    }
    const previous = this.currentState();
    this.elapsed += 1;
    this.emitter.emit("tick", this.snapshot());
    this.emitLevelChange(previous);
  }

  reset(): void {
    const previous = this.currentState();
    this.elapsed = 0;
    this.emitter.emit("reset", this.snapshot());
    this.emitLevelChange(previous);
  }

  toggleRun(): void {
    this.running = !this.running;
    this.emitter.emit("toggle", this.snapshot());
  }

  currentState(): AlertLevel {
    return classifyElapsed(this.elapsed, this.thresholds);
  }

  snapshot(): StopwatchSnapshot {
    return {
      elapsedSeconds: this.elapsed,
      running: this.running,
      level: this.currentState(),
      ...this.thresholds
    };
  }

  private emitLevelChange(previous: AlertLevel): void {
    const level = this.currentState();
    if (level !== previous) {
      this.emitter.emit("level", level, previous);
    }
  }
}
