import { differenceInSeconds, formatISO } from "date-fns";
import { v4 as uuid } from "uuid";
import type { Stopwatch } from "../stopwatch.js";
import type { SegmentKind, SessionSegment } from "../types.js";

interface SessionRecorderOptions {
  now?: () => Date;
  onChange?: (segments: SessionSegment[]) => void | Promise<void>;
}

/**
 * Splits the stopwatch's lifetime into active and pause segments, closing
 * one on every toggle.
 */
export class SessionRecorder {
  private readonly segments: SessionSegment[] = [];
  private readonly now: () => Date;
  private readonly onChange?: (segments: SessionSegment[]) => void | Promise<void>;
  private readonly unsubscribe: () => void;
  private openedAt: Date;
  private openKind: SegmentKind;
  private pendingPersist: Promise<void> = Promise.resolve();
  private lastPersistError: Error | null = null;

  constructor(stopwatch: Stopwatch, options: SessionRecorderOptions = {}) {
    this.now = options.now ?? (() => new Date());
    this.onChange = options.onChange;
    this.openedAt = this.now();
    this.openKind = stopwatch.isRunning ? "active" : "pause";
    this.unsubscribe = stopwatch.on("toggle", snapshot => {
      this.close(snapshot.running ? "active" : "pause");
    });
  }

  getSegments(): SessionSegment[] {
    return [...this.segments];
  }

  get breaks(): number {
    return this.segments.filter(segment => segment.kind === "pause").length;
  }

  dispose(): void {
    this.unsubscribe();
  }

  /** Settles once the latest save finished; rejects with its error, once. */
  async waitForPersistence(): Promise<void> {
    await this.pendingPersist;

    if (this.lastPersistError) {
      const error = this.lastPersistError;
      this.lastPersistError = null;
      throw error;
    }
  }

  private close(nextKind: SegmentKind): void {
    const endedAt = this.now();
    this.segments.push({
      id: uuid(),
      kind: this.openKind,
      startedAt: formatISO(this.openedAt),
      endedAt: formatISO(endedAt),
      seconds: Math.max(differenceInSeconds(endedAt, this.openedAt), 0)
    });
    this.openedAt = endedAt;
    this.openKind = nextKind;
    this.emitChange();
  }

  private emitChange(): void {
    const onChange = this.onChange;
    if (!onChange) {
      return;
    }

    const snapshot = this.getSegments();
    this.lastPersistError = null;
    // A synchronous throw becomes a rejection instead of escaping toggleRun().
    const result = Promise.resolve().then(() => onChange(snapshot));
    this.pendingPersist = result.then(
      () => undefined,
      (error: unknown) => {
        this.lastPersistError = error instanceof Error ? error : new Error(String(error));
        console.error("SessionRecorder persistence error", this.lastPersistError);
      }
    );
  }
}
