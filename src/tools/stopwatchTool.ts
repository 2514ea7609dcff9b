import { z } from "zod";
import { describeSeconds } from "../format.js";
import type { SessionRecorder } from "../state/sessionRecorder.js";
import type { Stopwatch } from "../stopwatch.js";
import type { StopwatchUpdateResult, StopwatchView } from "../types.js";
import { buildStopwatchView, levelCopy } from "../ui/builders.js";

export const stopwatchActions = ["status", "toggle", "reset"] as const;

export const stopwatchActionShape = {
  action: z.enum(stopwatchActions).optional().describe("status (default), toggle to pause/resume, or reset to zero.")
};

export const stopwatchActionInput = z.object(stopwatchActionShape).transform(value => ({
  action: value.action ?? "status"
}));

export type StopwatchAction = (typeof stopwatchActions)[number];

export class StopwatchToolset {
  constructor(
    private readonly stopwatch: Stopwatch,
    private readonly recorder: SessionRecorder
  ) {}

  getView(): StopwatchView {
    return buildStopwatchView(this.stopwatch.snapshot(), this.recorder.breaks);
  }

  async run(input: z.input<typeof stopwatchActionInput>): Promise<StopwatchUpdateResult> {
    const { action } = stopwatchActionInput.parse(input);
    switch (action) {
      case "toggle":
        return this.toggle();
      case "reset":
        return this.reset();
      case "status":
        return this.status();
    }
  }

  status(): StopwatchUpdateResult {
    const snapshot = this.stopwatch.snapshot();
    const spoken = describeSeconds(snapshot.elapsedSeconds);
    const message = snapshot.running
      ? `${spoken} elapsed. ${levelCopy(snapshot.level)}.`
      : `Paused at ${spoken}.`;
    return { view: this.getView(), message };
  }

  async toggle(): Promise<StopwatchUpdateResult> {
    this.stopwatch.toggleRun();
    const snapshot = this.stopwatch.snapshot();
    const spoken = describeSeconds(snapshot.elapsedSeconds);
    let message = snapshot.running ? `Resumed at ${spoken}.` : `Paused at ${spoken}.`;

    try {
      await this.recorder.waitForPersistence();
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      message = `${message} Session log not saved: ${reason}`;
    }

    return { view: this.getView(), message };
  }

  reset(): StopwatchUpdateResult {
    this.stopwatch.reset();
    return { view: this.getView(), message: "Stopwatch reset to zero." };
  }
}
