import { SessionFileLog } from "./state/sessionLog.js";
import { SessionRecorder } from "./state/sessionRecorder.js";
import { Stopwatch } from "./stopwatch.js";
import { Ticker } from "./ticker.js";
import { StopwatchToolset } from "./tools/stopwatchTool.js";
import type { StopwatchConfig } from "./types.js";

export interface RuntimeOptions {
  /** Where toggled segments are written when `storeSessions` is on. */
  sessionLogPath: string;
  tickIntervalMs?: number;
}

export interface StopwatchRuntime {
  stopwatch: Stopwatch;
  recorder: SessionRecorder;
  ticker: Ticker;
  toolset: StopwatchToolset;
  stop(): Promise<void>;
}

/** Wires one stopwatch to its ticker, session recorder and optional log, shared by both faces. */
export function createRuntime(config: StopwatchConfig, options: RuntimeOptions): StopwatchRuntime {
  const stopwatch = new Stopwatch({
    warnThresholdSeconds: config.warnThresholdSeconds,
    alertThresholdSeconds: config.alertThresholdSeconds,
    running: !config.startPaused
  });
  const sessionLog = config.storeSessions ? new SessionFileLog(options.sessionLogPath) : null;
  const recorder = new SessionRecorder(stopwatch, {
    onChange: sessionLog ? segments => sessionLog.save(segments) : undefined
  });
  const ticker = new Ticker(stopwatch, options.tickIntervalMs);

  const stop = async () => {
    ticker.stop();
    recorder.dispose();
    try {
      await recorder.waitForPersistence();
    } catch (error) {
      console.error("Session log not saved before exit", error);
    }
  };

  return {
    stopwatch,
    recorder,
    ticker,
    toolset: new StopwatchToolset(stopwatch, recorder),
    stop
  };
}
