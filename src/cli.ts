#!/usr/bin/env node
import { join } from "path";
import { emitKeypressEvents } from "readline";
import type { Key } from "readline";
import packageJson from "../package.json" with { type: "json" };
import { ENV_KEYS, loadEnvConfig } from "./config/env.js";
import { resolveConfigDir, SESSION_LOG_FILE_NAME } from "./config/paths.js";
import { createRuntime } from "./runtime.js";
import { buildStopwatchView } from "./ui/builders.js";
import { redraw } from "./ui/terminal.js";

const USAGE = `Usage: breakwatch [--help] [--version]

Counts the time spent on an activity and turns yellow when a break is due,
red when it is overdue.

Keys: space pause/resume, r reset, q quit.

Environment:
  ${ENV_KEYS.warn_threshold_seconds}   seconds until a break is due (default 2700)
  ${ENV_KEYS.alert_threshold_seconds}  seconds until a break is overdue (default 3600)
  ${ENV_KEYS.start_paused}             start paused (default false)
  ${ENV_KEYS.store_sessions}           write toggled segments to breakwatch.log (default false)
`;

function main(argv: string[]): void {
  if (argv.includes("--help") || argv.includes("-h")) {
    process.stdout.write(USAGE);
    return;
  }
  if (argv.includes("--version")) {
    process.stdout.write(`${packageJson.version}\n`);
    return;
  }

  const config = loadEnvConfig();
  const runtime = createRuntime(config, {
    sessionLogPath: join(resolveConfigDir(), SESSION_LOG_FILE_NAME)
  });
  const { stopwatch, recorder, ticker } = runtime;
  const useColor = Boolean(process.stdout.isTTY) && !process.env.NO_COLOR;

  const render = () => {
    process.stdout.write(redraw(buildStopwatchView(stopwatch.snapshot(), recorder.breaks), useColor));
  };

  let quitting = false;
  const quit = () => {
    if (quitting) {
      return;
    }
    quitting = true;
    if (process.stdin.isTTY) {
      process.stdin.setRawMode(false);
    }
    process.stdout.write("\n");
    runtime.stop().then(
      () => process.exit(0),
      (error: unknown) => {
        console.error("Failed to stop cleanly", error);
        process.exit(1);
      }
    );
  };

  stopwatch.on("tick", render);
  stopwatch.on("toggle", render);
  stopwatch.on("reset", render);

  if (process.stdin.isTTY) {
    emitKeypressEvents(process.stdin);
    process.stdin.setRawMode(true);
    process.stdin.on("keypress", (_input: string, key: Key | undefined) => {
      if (!key) {
        return;
      }
      if (key.name === "q" || (key.ctrl && key.name === "c")) {
        quit();
      } else if (key.name === "space") {
        stopwatch.toggleRun();
      } else if (key.name === "r") {
        stopwatch.reset();
      }
    });
  }

  process.on("SIGINT", quit);
  process.on("SIGTERM", quit);

  render();
  ticker.start();
}

main(process.argv.slice(2));
