import { test } from "node:test";
import assert from "node:assert/strict";
import { Stopwatch, classifyElapsed } from "../src/stopwatch.js";
import type { AlertLevel } from "../src/types.js";

const thresholds = { warnThresholdSeconds: 1200, alertThresholdSeconds: 1500 };

function advance(stopwatch: Stopwatch, seconds: number) {
  for (let i = 0; i < seconds; i += 1) {
    stopwatch.tick();
  }
}

test("a new stopwatch starts running at zero in the normal state", () => {
  const stopwatch = new Stopwatch(thresholds);
  assert.deepEqual(stopwatch.snapshot(), {
    elapsedSeconds: 0,
    running: true,
    level: "normal",
    warnThresholdSeconds: 1200,
    alertThresholdSeconds: 1500
  });
});

test("crossing the thresholds moves through break-due to break-overdue", () => {
  const stopwatch = new Stopwatch(thresholds);

  advance(stopwatch, 1199);
  assert.equal(stopwatch.currentState(), "normal");

  stopwatch.tick();
  assert.equal(stopwatch.elapsedSeconds, 1200);
  assert.equal(stopwatch.currentState(), "break-due");

  advance(stopwatch, 299);
  assert.equal(stopwatch.currentState(), "break-due");

  stopwatch.tick();
  assert.equal(stopwatch.elapsedSeconds, 1500);
  assert.equal(stopwatch.currentState(), "break-overdue");

  advance(stopwatch, 3600);
  assert.equal(stopwatch.currentState(), "break-overdue");
});

test("classifyElapsed agrees with the threshold bands for every second", () => {
  for (let elapsed = 0; elapsed <= 1600; elapsed += 1) {
    const expected: AlertLevel = elapsed < 1200 ? "normal" : elapsed < 1500 ? "break-due" : "break-overdue";
    assert.equal(classifyElapsed(elapsed, thresholds), expected, `elapsed=${elapsed}`);
  }
});

test("reset returns to normal from any level and keeps the run flag", () => {
  const stopwatch = new Stopwatch(thresholds);
  advance(stopwatch, 1700);
  stopwatch.toggleRun();

  stopwatch.reset();

  assert.equal(stopwatch.elapsedSeconds, 0);
  assert.equal(stopwatch.currentState(), "normal");
  assert.equal(stopwatch.isRunning, false);
});

test("tick is a no-op while paused", () => {
  const stopwatch = new Stopwatch(thresholds);
  advance(stopwatch, 5);
  stopwatch.toggleRun();

  advance(stopwatch, 10);
  assert.equal(stopwatch.elapsedSeconds, 5);

  stopwatch.toggleRun();
  stopwatch.tick();
  assert.equal(stopwatch.elapsedSeconds, 6);
});

test("running option starts the stopwatch paused", () => {
  const stopwatch = new Stopwatch({ ...thresholds, running: false });
  stopwatch.tick();
  assert.equal(stopwatch.isRunning, false);
  assert.equal(stopwatch.elapsedSeconds, 0);
});

test("rejects a warn threshold that is not below the alert threshold", () => {
  assert.throws(
    () => new Stopwatch({ warnThresholdSeconds: 1500, alertThresholdSeconds: 1500 }),
    /Warn threshold must be lower than the alert threshold/
  );
});

test("emits level changes only when a threshold is crossed", () => {
  const stopwatch = new Stopwatch({ warnThresholdSeconds: 2, alertThresholdSeconds: 4 });
  const changes: Array<[AlertLevel, AlertLevel]> = [];
  stopwatch.on("level", (level, previous) => changes.push([level, previous]));

  advance(stopwatch, 5);
  stopwatch.reset();
  stopwatch.reset();

  assert.deepEqual(changes, [
    ["break-due", "normal"],
    ["break-overdue", "break-due"],
    ["normal", "break-overdue"]
  ]);
});

test("unsubscribing stops tick notifications", () => {
  const stopwatch = new Stopwatch(thresholds);
  const seen: number[] = [];
  const off = stopwatch.on("tick", snapshot => seen.push(snapshot.elapsedSeconds));

  advance(stopwatch, 2);
  off();
  advance(stopwatch, 2);

  assert.deepEqual(seen, [1, 2]);
  assert.equal(stopwatch.elapsedSeconds, 4);
});

test("toggle listeners see the new run flag", () => {
  const stopwatch = new Stopwatch(thresholds);
  const flags: boolean[] = [];
  stopwatch.on("toggle", snapshot => flags.push(snapshot.running));

  stopwatch.toggleRun();
  stopwatch.toggleRun();

  assert.deepEqual(flags, [false, true]);
});
