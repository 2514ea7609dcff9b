import { test } from "node:test";
import assert from "node:assert/strict";
import { Stopwatch } from "../src/stopwatch.js";
import { Ticker } from "../src/ticker.js";

function createStopwatch(running = true) {
  return new Stopwatch({ warnThresholdSeconds: 10, alertThresholdSeconds: 20, running });
}

test("ticker advances the stopwatch once per interval until stopped", t => {
  t.mock.timers.enable({ apis: ["setInterval"] });
  const stopwatch = createStopwatch();
  const ticker = new Ticker(stopwatch);
  t.after(() => ticker.stop());

  ticker.start();
  ticker.start();
  assert.equal(ticker.isActive, true);

  t.mock.timers.tick(999);
  assert.equal(stopwatch.elapsedSeconds, 0);
  t.mock.timers.tick(1);
  assert.equal(stopwatch.elapsedSeconds, 1);
  t.mock.timers.tick(3000);
  assert.equal(stopwatch.elapsedSeconds, 4);

  ticker.stop();
  assert.equal(ticker.isActive, false);
  t.mock.timers.tick(5000);
  assert.equal(stopwatch.elapsedSeconds, 4);
});

test("ticker honours a custom interval", t => {
  t.mock.timers.enable({ apis: ["setInterval"] });
  const stopwatch = createStopwatch();
  const ticker = new Ticker(stopwatch, 250);
  t.after(() => ticker.stop());

  ticker.start();
  t.mock.timers.tick(1000);

  assert.equal(stopwatch.elapsedSeconds, 4);
});

test("ticker can be restarted after a stop", t => {
  t.mock.timers.enable({ apis: ["setInterval"] });
  const stopwatch = createStopwatch();
  const ticker = new Ticker(stopwatch);
  t.after(() => ticker.stop());

  ticker.start();
  t.mock.timers.tick(2000);
  ticker.stop();
  ticker.start();
  t.mock.timers.tick(1000);

  assert.equal(stopwatch.elapsedSeconds, 3);
});

test("ticker ticks do not advance a paused stopwatch", t => {
  t.mock.timers.enable({ apis: ["setInterval"] });
  const stopwatch = createStopwatch(false);
  const ticks: number[] = [];
  stopwatch.on("tick", snapshot => ticks.push(snapshot.elapsedSeconds));
  const ticker = new Ticker(stopwatch);
  t.after(() => ticker.stop());

  ticker.start();
  t.mock.timers.tick(5000);

  assert.equal(stopwatch.elapsedSeconds, 0);
  assert.deepEqual(ticks, []);
});
