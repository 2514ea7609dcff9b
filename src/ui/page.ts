import { LEVEL_COLORS, PAUSED_COLOR } from "./builders.js";

export const REFRESH_INTERVAL_MS = 500;

/**
 * The browser face. It owns no state: it polls the JSON API and posts
 * toggle/reset, painting whatever colour the server reports.
 */
export function renderPage(): string {
  return `<!doctype html>
<html lang="en">
<head>
<meta charset="utf-8">
<meta name="viewport" content="width=device-width, initial-scale=1">
<title>breakwatch</title>
<style>
  body { margin: 0; height: 100vh; display: flex; align-items: center; justify-content: center; background: #1e1e1e; color: #e0e0e0; font-family: sans-serif; }
  main { display: flex; flex-direction: column; align-items: center; gap: 8px; padding: 10px; }
  #timer { font: 32px monospace; background: transparent; border: none; cursor: pointer; color: ${LEVEL_COLORS.normal}; }
  #breaks { font-size: 20px; min-height: 24px; }
  #reset { background: transparent; color: inherit; border: 1px solid #555; border-radius: 4px; cursor: pointer; }
</style>
</head>
<body>
<main>
  <button id="timer" type="button" aria-live="polite">--:--</button>
  <div id="breaks"></div>
  <button id="reset" type="button">reset</button>
</main>
<script>
  const timer = document.getElementById("timer");
  const breaks = document.getElementById("breaks");
  function paint(view) {
    timer.textContent = view.label;
    timer.style.color = view.color;
    timer.setAttribute("aria-label", view.accessibilityLabel);
    breaks.textContent = view.running ? "" : "breaks: " + view.breaks;
  }
  async function call(method, path) {
    const response = await fetch(path, { method });
    if (!response.ok) {
      throw new Error("Request to " + path + " failed with " + response.status);
    }
    const body = await response.json();
    paint(body.view);
  }
  function report(error) {
    timer.style.color = "${PAUSED_COLOR}";
    console.error(error);
  }
  timer.addEventListener("click", () => call("POST", "/api/stopwatch/toggle").catch(report));
  document.getElementById("reset").addEventListener("click", () => call("POST", "/api/stopwatch/reset").catch(report));
  setInterval(() => call("GET", "/api/stopwatch").catch(report), ${REFRESH_INTERVAL_MS});
  call("GET", "/api/stopwatch").catch(report);
</script>
</body>
</html>
`;
}
