import type { AlertLevel, StopwatchView } from "../types.js";
import { levelCopy } from "./builders.js";

const ESC = "\u001b[";

export const ANSI = {
  reset: `${ESC}0m`,
  dim: `${ESC}2m`,
  yellow: `${ESC}33m`,
  red: `${ESC}31m`,
  clearLine: `${ESC}2K`
} as const;

// normal stays in the terminal's own foreground colour
const LEVEL_ANSI: Record<AlertLevel, string | null> = {
  normal: null,
  "break-due": ANSI.yellow,
  "break-overdue": ANSI.red
};

function paint(text: string, code: string | null, useColor: boolean): string {
  return useColor && code ? `${code}${text}${ANSI.reset}` : text;
}

export function renderTerminalLine(view: StopwatchView, useColor: boolean): string {
  if (!view.running) {
    return paint(`PAUSED ${view.elapsed}  breaks: ${view.breaks}`, ANSI.dim, useColor);
  }
  return paint(`${view.elapsed}  ${levelCopy(view.level)}`, LEVEL_ANSI[view.level], useColor);
}

export function redraw(view: StopwatchView, useColor: boolean): string {
  return `\r${ANSI.clearLine}${renderTerminalLine(view, useColor)}`;
}
