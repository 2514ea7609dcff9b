import { describeSeconds, formatElapsed } from "../format.js";
import type { AlertLevel, StopwatchSnapshot, StopwatchView } from "../types.js";

export const LEVEL_COLORS: Record<AlertLevel, string> = {
  normal: "#00FF00",
  "break-due": "#FFFF00",
  "break-overdue": "#FF0000"
};

export const PAUSED_COLOR = "#C0C0C0";

export interface InlineCard {
  surface: "inline_card";
  heading: string;
  body: string;
  badge?: string;
  color: string;
  cta: {
    label: string;
    action: "toggle" | "reset";
  };
  accessibilityLabel: string;
}

export interface StopwatchStructuredContent {
  app: string;
  inlineCard: InlineCard;
  stopwatch: StopwatchView;
}

export function levelColor(level: AlertLevel): string {
  return LEVEL_COLORS[level];
}

export function levelCopy(level: AlertLevel): string {
  switch (level) {
    case "normal":
      return "Keep going";
    case "break-due":
      return "Break due";
    case "break-overdue":
      return "Break overdue";
  }
}

export function buildStopwatchView(snapshot: StopwatchSnapshot, breaks: number): StopwatchView {
  const elapsed = formatElapsed(snapshot.elapsedSeconds);
  const spoken = describeSeconds(snapshot.elapsedSeconds);

  return {
    label: snapshot.running ? elapsed : "PAUSED",
    elapsed,
    color: snapshot.running ? levelColor(snapshot.level) : PAUSED_COLOR,
    level: snapshot.level,
    running: snapshot.running,
    breaks,
    accessibilityLabel: snapshot.running
      ? `Stopwatch running, ${spoken} elapsed, ${levelCopy(snapshot.level).toLowerCase()}`
      : `Stopwatch paused at ${spoken}, ${breaks} break${breaks === 1 ? "" : "s"} taken`
  };
}

export function buildInlineCard(view: StopwatchView): InlineCard {
  return {
    surface: "inline_card",
    heading: view.label,
    body: view.running ? levelCopy(view.level) : `breaks: ${view.breaks}`,
    badge: view.level === "normal" ? undefined : levelCopy(view.level),
    color: view.color,
    cta: view.running ? { label: "Pause", action: "toggle" } : { label: "Resume", action: "toggle" },
    accessibilityLabel: view.accessibilityLabel
  };
}

export function buildStructuredContent(view: StopwatchView): StopwatchStructuredContent {
  return {
    app: "breakwatch",
    inlineCard: buildInlineCard(view),
    stopwatch: view
  };
}
