export type AlertLevel = "normal" | "break-due" | "break-overdue";

export interface Thresholds {
  warnThresholdSeconds: number;
  alertThresholdSeconds: number;
}

export interface StopwatchConfig extends Thresholds {
  startPaused: boolean;
  storeSessions: boolean;
  port: number;
}

export interface StopwatchSnapshot extends Thresholds {
  elapsedSeconds: number;
  running: boolean;
  level: AlertLevel;
}

export type SegmentKind = "active" | "pause";

export interface SessionSegment {
  id: string;
  kind: SegmentKind;
  startedAt: string;
  endedAt: string;
  seconds: number;
}

export interface StopwatchView {
  label: string;
  elapsed: string;
  color: string;
  level: AlertLevel;
  running: boolean;
  breaks: number;
  accessibilityLabel: string;
}

export interface StopwatchUpdateResult {
  view: StopwatchView;
  message: string;
}
