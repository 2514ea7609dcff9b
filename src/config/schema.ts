import { z } from "zod";
import type { StopwatchConfig } from "../types.js";

export const DEFAULT_CONFIG: Readonly<StopwatchConfig> = {
  warnThresholdSeconds: 45 * 60,
  alertThresholdSeconds: 60 * 60,
  startPaused: false,
  storeSessions: false,
  port: 2092
};

function blankAsMissing(value: unknown): unknown {
  return typeof value === "string" && value.trim() === "" ? undefined : value;
}

const DIGITS = /^\s*\d+\s*$/;

// Only numbers and plain digit strings reach the number check; booleans,
// arrays, dates, "0x10" and "1e3" stay as they are and fail it.
function integerField(min: number, max = Number.MAX_SAFE_INTEGER) {
  return z.preprocess(value => {
    const normalized = blankAsMissing(value);
    return typeof normalized === "string" && DIGITS.test(normalized) ? Number(normalized) : normalized;
  }, z.number().int().min(min).max(max).optional());
}

export const portField = integerField(1, 65535);

const booleanField = z.preprocess(value => {
  const normalized = blankAsMissing(value);
  if (typeof normalized !== "string") {
    return normalized;
  }
  switch (normalized.trim().toLowerCase()) {
    case "1":
    case "true":
    case "yes":
    case "on":
      return true;
    case "0":
    case "false":
    case "no":
    case "off":
      return false;
    default:
      return normalized;
  }
}, z.boolean().optional());

/** Raw configuration keys, as they appear in the TOML file. */
export const rawConfigSchema = z.object({
  warn_threshold_seconds: integerField(0),
  alert_threshold_seconds: integerField(1),
  start_paused: booleanField,
  store_sessions: booleanField,
  port: portField
});

export type RawConfig = z.infer<typeof rawConfigSchema>;

export const configSchema = rawConfigSchema
  .transform(
    (raw): StopwatchConfig => ({
      warnThresholdSeconds: raw.warn_threshold_seconds ?? DEFAULT_CONFIG.warnThresholdSeconds,
      alertThresholdSeconds: raw.alert_threshold_seconds ?? DEFAULT_CONFIG.alertThresholdSeconds,
      startPaused: raw.start_paused ?? DEFAULT_CONFIG.startPaused,
      storeSessions: raw.store_sessions ?? DEFAULT_CONFIG.storeSessions,
      port: raw.port ?? DEFAULT_CONFIG.port
    })
  )
  .refine(config => config.warnThresholdSeconds < config.alertThresholdSeconds, {
    message: "warn_threshold_seconds must be lower than alert_threshold_seconds"
  });

export interface ConfigParseResult {
  config: StopwatchConfig;
  issues: string[];
}

/**
 * Validate raw configuration values. A malformed value anywhere discards the
 * whole input in favour of the built-in defaults; missing keys take their
 * defaults individually.
 */
export function parseConfig(raw: Record<string, unknown>): ConfigParseResult {
  const parsed = configSchema.safeParse(raw);
  if (parsed.success) {
    return { config: parsed.data, issues: [] };
  }
  return {
    config: { ...DEFAULT_CONFIG },
    issues: parsed.error.issues.map(issue =>
      issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
    )
  };
}

export function toRawConfig(config: StopwatchConfig): Required<RawConfig> {
  return {
    warn_threshold_seconds: config.warnThresholdSeconds,
    alert_threshold_seconds: config.alertThresholdSeconds,
    start_paused: config.startPaused,
    store_sessions: config.storeSessions,
    port: config.port
  };
}
