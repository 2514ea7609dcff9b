import type { StopwatchConfig } from "../types.js";
import { parseConfig, portField } from "./schema.js";

export const ENV_KEYS = {
  warn_threshold_seconds: "BREAKWATCH_WARN_THRESHOLD_SECONDS",
  alert_threshold_seconds: "BREAKWATCH_ALERT_THRESHOLD_SECONDS",
  start_paused: "BREAKWATCH_START_PAUSED",
  store_sessions: "BREAKWATCH_STORE_SESSIONS"
} as const;

export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): StopwatchConfig {
  const raw: Record<string, unknown> = {};
  for (const [key, name] of Object.entries(ENV_KEYS)) {
    raw[key] = env[name];
  }

  const { config, issues } = parseConfig(raw);
  if (issues.length > 0) {
    console.warn(`Ignoring malformed environment configuration, using defaults: ${issues.join("; ")}`);
  }
  return config;
}

/** `PORT` overrides the configured port when it holds a valid port number. */
export function resolvePort(env: NodeJS.ProcessEnv, fallback: number): number {
  const parsed = portField.safeParse(env.PORT);
  if (!parsed.success) {
    console.warn(`Ignoring malformed PORT "${env.PORT}", using ${fallback}`);
    return fallback;
  }
  return parsed.data ?? fallback;
}
