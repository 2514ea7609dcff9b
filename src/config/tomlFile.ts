import { mkdir, readFile, writeFile } from "fs/promises";
import { dirname } from "path";
import { parse, stringify } from "smol-toml";
import type { StopwatchConfig } from "../types.js";
import { DEFAULT_CONFIG, parseConfig, toRawConfig } from "./schema.js";

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export async function writeDefaultConfig(filePath: string): Promise<void> {
  await mkdir(dirname(filePath), { recursive: true });
  await writeFile(filePath, `${stringify(toRawConfig({ ...DEFAULT_CONFIG }))}\n`, "utf-8");
}

/**
 * Load the configuration file. A missing file is created with the defaults;
 * an unreadable or malformed one is reported and replaced by the defaults in
 * memory only. Never rejects.
 */
export async function loadTomlConfig(filePath: string): Promise<StopwatchConfig> {
  let source: string;
  try {
    source = await readFile(filePath, "utf-8");
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === "ENOENT") {
      try {
        await writeDefaultConfig(filePath);
      } catch (writeError) {
        console.error(`Failed to write default config to ${filePath}`, writeError);
      }
      return { ...DEFAULT_CONFIG };
    }
    console.warn(`Failed to read config ${filePath}, using defaults: ${errorMessage(error)}`);
    return { ...DEFAULT_CONFIG };
  }

  let document: Record<string, unknown>;
  try {
    document = parse(source);
  } catch (error) {
    console.warn(`Failed to parse config ${filePath}, using defaults: ${errorMessage(error)}`);
    return { ...DEFAULT_CONFIG };
  }

  const { config, issues } = parseConfig(document);
  if (issues.length > 0) {
    console.warn(`Ignoring malformed config ${filePath}, using defaults: ${issues.join("; ")}`);
  }
  return config;
}
