import { homedir } from "os";
import { isAbsolute, join } from "path";

export const CONFIG_FILE_NAME = "breakwatch.toml";
export const SESSION_LOG_FILE_NAME = "breakwatch.log";

export function resolveConfigDir(
  env: NodeJS.ProcessEnv = process.env,
  platform: NodeJS.Platform = process.platform,
  home: string = homedir()
): string {
  if (platform === "win32") {
    return env.APPDATA ?? join(home, "AppData", "Roaming");
  }
  if (platform === "darwin") {
    return join(home, "Library", "Application Support");
  }
  const xdg = env.XDG_CONFIG_HOME;
  // XDG_CONFIG_HOME counts only when absolute
  return xdg && isAbsolute(xdg) ? xdg : join(home, ".config");
}

export function resolveConfigFile(env: NodeJS.ProcessEnv = process.env): string {
  return env.BREAKWATCH_CONFIG ?? join(resolveConfigDir(env), CONFIG_FILE_NAME);
}
