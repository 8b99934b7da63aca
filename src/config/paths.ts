import os from "node:os";
import path from "node:path";

export const APP_DIR_NAME = "mesh-ssh";
export const PREFERENCES_FILE = "config.json";

/**
 * Per-user configuration directory. `MESH_SSH_CONFIG_DIR` wins, then
 * `XDG_CONFIG_HOME`, then `~/.config`.
 */
export function resolveConfigDir(env: NodeJS.ProcessEnv = process.env): string {
  const override = env.MESH_SSH_CONFIG_DIR?.trim();
  if (override) {
    return override;
  }
  const xdg = env.XDG_CONFIG_HOME?.trim();
  if (xdg) {
    return path.join(xdg, APP_DIR_NAME);
  }
  return path.join(os.homedir(), ".config", APP_DIR_NAME);
}

export function resolvePreferencesPath(configDir: string): string {
  return path.join(configDir, PREFERENCES_FILE);
}
