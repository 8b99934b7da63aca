import { resolveConfigDir, resolvePreferencesPath } from "./paths.js";
import type { AppConfig } from "./types.js";
import { CliOptionsSchema, type CliOptions } from "./zod-schema.js";

/**
 * Build the configuration for one run from parsed command-line options and
 * the environment. Throws a ZodError when an option is out of range.
 */
export function resolveAppConfig(
  options: CliOptions,
  env: NodeJS.ProcessEnv = process.env,
): AppConfig {
  const opts = CliOptionsSchema.parse(options);
  const configDir = opts.configDir ?? resolveConfigDir(env);
  return {
    preferencesPath: resolvePreferencesPath(configDir),
    statusCommand: { command: opts.tailscale, args: ["status"] },
    sshCommand: opts.ssh,
    connectBy: opts.byHostname ? "hostname" : "address",
    pageSize: opts.pageSize,
    vimKeys: opts.vimKeys,
    color: opts.color && !env.NO_COLOR,
    onlineOnly: opts.online ?? false,
    username: opts.user,
  };
}
