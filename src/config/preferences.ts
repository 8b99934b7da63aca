import type { Logger } from "../infra/logger.js";
import { readJsonFileWithFallback, writeJsonFileAtomically } from "../infra/json-store.js";
import type { Preferences } from "./types.js";
import { PreferencesFileSchema } from "./zod-schema.js";

export const EMPTY_PREFERENCES: Preferences = { defaultUsername: "" };

/**
 * Load the remembered username. Never throws: a missing file is the normal
 * first-run case, and an unreadable or malformed one falls back to empty.
 */
export async function loadPreferences(
  filePath: string,
  log?: Pick<Logger, "warn">,
): Promise<Preferences> {
  const { value, exists, error } = await readJsonFileWithFallback(filePath, {});
  if (!exists) {
    return { ...EMPTY_PREFERENCES };
  }
  if (error) {
    log?.warn(`ignoring unreadable preferences at ${filePath}: ${error.message}`);
    return { ...EMPTY_PREFERENCES };
  }
  const parsed = PreferencesFileSchema.safeParse(value);
  if (!parsed.success) {
    log?.warn(`ignoring malformed preferences at ${filePath}`);
    return { ...EMPTY_PREFERENCES };
  }
  return { defaultUsername: parsed.data.default_username };
}

export async function savePreferences(filePath: string, prefs: Preferences): Promise<void> {
  await writeJsonFileAtomically(filePath, { default_username: prefs.defaultUsername });
}
