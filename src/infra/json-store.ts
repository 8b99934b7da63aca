import { randomBytes } from "node:crypto";
import fs from "node:fs";
import path from "node:path";

export type JsonReadResult = {
  /** Parsed contents, or `fallback` when the file is missing or unusable. */
  value: unknown;
  /** Set when the file existed but could not be read or parsed. */
  error?: Error;
  exists: boolean;
};

/**
 * Read and parse a JSON file. A missing file yields the fallback silently;
 * an unreadable or malformed file yields the fallback along with the error.
 * The parsed value is not validated.
 */
export async function readJsonFileWithFallback(
  filePath: string,
  fallback: unknown,
): Promise<JsonReadResult> {
  let raw: string;
  try {
    raw = await fs.promises.readFile(filePath, "utf8");
  } catch (err) {
    if (typeof err === "object" && err !== null && "code" in err && err.code === "ENOENT") {
      return { value: fallback, exists: false };
    }
    return { value: fallback, exists: true, error: toError(err) };
  }
  try {
    const parsed: unknown = JSON.parse(raw);
    return { value: parsed, exists: true };
  } catch (err) {
    return { value: fallback, exists: true, error: toError(err) };
  }
}

/**
 * Write JSON next to the target under a temporary name, then rename it over
 * the target. Readers see either the old file or the new one, never a partial
 * write.
 */
export async function writeJsonFileAtomically(
  filePath: string,
  value: unknown,
  opts: { mode?: number } = {},
): Promise<void> {
  const dir = path.dirname(filePath);
  await fs.promises.mkdir(dir, { recursive: true });
  const tmpPath = path.join(dir, `.${path.basename(filePath)}.${randomBytes(4).toString("hex")}.tmp`);
  try {
    await fs.promises.writeFile(tmpPath, `${JSON.stringify(value, null, 2)}\n`, {
      encoding: "utf8",
      mode: opts.mode ?? 0o600,
    });
    await fs.promises.rename(tmpPath, filePath);
  } catch (err) {
    await fs.promises.rm(tmpPath, { force: true });
    throw err;
  }
}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
