import type { Key } from "node:readline";
import type { PickerKey } from "./selection.js";

export type KeyDecodeOptions = {
  /** Bare `j` / `k` navigate instead of typing. */
  vimKeys: boolean;
};

const NAMED_KEYS = new Map<string, PickerKey>([
  ["return", { kind: "confirm" }],
  ["enter", { kind: "confirm" }],
  ["backspace", { kind: "backspace" }],
  ["escape", { kind: "clear" }],
  ["down", { kind: "down" }],
  ["up", { kind: "up" }],
  ["pagedown", { kind: "page-down" }],
  ["pageup", { kind: "page-up" }],
  ["home", { kind: "home" }],
  ["end", { kind: "end" }],
]);

function isPrintable(text: string): boolean {
  for (const ch of text) {
    const code = ch.codePointAt(0) ?? 0;
    if (code < 0x20 || code === 0x7f) {
      return false;
    }
  }
  return text.length > 0;
}

/**
 * Map a readline `keypress` event onto the picker's key vocabulary. Returns
 * null for keys the picker does not use.
 */
export function decodeKeypress(
  str: string | undefined,
  key: Key | undefined,
  opts: KeyDecodeOptions,
): PickerKey | null {
  if (key?.ctrl && (key.name === "c" || key.name === "q")) {
    return { kind: "interrupt" };
  }
  if (key?.ctrl || key?.meta) {
    return null;
  }
  const named = key?.name ? NAMED_KEYS.get(key.name) : undefined;
  if (named) {
    return named;
  }
  if (str === undefined || !isPrintable(str)) {
    return null;
  }
  if (opts.vimKeys && str === "j") {
    return { kind: "down" };
  }
  if (opts.vimKeys && str === "k") {
    return { kind: "up" };
  }
  return { kind: "insert", text: str };
}
