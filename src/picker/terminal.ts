import { emitKeypressEvents, type Key } from "node:readline";
import { EnvironmentError } from "../infra/errors.js";
import { ANSI } from "./render.js";

export type KeypressListener = (str: string | undefined, key: Key | undefined) => void;

/** Anything that emits readline-style `keypress` events. */
export type KeySource = {
  on(event: "keypress", listener: KeypressListener): unknown;
  off(event: "keypress", listener: KeypressListener): unknown;
};

export type PickerScreen = {
  readonly isTTY?: boolean;
  readonly columns?: number;
  readonly rows?: number;
  write(chunk: string): unknown;
  on(event: "resize", listener: () => void): unknown;
  off(event: "resize", listener: () => void): unknown;
};

export type TerminalInput = NodeJS.ReadableStream &
  KeySource & {
    readonly isTTY?: boolean;
    readonly isRaw?: boolean;
    setRawMode?(mode: boolean): unknown;
  };

export type TerminalIo = {
  input: TerminalInput;
  output: PickerScreen;
};

export type TerminalSession = {
  keys: KeySource;
  screen: PickerScreen;
};

export function assertInteractive(io: TerminalIo): void {
  if (!io.input.isTTY || !io.output.isTTY || typeof io.input.setRawMode !== "function") {
    throw new EnvironmentError(
      "NOT_A_TTY",
      "mesh-ssh needs an interactive terminal (stdin and stdout must be a TTY)",
    );
  }
}

/**
 * Run `fn` with the terminal in raw mode on the alternate screen. The
 * previous mode, the main screen and the cursor are restored however `fn`
 * ends: confirm, cancel or throw.
 */
export async function withRawTerminal<T>(
  io: TerminalIo,
  fn: (session: TerminalSession) => Promise<T>,
): Promise<T> {
  assertInteractive(io);
  const { input, output } = io;
  const wasRaw = input.isRaw ?? false;
  const setRaw = (mode: boolean) => {
    input.setRawMode?.(mode);
  };

  emitKeypressEvents(input);
  setRaw(true);
  input.resume();
  try {
    output.write(`${ANSI.altScreenOn}${ANSI.hideCursor}`);
    return await fn({ keys: input, screen: output });
  } finally {
    output.write(`${ANSI.reset}${ANSI.showCursor}${ANSI.altScreenOff}`);
    setRaw(wasRaw);
    input.pause();
  }
}
