import * as readline from "node:readline";
import { UsernameSchema } from "../config/zod-schema.js";

export type PromptUsernameOptions = {
  hostname: string;
  /** Offered in brackets and taken when the answer is empty. */
  defaultUsername: string;
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
  /** Let readline handle line editing and ^C itself (true for a real TTY). */
  terminal?: boolean;
  /** Aborting ends the prompt as if cancelled. */
  signal?: AbortSignal;
};

export function formatUsernamePrompt(hostname: string, defaultUsername: string): string {
  return defaultUsername
    ? `Username for ${hostname} [${defaultUsername}]: `
    : `Username for ${hostname}: `;
}

/**
 * Ask which user to log in as. Repeats until the answer is a usable login
 * name; resolves null when the user presses Ctrl+C or input ends.
 */
export async function promptUsername(opts: PromptUsernameOptions): Promise<string | null> {
  if (opts.signal?.aborted) {
    return null;
  }
  const rl = readline.createInterface({
    input: opts.input,
    output: opts.output,
    terminal: opts.terminal ?? false,
  });
  let isClosed = false;
  const closed = new Promise<null>((resolve) => {
    rl.once("close", () => {
      isClosed = true;
      resolve(null);
    });
  });
  const cancel = () => {
    opts.output.write("\n");
    rl.close();
  };
  rl.once("SIGINT", cancel);
  opts.signal?.addEventListener("abort", cancel, { once: true });
  const ask = (query: string): Promise<string | null> =>
    isClosed
      ? closed
      : Promise.race([new Promise<string>((resolve) => rl.question(query, resolve)), closed]);

  try {
    for (;;) {
      const answer = await ask(formatUsernamePrompt(opts.hostname, opts.defaultUsername));
      if (answer === null) {
        return null;
      }
      const candidate = answer.trim() || opts.defaultUsername;
      if (!candidate) {
        continue;
      }
      const parsed = UsernameSchema.safeParse(candidate);
      if (parsed.success) {
        return parsed.data;
      }
      opts.output.write(`${parsed.error.issues[0]?.message ?? "invalid username"}\n`);
    }
  } finally {
    opts.signal?.removeEventListener("abort", cancel);
    rl.close();
  }
}
