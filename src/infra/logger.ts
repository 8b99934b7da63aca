export type Logger = {
  info: (msg: string) => void;
  warn: (msg: string) => void;
  error: (msg: string) => void;
};

export const DEFAULT_LOGGER: Logger = {
  info: (msg) => console.log(msg),
  warn: (msg) => console.warn(msg),
  error: (msg) => console.error(msg),
};

/**
 * Logger for interactive runs. Everything goes to stderr so stdout stays
 * with the picker and the ssh session that follows it.
 */
export function createStderrLogger(stream: NodeJS.WritableStream = process.stderr): Logger {
  return {
    info: (msg) => stream.write(`${msg}\n`),
    warn: (msg) => stream.write(`warning: ${msg}\n`),
    error: (msg) => stream.write(`error: ${msg}\n`),
  };
}
