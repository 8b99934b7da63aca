export type EnvironmentErrorCode =
  | "MESH_CLIENT_MISSING"
  | "MESH_CLIENT_FAILED"
  | "SSH_CLIENT_MISSING"
  | "NOT_A_TTY";

/**
 * A problem with the surrounding environment (missing binaries, no terminal).
 * These are the only errors that abort the program.
 */
export class EnvironmentError extends Error {
  readonly code: EnvironmentErrorCode;

  constructor(code: EnvironmentErrorCode, message: string, opts?: { cause?: unknown }) {
    super(message, opts);
    this.name = "EnvironmentError";
    this.code = code;
  }
}

export function isEnvironmentError(err: unknown): err is EnvironmentError {
  return err instanceof EnvironmentError;
}

/** True when a spawn/exec failure means the executable was not found. */
export function isMissingExecutable(err: unknown): boolean {
  return (
    typeof err === "object" &&
    err !== null &&
    "code" in err &&
    (err.code === "ENOENT" || err.code === "EACCES")
  );
}

export function formatError(err: unknown): string {
  if (err instanceof Error) {
    return err.message;
  }
  return String(err);
}
