import { execFile } from "node:child_process";
import type { StatusCommand } from "../config/types.js";
import { EnvironmentError, isMissingExecutable } from "../infra/errors.js";
import { DEFAULT_LOGGER, type Logger } from "../infra/logger.js";
import { parseStatusOutput } from "./status-parser.js";
import type { Peer } from "./types.js";

export type CommandOutput = {
  stdout: string;
  stderr: string;
  exitCode: number;
};

/**
 * Runs a command to completion. Rejects only when the process could not be
 * started; a non-zero exit is reported through `exitCode`.
 */
export type CommandRunner = (command: string, args: string[]) => Promise<CommandOutput>;

export const execFileRunner: CommandRunner = (command, args) =>
  new Promise((resolve, reject) => {
    execFile(
      command,
      args,
      { encoding: "utf8", maxBuffer: 16 * 1024 * 1024, timeout: 15_000 },
      (err, stdout, stderr) => {
        if (err && typeof err.code !== "number") {
          reject(err);
          return;
        }
        resolve({ stdout, stderr, exitCode: typeof err?.code === "number" ? err.code : 0 });
      },
    );
  });

export type LoadPeersOptions = {
  statusCommand: StatusCommand;
  onlineOnly?: boolean;
  runner?: CommandRunner;
  log?: Logger;
};

/**
 * Ask the mesh client for its peer table. Failing to run the client is an
 * environment error; unparseable rows are skipped.
 */
export async function loadPeers(opts: LoadPeersOptions): Promise<Peer[]> {
  const runner = opts.runner ?? execFileRunner;
  const log = opts.log ?? DEFAULT_LOGGER;
  const { command, args } = opts.statusCommand;
  const display = [command, ...args].join(" ");

  let output: CommandOutput;
  try {
    output = await runner(command, args);
  } catch (err) {
    if (isMissingExecutable(err)) {
      throw new EnvironmentError(
        "MESH_CLIENT_MISSING",
        `could not run '${display}'. Is tailscale installed and on your PATH?`,
        { cause: err },
      );
    }
    throw new EnvironmentError("MESH_CLIENT_FAILED", `'${display}' did not complete`, {
      cause: err,
    });
  }

  if (output.exitCode !== 0) {
    const detail = output.stderr.trim() || output.stdout.trim() || `exit code ${output.exitCode}`;
    throw new EnvironmentError(
      "MESH_CLIENT_FAILED",
      `'${display}' failed (${detail}). Is tailscale connected?`,
    );
  }

  const { peers, skipped } = parseStatusOutput(output.stdout);
  if (skipped > 0) {
    log.info(`skipped ${skipped} unrecognized line(s) in '${display}' output`);
  }
  if (peers.length === 0 && output.stdout.trim()) {
    log.warn(`could not read any peers from '${display}' output`);
  }
  return opts.onlineOnly ? peers.filter((peer) => peer.status === "online") : peers;
}
