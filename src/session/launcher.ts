import { spawn, type ChildProcess, type SpawnOptions } from "node:child_process";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import type { ConnectTarget } from "../config/types.js";
import { EnvironmentError, isMissingExecutable } from "../infra/errors.js";
import type { Peer } from "../peers/types.js";

/** ssh reserves 255 for its own failures (unreachable host, auth refused). */
export const SSH_CONNECTION_FAILED = 255;

export type SpawnFn = (command: string, args: string[], options: SpawnOptions) => ChildProcess;

export type LaunchSshParams = {
  target: string;
  username: string;
  sshCommand?: string;
  spawnFn?: SpawnFn;
};

export function resolveTarget(peer: Peer, connectBy: ConnectTarget): string {
  return connectBy === "hostname" ? peer.hostname : peer.address;
}

function missingSshError(command: string, cause?: unknown): EnvironmentError {
  return new EnvironmentError(
    "SSH_CLIENT_MISSING",
    `could not run '${command}'. Is an ssh client installed and on your PATH?`,
    { cause },
  );
}

async function isExecutableFile(candidate: string): Promise<boolean> {
  try {
    const stat = await fs.promises.stat(candidate);
    if (!stat.isFile()) {
      return false;
    }
    await fs.promises.access(candidate, fs.constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Check that `command` names an executable file, directly when it contains a
 * path separator and through `PATH` otherwise. Runs before the picker so a
 * missing client is reported while the terminal is still in cooked mode.
 */
export async function assertSshAvailable(
  command: string,
  env: NodeJS.ProcessEnv = process.env,
): Promise<void> {
  if (command.includes("/") || command.includes(path.sep)) {
    if (await isExecutableFile(command)) {
      return;
    }
    throw missingSshError(command);
  }
  const dirs = (env.PATH ?? "").split(path.delimiter).filter(Boolean);
  const exts =
    process.platform === "win32" ? ["", ...(env.PATHEXT ?? ".EXE").split(";").filter(Boolean)] : [""];
  for (const dir of dirs) {
    for (const ext of exts) {
      if (await isExecutableFile(path.join(dir, command + ext))) {
        return;
      }
    }
  }
  throw missingSshError(command);
}

function signalExitCode(signal: NodeJS.Signals): number {
  const num = os.constants.signals[signal];
  return typeof num === "number" ? 128 + num : 1;
}

/**
 * Hand the terminal to `ssh username@target` and resolve with its exit
 * status once it ends. Rejects with an environment error when ssh cannot be
 * started at all.
 */
export function launchSsh(params: LaunchSshParams): Promise<number> {
  const command = params.sshCommand ?? "ssh";
  const spawnFn = params.spawnFn ?? spawn;
  const destination = `${params.username}@${params.target}`;

  return new Promise<number>((resolve, reject) => {
    let child: ChildProcess;
    try {
      child = spawnFn(command, [destination], { stdio: "inherit" });
    } catch (err) {
      reject(toLaunchError(command, err));
      return;
    }
    child.once("error", (err) => {
      reject(toLaunchError(command, err));
    });
    child.once("exit", (code, signal) => {
      if (typeof code === "number") {
        resolve(code);
        return;
      }
      resolve(signal ? signalExitCode(signal) : 1);
    });
  });
}

function toLaunchError(command: string, err: unknown): Error {
  if (isMissingExecutable(err)) {
    return missingSshError(command, err);
  }
  return err instanceof Error ? err : new Error(String(err));
}
