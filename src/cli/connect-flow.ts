import { loadPreferences, savePreferences } from "../config/preferences.js";
import type { AppConfig } from "../config/types.js";
import { formatError } from "../infra/errors.js";
import type { Logger } from "../infra/logger.js";
import type { LoadPeersOptions } from "../peers/peer-source.js";
import type { Peer } from "../peers/types.js";
import type { PickerOutcome } from "../picker/run-picker.js";
import { resolveTarget, SSH_CONNECTION_FAILED, type LaunchSshParams } from "../session/launcher.js";

/** Conventional status for "terminated by Ctrl+C". */
export const EXIT_CANCELLED = 130;

export type ConnectFlowDeps = {
  /** Throws when the terminal cannot host the picker. Runs before anything else. */
  assertTerminal: () => void;
  /** Rejects when the ssh client cannot be found. Runs before the picker. */
  assertSshAvailable: (command: string) => Promise<void>;
  loadPeers: (opts: LoadPeersOptions) => Promise<Peer[]>;
  pickPeer: (params: {
    peers: Peer[];
    rememberedUsername: string;
    signal?: AbortSignal;
  }) => Promise<PickerOutcome>;
  promptUsername: (params: {
    hostname: string;
    defaultUsername: string;
    signal?: AbortSignal;
  }) => Promise<string | null>;
  launchSsh: (params: LaunchSshParams) => Promise<number>;
  log: Logger;
};

/**
 * Pick a peer, settle the username, run ssh and remember the name once the
 * connection went through. Resolves with the process exit code.
 */
export async function runConnectFlow(
  config: AppConfig,
  deps: ConnectFlowDeps,
  signal?: AbortSignal,
): Promise<number> {
  const { log } = deps;
  deps.assertTerminal();
  await deps.assertSshAvailable(config.sshCommand);

  const prefs = await loadPreferences(config.preferencesPath, log);
  const peers = await deps.loadPeers({
    statusCommand: config.statusCommand,
    onlineOnly: config.onlineOnly,
    log,
  });

  const outcome = await deps.pickPeer({
    peers,
    rememberedUsername: prefs.defaultUsername,
    signal,
  });
  if (outcome.kind === "cancelled") {
    return EXIT_CANCELLED;
  }
  const peer = outcome.peer;

  const username =
    config.username ??
    (await deps.promptUsername({
      hostname: peer.hostname,
      defaultUsername: prefs.defaultUsername,
      signal,
    }));
  if (username === null) {
    return EXIT_CANCELLED;
  }

  const target = resolveTarget(peer, config.connectBy);
  log.info(`Connecting to ${username}@${peer.hostname} (${target})...`);
  const exitCode = await deps.launchSsh({ target, username, sshCommand: config.sshCommand });

  if (exitCode !== SSH_CONNECTION_FAILED && username !== prefs.defaultUsername) {
    try {
      await savePreferences(config.preferencesPath, { defaultUsername: username });
    } catch (err) {
      log.warn(`could not remember username in ${config.preferencesPath}: ${formatError(err)}`);
    }
  }
  if (exitCode !== 0) {
    log.warn(`ssh exited with status ${exitCode}`);
  }
  return exitCode;
}
