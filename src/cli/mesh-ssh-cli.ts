import { Command } from "commander";
import { ZodError } from "zod";
import { resolveAppConfig } from "../config/app-config.js";
import type { AppConfig } from "../config/types.js";
import type { CliOptions } from "../config/zod-schema.js";
import { formatError, isEnvironmentError } from "../infra/errors.js";
import { createStderrLogger, type Logger } from "../infra/logger.js";
import { loadPeers } from "../peers/peer-source.js";
import { runPicker } from "../picker/run-picker.js";
import { assertInteractive, withRawTerminal, type TerminalIo } from "../picker/terminal.js";
import { assertSshAvailable, launchSsh } from "../session/launcher.js";
import { promptUsername } from "../session/username-prompt.js";
import { EXIT_CANCELLED, runConnectFlow, type ConnectFlowDeps } from "./connect-flow.js";

export const VERSION = "0.1.0";

export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

const STOP_SIGNALS: NodeJS.Signals[] = ["SIGINT", "SIGTERM", "SIGHUP"];

export function createFlowDeps(config: AppConfig, io: TerminalIo, log: Logger): ConnectFlowDeps {
  return {
    assertTerminal: () => assertInteractive(io),
    assertSshAvailable: (command) => assertSshAvailable(command),
    loadPeers,
    pickPeer: ({ peers, rememberedUsername, signal }) =>
      withRawTerminal(io, ({ keys, screen }) =>
        runPicker({
          peers,
          keys,
          screen,
          pageSize: config.pageSize,
          vimKeys: config.vimKeys,
          color: config.color,
          rememberedUsername,
          signal,
          log,
        }),
      ),
    promptUsername: ({ hostname, defaultUsername, signal }) =>
      promptUsername({
        hostname,
        defaultUsername,
        input: io.input,
        output: process.stdout,
        terminal: true,
        signal,
      }),
    launchSsh,
    log,
  };
}

function describeConfigError(err: ZodError): string {
  return err.issues
    .map((issue) => {
      const flag = issue.path.join(".").replace(/[A-Z]/g, (ch) => `-${ch.toLowerCase()}`);
      const where = flag ? `--${flag}: ` : "";
      return `${where}${issue.message}`;
    })
    .join("; ");
}

/**
 * Run the connect flow with SIGINT / SIGTERM / SIGHUP turned into a
 * cancellation, and map failures onto exit codes.
 */
export async function runMeshSsh(
  options: CliOptions,
  io: TerminalIo = { input: process.stdin, output: process.stdout },
  log: Logger = createStderrLogger(),
): Promise<number> {
  let config: AppConfig;
  try {
    config = resolveAppConfig(options);
  } catch (err) {
    if (err instanceof ZodError) {
      log.error(describeConfigError(err));
      return EXIT_USAGE;
    }
    throw err;
  }

  const controller = new AbortController();
  const onSignal = () => controller.abort();
  for (const sig of STOP_SIGNALS) {
    process.on(sig, onSignal);
  }
  try {
    return await runConnectFlow(config, createFlowDeps(config, io, log), controller.signal);
  } catch (err) {
    if (isEnvironmentError(err)) {
      log.error(err.message);
    } else {
      log.error(`unexpected failure: ${formatError(err)}`);
    }
    return EXIT_FAILURE;
  } finally {
    for (const sig of STOP_SIGNALS) {
      process.off(sig, onSignal);
    }
  }
}

export function createMeshSshCli(): Command {
  const program = new Command();
  program
    .name("mesh-ssh")
    .description("Pick a tailscale peer from a fuzzy-filtered list and ssh into it")
    .version(VERSION)
    .option("-u, --user <name>", "Log in as this user instead of asking")
    .option("--online", "Only list peers the mesh client reports as online")
    .option("--by-hostname", "Connect to the peer's hostname instead of its mesh address")
    .option("--page-size <rows>", "Rows moved by Page Up / Page Down", "10")
    .option("--tailscale <bin>", "tailscale executable", "tailscale")
    .option("--ssh <bin>", "ssh executable", "ssh")
    .option("--config-dir <dir>", "Directory holding the remembered username")
    .option("--no-vim-keys", "Type j and k into the filter instead of moving the cursor")
    .option("--no-color", "Disable colors")
    .addHelpText(
      "after",
      `
Keys:
  type to filter   enter connect   esc clear filter
  up/down, j/k     pgup/pgdn       home/end
  ctrl+c quit (exit status ${EXIT_CANCELLED})`,
    )
    .action(async (opts: CliOptions) => {
      process.exitCode = await runMeshSsh(opts);
    });
  return program;
}
