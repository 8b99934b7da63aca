import type { Key } from "node:readline";
import { formatError } from "../infra/errors.js";
import { DEFAULT_LOGGER, type Logger } from "../infra/logger.js";
import type { Peer } from "../peers/types.js";
import { decodeKeypress } from "./keys.js";
import {
  composeFrame,
  followScroll,
  listRowsFor,
  renderPicker,
  type RenderModel,
} from "./render.js";
import { createSelectionState, reduceSelection, type SelectionStep } from "./selection.js";
import type { KeySource, PickerScreen } from "./terminal.js";

export type PickerOutcome = Exclude<SelectionStep, { kind: "continue" }>;

export type RunPickerOptions = {
  peers: readonly Peer[];
  keys: KeySource;
  screen: PickerScreen;
  pageSize: number;
  vimKeys: boolean;
  color: boolean;
  /** Shown in the summary line when non-empty. */
  rememberedUsername: string;
  /** Aborting cancels the picker (wired to SIGTERM / SIGHUP by the CLI). */
  signal?: AbortSignal;
  log?: Logger;
  render?: (model: RenderModel) => string[];
};

const FALLBACK_COLUMNS = 80;
const FALLBACK_ROWS = 24;

/**
 * Drive the picker until the user confirms a peer or cancels. Each key is
 * decoded, applied and drawn before the next one is looked at, so every
 * frame reflects all input received so far.
 */
export function runPicker(opts: RunPickerOptions): Promise<PickerOutcome> {
  const log = opts.log ?? DEFAULT_LOGGER;
  const render = opts.render ?? renderPicker;

  return new Promise<PickerOutcome>((resolve, reject) => {
    let state = createSelectionState(opts.peers);
    let scrollOffset = 0;
    let fullRedraw = true;
    let settled = false;

    const draw = () => {
      const columns = opts.screen.columns || FALLBACK_COLUMNS;
      const rows = opts.screen.rows || FALLBACK_ROWS;
      scrollOffset = followScroll(scrollOffset, state.cursor, listRowsFor(rows), state.view.length);
      try {
        const lines = render({
          state,
          scrollOffset,
          columns,
          rows,
          rememberedUsername: opts.rememberedUsername,
          color: opts.color,
        });
        opts.screen.write(composeFrame(lines, fullRedraw));
        fullRedraw = false;
      } catch (err) {
        fullRedraw = true;
        log.warn(`render failed, redrawing on next frame: ${formatError(err)}`);
      }
    };

    const detach = () => {
      opts.keys.off("keypress", onKeypress);
      opts.screen.off("resize", onResize);
      opts.signal?.removeEventListener("abort", onAbort);
    };

    const settle = (outcome: PickerOutcome) => {
      if (settled) {
        return;
      }
      settled = true;
      detach();
      resolve(outcome);
    };

    const onKeypress = (str: string | undefined, key: Key | undefined) => {
      if (settled) {
        return;
      }
      try {
        const decoded = decodeKeypress(str, key, { vimKeys: opts.vimKeys });
        if (!decoded) {
          return;
        }
        const step = reduceSelection(state, decoded, { pageSize: opts.pageSize });
        if (step.kind !== "continue") {
          settle(step);
          return;
        }
        if (step.state !== state) {
          state = step.state;
          draw();
        }
      } catch (err) {
        settled = true;
        detach();
        reject(err);
      }
    };

    const onResize = () => {
      fullRedraw = true;
      draw();
    };

    const onAbort = () => settle({ kind: "cancelled" });

    if (opts.signal?.aborted) {
      settle({ kind: "cancelled" });
      return;
    }
    opts.keys.on("keypress", onKeypress);
    opts.screen.on("resize", onResize);
    opts.signal?.addEventListener("abort", onAbort, { once: true });
    draw();
  });
}
