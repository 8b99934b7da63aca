import type { Peer } from "../peers/types.js";
import { matchPeers, type FuzzyResult } from "./fuzzy.js";

export type PickerKey =
  | { kind: "insert"; text: string }
  | { kind: "backspace" }
  | { kind: "clear" }
  | { kind: "down" }
  | { kind: "up" }
  | { kind: "page-down" }
  | { kind: "page-up" }
  | { kind: "home" }
  | { kind: "end" }
  | { kind: "confirm" }
  | { kind: "interrupt" };

export type SelectionState = {
  readonly peers: readonly Peer[];
  readonly query: string;
  /** Peers matching `query`, best first. */
  readonly view: readonly FuzzyResult<Peer>[];
  /** Index into `view`; undefined exactly when `view` is empty. */
  readonly cursor: number | undefined;
};

export type SelectionStep =
  | { kind: "continue"; state: SelectionState }
  | { kind: "confirmed"; peer: Peer }
  | { kind: "cancelled" };

export type SelectionOptions = {
  pageSize: number;
};

export function createSelectionState(peers: readonly Peer[], query = ""): SelectionState {
  return withQuery({ peers, query: "", view: [], cursor: undefined }, query);
}

function withQuery(state: SelectionState, query: string): SelectionState {
  const view = matchPeers(query, state.peers);
  return { peers: state.peers, query, view, cursor: view.length > 0 ? 0 : undefined };
}

/** Re-filter for `query`; returns `state` itself when that changes nothing. */
function requery(state: SelectionState, query: string): SelectionState {
  const resetCursor = state.view.length > 0 ? 0 : undefined;
  if (query === state.query && state.cursor === resetCursor) {
    return state;
  }
  return withQuery(state, query);
}

function moveCursor(state: SelectionState, to: (cursor: number, last: number) => number): SelectionState {
  if (state.cursor === undefined || state.view.length === 0) {
    return state;
  }
  const last = state.view.length - 1;
  const next = Math.min(Math.max(to(state.cursor, last), 0), last);
  return next === state.cursor ? state : { ...state, cursor: next };
}

/**
 * Apply one key to the selection. Query edits, including Backspace and Escape
 * on an empty query, re-filter synchronously and put the cursor back on the
 * best match. Returns the same state object when the key changes nothing.
 */
export function reduceSelection(
  state: SelectionState,
  key: PickerKey,
  opts: SelectionOptions,
): SelectionStep {
  const pageSize = Math.max(1, Math.floor(opts.pageSize));
  const next = (s: SelectionState): SelectionStep => ({ kind: "continue", state: s });

  switch (key.kind) {
    case "interrupt":
      return { kind: "cancelled" };
    case "confirm": {
      const peer = selectedPeer(state);
      return peer ? { kind: "confirmed", peer } : next(state);
    }
    case "insert":
      return key.text ? next(withQuery(state, state.query + key.text)) : next(state);
    case "backspace":
      return next(requery(state, Array.from(state.query).slice(0, -1).join("")));
    case "clear":
      return next(requery(state, ""));
    case "down":
      return next(moveCursor(state, (cursor) => cursor + 1));
    case "up":
      return next(moveCursor(state, (cursor) => cursor - 1));
    case "page-down":
      return next(moveCursor(state, (cursor) => cursor + pageSize));
    case "page-up":
      return next(moveCursor(state, (cursor) => cursor - pageSize));
    case "home":
      return next(moveCursor(state, () => 0));
    case "end":
      return next(moveCursor(state, (_cursor, last) => last));
  }
}

export function selectedPeer(state: SelectionState): Peer | undefined {
  return state.cursor === undefined ? undefined : state.view[state.cursor]?.item;
}
