import { describe, expect, it } from "vitest";
import { makePeer, numberedPeers, samplePeers } from "../../test/helpers/peers.js";
import {
  ANSI,
  composeFrame,
  followScroll,
  HINTS,
  NO_PEERS_MESSAGE,
  renderPicker,
  statusDetail,
  TITLE,
  type RenderModel,
} from "./render.js";
import { createSelectionState, type SelectionState } from "./selection.js";

function model(state: SelectionState, overrides: Partial<RenderModel> = {}): RenderModel {
  return {
    state,
    scrollOffset: 0,
    columns: 80,
    rows: 8,
    rememberedUsername: "",
    color: false,
    ...overrides,
  };
}

function stripAnsi(text: string): string {
  return text.replace(/\x1b\[[0-9;?]*[A-Za-z]/g, "");
}

describe("followScroll()", () => {
  it("keeps the offset while the cursor is visible", () => {
    expect(followScroll(0, 2, 3, 10)).toBe(0);
    expect(followScroll(4, 6, 3, 10)).toBe(4);
  });

  it("scrolls just far enough to reveal the cursor", () => {
    expect(followScroll(0, 5, 3, 10)).toBe(3);
    expect(followScroll(5, 2, 3, 10)).toBe(2);
  });

  it("never scrolls past the end of the list", () => {
    expect(followScroll(8, 9, 3, 10)).toBe(7);
  });

  it("resets when there is nothing to show", () => {
    expect(followScroll(4, undefined, 3, 0)).toBe(0);
  });
});

describe("statusDetail()", () => {
  it("keeps status text that says more than the status word", () => {
    expect(statusDetail(makePeer("web1", "online", { statusText: "active; direct 10.0.0.4:41641" }))).toBe(
      "active; direct 10.0.0.4:41641",
    );
    expect(statusDetail(makePeer("db2", "unknown", { statusText: "exit node" }))).toBe("exit node");
  });

  it("drops status text that repeats the status word", () => {
    expect(statusDetail(makePeer("web1", "online", { statusText: "-" }))).toBe("");
    expect(statusDetail(makePeer("db2", "offline", { statusText: "offline" }))).toBe("");
    expect(statusDetail(makePeer("db2", "unknown", { statusText: "" }))).toBe("");
  });
});

describe("renderPicker()", () => {
  it("anchors the list above the query line with the best match at the bottom", () => {
    expect(renderPicker(model(createSelectionState(samplePeers())))).toEqual([
      TITLE,
      "3 peers",
      "",
      "  web3      100.64.0.3  online",
      "  db2       100.64.0.2  offline",
      "> web1      100.64.0.1  online",
      ">   3/3",
      HINTS,
    ]);
  });

  it("shows the raw status text after the status word", () => {
    const peers = [makePeer("web1", "online", { address: "100.64.0.1", statusText: "idle, tx 1 rx 2" })];
    const lines = renderPicker(model(createSelectionState(peers), { rows: 5 }));
    expect(lines[2]).toBe("> web1      100.64.0.1  online  idle, tx 1 rx 2");
  });

  it("shows the remembered username in the summary", () => {
    const lines = renderPicker(model(createSelectionState(samplePeers()), { rememberedUsername: "alice" }));
    expect(lines[1]).toBe("3 peers · user alice");
  });

  it("shows the query and the match count", () => {
    const lines = renderPicker(model(createSelectionState(samplePeers(), "web")));
    expect(lines.slice(3)).toEqual([
      "",
      "  web3      100.64.0.3  online",
      "> web1      100.64.0.1  online",
      "> web  2/3",
      HINTS,
    ]);
  });

  it("renders the window starting at the scroll offset", () => {
    const state = { ...createSelectionState(numberedPeers(10)), cursor: 5 };
    const lines = renderPicker(model(state, { rows: 7, scrollOffset: 3 }));
    expect(lines.slice(2, 5)).toEqual([
      "> node05    100.64.1.5  online",
      "  node04    100.64.1.4  online",
      "  node03    100.64.1.3  online",
    ]);
  });

  it("explains an empty peer list", () => {
    expect(renderPicker(model(createSelectionState([]), { rows: 6 }))).toEqual([
      TITLE,
      "0 peers",
      "",
      NO_PEERS_MESSAGE,
      "> ",
      HINTS,
    ]);
  });

  it("explains a query with no matches", () => {
    const lines = renderPicker(model(createSelectionState(samplePeers(), "zzz"), { rows: 6 }));
    expect(lines.slice(3, 5)).toEqual(['No peers match "zzz"', "> zzz  0/3"]);
  });

  it("truncates lines to the terminal width", () => {
    const lines = renderPicker(model(createSelectionState(samplePeers()), { columns: 12 }));
    expect(lines[0]).toBe("mesh-ssh  se");
    expect(lines.every((l) => l.length <= 12)).toBe(true);
  });

  it("keeps the bottom of the picker on very short terminals", () => {
    const lines = renderPicker(model(createSelectionState(samplePeers()), { rows: 3 }));
    expect(lines).toEqual(["> web1      100.64.0.1  online", ">   3/3", HINTS]);
    expect(renderPicker(model(createSelectionState(samplePeers()), { rows: 0 }))).toEqual([]);
  });

  it("highlights the selected row across the full width in color mode", () => {
    const lines = renderPicker(model(createSelectionState(samplePeers()), { color: true }));
    const selected = lines[5];
    expect(selected.startsWith(`${ANSI.inverse}${ANSI.bold}> ${ANSI.reset}`)).toBe(true);
    expect(selected).toContain(`${ANSI.inverse}${ANSI.green}online${ANSI.reset}`);
    expect(stripAnsi(selected)).toBe("> web1      100.64.0.1  online".padEnd(80));
    expect(lines[4]).toContain(`${ANSI.red}offline${ANSI.reset}`);
  });

  it("emphasizes matched characters in color mode", () => {
    const lines = renderPicker(model(createSelectionState(samplePeers(), "web"), { color: true }));
    expect(lines[4]).toContain(`${ANSI.bold}${ANSI.yellow}w${ANSI.reset}`);
    expect(lines[5]).toContain(`${ANSI.inverse}${ANSI.bold}${ANSI.yellow}w${ANSI.reset}`);
  });
});

describe("composeFrame()", () => {
  it("paints from the top-left and clears leftovers", () => {
    expect(composeFrame(["a", "b"], false)).toBe("\x1b[Ha\x1b[K\r\nb\x1b[K\x1b[J");
  });

  it("clears the whole screen on a full redraw", () => {
    expect(composeFrame(["a"], true)).toBe("\x1b[2J\x1b[Ha\x1b[K\x1b[J");
  });
});
