import type { Peer, PeerStatus } from "../peers/types.js";
import type { FuzzyResult } from "./fuzzy.js";
import type { SelectionState } from "./selection.js";

export const ANSI = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  dim: "\x1b[2m",
  inverse: "\x1b[7m",
  red: "\x1b[31m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  clearScreen: "\x1b[2J",
  clearLine: "\x1b[K",
  clearBelow: "\x1b[J",
  cursorHome: "\x1b[H",
  hideCursor: "\x1b[?25l",
  showCursor: "\x1b[?25h",
  altScreenOn: "\x1b[?1049h",
  altScreenOff: "\x1b[?1049l",
} as const;

/** Title, summary, query and hint lines around the list. */
export const CHROME_ROWS = 4;

export const TITLE = "mesh-ssh  select a peer";
export const HINTS = "enter connect  esc clear  ↑↓ move  pgup/pgdn page  ctrl+c quit";
export const NO_PEERS_MESSAGE = "No peers found. Is tailscale up?";

export type RenderModel = {
  state: SelectionState;
  scrollOffset: number;
  columns: number;
  rows: number;
  rememberedUsername: string;
  color: boolean;
};

type Segment = { text: string; style?: string };

const STATUS_STYLE: Record<PeerStatus, string> = {
  online: ANSI.green,
  offline: ANSI.red,
  unknown: ANSI.dim,
};

export function listRowsFor(rows: number): number {
  return Math.max(1, rows - CHROME_ROWS);
}

/**
 * Next scroll offset for a list window of `listRows` rows: unchanged while
 * the cursor is visible, otherwise moved just far enough to show it.
 */
export function followScroll(
  prevOffset: number,
  cursor: number | undefined,
  listRows: number,
  total: number,
): number {
  if (cursor === undefined || total === 0) {
    return 0;
  }
  let offset = prevOffset;
  if (cursor < offset) {
    offset = cursor;
  } else if (cursor >= offset + listRows) {
    offset = cursor - listRows + 1;
  }
  return Math.min(Math.max(offset, 0), Math.max(0, total - listRows));
}

function clampWidth(values: string[], min: number, max: number): number {
  const longest = values.reduce((acc, value) => Math.max(acc, value.length), 0);
  return Math.min(Math.max(longest, min), max);
}

function fit(segments: Segment[], width: number, color: boolean, highlight: boolean): string {
  let remaining = Math.max(0, width);
  let out = "";
  for (const segment of segments) {
    if (remaining === 0) {
      break;
    }
    const chars = Array.from(segment.text);
    const text = chars.length > remaining ? chars.slice(0, remaining).join("") : segment.text;
    remaining -= Math.min(chars.length, remaining);
    if (!color || !text) {
      out += text;
      continue;
    }
    const style = `${highlight ? ANSI.inverse : ""}${segment.style ?? ""}`;
    out += style ? `${style}${text}${ANSI.reset}` : text;
  }
  if (color && highlight && remaining > 0) {
    out += `${ANSI.inverse}${" ".repeat(remaining)}${ANSI.reset}`;
  }
  return out;
}

function hostnameSegments(result: FuzzyResult<Peer>, width: number, color: boolean): Segment[] {
  const padded = result.item.hostname.padEnd(width);
  if (!color || result.positions.length === 0) {
    return [{ text: padded }];
  }
  const matched = new Set(result.positions);
  return Array.from(padded).map((ch, i) => ({
    text: ch,
    style: matched.has(i) ? `${ANSI.bold}${ANSI.yellow}` : undefined,
  }));
}

/** Raw status text when it says more than the status word, e.g. "active; direct 10.0.0.4:41641". */
export function statusDetail(peer: Peer): string {
  const text = peer.statusText.trim();
  return text === "-" || text.toLowerCase() === peer.status ? "" : text;
}

function renderRow(
  result: FuzzyResult<Peer>,
  selected: boolean,
  widths: { host: number; address: number },
  model: RenderModel,
): string {
  const peer = result.item;
  const segments: Segment[] = [
    { text: selected ? "> " : "  ", style: selected ? ANSI.bold : undefined },
    ...hostnameSegments(result, widths.host, model.color),
    { text: "  " },
    { text: peer.address.padEnd(widths.address) },
    { text: "  " },
    { text: peer.status, style: STATUS_STYLE[peer.status] },
  ];
  const detail = statusDetail(peer);
  if (detail) {
    segments.push({ text: "  " }, { text: detail, style: ANSI.dim });
  }
  return fit(segments, model.columns, model.color, selected);
}

/**
 * Draw the picker as exactly `rows` lines. The list grows upward from the
 * query line: `view[scrollOffset]` sits directly above it.
 */
export function renderPicker(model: RenderModel): string[] {
  const { state, columns, color } = model;
  if (model.rows <= 0) {
    return [];
  }
  const listRows = listRowsFor(model.rows);
  const total = state.peers.length;
  const line = (text: string, style?: string) => fit([{ text, style }], columns, color, false);

  const summary = [
    `${total} ${total === 1 ? "peer" : "peers"}`,
    ...(model.rememberedUsername ? [`user ${model.rememberedUsername}`] : []),
  ].join(" · ");

  const area: string[] = new Array<string>(listRows).fill("");
  if (state.view.length === 0) {
    const message = total === 0 ? NO_PEERS_MESSAGE : `No peers match "${state.query}"`;
    area[listRows - 1] = line(message, ANSI.yellow);
  } else {
    const widths = {
      host: clampWidth(state.peers.map((p) => p.hostname), 8, 32),
      address: clampWidth(state.peers.map((p) => p.address), 7, 39),
    };
    for (let i = 0; i < listRows; i++) {
      const index = model.scrollOffset + i;
      const result = state.view[index];
      if (!result) {
        break;
      }
      area[listRows - 1 - i] = renderRow(result, index === state.cursor, widths, model);
    }
  }

  const counter = total > 0 ? [{ text: `  ${state.view.length}/${total}`, style: ANSI.dim }] : [];
  const lines = [
    line(TITLE, `${ANSI.bold}${ANSI.green}`),
    line(summary, ANSI.dim),
    ...area,
    fit([{ text: "> ", style: ANSI.bold }, { text: state.query }, ...counter], columns, color, false),
    line(HINTS, ANSI.dim),
  ];
  return lines.length > model.rows ? lines.slice(lines.length - model.rows) : lines;
}

/** Terminal bytes that paint `lines` from the top-left corner. */
export function composeFrame(lines: string[], fullRedraw: boolean): string {
  const body = lines.map((l) => `${l}${ANSI.clearLine}`).join("\r\n");
  return `${fullRedraw ? ANSI.clearScreen : ""}${ANSI.cursorHome}${body}${ANSI.clearBelow}`;
}
