import { isIP } from "node:net";
import type { Peer, PeerStatus } from "./types.js";

export type StatusLineResult =
  | { kind: "peer"; peer: Peer }
  | { kind: "ignored" }
  | { kind: "malformed"; reason: string };

export type ParsedStatus = {
  peers: Peer[];
  /** Non-blank lines that looked like peer rows but could not be read. */
  skipped: number;
};

const HOSTNAME_RE = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

export function classifyStatus(statusText: string): PeerStatus {
  const text = statusText.trim().toLowerCase();
  if (text.startsWith("offline")) {
    return "offline";
  }
  if (text === "-" || text.startsWith("active") || text.startsWith("idle")) {
    return "online";
  }
  return "unknown";
}

/**
 * Tokenize one line of `tailscale status` output:
 *
 *   100.74.180.3  web-1  alice@  linux  active; direct 10.0.0.4:41641
 *   <address>     <host> <owner> <os>   <status...>
 *
 * Blank lines and `#` comments (health warnings, notes) are ignored.
 */
export function parseStatusLine(line: string): StatusLineResult {
  const trimmed = line.trim();
  if (!trimmed || trimmed.startsWith("#")) {
    return { kind: "ignored" };
  }
  const tokens = trimmed.split(/\s+/);
  const [address, hostname, owner, os, ...rest] = tokens;
  if (!address || isIP(address) === 0) {
    return { kind: "malformed", reason: "first column is not an IP address" };
  }
  if (!hostname || !HOSTNAME_RE.test(hostname)) {
    return { kind: "malformed", reason: "missing or invalid hostname" };
  }
  if (!owner || !os) {
    return { kind: "malformed", reason: "too few columns" };
  }
  const statusText = rest.join(" ");
  return {
    kind: "peer",
    peer: {
      hostname,
      address,
      status: statusText ? classifyStatus(statusText) : "unknown",
      statusText,
    },
  };
}

/**
 * Parse the whole status output. Each line is handled on its own; a bad line
 * is counted and skipped. Later rows repeating a hostname are dropped.
 */
export function parseStatusOutput(text: string): ParsedStatus {
  const peers: Peer[] = [];
  const seen = new Set<string>();
  let skipped = 0;
  for (const line of text.split(/\r?\n/)) {
    const result = parseStatusLine(line);
    if (result.kind === "malformed") {
      skipped += 1;
      continue;
    }
    if (result.kind === "ignored" || seen.has(result.peer.hostname)) {
      continue;
    }
    seen.add(result.peer.hostname);
    peers.push(result.peer);
  }
  return { peers, skipped };
}
