export type PeerStatus = "online" | "offline" | "unknown";

/** One row of the mesh client's peer table. Identity is the hostname. */
export type Peer = {
  hostname: string;
  /** Mesh IP address (v4 or v6). */
  address: string;
  status: PeerStatus;
  /** Status column verbatim, e.g. "active; direct 10.0.0.4:41641". */
  statusText: string;
};
