export type StatusCommand = {
  /** Executable of the mesh client (default: "tailscale"). */
  command: string;
  /** Arguments that make it print the peer table (default: ["status"]). */
  args: string[];
};

export type ConnectTarget = "address" | "hostname";

export type AppConfig = {
  /** JSON file holding the remembered username. */
  preferencesPath: string;
  statusCommand: StatusCommand;
  /** ssh executable to hand the terminal to. */
  sshCommand: string;
  /** Whether ssh is pointed at the peer's mesh address or its hostname. */
  connectBy: ConnectTarget;
  /** Rows moved by Page Up / Page Down. */
  pageSize: number;
  /** Treat bare `j` / `k` as navigation instead of query input. */
  vimKeys: boolean;
  color: boolean;
  /** Hide peers the mesh client reports as offline. */
  onlineOnly: boolean;
  /** Username given on the command line; skips the prompt. */
  username?: string;
};

export type Preferences = {
  defaultUsername: string;
};
