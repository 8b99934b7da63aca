import { ChildProcess } from "node:child_process";
import fs from "node:fs";
import path from "node:path";
import { describe, expect, it, vi } from "vitest";
import { makePeer } from "../../test/helpers/peers.js";
import { withTempDir } from "../../test/helpers/temp-dir.js";
import { assertSshAvailable, launchSsh, resolveTarget, type SpawnFn } from "./launcher.js";

function fakeSpawn() {
  const child = new ChildProcess();
  const spawnFn = vi.fn<SpawnFn>(() => child);
  return { child, spawnFn };
}

function enoent(): NodeJS.ErrnoException {
  return Object.assign(new Error("spawn ssh ENOENT"), { code: "ENOENT" });
}

describe("resolveTarget()", () => {
  const peer = makePeer("web3", "online", { address: "100.64.0.3" });

  it("connects by address unless asked for the hostname", () => {
    expect(resolveTarget(peer, "address")).toBe("100.64.0.3");
    expect(resolveTarget(peer, "hostname")).toBe("web3");
  });
});

describe.skipIf(process.platform === "win32")("assertSshAvailable()", () => {
  async function writeFile(file: string, mode: number): Promise<void> {
    await fs.promises.writeFile(file, "#!/bin/sh\n");
    await fs.promises.chmod(file, mode);
  }

  it("finds an executable on PATH", async () => {
    await withTempDir(async (dir) => {
      await writeFile(path.join(dir, "ssh"), 0o755);
      const env = { PATH: `/nonexistent${path.delimiter}${dir}` };
      await expect(assertSshAvailable("ssh", env)).resolves.toBeUndefined();
    });
  });

  it("accepts an explicit path to an executable", async () => {
    await withTempDir(async (dir) => {
      const file = path.join(dir, "my-ssh");
      await writeFile(file, 0o755);
      await expect(assertSshAvailable(file, {})).resolves.toBeUndefined();
    });
  });

  it("rejects a command missing from PATH", async () => {
    await withTempDir(async (dir) => {
      await expect(assertSshAvailable("ssh", { PATH: dir })).rejects.toMatchObject({
        code: "SSH_CLIENT_MISSING",
        message: "could not run 'ssh'. Is an ssh client installed and on your PATH?",
      });
    });
  });

  it("rejects files without execute permission and directories", async () => {
    await withTempDir(async (dir) => {
      await writeFile(path.join(dir, "ssh"), 0o644);
      await fs.promises.mkdir(path.join(dir, "sshd"));
      await expect(assertSshAvailable("ssh", { PATH: dir })).rejects.toMatchObject({
        code: "SSH_CLIENT_MISSING",
      });
      await expect(assertSshAvailable("sshd", { PATH: dir })).rejects.toMatchObject({
        code: "SSH_CLIENT_MISSING",
      });
    });
  });

  it("rejects a missing explicit path", async () => {
    await withTempDir(async (dir) => {
      await expect(assertSshAvailable(path.join(dir, "gone"), {})).rejects.toMatchObject({
        code: "SSH_CLIENT_MISSING",
      });
    });
  });

  it("rejects when PATH is unset", async () => {
    await expect(assertSshAvailable("ssh", {})).rejects.toMatchObject({ code: "SSH_CLIENT_MISSING" });
  });
});

describe("launchSsh()", () => {
  it("runs ssh user@target on the inherited terminal", async () => {
    const { child, spawnFn } = fakeSpawn();
    const done = launchSsh({ target: "100.64.0.3", username: "alice", spawnFn });
    child.emit("exit", 0, null);
    await expect(done).resolves.toBe(0);
    expect(spawnFn).toHaveBeenCalledWith("ssh", ["alice@100.64.0.3"], { stdio: "inherit" });
  });

  it("uses a custom ssh command", async () => {
    const { child, spawnFn } = fakeSpawn();
    const done = launchSsh({ target: "web3", username: "bob", sshCommand: "/opt/bin/ssh", spawnFn });
    child.emit("exit", 0, null);
    await done;
    expect(spawnFn).toHaveBeenCalledWith("/opt/bin/ssh", ["bob@web3"], { stdio: "inherit" });
  });

  it("passes the remote exit status through", async () => {
    const { child, spawnFn } = fakeSpawn();
    const done = launchSsh({ target: "web3", username: "alice", spawnFn });
    child.emit("exit", 255, null);
    await expect(done).resolves.toBe(255);
  });

  it("maps death by signal to 128 plus the signal number", async () => {
    const { child, spawnFn } = fakeSpawn();
    const done = launchSsh({ target: "web3", username: "alice", spawnFn });
    child.emit("exit", null, "SIGTERM");
    await expect(done).resolves.toBe(143);
  });

  it("reports a missing ssh client", async () => {
    const { child, spawnFn } = fakeSpawn();
    const done = launchSsh({ target: "web3", username: "alice", spawnFn });
    child.emit("error", enoent());
    await expect(done).rejects.toMatchObject({
      code: "SSH_CLIENT_MISSING",
      message: "could not run 'ssh'. Is an ssh client installed and on your PATH?",
    });
  });

  it("rejects when spawn throws", async () => {
    const spawnFn = vi.fn<SpawnFn>(() => {
      throw new Error("bad options");
    });
    await expect(launchSsh({ target: "web3", username: "alice", spawnFn })).rejects.toThrow("bad options");
  });
});
