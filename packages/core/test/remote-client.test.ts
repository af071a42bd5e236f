import { describe, it, expect } from "vitest";
import { RemoteClient, parseId } from "../src/remote/client.js";
import { createRemoteClientFor } from "../src/remote/factory.js";
import { ChannelPool } from "../src/pool/channel-pool.js";
import { CommandError, PoolClosedError, RemoteFsError } from "../src/errors.js";
import { FakeHost } from "./helpers/fake-host.js";
import { echoTransport } from "./helpers/echo-transport.js";

function setup(options: { sudo?: boolean; user?: string } = {}) {
  const host = new FakeHost({ user: options.user });
  const client = createRemoteClientFor(host, { sudo: options.sudo ?? false, maxSessions: 2 });
  return { host, client };
}

describe("RemoteClient", () => {
  describe("command text", () => {
    it("writes through tee with content on stdin", async () => {
      const { host, client } = setup();

      await client.writeFile("blabetiblou", "/tmp/test");

      expect(host.commands).toEqual(["cat /dev/stdin | tee /tmp/test"]);
      expect(host.stdins).toEqual(["blabetiblou"]);
    });

    it("prefixes sudo from the client flag", async () => {
      const { host, client } = setup({ sudo: true });

      await client.writeFile("x", "/tmp/a/b", { ensureDir: true });
      await client.createDir("/tmp/dir");
      await client.readFile("/tmp/a/b");
      await client.readFilePermissions("/tmp/a/b");
      await client.readFileOwnerName("/tmp/a/b");
      await client.chownFile("/tmp/a/b", "1000");
      await client.chgrpFile("/tmp/a/b", "staff");
      await client.chmodFile("/tmp/a/b", "0600");
      await client.dirExists("/tmp/dir");
      await client.deleteFile("/tmp/a/b");
      await client.deleteFolder("/tmp/dir");

      expect(client.usesSudo).toBe(true);
      expect(host.commands).toEqual([
        "mkdir -p /tmp/a && cat /dev/stdin | sudo tee /tmp/a/b",
        "sudo mkdir -p /tmp/dir",
        "sudo cat /tmp/a/b",
        "sudo stat -c %a /tmp/a/b",
        "sudo stat -c %U /tmp/a/b",
        "sudo chown 1000 /tmp/a/b",
        "sudo chgrp staff /tmp/a/b",
        "sudo chmod 0600 /tmp/a/b",
        '[ -d "/tmp/dir" ] && exit 0 || exit 1',
        "sudo rm /tmp/a/b",
        "sudo rm -rf /tmp/dir",
      ]);
    });

    it("creates the parent directory as the login user even under sudo", async () => {
      const { host, client } = setup({ sudo: true, user: "alice" });

      const error = await client.writeFile("x", "/etc/app/conf", { ensureDir: true }).catch((e: unknown) => e);

      expect(host.commands).toEqual(["mkdir -p /etc/app && cat /dev/stdin | sudo tee /etc/app/conf"]);
      expect(error).toBeInstanceOf(CommandError);
      if (error instanceof CommandError) {
        expect(error.stderrText).toBe("mkdir: cannot create directory '/etc/app': Permission denied\n");
      }
      expect(host.has("/etc/app/conf")).toBe(false);
    });

    it("selects the stat format per attribute", async () => {
      const { host, client } = setup();
      host.addFile("/tmp/f", "", { uid: 1000, gid: 50, mode: 0o640 });

      expect(await client.readFileOwner("/tmp/f")).toBe("1000");
      expect(await client.readFileGroup("/tmp/f")).toBe("50");
      expect(await client.readFileOwnerName("/tmp/f")).toBe("alice");
      expect(await client.readFileGroupName("/tmp/f")).toBe("staff");
      expect(await client.statFile("/tmp/f", "a")).toBe("640");
      expect(host.commands).toEqual([
        "stat -c %u /tmp/f",
        "stat -c %g /tmp/f",
        "stat -c %U /tmp/f",
        "stat -c %G /tmp/f",
        "stat -c %a /tmp/f",
      ]);
    });
  });

  describe("writeFile / readFile", () => {
    it("round-trips content byte for byte", async () => {
      const { client } = setup();
      const content = "line one\n  indented\ttab\n\nunicode: é ✓\n";

      await client.writeFile(content, "/tmp/roundtrip");

      expect(await client.readFile("/tmp/roundtrip")).toEqual({ content, exists: true });
    });

    it("writes blabetiblou to /tmp/test and reads it back", async () => {
      const { client } = setup();

      await client.writeFile("blabetiblou", "/tmp/test");

      expect((await client.readFile("/tmp/test")).content).toBe("blabetiblou");
    });

    it("fails on a missing parent directory with the tee error stream", async () => {
      const { client } = setup();
      const path = "/etc/doesnt-exist-1700000000000/file";

      const error = await client.writeFile("blabetiblou", path).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(CommandError);
      if (error instanceof CommandError) {
        expect(error.stderrText).toBe(`tee: ${path}: No such file or directory\n`);
      }
    });

    it("creates the parent directory when ensureDir is set", async () => {
      const { host, client } = setup();

      await client.writeFile("blabetiblou", "/tmp/blabetiblou/test", { ensureDir: true });

      expect(host.get("/tmp/blabetiblou")?.type).toBe("dir");
      expect((await client.readFile("/tmp/blabetiblou/test")).content).toBe("blabetiblou");
    });

    it("reports permission denied for an unprivileged user without sudo", async () => {
      const { client } = setup({ user: "alice" });

      const error = await client.writeFile("blabetiblou", "/home/file").catch((e: unknown) => e);

      expect(error).toBeInstanceOf(CommandError);
      if (error instanceof CommandError) {
        expect(error.stderrText.endsWith("Permission denied\n")).toBe(true);
      }
    });

    it("reports a missing file as absent instead of failing", async () => {
      const { client } = setup();

      expect(await client.readFile("/tmp/nothing")).toEqual({ content: "", exists: false });
    });

    it("raises other read failures", async () => {
      const { host, client } = setup();
      host.addDir("/tmp/dir");

      await expect(client.readFile("/tmp/dir")).rejects.toThrow("cat: /tmp/dir: Is a directory");
    });
  });

  describe("existence checks", () => {
    it("answers dirExists from the exit status", async () => {
      const { host, client } = setup();
      host.addFile("/tmp/file", "");

      expect(await client.dirExists("/tmp")).toBe(true);
      expect(await client.dirExists("/tmp/file")).toBe(false);
      expect(await client.dirExists("/tmp/none")).toBe(false);
    });

    it("treats a transport failure during dirExists as absent", async () => {
      const { host, client } = setup();
      host.failOpens = 1;

      expect(await client.dirExists("/tmp")).toBe(false);
    });

    it("uses a second channel to confirm a file is absent", async () => {
      const { host, client } = setup();
      host.addFile("/tmp/present", "");
      host.addDir("/tmp/folder");

      expect(await client.fileExists("/tmp/present")).toBe(true);
      expect(await client.fileExists("/tmp/missing")).toBe(false);
      expect(await client.fileExists("/tmp/folder")).toBe(false);
      expect(host.commands).toEqual([
        "test -f /tmp/present",
        "test -f /tmp/missing",
        "test ! -f /tmp/missing",
        "test -f /tmp/folder",
        "test ! -f /tmp/folder",
      ]);
      expect(host.channelsOpened).toBe(5);
    });
  });

  describe("attributes", () => {
    it("pads short permission strings with a leading zero", async () => {
      const { host, client } = setup();
      host.addFile("/tmp/short", "", { mode: 0o644 });
      host.addFile("/tmp/sticky", "", { mode: 0o1755 });

      expect(await client.readFilePermissions("/tmp/short")).toBe("0644");
      expect(await client.readFilePermissions("/tmp/sticky")).toBe("1755");
    });

    it("reads the whole snapshot in order", async () => {
      const { host, client } = setup();
      host.addFile("/tmp/f", "", { uid: 1001, gid: 50, mode: 0o600 });

      expect(await client.readAttributes("/tmp/f")).toEqual({
        owner: 1001,
        group: 50,
        ownerName: "bob",
        groupName: "staff",
        permissions: "0600",
      });
      expect(host.commands).toEqual([
        "stat -c %u /tmp/f",
        "stat -c %g /tmp/f",
        "stat -c %U /tmp/f",
        "stat -c %G /tmp/f",
        "stat -c %a /tmp/f",
      ]);
    });

    it("refuses a non-numeric owner id instead of reading it as root", async () => {
      const transport = echoTransport("nobody\n");
      const client = createRemoteClientFor(transport, { sudo: false, maxSessions: 1 });

      await expect(client.readAttributes("/tmp/f")).rejects.toThrow('expected a numeric id, got "nobody"');
      expect(transport.commands).toEqual([
        "stat -c %u /tmp/f",
        "stat -c %g /tmp/f",
        "stat -c %U /tmp/f",
        "stat -c %G /tmp/f",
        "stat -c %a /tmp/f",
      ]);
    });

    it("stops at the first failing read", async () => {
      const { host, client } = setup();

      await expect(client.readAttributes("/tmp/gone")).rejects.toBeInstanceOf(CommandError);
      expect(host.commands).toEqual(["stat -c %u /tmp/gone"]);
    });

    it("applies ownership and mode changes", async () => {
      const { host, client } = setup();
      host.addFile("/tmp/f", "");

      await client.chownFile("/tmp/f", "alice");
      await client.chgrpFile("/tmp/f", "50");
      await client.chmodFile("/tmp/f", "0600");

      expect(host.get("/tmp/f")).toMatchObject({ uid: 1000, gid: 50, mode: 0o600 });
    });
  });

  describe("deletion", () => {
    it("classifies deleting a missing file as a command error", async () => {
      const { client } = setup();

      const error = await client.deleteFile("/tmp/missing").catch((e: unknown) => e);

      expect(error).toBeInstanceOf(CommandError);
      if (error instanceof CommandError) {
        expect(error.stderrText).toBe("rm: cannot remove '/tmp/missing': No such file or directory\n");
      }
    });

    it("removes a folder tree recursively", async () => {
      const { host, client } = setup();
      host.addDir("/tmp/tree");
      host.addDir("/tmp/tree/sub");
      host.addFile("/tmp/tree/sub/leaf", "x");

      await client.deleteFolder("/tmp/tree");

      expect(host.has("/tmp/tree")).toBe(false);
      expect(host.has("/tmp/tree/sub/leaf")).toBe(false);
      expect(host.has("/tmp")).toBe(true);
    });
  });

  it("releases every channel, including after failures", async () => {
    const { host, client } = setup();

    await client.writeFile("x", "/tmp/x");
    await client.readFile("/tmp/none");
    await client.deleteFile("/tmp/none").catch(() => undefined);
    await client.fileExists("/tmp/none");

    expect(host.openChannels).toBe(0);
  });

  it("closes the pool before disconnecting, once", async () => {
    const host = new FakeHost();
    const pool = new ChannelPool(host, { maxSessions: 1 });
    const client = new RemoteClient(pool, host);

    await client.close();
    await client.close();

    expect(pool.isClosed()).toBe(true);
    expect(host.disconnects).toBe(1);
    await expect(client.createDir("/tmp/late")).rejects.toBeInstanceOf(PoolClosedError);
  });

  it("lets a running command finish before disconnecting", async () => {
    const host = new FakeHost({ execDelayMs: 20 });
    const client = createRemoteClientFor(host, { sudo: false, maxSessions: 2 });

    const write = client.writeFile("late", "/tmp/late");
    await new Promise((resolve) => setTimeout(resolve, 5));
    await client.close();

    expect(host.get("/tmp/late")?.content).toBe("late");
    expect(host.disconnects).toBe(1);
    await expect(write).resolves.toBeUndefined();
  });
});

describe("parseId", () => {
  it("parses decimal ids", () => {
    expect(parseId("1000")).toBe(1000);
    expect(parseId("0")).toBe(0);
  });

  it("rejects output that is not a decimal id", () => {
    expect(() => parseId("")).toThrow('expected a numeric id, got ""');
    expect(() => parseId("nobody")).toThrow(RemoteFsError);
    expect(() => parseId("-1")).toThrow(RemoteFsError);
  });
});
