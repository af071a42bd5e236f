/**
 * Remote Filesystem Client
 * Filesystem operations expressed as shell commands over leased channels
 */

import path from "node:path";
import { logger } from "../utils/logger.js";
import { CommandError, RemoteFsError } from "../errors.js";
import { runCommand } from "../runner/command-runner.js";
import type { ChannelPool } from "../pool/channel-pool.js";
import type { Transport } from "../ssh/types.js";
import type { FileContent, ObservedAttributes, StatFormat, WriteFileOptions } from "./types.js";

/**
 * Error-stream marker that means the target does not exist
 */
export const NOT_FOUND_MARKER = "No such file or directory";

export interface RemoteClientOptions {
  /**
   * Prefix every command with `sudo`
   */
  sudo?: boolean;
}

/**
 * Remote Filesystem Client class
 * Each operation leases its own channel and releases it before returning.
 */
export class RemoteClient {
  private readonly pool: ChannelPool;
  private readonly transport: Transport;
  private readonly sudo: boolean;
  private closed = false;

  constructor(pool: ChannelPool, transport: Transport, options: RemoteClientOptions = {}) {
    this.pool = pool;
    this.transport = transport;
    this.sudo = options.sudo ?? false;
  }

  /**
   * Whether commands are run through sudo
   */
  public get usesSudo(): boolean {
    return this.sudo;
  }

  /**
   * Write `content` to `filePath` through `tee`, content streamed over stdin.
   * Only `tee` runs through sudo; the ensure-dir `mkdir` runs as the login user.
   */
  public async writeFile(content: string, filePath: string, options: WriteFileOptions = {}): Promise<void> {
    let command = `cat /dev/stdin | ${this.withSudo(`tee ${filePath}`)}`;
    if (options.ensureDir) {
      command = `mkdir -p ${path.posix.dirname(filePath)} && ${command}`;
    }
    await this.run(command, content);
  }

  public async createDir(dirPath: string): Promise<void> {
    await this.run(this.withSudo(`mkdir -p ${dirPath}`));
  }

  /**
   * Read a file. A missing file is reported as `exists: false`, not an error.
   */
  public async readFile(filePath: string): Promise<FileContent> {
    try {
      const output = await this.run(this.withSudo(`cat ${filePath}`));
      return { content: output.toString("utf-8"), exists: true };
    } catch (error) {
      if (error instanceof CommandError && error.stderrIncludes(NOT_FOUND_MARKER)) {
        return { content: "", exists: false };
      }
      throw error;
    }
  }

  /**
   * Test for a directory; any failure, including a transport one, reads as absent
   */
  public async dirExists(dirPath: string): Promise<boolean> {
    try {
      await this.run(`[ -d "${dirPath}" ] && exit 0 || exit 1`);
      return true;
    } catch (error) {
      logger.debug("Directory check failed", { path: dirPath, error: String(error) });
      return false;
    }
  }

  /**
   * Test for a regular file. When the first check fails, a second check on
   * a new channel confirms the file is absent; if that one fails too, its
   * error is raised.
   */
  public async fileExists(filePath: string): Promise<boolean> {
    try {
      await this.run(this.withSudo(`test -f ${filePath}`));
      return true;
    } catch (error) {
      if (!(error instanceof CommandError)) {
        throw error;
      }
    }

    await this.run(this.withSudo(`test ! -f ${filePath}`));
    return false;
  }

  /**
   * Octal permissions, padded to four digits
   */
  public async readFilePermissions(filePath: string): Promise<string> {
    const permissions = await this.statFile(filePath, "a");
    if (permissions.length > 0 && permissions.length < 4) {
      return `0${permissions}`;
    }
    return permissions;
  }

  public readFileOwner(filePath: string): Promise<string> {
    return this.statFile(filePath, "u");
  }

  public readFileGroup(filePath: string): Promise<string> {
    return this.statFile(filePath, "g");
  }

  public readFileOwnerName(filePath: string): Promise<string> {
    return this.statFile(filePath, "U");
  }

  public readFileGroupName(filePath: string): Promise<string> {
    return this.statFile(filePath, "G");
  }

  /**
   * Run `stat -c %<format>` and strip newlines from the result
   */
  public async statFile(filePath: string, format: StatFormat): Promise<string> {
    const output = await this.run(this.withSudo(`stat -c %${format} ${filePath}`));
    return output.toString("utf-8").replaceAll("\n", "");
  }

  /**
   * Ownership and permission snapshot. Reads run one after another and the
   * first failure is raised.
   */
  public async readAttributes(targetPath: string): Promise<ObservedAttributes> {
    const owner = await this.readFileOwner(targetPath);
    const group = await this.readFileGroup(targetPath);
    const ownerName = await this.readFileOwnerName(targetPath);
    const groupName = await this.readFileGroupName(targetPath);
    const permissions = await this.readFilePermissions(targetPath);

    return {
      owner: parseId(owner),
      group: parseId(group),
      ownerName,
      groupName,
      permissions,
    };
  }

  public async chownFile(filePath: string, owner: string): Promise<void> {
    await this.run(this.withSudo(`chown ${owner} ${filePath}`));
  }

  public async chgrpFile(filePath: string, group: string): Promise<void> {
    await this.run(this.withSudo(`chgrp ${group} ${filePath}`));
  }

  public async chmodFile(filePath: string, permissions: string): Promise<void> {
    await this.run(this.withSudo(`chmod ${permissions} ${filePath}`));
  }

  public async deleteFile(filePath: string): Promise<void> {
    await this.run(this.withSudo(`rm ${filePath}`));
  }

  /**
   * Remove a directory tree recursively
   */
  public async deleteFolder(dirPath: string): Promise<void> {
    await this.run(this.withSudo(`rm -rf ${dirPath}`));
  }

  /**
   * Stop leasing channels, wait for commands already running, then drop the
   * connection. Safe to call twice.
   */
  public async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.pool.close();
    await this.pool.drained();
    await this.transport.disconnect();
  }

  private withSudo(command: string): string {
    return this.sudo ? `sudo ${command}` : command;
  }

  private run(command: string, stdin?: string): Promise<Buffer> {
    return this.pool.withChannel(async (channel) => {
      const output = await runCommand(channel, command, { stdin });
      return output.stdout;
    });
  }
}

/**
 * Parse a numeric uid/gid as printed by stat. Anything else is an error, never
 * a default id.
 */
export function parseId(value: string): number {
  if (!/^\d+$/.test(value)) {
    throw new RemoteFsError(`expected a numeric id, got "${value}"`);
  }
  return Number.parseInt(value, 10);
}
