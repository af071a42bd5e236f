/**
 * SSH Manager
 * Owns the single SSH connection and hands out single-use command channels
 */

import { NodeSSH } from "node-ssh";
import fs from "node:fs/promises";
import { logger } from "../utils/logger.js";
import { TransportError, describeError } from "../errors.js";
import type { ChannelExecOptions, ChannelExecResult, CommandChannel, SSHConfig, Transport } from "./types.js";

/**
 * Channel backed by one exec request on the shared connection.
 * The underlying SSH channel is opened when the command runs and is closed
 * by the server once the command exits.
 */
class SSHChannel implements CommandChannel {
  private used = false;
  private closed = false;

  constructor(private readonly ssh: NodeSSH) {}

  public async exec(command: string, options: ChannelExecOptions = {}): Promise<ChannelExecResult> {
    if (this.closed) {
      throw new TransportError("channel is closed");
    }
    if (this.used) {
      throw new TransportError("channel already ran a command");
    }
    this.used = true;

    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];

    try {
      const result = await this.ssh.execCommand(command, {
        stdin: options.stdin,
        onStdout: (chunk) => stdout.push(chunk),
        onStderr: (chunk) => stderr.push(chunk),
      });

      return {
        code: result.code,
        signal: result.signal ?? undefined,
        stdout: Buffer.concat(stdout),
        stderr: Buffer.concat(stderr),
      };
    } catch (error) {
      throw new TransportError(`failed to open command channel: ${describeError(error)}`, { cause: error });
    }
  }

  public close(): void {
    this.closed = true;
  }
}

/**
 * SSH Manager class
 * Implements the Transport interface on top of node-ssh
 */
export class SSHManager implements Transport {
  private ssh: NodeSSH;
  private config: SSHConfig;
  private connected = false;

  constructor(config: SSHConfig) {
    this.ssh = new NodeSSH();
    this.config = config;
  }

  /**
   * Connect to the remote system
   */
  public async connect(): Promise<void> {
    try {
      logger.info("Connecting to SSH server", {
        host: this.config.host,
        port: this.config.port,
        username: this.config.username,
      });

      let privateKeyContent = this.config.privateKey;
      if (!privateKeyContent && this.config.privateKeyPath) {
        privateKeyContent = await fs.readFile(this.config.privateKeyPath, "utf-8");
      }

      await this.ssh.connect({
        host: this.config.host,
        port: this.config.port,
        username: this.config.username,
        password: this.config.password,
        privateKey: privateKeyContent,
        passphrase: this.config.passphrase,
      });

      this.connected = true;
      logger.info("SSH connection established");
    } catch (error) {
      this.connected = false;
      logger.error("SSH connection failed", { error: describeError(error) });
      throw new TransportError(
        `couldn't establish a connection to the remote server: ${describeError(error)}`,
        { cause: error }
      );
    }
  }

  /**
   * Open a fresh single-use channel on the connection
   */
  public async openChannel(): Promise<CommandChannel> {
    if (!this.connected || !this.ssh.isConnected()) {
      throw new TransportError("Not connected. Call connect() first.");
    }
    return new SSHChannel(this.ssh);
  }

  public isConnected(): boolean {
    return this.connected;
  }

  /**
   * Disconnect from the remote system
   */
  public async disconnect(): Promise<void> {
    if (this.connected) {
      this.ssh.dispose();
      this.connected = false;
      logger.info("SSH connection closed");
    }
  }

  /**
   * Create an SSH connection from configuration
   */
  public static async from(config: SSHConfig): Promise<SSHManager> {
    const manager = new SSHManager(config);
    await manager.connect();
    return manager;
  }
}
