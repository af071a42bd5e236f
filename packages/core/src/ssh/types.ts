/**
 * SSH Module Types
 */

/**
 * SSH connection configuration
 */
export interface SSHConfig {
  host: string;
  port: number;
  username: string;
  password?: string;
  privateKey?: string;
  privateKeyPath?: string;
  passphrase?: string;
}

/**
 * Options for a single command run on a channel
 */
export interface ChannelExecOptions {
  /**
   * Bytes streamed on the channel's input pipe, then closed
   */
  stdin?: string;
}

/**
 * Raw outcome of one command; streams are kept untrimmed
 */
export interface ChannelExecResult {
  code: number | null;
  signal?: string;
  stdout: Buffer;
  stderr: Buffer;
}

/**
 * Single-use command execution handle.
 * A channel runs exactly one command and is then closed.
 */
export interface CommandChannel {
  exec(command: string, options?: ChannelExecOptions): Promise<ChannelExecResult>;
  close(): void;
}

/**
 * Authenticated connection able to open independent command channels
 */
export interface Transport {
  openChannel(): Promise<CommandChannel>;
  isConnected(): boolean;
  disconnect(): Promise<void>;
}
