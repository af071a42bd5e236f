/**
 * Command Runner
 * Runs one command line on a leased channel and classifies the outcome
 */

import { logger } from "../utils/logger.js";
import { CommandError } from "../errors.js";
import type { ChannelExecOptions, CommandChannel } from "../ssh/types.js";

/**
 * Output of a command that exited with status 0
 */
export interface CommandOutput {
  command: string;
  stdout: Buffer;
  stderr: Buffer;
}

/**
 * Execute exactly one command on `channel`.
 * A non-zero or missing exit status raises CommandError carrying the
 * command text and the captured error stream.
 */
export async function runCommand(
  channel: CommandChannel,
  command: string,
  options: ChannelExecOptions = {}
): Promise<CommandOutput> {
  logger.debug("Executing command", { command });

  const result = await channel.exec(command, options);

  logger.debug("Command completed", {
    command,
    code: result.code,
    hasStderr: result.stderr.length > 0,
  });

  if (result.code !== 0) {
    const reason = result.code === null
      ? `Process terminated by signal ${result.signal ?? "unknown"}`
      : `Process exited with status ${result.code}`;
    throw new CommandError(command, new Error(reason), result.stderr, result.code);
  }

  return {
    command,
    stdout: result.stdout,
    stderr: result.stderr,
  };
}
