/**
 * Error taxonomy shared by the pool, runner, client and reconcilers
 */

/**
 * Base class for every error raised by remotefs
 */
export class RemoteFsError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * The SSH connection or a command channel could not be used
 */
export class TransportError extends RemoteFsError {}

/**
 * A lease was requested from a pool that has been closed
 */
export class PoolClosedError extends RemoteFsError {
  constructor() {
    super("channel pool is closed");
  }
}

/**
 * A remote command exited with a non-zero status.
 * `stderr` holds the raw bytes the command wrote to its error stream.
 */
export class CommandError extends RemoteFsError {
  public readonly command: string;
  public readonly exitCode: number | null;
  public readonly stderr: Buffer;

  constructor(command: string, cause: Error, stderr: Buffer, exitCode: number | null) {
    const trimmed = stderr.toString("utf-8").replace(/\n+$/, "");
    super(`\`${command}\`\n  ${cause.message}\n  ${trimmed}`, { cause });
    this.command = command;
    this.exitCode = exitCode;
    this.stderr = stderr;
  }

  public get stderrText(): string {
    return this.stderr.toString("utf-8");
  }

  public stderrIncludes(text: string): boolean {
    return this.stderr.includes(text);
  }
}

/**
 * A reconciliation step failed. Carries the resource-level summary and detail
 * in front of the underlying failure.
 */
export class ResourceError extends RemoteFsError {
  public readonly summary: string;
  public readonly detail: string;

  constructor(summary: string, detail: string, cause?: unknown) {
    const reason = cause === undefined ? "" : `: ${describeError(cause)}`;
    super(`${summary}: ${detail}${reason}`, { cause });
    this.summary = summary;
    this.detail = detail;
  }
}

/**
 * Connection settings or a manifest failed validation
 */
export class ConfigError extends RemoteFsError {}

/**
 * Message of an unknown thrown value
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
