/**
 * @remotefs/core
 *
 * Reconciles files and folders on a remote Linux host over one SSH connection.
 * Provides the channel pool, command runner, remote filesystem client,
 * file/folder reconcilers and manifest handling.
 */

// Errors
export {
  RemoteFsError,
  TransportError,
  PoolClosedError,
  CommandError,
  ResourceError,
  ConfigError,
  describeError,
} from "./errors.js";

// SSH module
export { SSHManager } from "./ssh/index.js";
export type { SSHConfig, ChannelExecOptions, ChannelExecResult, CommandChannel, Transport } from "./ssh/index.js";

// Pool module
export { ChannelPool, DEFAULT_MAX_SESSIONS } from "./pool/index.js";
export type { ChannelPoolOptions } from "./pool/index.js";

// Runner module
export { runCommand } from "./runner/index.js";
export type { CommandOutput } from "./runner/index.js";

// Remote module
export { RemoteClient, NOT_FOUND_MARKER, parseId, createRemoteClient, createRemoteClientFor } from "./remote/index.js";
export type { RemoteClientOptions, StatFormat, WriteFileOptions, FileContent, ObservedAttributes } from "./remote/index.js";

// Resources module
export {
  ResourceReconciler,
  FileReconciler,
  FolderReconciler,
  ResourceKind,
  normalizePermissions,
  unset,
  unknown,
  known,
  isKnown,
  fromOptional,
  valueOr,
  resolveIdOrName,
} from "./resources/index.js";
export type {
  Attr,
  DesiredAttributes,
  FileDesired,
  FolderDesired,
  ResourceRef,
  ResourceState,
  FileState,
  FolderState,
  PlannedChange,
} from "./resources/index.js";

// Reconcile module
export { Converger, OutcomeStatus } from "./reconcile/index.js";
export type { ResourceOutcome } from "./reconcile/index.js";

// Config module
export {
  ConfigManager,
  parseManifest,
  parseConnection,
  parseResource,
  resolveConnection,
  parseHost,
  DEFAULT_CONNECTION,
  DEFAULT_SSH_PORT,
} from "./config/index.js";
export type { ConnectionConfig, ResolvedConnection, ResourceDeclaration, Manifest } from "./config/index.js";

// Utils module
export { logger, initLogger, getLogger, LogLevel } from "./utils/index.js";
export type { Logger, LoggerConfig } from "./utils/index.js";
