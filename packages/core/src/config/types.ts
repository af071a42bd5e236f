/**
 * Configuration Module Types
 */

import type { SSHConfig } from "../ssh/types.js";
import type { FileDesired, FolderDesired, ResourceKind } from "../resources/types.js";
import { DEFAULT_MAX_SESSIONS } from "../pool/channel-pool.js";

/**
 * Connection settings as written in a manifest
 */
export interface ConnectionConfig {
  /**
   * "host" or "host:port"
   */
  host: string;
  /**
   * Defaults to the current OS user
   */
  username?: string;
  password?: string;
  /**
   * Environment variable holding the password
   */
  passwordEnvVar?: string;
  privateKey?: string;
  privateKeyPath?: string;
  /**
   * Environment variable holding the private key
   */
  privateKeyEnvVar?: string;
  passphrase?: string;
  /**
   * Prefix remote commands with sudo
   */
  sudo?: boolean;
  /**
   * Upper bound on concurrent command channels
   */
  maxSessions?: number;
}

/**
 * Connection settings with defaults and secrets resolved
 */
export interface ResolvedConnection {
  ssh: SSHConfig;
  sudo: boolean;
  maxSessions: number;
}

export type ResourceDeclaration =
  | { kind: ResourceKind.FILE; desired: FileDesired }
  | { kind: ResourceKind.FOLDER; desired: FolderDesired };

/**
 * A validated manifest
 */
export interface Manifest {
  connection: ConnectionConfig;
  resources: ResourceDeclaration[];
}

export const DEFAULT_SSH_PORT = 22;

export const DEFAULT_CONNECTION: Required<Pick<ConnectionConfig, "sudo" | "maxSessions">> = {
  sudo: false,
  maxSessions: DEFAULT_MAX_SESSIONS,
};
