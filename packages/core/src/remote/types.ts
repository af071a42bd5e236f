/**
 * Remote Filesystem Client Types
 */

/**
 * Single-character `stat -c` selectors: permissions, uid, gid, user name, group name
 */
export type StatFormat = "a" | "u" | "g" | "U" | "G";

export interface WriteFileOptions {
  /**
   * Create the parent directory before writing
   */
  ensureDir?: boolean;
}

/**
 * Result of reading a remote file
 */
export interface FileContent {
  content: string;
  exists: boolean;
}

/**
 * Ownership and permissions as measured on the host
 */
export interface ObservedAttributes {
  owner: number;
  group: number;
  ownerName: string;
  groupName: string;
  permissions: string;
}
