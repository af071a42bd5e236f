/**
 * Resource Module Types
 */

import type { Attr } from "./attribute.js";
import type { ObservedAttributes } from "../remote/types.js";

export enum ResourceKind {
  FILE = "file",
  FOLDER = "folder",
}

/**
 * Desired ownership and permissions shared by files and folders
 */
export interface DesiredAttributes {
  /**
   * Absolute path; the resource identity. Changing it means replacement.
   */
  path: string;
  owner: Attr<number>;
  ownerName: Attr<string>;
  group: Attr<number>;
  groupName: Attr<string>;
  /**
   * Octal mode such as "0644"
   */
  permissions: Attr<string>;
}

export type FolderDesired = DesiredAttributes;

export interface FileDesired extends DesiredAttributes {
  content: string;
  /**
   * Create the parent directory on creation. Only honoured by create; the
   * directory is never removed on delete.
   */
  ensureDir: Attr<boolean>;
}

/**
 * Identifies a tracked resource for Read
 */
export interface ResourceRef {
  path: string;
  lastUpdated?: string;
}

/**
 * Observed state-of-record, fully populated from the host
 */
export interface ResourceState extends ObservedAttributes {
  id: string;
  path: string;
  /**
   * ISO-8601 time of the last create or update
   */
  lastUpdated: string;
}

export type FolderState = ResourceState;

export interface FileState extends ResourceState {
  content: string;
  ensureDir: boolean;
}

/**
 * One mutation an update will issue
 */
export type PlannedChange =
  | { attribute: "content"; from: string; to: string }
  | { attribute: "owner"; from: string; to: string }
  | { attribute: "group"; from: string; to: string }
  | { attribute: "permissions"; from: string; to: string };
