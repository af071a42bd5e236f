/**
 * Resources Module
 */

export { ResourceReconciler, normalizePermissions } from "./reconciler.js";
export { FileReconciler } from "./file.js";
export { FolderReconciler } from "./folder.js";
export { unset, unknown, known, isKnown, fromOptional, valueOr, resolveIdOrName } from "./attribute.js";
export type { Attr } from "./attribute.js";
export { ResourceKind } from "./types.js";
export type {
  DesiredAttributes,
  FileDesired,
  FolderDesired,
  ResourceRef,
  ResourceState,
  FileState,
  FolderState,
  PlannedChange,
} from "./types.js";
