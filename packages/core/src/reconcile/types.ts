/**
 * Converger Types
 */

import type { PlannedChange, ResourceKind, ResourceState } from "../resources/types.js";

export enum OutcomeStatus {
  CREATED = "created",
  UPDATED = "updated",
  UNCHANGED = "unchanged",
  DELETED = "deleted",
  PRESENT = "present",
  ABSENT = "absent",
  WILL_CREATE = "will-create",
  WILL_UPDATE = "will-update",
  FAILED = "failed",
}

/**
 * What happened to one declared resource
 */
export interface ResourceOutcome {
  kind: ResourceKind;
  path: string;
  status: OutcomeStatus;
  changes?: PlannedChange[];
  state?: ResourceState;
  error?: string;
}
