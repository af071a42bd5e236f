/**
 * Resource Reconciler
 * Shared Create/Read/Update/Delete machinery for remote files and folders
 */

import { logger } from "../utils/logger.js";
import { ResourceError, describeError } from "../errors.js";
import { isKnown, resolveIdOrName } from "./attribute.js";
import type { Attr } from "./attribute.js";
import type { RemoteClient } from "../remote/client.js";
import type { ObservedAttributes } from "../remote/types.js";
import type { DesiredAttributes, PlannedChange, ResourceKind, ResourceRef, ResourceState } from "./types.js";

/**
 * Pad an octal mode the way the client reports it ("644" -> "0644")
 */
export function normalizePermissions(permissions: string): string {
  return permissions.length > 0 && permissions.length < 4 ? `0${permissions}` : permissions;
}

/**
 * Base reconciler. Subclasses supply how the path itself is created, read
 * and removed; ownership, permissions, diffing and re-reads live here.
 *
 * Every step of a transition runs after the previous one succeeded. The first
 * failure aborts the transition and is raised as a ResourceError; whatever the
 * earlier steps changed stays on the host for the next pass to converge.
 */
export abstract class ResourceReconciler<D extends DesiredAttributes, S extends ResourceState> {
  protected readonly client: RemoteClient;
  public abstract readonly kind: ResourceKind;

  constructor(client: RemoteClient) {
    this.client = client;
  }

  /**
   * absent -> present
   */
  public abstract create(desired: D): Promise<S>;

  /**
   * Refresh from the host; null when the path no longer exists
   */
  public abstract read(target: ResourceRef): Promise<S | null>;

  /**
   * present -> absent
   */
  public abstract delete(prior: S): Promise<void>;

  /**
   * Mutations update() would issue, in order. Pure; nothing runs remotely.
   */
  public plan(desired: D, prior: S): PlannedChange[] {
    const changes: PlannedChange[] = [];

    const owner = this.ownershipChange(desired.owner, desired.ownerName, prior.owner, prior.ownerName);
    if (owner) {
      changes.push({ attribute: "owner", ...owner });
    }

    const group = this.ownershipChange(desired.group, desired.groupName, prior.group, prior.groupName);
    if (group) {
      changes.push({ attribute: "group", ...group });
    }

    if (isKnown(desired.permissions)) {
      const wanted = normalizePermissions(desired.permissions.value);
      if (wanted !== prior.permissions) {
        changes.push({ attribute: "permissions", from: prior.permissions, to: wanted });
      }
    }

    return changes;
  }

  /**
   * Whether moving from `prior` to `desired` needs delete-then-create
   */
  public requiresReplacement(desired: D, prior: S): boolean {
    return desired.path !== prior.path;
  }

  /**
   * present -> present. Issues only the changes plan() reports, then re-reads.
   */
  public async update(desired: D, prior: S): Promise<S> {
    if (this.requiresReplacement(desired, prior)) {
      throw new ResourceError(
        `Error updating ${this.kind}`,
        `path changed from ${prior.path} to ${desired.path}; the ${this.kind} must be replaced`
      );
    }

    const changes = this.plan(desired, prior);
    logger.info(`Updating ${this.kind}`, { path: prior.path, changes: changes.map((change) => change.attribute) });

    for (const change of changes) {
      await this.applyChange(prior.path, change);
    }

    return this.refresh(desired, prior.path);
  }

  /**
   * Re-read the full state after a mutation
   */
  protected abstract refresh(desired: D, path: string): Promise<S>;

  protected async applyChange(path: string, change: PlannedChange): Promise<void> {
    switch (change.attribute) {
      case "content":
        await this.step(`Error updating ${this.kind} content`, path, () =>
          this.client.writeFile(change.to, path)
        );
        return;
      case "owner":
        await this.step(`Error updating ${this.kind} user ownership`, path, () =>
          this.client.chownFile(path, change.to)
        );
        return;
      case "group":
        await this.step(`Error updating ${this.kind} group ownership`, path, () =>
          this.client.chgrpFile(path, change.to)
        );
        return;
      case "permissions":
        await this.step(`Error updating ${this.kind} permissions`, path, () =>
          this.client.chmodFile(path, change.to)
        );
        return;
    }
  }

  /**
   * Ownership and permissions for a freshly created path. Numeric ids win
   * over names; nothing known means nothing is issued.
   */
  protected async applyInitialAttributes(desired: D): Promise<void> {
    const owner = resolveIdOrName(desired.owner, desired.ownerName);
    if (owner !== undefined) {
      await this.step(`Error updating ${this.kind} user ownership`, desired.path, () =>
        this.client.chownFile(desired.path, owner)
      );
    }

    const group = resolveIdOrName(desired.group, desired.groupName);
    if (group !== undefined) {
      await this.step(`Error updating ${this.kind} group ownership`, desired.path, () =>
        this.client.chgrpFile(desired.path, group)
      );
    }

    if (isKnown(desired.permissions)) {
      const permissions = normalizePermissions(desired.permissions.value);
      await this.step(`Error updating ${this.kind} permissions`, desired.path, () =>
        this.client.chmodFile(desired.path, permissions)
      );
    }
  }

  /**
   * Ownership and permission re-read; failures are fatal
   */
  protected observe(path: string): Promise<ObservedAttributes> {
    return this.step(`Error reading ${this.kind} attributes`, path, () => this.client.readAttributes(path));
  }

  /**
   * Run one remote step, wrapping its failure with resource context
   */
  protected async step<T>(summary: string, path: string, action: () => Promise<T>): Promise<T> {
    try {
      return await action();
    } catch (error) {
      logger.error(summary, { kind: this.kind, path, error: describeError(error) });
      throw new ResourceError(summary, `${this.kind} ${path}`, error);
    }
  }

  private ownershipChange(
    id: Attr<number>,
    name: Attr<string>,
    currentId: number,
    currentName: string
  ): { from: string; to: string } | undefined {
    if (isKnown(id) && id.value !== currentId) {
      return { from: String(currentId), to: String(id.value) };
    }
    if (isKnown(name) && name.value !== currentName) {
      return { from: currentName, to: name.value };
    }
    return undefined;
  }
}
