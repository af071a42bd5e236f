/**
 * Folder Reconciler
 */

import { logger } from "../utils/logger.js";
import { ResourceReconciler } from "./reconciler.js";
import { ResourceKind } from "./types.js";
import type { FolderDesired, FolderState, ResourceRef } from "./types.js";

export class FolderReconciler extends ResourceReconciler<FolderDesired, FolderState> {
  public readonly kind = ResourceKind.FOLDER;

  public async create(desired: FolderDesired): Promise<FolderState> {
    logger.info("Creating folder", { path: desired.path });

    await this.step("Error creating folder", desired.path, () => this.client.createDir(desired.path));
    await this.applyInitialAttributes(desired);

    return this.refresh(desired, desired.path);
  }

  /**
   * The directory check treats any failure as absence, so an unreachable
   * host also reports the folder as gone.
   */
  public async read(target: ResourceRef): Promise<FolderState | null> {
    const exists = await this.client.dirExists(target.path);
    if (!exists) {
      logger.info("Folder no longer exists", { path: target.path });
      return null;
    }

    const attributes = await this.observe(target.path);
    return {
      id: target.path,
      path: target.path,
      ...attributes,
      lastUpdated: target.lastUpdated ?? new Date().toISOString(),
    };
  }

  /**
   * Removes the whole subtree; a missing folder is not an error
   */
  public async delete(prior: FolderState): Promise<void> {
    logger.info("Deleting folder", { path: prior.path });
    await this.step("Error deleting folder", prior.path, () => this.client.deleteFolder(prior.path));
  }

  protected async refresh(_desired: FolderDesired, path: string): Promise<FolderState> {
    const attributes = await this.observe(path);
    return {
      id: path,
      path,
      ...attributes,
      lastUpdated: new Date().toISOString(),
    };
  }
}
