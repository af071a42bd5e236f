/**
 * File Reconciler
 */

import { logger } from "../utils/logger.js";
import { valueOr } from "./attribute.js";
import { ResourceReconciler } from "./reconciler.js";
import { ResourceKind } from "./types.js";
import type { FileDesired, FileState, PlannedChange, ResourceRef } from "./types.js";

export class FileReconciler extends ResourceReconciler<FileDesired, FileState> {
  public readonly kind = ResourceKind.FILE;

  public async create(desired: FileDesired): Promise<FileState> {
    logger.info("Creating file", { path: desired.path });

    await this.step("Error creating file", desired.path, () =>
      this.client.writeFile(desired.content, desired.path, { ensureDir: valueOr(desired.ensureDir, false) })
    );
    await this.applyInitialAttributes(desired);

    return this.refresh(desired, desired.path);
  }

  public async read(target: ResourceRef & { ensureDir?: boolean }): Promise<FileState | null> {
    const file = await this.step("Error reading remote file", target.path, () => this.client.readFile(target.path));
    if (!file.exists) {
      logger.info("File no longer exists", { path: target.path });
      return null;
    }

    const attributes = await this.observe(target.path);
    return {
      id: target.path,
      path: target.path,
      content: file.content,
      ensureDir: target.ensureDir ?? false,
      ...attributes,
      lastUpdated: target.lastUpdated ?? new Date().toISOString(),
    };
  }

  /**
   * Content is compared first and rewritten as a whole when it differs
   */
  public override plan(desired: FileDesired, prior: FileState): PlannedChange[] {
    const changes = super.plan(desired, prior);
    if (desired.content !== prior.content) {
      changes.unshift({ attribute: "content", from: prior.content, to: desired.content });
    }
    return changes;
  }

  public async delete(prior: FileState): Promise<void> {
    logger.info("Deleting file", { path: prior.path });
    await this.step("Error deleting file", prior.path, () => this.client.deleteFile(prior.path));
  }

  protected async refresh(desired: FileDesired, path: string): Promise<FileState> {
    const file = await this.step("Error reading file after write", path, () => this.client.readFile(path));
    const attributes = await this.observe(path);

    return {
      id: path,
      path,
      content: file.content,
      ensureDir: valueOr(desired.ensureDir, false),
      ...attributes,
      lastUpdated: new Date().toISOString(),
    };
  }
}
