/**
 * Converger
 * Drives every declared resource toward its desired state, resources in
 * parallel, steps within a resource in order
 */

import { logger } from "../utils/logger.js";
import { describeError } from "../errors.js";
import { FileReconciler } from "../resources/file.js";
import { FolderReconciler } from "../resources/folder.js";
import { ResourceKind } from "../resources/types.js";
import type { ResourceReconciler } from "../resources/reconciler.js";
import type { DesiredAttributes, ResourceState } from "../resources/types.js";
import type { RemoteClient } from "../remote/client.js";
import type { ResourceDeclaration } from "../config/types.js";
import { OutcomeStatus } from "./types.js";
import type { ResourceOutcome } from "./types.js";

type Task = <D extends DesiredAttributes, S extends ResourceState>(
  reconciler: ResourceReconciler<D, S>,
  desired: D
) => Promise<Omit<ResourceOutcome, "kind" | "path">>;

export class Converger {
  private readonly files: FileReconciler;
  private readonly folders: FolderReconciler;

  constructor(client: RemoteClient) {
    this.files = new FileReconciler(client);
    this.folders = new FolderReconciler(client);
  }

  /**
   * Create what is missing and update what drifted
   */
  public apply(resources: ResourceDeclaration[]): Promise<ResourceOutcome[]> {
    return this.forEach(resources, async (reconciler, desired) => {
      const current = await reconciler.read({ path: desired.path });
      if (!current) {
        const state = await reconciler.create(desired);
        return { status: OutcomeStatus.CREATED, state };
      }

      const changes = reconciler.plan(desired, current);
      if (changes.length === 0) {
        return { status: OutcomeStatus.UNCHANGED, state: current, changes };
      }

      const state = await reconciler.update(desired, current);
      return { status: OutcomeStatus.UPDATED, state, changes };
    });
  }

  /**
   * Report what apply() would do without touching the host
   */
  public plan(resources: ResourceDeclaration[]): Promise<ResourceOutcome[]> {
    return this.forEach(resources, async (reconciler, desired) => {
      const current = await reconciler.read({ path: desired.path });
      if (!current) {
        return { status: OutcomeStatus.WILL_CREATE };
      }

      const changes = reconciler.plan(desired, current);
      return {
        status: changes.length === 0 ? OutcomeStatus.UNCHANGED : OutcomeStatus.WILL_UPDATE,
        state: current,
        changes,
      };
    });
  }

  /**
   * Remove every declared resource that still exists
   */
  public destroy(resources: ResourceDeclaration[]): Promise<ResourceOutcome[]> {
    return this.forEach(resources, async (reconciler, desired) => {
      const current = await reconciler.read({ path: desired.path });
      if (!current) {
        return { status: OutcomeStatus.ABSENT };
      }

      await reconciler.delete(current);
      return { status: OutcomeStatus.DELETED };
    });
  }

  /**
   * Read the observed state of every declared resource
   */
  public inspect(resources: ResourceDeclaration[]): Promise<ResourceOutcome[]> {
    return this.forEach(resources, async (reconciler, desired) => {
      const current = await reconciler.read({ path: desired.path });
      return current
        ? { status: OutcomeStatus.PRESENT, state: current }
        : { status: OutcomeStatus.ABSENT };
    });
  }

  /**
   * Run `task` for each resource concurrently. A failure is recorded on that
   * resource's outcome and does not stop the others.
   */
  private forEach(resources: ResourceDeclaration[], task: Task): Promise<ResourceOutcome[]> {
    return Promise.all(
      resources.map(async (resource): Promise<ResourceOutcome> => {
        const base = { kind: resource.kind, path: resource.desired.path };
        try {
          const outcome = resource.kind === ResourceKind.FILE
            ? await task(this.files, resource.desired)
            : await task(this.folders, resource.desired);
          return { ...base, ...outcome };
        } catch (error) {
          logger.error("Reconciliation failed", { ...base, error: describeError(error) });
          return { ...base, status: OutcomeStatus.FAILED, error: describeError(error) };
        }
      })
    );
  }
}
