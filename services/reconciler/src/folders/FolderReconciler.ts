import type { AccessChange, AccessReconciler, DesiredAccess } from "../access/AccessReconciler.js";
import type { DirectoryService } from "../backend/DirectoryService.js";
import { loadLive } from "../diff/ResourceDiffer.js";
import type { ItemError, LiveResource } from "../diff/types.js";
import { type KindTally, createTally, recordFailure, runMutation } from "../engine/tally.js";
import { ReconcilerError, ResolutionError } from "../errors.js";
import { appLogger } from "../observability/logger.js";

export interface DesiredFolder {
  name: string;
  /** Parent folder name; the root folder when omitted. */
  parent?: string;
  access: DesiredAccess[];
}

export type FolderPlanItem =
  | {
      action: "create";
      name: string;
      parent: string;
      /** Absent when the parent is itself created earlier in the same pass. */
      parentId?: string;
      access: DesiredAccess[];
    }
  | { action: "access"; name: string; id: string; access: DesiredAccess[]; changes: AccessChange[] };

export interface FolderPlan {
  items: FolderPlanItem[];
  errors: ItemError[];
}

/** Backends may return the parent id as a number. */
function parentIdOf(record: LiveResource): string | undefined {
  const value = record.fields.parentId;
  if (typeof value === "number") {
    return String(value);
  }
  return typeof value === "string" && value.length > 0 ? value : undefined;
}

export type FolderReconcilerOptions = {
  rootFolderId: string;
  rootFolderName: string;
};

/**
 * Creates missing folders under their named parent and hands each folder's
 * access list to the AccessReconciler. Folders are never deleted.
 */
export class FolderReconciler {
  private readonly logger = appLogger.child({ component: "FolderReconciler" });

  constructor(
    private readonly directory: DirectoryService,
    private readonly access: AccessReconciler,
    private readonly options: FolderReconcilerOptions,
  ) {}

  async diff(folders: DesiredFolder[]): Promise<FolderPlan> {
    const live = await loadLive(this.directory, "folder");
    const plan: FolderPlan = { items: [], errors: [] };
    const plannedCreates = new Set<string>();

    for (const folder of folders) {
      if (this.isRoot(folder)) {
        await this.planAccess(plan, folder, this.options.rootFolderId);
        continue;
      }

      const parent = folder.parent ?? this.options.rootFolderName;
      const parentId = this.resolveParentId(parent, live);
      if (parentId === undefined && !plannedCreates.has(parent)) {
        const error = new ResolutionError("folder", folder.name, `Parent folder '${parent}' not found for folder '${folder.name}'`);
        this.logger.error({ event: "folder.parent_unresolved", folder: folder.name, parent }, error.message);
        plan.errors.push({ kind: "folder", name: folder.name, message: error.message, code: error.code });
        continue;
      }

      const existing = parentId === undefined
        ? undefined
        : live.find((record) => record.name === folder.name && parentIdOf(record) === parentId);
      if (existing) {
        await this.planAccess(plan, folder, existing.id);
        continue;
      }

      plannedCreates.add(folder.name);
      plan.items.push({ action: "create", name: folder.name, parent, parentId, access: folder.access });
    }

    return plan;
  }

  async apply(plan: FolderPlan, tally: KindTally = createTally("folder")): Promise<KindTally> {
    const createdIds = new Map<string, string>();

    for (const item of plan.items) {
      if (item.action === "access") {
        await this.access.reconcile(item.id, item.access, tally, item.name);
        continue;
      }

      const parentId = item.parentId ?? createdIds.get(item.parent);
      if (parentId === undefined) {
        recordFailure(
          tally,
          item.name,
          new ResolutionError("folder", item.name, `Parent folder '${item.parent}' was not created for folder '${item.name}'`),
        );
        continue;
      }

      const created = await runMutation(tally, item.name, `Created folder '${item.name}' under '${item.parent}'`, () =>
        this.directory.create("folder", { name: item.name, parentId }),
      );
      if (!created.ok) {
        continue;
      }
      createdIds.set(item.name, created.value);
      if (item.access.length > 0) {
        await this.access.initializeNewContainer(created.value, item.access, tally, item.name);
      }
    }

    return tally;
  }

  private isRoot(folder: DesiredFolder): boolean {
    return folder.name === this.options.rootFolderName && folder.parent === undefined;
  }

  private resolveParentId(parent: string, live: LiveResource[]): string | undefined {
    if (parent === this.options.rootFolderName) {
      return this.options.rootFolderId;
    }
    return live.find((record) => record.name === parent)?.id;
  }

  private async planAccess(plan: FolderPlan, folder: DesiredFolder, id: string): Promise<void> {
    try {
      const changes = await this.access.diff(id, folder.access, folder.name);
      if (changes.length > 0) {
        plan.items.push({ action: "access", name: folder.name, id, access: folder.access, changes });
      }
    } catch (error) {
      if (!(error instanceof ReconcilerError)) {
        throw error;
      }
      this.logger.error({ event: "folder.access_diff_failed", folder: folder.name, code: error.code }, error.message);
      plan.errors.push({ kind: "folder", name: folder.name, message: error.message, code: error.code });
    }
  }
}
