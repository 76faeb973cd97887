import type { AccessEntry, DirectoryService, PrincipalType } from "../backend/DirectoryService.js";
import { type KindTally, runMutation } from "../engine/tally.js";
import { ApplyError, FetchError } from "../errors.js";
import { appLogger } from "../observability/logger.js";
import type { PrincipalResolver } from "./PrincipalResolver.js";

export interface DesiredAccess {
  principalType: PrincipalType;
  /** Group name or user email as written in the desired state. */
  principal: string;
  permission: string;
}

export type AccessChange =
  | { action: "breakInheritance" }
  | { action: "add"; principalType: PrincipalType; principalId: string; principal: string; permission: string }
  | {
      action: "update";
      principalType: PrincipalType;
      principalId: string;
      principal: string;
      entryId: string;
      from: string;
      to: string;
    }
  | { action: "remove"; principalType: PrincipalType; principalId: string; entryId: string; permission: string };

type TargetEntry = { principalType: PrincipalType; principalId: string; principal: string; permission: string };

type CurrentEntry = { entryId: string; permission: string };

function principalKey(type: PrincipalType, id: string): string {
  return `${type}:${id}`;
}

export function describeAccessChange(change: AccessChange): string {
  switch (change.action) {
    case "breakInheritance":
      return "break inheritance from parent folder";
    case "add":
      return `+ ${change.principalType} '${change.principal}' (${change.permission})`;
    case "update":
      return `~ ${change.principalType} '${change.principal}' (${change.from} -> ${change.to})`;
    case "remove":
      return `- ${change.principalType} ${change.principalId} (${change.permission})`;
  }
}

/**
 * Reconciles the access list owned by one folder. A folder that inherits its
 * parent's access is detached first when it has desired entries; the backend
 * then copies the inherited entries onto the folder and reconciliation runs
 * against those copies.
 */
export class AccessReconciler {
  private readonly logger = appLogger.child({ component: "AccessReconciler" });

  constructor(
    private readonly directory: DirectoryService,
    private readonly principals: PrincipalResolver,
  ) {}

  /** Computes the changes `reconcile` would make, without mutating anything. */
  async diff(containerId: string, desired: DesiredAccess[], folderName = containerId): Promise<AccessChange[]> {
    const inherits = await this.readInherits(containerId);
    if (inherits && desired.length === 0) {
      return [];
    }
    const current = await this.readEntries(containerId);
    const target = await this.buildTargetMap(desired, folderName);
    const changes = this.computeChanges(current, target);
    return inherits ? [{ action: "breakInheritance" }, ...changes] : changes;
  }

  /**
   * Brings the folder's access list to the desired state. Individual entry
   * failures are recorded on the tally and do not stop the remaining changes.
   */
  async reconcile(
    containerId: string,
    desired: DesiredAccess[],
    tally: KindTally,
    folderName = containerId,
  ): Promise<AccessChange[]> {
    let inherits: boolean;
    try {
      inherits = await this.readInherits(containerId);
    } catch (error) {
      this.recordReadFailure(tally, folderName, error);
      return [];
    }
    if (inherits && desired.length === 0) {
      return [];
    }

    const applied: AccessChange[] = [];
    if (inherits) {
      const broken = await runMutation(tally, folderName, `Broke inheritance for folder '${folderName}'`, () =>
        this.directory.setInheritance(containerId, false),
      );
      if (!broken.ok) {
        return applied;
      }
      applied.push({ action: "breakInheritance" });
    }

    let current: AccessEntry[];
    try {
      current = await this.readEntries(containerId);
    } catch (error) {
      this.recordReadFailure(tally, folderName, error);
      return applied;
    }
    const target = await this.buildTargetMap(desired, folderName);

    for (const change of this.computeChanges(current, target)) {
      const result = await runMutation(tally, folderName, `Folder '${folderName}': ${describeAccessChange(change)}`, () =>
        this.execute(containerId, change),
      );
      if (result.ok) {
        applied.push(change);
      }
    }
    return applied;
  }

  /** A newly created folder inherits by default; detach it before granting access. */
  async initializeNewContainer(
    containerId: string,
    desired: DesiredAccess[],
    tally: KindTally,
    folderName = containerId,
  ): Promise<AccessChange[]> {
    const broken = await runMutation(tally, folderName, `Broke inheritance for new folder '${folderName}'`, () =>
      this.directory.setInheritance(containerId, false),
    );
    if (!broken.ok) {
      return [];
    }
    const changes = await this.reconcile(containerId, desired, tally, folderName);
    return [{ action: "breakInheritance" }, ...changes];
  }

  private async execute(containerId: string, change: AccessChange): Promise<void> {
    switch (change.action) {
      case "breakInheritance":
        await this.directory.setInheritance(containerId, false);
        return;
      case "add":
        await this.directory.addAccessEntry(containerId, {
          principalType: change.principalType,
          principalId: change.principalId,
          permission: change.permission,
        });
        return;
      case "update":
        await this.directory.updateAccessEntry(change.entryId, change.to);
        return;
      case "remove":
        await this.directory.removeAccessEntry(change.entryId);
        return;
    }
  }

  private computeChanges(current: AccessEntry[], target: Map<string, TargetEntry>): AccessChange[] {
    const currentMap = new Map<string, CurrentEntry>();
    for (const entry of current) {
      currentMap.set(principalKey(entry.principalType, entry.principalId), {
        entryId: entry.entryId,
        permission: entry.permission,
      });
    }

    const changes: AccessChange[] = [];
    for (const [key, wanted] of target) {
      const existing = currentMap.get(key);
      if (!existing) {
        changes.push({ action: "add", ...wanted });
      } else if (existing.permission !== wanted.permission) {
        changes.push({
          action: "update",
          principalType: wanted.principalType,
          principalId: wanted.principalId,
          principal: wanted.principal,
          entryId: existing.entryId,
          from: existing.permission,
          to: wanted.permission,
        });
      }
    }
    for (const entry of current) {
      if (!target.has(principalKey(entry.principalType, entry.principalId))) {
        changes.push({
          action: "remove",
          principalType: entry.principalType,
          principalId: entry.principalId,
          entryId: entry.entryId,
          permission: entry.permission,
        });
      }
    }
    return changes;
  }

  private async buildTargetMap(desired: DesiredAccess[], folderName: string): Promise<Map<string, TargetEntry>> {
    const target = new Map<string, TargetEntry>();
    for (const entry of desired) {
      const principalId = await this.principals.resolve(entry.principalType, entry.principal);
      if (principalId === undefined) {
        this.logger.warn(
          { event: "access.principal_unresolved", folder: folderName, type: entry.principalType, principal: entry.principal },
          `${entry.principalType} '${entry.principal}' not found for folder '${folderName}'`,
        );
        continue;
      }
      target.set(principalKey(entry.principalType, principalId), {
        principalType: entry.principalType,
        principalId,
        principal: entry.principal,
        permission: entry.permission,
      });
    }
    return target;
  }

  private async readInherits(containerId: string): Promise<boolean> {
    let folder;
    try {
      folder = await this.directory.get("folder", containerId);
    } catch (error) {
      throw new FetchError("folder", error);
    }
    if (!folder) {
      throw new FetchError("folder", new Error(`Folder ${containerId} not found`));
    }
    return folder.fields.inherits !== false;
  }

  private async readEntries(containerId: string): Promise<AccessEntry[]> {
    try {
      return await this.directory.listAccessEntries(containerId);
    } catch (error) {
      throw new FetchError("folder", error);
    }
  }

  private recordReadFailure(tally: KindTally, folderName: string, error: unknown): void {
    tally.failed += 1;
    const failure = error instanceof FetchError ? error : new ApplyError("folder", folderName, error);
    tally.errors.push({ kind: "folder", name: folderName, message: failure.message, code: failure.code });
    this.logger.error({ event: "access.read_failed", folder: folderName, code: failure.code }, failure.message);
  }
}
