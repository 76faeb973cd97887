import type { DirectoryService } from "../backend/DirectoryService.js";
import type { RolesConfig } from "../config/schema.js";
import { compareFields } from "../diff/compare.js";
import { MODEL_SET_SCHEMA, PERMISSION_SET_SCHEMA, type KindSchema } from "../diff/fieldSchema.js";
import { indexByName, loadLive } from "../diff/ResourceDiffer.js";
import type { DesiredResource, DiffItem, FieldChange, LiveResource } from "../diff/types.js";
import { createTally, recordFailure, recordSuppressed, runMutation, type KindTally } from "../engine/tally.js";
import { ResolutionError } from "../errors.js";
import { appLogger, normalizeError } from "../observability/logger.js";
import { filterProtected, isProtected, logSuppressed } from "../policy/ProtectionPolicy.js";

export type SetKind = "permissionSet" | "modelSet";

/**
 * Planned changes for the role/set triad, grouped by the stage that applies
 * them. Role payloads carry set names; ids are resolved while applying.
 */
export interface RolePlan {
  deleteRoles: DiffItem[];
  deletePermissionSets: DiffItem[];
  deleteModelSets: DiffItem[];
  upsertPermissionSets: DiffItem[];
  upsertModelSets: DiffItem[];
  upsertRoles: DiffItem[];
  /** Protected deletes and updates that were downgraded to no-ops. */
  suppressed: DiffItem[];
  /** Live name → id maps captured while planning; refreshed when applying. */
  permissionSetIds: Map<string, string>;
  modelSetIds: Map<string, string>;
}

export type RoleTallies = Record<SetKind | "role", KindTally>;

const SET_MEMBER_FIELD: Record<SetKind, string> = {
  permissionSet: "permissions",
  modelSet: "models",
};

const SET_SCHEMA: Record<SetKind, KindSchema> = {
  permissionSet: PERMISSION_SET_SCHEMA,
  modelSet: MODEL_SET_SCHEMA,
};

function readString(resource: LiveResource, field: string): string | undefined {
  const value = resource.fields[field];
  if (typeof value === "string" && value.length > 0) {
    return value;
  }
  return typeof value === "number" ? String(value) : undefined;
}

function invert(map: Map<string, string>): Map<string, string> {
  return new Map([...map.entries()].map(([name, id]) => [id, name]));
}

export function toSetResources(kind: SetKind, config: RolesConfig): DesiredResource[] {
  const field = SET_MEMBER_FIELD[kind];
  const entries = kind === "permissionSet"
    ? config.permissionSets.map((set) => ({ name: set.name, members: set.permissions }))
    : config.modelSets.map((set) => ({ name: set.name, members: set.models }));
  return entries.map((entry) => ({ name: entry.name, fields: { [field]: [...entry.members] } }));
}

/**
 * Reconciles permission sets, model sets and the roles that bind them. This
 * is the only reconciler that computes deletes: any live entry of the triad
 * missing from the desired state is removed unless it is protected.
 */
export class RoleReconciler {
  private readonly logger = appLogger.child({ component: "RoleReconciler" });

  constructor(private readonly directory: DirectoryService) {}

  async diff(config: RolesConfig): Promise<RolePlan> {
    const livePermissionSets = await loadLive(this.directory, "permissionSet");
    const liveModelSets = await loadLive(this.directory, "modelSet");
    const liveRoles = await loadLive(this.directory, "role");

    const plan: RolePlan = {
      deleteRoles: [],
      deletePermissionSets: [],
      deleteModelSets: [],
      upsertPermissionSets: this.diffSets("permissionSet", toSetResources("permissionSet", config), livePermissionSets),
      upsertModelSets: this.diffSets("modelSet", toSetResources("modelSet", config), liveModelSets),
      upsertRoles: [],
      suppressed: [],
      permissionSetIds: new Map(livePermissionSets.map((set) => [set.name, set.id])),
      modelSetIds: new Map(liveModelSets.map((set) => [set.name, set.id])),
    };

    const permissionSetNames = invert(plan.permissionSetIds);
    const modelSetNames = invert(plan.modelSetIds);
    const liveRolesByName = indexByName(liveRoles);

    for (const role of config.roles) {
      const payload = { name: role.name, permissionSet: role.permissionSet, modelSet: role.modelSet };
      const existing = liveRolesByName.get(role.name);
      if (!existing) {
        plan.upsertRoles.push({ action: "create", kind: "role", name: role.name, fieldChanges: [], payload });
        continue;
      }

      const currentPermissionSet = this.boundName(existing, "permissionSetId", permissionSetNames);
      const currentModelSet = this.boundName(existing, "modelSetId", modelSetNames);
      const fieldChanges: FieldChange[] = [];
      if (currentPermissionSet !== role.permissionSet) {
        fieldChanges.push({ field: "permissionSet", from: currentPermissionSet, to: role.permissionSet });
      }
      if (currentModelSet !== role.modelSet) {
        fieldChanges.push({ field: "modelSet", from: currentModelSet, to: role.modelSet });
      }
      if (fieldChanges.length === 0) {
        continue;
      }
      const item: DiffItem = { action: "update", kind: "role", name: role.name, id: existing.id, fieldChanges, payload };
      if (isProtected("role", role.name, "update")) {
        logSuppressed(item);
        plan.suppressed.push(item);
        continue;
      }
      plan.upsertRoles.push(item);
    }

    plan.deleteRoles = this.detectDeletes("role", new Set(config.roles.map((role) => role.name)), liveRoles, plan);
    plan.deletePermissionSets = this.detectDeletes(
      "permissionSet",
      new Set(config.permissionSets.map((set) => set.name)),
      livePermissionSets,
      plan,
    );
    plan.deleteModelSets = this.detectDeletes(
      "modelSet",
      new Set(config.modelSets.map((set) => set.name)),
      liveModelSets,
      plan,
    );

    return plan;
  }

  /**
   * Applies a plan in dependency order: role deletes free their sets, set
   * deletes follow, then set upserts record new ids that role upserts
   * resolve against.
   */
  async apply(plan: RolePlan): Promise<RoleTallies> {
    const tallies: RoleTallies = {
      permissionSet: createTally("permissionSet"),
      modelSet: createTally("modelSet"),
      role: createTally("role"),
    };
    const setIds: Record<SetKind, Map<string, string>> = {
      permissionSet: await this.refreshIds("permissionSet", plan.permissionSetIds),
      modelSet: await this.refreshIds("modelSet", plan.modelSetIds),
    };
    for (const kind of ["permissionSet", "modelSet", "role"] as const) {
      recordSuppressed(tallies[kind], plan.suppressed.filter((item) => item.kind === kind).length);
    }

    await this.deleteStage("role", this.allowed(plan.deleteRoles, tallies.role), tallies.role);
    for (const kind of ["permissionSet", "modelSet"] as const) {
      const items = kind === "permissionSet" ? plan.deletePermissionSets : plan.deleteModelSets;
      const deleted = await this.deleteStage(kind, this.allowed(items, tallies[kind]), tallies[kind]);
      for (const name of deleted) {
        setIds[kind].delete(name);
      }
    }

    await this.upsertSetStage("permissionSet", plan.upsertPermissionSets, setIds.permissionSet, tallies.permissionSet);
    await this.upsertSetStage("modelSet", plan.upsertModelSets, setIds.modelSet, tallies.modelSet);
    await this.upsertRoleStage(this.allowed(plan.upsertRoles, tallies.role), setIds, tallies.role);

    return tallies;
  }

  /** Name → id map as of now; falls back to the planning snapshot when listing fails. */
  private async refreshIds(kind: SetKind, planned: Map<string, string>): Promise<Map<string, string>> {
    try {
      const live = await this.directory.listAll(kind);
      return new Map(live.map((record) => [record.name, record.id]));
    } catch (error) {
      this.logger.warn(
        { event: "role.refresh_failed", kind, err: normalizeError(error) },
        `Could not refresh ${kind} ids; using the planning snapshot`,
      );
      return new Map(planned);
    }
  }

  private diffSets(kind: SetKind, desired: DesiredResource[], live: LiveResource[]): DiffItem[] {
    const liveByName = indexByName(live);
    const items: DiffItem[] = [];
    for (const resource of desired) {
      const payload = { name: resource.name, ...resource.fields };
      const existing = liveByName.get(resource.name);
      if (!existing) {
        items.push({ action: "create", kind, name: resource.name, fieldChanges: [], payload });
        continue;
      }
      const fieldChanges = compareFields(SET_SCHEMA[kind], resource.fields, existing.fields);
      if (fieldChanges.length > 0) {
        items.push({ action: "update", kind, name: resource.name, id: existing.id, fieldChanges, payload });
      }
    }
    return items;
  }

  private boundName(role: LiveResource, field: string, namesById: Map<string, string>): string | null {
    const id = readString(role, field);
    if (id === undefined) {
      return null;
    }
    return namesById.get(id) ?? `unknown id ${id}`;
  }

  private detectDeletes(
    kind: SetKind | "role",
    desiredNames: Set<string>,
    live: LiveResource[],
    plan: RolePlan,
  ): DiffItem[] {
    const deletes: DiffItem[] = [];
    for (const record of live) {
      if (desiredNames.has(record.name)) {
        continue;
      }
      const item: DiffItem = { action: "delete", kind, name: record.name, id: record.id, fieldChanges: [], payload: {} };
      if (isProtected(kind, record.name, "delete")) {
        logSuppressed(item);
        plan.suppressed.push(item);
        continue;
      }
      deletes.push(item);
    }
    return deletes;
  }

  private allowed(items: DiffItem[], tally: KindTally): DiffItem[] {
    const decision = filterProtected(items);
    recordSuppressed(tally, decision.suppressed.length);
    return decision.allowed;
  }

  private async deleteStage(kind: SetKind | "role", items: DiffItem[], tally: KindTally): Promise<string[]> {
    const deleted: string[] = [];
    for (const item of items) {
      const id = item.id;
      if (id === undefined) {
        continue;
      }
      const result = await runMutation(tally, item.name, `Deleted ${kind} '${item.name}'`, () =>
        this.directory.delete(kind, id),
      );
      if (result.ok) {
        deleted.push(item.name);
      }
    }
    return deleted;
  }

  private async upsertSetStage(
    kind: SetKind,
    items: DiffItem[],
    ids: Map<string, string>,
    tally: KindTally,
  ): Promise<void> {
    for (const item of items) {
      const id = item.id;
      if (item.action === "create") {
        const result = await runMutation(tally, item.name, `Created ${kind} '${item.name}'`, () =>
          this.directory.create(kind, item.payload),
        );
        if (result.ok) {
          ids.set(item.name, result.value);
        }
      } else if (item.action === "update" && id !== undefined) {
        await runMutation(tally, item.name, `Updated ${kind} '${item.name}'`, () =>
          this.directory.update(kind, id, item.payload),
        );
      }
    }
  }

  private async upsertRoleStage(
    items: DiffItem[],
    setIds: Record<SetKind, Map<string, string>>,
    tally: KindTally,
  ): Promise<void> {
    for (const item of items) {
      const permissionSetName = String(item.payload.permissionSet);
      const modelSetName = String(item.payload.modelSet);
      const permissionSetId = setIds.permissionSet.get(permissionSetName);
      const modelSetId = setIds.modelSet.get(modelSetName);
      if (permissionSetId === undefined || modelSetId === undefined) {
        const missing = permissionSetId === undefined
          ? `Permission set '${permissionSetName}'`
          : `Model set '${modelSetName}'`;
        recordFailure(
          tally,
          item.name,
          new ResolutionError("role", item.name, `${missing} not found for role '${item.name}'`),
        );
        continue;
      }

      const body = { name: item.name, permissionSetId, modelSetId };
      const id = item.id;
      if (item.action === "create") {
        await runMutation(tally, item.name, `Created role '${item.name}'`, () => this.directory.create("role", body));
      } else if (id !== undefined) {
        await runMutation(tally, item.name, `Updated role '${item.name}'`, () => this.directory.update("role", id, body));
      }
      this.logger.debug({ event: "role.bound", role: item.name, permissionSetId, modelSetId }, "Role bindings resolved");
    }
  }
}
