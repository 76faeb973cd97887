import { z } from "zod";

import type { DirectoryService } from "../backend/DirectoryService.js";
import { compareFields, valuesEqual } from "../diff/compare.js";
import { IDENTITY_PROVIDER_SCHEMA } from "../diff/fieldSchema.js";
import { loadLive } from "../diff/ResourceDiffer.js";
import type { DiffItem, FieldChange, FieldMap, FieldValue, ItemError, SecretRef } from "../diff/types.js";
import { type KindTally, createTally, runMutation } from "../engine/tally.js";
import { FetchError, ReconcilerError, ResolutionError } from "../errors.js";
import { appLogger } from "../observability/logger.js";
import type { SecretResolver } from "../secrets/SecretResolver.js";

export const IDENTITY_PROVIDER_NAME = "identity provider";

export interface MirroredGroup {
  name: string;
  roles: string[];
}

export interface DesiredIdentityProvider {
  fields: FieldMap;
  secrets?: Record<string, SecretRef>;
  /** Omitted when group mirroring is not managed. */
  mirroredGroups?: MirroredGroup[];
}

export interface IdentityProviderPlan {
  item?: DiffItem;
  mirroredGroups?: MirroredGroup[];
  /** Live group name → id, so existing groups keep their ids on update. */
  groupIds: Map<string, string>;
  errors: ItemError[];
}

const IdSchema = z.union([z.string(), z.number()]).transform(String);

const LiveGroupsSchema = z.array(
  z.object({
    id: IdSchema.optional(),
    name: z.string(),
    roleIds: z.array(IdSchema).default([]),
  }),
);

type LiveGroup = z.infer<typeof LiveGroupsSchema>[number];

function comparableGroups(groups: MirroredGroup[]): FieldValue[] {
  return groups.map((group) => ({ name: group.name, roles: [...group.roles].sort() }));
}

/**
 * Reconciles the identity-provider singleton: its settings, compared through
 * the declared field schema, and the groups it mirrors onto roles.
 */
export class IdentityProviderReconciler {
  private readonly logger = appLogger.child({ component: "IdentityProviderReconciler" });

  constructor(
    private readonly directory: DirectoryService,
    private readonly secrets: SecretResolver,
  ) {}

  async diff(desired: DesiredIdentityProvider): Promise<IdentityProviderPlan> {
    let live: FieldMap;
    try {
      live = await this.directory.getIdentityProvider();
    } catch (error) {
      throw new FetchError("identityProvider", error);
    }

    const liveGroups = this.parseGroups(live.groups);
    const plan: IdentityProviderPlan = {
      mirroredGroups: desired.mirroredGroups,
      groupIds: new Map(
        liveGroups.flatMap((group): Array<[string, string]> => (group.id === undefined ? [] : [[group.name, group.id]])),
      ),
      errors: [],
    };

    const fieldChanges = compareFields(IDENTITY_PROVIDER_SCHEMA, desired.fields, live);
    if (desired.mirroredGroups) {
      const change = await this.diffGroups(desired.mirroredGroups, liveGroups);
      if (change) {
        fieldChanges.push(change);
      }
    }
    if (fieldChanges.length === 0) {
      return plan;
    }

    try {
      const payload = this.secrets.buildPayload(desired.fields, desired.secrets);
      plan.item = { action: "update", kind: "identityProvider", name: IDENTITY_PROVIDER_NAME, fieldChanges, payload };
    } catch (error) {
      if (!(error instanceof ReconcilerError)) {
        throw error;
      }
      this.logger.warn({ event: "diff.payload_failed", kind: "identityProvider", code: error.code }, error.message);
      plan.errors.push({ kind: "identityProvider", name: IDENTITY_PROVIDER_NAME, message: error.message, code: error.code });
    }
    return plan;
  }

  /**
   * Sends the full settings payload. Mirrored group role names are resolved
   * against the roles that exist now, so roles created earlier in the same
   * run are found.
   */
  async apply(plan: IdentityProviderPlan, tally: KindTally = createTally("identityProvider")): Promise<KindTally> {
    const item = plan.item;
    if (!item) {
      return tally;
    }
    await runMutation(tally, item.name, "Updated identity provider settings", async () => {
      const body: FieldMap = { ...item.payload };
      if (plan.mirroredGroups) {
        body.groups = await this.resolveGroups(plan.mirroredGroups, plan.groupIds);
      }
      await this.directory.updateIdentityProvider(body);
    });
    return tally;
  }

  private async diffGroups(desired: MirroredGroup[], liveGroups: LiveGroup[]): Promise<FieldChange | undefined> {
    const roles = await loadLive(this.directory, "role");
    const roleNames = new Map(roles.map((role) => [role.id, role.name]));
    const current = comparableGroups(
      liveGroups.map((group) => ({
        name: group.name,
        roles: group.roleIds.map((id) => roleNames.get(id) ?? `unknown id ${id}`),
      })),
    );
    const target = comparableGroups(desired);
    if (valuesEqual("unorderedList", current, target)) {
      return undefined;
    }
    return { field: "mirroredGroups", from: current, to: target };
  }

  private async resolveGroups(groups: MirroredGroup[], groupIds: Map<string, string>): Promise<FieldValue[]> {
    const roles = await this.directory.listAll("role");
    const roleIds = new Map(roles.map((role) => [role.name, role.id]));
    return groups.map((group): FieldValue => {
      const ids = group.roles.map((roleName) => {
        const id = roleIds.get(roleName);
        if (id === undefined) {
          throw new ResolutionError(
            "identityProvider",
            group.name,
            `Role '${roleName}' not found for mirrored group '${group.name}'`,
          );
        }
        return id;
      });
      const entry: FieldMap = { name: group.name, roleIds: ids };
      const id = groupIds.get(group.name);
      if (id !== undefined) {
        entry.id = id;
      }
      return entry;
    });
  }

  private parseGroups(value: FieldValue | undefined): LiveGroup[] {
    if (value === undefined || value === null) {
      return [];
    }
    const parsed = LiveGroupsSchema.safeParse(value);
    if (!parsed.success) {
      this.logger.warn(
        { event: "identity.groups_unparsed", issues: parsed.error.issues.length },
        "Ignoring live mirrored groups with an unexpected shape",
      );
      return [];
    }
    return parsed.data;
  }
}
