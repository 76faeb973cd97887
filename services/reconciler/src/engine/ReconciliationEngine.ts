import { AccessReconciler } from "../access/AccessReconciler.js";
import { PrincipalResolver } from "../access/PrincipalResolver.js";
import type { DirectoryService } from "../backend/DirectoryService.js";
import {
  toConnectionResources,
  toDesiredFolders,
  toDesiredIdentityProvider,
  toProjectResources,
} from "../config/desired.js";
import type { DesiredConfig, EngineSettings } from "../config/schema.js";
import { CONNECTION_SCHEMA } from "../diff/fieldSchema.js";
import { ResourceDiffer, loadLive } from "../diff/ResourceDiffer.js";
import type { DiffItem, ItemError, KindDiff, ResourceKind } from "../diff/types.js";
import { ApplyError, FetchError } from "../errors.js";
import { FolderReconciler, type FolderPlan } from "../folders/FolderReconciler.js";
import { IdentityProviderReconciler, type IdentityProviderPlan } from "../identity/IdentityProviderReconciler.js";
import { appLogger } from "../observability/logger.js";
import { ProjectReconciler, type ProjectPlan } from "../projects/ProjectReconciler.js";
import { RoleReconciler, type RolePlan } from "../roles/RoleReconciler.js";
import { SecretResolver } from "../secrets/SecretResolver.js";
import { ConfigValidator } from "../validation/ConfigValidator.js";
import { describeDiffItem, describeFolderItem, describeSuppressed } from "./describe.js";
import { type KindTally, applyUpserts, createTally, recordFailure } from "./tally.js";

/** Order in which kinds are planned, applied and reported. */
export const KIND_ORDER: readonly ResourceKind[] = [
  "connection",
  "project",
  "modelBinding",
  "permissionSet",
  "modelSet",
  "role",
  "identityProvider",
  "folder",
];

export interface KindReport {
  kind: ResourceKind;
  /** Human-readable change descriptions, in apply order. */
  changes: string[];
  errors: ItemError[];
  /** Protected items the plan leaves alone; not counted as changes. */
  suppressed: string[];
  /** Set when live state could not be read; the kind is skipped. */
  fetchError?: string;
}

export interface ReconciliationPlan {
  reports: KindReport[];
  connections?: KindDiff;
  projects?: ProjectPlan;
  roles?: RolePlan;
  identityProvider?: IdentityProviderPlan;
  folders?: FolderPlan;
}

export interface ApplyReport {
  tallies: KindTally[];
}

function report(
  kind: ResourceKind,
  changes: string[] = [],
  errors: ItemError[] = [],
  suppressed: string[] = [],
): KindReport {
  return { kind, changes, errors: errors.filter((error) => error.kind === kind), suppressed };
}

function describeAll(items: DiffItem[]): string[] {
  return items.map(describeDiffItem);
}

function byKindOrder<T extends { kind: ResourceKind }>(entries: T[]): T[] {
  return [...entries].sort((left, right) => KIND_ORDER.indexOf(left.kind) - KIND_ORDER.indexOf(right.kind));
}

export function countChanges(plan: ReconciliationPlan): number {
  return plan.reports.reduce((total, entry) => total + entry.changes.length, 0);
}

export function hasFailures(result: ApplyReport): boolean {
  return result.tallies.some((tally) => tally.failed > 0);
}

/**
 * Validates desired state, plans every managed kind against fresh live state
 * and applies the plan in dependency order. Sections absent from the desired
 * state are not managed at all. Nothing is cached between runs.
 */
export class ReconciliationEngine {
  private readonly logger = appLogger.child({ component: "ReconciliationEngine" });

  constructor(
    private readonly directory: DirectoryService,
    private readonly settings: EngineSettings,
    private readonly secrets: SecretResolver = new SecretResolver(),
  ) {}

  async plan(config: DesiredConfig): Promise<ReconciliationPlan> {
    const principals = new PrincipalResolver(this.directory);
    await new ConfigValidator(this.directory, principals, {
      strictPrincipals: this.settings.strictPrincipals,
    }).validate(config);

    const plan: ReconciliationPlan = { reports: [] };

    if (config.connections.length > 0) {
      await this.planStage(plan, ["connection"], async () => {
        const live = await loadLive(this.directory, "connection");
        const diff = new ResourceDiffer(CONNECTION_SCHEMA, this.secrets).diff(
          toConnectionResources(config.connections),
          live,
        );
        plan.connections = diff;
        return [report("connection", describeAll(diff.items), diff.errors)];
      });
    }

    if (config.projects.length > 0) {
      await this.planStage(plan, ["project", "modelBinding"], async () => {
        const projects = await this.projectReconciler().diff(toProjectResources(config.projects));
        plan.projects = projects;
        return [
          report("project", describeAll(projects.projects.items), projects.projects.errors),
          report("modelBinding", describeAll(projects.modelBindings.items), projects.modelBindings.errors),
        ];
      });
    }

    const roles = config.roles;
    if (roles) {
      await this.planStage(plan, ["permissionSet", "modelSet", "role"], async () => {
        const rolePlan = await new RoleReconciler(this.directory).diff(roles);
        plan.roles = rolePlan;
        const suppressed = (kind: ResourceKind) =>
          rolePlan.suppressed.filter((item) => item.kind === kind).map(describeSuppressed);
        return [
          report(
            "permissionSet",
            describeAll([...rolePlan.deletePermissionSets, ...rolePlan.upsertPermissionSets]),
            [],
            suppressed("permissionSet"),
          ),
          report(
            "modelSet",
            describeAll([...rolePlan.deleteModelSets, ...rolePlan.upsertModelSets]),
            [],
            suppressed("modelSet"),
          ),
          report("role", describeAll([...rolePlan.deleteRoles, ...rolePlan.upsertRoles]), [], suppressed("role")),
        ];
      });
    }

    const identityProvider = config.identityProvider;
    if (identityProvider) {
      await this.planStage(plan, ["identityProvider"], async () => {
        const identityPlan = await new IdentityProviderReconciler(this.directory, this.secrets).diff(
          toDesiredIdentityProvider(identityProvider),
        );
        plan.identityProvider = identityPlan;
        return [
          report("identityProvider", identityPlan.item ? [describeDiffItem(identityPlan.item)] : [], identityPlan.errors),
        ];
      });
    }

    if (config.folders.length > 0) {
      await this.planStage(plan, ["folder"], async () => {
        const folderPlan = await this.folderReconciler(principals).diff(toDesiredFolders(config.folders));
        plan.folders = folderPlan;
        return [report("folder", folderPlan.items.map(describeFolderItem), folderPlan.errors)];
      });
    }

    plan.reports = byKindOrder(plan.reports);
    return plan;
  }

  /**
   * Applies each planned stage in order. A stage whose plan is missing, because
   * its kind could not be fetched, is skipped. Failures are tallied and the
   * run continues; nothing is rolled back or retried.
   */
  async apply(plan: ReconciliationPlan): Promise<ApplyReport> {
    const tallies: KindTally[] = [];

    const connections = plan.connections;
    if (connections) {
      const tally = createTally("connection");
      await this.applyStage(tally, () => applyUpserts(this.directory, "connection", connections.items, tally));
      tallies.push(tally);
    }

    const projects = plan.projects;
    if (projects) {
      const stageTallies = { project: createTally("project"), modelBinding: createTally("modelBinding") };
      await this.applyStage(stageTallies.project, () => this.projectReconciler().apply(projects, stageTallies));
      tallies.push(stageTallies.project, stageTallies.modelBinding);
    }

    const roles = plan.roles;
    if (roles) {
      const fallback = {
        permissionSet: createTally("permissionSet"),
        modelSet: createTally("modelSet"),
        role: createTally("role"),
      };
      const roleTallies = await this.applyStage(fallback.role, () => new RoleReconciler(this.directory).apply(roles));
      const applied = roleTallies ?? fallback;
      tallies.push(applied.permissionSet, applied.modelSet, applied.role);
    }

    const identityProvider = plan.identityProvider;
    if (identityProvider) {
      const tally = createTally("identityProvider");
      await this.applyStage(tally, () =>
        new IdentityProviderReconciler(this.directory, this.secrets).apply(identityProvider, tally),
      );
      tallies.push(tally);
    }

    const folders = plan.folders;
    if (folders) {
      const tally = createTally("folder");
      const principals = new PrincipalResolver(this.directory);
      await this.applyStage(tally, () => this.folderReconciler(principals).apply(folders, tally));
      tallies.push(tally);
    }

    for (const tally of tallies) {
      this.logger.info(
        {
          event: "apply.tally",
          kind: tally.kind,
          succeeded: tally.succeeded,
          failed: tally.failed,
          suppressed: tally.suppressed,
        },
        `${tally.kind}: ${tally.succeeded} succeeded, ${tally.failed} failed, ${tally.suppressed} suppressed`,
      );
    }
    return { tallies };
  }

  private projectReconciler(): ProjectReconciler {
    return new ProjectReconciler(this.directory, this.secrets, this.settings.devWorkspace);
  }

  private folderReconciler(principals: PrincipalResolver): FolderReconciler {
    return new FolderReconciler(this.directory, new AccessReconciler(this.directory, principals), {
      rootFolderId: this.settings.rootFolderId,
      rootFolderName: this.settings.rootFolderName,
    });
  }

  /** A FetchError skips only this stage's kinds; anything else aborts the plan. */
  private async planStage(
    plan: ReconciliationPlan,
    kinds: ResourceKind[],
    build: () => Promise<KindReport[]>,
  ): Promise<void> {
    try {
      plan.reports.push(...(await build()));
    } catch (error) {
      if (!(error instanceof FetchError)) {
        throw error;
      }
      this.logger.error({ event: "plan.kind_skipped", kinds, code: error.code }, error.message);
      for (const kind of kinds) {
        plan.reports.push({ kind, changes: [], errors: [], suppressed: [], fetchError: error.message });
      }
    }
  }

  /** An error escaping a stage is recorded against `tally` and the run moves on. */
  private async applyStage<T>(tally: KindTally, run: () => Promise<T>): Promise<T | undefined> {
    try {
      return await run();
    } catch (error) {
      recordFailure(tally, tally.kind, new ApplyError(tally.kind, tally.kind, error));
      return undefined;
    }
  }
}
