import type { DirectoryService } from "../backend/DirectoryService.js";
import { MODEL_BINDING_SCHEMA, PROJECT_SCHEMA } from "../diff/fieldSchema.js";
import { ResourceDiffer, loadLive } from "../diff/ResourceDiffer.js";
import type { DesiredResource, KindDiff } from "../diff/types.js";
import { type KindTally, applyUpserts, createTally } from "../engine/tally.js";
import { FetchError, ReconcilerError } from "../errors.js";
import type { SecretResolver } from "../secrets/SecretResolver.js";
import { withWorkspace } from "./workspace.js";

export interface DesiredProjects {
  projects: DesiredResource[];
  modelBindings: DesiredResource[];
}

export interface ProjectPlan {
  projects: KindDiff;
  modelBindings: KindDiff;
}

export type ProjectTallies = {
  project: KindTally;
  modelBinding: KindTally;
};

/**
 * Projects and the model bindings inside them. Both are only visible and
 * writable in the development workspace, so every read and write runs inside
 * `withWorkspace`. Existing projects are never updated.
 */
export class ProjectReconciler {
  private readonly projects: ResourceDiffer;
  private readonly modelBindings: ResourceDiffer;

  constructor(
    private readonly directory: DirectoryService,
    secrets: SecretResolver,
    private readonly workspace: string,
  ) {
    this.projects = new ResourceDiffer(PROJECT_SCHEMA, secrets);
    this.modelBindings = new ResourceDiffer(MODEL_BINDING_SCHEMA, secrets);
  }

  /** A failure to enter the workspace is reported as a FetchError for projects. */
  async diff(desired: DesiredProjects): Promise<ProjectPlan> {
    try {
      return await withWorkspace(this.directory, this.workspace, async () => {
        const liveProjects = await loadLive(this.directory, "project");
        const liveBindings = await loadLive(this.directory, "modelBinding");
        return {
          projects: this.projects.diff(desired.projects, liveProjects),
          modelBindings: this.modelBindings.diff(desired.modelBindings, liveBindings),
        };
      });
    } catch (error) {
      throw error instanceof ReconcilerError ? error : new FetchError("project", error);
    }
  }

  /** Projects are created before the bindings that reference them. */
  apply(
    plan: ProjectPlan,
    tallies: ProjectTallies = { project: createTally("project"), modelBinding: createTally("modelBinding") },
  ): Promise<ProjectTallies> {
    return withWorkspace(this.directory, this.workspace, async () => {
      await applyUpserts(this.directory, "project", plan.projects.items, tallies.project);
      await applyUpserts(this.directory, "modelBinding", plan.modelBindings.items, tallies.modelBinding);
      return tallies;
    });
  }
}
