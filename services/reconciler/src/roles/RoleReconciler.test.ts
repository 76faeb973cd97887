import { describe, expect, it, vi } from "vitest";

import { InMemoryDirectory } from "../backend/InMemoryDirectory.js";
import type { RolesConfig } from "../config/schema.js";
import { FetchError } from "../errors.js";
import { RoleReconciler } from "./RoleReconciler.js";

vi.mock("../observability/logger.js", () => ({
  appLogger: {
    child: () => ({ info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() }),
  },
  normalizeError: (error: unknown) => ({ message: String(error) }),
}));

function rolesConfig(partial: Partial<RolesConfig> = {}): RolesConfig {
  return { permissionSets: [], modelSets: [], roles: [], ...partial };
}

describe("RoleReconciler", () => {
  it("binds a role to sets created in the same pass", async () => {
    const directory = new InMemoryDirectory();
    const reconciler = new RoleReconciler(directory);
    const config = rolesConfig({
      permissionSets: [{ name: "P", permissions: ["see_dashboards"] }],
      modelSets: [{ name: "M", models: ["sales"] }],
      roles: [{ name: "R", permissionSet: "P", modelSet: "M" }],
    });

    const plan = await reconciler.diff(config);
    const tallies = await reconciler.apply(plan);

    expect(directory.calls).toEqual(["create:permissionSet:P", "create:modelSet:M", "create:role:R"]);
    expect(directory.findByName("role", "R")?.fields).toEqual({ permissionSetId: "101", modelSetId: "102" });
    expect(tallies.role).toMatchObject({ succeeded: 1, failed: 0 });
    expect(tallies.permissionSet.succeeded).toBe(1);
    expect(tallies.modelSet.succeeded).toBe(1);
  });

  it("never deletes protected names", async () => {
    const directory = new InMemoryDirectory();
    const adminSet = directory.seed("permissionSet", "Admin", { permissions: ["administer"] });
    const allModels = directory.seed("modelSet", "All", { models: [] });
    directory.seed("role", "Admin", { permissionSetId: adminSet, modelSetId: allModels });
    directory.seed("role", "Legacy", { permissionSetId: adminSet, modelSetId: allModels });
    const reconciler = new RoleReconciler(directory);

    const plan = await reconciler.diff(rolesConfig());

    expect(plan.deleteRoles.map((item) => item.name)).toEqual(["Legacy"]);
    expect(plan.deletePermissionSets).toEqual([]);
    expect(plan.deleteModelSets).toEqual([]);
    expect(plan.suppressed.map((item) => `${item.kind}:${item.name}`)).toEqual([
      "role:Admin",
      "permissionSet:Admin",
      "modelSet:All",
    ]);

    const tallies = await reconciler.apply(plan);

    expect(directory.calls).toEqual(["delete:role:Legacy"]);
    expect(tallies.role).toMatchObject({ succeeded: 1, suppressed: 1 });
    expect(tallies.permissionSet.suppressed).toBe(1);
    expect(tallies.modelSet.suppressed).toBe(1);
  });

  it("keeps built-in permission sets while deleting unmanaged ones", async () => {
    const directory = new InMemoryDirectory();
    directory.seed("permissionSet", "Gemini", { permissions: [] });
    directory.seed("permissionSet", "LookML Dashboard User", { permissions: [] });
    directory.seed("permissionSet", "User who can't view LookML", { permissions: [] });
    directory.seed("permissionSet", "Legacy PS", { permissions: [] });
    const reconciler = new RoleReconciler(directory);

    const plan = await reconciler.diff(rolesConfig());
    await reconciler.apply(plan);

    expect(plan.suppressed.map((item) => item.name)).toEqual([
      "Gemini",
      "LookML Dashboard User",
      "User who can't view LookML",
    ]);
    expect(directory.calls).toEqual(["delete:permissionSet:Legacy PS"]);
  });

  it("suppresses rebinding the super-admin role", async () => {
    const directory = new InMemoryDirectory();
    const adminSet = directory.seed("permissionSet", "Admin", { permissions: ["administer"] });
    const allModels = directory.seed("modelSet", "All", { models: [] });
    directory.seed("modelSet", "sales", { models: ["orders"] });
    directory.seed("role", "Admin", { permissionSetId: adminSet, modelSetId: allModels });
    const reconciler = new RoleReconciler(directory);

    const plan = await reconciler.diff(
      rolesConfig({
        modelSets: [{ name: "sales", models: ["orders"] }],
        roles: [{ name: "Admin", permissionSet: "Admin", modelSet: "sales" }],
      }),
    );

    expect(plan.upsertRoles).toEqual([]);
    expect(plan.suppressed.find((item) => item.action === "update")?.fieldChanges).toEqual([
      { field: "modelSet", from: "All", to: "sales" },
    ]);

    await reconciler.apply(plan);

    expect(directory.calls).toEqual([]);
    expect(directory.findByName("role", "Admin")?.fields.modelSetId).toBe(allModels);
  });

  it("deletes roles before the sets they reference", async () => {
    const directory = new InMemoryDirectory();
    const permissionSet = directory.seed("permissionSet", "old_ps", { permissions: ["explore"] });
    const modelSet = directory.seed("modelSet", "old_ms", { models: ["orders"] });
    directory.seed("role", "Old", { permissionSetId: permissionSet, modelSetId: modelSet });
    const reconciler = new RoleReconciler(directory);

    const tallies = await reconciler.apply(await reconciler.diff(rolesConfig()));

    expect(directory.calls).toEqual([
      "delete:role:Old",
      "delete:permissionSet:old_ps",
      "delete:modelSet:old_ms",
    ]);
    expect(tallies.permissionSet.failed).toBe(0);
    expect(tallies.modelSet.failed).toBe(0);
  });

  it("updates a role whose bound set differs by name", async () => {
    const directory = new InMemoryDirectory();
    const first = directory.seed("permissionSet", "P1", { permissions: ["a"] });
    const second = directory.seed("permissionSet", "P2", { permissions: ["a"] });
    const models = directory.seed("modelSet", "M", { models: ["m"] });
    directory.seed("role", "R", { permissionSetId: first, modelSetId: models });
    const reconciler = new RoleReconciler(directory);

    const plan = await reconciler.diff(
      rolesConfig({
        permissionSets: [
          { name: "P1", permissions: ["a"] },
          { name: "P2", permissions: ["a"] },
        ],
        modelSets: [{ name: "M", models: ["m"] }],
        roles: [{ name: "R", permissionSet: "P2", modelSet: "M" }],
      }),
    );

    expect(plan.upsertRoles).toHaveLength(1);
    expect(plan.upsertRoles[0]?.fieldChanges).toEqual([{ field: "permissionSet", from: "P1", to: "P2" }]);

    await reconciler.apply(plan);

    expect(directory.calls).toEqual(["update:role:R"]);
    expect(directory.findByName("role", "R")?.fields.permissionSetId).toBe(second);
  });

  it("fails only the role whose set cannot be resolved", async () => {
    const directory = new InMemoryDirectory();
    const reconciler = new RoleReconciler(directory);

    const plan = await reconciler.diff(
      rolesConfig({
        permissionSets: [{ name: "P", permissions: ["a"] }],
        modelSets: [{ name: "M", models: ["m"] }],
        roles: [
          { name: "Bad", permissionSet: "Missing", modelSet: "M" },
          { name: "Good", permissionSet: "P", modelSet: "M" },
        ],
      }),
    );
    const tallies = await reconciler.apply(plan);

    expect(tallies.role.succeeded).toBe(1);
    expect(tallies.role.failed).toBe(1);
    expect(tallies.role.errors).toEqual([
      {
        kind: "role",
        name: "Bad",
        message: "Permission set 'Missing' not found for role 'Bad'",
        code: "UNRESOLVED_DEPENDENCY",
      },
    ]);
    expect(directory.findByName("role", "Good")).toBeDefined();
    expect(directory.findByName("role", "Bad")).toBeUndefined();
  });

  it("ignores member order when comparing sets", async () => {
    const directory = new InMemoryDirectory();
    directory.seed("permissionSet", "P", { permissions: ["a", "b"] });
    const reconciler = new RoleReconciler(directory);

    const plan = await reconciler.diff(rolesConfig({ permissionSets: [{ name: "P", permissions: ["b", "a"] }] }));

    expect(plan.upsertPermissionSets).toEqual([]);
  });

  it("produces no further changes after applying", async () => {
    const directory = new InMemoryDirectory();
    directory.seed("role", "Stale", {});
    const reconciler = new RoleReconciler(directory);
    const config = rolesConfig({
      permissionSets: [{ name: "P", permissions: ["a", "b"] }],
      modelSets: [{ name: "M", models: ["m"] }],
      roles: [{ name: "R", permissionSet: "P", modelSet: "M" }],
    });

    await reconciler.apply(await reconciler.diff(config));
    const second = await reconciler.diff(config);

    expect([
      ...second.deleteRoles,
      ...second.deletePermissionSets,
      ...second.deleteModelSets,
      ...second.upsertPermissionSets,
      ...second.upsertModelSets,
      ...second.upsertRoles,
    ]).toEqual([]);
  });

  it("reports a listing failure as a FetchError", async () => {
    const directory = new InMemoryDirectory();
    directory.failOn("listAll:role");
    const reconciler = new RoleReconciler(directory);

    await expect(reconciler.diff(rolesConfig())).rejects.toBeInstanceOf(FetchError);
  });
});
