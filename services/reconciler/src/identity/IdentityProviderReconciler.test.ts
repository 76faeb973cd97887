import { describe, expect, it, vi } from "vitest";

import { InMemoryDirectory } from "../backend/InMemoryDirectory.js";
import { describeFieldChange } from "../diff/compare.js";
import { FetchError } from "../errors.js";
import { SecretResolver } from "../secrets/SecretResolver.js";
import { IdentityProviderReconciler } from "./IdentityProviderReconciler.js";

vi.mock("../observability/logger.js", () => ({
  appLogger: {
    child: () => ({ info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() }),
  },
  normalizeError: (error: unknown) => ({ message: String(error) }),
}));

function setup(env: NodeJS.ProcessEnv = { OIDC_SECRET: "test-secret" }) {
  const directory = new InMemoryDirectory();
  const reconciler = new IdentityProviderReconciler(directory, new SecretResolver(env));
  return { directory, reconciler };
}

const secrets = { secret: { source: "env" as const, id: "OIDC_SECRET" } };

describe("IdentityProviderReconciler", () => {
  it("treats reordered scopes as unchanged and ignores the live secret", async () => {
    const { directory, reconciler } = setup();
    directory.setIdentityProvider({ identifier: "client_123", secret: "stored", scopes: ["email", "profile"] });

    const plan = await reconciler.diff({
      fields: { identifier: "client_123", scopes: ["profile", "email"] },
      secrets,
    });

    expect(plan.item).toBeUndefined();
    expect(plan.errors).toEqual([]);
  });

  it("updates changed settings with the resolved secret", async () => {
    const { directory, reconciler } = setup();
    directory.setIdentityProvider({ identifier: "client_123", issuer: "https://idp.example.com" });

    const plan = await reconciler.diff({ fields: { identifier: "client_new" }, secrets });

    expect(plan.item?.fieldChanges.map(describeFieldChange)).toEqual(["identifier: 'client_123' -> 'client_new'"]);

    const tally = await reconciler.apply(plan);

    expect(tally.succeeded).toBe(1);
    expect(directory.calls).toEqual(["updateIdentityProvider"]);
    expect(await directory.getIdentityProvider()).toEqual({
      identifier: "client_new",
      issuer: "https://idp.example.com",
      secret: "test-secret",
    });
  });

  it("compares mirrored groups by role name and keeps group ids", async () => {
    const { directory, reconciler } = setup();
    const adminId = directory.seed("role", "Admin", {});
    const userId = directory.seed("role", "User", {});
    directory.setIdentityProvider({ groups: [{ id: "g1", name: "Okta_Admins", roleIds: [adminId] }] });

    const plan = await reconciler.diff({
      fields: {},
      secrets,
      mirroredGroups: [{ name: "Okta_Admins", roles: ["User", "Admin"] }],
    });

    expect(plan.item?.fieldChanges).toEqual([
      {
        field: "mirroredGroups",
        from: [{ name: "Okta_Admins", roles: ["Admin"] }],
        to: [{ name: "Okta_Admins", roles: ["Admin", "User"] }],
      },
    ]);

    await reconciler.apply(plan);

    const live = await directory.getIdentityProvider();
    expect(live.groups).toEqual([{ id: "g1", name: "Okta_Admins", roleIds: [userId, adminId] }]);
  });

  it("resolves roles that only exist by the time of apply", async () => {
    const { directory, reconciler } = setup();

    const plan = await reconciler.diff({
      fields: {},
      secrets,
      mirroredGroups: [{ name: "Analysts", roles: ["Analyst"] }],
    });
    const analystId = directory.seed("role", "Analyst", {});
    await reconciler.apply(plan);

    const live = await directory.getIdentityProvider();
    expect(live.groups).toEqual([{ id: expect.any(String), name: "Analysts", roleIds: [analystId] }]);
  });

  it("fails the update when a mirrored role cannot be resolved", async () => {
    const { directory, reconciler } = setup();

    const plan = await reconciler.diff({
      fields: {},
      secrets,
      mirroredGroups: [{ name: "Analysts", roles: ["Ghost"] }],
    });
    const tally = await reconciler.apply(plan);

    expect(tally.failed).toBe(1);
    expect(tally.errors).toEqual([
      {
        kind: "identityProvider",
        name: "identity provider",
        message: "Role 'Ghost' not found for mirrored group 'Analysts'",
        code: "UNRESOLVED_DEPENDENCY",
      },
    ]);
    expect(directory.calls).toEqual([]);
  });

  it("reports a missing client secret instead of planning an update", async () => {
    const { directory, reconciler } = setup({});
    directory.setIdentityProvider({ identifier: "client_123" });

    const plan = await reconciler.diff({ fields: { identifier: "client_new" }, secrets });

    expect(plan.item).toBeUndefined();
    expect(plan.errors).toEqual([
      {
        kind: "identityProvider",
        name: "identity provider",
        message: "Secret env:OIDC_SECRET is not set",
        code: "SECRET_MISSING",
      },
    ]);
  });

  it("raises a FetchError when the settings cannot be read", async () => {
    const { directory, reconciler } = setup();
    directory.failOn("getIdentityProvider");

    await expect(reconciler.diff({ fields: {} })).rejects.toBeInstanceOf(FetchError);
  });
});
