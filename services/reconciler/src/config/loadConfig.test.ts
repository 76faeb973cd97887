import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { ConfigValidationError } from "../errors.js";
import { toConnectionResources, toDesiredFolders, toDesiredIdentityProvider, toProjectResources } from "./desired.js";
import { loadDesiredConfig, loadEngineSettings } from "./loadConfig.js";

vi.mock("../observability/logger.js", () => ({
  appLogger: {
    child: () => ({ info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() }),
  },
}));

describe("loadDesiredConfig", () => {
  let configDir: string;

  beforeEach(() => {
    configDir = mkdtempSync(path.join(tmpdir(), "acl-sync-config-"));
  });

  afterEach(() => {
    rmSync(configDir, { recursive: true, force: true });
  });

  function write(file: string, contents: string): void {
    writeFileSync(path.join(configDir, file), contents);
  }

  it("reads every section file and applies defaults", () => {
    write(
      "connections.yaml",
      [
        "connections:",
        "  - name: warehouse",
        "    host: db.internal",
        "    port: 5432",
        "    password:",
        "      source: env",
        "      id: WAREHOUSE_PASSWORD",
      ].join("\n"),
    );
    write("projects.yaml", ["- name: analytics", "  models:", "    - name: orders", "      connections: [warehouse]"].join("\n"));
    write(
      "roles.yaml",
      [
        "permissionSets:",
        "  - name: Analyst PS",
        "    permissions: [see_dashboards]",
        "roles:",
        "  - name: Analyst",
        "    permissionSet: Analyst PS",
        "    modelSet: All",
      ].join("\n"),
    );
    write("oidc.yaml", ["clientId: client-1", "scopes: [openid, email]"].join("\n"));
    write("folders.yaml", ["folders:", "  - name: Finance", "    access:", "      - group: Analysts"].join("\n"));

    const config = loadDesiredConfig(configDir);

    expect(config.connections).toEqual([
      { name: "warehouse", host: "db.internal", port: 5432, password: { source: "env", id: "WAREHOUSE_PASSWORD" } },
    ]);
    expect(config.projects).toEqual([{ name: "analytics", models: [{ name: "orders", connections: ["warehouse"] }] }]);
    expect(config.roles?.modelSets).toEqual([]);
    expect(config.identityProvider).toEqual({ clientId: "client-1", scopes: ["openid", "email"] });
    expect(config.folders).toEqual([{ name: "Finance", access: [{ group: "Analysts", permission: "view" }] }]);
  });

  it("leaves roles unmanaged when roles.yaml is absent", () => {
    write("connections.yaml", "[]");

    const config = loadDesiredConfig(configDir);

    expect(config.roles).toBeUndefined();
    expect(config.identityProvider).toBeUndefined();
    expect(config.connections).toEqual([]);
  });

  it("rejects literal secrets", () => {
    write("connections.yaml", ["- name: warehouse", "  password: hunter-placeholder"].join("\n"));

    expect(() => loadDesiredConfig(configDir)).toThrow(ConfigValidationError);
  });

  it("reports the file when YAML cannot be parsed", () => {
    write("folders.yaml", "folders: [unclosed");

    try {
      loadDesiredConfig(configDir);
      expect.unreachable("expected a ConfigValidationError");
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigValidationError);
      if (error instanceof ConfigValidationError) {
        expect(error.problems[0]?.startsWith("folders.yaml: ")).toBe(true);
      }
    }
  });
});

describe("loadEngineSettings", () => {
  it("falls back to defaults", () => {
    expect(loadEngineSettings({})).toEqual({
      rootFolderId: "1",
      rootFolderName: "Shared",
      devWorkspace: "dev",
      strictPrincipals: false,
    });
  });

  it("reads overrides from the environment", () => {
    const settings = loadEngineSettings({
      ACL_SYNC_ROOT_FOLDER_ID: "42",
      ACL_SYNC_DEV_WORKSPACE: "draft",
      ACL_SYNC_STRICT_PRINCIPALS: "yes",
    });

    expect(settings).toMatchObject({ rootFolderId: "42", devWorkspace: "draft", strictPrincipals: true });
  });
});

describe("desired-state mapping", () => {
  it("splits connection secrets from comparable fields", () => {
    expect(
      toConnectionResources([
        { name: "warehouse", host: "db.internal", ssl: true, password: { source: "file", path: "/run/secrets/db" } },
      ]),
    ).toEqual([
      {
        name: "warehouse",
        fields: { host: "db.internal", ssl: true },
        secrets: { password: { source: "file", path: "/run/secrets/db" } },
      },
    ]);
  });

  it("flattens projects into projects and model bindings", () => {
    expect(toProjectResources([{ name: "analytics", models: [{ name: "orders", connections: ["warehouse"] }] }])).toEqual({
      projects: [{ name: "analytics", fields: {} }],
      modelBindings: [{ name: "orders", fields: { project: "analytics", connections: ["warehouse"] } }],
    });
  });

  it("maps identity provider names onto directory fields", () => {
    const desired = toDesiredIdentityProvider({
      clientId: "client-1",
      clientSecret: { source: "env", id: "OIDC_SECRET" },
      userAttributeMap: { email: "email", firstName: "given_name" },
    });

    expect(desired).toEqual({
      fields: { identifier: "client-1", userAttributeMapEmail: "email", userAttributeMapFirstName: "given_name" },
      secrets: { secret: { source: "env", id: "OIDC_SECRET" } },
      mirroredGroups: undefined,
    });
  });

  it("maps folder access to principals", () => {
    expect(
      toDesiredFolders([
        {
          name: "Finance",
          parent: "Departments",
          access: [
            { group: "Analysts", permission: "edit" },
            { user: "cfo@example.com", permission: "view" },
          ],
        },
      ]),
    ).toEqual([
      {
        name: "Finance",
        parent: "Departments",
        access: [
          { principalType: "group", principal: "Analysts", permission: "edit" },
          { principalType: "user", principal: "cfo@example.com", permission: "view" },
        ],
      },
    ]);
  });
});
