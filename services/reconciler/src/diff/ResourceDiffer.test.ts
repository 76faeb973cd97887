import { describe, expect, it, vi } from "vitest";

import { InMemoryDirectory } from "../backend/InMemoryDirectory.js";
import { FetchError } from "../errors.js";
import { SecretResolver } from "../secrets/SecretResolver.js";
import { CONNECTION_SCHEMA } from "./fieldSchema.js";
import { ResourceDiffer, loadLive } from "./ResourceDiffer.js";

vi.mock("../observability/logger.js", () => ({
  appLogger: {
    child: () => ({ info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() }),
  },
}));

const passwordRef = { source: "env" as const, id: "DB_PASSWORD" };

describe("ResourceDiffer", () => {
  it("creates resources that are absent live", () => {
    const differ = new ResourceDiffer(CONNECTION_SCHEMA, new SecretResolver({}));

    const result = differ.diff([{ name: "a", fields: { host: "h" } }], []);

    expect(result.errors).toEqual([]);
    expect(result.items).toEqual([
      { action: "create", kind: "connection", name: "a", fieldChanges: [], payload: { name: "a", host: "h" } },
    ]);
  });

  it("updates with the full resolved payload when a field drifts", () => {
    const differ = new ResourceDiffer(CONNECTION_SCHEMA, new SecretResolver({ DB_PASSWORD: "test-secret" }));

    const result = differ.diff(
      [{ name: "warehouse", fields: { host: "new.internal", port: 5432 }, secrets: { password: passwordRef } }],
      [{ id: "7", name: "warehouse", fields: { host: "old.internal", port: 5432 } }],
    );

    expect(result.items).toEqual([
      {
        action: "update",
        kind: "connection",
        name: "warehouse",
        id: "7",
        fieldChanges: [{ field: "host", from: "old.internal", to: "new.internal" }],
        payload: { name: "warehouse", host: "new.internal", port: 5432, password: "test-secret" },
      },
    ]);
  });

  it("compares numeric fields by value", () => {
    const differ = new ResourceDiffer(CONNECTION_SCHEMA, new SecretResolver({}));

    const result = differ.diff(
      [{ name: "warehouse", fields: { port: 5432, maxConnections: 10 } }],
      [{ id: "7", name: "warehouse", fields: { port: "5432", maxConnections: 10 } }],
    );

    expect(result.items).toEqual([]);
  });

  it("ignores fields the kind does not declare", () => {
    const differ = new ResourceDiffer(CONNECTION_SCHEMA, new SecretResolver({}));

    const result = differ.diff(
      [{ name: "warehouse", fields: { host: "h", createdAt: "2024-01-01", comment: "x" } }],
      [{ id: "7", name: "warehouse", fields: { host: "h", createdAt: "2023-05-05" } }],
    );

    expect(result.items).toEqual([]);
  });

  it("produces nothing when only a secret value rotated", () => {
    const differ = new ResourceDiffer(CONNECTION_SCHEMA, new SecretResolver({ DB_PASSWORD: "rotated-secret" }));

    const result = differ.diff(
      [{ name: "warehouse", fields: { host: "h" }, secrets: { password: passwordRef } }],
      [{ id: "7", name: "warehouse", fields: { host: "h" } }],
    );

    expect(result).toEqual({ items: [], errors: [] });
  });

  it("fails only the item whose secret is missing", () => {
    const differ = new ResourceDiffer(CONNECTION_SCHEMA, new SecretResolver({}));

    const result = differ.diff(
      [
        { name: "a", fields: { host: "h" }, secrets: { password: passwordRef } },
        { name: "b", fields: { host: "h" } },
      ],
      [],
    );

    expect(result.items.map((item) => item.name)).toEqual(["b"]);
    expect(result.errors).toEqual([
      { kind: "connection", name: "a", message: "Secret env:DB_PASSWORD is not set", code: "SECRET_MISSING" },
    ]);
  });

  it("never schedules deletes for live-only resources", () => {
    const differ = new ResourceDiffer(CONNECTION_SCHEMA, new SecretResolver({}));

    const result = differ.diff([], [{ id: "7", name: "legacy", fields: { host: "h" } }]);

    expect(result.items).toEqual([]);
  });

  it("wraps listing failures in a FetchError", async () => {
    const directory = new InMemoryDirectory();
    directory.failOn("listAll:connection");

    await expect(loadLive(directory, "connection")).rejects.toBeInstanceOf(FetchError);
  });
});
