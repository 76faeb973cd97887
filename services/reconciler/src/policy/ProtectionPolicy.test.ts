import { describe, expect, it, vi } from "vitest";

import type { DiffItem } from "../diff/types.js";
import { filterProtected, isProtected } from "./ProtectionPolicy.js";

vi.mock("../observability/logger.js", () => ({
  appLogger: {
    child: () => ({ info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() }),
  },
}));

function item(partial: Partial<DiffItem> & Pick<DiffItem, "kind" | "name" | "action">): DiffItem {
  return { fieldChanges: [], payload: {}, ...partial };
}

describe("ProtectionPolicy", () => {
  it("protects built-in names from deletion by exact match", () => {
    expect(isProtected("role", "Admin", "delete")).toBe(true);
    expect(isProtected("permissionSet", "Support Basic Editor", "delete")).toBe(true);
    expect(isProtected("modelSet", "All", "delete")).toBe(true);
    expect(isProtected("role", "admin", "delete")).toBe(false);
    expect(isProtected("role", "Admin*", "delete")).toBe(false);
    expect(isProtected("role", "Analyst", "delete")).toBe(false);
  });

  it("scopes names to their kind", () => {
    expect(isProtected("modelSet", "Admin", "delete")).toBe(false);
    expect(isProtected("connection", "All", "delete")).toBe(false);
  });

  it("only blocks updates that rebind the super-admin role", () => {
    expect(isProtected("role", "Admin", "update")).toBe(true);
    expect(isProtected("permissionSet", "Admin", "update")).toBe(false);
    expect(isProtected("role", "Viewer", "update")).toBe(false);
    expect(isProtected("role", "Admin", "create")).toBe(false);
  });

  it("splits a batch into allowed and suppressed items", () => {
    const decision = filterProtected([
      item({ kind: "role", name: "Admin", action: "delete", id: "1" }),
      item({ kind: "role", name: "Analyst", action: "delete", id: "7" }),
      item({ kind: "role", name: "Admin", action: "update", id: "1" }),
      item({ kind: "modelSet", name: "sales", action: "create" }),
    ]);

    expect(decision.allowed.map((entry) => `${entry.action}:${entry.name}`)).toEqual([
      "delete:Analyst",
      "create:sales",
    ]);
    expect(decision.suppressed.map((entry) => `${entry.action}:${entry.name}`)).toEqual([
      "delete:Admin",
      "update:Admin",
    ]);
  });
});
