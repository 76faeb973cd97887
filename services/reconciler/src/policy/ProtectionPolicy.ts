import type { DiffAction, DiffItem, ResourceKind } from "../diff/types.js";
import { appLogger } from "../observability/logger.js";

/**
 * Built-in resources that reconciliation must never delete. Matching is by
 * exact name. These are compiled in so that editing the desired state cannot
 * lift the protection.
 */
export const PROTECTED_NAMES: Readonly<Partial<Record<ResourceKind, ReadonlySet<string>>>> = {
  permissionSet: new Set([
    "Admin",
    "Support Basic Editor",
    "Support Advanced Editor",
    "Customer Engineer Advanced Editor",
    "Gemini",
    "LookML Dashboard User",
    "User who can't view LookML",
  ]),
  modelSet: new Set(["All"]),
  role: new Set(["Admin", "Developer", "User", "Viewer"]),
};

/** The super-admin role keeps its set bindings; updates to it are suppressed. */
export const SUPER_ADMIN_ROLE = "Admin";

export type ProtectionDecision = {
  allowed: DiffItem[];
  suppressed: DiffItem[];
};

export function isProtectedName(kind: ResourceKind, name: string): boolean {
  return PROTECTED_NAMES[kind]?.has(name) ?? false;
}

export function isProtected(kind: ResourceKind, name: string, action: DiffAction): boolean {
  if (action === "delete") {
    return isProtectedName(kind, name);
  }
  if (action === "update") {
    return kind === "role" && name === SUPER_ADMIN_ROLE;
  }
  return false;
}

const logger = appLogger.child({ component: "ProtectionPolicy" });

export function logSuppressed(item: Pick<DiffItem, "kind" | "name" | "action">): void {
  logger.info(
    { event: "protection.suppressed", kind: item.kind, name: item.name, action: item.action },
    `Suppressed ${item.action} of protected ${item.kind} '${item.name}'`,
  );
}

/**
 * Splits a batch into the items that may run and the protected ones, which are
 * downgraded to no-ops.
 */
export function filterProtected(items: DiffItem[]): ProtectionDecision {
  const allowed: DiffItem[] = [];
  const suppressed: DiffItem[] = [];
  for (const item of items) {
    if (isProtected(item.kind, item.name, item.action)) {
      logSuppressed(item);
      suppressed.push(item);
      continue;
    }
    allowed.push(item);
  }
  return { allowed, suppressed };
}
