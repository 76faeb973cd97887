import { describeAccessChange } from "../access/AccessReconciler.js";
import { describeFieldChange } from "../diff/compare.js";
import type { DiffItem } from "../diff/types.js";
import type { FolderPlanItem } from "../folders/FolderReconciler.js";

export function describeDiffItem(item: DiffItem): string {
  switch (item.action) {
    case "create":
      return `[+] CREATE ${item.kind} '${item.name}'`;
    case "update":
      return `[~] UPDATE ${item.kind} '${item.name}': ${item.fieldChanges.map(describeFieldChange).join(", ")}`;
    case "delete":
      return `[-] DELETE ${item.kind} '${item.name}'`;
  }
}

export function describeSuppressed(item: DiffItem): string {
  return `[=] KEEP protected ${item.kind} '${item.name}' (${item.action} suppressed)`;
}

export function describeFolderItem(item: FolderPlanItem): string {
  if (item.action === "create") {
    const grants = item.access.map((entry) => `${entry.principalType} '${entry.principal}' (${entry.permission})`);
    const suffix = grants.length > 0 ? ` with access ${grants.join(", ")}` : "";
    return `[+] CREATE folder '${item.name}' under '${item.parent}'${suffix}`;
  }
  return `[~] ACCESS folder '${item.name}': ${item.changes.map(describeAccessChange).join("; ")}`;
}
