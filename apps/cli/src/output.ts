import {
  countChanges,
  type ApplyReport,
  type ItemError,
  type ReconciliationPlan,
} from "@acl-sync/reconciler";

function formatLine(parts: string[]): string {
  return parts.filter(segment => segment.length > 0).join(" ");
}

export function printLine(...parts: string[]): void {
  process.stdout.write(`${formatLine(parts)}\n`);
}

export function printErrorLine(...parts: string[]): void {
  process.stderr.write(`${formatLine(parts)}\n`);
}

function formatItemError(error: ItemError): string {
  return `  ! ${error.name}: ${error.message}`;
}

/** One section per managed kind, in apply order, followed by a summary line. */
export function formatPlan(plan: ReconciliationPlan): string[] {
  const lines: string[] = [];
  for (const report of plan.reports) {
    lines.push(`--- ${report.kind} ---`);
    if (report.fetchError !== undefined) {
      lines.push(`  ! skipped: ${report.fetchError}`);
      continue;
    }
    if (report.changes.length === 0 && report.errors.length === 0) {
      lines.push("  No changes detected.");
    }
    lines.push(...report.changes.map((change) => `  ${change}`));
    lines.push(...report.errors.map(formatItemError));
    lines.push(...report.suppressed.map((line) => `  ${line}`));
  }
  const total = countChanges(plan);
  lines.push(`${total} change${total === 1 ? "" : "s"} planned.`);
  return lines;
}

export function formatApplyReport(report: ApplyReport): string[] {
  const lines: string[] = [];
  for (const tally of report.tallies) {
    lines.push(`${tally.kind}: ${tally.succeeded} succeeded, ${tally.failed} failed, ${tally.suppressed} suppressed`);
    lines.push(...tally.errors.map(formatItemError));
  }
  return lines;
}
