import {
  ConfigValidationError,
  ReconciliationEngine,
  hasFailures,
  loadDesiredConfig,
  loadEngineSettings,
  renderMetrics,
  type DirectoryService,
  type ReconciliationPlan,
} from "@acl-sync/reconciler";

import { HttpDirectory, resolveDirectoryConfig } from "../directory.js";
import { logger } from "../logger.js";
import { formatApplyReport, formatPlan, printErrorLine, printLine } from "../output.js";

export type ReconcileMode = "check" | "apply";

export interface ReconcileOptions {
  mode: ReconcileMode;
  configDir: string;
  env?: NodeJS.ProcessEnv;
  /** Defaults to the HTTP directory described by DIRECTORY_URL. */
  directory?: DirectoryService;
  /** Print the action counters after an apply. */
  metrics?: boolean;
}

function planHasErrors(plan: ReconciliationPlan): boolean {
  return plan.reports.some((report) => report.fetchError !== undefined || report.errors.length > 0);
}

/**
 * Plans against live state, prints the plan and, in apply mode, executes it.
 * Resolves to the process exit code, which is 0 only when every managed kind
 * was planned cleanly and every action succeeded.
 */
export async function runReconcile(options: ReconcileOptions): Promise<number> {
  const env = options.env ?? process.env;
  const directory = options.directory ?? new HttpDirectory(resolveDirectoryConfig(env));

  let engine: ReconciliationEngine;
  let plan: ReconciliationPlan;
  try {
    engine = new ReconciliationEngine(directory, loadEngineSettings(env));
    plan = await engine.plan(loadDesiredConfig(options.configDir));
  } catch (error) {
    if (error instanceof ConfigValidationError) {
      printErrorLine("Configuration is invalid:");
      for (const problem of error.problems) {
        printErrorLine(`  - ${problem}`);
      }
      return 1;
    }
    throw error;
  }

  for (const line of formatPlan(plan)) {
    printLine(line);
  }
  const planFailed = planHasErrors(plan);

  if (options.mode === "check") {
    return planFailed ? 1 : 0;
  }

  logger.info({ event: "cli.apply", configDir: options.configDir }, "Applying planned changes");
  printLine("Applying changes...");
  const result = await engine.apply(plan);
  for (const line of formatApplyReport(result)) {
    printLine(line);
  }
  if (options.metrics) {
    const exposition = await renderMetrics();
    for (const line of exposition.trimEnd().split("\n")) {
      printLine(line);
    }
  }
  return planFailed || hasFailures(result) ? 1 : 0;
}
