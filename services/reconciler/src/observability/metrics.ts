import { Counter, register } from "prom-client";

import type { ResourceKind } from "../diff/types.js";

export const ACTIONS_TOTAL_NAME = "acl_sync_actions_total";

export type ActionOutcome = "success" | "failure" | "suppressed";

function getOrCreateActionCounter(): Counter<string> {
  const existing = register.getSingleMetric(ACTIONS_TOTAL_NAME);
  if (existing instanceof Counter) {
    return existing;
  }
  return new Counter({
    name: ACTIONS_TOTAL_NAME,
    help: "Reconciliation actions executed against the directory, by kind and outcome",
    labelNames: ["kind", "outcome"],
  });
}

const actionCounter = getOrCreateActionCounter();

export function recordAction(kind: ResourceKind, outcome: ActionOutcome, count = 1): void {
  if (count <= 0) {
    return;
  }
  actionCounter.labels({ kind, outcome }).inc(count);
}

export function resetMetrics(): void {
  actionCounter.reset();
}

/** Prometheus text exposition of every metric on the default registry. */
export function renderMetrics(): Promise<string> {
  return register.metrics();
}
