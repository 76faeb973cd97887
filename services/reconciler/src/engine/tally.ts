import type { CollectionKind, DirectoryService } from "../backend/DirectoryService.js";
import type { DiffItem, ItemError, ResourceKind } from "../diff/types.js";
import { ApplyError, ReconcilerError } from "../errors.js";
import { appLogger, normalizeError } from "../observability/logger.js";
import { recordAction } from "../observability/metrics.js";

export interface KindTally {
  kind: ResourceKind;
  succeeded: number;
  failed: number;
  suppressed: number;
  errors: ItemError[];
}

export function createTally(kind: ResourceKind): KindTally {
  return { kind, succeeded: 0, failed: 0, suppressed: 0, errors: [] };
}

const logger = appLogger.child({ component: "apply" });

export function recordFailure(tally: KindTally, name: string, error: ReconcilerError): void {
  tally.failed += 1;
  tally.errors.push({ kind: tally.kind, name, message: error.message, code: error.code });
  recordAction(tally.kind, "failure");
  logger.error(
    { event: "apply.failed", kind: tally.kind, name, err: normalizeError(error) },
    error.message,
  );
}

export function recordSuppressed(tally: KindTally, count: number): void {
  tally.suppressed += count;
  recordAction(tally.kind, "suppressed", count);
}

/**
 * Runs one backend mutation. A failure is recorded against the tally and
 * swallowed so the rest of the batch continues; nothing is retried.
 */
export async function runMutation<T>(
  tally: KindTally,
  name: string,
  description: string,
  mutation: () => Promise<T>,
): Promise<{ ok: true; value: T } | { ok: false }> {
  try {
    const value = await mutation();
    tally.succeeded += 1;
    recordAction(tally.kind, "success");
    logger.info({ event: "apply.succeeded", kind: tally.kind, name }, description);
    return { ok: true, value };
  } catch (error) {
    const failure = error instanceof ReconcilerError ? error : new ApplyError(tally.kind, name, error);
    recordFailure(tally, name, failure);
    return { ok: false };
  }
}

/** Applies create/update items of an additive kind in order. */
export async function applyUpserts(
  directory: DirectoryService,
  kind: CollectionKind,
  items: DiffItem[],
  tally: KindTally = createTally(kind),
): Promise<KindTally> {
  for (const item of items) {
    const id = item.id;
    if (item.action === "create") {
      await runMutation(tally, item.name, `Created ${kind} '${item.name}'`, () =>
        directory.create(kind, item.payload),
      );
    } else if (item.action === "update" && id !== undefined) {
      await runMutation(tally, item.name, `Updated ${kind} '${item.name}'`, () =>
        directory.update(kind, id, item.payload),
      );
    }
  }
  return tally;
}
