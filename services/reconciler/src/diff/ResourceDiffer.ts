import type { CollectionKind, DirectoryService } from "../backend/DirectoryService.js";
import { FetchError, ReconcilerError } from "../errors.js";
import { appLogger } from "../observability/logger.js";
import type { SecretResolver } from "../secrets/SecretResolver.js";
import { compareFields } from "./compare.js";
import type { KindSchema } from "./fieldSchema.js";
import type { DesiredResource, DiffItem, FieldMap, KindDiff, LiveResource } from "./types.js";

/**
 * Lists live records for a kind, converting any backend failure into a
 * FetchError so the caller can skip just that kind.
 */
export async function loadLive(directory: DirectoryService, kind: CollectionKind): Promise<LiveResource[]> {
  try {
    return await directory.listAll(kind);
  } catch (error) {
    throw new FetchError(kind, error);
  }
}

export function indexByName<T extends { name: string }>(records: T[]): Map<string, T> {
  return new Map(records.map((record) => [record.name, record]));
}

/**
 * Generic create/update differ for additive kinds. Removing an entry from the
 * desired state never produces a delete here.
 */
export class ResourceDiffer {
  private readonly logger = appLogger.child({ component: "ResourceDiffer" });

  constructor(
    private readonly schema: KindSchema,
    private readonly secrets: SecretResolver,
  ) {}

  get kind(): KindSchema["kind"] {
    return this.schema.kind;
  }

  diff(desired: DesiredResource[], live: LiveResource[]): KindDiff {
    const result: KindDiff = { items: [], errors: [] };
    const liveByName = indexByName(live);

    for (const resource of desired) {
      const existing = liveByName.get(resource.name);
      const fieldChanges = existing ? compareFields(this.schema, resource.fields, existing.fields) : [];
      if (existing && fieldChanges.length === 0) {
        continue;
      }

      let payload: FieldMap;
      try {
        payload = this.buildPayload(resource);
      } catch (error) {
        if (!(error instanceof ReconcilerError)) {
          throw error;
        }
        this.logger.warn(
          { event: "diff.payload_failed", kind: this.kind, name: resource.name, code: error.code },
          error.message,
        );
        result.errors.push({ kind: this.kind, name: resource.name, message: error.message, code: error.code });
        continue;
      }

      const item: DiffItem = existing
        ? { action: "update", kind: this.kind, name: resource.name, id: existing.id, fieldChanges, payload }
        : { action: "create", kind: this.kind, name: resource.name, fieldChanges: [], payload };
      result.items.push(item);
    }

    return result;
  }

  private buildPayload(resource: DesiredResource): FieldMap {
    return this.secrets.buildPayload({ name: resource.name, ...resource.fields }, resource.secrets);
  }
}
