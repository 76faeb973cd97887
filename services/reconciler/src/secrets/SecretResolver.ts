import { MissingSecretError } from "../errors.js";
import type { FieldMap, SecretRef } from "../diff/types.js";
import { readFileValue, resolveEnv } from "../utils/env.js";

export function describeSecretRef(ref: SecretRef): string {
  return ref.source === "env" ? `env:${ref.id}` : `file:${ref.path}`;
}

/**
 * Resolves secret pointers from desired state. Values are read on every call;
 * nothing is cached between payloads or runs.
 */
export class SecretResolver {
  private readonly env: NodeJS.ProcessEnv;

  constructor(env: NodeJS.ProcessEnv = process.env) {
    this.env = env;
  }

  resolve(ref: SecretRef): string {
    const value = ref.source === "env" ? resolveEnv(ref.id, undefined, this.env) : readFileValue(ref.path);
    if (value === undefined) {
      throw new MissingSecretError(describeSecretRef(ref));
    }
    return value;
  }

  /**
   * Returns a copy of `fields` with every secret pointer resolved into its
   * payload field. Throws MissingSecretError on the first unresolvable pointer.
   */
  buildPayload(fields: FieldMap, secrets: Record<string, SecretRef> | undefined): FieldMap {
    const payload: FieldMap = { ...fields };
    for (const [field, ref] of Object.entries(secrets ?? {})) {
      payload[field] = this.resolve(ref);
    }
    return payload;
  }
}
