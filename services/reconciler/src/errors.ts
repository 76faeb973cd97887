import type { ResourceKind } from "./diff/types.js";

export type ReconcilerErrorCode =
  | "FETCH_FAILED"
  | "CONFIG_INVALID"
  | "UNRESOLVED_DEPENDENCY"
  | "APPLY_FAILED"
  | "SECRET_MISSING";

export class ReconcilerError extends Error {
  readonly code: ReconcilerErrorCode;

  constructor(message: string, code: ReconcilerErrorCode, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ReconcilerError";
    this.code = code;
  }
}

/** Listing live state for a kind failed; the kind is skipped for this run. */
export class FetchError extends ReconcilerError {
  readonly kind: ResourceKind;

  constructor(kind: ResourceKind, cause: unknown) {
    super(`Failed to fetch live ${kind} state: ${describeCause(cause)}`, "FETCH_FAILED", { cause });
    this.name = "FetchError";
    this.kind = kind;
  }
}

export class ConfigValidationError extends ReconcilerError {
  readonly problems: string[];

  constructor(problems: string[]) {
    super(
      `Configuration validation failed:\n${problems.map((problem) => `- ${problem}`).join("\n")}`,
      "CONFIG_INVALID",
    );
    this.name = "ConfigValidationError";
    this.problems = problems;
  }
}

export class ResolutionError extends ReconcilerError {
  readonly kind: ResourceKind;
  readonly resourceName: string;

  constructor(kind: ResourceKind, resourceName: string, message: string) {
    super(message, "UNRESOLVED_DEPENDENCY");
    this.name = "ResolutionError";
    this.kind = kind;
    this.resourceName = resourceName;
  }
}

export class ApplyError extends ReconcilerError {
  readonly kind: ResourceKind;
  readonly resourceName: string;

  constructor(kind: ResourceKind, resourceName: string, cause: unknown) {
    super(`Failed to apply ${kind} '${resourceName}': ${describeCause(cause)}`, "APPLY_FAILED", { cause });
    this.name = "ApplyError";
    this.kind = kind;
    this.resourceName = resourceName;
  }
}

export class MissingSecretError extends ReconcilerError {
  readonly reference: string;

  constructor(reference: string) {
    super(`Secret ${reference} is not set`, "SECRET_MISSING");
    this.name = "MissingSecretError";
    this.reference = reference;
  }
}

export function describeCause(cause: unknown): string {
  if (cause instanceof Error) {
    return cause.message;
  }
  return String(cause);
}
