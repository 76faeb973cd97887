import type { FieldSemantic, KindSchema } from "./fieldSchema.js";
import type { FieldChange, FieldMap, FieldValue } from "./types.js";

type Comparable = FieldValue | undefined;

function toNumber(value: Comparable): number | undefined {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : undefined;
  }
  if (typeof value === "string" && value.trim().length > 0) {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
}

function toList(value: Comparable): FieldValue[] {
  if (Array.isArray(value)) {
    return value;
  }
  return value === undefined || value === null ? [] : [value];
}

function canonical(value: Comparable): string {
  return value === undefined ? "null" : JSON.stringify(value);
}

function isPresent(value: Comparable): boolean {
  return value !== undefined && value !== null;
}

export function valuesEqual(semantic: FieldSemantic, live: Comparable, desired: Comparable): boolean {
  switch (semantic) {
    case "numeric": {
      const left = toNumber(live);
      const right = toNumber(desired);
      if (left === undefined || right === undefined) {
        return !isPresent(live) && !isPresent(desired);
      }
      return left === right;
    }
    case "unorderedList": {
      const left = toList(live).map(canonical).sort();
      const right = toList(desired).map(canonical).sort();
      return left.length === right.length && left.every((entry, index) => entry === right[index]);
    }
    case "orderedList": {
      const left = toList(live).map(canonical);
      const right = toList(desired).map(canonical);
      return left.length === right.length && left.every((entry, index) => entry === right[index]);
    }
    case "scalar":
      if (!isPresent(live) || !isPresent(desired)) {
        return !isPresent(live) && !isPresent(desired);
      }
      return canonical(live) === canonical(desired);
  }
}

/**
 * Compares the desired fields a schema declares against the live record.
 * Fields not declared by the schema, and fields on its ignore list, are
 * skipped; live-only fields are never inspected.
 */
export function compareFields(schema: KindSchema, desired: FieldMap, live: FieldMap): FieldChange[] {
  const changes: FieldChange[] = [];
  for (const [field, to] of Object.entries(desired)) {
    if (schema.ignore.includes(field)) {
      continue;
    }
    const semantic = schema.fields[field];
    if (!semantic) {
      continue;
    }
    const from = live[field];
    if (!valuesEqual(semantic, from, to)) {
      changes.push({ field, from, to });
    }
  }
  return changes;
}

export function formatFieldValue(value: Comparable): string {
  if (value === undefined || value === null) {
    return "none";
  }
  if (Array.isArray(value)) {
    return `[${value.map(formatFieldValue).join(", ")}]`;
  }
  if (typeof value === "object") {
    return JSON.stringify(value);
  }
  return String(value);
}

export function describeFieldChange(change: FieldChange): string {
  return `${change.field}: '${formatFieldValue(change.from)}' -> '${formatFieldValue(change.to)}'`;
}
