export type ResourceKind =
  | "connection"
  | "project"
  | "modelBinding"
  | "permissionSet"
  | "modelSet"
  | "role"
  | "identityProvider"
  | "folder";

export type DiffAction = "create" | "update" | "delete";

export type FieldScalar = string | number | boolean | null;

export type FieldValue = FieldScalar | FieldValue[] | { [key: string]: FieldValue };

export type FieldMap = Record<string, FieldValue>;

export type SecretRef =
  | { source: "env"; id: string }
  | { source: "file"; path: string };

/**
 * One entry of desired state, keyed by `name`. Secret-bearing fields are never
 * listed in `fields`; they are carried as pointers in `secrets` and only
 * resolved when a create or update payload is built.
 */
export interface DesiredResource {
  name: string;
  fields: FieldMap;
  secrets?: Record<string, SecretRef>;
}

export interface LiveResource {
  id: string;
  name: string;
  fields: FieldMap;
}

export interface FieldChange {
  field: string;
  from: FieldValue | undefined;
  to: FieldValue | undefined;
}

export interface DiffItem {
  action: DiffAction;
  kind: ResourceKind;
  name: string;
  /** Backend id; absent for creates. */
  id?: string;
  fieldChanges: FieldChange[];
  /** Full resolved desired field map for create/update, empty for delete. */
  payload: FieldMap;
}

export interface ItemError {
  kind: ResourceKind;
  name: string;
  message: string;
  code: string;
}

export interface KindDiff<TItem = DiffItem> {
  items: TItem[];
  errors: ItemError[];
}

export function emptyKindDiff<TItem = DiffItem>(): KindDiff<TItem> {
  return { items: [], errors: [] };
}
