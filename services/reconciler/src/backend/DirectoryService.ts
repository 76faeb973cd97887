import type { FieldMap, LiveResource, ResourceKind } from "../diff/types.js";

export type PrincipalType = "group" | "user";

export interface AccessEntry {
  entryId: string;
  principalType: PrincipalType;
  principalId: string;
  permission: string;
}

export type NewAccessEntry = Omit<AccessEntry, "entryId">;

/** Kinds stored as named collections; the identity provider is a singleton. */
export type CollectionKind = Exclude<ResourceKind, "identityProvider">;

/**
 * The backend the engine reconciles against. Field names inside payloads are
 * owned by the implementation; the engine only relies on `name` and the
 * fields declared by each kind's schema.
 *
 * Folder records carry `parentId` and `inherits` in their fields.
 */
export interface DirectoryService {
  listAll(kind: CollectionKind): Promise<LiveResource[]>;
  get(kind: CollectionKind, id: string): Promise<LiveResource | undefined>;
  create(kind: CollectionKind, payload: FieldMap): Promise<string>;
  update(kind: CollectionKind, id: string, payload: FieldMap): Promise<void>;
  delete(kind: CollectionKind, id: string): Promise<void>;

  listAccessEntries(containerId: string): Promise<AccessEntry[]>;
  addAccessEntry(containerId: string, entry: NewAccessEntry): Promise<string>;
  updateAccessEntry(entryId: string, permission: string): Promise<void>;
  removeAccessEntry(entryId: string): Promise<void>;
  setInheritance(containerId: string, inherits: boolean): Promise<void>;

  findGroupId(name: string): Promise<string | undefined>;
  findUserId(email: string): Promise<string | undefined>;

  /** Catalog of permission names the backend accepts. */
  listPermissions(): Promise<string[]>;

  getWorkspace(): Promise<string>;
  setWorkspace(workspaceId: string): Promise<void>;

  getIdentityProvider(): Promise<FieldMap>;
  updateIdentityProvider(payload: FieldMap): Promise<void>;
}
