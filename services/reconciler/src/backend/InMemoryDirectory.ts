import type { FieldMap, FieldValue, LiveResource } from "../diff/types.js";
import type {
  AccessEntry,
  CollectionKind,
  DirectoryService,
  NewAccessEntry,
} from "./DirectoryService.js";

export type InMemoryDirectoryOptions = {
  rootFolderId?: string;
  rootFolderName?: string;
  permissions?: string[];
  workspace?: string;
  identityProvider?: FieldMap;
};

type StoredAccess = AccessEntry & { containerId: string };

/**
 * Directory kept entirely in process. It enforces the referential rules of the
 * real backend (a set bound to a role cannot be deleted, a role cannot bind a
 * missing set) and the folder inheritance model, and records every mutation
 * in `calls` so callers can assert ordering.
 */
export class InMemoryDirectory implements DirectoryService {
  readonly calls: string[] = [];
  readonly rootFolderId: string;

  private nextId = 100;
  private readonly records = new Map<CollectionKind, Map<string, LiveResource>>();
  private readonly access = new Map<string, StoredAccess>();
  private readonly groups = new Map<string, string>();
  private readonly users = new Map<string, string>();
  private readonly failures = new Set<string>();
  private permissions: string[];
  private workspace: string;
  private identityProvider: FieldMap;

  constructor(options: InMemoryDirectoryOptions = {}) {
    this.rootFolderId = options.rootFolderId ?? "1";
    this.permissions = [...(options.permissions ?? [])];
    this.workspace = options.workspace ?? "production";
    this.identityProvider = { ...(options.identityProvider ?? {}) };
    this.collection("folder").set(this.rootFolderId, {
      id: this.rootFolderId,
      name: options.rootFolderName ?? "Shared",
      fields: { parentId: null, inherits: false },
    });
  }

  // -- seeding ---------------------------------------------------------------

  seed(kind: CollectionKind, name: string, fields: FieldMap = {}): string {
    const id = this.allocateId();
    this.collection(kind).set(id, { id, name, fields: { ...fields } });
    return id;
  }

  seedGroup(name: string): string {
    const id = this.allocateId();
    this.groups.set(name, id);
    return id;
  }

  seedUser(email: string): string {
    const id = this.allocateId();
    this.users.set(email, id);
    return id;
  }

  seedAccess(containerId: string, entry: NewAccessEntry): string {
    const entryId = this.allocateId();
    this.access.set(entryId, { ...entry, entryId, containerId });
    return entryId;
  }

  setIdentityProvider(settings: FieldMap): void {
    this.identityProvider = structuredClone(settings);
  }

  setPermissions(permissions: string[]): void {
    this.permissions = [...permissions];
  }

  /**
   * Makes every matching call reject until cleared. Keys are `op:kind` or
   * `op:kind:name`, e.g. `listAll:role` or `create:role:Analyst`.
   */
  failOn(key: string): void {
    this.failures.add(key);
  }

  clearFailures(): void {
    this.failures.clear();
  }

  findByName(kind: CollectionKind, name: string): LiveResource | undefined {
    return [...this.collection(kind).values()].find((record) => record.name === name);
  }

  ownAccessEntries(containerId: string): AccessEntry[] {
    return [...this.access.values()]
      .filter((entry) => entry.containerId === containerId)
      .map(({ containerId: _container, ...entry }) => entry);
  }

  // -- DirectoryService ------------------------------------------------------

  async listAll(kind: CollectionKind): Promise<LiveResource[]> {
    this.assertAvailable(`listAll:${kind}`);
    return [...this.collection(kind).values()].map(cloneRecord);
  }

  async get(kind: CollectionKind, id: string): Promise<LiveResource | undefined> {
    this.assertAvailable(`get:${kind}`);
    const record = this.collection(kind).get(id);
    return record ? cloneRecord(record) : undefined;
  }

  async create(kind: CollectionKind, payload: FieldMap): Promise<string> {
    const name = payload.name;
    if (typeof name !== "string" || name.length === 0) {
      throw new Error(`${kind} payload requires a name`);
    }
    this.assertAvailable(`create:${kind}`, `create:${kind}:${name}`);
    if (this.findByName(kind, name) && kind !== "folder") {
      throw new Error(`${kind} '${name}' already exists`);
    }
    const fields = withoutName(payload);
    this.assertReferences(kind, fields);
    if (kind === "folder") {
      const parentId = fields.parentId;
      if (typeof parentId !== "string" || !this.collection("folder").has(parentId)) {
        throw new Error(`Parent folder ${String(parentId)} not found`);
      }
      fields.inherits = true;
    }
    const id = this.allocateId();
    this.collection(kind).set(id, { id, name, fields });
    this.calls.push(`create:${kind}:${name}`);
    return id;
  }

  async update(kind: CollectionKind, id: string, payload: FieldMap): Promise<void> {
    const record = this.collection(kind).get(id);
    if (!record) {
      throw new Error(`${kind} ${id} not found`);
    }
    this.assertAvailable(`update:${kind}`, `update:${kind}:${record.name}`);
    const fields = withoutName(payload);
    this.assertReferences(kind, fields);
    if (typeof payload.name === "string") {
      record.name = payload.name;
    }
    record.fields = { ...record.fields, ...fields };
    this.calls.push(`update:${kind}:${record.name}`);
  }

  async delete(kind: CollectionKind, id: string): Promise<void> {
    const record = this.collection(kind).get(id);
    if (!record) {
      throw new Error(`${kind} ${id} not found`);
    }
    this.assertAvailable(`delete:${kind}`, `delete:${kind}:${record.name}`);
    if (kind === "permissionSet" || kind === "modelSet") {
      const field = kind === "permissionSet" ? "permissionSetId" : "modelSetId";
      const holder = [...this.collection("role").values()].find((role) => role.fields[field] === id);
      if (holder) {
        throw new Error(`${kind} '${record.name}' is still bound to role '${holder.name}'`);
      }
    }
    this.collection(kind).delete(id);
    this.calls.push(`delete:${kind}:${record.name}`);
  }

  async listAccessEntries(containerId: string): Promise<AccessEntry[]> {
    this.assertAvailable("listAccessEntries:folder");
    return this.ownAccessEntries(this.effectiveAccessSource(containerId));
  }

  async addAccessEntry(containerId: string, entry: NewAccessEntry): Promise<string> {
    this.assertAvailable("addAccessEntry:folder");
    const duplicate = this.ownAccessEntries(containerId).find(
      (existing) =>
        existing.principalType === entry.principalType && existing.principalId === entry.principalId,
    );
    if (duplicate) {
      throw new Error(`Access for ${entry.principalType} ${entry.principalId} already exists`);
    }
    const entryId = this.seedAccess(containerId, entry);
    this.calls.push(`addAccess:${containerId}:${entry.principalType}:${entry.principalId}:${entry.permission}`);
    return entryId;
  }

  async updateAccessEntry(entryId: string, permission: string): Promise<void> {
    this.assertAvailable("updateAccessEntry:folder");
    const entry = this.access.get(entryId);
    if (!entry) {
      throw new Error(`Access entry ${entryId} not found`);
    }
    entry.permission = permission;
    this.calls.push(`updateAccess:${entry.containerId}:${entry.principalType}:${entry.principalId}:${permission}`);
  }

  async removeAccessEntry(entryId: string): Promise<void> {
    this.assertAvailable("removeAccessEntry:folder");
    const entry = this.access.get(entryId);
    if (!entry) {
      throw new Error(`Access entry ${entryId} not found`);
    }
    this.access.delete(entryId);
    this.calls.push(`removeAccess:${entry.containerId}:${entry.principalType}:${entry.principalId}`);
  }

  async setInheritance(containerId: string, inherits: boolean): Promise<void> {
    this.assertAvailable("setInheritance:folder");
    const folder = this.collection("folder").get(containerId);
    if (!folder) {
      throw new Error(`Folder ${containerId} not found`);
    }
    const currentlyInherits = folder.fields.inherits === true;
    if (currentlyInherits && !inherits) {
      const source = this.effectiveAccessSource(containerId);
      for (const entry of this.ownAccessEntries(source)) {
        this.seedAccess(containerId, {
          principalType: entry.principalType,
          principalId: entry.principalId,
          permission: entry.permission,
        });
      }
    }
    if (!currentlyInherits && inherits) {
      for (const entry of this.ownAccessEntries(containerId)) {
        this.access.delete(entry.entryId);
      }
    }
    folder.fields.inherits = inherits;
    this.calls.push(`setInheritance:${containerId}:${String(inherits)}`);
  }

  async findGroupId(name: string): Promise<string | undefined> {
    return this.groups.get(name);
  }

  async findUserId(email: string): Promise<string | undefined> {
    return this.users.get(email);
  }

  async listPermissions(): Promise<string[]> {
    this.assertAvailable("listPermissions");
    return [...this.permissions];
  }

  async getWorkspace(): Promise<string> {
    return this.workspace;
  }

  async setWorkspace(workspaceId: string): Promise<void> {
    this.assertAvailable(`setWorkspace:${workspaceId}`);
    this.workspace = workspaceId;
    this.calls.push(`setWorkspace:${workspaceId}`);
  }

  async getIdentityProvider(): Promise<FieldMap> {
    this.assertAvailable("getIdentityProvider");
    return structuredClone(this.identityProvider);
  }

  async updateIdentityProvider(payload: FieldMap): Promise<void> {
    this.assertAvailable("updateIdentityProvider");
    const next: FieldMap = { ...this.identityProvider, ...payload };
    const groups = next.groups;
    if (Array.isArray(groups)) {
      next.groups = groups.map((group) => this.assignGroupId(group));
    }
    this.identityProvider = structuredClone(next);
    this.calls.push("updateIdentityProvider");
  }

  // -- internals -------------------------------------------------------------

  private collection(kind: CollectionKind): Map<string, LiveResource> {
    let records = this.records.get(kind);
    if (!records) {
      records = new Map();
      this.records.set(kind, records);
    }
    return records;
  }

  private allocateId(): string {
    this.nextId += 1;
    return String(this.nextId);
  }

  private assertAvailable(...keys: string[]): void {
    const failing = keys.find((key) => this.failures.has(key));
    if (failing) {
      throw new Error(`Injected failure for ${failing}`);
    }
  }

  private assertReferences(kind: CollectionKind, fields: FieldMap): void {
    if (kind !== "role") {
      return;
    }
    const checks: Array<[string, CollectionKind]> = [
      ["permissionSetId", "permissionSet"],
      ["modelSetId", "modelSet"],
    ];
    for (const [field, target] of checks) {
      const id = fields[field];
      if (id !== undefined && (typeof id !== "string" || !this.collection(target).has(id))) {
        throw new Error(`${target} ${String(id)} not found`);
      }
    }
  }

  private effectiveAccessSource(containerId: string): string {
    let current = this.collection("folder").get(containerId);
    while (current && current.fields.inherits === true) {
      const parentId = current.fields.parentId;
      current = typeof parentId === "string" ? this.collection("folder").get(parentId) : undefined;
    }
    return current?.id ?? containerId;
  }

  private assignGroupId(group: FieldValue): FieldValue {
    if (!group || typeof group !== "object" || Array.isArray(group)) {
      return group;
    }
    if (typeof group.id === "string") {
      return group;
    }
    return { ...group, id: this.allocateId() };
  }
}

function withoutName(payload: FieldMap): FieldMap {
  const { name: _name, ...fields } = payload;
  return { ...fields };
}

function cloneRecord(record: LiveResource): LiveResource {
  return { id: record.id, name: record.name, fields: structuredClone(record.fields) };
}
