import type { PrincipalResolver } from "../access/PrincipalResolver.js";
import type { CollectionKind, DirectoryService } from "../backend/DirectoryService.js";
import { toDesiredAccess } from "../config/desired.js";
import type { DesiredConfig, RolesConfig } from "../config/schema.js";
import { ConfigValidationError } from "../errors.js";
import { appLogger, normalizeError } from "../observability/logger.js";
import { PROTECTED_NAMES, SUPER_ADMIN_ROLE, isProtectedName } from "../policy/ProtectionPolicy.js";

export type ConfigValidatorOptions = {
  /** Unresolvable folder principals fail validation instead of being skipped. */
  strictPrincipals: boolean;
};

function duplicates(names: string[]): string[] {
  const seen = new Set<string>();
  const repeated = new Set<string>();
  for (const name of names) {
    if (seen.has(name)) {
      repeated.add(name);
    }
    seen.add(name);
  }
  return [...repeated];
}

/**
 * Cross-reference checks over the whole desired state. Every problem is
 * collected first and reported in one ConfigValidationError, before any
 * diff is computed or mutation sent. Checks that need live data are skipped
 * with a warning when that data cannot be read.
 */
export class ConfigValidator {
  private readonly logger = appLogger.child({ component: "ConfigValidator" });

  constructor(
    private readonly directory: DirectoryService,
    private readonly principals: PrincipalResolver,
    private readonly options: ConfigValidatorOptions,
  ) {}

  async validate(config: DesiredConfig): Promise<void> {
    const problems = [
      ...this.validateUniqueNames(config),
      ...(config.roles ? await this.validatePermissions(config.roles) : []),
      ...(config.roles ? this.validateRoleDependencies(config.roles) : []),
      ...(await this.validateIdentityGroups(config)),
      ...(await this.validateModelConnections(config)),
      ...(await this.validateFolderAccess(config)),
    ];

    if (problems.length > 0) {
      throw new ConfigValidationError(problems);
    }
    this.logger.info({ event: "config.validated" }, "Configuration validation passed");
  }

  private validateUniqueNames(config: DesiredConfig): string[] {
    const groups: Array<[string, string[]]> = [
      ["connection", config.connections.map((connection) => connection.name)],
      ["project", config.projects.map((project) => project.name)],
      ["model", config.projects.flatMap((project) => project.models.map((model) => model.name))],
      ["permission set", config.roles?.permissionSets.map((set) => set.name) ?? []],
      ["model set", config.roles?.modelSets.map((set) => set.name) ?? []],
      ["role", config.roles?.roles.map((role) => role.name) ?? []],
      [
        "folder",
        config.folders.map((folder) => (folder.parent ? `${folder.parent}/${folder.name}` : folder.name)),
      ],
    ];
    return groups.flatMap(([label, names]) => duplicates(names).map((name) => `Duplicate ${label} '${name}'`));
  }

  private async validatePermissions(roles: RolesConfig): Promise<string[]> {
    if (roles.permissionSets.length === 0) {
      return [];
    }
    let catalog: Set<string>;
    try {
      catalog = new Set(await this.directory.listPermissions());
    } catch (error) {
      this.logger.warn(
        { event: "validation.skipped", check: "permissions", err: normalizeError(error) },
        "Skipping permission validation; the permission catalog could not be read",
      );
      return [];
    }
    return roles.permissionSets.flatMap((set) =>
      set.permissions
        .filter((permission) => !catalog.has(permission))
        .map((permission) => `Invalid permission '${permission}' in permission set '${set.name}'`),
    );
  }

  private validateRoleDependencies(roles: RolesConfig): string[] {
    const permissionSets = new Set([
      ...roles.permissionSets.map((set) => set.name),
      ...(PROTECTED_NAMES.permissionSet ?? []),
    ]);
    const modelSets = new Set([...roles.modelSets.map((set) => set.name), ...(PROTECTED_NAMES.modelSet ?? [])]);

    const problems: string[] = [];
    for (const role of roles.roles) {
      if (role.name === SUPER_ADMIN_ROLE) {
        continue;
      }
      if (!permissionSets.has(role.permissionSet)) {
        problems.push(`Role '${role.name}' references undefined permission set '${role.permissionSet}'`);
      }
      if (!modelSets.has(role.modelSet)) {
        problems.push(`Role '${role.name}' references undefined model set '${role.modelSet}'`);
      }
    }
    return problems;
  }

  private async validateIdentityGroups(config: DesiredConfig): Promise<string[]> {
    const groups = config.identityProvider?.mirroredGroups ?? [];
    if (groups.length === 0) {
      return [];
    }
    const liveRoles = await this.liveNames("role", "identity provider groups");
    if (!liveRoles) {
      return [];
    }
    // Managed roles replace the live ones; only protected live roles survive the pass.
    const surviving = config.roles ? liveRoles.filter((name) => isProtectedName("role", name)) : liveRoles;
    const known = new Set([...surviving, ...(config.roles?.roles.map((role) => role.name) ?? [])]);
    return groups.flatMap((group) =>
      group.roles
        .filter((role) => !known.has(role))
        .map((role) => `Identity provider group '${group.name}' references unknown role '${role}'`),
    );
  }

  private async validateModelConnections(config: DesiredConfig): Promise<string[]> {
    const models = config.projects.flatMap((project) => project.models);
    if (!models.some((model) => model.connections.length > 0)) {
      return [];
    }
    const liveConnections = await this.liveNames("connection", "model connections");
    if (!liveConnections) {
      return [];
    }
    const known = new Set([...liveConnections, ...config.connections.map((connection) => connection.name)]);
    return models.flatMap((model) =>
      model.connections
        .filter((connection) => !known.has(connection))
        .map((connection) => `Model '${model.name}' references unknown connection '${connection}'`),
    );
  }

  private async validateFolderAccess(config: DesiredConfig): Promise<string[]> {
    const problems: string[] = [];
    for (const folder of config.folders) {
      const entries = folder.access.map(toDesiredAccess);
      const keys = entries.map((entry) =>
        entry.principalType === "user"
          ? `user '${entry.principal.toLowerCase()}'`
          : `group '${entry.principal}'`,
      );
      for (const key of duplicates(keys)) {
        problems.push(`Folder '${folder.name}' lists ${key} more than once`);
      }

      if (!this.options.strictPrincipals) {
        continue;
      }
      for (const entry of entries) {
        const id = await this.principals.resolve(entry.principalType, entry.principal);
        if (id === undefined) {
          problems.push(`Folder '${folder.name}' references unknown ${entry.principalType} '${entry.principal}'`);
        }
      }
    }
    return problems;
  }

  private async liveNames(kind: CollectionKind, check: string): Promise<string[] | undefined> {
    try {
      const records = await this.directory.listAll(kind);
      return records.map((record) => record.name);
    } catch (error) {
      this.logger.warn(
        { event: "validation.skipped", check, err: normalizeError(error) },
        `Skipping validation of ${check}; live ${kind} records could not be read`,
      );
      return undefined;
    }
  }
}
