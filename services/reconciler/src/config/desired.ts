import type { DesiredAccess } from "../access/AccessReconciler.js";
import type { DesiredResource, FieldMap, SecretRef } from "../diff/types.js";
import type { DesiredFolder } from "../folders/FolderReconciler.js";
import type { DesiredIdentityProvider } from "../identity/IdentityProviderReconciler.js";
import type { DesiredProjects } from "../projects/ProjectReconciler.js";
import type {
  AccessConfig,
  ConnectionConfig,
  FolderConfig,
  IdentityProviderConfig,
  ProjectConfig,
} from "./schema.js";

function definedFields(values: Record<string, string | number | boolean | string[] | undefined>): FieldMap {
  const fields: FieldMap = {};
  for (const [key, value] of Object.entries(values)) {
    if (value !== undefined) {
      fields[key] = Array.isArray(value) ? [...value] : value;
    }
  }
  return fields;
}

function definedSecrets(refs: Record<string, SecretRef | undefined>): Record<string, SecretRef> | undefined {
  const secrets: Record<string, SecretRef> = {};
  for (const [field, ref] of Object.entries(refs)) {
    if (ref) {
      secrets[field] = ref;
    }
  }
  return Object.keys(secrets).length > 0 ? secrets : undefined;
}

export function toConnectionResources(connections: ConnectionConfig[]): DesiredResource[] {
  return connections.map(({ name, password, certificate, ...settings }) => ({
    name,
    fields: definedFields(settings),
    secrets: definedSecrets({ password, certificate }),
  }));
}

export function toProjectResources(projects: ProjectConfig[]): DesiredProjects {
  return {
    projects: projects.map((project) => ({ name: project.name, fields: {} })),
    modelBindings: projects.flatMap((project) =>
      project.models.map((model) => ({
        name: model.name,
        fields: { project: project.name, connections: [...model.connections] },
      })),
    ),
  };
}

export function toDesiredAccess(entry: AccessConfig): DesiredAccess {
  return "group" in entry
    ? { principalType: "group", principal: entry.group, permission: entry.permission }
    : { principalType: "user", principal: entry.user, permission: entry.permission };
}

export function toDesiredFolders(folders: FolderConfig[]): DesiredFolder[] {
  return folders.map((folder) => ({
    name: folder.name,
    parent: folder.parent,
    access: folder.access.map(toDesiredAccess),
  }));
}

/** Maps configuration names onto the settings fields the directory exposes. */
export function toDesiredIdentityProvider(config: IdentityProviderConfig): DesiredIdentityProvider {
  return {
    fields: definedFields({
      enabled: config.enabled,
      identifier: config.clientId,
      issuer: config.issuer,
      authorizationEndpoint: config.authorizationEndpoint,
      tokenEndpoint: config.tokenEndpoint,
      userinfoEndpoint: config.userinfoEndpoint,
      audience: config.audience,
      scopes: config.scopes,
      userAttributeMapEmail: config.userAttributeMap?.email,
      userAttributeMapFirstName: config.userAttributeMap?.firstName,
      userAttributeMapLastName: config.userAttributeMap?.lastName,
      newUserMigrationTypes: config.newUserMigrationTypes,
      alternateEmailLoginAllowed: config.alternateEmailLoginAllowed,
      setRolesFromGroups: config.setRolesFromGroups,
    }),
    secrets: definedSecrets({ secret: config.clientSecret }),
    mirroredGroups: config.mirroredGroups?.map((group) => ({ name: group.name, roles: [...group.roles] })),
  };
}
