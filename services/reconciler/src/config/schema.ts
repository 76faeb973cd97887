/**
 * Desired-state schemas.
 *
 * Each YAML file in the configuration directory is parsed against one of the
 * section schemas below. Secret-bearing fields only ever accept a pointer
 * (`{ source: env, id }` or `{ source: file, path }`), never a literal value.
 */

import { z } from "zod";

import { ConfigValidationError } from "../errors.js";

const NameSchema = z.string().trim().min(1);

// ============================================================================
// Secrets
// ============================================================================

export const SecretRefSchema = z.discriminatedUnion("source", [
  z.object({ source: z.literal("env"), id: z.string().trim().min(1) }).strict(),
  z.object({ source: z.literal("file"), path: z.string().trim().min(1) }).strict(),
]);
export type SecretRefConfig = z.infer<typeof SecretRefSchema>;

// ============================================================================
// Connections
// ============================================================================

export const ConnectionConfigSchema = z.object({
  name: NameSchema,
  host: z.string().optional(),
  port: z.number().int().min(1).max(65535).optional(),
  database: z.string().optional(),
  schema: z.string().optional(),
  dialect: z.string().optional(),
  username: z.string().optional(),
  ssl: z.boolean().optional(),
  verifySsl: z.boolean().optional(),
  maxConnections: z.number().int().min(1).optional(),
  poolTimeout: z.number().int().min(0).optional(),
  usesApplicationDefaultCredentials: z.boolean().optional(),
  password: SecretRefSchema.optional(),
  certificate: SecretRefSchema.optional(),
}).strict();
export type ConnectionConfig = z.infer<typeof ConnectionConfigSchema>;

// ============================================================================
// Projects and model bindings
// ============================================================================

export const ModelBindingConfigSchema = z.object({
  name: NameSchema,
  connections: z.array(NameSchema).default([]),
}).strict();
export type ModelBindingConfig = z.infer<typeof ModelBindingConfigSchema>;

export const ProjectConfigSchema = z.object({
  name: NameSchema,
  models: z.array(ModelBindingConfigSchema).default([]),
}).strict();
export type ProjectConfig = z.infer<typeof ProjectConfigSchema>;

// ============================================================================
// Roles, permission sets and model sets
// ============================================================================

export const PermissionSetConfigSchema = z.object({
  name: NameSchema,
  permissions: z.array(NameSchema),
}).strict();
export type PermissionSetConfig = z.infer<typeof PermissionSetConfigSchema>;

export const ModelSetConfigSchema = z.object({
  name: NameSchema,
  models: z.array(NameSchema),
}).strict();
export type ModelSetConfig = z.infer<typeof ModelSetConfigSchema>;

export const RoleConfigSchema = z.object({
  name: NameSchema,
  permissionSet: NameSchema,
  modelSet: NameSchema,
}).strict();
export type RoleConfig = z.infer<typeof RoleConfigSchema>;

export const RolesConfigSchema = z.object({
  permissionSets: z.array(PermissionSetConfigSchema).default([]),
  modelSets: z.array(ModelSetConfigSchema).default([]),
  roles: z.array(RoleConfigSchema).default([]),
}).strict();
export type RolesConfig = z.infer<typeof RolesConfigSchema>;

// ============================================================================
// Identity provider
// ============================================================================

export const MirroredGroupConfigSchema = z.object({
  name: NameSchema,
  roles: z.array(NameSchema).default([]),
}).strict();
export type MirroredGroupConfig = z.infer<typeof MirroredGroupConfigSchema>;

export const IdentityProviderConfigSchema = z.object({
  enabled: z.boolean().optional(),
  clientId: z.string().optional(),
  clientSecret: SecretRefSchema.optional(),
  issuer: z.string().url().optional(),
  authorizationEndpoint: z.string().url().optional(),
  tokenEndpoint: z.string().url().optional(),
  userinfoEndpoint: z.string().url().optional(),
  audience: z.string().optional(),
  scopes: z.array(z.string()).optional(),
  userAttributeMap: z.object({
    email: z.string().optional(),
    firstName: z.string().optional(),
    lastName: z.string().optional(),
  }).strict().optional(),
  newUserMigrationTypes: z.array(z.string()).optional(),
  alternateEmailLoginAllowed: z.boolean().optional(),
  setRolesFromGroups: z.boolean().optional(),
  mirroredGroups: z.array(MirroredGroupConfigSchema).optional(),
}).strict();
export type IdentityProviderConfig = z.infer<typeof IdentityProviderConfigSchema>;

// ============================================================================
// Folders
// ============================================================================

export const AccessPermissionSchema = z.enum(["view", "edit"]);
export type AccessPermission = z.infer<typeof AccessPermissionSchema>;

export const AccessConfigSchema = z.union([
  z.object({ group: NameSchema, permission: AccessPermissionSchema.default("view") }).strict(),
  z.object({ user: z.string().email(), permission: AccessPermissionSchema.default("view") }).strict(),
]);
export type AccessConfig = z.infer<typeof AccessConfigSchema>;

export const FolderConfigSchema = z.object({
  name: NameSchema,
  parent: NameSchema.optional(),
  access: z.array(AccessConfigSchema).default([]),
}).strict();
export type FolderConfig = z.infer<typeof FolderConfigSchema>;

// ============================================================================
// Complete desired state
// ============================================================================

export const DesiredConfigSchema = z.object({
  connections: z.array(ConnectionConfigSchema).default([]),
  projects: z.array(ProjectConfigSchema).default([]),
  /** The role triad is only managed when this section is present. */
  roles: RolesConfigSchema.optional(),
  identityProvider: IdentityProviderConfigSchema.optional(),
  folders: z.array(FolderConfigSchema).default([]),
});
export type DesiredConfig = z.infer<typeof DesiredConfigSchema>;
export type DesiredConfigInput = z.input<typeof DesiredConfigSchema>;

// ============================================================================
// Engine settings
// ============================================================================

export const EngineSettingsSchema = z.object({
  rootFolderId: z.string().min(1).default("1"),
  rootFolderName: z.string().min(1).default("Shared"),
  devWorkspace: z.string().min(1).default("dev"),
  strictPrincipals: z.boolean().default(false),
});
export type EngineSettings = z.infer<typeof EngineSettingsSchema>;

// ============================================================================
// Validation helpers
// ============================================================================

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const location = issue.path.length > 0 ? issue.path.join(".") : "(root)";
    return `${location}: ${issue.message}`;
  });
}

/**
 * Parses a raw desired-state document.
 * @throws ConfigValidationError listing every schema violation
 */
export function parseDesiredConfig(input: unknown): DesiredConfig {
  const result = DesiredConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigValidationError(formatIssues(result.error));
  }
  return result.data;
}

export function parseEngineSettings(input: unknown): EngineSettings {
  const result = EngineSettingsSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigValidationError(formatIssues(result.error));
  }
  return result.data;
}
