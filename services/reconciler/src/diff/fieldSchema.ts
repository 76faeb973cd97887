import type { ResourceKind } from "./types.js";

/**
 * How a field is compared against its live value:
 * - `scalar`: equality, with null and unset treated alike
 * - `numeric`: numeric equality, so a live "5432" matches a desired 5432
 * - `orderedList`: element-wise equality
 * - `unorderedList`: multiset equality, order ignored
 */
export type FieldSemantic = "scalar" | "numeric" | "orderedList" | "unorderedList";

export interface KindSchema {
  kind: ResourceKind;
  /** Comparable fields. Desired fields missing here are sent but never compared. */
  fields: Readonly<Record<string, FieldSemantic>>;
  /** Fields excluded from drift detection: secrets and server-assigned values. */
  ignore: readonly string[];
}

const SERVER_ASSIGNED = ["createdAt", "userId", "example"] as const;

export const CONNECTION_SCHEMA: KindSchema = {
  kind: "connection",
  fields: {
    host: "scalar",
    port: "numeric",
    database: "scalar",
    schema: "scalar",
    dialect: "scalar",
    username: "scalar",
    ssl: "scalar",
    verifySsl: "scalar",
    maxConnections: "numeric",
    poolTimeout: "numeric",
    usesApplicationDefaultCredentials: "scalar",
  },
  ignore: ["password", "certificate", ...SERVER_ASSIGNED],
};

// Projects are create-only; existing projects are never updated.
export const PROJECT_SCHEMA: KindSchema = {
  kind: "project",
  fields: {},
  ignore: [...SERVER_ASSIGNED],
};

export const MODEL_BINDING_SCHEMA: KindSchema = {
  kind: "modelBinding",
  fields: {
    project: "scalar",
    connections: "unorderedList",
  },
  ignore: [...SERVER_ASSIGNED],
};

export const PERMISSION_SET_SCHEMA: KindSchema = {
  kind: "permissionSet",
  fields: { permissions: "unorderedList" },
  ignore: [...SERVER_ASSIGNED],
};

export const MODEL_SET_SCHEMA: KindSchema = {
  kind: "modelSet",
  fields: { models: "unorderedList" },
  ignore: [...SERVER_ASSIGNED],
};

export const IDENTITY_PROVIDER_SCHEMA: KindSchema = {
  kind: "identityProvider",
  fields: {
    enabled: "scalar",
    identifier: "scalar",
    issuer: "scalar",
    authorizationEndpoint: "scalar",
    tokenEndpoint: "scalar",
    userinfoEndpoint: "scalar",
    audience: "scalar",
    scopes: "unorderedList",
    userAttributeMapEmail: "scalar",
    userAttributeMapFirstName: "scalar",
    userAttributeMapLastName: "scalar",
    newUserMigrationTypes: "unorderedList",
    alternateEmailLoginAllowed: "scalar",
    setRolesFromGroups: "scalar",
  },
  ignore: ["secret", "url", "modifiedAt", "modifiedBy", ...SERVER_ASSIGNED],
};
