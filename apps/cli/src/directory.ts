import {
  resolveEnv,
  type AccessEntry,
  type CollectionKind,
  type DirectoryService,
  type FieldMap,
  type FieldValue,
  type LiveResource,
  type NewAccessEntry,
} from "@acl-sync/reconciler";
import { z } from "zod";

import { logger } from "./logger.js";

export interface DirectoryConfig {
  baseUrl: string;
  token: string;
  timeoutMs: number;
}

const DEFAULT_TIMEOUT_MS = 30_000;

function parseDirectoryUrl(rawBaseUrl: string): string {
  const errorMessage = "Invalid directory URL. Set DIRECTORY_URL to a valid HTTP(S) URL.";
  let parsed: URL;
  try {
    parsed = new URL(rawBaseUrl);
  } catch {
    throw new Error(errorMessage);
  }
  if (!parsed.hostname) {
    throw new Error(errorMessage);
  }
  if (parsed.username || parsed.password) {
    throw new Error("Invalid directory URL. Credentials in URLs are not supported.");
  }
  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    throw new Error("Invalid directory URL. Directory URL must use http or https.");
  }
  return parsed.toString().replace(/\/$/, "");
}

function resolveTimeout(rawTimeout?: string): number {
  if (!rawTimeout) return DEFAULT_TIMEOUT_MS;
  const parsed = Number.parseInt(rawTimeout, 10);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new Error(
      `Invalid directory timeout: ${rawTimeout}. Provide a positive integer number of milliseconds.`,
    );
  }
  return parsed;
}

/** Reads DIRECTORY_URL, DIRECTORY_TOKEN (or DIRECTORY_TOKEN_FILE) and DIRECTORY_TIMEOUT_MS. */
export function resolveDirectoryConfig(env: NodeJS.ProcessEnv = process.env): DirectoryConfig {
  const rawUrl = resolveEnv("DIRECTORY_URL", undefined, env);
  if (!rawUrl) {
    throw new Error("Directory URL is required. Set DIRECTORY_URL.");
  }
  const token = resolveEnv("DIRECTORY_TOKEN", undefined, env);
  if (!token) {
    throw new Error("Directory token is required. Set DIRECTORY_TOKEN or DIRECTORY_TOKEN_FILE.");
  }
  return {
    baseUrl: parseDirectoryUrl(rawUrl),
    token,
    timeoutMs: resolveTimeout(resolveEnv("DIRECTORY_TIMEOUT_MS", undefined, env)),
  };
}

function assertRelativePath(pathname: string): string {
  const trimmed = pathname.trim();
  if (!trimmed) {
    throw new Error("Directory request path is required.");
  }
  if (/^[a-zA-Z][a-zA-Z\d+\-.]*:/.test(trimmed) || trimmed.startsWith("//")) {
    throw new Error("Directory request path must be relative.");
  }
  return trimmed;
}

export function joinUrl(baseUrl: string, pathname: string): string {
  const normalizedBase = baseUrl.endsWith("/") ? baseUrl : `${baseUrl}/`;
  const relativePath = assertRelativePath(pathname);
  const normalizedPath = relativePath.startsWith("/") ? relativePath.slice(1) : relativePath;
  return new URL(normalizedPath, normalizedBase).toString();
}

const ErrorBodySchema = z.union([
  z.string(),
  z.object({
    message: z.string().optional(),
    error: z.union([z.string(), z.object({ message: z.string().optional() })]).optional(),
    errors: z.array(z.unknown()).optional(),
  }),
]);

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

export async function readErrorMessage(response: Response): Promise<string | undefined> {
  const contentType = response.headers.get("content-type") ?? "";
  const bodyText = await response.text();
  if (!bodyText) {
    return undefined;
  }
  if (contentType.includes("application/json")) {
    const parsed = ErrorBodySchema.safeParse(parseJson(bodyText));
    if (parsed.success) {
      const body = parsed.data;
      if (typeof body === "string") return nonEmpty(body);
      const nested = typeof body.error === "string" ? body.error : body.error?.message;
      const message = nonEmpty(body.message) ?? nonEmpty(nested);
      if (message) return message;
      if (body.errors && body.errors.length > 0) {
        return body.errors.map((err) => String(err)).join(", ");
      }
    }
  }
  return nonEmpty(bodyText);
}

export class DirectoryHttpError extends Error {
  constructor(
    message: string,
    public readonly status: number,
    public readonly requestId?: string,
  ) {
    super(message);
    this.name = "DirectoryHttpError";
  }
}

async function handleError(response: Response): Promise<never> {
  const requestId = response.headers.get("x-request-id") ?? undefined;
  const message = await readErrorMessage(response);
  const withRequestId = (text: string): string =>
    requestId ? `${text} (request id ${requestId})` : text;

  if (response.status >= 300 && response.status < 400) {
    throw new DirectoryHttpError(
      withRequestId("Directory responded with a redirect, which is blocked to protect credentials."),
      response.status,
      requestId,
    );
  }

  switch (response.status) {
    case 400:
    case 422:
      throw new DirectoryHttpError(
        withRequestId(message ?? "Directory rejected the request with a validation error."),
        response.status,
        requestId,
      );
    case 401:
    case 403:
      throw new DirectoryHttpError(
        withRequestId(
          message
            ? `Authentication failed: ${message}`
            : "Authentication failed. Provide a valid token via DIRECTORY_TOKEN.",
        ),
        response.status,
        requestId,
      );
    case 404:
      throw new DirectoryHttpError(
        withRequestId(message ?? "Directory resource not found."),
        response.status,
        requestId,
      );
    default: {
      const statusText = response.statusText || `HTTP ${response.status}`;
      const detail = message ? `: ${message}` : ".";
      throw new DirectoryHttpError(
        withRequestId(`Directory request failed - ${statusText}${detail}`),
        response.status,
        requestId,
      );
    }
  }
}

type Method = "GET" | "POST" | "PATCH" | "DELETE";

/** Resolves to the parsed JSON body, or undefined for an empty response. */
async function requestJson(
  config: DirectoryConfig,
  method: Method,
  pathname: string,
  body?: unknown,
): Promise<unknown> {
  const url = joinUrl(config.baseUrl, pathname);
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), config.timeoutMs);

  try {
    const response = await fetch(url, {
      method,
      body: body === undefined ? undefined : JSON.stringify(body),
      redirect: "manual",
      headers: { "content-type": "application/json", authorization: `Bearer ${config.token}` },
      signal: controller.signal,
    });
    if (!response.ok) {
      return await handleError(response);
    }
    const text = await response.text();
    return text ? JSON.parse(text) : undefined;
  } catch (error) {
    if (error instanceof Error && error.name === "AbortError") {
      throw new Error(
        `Directory request timed out after ${config.timeoutMs}ms. Adjust DIRECTORY_TIMEOUT_MS if needed.`,
      );
    }
    if (error instanceof DirectoryHttpError) {
      throw error;
    }
    if (error instanceof Error) {
      throw new Error(`Directory request failed: ${error.message}`);
    }
    logger.error({ err: error }, "Directory request failed with unknown error");
    throw new Error("Directory request failed due to an unknown error");
  } finally {
    clearTimeout(timeout);
  }
}

const FieldValueSchema: z.ZodType<FieldValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(FieldValueSchema), z.record(FieldValueSchema)]),
);

const FieldMapSchema = z.record(FieldValueSchema);

const IdSchema = z.union([z.string(), z.number()]).transform(String);

const RecordSchema = z.object({ id: IdSchema, name: z.string() }).catchall(FieldValueSchema);

const CreatedSchema = z.object({ id: IdSchema });

const AccessEntrySchema = z.object({
  id: IdSchema,
  principalType: z.enum(["group", "user"]),
  principalId: IdSchema,
  permission: z.string(),
});

const PrincipalMatchSchema = z.array(z.object({ id: IdSchema, name: z.string().optional(), email: z.string().optional() }));

const SessionSchema = z.object({ workspaceId: z.string() });

const COLLECTION_PATHS: Record<CollectionKind, string> = {
  connection: "connections",
  project: "projects",
  modelBinding: "model_bindings",
  permissionSet: "permission_sets",
  modelSet: "model_sets",
  role: "roles",
  folder: "folders",
};

function toLiveResource(raw: z.infer<typeof RecordSchema>): LiveResource {
  const { id, name, ...fields } = raw;
  return { id, name, fields };
}

function toAccessEntry(raw: z.infer<typeof AccessEntrySchema>): AccessEntry {
  return {
    entryId: raw.id,
    principalType: raw.principalType,
    principalId: raw.principalId,
    permission: raw.permission,
  };
}

/**
 * DirectoryService over the backend's JSON REST API. Records are flat objects
 * carrying `id` and `name` next to their fields; every response is validated
 * before it reaches the engine.
 */
export class HttpDirectory implements DirectoryService {
  constructor(private readonly config: DirectoryConfig) {}

  async listAll(kind: CollectionKind): Promise<LiveResource[]> {
    const body = await requestJson(this.config, "GET", COLLECTION_PATHS[kind]);
    return z.array(RecordSchema).parse(body).map(toLiveResource);
  }

  async get(kind: CollectionKind, id: string): Promise<LiveResource | undefined> {
    try {
      const body = await requestJson(this.config, "GET", `${COLLECTION_PATHS[kind]}/${encodeURIComponent(id)}`);
      return toLiveResource(RecordSchema.parse(body));
    } catch (error) {
      if (error instanceof DirectoryHttpError && error.status === 404) {
        return undefined;
      }
      throw error;
    }
  }

  async create(kind: CollectionKind, payload: FieldMap): Promise<string> {
    const body = await requestJson(this.config, "POST", COLLECTION_PATHS[kind], payload);
    return CreatedSchema.parse(body).id;
  }

  async update(kind: CollectionKind, id: string, payload: FieldMap): Promise<void> {
    await requestJson(this.config, "PATCH", `${COLLECTION_PATHS[kind]}/${encodeURIComponent(id)}`, payload);
  }

  async delete(kind: CollectionKind, id: string): Promise<void> {
    await requestJson(this.config, "DELETE", `${COLLECTION_PATHS[kind]}/${encodeURIComponent(id)}`);
  }

  async listAccessEntries(containerId: string): Promise<AccessEntry[]> {
    const body = await requestJson(this.config, "GET", `folders/${encodeURIComponent(containerId)}/access`);
    return z.array(AccessEntrySchema).parse(body).map(toAccessEntry);
  }

  async addAccessEntry(containerId: string, entry: NewAccessEntry): Promise<string> {
    const body = await requestJson(this.config, "POST", `folders/${encodeURIComponent(containerId)}/access`, entry);
    return CreatedSchema.parse(body).id;
  }

  async updateAccessEntry(entryId: string, permission: string): Promise<void> {
    await requestJson(this.config, "PATCH", `access/${encodeURIComponent(entryId)}`, { permission });
  }

  async removeAccessEntry(entryId: string): Promise<void> {
    await requestJson(this.config, "DELETE", `access/${encodeURIComponent(entryId)}`);
  }

  async setInheritance(containerId: string, inherits: boolean): Promise<void> {
    await requestJson(this.config, "PATCH", `folders/${encodeURIComponent(containerId)}`, { inherits });
  }

  async findGroupId(name: string): Promise<string | undefined> {
    const body = await requestJson(this.config, "GET", `groups/search?name=${encodeURIComponent(name)}`);
    return PrincipalMatchSchema.parse(body).find((group) => group.name === name)?.id;
  }

  async findUserId(email: string): Promise<string | undefined> {
    const body = await requestJson(this.config, "GET", `users/search?email=${encodeURIComponent(email)}`);
    const wanted = email.toLowerCase();
    return PrincipalMatchSchema.parse(body).find((user) => user.email?.toLowerCase() === wanted)?.id;
  }

  async listPermissions(): Promise<string[]> {
    const body = await requestJson(this.config, "GET", "permissions");
    return z.array(z.string()).parse(body);
  }

  async getWorkspace(): Promise<string> {
    const body = await requestJson(this.config, "GET", "session");
    return SessionSchema.parse(body).workspaceId;
  }

  async setWorkspace(workspaceId: string): Promise<void> {
    await requestJson(this.config, "PATCH", "session", { workspaceId });
  }

  async getIdentityProvider(): Promise<FieldMap> {
    const body = await requestJson(this.config, "GET", "identity_provider");
    return FieldMapSchema.parse(body);
  }

  async updateIdentityProvider(payload: FieldMap): Promise<void> {
    await requestJson(this.config, "PATCH", "identity_provider", payload);
  }
}
