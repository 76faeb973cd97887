import fs from "node:fs";
import path from "node:path";

import YAML from "yaml";

import { ConfigValidationError, describeCause } from "../errors.js";
import { appLogger } from "../observability/logger.js";
import { parseBoolean, resolveEnv } from "../utils/env.js";
import { type DesiredConfig, type EngineSettings, parseDesiredConfig, parseEngineSettings } from "./schema.js";

export const CONFIG_FILES = {
  connections: "connections.yaml",
  projects: "projects.yaml",
  roles: "roles.yaml",
  identityProvider: "oidc.yaml",
  folders: "folders.yaml",
} as const;

const logger = appLogger.child({ component: "config" });

function asRecord(value: unknown): Record<string, unknown> | undefined {
  if (!value || typeof value !== "object" || Array.isArray(value)) {
    return undefined;
  }
  return Object.fromEntries(Object.entries(value));
}

/** Returns the parsed document, or undefined when the file is absent or empty. */
export function readYamlFile(filePath: string): unknown {
  if (!fs.existsSync(filePath)) {
    return undefined;
  }
  try {
    const parsed: unknown = YAML.parse(fs.readFileSync(filePath, "utf-8"));
    return parsed ?? undefined;
  } catch (error) {
    throw new ConfigValidationError([`${path.basename(filePath)}: ${describeCause(error)}`]);
  }
}

/**
 * List sections may be written either as a bare list or under a key of the
 * same name, e.g. `connections: [...]`.
 */
function listSection(document: unknown, key: string): unknown {
  const record = asRecord(document);
  if (record && key in record) {
    return record[key];
  }
  return document;
}

export function loadDesiredConfig(configDir: string): DesiredConfig {
  const read = (file: string): unknown => readYamlFile(path.join(configDir, file));

  const raw = {
    connections: listSection(read(CONFIG_FILES.connections), "connections"),
    projects: listSection(read(CONFIG_FILES.projects), "projects"),
    roles: read(CONFIG_FILES.roles),
    identityProvider: read(CONFIG_FILES.identityProvider),
    folders: listSection(read(CONFIG_FILES.folders), "folders"),
  };

  const config = parseDesiredConfig(raw);
  logger.info(
    {
      event: "config.loaded",
      configDir,
      connections: config.connections.length,
      projects: config.projects.length,
      roles: config.roles?.roles.length ?? 0,
      identityProvider: config.identityProvider !== undefined,
      folders: config.folders.length,
    },
    "Loaded desired state",
  );
  return config;
}

export function loadEngineSettings(env: NodeJS.ProcessEnv = process.env): EngineSettings {
  return parseEngineSettings({
    rootFolderId: resolveEnv("ACL_SYNC_ROOT_FOLDER_ID", undefined, env),
    rootFolderName: resolveEnv("ACL_SYNC_ROOT_FOLDER_NAME", undefined, env),
    devWorkspace: resolveEnv("ACL_SYNC_DEV_WORKSPACE", undefined, env),
    strictPrincipals: parseBoolean(resolveEnv("ACL_SYNC_STRICT_PRINCIPALS", undefined, env)),
  });
}
