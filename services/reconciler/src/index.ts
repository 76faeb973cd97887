export {
  KIND_ORDER,
  ReconciliationEngine,
  countChanges,
  hasFailures,
  type ApplyReport,
  type KindReport,
  type ReconciliationPlan,
} from "./engine/ReconciliationEngine.js";
export type { KindTally } from "./engine/tally.js";

export { CONFIG_FILES, loadDesiredConfig, loadEngineSettings } from "./config/loadConfig.js";
export {
  DesiredConfigSchema,
  EngineSettingsSchema,
  parseDesiredConfig,
  parseEngineSettings,
  type DesiredConfig,
  type DesiredConfigInput,
  type EngineSettings,
} from "./config/schema.js";

export type {
  AccessEntry,
  CollectionKind,
  DirectoryService,
  NewAccessEntry,
  PrincipalType,
} from "./backend/DirectoryService.js";
export type { FieldMap, FieldValue, ItemError, LiveResource, ResourceKind } from "./diff/types.js";

export {
  ApplyError,
  ConfigValidationError,
  FetchError,
  MissingSecretError,
  ReconcilerError,
  ResolutionError,
  type ReconcilerErrorCode,
} from "./errors.js";
export { SecretResolver } from "./secrets/SecretResolver.js";
export { PROTECTED_NAMES, isProtected } from "./policy/ProtectionPolicy.js";
export { appLogger, createLogger, normalizeError, type AppLogger } from "./observability/logger.js";
export { ACTIONS_TOTAL_NAME, renderMetrics, resetMetrics } from "./observability/metrics.js";
export { parseBoolean, resolveEnv } from "./utils/env.js";
