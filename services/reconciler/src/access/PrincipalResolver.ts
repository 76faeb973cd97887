import type { DirectoryService, PrincipalType } from "../backend/DirectoryService.js";
import { appLogger, normalizeError } from "../observability/logger.js";

/** Groups mirrored from the identity provider carry this suffix. */
export const MIRRORED_GROUP_SUFFIX = " (OIDC)";

/**
 * Looks up group and user ids by name or email. Lookups are memoized for the
 * lifetime of one instance, which the engine scopes to a single run.
 */
export class PrincipalResolver {
  private readonly logger = appLogger.child({ component: "PrincipalResolver" });
  private readonly cache = new Map<string, Promise<string | undefined>>();

  constructor(private readonly directory: DirectoryService) {}

  resolve(type: PrincipalType, principal: string): Promise<string | undefined> {
    const key = `${type}:${principal}`;
    let pending = this.cache.get(key);
    if (!pending) {
      pending = type === "group" ? this.lookupGroup(principal) : this.lookupUser(principal);
      this.cache.set(key, pending);
    }
    return pending;
  }

  private async lookupGroup(name: string): Promise<string | undefined> {
    const exact = await this.safeLookup("group", name, () => this.directory.findGroupId(name));
    if (exact !== undefined) {
      return exact;
    }
    const mirrored = `${name}${MIRRORED_GROUP_SUFFIX}`;
    return this.safeLookup("group", mirrored, () => this.directory.findGroupId(mirrored));
  }

  private lookupUser(email: string): Promise<string | undefined> {
    return this.safeLookup("user", email, () => this.directory.findUserId(email));
  }

  private async safeLookup(
    type: PrincipalType,
    principal: string,
    lookup: () => Promise<string | undefined>,
  ): Promise<string | undefined> {
    try {
      return await lookup();
    } catch (error) {
      this.logger.warn(
        { event: "principal.lookup_failed", type, principal, err: normalizeError(error) },
        `Failed to look up ${type} '${principal}'`,
      );
      return undefined;
    }
  }
}
