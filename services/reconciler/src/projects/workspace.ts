import type { DirectoryService } from "../backend/DirectoryService.js";
import { appLogger, normalizeError } from "../observability/logger.js";

const logger = appLogger.child({ component: "workspace" });

/**
 * Runs `fn` with the directory switched to `workspaceId` and switches back to
 * the previous workspace afterwards, whether `fn` resolves or rejects. When
 * `fn` rejects, its error wins over a failed restore.
 */
export async function withWorkspace<T>(
  directory: DirectoryService,
  workspaceId: string,
  fn: () => Promise<T>,
): Promise<T> {
  const previous = await directory.getWorkspace();
  if (previous === workspaceId) {
    return fn();
  }

  await directory.setWorkspace(workspaceId);
  logger.debug({ event: "workspace.switched", from: previous, to: workspaceId }, "Switched workspace");

  let result: T;
  try {
    result = await fn();
  } catch (error) {
    await directory.setWorkspace(previous).catch((restoreError: unknown) => {
      logger.error(
        { event: "workspace.restore_failed", workspace: previous, err: normalizeError(restoreError) },
        `Failed to restore workspace '${previous}'`,
      );
    });
    throw error;
  }
  await directory.setWorkspace(previous);
  return result;
}
