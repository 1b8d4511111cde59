import { existsSync, mkdirSync, rmSync } from "node:fs";
import { join, resolve } from "node:path";
import { ILogger } from "../../core/domain/services/ILogger.js";

/** A scratch directory owned by one run. */
export interface Workspace {
  readonly dir: string;
  path(...segments: string[]): string;
}

/** Wipes `dir` if it exists and recreates it empty. */
export function acquireWorkspace(dir: string): Workspace {
  const root = resolve(dir);
  if (existsSync(root)) rmSync(root, { recursive: true, force: true });
  mkdirSync(root, { recursive: true });
  return {
    dir: root,
    path: (...segments) => join(root, ...segments),
  };
}

/** Removes the workspace directory. Failures are logged, not thrown. */
export function releaseWorkspace(workspace: Workspace, logger: ILogger): void {
  try {
    rmSync(workspace.dir, { recursive: true, force: true });
    logger.log({ level: "info", event: "workspace_released", dir: workspace.dir });
  } catch (err) {
    logger.log({
      level: "warn",
      event: "workspace_cleanup_failed",
      dir: workspace.dir,
      message: err instanceof Error ? err.message : String(err),
    });
  }
}

/**
 * Runs `fn` inside a freshly created workspace and releases it afterwards,
 * whether `fn` resolves or rejects. With `keep`, the directory is left in place.
 */
export async function withWorkspace<T>(
  dir: string,
  logger: ILogger,
  fn: (workspace: Workspace) => Promise<T>,
  options: { keep?: boolean } = {},
): Promise<T> {
  const workspace = acquireWorkspace(dir);
  logger.log({ level: "info", event: "workspace_acquired", dir: workspace.dir });
  try {
    return await fn(workspace);
  } finally {
    if (!options.keep) releaseWorkspace(workspace, logger);
  }
}
