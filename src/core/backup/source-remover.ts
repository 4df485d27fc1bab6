/**
 * Removal of sources after a successful backup
 */

import { realpath, rm } from "node:fs/promises";
import * as path from "node:path";
import type { SourceConfig } from "../../types/index.js";
import { logger } from "../../utils/logger.js";
import { isProtectedPath } from "../../utils/path.js";
import { SourceRemovalError } from "../errors.js";

function isMissingPathError(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/**
 * Resolve every source through symlinks, refuse the filesystem root and
 * system directories, then delete what remains. Nothing is deleted when
 * any source is refused. Sources that no longer exist are skipped.
 *
 * @returns the real paths that were removed
 */
export async function removeSources(sources: SourceConfig[]): Promise<string[]> {
  const targets: string[] = [];

  for (const source of sources) {
    let realPath: string;
    try {
      realPath = await realpath(path.resolve(source.path));
    } catch (err) {
      if (!isMissingPathError(err)) throw err;
      logger.debug(`Source already gone, not removing: ${source.path}`);
      continue;
    }

    if (isProtectedPath(realPath)) {
      throw new SourceRemovalError(realPath);
    }
    if (!targets.includes(realPath)) targets.push(realPath);
  }

  for (const target of targets) {
    await rm(target, { recursive: true, force: true });
    logger.info(`Removed source: ${target}`);
  }

  return targets;
}
