/**
 * Configuration path resolution
 */

import * as path from "node:path";
import type { DockpackConfig } from "../types";

/**
 * Resolve relative paths in config to absolute paths.
 * backupRoot is relative to the config file directory; the journal, log and
 * database files are relative to backupRoot.
 */
export function resolvePaths(config: DockpackConfig, configDir: string): DockpackConfig {
  const backupRoot = path.resolve(configDir, config.backupRoot);
  const underRoot = (p: string) => (path.isAbsolute(p) ? p : path.resolve(backupRoot, p));

  return {
    ...config,
    backupRoot,
    journal: { path: underRoot(config.journal.path) },
    log: { ...config.log, path: underRoot(config.log.path) },
    database: { path: underRoot(config.database.path) },
    ...(config.restore?.composeTargetDir && {
      restore: { composeTargetDir: path.resolve(configDir, config.restore.composeTargetDir) },
    }),
  };
}
