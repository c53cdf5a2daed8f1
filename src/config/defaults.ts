/**
 * Default configuration values
 */

import type { ConfigInput, DockpackConfig } from "../types";

export const DEFAULT_CONFIG: DockpackConfig = {
  version: "1",
  backupRoot: "/home/docker_backups",
  archive: {
    prefix: "docker_project_backup",
    extension: ".tar.gz",
    compression: 6,
  },
  journal: {
    path: "docker_run_commands.txt",
  },
  log: {
    path: "dockpack.log",
    level: "info",
  },
  database: {
    path: "dockpack.db",
  },
  docker: {
    binary: "docker",
    composeUpCommand: "docker-compose up -d",
  },
};

/**
 * Merge a partial config over a complete one, section by section
 */
export function mergeConfig(target: DockpackConfig, source: ConfigInput): DockpackConfig {
  const restore =
    target.restore || source.restore ? { ...target.restore, ...source.restore } : undefined;

  return {
    version: source.version ?? target.version,
    backupRoot: source.backupRoot ?? target.backupRoot,
    archive: { ...target.archive, ...source.archive },
    journal: { ...target.journal, ...source.journal },
    log: { ...target.log, ...source.log },
    database: { ...target.database, ...source.database },
    docker: { ...target.docker, ...source.docker },
    ...(restore && { restore }),
  };
}
