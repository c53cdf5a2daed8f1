/**
 * Configuration type definitions for dockpack
 */

import type { LogLevel } from "../utils/logger";

export interface ArchiveConfig {
  /** Filename prefix of every archive in the backup root */
  prefix: string;
  /** Archive filename extension, including the leading dot */
  extension: string;
  /** gzip level (0-9) used for payloads and the final archive */
  compression: number;
}

export interface JournalConfig {
  /** Command journal path, relative paths resolve against the backup root */
  path: string;
}

export interface LogConfig {
  /** Durable log path, relative paths resolve against the backup root */
  path: string;
  level: LogLevel;
}

export interface DatabaseConfig {
  /** Catalog database path, relative paths resolve against the backup root */
  path: string;
}

export interface DockerConfig {
  /** Docker CLI binary */
  binary: string;
  /** Command that brings a compose project up, recorded in the journal */
  composeUpCommand: string;
}

export interface RestoreConfig {
  /** Default target directory for restored compose files */
  composeTargetDir?: string;
}

export interface DockpackConfig {
  version: string;
  backupRoot: string;
  archive: ArchiveConfig;
  journal: JournalConfig;
  log: LogConfig;
  database: DatabaseConfig;
  docker: DockerConfig;
  restore?: RestoreConfig;
}

/**
 * Shape accepted from config files and inline flags before defaults apply
 */
export interface ConfigInput {
  version?: string;
  backupRoot?: string;
  archive?: Partial<ArchiveConfig>;
  journal?: Partial<JournalConfig>;
  log?: Partial<LogConfig>;
  database?: Partial<DatabaseConfig>;
  docker?: Partial<DockerConfig>;
  restore?: RestoreConfig;
}
