/**
 * Inline configuration passed via CLI flags
 */

import * as path from "node:path";
import type { ConfigInput, DockpackConfig } from "../types";
import { mergeConfig } from "./defaults";
import { ConfigError } from "./validator";

/**
 * Inline configuration options that can be passed via CLI flags
 */
export interface InlineConfigOptions {
  /** Directory holding archives, journal, log and catalog */
  backupRoot?: string;
  /** Archive filename prefix */
  archivePrefix?: string;
  /** Compression level (0-9) */
  compression?: number;
  /** Command run in the restored compose directory */
  composeCommand?: string;
  dockerBinary?: string;
  /** Catalog database file path */
  database?: string;
  /** Log file path */
  logFile?: string;
}

/**
 * CLI option definitions for inline config (for parseArgs)
 */
export const INLINE_CONFIG_OPTIONS = {
  "backup-root": { type: "string" as const },
  "archive-prefix": { type: "string" as const },
  compression: { type: "string" as const },
  "compose-command": { type: "string" as const },
  "docker-binary": { type: "string" as const },
  database: { type: "string" as const },
  "log-file": { type: "string" as const },
} as const;

export type ParsedOptionValues = {
  [key: string]: string | boolean | Array<string | boolean> | undefined;
};

function stringOption(values: ParsedOptionValues, key: string): string | undefined {
  const value = values[key];
  return typeof value === "string" ? value : undefined;
}

/**
 * Extract inline config options from parsed CLI values
 */
export function extractInlineOptions(values: ParsedOptionValues): InlineConfigOptions {
  const compression = stringOption(values, "compression");
  let level: number | undefined;
  if (compression !== undefined) {
    level = Number.parseInt(compression, 10);
    if (Number.isNaN(level)) {
      throw new ConfigError(`Invalid --compression value: ${compression}`);
    }
  }

  return {
    backupRoot: stringOption(values, "backup-root"),
    archivePrefix: stringOption(values, "archive-prefix"),
    compression: level,
    composeCommand: stringOption(values, "compose-command"),
    dockerBinary: stringOption(values, "docker-binary"),
    database: stringOption(values, "database"),
    logFile: stringOption(values, "log-file"),
  };
}

/**
 * Build a partial config from inline options. Paths given on the command
 * line are taken relative to the working directory.
 */
export function buildInlineConfig(options: InlineConfigOptions): ConfigInput {
  const config: ConfigInput = {};

  if (options.backupRoot) {
    config.backupRoot = path.resolve(options.backupRoot);
  }

  if (options.archivePrefix || options.compression !== undefined) {
    config.archive = {
      ...(options.archivePrefix && { prefix: options.archivePrefix }),
      ...(options.compression !== undefined && { compression: options.compression }),
    };
  }

  if (options.composeCommand || options.dockerBinary) {
    config.docker = {
      ...(options.composeCommand && { composeUpCommand: options.composeCommand }),
      ...(options.dockerBinary && { binary: options.dockerBinary }),
    };
  }

  if (options.database) {
    config.database = { path: path.resolve(options.database) };
  }

  if (options.logFile) {
    config.log = { path: path.resolve(options.logFile) };
  }

  return config;
}

/**
 * Check if any inline config options were provided
 */
export function hasInlineOptions(options: InlineConfigOptions): boolean {
  return Object.values(options).some((value) => value !== undefined);
}

/**
 * Merge inline config options into an existing config
 */
export function mergeInlineConfig(
  baseConfig: DockpackConfig,
  inlineOptions: InlineConfigOptions,
): DockpackConfig {
  return mergeConfig(baseConfig, buildInlineConfig(inlineOptions));
}
