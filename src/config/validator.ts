/**
 * Configuration validation
 */

import type { ConfigInput, DockpackConfig } from "../types";
import { isRecord } from "../utils/json";
import { isLogLevel } from "../utils/logger";

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

type Section = Record<string, unknown>;

function optionalString(section: Section, key: string, label: string): string | undefined {
  const value = section[key];
  if (value === undefined) return undefined;
  if (typeof value !== "string" || value.length === 0) {
    throw new ConfigError(`${label}.${key} must be a non-empty string`);
  }
  return value;
}

function optionalSection(raw: Section, key: string): Section | undefined {
  const value = raw[key];
  if (value === undefined) return undefined;
  if (!isRecord(value)) {
    throw new ConfigError(`${key} must be an object`);
  }
  return value;
}

type SectionParser<K extends keyof ConfigInput> = (section: Section) => NonNullable<ConfigInput[K]>;

const sectionParsers: { [K in "archive" | "journal" | "log" | "database" | "docker" | "restore"]: SectionParser<K> } = {
  archive: (s) => {
    const compression = s.compression;
    if (compression !== undefined && typeof compression !== "number") {
      throw new ConfigError("archive.compression must be a number");
    }
    const prefix = optionalString(s, "prefix", "archive");
    const extension = optionalString(s, "extension", "archive");
    return {
      ...(prefix !== undefined && { prefix }),
      ...(extension !== undefined && { extension }),
      ...(compression !== undefined && { compression }),
    };
  },

  journal: (s) => {
    const path = optionalString(s, "path", "journal");
    return path === undefined ? {} : { path };
  },

  log: (s) => {
    const path = optionalString(s, "path", "log");
    const level = s.level;
    if (level !== undefined && !isLogLevel(level)) {
      throw new ConfigError("log.level must be one of: debug, info, warn, error");
    }
    return {
      ...(path !== undefined && { path }),
      ...(level !== undefined && { level }),
    };
  },

  database: (s) => {
    const path = optionalString(s, "path", "database");
    return path === undefined ? {} : { path };
  },

  docker: (s) => {
    const binary = optionalString(s, "binary", "docker");
    const composeUpCommand = optionalString(s, "composeUpCommand", "docker");
    return {
      ...(binary !== undefined && { binary }),
      ...(composeUpCommand !== undefined && { composeUpCommand }),
    };
  },

  restore: (s) => {
    const composeTargetDir = optionalString(s, "composeTargetDir", "restore");
    return composeTargetDir === undefined ? {} : { composeTargetDir };
  },
};

/**
 * Check the shape of a parsed config file and copy out the known fields
 */
export function parseConfigInput(raw: unknown): ConfigInput {
  if (raw === null || raw === undefined) {
    return {};
  }
  if (!isRecord(raw)) {
    throw new ConfigError("Config must be an object");
  }

  const input: ConfigInput = {};

  if (raw.version !== undefined) {
    if (typeof raw.version !== "string" && typeof raw.version !== "number") {
      throw new ConfigError("version must be a string");
    }
    input.version = String(raw.version);
  }

  const backupRoot = optionalString(raw, "backupRoot", "config");
  if (backupRoot !== undefined) {
    input.backupRoot = backupRoot;
  }

  const archive = optionalSection(raw, "archive");
  if (archive) input.archive = sectionParsers.archive(archive);

  const journal = optionalSection(raw, "journal");
  if (journal) input.journal = sectionParsers.journal(journal);

  const log = optionalSection(raw, "log");
  if (log) input.log = sectionParsers.log(log);

  const database = optionalSection(raw, "database");
  if (database) input.database = sectionParsers.database(database);

  const docker = optionalSection(raw, "docker");
  if (docker) input.docker = sectionParsers.docker(docker);

  const restore = optionalSection(raw, "restore");
  if (restore) input.restore = sectionParsers.restore(restore);

  return input;
}

/**
 * Validate a fully merged configuration
 */
export function validateConfig(config: DockpackConfig): void {
  if (!config.backupRoot) {
    throw new ConfigError("backupRoot must be set");
  }

  const { compression, prefix, extension } = config.archive;
  if (!Number.isInteger(compression) || compression < 0 || compression > 9) {
    throw new ConfigError("archive.compression must be an integer between 0 and 9");
  }
  if (!/^[A-Za-z0-9._-]+$/.test(prefix)) {
    throw new ConfigError("archive.prefix may only contain letters, digits, '.', '_' and '-'");
  }
  if (!extension.startsWith(".") || extension.includes("/")) {
    throw new ConfigError("archive.extension must start with '.' and contain no '/'");
  }
  if (!config.docker.composeUpCommand.trim()) {
    throw new ConfigError("docker.composeUpCommand must not be blank");
  }
}
