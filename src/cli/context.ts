/**
 * Shared command bootstrap: config, logging, catalog and capabilities
 */

import {
  extractInlineOptions,
  findAndLoadConfig,
  INLINE_CONFIG_OPTIONS,
  type ParsedOptionValues,
} from "../config/loader";
import type { BackupDeps } from "../core/backup/orchestrator";
import { archiveSettingsFromConfig } from "../core/backup/archive-assembler";
import { TarGzipCodec } from "../core/archive/codec";
import { RuntimeUnavailableError } from "../core/errors";
import { CommandJournal } from "../core/journal/command-journal";
import type { RestoreDeps } from "../core/restore/restore-engine";
import { initDatabase, sqliteCatalog } from "../db";
import { setDockerBinary } from "../docker/client";
import { DockerCliRuntime } from "../docker/runtime";
import { LocalBackupStore, storeSettingsFromConfig } from "../storage/local";
import type { ArchiveCodec, ContainerRuntime, DockpackConfig, OperatorPrompts } from "../types";
import { logger, setLogFile, setLogLevel } from "../utils/logger";

/**
 * Options every command accepts (for parseArgs)
 */
export const COMMON_OPTIONS = {
  config: { type: "string" as const, short: "c" },
  verbose: { type: "boolean" as const, short: "v", default: false },
  help: { type: "boolean" as const, short: "h", default: false },
  ...INLINE_CONFIG_OPTIONS,
} as const;

export const COMMON_HELP = `  -c, --config <path>          Path to config file (default: ./dockpack.config.yaml)
  -v, --verbose                Verbose output
  -h, --help                   Show this help message

      --backup-root <dir>      Directory for archives, journal, log and catalog
      --archive-prefix <str>   Archive filename prefix (default: docker_project_backup)
      --compression <0-9>      Compression level (default: 6)
      --compose-command <cmd>  Compose start command (default: docker-compose up -d)
      --docker-binary <path>   Docker executable (default: docker)
      --database <path>        Catalog database file
      --log-file <path>        Log file`;

export interface CliContext {
  config: DockpackConfig;
  runtime: ContainerRuntime;
  codec: ArchiveCodec;
  journal: CommandJournal;
  store: LocalBackupStore;
}

export interface ContextOptions {
  /** Open the catalog database (default true) */
  database?: boolean;
}

export async function createCliContext(
  values: ParsedOptionValues,
  options: ContextOptions = {},
): Promise<CliContext> {
  if (values.verbose === true) {
    setLogLevel("debug");
  }

  const configPath = typeof values.config === "string" ? values.config : undefined;
  const config = await findAndLoadConfig(configPath, extractInlineOptions(values));

  if (values.verbose !== true) {
    setLogLevel(config.log.level);
  }
  setLogFile(config.log.path);
  setDockerBinary(config.docker.binary);
  logger.debug(`Backup root: ${config.backupRoot}`);

  if (options.database !== false) {
    await initDatabase(config.database.path);
  }

  return {
    config,
    runtime: new DockerCliRuntime(),
    codec: new TarGzipCodec(config.archive.compression),
    journal: new CommandJournal(config.journal.path),
    store: new LocalBackupStore(storeSettingsFromConfig(config)),
  };
}

export async function requireDocker(runtime: ContainerRuntime): Promise<void> {
  if (!(await runtime.isAvailable())) {
    throw new RuntimeUnavailableError();
  }
}

export function backupDepsFor(context: CliContext, prompts: OperatorPrompts): BackupDeps {
  return {
    runtime: context.runtime,
    codec: context.codec,
    prompts,
    journal: context.journal,
    catalog: sqliteCatalog,
    settings: archiveSettingsFromConfig(context.config),
  };
}

export function restoreDepsFor(
  context: CliContext,
  prompts: OperatorPrompts,
  composeTargetDir?: string,
): RestoreDeps {
  const targetDir = composeTargetDir ?? context.config.restore?.composeTargetDir;
  return {
    runtime: context.runtime,
    codec: context.codec,
    prompts,
    composeUpCommand: context.config.docker.composeUpCommand,
    ...(targetDir && { composeTargetDir: targetDir }),
  };
}
