/**
 * Manifest + payloads → one archive in the backup root
 */

import { mkdir, readFile, rm, stat, writeFile } from "node:fs/promises";
import * as path from "node:path";
import { findComposeFile, parseComposeContent } from "../../docker/compose";
import type {
  ArchiveCodec,
  BackupCatalog,
  ContainerDescriptor,
  ContainerRuntime,
  DockpackConfig,
  OperatorPrompts,
  ProjectManifest,
} from "../../types";
import { computeFileChecksum, generateUUID } from "../../utils/crypto";
import { errorMessage } from "../../utils/error";
import { logger } from "../../utils/logger";
import {
  COMPOSE_FILE,
  formatBackupTimestamp,
  generateArchiveName,
  MANIFEST_FILE,
} from "../../utils/naming";
import { pathExists } from "../../utils/path";
import { shellQuote } from "../../utils/shell";
import { MANIFEST_FORMAT_VERSION, serializeManifest } from "../archive/manifest";
import { ArchivePackError, type WarningCollector } from "../errors";
import type { CommandJournal, CommandJournalEntry, JournalAppend } from "../journal/command-journal";
import { CaptureContext, capturePayloads } from "./payload-capture";
import type { ProjectResolution } from "./project-resolver";

export interface ArchiveSettings {
  backupRoot: string;
  prefix: string;
  extension: string;
  composeUpCommand: string;
}

export function archiveSettingsFromConfig(config: DockpackConfig): ArchiveSettings {
  return {
    backupRoot: config.backupRoot,
    prefix: config.archive.prefix,
    extension: config.archive.extension,
    composeUpCommand: config.docker.composeUpCommand,
  };
}

export interface ArchiveTarget {
  archiveName: string;
  archivePath: string;
  /** Project name recorded in the manifest, suffix included */
  projectName: string;
  suffix?: number;
  /** The operator approved replacing an existing archive */
  overwrite: boolean;
}

export interface AssemblyDeps {
  runtime: ContainerRuntime;
  codec: ArchiveCodec;
  prompts: OperatorPrompts;
  journal: CommandJournal;
  catalog?: BackupCatalog;
  settings: ArchiveSettings;
  warnings: WarningCollector;
  now?: () => Date;
}

export interface AssembledArchive {
  archiveName: string;
  archivePath: string;
  projectName: string;
  manifest: ProjectManifest;
  sizeBytes: number;
  checksum: string;
  journalEntry: CommandJournalEntry | null;
  /** Catalog id, when the catalog recorded the archive */
  backupId: string | null;
}

function targetFor(
  projectName: string,
  timestamp: string,
  settings: ArchiveSettings,
  suffix?: number,
): ArchiveTarget {
  const archiveName = generateArchiveName(
    settings.prefix,
    timestamp,
    projectName,
    settings.extension,
    suffix,
  );
  return {
    archiveName,
    archivePath: path.join(settings.backupRoot, archiveName),
    projectName: suffix === undefined ? projectName : `${projectName}_${suffix}`,
    ...(suffix !== undefined && { suffix }),
    overwrite: false,
  };
}

/**
 * Lowest free `_<n>` target with n ≥ startAt
 */
export async function nextFreeTarget(
  projectName: string,
  timestamp: string,
  settings: ArchiveSettings,
  startAt: number = 1,
): Promise<ArchiveTarget> {
  for (let suffix = startAt; ; suffix++) {
    const target = targetFor(projectName, timestamp, settings, suffix);
    if (!(await pathExists(target.archivePath))) {
      return target;
    }
  }
}

/**
 * Pick the archive path. When the plain name is taken the operator is asked
 * whether to overwrite it; otherwise a numeric suffix is added.
 */
export async function chooseArchiveTarget(
  projectName: string,
  timestamp: string,
  settings: ArchiveSettings,
  prompts: OperatorPrompts,
): Promise<ArchiveTarget> {
  const target = targetFor(projectName, timestamp, settings);
  if (!(await pathExists(target.archivePath))) {
    return target;
  }

  const overwrite = await prompts.confirmOverwrite(target.archiveName);
  if (overwrite) {
    logger.warn(`Overwriting existing archive ${target.archivePath}`);
    return { ...target, overwrite: true };
  }

  return nextFreeTarget(projectName, timestamp, settings);
}

/**
 * Check the chosen path again right before packing. A path that appeared
 * since it was chosen moves the archive to the next free suffix.
 */
export async function recheckArchiveTarget(
  target: ArchiveTarget,
  baseProjectName: string,
  timestamp: string,
  settings: ArchiveSettings,
): Promise<ArchiveTarget> {
  if (target.overwrite || !(await pathExists(target.archivePath))) {
    return target;
  }

  const next = await nextFreeTarget(baseProjectName, timestamp, settings, (target.suffix ?? 0) + 1);
  logger.warn(`${target.archiveName} appeared while capturing; writing ${next.archiveName} instead`);
  return next;
}

async function captureComposeFile(
  resolution: ProjectResolution,
  context: CaptureContext,
  warnings: WarningCollector,
): Promise<string | undefined> {
  const subject = resolution.composeSourcePath ?? resolution.projectName;
  const found = await findComposeFile(resolution.composeSourcePath, resolution.composeConfigFiles);
  if (!found) {
    warnings.add("capture", subject, "compose file not found; archive will not include it");
    return undefined;
  }

  let content: string;
  try {
    content = await readFile(found, "utf-8");
  } catch (error) {
    warnings.add("capture", found, `compose file could not be read: ${errorMessage(error)}`);
    return undefined;
  }

  if (!parseComposeContent(content)) {
    warnings.add("capture", found, "compose file did not parse; embedded unchanged");
  }

  await writeFile(context.file(COMPOSE_FILE), content, "utf-8");
  logger.info(`Captured compose file ${found}`);
  return COMPOSE_FILE;
}

/**
 * Journal line that restarts the project: compose projects start from their
 * source directory, standalone projects use the first launch command.
 */
export function journalEntryFor(
  resolution: ProjectResolution,
  descriptors: ContainerDescriptor[],
  projectName: string,
  composeUpCommand: string,
): JournalAppend | null {
  if (resolution.isComposeProject) {
    const command = resolution.composeSourcePath
      ? `cd ${shellQuote(resolution.composeSourcePath)} && ${composeUpCommand}`
      : composeUpCommand;
    return { projectName, kind: "compose", command };
  }

  const command = descriptors[0]?.launchCommand;
  return command ? { projectName, kind: "standalone", command } : null;
}

async function recordJournal(
  entry: JournalAppend | null,
  deps: AssemblyDeps,
): Promise<CommandJournalEntry | null> {
  if (!entry) {
    deps.warnings.add("capture", deps.journal.filePath, "no start command to record");
    return null;
  }
  try {
    return await deps.journal.append(entry);
  } catch (error) {
    deps.warnings.add("capture", deps.journal.filePath, `journal append failed: ${errorMessage(error)}`);
    return null;
  }
}

function recordCatalog(
  archive: Omit<AssembledArchive, "journalEntry" | "backupId">,
  deps: AssemblyDeps,
): string | null {
  if (!deps.catalog) return null;

  const backupId = generateUUID();
  try {
    deps.catalog.recordBackup({
      backup_id: backupId,
      project_name: archive.projectName,
      archive_name: archive.archiveName,
      archive_path: archive.archivePath,
      archive_size_bytes: archive.sizeBytes,
      archive_checksum: archive.checksum,
      containers_count: archive.manifest.containers.length,
      is_compose: archive.manifest.isComposeProject,
    });
    return backupId;
  } catch (error) {
    deps.warnings.add("capture", archive.archiveName, `catalog update failed: ${errorMessage(error)}`);
    return null;
  }
}

/**
 * Capture payloads, write the manifest and pack everything into one archive
 */
export async function assembleArchive(
  resolution: ProjectResolution,
  descriptors: ContainerDescriptor[],
  deps: AssemblyDeps,
): Promise<AssembledArchive> {
  const { settings, warnings } = deps;
  const now = (deps.now ?? (() => new Date()))();
  const timestamp = formatBackupTimestamp(now);
  const context = await CaptureContext.create();

  try {
    const chosen = await chooseArchiveTarget(
      resolution.projectName,
      timestamp,
      settings,
      deps.prompts,
    );

    const payloads = await capturePayloads(descriptors, context, deps);
    const composeFile = resolution.isComposeProject
      ? await captureComposeFile(resolution, context, warnings)
      : undefined;

    await mkdir(settings.backupRoot, { recursive: true });
    const target = await recheckArchiveTarget(chosen, resolution.projectName, timestamp, settings);

    const manifest: ProjectManifest = {
      formatVersion: MANIFEST_FORMAT_VERSION,
      projectName: target.projectName,
      backupTimestamp: timestamp,
      createdAt: now.toISOString(),
      isComposeProject: resolution.isComposeProject,
      ...(resolution.composeSourcePath && { composeSourcePath: resolution.composeSourcePath }),
      ...(composeFile && { composeFile }),
      containers: descriptors,
      payloads,
    };
    await writeFile(context.file(MANIFEST_FILE), serializeManifest(manifest), "utf-8");

    try {
      await deps.codec.packContents(context.dir, target.archivePath);
    } catch (error) {
      await rm(target.archivePath, { force: true });
      throw new ArchivePackError(target.archivePath, error);
    }

    const sizeBytes = (await stat(target.archivePath)).size;
    const checksum = await computeFileChecksum(target.archivePath);
    logger.info(`Archive written: ${target.archivePath}`);

    const archive = {
      archiveName: target.archiveName,
      archivePath: target.archivePath,
      projectName: target.projectName,
      manifest,
      sizeBytes,
      checksum,
    };

    const journalEntry = await recordJournal(
      journalEntryFor(resolution, descriptors, target.projectName, settings.composeUpCommand),
      deps,
    );
    const backupId = recordCatalog(archive, deps);

    return { ...archive, journalEntry, backupId };
  } finally {
    await context.release();
  }
}
