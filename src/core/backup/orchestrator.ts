/**
 * Backup orchestration
 */

import type { ContainerDescriptor, ContainerRuntime } from "../../types";
import { errorMessage } from "../../utils/error";
import { formatBytes, formatDuration } from "../../utils/format";
import { logger } from "../../utils/logger";
import { type OperationWarning, WarningCollector } from "../errors";
import {
  type AssembledArchive,
  type AssemblyDeps,
  assembleArchive,
} from "./archive-assembler";
import { buildContainerDescriptor } from "./descriptor-builder";
import { type ProjectResolution, resolveProject } from "./project-resolver";

export type BackupDeps = Omit<AssemblyDeps, "warnings">;

export type OutcomeStatus = "success" | "partial" | "failed";

export interface BackupResult {
  identifier: string;
  resolution: ProjectResolution;
  archive: AssembledArchive;
  warnings: OperationWarning[];
  durationMs: number;
}

export interface BackupOutcome {
  identifier: string;
  status: OutcomeStatus;
  result?: BackupResult;
  error?: Error;
  warnings: OperationWarning[];
}

/**
 * Back up the project an identifier resolves to. Throws NotFoundError
 * before touching anything when no container matches.
 */
export async function backupProject(identifier: string, deps: BackupDeps): Promise<BackupResult> {
  const startTime = Date.now();
  logger.info(`Starting backup of "${identifier}"`);

  const resolution = await resolveProject(identifier, deps.runtime);
  const warnings = new WarningCollector((message) => logger.warn(message));

  const descriptors: ContainerDescriptor[] = [];
  for (const id of resolution.containerIds) {
    descriptors.push(await buildContainerDescriptor(id, deps.runtime, warnings));
  }

  const archive = await assembleArchive(resolution, descriptors, { ...deps, warnings });
  const durationMs = Date.now() - startTime;

  logger.info(
    `Backup of ${archive.projectName} completed in ${formatDuration(durationMs)} (${formatBytes(archive.sizeBytes)})`,
  );
  if (warnings.size > 0) {
    logger.warn(`Backup of ${archive.projectName} finished with ${warnings.size} warning(s)`);
  }

  return { identifier, resolution, archive, warnings: warnings.warnings, durationMs };
}

/**
 * Back up several identifiers one after another. A failed item is recorded
 * and the batch continues.
 */
export async function backupProjects(
  identifiers: string[],
  deps: BackupDeps,
): Promise<BackupOutcome[]> {
  const outcomes: BackupOutcome[] = [];

  for (const identifier of identifiers) {
    try {
      const result = await backupProject(identifier, deps);
      outcomes.push({
        identifier,
        status: result.warnings.length > 0 ? "partial" : "success",
        result,
        warnings: result.warnings,
      });
    } catch (error) {
      logger.error(`Backup of "${identifier}" failed: ${errorMessage(error)}`);
      outcomes.push({
        identifier,
        status: "failed",
        error: error instanceof Error ? error : new Error(errorMessage(error)),
        warnings: [],
      });
    }
  }

  return outcomes;
}

/**
 * Identifiers for backing up everything: one container name per compose
 * project, plus every container outside a compose project.
 */
export async function allBackupIdentifiers(runtime: ContainerRuntime): Promise<string[]> {
  const containers = await runtime.listContainers();
  const seenProjects = new Set<string>();
  const identifiers: string[] = [];

  for (const container of containers) {
    if (!container.name) continue;
    if (container.composeProject) {
      if (seenProjects.has(container.composeProject)) continue;
      seenProjects.add(container.composeProject);
    }
    identifiers.push(container.name);
  }
  return identifiers;
}
