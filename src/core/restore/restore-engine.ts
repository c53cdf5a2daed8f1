/**
 * Archive → volumes, bind mounts and project reconstruction
 */

import { mkdtemp, rm } from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import type { ArchiveCodec, ContainerRuntime, OperatorPrompts, ProjectManifest } from "../../types";
import { errorMessage } from "../../utils/error";
import { logger } from "../../utils/logger";
import { isFile } from "../../utils/path";
import { ManifestError, readManifest } from "../archive/manifest";
import type { OutcomeStatus } from "../backup/orchestrator";
import {
  ExtractionError,
  InvalidArchiveError,
  type OperationWarning,
  WarningCollector,
} from "../errors";
import { type MountRestoreResult, restoreMounts } from "./mount-restorer";
import {
  type ComposeRestoreReport,
  type ContainerLaunchReport,
  relaunchContainers,
  restoreComposeFile,
} from "./project-reconstructor";

export type RestorePhase =
  | "extracting"
  | "manifest-loaded"
  | "mounts-restoring"
  | "project-reconstructing"
  | "done"
  | "partially-failed";

export interface RestoreDeps {
  runtime: ContainerRuntime;
  codec: ArchiveCodec;
  prompts: OperatorPrompts;
  composeUpCommand: string;
  composeTargetDir?: string;
  onPhase?: (phase: RestorePhase) => void;
}

export interface RestoreResult {
  archivePath: string;
  manifest: ProjectManifest;
  status: "done" | "partially-failed";
  phases: RestorePhase[];
  mounts: MountRestoreResult;
  compose: ComposeRestoreReport | null;
  launches: ContainerLaunchReport[];
  warnings: OperationWarning[];
}

export interface RestoreOutcome {
  archivePath: string;
  status: OutcomeStatus;
  result?: RestoreResult;
  error?: Error;
  warnings: OperationWarning[];
}

/**
 * Restore one archive. Extraction failures and unusable manifests throw;
 * everything after that degrades to warnings.
 */
export async function restoreArchive(archivePath: string, deps: RestoreDeps): Promise<RestoreResult> {
  const phases: RestorePhase[] = [];
  const enter = (phase: RestorePhase) => {
    phases.push(phase);
    logger.debug(`Restore ${path.basename(archivePath)}: ${phase}`);
    deps.onPhase?.(phase);
  };

  if (!(await isFile(archivePath))) {
    throw new ExtractionError(archivePath, new Error("archive not found"));
  }

  const warnings = new WarningCollector((message) => logger.warn(message));
  const workDir = await mkdtemp(path.join(os.tmpdir(), "dockpack-restore-"));

  try {
    enter("extracting");
    try {
      await deps.codec.unpack(archivePath, workDir);
    } catch (error) {
      throw new ExtractionError(archivePath, error);
    }

    let manifest: ProjectManifest;
    try {
      manifest = await readManifest(workDir);
    } catch (error) {
      if (error instanceof ManifestError) {
        throw new InvalidArchiveError(archivePath, error.message);
      }
      throw error;
    }
    enter("manifest-loaded");
    logger.info(
      `Restoring ${manifest.projectName} (${manifest.containers.length} container(s), backed up ${manifest.backupTimestamp})`,
    );

    enter("mounts-restoring");
    const mounts = await restoreMounts(manifest, workDir, { ...deps, warnings });

    enter("project-reconstructing");
    const reconstructDeps = { ...deps, warnings };
    const compose = manifest.isComposeProject
      ? await restoreComposeFile(manifest, workDir, reconstructDeps)
      : null;
    const launches = await relaunchContainers(manifest, reconstructDeps);

    const status = warnings.size === 0 ? "done" : "partially-failed";
    enter(status);
    logger.info(`Verify the restored containers and data of ${manifest.projectName} manually`);

    return {
      archivePath,
      manifest,
      status,
      phases,
      mounts,
      compose,
      launches,
      warnings: warnings.warnings,
    };
  } finally {
    await rm(workDir, { recursive: true, force: true });
  }
}

/**
 * Restore several archives one after another. A failed item is recorded
 * and the batch continues.
 */
export async function restoreArchives(
  archivePaths: string[],
  deps: RestoreDeps,
): Promise<RestoreOutcome[]> {
  const outcomes: RestoreOutcome[] = [];

  for (const archivePath of archivePaths) {
    try {
      const result = await restoreArchive(archivePath, deps);
      outcomes.push({
        archivePath,
        status: result.status === "done" ? "success" : "partial",
        result,
        warnings: result.warnings,
      });
    } catch (error) {
      logger.error(`Restore of ${archivePath} failed: ${errorMessage(error)}`);
      outcomes.push({
        archivePath,
        status: "failed",
        error: error instanceof Error ? error : new Error(errorMessage(error)),
        warnings: [],
      });
    }
  }

  return outcomes;
}
