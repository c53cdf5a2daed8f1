/**
 * Archive deletion with catalog bookkeeping
 */

import * as path from "node:path";
import { getActiveBackupByPath, logDeletion, markArchivePathDeleted } from "../../db";
import type { LocalBackupStore } from "../../storage/local";
import type { DeletionReason } from "../../types";
import { errorMessage } from "../../utils/error";
import { logger } from "../../utils/logger";

export interface DeletionResult {
  archivePath: string;
  /** Catalog record of the archive, when there was one */
  backupId: string | null;
  success: boolean;
  error?: string;
}

export interface DeleteAllOutcome {
  results: DeletionResult[];
  journalRemoved: boolean;
}

function record(
  archivePath: string,
  backupId: string | null,
  reason: DeletionReason,
  error?: string,
): DeletionResult {
  logDeletion({
    backup_id: backupId,
    archive_path: archivePath,
    reason,
    success: error === undefined,
    error_message: error ?? null,
  });

  if (error === undefined) {
    markArchivePathDeleted(archivePath);
    logger.info(`Deleted: ${path.basename(archivePath)}`);
    return { archivePath, backupId, success: true };
  }

  logger.error(`Failed to delete ${archivePath}: ${error}`);
  return { archivePath, backupId, success: false, error };
}

/**
 * Delete one archive from the backup root and mark its catalog records
 * deleted. Every attempt is written to the deletion log.
 */
export async function deleteBackupArchive(
  store: LocalBackupStore,
  archivePath: string,
  reason: DeletionReason = "manual",
): Promise<DeletionResult> {
  const backupId = getActiveBackupByPath(archivePath)?.backup_id ?? null;

  try {
    await store.deleteArchive(archivePath);
  } catch (error) {
    return record(archivePath, backupId, reason, errorMessage(error));
  }
  return record(archivePath, backupId, reason);
}

/**
 * Delete every archive in the backup root together with the command journal
 */
export async function deleteAllBackupArchives(store: LocalBackupStore): Promise<DeleteAllOutcome> {
  const backupIds = new Map<string, string | null>();
  for (const entry of await store.listArchives()) {
    backupIds.set(entry.path, getActiveBackupByPath(entry.path)?.backup_id ?? null);
  }

  const outcome = await store.deleteAll();
  const results = [
    ...outcome.deleted.map((p) => record(p, backupIds.get(p) ?? null, "manual_all")),
    ...outcome.failed.map((f) => record(f.path, backupIds.get(f.path) ?? null, "manual_all", f.error)),
  ];

  if (outcome.journalRemoved) {
    logger.info("Command journal removed");
  }
  return { results, journalRemoved: outcome.journalRemoved };
}
