/**
 * Backup record repository
 */

import type { BackupCatalog, BackupInsert, BackupRecord } from "../types";
import { debug } from "../utils/logger";
import { getDatabase } from "./connection";
import { parseBackupRow, type RawBackupRow } from "./mappers";

export function insertBackup(backup: BackupInsert): BackupRecord {
  const database = getDatabase();

  database
    .prepare(`
      INSERT INTO backups (
        backup_id, project_name, archive_name, archive_path,
        archive_size_bytes, archive_checksum, containers_count, is_compose
      ) VALUES (@backup_id, @project_name, @archive_name, @archive_path,
        @archive_size_bytes, @archive_checksum, @containers_count, @is_compose)
    `)
    .run({ ...backup, is_compose: backup.is_compose ? 1 : 0 });

  const inserted = getBackupById(backup.backup_id);
  if (!inserted) {
    throw new Error(`Failed to retrieve inserted backup: ${backup.backup_id}`);
  }
  return inserted;
}

export function getBackupById(backupId: string): BackupRecord | null {
  const row = getDatabase()
    .prepare<[string], RawBackupRow>("SELECT * FROM backups WHERE backup_id = ?")
    .get(backupId);

  return row ? parseBackupRow(row) : null;
}

export function getAllActiveBackups(): BackupRecord[] {
  const rows = getDatabase()
    .prepare<[], RawBackupRow>(
      "SELECT * FROM backups WHERE status = 'active' ORDER BY created_at DESC, id DESC",
    )
    .all();

  return rows.map(parseBackupRow);
}

/**
 * Most recent active record for an archive path. An overwritten archive
 * leaves older records behind; the newest describes the file on disk.
 */
export function getActiveBackupByPath(archivePath: string): BackupRecord | null {
  const row = getDatabase()
    .prepare<[string], RawBackupRow>(`
      SELECT * FROM backups
      WHERE archive_path = ? AND status = 'active'
      ORDER BY created_at DESC, id DESC
      LIMIT 1
    `)
    .get(archivePath);

  return row ? parseBackupRow(row) : null;
}

export function markBackupDeleted(backupId: string): void {
  getDatabase()
    .prepare(
      "UPDATE backups SET status = 'deleted', deleted_at = strftime('%Y-%m-%dT%H:%M:%fZ', 'now') WHERE backup_id = ?",
    )
    .run(backupId);
}

/**
 * Mark every active record of an archive path deleted
 */
export function markArchivePathDeleted(archivePath: string): number {
  const result = getDatabase()
    .prepare(
      "UPDATE backups SET status = 'deleted', deleted_at = strftime('%Y-%m-%dT%H:%M:%fZ', 'now') WHERE archive_path = ? AND status = 'active'",
    )
    .run(archivePath);
  return result.changes;
}

/**
 * Catalog backed by the backups table. Recording an archive supersedes any
 * active record of the same path, since an overwrite replaces the file.
 */
export const sqliteCatalog: BackupCatalog = {
  recordBackup(backup) {
    const superseded = markArchivePathDeleted(backup.archive_path);
    if (superseded > 0) {
      debug(`Superseded ${superseded} record(s) of ${backup.archive_path}`);
    }
    return insertBackup(backup);
  },
};
