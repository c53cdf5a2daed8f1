/**
 * Database record type definitions
 */

export type BackupStatus = "active" | "deleted";
export type DeletionReason = "manual" | "manual_all" | "missing_file";

export interface BackupRecord {
  id: number;
  backup_id: string;
  project_name: string;
  archive_name: string;
  archive_path: string;
  archive_size_bytes: number;
  archive_checksum: string;
  containers_count: number;
  is_compose: boolean;
  created_at: string;
  status: BackupStatus;
  deleted_at: string | null;
}

export interface DeletionLogRecord {
  id: number;
  backup_id: string | null;
  archive_path: string;
  reason: DeletionReason;
  deleted_at: string;
  success: boolean;
  error_message: string | null;
}

export interface BackupInsert {
  backup_id: string;
  project_name: string;
  archive_name: string;
  archive_path: string;
  archive_size_bytes: number;
  archive_checksum: string;
  containers_count: number;
  is_compose: boolean;
}

export interface Migration {
  version: number;
  name: string;
  description: string;
  up: string;
}

/**
 * Where successful backups are recorded
 */
export interface BackupCatalog {
  recordBackup(backup: BackupInsert): BackupRecord;
}
