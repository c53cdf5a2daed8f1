/**
 * Database row mapping utilities
 */

import type { BackupRecord, BackupStatus, DeletionLogRecord, DeletionReason } from "../types";

export type RawBackupRow = Omit<BackupRecord, "is_compose" | "status"> & {
  is_compose: number;
  status: string;
};

export type RawDeletionLogRow = Omit<DeletionLogRecord, "success" | "reason"> & {
  success: number;
  reason: string;
};

function toStatus(value: string): BackupStatus {
  return value === "deleted" ? "deleted" : "active";
}

function toReason(value: string): DeletionReason {
  return value === "manual_all" || value === "missing_file" ? value : "manual";
}

export function parseBackupRow(row: RawBackupRow): BackupRecord {
  return {
    ...row,
    is_compose: Boolean(row.is_compose),
    status: toStatus(row.status),
  };
}

export function parseDeletionLogRow(row: RawDeletionLogRow): DeletionLogRecord {
  return {
    ...row,
    reason: toReason(row.reason),
    success: Boolean(row.success),
  };
}
