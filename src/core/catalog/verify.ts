/**
 * Catalog verification against the archives on disk
 */

import { getAllActiveBackups, logDeletion, markBackupDeleted } from "../../db";
import type { ArchiveEntry, LocalBackupStore } from "../../storage/local";
import type { BackupRecord } from "../../types";
import { logger } from "../../utils/logger";

export interface ChecksumMismatch {
  record: BackupRecord;
  actualChecksum: string;
}

export interface VerifyReport {
  verified: BackupRecord[];
  missing: BackupRecord[];
  mismatched: ChecksumMismatch[];
  /** Archives in the backup root without an active catalog record */
  uncatalogued: ArchiveEntry[];
  /** Records of missing archives marked deleted */
  fixed: number;
}

export interface VerifyOptions {
  /** Mark records whose archive is gone as deleted */
  fix?: boolean;
}

/**
 * Compare each active record's checksum with the archive on disk
 */
export async function verifyCatalog(
  store: LocalBackupStore,
  options: VerifyOptions = {},
): Promise<VerifyReport> {
  const report: VerifyReport = {
    verified: [],
    missing: [],
    mismatched: [],
    uncatalogued: [],
    fixed: 0,
  };

  const records = getAllActiveBackups();
  const catalogued = new Set<string>();

  for (const record of records) {
    catalogued.add(record.archive_path);
    const actualChecksum = await store.getChecksum(record.archive_path);

    if (actualChecksum === null) {
      logger.warn(`Archive missing: ${record.archive_path}`);
      report.missing.push(record);
      continue;
    }
    if (actualChecksum !== record.archive_checksum) {
      logger.warn(`Checksum mismatch: ${record.archive_path}`);
      report.mismatched.push({ record, actualChecksum });
      continue;
    }
    report.verified.push(record);
  }

  for (const entry of await store.listArchives()) {
    if (!catalogued.has(entry.path)) {
      report.uncatalogued.push(entry);
    }
  }

  if (options.fix) {
    for (const record of report.missing) {
      markBackupDeleted(record.backup_id);
      logDeletion({
        backup_id: record.backup_id,
        archive_path: record.archive_path,
        reason: "missing_file",
        success: true,
        error_message: null,
      });
      report.fixed++;
    }
    if (report.fixed > 0) {
      logger.info(`Marked ${report.fixed} missing archive record(s) as deleted`);
    }
  }

  return report;
}
