import { mkdtemp, rm } from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import {
  getActiveBackupByPath,
  getAllActiveBackups,
  getBackupById,
  insertBackup,
  markArchivePathDeleted,
  markBackupDeleted,
} from "../../src/db/backup-repository";
import { closeDatabase, initDatabase } from "../../src/db/connection";
import { getDeletionLogs, logDeletion } from "../../src/db/deletion-log-repository";
import type { BackupInsert } from "../../src/types";

function backup(overrides: Partial<BackupInsert> = {}): BackupInsert {
  return {
    backup_id: "b-1",
    project_name: "web1",
    archive_name: "docker_project_backup_20250101_120000_web1.tar.gz",
    archive_path: "/backups/docker_project_backup_20250101_120000_web1.tar.gz",
    archive_size_bytes: 2048,
    archive_checksum: "abc123",
    containers_count: 1,
    is_compose: false,
    ...overrides,
  };
}

describe("repositories", () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(path.join(os.tmpdir(), "dockpack-repository-test-"));
    closeDatabase();
    await initDatabase(path.join(tempDir, "catalog.db"));
  });

  afterEach(async () => {
    closeDatabase();
    await rm(tempDir, { recursive: true, force: true });
  });

  describe("backups", () => {
    test("insertBackup returns the stored record", () => {
      const record = insertBackup(backup({ is_compose: true, containers_count: 3 }));

      expect(record).toMatchObject({
        backup_id: "b-1",
        project_name: "web1",
        containers_count: 3,
        is_compose: true,
        status: "active",
        deleted_at: null,
      });
      expect(record.created_at).toMatch(/^\d{4}-\d{2}-\d{2}T/);
      expect(getBackupById("b-1")).toEqual(record);
    });

    test("getBackupById returns null for unknown ids", () => {
      expect(getBackupById("missing")).toBeNull();
    });

    test("lists every active backup", () => {
      insertBackup(backup({ backup_id: "b-1" }));
      insertBackup(backup({ backup_id: "b-2", project_name: "shop", archive_path: "/backups/shop.tar.gz" }));
      insertBackup(backup({ backup_id: "b-3", archive_path: "/backups/web1-2.tar.gz" }));

      expect(getAllActiveBackups().map((b) => b.backup_id).sort()).toEqual(["b-1", "b-2", "b-3"]);
    });

    test("getActiveBackupByPath returns the newest record of an overwritten archive", () => {
      insertBackup(backup({ backup_id: "b-1" }));
      insertBackup(backup({ backup_id: "b-2" }));

      expect(getActiveBackupByPath(backup().archive_path)?.backup_id).toBe("b-2");
      expect(getActiveBackupByPath("/backups/other.tar.gz")).toBeNull();
    });

    test("markBackupDeleted hides one record", () => {
      insertBackup(backup({ backup_id: "b-1" }));

      markBackupDeleted("b-1");

      const record = getBackupById("b-1");
      expect(record?.status).toBe("deleted");
      expect(record?.deleted_at).not.toBeNull();
      expect(getAllActiveBackups()).toEqual([]);
    });

    test("markArchivePathDeleted marks every active record of the path", () => {
      insertBackup(backup({ backup_id: "b-1" }));
      insertBackup(backup({ backup_id: "b-2" }));
      insertBackup(backup({ backup_id: "b-3", archive_path: "/backups/other.tar.gz" }));

      expect(markArchivePathDeleted(backup().archive_path)).toBe(2);
      expect(markArchivePathDeleted(backup().archive_path)).toBe(0);
      expect(getAllActiveBackups().map((b) => b.backup_id)).toEqual(["b-3"]);
    });
  });

  describe("deletion log", () => {
    test("records deletions newest first", () => {
      logDeletion({
        backup_id: "b-1",
        archive_path: "/backups/a.tar.gz",
        reason: "manual",
        success: true,
        error_message: null,
      });
      logDeletion({
        backup_id: null,
        archive_path: "/backups/b.tar.gz",
        reason: "manual_all",
        success: false,
        error_message: "permission denied",
      });

      const logs = getDeletionLogs();

      expect(logs).toHaveLength(2);
      expect(logs[0]).toMatchObject({
        backup_id: null,
        archive_path: "/backups/b.tar.gz",
        reason: "manual_all",
        success: false,
        error_message: "permission denied",
      });
      expect(logs[1]).toMatchObject({ backup_id: "b-1", reason: "manual", success: true });
    });

    test("respects the limit", () => {
      for (const name of ["a", "b", "c"]) {
        logDeletion({
          backup_id: null,
          archive_path: `/backups/${name}.tar.gz`,
          reason: "missing_file",
          success: true,
          error_message: null,
        });
      }

      expect(getDeletionLogs(2).map((l) => l.archive_path)).toEqual([
        "/backups/c.tar.gz",
        "/backups/b.tar.gz",
      ]);
    });
  });
});
