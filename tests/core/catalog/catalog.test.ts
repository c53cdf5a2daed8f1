import { createHash } from "node:crypto";
import { mkdir, mkdtemp, rm, utimes, writeFile } from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { deleteAllBackupArchives, deleteBackupArchive } from "../../../src/core/catalog/deletion";
import { verifyCatalog } from "../../../src/core/catalog/verify";
import {
  getAllActiveBackups,
  getBackupById,
  getDeletionLogs,
  insertBackup,
  sqliteCatalog,
} from "../../../src/db";
import { closeDatabase, initDatabase } from "../../../src/db/connection";
import { LocalBackupStore } from "../../../src/storage/local";
import { isFile } from "../../../src/utils/path";

const PREFIX = "docker_project_backup";

function sha256(content: string): string {
  return createHash("sha256").update(content).digest("hex");
}

describe("catalog", () => {
  let tempDir: string;
  let backupRoot: string;
  let journalPath: string;
  let store: LocalBackupStore;

  async function catalogued(backupId: string, project: string, content: string, mtime: number) {
    const name = `${PREFIX}_20250101_120000_${project}.tar.gz`;
    const archivePath = path.join(backupRoot, name);
    await writeFile(archivePath, content);
    await utimes(archivePath, mtime, mtime);
    insertBackup({
      backup_id: backupId,
      project_name: project,
      archive_name: name,
      archive_path: archivePath,
      archive_size_bytes: content.length,
      archive_checksum: sha256(content),
      containers_count: 1,
      is_compose: false,
    });
    return archivePath;
  }

  beforeEach(async () => {
    tempDir = await mkdtemp(path.join(os.tmpdir(), "dockpack-catalog-test-"));
    backupRoot = path.join(tempDir, "backups");
    journalPath = path.join(backupRoot, "docker_run_commands.txt");
    await mkdir(backupRoot);
    store = new LocalBackupStore({ backupRoot, prefix: PREFIX, extension: ".tar.gz", journalPath });
    closeDatabase();
    await initDatabase(path.join(tempDir, "catalog.db"));
  });

  afterEach(async () => {
    closeDatabase();
    await rm(tempDir, { recursive: true, force: true });
  });

  describe("sqliteCatalog", () => {
    test("a new record for the same path supersedes the old one", async () => {
      const archivePath = await catalogued("b-1", "web1", "old", 1_700_000_100);

      sqliteCatalog.recordBackup({
        backup_id: "b-2",
        project_name: "web1",
        archive_name: path.basename(archivePath),
        archive_path: archivePath,
        archive_size_bytes: 3,
        archive_checksum: sha256("new"),
        containers_count: 1,
        is_compose: false,
      });

      expect(getBackupById("b-1")?.status).toBe("deleted");
      expect(getAllActiveBackups().map((b) => b.backup_id)).toEqual(["b-2"]);
    });
  });

  describe("deleteBackupArchive", () => {
    test("deletes the file, marks the record and logs the deletion", async () => {
      const archivePath = await catalogued("b-1", "web1", "a", 1_700_000_100);

      const result = await deleteBackupArchive(store, archivePath);

      expect(result).toEqual({ archivePath, backupId: "b-1", success: true });
      expect(await isFile(archivePath)).toBe(false);
      expect(getBackupById("b-1")?.status).toBe("deleted");
      expect(getDeletionLogs()).toEqual([
        expect.objectContaining({ backup_id: "b-1", archive_path: archivePath, reason: "manual", success: true }),
      ]);
    });

    test("logs a failed deletion and keeps the record active", async () => {
      const archivePath = await catalogued("b-1", "web1", "a", 1_700_000_100);
      await rm(archivePath);

      const result = await deleteBackupArchive(store, archivePath);

      expect(result).toEqual({
        archivePath,
        backupId: "b-1",
        success: false,
        error: `Archive not found: ${archivePath}`,
      });
      expect(getBackupById("b-1")?.status).toBe("active");
      expect(getDeletionLogs()[0]).toMatchObject({ success: false, error_message: `Archive not found: ${archivePath}` });
    });

    test("deletes uncatalogued archives too", async () => {
      const archivePath = path.join(backupRoot, `${PREFIX}_20250101_120000_loose.tar.gz`);
      await writeFile(archivePath, "x");

      const result = await deleteBackupArchive(store, archivePath);

      expect(result).toEqual({ archivePath, backupId: null, success: true });
    });
  });

  describe("deleteAllBackupArchives", () => {
    test("removes every archive with the journal", async () => {
      const a = await catalogued("b-1", "web1", "a", 1_700_000_100);
      const b = await catalogued("b-2", "shop", "b", 1_700_000_200);
      await writeFile(journalPath, "01 web1 standalone docker run nginx\n");

      const outcome = await deleteAllBackupArchives(store);

      expect(outcome.journalRemoved).toBe(true);
      expect(outcome.results).toEqual([
        { archivePath: a, backupId: "b-1", success: true },
        { archivePath: b, backupId: "b-2", success: true },
      ]);
      expect(getAllActiveBackups()).toEqual([]);
      expect(getDeletionLogs().map((l) => l.reason)).toEqual(["manual_all", "manual_all"]);
    });
  });

  describe("verifyCatalog", () => {
    test("sorts records into verified, missing and mismatched", async () => {
      await catalogued("b-1", "web1", "intact", 1_700_000_100);
      const missing = await catalogued("b-2", "shop", "gone", 1_700_000_200);
      const changed = await catalogued("b-3", "blog", "before", 1_700_000_300);
      await rm(missing);
      await writeFile(changed, "after");
      const loose = path.join(backupRoot, `${PREFIX}_20250101_120000_loose.tar.gz`);
      await writeFile(loose, "x");

      const report = await verifyCatalog(store);

      expect(report.verified.map((r) => r.backup_id)).toEqual(["b-1"]);
      expect(report.missing.map((r) => r.backup_id)).toEqual(["b-2"]);
      expect(report.mismatched).toEqual([
        { record: expect.objectContaining({ backup_id: "b-3" }), actualChecksum: sha256("after") },
      ]);
      expect(report.uncatalogued.map((e) => e.path)).toEqual([loose]);
      expect(report.fixed).toBe(0);
      expect(getBackupById("b-2")?.status).toBe("active");
    });

    test("fix marks missing archives deleted", async () => {
      const missing = await catalogued("b-2", "shop", "gone", 1_700_000_200);
      await rm(missing);

      const report = await verifyCatalog(store, { fix: true });

      expect(report.fixed).toBe(1);
      expect(getBackupById("b-2")?.status).toBe("deleted");
      expect(getDeletionLogs()[0]).toMatchObject({ backup_id: "b-2", reason: "missing_file", success: true });
    });
  });
});
