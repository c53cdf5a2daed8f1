import { createHash } from "node:crypto";
import { mkdir, mkdtemp, rm, utimes, writeFile } from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { LocalBackupStore } from "../../src/storage/local";
import { isFile } from "../../src/utils/path";

const PREFIX = "docker_project_backup";

describe("LocalBackupStore", () => {
  let tempDir: string;
  let backupRoot: string;
  let journalPath: string;
  let store: LocalBackupStore;

  async function writeArchive(name: string, content: string, mtimeSeconds?: number): Promise<string> {
    const archivePath = path.join(backupRoot, name);
    await writeFile(archivePath, content);
    if (mtimeSeconds !== undefined) {
      await utimes(archivePath, mtimeSeconds, mtimeSeconds);
    }
    return archivePath;
  }

  beforeEach(async () => {
    tempDir = await mkdtemp(path.join(os.tmpdir(), "dockpack-store-test-"));
    backupRoot = path.join(tempDir, "backups");
    journalPath = path.join(backupRoot, "docker_run_commands.txt");
    await mkdir(backupRoot);
    store = new LocalBackupStore({ backupRoot, prefix: PREFIX, extension: ".tar.gz", journalPath });
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  describe("listArchives", () => {
    test("lists archives oldest first with parsed names", async () => {
      await writeArchive(`${PREFIX}_20250102_090000_shop.tar.gz`, "second", 1_700_000_200);
      await writeArchive(`${PREFIX}_20250101_120000_web1.tar.gz`, "first", 1_700_000_100);

      const entries = await store.listArchives();

      expect(entries.map((e) => e.name)).toEqual([
        `${PREFIX}_20250101_120000_web1.tar.gz`,
        `${PREFIX}_20250102_090000_shop.tar.gz`,
      ]);
      expect(entries[0]).toMatchObject({
        path: path.join(backupRoot, `${PREFIX}_20250101_120000_web1.tar.gz`),
        sizeBytes: 5,
        projectName: "web1",
        timestamp: "20250101_120000",
      });
    });

    test("skips files that are not archives", async () => {
      await writeFile(journalPath, "01 web1 standalone docker run nginx\n");
      await writeFile(path.join(backupRoot, "notes.txt"), "x");
      await mkdir(path.join(backupRoot, `${PREFIX}_dir.tar.gz`));

      expect(await store.listArchives()).toEqual([]);
    });

    test("keeps archives whose name does not parse", async () => {
      await writeArchive(`${PREFIX}_manual.tar.gz`, "x");

      const [entry] = await store.listArchives();

      expect(entry?.projectName).toBeNull();
      expect(entry?.timestamp).toBeNull();
    });

    test("returns nothing when the backup root is missing", async () => {
      const missing = new LocalBackupStore({
        backupRoot: path.join(tempDir, "missing"),
        prefix: PREFIX,
        extension: ".tar.gz",
        journalPath,
      });

      expect(await missing.listArchives()).toEqual([]);
    });
  });

  describe("resolveArchive", () => {
    test("looks bare names up in the backup root", () => {
      expect(store.resolveArchive("a.tar.gz")).toBe(path.join(backupRoot, "a.tar.gz"));
    });

    test("takes anything with a directory part as a path", () => {
      expect(store.resolveArchive("/elsewhere/a.tar.gz")).toBe("/elsewhere/a.tar.gz");
    });
  });

  describe("getChecksum", () => {
    test("returns the sha256 of the archive", async () => {
      const archivePath = await writeArchive(`${PREFIX}_20250101_120000_web1.tar.gz`, "payload");

      expect(await store.getChecksum(archivePath)).toBe(
        createHash("sha256").update("payload").digest("hex"),
      );
    });

    test("returns null for a missing archive", async () => {
      expect(await store.getChecksum(path.join(backupRoot, "gone.tar.gz"))).toBeNull();
    });
  });

  describe("deleteArchive", () => {
    test("removes an archive inside the backup root", async () => {
      const archivePath = await writeArchive(`${PREFIX}_20250101_120000_web1.tar.gz`, "x");

      await store.deleteArchive(archivePath);

      expect(await isFile(archivePath)).toBe(false);
    });

    test("refuses paths outside the backup root", async () => {
      const outside = path.join(tempDir, "outside.tar.gz");
      await writeFile(outside, "x");

      await expect(store.deleteArchive(outside)).rejects.toThrow(
        `Refusing to delete "${outside}": outside backup root "${backupRoot}"`,
      );
      expect(await isFile(outside)).toBe(true);
    });

    test("refuses the backup root itself", () => {
      expect(store.isWithinRoot(backupRoot)).toBe(false);
    });

    test("reports a missing archive", async () => {
      const missing = path.join(backupRoot, "gone.tar.gz");

      await expect(store.deleteArchive(missing)).rejects.toThrow(`Archive not found: ${missing}`);
    });
  });

  describe("deleteAll", () => {
    test("removes every archive and the journal", async () => {
      const a = await writeArchive(`${PREFIX}_20250101_120000_web1.tar.gz`, "a", 1_700_000_100);
      const b = await writeArchive(`${PREFIX}_20250101_120000_shop.tar.gz`, "b", 1_700_000_200);
      await writeFile(journalPath, "01 web1 standalone docker run nginx\n");
      await writeFile(path.join(backupRoot, "notes.txt"), "kept");

      const result = await store.deleteAll();

      expect(result).toEqual({ deleted: [a, b], failed: [], journalRemoved: true });
      expect(await isFile(path.join(backupRoot, "notes.txt"))).toBe(true);
    });

    test("reports journalRemoved false without a journal", async () => {
      expect(await store.deleteAll()).toEqual({ deleted: [], failed: [], journalRemoved: false });
    });
  });
});
