import { mkdir, mkdtemp, readdir, readFile, rm, writeFile } from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import { TarGzipCodec } from "../../src/core/archive/codec";
import { readManifest } from "../../src/core/archive/manifest";
import {
  allBackupIdentifiers,
  type BackupDeps,
  backupProject,
  backupProjects,
} from "../../src/core/backup/orchestrator";
import { ExtractionError, InvalidArchiveError, NotFoundError } from "../../src/core/errors";
import { CommandJournal } from "../../src/core/journal/command-journal";
import { type RestoreDeps, restoreArchive, restoreArchives } from "../../src/core/restore/restore-engine";
import type { ArchiveCodec, BackupInsert, BackupRecord } from "../../src/types";
import { bindPayloadName } from "../../src/utils/naming";
import { shellQuote } from "../../src/utils/shell";
import { FakeRuntime, ScriptedPrompts } from "../helpers/fake-runtime";

const WEB1_ID = "f00dfeedbeef00112233445566778899aabbccddeeff00112233445566778899";
const BACKUP_TIME = new Date(2025, 0, 1, 12, 0, 0);

describe("backup and restore", () => {
  let tempDir: string;
  let backupRoot: string;
  let bindDir: string;
  let runtime: FakeRuntime;
  const codec = new TarGzipCodec(6);

  function backupDeps(prompts = new ScriptedPrompts()): BackupDeps {
    return {
      runtime,
      codec,
      prompts,
      journal: new CommandJournal(path.join(backupRoot, "docker_run_commands.txt")),
      settings: {
        backupRoot,
        prefix: "docker_project_backup",
        extension: ".tar.gz",
        composeUpCommand: "docker-compose up -d",
      },
      now: () => BACKUP_TIME,
    };
  }

  function restoreDeps(prompts = new ScriptedPrompts()): RestoreDeps {
    return { runtime, codec, prompts, composeUpCommand: "docker-compose up -d" };
  }

  async function archiveEntries(archivePath: string): Promise<string[]> {
    const out = await mkdtemp(path.join(tempDir, "inspect-"));
    await codec.unpack(archivePath, out);
    return (await readdir(out)).sort();
  }

  async function archiveManifest(archivePath: string) {
    const out = await mkdtemp(path.join(tempDir, "manifest-"));
    await codec.unpack(archivePath, out);
    return readManifest(out);
  }

  beforeEach(async () => {
    tempDir = await mkdtemp(path.join(os.tmpdir(), "dockpack-backup-test-"));
    backupRoot = path.join(tempDir, "backups");
    bindDir = path.join(tempDir, "data", "web1");
    await mkdir(path.join(bindDir, "assets"), { recursive: true });
    await writeFile(path.join(bindDir, "index.html"), "<h1>hello</h1>");
    await writeFile(path.join(bindDir, "assets", "site.css"), "body { margin: 0; }");

    runtime = new FakeRuntime(path.join(tempDir, "volumes"));
    runtime.addContainer({
      id: WEB1_ID,
      name: "web1",
      image: "nginx:1.25",
      binds: [`${bindDir}:/usr/share/nginx/html`],
      mounts: [{ type: "bind", source: bindDir, destination: "/usr/share/nginx/html" }],
    });
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(tempDir, { recursive: true, force: true });
  });

  describe("standalone container", () => {
    test("writes one archive with the manifest and the bind payload", async () => {
      const result = await backupProject("web1", backupDeps());

      expect(result.archive.archiveName).toBe("docker_project_backup_20250101_120000_web1.tar.gz");
      expect(result.archive.archivePath).toBe(
        path.join(backupRoot, "docker_project_backup_20250101_120000_web1.tar.gz"),
      );
      expect(result.warnings).toEqual([]);
      expect(await archiveEntries(result.archive.archivePath)).toEqual(
        [bindPayloadName(bindDir), "manifest.json"].sort(),
      );

      const manifest = await archiveManifest(result.archive.archivePath);
      expect(manifest.projectName).toBe("web1");
      expect(manifest.isComposeProject).toBe(false);
      expect(manifest.composeFile).toBeUndefined();
      expect(manifest.payloads).toEqual([{ type: "bind", source: bindDir, file: bindPayloadName(bindDir) }]);
    });

    test("records the launch command in the journal", async () => {
      const result = await backupProject("web1", backupDeps());
      const command = `docker run -v ${shellQuote(`${bindDir}:/usr/share/nginx/html`)} --name web1 nginx:1.25`;

      expect(result.archive.journalEntry).toEqual({
        sequenceNumber: 1,
        projectName: "web1",
        kind: "standalone",
        command,
      });
      expect(await readFile(path.join(backupRoot, "docker_run_commands.txt"), "utf-8")).toBe(
        `01 web1 standalone ${command}\n`,
      );
    });

    test("restores the bind mount contents and recreates the container", async () => {
      const { archive } = await backupProject("web1", backupDeps());
      await rm(bindDir, { recursive: true, force: true });

      const result = await restoreArchive(archive.archivePath, restoreDeps(new ScriptedPrompts([true, true])));

      expect(result.status).toBe("done");
      expect(result.phases).toEqual([
        "extracting",
        "manifest-loaded",
        "mounts-restoring",
        "project-reconstructing",
        "done",
      ]);
      expect(result.mounts).toEqual({ volumes: [], bindPaths: [bindDir] });
      expect(await readFile(path.join(bindDir, "index.html"), "utf-8")).toBe("<h1>hello</h1>");
      expect(await readFile(path.join(bindDir, "assets", "site.css"), "utf-8")).toBe("body { margin: 0; }");

      const launchCommand = archive.manifest.containers[0]?.launchCommand;
      expect(runtime.stopped).toEqual([WEB1_ID]);
      expect(runtime.removed).toEqual([WEB1_ID]);
      expect(runtime.commands).toEqual([launchCommand]);
      expect(result.launches).toEqual([{ name: "web1", command: launchCommand, executed: true, success: true }]);
    });

    test("restoring twice gives the same contents", async () => {
      const { archive } = await backupProject("web1", backupDeps());
      await writeFile(path.join(bindDir, "index.html"), "changed");

      await restoreArchive(archive.archivePath, restoreDeps(new ScriptedPrompts([], [], false)));
      const first = await readFile(path.join(bindDir, "index.html"), "utf-8");
      await restoreArchive(archive.archivePath, restoreDeps(new ScriptedPrompts([], [], false)));
      const second = await readFile(path.join(bindDir, "index.html"), "utf-8");

      expect(first).toBe("<h1>hello</h1>");
      expect(second).toBe(first);
    });

    test("declining the start command is a warning, not a failure", async () => {
      const { archive } = await backupProject("web1", backupDeps());

      const result = await restoreArchive(archive.archivePath, restoreDeps(new ScriptedPrompts([false])));

      expect(result.status).toBe("partially-failed");
      expect(result.warnings).toEqual([
        { kind: "confirmation-declined", subject: "web1", message: "start command not run" },
      ]);
      expect(runtime.commands).toEqual([]);
    });

    test("adds a restart policy to the start command", async () => {
      runtime.addContainer({
        id: WEB1_ID,
        name: "web1",
        image: "nginx:1.25",
        restartPolicy: "unless-stopped",
      });
      const { archive } = await backupProject("web1", backupDeps());

      await restoreArchive(archive.archivePath, restoreDeps());

      expect(runtime.commands).toEqual(["docker run --restart unless-stopped --name web1 nginx:1.25"]);
    });

    test("captures and restores named volumes", async () => {
      const mountpoint = await runtime.addVolume("web1_cache");
      await writeFile(path.join(mountpoint, "entry.bin"), "cached");
      runtime.addContainer({
        id: WEB1_ID,
        name: "web1",
        image: "nginx:1.25",
        mounts: [{ type: "volume", source: "web1_cache", destination: "/cache" }],
      });

      const { archive } = await backupProject("web1", backupDeps());
      expect(archive.manifest.payloads).toEqual([
        { type: "volume", source: "web1_cache", file: "volume_web1_cache.tar.gz" },
      ]);

      runtime.volumes.delete("web1_cache");
      await rm(path.join(tempDir, "volumes"), { recursive: true, force: true });

      const result = await restoreArchive(archive.archivePath, restoreDeps(new ScriptedPrompts([false])));

      expect(result.mounts.volumes).toEqual(["web1_cache"]);
      expect(await readFile(path.join(tempDir, "volumes", "web1_cache", "_data", "entry.bin"), "utf-8")).toBe(
        "cached",
      );
    });

    test("bind paths with long names survive a round trip", async () => {
      const longDir = path.join(tempDir, "long", "d".repeat(200));
      await mkdir(longDir, { recursive: true });
      await writeFile(path.join(longDir, "notes.txt"), "kept");
      runtime.addContainer({
        id: WEB1_ID,
        name: "web1",
        image: "nginx:1.25",
        mounts: [{ type: "bind", source: longDir, destination: "/notes" }],
      });

      const { archive, warnings } = await backupProject("web1", backupDeps());
      expect(warnings).toEqual([]);
      expect(bindPayloadName(longDir)).toContain("/");
      expect(archive.manifest.payloads).toEqual([{ type: "bind", source: longDir, file: bindPayloadName(longDir) }]);

      await rm(longDir, { recursive: true, force: true });
      const result = await restoreArchive(archive.archivePath, restoreDeps(new ScriptedPrompts([false])));

      expect(result.mounts.bindPaths).toEqual([longDir]);
      expect(await readFile(path.join(longDir, "notes.txt"), "utf-8")).toBe("kept");
    });

    test("a missing bind path is a capture warning", async () => {
      await rm(bindDir, { recursive: true, force: true });

      const result = await backupProject("web1", backupDeps());

      expect(result.warnings).toEqual([
        { kind: "capture", subject: bindDir, message: "bind path is not a directory; skipped" },
      ]);
      expect(result.archive.manifest.payloads).toEqual([]);
    });
  });

  describe("archive naming", () => {
    test("adds a suffix when the operator keeps the existing archive", async () => {
      await backupProject("web1", backupDeps());

      const second = await backupProject("web1", backupDeps(new ScriptedPrompts([false])));

      expect(second.archive.archiveName).toBe("docker_project_backup_20250101_120000_web1_1.tar.gz");
      expect(second.archive.manifest.projectName).toBe("web1_1");
      expect(second.archive.journalEntry?.projectName).toBe("web1_1");
      expect(second.archive.journalEntry?.sequenceNumber).toBe(2);
    });

    test("suffixes keep increasing", async () => {
      await backupProject("web1", backupDeps());
      await backupProject("web1", backupDeps(new ScriptedPrompts([false])));

      const third = await backupProject("web1", backupDeps(new ScriptedPrompts([false])));

      expect(third.archive.archiveName).toBe("docker_project_backup_20250101_120000_web1_2.tar.gz");
    });

    test("moves to the next suffix when the name is taken during capture", async () => {
      const plainPath = path.join(backupRoot, "docker_project_backup_20250101_120000_web1.tar.gz");
      const racing: ArchiveCodec = {
        async packDirectory(sourceDir, outputFile) {
          await mkdir(backupRoot, { recursive: true });
          await writeFile(plainPath, "written by another run");
          await codec.packDirectory(sourceDir, outputFile);
        },
        packContents: (sourceDir, outputFile) => codec.packContents(sourceDir, outputFile),
        unpack: (archiveFile, destination, options) => codec.unpack(archiveFile, destination, options),
      };
      const prompts = new ScriptedPrompts();

      const result = await backupProject("web1", { ...backupDeps(prompts), codec: racing });

      expect(result.archive.archiveName).toBe("docker_project_backup_20250101_120000_web1_1.tar.gz");
      expect(result.archive.manifest.projectName).toBe("web1_1");
      expect(prompts.asked).toEqual([]);
      expect(await readFile(plainPath, "utf-8")).toBe("written by another run");
    });

    test("overwrites when the operator agrees", async () => {
      await backupProject("web1", backupDeps());
      const prompts = new ScriptedPrompts([true]);

      const second = await backupProject("web1", backupDeps(prompts));

      expect(second.archive.archiveName).toBe("docker_project_backup_20250101_120000_web1.tar.gz");
      expect(prompts.asked).toEqual([
        "Archive docker_project_backup_20250101_120000_web1.tar.gz already exists. Overwrite it?",
      ]);
      expect(await readdir(backupRoot)).toHaveLength(2);
    });
  });

  describe("catalog", () => {
    test("records the archive in the catalog", async () => {
      const recorded: BackupInsert[] = [];
      const deps: BackupDeps = {
        ...backupDeps(),
        catalog: {
          recordBackup(backup: BackupInsert): BackupRecord {
            recorded.push(backup);
            return { ...backup, id: 1, created_at: "2025-01-01T12:00:00.000Z", status: "active", deleted_at: null };
          },
        },
      };

      const result = await backupProject("web1", deps);

      expect(recorded).toHaveLength(1);
      expect(recorded[0]).toMatchObject({
        backup_id: result.archive.backupId,
        project_name: "web1",
        archive_path: result.archive.archivePath,
        archive_size_bytes: result.archive.sizeBytes,
        archive_checksum: result.archive.checksum,
        containers_count: 1,
        is_compose: false,
      });
      expect(result.archive.checksum).toMatch(/^[0-9a-f]{64}$/);
    });

    test("a catalog failure is a warning", async () => {
      const deps: BackupDeps = {
        ...backupDeps(),
        catalog: {
          recordBackup(): BackupRecord {
            throw new Error("database is locked");
          },
        },
      };

      const result = await backupProject("web1", deps);

      expect(result.archive.backupId).toBeNull();
      expect(result.warnings).toEqual([
        {
          kind: "capture",
          subject: "docker_project_backup_20250101_120000_web1.tar.gz",
          message: "catalog update failed: database is locked",
        },
      ]);
    });
  });

  describe("compose project", () => {
    let composeDir: string;

    const COMPOSE_YAML = `services:
  web:
    image: shop/web
  db:
    image: postgres:16
    volumes:
      - shop_dbdata:/var/lib/postgresql/data
volumes:
  shop_dbdata:
`;

    beforeEach(async () => {
      composeDir = path.join(tempDir, "srv", "shop");
      await mkdir(composeDir, { recursive: true });
      await writeFile(path.join(composeDir, "docker-compose.yml"), COMPOSE_YAML);
      const dbData = await runtime.addVolume("shop_dbdata");
      await writeFile(path.join(dbData, "PG_VERSION"), "16");

      const labels = (service: string) => ({
        "com.docker.compose.project": "shop",
        "com.docker.compose.service": service,
        "com.docker.compose.project.config_files": path.join(composeDir, "docker-compose.yml"),
      });
      runtime.addContainer({ id: "shopweb", name: "shop-web-1", image: "shop/web", labels: labels("web") });
      runtime.addContainer({
        id: "shopdb",
        name: "shop-db-1",
        image: "postgres:16",
        labels: labels("db"),
        mounts: [{ type: "volume", source: "shop_dbdata", destination: "/var/lib/postgresql/data" }],
      });
    });

    test("includes every project container and embeds the compose file", async () => {
      const result = await backupProject("shop-web-1", backupDeps());

      expect(result.archive.archiveName).toBe("docker_project_backup_20250101_120000_shop.tar.gz");
      expect(result.archive.manifest.containers.map((c) => c.name)).toEqual(["shop-web-1", "shop-db-1"]);
      expect(result.archive.manifest.isComposeProject).toBe(true);
      expect(result.archive.manifest.composeFile).toBe("docker-compose.yml");
      expect(result.archive.manifest.composeSourcePath).toBe(composeDir);
      expect(await archiveEntries(result.archive.archivePath)).toEqual([
        "docker-compose.yml",
        "manifest.json",
        "volume_shop_dbdata.tar.gz",
      ]);
    });

    test("journals one compose entry", async () => {
      const result = await backupProject("shop-db-1", backupDeps());

      expect(result.archive.journalEntry).toEqual({
        sequenceNumber: 1,
        projectName: "shop",
        kind: "compose",
        command: `cd ${shellQuote(composeDir)} && docker-compose up -d`,
      });
      expect(await new CommandJournal(path.join(backupRoot, "docker_run_commands.txt")).readEntries()).toHaveLength(1);
    });

    test("a missing compose file is a warning", async () => {
      await rm(path.join(composeDir, "docker-compose.yml"));

      const result = await backupProject("shop-web-1", backupDeps());

      expect(result.warnings).toEqual([
        { kind: "capture", subject: composeDir, message: "compose file not found; archive will not include it" },
      ]);
      expect(result.archive.manifest.composeFile).toBeUndefined();
    });

    test("restore places the compose file without starting services", async () => {
      const { archive } = await backupProject("shop-web-1", backupDeps());
      const target = path.join(tempDir, "restored-shop");

      const result = await restoreArchive(archive.archivePath, restoreDeps(new ScriptedPrompts([], [target])));

      expect(result.status).toBe("done");
      expect(result.compose).toEqual({
        targetDir: target,
        composeFilePath: path.join(target, "docker-compose.yml"),
        command: `cd ${shellQuote(target)} && docker-compose up -d`,
        services: ["web", "db"],
      });
      expect(await readFile(path.join(target, "docker-compose.yml"), "utf-8")).toBe(COMPOSE_YAML);
      expect(result.launches).toEqual([]);
      expect(runtime.commands).toEqual([]);
      expect(result.mounts.volumes).toEqual(["shop_dbdata"]);
    });

    test("keeps an existing compose file when the operator declines", async () => {
      const { archive } = await backupProject("shop-web-1", backupDeps());

      const result = await restoreArchive(
        archive.archivePath,
        restoreDeps(new ScriptedPrompts([false], [composeDir])),
      );

      expect(result.compose).toBeNull();
      expect(result.warnings).toEqual([
        {
          kind: "confirmation-declined",
          subject: path.join(composeDir, "docker-compose.yml"),
          message: "existing compose file kept",
        },
      ]);
    });

    test("allBackupIdentifiers lists one container per compose project", async () => {
      expect(await allBackupIdentifiers(runtime)).toEqual(["web1", "shop-web-1"]);
    });
  });

  describe("restore degradation", () => {
    test("payloads missing from the archive leave the restore partially failed", async () => {
      await rm(bindDir, { recursive: true, force: true });
      runtime.addContainer({
        id: WEB1_ID,
        name: "web1",
        image: "nginx:1.25",
        mounts: [
          { type: "volume", source: "ghost", destination: "/cache" },
          { type: "bind", source: bindDir, destination: "/usr/share/nginx/html" },
        ],
      });
      const { archive } = await backupProject("web1", backupDeps());
      expect(archive.manifest.payloads).toEqual([]);

      const result = await restoreArchive(archive.archivePath, restoreDeps());

      expect(result.status).toBe("partially-failed");
      expect(result.mounts).toEqual({ volumes: [], bindPaths: [] });
      expect(result.warnings).toEqual([
        { kind: "reconstruction", subject: "ghost", message: "payload missing from archive; volume not restored" },
        {
          kind: "reconstruction",
          subject: bindDir,
          message: "payload missing from archive; bind path not restored",
        },
      ]);
      expect(result.launches).toHaveLength(1);
    });

    test("an inaccessible volume mountpoint is a warning", async () => {
      const mountpoint = await runtime.addVolume("web1_cache");
      await writeFile(path.join(mountpoint, "entry.bin"), "cached");
      runtime.addContainer({
        id: WEB1_ID,
        name: "web1",
        image: "nginx:1.25",
        mounts: [{ type: "volume", source: "web1_cache", destination: "/cache" }],
      });
      const { archive } = await backupProject("web1", backupDeps());
      await rm(mountpoint, { recursive: true, force: true });

      const result = await restoreArchive(archive.archivePath, restoreDeps());

      expect(result.status).toBe("partially-failed");
      expect(result.warnings).toEqual([
        { kind: "reconstruction", subject: "web1_cache", message: `mountpoint ${mountpoint} is not accessible` },
      ]);
    });

    test("runtime errors during restore become warnings", async () => {
      await runtime.addVolume("web1_cache");
      runtime.addContainer({
        id: WEB1_ID,
        name: "web1",
        image: "nginx:1.25",
        mounts: [{ type: "volume", source: "web1_cache", destination: "/cache" }],
      });
      const { archive } = await backupProject("web1", backupDeps());
      vi.spyOn(runtime, "inspectVolume").mockRejectedValue(new Error("spawn docker ENOENT"));
      vi.spyOn(runtime, "runCommand").mockRejectedValue(new Error("spawn sh ENOENT"));

      const result = await restoreArchive(archive.archivePath, restoreDeps());

      expect(result.status).toBe("partially-failed");
      expect(result.launches).toEqual([]);
      expect(result.warnings).toEqual([
        { kind: "reconstruction", subject: "web1_cache", message: "restore failed: spawn docker ENOENT" },
        { kind: "reconstruction", subject: "web1", message: "relaunch failed: spawn sh ENOENT" },
      ]);
    });
  });

  describe("failures", () => {
    test("an unknown identifier throws before anything is written", async () => {
      await expect(backupProject("nope", backupDeps())).rejects.toThrow(NotFoundError);
      await expect(readdir(backupRoot)).rejects.toThrow();
    });

    test("a batch continues past a failed identifier", async () => {
      const outcomes = await backupProjects(["nope", "web1"], backupDeps());

      expect(outcomes.map((o) => o.status)).toEqual(["failed", "success"]);
      expect(outcomes[0]?.error).toBeInstanceOf(NotFoundError);
    });

    test("an archive without a manifest is invalid", async () => {
      const content = path.join(tempDir, "no-manifest");
      await mkdir(content);
      await writeFile(path.join(content, "readme.txt"), "nothing here");
      const archivePath = path.join(tempDir, "no-manifest.tar.gz");
      await codec.packContents(content, archivePath);

      await expect(restoreArchive(archivePath, restoreDeps())).rejects.toThrow(InvalidArchiveError);
    });

    test("an archive with an empty container list is invalid", async () => {
      const content = path.join(tempDir, "empty-manifest");
      await mkdir(content);
      await writeFile(
        path.join(content, "manifest.json"),
        JSON.stringify({
          formatVersion: 1,
          projectName: "x",
          backupTimestamp: "20250101_120000",
          isComposeProject: false,
          containers: [],
          payloads: [],
        }),
      );
      const archivePath = path.join(tempDir, "empty-manifest.tar.gz");
      await codec.packContents(content, archivePath);

      await expect(restoreArchive(archivePath, restoreDeps())).rejects.toThrow(
        `Invalid archive ${archivePath}: manifest lists no containers`,
      );
    });

    test("a file that does not unpack is an extraction error", async () => {
      const archivePath = path.join(tempDir, "garbage.tar.gz");
      await writeFile(archivePath, "definitely not gzip");

      await expect(restoreArchive(archivePath, restoreDeps())).rejects.toThrow(ExtractionError);
    });

    test("a restore batch records failed archives and continues", async () => {
      const { archive } = await backupProject("web1", backupDeps());
      const garbage = path.join(tempDir, "garbage.tar.gz");
      await writeFile(garbage, "definitely not gzip");

      const outcomes = await restoreArchives(
        [garbage, archive.archivePath],
        restoreDeps(new ScriptedPrompts([], [], false)),
      );

      expect(outcomes.map((o) => o.status)).toEqual(["failed", "partial"]);
      expect(outcomes[0]?.error).toBeInstanceOf(ExtractionError);
    });

    test("a missing archive fails only its own batch item", async () => {
      const { archive } = await backupProject("web1", backupDeps());
      const missing = path.join(tempDir, "missing.tar.gz");

      const outcomes = await restoreArchives(
        [missing, archive.archivePath],
        restoreDeps(new ScriptedPrompts([], [], false)),
      );

      expect(outcomes.map((o) => o.status)).toEqual(["failed", "partial"]);
      expect(outcomes[0]?.error?.message).toBe(`Failed to extract archive ${missing}: archive not found`);
    });
  });
});
