/**
 * Archives in the local backup root
 */

import { readdir, rm, stat } from "node:fs/promises";
import * as path from "node:path";
import type { DockpackConfig } from "../types";
import { computeFileChecksum } from "../utils/crypto";
import { errorMessage } from "../utils/error";
import { logger } from "../utils/logger";
import { isArchiveName, parseArchiveName } from "../utils/naming";
import { isFile, isPathWithinDir, pathExists } from "../utils/path";

export interface LocalStoreSettings {
  backupRoot: string;
  prefix: string;
  extension: string;
  journalPath: string;
}

export interface ArchiveEntry {
  name: string;
  path: string;
  sizeBytes: number;
  modifiedAt: Date;
  /** From the archive name, when it follows the naming scheme */
  projectName: string | null;
  timestamp: string | null;
}

export interface DeleteAllResult {
  deleted: string[];
  failed: Array<{ path: string; error: string }>;
  journalRemoved: boolean;
}

export function storeSettingsFromConfig(config: DockpackConfig): LocalStoreSettings {
  return {
    backupRoot: config.backupRoot,
    prefix: config.archive.prefix,
    extension: config.archive.extension,
    journalPath: config.journal.path,
  };
}

export class LocalBackupStore {
  constructor(private readonly settings: LocalStoreSettings) {}

  get backupRoot(): string {
    return this.settings.backupRoot;
  }

  /**
   * Archives in the backup root, oldest first
   */
  async listArchives(): Promise<ArchiveEntry[]> {
    let names: string[];
    try {
      names = await readdir(this.settings.backupRoot);
    } catch {
      logger.debug(`Backup root ${this.settings.backupRoot} is not readable`);
      return [];
    }

    const entries: ArchiveEntry[] = [];
    for (const name of names) {
      if (!isArchiveName(name, this.settings.prefix, this.settings.extension)) continue;

      const archivePath = path.join(this.settings.backupRoot, name);
      try {
        const info = await stat(archivePath);
        if (!info.isFile()) continue;
        const parsed = parseArchiveName(name, this.settings.prefix, this.settings.extension);
        entries.push({
          name,
          path: archivePath,
          sizeBytes: info.size,
          modifiedAt: info.mtime,
          projectName: parsed?.projectName ?? null,
          timestamp: parsed?.timestamp ?? null,
        });
      } catch {
        logger.debug(`Skipping unreadable entry ${archivePath}`);
      }
    }

    return entries.sort(
      (a, b) => a.modifiedAt.getTime() - b.modifiedAt.getTime() || a.name.localeCompare(b.name),
    );
  }

  /**
   * A bare archive name is looked up in the backup root; anything with a
   * directory part is taken as a path.
   */
  resolveArchive(nameOrPath: string): string {
    if (path.isAbsolute(nameOrPath) || nameOrPath.includes(path.sep)) {
      return path.resolve(nameOrPath);
    }
    return path.join(this.settings.backupRoot, nameOrPath);
  }

  async getChecksum(archivePath: string): Promise<string | null> {
    if (!(await isFile(archivePath))) return null;
    return computeFileChecksum(archivePath);
  }

  isWithinRoot(archivePath: string): boolean {
    return (
      isPathWithinDir(archivePath, this.settings.backupRoot) &&
      path.resolve(archivePath) !== path.resolve(this.settings.backupRoot)
    );
  }

  /**
   * Delete one archive. Paths outside the backup root are refused.
   */
  async deleteArchive(archivePath: string): Promise<void> {
    if (!this.isWithinRoot(archivePath)) {
      throw new Error(
        `Refusing to delete "${archivePath}": outside backup root "${this.settings.backupRoot}"`,
      );
    }
    if (!(await isFile(archivePath))) {
      throw new Error(`Archive not found: ${archivePath}`);
    }

    await rm(archivePath);
    logger.debug(`Deleted archive: ${archivePath}`);
  }

  /**
   * Delete every archive in the backup root and the command journal
   */
  async deleteAll(): Promise<DeleteAllResult> {
    const result: DeleteAllResult = { deleted: [], failed: [], journalRemoved: false };

    for (const entry of await this.listArchives()) {
      try {
        await this.deleteArchive(entry.path);
        result.deleted.push(entry.path);
      } catch (error) {
        result.failed.push({
          path: entry.path,
          error: errorMessage(error),
        });
      }
    }

    if (await pathExists(this.settings.journalPath)) {
      await rm(this.settings.journalPath, { force: true });
      result.journalRemoved = true;
      logger.debug(`Deleted command journal: ${this.settings.journalPath}`);
    }

    return result;
  }
}
