/**
 * Database connection management
 */

import { existsSync } from "node:fs";
import { copyFile, mkdir, unlink } from "node:fs/promises";
import { dirname } from "node:path";
import BetterSqlite3, { type Database } from "better-sqlite3";
import { errorMessage } from "../utils/error";
import { debug, info, error as logError } from "../utils/logger";
import {
  getAllMigrations,
  getCurrentVersion,
  getPendingMigrations,
  initializeDatabase,
} from "./migrations";

let db: Database | null = null;

async function removeQuietly(filePath: string): Promise<void> {
  try {
    await unlink(filePath);
  } catch (err) {
    debug(`Could not remove ${filePath}: ${errorMessage(err)}`);
  }
}

export async function initDatabase(dbPath: string): Promise<Database> {
  if (db) {
    return db;
  }

  await mkdir(dirname(dbPath), { recursive: true });

  if (existsSync(dbPath)) {
    // Open temporarily to check migration status
    const tempDb = new BetterSqlite3(dbPath);
    const currentVersion = getCurrentVersion(tempDb);
    const pending = getPendingMigrations(currentVersion);
    tempDb.close();

    if (pending.length > 0 && currentVersion > 0) {
      const backupPath = `${dbPath}.migration-backup`;
      info(`Pending migrations detected (${pending.length}), creating backup...`);
      await copyFile(dbPath, backupPath);

      try {
        db = new BetterSqlite3(dbPath);
        initializeDatabase(db);
        info(
          `Migrations completed successfully (v${currentVersion} -> v${getAllMigrations().slice(-1)[0]?.version})`,
        );
        await removeQuietly(backupPath);
      } catch (err) {
        logError(`Migration failed: ${errorMessage(err)}`);
        info("Rolling back database from backup...");

        if (db) {
          db.close();
          db = null;
        }

        await copyFile(backupPath, dbPath);
        await removeQuietly(backupPath);

        throw new Error(`Database migration failed and was rolled back: ${errorMessage(err)}`);
      }

      return db;
    }
  }

  db = new BetterSqlite3(dbPath);
  initializeDatabase(db);

  return db;
}

export function getDatabase(): Database {
  if (!db) {
    throw new Error("Database not initialized. Call initDatabase() first.");
  }
  return db;
}

export function closeDatabase(): void {
  if (db) {
    db.close();
    db = null;
  }
}
