/**
 * Database module exports
 */

// Backup repository
export {
  getActiveBackupByPath,
  getAllActiveBackups,
  getBackupById,
  insertBackup,
  markArchivePathDeleted,
  markBackupDeleted,
  sqliteCatalog,
} from "./backup-repository";

// Connection
export { closeDatabase, getDatabase, initDatabase } from "./connection";
export type { DeletionLogInsert } from "./deletion-log-repository";
// Deletion log repository
export { getDeletionLogs, logDeletion } from "./deletion-log-repository";
export type { RawBackupRow, RawDeletionLogRow } from "./mappers";
// Mappers
export { parseBackupRow, parseDeletionLogRow } from "./mappers";
// Migrations
export {
  getAllMigrations,
  getCurrentVersion,
  getLatestVersion,
  getPendingMigrations,
} from "./migrations";
