/**
 * Storage module exports
 */

export {
  type ArchiveEntry,
  type DeleteAllResult,
  LocalBackupStore,
  type LocalStoreSettings,
  storeSettingsFromConfig,
} from "./local";
