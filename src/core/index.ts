/**
 * Core module exports
 */

// Archive format
export * from "./archive";
// Backup
export * from "./backup";
// Catalog
export * from "./catalog";
// Errors
export {
  ArchivePackError,
  ConfigError,
  ExtractionError,
  InvalidArchiveError,
  NotFoundError,
  type OperationWarning,
  RuntimeUnavailableError,
  WarningCollector,
  type WarningKind,
} from "./errors";
// Journal
export * from "./journal";
// Restore
export * from "./restore";
