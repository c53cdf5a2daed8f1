export {
  type DeleteAllOutcome,
  type DeletionResult,
  deleteAllBackupArchives,
  deleteBackupArchive,
} from "./deletion";
export {
  type ChecksumMismatch,
  type VerifyOptions,
  type VerifyReport,
  verifyCatalog,
} from "./verify";
