/**
 * Backup module exports
 */

export {
  type ArchiveSettings,
  type ArchiveTarget,
  type AssembledArchive,
  type AssemblyDeps,
  archiveSettingsFromConfig,
  assembleArchive,
  chooseArchiveTarget,
  journalEntryFor,
  nextFreeTarget,
  recheckArchiveTarget,
} from "./archive-assembler";
export {
  buildContainerDescriptor,
  classifyMounts,
  composeSourcePathOf,
  containerNameOf,
  describeContainer,
} from "./descriptor-builder";
export { buildLaunchCommand, toLinkFlag, withRestartPolicy } from "./launch-command";
export {
  type BackupDeps,
  type BackupOutcome,
  type BackupResult,
  allBackupIdentifiers,
  backupProject,
  backupProjects,
  type OutcomeStatus,
} from "./orchestrator";
export { CaptureContext, type CaptureDeps, capturePayloads, collectMountSources } from "./payload-capture";
export { type MatchKind, type ProjectResolution, resolveProject } from "./project-resolver";
