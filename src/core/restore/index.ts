/**
 * Restore module exports
 */

export { type MountRestoreDeps, type MountRestoreResult, restoreMounts } from "./mount-restorer";
export {
  type ComposeRestoreReport,
  type ContainerLaunchReport,
  type ReconstructDeps,
  relaunchContainer,
  relaunchContainers,
  restoreComposeFile,
} from "./project-reconstructor";
export {
  type RestoreDeps,
  type RestoreOutcome,
  type RestorePhase,
  type RestoreResult,
  restoreArchive,
  restoreArchives,
} from "./restore-engine";
