/**
 * Centralized type exports for dockpack
 */

// Config types
export type {
  ArchiveConfig,
  ConfigInput,
  DatabaseConfig,
  DockerConfig,
  DockpackConfig,
  JournalConfig,
  LogConfig,
  RestoreConfig,
} from "./config";
// Database types
export type {
  BackupCatalog,
  BackupInsert,
  BackupRecord,
  BackupStatus,
  DeletionLogRecord,
  DeletionReason,
  Migration,
} from "./database";
// Manifest types
export type {
  BindMount,
  ContainerDescriptor,
  MountRecord,
  PayloadRecord,
  PayloadType,
  ProjectManifest,
  VolumeMount,
} from "./manifest";
// Capability types
export type {
  ArchiveCodec,
  CommandResult,
  ContainerInspect,
  ContainerRuntime,
  ContainerSummary,
  DockerVolume,
  InspectMount,
  OperatorPrompts,
  PortBinding,
  UnpackOptions,
} from "./runtime";
