/**
 * Manifest and descriptor types embedded in every archive
 */

export interface VolumeMount {
  type: "volume";
  /** Docker volume name */
  name: string;
  /** Mount path inside the container */
  destination: string;
}

export interface BindMount {
  type: "bind";
  /** Absolute path on the host */
  hostPath: string;
  /** Mount path inside the container */
  destination: string;
}

export type MountRecord = VolumeMount | BindMount;

export interface ContainerDescriptor {
  id: string;
  name: string;
  image: string;
  restartPolicy: string;
  /** `docker run` command recreating a standalone container */
  launchCommand?: string;
  /** Directory holding the compose file of a compose-managed container */
  composeSourcePath?: string;
  mounts: MountRecord[];
  networks: string[];
  composeProject?: string;
}

export type PayloadType = "volume" | "bind";

export interface PayloadRecord {
  type: PayloadType;
  /** Volume name or bind mount host path */
  source: string;
  /** Payload filename inside the archive */
  file: string;
}

export interface ProjectManifest {
  formatVersion: 1;
  projectName: string;
  /** Local time of the backup run, YYYYMMDD_HHMMSS */
  backupTimestamp: string;
  createdAt: string;
  isComposeProject: boolean;
  composeSourcePath?: string;
  /** Filename of the embedded compose file, when one was captured */
  composeFile?: string;
  containers: ContainerDescriptor[];
  payloads: PayloadRecord[];
}
