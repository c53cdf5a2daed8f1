/**
 * Capabilities consumed by the backup and restore engines
 */

export interface CommandResult {
  success: boolean;
  stdout: string;
  stderr: string;
  exitCode: number;
}

export interface ContainerSummary {
  id: string;
  name: string;
  image: string;
  state: string;
  composeProject: string | null;
}

export interface DockerVolume {
  name: string;
  driver: string;
  mountpoint: string;
  labels: Record<string, string>;
}

export interface PortBinding {
  HostIp?: string;
  HostPort?: string;
}

export interface InspectMount {
  Type?: string;
  Name?: string;
  Source?: string;
  Destination?: string;
}

/**
 * The subset of `docker inspect` output dockpack reads. Every field is
 * optional because partially populated documents are accepted.
 */
export interface ContainerInspect {
  Id?: string;
  Name?: string;
  Config?: {
    Image?: string;
    Env?: string[] | null;
    Cmd?: string[] | string | null;
    Labels?: Record<string, string> | null;
  };
  HostConfig?: {
    Binds?: string[] | null;
    PortBindings?: Record<string, PortBinding[] | null> | null;
    VolumesFrom?: string[] | null;
    Links?: string[] | null;
    RestartPolicy?: { Name?: string };
  };
  Mounts?: InspectMount[] | null;
  NetworkSettings?: {
    Networks?: Record<string, unknown> | null;
  };
}

export interface ContainerRuntime {
  isAvailable(): Promise<boolean>;
  listContainers(): Promise<ContainerSummary[]>;
  /** IDs of containers whose name is exactly `name` */
  findContainersByName(name: string): Promise<string[]>;
  /** IDs of containers whose full or short ID is exactly `id` */
  findContainersById(id: string): Promise<string[]>;
  findContainersByImage(image: string): Promise<string[]>;
  findContainersByLabel(key: string, value: string): Promise<string[]>;
  /** Throws when the container cannot be inspected */
  inspectContainer(id: string): Promise<ContainerInspect>;
  inspectVolume(name: string): Promise<DockerVolume | null>;
  createVolume(name: string): Promise<DockerVolume | null>;
  stopContainer(id: string): Promise<boolean>;
  removeContainer(id: string): Promise<boolean>;
  /** Runs a shell command line such as a reconstructed `docker run` */
  runCommand(command: string): Promise<CommandResult>;
}

export interface UnpackOptions {
  stripComponents?: number;
}

export interface ArchiveCodec {
  /** Pack a directory so that its basename is the single leading component */
  packDirectory(sourceDir: string, outputFile: string): Promise<void>;
  /** Pack the entries of a directory relative to it */
  packContents(sourceDir: string, outputFile: string): Promise<void>;
  unpack(archiveFile: string, destination: string, options?: UnpackOptions): Promise<void>;
}

export interface OperatorPrompts {
  /** Resolves false when the operator declines or cancels */
  confirm(message: string, initialValue?: boolean): Promise<boolean>;
  /** Whether an existing archive may be replaced; false keeps it and suffixes the new one */
  confirmOverwrite(archiveName: string): Promise<boolean>;
  /** Resolves null when the operator cancels */
  askPath(message: string, defaultValue: string): Promise<string | null>;
}
