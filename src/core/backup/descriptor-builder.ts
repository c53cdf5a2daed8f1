/**
 * Container inspection → ContainerDescriptor
 */

import * as path from "node:path";
import {
  COMPOSE_CONFIG_FILES_LABEL,
  COMPOSE_WORKING_DIR_LABEL,
  splitConfigFilesLabel,
} from "../../docker/compose";
import { COMPOSE_PROJECT_LABEL } from "../../docker/runtime";
import type {
  ContainerDescriptor,
  ContainerInspect,
  ContainerRuntime,
  InspectMount,
  MountRecord,
} from "../../types";
import { errorMessage } from "../../utils/error";
import type { WarningCollector } from "../errors";
import { buildLaunchCommand } from "./launch-command";

export function containerNameOf(inspect: ContainerInspect): string {
  return (inspect.Name ?? "").replace(/^\//, "");
}

/**
 * Keep named volumes and bind mounts; tmpfs and other mount types carry
 * nothing to capture.
 */
export function classifyMounts(mounts: InspectMount[]): MountRecord[] {
  const records: MountRecord[] = [];
  for (const mount of mounts) {
    if (!mount.Destination) continue;
    if (mount.Type === "volume" && mount.Name) {
      records.push({ type: "volume", name: mount.Name, destination: mount.Destination });
    } else if (mount.Type === "bind" && mount.Source) {
      records.push({ type: "bind", hostPath: mount.Source, destination: mount.Destination });
    }
  }
  return records;
}

/**
 * Directory of the first compose config file, or the recorded working dir
 */
export function composeSourcePathOf(labels: Record<string, string>): string | undefined {
  const first = splitConfigFilesLabel(labels[COMPOSE_CONFIG_FILES_LABEL])[0];
  if (first) return path.dirname(first);
  return labels[COMPOSE_WORKING_DIR_LABEL] || undefined;
}

export function describeContainer(id: string, inspect: ContainerInspect): ContainerDescriptor {
  const labels = inspect.Config?.Labels ?? {};
  const name = containerNameOf(inspect);
  const composeProject = labels[COMPOSE_PROJECT_LABEL] || undefined;

  const descriptor: ContainerDescriptor = {
    id: inspect.Id ?? id,
    name,
    image: inspect.Config?.Image ?? "",
    restartPolicy: inspect.HostConfig?.RestartPolicy?.Name ?? "",
    mounts: classifyMounts(inspect.Mounts ?? []),
    networks: Object.keys(inspect.NetworkSettings?.Networks ?? {}),
  };

  if (composeProject) {
    descriptor.composeProject = composeProject;
    const sourcePath = composeSourcePathOf(labels);
    if (sourcePath) descriptor.composeSourcePath = sourcePath;
  } else {
    descriptor.launchCommand = buildLaunchCommand(inspect, name);
  }

  return descriptor;
}

/**
 * Inspect one container and describe it. An inspection failure is recorded
 * as a warning and yields a descriptor carrying only the id.
 */
export async function buildContainerDescriptor(
  id: string,
  runtime: ContainerRuntime,
  warnings: WarningCollector,
): Promise<ContainerDescriptor> {
  try {
    return describeContainer(id, await runtime.inspectContainer(id));
  } catch (error) {
    warnings.add("inspection", id, `inspection failed: ${errorMessage(error)}`);
    return { id, name: "", image: "", restartPolicy: "", mounts: [], networks: [] };
  }
}
