/**
 * Volume and bind mount payload restore
 */

import { mkdir } from "node:fs/promises";
import * as path from "node:path";
import type { ArchiveCodec, ContainerRuntime, ProjectManifest } from "../../types";
import { errorMessage } from "../../utils/error";
import { logger } from "../../utils/logger";
import { bindPayloadName, volumePayloadName } from "../../utils/naming";
import { isDirectory, isFile } from "../../utils/path";
import { collectMountSources } from "../backup/payload-capture";
import type { WarningCollector } from "../errors";

/** Payloads hold the source directory as their single leading component */
const PAYLOAD_STRIP_COMPONENTS = 1;

export interface MountRestoreDeps {
  runtime: ContainerRuntime;
  codec: ArchiveCodec;
  warnings: WarningCollector;
}

export interface MountRestoreResult {
  volumes: string[];
  bindPaths: string[];
}

async function restoreVolume(
  name: string,
  extractedDir: string,
  deps: MountRestoreDeps,
): Promise<boolean> {
  let payload: string;
  try {
    payload = path.join(extractedDir, volumePayloadName(name));
  } catch (error) {
    deps.warnings.add("reconstruction", name, errorMessage(error));
    return false;
  }

  if (!(await isFile(payload))) {
    deps.warnings.add("reconstruction", name, "payload missing from archive; volume not restored");
    return false;
  }

  let volume = await deps.runtime.inspectVolume(name);
  if (!volume) {
    logger.info(`Creating volume ${name}`);
    volume = await deps.runtime.createVolume(name);
  }
  if (!volume) {
    deps.warnings.add("reconstruction", name, "volume could not be created");
    return false;
  }
  if (!volume.mountpoint || !(await isDirectory(volume.mountpoint))) {
    deps.warnings.add("reconstruction", name, `mountpoint ${volume.mountpoint || "(none)"} is not accessible`);
    return false;
  }

  try {
    await deps.codec.unpack(payload, volume.mountpoint, { stripComponents: PAYLOAD_STRIP_COMPONENTS });
  } catch (error) {
    deps.warnings.add("reconstruction", name, `unpack failed: ${errorMessage(error)}`);
    return false;
  }
  logger.info(`Restored volume ${name}`);
  return true;
}

async function restoreBindPath(
  hostPath: string,
  extractedDir: string,
  deps: MountRestoreDeps,
): Promise<boolean> {
  const payload = path.join(extractedDir, bindPayloadName(hostPath));
  if (!(await isFile(payload))) {
    deps.warnings.add("reconstruction", hostPath, "payload missing from archive; bind path not restored");
    return false;
  }

  try {
    await mkdir(hostPath, { recursive: true });
    await deps.codec.unpack(payload, hostPath, { stripComponents: PAYLOAD_STRIP_COMPONENTS });
  } catch (error) {
    deps.warnings.add("reconstruction", hostPath, `restore failed: ${errorMessage(error)}`);
    return false;
  }
  logger.info(`Restored bind mount ${hostPath}`);
  return true;
}

/**
 * Restore every distinct volume and bind path named by the manifest.
 * Missing payloads and inaccessible targets are warnings, not failures.
 */
export async function restoreMounts(
  manifest: ProjectManifest,
  extractedDir: string,
  deps: MountRestoreDeps,
): Promise<MountRestoreResult> {
  const { volumes, bindPaths } = collectMountSources(manifest.containers);
  const result: MountRestoreResult = { volumes: [], bindPaths: [] };

  for (const name of volumes) {
    try {
      if (await restoreVolume(name, extractedDir, deps)) result.volumes.push(name);
    } catch (error) {
      deps.warnings.add("reconstruction", name, `restore failed: ${errorMessage(error)}`);
    }
  }
  for (const hostPath of bindPaths) {
    try {
      if (await restoreBindPath(hostPath, extractedDir, deps)) result.bindPaths.push(hostPath);
    } catch (error) {
      deps.warnings.add("reconstruction", hostPath, `restore failed: ${errorMessage(error)}`);
    }
  }

  return result;
}
