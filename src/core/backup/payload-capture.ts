/**
 * Volume and bind mount payload capture
 */

import { mkdir, mkdtemp, rm } from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import type { ArchiveCodec, ContainerDescriptor, ContainerRuntime, PayloadRecord } from "../../types";
import { errorMessage } from "../../utils/error";
import { logger } from "../../utils/logger";
import { bindPayloadName, volumePayloadName } from "../../utils/naming";
import { isDirectory } from "../../utils/path";
import type { WarningCollector } from "../errors";

/**
 * Temporary staging directory owned by one backup run
 */
export class CaptureContext {
  private released = false;

  private constructor(readonly dir: string) {}

  static async create(): Promise<CaptureContext> {
    const dir = await mkdtemp(path.join(os.tmpdir(), "dockpack-"));
    logger.debug(`Capture area: ${dir}`);
    return new CaptureContext(dir);
  }

  file(name: string): string {
    return path.join(this.dir, name);
  }

  async release(): Promise<void> {
    if (this.released) return;
    this.released = true;
    await rm(this.dir, { recursive: true, force: true });
    logger.debug(`Removed capture area: ${this.dir}`);
  }
}

export interface CaptureDeps {
  runtime: ContainerRuntime;
  codec: ArchiveCodec;
  warnings: WarningCollector;
}

/** Volume names and bind paths across all descriptors, first seen first */
export function collectMountSources(descriptors: ContainerDescriptor[]): {
  volumes: string[];
  bindPaths: string[];
} {
  const volumes = new Set<string>();
  const bindPaths = new Set<string>();
  for (const descriptor of descriptors) {
    for (const mount of descriptor.mounts) {
      if (mount.type === "volume") volumes.add(mount.name);
      else bindPaths.add(mount.hostPath);
    }
  }
  return { volumes: [...volumes], bindPaths: [...bindPaths] };
}

async function captureVolume(
  name: string,
  context: CaptureContext,
  deps: CaptureDeps,
): Promise<PayloadRecord | null> {
  let file: string;
  try {
    file = volumePayloadName(name);
  } catch (error) {
    deps.warnings.add("capture", name, errorMessage(error));
    return null;
  }

  const volume = await deps.runtime.inspectVolume(name);
  if (!volume) {
    deps.warnings.add("capture", name, "volume not found; skipped");
    return null;
  }
  if (!volume.mountpoint || !(await isDirectory(volume.mountpoint))) {
    deps.warnings.add("capture", name, `mountpoint ${volume.mountpoint || "(none)"} is not readable; skipped`);
    return null;
  }

  try {
    await deps.codec.packDirectory(volume.mountpoint, context.file(file));
  } catch (error) {
    deps.warnings.add("capture", name, `capture failed: ${errorMessage(error)}`);
    return null;
  }
  logger.info(`Captured volume ${name}`);
  return { type: "volume", source: name, file };
}

async function captureBindPath(
  hostPath: string,
  context: CaptureContext,
  deps: CaptureDeps,
): Promise<PayloadRecord | null> {
  if (!(await isDirectory(hostPath))) {
    deps.warnings.add("capture", hostPath, "bind path is not a directory; skipped");
    return null;
  }

  const file = bindPayloadName(hostPath);
  try {
    const target = context.file(file);
    await mkdir(path.dirname(target), { recursive: true });
    await deps.codec.packDirectory(hostPath, target);
  } catch (error) {
    deps.warnings.add("capture", hostPath, `capture failed: ${errorMessage(error)}`);
    return null;
  }
  logger.info(`Captured bind mount ${hostPath}`);
  return { type: "bind", source: hostPath, file };
}

/**
 * Capture every distinct volume and bind path once, in order. Sources that
 * are missing or unreadable become capture warnings.
 */
export async function capturePayloads(
  descriptors: ContainerDescriptor[],
  context: CaptureContext,
  deps: CaptureDeps,
): Promise<PayloadRecord[]> {
  const { volumes, bindPaths } = collectMountSources(descriptors);
  const payloads: PayloadRecord[] = [];

  for (const name of volumes) {
    const payload = await captureVolume(name, context, deps);
    if (payload) payloads.push(payload);
  }
  for (const hostPath of bindPaths) {
    const payload = await captureBindPath(hostPath, context, deps);
    if (payload) payloads.push(payload);
  }

  return payloads;
}
