/**
 * manifest.json serialization and validation
 */

import { readFile } from "node:fs/promises";
import * as path from "node:path";
import type {
  ContainerDescriptor,
  MountRecord,
  PayloadRecord,
  ProjectManifest,
} from "../../types";
import { isRecord, parseJson, readString, readStringArray } from "../../utils/json";
import { logger } from "../../utils/logger";
import { isBackupTimestamp, MANIFEST_FILE } from "../../utils/naming";

export const MANIFEST_FORMAT_VERSION = 1;

/**
 * Raised while parsing; the restore engine wraps it with the archive path
 */
export class ManifestError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ManifestError";
  }
}

export function serializeManifest(manifest: ProjectManifest): string {
  return `${JSON.stringify(manifest, null, 2)}\n`;
}

function parseMount(raw: unknown): MountRecord | null {
  if (!isRecord(raw)) return null;
  const destination = readString(raw.destination);
  if (!destination) return null;

  if (raw.type === "volume") {
    const name = readString(raw.name);
    return name ? { type: "volume", name, destination } : null;
  }
  if (raw.type === "bind") {
    const hostPath = readString(raw.hostPath);
    return hostPath ? { type: "bind", hostPath, destination } : null;
  }
  return null;
}

function parseDescriptor(raw: unknown): ContainerDescriptor | null {
  if (!isRecord(raw)) return null;
  const id = readString(raw.id);
  if (!id) return null;

  const mounts = Array.isArray(raw.mounts)
    ? raw.mounts.map(parseMount).filter((m): m is MountRecord => m !== null)
    : [];

  const descriptor: ContainerDescriptor = {
    id,
    name: readString(raw.name) ?? "",
    image: readString(raw.image) ?? "",
    restartPolicy: readString(raw.restartPolicy) ?? "",
    mounts,
    networks: readStringArray(raw.networks) ?? [],
  };

  const launchCommand = readString(raw.launchCommand);
  const composeSourcePath = readString(raw.composeSourcePath);
  const composeProject = readString(raw.composeProject);
  if (launchCommand) descriptor.launchCommand = launchCommand;
  if (composeSourcePath) descriptor.composeSourcePath = composeSourcePath;
  if (composeProject) descriptor.composeProject = composeProject;

  return descriptor;
}

function parsePayload(raw: unknown): PayloadRecord | null {
  if (!isRecord(raw)) return null;
  const source = readString(raw.source);
  const file = readString(raw.file);
  const type = raw.type;
  if (!source || !file || (type !== "volume" && type !== "bind")) return null;
  return { type, source, file };
}

/**
 * Parse and validate manifest.json content. Container entries without an
 * id are dropped; a manifest left with no containers is rejected.
 */
export function parseManifest(text: string): ProjectManifest {
  let raw: unknown;
  try {
    raw = parseJson(text);
  } catch {
    throw new ManifestError("manifest is not valid JSON");
  }

  if (!isRecord(raw)) {
    throw new ManifestError("manifest is not an object");
  }
  if (raw.formatVersion !== MANIFEST_FORMAT_VERSION) {
    throw new ManifestError(`unsupported manifest format version: ${String(raw.formatVersion)}`);
  }

  const projectName = readString(raw.projectName);
  if (!projectName) {
    throw new ManifestError("manifest has no project name");
  }

  const backupTimestamp = readString(raw.backupTimestamp);
  if (!backupTimestamp || !isBackupTimestamp(backupTimestamp)) {
    throw new ManifestError("manifest has no valid backup timestamp");
  }

  const isComposeProject = raw.isComposeProject;
  if (typeof isComposeProject !== "boolean") {
    throw new ManifestError("manifest does not record the compose classification");
  }

  const rawContainers = Array.isArray(raw.containers) ? raw.containers : [];
  const containers = rawContainers
    .map(parseDescriptor)
    .filter((d): d is ContainerDescriptor => d !== null);
  if (containers.length < rawContainers.length) {
    logger.debug(`Skipped ${rawContainers.length - containers.length} malformed container entries`);
  }
  if (containers.length === 0) {
    throw new ManifestError("manifest lists no containers");
  }

  const payloads = Array.isArray(raw.payloads)
    ? raw.payloads.map(parsePayload).filter((p): p is PayloadRecord => p !== null)
    : [];

  const manifest: ProjectManifest = {
    formatVersion: MANIFEST_FORMAT_VERSION,
    projectName,
    backupTimestamp,
    createdAt: readString(raw.createdAt) ?? "",
    isComposeProject,
    containers,
    payloads,
  };

  const composeSourcePath = readString(raw.composeSourcePath);
  const composeFile = readString(raw.composeFile);
  if (composeSourcePath) manifest.composeSourcePath = composeSourcePath;
  if (composeFile) manifest.composeFile = composeFile;

  return manifest;
}

/**
 * Read manifest.json from an extracted archive directory
 */
export async function readManifest(dir: string): Promise<ProjectManifest> {
  let text: string;
  try {
    text = await readFile(path.join(dir, MANIFEST_FILE), "utf-8");
  } catch {
    throw new ManifestError(`${MANIFEST_FILE} is missing`);
  }
  return parseManifest(text);
}
