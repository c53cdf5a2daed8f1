/**
 * Docker volume operations
 */

import type { DockerVolume } from "../types";
import { isRecord, parseJson, readString, readStringMap } from "../utils/json";
import { logger } from "../utils/logger";
import { dockerRun } from "./client";

function toVolume(raw: unknown): DockerVolume | null {
  const data = Array.isArray(raw) ? raw[0] : raw;
  if (!isRecord(data)) return null;

  const name = readString(data.Name);
  if (!name) return null;

  return {
    name,
    driver: readString(data.Driver) ?? "local",
    mountpoint: readString(data.Mountpoint) ?? "",
    labels: readStringMap(data.Labels) ?? {},
  };
}

/**
 * Get detailed information about a specific volume
 */
export async function inspectVolume(name: string): Promise<DockerVolume | null> {
  const result = await dockerRun(["volume", "inspect", name]);

  if (!result.success) {
    logger.debug(`Volume not found or error: ${name}`, result.stderr);
    return null;
  }

  try {
    return toVolume(parseJson(result.stdout));
  } catch {
    logger.error(`Failed to parse volume inspect output for ${name}`);
    return null;
  }
}

/**
 * Create a named volume and return its details
 */
export async function createVolume(name: string): Promise<DockerVolume | null> {
  const result = await dockerRun(["volume", "create", name]);

  if (!result.success) {
    logger.error(`Failed to create volume ${name}: ${result.stderr}`);
    return null;
  }

  return inspectVolume(name);
}
