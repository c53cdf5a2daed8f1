/**
 * Docker Compose file discovery and parsing
 */

import { readFile } from "node:fs/promises";
import * as path from "node:path";
import * as yaml from "js-yaml";
import { errorMessage } from "../utils/error";
import { isRecord } from "../utils/json";
import { logger } from "../utils/logger";
import { isFile } from "../utils/path";

export const COMPOSE_CONFIG_FILES_LABEL = "com.docker.compose.project.config_files";
export const COMPOSE_WORKING_DIR_LABEL = "com.docker.compose.project.working_dir";

/** Filenames docker compose looks for, in its lookup order */
export const COMPOSE_FILE_NAMES = [
  "docker-compose.yml",
  "docker-compose.yaml",
  "compose.yaml",
  "compose.yml",
];

export interface ComposeFile {
  /** Service names in file order */
  services: string[];
}

/**
 * Parse compose file content. Returns null when the document is not valid
 * YAML or has no services mapping.
 */
export function parseComposeContent(content: string): ComposeFile | null {
  let parsed: unknown;
  try {
    parsed = yaml.load(content);
  } catch (error) {
    logger.debug(`Compose YAML did not parse: ${errorMessage(error)}`);
    return null;
  }

  if (!isRecord(parsed) || !isRecord(parsed.services)) {
    return null;
  }

  return { services: Object.keys(parsed.services) };
}

/**
 * Parse a docker-compose.yml file
 */
export async function parseComposeFile(composePath: string): Promise<ComposeFile | null> {
  let content: string;
  try {
    content = await readFile(composePath, "utf-8");
  } catch (error) {
    logger.error(`Failed to read compose file: ${composePath}`, errorMessage(error));
    return null;
  }

  const composeFile = parseComposeContent(content);
  if (!composeFile) {
    logger.warn(`No services found in compose file: ${composePath}`);
  }
  return composeFile;
}

/**
 * Split the config_files label into absolute paths
 */
export function splitConfigFilesLabel(label: string | undefined): string[] {
  if (!label) return [];
  return label
    .split(",")
    .map((entry) => entry.trim())
    .filter(Boolean);
}

/**
 * Locate the compose file of a project: the first file named by the
 * config_files label when it exists, otherwise the standard names in
 * sourceDir.
 */
export async function findComposeFile(
  sourceDir: string | undefined,
  configFiles: string[] = [],
): Promise<string | null> {
  const labelled = configFiles[0];
  if (labelled && (await isFile(labelled))) {
    return labelled;
  }

  if (!sourceDir) return null;

  for (const name of COMPOSE_FILE_NAMES) {
    const candidate = path.join(sourceDir, name);
    if (await isFile(candidate)) {
      return candidate;
    }
  }

  return null;
}

