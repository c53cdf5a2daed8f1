/**
 * Identifier → container set + canonical project name
 */

import { COMPOSE_CONFIG_FILES_LABEL, splitConfigFilesLabel } from "../../docker/compose";
import { COMPOSE_PROJECT_LABEL } from "../../docker/runtime";
import type { ContainerInspect, ContainerRuntime } from "../../types";
import { errorMessage } from "../../utils/error";
import { logger } from "../../utils/logger";
import { sanitizeProjectName } from "../../utils/naming";
import { NotFoundError } from "../errors";
import { composeSourcePathOf, containerNameOf } from "./descriptor-builder";

export type MatchKind = "name" | "id" | "image";

export interface ProjectResolution {
  identifier: string;
  matchedBy: MatchKind;
  /** Container IDs in resolution order, without duplicates */
  containerIds: string[];
  /** Sanitized canonical name, before collision suffixing */
  projectName: string;
  isComposeProject: boolean;
  /** Raw compose project label value */
  composeProject?: string;
  /** Compose files named by the project's config_files label */
  composeConfigFiles: string[];
  /** Directory holding the compose file */
  composeSourcePath?: string;
}

function unique(ids: string[]): string[] {
  return [...new Set(ids)];
}

async function matchContainers(
  identifier: string,
  runtime: ContainerRuntime,
): Promise<{ matchedBy: MatchKind; ids: string[] } | null> {
  const lookups: Array<[MatchKind, (value: string) => Promise<string[]>]> = [
    ["name", (v) => runtime.findContainersByName(v)],
    ["id", (v) => runtime.findContainersById(v)],
    ["image", (v) => runtime.findContainersByImage(v)],
  ];

  for (const [matchedBy, lookup] of lookups) {
    const ids = unique(await lookup(identifier));
    if (ids.length > 0) {
      return { matchedBy, ids };
    }
  }
  return null;
}

/**
 * Resolve an identifier to the containers to back up. Matching tries the
 * exact container name, then the full or short ID, then the image. When any
 * matched container belongs to a compose project, every container carrying
 * that project label is added.
 */
export async function resolveProject(
  identifier: string,
  runtime: ContainerRuntime,
): Promise<ProjectResolution> {
  const match = await matchContainers(identifier, runtime);
  if (!match) {
    throw new NotFoundError(identifier);
  }
  logger.debug(`"${identifier}" matched ${match.ids.length} container(s) by ${match.matchedBy}`);

  const inspected: Array<{ id: string; inspect: ContainerInspect | null }> = [];
  for (const id of match.ids) {
    try {
      inspected.push({ id, inspect: await runtime.inspectContainer(id) });
    } catch (error) {
      logger.debug(`Could not inspect ${id} while resolving: ${errorMessage(error)}`);
      inspected.push({ id, inspect: null });
    }
  }

  let composeProject: string | undefined;
  let labels: Record<string, string> = {};
  for (const { inspect } of inspected) {
    const value = inspect?.Config?.Labels?.[COMPOSE_PROJECT_LABEL];
    if (value) {
      composeProject = value;
      labels = inspect?.Config?.Labels ?? {};
      break;
    }
  }

  if (!composeProject) {
    const first = inspected[0]?.inspect;
    const name = first ? containerNameOf(first) : "";
    return {
      identifier,
      matchedBy: match.matchedBy,
      containerIds: match.ids,
      projectName: sanitizeProjectName(name || identifier),
      isComposeProject: false,
      composeConfigFiles: [],
    };
  }

  const projectIds = await runtime.findContainersByLabel(COMPOSE_PROJECT_LABEL, composeProject);
  const containerIds = unique([...match.ids, ...projectIds]);
  logger.info(`Compose project "${composeProject}" has ${containerIds.length} container(s)`);

  const composeConfigFiles = splitConfigFilesLabel(labels[COMPOSE_CONFIG_FILES_LABEL]);
  const composeSourcePath = composeSourcePathOf(labels);

  return {
    identifier,
    matchedBy: match.matchedBy,
    containerIds,
    projectName: sanitizeProjectName(composeProject),
    isComposeProject: true,
    composeProject,
    composeConfigFiles,
    composeSourcePath,
  };
}
