/**
 * ContainerRuntime backed by the docker CLI
 */

import type {
  CommandResult,
  ContainerInspect,
  ContainerRuntime,
  ContainerSummary,
  DockerVolume,
} from "../types";
import { isRecord, parseJson, readString } from "../utils/json";
import { logger } from "../utils/logger";
import { dockerRun, isDockerAvailable, removeContainer, shellRun, stopContainer } from "./client";
import { firstInspectDocument } from "./inspect";
import { createVolume, inspectVolume } from "./volume";

export const COMPOSE_PROJECT_LABEL = "com.docker.compose.project";
export const SHORT_ID_LENGTH = 12;

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Pull one label out of the comma separated `Labels` column of `docker ps`
 */
export function labelFromPsColumn(labels: string, key: string): string | null {
  for (const pair of labels.split(",")) {
    const eq = pair.indexOf("=");
    if (eq > 0 && pair.slice(0, eq) === key) {
      return pair.slice(eq + 1) || null;
    }
  }
  return null;
}

function toSummary(raw: unknown): ContainerSummary | null {
  if (!isRecord(raw)) return null;
  const id = readString(raw.ID);
  if (!id) return null;

  return {
    id,
    name: readString(raw.Names) ?? "",
    image: readString(raw.Image) ?? "",
    state: readString(raw.State) ?? "",
    composeProject: labelFromPsColumn(readString(raw.Labels) ?? "", COMPOSE_PROJECT_LABEL),
  };
}

export class DockerCliRuntime implements ContainerRuntime {
  async isAvailable(): Promise<boolean> {
    return isDockerAvailable();
  }

  async listContainers(): Promise<ContainerSummary[]> {
    const result = await dockerRun(["ps", "-a", "--no-trunc", "--format", "{{json .}}"]);

    if (!result.success) {
      logger.error("Failed to list containers", result.stderr);
      return [];
    }

    const containers: ContainerSummary[] = [];
    for (const line of result.stdout.split("\n").filter(Boolean)) {
      try {
        const summary = toSummary(parseJson(line));
        if (summary) containers.push(summary);
      } catch {
        logger.debug(`Failed to parse container JSON: ${line}`);
      }
    }
    return containers;
  }

  async findContainersByName(name: string): Promise<string[]> {
    return this.queryIds(`name=^/${escapeRegExp(name)}$`);
  }

  async findContainersById(id: string): Promise<string[]> {
    // the id filter matches prefixes; keep only full or short id matches
    const ids = await this.queryIds(`id=${id}`);
    return ids.filter(
      (candidate) =>
        candidate === id || (id.length === SHORT_ID_LENGTH && candidate.slice(0, SHORT_ID_LENGTH) === id),
    );
  }

  async findContainersByImage(image: string): Promise<string[]> {
    return this.queryIds(`ancestor=${image}`);
  }

  async findContainersByLabel(key: string, value: string): Promise<string[]> {
    return this.queryIds(`label=${key}=${value}`);
  }

  async inspectContainer(id: string): Promise<ContainerInspect> {
    const result = await dockerRun(["inspect", "--type", "container", id]);
    if (!result.success) {
      throw new Error(`docker inspect ${id} failed: ${result.stderr || `exit code ${result.exitCode}`}`);
    }
    return firstInspectDocument(parseJson(result.stdout));
  }

  async inspectVolume(name: string): Promise<DockerVolume | null> {
    return inspectVolume(name);
  }

  async createVolume(name: string): Promise<DockerVolume | null> {
    return createVolume(name);
  }

  async stopContainer(id: string): Promise<boolean> {
    return stopContainer(id);
  }

  async removeContainer(id: string): Promise<boolean> {
    return removeContainer(id);
  }

  async runCommand(command: string): Promise<CommandResult> {
    return shellRun(command);
  }

  private async queryIds(filter: string): Promise<string[]> {
    const result = await dockerRun(["ps", "-a", "--no-trunc", "--filter", filter, "--format", "{{.ID}}"]);
    if (!result.success) {
      logger.warn(`Container query "${filter}" failed: ${result.stderr}`);
      return [];
    }
    return result.stdout
      .split("\n")
      .map((line) => line.trim())
      .filter(Boolean);
  }
}
