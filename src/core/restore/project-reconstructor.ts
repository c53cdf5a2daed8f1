/**
 * Compose file placement and standalone container reconstruction
 */

import { copyFile, mkdir } from "node:fs/promises";
import * as path from "node:path";
import { parseComposeFile } from "../../docker/compose";
import type { ContainerDescriptor, ContainerRuntime, OperatorPrompts, ProjectManifest } from "../../types";
import { errorMessage } from "../../utils/error";
import { logger } from "../../utils/logger";
import { COMPOSE_FILE } from "../../utils/naming";
import { isFile, pathExists } from "../../utils/path";
import { shellQuote } from "../../utils/shell";
import { withRestartPolicy } from "../backup/launch-command";
import type { WarningCollector } from "../errors";

export interface ReconstructDeps {
  runtime: ContainerRuntime;
  prompts: OperatorPrompts;
  warnings: WarningCollector;
  composeUpCommand: string;
  /** Preset target directory for the compose file */
  composeTargetDir?: string;
}

export interface ComposeRestoreReport {
  targetDir: string;
  composeFilePath: string;
  /** Command the operator runs to start the project */
  command: string;
  services: string[];
}

export interface ContainerLaunchReport {
  name: string;
  command: string;
  executed: boolean;
  success: boolean;
}

/**
 * Place the archived compose file in a directory chosen by the operator.
 * Services are not started.
 */
export async function restoreComposeFile(
  manifest: ProjectManifest,
  extractedDir: string,
  deps: ReconstructDeps,
): Promise<ComposeRestoreReport | null> {
  const archived = path.join(extractedDir, COMPOSE_FILE);
  if (!(await isFile(archived))) {
    deps.warnings.add("reconstruction", manifest.projectName, "archive holds no compose file");
    return null;
  }

  const suggested =
    deps.composeTargetDir ?? manifest.composeSourcePath ?? path.resolve(manifest.projectName);
  const answer = await deps.prompts.askPath(
    `Directory for the ${manifest.projectName} compose file`,
    suggested,
  );
  if (answer === null) {
    deps.warnings.add("confirmation-declined", manifest.projectName, "compose file placement cancelled");
    return null;
  }

  const targetDir = path.resolve(answer || suggested);
  const composeFilePath = path.join(targetDir, COMPOSE_FILE);

  if (await pathExists(composeFilePath)) {
    const replace = await deps.prompts.confirm(`${composeFilePath} exists. Replace it?`, false);
    if (!replace) {
      deps.warnings.add("confirmation-declined", composeFilePath, "existing compose file kept");
      return null;
    }
  }

  try {
    await mkdir(targetDir, { recursive: true });
    await copyFile(archived, composeFilePath);
  } catch (error) {
    deps.warnings.add("reconstruction", composeFilePath, `could not write compose file: ${errorMessage(error)}`);
    return null;
  }

  const parsed = await parseComposeFile(composeFilePath);
  const services = parsed ? parsed.services : [];
  const command = `cd ${shellQuote(targetDir)} && ${deps.composeUpCommand}`;

  logger.info(`Compose file restored to ${composeFilePath}`);
  if (services.length > 0) {
    logger.info(`Services: ${services.join(", ")}`);
  }
  logger.info(`Start the project with: ${command}`);

  return { targetDir, composeFilePath, command, services };
}

async function replaceExisting(name: string, deps: ReconstructDeps): Promise<boolean> {
  const existing = await deps.runtime.findContainersByName(name);
  if (existing.length === 0) return true;

  const replace = await deps.prompts.confirm(
    `Container ${name} already exists. Stop and remove it?`,
    false,
  );
  if (!replace) {
    deps.warnings.add("confirmation-declined", name, "existing container kept; not recreated");
    return false;
  }

  for (const id of existing) {
    await deps.runtime.stopContainer(id);
    if (!(await deps.runtime.removeContainer(id))) {
      deps.warnings.add("reconstruction", name, `could not remove existing container ${id}`);
      return false;
    }
  }
  return true;
}

/**
 * Recreate one container from its recorded launch command after the
 * operator confirms.
 */
export async function relaunchContainer(
  descriptor: ContainerDescriptor,
  deps: ReconstructDeps,
): Promise<ContainerLaunchReport | null> {
  const subject = descriptor.name || descriptor.id;
  if (!descriptor.launchCommand) {
    deps.warnings.add("reconstruction", subject, "no start command recorded");
    return null;
  }

  const command = withRestartPolicy(descriptor.launchCommand, descriptor.restartPolicy);
  logger.info(`Start command for ${subject}: ${command}`);

  if (!(await deps.prompts.confirm(`Run the start command for ${subject}?`, false))) {
    deps.warnings.add("confirmation-declined", subject, "start command not run");
    return { name: subject, command, executed: false, success: false };
  }

  if (descriptor.name && !(await replaceExisting(descriptor.name, deps))) {
    return { name: subject, command, executed: false, success: false };
  }

  const result = await deps.runtime.runCommand(command);
  if (!result.success) {
    deps.warnings.add(
      "reconstruction",
      subject,
      `start command failed (exit ${result.exitCode}): ${result.stderr}`,
    );
  } else {
    logger.info(`Container ${subject} started`);
  }
  return { name: subject, command, executed: true, success: result.success };
}

/**
 * Relaunch the containers a manifest records start commands for. In a
 * standalone manifest a container without one is a warning.
 */
export async function relaunchContainers(
  manifest: ProjectManifest,
  deps: ReconstructDeps,
): Promise<ContainerLaunchReport[]> {
  const reports: ContainerLaunchReport[] = [];
  for (const descriptor of manifest.containers) {
    if (manifest.isComposeProject && !descriptor.launchCommand) continue;
    try {
      const report = await relaunchContainer(descriptor, deps);
      if (report) reports.push(report);
    } catch (error) {
      deps.warnings.add("reconstruction", descriptor.name || descriptor.id, `relaunch failed: ${errorMessage(error)}`);
    }
  }
  return reports;
}
