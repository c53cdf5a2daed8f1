/**
 * Docker CLI client wrapper using child_process.execFile
 */

import { execFile } from "node:child_process";
import type { CommandResult } from "../types";
import { logger } from "../utils/logger";

const MAX_BUFFER = 64 * 1024 * 1024;

let dockerBinary = "docker";

export function setDockerBinary(binary: string): void {
  dockerBinary = binary;
}

export function getDockerBinary(): string {
  return dockerBinary;
}

/**
 * Run an executable and collect its output. A non-zero exit is reported in
 * the result; failing to start the process rejects.
 */
export function execCommand(file: string, args: string[]): Promise<CommandResult> {
  return new Promise((resolve, reject) => {
    execFile(file, args, { maxBuffer: MAX_BUFFER }, (error, stdout, stderr) => {
      if (error && typeof error.code !== "number") {
        reject(error);
        return;
      }
      const exitCode = error && typeof error.code === "number" ? error.code : 0;
      resolve({
        success: exitCode === 0,
        stdout: stdout.trim(),
        stderr: stderr.trim(),
        exitCode,
      });
    });
  });
}

/**
 * Run a Docker command and return the result
 */
export async function dockerRun(args: string[]): Promise<CommandResult> {
  logger.debug(`Running: ${dockerBinary} ${args.join(" ")}`);
  return execCommand(dockerBinary, args);
}

/**
 * Run a full shell command line, such as a reconstructed `docker run`
 */
export async function shellRun(command: string): Promise<CommandResult> {
  logger.debug(`Running: sh -c ${command}`);
  return execCommand("sh", ["-c", command]);
}

/**
 * Check if Docker is available and running
 */
export async function isDockerAvailable(): Promise<boolean> {
  try {
    const result = await dockerRun(["info"]);
    return result.success;
  } catch {
    return false;
  }
}

/**
 * Get Docker version information
 */
export async function getDockerVersion(): Promise<string | null> {
  const result = await dockerRun(["version", "--format", "{{.Server.Version}}"]);
  if (result.success) {
    return result.stdout;
  }
  return null;
}

/**
 * Stop a container
 * @param timeout - Seconds to wait for a graceful stop
 */
export async function stopContainer(containerId: string, timeout: number = 30): Promise<boolean> {
  logger.debug(`Stopping container ${containerId} with timeout ${timeout}s`);
  const result = await dockerRun(["stop", "-t", timeout.toString(), containerId]);
  if (!result.success) {
    logger.error(`Failed to stop container ${containerId}: ${result.stderr}`);
  }
  return result.success;
}

/**
 * Remove a stopped container
 */
export async function removeContainer(containerId: string): Promise<boolean> {
  logger.debug(`Removing container ${containerId}`);
  const result = await dockerRun(["rm", containerId]);
  if (!result.success) {
    logger.error(`Failed to remove container ${containerId}: ${result.stderr}`);
  }
  return result.success;
}
