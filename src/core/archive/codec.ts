/**
 * tar + gzip archive codec
 */

import { type ChildProcess, spawn } from "node:child_process";
import { createReadStream, createWriteStream } from "node:fs";
import { readdir } from "node:fs/promises";
import * as path from "node:path";
import { pipeline } from "node:stream/promises";
import { createGunzip, createGzip } from "node:zlib";
import type { ArchiveCodec, UnpackOptions } from "../../types";
import { logger } from "../../utils/logger";

function waitForTar(child: ChildProcess): Promise<void> {
  return new Promise((resolve, reject) => {
    let stderr = "";
    child.stderr?.on("data", (chunk: Buffer) => {
      stderr += chunk.toString();
    });
    child.once("error", reject);
    child.once("close", (code: number | null) => {
      if (code === 0) {
        resolve();
      } else {
        reject(new Error(`tar exited with code ${code}: ${stderr.trim()}`));
      }
    });
  });
}

/**
 * Drives the system `tar` binary and compresses in process with zlib
 */
export class TarGzipCodec implements ArchiveCodec {
  constructor(private readonly compression: number = 6) {}

  async packDirectory(sourceDir: string, outputFile: string): Promise<void> {
    const resolved = path.resolve(sourceDir);
    await this.pack(["-C", path.dirname(resolved), path.basename(resolved)], outputFile);
  }

  async packContents(sourceDir: string, outputFile: string): Promise<void> {
    const entries = (await readdir(sourceDir)).sort();
    if (entries.length === 0) {
      throw new Error(`No entries to archive in ${sourceDir}`);
    }
    await this.pack(["-C", sourceDir, ...entries], outputFile);
  }

  async unpack(archiveFile: string, destination: string, options: UnpackOptions = {}): Promise<void> {
    const args = ["-xf", "-", "-C", destination];
    if (options.stripComponents) {
      args.push(`--strip-components=${options.stripComponents}`);
    }

    logger.debug(`Unpacking ${archiveFile} into ${destination}`);
    const child = spawn("tar", args, { stdio: ["pipe", "ignore", "pipe"] });
    await Promise.all([
      pipeline(createReadStream(archiveFile), createGunzip(), child.stdin),
      waitForTar(child),
    ]);
  }

  private async pack(tarArgs: string[], outputFile: string): Promise<void> {
    logger.debug(`Creating tar.gz archive ${outputFile} with compression level ${this.compression}`);
    const child = spawn("tar", ["-cf", "-", ...tarArgs], { stdio: ["ignore", "pipe", "pipe"] });
    await Promise.all([
      pipeline(child.stdout, createGzip({ level: this.compression }), createWriteStream(outputFile)),
      waitForTar(child),
    ]);
  }
}
