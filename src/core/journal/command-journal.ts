/**
 * Append-only record of the commands that restart each backed up project
 */

import { appendFile, mkdir, readFile } from "node:fs/promises";
import * as path from "node:path";
import { logger } from "../../utils/logger";

export type JournalKind = "compose" | "standalone";

export interface CommandJournalEntry {
  sequenceNumber: number;
  projectName: string;
  kind: JournalKind;
  command: string;
}

export type JournalAppend = Omit<CommandJournalEntry, "sequenceNumber">;

const ENTRY_PATTERN = /^(\d+) (\S+) (compose|standalone) (.*)$/;

export function formatJournalLine(entry: CommandJournalEntry): string {
  const sequence = entry.sequenceNumber.toString().padStart(2, "0");
  return `${sequence} ${entry.projectName} ${entry.kind} ${entry.command}`;
}

export function parseJournalLine(line: string): CommandJournalEntry | null {
  const match = ENTRY_PATTERN.exec(line);
  if (!match) return null;

  const [, sequence, projectName, kind, command] = match;
  if (
    sequence === undefined ||
    projectName === undefined ||
    command === undefined ||
    (kind !== "compose" && kind !== "standalone")
  ) {
    return null;
  }

  return { sequenceNumber: Number.parseInt(sequence, 10), projectName, kind, command };
}

export class CommandJournal {
  constructor(readonly filePath: string) {}

  /**
   * Append one entry. The sequence number is one more than the number of
   * non-empty lines already in the file.
   */
  async append(entry: JournalAppend): Promise<CommandJournalEntry> {
    const lines = await this.readLines();
    let command = entry.command;
    if (/[\r\n]/.test(command)) {
      logger.debug(`Journal command for ${entry.projectName} spans lines; joining with spaces`);
      command = command.replace(/\r?\n|\r/g, " ");
    }

    const written: CommandJournalEntry = {
      sequenceNumber: lines.length + 1,
      projectName: entry.projectName,
      kind: entry.kind,
      command,
    };

    await mkdir(path.dirname(this.filePath), { recursive: true });
    await appendFile(this.filePath, `${formatJournalLine(written)}\n`, "utf-8");
    logger.debug(`Journal entry ${written.sequenceNumber} written to ${this.filePath}`);
    return written;
  }

  /**
   * Entries in file order. Lines that do not match the entry format are skipped.
   */
  async readEntries(): Promise<CommandJournalEntry[]> {
    const lines = await this.readLines();
    return lines.map(parseJournalLine).filter((e): e is CommandJournalEntry => e !== null);
  }

  private async readLines(): Promise<string[]> {
    let content: string;
    try {
      content = await readFile(this.filePath, "utf-8");
    } catch (error) {
      if (error instanceof Error && "code" in error && error.code === "ENOENT") {
        return [];
      }
      throw error;
    }
    return content.split("\n").filter((line) => line.length > 0);
  }
}
