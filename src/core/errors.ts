/**
 * Error types and recoverable warnings shared by backup and restore
 */

import { errorMessage } from "../utils/error";

export { ConfigError } from "../config/validator";

/** No container matched the identifier */
export class NotFoundError extends Error {
  constructor(public readonly identifier: string) {
    super(`No container found matching "${identifier}" by name, ID or image`);
    this.name = "NotFoundError";
  }
}

/** The archive could not be unpacked */
export class ExtractionError extends Error {
  constructor(
    public readonly archivePath: string,
    cause: unknown,
  ) {
    super(`Failed to extract archive ${archivePath}: ${errorMessage(cause)}`, { cause });
    this.name = "ExtractionError";
  }
}

/** The archive unpacked but carries no usable manifest */
export class InvalidArchiveError extends Error {
  constructor(
    public readonly archivePath: string,
    reason: string,
  ) {
    super(`Invalid archive ${archivePath}: ${reason}`);
    this.name = "InvalidArchiveError";
  }
}

/** Packing the final archive failed */
export class ArchivePackError extends Error {
  constructor(
    public readonly archivePath: string,
    cause: unknown,
  ) {
    super(`Failed to write archive ${archivePath}`, { cause });
    this.name = "ArchivePackError";
  }
}

/** The container runtime is not installed or not reachable */
export class RuntimeUnavailableError extends Error {
  constructor(message: string = "Docker is not available. Is the daemon running?") {
    super(message);
    this.name = "RuntimeUnavailableError";
  }
}

export type WarningKind = "capture" | "reconstruction" | "confirmation-declined" | "inspection";

export interface OperationWarning {
  kind: WarningKind;
  /** Volume name, host path, container name or file the warning is about */
  subject: string;
  message: string;
}

/**
 * Collects warnings for one operation and mirrors each to the log
 */
export class WarningCollector {
  private readonly items: OperationWarning[] = [];

  constructor(private readonly log: (message: string) => void) {}

  add(kind: WarningKind, subject: string, message: string): void {
    this.items.push({ kind, subject, message });
    this.log(`${subject}: ${message}`);
  }

  get warnings(): OperationWarning[] {
    return [...this.items];
  }

  get size(): number {
    return this.items.length;
  }
}
