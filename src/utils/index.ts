/**
 * Utility exports
 */

// Crypto utilities
export { computeFileChecksum, generateUUID } from "./crypto";
export { errorMessage } from "./error";
// Formatting utilities
export { formatBytes, formatDuration } from "./format";
// JSON narrowing
export {
  isRecord,
  type JsonRecord,
  parseJson,
  readString,
  readStringArray,
  readStringMap,
} from "./json";
export type { LogLevel } from "./logger";
// Logger
export {
  debug,
  error,
  getLogFile,
  getLogLevel,
  info,
  isLogLevel,
  logger,
  setLogFile,
  setLogLevel,
  warn,
} from "./logger";
export type { ParsedArchiveName, ParsedPayloadName } from "./naming";
// Naming utilities
export {
  bindPayloadName,
  COMPOSE_FILE,
  decodeHostPath,
  encodeHostPath,
  formatBackupTimestamp,
  generateArchiveName,
  isArchiveName,
  isBackupTimestamp,
  isValidVolumeName,
  MANIFEST_FILE,
  PAYLOAD_EXTENSION,
  parseArchiveName,
  parsePayloadName,
  sanitizeProjectName,
  UNNAMED_PROJECT,
  volumePayloadName,
} from "./naming";
// Path utilities
export { isDirectory, isFile, isPathWithinDir, pathExists } from "./path";
// Shell utilities
export { hasLongOption, shellQuote, splitShellWords } from "./shell";
