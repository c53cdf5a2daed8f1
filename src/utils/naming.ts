/**
 * Archive and payload naming utilities
 */

export const MANIFEST_FILE = "manifest.json";
export const COMPOSE_FILE = "docker-compose.yml";
export const PAYLOAD_EXTENSION = ".tar.gz";
export const UNNAMED_PROJECT = "unnamed_project";

const VOLUME_PAYLOAD_PREFIX = "volume_";
const BIND_PAYLOAD_PREFIX = "bind_";

/** Longest encoded run kept in one path component of a bind payload name */
export const BIND_SEGMENT_LENGTH = 200;

// Docker's own rule for volume names
const VOLUME_NAME_PATTERN = /^[a-zA-Z0-9][a-zA-Z0-9_.-]*$/;

const TIMESTAMP_PATTERN = /^\d{8}_\d{6}$/;

export interface ParsedArchiveName {
  prefix: string;
  timestamp: string;
  projectName: string;
}

export type ParsedPayloadName = { type: "volume"; name: string } | { type: "bind"; hostPath: string };

/**
 * Restrict a project name to `[A-Za-z0-9._-]`, never returning an empty string
 */
export function sanitizeProjectName(raw: string): string {
  const sanitized = raw
    .replace(/[^A-Za-z0-9._-]/g, "_")
    .replace(/^_+/, "")
    .replace(/_+$/, "");
  return sanitized || UNNAMED_PROJECT;
}

function pad(value: number): string {
  return value.toString().padStart(2, "0");
}

/**
 * Local wall-clock timestamp in YYYYMMDD_HHMMSS form
 */
export function formatBackupTimestamp(date: Date = new Date()): string {
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `${day}_${time}`;
}

export function isBackupTimestamp(value: string): boolean {
  return TIMESTAMP_PATTERN.test(value);
}

export function generateArchiveName(
  prefix: string,
  timestamp: string,
  projectName: string,
  extension: string,
  suffix?: number,
): string {
  const name = suffix === undefined ? projectName : `${projectName}_${suffix}`;
  return `${prefix}_${timestamp}_${name}${extension}`;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

export function parseArchiveName(
  archiveName: string,
  prefix: string,
  extension: string,
): ParsedArchiveName | null {
  const pattern = new RegExp(
    `^${escapeRegExp(prefix)}_(\\d{8}_\\d{6})_([A-Za-z0-9._-]+)${escapeRegExp(extension)}$`,
  );
  const match = archiveName.match(pattern);
  if (!match) return null;

  const [, timestamp, projectName] = match;
  if (timestamp === undefined || projectName === undefined) return null;

  return { prefix, timestamp, projectName };
}

export function isArchiveName(archiveName: string, prefix: string, extension: string): boolean {
  return archiveName.startsWith(`${prefix}_`) && archiveName.endsWith(extension);
}

/**
 * Filename-safe, reversible encoding of a host path (base64url, no padding)
 */
export function encodeHostPath(hostPath: string): string {
  return Buffer.from(hostPath, "utf8").toString("base64url");
}

export function decodeHostPath(encoded: string): string {
  return Buffer.from(encoded, "base64url").toString("utf8");
}

export function isValidVolumeName(name: string): boolean {
  return VOLUME_NAME_PATTERN.test(name);
}

export function volumePayloadName(volumeName: string): string {
  if (!isValidVolumeName(volumeName)) {
    throw new Error(`Invalid Docker volume name: ${volumeName}`);
  }
  return `${VOLUME_PAYLOAD_PREFIX}${volumeName}${PAYLOAD_EXTENSION}`;
}

/**
 * Archive-relative payload name for a bind path. Encodings longer than
 * {@link BIND_SEGMENT_LENGTH} are split into nested directories so that no
 * single component exceeds the filesystem name limit.
 */
export function bindPayloadName(hostPath: string): string {
  const encoded = encodeHostPath(hostPath);
  const segments: string[] = [];
  for (let i = 0; i < encoded.length; i += BIND_SEGMENT_LENGTH) {
    segments.push(encoded.slice(i, i + BIND_SEGMENT_LENGTH));
  }
  return `${BIND_PAYLOAD_PREFIX}${segments.join("/")}${PAYLOAD_EXTENSION}`;
}

export function parsePayloadName(fileName: string): ParsedPayloadName | null {
  if (!fileName.endsWith(PAYLOAD_EXTENSION)) return null;
  const stem = fileName.slice(0, -PAYLOAD_EXTENSION.length);

  if (stem.startsWith(VOLUME_PAYLOAD_PREFIX)) {
    const name = stem.slice(VOLUME_PAYLOAD_PREFIX.length);
    return isValidVolumeName(name) ? { type: "volume", name } : null;
  }

  if (stem.startsWith(BIND_PAYLOAD_PREFIX)) {
    const segments = stem.slice(BIND_PAYLOAD_PREFIX.length).split("/");
    if (!segments.every((segment) => /^[A-Za-z0-9_-]+$/.test(segment))) return null;
    return { type: "bind", hostPath: decodeHostPath(segments.join("")) };
  }

  return null;
}
