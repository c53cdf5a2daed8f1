/**
 * Narrowing helpers for parsed JSON and YAML documents
 */

export type JsonRecord = Record<string, unknown>;

export function isRecord(value: unknown): value is JsonRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function readString(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}

/** Keeps the string elements of an array, or undefined for anything else */
export function readStringArray(value: unknown): string[] | undefined {
  if (!Array.isArray(value)) return undefined;
  return value.filter((item): item is string => typeof item === "string");
}

export function readStringMap(value: unknown): Record<string, string> | undefined {
  if (!isRecord(value)) return undefined;
  const map: Record<string, string> = {};
  for (const [key, item] of Object.entries(value)) {
    if (typeof item === "string") {
      map[key] = item;
    }
  }
  return map;
}

/**
 * Parse JSON text into an unknown value for narrowing
 */
export function parseJson(text: string): unknown {
  const value: unknown = JSON.parse(text);
  return value;
}
