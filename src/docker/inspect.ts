/**
 * Typed view over `docker inspect` output
 */

import type { ContainerInspect, InspectMount, PortBinding } from "../types";
import { isRecord, readString, readStringArray, readStringMap } from "../utils/json";

function readPortBindings(value: unknown): Record<string, PortBinding[] | null> | null {
  if (!isRecord(value)) return null;
  const bindings: Record<string, PortBinding[] | null> = {};
  for (const [port, entries] of Object.entries(value)) {
    if (!Array.isArray(entries)) {
      bindings[port] = null;
      continue;
    }
    bindings[port] = entries.filter(isRecord).map((entry) => ({
      HostIp: readString(entry.HostIp),
      HostPort: readString(entry.HostPort),
    }));
  }
  return bindings;
}

function readMounts(value: unknown): InspectMount[] | null {
  if (!Array.isArray(value)) return null;
  return value.filter(isRecord).map((mount) => ({
    Type: readString(mount.Type),
    Name: readString(mount.Name),
    Source: readString(mount.Source),
    Destination: readString(mount.Destination),
  }));
}

function readCmd(value: unknown): string[] | string | null {
  if (typeof value === "string") return value;
  return readStringArray(value) ?? null;
}

/**
 * Build a ContainerInspect from one parsed inspect document. Missing or
 * mistyped fields are left out rather than rejected.
 */
export function parseContainerInspect(raw: unknown): ContainerInspect {
  if (!isRecord(raw)) {
    throw new Error("Inspect document is not an object");
  }

  const doc: ContainerInspect = {
    Id: readString(raw.Id),
    Name: readString(raw.Name),
    Mounts: readMounts(raw.Mounts),
  };

  if (isRecord(raw.Config)) {
    const config = raw.Config;
    doc.Config = {
      Image: readString(config.Image),
      Env: readStringArray(config.Env) ?? null,
      Cmd: readCmd(config.Cmd),
      Labels: readStringMap(config.Labels) ?? null,
    };
  }

  if (isRecord(raw.HostConfig)) {
    const host = raw.HostConfig;
    doc.HostConfig = {
      Binds: readStringArray(host.Binds) ?? null,
      PortBindings: readPortBindings(host.PortBindings),
      VolumesFrom: readStringArray(host.VolumesFrom) ?? null,
      Links: readStringArray(host.Links) ?? null,
      RestartPolicy: isRecord(host.RestartPolicy)
        ? { Name: readString(host.RestartPolicy.Name) }
        : undefined,
    };
  }

  if (isRecord(raw.NetworkSettings)) {
    const networks = raw.NetworkSettings.Networks;
    doc.NetworkSettings = { Networks: isRecord(networks) ? networks : null };
  }

  return doc;
}

/**
 * `docker inspect` prints an array; take its first document
 */
export function firstInspectDocument(raw: unknown): ContainerInspect {
  const doc = Array.isArray(raw) ? raw[0] : raw;
  return parseContainerInspect(doc);
}
