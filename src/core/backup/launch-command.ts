/**
 * `docker run` reconstruction for standalone containers
 */

import type { ContainerInspect } from "../../types";
import { hasLongOption, shellQuote, splitShellWords } from "../../utils/shell";

function portArgs(inspect: ContainerInspect): string[] {
  const args: string[] = [];
  const bindings = inspect.HostConfig?.PortBindings ?? {};

  for (const [containerPort, hostBindings] of Object.entries(bindings)) {
    for (const binding of hostBindings ?? []) {
      const hostIp = binding.HostIp ?? "";
      const hostPort = binding.HostPort ?? "";
      let mapping: string;
      if (hostPort) {
        mapping = hostIp ? `${hostIp}:${hostPort}:${containerPort}` : `${hostPort}:${containerPort}`;
      } else {
        mapping = hostIp ? `${hostIp}::${containerPort}` : containerPort;
      }
      args.push("-p", shellQuote(mapping));
    }
  }
  return args;
}

/** Container path of a `host:container[:opts]` bind string */
function bindDestination(bind: string): string | undefined {
  return bind.split(":")[1];
}

function volumeArgs(inspect: ContainerInspect): string[] {
  const args: string[] = [];
  const binds = inspect.HostConfig?.Binds ?? [];
  const covered = new Set<string>();

  for (const bind of binds) {
    args.push("-v", shellQuote(bind));
    const destination = bindDestination(bind);
    if (destination) covered.add(destination);
  }

  for (const mount of inspect.Mounts ?? []) {
    if (!mount.Destination || covered.has(mount.Destination)) continue;
    const source = mount.Type === "volume" ? mount.Name : mount.Type === "bind" ? mount.Source : undefined;
    if (!source) continue;
    args.push("-v", shellQuote(`${source}:${mount.Destination}`));
    covered.add(mount.Destination);
  }
  return args;
}

/**
 * Inspect reports links as `/target:/self/alias`; `docker run` wants `target:alias`
 */
export function toLinkFlag(link: string): string {
  const [target, alias] = link.split(":");
  if (!target || !alias) return link;
  const name = target.replace(/^\//, "");
  const aliasName = alias.split("/").filter(Boolean).pop() ?? name;
  return `${name}:${aliasName}`;
}

function commandArgs(cmd: string[] | string | null | undefined): string[] {
  if (!cmd) return [];
  if (Array.isArray(cmd)) return cmd.map(shellQuote);
  try {
    return splitShellWords(cmd).map(shellQuote);
  } catch {
    return [shellQuote(cmd)];
  }
}

/**
 * Build the `docker run` line that recreates a container:
 * env, ports, binds, volumes, volumes-from, links, name, image and command.
 */
export function buildLaunchCommand(inspect: ContainerInspect, name: string): string {
  const parts = ["docker", "run"];

  for (const env of inspect.Config?.Env ?? []) {
    parts.push("-e", shellQuote(env));
  }
  parts.push(...portArgs(inspect));
  parts.push(...volumeArgs(inspect));
  for (const source of inspect.HostConfig?.VolumesFrom ?? []) {
    parts.push("--volumes-from", shellQuote(source));
  }
  for (const link of inspect.HostConfig?.Links ?? []) {
    parts.push("--link", shellQuote(toLinkFlag(link)));
  }

  parts.push("--name", shellQuote(name));
  parts.push(shellQuote(inspect.Config?.Image ?? ""));
  parts.push(...commandArgs(inspect.Config?.Cmd));

  return parts.join(" ");
}

/**
 * Insert `--restart <policy>` right after `docker run` unless the command
 * already sets one or the policy is empty or "no".
 */
export function withRestartPolicy(command: string, policy: string): string {
  if (!policy || policy === "no" || hasLongOption(command, "--restart")) {
    return command;
  }

  const match = /^(\s*\S*docker\s+run)(\s|$)/.exec(command);
  if (!match?.[1]) {
    return command;
  }
  const head = match[1];
  return `${head} --restart ${shellQuote(policy)}${command.slice(head.length)}`;
}
