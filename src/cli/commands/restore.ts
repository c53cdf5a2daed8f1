import { parseArgs } from "node:util";
import { type RestoreOutcome, restoreArchives } from "../../core/restore/restore-engine";
import { errorMessage } from "../../utils/error";
import { formatBytes } from "../../utils/format";
import { color, createPrompts, formatSummary, formatWarnings, ui } from "../ui";
import {
  COMMON_HELP,
  COMMON_OPTIONS,
  createCliContext,
  requireDocker,
  restoreDepsFor,
} from "../context";

export async function restoreCommand(args: string[]): Promise<number> {
  const { values, positionals } = parseArgs({
    args,
    options: {
      ...COMMON_OPTIONS,
      all: { type: "boolean", short: "a", default: false },
      yes: { type: "boolean", short: "y", default: false },
      "compose-dir": { type: "string" },
    },
    allowPositionals: true,
  });

  if (values.help) {
    printHelp();
    return 0;
  }

  try {
    const context = await createCliContext(values, { database: false });
    await requireDocker(context.runtime);

    ui.intro("dockpack restore");

    let archivePaths = positionals.map((name) => context.store.resolveArchive(name));

    if (values.all) {
      const entries = await context.store.listArchives();
      if (entries.length === 0) {
        ui.info(`No archives in ${context.config.backupRoot}`);
        ui.outro("Nothing to restore");
        return 0;
      }
      if (!values.yes) {
        const proceed = await ui.confirm({
          message: `Restore all ${entries.length} archive(s)?`,
          initialValue: false,
        });
        if (ui.isCancel(proceed) || !proceed) {
          ui.cancel("Restore cancelled");
          return 1;
        }
      }
      archivePaths = entries.map((e) => e.path);
    } else if (archivePaths.length === 0) {
      const entries = await context.store.listArchives();
      if (entries.length === 0) {
        ui.info(`No archives in ${context.config.backupRoot}`);
        ui.outro("Nothing to restore");
        return 0;
      }

      const selected = await ui.select({
        message: "Select an archive to restore",
        options: entries.map((e) => ({
          value: e.path,
          label: e.name,
          hint: formatBytes(e.sizeBytes),
        })),
      });
      if (ui.isCancel(selected)) {
        ui.cancel("Restore cancelled");
        return 1;
      }
      archivePaths = [selected];
    }

    const outcomes = await restoreArchives(
      archivePaths,
      restoreDepsFor(context, createPrompts(values.yes), values["compose-dir"]),
    );
    printOutcomes(outcomes);

    ui.warn("Check the restored containers and data before relying on them.");

    const failed = outcomes.filter((o) => o.status === "failed").length;
    if (failed > 0) {
      ui.outro(`${outcomes.length - failed} of ${outcomes.length} restore(s) completed`);
      return 1;
    }
    ui.outro("Restore complete!");
    return 0;
  } catch (error) {
    ui.error(`Restore failed: ${errorMessage(error)}`);
    if (values.verbose) {
      console.error(error);
    }
    return 1;
  }
}

function printOutcomes(outcomes: RestoreOutcome[]): void {
  for (const outcome of outcomes) {
    if (!outcome.result) {
      ui.error(`${outcome.archivePath}: ${outcome.error?.message ?? "failed"}`);
      continue;
    }

    const { manifest, mounts, compose, launches } = outcome.result;
    ui.note(
      formatSummary([
        { label: "Project", value: manifest.projectName },
        { label: "Backed up", value: manifest.backupTimestamp },
        { label: "Type", value: manifest.isComposeProject ? "compose" : "standalone" },
        { label: "Volumes", value: mounts.volumes.join(", ") || "-" },
        { label: "Bind mounts", value: mounts.bindPaths.join(", ") || "-" },
        { label: "Compose file", value: compose?.composeFilePath },
        { label: "Services", value: compose ? compose.services.join(", ") || "-" : null },
        { label: "Start with", value: compose?.command },
        {
          label: "Containers",
          value:
            launches.length > 0
              ? launches
                  .map((l) => `${l.name} ${l.executed ? (l.success ? "started" : "failed") : "not started"}`)
                  .join(", ")
              : null,
        },
      ]),
      outcome.status === "success" ? "Restore Summary" : "Restore Summary (with warnings)",
    );

    if (outcome.warnings.length > 0) {
      ui.warn(formatWarnings(outcome.warnings));
    }
  }
}

function printHelp(): void {
  console.log(`
${color.bold("dockpack restore")} - Restore volumes, bind mounts and containers from archives

${color.dim("USAGE:")}
  dockpack restore [OPTIONS] [ARCHIVE...]

  ARCHIVE is a file name in the backup root or a path. Without one you are
  asked to pick an archive.

${color.dim("OPTIONS:")}
  -a, --all                    Restore every archive in the backup root
  -y, --yes                    Answer yes to every question
      --compose-dir <dir>      Directory for restored compose files
${COMMON_HELP}

${color.dim("EXAMPLES:")}
  dockpack restore                                                  # Pick an archive
  dockpack restore docker_project_backup_20250101_120000_web1.tar.gz
  dockpack restore ./elsewhere/backup.tar.gz --compose-dir /srv/shop
`);
}
