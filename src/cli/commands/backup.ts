import { parseArgs } from "node:util";
import {
  allBackupIdentifiers,
  type BackupOutcome,
  backupProjects,
} from "../../core/backup/orchestrator";
import { errorMessage } from "../../utils/error";
import { formatBytes, formatDuration } from "../../utils/format";
import { color, createPrompts, formatSummary, formatWarnings, ui } from "../ui";
import {
  backupDepsFor,
  COMMON_HELP,
  COMMON_OPTIONS,
  createCliContext,
  requireDocker,
} from "../context";

export async function backupCommand(args: string[]): Promise<number> {
  const { values, positionals } = parseArgs({
    args,
    options: {
      ...COMMON_OPTIONS,
      all: { type: "boolean", short: "a", default: false },
      yes: { type: "boolean", short: "y", default: false },
    },
    allowPositionals: true,
  });

  if (values.help) {
    printHelp();
    return 0;
  }

  try {
    const context = await createCliContext(values);
    await requireDocker(context.runtime);

    ui.intro("dockpack backup");

    let identifiers = positionals;
    if (values.all) {
      identifiers = await allBackupIdentifiers(context.runtime);
      ui.info(`Backing up ${identifiers.length} project(s)`);
    } else if (identifiers.length === 0) {
      const containers = await context.runtime.listContainers();
      if (containers.length === 0) {
        ui.warn("No containers found");
        ui.outro("Nothing to back up");
        return 0;
      }

      const selected = await ui.multiselect({
        message: "Select containers to back up",
        options: containers.map((c) => ({
          value: c.name,
          label: c.name,
          hint: [c.image, c.state, c.composeProject && `compose: ${c.composeProject}`]
            .filter(Boolean)
            .join(" · "),
        })),
        required: true,
      });

      if (ui.isCancel(selected)) {
        ui.cancel("Backup cancelled");
        return 1;
      }
      identifiers = selected;
    }

    if (identifiers.length === 0) {
      ui.warn("No containers to back up");
      ui.outro("Nothing to back up");
      return 0;
    }

    const outcomes = await backupProjects(
      identifiers,
      backupDepsFor(context, createPrompts(values.yes)),
    );
    printOutcomes(outcomes);

    const failed = outcomes.filter((o) => o.status === "failed").length;
    if (failed > 0) {
      ui.outro(`${outcomes.length - failed} of ${outcomes.length} backup(s) completed`);
      return 1;
    }
    ui.outro("Backup complete!");
    return 0;
  } catch (error) {
    ui.error(`Backup failed: ${errorMessage(error)}`);
    if (values.verbose) {
      console.error(error);
    }
    return 1;
  }
}

function printOutcomes(outcomes: BackupOutcome[]): void {
  for (const outcome of outcomes) {
    if (!outcome.result) {
      ui.error(`${outcome.identifier}: ${outcome.error?.message ?? "failed"}`);
      continue;
    }

    const { archive, resolution, durationMs } = outcome.result;
    ui.note(
      formatSummary([
        { label: "Project", value: archive.projectName },
        { label: "Matched by", value: resolution.matchedBy },
        { label: "Type", value: resolution.isComposeProject ? "compose" : "standalone" },
        { label: "Containers", value: archive.manifest.containers.length },
        { label: "Payloads", value: archive.manifest.payloads.length },
        { label: "Archive", value: archive.archivePath },
        { label: "Size", value: formatBytes(archive.sizeBytes) },
        { label: "Duration", value: formatDuration(durationMs) },
        { label: "Backup ID", value: archive.backupId },
        {
          label: "Journal",
          value: archive.journalEntry
            ? `#${archive.journalEntry.sequenceNumber} ${archive.journalEntry.kind}`
            : null,
        },
      ]),
      outcome.status === "success" ? "Backup Summary" : "Backup Summary (with warnings)",
    );

    if (outcome.warnings.length > 0) {
      ui.warn(formatWarnings(outcome.warnings));
    }
  }
}

function printHelp(): void {
  console.log(`
${color.bold("dockpack backup")} - Back up containers, their data and start commands

${color.dim("USAGE:")}
  dockpack backup [OPTIONS] [IDENTIFIER...]

  An identifier is a container name, a full or 12-character container ID,
  or an image name. Containers of a compose project are backed up together.
  Without identifiers you are asked to pick containers.

${color.dim("OPTIONS:")}
  -a, --all                    Back up every container
  -y, --yes                    Answer yes to every question
${COMMON_HELP}

${color.dim("EXAMPLES:")}
  dockpack backup web1                     # Back up one container
  dockpack backup shop-api-1 nginx:1.27    # Several identifiers in one run
  dockpack backup --all --yes              # Everything, non-interactive
`);
}
