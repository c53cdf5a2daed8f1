import * as path from "node:path";
import { parseArgs } from "node:util";
import {
  type DeletionResult,
  deleteAllBackupArchives,
  deleteBackupArchive,
} from "../../core/catalog/deletion";
import { errorMessage } from "../../utils/error";
import { color, ui } from "../ui";
import { COMMON_HELP, COMMON_OPTIONS, createCliContext } from "../context";

/** What the operator must type before every archive is removed */
export const DELETE_ALL_CONFIRMATION = "YES";

export async function deleteCommand(args: string[]): Promise<number> {
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

    ui.intro("dockpack delete");

    if (values.all) {
      const entries = await context.store.listArchives();
      ui.warn(
        `This removes ${entries.length} archive(s) and the command journal from ${context.config.backupRoot}`,
      );

      if (!values.yes) {
        const proceed = await ui.confirm({
          message: "Delete every archive?",
          initialValue: false,
        });
        if (ui.isCancel(proceed) || !proceed) {
          ui.cancel("Delete cancelled");
          return 1;
        }

        const typed = await ui.text({
          message: `Type ${DELETE_ALL_CONFIRMATION} to confirm`,
          placeholder: DELETE_ALL_CONFIRMATION,
        });
        if (ui.isCancel(typed) || typed !== DELETE_ALL_CONFIRMATION) {
          ui.cancel("Delete cancelled");
          return 1;
        }
      }

      const outcome = await deleteAllBackupArchives(context.store);
      printResults(outcome.results);
      if (outcome.journalRemoved) {
        ui.info("Command journal removed");
      }
      return finish(outcome.results);
    }

    let archivePaths = positionals.map((name) => context.store.resolveArchive(name));

    if (archivePaths.length === 0) {
      const entries = await context.store.listArchives();
      if (entries.length === 0) {
        ui.info(`No archives in ${context.config.backupRoot}`);
        ui.outro("Nothing to delete");
        return 0;
      }

      const selected = await ui.multiselect({
        message: "Select archives to delete",
        options: entries.map((e) => ({ value: e.path, label: e.name })),
        required: true,
      });
      if (ui.isCancel(selected)) {
        ui.cancel("Delete cancelled");
        return 1;
      }
      archivePaths = selected;
    }

    if (!values.yes) {
      const proceed = await ui.confirm({
        message: `Delete ${archivePaths.map((p) => path.basename(p)).join(", ")}?`,
        initialValue: false,
      });
      if (ui.isCancel(proceed) || !proceed) {
        ui.cancel("Delete cancelled");
        return 1;
      }
    }

    const results: DeletionResult[] = [];
    for (const archivePath of archivePaths) {
      results.push(await deleteBackupArchive(context.store, archivePath));
    }
    printResults(results);
    return finish(results);
  } catch (error) {
    ui.error(`Delete failed: ${errorMessage(error)}`);
    if (values.verbose) {
      console.error(error);
    }
    return 1;
  }
}

function printResults(results: DeletionResult[]): void {
  for (const result of results) {
    if (result.success) {
      ui.success(path.basename(result.archivePath));
    } else {
      ui.error(`${path.basename(result.archivePath)}: ${result.error ?? "failed"}`);
    }
  }
}

function finish(results: DeletionResult[]): number {
  const failed = results.filter((r) => !r.success).length;
  if (failed > 0) {
    ui.outro(`${results.length - failed} of ${results.length} archive(s) deleted`);
    return 1;
  }
  ui.outro(`${results.length} archive(s) deleted`);
  return 0;
}

function printHelp(): void {
  console.log(`
${color.bold("dockpack delete")} - Delete archives from the backup root

${color.dim("USAGE:")}
  dockpack delete [OPTIONS] [ARCHIVE...]
  dockpack delete --all [OPTIONS]

${color.dim("OPTIONS:")}
  -a, --all                    Delete every archive and the command journal
  -y, --yes                    Skip confirmation
${COMMON_HELP}

${color.dim("DESCRIPTION:")}
  Archives outside the backup root are never deleted. --all asks twice,
  the second time for the word ${DELETE_ALL_CONFIRMATION}.

${color.dim("EXAMPLES:")}
  dockpack delete                          # Pick archives to delete
  dockpack delete docker_project_backup_20250101_120000_web1.tar.gz
  dockpack delete --all                    # Delete everything
`);
}
