import { parseArgs } from "node:util";
import { getAllActiveBackups } from "../../db";
import type { ArchiveEntry } from "../../storage/local";
import type { BackupRecord } from "../../types";
import { errorMessage } from "../../utils/error";
import { formatBytes } from "../../utils/format";
import { color, formatTableRow, formatTableSeparator, TABLE_WIDTHS, ui } from "../ui";
import { COMMON_HELP, COMMON_OPTIONS, createCliContext } from "../context";

interface ListedArchive {
  name: string;
  path: string;
  project: string | null;
  timestamp: string | null;
  sizeBytes: number;
  modifiedAt: string;
  backupId: string | null;
  containers: number | null;
  compose: boolean | null;
}

export async function listCommand(args: string[]): Promise<number> {
  const { values } = parseArgs({
    args,
    options: {
      ...COMMON_OPTIONS,
      project: { type: "string", short: "p" },
      limit: { type: "string", short: "n" },
      format: { type: "string", default: "table" },
    },
    allowPositionals: false,
  });

  if (values.help) {
    printHelp();
    return 0;
  }

  try {
    const context = await createCliContext(values);

    const records = new Map<string, BackupRecord>();
    for (const record of getAllActiveBackups()) {
      records.set(record.archive_path, record);
    }

    let archives = (await context.store.listArchives()).map((entry) =>
      toListed(entry, records.get(entry.path)),
    );

    if (values.project) {
      archives = archives.filter((a) => a.project === values.project);
    }

    const limit = values.limit ? parseInt(values.limit, 10) : undefined;
    if (limit && limit > 0) {
      archives = archives.slice(-limit);
    }

    // No intro for scripting formats
    switch (values.format) {
      case "json":
        console.log(JSON.stringify(archives, null, 2));
        return 0;
      case "csv":
        printCsv(archives);
        return 0;
      default:
        ui.intro("dockpack list");

        if (archives.length === 0) {
          ui.info(`No archives in ${context.config.backupRoot}`);
          ui.outro("Done");
          return 0;
        }

        printTable(archives);

        ui.outro(`${archives.length} archive(s) total`);
        return 0;
    }
  } catch (error) {
    ui.error(`List failed: ${errorMessage(error)}`);
    if (values.verbose) {
      console.error(error);
    }
    return 1;
  }
}

function toListed(entry: ArchiveEntry, record: BackupRecord | undefined): ListedArchive {
  return {
    name: entry.name,
    path: entry.path,
    project: entry.projectName ?? record?.project_name ?? null,
    timestamp: entry.timestamp,
    sizeBytes: entry.sizeBytes,
    modifiedAt: entry.modifiedAt.toISOString(),
    backupId: record?.backup_id ?? null,
    containers: record?.containers_count ?? null,
    compose: record?.is_compose ?? null,
  };
}

function printTable(archives: ListedArchive[]): void {
  const widths = [
    TABLE_WIDTHS.archiveName,
    TABLE_WIDTHS.project,
    TABLE_WIDTHS.created,
    TABLE_WIDTHS.size,
    TABLE_WIDTHS.catalog,
  ];

  ui.step("Archives:");
  console.log(formatTableRow(["Archive", "Project", "Modified", "Size", "Catalog"], widths));
  console.log(formatTableSeparator(widths));

  for (const archive of archives) {
    const catalog = archive.backupId
      ? color.green(archive.compose ? "compose" : "standalone")
      : color.dim("-");

    console.log(
      formatTableRow(
        [
          archive.name,
          archive.project ?? "?",
          archive.modifiedAt.substring(0, 19).replace("T", " "),
          formatBytes(archive.sizeBytes),
          catalog,
        ],
        widths,
      ),
    );
  }

  console.log(formatTableSeparator(widths));
}

function printCsv(archives: ListedArchive[]): void {
  console.log("archive_name,project_name,timestamp,size_bytes,modified_at,backup_id,containers_count,is_compose,path");

  for (const archive of archives) {
    console.log(
      [
        archive.name,
        archive.project ?? "",
        archive.timestamp ?? "",
        archive.sizeBytes,
        archive.modifiedAt,
        archive.backupId ?? "",
        archive.containers ?? "",
        archive.compose ?? "",
        archive.path,
      ].join(","),
    );
  }
}

function printHelp(): void {
  console.log(`
${color.bold("dockpack list")} - List archives in the backup root

${color.dim("USAGE:")}
  dockpack list [OPTIONS]

${color.dim("OPTIONS:")}
  -p, --project <name>         Only archives of this project
  -n, --limit <number>         Only the newest N archives
      --format <format>        Output format: table, json, csv (default: table)
${COMMON_HELP}

${color.dim("EXAMPLES:")}
  dockpack list                            # List all archives
  dockpack list -p shop                    # Archives of the shop project
  dockpack list -n 5                       # Newest 5 archives
  dockpack list --format json              # Output as JSON (for scripting)
`);
}
