import { parseArgs } from "node:util";
import { formatJournalLine } from "../../core/journal/command-journal";
import { errorMessage } from "../../utils/error";
import { color, ui } from "../ui";
import { COMMON_HELP, COMMON_OPTIONS, createCliContext } from "../context";

export async function journalCommand(args: string[]): Promise<number> {
  const { values } = parseArgs({
    args,
    options: {
      ...COMMON_OPTIONS,
      project: { type: "string", short: "p" },
      format: { type: "string", default: "text" },
    },
    allowPositionals: false,
  });

  if (values.help) {
    printHelp();
    return 0;
  }

  try {
    const context = await createCliContext(values, { database: false });
    let entries = await context.journal.readEntries();

    if (values.project) {
      entries = entries.filter((e) => e.projectName === values.project);
    }

    if (values.format === "json") {
      console.log(JSON.stringify(entries, null, 2));
      return 0;
    }

    ui.intro("dockpack journal");

    if (entries.length === 0) {
      ui.info(`No journal entries in ${context.journal.filePath}`);
      ui.outro("Done");
      return 0;
    }

    for (const entry of entries) {
      console.log(formatJournalLine(entry));
    }

    ui.outro(`${entries.length} entr${entries.length === 1 ? "y" : "ies"}`);
    return 0;
  } catch (error) {
    ui.error(`Reading journal failed: ${errorMessage(error)}`);
    if (values.verbose) {
      console.error(error);
    }
    return 1;
  }
}

function printHelp(): void {
  console.log(`
${color.bold("dockpack journal")} - Show the commands recorded for restarting backed up projects

${color.dim("USAGE:")}
  dockpack journal [OPTIONS]

${color.dim("OPTIONS:")}
  -p, --project <name>         Only entries of this project
      --format <format>        Output format: text, json (default: text)
${COMMON_HELP}
`);
}
