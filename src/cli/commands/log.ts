import { readFile } from "node:fs/promises";
import { parseArgs } from "node:util";
import { errorMessage } from "../../utils/error";
import { color, ui } from "../ui";
import { COMMON_HELP, COMMON_OPTIONS, createCliContext } from "../context";

const DEFAULT_LINES = 50;

/**
 * Last `count` non-empty lines of `content`
 */
export function tailLines(content: string, count: number): string[] {
  const lines = content.split("\n").filter((line) => line.length > 0);
  return count > 0 ? lines.slice(-count) : lines;
}

export async function logCommand(args: string[]): Promise<number> {
  const { values } = parseArgs({
    args,
    options: {
      ...COMMON_OPTIONS,
      lines: { type: "string", short: "n" },
    },
    allowPositionals: false,
  });

  if (values.help) {
    printHelp();
    return 0;
  }

  try {
    const context = await createCliContext(values, { database: false });
    const logPath = context.config.log.path;
    const count = values.lines ? parseInt(values.lines, 10) : DEFAULT_LINES;
    if (Number.isNaN(count) || count < 0) {
      ui.error(`Invalid line count: ${values.lines}`);
      return 1;
    }

    let content: string;
    try {
      content = await readFile(logPath, "utf-8");
    } catch (error) {
      if (error instanceof Error && "code" in error && error.code === "ENOENT") {
        ui.info(`No log file at ${logPath}`);
        return 0;
      }
      throw error;
    }

    for (const line of tailLines(content, count)) {
      console.log(line);
    }
    return 0;
  } catch (error) {
    ui.error(`Reading log failed: ${errorMessage(error)}`);
    if (values.verbose) {
      console.error(error);
    }
    return 1;
  }
}

function printHelp(): void {
  console.log(`
${color.bold("dockpack log")} - Show the end of the dockpack log

${color.dim("USAGE:")}
  dockpack log [OPTIONS]

${color.dim("OPTIONS:")}
  -n, --lines <number>         Number of lines, 0 for all (default: ${DEFAULT_LINES})
${COMMON_HELP}
`);
}
