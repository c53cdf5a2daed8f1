import { parseArgs } from "node:util";
import { getDockerVersion } from "../../docker/client";
import type { ContainerSummary } from "../../types";
import { errorMessage } from "../../utils/error";
import { color, formatTableRow, formatTableSeparator, ui } from "../ui";
import { COMMON_HELP, COMMON_OPTIONS, createCliContext, requireDocker } from "../context";

export async function containersCommand(args: string[]): Promise<number> {
  const { values } = parseArgs({
    args,
    options: {
      ...COMMON_OPTIONS,
      format: { type: "string", default: "table" },
    },
    allowPositionals: false,
  });

  if (values.help) {
    printHelp();
    return 0;
  }

  try {
    const context = await createCliContext(values, { database: false });
    await requireDocker(context.runtime);

    const containers = await context.runtime.listContainers();

    if (values.format === "json") {
      console.log(JSON.stringify(containers, null, 2));
      return 0;
    }

    ui.banner("containers");
    const version = await getDockerVersion();
    if (version) {
      ui.info(`Docker ${version}`);
    }

    if (containers.length === 0) {
      ui.info("No containers found");
      ui.outro("Done");
      return 0;
    }

    printTable(containers);

    const projects = new Set(containers.map((c) => c.composeProject).filter(Boolean));
    ui.outro(`${containers.length} container(s), ${projects.size} compose project(s)`);
    return 0;
  } catch (error) {
    ui.error(`Listing containers failed: ${errorMessage(error)}`);
    if (values.verbose) {
      console.error(error);
    }
    return 1;
  }
}

function printTable(containers: ContainerSummary[]): void {
  const widths = [12, 28, 32, 10, 20];

  ui.step("Containers:");
  console.log(formatTableRow(["ID", "Name", "Image", "State", "Compose project"], widths));
  console.log(formatTableSeparator(widths));

  for (const container of containers) {
    const state = container.state === "running" ? color.green(container.state) : color.dim(container.state);
    console.log(
      formatTableRow(
        [
          container.id.substring(0, 12),
          container.name,
          container.image,
          state,
          container.composeProject ?? color.dim("-"),
        ],
        widths,
      ),
    );
  }

  console.log(formatTableSeparator(widths));
}

function printHelp(): void {
  console.log(`
${color.bold("dockpack containers")} - List containers that can be backed up

${color.dim("USAGE:")}
  dockpack containers [OPTIONS]

${color.dim("OPTIONS:")}
      --format <format>        Output format: table, json (default: table)
${COMMON_HELP}
`);
}
