import { parseArgs } from "node:util";
import { verifyCatalog } from "../../core/catalog/verify";
import { errorMessage } from "../../utils/error";
import { color, formatSummary, ui } from "../ui";
import { COMMON_HELP, COMMON_OPTIONS, createCliContext } from "../context";

export async function verifyCommand(args: string[]): Promise<number> {
  const { values } = parseArgs({
    args,
    options: {
      ...COMMON_OPTIONS,
      fix: { type: "boolean", default: false },
      force: { type: "boolean", default: false },
    },
    allowPositionals: false,
  });

  if (values.help) {
    printHelp();
    return 0;
  }

  try {
    const context = await createCliContext(values);

    ui.intro("dockpack verify");

    const s = ui.spinner();
    s.start("Verifying catalog...");
    const report = await verifyCatalog(context.store);
    s.stop("Verification complete");

    for (const record of report.verified) {
      ui.success(record.archive_name);
    }
    for (const record of report.missing) {
      ui.error(`${record.archive_name}: archive missing`);
    }
    for (const { record, actualChecksum } of report.mismatched) {
      ui.error(record.archive_name);
      ui.message(`  ${color.dim("•")} expected ${record.archive_checksum}, got ${actualChecksum}`);
    }
    for (const entry of report.uncatalogued) {
      ui.info(`${entry.name}: not in catalog`);
    }

    ui.note(
      formatSummary([
        { label: "Verified", value: report.verified.length },
        { label: "Missing", value: report.missing.length },
        { label: "Checksum mismatch", value: report.mismatched.length },
        { label: "Not in catalog", value: report.uncatalogued.length },
      ]),
      "Verification Summary",
    );

    if (values.fix && report.missing.length > 0) {
      if (!values.force) {
        const confirmed = await ui.confirm({
          message: `Mark ${report.missing.length} record(s) with missing archives as deleted?`,
          initialValue: false,
        });

        if (ui.isCancel(confirmed) || !confirmed) {
          ui.cancel("Fix cancelled");
          ui.info("Run with --fix --force to skip confirmation");
          return 1;
        }
      }

      const fixed = await verifyCatalog(context.store, { fix: true });
      ui.success(`Updated ${fixed.fixed} catalog record(s)`);
    } else if (report.missing.length > 0 && !values.fix) {
      ui.info("Run with --fix to mark missing archives as deleted");
    }

    if (report.missing.length > 0 || report.mismatched.length > 0) {
      ui.outro("Verification found issues");
      return 1;
    }

    ui.outro("All archives verified!");
    return 0;
  } catch (error) {
    ui.error(`Verify failed: ${errorMessage(error)}`);
    if (values.verbose) {
      console.error(error);
    }
    return 1;
  }
}

function printHelp(): void {
  console.log(`
${color.bold("dockpack verify")} - Check catalogued archives against the backup root

${color.dim("USAGE:")}
  dockpack verify [OPTIONS]

${color.dim("OPTIONS:")}
      --fix                    Mark records of missing archives as deleted (with confirmation)
      --force                  Skip confirmation when using --fix
${COMMON_HELP}

${color.dim("DESCRIPTION:")}
  Every active catalog record is checked for its archive file and checksum.
  Archives in the backup root without a record are reported as well.

${color.dim("EXAMPLES:")}
  dockpack verify                          # Verify the catalog
  dockpack verify --fix --force            # Verify and fix without confirmation
`);
}
