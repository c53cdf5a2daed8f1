#!/usr/bin/env node

import * as p from "@clack/prompts";
import color from "picocolors";
import { backupCommand } from "./cli/commands/backup";
import { containersCommand } from "./cli/commands/containers";
import { deleteCommand } from "./cli/commands/delete";
import { journalCommand } from "./cli/commands/journal";
import { listCommand } from "./cli/commands/list";
import { logCommand } from "./cli/commands/log";
import { restoreCommand } from "./cli/commands/restore";
import { verifyCommand } from "./cli/commands/verify";
import { LOGO, VERSION } from "./cli/ui";
import { closeDatabase } from "./db";

function printHelp(): void {
  console.log(color.bold(color.cyan(LOGO)));
  p.intro(`${color.cyan("dockpack")} ${color.dim(`v${VERSION}`)} - Docker project backup and restore`);

  p.note(
    `${color.cyan("backup")}      Back up containers or compose projects
${color.cyan("restore")}     Restore volumes, bind mounts and containers from archives
${color.cyan("list")}        List archives in the backup root
${color.cyan("containers")}  List containers that can be backed up
${color.cyan("verify")}      Check catalogued archives against the backup root
${color.cyan("delete")}      Delete archives
${color.cyan("journal")}     Show recorded restart commands
${color.cyan("log")}         Show the end of the log`,
    "Commands",
  );

  p.note(
    `-h, --help      Show this help message
-v, --version   Show version`,
    "Options",
  );

  p.note(
    `dockpack backup web1                 ${color.dim("# Back up the project of container web1")}
dockpack backup --all                ${color.dim("# Back up every project")}
dockpack backup                      ${color.dim("# Interactive container selection")}
dockpack restore                     ${color.dim("# Interactive archive selection")}
dockpack list                        ${color.dim("# List all archives")}
dockpack verify --fix                ${color.dim("# Verify and fix the catalog")}`,
    "Examples",
  );

  p.outro(`Run ${color.cyan("dockpack <command> --help")} for command details`);
}

function printVersion(): void {
  console.log(color.bold(color.cyan(LOGO)));
  p.outro(`${color.cyan("dockpack")} ${color.dim(`v${VERSION}`)}`);
}

async function main(): Promise<number> {
  const args = process.argv.slice(2);

  if (args.length === 0) {
    printHelp();
    return 0;
  }

  const command = args[0];
  const commandArgs = args.slice(1);

  switch (command) {
    case "backup":
      return backupCommand(commandArgs);

    case "restore":
      return restoreCommand(commandArgs);

    case "list":
      return listCommand(commandArgs);

    case "containers":
      return containersCommand(commandArgs);

    case "verify":
      return verifyCommand(commandArgs);

    case "delete":
      return deleteCommand(commandArgs);

    case "journal":
      return journalCommand(commandArgs);

    case "log":
      return logCommand(commandArgs);

    case "-h":
    case "--help":
    case "help":
      printHelp();
      return 0;

    case "-v":
    case "--version":
    case "version":
      printVersion();
      return 0;

    default:
      console.error(`${color.red("Error:")} Unknown command: ${command}`);
      console.error(`Run ${color.cyan("dockpack --help")} for usage information.`);
      return 1;
  }
}

main()
  .then((code) => {
    closeDatabase();
    process.exit(code);
  })
  .catch((error: unknown) => {
    closeDatabase();
    console.error(`${color.red("Fatal error:")}`, error);
    process.exit(1);
  });
