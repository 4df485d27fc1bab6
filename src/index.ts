#!/usr/bin/env node

import * as p from "@clack/prompts";
import { backupCommand } from "./cli/commands/backup.js";
import { infoCommand } from "./cli/commands/info.js";
import { initCommand } from "./cli/commands/init.js";
import { listCommand } from "./cli/commands/list.js";
import { pruneCommand } from "./cli/commands/prune.js";
import { restoreCommand } from "./cli/commands/restore.js";
import { color, LOGO, VERSION } from "./cli/ui/index.js";

function printHelp(): void {
  console.log(color.bold(color.cyan(LOGO)));
  p.intro(`${color.cyan("borgkeep")} ${color.dim(`v${VERSION}`)} - Borg archive lifecycle manager`);

  p.note(
    `${color.cyan("init")}        Initialize repositories
${color.cyan("backup")}      Create archives (one per run, or one per file)
${color.cyan("prune")}       Delete archives no retention rule keeps
${color.cyan("list")}        List archives
${color.cyan("info")}        Show repository information
${color.cyan("restore")}     Extract an archive`,
    "Commands",
  );

  p.note(
    `-h, --help      Show this help message
-v, --version   Show version`,
    "Options",
  );

  p.note(
    `borgkeep init --all                ${color.dim("# Initialize every repository")}
borgkeep backup -r documents       ${color.dim("# Back up one repository")}
borgkeep prune --all --dry-run     ${color.dim("# Preview pruning")}
borgkeep list --format json        ${color.dim("# List archives as JSON")}
borgkeep restore                   ${color.dim("# Pick an archive to restore")}`,
    "Examples",
  );

  p.outro(`Run ${color.cyan("borgkeep <command> --help")} for command details`);
}

function printVersion(): void {
  console.log(`borgkeep v${VERSION}`);
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
    case "init":
      return initCommand(commandArgs);

    case "backup":
      return backupCommand(commandArgs);

    case "prune":
      return pruneCommand(commandArgs);

    case "list":
      return listCommand(commandArgs);

    case "info":
      return infoCommand(commandArgs);

    case "restore":
      return restoreCommand(commandArgs);

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
      console.error(`Run ${color.cyan("borgkeep --help")} for usage information.`);
      return 1;
  }
}

main()
  .then((code) => process.exit(code))
  .catch((error) => {
    console.error(`${color.red("Fatal error:")}`, error);
    process.exit(1);
  });
