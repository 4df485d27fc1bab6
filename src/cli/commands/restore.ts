import * as path from "node:path";
import { parseArgs } from "node:util";
import { resolveRepository, selectRepositories } from "../../config/index.js";
import { loadArchiveRecords } from "../../store/index.js";
import { logger } from "../../utils/logger.js";
import { isProtectedPath } from "../../utils/path.js";
import { color, ui } from "../ui/index.js";
import {
  COMMON_OPTIONS,
  type CommandDeps,
  defaultDeps,
  errorMessage,
  loadCommandConfig,
} from "./shared.js";

export async function restoreCommand(
  args: string[],
  deps: CommandDeps = defaultDeps,
): Promise<number> {
  const { values, positionals } = parseArgs({
    args,
    options: {
      ...COMMON_OPTIONS,
      repository: { type: "string", short: "r" },
      destination: { type: "string", short: "d", default: "." },
      path: { type: "string", short: "p" },
    },
    allowPositionals: true,
  });

  if (values.help) {
    printHelp();
    return 0;
  }

  try {
    const config = await loadCommandConfig(values);
    const [repository] = values.repository
      ? [resolveRepository(config, values.repository)]
      : selectRepositories(config, undefined, false);
    if (!repository) {
      ui.error("No repository configured");
      return 1;
    }

    const destination = path.resolve(values.destination ?? ".");
    if (isProtectedPath(destination)) {
      ui.error(`Refusing to restore into system directory: ${destination}`);
      return 1;
    }

    ui.intro("borgkeep restore");

    const store = deps.createStore(repository, config);
    let archiveName = positionals[0];

    if (!archiveName) {
      const records = await loadArchiveRecords(store);
      if (records.length === 0) {
        ui.info("No archives found");
        ui.outro("Nothing to restore");
        return 0;
      }

      const selected = await ui.selectArchive(records);
      if (selected === null) {
        ui.cancel("Restore cancelled");
        return 1;
      }
      archiveName = selected;
    }

    const s = ui.spinner();
    s.start(`Restoring ${archiveName}...`);
    await store.extract(archiveName, destination, values.path);
    s.stop(`Restored ${archiveName}`);

    logger.info(`Restored ${archiveName} into ${destination}`);
    ui.outro(`Restored into ${destination}`);
    return 0;
  } catch (error) {
    logger.error(`Restore failed: ${errorMessage(error)}`);
    ui.error(`Restore failed: ${errorMessage(error)}`);
    return 1;
  }
}

function printHelp(): void {
  console.log(`
${color.bold("borgkeep restore")} - Extract an archive

${color.dim("USAGE:")}
  borgkeep restore [ARCHIVE] [OPTIONS]

${color.dim("OPTIONS:")}
  -c, --config <path>       Path to config file (default: ./borgkeep.config.yaml)
  -r, --repository <name>   Repository holding the archive
  -d, --destination <dir>   Directory to extract into (default: current directory)
  -p, --path <path>         Extract only this path from the archive
      --log <path>          Also write log lines to this file
  -v, --verbose             Verbose output
  -h, --help                Show this help message

${color.dim("SAFETY:")}
  Restoring into / or a system directory (/bin, /sbin, /usr, /etc,
  /sys, /proc, /boot) is refused.

${color.dim("EXAMPLES:")}
  borgkeep restore                              # Pick an archive interactively
  borgkeep restore docs-2024-01-15_10-30-00 -d ./restored
`);
}
