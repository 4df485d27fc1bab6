import { parseArgs } from "node:util";
import { selectRepositories } from "../../config/index.js";
import { ensureRepository } from "../../core/index.js";
import { logger } from "../../utils/logger.js";
import { color, formatSummary, ui } from "../ui/index.js";
import {
  COMMON_OPTIONS,
  type CommandDeps,
  defaultDeps,
  errorMessage,
  loadCommandConfig,
  REPOSITORY_OPTIONS,
} from "./shared.js";

export async function infoCommand(args: string[], deps: CommandDeps = defaultDeps): Promise<number> {
  const { values } = parseArgs({
    args,
    options: {
      ...COMMON_OPTIONS,
      ...REPOSITORY_OPTIONS,
    },
    allowPositionals: false,
  });

  if (values.help) {
    printHelp();
    return 0;
  }

  try {
    const config = await loadCommandConfig(values);
    const repositories = selectRepositories(config, values.repository, values.all ?? false);

    ui.intro("borgkeep info");

    for (const repository of repositories) {
      const store = deps.createStore(repository, config);
      await ensureRepository(store, repository);

      const version = await store.version();
      const details = await store.info();
      const names = await store.listNames();

      ui.note(
        formatSummary([
          { label: "Path", value: repository.path },
          { label: "Mode", value: repository.retentionMode },
          {
            label: "Paranoid",
            value: repository.retentionMode === "per_file" ? String(repository.paranoid) : null,
          },
          { label: "Compression", value: repository.compression },
          { label: "Archives", value: names.length },
          { label: "Newest", value: names.at(-1) ?? null },
          { label: "Store", value: version },
        ]),
        repository.name,
      );
      ui.message(details);
    }

    ui.outro("Done");
    return 0;
  } catch (error) {
    logger.error(`Info failed: ${errorMessage(error)}`);
    ui.error(`Info failed: ${errorMessage(error)}`);
    return 1;
  }
}

function printHelp(): void {
  console.log(`
${color.bold("borgkeep info")} - Show repository information

${color.dim("USAGE:")}
  borgkeep info [OPTIONS]

${color.dim("OPTIONS:")}
  -c, --config <path>       Path to config file (default: ./borgkeep.config.yaml)
  -r, --repository <name>   Show one repository
      --all                 Show every repository
      --log <path>          Also write log lines to this file
  -v, --verbose             Verbose output
  -h, --help                Show this help message
`);
}
