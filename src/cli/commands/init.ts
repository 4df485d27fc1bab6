import { parseArgs } from "node:util";
import { selectRepositories } from "../../config/index.js";
import { logger } from "../../utils/logger.js";
import { color, ui } from "../ui/index.js";
import {
  COMMON_OPTIONS,
  type CommandDeps,
  defaultDeps,
  errorMessage,
  loadCommandConfig,
} from "./shared.js";

export async function initCommand(args: string[], deps: CommandDeps = defaultDeps): Promise<number> {
  const { values, positionals } = parseArgs({
    args,
    options: {
      ...COMMON_OPTIONS,
      all: { type: "boolean", default: false },
    },
    allowPositionals: true,
  });

  if (values.help) {
    printHelp();
    return 0;
  }

  try {
    const config = await loadCommandConfig(values);
    const repositories = selectRepositories(config, positionals[0], values.all ?? false);

    ui.intro("borgkeep init");

    for (const repository of repositories) {
      const store = deps.createStore(repository, config);

      if (await store.exists()) {
        ui.warn(`${repository.name}: already initialized at ${repository.path}`);
        continue;
      }

      await store.init(repository.encryption);
      logger.info(`Initialized repository ${repository.name} (${repository.encryption})`);
      ui.success(`${repository.name}: initialized at ${repository.path}`);
    }

    ui.outro("Done");
    return 0;
  } catch (error) {
    logger.error(`Init failed: ${errorMessage(error)}`);
    ui.error(`Init failed: ${errorMessage(error)}`);
    return 1;
  }
}

function printHelp(): void {
  console.log(`
${color.bold("borgkeep init")} - Initialize configured repositories

${color.dim("USAGE:")}
  borgkeep init [REPOSITORY] [OPTIONS]

${color.dim("OPTIONS:")}
  -c, --config <path>     Path to config file (default: ./borgkeep.config.yaml)
      --all               Initialize every configured repository
      --log <path>        Also write log lines to this file
  -v, --verbose           Verbose output
  -h, --help              Show this help message

${color.dim("EXAMPLES:")}
  borgkeep init documents                  # Initialize one repository
  borgkeep init --all                      # Initialize all repositories
`);
}
