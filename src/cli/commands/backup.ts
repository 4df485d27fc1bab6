import { parseArgs } from "node:util";
import { ConfigError, selectRepositories } from "../../config/index.js";
import { runBackup } from "../../core/index.js";
import type { BackupResult } from "../../types/index.js";
import { formatDuration } from "../../utils/format.js";
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

function summarize(result: BackupResult): string {
  return formatSummary([
    { label: "Repository", value: result.repository },
    { label: "Mode", value: result.mode },
    {
      label: "Archive",
      value: result.mode === "standard" ? (result.archives[0] ?? null) : null,
    },
    { label: "Created", value: result.created },
    { label: "Versioned", value: result.mode === "per_file" ? result.versioned : null },
    { label: "Skipped", value: result.mode === "per_file" ? result.skipped : null },
    { label: "Failed", value: result.failures.length > 0 ? result.failures.length : null },
    {
      label: "Removed",
      value: result.removedSources.length > 0 ? result.removedSources.length : null,
    },
    { label: "Duration", value: formatDuration(result.durationMs) },
  ]);
}

export async function backupCommand(
  args: string[],
  deps: CommandDeps = defaultDeps,
): Promise<number> {
  const { values } = parseArgs({
    args,
    options: {
      ...COMMON_OPTIONS,
      ...REPOSITORY_OPTIONS,
      "dry-run": { type: "boolean", default: false },
      "remove-source": { type: "boolean", default: false },
      name: { type: "string" },
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
    const removeSource = values["remove-source"] ?? false;

    if (removeSource) {
      const blocked = repositories.filter((repository) => !repository.allowRemoveSource);
      if (blocked.length > 0) {
        throw new ConfigError(
          `--remove-source is not allowed for: ${blocked.map((r) => r.name).join(", ")}. ` +
            "Set allowRemoveSource: true in the config to enable it",
        );
      }
    }

    ui.intro("borgkeep backup");

    let failed = 0;

    for (const repository of repositories) {
      const s = ui.spinner();
      s.start(`Backing up ${repository.name}...`);

      const result = await runBackup(deps.createStore(repository, config), repository, {
        dryRun: values["dry-run"],
        archiveName: values.name,
        removeSource,
      });

      s.stop(`${repository.name}: ${result.archives.length} archive(s) ${values["dry-run"] ? "planned" : "written"}`);

      for (const failure of result.failures) {
        ui.error(`${failure.path}: ${failure.error}`);
      }
      if (removeSource && result.failures.length > 0) {
        ui.warn(`${repository.name}: sources kept because some files failed`);
      }
      failed += result.failures.length;

      ui.note(summarize(result), values["dry-run"] ? "Backup Preview" : "Backup Summary");
    }

    if (values["dry-run"]) {
      ui.warn("[DRY RUN] No archives were created.");
    }

    if (failed > 0) {
      ui.outro(`Backup finished with ${failed} failure(s)`);
      return 1;
    }

    ui.outro("Backup complete!");
    return 0;
  } catch (error) {
    logger.error(`Backup failed: ${errorMessage(error)}`);
    ui.error(`Backup failed: ${errorMessage(error)}`);
    if (values.verbose) {
      console.error(error);
    }
    return 1;
  }
}

function printHelp(): void {
  console.log(`
${color.bold("borgkeep backup")} - Create archives for configured repositories

${color.dim("USAGE:")}
  borgkeep backup [OPTIONS]

${color.dim("OPTIONS:")}
  -c, --config <path>       Path to config file (default: ./borgkeep.config.yaml)
  -r, --repository <name>   Back up one repository
      --all                 Back up every repository
      --name <archive>      Archive name (standard mode only)
      --dry-run             Show what would be archived without creating anything
      --remove-source       Delete the sources after a backup with no failures
                            (needs allowRemoveSource: true in the config)
      --log <path>          Also write log lines to this file
  -v, --verbose             Verbose output
  -h, --help                Show this help message

${color.dim("MODES:")}
  standard    One archive per run holding every source path
  per_file    One archive per file; unchanged files are skipped and changed
              files get a new versioned archive (-v2, -v3, ...)

${color.dim("EXAMPLES:")}
  borgkeep backup -r documents             # Back up one repository
  borgkeep backup --all --dry-run          # Preview all repositories
`);
}
