import { parseArgs } from "node:util";
import { selectRepositories } from "../../config/index.js";
import { loadPruneRecords, pruneArchives } from "../../core/index.js";
import type { PruneResult } from "../../types/index.js";
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

function summarize(result: PruneResult): string {
  return formatSummary([
    { label: "Checked", value: result.totalChecked },
    { label: "Kept", value: result.totalKept },
    {
      label: result.dryRun ? "Would delete" : "Deleted",
      value: result.dryRun ? result.deletions.length : result.totalDeleted,
    },
    { label: "Groups", value: result.groups.length },
    { label: "Errors", value: result.errors.length > 0 ? result.errors.length : null },
  ]);
}

export async function pruneCommand(args: string[], deps: CommandDeps = defaultDeps): Promise<number> {
  const { values } = parseArgs({
    args,
    options: {
      ...COMMON_OPTIONS,
      ...REPOSITORY_OPTIONS,
      "dry-run": { type: "boolean", default: false },
      force: { type: "boolean", default: false },
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

    ui.intro("borgkeep prune");

    let errors = 0;

    for (const repository of repositories) {
      const store = deps.createStore(repository, config);
      const records = await loadPruneRecords(store, repository, { dryRun: values["dry-run"] });
      const mode = repository.retentionMode;

      // Preview what will be deleted first
      const preview = await pruneArchives(store, records, repository.retention, {
        mode,
        dryRun: true,
      });

      if (preview.deletions.length === 0) {
        ui.success(`${repository.name}: no archives need to be pruned`);
        continue;
      }

      ui.step(`${repository.name}: ${preview.deletions.length} archive(s) to delete:`);
      for (const deletion of preview.deletions) {
        ui.message(`  ${color.dim("•")} ${deletion.record.name} ${color.dim(`(${deletion.reason})`)}`);
      }

      if (values["dry-run"]) {
        ui.note(summarize(preview), `${repository.name} Preview`);
        continue;
      }

      if (!values.force) {
        const confirmed = await ui.confirmDeletion(preview.deletions.length, repository.name);
        if (!confirmed) {
          ui.cancel("Prune cancelled");
          return 1;
        }
      }

      const s = ui.spinner();
      s.start(`Pruning ${repository.name}...`);
      const result = await pruneArchives(store, records, repository.retention, {
        mode,
        dryRun: false,
      });
      s.stop(`${repository.name}: ${result.totalDeleted} archive(s) deleted`);

      for (const failure of result.errors) {
        ui.error(`${failure.archiveName}: ${failure.error}`);
      }
      errors += result.errors.length;

      ui.note(summarize(result), `${repository.name} Prune Summary`);
    }

    if (values["dry-run"]) {
      ui.warn("[DRY RUN] No changes were made.");
    }

    if (errors > 0) {
      ui.outro("Prune finished with errors");
      return 1;
    }

    ui.outro("Prune complete!");
    return 0;
  } catch (error) {
    logger.error(`Prune failed: ${errorMessage(error)}`);
    ui.error(`Prune failed: ${errorMessage(error)}`);
    if (values.verbose) {
      console.error(error);
    }
    return 1;
  }
}

function printHelp(): void {
  console.log(`
${color.bold("borgkeep prune")} - Delete archives that no retention rule keeps

${color.dim("USAGE:")}
  borgkeep prune [OPTIONS]

${color.dim("OPTIONS:")}
  -c, --config <path>       Path to config file (default: ./borgkeep.config.yaml)
  -r, --repository <name>   Prune one repository
      --all                 Prune every repository
      --dry-run             Show what would be deleted without doing it
      --force               Skip confirmation prompts
      --log <path>          Also write log lines to this file
  -v, --verbose             Verbose output
  -h, --help                Show this help message

${color.dim("RETENTION:")}
  Rules are additive: an archive is kept when any rule keeps it.
  per_file repositories are pruned per source directory. When
  keepFilesModifiedWithin is set it replaces the other rules there,
  judging each archive by the modification time of the file it holds.
  Archives that cannot be read are never deleted.

${color.dim("EXAMPLES:")}
  borgkeep prune -r documents              # Prune with confirmation
  borgkeep prune --all --dry-run           # Preview all repositories
  borgkeep prune --all --force             # Skip confirmation
`);
}
