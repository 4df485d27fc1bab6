import { parseArgs } from "node:util";
import { selectRepositories } from "../../config/index.js";
import { ensureRepository } from "../../core/index.js";
import { loadArchiveRecords } from "../../store/index.js";
import type { ArchiveRecord } from "../../types/index.js";
import { logger } from "../../utils/logger.js";
import {
  color,
  escapeCsv,
  formatTableRow,
  formatTableSeparator,
  formatTimestamp,
  TABLE_WIDTHS,
  truncateStart,
  ui,
} from "../ui/index.js";
import {
  COMMON_OPTIONS,
  type CommandDeps,
  defaultDeps,
  errorMessage,
  loadCommandConfig,
  REPOSITORY_OPTIONS,
} from "./shared.js";

export interface ArchiveRow {
  repository: string;
  name: string;
  createdAt: string;
  sourcePath: string | null;
  sourceDir: string | null;
  size: number | null;
}

export function toArchiveRow(repository: string, record: ArchiveRecord): ArchiveRow {
  return {
    repository,
    name: record.name,
    createdAt: record.createdAt.toISOString(),
    sourcePath: record.metadata?.sourcePath ?? null,
    sourceDir: record.metadata?.sourceDir ?? null,
    size: record.metadata?.size ?? null,
  };
}

export async function listCommand(args: string[], deps: CommandDeps = defaultDeps): Promise<number> {
  const { values } = parseArgs({
    args,
    options: {
      ...COMMON_OPTIONS,
      ...REPOSITORY_OPTIONS,
      limit: { type: "string", short: "n" },
      format: { type: "string", default: "table" },
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

    const rows: { row: ArchiveRow; record: ArchiveRecord }[] = [];
    for (const repository of repositories) {
      const store = deps.createStore(repository, config);
      await ensureRepository(store, repository);

      const records = await loadArchiveRecords(store);
      for (const record of records) {
        rows.push({ row: toArchiveRow(repository.name, record), record });
      }
    }

    // Newest first
    rows.sort((a, b) => b.record.createdAt.getTime() - a.record.createdAt.getTime());

    const limit = values.limit ? Number.parseInt(values.limit, 10) : undefined;
    const shown = limit && limit > 0 ? rows.slice(0, limit) : rows;

    // Output based on format - no intro for scripting formats
    switch (values.format) {
      case "json":
        console.log(JSON.stringify(shown.map((r) => r.row), null, 2));
        return 0;
      case "csv":
        printCsv(shown.map((r) => r.row));
        return 0;
      default:
        ui.intro("borgkeep list");

        if (shown.length === 0) {
          ui.info("No archives found");
          ui.outro("Done");
          return 0;
        }

        printTable(shown);
        ui.outro(`${shown.length} archive(s) shown, ${rows.length} total`);
        return 0;
    }
  } catch (error) {
    logger.error(`List failed: ${errorMessage(error)}`);
    ui.error(`List failed: ${errorMessage(error)}`);
    if (values.verbose) {
      console.error(error);
    }
    return 1;
  }
}

function printTable(rows: { row: ArchiveRow; record: ArchiveRecord }[]): void {
  const widths = [
    TABLE_WIDTHS.archiveName,
    TABLE_WIDTHS.created,
    TABLE_WIDTHS.sourcePath,
    TABLE_WIDTHS.sourceDir,
  ];

  ui.step("Archives:");
  console.log(formatTableRow(["Archive", "Created", "Source path", "Source dir"], widths));
  console.log(formatTableSeparator(widths));

  for (const { row, record } of rows) {
    const sourcePath = record.unreadable
      ? color.red("(unreadable)")
      : truncateStart(row.sourcePath ?? "", TABLE_WIDTHS.sourcePath);

    console.log(
      formatTableRow(
        [
          truncateStart(row.name, TABLE_WIDTHS.archiveName),
          formatTimestamp(record.createdAt),
          sourcePath,
          truncateStart(row.sourceDir ?? "", TABLE_WIDTHS.sourceDir),
        ],
        widths,
      ),
    );
  }

  console.log(formatTableSeparator(widths));
}

export function printCsv(rows: ArchiveRow[]): void {
  console.log("repository,name,created_at,source_path,source_dir,size");

  for (const row of rows) {
    console.log(
      [
        row.repository,
        row.name,
        row.createdAt,
        row.sourcePath ?? "",
        row.sourceDir ?? "",
        row.size === null ? "" : String(row.size),
      ]
        .map(escapeCsv)
        .join(","),
    );
  }
}

function printHelp(): void {
  console.log(`
${color.bold("borgkeep list")} - List archives

${color.dim("USAGE:")}
  borgkeep list [OPTIONS]

${color.dim("OPTIONS:")}
  -c, --config <path>       Path to config file (default: ./borgkeep.config.yaml)
  -r, --repository <name>   List one repository
      --all                 List every repository
  -n, --limit <number>      Limit number of results
      --format <format>     Output format: table, json, csv (default: table)
      --log <path>          Also write log lines to this file
  -v, --verbose             Verbose output
  -h, --help                Show this help message

${color.dim("EXAMPLES:")}
  borgkeep list -r documents               # List one repository
  borgkeep list --all -n 10                # Newest 10 archives overall
  borgkeep list --format json              # Output as JSON (for scripting)
`);
}
