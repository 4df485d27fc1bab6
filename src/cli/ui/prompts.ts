/**
 * Interactive prompts wrapper
 */

import * as p from "@clack/prompts";
import type { ArchiveRecord } from "../../types/index.js";
import { formatTimestamp } from "./formatters.js";

/**
 * Ask before deleting archives. Cancelling counts as a refusal.
 */
export async function confirmDeletion(count: number, repository: string): Promise<boolean> {
  const answer = await p.confirm({
    message: `Delete ${count} archive(s) from ${repository}?`,
    initialValue: false,
  });
  return !p.isCancel(answer) && answer;
}

/**
 * Pick one archive, newest first. Resolves to null when cancelled.
 */
export async function selectArchive(records: ArchiveRecord[]): Promise<string | null> {
  const newestFirst = [...records].sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime());

  const selected = await p.select<{ value: string; label: string; hint: string }[], string>({
    message: "Select an archive to restore",
    options: newestFirst.map((record) => ({
      value: record.name,
      label: record.name,
      hint: record.metadata?.sourcePath ?? formatTimestamp(record.createdAt),
    })),
  });

  return p.isCancel(selected) ? null : selected;
}
