/**
 * Archive comment codec.
 *
 * Per-file archives carry their metadata in the store's free-text comment:
 *
 *   sourcePath|||size|||contentHash|||sourceDir
 *
 * Older writers produced shorter forms, all still accepted on read:
 *
 *   sourcePath                      (bare)
 *   sourcePath|||contentHash        (path-hash)
 *   sourcePath|||size|||contentHash (path-size-hash)
 *
 * Decoding dispatches on the number of parts. Any other count is read as a
 * bare path made of the whole comment, so decoding never fails.
 */

import type { ArchiveMetadata } from "../types/index.js";

export const METADATA_DELIMITER = "|||";

export type DecodedComment =
  | { format: "empty" }
  | { format: "bare"; metadata: ArchiveMetadata }
  | { format: "path-hash"; metadata: ArchiveMetadata }
  | { format: "path-size-hash"; metadata: ArchiveMetadata }
  | { format: "full"; metadata: ArchiveMetadata }
  | { format: "fallback"; metadata: ArchiveMetadata };

function optionalField(value: string | undefined): string | undefined {
  return value === undefined || value === "" ? undefined : value;
}

function parseSize(value: string | undefined): number | undefined {
  const field = optionalField(value);
  if (field === undefined || !/^\d+$/.test(field)) return undefined;
  return Number.parseInt(field, 10);
}

/**
 * Build metadata from positional fields, leaving empty fields unset
 */
function toMetadata(
  sourcePath: string,
  fields: { size?: string; contentHash?: string; sourceDir?: string },
): ArchiveMetadata {
  const metadata: ArchiveMetadata = { sourcePath };

  const size = parseSize(fields.size);
  if (size !== undefined) metadata.size = size;

  const contentHash = optionalField(fields.contentHash);
  if (contentHash !== undefined) metadata.contentHash = contentHash;

  const sourceDir = optionalField(fields.sourceDir);
  if (sourceDir !== undefined) metadata.sourceDir = sourceDir;

  return metadata;
}

export function encodeMetadata(metadata: ArchiveMetadata): string {
  return [
    metadata.sourcePath,
    metadata.size === undefined ? "" : String(metadata.size),
    metadata.contentHash ?? "",
    metadata.sourceDir ?? "",
  ].join(METADATA_DELIMITER);
}

export function decodeComment(comment: string): DecodedComment {
  if (comment.trim() === "") return { format: "empty" };

  const parts = comment.split(METADATA_DELIMITER);
  const [sourcePath = "", second, third, fourth] = parts;

  // A comment starting with the delimiter has no usable path
  if (sourcePath === "") {
    return { format: "fallback", metadata: { sourcePath: comment } };
  }

  switch (parts.length) {
    case 1:
      return { format: "bare", metadata: { sourcePath } };
    case 2:
      return { format: "path-hash", metadata: toMetadata(sourcePath, { contentHash: second }) };
    case 3:
      return {
        format: "path-size-hash",
        metadata: toMetadata(sourcePath, { size: second, contentHash: third }),
      };
    case 4:
      return {
        format: "full",
        metadata: toMetadata(sourcePath, { size: second, contentHash: third, sourceDir: fourth }),
      };
    default:
      return { format: "fallback", metadata: { sourcePath: comment } };
  }
}

/**
 * Decode a comment into metadata, or null when the comment is empty
 */
export function decodeMetadata(comment: string): ArchiveMetadata | null {
  const decoded = decodeComment(comment);
  return decoded.format === "empty" ? null : decoded.metadata;
}

/**
 * Whether the metadata carries enough to compare a file against.
 * Paranoid comparison also needs the content hash.
 */
export function isVerifiableMetadata(
  metadata: ArchiveMetadata | null,
  paranoid: boolean,
): metadata is ArchiveMetadata & { size: number } {
  if (metadata?.size === undefined) return false;
  return !paranoid || metadata.contentHash !== undefined;
}
