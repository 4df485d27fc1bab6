/**
 * Domain error types
 */

export class InvalidDurationError extends Error {
  constructor(readonly input: string) {
    super(
      `Invalid time duration format: "${input}" (expected a number followed by h, d, w, m or y, e.g. "30d")`,
    );
    this.name = "InvalidDurationError";
  }
}

export class EmptyRetentionPolicyError extends Error {
  constructor(message = "Retention policy must contain at least one rule that can keep archives") {
    super(message);
    this.name = "EmptyRetentionPolicyError";
  }
}

/**
 * The archive store itself could not be reached (binary missing, repository gone).
 * Fatal for the whole operation.
 */
export class ArchiveStoreUnavailableError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ArchiveStoreUnavailableError";
  }
}

/**
 * An archive store command ran but exited unsuccessfully.
 */
export class ArchiveStoreCommandError extends Error {
  constructor(
    readonly args: string[],
    readonly exitCode: number | null,
    readonly stderr: string,
  ) {
    super(
      `Archive store command failed (exit ${exitCode ?? "signal"}): ${args.join(" ")}${stderr ? ` - ${stderr}` : ""}`,
    );
    this.name = "ArchiveStoreCommandError";
  }
}

/**
 * A single archive could not be read. Never fatal: callers log it and
 * keep the archive out of any deletion.
 */
export class ArchiveReadError extends Error {
  constructor(
    readonly archiveName: string,
    options?: { cause?: unknown },
  ) {
    const reason = options?.cause instanceof Error ? `: ${options.cause.message}` : "";
    super(`Failed to read archive ${archiveName}${reason}`, options);
    this.name = "ArchiveReadError";
  }
}

/**
 * A source path may not be removed after backup
 */
export class SourceRemovalError extends Error {
  constructor(readonly sourcePath: string) {
    super(`Refusing to delete system path: ${sourcePath}`);
    this.name = "SourceRemovalError";
  }
}
