/**
 * Utility exports
 */

// Crypto utilities
export { computeFileChecksum, computePathHash, computeStringHash } from "./crypto.js";
// Duration parsing
export { isValidDuration, parseDuration, parseDurationMs } from "./duration.js";
// Formatting utilities
export { formatBytes, formatDuration } from "./format.js";
export type { LogLevel } from "./logger.js";
// Logger
export {
  debug,
  error,
  getLogFile,
  getLogLevel,
  info,
  logger,
  setLogFile,
  setLogLevel,
  warn,
} from "./logger.js";
export type { ParsedFileArchiveName } from "./naming.js";
// Naming utilities
export {
  formatArchiveTimestamp,
  generateArchiveName,
  generateFileArchiveName,
  isArchiveForPath,
  parseArchiveVersion,
  parseFileArchiveName,
  sanitizeName,
  withVersionSuffix,
} from "./naming.js";
// Path utilities
export { isProtectedPath, isPathWithinDir } from "./path.js";
