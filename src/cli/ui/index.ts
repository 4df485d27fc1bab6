/**
 * CLI UI module exports
 */

export type { SummaryItem } from "./formatters.js";
// Formatters
export {
  escapeCsv,
  formatSummary,
  formatTableRow,
  formatTableSeparator,
  formatTimestamp,
  TABLE_WIDTHS,
  truncateStart,
} from "./formatters.js";
// Output
export {
  cancel,
  color,
  error,
  info,
  intro,
  LOGO,
  message,
  note,
  outro,
  spinner,
  step,
  success,
  VERSION,
  warn,
} from "./output.js";
// Prompts
export { confirmDeletion, selectArchive } from "./prompts.js";

import * as output from "./output.js";
import * as prompts from "./prompts.js";

export const ui = {
  intro: output.intro,
  outro: output.outro,
  cancel: output.cancel,
  note: output.note,
  info: output.info,
  success: output.success,
  warn: output.warn,
  error: output.error,
  step: output.step,
  message: output.message,
  spinner: output.spinner,
  confirmDeletion: prompts.confirmDeletion,
  selectArchive: prompts.selectArchive,
};
