/**
 * CLI UI module exports
 */

export type { SummaryItem } from "./formatters";
export { formatSummary, formatTableRow, formatTableSeparator, TABLE_WIDTHS } from "./formatters";
export {
  banner,
  cancel,
  color,
  error,
  info,
  NAME,
  note,
  outro,
  success,
  VERSION,
  warn,
} from "./output";
export { confirm, isCancel } from "./prompts";

import * as output from "./output";
import * as prompts from "./prompts";

export const ui = {
  banner: output.banner,
  outro: output.outro,
  cancel: output.cancel,
  note: output.note,
  info: output.info,
  success: output.success,
  warn: output.warn,
  error: output.error,
  confirm: prompts.confirm,
  isCancel: prompts.isCancel,
};
