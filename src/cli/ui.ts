/**
 * CLI UI - re-exports from the ui/ subdirectory
 */

export type { SummaryItem } from "./ui/index";
export {
  AutoApprovePrompts,
  banner,
  ClackPrompts,
  color,
  createPrompts,
  formatSummary,
  formatTableRow,
  formatTableSeparator,
  formatWarnings,
  LOGO,
  TABLE_WIDTHS,
  ui,
  VERSION,
} from "./ui/index";
