/**
 * Table and summary formatters
 */

import color from "picocolors";
import type { OperationWarning } from "../../core/errors";

export const TABLE_WIDTHS = {
  archiveName: 60,
  project: 20,
  created: 19,
  size: 10,
  catalog: 10,
} as const;

export interface SummaryItem {
  label: string;
  value: string | number | null | undefined;
}

export function formatSummary(items: SummaryItem[]): string {
  const shown = items.filter((i) => i.value !== null && i.value !== undefined);
  const maxLabelLen = Math.max(0, ...shown.map((i) => i.label.length));
  return shown.map((i) => `${color.dim(i.label.padEnd(maxLabelLen))}  ${i.value}`).join("\n");
}

export function formatTableRow(columns: string[], widths: number[]): string {
  return columns.map((col, i) => col.padEnd(widths[i] ?? 0)).join(color.dim(" │ "));
}

export function formatTableSeparator(widths: number[]): string {
  return color.dim(widths.map((w) => "─".repeat(w)).join("─┼─"));
}

/**
 * One line per warning: `[kind] subject: message`
 */
export function formatWarnings(warnings: OperationWarning[]): string {
  return warnings
    .map((w) => `${color.yellow(`[${w.kind}]`)} ${w.subject}: ${w.message}`)
    .join("\n");
}
