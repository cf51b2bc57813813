/**
 * Commit counts per time period as a two-column table, largest period first.
 */

import { format } from "date-fns";
import type { Group, GroupKey } from "../history/commitHistory.js";
import { parseLocalDate } from "../time/dates.js";
import { numberCompare } from "../util/order.js";

export type PeriodUnit = "day" | "month" | "year";

export const GROUP_COUNTS_HEADER = "    TIME PERIOD    |    COUNT    ";
export const GROUP_COUNTS_RULE = "-".repeat(GROUP_COUNTS_HEADER.length);

const PERIOD_WIDTH = 15;

/** Day keys render as `yyyy-MMM-dd`, month keys as `yyyy-MMMM`, years as the number. */
export function formatPeriod(key: GroupKey, unit: PeriodUnit): string {
  switch (unit) {
    case "day":
      return format(parseLocalDate(String(key)), "yyyy-MMM-dd");
    case "month":
      return format(parseLocalDate(`${String(key)}-01`), "yyyy-MMMM");
    case "year":
      return String(key);
  }
}

export function formatGroupCounts(groups: Group[], limit: number, unit: PeriodUnit): string {
  // Array.prototype.sort is stable: equal counts keep ascending key order.
  const largest = [...groups].sort((a, b) => numberCompare(b.size, a.size)).slice(0, Math.max(0, limit));
  const rows = largest.map((g) => `    ${formatPeriod(g.key, unit).padEnd(PERIOD_WIDTH)}|    ${g.size}`);
  return [GROUP_COUNTS_HEADER, GROUP_COUNTS_RULE, ...rows].join("\n");
}
