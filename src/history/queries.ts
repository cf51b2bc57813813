/**
 * Composable commit predicates behind the reports. Unset criteria match every commit.
 */

import { addDays } from "date-fns";
import { parseLocalDate, isWeekendDay, secondsOfDay } from "../time/dates.js";
import { TimePeriods } from "../time/timePeriods.js";
import { hasText } from "../util/order.js";
import type { Predicate } from "../util/order.js";
import type { CommitRecord } from "./commitRecord.js";

export type CommitPredicate = Predicate<CommitRecord>;

export interface WorkHours {
  /** Hour of day work starts, 0–23. */
  startHour: number;
  /** Hour of day work ends, 1–24. */
  endHour: number;
}

export const DEFAULT_WORK_HOURS: WorkHours = { startHour: 9, endHour: 17 };

export interface TimeCriteria {
  since?: string;
  until?: string;
  during?: string;
  excluding?: string;
}

export const ALL_COMMITS: CommitPredicate = () => true;

export function and(...predicates: CommitPredicate[]): CommitPredicate {
  return (r) => predicates.every((p) => p(r));
}

export function not(predicate: CommitPredicate): CommitPredicate {
  return (r) => !predicate(r);
}

/** Author name or email contains the text, ignoring case. */
export function byAuthorLike(text: string | undefined): CommitPredicate {
  if (!hasText(text)) return ALL_COMMITS;
  return (r) => r.author.resembles(text);
}

/** On or after the `yyyy-MM-dd` date. */
export function sinceDate(text: string | undefined): CommitPredicate {
  if (!hasText(text)) return ALL_COMMITS;
  const since = parseLocalDate(text).getTime();
  return (r) => r.timestamp.getTime() >= since;
}

/** On or before the `yyyy-MM-dd` date (the whole day is included). */
export function untilDate(text: string | undefined): CommitPredicate {
  if (!hasText(text)) return ALL_COMMITS;
  const nextDay = addDays(parseLocalDate(text), 1).getTime();
  return (r) => r.timestamp.getTime() < nextDay;
}

export function duringDates(text: string | undefined): CommitPredicate {
  if (!hasText(text)) return ALL_COMMITS;
  const periods = TimePeriods.parse(text);
  return (r) => periods.isDuring(r.timestamp);
}

export function excludingDates(text: string | undefined): CommitPredicate {
  if (!hasText(text)) return ALL_COMMITS;
  const periods = TimePeriods.parse(text);
  return (r) => !periods.isDuring(r.timestamp);
}

export function byTime(criteria: TimeCriteria): CommitPredicate {
  return and(
    sinceDate(criteria.since),
    untilDate(criteria.until),
    excludingDates(criteria.excluding),
    duringDates(criteria.during),
  );
}

/** Monday–Friday, between the start and end hour inclusive. */
export function duringWorkHours(hours: WorkHours = DEFAULT_WORK_HOURS): CommitPredicate {
  const start = hours.startHour * 3600;
  const end = hours.endHour * 3600;
  return (r) => {
    if (isWeekendDay(r.timestamp)) return false;
    const t = secondsOfDay(r.timestamp);
    return t >= start && t <= end;
  };
}

/** Weekends, or before the start hour, or after the end hour. */
export function afterHours(hours: WorkHours = DEFAULT_WORK_HOURS): CommitPredicate {
  return not(duringWorkHours(hours));
}

/** Message contains the text, ignoring case. */
export function withMessage(text: string | undefined): CommitPredicate {
  if (!hasText(text)) return ALL_COMMITS;
  const needle = text.toLowerCase();
  return (r) => r.message.toLowerCase().includes(needle);
}

/** Message contains any of the `|`-separated texts, ignoring case. */
export function withAnyMessage(text: string | undefined): CommitPredicate {
  const needles = (text ?? "").split("|").filter(hasText).map((t) => t.toLowerCase());
  if (needles.length === 0) return ALL_COMMITS;
  return (r) => {
    const message = r.message.toLowerCase();
    return needles.some((n) => message.includes(n));
  };
}

/** Touches a file whose path contains the text. */
export function touchingPath(text: string | undefined): CommitPredicate {
  if (!hasText(text)) return ALL_COMMITS;
  return (r) => r.files.some((f) => f.includes(text));
}
