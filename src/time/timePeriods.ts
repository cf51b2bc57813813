/**
 * Sets of inclusive date ranges, e.g. holidays or a release window.
 *
 * Grammar: comma separated tokens, each `yyyy-MM-dd` or `yyyy-MM-dd--yyyy-MM-dd`.
 */

import { startOfDay } from "date-fns";
import { InvalidArgumentError } from "../errors.js";
import { hasText } from "../util/order.js";
import { formatLocalDate, parseLocalDate } from "./dates.js";

const TOKEN_SEPARATOR = ",";
const RANGE_SEPARATOR = "--";

export class DateRange {
  readonly start: Date;
  readonly end: Date;

  constructor(start: Date, end: Date) {
    const s = startOfDay(start);
    const e = startOfDay(end);
    if (s.getTime() > e.getTime()) {
      throw new InvalidArgumentError(
        `Start Date [${formatLocalDate(s)}] must be on or before End Date [${formatLocalDate(e)}]`,
      );
    }
    this.start = s;
    this.end = e;
  }

  static forSingleDate(date: Date): DateRange {
    return new DateRange(date, date);
  }

  static parse(token: string): DateRange {
    const parts = token.trim().split(RANGE_SEPARATOR);
    if (parts.length > 2) {
      throw new InvalidArgumentError(`Date(s) [${token}] are not valid`);
    }
    try {
      const start = parseLocalDate(parts[0]);
      const end = parts.length > 1 ? parseLocalDate(parts[1]) : start;
      return new DateRange(start, end);
    } catch (err) {
      if (err instanceof InvalidArgumentError) {
        throw new InvalidArgumentError(`Date(s) [${token}] are not valid`, err);
      }
      throw err;
    }
  }

  isSingleDate(): boolean {
    return this.start.getTime() === this.end.getTime();
  }

  isDuring(date: Date): boolean {
    const day = startOfDay(date).getTime();
    return day >= this.start.getTime() && day <= this.end.getTime();
  }

  toString(): string {
    const start = formatLocalDate(this.start);
    return this.isSingleDate() ? start : start + RANGE_SEPARATOR + formatLocalDate(this.end);
  }
}

export class TimePeriods implements Iterable<DateRange> {
  private readonly ranges: DateRange[];

  private constructor(ranges: Iterable<DateRange | null | undefined>) {
    this.ranges = [...ranges].filter((r): r is DateRange => r != null);
  }

  static empty(): TimePeriods {
    return new TimePeriods([]);
  }

  static of(...ranges: Array<DateRange | null | undefined>): TimePeriods {
    return new TimePeriods(ranges);
  }

  static ofSingleDates(...dates: Array<Date | null | undefined>): TimePeriods {
    return new TimePeriods(dates.map((d) => (d != null ? DateRange.forSingleDate(d) : null)));
  }

  static parse(text: string): TimePeriods {
    const tokens = (text ?? "").split(TOKEN_SEPARATOR).filter(hasText);
    return new TimePeriods(tokens.map((t) => DateRange.parse(t)));
  }

  get size(): number {
    return this.ranges.length;
  }

  isEmpty(): boolean {
    return this.ranges.length === 0;
  }

  isDuring(date: Date | null | undefined): boolean {
    return date != null && this.ranges.some((r) => r.isDuring(date));
  }

  asPredicate(): (date: Date) => boolean {
    return (date) => this.isDuring(date);
  }

  [Symbol.iterator](): Iterator<DateRange> {
    return this.ranges[Symbol.iterator]();
  }

  toString(): string {
    return this.ranges.map(String).join(TOKEN_SEPARATOR);
  }
}
