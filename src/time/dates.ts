/**
 * Local calendar helpers. Commit timestamps are read in the local time zone; days are `yyyy-MM-dd`.
 */

import { format, isSameDay, isValid, isWeekend, parse, startOfDay } from "date-fns";
import { InvalidArgumentError } from "../errors.js";

export const DATE_PATTERN = "yyyy-MM-dd";
export const MONTH_PATTERN = "yyyy-MM";

const DATE_SHAPE = /^\d{4}-\d{2}-\d{2}$/;

/** Parse a `yyyy-MM-dd` date to local midnight. */
export function parseLocalDate(text: string): Date {
  const value = text.trim();
  const date = DATE_SHAPE.test(value) ? parse(value, DATE_PATTERN, new Date(0)) : new Date(Number.NaN);
  if (!isValid(date)) {
    throw new InvalidArgumentError(`Date [${text}] is not valid; expected ${DATE_PATTERN}`);
  }
  return startOfDay(date);
}

export function formatLocalDate(date: Date): string {
  return format(date, DATE_PATTERN);
}

export function formatLocalMonth(date: Date): string {
  return format(date, MONTH_PATTERN);
}

export function sameLocalDay(a: Date, b: Date): boolean {
  return isSameDay(a, b);
}

export function isWeekendDay(date: Date): boolean {
  return isWeekend(date);
}

/** Seconds since local midnight. */
export function secondsOfDay(date: Date): number {
  return date.getHours() * 3600 + date.getMinutes() * 60 + date.getSeconds();
}

export function isValidDate(value: unknown): value is Date {
  return value instanceof Date && isValid(value);
}
