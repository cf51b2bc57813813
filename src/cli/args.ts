/**
 * argv helpers: `--flag`, `--flag value`, and positional arguments.
 */

import { InvalidArgumentError } from "../errors.js";

/** Flags that take a value; their value is never a positional argument. */
export const VALUE_FLAGS = new Set([
  "--after-hash",
  "--author",
  "--before-hash",
  "--dir",
  "--during",
  "--exclude-dates",
  "--exclude-filter",
  "--include-filter",
  "--limit",
  "--since",
  "--source",
  "--until",
]);

export function hasFlag(args: string[], name: string): boolean {
  return args.includes(name);
}

export function getFlagValue(args: string[], name: string): string | null {
  const i = args.indexOf(name);
  return i >= 0 && i < args.length - 1 ? args[i + 1] : null;
}

export function positionals(args: string[]): string[] {
  const out: string[] = [];
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg.startsWith("--")) {
      if (VALUE_FLAGS.has(arg)) i++;
      continue;
    }
    out.push(arg);
  }
  return out;
}

/** Positive integer value of the flag, or the fallback when the flag is absent. */
export function getLimit(args: string[], fallback: number): number {
  const text = getFlagValue(args, "--limit");
  if (text === null) return fallback;
  const n = Number(text);
  if (!Number.isInteger(n) || n < 1) {
    throw new InvalidArgumentError(`Limit [${text}] must be a positive integer`);
  }
  return n;
}
