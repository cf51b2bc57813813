/**
 * .projlens.yml loader (v1 schema). Unknown keys or invalid values throw ConfigError (CLI exits 2).
 * Missing file → defaults.
 */

import { existsSync, readFileSync } from "fs";
import { join } from "path";
import { parse } from "yaml";
import { ConfigError, errorMessage } from "../errors.js";
import { TimePeriods } from "../time/timePeriods.js";

export const CONFIG_FILE = ".projlens.yml";

const ALLOWED_KEYS = new Set(["workdayStart", "workdayEnd", "logLimit", "groupLimit", "excludeDates"]);
const DEFAULT_WORKDAY_START = 9;
const DEFAULT_WORKDAY_END = 17;
const DEFAULT_LOG_LIMIT = 5;
const DEFAULT_GROUP_LIMIT = 12;
const MAX_LIMIT = 1000;

export interface ProjlensConfig {
  workdayStart: number;
  workdayEnd: number;
  logLimit: number;
  groupLimit: number;
  /** TimePeriods text excluded from every commit query; empty for none. */
  excludeDates: string;
}

export function defaultConfig(): ProjlensConfig {
  return {
    workdayStart: DEFAULT_WORKDAY_START,
    workdayEnd: DEFAULT_WORKDAY_END,
    logLimit: DEFAULT_LOG_LIMIT,
    groupLimit: DEFAULT_GROUP_LIMIT,
    excludeDates: "",
  };
}

function integerIn(obj: Record<string, unknown>, key: string, min: number, max: number, fallback: number): number {
  const value = obj[key];
  if (value === undefined) return fallback;
  const n = typeof value === "number" ? value : Number.NaN;
  if (!Number.isInteger(n) || n < min || n > max) {
    throw new ConfigError(`${CONFIG_FILE}: ${key} must be an integer between ${min} and ${max}`);
  }
  return n;
}

export function parseProjlensConfig(content: string): ProjlensConfig {
  let raw: unknown;
  try {
    raw = parse(content);
  } catch (err) {
    throw new ConfigError(`${CONFIG_FILE}: invalid YAML — ${errorMessage(err)}`, err);
  }

  if (raw === null || raw === undefined) return defaultConfig();
  if (typeof raw !== "object" || Array.isArray(raw)) {
    throw new ConfigError(`${CONFIG_FILE}: root must be an object`);
  }

  const obj = raw as Record<string, unknown>;
  for (const key of Object.keys(obj)) {
    if (!ALLOWED_KEYS.has(key)) {
      throw new ConfigError(`${CONFIG_FILE}: unknown key "${key}"`);
    }
  }

  const workdayStart = integerIn(obj, "workdayStart", 0, 23, DEFAULT_WORKDAY_START);
  const workdayEnd = integerIn(obj, "workdayEnd", 1, 24, DEFAULT_WORKDAY_END);
  if (workdayEnd <= workdayStart) {
    throw new ConfigError(`${CONFIG_FILE}: workdayEnd must be after workdayStart`);
  }
  const logLimit = integerIn(obj, "logLimit", 1, MAX_LIMIT, DEFAULT_LOG_LIMIT);
  const groupLimit = integerIn(obj, "groupLimit", 1, MAX_LIMIT, DEFAULT_GROUP_LIMIT);

  let excludeDates = "";
  if (obj.excludeDates !== undefined) {
    const value = obj.excludeDates;
    const text = Array.isArray(value) ? value.map(String).join(",") : value;
    if (typeof text !== "string") {
      throw new ConfigError(`${CONFIG_FILE}: excludeDates must be a string or a list of dates`);
    }
    try {
      TimePeriods.parse(text);
    } catch (err) {
      throw new ConfigError(`${CONFIG_FILE}: excludeDates — ${errorMessage(err)}`, err);
    }
    excludeDates = text;
  }

  return { workdayStart, workdayEnd, logLimit, groupLimit, excludeDates };
}

/** Load and validate .projlens.yml from the repository root. */
export function loadProjlensConfig(repoRoot: string): ProjlensConfig {
  const path = join(repoRoot, CONFIG_FILE);
  if (!existsSync(path)) return defaultConfig();
  let content: string;
  try {
    content = readFileSync(path, "utf8");
  } catch (err) {
    throw new ConfigError(`${CONFIG_FILE}: cannot be read — ${errorMessage(err)}`, err);
  }
  return parseProjlensConfig(content);
}
