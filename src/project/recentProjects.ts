/**
 * Persisted bookmarks of recently used projects: name → location, in recent-projects.json.
 */

import { existsSync, mkdirSync, readFileSync, renameSync, unlinkSync, writeFileSync } from "fs";
import { homedir } from "os";
import { dirname, join } from "path";
import { stringCompareBinary } from "../util/order.js";
import type { Project } from "./project.js";

const RECENT_PROJECTS_FILE = "recent-projects.json";

export interface RecentProject {
  name: string;
  location: string;
}

/** PROJLENS_HOME, else ~/.projlens. */
export function defaultStoreDir(): string {
  return process.env.PROJLENS_HOME ?? join(homedir(), ".projlens");
}

function stableStringify(obj: unknown): string {
  if (obj === null) return "null";
  if (typeof obj === "boolean" || typeof obj === "number") return String(obj);
  if (typeof obj === "string") return JSON.stringify(obj);
  if (Array.isArray(obj)) {
    return "[" + obj.map((v) => stableStringify(v)).join(",") + "]";
  }
  if (typeof obj === "object") {
    const entries = Object.entries(obj).sort(([a], [b]) => stringCompareBinary(a, b));
    return "{" + entries.map(([k, v]) => JSON.stringify(k) + ":" + stableStringify(v)).join(",") + "}";
  }
  return "null";
}

function atomicWrite(path: string, content: string): void {
  const dir = dirname(path);
  mkdirSync(dir, { recursive: true });
  const tmp = join(dir, ".tmp-projlens-recent-write.json");
  writeFileSync(tmp, content, "utf8");
  try {
    renameSync(tmp, path);
  } finally {
    if (existsSync(tmp)) unlinkSync(tmp);
  }
}

function sortRecent(list: RecentProject[]): RecentProject[] {
  return [...list].sort((a, b) => stringCompareBinary(a.name, b.name) || stringCompareBinary(a.location, b.location));
}

/** Missing or unreadable store → empty list. */
export function loadRecentProjects(storeDir: string): RecentProject[] {
  const path = join(storeDir, RECENT_PROJECTS_FILE);
  let data: unknown;
  try {
    data = JSON.parse(readFileSync(path, "utf8"));
  } catch {
    return [];
  }
  if (data === null || typeof data !== "object" || Array.isArray(data)) return [];
  const list: RecentProject[] = [];
  for (const [name, location] of Object.entries(data)) {
    if (typeof location === "string" && location.length > 0) list.push({ name, location });
  }
  return sortRecent(list);
}

/** Writes the entries whose location still exists. */
export function saveRecentProjects(storeDir: string, list: RecentProject[]): void {
  const byName: Record<string, string> = {};
  for (const entry of sortRecent(list)) {
    if (existsSync(entry.location)) byName[entry.name] = entry.location;
  }
  atomicWrite(join(storeDir, RECENT_PROJECTS_FILE), stableStringify(byName) + "\n");
}

/** Adds or relocates the project's entry. Projects without a directory are not remembered. */
export function rememberProject(list: RecentProject[], project: Project): RecentProject[] {
  if (!project.directory) return sortRecent(list);
  const others = list.filter((e) => e.name !== project.name);
  return sortRecent([...others, { name: project.name, location: project.directory }]);
}
