/**
 * Working tree status from `git status --porcelain -z`.
 */

import { sortStrings } from "../util/order.js";
import { runGit } from "./log.js";

const STATUS_MAX_BUFFER = 64 * 1024 * 1024;

/** Both-sides codes git uses for unmerged paths. */
const CONFLICT_CODES = new Set(["DD", "AU", "UD", "UA", "DU", "AA", "UU"]);

export interface GitStatusEntries {
  added?: Iterable<string>;
  changed?: Iterable<string>;
  conflicts?: Iterable<string>;
  ignored?: Iterable<string>;
  missing?: Iterable<string>;
  removed?: Iterable<string>;
  untracked?: Iterable<string>;
}

/** Paths by kind of change, each list sorted and unique. */
export class GitStatus {
  /** Staged new files, including the new path of a rename or copy. */
  readonly added: string[];
  /** Modified files, staged or not. */
  readonly changed: string[];
  readonly conflicts: string[];
  readonly ignored: string[];
  /** Deleted in the working tree but not staged. */
  readonly missing: string[];
  /** Staged deletions, including the old path of a rename. */
  readonly removed: string[];
  readonly untracked: string[];

  constructor(entries: GitStatusEntries = {}) {
    this.added = sortStrings(new Set(entries.added ?? []));
    this.changed = sortStrings(new Set(entries.changed ?? []));
    this.conflicts = sortStrings(new Set(entries.conflicts ?? []));
    this.ignored = sortStrings(new Set(entries.ignored ?? []));
    this.missing = sortStrings(new Set(entries.missing ?? []));
    this.removed = sortStrings(new Set(entries.removed ?? []));
    this.untracked = sortStrings(new Set(entries.untracked ?? []));
  }

  /** Every tracked path with a change not yet committed. */
  get uncommitted(): string[] {
    return sortStrings(new Set([...this.added, ...this.changed, ...this.conflicts, ...this.missing, ...this.removed]));
  }

  isClean(): boolean {
    return this.uncommitted.length === 0 && this.ignored.length === 0 && this.untracked.length === 0;
  }

  isDirty(): boolean {
    return !this.isClean();
  }
}

/**
 * Parse porcelain v1 output written with `-z`: entries `XY path` separated by NUL,
 * a rename or copy followed by its original path as the next entry.
 */
export function parseStatus(output: string): GitStatus {
  const added: string[] = [];
  const changed: string[] = [];
  const conflicts: string[] = [];
  const ignored: string[] = [];
  const missing: string[] = [];
  const removed: string[] = [];
  const untracked: string[] = [];

  const entries = output.split("\0");
  for (let i = 0; i < entries.length; i++) {
    const entry = entries[i];
    if (entry.length < 4) continue;
    const code = entry.slice(0, 2);
    const path = entry.slice(3);
    const index = code[0];
    const worktree = code[1];

    if (code === "??") {
      untracked.push(path);
      continue;
    }
    if (code === "!!") {
      ignored.push(path);
      continue;
    }
    if (CONFLICT_CODES.has(code)) {
      conflicts.push(path);
      continue;
    }

    if (index === "R" || index === "C") {
      added.push(path);
      const original = entries[++i];
      if (index === "R" && original) removed.push(original);
    } else if (index === "A") {
      added.push(path);
    } else if (index === "M" || index === "T") {
      changed.push(path);
    } else if (index === "D") {
      removed.push(path);
    }

    if (worktree === "M" || worktree === "T") changed.push(path);
    else if (worktree === "D") missing.push(path);
  }

  return new GitStatus({ added, changed, conflicts, ignored, missing, removed, untracked });
}

export function loadStatus(repoRoot: string): GitStatus {
  return parseStatus(runGit(repoRoot, ["status", "--porcelain", "-z", "--untracked-files=all"], STATUS_MAX_BUFFER));
}
