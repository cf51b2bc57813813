/**
 * Reads the commit log of a local repository through the git executable.
 */

import { spawnSync } from "child_process";
import { resolve } from "path";
import { GitCommandError } from "../errors.js";
import type { RawCommit } from "./types.js";

const RECORD_SEPARATOR = "\x1e";
const FIELD_SEPARATOR = "\x1f";
const LOG_FORMAT = ["%H", "%an", "%ae", "%at", "%ct", "%B", ""].join("%x1f");
const MAX_LOG_BUFFER = 256 * 1024 * 1024;

export function getRepoRoot(cwd: string = process.cwd()): string | null {
  try {
    const out = spawnSync("git", ["rev-parse", "--show-toplevel"], {
      encoding: "utf8",
      cwd,
      maxBuffer: 64 * 1024,
    });
    if (out.status !== 0 || !out.stdout?.trim()) return null;
    return resolve(out.stdout.trim());
  } catch {
    return null;
  }
}

function epochSeconds(text: string): number | null {
  const n = Number.parseInt(text.trim(), 10);
  return Number.isFinite(n) ? n : null;
}

/**
 * Parse `git log --name-only` output written with LOG_FORMAT.
 * Each record is `%x1e`, the fields each closed by `%x1f`, then the changed file names one per line.
 */
export function parseGitLog(output: string): RawCommit[] {
  const commits: RawCommit[] = [];
  for (const chunk of output.split(RECORD_SEPARATOR)) {
    if (!chunk.trim()) continue;
    const fields = chunk.split(FIELD_SEPARATOR);
    if (fields.length < 7) continue;

    const [hash, authorName, authorEmail, authorTime, committerTime] = fields;
    const message = fields.slice(5, fields.length - 1).join(FIELD_SEPARATOR).trim();
    const fileSection = fields[fields.length - 1];
    const times = [epochSeconds(authorTime), epochSeconds(committerTime)].filter(
      (t): t is number => t !== null,
    );
    if (!hash.trim() || times.length === 0) continue;

    const files = fileSection
      .split("\n")
      .map((line) => line.replace(/\\/g, "/").trim())
      .filter(Boolean);

    commits.push({
      hash: hash.trim(),
      authorName: authorName.trim(),
      authorEmail: authorEmail.trim() || undefined,
      timestamp: new Date(Math.min(...times) * 1000),
      message,
      files,
    });
  }
  return commits;
}

/** Run git in the repository and return stdout. A failed or non-zero run throws GitCommandError. */
export function runGit(repoRoot: string, args: string[], maxBuffer: number = MAX_LOG_BUFFER): string {
  const out = spawnSync("git", args, {
    encoding: "utf8",
    cwd: repoRoot,
    maxBuffer,
  });
  if (out.error) {
    throw new GitCommandError(`Failed to run git ${args[0]} in [${repoRoot}]: ${out.error.message}`, out.error);
  }
  if (out.status !== 0) {
    const stderr = (out.stderr ?? "").trim();
    throw new GitCommandError(`git ${args[0]} failed in [${repoRoot}]${stderr ? ": " + stderr : ""}`);
  }
  return out.stdout ?? "";
}

export function loadRawCommits(repoRoot: string): RawCommit[] {
  return parseGitLog(runGit(repoRoot, ["log", "--all", "-M", "--name-only", `--format=%x1e${LOG_FORMAT}`]));
}
