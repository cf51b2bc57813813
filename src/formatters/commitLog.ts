/**
 * Plain-text rendering of commits, in the layout of `git log`.
 */

import { format } from "date-fns";
import type { CommitHistory } from "../history/commitHistory.js";
import { CommitRecord } from "../history/commitRecord.js";

export const COMMIT_TIMESTAMP_PATTERN = "EEE, yyyy-MMM-dd HH:mm:ss";
export const NO_COMMITS = "No commits found";

const INDENT = "    ";

export function formatCommitRecord(record: CommitRecord, showFiles = false): string {
  const lines = [
    `Author: ${record.author.toString()}`,
    `Commit: ${record.hash}`,
    `Date:   ${format(record.timestamp, COMMIT_TIMESTAMP_PATTERN)}`,
  ];
  const message = record.message.trim();
  if (message) {
    lines.push("");
    for (const line of message.split("\n")) lines.push((INDENT + line).trimEnd());
  }
  if (showFiles && record.fileCount > 0) {
    lines.push("", `Files (${record.fileCount}):`);
    for (const path of record) lines.push(INDENT + path);
  }
  return lines.join("\n");
}

/** The `limit` newest commits, newest first, separated by blank lines. */
export function formatCommitLog(history: CommitHistory, limit: number, showFiles = false): string {
  const newest = history.toArray().sort(CommitRecord.compare).slice(0, Math.max(0, limit));
  if (newest.length === 0) return NO_COMMITS;
  return newest.map((r) => formatCommitRecord(r, showFiles)).join("\n\n");
}
