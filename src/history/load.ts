/**
 * Builds a CommitHistory from raw commits supplied by a loader (the git log adapter by default).
 */

import { loadRawCommits } from "../git/log.js";
import type { RawCommit, RawCommitLoader } from "../git/types.js";
import { Author } from "../model/author.js";
import { CommitHistory } from "./commitHistory.js";
import { CommitRecord } from "./commitRecord.js";

export function toCommitRecord(raw: RawCommit): CommitRecord {
  return CommitRecord.of(Author.as(raw.authorName, raw.authorEmail), raw.timestamp, raw.hash)
    .withMessage(raw.message)
    .add(...raw.files);
}

export function commitHistoryFrom(raws: Iterable<RawCommit>): CommitHistory {
  const records: CommitRecord[] = [];
  for (const raw of raws) records.push(toCommitRecord(raw));
  return CommitHistory.of(records);
}

export function loadCommitHistory(repoRoot: string, loader: RawCommitLoader = loadRawCommits): CommitHistory {
  return commitHistoryFrom(loader(repoRoot));
}
