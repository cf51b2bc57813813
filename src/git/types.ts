/**
 * Commit data as materialized from the repository, before it becomes a CommitRecord.
 */

export interface RawCommit {
  hash: string;
  authorName: string;
  authorEmail?: string;
  /** Earliest of author and committer time. */
  timestamp: Date;
  message: string;
  /** Paths changed relative to the previous commit, repository-relative with forward slashes. */
  files: string[];
}

export type RawCommitLoader = (repoRoot: string) => Iterable<RawCommit>;
