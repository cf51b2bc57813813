/**
 * One revision from the repository log.
 *
 * Identity is the hash. Natural order is descending by timestamp (most recent first).
 */

import { format } from "date-fns";
import { InvalidArgumentError, InvalidStateError } from "../errors.js";
import { Author } from "../model/author.js";
import { formatLocalDate, isValidDate } from "../time/dates.js";
import { hasText, invert, numberCompare, sortStrings } from "../util/order.js";

export const SHORT_HASH_LENGTH = 7;

export class CommitRecord implements Iterable<string> {
  readonly author: Author;
  readonly timestamp: Date;
  readonly hash: string;
  private _message: string | undefined;
  private readonly sourceFiles = new Set<string>();

  constructor(author: Author, timestamp: Date, hash: string) {
    if (!(author instanceof Author)) {
      throw new InvalidArgumentError("Author of commit is required");
    }
    if (!isValidDate(timestamp)) {
      throw new InvalidArgumentError(`Timestamp [${String(timestamp)}] of commit is required`);
    }
    if (!hasText(hash)) {
      throw new InvalidArgumentError(`Hash [${hash}] of commit is required`);
    }
    this.author = author;
    this.timestamp = new Date(timestamp.getTime());
    this.hash = hash.trim();
  }

  static of(author: Author, timestamp: Date, hash: string): CommitRecord {
    return new CommitRecord(author, timestamp, hash);
  }

  /** Newest first. */
  static compare(a: CommitRecord, b: CommitRecord): number {
    return a.compareTo(b);
  }

  /** Oldest first. */
  static compareChronologically(a: CommitRecord, b: CommitRecord): number {
    return numberCompare(a.timestamp.getTime(), b.timestamp.getTime());
  }

  get message(): string {
    return this._message ?? "";
  }

  /** Real hashes are at least 7 characters long; shorter ones are returned whole. */
  get shortHash(): string {
    return this.hash.slice(0, SHORT_HASH_LENGTH);
  }

  /** Local `yyyy-MM-dd`. */
  get date(): string {
    return formatLocalDate(this.timestamp);
  }

  /** Local `HH:mm:ss`. */
  get time(): string {
    return format(this.timestamp, "HH:mm:ss");
  }

  /** Touched files sorted by path. */
  get files(): string[] {
    return sortStrings(this.sourceFiles);
  }

  get fileCount(): number {
    return this.sourceFiles.size;
  }

  withMessage(message: string): this {
    if (this._message !== undefined) {
      throw new InvalidStateError(`Message for commit [${this.hash}] is already set`);
    }
    this._message = message ?? "";
    return this;
  }

  add(...paths: Array<string | null | undefined>): this {
    for (const p of paths) {
      if (hasText(p)) this.sourceFiles.add(p.trim());
    }
    return this;
  }

  contains(path: string | null | undefined): boolean {
    return path != null && this.sourceFiles.has(path.trim());
  }

  compareTo(that: CommitRecord): number {
    return invert(CommitRecord.compareChronologically(this, that));
  }

  equals(that: unknown): boolean {
    return that instanceof CommitRecord && that.hash === this.hash;
  }

  [Symbol.iterator](): Iterator<string> {
    return this.files[Symbol.iterator]();
  }

  toString(): string {
    return this.hash;
  }
}
